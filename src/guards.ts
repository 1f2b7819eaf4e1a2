import type { ChangeEntry, Path } from './differ/types';
import type { Scalar } from './types/values';

/**
 * Checks whether a value is an array.
 *
 * Wrapper around `Array.isArray` that acts as a TypeScript **type guard**
 * (`value is readonly T[]`). Note: `T` is not validated at runtime.
 *
 * @typeParam T  Assumed element type (defaults to `unknown`).
 * @param value  Value to test.
 * @returns      `true` if `value` is an array.
 */
export function isArray<T = unknown>(value: unknown): value is readonly T[] {
  return Array.isArray(value);
}

/**
 * Determines whether a value is a "plain object" (a simple POJO / dictionary
 * object).
 *
 * A value is considered plain if all of the following are true:
 * 1. It is not `null`.
 * 2. `typeof value === "object"`.
 * 3. Its prototype is either:
 *    - `Object.prototype` (typical object literals / `new Object()`), or
 *    - `null` (objects created via `Object.create(null)`).
 *
 * As a result, this returns `false` for arrays, `Map`s, `Date`s, class
 * instances and boxed primitives. Those are either handled by their own
 * guard or classified as unsupported shapes.
 *
 * @param value
 *   The value to test.
 * @returns
 *   `true` if `value` is a plain object; otherwise `false`.
 */
export function isPlainObject(
  value: unknown
): value is Readonly<Record<string, unknown>> {
  if (typeof value !== 'object' || value === null) return false;

  const proto = Object.getPrototypeOf(value);
  return proto === null || proto === Object.prototype;
}

/**
 * Narrowing helper for "object-like" values.
 *
 * @param value
 *   Unknown value to test.
 * @returns
 *   `true` if `value` is a non-null object; otherwise `false`.
 */
export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null;
}

/**
 * Guard for the non-null scalar kinds: string, number, bigint and boolean.
 */
export function isPresentScalar(
  value: unknown
): value is Exclude<Scalar, null> {
  return (
    typeof value === 'string' ||
    typeof value === 'number' ||
    typeof value === 'bigint' ||
    typeof value === 'boolean'
  );
}

/** Guard verifying the value is a scalar, `null` included. */
export function isScalar(value: unknown): value is Scalar {
  return value === null || isPresentScalar(value);
}

/** Guard verifying the value is one of the two numeric kinds. */
export function isNumeric(value: unknown): value is number | bigint {
  return typeof value === 'number' || typeof value === 'bigint';
}

/**
 * Checks whether a value is an ES `Map` whose keys are all scalars.
 *
 * Maps keyed by objects or symbols have no stable textual key order and no
 * token representation, so they are not treated as keyed containers.
 *
 * @param value
 *   Unknown value to test.
 * @returns
 *   `true` if `value` is a `Map` and every key satisfies {@link isScalar}.
 */
export function isScalarKeyedMap(
  value: unknown
): value is ReadonlyMap<Scalar, unknown> {
  if (!(value instanceof Map)) return false;

  for (const key of value.keys()) {
    if (!isScalar(key)) return false;
  }
  return true;
}

/**
 * Type guard for `Path`: either a string or an array of scalar tokens.
 */
export function isPath(value: unknown): value is Path {
  return (
    typeof value === 'string' || (Array.isArray(value) && value.every(isScalar))
  );
}

/**
 * Type guard for a single `ChangeEntry`.
 *
 * Used on comparator results, which come from user code and are only
 * trusted once every entry has the expected shape.
 *
 * @param value
 *   Unknown value to validate.
 * @returns
 *   `true` if `value` has a known `op`, a valid `path` and the value slots
 *   that operation requires.
 */
export function isChangeEntry(value: unknown): value is ChangeEntry {
  if (!isRecord(value) || !isPath(value.path)) return false;

  switch (value.op) {
    case 'add':
      return 'value' in value;
    case 'remove':
      return 'oldValue' in value;
    case 'modify':
      return 'value' in value && 'oldValue' in value;
    default:
      return false;
  }
}
