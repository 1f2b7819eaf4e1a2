import type { ChangeEntry, Comparator, Path, Verdict } from '../differ/types';
import { InvalidComparatorResultError } from '../errors';
import { fromChangeTuple, isChangeTuple } from '../format';
import { isChangeEntry, isNumeric } from '../guards';
import type { DiffConfig } from '../options';
import type { Scalar } from '../types/values';

/**
 * The subset of the configuration that decides value equality.
 */
export type EqualityConfig = Pick<
  DiffConfig,
  'strict' | 'numericTolerance' | 'strip'
>;

/**
 * Absolute difference of two numeric values, as a `number`.
 * `bigint` pairs are subtracted exactly before conversion.
 */
function numericDistance(left: number | bigint, right: number | bigint): number {
  if (typeof left === 'bigint' && typeof right === 'bigint') {
    const delta = left - right;
    return Number(delta < 0n ? -delta : delta);
  }
  return Math.abs(Number(left) - Number(right));
}

/**
 * Compares two non-null scalars under the configured rules.
 *
 * Logic:
 * 1. Identity:
 *    `Object.is` equal values are always equal (this covers `NaN`).
 * 2. Numbers:
 *    Equal when `|left - right| <= numericTolerance`. A tolerance of `0`
 *    means exact numeric equality (so `0` equals `-0`). Mixed `number` /
 *    `bigint` pairs only get here outside strict mode.
 * 3. Strings:
 *    With `strip`, compared after trimming both sides.
 * 4. Everything else:
 *    Strict equality.
 *
 * @param previous - Scalar from the base state.
 * @param current - Scalar from the new state.
 * @param config - The equality options.
 * @returns `true` if the scalars are considered equal.
 */
export function areScalarsEqual(
  previous: Exclude<Scalar, null>,
  current: Exclude<Scalar, null>,
  config: EqualityConfig
): boolean {
  if (Object.is(previous, current)) return true;

  if (isNumeric(previous) && isNumeric(current)) {
    if (config.strict && typeof previous !== typeof current) return false;
    return numericDistance(previous, current) <= config.numericTolerance;
  }

  if (
    config.strip &&
    typeof previous === 'string' &&
    typeof current === 'string'
  ) {
    return previous.trim() === current.trim();
  }

  return previous === current;
}

/**
 * Converts the list a comparator answered with into change entries.
 * Tuples are expanded, entries kept as they are.
 *
 * @throws {InvalidComparatorResultError} On the first element that is
 *   neither.
 */
function toComparatorChanges(path: Path, result: readonly unknown[]): ChangeEntry[] {
  return result.map((item, index) => {
    if (isChangeEntry(item)) return item;
    if (isChangeTuple(item)) return fromChangeTuple(item);
    throw new InvalidComparatorResultError(path, index);
  });
}

/**
 * Consults the custom comparator (if any) and normalises its answer.
 *
 * Mapping:
 * - `true`               → `equal`
 * - `false`              → `different`
 * - a list               → `replace` (entries and tuples, in order)
 * - anything else        → `defer` (default comparison runs)
 *
 * Exceptions thrown by the comparator propagate to the caller.
 *
 * @param comparator - The configured comparator, or `undefined`.
 * @param path - Location being compared.
 * @param previous - Value from the base state (`undefined` for added keys).
 * @param current - Value from the new state (`undefined` for removed keys).
 * @returns The normalised verdict.
 * @throws {InvalidComparatorResultError} When a returned list holds
 *   anything but change entries and change tuples.
 */
export function consultComparator(
  comparator: Comparator | undefined,
  path: Path,
  previous: unknown,
  current: unknown
): Verdict {
  if (!comparator) return { kind: 'defer' };

  const result: unknown = comparator(path, previous, current);

  if (result === true) return { kind: 'equal' };
  if (result === false) return { kind: 'different' };
  if (Array.isArray(result)) {
    return { kind: 'replace', changes: toComparatorChanges(path, result) };
  }
  return { kind: 'defer' };
}
