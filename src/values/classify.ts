import {
  isArray,
  isNumeric,
  isPlainObject,
  isPresentScalar,
  isScalarKeyedMap
} from '../guards';
import type {
  KeyedView,
  NodePair,
  Scalar,
  ValueNode
} from '../types/values';

/**
 * Classifies a raw input value into the closed {@link ValueNode} variant.
 *
 * Order of checks:
 * 1. `null`
 * 2. string / number / bigint / boolean
 * 3. arrays
 * 4. plain objects
 * 5. `Map`s with scalar keys
 * 6. everything else (`undefined`, functions, symbols, `Date`, class
 *    instances, boxed primitives, `Map`s with object keys) is unsupported.
 *
 * @param value - The value to classify.
 * @returns The tagged node.
 */
export function classify(value: unknown): ValueNode {
  if (value === null) return { kind: 'null' };
  if (isPresentScalar(value)) return { kind: 'scalar', value };
  if (isArray(value)) return { kind: 'sequence', value };
  if (isPlainObject(value)) return { kind: 'record', value };
  if (isScalarKeyedMap(value)) return { kind: 'map', value };
  return { kind: 'unsupported', value };
}

/**
 * Builds a {@link KeyedView} over a record.
 * Only own enumerable string keys take part in the comparison.
 */
function viewRecord(record: Readonly<Record<string, unknown>>): KeyedView {
  return {
    keys: Object.keys(record),
    has: key => typeof key === 'string' && Object.hasOwn(record, key),
    get: key => (typeof key === 'string' ? record[key] : undefined)
  };
}

function viewMap(map: ReadonlyMap<Scalar, unknown>): KeyedView {
  return {
    keys: Array.from(map.keys()),
    has: key => map.has(key),
    get: key => map.get(key)
  };
}

/**
 * Determines whether two scalars may be compared as values.
 *
 * Same `typeof` is always comparable. `number` against `bigint` is comparable
 * only outside strict mode.
 */
export function areScalarsComparable(
  previous: Exclude<Scalar, null>,
  current: Exclude<Scalar, null>,
  strict: boolean
): boolean {
  if (typeof previous === typeof current) return true;
  return !strict && isNumeric(previous) && isNumeric(current);
}

/**
 * Pairs two classified nodes when they share a comparable shape.
 *
 * Returns `undefined` for shape mismatches (sequence vs record, record vs
 * `Map`, string vs number, ...) and whenever either side is `null` alone or
 * unsupported: callers report those as a whole-value change.
 *
 * @param previous - Node from the base state.
 * @param current - Node from the new state.
 * @param strict - Whether scalar types must match exactly.
 * @returns The typed pair, or `undefined` if the nodes are not comparable.
 */
export function pairNodes(
  previous: ValueNode,
  current: ValueNode,
  strict: boolean
): NodePair | undefined {
  if (previous.kind === 'null' && current.kind === 'null') {
    return { kind: 'null' };
  }

  if (previous.kind === 'sequence' && current.kind === 'sequence') {
    return {
      kind: 'sequence',
      previous: previous.value,
      current: current.value
    };
  }

  if (previous.kind === 'record' && current.kind === 'record') {
    return {
      kind: 'keyed',
      previous: viewRecord(previous.value),
      current: viewRecord(current.value)
    };
  }

  if (previous.kind === 'map' && current.kind === 'map') {
    return {
      kind: 'keyed',
      previous: viewMap(previous.value),
      current: viewMap(current.value)
    };
  }

  if (
    previous.kind === 'scalar' &&
    current.kind === 'scalar' &&
    areScalarsComparable(previous.value, current.value, strict)
  ) {
    return {
      kind: 'scalar',
      previous: previous.value,
      current: current.value
    };
  }

  return undefined;
}

/**
 * Compares two keys by the code points of their string form. Used to impose
 * a deterministic order on keyed containers, whose insertion order carries
 * no meaning.
 *
 * Code points rather than UTF-16 units: astral characters sort after
 * `U+E000`-`U+FFFF`, as they do in UTF-8 byte order.
 */
export function compareKeys(left: Scalar, right: Scalar): number {
  const leftPoints = Array.from(String(left), char => char.codePointAt(0) ?? 0);
  const rightPoints = Array.from(String(right), char => char.codePointAt(0) ?? 0);
  const shared = Math.min(leftPoints.length, rightPoints.length);

  for (let index = 0; index < shared; index++) {
    const delta = leftPoints[index] - rightPoints[index];
    if (delta !== 0) return delta < 0 ? -1 : 1;
  }

  if (leftPoints.length === rightPoints.length) return 0;
  return leftPoints.length < rightPoints.length ? -1 : 1;
}

/**
 * Returns a copy of `keys` sorted by {@link compareKeys}.
 * The sort is stable, so keys with the same string form keep their
 * insertion order (e.g. `1` and `"1"` in a `Map`).
 */
export function sortKeys(keys: readonly Scalar[]): Scalar[] {
  return [...keys].sort(compareKeys);
}
