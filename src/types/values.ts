/**
 * A leaf value that the differ compares by value.
 *
 * `number` and `bigint` are the two numeric kinds. With `strict: false` they
 * are compared against each other by numeric value.
 */
export type Scalar = string | number | bigint | boolean | null;

/**
 * A plain object (object literal or `Object.create(null)`) with string keys.
 */
export type ValueRecord = { readonly [key: string]: Value };

/**
 * An ES `Map` keyed by scalars. Keys keep their native type in token paths.
 */
export type ValueMap = ReadonlyMap<Scalar, Value>;

/**
 * An ordered sequence. Duplicates are allowed.
 */
export type ValueArray = readonly Value[];

/**
 * The fundamental unit of a diffable document.
 * Recursively defined as a scalar or a container holding other values.
 */
export type Value = Scalar | ValueRecord | ValueMap | ValueArray;

/**
 * Uniform read access to the entries of a record or a `Map`.
 */
export type KeyedView = {
  /**
   * Own keys in insertion order.
   */
  readonly keys: readonly Scalar[];
  has(key: Scalar): boolean;
  get(key: Scalar): unknown;
};

/**
 * The closed set of shapes an input node can take.
 *
 * Produced once per node by `classify`; every later dispatch switches on
 * `kind` instead of inspecting the raw value again.
 */
export type ValueNode =
  | { kind: 'null' }
  | { kind: 'scalar'; value: Exclude<Scalar, null> }
  | { kind: 'record'; value: Readonly<Record<string, unknown>> }
  | { kind: 'map'; value: ReadonlyMap<Scalar, unknown> }
  | { kind: 'sequence'; value: readonly unknown[] }
  | { kind: 'unsupported'; value: unknown };

/**
 * Two classified nodes of the same comparable shape.
 *
 * Records and `Map`s are both `keyed`, but only ever paired with their own
 * representation.
 */
export type NodePair =
  | { kind: 'null' }
  | {
      kind: 'scalar';
      previous: Exclude<Scalar, null>;
      current: Exclude<Scalar, null>;
    }
  | { kind: 'keyed'; previous: KeyedView; current: KeyedView }
  | { kind: 'sequence'; previous: readonly unknown[]; current: readonly unknown[] };
