import type { Scalar } from '../types/values';

/**
 * A single raw token of a token path: a record key, a `Map` key in its native
 * type, or a sequence index.
 */
export type PathSegment = Scalar;

/**
 * A path expressed as raw tokens (e.g. `["users", 0, "name"]`).
 * Emitted when `arrayPath` is enabled.
 */
export type TokenPath = readonly PathSegment[];

/**
 * A location inside the compared structures.
 *
 * - `string`: delimited form, e.g. `"users[0].name"`.
 * - `TokenPath`: raw token form, e.g. `["users", 0, "name"]`.
 *
 * A single run never mixes the two.
 */
export type Path = string | TokenPath;

/**
 * Shared properties common to all change entries.
 */
type ChangeBase<P extends Path> = {
  /**
   * Location of the change. Remove and Modify entries address the previous
   * structure; Add entries address the current one.
   */
  path: P;
};

/**
 * Represents an **addition**.
 * The location exists in `current` but not in `previous`.
 */
export type ChangeAdd<P extends Path = Path> = ChangeBase<P> & {
  /**
   * Discriminator literal identifying the type of change.
   */
  op: 'add';
  /**
   * The value that was added.
   */
  value: unknown;
};

/**
 * Represents a **removal**.
 * The location exists in `previous` but not in `current`.
 */
export type ChangeRemove<P extends Path = Path> = ChangeBase<P> & {
  /**
   * Discriminator literal identifying the type of change.
   */
  op: 'remove';
  /**
   * The value that was removed.
   */
  oldValue: unknown;
};

/**
 * Represents a **modification**.
 * The location exists on both sides but the values differ (or cannot be
 * compared structurally).
 */
export type ChangeModify<P extends Path = Path> = ChangeBase<P> & {
  /**
   * Discriminator literal identifying the type of change.
   */
  op: 'modify';
  /**
   * The value in the `previous` structure.
   */
  oldValue: unknown;
  /**
   * The value in the `current` structure.
   */
  value: unknown;
};

/**
 * Union of all change entries emitted by the differ.
 */
export type ChangeEntry<P extends Path = Path> =
  | ChangeAdd<P>
  | ChangeRemove<P>
  | ChangeModify<P>;

/**
 * Compact positional form of a change entry, as consumed by patch tooling:
 *
 * - `['+', path, value]`
 * - `['-', path, oldValue]`
 * - `['~', path, oldValue, value]`
 */
export type ChangeTuple =
  | readonly ['+', Path, unknown]
  | readonly ['-', Path, unknown]
  | readonly ['~', Path, unknown, unknown];

/**
 * What a custom comparator may answer.
 *
 * - `true`: the values are equal, nothing is emitted.
 * - `false`: the values differ, a single Modify is emitted at the path.
 * - a list of entries and / or tuples: spliced into the result in order,
 *   tuples converted to entries. Any other list element is an error.
 * - anything else: no verdict, the default comparison runs.
 */
export type ComparatorResult =
  | boolean
  | readonly (ChangeEntry | ChangeTuple)[]
  | null
  | undefined
  | void;

/**
 * Custom comparison hook consulted before the default logic at every node.
 * Must be pure: it may be called many times and in document order.
 */
export type Comparator = (
  path: Path,
  previous: unknown,
  current: unknown
) => ComparatorResult;

/**
 * The normalised answer of a comparator.
 */
export type Verdict =
  | { kind: 'equal' }
  | { kind: 'different' }
  | { kind: 'replace'; changes: readonly ChangeEntry[] }
  | { kind: 'defer' };

/**
 * A pending comparison of two values at one location.
 */
export type DiffTask = {
  path: Path;
  previous: unknown;
  current: unknown;
};

/**
 * A container comparison waiting on its children.
 *
 * The traversal evaluates `tasks` in order and hands their results, in the
 * same order, to `finish`, which assembles the entries of this node.
 */
export type Frame = {
  tasks: readonly DiffTask[];
  finish: (results: readonly ChangeEntry[][]) => ChangeEntry[];
};

/**
 * The outcome of visiting one task: either final entries, or a frame whose
 * children still need to be compared.
 */
export type Expansion =
  | { kind: 'done'; changes: ChangeEntry[] }
  | { kind: 'frame'; frame: Frame };
