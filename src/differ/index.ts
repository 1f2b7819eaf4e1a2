import { UnsupportedValueShapeError } from '../errors';
import { log } from '../logger';
import {
  type ComparisonOptions,
  type DiffConfig,
  normalizeOptions
} from '../options';
import type { KeyedView, Scalar } from '../types/values';
import { appendKey, describePath } from '../utils/path-utils';
import { classify, pairNodes, sortKeys } from '../values/classify';
import { areScalarsEqual, consultComparator } from '../values/compare';
import { CycleTracker } from '../values/cycles';
import {
  type ArrayStrategy,
  getArrayStrategy,
  planArrayDiff
} from './strategies';
import type {
  ChangeEntry,
  Comparator,
  DiffTask,
  Expansion,
  Frame,
  Path,
  TokenPath
} from './types';
import { createAdd, createModify, createRemove, done } from './utils';

/**
 * A frame on the traversal stack, the task that opened it, and the results
 * collected for its tasks so far.
 */
type ActiveFrame = {
  task: DiffTask;
  frame: Frame;
  results: ChangeEntry[][];
};

/**
 * Emits the entry for a key present on one side only, after consulting the
 * comparator for that key.
 *
 * - `equal`     → nothing
 * - `replace`   → the comparator's entries
 * - `different` → a Modify with `undefined` on the missing side
 * - `defer`     → the default Remove or Add entry
 */
function keyOnlyOnOneSide(
  config: DiffConfig,
  path: Path,
  previous: unknown,
  current: unknown,
  fallback: ChangeEntry
): readonly ChangeEntry[] {
  const verdict = consultComparator(config.comparator, path, previous, current);

  switch (verdict.kind) {
    case 'equal':
      return [];
    case 'replace':
      return verdict.changes;
    case 'different':
      return [createModify(path, previous, current)];
    case 'defer':
      return [fallback];
  }
}

/**
 * Plans the comparison of two keyed containers (records or `Map`s).
 *
 * Logic:
 * 1. Partition:
 *    Keys are split into deleted (previous only), common (both) and added
 *    (current only), each sorted by string form for a deterministic result
 *    regardless of insertion order.
 * 2. Removals:
 *    Emitted immediately (comparator consulted per key).
 * 3. Common keys:
 *    One task per key, compared recursively in key order.
 * 4. Additions:
 *    Emitted once the common keys are done (comparator consulted per key).
 *
 * The order removals → modifications → additions is part of the output
 * contract.
 */
function planKeyed(
  path: Path,
  previous: KeyedView,
  current: KeyedView,
  config: DiffConfig
): Expansion {
  const childPath = (key: Scalar): Path => appendKey(path, key, config.delimiter);

  const deletedKeys = sortKeys(previous.keys.filter(key => !current.has(key)));
  const commonKeys = sortKeys(previous.keys.filter(key => current.has(key)));
  const addedKeys = sortKeys(current.keys.filter(key => !previous.has(key)));

  const removals = deletedKeys.flatMap(key => {
    const keyPath = childPath(key);
    const oldValue = previous.get(key);
    return keyOnlyOnOneSide(
      config,
      keyPath,
      oldValue,
      undefined,
      createRemove(keyPath, oldValue)
    );
  });

  const tasks: DiffTask[] = commonKeys.map(key => ({
    path: childPath(key),
    previous: previous.get(key),
    current: current.get(key)
  }));

  return {
    kind: 'frame',
    frame: {
      tasks,
      finish: results => {
        const additions = addedKeys.flatMap(key => {
          const keyPath = childPath(key);
          const value = current.get(key);
          return keyOnlyOnOneSide(
            config,
            keyPath,
            undefined,
            value,
            createAdd(keyPath, value)
          );
        });
        return [...removals, ...results.flat(), ...additions];
      }
    }
  };
}

/**
 * Handles a node whose value is neither keyed, sequence nor scalar.
 *
 * Policy `'throw'` fails fast. Policy `'modify'` degrades to an `Object.is`
 * comparison so siblings are still compared.
 */
function compareUnsupported(task: DiffTask, config: DiffConfig): Expansion {
  const { path, previous, current } = task;
  const offending = classify(previous).kind === 'unsupported' ? previous : current;

  if (config.unsupported === 'throw') {
    throw new UnsupportedValueShapeError(path, offending);
  }

  log.differ('unsupported value at %s compared by identity', describePath(path));
  return Object.is(previous, current)
    ? done([])
    : done([createModify(path, previous, current)]);
}

/**
 * Handles a container pair that is already open further up the path.
 *
 * The same container on both sides is unchanged. Distinct containers follow
 * the `unsupported` policy, like other values that cannot be compared
 * structurally.
 */
function compareCycle(task: DiffTask, config: DiffConfig): Expansion {
  const { path, previous, current } = task;
  if (Object.is(previous, current)) return done([]);

  if (config.unsupported === 'throw') {
    throw new UnsupportedValueShapeError(
      path,
      current,
      'circular reference to an enclosing container'
    );
  }

  log.differ('circular reference at %s compared by identity', describePath(path));
  return done([createModify(path, previous, current)]);
}

/**
 * Visits one task: decides its entries directly, or returns a frame of child
 * tasks when both sides are containers.
 *
 * Logic:
 * 1. Custom comparator (whole value) first.
 * 2. `null` on both sides → nothing; on one side → Modify.
 * 3. Unsupported shapes → see {@link compareUnsupported}.
 * 4. Not comparable → Modify with both full values.
 * 5. Containers already open on the path → {@link compareCycle}.
 * 6. Sequences → the active array strategy.
 * 7. Keyed containers → {@link planKeyed}.
 * 8. Scalars → equal or Modify.
 */
function expand(
  task: DiffTask,
  config: DiffConfig,
  arrayStrategy: ArrayStrategy,
  cycles: CycleTracker
): Expansion {
  const { path, previous, current } = task;

  const verdict = consultComparator(config.comparator, path, previous, current);
  switch (verdict.kind) {
    case 'equal':
      return done([]);
    case 'different':
      return done([createModify(path, previous, current)]);
    case 'replace':
      return done([...verdict.changes]);
    case 'defer':
      break;
  }

  const previousNode = classify(previous);
  const currentNode = classify(current);

  if (previousNode.kind === 'null' && currentNode.kind === 'null') return done([]);
  if (previousNode.kind === 'null' || currentNode.kind === 'null') {
    return done([createModify(path, previous, current)]);
  }

  if (
    previousNode.kind === 'unsupported' ||
    currentNode.kind === 'unsupported'
  ) {
    return compareUnsupported(task, config);
  }

  const pair = pairNodes(previousNode, currentNode, config.strict);
  if (!pair) return done([createModify(path, previous, current)]);

  if (
    (pair.kind === 'sequence' || pair.kind === 'keyed') &&
    cycles.isOpen(previous, current)
  ) {
    return compareCycle(task, config);
  }

  switch (pair.kind) {
    case 'null':
      return done([]);
    case 'sequence':
      return planArrayDiff(
        arrayStrategy,
        path,
        pair.previous,
        pair.current,
        config
      );
    case 'keyed':
      return planKeyed(path, pair.previous, pair.current, config);
    case 'scalar':
      return areScalarsEqual(pair.previous, pair.current, config)
        ? done([])
        : done([createModify(path, previous, current)]);
  }
}

/**
 * Runs a full comparison with an already normalised configuration.
 *
 * Execution Flow (Depth-First, Explicit Stack):
 * Instead of recursing, the traversal keeps a stack of frames. The frame on
 * top evaluates its tasks in order; a task that needs children pushes a new
 * frame, a task that resolves directly appends its entries to the frame's
 * results. When every task of a frame is resolved, its `finish` combines
 * the results and hands them to the frame below.
 *
 * This yields exactly the order a recursive walk would produce, while the
 * nesting depth of the input no longer consumes the call stack.
 *
 * The container pair of every frame stays registered with a
 * {@link CycleTracker} until the frame finishes, so self-referencing input
 * terminates.
 *
 * @param previous - The original structure (base state).
 * @param current - The new structure (updated state).
 * @param config - The normalised configuration.
 * @returns The ordered change entries.
 */
export function diffWithConfig(
  previous: unknown,
  current: unknown,
  config: DiffConfig
): ChangeEntry[] {
  const arrayStrategy = getArrayStrategy(config);
  const cycles = new CycleTracker();
  const stack: ActiveFrame[] = [];

  const visit = (task: DiffTask): ChangeEntry[] | undefined => {
    const expansion = expand(task, config, arrayStrategy, cycles);
    if (expansion.kind === 'done') return expansion.changes;
    cycles.enter(task.previous, task.current);
    stack.push({ task, frame: expansion.frame, results: [] });
    return undefined;
  };

  const rootChanges = visit({ path: config.prefix, previous, current });
  if (rootChanges) return rootChanges;

  for (let top = stack.at(-1); top; top = stack.at(-1)) {
    const { task, frame, results } = top;

    if (results.length < frame.tasks.length) {
      const changes = visit(frame.tasks[results.length]);
      if (changes) results.push(changes);
      continue;
    }

    stack.pop();
    cycles.leave(task.previous, task.current);
    const changes = frame.finish(results);
    const parent = stack.at(-1);
    if (!parent) return changes;
    parent.results.push(changes);
  }

  return [];
}

/**
 * Calculates the structural difference between two values.
 *
 * Logic:
 * 1. Configuration:
 *    Validates `options` and merges them with the library defaults. Invalid
 *    options throw `InvalidConfigurationError` before any comparison.
 * 2. Execution:
 *    Compares both values from the configured prefix (see
 *    {@link diffWithConfig}).
 *
 * @example
 * ```ts
 * diff({ a: 1, b: { b1: 1, b2: 2 } }, { a: 1, b: {} });
 * // [
 * //   { op: 'remove', path: 'b.b1', oldValue: 1 },
 * //   { op: 'remove', path: 'b.b2', oldValue: 2 }
 * // ]
 * ```
 *
 * @param previous - The original structure (base state).
 * @param current - The new structure (updated state).
 * @param options - Optional comparison options.
 * @param comparator - Optional custom comparison hook.
 * @returns The ordered change entries transforming `previous` into `current`.
 */
export function diff(
  previous: unknown,
  current: unknown,
  options: ComparisonOptions & { arrayPath: true },
  comparator?: Comparator
): ChangeEntry<TokenPath>[];

export function diff(
  previous: unknown,
  current: unknown,
  options?: ComparisonOptions & { arrayPath?: false },
  comparator?: Comparator
): ChangeEntry<string>[];

export function diff(
  previous: unknown,
  current: unknown,
  options?: ComparisonOptions,
  comparator?: Comparator
): ChangeEntry[];

export function diff(
  previous: unknown,
  current: unknown,
  options: ComparisonOptions = {},
  comparator?: Comparator
): ChangeEntry[] {
  return diffWithConfig(previous, current, normalizeOptions(options, comparator));
}
