import { log } from '../logger';
import type { DiffConfig } from '../options';
import { appendIndex, describePath } from '../utils/path-utils';
import { type MatchedPair, matchSubsequence } from './lcs';
import type { ChangeEntry, DiffTask, Expansion, Path } from './types';
import { createAdd, createRemove, done } from './utils';

/**
 * Represents the active strategy for sequence comparisons.
 */
export type ArrayStrategy =
  | {
      /**
       * Elements are aligned with the subsequence matcher; matched pairs are
       * compared recursively, the rest become adds and removes.
       * O(n·m) per sequence.
       */
      mode: 'lcs';
    }
  | {
      /**
       * Elements are compared position by position, from the front and
       * from the back, keeping the smaller result. O(n) per sequence.
       */
      mode: 'linear';
    };

/**
 * Selects the sequence strategy from the configuration.
 */
export function getArrayStrategy(config: DiffConfig): ArrayStrategy {
  return config.useLcs ? { mode: 'lcs' } : { mode: 'linear' };
}

/**
 * Plans the comparison of two sequences with the given strategy.
 *
 * @param strategy - The active sequence strategy.
 * @param path - Location of the sequences.
 * @param previous - The base sequence.
 * @param current - The new sequence.
 * @param config - The active configuration.
 * @returns Either final entries, or a frame whose tasks compare elements.
 */
export function planArrayDiff(
  strategy: ArrayStrategy,
  path: Path,
  previous: readonly unknown[],
  current: readonly unknown[],
  config: DiffConfig
): Expansion {
  // Shared degenerate cases.
  if (previous.length === 0 && current.length === 0) return done([]);
  if (previous.length === 0) return done(addRange(path, current, 0, current.length));
  if (current.length === 0) return done(removeRange(path, previous, 0, previous.length));

  switch (strategy.mode) {
    case 'lcs':
      return planSubsequence(path, previous, current, config);
    case 'linear':
      return planLinear(path, previous, current);
  }
}

/**
 * Adds `source[start..end)` at their own indices, head first.
 */
function addRange(
  path: Path,
  source: readonly unknown[],
  start: number,
  end: number
): ChangeEntry[] {
  const changes: ChangeEntry[] = [];
  for (let index = start; index < end; index++) {
    changes.push(createAdd(appendIndex(path, index), source[index]));
  }
  return changes;
}

/**
 * Removes `source[start..end)` at their own indices, tail first, so applying
 * the entries in order never shifts an index that is still to be removed.
 */
function removeRange(
  path: Path,
  source: readonly unknown[],
  start: number,
  end: number
): ChangeEntry[] {
  const changes: ChangeEntry[] = [];
  for (let index = end - 1; index >= start; index--) {
    changes.push(createRemove(appendIndex(path, index), source[index]));
  }
  return changes;
}

/**
 * LCS strategy.
 *
 * Logic:
 * 1. Matching:
 *    Compute the matched pairs with {@link matchSubsequence}.
 * 2. Recursion:
 *    Every matched pair `(i, j)` becomes a task comparing `previous[i]` with
 *    `current[j]` at `path[i]`. The elements were only "similar", so this
 *    captures their inner modifications.
 * 3. Gaps:
 *    Walk the pairs plus the sentinel `(|previous|, |current|)`. Between two
 *    consecutive pairs, unmatched `previous` elements are removed (tail
 *    first) and unmatched `current` elements added (head first), both
 *    positioned right after the last matched `current` index.
 *
 * The frame emits the recursion results first, then the gap entries.
 */
function planSubsequence(
  path: Path,
  previous: readonly unknown[],
  current: readonly unknown[],
  config: DiffConfig
): Expansion {
  const pairs = matchSubsequence(previous, current, config);
  const gapChanges = collectGapChanges(path, previous, current, pairs);

  const tasks: DiffTask[] = pairs.map(([previousIndex, currentIndex]) => ({
    path: appendIndex(path, previousIndex),
    previous: previous[previousIndex],
    current: current[currentIndex]
  }));

  return {
    kind: 'frame',
    frame: {
      tasks,
      finish: results => [...results.flat(), ...gapChanges]
    }
  };
}

function collectGapChanges(
  path: Path,
  previous: readonly unknown[],
  current: readonly unknown[],
  pairs: readonly MatchedPair[]
): ChangeEntry[] {
  const changes: ChangeEntry[] = [];
  const sentinel: MatchedPair = [previous.length, current.length];
  let lastPrevious = -1;
  let lastCurrent = -1;

  for (const [previousIndex, currentIndex] of [...pairs, sentinel]) {
    for (let offset = previousIndex - lastPrevious - 2; offset >= 0; offset--) {
      changes.push(
        createRemove(
          appendIndex(path, lastCurrent + offset + 1),
          previous[lastPrevious + offset + 1]
        )
      );
    }

    for (let offset = 0; offset <= currentIndex - lastCurrent - 2; offset++) {
      changes.push(
        createAdd(
          appendIndex(path, lastCurrent + offset + 1),
          current[lastCurrent + offset + 1]
        )
      );
    }

    lastPrevious = previousIndex;
    lastCurrent = currentIndex;
  }

  return changes;
}

/**
 * Element-wise comparison of two aligned ranges, plus the entries for the
 * elements outside them.
 */
type LinearCandidate = {
  tasks: DiffTask[];
  edges: ChangeEntry[];
};

/**
 * Aligns both sequences at their heads: the shared prefix is compared
 * element-wise, the longer tail is removed (tail first) or added.
 */
function alignForward(
  path: Path,
  previous: readonly unknown[],
  current: readonly unknown[]
): LinearCandidate {
  const shared = Math.min(previous.length, current.length);
  const tasks: DiffTask[] = [];

  for (let index = 0; index < shared; index++) {
    tasks.push({
      path: appendIndex(path, index),
      previous: previous[index],
      current: current[index]
    });
  }

  const edges =
    previous.length > current.length
      ? removeRange(path, previous, shared, previous.length)
      : addRange(path, current, shared, current.length);

  return { tasks, edges };
}

/**
 * Aligns both sequences at their tails: the shared suffix is compared
 * element-wise (addressed by the `previous` index), the leading elements
 * of the longer side are added or removed.
 */
function alignBackward(
  path: Path,
  previous: readonly unknown[],
  current: readonly unknown[]
): LinearCandidate {
  const leadingAdds = Math.max(current.length - previous.length, 0);
  const leadingRemoves = Math.max(previous.length - current.length, 0);
  const end = Math.max(previous.length, current.length);
  const tasks: DiffTask[] = [];

  for (let index = Math.max(leadingAdds, leadingRemoves); index < end; index++) {
    const previousIndex = index - leadingAdds;
    tasks.push({
      path: appendIndex(path, previousIndex),
      previous: previous[previousIndex],
      current: current[index - leadingRemoves]
    });
  }

  const edges = [
    ...addRange(path, current, 0, leadingAdds),
    ...removeRange(path, previous, 0, leadingRemoves)
  ];

  return { tasks, edges };
}

/**
 * Linear strategy.
 *
 * - Equal lengths: position-by-position comparison only.
 * - Unequal lengths: both the forward and the backward alignment are
 *   evaluated; the one with fewer entries wins, forward on a tie.
 *
 * The frame carries the forward tasks followed by the backward tasks and
 * splits the results again in `finish`.
 */
function planLinear(
  path: Path,
  previous: readonly unknown[],
  current: readonly unknown[]
): Expansion {
  const forward = alignForward(path, previous, current);

  if (previous.length === current.length) {
    return {
      kind: 'frame',
      frame: { tasks: forward.tasks, finish: results => results.flat() }
    };
  }

  const backward = alignBackward(path, previous, current);
  const split = forward.tasks.length;

  return {
    kind: 'frame',
    frame: {
      tasks: [...forward.tasks, ...backward.tasks],
      finish: results => {
        const forwardChanges = [...results.slice(0, split).flat(), ...forward.edges];
        const backwardChanges = [...results.slice(split).flat(), ...backward.edges];

        log.differ(
          'linear %s: forward=%d backward=%d',
          describePath(path),
          forwardChanges.length,
          backwardChanges.length
        );

        return forwardChanges.length > backwardChanges.length
          ? backwardChanges
          : forwardChanges;
      }
    }
  };
}
