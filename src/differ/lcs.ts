import { log } from '../logger';
import type { DiffConfig } from '../options';
import type { KeyedView } from '../types/values';
import { classify, pairNodes } from '../values/classify';
import { deepEqual } from '../values/equal';

/**
 * A matched pair of indices: `[previousIndex, currentIndex]`.
 */
export type MatchedPair = readonly [previousIndex: number, currentIndex: number];

/**
 * The subset of the configuration the matcher depends on.
 */
export type MatchConfig = Pick<
  DiffConfig,
  'strict' | 'numericTolerance' | 'strip' | 'similarity'
>;

/**
 * Backtracking directions stored per table cell.
 */
const Step = {
  Diagonal: 0,
  Up: 1,
  Left: 2,
  Both: 3
} as const;

/**
 * Share of keys (over the union of both key sets) whose values are deeply
 * equal on both sides.
 */
function keyedSimilarity(
  previous: KeyedView,
  current: KeyedView,
  config: MatchConfig
): number {
  const union = [
    ...previous.keys,
    ...current.keys.filter(key => !previous.has(key))
  ];
  if (union.length === 0) return 1;

  let equal = 0;
  for (const key of union) {
    if (
      previous.has(key) &&
      current.has(key) &&
      deepEqual(previous.get(key), current.get(key), config)
    ) {
      equal++;
    }
  }
  return equal / union.length;
}

/**
 * Share of positions (over the longer sequence) holding deeply equal values.
 */
function positionalSimilarity(
  previous: readonly unknown[],
  current: readonly unknown[],
  config: MatchConfig
): number {
  const longest = Math.max(previous.length, current.length);
  if (longest === 0) return 1;

  const shortest = Math.min(previous.length, current.length);
  let equal = 0;
  for (let index = 0; index < shortest; index++) {
    if (deepEqual(previous[index], current[index], config)) equal++;
  }
  return equal / longest;
}

/**
 * Decides whether two sequence elements may be aligned with each other.
 *
 * Logic:
 * 1. Deeply equal values always match.
 * 2. Two keyed containers of the same representation match when their
 *    key-level similarity reaches `config.similarity`.
 * 3. Two sequences match when their positional similarity reaches
 *    `config.similarity`.
 * 4. Anything else (unequal scalars, mismatched shapes) does not match.
 *
 * @param previous - Element from the base sequence.
 * @param current - Element from the new sequence.
 * @param config - Equality options and the similarity threshold.
 * @returns `true` if the elements may be treated as the same, modified.
 */
export function isSimilar(
  previous: unknown,
  current: unknown,
  config: MatchConfig
): boolean {
  if (deepEqual(previous, current, config)) return true;

  const pair = pairNodes(classify(previous), classify(current), config.strict);
  if (!pair) return false;

  switch (pair.kind) {
    case 'keyed':
      return (
        keyedSimilarity(pair.previous, pair.current, config) >= config.similarity
      );
    case 'sequence':
      return (
        positionalSimilarity(pair.previous, pair.current, config) >=
        config.similarity
      );
    case 'null':
    case 'scalar':
      return false;
  }
}

/**
 * Computes a longest common subsequence of two sequences under the
 * {@link isSimilar} predicate.
 *
 * Dynamic programming over a `|current| × |previous|` table, filled row by
 * row (one row per `current` element). Each cell stores the best match count
 * and the direction it came from. On a tie between "up" and "left" the first
 * row goes up, the first column goes left, and every other cell records
 * `Both`, which backtracking resolves by moving left. This fixes which of
 * several equally long matchings is returned.
 *
 * Cost: O(n·m) similarity checks, O(n·m) memory.
 *
 * @param previous - The base sequence.
 * @param current - The new sequence.
 * @param config - Equality options and the similarity threshold.
 * @returns Matched index pairs, strictly increasing on both sides.
 */
export function matchSubsequence(
  previous: readonly unknown[],
  current: readonly unknown[],
  config: MatchConfig
): MatchedPair[] {
  const width = previous.length;
  const height = current.length;
  if (width === 0 || height === 0) return [];

  const lengths = new Uint32Array(width * height);
  const steps = new Uint8Array(width * height);

  for (let row = 0; row < height; row++) {
    for (let col = 0; col < width; col++) {
      const cell = row * width + col;

      if (isSimilar(previous[col], current[row], config)) {
        const diagonal = row > 0 && col > 0 ? lengths[cell - width - 1] : 0;
        lengths[cell] = diagonal + 1;
        steps[cell] = Step.Diagonal;
        continue;
      }

      const up = row > 0 ? lengths[cell - width] : 0;
      const left = col > 0 ? lengths[cell - 1] : 0;
      lengths[cell] = Math.max(up, left);

      if (up > left) steps[cell] = Step.Up;
      else if (up < left) steps[cell] = Step.Left;
      else if (row === 0) steps[cell] = Step.Up;
      else if (col === 0) steps[cell] = Step.Left;
      else steps[cell] = Step.Both;
    }
  }

  const pairs: MatchedPair[] = [];
  let col = width - 1;
  let row = height - 1;

  while (col >= 0 && row >= 0 && lengths[row * width + col] > 0) {
    switch (steps[row * width + col]) {
      case Step.Diagonal:
        pairs.push([col, row]);
        col--;
        row--;
        break;
      case Step.Up:
        row--;
        break;
      default:
        col--;
    }
  }

  log.lcs(
    'matched %d pair(s) in %d×%d at similarity %d',
    pairs.length,
    width,
    height,
    config.similarity
  );

  return pairs.reverse();
}
