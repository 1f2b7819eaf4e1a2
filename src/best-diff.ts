import { diffWithConfig } from './differ';
import type {
  ChangeEntry,
  Comparator,
  TokenPath
} from './differ/types';
import { log } from './logger';
import {
  type ComparisonOptions,
  normalizeOptions,
  withSimilarity
} from './options';

/**
 * Similarity thresholds tried by {@link bestDiff}, in evaluation order.
 */
export const SIMILARITY_THRESHOLDS = [0.3, 0.5, 0.8] as const;

/**
 * Scores a change list: the number of entries, unweighted.
 */
export function countChanges(changes: readonly ChangeEntry[]): number {
  return changes.length;
}

/**
 * Diffs two values at every threshold of {@link SIMILARITY_THRESHOLDS} and
 * keeps the smallest result.
 *
 * Useful when sequences hold similar keyed containers: a low threshold
 * aligns loosely related elements and reports their inner changes, a high
 * one reports them as removed and added. Whichever yields fewer entries
 * wins; on a tie the earlier (lower) threshold is kept.
 *
 * Every other option is applied unchanged to each run. A `similarity`
 * passed in `options` is validated but not used.
 *
 * @example
 * ```ts
 * bestDiff(
 *   { x: [{ a: 1, c: 3, e: 5 }, { y: 3 }] },
 *   { x: [{ a: 1, b: 2, e: 5 }] }
 * );
 * // [
 * //   { op: 'remove', path: 'x[0].c', oldValue: 3 },
 * //   { op: 'add', path: 'x[0].b', value: 2 },
 * //   { op: 'remove', path: 'x[1]', oldValue: { y: 3 } }
 * // ]
 * ```
 *
 * @param previous - The original structure (base state).
 * @param current - The new structure (updated state).
 * @param options - Optional comparison options.
 * @param comparator - Optional custom comparison hook.
 * @returns The smallest change list found.
 */
export function bestDiff(
  previous: unknown,
  current: unknown,
  options: ComparisonOptions & { arrayPath: true },
  comparator?: Comparator
): ChangeEntry<TokenPath>[];

export function bestDiff(
  previous: unknown,
  current: unknown,
  options?: ComparisonOptions & { arrayPath?: false },
  comparator?: Comparator
): ChangeEntry<string>[];

export function bestDiff(
  previous: unknown,
  current: unknown,
  options?: ComparisonOptions,
  comparator?: Comparator
): ChangeEntry[];

export function bestDiff(
  previous: unknown,
  current: unknown,
  options: ComparisonOptions = {},
  comparator?: Comparator
): ChangeEntry[] {
  const config = normalizeOptions(options, comparator);
  let best: ChangeEntry[] | undefined;

  for (const similarity of SIMILARITY_THRESHOLDS) {
    const candidate = diffWithConfig(
      previous,
      current,
      withSimilarity(config, similarity)
    );
    log.best('similarity %d: %d change(s)', similarity, countChanges(candidate));

    if (!best || countChanges(candidate) < countChanges(best)) {
      best = candidate;
    }
  }

  return best ?? [];
}
