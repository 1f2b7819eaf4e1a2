import { classify, pairNodes } from './classify';
import { areScalarsEqual, type EqualityConfig } from './compare';
import { CycleTracker } from './cycles';

/**
 * A pair still to compare, or the marker that closes a container pair once
 * all of its children were compared.
 */
type Step =
  | { kind: 'compare'; left: unknown; right: unknown }
  | { kind: 'leave'; left: unknown; right: unknown };

/**
 * Deep equality under the configured comparison rules.
 *
 * Walks both values with an explicit stack of pending pairs, so nesting
 * depth is bounded by memory rather than by the call stack.
 *
 * Rules per pair:
 * - Unsupported values on either side: `Object.is`.
 * - Not comparable (different shapes, or scalar types under `strict`):
 *   not equal.
 * - Scalars: {@link areScalarsEqual}.
 * - Sequences: same length and pairwise equal.
 * - Keyed containers: same key set and equal values per key.
 * - A distinct pair of containers that loops back to an enclosing pair:
 *   not equal, as for other values compared by identity.
 *
 * The custom comparator is not consulted here.
 *
 * @param previous - Value from the base state.
 * @param current - Value from the new state.
 * @param config - The equality options.
 * @returns `true` if both values are deeply equal.
 */
export function deepEqual(
  previous: unknown,
  current: unknown,
  config: EqualityConfig
): boolean {
  const cycles = new CycleTracker();
  const pending: Step[] = [{ kind: 'compare', left: previous, right: current }];

  for (let step = pending.pop(); step; step = pending.pop()) {
    const { left, right } = step;
    if (step.kind === 'leave') {
      cycles.leave(left, right);
      continue;
    }
    if (Object.is(left, right)) continue;

    const leftNode = classify(left);
    const rightNode = classify(right);
    if (leftNode.kind === 'unsupported' || rightNode.kind === 'unsupported') {
      return false;
    }

    const pair = pairNodes(leftNode, rightNode, config.strict);
    if (!pair) return false;

    switch (pair.kind) {
      case 'null':
        break;

      case 'scalar':
        if (!areScalarsEqual(pair.previous, pair.current, config)) return false;
        break;

      case 'sequence': {
        if (pair.previous.length !== pair.current.length) return false;
        if (cycles.isOpen(left, right)) return false;
        cycles.enter(left, right);
        pending.push({ kind: 'leave', left, right });
        for (let index = pair.previous.length - 1; index >= 0; index--) {
          pending.push({
            kind: 'compare',
            left: pair.previous[index],
            right: pair.current[index]
          });
        }
        break;
      }

      case 'keyed': {
        const { previous: leftView, current: rightView } = pair;
        if (leftView.keys.length !== rightView.keys.length) return false;
        if (cycles.isOpen(left, right)) return false;
        cycles.enter(left, right);
        pending.push({ kind: 'leave', left, right });
        for (const key of leftView.keys) {
          if (!rightView.has(key)) return false;
          pending.push({ kind: 'compare', left: leftView.get(key), right: rightView.get(key) });
        }
        break;
      }
    }
  }

  return true;
}
