import { describe, expect, test } from 'vitest';

import type { ChangeEntry } from '../types';
import {
  createDiffRunner,
  type DiffInput,
  resolveScenarioInput,
  type TestScenario
} from './helpers';
import { bestDiff } from '../../best-diff';
import { UnsupportedValueShapeError } from '../../errors';
import { diff } from '..';

/**
 * Builds `{ v, self }` where `self` points back at the record.
 */
function selfReferencing(v: number): Record<string, unknown> {
  const record: Record<string, unknown> = { v };
  record.self = record;
  return record;
}

/**
 * Cyclic references.
 * Focus: shared cycles, distinct cycles, the `unsupported` policy.
 */
describe('Cycles: shared cycles, distinct cycles, policy.', () => {
  describe('Shared References', () => {
    const run = createDiffRunner();

    const scenarios: Array<TestScenario<DiffInput, ChangeEntry[]>> = [
      {
        id: 'Self-Cycle, Stable',
        description: 'A record holding itself is compared to itself without looping.',
        input: () => {
          const record = selfReferencing(1);
          return { previous: record, current: record };
        },
        expected: []
      },
      {
        id: 'Ancestor Reference, Stable',
        description: 'A nested record pointing at an ancestor terminates.',
        input: () => {
          const inner: Record<string, unknown> = {};
          const outer: Record<string, unknown> = { inner };
          inner.outer = outer;
          return { previous: outer, current: outer };
        },
        expected: []
      },
      {
        id: 'Self-Cycle, Stable Under Throw',
        description: 'The same container on both sides never trips the throw policy.',
        input: () => {
          const record = selfReferencing(1);
          return {
            previous: record,
            current: record,
            options: { unsupported: 'throw' }
          };
        },
        expected: []
      },
      {
        id: 'Cyclic Sequence, Stable',
        description: 'An array holding itself is aligned with itself.',
        input: () => {
          const list: unknown[] = [1];
          list.push(list);
          return { previous: list, current: list };
        },
        expected: []
      }
    ];

    test.for(scenarios)('[$id] $description', ({ input, expected }) => {
      expect(run(resolveScenarioInput(input))).toStrictEqual(expected);
    });
  });

  describe('Distinct Cycles', () => {
    test('A back-reference between distinct records is one Modify', () => {
      const previous = selfReferencing(1);
      const current = selfReferencing(2);

      expect(diff(previous, current)).toStrictEqual([
        { op: 'modify', path: 'self', oldValue: previous, value: current },
        { op: 'modify', path: 'v', oldValue: 1, value: 2 }
      ]);
    });

    test('Equal values under the back-reference still report it', () => {
      const previous = selfReferencing(1);
      const current = selfReferencing(1);

      expect(diff(previous, current, { arrayPath: true })).toStrictEqual([
        { op: 'modify', path: ['self'], oldValue: previous, value: current }
      ]);
    });

    test('Maps referencing themselves', () => {
      const previous = new Map<string, unknown>([['v', 1]]);
      previous.set('self', previous);
      const current = new Map<string, unknown>([['v', 1]]);
      current.set('self', current);

      expect(diff(previous, current)).toStrictEqual([
        { op: 'modify', path: 'self', oldValue: previous, value: current }
      ]);
    });

    test('Arrays compared position by position', () => {
      const previous: unknown[] = [1];
      previous.push(previous);
      const current: unknown[] = [1];
      current.push(current);

      expect(diff(previous, current, { useLcs: false })).toStrictEqual([
        { op: 'modify', path: '[1]', oldValue: previous, value: current }
      ]);
    });

    test('Arrays aligned by the subsequence matcher', () => {
      const previous: unknown[] = [1];
      previous.push(previous);
      const current: unknown[] = [1];
      current.push(current);

      // Only half of the positions are deeply equal, below the 0.8 default.
      expect(diff(previous, current)).toStrictEqual([
        { op: 'remove', path: '[1]', oldValue: previous },
        { op: 'add', path: '[1]', value: current }
      ]);
    });

    test('bestDiff aligns cyclic records', () => {
      const previous: Record<string, unknown> = { a: 1, b: 1, v: 1 };
      previous.self = previous;
      const current: Record<string, unknown> = { a: 1, b: 1, v: 2 };
      current.self = current;

      // Two of four keys hold deeply equal values: similar at 0.3 and 0.5.
      expect(bestDiff({ list: [previous] }, { list: [current] })).toStrictEqual([
        { op: 'modify', path: 'list[0].self', oldValue: previous, value: current },
        { op: 'modify', path: 'list[0].v', oldValue: 1, value: 2 }
      ]);
    });

    test('The throw policy rejects the back-reference with its path', () => {
      const previous = selfReferencing(1);
      const current = selfReferencing(2);

      expect(() => diff(previous, current, { unsupported: 'throw' })).toThrowError(
        '[deep-delta] Unsupported value at self: circular reference to an enclosing container.'
      );

      let caught: unknown;
      try {
        diff(previous, current, { unsupported: 'throw' });
      } catch (error) {
        caught = error;
      }

      expect(caught).toBeInstanceOf(UnsupportedValueShapeError);
      expect(caught).toMatchObject({
        code: 'UNSUPPORTED_VALUE_SHAPE',
        path: 'self',
        value: current
      });
    });
  });
});
