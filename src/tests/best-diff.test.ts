import { describe, expect, test } from 'vitest';

import { bestDiff, countChanges, SIMILARITY_THRESHOLDS } from '../best-diff';
import { diff } from '../differ';
import { toChangeTuples } from '../format';

describe('Best-of-thresholds selection.', () => {
  test('Thresholds are tried from loose to tight', () => {
    expect(SIMILARITY_THRESHOLDS).toStrictEqual([0.3, 0.5, 0.8]);
  });

  test('countChanges scores by number of entries', () => {
    expect(countChanges([])).toBe(0);
    expect(countChanges(diff({ a: 1, b: 2 }, { a: 2, c: 3 }))).toBe(3);
  });

  test('A loose threshold wins when it aligns similar records', () => {
    const previous = [{ a: 1, b: 2, c: 3, d: 4 }];
    const current = [{ a: 1, b: 2, c: 3, d: 5 }];

    expect(toChangeTuples(diff(previous, current))).toStrictEqual([
      ['-', '[0]', { a: 1, b: 2, c: 3, d: 4 }],
      ['+', '[0]', { a: 1, b: 2, c: 3, d: 5 }]
    ]);
    expect(toChangeTuples(bestDiff(previous, current))).toStrictEqual([
      ['~', '[0].d', 4, 5]
    ]);
  });

  test('On equal scores the lowest threshold is kept', () => {
    const previous = { x: [{ a: 1, c: 3, e: 5 }, { y: 3 }] };
    const current = { x: [{ a: 1, b: 2, e: 5 }] };

    // Every threshold yields three entries.
    expect(countChanges(diff(previous, current, { similarity: 0.8 }))).toBe(3);
    expect(toChangeTuples(bestDiff(previous, current))).toStrictEqual([
      ['-', 'x[0].c', 3],
      ['+', 'x[0].b', 2],
      ['-', 'x[1]', { y: 3 }]
    ]);
  });

  test('Never worse than any single threshold', () => {
    const previous = {
      rows: [
        { id: 1, name: 'a', tags: ['x'] },
        { id: 2, name: 'b', tags: [] },
        { id: 3, name: 'c', tags: ['y', 'z'] }
      ]
    };
    const current = {
      rows: [
        { id: 2, name: 'B', tags: [] },
        { id: 3, name: 'c', tags: ['z'] },
        { id: 4, name: 'd', tags: [] }
      ]
    };

    const best = countChanges(bestDiff(previous, current));
    for (const similarity of SIMILARITY_THRESHOLDS) {
      expect(best).toBeLessThanOrEqual(
        countChanges(diff(previous, current, { similarity }))
      );
    }
  });

  test('A caller similarity is overridden', () => {
    const previous = [{ a: 1, b: 2, c: 3, d: 4 }];
    const current = [{ a: 1, b: 2, c: 3, d: 5 }];

    expect(bestDiff(previous, current, { similarity: 1 })).toStrictEqual(
      bestDiff(previous, current)
    );
  });

  test('Other options apply to every run', () => {
    expect(
      bestDiff({ list: [1, 2] }, { list: [1, 3] }, { arrayPath: true, useLcs: false })
    ).toStrictEqual([{ op: 'modify', path: ['list', 1], oldValue: 2, value: 3 }]);
  });

  test('Equal inputs yield no entries', () => {
    expect(bestDiff({ a: [1, { b: 2 }] }, { a: [1, { b: 2 }] })).toStrictEqual([]);
  });
});
