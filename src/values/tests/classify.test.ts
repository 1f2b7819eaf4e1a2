import { describe, expect, test } from 'vitest';

import type { ValueNode } from '../../types/values';
import {
  areScalarsComparable,
  classify,
  compareKeys,
  pairNodes,
  sortKeys
} from '../classify';

class Point {
  constructor(
    public x: number,
    public y: number
  ) {}
}

describe('classify', () => {
  test.for<[string, ValueNode['kind'], unknown]>([
    ['null', 'null', null],
    ['string', 'scalar', 'a'],
    ['number', 'scalar', 1.5],
    ['bigint', 'scalar', 10n],
    ['boolean', 'scalar', false],
    ['array', 'sequence', [1]],
    ['object literal', 'record', { a: 1 }],
    ['null-prototype object', 'record', Object.create(null)],
    ['Map with scalar keys', 'map', new Map([[1, 'a']])],
    ['Map with object keys', 'unsupported', new Map([[{}, 'a']])],
    ['undefined', 'unsupported', undefined],
    ['function', 'unsupported', () => 1],
    ['symbol', 'unsupported', Symbol('s')],
    ['Date', 'unsupported', new Date(0)],
    ['Set', 'unsupported', new Set([1])],
    ['class instance', 'unsupported', new Point(1, 2)]
  ])('%s is classified as %s', ([, kind, value]) => {
    expect(classify(value).kind).toBe(kind);
  });
});

describe('pairNodes', () => {
  test('Records pair as keyed views over own keys', () => {
    const pair = pairNodes(classify({ b: 1, a: 2 }), classify({ c: 3 }), true);

    if (pair?.kind !== 'keyed') throw new Error('expected a keyed pair');
    expect(pair.previous.keys).toStrictEqual(['b', 'a']);
    expect(pair.previous.has('a')).toBe(true);
    expect(pair.previous.has('c')).toBe(false);
    expect(pair.current.get('c')).toBe(3);
  });

  test('Map views keep native key types', () => {
    const pair = pairNodes(
      classify(new Map<unknown, unknown>([[1, 'x']])),
      classify(new Map<unknown, unknown>([['1', 'y']])),
      true
    );

    if (pair?.kind !== 'keyed') throw new Error('expected a keyed pair');
    expect(pair.previous.has(1)).toBe(true);
    expect(pair.previous.has('1')).toBe(false);
    expect(pair.current.get('1')).toBe('y');
  });

  test.for<[string, boolean, unknown, unknown]>([
    ['sequence vs record', false, [1], { 0: 1 }],
    ['record vs Map', false, { a: 1 }, new Map([['a', 1]])],
    ['string vs number', false, '1', 1],
    ['null vs scalar', false, null, 1],
    ['number vs bigint (strict)', false, 1, 1n],
    ['null vs null', true, null, null],
    ['number vs number', true, 1, 2]
  ])('%s comparable: %s', ([, comparable, previous, current]) => {
    expect(pairNodes(classify(previous), classify(current), true) !== undefined).toBe(
      comparable
    );
  });

  test('number vs bigint pair outside strict mode', () => {
    expect(pairNodes(classify(1), classify(1n), false)).toStrictEqual({
      kind: 'scalar',
      previous: 1,
      current: 1n
    });
  });
});

describe('areScalarsComparable', () => {
  test('Numeric kinds mix only outside strict mode', () => {
    expect(areScalarsComparable(1, 2n, true)).toBe(false);
    expect(areScalarsComparable(1, 2n, false)).toBe(true);
    expect(areScalarsComparable('1', 1, false)).toBe(false);
    expect(areScalarsComparable(true, false, true)).toBe(true);
  });
});

describe('Key ordering', () => {
  test('compareKeys orders by string form', () => {
    expect(compareKeys('a', 'b')).toBe(-1);
    expect(compareKeys(10, 9)).toBe(-1);
    expect(compareKeys(1, '1')).toBe(0);
    expect(compareKeys('ab', 'a')).toBe(1);
  });

  test('compareKeys orders astral characters by code point', () => {
    // UTF-16 units would put the surrogate pair (0xD83D 0xDE00) first.
    expect(compareKeys('\u{1F600}', '\uFFFD')).toBe(1);
    expect(compareKeys('\uFFFD', '\u{1F600}')).toBe(-1);
    expect(sortKeys(['\u{1F600}', '\uFFFD', 'z'])).toStrictEqual(['z', '\uFFFD', '\u{1F600}']);
  });

  test('sortKeys is stable and does not mutate its input', () => {
    const keys = ['b', 1, 'a', '1'];

    expect(sortKeys(keys)).toStrictEqual([1, '1', 'a', 'b']);
    expect(keys).toStrictEqual(['b', 1, 'a', '1']);
  });
});
