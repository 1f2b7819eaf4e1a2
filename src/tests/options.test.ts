import { describe, expect, test } from 'vitest';

import { InvalidConfigurationError } from '../errors';
import { comparisonOptionsSchema, normalizeOptions, withSimilarity } from '../options';
import { validateWithSchema } from '../validator';

describe('Option normalisation', () => {
  test('Defaults are applied', () => {
    expect(normalizeOptions()).toStrictEqual({
      strict: true,
      similarity: 0.8,
      delimiter: '.',
      numericTolerance: 0,
      strip: false,
      arrayPath: false,
      useLcs: true,
      prefix: '',
      unsupported: 'modify',
      comparator: undefined
    });
  });

  test('The prefix defaults to an empty token path in arrayPath mode', () => {
    expect(normalizeOptions({ arrayPath: true }).prefix).toStrictEqual([]);
  });

  test('The configuration is frozen', () => {
    const config = normalizeOptions({ similarity: 0.5 });

    expect(Object.isFrozen(config)).toBe(true);
    expect(Object.isFrozen(withSimilarity(config, 0.3))).toBe(true);
    expect(withSimilarity(config, 0.3).similarity).toBe(0.3);
    expect(config.similarity).toBe(0.5);
  });

  test('A similarity of exactly one is accepted', () => {
    expect(normalizeOptions({ similarity: 1 }).similarity).toBe(1);
  });

  test('Non-finite tolerances are rejected', () => {
    expect(() => normalizeOptions({ numericTolerance: Number.POSITIVE_INFINITY })).toThrowError(
      InvalidConfigurationError
    );
  });

  test('Wrong option types are rejected with their path', () => {
    expect(() => normalizeOptions(JSON.parse('{"strict":"yes"}'))).toThrowError(
      /^\[deep-delta\] Invalid comparison options at "strict": /
    );
  });
});

describe('validateWithSchema', () => {
  test('Returns the parsed value with defaults', () => {
    expect(validateWithSchema(comparisonOptionsSchema, {}, 'options').delimiter).toBe('.');
  });

  test('Names the subject and the first issue path', () => {
    expect(() => validateWithSchema(comparisonOptionsSchema, { delimiter: 1 }, 'options')).toThrowError(
      /^\[deep-delta\] Invalid options at "delimiter": /
    );
  });
});
