import { z } from 'zod';

import type { Comparator, Path } from './differ/types';
import { InvalidConfigurationError } from './errors';
import { validateWithSchema } from './validator';

const pathSegmentSchema = z.union([
  z.string(),
  z.number(),
  z.bigint(),
  z.boolean(),
  z.null()
]);

/**
 * Schema of the public comparison options.
 *
 * Every field is optional; defaults are applied during validation. The
 * `prefix` default depends on `arrayPath` and is resolved in
 * {@link normalizeOptions}.
 */
export const comparisonOptionsSchema = z
  .object({
    /**
     * Require the same scalar type on both sides. When `false`, `number` and
     * `bigint` values compare by numeric value.
     */
    strict: z.boolean().default(true),

    /**
     * Minimum share of equal entries for two keyed containers (or two
     * sequences) inside a sequence to be aligned as "the same element,
     * modified". Must be in (0, 1].
     */
    similarity: z.number().gt(0).lte(1).default(0.8),

    /**
     * Separator between key segments of string paths.
     */
    delimiter: z.string().default('.'),

    /**
     * Largest numeric difference still treated as equal.
     */
    numericTolerance: z.number().finite().nonnegative().default(0),

    /**
     * Trim leading/trailing whitespace of strings before comparing.
     */
    strip: z.boolean().default(false),

    /**
     * Emit token paths (`["a", 0]`) instead of delimited strings (`"a[0]"`).
     */
    arrayPath: z.boolean().default(false),

    /**
     * Align sequences with the subsequence matcher (`true`) or compare them
     * position by position (`false`).
     */
    useLcs: z.boolean().default(true),

    /**
     * Path every emitted entry starts from. Must be a string in string mode
     * and a token array in `arrayPath` mode.
     */
    prefix: z.union([z.string(), z.array(pathSegmentSchema).readonly()]).optional(),

    /**
     * What to do with values that are neither keyed containers, sequences
     * nor scalars (`undefined`, functions, class instances, ...):
     * - `'modify'`: compare with `Object.is`, emit a Modify when different.
     * - `'throw'`: fail with `UnsupportedValueShapeError`.
     */
    unsupported: z.enum(['modify', 'throw']).default('modify')
  })
  .strict()
  .superRefine((options, context) => {
    if (options.prefix === undefined) return;

    const isTokenPrefix = typeof options.prefix !== 'string';
    if (isTokenPrefix !== options.arrayPath) {
      context.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['prefix'],
        message: options.arrayPath
          ? 'Expected a token array when arrayPath is enabled.'
          : 'Expected a string when arrayPath is disabled.'
      });
    }
  });

/**
 * Options accepted by `diff` and `bestDiff`.
 */
export type ComparisonOptions = z.input<typeof comparisonOptionsSchema>;

export type UnsupportedPolicy = 'modify' | 'throw';

/**
 * The immutable configuration threaded through a whole traversal.
 * Built once per call by {@link normalizeOptions}.
 */
export type DiffConfig = Readonly<{
  strict: boolean;
  similarity: number;
  delimiter: string;
  numericTolerance: number;
  strip: boolean;
  arrayPath: boolean;
  useLcs: boolean;
  prefix: Path;
  unsupported: UnsupportedPolicy;
  comparator: Comparator | undefined;
}>;

/**
 * Validates the provided options and merges them with the library defaults.
 *
 * Default settings:
 * - `strict`: `true`, `similarity`: `0.8`, `delimiter`: `"."`
 * - `numericTolerance`: `0`, `strip`: `false`
 * - `arrayPath`: `false`, `useLcs`: `true`
 * - `prefix`: `""` (or `[]` with `arrayPath`)
 * - `unsupported`: `'modify'`
 *
 * Invalid input is reported here, before any traversal starts.
 *
 * @param options - The user-provided options.
 * @param comparator - Optional custom comparison hook.
 * @returns A frozen `DiffConfig`.
 * @throws {InvalidConfigurationError} If any option is out of range or of the
 * wrong type, or if `comparator` is not a function.
 */
export function normalizeOptions(
  options: ComparisonOptions = {},
  comparator?: Comparator
): DiffConfig {
  const parsed = validateWithSchema(
    comparisonOptionsSchema,
    options,
    'comparison options'
  );

  if (comparator !== undefined && typeof comparator !== 'function') {
    throw new InvalidConfigurationError(
      `Expected the comparator to be a function, got ${typeof comparator}.`
    );
  }

  return Object.freeze({
    strict: parsed.strict,
    similarity: parsed.similarity,
    delimiter: parsed.delimiter,
    numericTolerance: parsed.numericTolerance,
    strip: parsed.strip,
    arrayPath: parsed.arrayPath,
    useLcs: parsed.useLcs,
    prefix: parsed.prefix ?? (parsed.arrayPath ? [] : ''),
    unsupported: parsed.unsupported,
    comparator
  });
}

/**
 * Derives a configuration that differs only in its similarity threshold.
 */
export function withSimilarity(
  config: DiffConfig,
  similarity: number
): DiffConfig {
  return Object.freeze({ ...config, similarity });
}
