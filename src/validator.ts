import type { StandardSchemaV1 } from '@standard-schema/spec';

import { InvalidConfigurationError } from './errors';

/**
 * Validates and transforms input using a Standard Schema V1 compliant
 * validator.
 *
 * About `~standard`:
 * - Purpose:
 *   It acts as a universal adapter. The options schema is written with Zod,
 *   but nothing here depends on Zod's own `parse` API.
 *
 * Schema Object Layout:
 * ```ts
 * const schema = {
 *   // 1. Universal Adapter (Result Pattern):
 *   //    - Returns an object ({ value } or { issues }).
 *   //    - Does NOT throw errors.
 *   "~standard": {
 *     validate: (input) => Result
 *   },
 *
 *   // 2. Library-Specific Internals (Ignored):
 *   parse,
 *   ...otherLibrarySpecificProps
 * };
 * ```
 *
 * @param schema - The schema instance.
 * @param input - The raw value to validate.
 * @param subject - What is being validated (used for error reporting).
 * @returns The validated (and potentially defaulted) value.
 *
 * @throws {InvalidConfigurationError}
 * - If the validator returns a Promise (async validation is not supported).
 * - If validation fails (the first reported issue is included).
 */
export function validateWithSchema<S extends StandardSchemaV1>(
  schema: S,
  input: unknown,
  subject: string
): StandardSchemaV1.InferOutput<S> {
  const result = schema['~standard'].validate(input);

  // Diffing is strictly synchronous.
  if (result instanceof Promise) {
    throw new InvalidConfigurationError(
      `Async schema validation is not supported for ${subject}.`
    );
  }

  // Handle 'Result Pattern' (see JSDoc).
  if (result.issues) {
    const [firstIssue] = result.issues;
    const issuePath = formatIssuePath(firstIssue?.path);
    throw new InvalidConfigurationError(
      `Invalid ${subject} at "${issuePath}": ${firstIssue?.message ?? 'unknown issue'}`
    );
  }

  return result.value;
}

/**
 * Joins a Standard Schema issue path with dots; `"<root>"` when absent.
 */
function formatIssuePath(
  path: StandardSchemaV1.Issue['path']
): string {
  if (!path || path.length === 0) return '<root>';

  return path
    .map(segment =>
      typeof segment === 'object' ? String(segment.key) : String(segment)
    )
    .join('.');
}
