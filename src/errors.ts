import type { Path } from './differ/types';
import { describePath } from './utils/path-utils';

export type DeepDeltaErrorCode =
  /**
   * Options rejected before any traversal started.
   */
  | 'INVALID_CONFIGURATION'

  /**
   * An input node is neither a keyed container, a sequence nor a scalar, and
   * the `unsupported` policy is `'throw'`. Also raised for a container that
   * contains itself.
   */
  | 'UNSUPPORTED_VALUE_SHAPE'

  /**
   * The comparator returned a list holding something other than change
   * entries or change tuples.
   */
  | 'INVALID_COMPARATOR_RESULT';

/**
 * Base class of every error raised by this library.
 * Comparator exceptions are never wrapped and reach the caller unchanged.
 */
export class DeepDeltaError extends Error {
  constructor(
    public readonly code: DeepDeltaErrorCode,
    message: string
  ) {
    super(`[deep-delta] ${message}`);
    this.name = 'DeepDeltaError';
  }
}

export class InvalidConfigurationError extends DeepDeltaError {
  constructor(message: string) {
    super('INVALID_CONFIGURATION', message);
    this.name = 'InvalidConfigurationError';
  }
}

export class UnsupportedValueShapeError extends DeepDeltaError {
  constructor(
    public readonly path: Path,
    public readonly value: unknown,
    shape: string = describeShape(value)
  ) {
    super('UNSUPPORTED_VALUE_SHAPE', `Unsupported value at ${describePath(path)}: ${shape}.`);
    this.name = 'UnsupportedValueShapeError';
  }
}

export class InvalidComparatorResultError extends DeepDeltaError {
  constructor(
    public readonly path: Path,
    public readonly index: number
  ) {
    super(
      'INVALID_COMPARATOR_RESULT',
      `Invalid comparator result at ${describePath(path)}: entry ${index} is neither a change entry nor a change tuple.`
    );
    this.name = 'InvalidComparatorResultError';
  }
}

/**
 * Names the runtime shape of a value for error messages.
 *
 * Objects are named by their internal tag (e.g. `"[object Date]"`), which
 * survives minification and cross-realm values; everything else by `typeof`.
 */
function describeShape(value: unknown): string {
  if (typeof value === 'object' && value !== null) {
    return Object.prototype.toString.call(value);
  }
  return typeof value;
}
