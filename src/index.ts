export { diff } from './differ';
export { bestDiff, countChanges, SIMILARITY_THRESHOLDS } from './best-diff';
export {
  fromChangeTuple,
  isChangeTuple,
  toChangeTuple,
  toChangeTuples
} from './format';
export {
  DeepDeltaError,
  InvalidComparatorResultError,
  InvalidConfigurationError,
  UnsupportedValueShapeError,
  type DeepDeltaErrorCode
} from './errors';
export {
  comparisonOptionsSchema,
  type ComparisonOptions,
  type UnsupportedPolicy
} from './options';
export { describePath } from './utils/path-utils';

export type {
  ChangeAdd,
  ChangeEntry,
  ChangeModify,
  ChangeRemove,
  ChangeTuple,
  Comparator,
  ComparatorResult,
  Path,
  PathSegment,
  TokenPath
} from './differ/types';
export type {
  Scalar,
  Value,
  ValueArray,
  ValueMap,
  ValueRecord
} from './types/values';
