/**
 * @phikit/diff
 *
 * Type-aware before/after comparison of datasets.
 */

export {
  normalizeElementValue,
  normalizedValuesEqual,
  elementsAreEqual,
  isClose,
  RELATIVE_TOLERANCE,
} from './element-compare.js';
export type { NormalizedValue, NormalizedItem } from './element-compare.js';

export { DiffStatus, compareDatasets, hasChanges, formatDiff } from './dataset-diff.js';
export type { TagDiff, DatasetDiff, CompareOptions, FormatDiffOptions } from './dataset-diff.js';
