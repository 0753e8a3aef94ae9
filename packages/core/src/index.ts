/**
 * @phikit/core
 *
 * Shared data model for redaction, diffing and risk scoring of tagged
 * medical-record datasets.
 *
 * @example
 * ```typescript
 * import { createDataset, getTagState, TagState } from '@phikit/core';
 *
 * const ds = createDataset([
 *   ['PatientName', 'PN', 'Doe^Jane'],
 *   ['StudyDate', 'DA', ''],
 * ]);
 *
 * getTagState(ds, 'StudyDate'); // TagState.EMPTY
 * getTagState(ds, 'PatientID'); // TagState.MISSING
 * ```
 */

// Data model
export { VRClass, TagState } from './types.js';
export type {
  TagId,
  VRCode,
  ScalarValue,
  ElementValue,
  DataElement,
  Dataset,
} from './types.js';

export {
  NUMERIC_VRS,
  DATE_TIME_VRS,
  BINARY_VRS,
  SEQUENCE_VR,
  MULTI_VALUE_DELIMITER,
  vrClassOf,
  isSequenceElement,
  isBytes,
  isScalarList,
  isSequenceItems,
  isEmptyValue,
  getTagState,
  stringifyValue,
  stringifyElement,
} from './vr.js';

export {
  InMemoryDataset,
  createDataset,
  cloneDataset,
  safeGetTagValue,
} from './dataset.js';
export type { ElementEntry } from './dataset.js';

// Registry
export {
  TagRegistry,
  DEFAULT_TAG_ENTRIES,
  DEFAULT_TAG_REGISTRY,
  MAX_RISK_LEVEL,
} from './tag-registry.js';
export type { TagMetadata } from './tag-registry.js';

// Profiles
export {
  Action,
  BASIC_PROFILE,
  CLEAN_DESCRIPTORS_PROFILE,
  BUILTIN_PROFILES,
  ProfileStore,
  defaultProfileStore,
  getProfile,
  mergeProfiles,
  namedProfile,
  inlineProfile,
  assertDistinctTags,
  parseProfileDocument,
} from './profiles.js';
export type { ProfileRule, ProfileSelection, ProfileDocument } from './profiles.js';

// Hashing and tag utilities
export {
  hashValue,
  resolveHashSettings,
  HASH_ALGORITHMS,
  DEFAULT_HASH_ALGORITHM,
  DEFAULT_HASH_LENGTH,
  MIN_HASH_LENGTH,
  MAX_HASH_LENGTH,
} from './hash.js';
export type { HashAlgorithm, HashOptions, HashSettings } from './hash.js';

export {
  formatTag,
  parseTagGroup,
  isPrivateTag,
  getPrivateTags,
  flagPrivateTags,
  PRIVATE_TAG_WARNING,
} from './tag-format.js';
export type { TagRef, PrivateTagFlag } from './tag-format.js';

// Ambient
export {
  createLogger,
  createConfiguredLogger,
  silentLogger,
  streamSink,
  isLogLevel,
  LOG_LEVELS,
} from './logger.js';
export type { Logger, LogLevel, LoggerOptions, LogEntry, LogSink, LoggingConfig } from './logger.js';

export {
  TagNotFoundError,
  ProfileValidationError,
  ConfigError,
  getErrorMessage,
} from './errors.js';

export {
  loadPrivacyConfigFromEnv,
  parseRiskWeights,
  describePrivacyConfig,
} from './config.js';
export type { PrivacyConfig } from './config.js';
