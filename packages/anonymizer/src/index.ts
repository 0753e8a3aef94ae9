/**
 * @phikit/anonymizer
 *
 * Applies redaction profiles and checks the result.
 *
 * @example
 * ```typescript
 * import { createDataset, namedProfile } from '@phikit/core';
 * import { AnonymizationEngine, generateComplianceReport } from '@phikit/anonymizer';
 *
 * const original = createDataset([['PatientID', 'LO', '12345']]);
 * const engine = new AnonymizationEngine({ salt: 'site-salt' });
 * const { dataset, log } = engine.apply(original, namedProfile('basic'));
 *
 * log; // ['REMOVED: PatientName (not present)', 'HASHED: PatientID', ...]
 * generateComplianceReport(original, dataset).compliancePercentage; // 100
 * ```
 */

export {
  ActionOutcome,
  ACTION_HANDLERS,
  MissingReplacementError,
  UnknownActionError,
  formatLogLine,
  handlerFor,
} from './actions.js';
export type { ActionContext, ActionHandler, SequencePolicy } from './actions.js';

export { AnonymizationEngine } from './engine.js';
export type {
  ActionRecord,
  AnonymizationResult,
  AnonymizationEngineOptions,
  ApplyOptions,
} from './engine.js';

export { generateComplianceReport, formatComplianceReport } from './compliance-report.js';
export type { ComplianceReport, ComplianceOptions } from './compliance-report.js';

export { evaluatePrivacyGate } from './gate.js';
export type {
  GateStatus,
  PrivacyGateInput,
  PrivacyGateResult,
  PrivacyGateThresholds,
} from './gate.js';
