/**
 * @phikit/risk
 *
 * Bounded, explainable PHI risk scoring.
 *
 * @example
 * ```typescript
 * import { RiskScorer } from '@phikit/risk';
 *
 * const scorer = new RiskScorer();
 * const strictDates = scorer.withWeights({ date: 1.0 });
 *
 * strictDates.score(dataset).riskLevel; // 'LOW' | 'MEDIUM' | 'HIGH' | 'CRITICAL'
 * ```
 */

export {
  RiskScorer,
  RiskLevel,
  defaultRiskScorer,
  scoreDataset,
  calculateTagRisk,
  riskLevelFor,
  formatRiskScore,
} from './scorer.js';
export type { RiskScore, RiskScorerOptions } from './scorer.js';

export {
  DEFAULT_RISK_WEIGHTS,
  TAG_CATEGORIES,
  UNKNOWN_CATEGORY,
  UNKNOWN_CATEGORY_WEIGHT,
  ANONYMIZATION_PLACEHOLDERS,
  HASHED_VALUE_LENGTHS,
  HASHED_RISK_FACTOR,
  assessValueRisk,
  isAnonymizationPlaceholder,
  isEmptyOrWhitespace,
  looksHashed,
  parseWeightOverrides,
} from './weights.js';
export type { RiskWeightTable, TagRiskBreakdown } from './weights.js';
