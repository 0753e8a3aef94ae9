/**
 * PHI Risk Scorer
 *
 * Computes a bounded, explainable identifiability score for one dataset.
 * Every registered PHI tag adds its weighted maximum to `maxScore` whether or
 * not it is present; present tags add their assessed risk to `totalScore`.
 *
 * The weight table belongs to the scorer instance. Tuning produces a new
 * scorer via `withWeights`; existing scorers never change.
 *
 * Private (odd-group) tags are not scored. They are flagged separately by
 * `flagPrivateTags` in @phikit/core.
 */

import {
  DEFAULT_TAG_REGISTRY,
  createConfiguredLogger,
  createLogger,
  getErrorMessage,
  isPrivateTag,
  stringifyElement,
  type Dataset,
  type Logger,
  type PrivacyConfig,
  type TagId,
  type TagRegistry,
} from '@phikit/core';
import {
  DEFAULT_RISK_WEIGHTS,
  TAG_CATEGORIES,
  UNKNOWN_CATEGORY,
  UNKNOWN_CATEGORY_WEIGHT,
  assessValueRisk,
  parseWeightOverrides,
  type RiskWeightTable,
  type TagRiskBreakdown,
} from './weights.js';

export enum RiskLevel {
  LOW = 'LOW',
  MEDIUM = 'MEDIUM',
  HIGH = 'HIGH',
  CRITICAL = 'CRITICAL',
}

export interface RiskScore {
  totalScore: number;
  maxScore: number;
  /** totalScore / maxScore * 100, clamped to [0, 100] */
  riskPercentage: number;
  riskLevel: RiskLevel;
  /** Present PHI tag -> assessed risk */
  tagScores: Record<TagId, number>;
  tagBreakdown: Record<TagId, TagRiskBreakdown>;
}

export interface RiskScorerOptions {
  registry?: TagRegistry;
  /** Full weight table; defaults to DEFAULT_RISK_WEIGHTS. Validated like overrides. */
  weights?: RiskWeightTable;
  categories?: Readonly<Record<TagId, string>>;
  logger?: Logger;
}

/**
 * Inclusive lower bounds: 25 is MEDIUM, 50 is HIGH, 75 is CRITICAL.
 */
export function riskLevelFor(percentage: number): RiskLevel {
  if (percentage < 25) return RiskLevel.LOW;
  if (percentage < 50) return RiskLevel.MEDIUM;
  if (percentage < 75) return RiskLevel.HIGH;
  return RiskLevel.CRITICAL;
}

function clampPercentage(value: number): number {
  return Math.max(0, Math.min(100, value));
}

export class RiskScorer {
  private readonly registry: TagRegistry;
  private readonly weightTable: RiskWeightTable;
  private readonly categories: Readonly<Record<TagId, string>>;
  private readonly logger: Logger;

  /**
   * Throws ConfigError when a weight is negative or not finite.
   */
  constructor(options: RiskScorerOptions = {}) {
    this.registry = options.registry ?? DEFAULT_TAG_REGISTRY;
    this.weightTable = Object.freeze(parseWeightOverrides(options.weights ?? DEFAULT_RISK_WEIGHTS));
    this.categories = options.categories ?? TAG_CATEGORIES;
    this.logger = options.logger ?? createLogger('risk-scorer');
  }

  /**
   * Scorer with the configured weight overrides applied to the defaults.
   * Without an injected logger, logs at the configured level.
   */
  static fromConfig(config: PrivacyConfig, options: Omit<RiskScorerOptions, 'weights'> = {}): RiskScorer {
    return new RiskScorer({
      ...options,
      logger: options.logger ?? createConfiguredLogger('risk-scorer', config),
    }).withWeights(config.riskWeights);
  }

  get weights(): RiskWeightTable {
    return this.weightTable;
  }

  /**
   * New scorer whose weight table is this one's with `overrides` applied.
   */
  withWeights(overrides: Readonly<Record<string, number>>): RiskScorer {
    return new RiskScorer({
      registry: this.registry,
      weights: { ...this.weightTable, ...parseWeightOverrides(overrides) },
      categories: this.categories,
      logger: this.logger,
    });
  }

  /**
   * Category and weight for a tag. Unknown tags are never down-weighted.
   */
  categoryOf(tag: TagId): { category: string; weight: number } {
    const category = Object.prototype.hasOwnProperty.call(this.categories, tag)
      ? this.categories[tag]
      : UNKNOWN_CATEGORY;
    const weight = Object.prototype.hasOwnProperty.call(this.weightTable, category)
      ? this.weightTable[category]
      : UNKNOWN_CATEGORY_WEIGHT;
    return { category, weight };
  }

  /**
   * Risk of one value for one tag, with the inputs that produced it.
   * Tags outside the registry score 0.
   */
  calculateTagRisk(tag: TagId, value: string): TagRiskBreakdown {
    const meta = this.registry.get(tag);
    if (!meta) {
      return { risk: 0, baseRisk: 0, weight: UNKNOWN_CATEGORY_WEIGHT, maxRisk: 0, category: UNKNOWN_CATEGORY };
    }

    const baseRisk = meta.riskLevel;
    const { category, weight } = this.categoryOf(tag);
    const maxRisk = baseRisk * weight;
    return {
      risk: assessValueRisk(value, maxRisk),
      baseRisk,
      weight,
      maxRisk,
      category,
    };
  }

  /**
   * When `maxScore` is 0 (no scorable PHI tags registered, or every weight
   * set to 0) the percentage is 100 and the level CRITICAL, even for an
   * empty dataset. With the default registry and weights the maximum is
   * positive, so an empty dataset is 0% / LOW.
   */
  score(dataset: Dataset): RiskScore {
    const tagScores: Record<TagId, number> = {};
    const tagBreakdown: Record<TagId, TagRiskBreakdown> = {};
    let totalScore = 0;
    let maxScore = 0;

    for (const tag of this.registry.phiTags()) {
      if (isPrivateTag(tag)) continue;

      const meta = this.registry.get(tag);
      if (!meta) continue;

      const { weight } = this.categoryOf(tag);
      maxScore += meta.riskLevel * weight;

      try {
        if (!dataset.contains(tag)) {
          this.logger.debug(`PHI tag ${tag} not in dataset`, { tag });
          continue;
        }

        const breakdown = this.calculateTagRisk(tag, stringifyElement(dataset.get(tag)));
        tagScores[tag] = breakdown.risk;
        tagBreakdown[tag] = breakdown;
        totalScore += breakdown.risk;
      } catch (error) {
        this.logger.warn(`Could not score tag ${tag}`, { tag, error: getErrorMessage(error) });
      }
    }

    const riskPercentage = maxScore > 0 ? clampPercentage((totalScore / maxScore) * 100) : 100;

    return {
      totalScore,
      maxScore,
      riskPercentage,
      riskLevel: riskLevelFor(riskPercentage),
      tagScores,
      tagBreakdown,
    };
  }
}

export const defaultRiskScorer = new RiskScorer();

export function scoreDataset(dataset: Dataset): RiskScore {
  return defaultRiskScorer.score(dataset);
}

export function calculateTagRisk(tag: TagId, value: string): TagRiskBreakdown {
  return defaultRiskScorer.calculateTagRisk(tag, value);
}

const RULE = '='.repeat(50);

/**
 * Plain-text rendering, highest contributions first.
 */
export function formatRiskScore(score: RiskScore, registry: TagRegistry = DEFAULT_TAG_REGISTRY): string {
  const lines = [
    RULE,
    'PHI RISK ASSESSMENT',
    RULE,
    `Risk Level: ${score.riskLevel}`,
    `Risk Score: ${score.totalScore.toFixed(1)} / ${score.maxScore.toFixed(1)}`,
    `Risk Percentage: ${score.riskPercentage.toFixed(1)}%`,
    '',
    'Tag-level Risks:',
  ];

  const ranked = Object.entries(score.tagScores).sort((a, b) => b[1] - a[1]);
  for (const [tag, risk] of ranked) {
    const b = score.tagBreakdown[tag];
    lines.push(
      `  ${tag} (${registry.displayName(tag)}) [cat=${b.category}, base=${b.baseRisk.toFixed(1)}, ` +
        `weight=${b.weight.toFixed(2)}]: ${risk.toFixed(1)}`
    );
  }

  lines.push(RULE);
  return lines.join('\n');
}
