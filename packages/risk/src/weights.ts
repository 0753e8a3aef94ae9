/**
 * Risk Weights and Per-Tag Risk
 *
 * Scoring goals:
 * - Bounded: per-tag risk lies in [0, baseRisk * categoryWeight]
 * - Explainable: every number carries the inputs it came from
 * - Tunable: weights change without touching the tag registry
 */

import { z } from 'zod';
import { ConfigError, type TagId } from '@phikit/core';

export const UNKNOWN_CATEGORY = 'unknown';
export const UNKNOWN_CATEGORY_WEIGHT = 1.0;

export type RiskWeightTable = Readonly<Record<string, number>>;

export const DEFAULT_RISK_WEIGHTS: RiskWeightTable = Object.freeze({
  name: 1.0,
  identifier: 1.0,
  date: 0.8,
  time: 0.6,
  uid: 0.7,
  descriptor: 0.5,
});

/**
 * Tag -> risk category. Tags not listed fall into "unknown".
 */
export const TAG_CATEGORIES: Readonly<Record<TagId, string>> = Object.freeze({
  PatientName: 'name',
  ReferringPhysicianName: 'name',
  PatientID: 'identifier',
  AccessionNumber: 'identifier',
  PatientBirthDate: 'date',
  StudyDate: 'date',
  StudyTime: 'time',
  StudyInstanceUID: 'uid',
  SeriesInstanceUID: 'uid',
  InstitutionName: 'descriptor',
  StudyDescription: 'descriptor',
  SeriesDescription: 'descriptor',
});

/** Values that mark a field as already anonymized (compared lower-cased) */
export const ANONYMIZATION_PLACEHOLDERS: ReadonlySet<string> = new Set([
  'anonymous',
  'anonymized',
  'n/a',
  'none',
]);

export const HASHED_VALUE_LENGTHS: ReadonlySet<number> = new Set([16, 32, 64]);

/** Fraction of the maximum kept for values that look hashed */
export const HASHED_RISK_FACTOR = 0.2;

const HEX_LOWER = /^[0-9a-f]+$/;

export interface TagRiskBreakdown {
  risk: number;
  baseRisk: number;
  weight: number;
  maxRisk: number;
  category: string;
}

export function isEmptyOrWhitespace(value: string): boolean {
  return value.trim() === '';
}

export function isAnonymizationPlaceholder(value: string): boolean {
  return ANONYMIZATION_PLACEHOLDERS.has(value.toLowerCase());
}

/**
 * 16, 32 or 64 lowercase hex digits.
 */
export function looksHashed(value: string): boolean {
  return HASHED_VALUE_LENGTHS.has(value.length) && HEX_LOWER.test(value);
}

/**
 * Risk of one value given its tag's maximum. Result is within [0, maxRisk].
 */
export function assessValueRisk(value: string, maxRisk: number): number {
  if (isEmptyOrWhitespace(value)) return 0;
  if (isAnonymizationPlaceholder(value)) return 0;
  if (looksHashed(value)) return Math.min(maxRisk, maxRisk * HASHED_RISK_FACTOR);
  return maxRisk;
}

const WeightOverridesSchema = z.record(
  z.string().min(1),
  z.number().finite().nonnegative()
);

/**
 * Validates category -> weight overrides.
 */
export function parseWeightOverrides(overrides: unknown): Record<string, number> {
  const parsed = WeightOverridesSchema.safeParse(overrides);
  if (!parsed.success) {
    throw new ConfigError(
      'Invalid risk weight overrides',
      parsed.error.issues.map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
    );
  }
  return parsed.data;
}
