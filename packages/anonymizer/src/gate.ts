/**
 * Privacy Gate
 *
 * Post-run policy check over a compliance report and a risk score.
 * The gate only reports PASS/FAIL with reasons; whether FAIL stops a
 * pipeline is the caller's decision.
 */

import { z } from 'zod';
import { ConfigError } from '@phikit/core';
import type { RiskScore } from '@phikit/risk';
import type { ComplianceReport } from './compliance-report.js';

export type GateStatus = 'PASS' | 'FAIL';

export interface PrivacyGateInput {
  compliance: ComplianceReport;
  risk: RiskScore;
}

export interface PrivacyGateResult {
  status: GateStatus;
  failures: string[];
}

const percentage = z.number().min(0).max(100);

const ThresholdsSchema = z
  .object({
    minCompliancePercentage: percentage.optional(),
    maxRiskPercentage: percentage.optional(),
    allowRemainingPhi: z.boolean().optional(),
  })
  .strict();

export type PrivacyGateThresholds = z.infer<typeof ThresholdsSchema>;

export function evaluatePrivacyGate(
  input: PrivacyGateInput,
  thresholds: PrivacyGateThresholds = {}
): PrivacyGateResult {
  const parsed = ThresholdsSchema.safeParse(thresholds);
  if (!parsed.success) {
    throw new ConfigError(
      'Invalid privacy gate thresholds',
      parsed.error.issues.map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
    );
  }

  const { minCompliancePercentage, maxRiskPercentage, allowRemainingPhi = true } = parsed.data;
  const { compliance, risk } = input;
  const failures: string[] = [];

  if (minCompliancePercentage !== undefined && compliance.compliancePercentage < minCompliancePercentage) {
    failures.push(
      `Compliance ${compliance.compliancePercentage.toFixed(1)}% is below ${minCompliancePercentage.toFixed(1)}%`
    );
  }

  if (maxRiskPercentage !== undefined && risk.riskPercentage > maxRiskPercentage) {
    failures.push(`Risk ${risk.riskPercentage.toFixed(1)}% exceeds ${maxRiskPercentage.toFixed(1)}%`);
  }

  if (!allowRemainingPhi && compliance.remainingTags.length > 0) {
    failures.push(`PHI tags left unchanged: ${compliance.remainingTags.join(', ')}`);
  }

  return { status: failures.length === 0 ? 'PASS' : 'FAIL', failures };
}
