/**
 * Compliance Report
 *
 * Counts how many of the original dataset's PHI tags were neutralized.
 * A PHI tag is "remaining" only when it is present in both datasets with
 * the same non-empty stringified value. Removal counts as neutralized.
 */

import {
  DEFAULT_TAG_REGISTRY,
  createLogger,
  getErrorMessage,
  stringifyElement,
  type Dataset,
  type Logger,
  type TagId,
  type TagRegistry,
} from '@phikit/core';

export interface ComplianceReport {
  totalPhiTags: number;
  neutralizedPhiTags: number;
  remainingPhiTags: number;
  /** neutralized / total * 100; 100 when the original had no PHI tags */
  compliancePercentage: number;
  remainingTags: TagId[];
}

export interface ComplianceOptions {
  registry?: TagRegistry;
  logger?: Logger;
}

const defaultLogger = createLogger('compliance');

function isRemaining(original: Dataset, transformed: Dataset, tag: TagId): boolean {
  if (!transformed.contains(tag)) return false;
  const before = stringifyElement(original.get(tag));
  const after = stringifyElement(transformed.get(tag));
  return before === after && before !== '';
}

export function generateComplianceReport(
  original: Dataset,
  transformed: Dataset,
  options: ComplianceOptions = {}
): ComplianceReport {
  const registry = options.registry ?? DEFAULT_TAG_REGISTRY;
  const logger = options.logger ?? defaultLogger;

  let total = 0;
  const remainingTags: TagId[] = [];

  // A PHI tag whose presence or value cannot be read is counted as present
  // and remaining.
  for (const tag of registry.phiTags()) {
    let counted = false;
    try {
      if (!original.contains(tag)) continue;
      counted = true;
      total += 1;
      if (isRemaining(original, transformed, tag)) remainingTags.push(tag);
    } catch (error) {
      logger.warn(`Could not check PHI tag ${tag}`, { tag, error: getErrorMessage(error) });
      if (!counted) total += 1;
      remainingTags.push(tag);
    }
  }

  const neutralized = total - remainingTags.length;

  return {
    totalPhiTags: total,
    neutralizedPhiTags: neutralized,
    remainingPhiTags: remainingTags.length,
    compliancePercentage: total > 0 ? (neutralized / total) * 100 : 100,
    remainingTags,
  };
}

const RULE = '='.repeat(50);

export function formatComplianceReport(
  report: ComplianceReport,
  registry: TagRegistry = DEFAULT_TAG_REGISTRY
): string {
  const lines = [
    RULE,
    'COMPLIANCE REPORT',
    RULE,
    `Total PHI Tags: ${report.totalPhiTags}`,
    `Removed/Modified: ${report.neutralizedPhiTags}`,
    `Remaining Unchanged: ${report.remainingPhiTags}`,
    `Compliance: ${report.compliancePercentage.toFixed(1)}%`,
    '',
  ];

  if (report.remainingTags.length > 0) {
    lines.push('Remaining PHI Tags:');
    for (const tag of report.remainingTags) {
      lines.push(`  - ${tag} (${registry.get(tag)?.name ?? 'Unknown'})`);
    }
  }

  lines.push(RULE);
  return lines.join('\n');
}
