/**
 * Privacy Configuration
 *
 * Environment-based configuration for hashing, risk weight overrides and
 * logging. Validated once at load time.
 */

import { z } from 'zod';
import { ConfigError } from './errors.js';
import {
  DEFAULT_HASH_ALGORITHM,
  DEFAULT_HASH_LENGTH,
  HASH_ALGORITHMS,
  MAX_HASH_LENGTH,
  MIN_HASH_LENGTH,
  type HashAlgorithm,
} from './hash.js';
import type { LogLevel } from './logger.js';

export interface PrivacyConfig {
  hash: {
    salt: string;
    algorithm: HashAlgorithm;
    length: number;
  };
  /** Category -> weight overrides applied on top of the default table */
  riskWeights: Record<string, number>;
  logging: {
    level: LogLevel;
  };
}

const EnvSchema = z.object({
  PHIKIT_HASH_SALT: z.string().default(''),
  PHIKIT_HASH_ALGORITHM: z
    .string()
    .transform((value) => value.toLowerCase())
    .pipe(z.enum(HASH_ALGORITHMS))
    .default(DEFAULT_HASH_ALGORITHM),
  PHIKIT_HASH_LENGTH: z.coerce
    .number()
    .int()
    .min(MIN_HASH_LENGTH)
    .max(MAX_HASH_LENGTH)
    .default(DEFAULT_HASH_LENGTH),
  PHIKIT_RISK_WEIGHTS: z.string().optional(),
  LOG_LEVEL: z
    .string()
    .transform((value) => value.toLowerCase())
    .pipe(z.enum(['debug', 'info', 'warn', 'error']))
    .default('info'),
});

/**
 * Parse "date=0.9,time=0.5" into a weight map.
 */
export function parseRiskWeights(value: string | undefined): Record<string, number> {
  const weights: Record<string, number> = {};
  if (!value || value.trim() === '') return weights;

  const issues: string[] = [];
  for (const pair of value.split(',')) {
    const separator = pair.indexOf('=');
    const category = separator === -1 ? '' : pair.slice(0, separator).trim();
    const rawWeight = separator === -1 ? '' : pair.slice(separator + 1).trim();
    const weight = Number(rawWeight);
    if (!category || rawWeight === '' || !Number.isFinite(weight) || weight < 0) {
      issues.push(`invalid weight entry "${pair.trim()}"`);
      continue;
    }
    weights[category] = weight;
  }

  if (issues.length > 0) {
    throw new ConfigError('Invalid PHIKIT_RISK_WEIGHTS', issues);
  }
  return weights;
}

export function loadPrivacyConfigFromEnv(env: NodeJS.ProcessEnv = process.env): PrivacyConfig {
  const parsed = EnvSchema.safeParse(env);
  if (!parsed.success) {
    throw new ConfigError(
      'Invalid privacy configuration',
      parsed.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`)
    );
  }

  const vars = parsed.data;
  return {
    hash: {
      salt: vars.PHIKIT_HASH_SALT,
      algorithm: vars.PHIKIT_HASH_ALGORITHM,
      length: vars.PHIKIT_HASH_LENGTH,
    },
    riskWeights: parseRiskWeights(vars.PHIKIT_RISK_WEIGHTS),
    logging: {
      level: vars.LOG_LEVEL,
    },
  };
}

/**
 * One-line description for startup logs. Never includes the salt.
 */
export function describePrivacyConfig(config: PrivacyConfig): string {
  const weights = Object.entries(config.riskWeights)
    .map(([category, weight]) => `${category}=${weight}`)
    .join(',');
  return [
    `hash=${config.hash.algorithm}/${config.hash.length}`,
    `salted=${config.hash.salt !== ''}`,
    `weights=${weights || 'default'}`,
    `log=${config.logging.level}`,
  ].join(' ');
}
