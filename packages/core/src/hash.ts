/**
 * Salted value hashing
 *
 * DETERMINISTIC: the same (value, salt, algorithm, length) always produces
 * the same output. Output is truncated lowercase hex for display.
 */

import { createHash } from 'node:crypto';
import { z } from 'zod';
import { ConfigError } from './errors.js';

export const HASH_ALGORITHMS = ['sha256', 'sha384', 'sha512', 'sha1'] as const;
export type HashAlgorithm = (typeof HASH_ALGORITHMS)[number];

export const DEFAULT_HASH_ALGORITHM: HashAlgorithm = 'sha256';
export const DEFAULT_HASH_LENGTH = 16;
export const MIN_HASH_LENGTH = 8;
export const MAX_HASH_LENGTH = 128;

export interface HashOptions {
  salt?: string;
  algorithm?: HashAlgorithm;
  /** Number of hex characters kept */
  length?: number;
}

export function hashValue(value: string, options: HashOptions = {}): string {
  const { salt = '', algorithm = DEFAULT_HASH_ALGORITHM, length = DEFAULT_HASH_LENGTH } = options;
  return createHash(algorithm).update(`${value}${salt}`, 'utf8').digest('hex').slice(0, length);
}

const HashSettingsSchema = z.object({
  salt: z.string(),
  algorithm: z.enum(HASH_ALGORITHMS),
  length: z.number().int().min(MIN_HASH_LENGTH).max(MAX_HASH_LENGTH),
});

export type HashSettings = z.infer<typeof HashSettingsSchema>;

/**
 * Fills defaults and validates; lengths outside [8, 128] are rejected.
 */
export function resolveHashSettings(options: HashOptions = {}): HashSettings {
  const parsed = HashSettingsSchema.safeParse({
    salt: options.salt ?? '',
    algorithm: options.algorithm ?? DEFAULT_HASH_ALGORITHM,
    length: options.length ?? DEFAULT_HASH_LENGTH,
  });
  if (!parsed.success) {
    throw new ConfigError(
      'Invalid hash settings',
      parsed.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`)
    );
  }
  return parsed.data;
}
