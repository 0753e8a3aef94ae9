/**
 * Anonymization Profiles
 *
 * A profile is a named, ordered list of rules (tag -> action). Built-in
 * profiles cover a PARTIAL subset of the baseline confidentiality profile;
 * `clean_descriptors` is a custom extension meant to be merged with `basic`.
 *
 * CRITICAL INVARIANTS:
 * - One rule per tag within a profile
 * - Unknown profile names resolve to an empty rule list, never an error
 * - Merging keeps the FIRST rule seen for a tag
 */

import { parse as parseYaml } from 'yaml';
import { z } from 'zod';
import { ProfileValidationError, getErrorMessage } from './errors.js';
import type { TagId } from './types.js';

export enum Action {
  REMOVE = 'REMOVE',
  HASH = 'HASH',
  EMPTY = 'EMPTY',
  KEEP = 'KEEP',
  REPLACE = 'REPLACE',
}

export interface ProfileRule {
  tag: TagId;
  action: Action;
  /** Value written by REPLACE */
  replacementValue?: string;
  /** Section reference in the source standard, for audit trails */
  standardRef?: string;
}

/**
 * Which rules to run: a registered profile by name, or an explicit list.
 */
export type ProfileSelection =
  | { kind: 'named'; name: string }
  | { kind: 'inline'; rules: readonly ProfileRule[] };

export function namedProfile(name: string): ProfileSelection {
  return { kind: 'named', name };
}

export function inlineProfile(rules: readonly ProfileRule[]): ProfileSelection {
  return { kind: 'inline', rules };
}

function rule(tag: TagId, action: Action, standardRef?: string): ProfileRule {
  return standardRef ? { tag, action, standardRef } : { tag, action };
}

export const BASIC_PROFILE: readonly ProfileRule[] = [
  rule('PatientName', Action.REMOVE, 'X.1-1'),
  rule('PatientID', Action.HASH, 'X.1-1'),
  rule('PatientBirthDate', Action.REMOVE, 'X.1-1'),
  rule('PatientSex', Action.KEEP, 'X.1-1'),
  rule('StudyDate', Action.EMPTY, 'X.1-1'),
  rule('StudyTime', Action.EMPTY, 'X.1-1'),
  rule('StudyInstanceUID', Action.HASH, 'X.1-1'),
  rule('SeriesInstanceUID', Action.HASH, 'X.1-1'),
];

// Not part of the standard profile; removes free-text descriptors
export const CLEAN_DESCRIPTORS_PROFILE: readonly ProfileRule[] = [
  rule('AccessionNumber', Action.REMOVE),
  rule('StudyDescription', Action.REMOVE),
  rule('SeriesDescription', Action.REMOVE),
];

export const BUILTIN_PROFILES: Readonly<Record<string, readonly ProfileRule[]>> = {
  basic: BASIC_PROFILE,
  clean_descriptors: CLEAN_DESCRIPTORS_PROFILE,
};

/**
 * Throws when a rule list names the same tag twice.
 */
export function assertDistinctTags(rules: readonly ProfileRule[], context: string): void {
  const seen = new Set<TagId>();
  const duplicates: string[] = [];
  for (const r of rules) {
    if (seen.has(r.tag)) duplicates.push(r.tag);
    seen.add(r.tag);
  }
  if (duplicates.length > 0) {
    throw new ProfileValidationError(
      `Duplicate tags in ${context}`,
      duplicates.map((tag) => `${tag} appears more than once`)
    );
  }
}

const RuleDocumentSchema = z.object({
  tag: z.string().min(1),
  action: z.preprocess(
    (value) => (typeof value === 'string' ? value.toUpperCase() : value),
    z.nativeEnum(Action)
  ),
  replacement: z.union([z.string(), z.number()]).optional(),
  ref: z.string().optional(),
});

const ProfileDocumentSchema = z.object({
  profiles: z.record(z.string().min(1), z.array(RuleDocumentSchema)),
});

export type ProfileDocument = z.infer<typeof ProfileDocumentSchema>;

/**
 * Parse a YAML profile document:
 *
 *   profiles:
 *     research:
 *       - { tag: PatientName, action: replace, replacement: ANONYMIZED }
 *       - { tag: PatientID, action: hash }
 */
export function parseProfileDocument(source: string): Record<string, ProfileRule[]> {
  let raw: unknown;
  try {
    raw = parseYaml(source);
  } catch (error) {
    throw new ProfileValidationError('Profile document is not valid YAML', [getErrorMessage(error)]);
  }

  const parsed = ProfileDocumentSchema.safeParse(raw);
  if (!parsed.success) {
    throw new ProfileValidationError(
      'Invalid profile document',
      parsed.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`)
    );
  }

  const profiles: Record<string, ProfileRule[]> = {};
  for (const [name, rules] of Object.entries(parsed.data.profiles)) {
    const converted = rules.map((r): ProfileRule => {
      const out: ProfileRule = { tag: r.tag, action: r.action };
      if (r.replacement !== undefined) out.replacementValue = String(r.replacement);
      if (r.ref !== undefined) out.standardRef = r.ref;
      return out;
    });
    assertDistinctTags(converted, `profile "${name}"`);
    profiles[name] = converted;
  }
  return profiles;
}

/**
 * Immutable registry of named profiles.
 */
export class ProfileStore {
  private readonly profiles: ReadonlyMap<string, readonly ProfileRule[]>;

  constructor(profiles: Readonly<Record<string, readonly ProfileRule[]>> = BUILTIN_PROFILES) {
    const map = new Map<string, readonly ProfileRule[]>();
    for (const [name, rules] of Object.entries(profiles)) {
      assertDistinctTags(rules, `profile "${name}"`);
      map.set(name, Object.freeze(rules.map((r) => Object.freeze({ ...r }))));
    }
    this.profiles = map;
  }

  /**
   * Profile store built from a YAML document, layered over `base`.
   * Document profiles replace base profiles of the same name.
   */
  static fromYaml(
    source: string,
    base: Readonly<Record<string, readonly ProfileRule[]>> = BUILTIN_PROFILES
  ): ProfileStore {
    return new ProfileStore({ ...base, ...parseProfileDocument(source) });
  }

  has(name: string): boolean {
    return this.profiles.has(name);
  }

  names(): string[] {
    return [...this.profiles.keys()];
  }

  /**
   * Rules for a profile; an empty list when the name is unknown.
   */
  get(name: string): ProfileRule[] {
    return [...(this.profiles.get(name) ?? [])];
  }

  /**
   * Combine profiles in order. The first rule seen for a tag wins.
   */
  merge(...names: string[]): ProfileRule[] {
    const merged: ProfileRule[] = [];
    const seen = new Set<TagId>();
    for (const name of names) {
      for (const r of this.get(name)) {
        if (!seen.has(r.tag)) {
          merged.push(r);
          seen.add(r.tag);
        }
      }
    }
    return merged;
  }

  withProfile(name: string, rules: readonly ProfileRule[]): ProfileStore {
    return new ProfileStore({ ...Object.fromEntries(this.profiles), [name]: rules });
  }

  /**
   * Resolve a selection once, at the call boundary.
   */
  resolve(selection: ProfileSelection): ProfileRule[] {
    if (selection.kind === 'named') {
      return this.get(selection.name);
    }
    assertDistinctTags(selection.rules, 'inline rule list');
    return [...selection.rules];
  }
}

export const defaultProfileStore = new ProfileStore();

export function getProfile(name: string): ProfileRule[] {
  return defaultProfileStore.get(name);
}

export function mergeProfiles(...names: string[]): ProfileRule[] {
  return defaultProfileStore.merge(...names);
}
