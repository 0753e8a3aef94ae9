/**
 * Tag Registry
 *
 * Static metadata for the fields the toolkit knows about. The registry is
 * partial: tags outside it are never PHI-scored and never error.
 *
 * INVARIANTS:
 * - Entries are frozen once the registry is constructed
 * - riskLevel is an integer in [0, 5]
 */

import type { TagId, VRClass, VRCode } from './types.js';
import { vrClassOf } from './vr.js';

export interface TagMetadata {
  tag: TagId;
  name: string;
  vr: VRCode;
  /** Value multiplicity ("1", "1-n", ...) */
  vm: string;
  isPhi: boolean;
  /** Base identifiability risk, 0 (none) to 5 (direct identifier) */
  riskLevel: number;
}

export const MAX_RISK_LEVEL = 5;

export class TagRegistry {
  private readonly byTag: ReadonlyMap<TagId, Readonly<TagMetadata>>;

  constructor(entries: Iterable<TagMetadata> = []) {
    const map = new Map<TagId, Readonly<TagMetadata>>();
    for (const entry of entries) {
      if (!Number.isInteger(entry.riskLevel) || entry.riskLevel < 0 || entry.riskLevel > MAX_RISK_LEVEL) {
        throw new RangeError(`Risk level for ${entry.tag} must be an integer in [0, ${MAX_RISK_LEVEL}]`);
      }
      map.set(entry.tag, Object.freeze({ ...entry }));
    }
    this.byTag = map;
  }

  get size(): number {
    return this.byTag.size;
  }

  get(tag: TagId): Readonly<TagMetadata> | undefined {
    return this.byTag.get(tag);
  }

  has(tag: TagId): boolean {
    return this.byTag.has(tag);
  }

  vrClass(tag: TagId): VRClass | undefined {
    const meta = this.byTag.get(tag);
    return meta ? vrClassOf(meta.vr) : undefined;
  }

  /**
   * Display name, falling back to the tag id itself.
   */
  displayName(tag: TagId): string {
    return this.byTag.get(tag)?.name ?? tag;
  }

  /**
   * PHI tags in registration order.
   */
  phiTags(): TagId[] {
    return [...this.byTag.values()].filter((meta) => meta.isPhi).map((meta) => meta.tag);
  }

  all(): Readonly<TagMetadata>[] {
    return [...this.byTag.values()];
  }
}

function tag(
  keyword: string,
  vr: VRCode,
  isPhi: boolean,
  riskLevel: number,
  vm = '1'
): TagMetadata {
  return { tag: keyword, name: keyword, vr, vm, isPhi, riskLevel };
}

/**
 * Common patient/study identifying fields, keyed by keyword.
 */
export const DEFAULT_TAG_ENTRIES: readonly TagMetadata[] = [
  tag('PatientName', 'PN', true, 5),
  tag('PatientID', 'LO', true, 5),
  tag('PatientBirthDate', 'DA', true, 4),
  tag('PatientSex', 'CS', false, 1),
  tag('StudyDate', 'DA', true, 3),
  tag('StudyTime', 'TM', true, 2),
  tag('StudyInstanceUID', 'UI', true, 4),
  tag('SeriesInstanceUID', 'UI', true, 4),
  tag('AccessionNumber', 'SH', true, 3),
  tag('ReferringPhysicianName', 'PN', true, 3),
  tag('InstitutionName', 'LO', true, 2),
  tag('StudyDescription', 'LO', true, 1),
  tag('SeriesDescription', 'LO', true, 1),
  tag('PatientWeight', 'DS', false, 0),
];

export const DEFAULT_TAG_REGISTRY = new TagRegistry(DEFAULT_TAG_ENTRIES);
