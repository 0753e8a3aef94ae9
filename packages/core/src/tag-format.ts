/**
 * Tag formatting and private-tag detection
 *
 * Private (manufacturer-specific) tags have an odd group number. They are
 * outside every registry and may carry PHI, so they are flagged for manual
 * review rather than silently ignored.
 */

import { DEFAULT_TAG_REGISTRY, type TagRegistry } from './tag-registry.js';
import { stringifyValue } from './vr.js';
import type { DataElement, Dataset, TagId } from './types.js';

const HEX_TAG = /^(?:0x)?([0-9a-f]{4})([0-9a-f]{4})$/i;
const GROUPED_TAG = /^\(([0-9a-f]{4}),([0-9a-f]{4})\)$/i;

export const PRIVATE_TAG_WARNING = 'UNVERIFIED - Private tags may contain PHI';
const FLAG_VALUE_LENGTH = 50;

/**
 * Normalize a numeric tag to "(GGGG,EEEE)". Keywords are returned unchanged.
 *
 *   formatTag('0x00100010')   // "(0010,0010)"
 *   formatTag('(0010, 0010)') // "(0010,0010)"
 *   formatTag('PatientName')  // "PatientName"
 */
export function formatTag(tag: TagId): TagId {
  const compact = tag.replace(/\s+/g, '');
  const hex = HEX_TAG.exec(compact);
  if (hex) {
    return `(${hex[1]},${hex[2]})`.toUpperCase();
  }
  if (GROUPED_TAG.test(compact)) {
    return compact.toUpperCase();
  }
  return tag;
}

/**
 * Group number of a numeric tag, or null for keywords.
 */
export function parseTagGroup(tag: TagId): number | null {
  const grouped = GROUPED_TAG.exec(formatTag(tag));
  return grouped ? parseInt(grouped[1], 16) : null;
}

export type TagRef = TagId | number | readonly [number, number];

export function isPrivateTag(tag: TagRef): boolean {
  let group: number | null;
  if (typeof tag === 'number') {
    group = (tag >>> 16) & 0xffff;
  } else if (typeof tag === 'string') {
    group = parseTagGroup(tag);
  } else {
    group = tag[0] & 0xffff;
  }
  return group !== null && (group & 0x0001) === 1;
}

export function getPrivateTags(dataset: Dataset): DataElement[] {
  return [...dataset.elements()].filter((element) => isPrivateTag(element.tag));
}

export interface PrivateTagFlag {
  name: string;
  /** Stringified value, truncated for display */
  value: string;
  vr: string;
  riskWarning: string;
}

export function flagPrivateTags(
  dataset: Dataset,
  registry: TagRegistry = DEFAULT_TAG_REGISTRY
): Record<TagId, PrivateTagFlag> {
  const flags: Record<TagId, PrivateTagFlag> = {};
  for (const element of getPrivateTags(dataset)) {
    flags[formatTag(element.tag)] = {
      name: registry.get(element.tag)?.name ?? 'Unknown',
      value: stringifyValue(element.value).slice(0, FLAG_VALUE_LENGTH),
      vr: element.vr,
      riskWarning: PRIVATE_TAG_WARNING,
    };
  }
  return flags;
}
