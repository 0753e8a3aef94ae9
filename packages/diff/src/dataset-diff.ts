/**
 * Dataset Diff
 *
 * Partitions the union of tags in two datasets into REMOVED, ADDED,
 * MODIFIED and UNCHANGED.
 *
 * CRITICAL INVARIANTS:
 * - Every tag present in either dataset lands in exactly one bucket,
 *   except a tag whose access fails, which is logged and skipped
 * - EMPTY counts as present: "" in both is UNCHANGED, missing -> "" is ADDED
 * - Equality uses normalized values; displayed values are always the
 *   stringified form
 */

import {
  DEFAULT_TAG_REGISTRY,
  createLogger,
  getErrorMessage,
  stringifyElement,
  type DataElement,
  type Dataset,
  type Logger,
  type TagId,
  type TagRegistry,
} from '@phikit/core';
import { elementsAreEqual } from './element-compare.js';

export enum DiffStatus {
  REMOVED = 'REMOVED',
  ADDED = 'ADDED',
  MODIFIED = 'MODIFIED',
  UNCHANGED = 'UNCHANGED',
}

export interface TagDiff {
  tag: TagId;
  tagName: string;
  beforeValue: string;
  afterValue: string;
  status: DiffStatus;
}

export interface DatasetDiff {
  removed: TagDiff[];
  added: TagDiff[];
  modified: TagDiff[];
  unchanged: TagDiff[];
}

export interface CompareOptions {
  /** Used for display names only */
  registry?: TagRegistry;
  logger?: Logger;
}

const defaultLogger = createLogger('dataset-diff');

function tagsOf(dataset: Dataset): TagId[] {
  const tags: TagId[] = [];
  for (const element of dataset.elements()) {
    tags.push(element.tag);
  }
  return tags;
}

export function compareDatasets(before: Dataset, after: Dataset, options: CompareOptions = {}): DatasetDiff {
  const registry = options.registry ?? DEFAULT_TAG_REGISTRY;
  const logger = options.logger ?? defaultLogger;

  const beforeTags = tagsOf(before);
  const afterTags = tagsOf(after);
  const beforeSet = new Set(beforeTags);
  const afterSet = new Set(afterTags);

  const diff: DatasetDiff = { removed: [], added: [], modified: [], unchanged: [] };

  const entry = (tag: TagId, status: DiffStatus, b?: DataElement, a?: DataElement): TagDiff => ({
    tag,
    tagName: registry.displayName(tag),
    beforeValue: b ? stringifyElement(b) : '',
    afterValue: a ? stringifyElement(a) : '',
    status,
  });

  for (const tag of beforeTags) {
    try {
      if (!afterSet.has(tag)) {
        diff.removed.push(entry(tag, DiffStatus.REMOVED, before.get(tag)));
        continue;
      }

      const b = before.get(tag);
      const a = after.get(tag);
      if (elementsAreEqual(b, a, logger)) {
        diff.unchanged.push(entry(tag, DiffStatus.UNCHANGED, b, a));
      } else {
        diff.modified.push(entry(tag, DiffStatus.MODIFIED, b, a));
      }
    } catch (error) {
      logger.warn(`Error accessing tag ${tag} in diff`, { tag, error: getErrorMessage(error) });
    }
  }

  for (const tag of afterTags) {
    if (beforeSet.has(tag)) continue;
    try {
      diff.added.push(entry(tag, DiffStatus.ADDED, undefined, after.get(tag)));
    } catch (error) {
      logger.warn(`Error accessing added tag ${tag}`, { tag, error: getErrorMessage(error) });
    }
  }

  return diff;
}

export function hasChanges(diff: DatasetDiff): boolean {
  return diff.removed.length > 0 || diff.added.length > 0 || diff.modified.length > 0;
}

export interface FormatDiffOptions {
  showUnchanged?: boolean;
}

const RULE = '='.repeat(70);

export function formatDiff(diff: DatasetDiff, options: FormatDiffOptions = {}): string {
  const lines = [
    RULE,
    'DATASET DIFF',
    RULE,
    `Removed: ${diff.removed.length} | Modified: ${diff.modified.length} | ` +
      `Unchanged: ${diff.unchanged.length} | Added: ${diff.added.length}`,
    '',
  ];

  if (diff.removed.length > 0) {
    lines.push('REMOVED TAGS:');
    for (const item of diff.removed) lines.push(`  [-] ${item.tag}: ${item.beforeValue}`);
    lines.push('');
  }

  if (diff.modified.length > 0) {
    lines.push('MODIFIED TAGS:');
    for (const item of diff.modified) {
      lines.push(`  [~] ${item.tag}:`);
      lines.push(`      Before: ${item.beforeValue}`);
      lines.push(`      After:  ${item.afterValue}`);
    }
    lines.push('');
  }

  if (diff.added.length > 0) {
    lines.push('ADDED TAGS:');
    for (const item of diff.added) lines.push(`  [+] ${item.tag}: ${item.afterValue}`);
    lines.push('');
  }

  if (options.showUnchanged && diff.unchanged.length > 0) {
    lines.push('UNCHANGED TAGS:');
    for (const item of diff.unchanged) lines.push(`  [=] ${item.tag}: ${item.beforeValue}`);
    lines.push('');
  }

  lines.push(RULE);
  return lines.join('\n');
}
