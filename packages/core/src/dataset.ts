/**
 * In-Memory Dataset
 *
 * Map-backed implementation of the Dataset capability. Insertion order is the
 * iteration order. `set` never creates a tag: use `add` to build a dataset.
 */

import { TagNotFoundError, getErrorMessage } from './errors.js';
import { createLogger } from './logger.js';
import { isBytes, isScalarList, isSequenceItems, stringifyValue } from './vr.js';
import type { DataElement, Dataset, ElementValue, TagId, VRCode } from './types.js';

/**
 * Element definition used to build a dataset: [tag, vr, value]
 */
export type ElementEntry = readonly [TagId, VRCode, ElementValue];

const log = createLogger('dataset');

function cloneValue(value: ElementValue): ElementValue {
  if (value === null || typeof value === 'string' || typeof value === 'number') {
    return value;
  }
  if (isBytes(value)) return new Uint8Array(value);
  if (isScalarList(value)) return [...value];
  if (isSequenceItems(value)) return value.map((item) => item.clone());
  return value;
}

export class InMemoryDataset implements Dataset {
  private readonly entries = new Map<TagId, DataElement>();

  constructor(elements: Iterable<ElementEntry> = []) {
    for (const [tag, vr, value] of elements) {
      this.add(tag, vr, value);
    }
  }

  get size(): number {
    return this.entries.size;
  }

  /**
   * Adds or overwrites an element, including its VR.
   */
  add(tag: TagId, vr: VRCode, value: ElementValue): this {
    this.entries.set(tag, { tag, vr: vr.toUpperCase(), value });
    return this;
  }

  contains(tag: TagId): boolean {
    return this.entries.has(tag);
  }

  get(tag: TagId): DataElement {
    const element = this.entries.get(tag);
    if (!element) {
      throw new TagNotFoundError(tag);
    }
    return { ...element };
  }

  set(tag: TagId, value: ElementValue): void {
    const element = this.entries.get(tag);
    if (!element) {
      throw new TagNotFoundError(tag);
    }
    this.entries.set(tag, { ...element, value });
  }

  delete(tag: TagId): void {
    this.entries.delete(tag);
  }

  *elements(): IterableIterator<DataElement> {
    for (const element of this.entries.values()) {
      yield { ...element };
    }
  }

  clone(): InMemoryDataset {
    const copy = new InMemoryDataset();
    for (const element of this.entries.values()) {
      copy.add(element.tag, element.vr, cloneValue(element.value));
    }
    return copy;
  }

  /**
   * Plain tag -> stringified value view, for logging and assertions.
   */
  toRecord(): Record<TagId, string> {
    const record: Record<TagId, string> = {};
    for (const element of this.entries.values()) {
      record[element.tag] = stringifyValue(element.value);
    }
    return record;
  }
}

/**
 * Create a dataset from [tag, vr, value] entries.
 */
export function createDataset(elements: Iterable<ElementEntry> = []): InMemoryDataset {
  return new InMemoryDataset(elements);
}

/**
 * Deep copy of any Dataset implementation.
 */
export function cloneDataset(dataset: Dataset): Dataset {
  return dataset.clone();
}

/**
 * Stringified value of a tag, or the fallback when it is missing or the
 * dataset cannot produce it.
 */
export function safeGetTagValue(
  dataset: Dataset,
  tag: TagId,
  fallback: string | null = null
): string | null {
  try {
    if (!dataset.contains(tag)) return fallback;
    return stringifyValue(dataset.get(tag).value);
  } catch (error) {
    log.debug(`Could not read tag ${tag}, using fallback`, { error: getErrorMessage(error) });
    return fallback;
  }
}
