/**
 * Core Types
 *
 * Shared data model for the anonymizer, diff and risk packages.
 * A Dataset is owned by the caller; the core only reads and mutates it
 * through this capability interface.
 */

/**
 * Field identifier: a keyword ("PatientName") or a group/element form
 * ("(0010,0010)"). Used as a mapping key everywhere.
 */
export type TagId = string;

/**
 * Two-letter value representation code (PN, LO, DA, DS, OB, SQ, ...)
 */
export type VRCode = string;

/**
 * Semantic kind of a field's value. Governs comparison and which actions
 * may touch the field.
 */
export enum VRClass {
  NUMERIC = 'NUMERIC',
  DATE_TIME = 'DATE_TIME',
  BINARY = 'BINARY',
  SEQUENCE = 'SEQUENCE',
  TEXT = 'TEXT',
}

/**
 * Tri-state of a tag within one dataset. Derived, never stored.
 *
 * MISSING: not in the dataset ("not applicable")
 * EMPTY:   present with the empty representation for its VR ("redacted")
 * PRESENT: present with a non-empty value
 */
export enum TagState {
  MISSING = 'MISSING',
  EMPTY = 'EMPTY',
  PRESENT = 'PRESENT',
}

export type ScalarValue = string | number;

export type ElementValue =
  | ScalarValue
  | readonly ScalarValue[]
  | Uint8Array
  | readonly Dataset[]
  | null;

export interface DataElement {
  tag: TagId;
  vr: VRCode;
  value: ElementValue;
}

/**
 * Dataset capability consumed by the core.
 *
 * `get` throws TagNotFoundError for a missing tag; callers check `contains`
 * first. Iteration order is stable within one call and nothing more.
 */
export interface Dataset {
  readonly size: number;
  contains(tag: TagId): boolean;
  get(tag: TagId): DataElement;
  /** Replaces the value of an existing element, keeping its VR. */
  set(tag: TagId, value: ElementValue): void;
  delete(tag: TagId): void;
  elements(): IterableIterator<DataElement>;
  /** Independent deep copy, nested sequence items included. */
  clone(): Dataset;
}
