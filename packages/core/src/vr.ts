/**
 * Value Representation helpers
 *
 * Maps VR codes to VR classes and derives the canonical string form and
 * emptiness of an element value. Tag state is computed here and nowhere else.
 */

import {
  VRClass,
  TagState,
  type DataElement,
  type Dataset,
  type ElementValue,
  type ScalarValue,
  type TagId,
  type VRCode,
} from './types.js';

export const NUMERIC_VRS: ReadonlySet<VRCode> = new Set([
  'DS', 'IS', 'US', 'SS', 'UL', 'SL', 'FD', 'FL', 'UV', 'SV',
]);
export const DATE_TIME_VRS: ReadonlySet<VRCode> = new Set(['DA', 'TM', 'DT']);
export const BINARY_VRS: ReadonlySet<VRCode> = new Set([
  'OB', 'OW', 'OD', 'OF', 'OL', 'OV', 'UN',
]);
export const SEQUENCE_VR: VRCode = 'SQ';

/** Delimiter between values of a multi-valued element */
export const MULTI_VALUE_DELIMITER = '\\';

export function vrClassOf(vr: VRCode): VRClass {
  const code = vr.toUpperCase();
  if (NUMERIC_VRS.has(code)) return VRClass.NUMERIC;
  if (DATE_TIME_VRS.has(code)) return VRClass.DATE_TIME;
  if (BINARY_VRS.has(code)) return VRClass.BINARY;
  if (code === SEQUENCE_VR) return VRClass.SEQUENCE;
  return VRClass.TEXT;
}

export function isSequenceElement(element: DataElement): boolean {
  return vrClassOf(element.vr) === VRClass.SEQUENCE;
}

export function isBytes(value: ElementValue): value is Uint8Array {
  return value instanceof Uint8Array;
}

export function isScalarList(value: ElementValue): value is readonly ScalarValue[] {
  return Array.isArray(value) && value.every((v) => typeof v === 'string' || typeof v === 'number');
}

export function isSequenceItems(value: ElementValue): value is readonly Dataset[] {
  return Array.isArray(value) && value.every((v) => typeof v === 'object' && v !== null);
}

/**
 * Empty means the zero-length representation for the value's kind.
 * A numeric 0 is a value, not an empty field.
 */
export function isEmptyValue(value: ElementValue): boolean {
  if (value === null) return true;
  if (typeof value === 'string') return value.length === 0;
  if (typeof value === 'number') return false;
  if (isBytes(value)) return value.byteLength === 0;
  return value.length === 0;
}

export function getTagState(dataset: Dataset, tag: TagId): TagState {
  if (!dataset.contains(tag)) return TagState.MISSING;
  return isEmptyValue(dataset.get(tag).value) ? TagState.EMPTY : TagState.PRESENT;
}

function bytesToHex(bytes: Uint8Array): string {
  return Buffer.from(bytes.buffer, bytes.byteOffset, bytes.byteLength).toString('hex');
}

/**
 * Canonical string form of a value. Used for hashing, reports and the
 * compliance check; whitespace is preserved as-is.
 */
export function stringifyValue(value: ElementValue): string {
  if (value === null) return '';
  if (typeof value === 'string') return value;
  if (typeof value === 'number') return String(value);
  if (isBytes(value)) return bytesToHex(value);
  if (isScalarList(value)) return value.map((v) => String(v)).join(MULTI_VALUE_DELIMITER);
  if (isSequenceItems(value)) {
    const items = value.map((item) => {
      const fields = [...item.elements()].map((e) => `${e.tag}=${stringifyValue(e.value)}`);
      return `{${fields.join(', ')}}`;
    });
    return `[${items.join(', ')}]`;
  }
  return '';
}

export function stringifyElement(element: DataElement): string {
  return stringifyValue(element.value);
}
