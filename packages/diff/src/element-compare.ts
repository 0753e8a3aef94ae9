/**
 * Element Value Comparison
 *
 * Normalizes element values by VR class so that equality is decided on
 * meaning rather than text:
 * - NUMERIC: floats with relative tolerance; multi-values as tuples
 * - DATE_TIME: canonical string (equal instants in different formats are
 *   NOT reconciled)
 * - BINARY: raw bytes
 * - SEQUENCE: nested elements normalized recursively, best effort
 * - TEXT: exact canonical string, whitespace included
 *
 * An empty numeric field normalizes to text "" so it never equals 0.
 */

import {
  MULTI_VALUE_DELIMITER,
  VRClass,
  createLogger,
  getErrorMessage,
  isBytes,
  isScalarList,
  isSequenceItems,
  stringifyValue,
  vrClassOf,
  type DataElement,
  type ElementValue,
  type Logger,
  type ScalarValue,
  type TagId,
} from '@phikit/core';

export type NormalizedValue =
  | { kind: 'number'; value: number }
  | { kind: 'numbers'; values: number[] }
  | { kind: 'text'; value: string }
  | { kind: 'bytes'; value: Uint8Array }
  | { kind: 'sequence'; items: NormalizedItem[] };

export type NormalizedItem = Array<[TagId, NormalizedValue]>;

export const RELATIVE_TOLERANCE = 1e-9;

const defaultLogger = createLogger('element-compare');

function text(value: ElementValue): NormalizedValue {
  return { kind: 'text', value: stringifyValue(value) };
}

function parseNumber(raw: ScalarValue): number | null {
  if (typeof raw === 'number') return Number.isFinite(raw) ? raw : null;
  const trimmed = raw.trim();
  if (trimmed === '') return null;
  const parsed = Number(trimmed);
  return Number.isFinite(parsed) ? parsed : null;
}

function parseNumberList(items: readonly ScalarValue[]): number[] | null {
  const values: number[] = [];
  for (const item of items) {
    const parsed = parseNumber(item);
    if (parsed === null) return null;
    values.push(parsed);
  }
  return values;
}

function normalizeNumeric(value: ElementValue, logger: Logger): NormalizedValue {
  if (typeof value === 'number') {
    return Number.isFinite(value) ? { kind: 'number', value } : text(value);
  }

  if (typeof value === 'string') {
    if (value.trim() === '') return text(value);
    if (value.includes(MULTI_VALUE_DELIMITER)) {
      const values = parseNumberList(value.split(MULTI_VALUE_DELIMITER));
      if (values) return { kind: 'numbers', values };
    } else {
      const parsed = parseNumber(value);
      if (parsed !== null) return { kind: 'number', value: parsed };
    }
    logger.debug('Numeric value did not parse, comparing as text', { value });
    return text(value);
  }

  if (value !== null && isScalarList(value)) {
    if (value.length === 0) return text(value);
    const values = parseNumberList(value);
    if (values) return { kind: 'numbers', values };
    logger.debug('Numeric multi-value did not parse, comparing as text');
  }

  return text(value);
}

function normalizeBinary(value: ElementValue): NormalizedValue {
  if (value !== null && isBytes(value)) return { kind: 'bytes', value };
  if (typeof value === 'string') {
    return { kind: 'bytes', value: new Uint8Array(Buffer.from(value, 'utf8')) };
  }
  return { kind: 'bytes', value: new Uint8Array(Buffer.from(stringifyValue(value), 'utf8')) };
}

function normalizeSequence(value: ElementValue, logger: Logger): NormalizedValue {
  if (value === null || typeof value === 'string' || typeof value === 'number' || isBytes(value)) {
    return text(value);
  }
  if (!isSequenceItems(value)) return text(value);

  try {
    const items = value.map((item): NormalizedItem =>
      [...item.elements()].map((nested): [TagId, NormalizedValue] => [
        nested.tag,
        normalizeElementValue(nested, logger),
      ])
    );
    return { kind: 'sequence', items };
  } catch (error) {
    logger.debug('Could not normalize sequence items, comparing as text', {
      error: getErrorMessage(error),
    });
    return text(value);
  }
}

/**
 * Comparable form of an element's value, chosen by its VR class.
 */
export function normalizeElementValue(element: DataElement, logger: Logger = defaultLogger): NormalizedValue {
  switch (vrClassOf(element.vr)) {
    case VRClass.NUMERIC:
      return normalizeNumeric(element.value, logger);
    case VRClass.DATE_TIME:
      return text(element.value);
    case VRClass.BINARY:
      return normalizeBinary(element.value);
    case VRClass.SEQUENCE:
      return normalizeSequence(element.value, logger);
    case VRClass.TEXT:
      return text(element.value);
  }
}

export function isClose(a: number, b: number, relTol = RELATIVE_TOLERANCE): boolean {
  if (a === b) return true;
  return Math.abs(a - b) <= relTol * Math.max(Math.abs(a), Math.abs(b));
}

function bytesEqual(a: Uint8Array, b: Uint8Array): boolean {
  if (a.byteLength !== b.byteLength) return false;
  for (let i = 0; i < a.byteLength; i++) {
    if (a[i] !== b[i]) return false;
  }
  return true;
}

function itemsEqual(a: NormalizedItem, b: NormalizedItem): boolean {
  if (a.length !== b.length) return false;
  return a.every(([tag, value], i) => tag === b[i][0] && normalizedValuesEqual(value, b[i][1]));
}

export function normalizedValuesEqual(a: NormalizedValue, b: NormalizedValue): boolean {
  switch (a.kind) {
    case 'number':
      return b.kind === 'number' && isClose(a.value, b.value);
    case 'numbers':
      return (
        b.kind === 'numbers' &&
        a.values.length === b.values.length &&
        a.values.every((v, i) => isClose(v, b.values[i]))
      );
    case 'text':
      return b.kind === 'text' && a.value === b.value;
    case 'bytes':
      return b.kind === 'bytes' && bytesEqual(a.value, b.value);
    case 'sequence':
      return (
        b.kind === 'sequence' &&
        a.items.length === b.items.length &&
        a.items.every((item, i) => itemsEqual(item, b.items[i]))
      );
  }
}

/**
 * Type-aware equality of two elements. Two absent elements are equal;
 * a comparison that throws counts as unequal.
 */
export function elementsAreEqual(
  a: DataElement | undefined,
  b: DataElement | undefined,
  logger: Logger = defaultLogger
): boolean {
  if (a === undefined && b === undefined) return true;
  if (a === undefined || b === undefined) return false;

  try {
    return normalizedValuesEqual(normalizeElementValue(a, logger), normalizeElementValue(b, logger));
  } catch (error) {
    logger.warn(`Could not compare values of ${a.tag}`, { tag: a.tag, error: getErrorMessage(error) });
    return false;
  }
}
