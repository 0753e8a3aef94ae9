import { describe, it, expect } from 'vitest';
import { createDataset, type DataElement } from '@phikit/core';
import { elementsAreEqual, isClose, normalizeElementValue } from './element-compare.js';

const el = (vr: string, value: DataElement['value'], tag = 'X'): DataElement => ({ tag, vr, value });

describe('diff:element-compare', () => {
  describe('Normalization', () => {
    it('parses numeric strings and splits multi-values', () => {
      expect(normalizeElementValue(el('DS', '70.0'))).toEqual({ kind: 'number', value: 70 });
      expect(normalizeElementValue(el('DS', '1\\2.5'))).toEqual({ kind: 'numbers', values: [1, 2.5] });
      expect(normalizeElementValue(el('IS', [3, '4']))).toEqual({ kind: 'numbers', values: [3, 4] });
    });

    it('keeps empty and unparseable numerics as text', () => {
      expect(normalizeElementValue(el('DS', ''))).toEqual({ kind: 'text', value: '' });
      expect(normalizeElementValue(el('DS', 'abc'))).toEqual({ kind: 'text', value: 'abc' });
      expect(normalizeElementValue(el('DS', null))).toEqual({ kind: 'text', value: '' });
    });

    it('reads VR codes case-insensitively', () => {
      expect(normalizeElementValue(el('ds', '2'))).toEqual({ kind: 'number', value: 2 });
    });

    it('treats binary strings as their UTF-8 bytes', () => {
      expect(normalizeElementValue(el('OB', 'ab'))).toEqual({
        kind: 'bytes',
        value: new Uint8Array([97, 98]),
      });
    });

    it('normalizes sequence items recursively', () => {
      const item = createDataset([['ItemWeight', 'DS', '1.50']]);
      expect(normalizeElementValue(el('SQ', [item]))).toEqual({
        kind: 'sequence',
        items: [[['ItemWeight', { kind: 'number', value: 1.5 }]]],
      });
    });
  });

  describe('Equality', () => {
    it('numbers compare with relative tolerance', () => {
      expect(isClose(1, 1 + 1e-10)).toBe(true);
      expect(isClose(1, 1.001)).toBe(false);
      expect(isClose(0, 0)).toBe(true);
      expect(elementsAreEqual(el('DS', '1.0'), el('DS', 1))).toBe(true);
    });

    it('an empty numeric never equals zero', () => {
      expect(elementsAreEqual(el('DS', ''), el('DS', 0))).toBe(false);
      expect(elementsAreEqual(el('DS', ''), el('DS', '0'))).toBe(false);
    });

    it('multi-values compare as tuples', () => {
      expect(elementsAreEqual(el('DS', '1\\2'), el('DS', [1, 2]))).toBe(true);
      expect(elementsAreEqual(el('DS', '1\\2'), el('DS', '2\\1'))).toBe(false);
      expect(elementsAreEqual(el('DS', '1\\2'), el('DS', '1\\2\\3'))).toBe(false);
    });

    it('text compares exactly, whitespace included', () => {
      expect(elementsAreEqual(el('LO', ''), el('LO', ' '))).toBe(false);
      expect(elementsAreEqual(el('LO', 'A'), el('LO', 'A'))).toBe(true);
    });

    it('dates in different formats are not reconciled', () => {
      expect(elementsAreEqual(el('DA', '20250126'), el('DA', '2025-01-26'))).toBe(false);
    });

    it('binary compares raw bytes', () => {
      expect(elementsAreEqual(el('OB', new Uint8Array([1, 2])), el('OB', new Uint8Array([1, 2])))).toBe(true);
      expect(elementsAreEqual(el('OB', new Uint8Array([1, 2])), el('OB', new Uint8Array([1, 3])))).toBe(false);
    });

    it('sequences compare nested values', () => {
      const a = createDataset([['CodeValue', 'SH', 'A']]);
      const same = createDataset([['CodeValue', 'SH', 'A']]);
      const other = createDataset([['CodeValue', 'SH', 'B']]);
      expect(elementsAreEqual(el('SQ', [a]), el('SQ', [same]))).toBe(true);
      expect(elementsAreEqual(el('SQ', [a]), el('SQ', [other]))).toBe(false);
      expect(elementsAreEqual(el('SQ', [a]), el('SQ', [a, same]))).toBe(false);
    });

    it('absence on both sides is equal, on one side is not', () => {
      expect(elementsAreEqual(undefined, undefined)).toBe(true);
      expect(elementsAreEqual(el('LO', ''), undefined)).toBe(false);
    });
  });
});
