/**
 * Tests for value type tags and content coercion.
 */

import { describe, expect, it } from 'vitest';
import { coerceContent, isValueType, parseValueType, tryCoerceContent } from './valueTypes.js';
import { ValueConversionError } from './errors.js';

describe('parseValueType', () => {
  it('reads tags case-insensitively', () => {
    expect(parseValueType('Int')).toBe('int');
    expect(parseValueType(' FLOAT ')).toBe('float');
    expect(parseValueType('n-tuple')).toBe('n-tuple');
  });

  it('treats missing and blank tags as untyped', () => {
    expect(parseValueType(undefined)).toBeNull();
    expect(parseValueType(null)).toBeNull();
    expect(parseValueType('  ')).toBeNull();
  });

  it('rejects unknown tags', () => {
    expect(() => parseValueType('blob')).toThrow(ValueConversionError);
    try {
      parseValueType('blob');
    } catch (err) {
      expect(err).toBeInstanceOf(ValueConversionError);
      if (err instanceof ValueConversionError) {
        expect(err.code).toBe('UNKNOWN_VALUE_TYPE');
      }
    }
  });

  it('recognises tags', () => {
    expect(isValueType('person')).toBe(true);
    expect(isValueType('Person')).toBe(false);
  });
});

describe('coerceContent', () => {
  it('reads integers', () => {
    expect(coerceContent('42', 'int')).toEqual({ type: 'int', value: 42 });
    expect(coerceContent(-7, 'int')).toEqual({ type: 'int', value: -7 });
    expect(() => coerceContent('3.0', 'int')).toThrow(ValueConversionError);
    expect(() => coerceContent(2.5, 'int')).toThrow(ValueConversionError);
  });

  it('refuses integers it cannot hold exactly', () => {
    expect(coerceContent('9007199254740991', 'int')).toEqual({ type: 'int', value: 9007199254740991 });
    expect(() => coerceContent('9007199254740993', 'int')).toThrow(
      "Cannot convert '9007199254740993' to int: outside the exact integer range"
    );
    expect(() => coerceContent(2 ** 53, 'int')).toThrow(ValueConversionError);
    expect(() => coerceContent('-9007199254740992', 'int')).toThrow(ValueConversionError);
  });

  it('reads floats', () => {
    expect(coerceContent('1e3', 'float')).toEqual({ type: 'float', value: 1000 });
    expect(coerceContent(' 0.25 ', 'float')).toEqual({ type: 'float', value: 0.25 });
    expect(() => coerceContent('', 'float')).toThrow(ValueConversionError);
    expect(() => coerceContent('abc', 'float')).toThrow(ValueConversionError);
  });

  it('reads booleans', () => {
    expect(coerceContent('Yes', 'boolean')).toEqual({ type: 'boolean', value: true });
    expect(coerceContent(0, 'boolean')).toEqual({ type: 'boolean', value: false });
    expect(() => coerceContent('maybe', 'boolean')).toThrow(ValueConversionError);
  });

  it('canonicalises dates', () => {
    expect(coerceContent(new Date(Date.UTC(2024, 1, 29)), 'date')).toEqual({ type: 'date', value: '2024-02-29' });
    expect(coerceContent('2024-03-01T08:00:00', 'date')).toEqual({ type: 'date', value: '2024-03-01' });
    expect(() => coerceContent('2023-02-29', 'date')).toThrow(ValueConversionError);
    expect(() => coerceContent('01.03.2024', 'date')).toThrow(ValueConversionError);
  });

  it('canonicalises times', () => {
    expect(coerceContent('09:30', 'time')).toEqual({ type: 'time', value: '09:30:00' });
    expect(coerceContent('23:59:59', 'time')).toEqual({ type: 'time', value: '23:59:59' });
    expect(() => coerceContent('24:00', 'time')).toThrow(ValueConversionError);
  });

  it('canonicalises date-times', () => {
    expect(coerceContent('2024-03-01 10:20', 'datetime')).toEqual({ type: 'datetime', value: '2024-03-01T10:20:00' });
    expect(coerceContent(new Date(Date.UTC(2024, 0, 2, 3, 4, 5)), 'datetime'))
      .toEqual({ type: 'datetime', value: '2024-01-02T03:04:05' });
  });

  it('checks URLs', () => {
    expect(coerceContent('https://example.org/x', 'url')).toEqual({ type: 'url', value: 'https://example.org/x' });
    expect(() => coerceContent('not a url', 'url')).toThrow(ValueConversionError);
  });

  it('stringifies textual content', () => {
    expect(coerceContent(5, 'text')).toEqual({ type: 'text', value: '5' });
    expect(coerceContent('Jane Doe', 'person')).toEqual({ type: 'person', value: 'Jane Doe' });
  });

  it('keeps untyped scalars as given', () => {
    expect(coerceContent(5, null)).toEqual({ type: null, value: 5 });
    expect(coerceContent(new Date(Date.UTC(2024, 0, 1)), null))
      .toEqual({ type: null, value: '2024-01-01T00:00:00.000Z' });
  });
});

describe('tryCoerceContent', () => {
  it('returns null instead of throwing', () => {
    expect(tryCoerceContent('abc', 'int')).toBeNull();
    expect(tryCoerceContent('12', 'int')).toEqual({ type: 'int', value: 12 });
  });
});
