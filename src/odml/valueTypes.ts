/**
 * Value type tags and typed content.
 *
 * Content is coerced once, when a Value is created or re-typed, into a
 * TypedContent variant keyed by its type tag. Accessors read the variant;
 * they never parse.
 */

import { z } from 'zod';
import { ValueConversionError } from './errors.js';

export const ValueTypeSchema = z.enum([
  'text',
  'string',
  'int',
  'float',
  'boolean',
  'date',
  'time',
  'datetime',
  'person',
  'url',
  'binary',
  'n-tuple',
]);

export type ValueType = z.infer<typeof ValueTypeSchema>;

export type NumericType = Extract<ValueType, 'int' | 'float'>;
export type TemporalType = Extract<ValueType, 'date' | 'time' | 'datetime'>;
export type TextualType = Exclude<ValueType, NumericType | TemporalType | 'boolean'>;

/**
 * Content as stored on a Value.
 */
export type ValueContent = string | number | boolean;

/**
 * Content as accepted from callers.
 */
export type RawContent = ValueContent | Date;

export type TypedContent =
  | { type: NumericType; value: number }
  | { type: 'boolean'; value: boolean }
  | { type: TemporalType; value: string }
  | { type: TextualType; value: string }
  | { type: null; value: ValueContent };

/**
 * Parse a type tag case-insensitively. Empty input means "untyped".
 */
export function parseValueType(tag: string | null | undefined): ValueType | null {
  if (tag === null || tag === undefined || tag.trim() === '') {
    return null;
  }
  const parsed = ValueTypeSchema.safeParse(tag.trim().toLowerCase());
  if (!parsed.success) {
    throw new ValueConversionError('UNKNOWN_VALUE_TYPE', `Unknown value type '${tag}'`, tag, tag);
  }
  return parsed.data;
}

export function isValueType(tag: string): tag is ValueType {
  return ValueTypeSchema.safeParse(tag).success;
}

const DATE_PATTERN = /^(\d{4})-(\d{2})-(\d{2})(?:[T ].*)?$/;
const TIME_PATTERN = /^(\d{2}):(\d{2})(?::(\d{2}))?$/;
const DATETIME_PATTERN = /^(\d{4}-\d{2}-\d{2})[T ](\d{2}:\d{2}(?::\d{2})?)(?:\.\d+)?Z?$/;
const INT_PATTERN = /^[+-]?\d+$/;

function fail(content: unknown, type: ValueType, detail: string): never {
  throw new ValueConversionError(
    'VALUE_CONVERSION_FAILED',
    `Cannot convert '${String(content)}' to ${type}: ${detail}`,
    content,
    type,
  );
}

function pad(n: number): string {
  return n.toString().padStart(2, '0');
}

function toDate(raw: RawContent, type: ValueType): string {
  if (raw instanceof Date) {
    if (Number.isNaN(raw.getTime())) fail(raw, type, 'invalid date');
    return raw.toISOString().slice(0, 10);
  }
  if (typeof raw !== 'string') fail(raw, type, 'expected yyyy-MM-dd');
  const m = DATE_PATTERN.exec(raw.trim());
  if (!m) fail(raw, type, 'expected yyyy-MM-dd');
  const year = Number(m[1]);
  const month = Number(m[2]);
  const day = Number(m[3]);
  const calendar = new Date(Date.UTC(year, month - 1, day));
  if (calendar.getUTCFullYear() !== year || calendar.getUTCMonth() !== month - 1 || calendar.getUTCDate() !== day) {
    fail(raw, type, 'no such calendar date');
  }
  return `${m[1]}-${m[2]}-${m[3]}`;
}

function toTime(raw: RawContent, type: ValueType): string {
  if (raw instanceof Date) {
    if (Number.isNaN(raw.getTime())) fail(raw, type, 'invalid date');
    return raw.toISOString().slice(11, 19);
  }
  if (typeof raw !== 'string') fail(raw, type, 'expected HH:mm:ss');
  const m = TIME_PATTERN.exec(raw.trim());
  if (!m) fail(raw, type, 'expected HH:mm:ss');
  const hours = Number(m[1]);
  const minutes = Number(m[2]);
  const seconds = m[3] !== undefined ? Number(m[3]) : 0;
  if (hours > 23 || minutes > 59 || seconds > 59) fail(raw, type, 'out of range');
  return `${pad(hours)}:${pad(minutes)}:${pad(seconds)}`;
}

function toDateTime(raw: RawContent, type: ValueType): string {
  if (raw instanceof Date) {
    if (Number.isNaN(raw.getTime())) fail(raw, type, 'invalid date');
    return raw.toISOString().slice(0, 19);
  }
  if (typeof raw !== 'string') fail(raw, type, 'expected yyyy-MM-ddTHH:mm:ss');
  const m = DATETIME_PATTERN.exec(raw.trim());
  if (!m || m[1] === undefined || m[2] === undefined) fail(raw, type, 'expected yyyy-MM-ddTHH:mm:ss');
  return `${toDate(m[1], type)}T${toTime(m[2], type)}`;
}

function toInt(raw: RawContent, type: ValueType): number {
  if (typeof raw === 'number') {
    if (!Number.isInteger(raw)) fail(raw, type, 'not an integer');
    if (!Number.isSafeInteger(raw)) fail(raw, type, 'outside the exact integer range');
    return raw;
  }
  if (typeof raw === 'string' && INT_PATTERN.test(raw.trim())) {
    const parsed = Number.parseInt(raw.trim(), 10);
    if (!Number.isSafeInteger(parsed)) fail(raw, type, 'outside the exact integer range');
    return parsed;
  }
  return fail(raw, type, 'not an integer');
}

function toFloat(raw: RawContent, type: ValueType): number {
  if (typeof raw === 'number') {
    if (!Number.isFinite(raw)) fail(raw, type, 'not a finite number');
    return raw;
  }
  if (typeof raw === 'string' && raw.trim() !== '') {
    const parsed = Number(raw.trim());
    if (Number.isFinite(parsed)) return parsed;
  }
  return fail(raw, type, 'not a number');
}

function toBoolean(raw: RawContent, type: ValueType): boolean {
  if (typeof raw === 'boolean') return raw;
  if (raw === 1 || raw === 0) return raw === 1;
  if (typeof raw === 'string') {
    const lowered = raw.trim().toLowerCase();
    if (['true', '1', 'yes'].includes(lowered)) return true;
    if (['false', '0', 'no'].includes(lowered)) return false;
  }
  return fail(raw, type, 'not a boolean');
}

function toText(raw: RawContent): string {
  return raw instanceof Date ? raw.toISOString() : String(raw);
}

/**
 * Coerce raw content into the variant for `type`.
 *
 * @throws ValueConversionError when the content does not fit the type
 */
export function coerceContent(raw: RawContent, type: ValueType | null): TypedContent {
  switch (type) {
    case null:
      return { type: null, value: raw instanceof Date ? raw.toISOString() : raw };
    case 'int':
      return { type, value: toInt(raw, type) };
    case 'float':
      return { type, value: toFloat(raw, type) };
    case 'boolean':
      return { type, value: toBoolean(raw, type) };
    case 'date':
      return { type, value: toDate(raw, type) };
    case 'time':
      return { type, value: toTime(raw, type) };
    case 'datetime':
      return { type, value: toDateTime(raw, type) };
    case 'url': {
      const text = toText(raw).trim();
      try {
        new URL(text);
      } catch {
        fail(raw, type, 'not a URL');
      }
      return { type, value: text };
    }
    case 'text':
    case 'string':
    case 'person':
    case 'binary':
    case 'n-tuple':
      return { type, value: toText(raw) };
  }
}

/**
 * Coerce without throwing; returns null on conversion failure.
 */
export function tryCoerceContent(raw: RawContent, type: ValueType | null): TypedContent | null {
  try {
    return coerceContent(raw, type);
  } catch (err) {
    if (err instanceof ValueConversionError) return null;
    throw err;
  }
}
