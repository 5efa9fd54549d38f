/**
 * Value coercion shared by every operator.
 *
 * Conditions compare loosely typed data (JSON, YAML, hand-built records), so
 * each operator first brings both sides to a common representation:
 * number, instant, string or boolean. The helpers here are pure and never
 * throw for any {@link FieldValue}.
 *
 * @module
 */

import type { FieldMapping, FieldValue } from '../types/value.js';

/** Type guard: object literal or object with a null prototype. */
export function isPlainMapping(value: FieldValue): value is FieldMapping {
  if (typeof value !== 'object' || value === null) return false;
  const proto: unknown = Object.getPrototypeOf(value);
  return proto === Object.prototype || proto === null;
}

// ---------------------------------------------------------------------------
// Numbers
// ---------------------------------------------------------------------------

const DECIMAL_RE = /^[+-]?(?:\d+(?:\.\d*)?|\.\d+)(?:[eE][+-]?\d+)?$/;
const INFINITY_RE = /^([+-]?)inf(?:inity)?$/i;
const NAN_RE = /^nan$/i;

function parseWholeNumber(text: string): number | undefined {
  if (DECIMAL_RE.test(text)) {
    const parsed = Number(text);
    // out of range (1e400) has no numeric form
    return Number.isFinite(parsed) ? parsed : undefined;
  }
  const inf = INFINITY_RE.exec(text);
  if (inf) {
    return inf[1] === '-' ? -Infinity : Infinity;
  }
  if (NAN_RE.test(text)) {
    return NaN;
  }
  return undefined;
}

/**
 * Converts a value to a number.
 *
 * Numbers pass through, bigints are widened. A string converts only when the
 * whole string is a number (`"12.5"`, `"-3e2"`), so `"12px"` and `" 1"` fail.
 *
 * @returns The number, or `undefined` when the value has no numeric form.
 */
export function toNumber(value: FieldValue): number | undefined {
  switch (typeof value) {
    case 'number':
      return value;
    case 'bigint':
      return Number(value);
    case 'string':
      return parseWholeNumber(value);
    default:
      return undefined;
  }
}

// ---------------------------------------------------------------------------
// Strings
// ---------------------------------------------------------------------------

function ownTextualForm(value: object): string | undefined {
  const fn: unknown = Reflect.get(value, 'toString');
  if (typeof fn !== 'function' || fn === Object.prototype.toString) {
    return undefined;
  }
  const text: unknown = fn.call(value);
  return typeof text === 'string' ? text : undefined;
}

function formatValue(value: FieldValue, seen: WeakSet<object>): string {
  if (value === null || value === undefined) return '';
  if (typeof value !== 'object') return String(value);

  if (value instanceof Date) {
    return Number.isNaN(value.getTime()) ? 'Invalid Date' : value.toISOString();
  }

  if (seen.has(value)) return '[circular]';
  seen.add(value);
  try {
    if (Array.isArray(value)) {
      return `[${value.map((item: FieldValue) => formatValue(item, seen)).join(' ')}]`;
    }
    if (value instanceof Set) {
      return `[${[...value].map((item: FieldValue) => formatValue(item, seen)).join(' ')}]`;
    }
    if (value instanceof Map) {
      const entries = [...value].map(([k, v]: [FieldValue, FieldValue]) => `${formatValue(k, seen)}:${formatValue(v, seen)}`);
      return `{${entries.join(' ')}}`;
    }
    if (!isPlainMapping(value)) {
      const own = ownTextualForm(value);
      if (own !== undefined) return own;
    }
    const entries = Object.entries(value).map(([k, v]) => `${k}:${formatValue(v, seen)}`);
    return `{${entries.join(' ')}}`;
  } finally {
    seen.delete(value);
  }
}

/**
 * Converts a value to its string form.
 *
 * `null`/`undefined` become `''`, instants become ISO-8601, sequences format
 * as `[a b c]` and mappings as `{k:v k2:v2}`. Objects carrying their own
 * `toString` use it.
 */
export function toString(value: FieldValue): string {
  if (typeof value === 'string') return value;
  return formatValue(value, new WeakSet());
}

// ---------------------------------------------------------------------------
// Booleans and emptiness
// ---------------------------------------------------------------------------

/**
 * Checks whether a value is empty: nullish, a zero-length string or
 * sequence, an empty Map/Set or a mapping without keys.
 */
export function isEmpty(value: FieldValue): boolean {
  if (value === null || value === undefined) return true;
  if (typeof value === 'string' || Array.isArray(value)) return value.length === 0;
  if (value instanceof Map || value instanceof Set) return value.size === 0;
  if (isPlainMapping(value)) return Object.keys(value).length === 0;
  return false;
}

/**
 * Converts a value to a boolean.
 *
 * Strings are true only when equal to `"true"` ignoring case, numbers when
 * non-zero; other values are true when not {@link isEmpty empty}.
 */
export function toBool(value: FieldValue): boolean {
  if (value === null || value === undefined) return false;
  switch (typeof value) {
    case 'boolean':
      return value;
    case 'string':
      return value.toLowerCase() === 'true';
    case 'number':
      return value !== 0;
    case 'bigint':
      return value !== 0n;
    default:
      return !isEmpty(value);
  }
}

// ---------------------------------------------------------------------------
// Instants
// ---------------------------------------------------------------------------

interface InstantParts {
  year: number;
  month: number;
  day: number;
  hour: number;
  minute: number;
  second: number;
  nanosecond: number;
  offsetMinutes: number;
}

interface TimeFormat {
  pattern: RegExp;
  read(match: RegExpExecArray): InstantParts;
}

function num(text: string | undefined): number {
  return text === undefined ? 0 : Number(text);
}

/** Fractional seconds as nanoseconds; digits past the ninth are dropped. */
function fraction(text: string | undefined): number {
  if (text === undefined) return 0;
  return Number(text.slice(1, 10).padEnd(9, '0'));
}

function offset(text: string | undefined): number {
  if (text === undefined || text === 'Z' || text === 'z') return 0;
  const sign = text.startsWith('-') ? -1 : 1;
  return sign * (num(text.slice(1, 3)) * 60 + num(text.slice(4, 6)));
}

/** Formats tried in order; the first match wins. Zone-less forms are UTC. */
const TIME_FORMATS: readonly TimeFormat[] = [
  {
    // RFC 3339, optional fractional seconds
    pattern: /^(\d{4})-(\d{2})-(\d{2})[Tt](\d{2}):(\d{2}):(\d{2})(\.\d+)?([Zz]|[+-]\d{2}:\d{2})$/,
    read: (m) => ({
      year: num(m[1]), month: num(m[2]), day: num(m[3]),
      hour: num(m[4]), minute: num(m[5]), second: num(m[6]),
      nanosecond: fraction(m[7]), offsetMinutes: offset(m[8]),
    }),
  },
  {
    pattern: /^(\d{4})-(\d{2})-(\d{2}) (\d{2}):(\d{2}):(\d{2})$/,
    read: (m) => ({
      year: num(m[1]), month: num(m[2]), day: num(m[3]),
      hour: num(m[4]), minute: num(m[5]), second: num(m[6]),
      nanosecond: 0, offsetMinutes: 0,
    }),
  },
  {
    pattern: /^(\d{4})-(\d{2})-(\d{2})$/,
    read: (m) => ({
      year: num(m[1]), month: num(m[2]), day: num(m[3]),
      hour: 0, minute: 0, second: 0, nanosecond: 0, offsetMinutes: 0,
    }),
  },
  {
    // time of day, anchored at year 0, January 1
    pattern: /^(\d{2}):(\d{2}):(\d{2})$/,
    read: (m) => ({
      year: 0, month: 1, day: 1,
      hour: num(m[1]), minute: num(m[2]), second: num(m[3]),
      nanosecond: 0, offsetMinutes: 0,
    }),
  },
];

/** A parsed instant: the `Date` plus the nanoseconds it cannot hold. */
interface Instant {
  date: Date;
  subMillisecond: number;
}

function buildInstant(parts: InstantParts): Instant | undefined {
  const { year, month, day, hour, minute, second, nanosecond } = parts;
  if (month < 1 || month > 12 || day < 1 || hour > 23 || minute > 59 || second > 59) {
    return undefined;
  }
  const date = new Date(0);
  date.setUTCFullYear(year, month - 1, day);
  date.setUTCHours(hour, minute, second, Math.floor(nanosecond / 1_000_000));
  // rejects days past the end of the month (2024-02-30)
  if (date.getUTCDate() !== day || date.getUTCMonth() !== month - 1) {
    return undefined;
  }
  return {
    date: new Date(date.getTime() - parts.offsetMinutes * 60_000),
    subMillisecond: nanosecond % 1_000_000,
  };
}

function fromEpochSeconds(seconds: number): Instant | undefined {
  const date = new Date(seconds * 1000);
  return Number.isNaN(date.getTime()) ? undefined : { date, subMillisecond: 0 };
}

function parseInstant(value: FieldValue): Instant | undefined {
  if (value instanceof Date) {
    return Number.isNaN(value.getTime()) ? undefined : { date: value, subMillisecond: 0 };
  }

  if (typeof value === 'string') {
    for (const format of TIME_FORMATS) {
      const match = format.pattern.exec(value);
      if (match) {
        const instant = buildInstant(format.read(match));
        if (instant) return instant;
      }
    }
    return undefined;
  }

  if (typeof value === 'bigint') {
    return fromEpochSeconds(Number(value));
  }

  if (typeof value === 'number' && Number.isSafeInteger(value)) {
    return fromEpochSeconds(value);
  }

  return undefined;
}

/**
 * Converts a value to an instant.
 *
 * Accepts a `Date`, a string in one of the supported formats, or an integer
 * (number or bigint) read as Unix epoch seconds. A `Date` holds milliseconds,
 * so finer fractional seconds are truncated; {@link toEpochNanos} keeps them.
 *
 * @returns The instant, or `undefined` when the value has no temporal form.
 */
export function toTime(value: FieldValue): Date | undefined {
  return parseInstant(value)?.date;
}

/**
 * Converts a value to nanoseconds since the Unix epoch, with the full
 * precision of RFC 3339 fractional seconds.
 *
 * @returns The instant, or `undefined` when the value has no temporal form.
 */
export function toEpochNanos(value: FieldValue): bigint | undefined {
  const instant = parseInstant(value);
  if (instant === undefined) return undefined;
  return BigInt(instant.date.getTime()) * 1_000_000n + BigInt(instant.subMillisecond);
}

// ---------------------------------------------------------------------------
// Comparison and equality
// ---------------------------------------------------------------------------

/** Result of {@link compareValues}. */
export type Ordering = -1 | 0 | 1;

function order<T extends number | bigint | string>(a: T, b: T): Ordering {
  if (a < b) return -1;
  if (a > b) return 1;
  return 0;
}

/**
 * Orders two values.
 *
 * Tries numbers first, then instants, then falls back to comparing string
 * forms. A representation is used only when both sides convert to it.
 */
export function compareValues(a: FieldValue, b: FieldValue): Ordering {
  const n1 = toNumber(a);
  const n2 = toNumber(b);
  if (n1 !== undefined && n2 !== undefined) {
    return order(n1, n2);
  }

  const t1 = toEpochNanos(a);
  const t2 = toEpochNanos(b);
  if (t1 !== undefined && t2 !== undefined) {
    return order(t1, t2);
  }

  return order(toString(a), toString(b));
}

function deepEqual(a: FieldValue, b: FieldValue): boolean {
  if (Object.is(a, b)) return true;
  if (typeof a !== 'object' || typeof b !== 'object' || a === null || b === null) return false;

  if (a instanceof Date || b instanceof Date) {
    return a instanceof Date && b instanceof Date && Object.is(a.getTime(), b.getTime());
  }

  if (Array.isArray(a) || Array.isArray(b)) {
    if (!Array.isArray(a) || !Array.isArray(b) || a.length !== b.length) return false;
    return a.every((item: FieldValue, i: number) => deepEqual(item, b[i]));
  }

  if (a instanceof Set || b instanceof Set) {
    if (!(a instanceof Set) || !(b instanceof Set) || a.size !== b.size) return false;
    return [...a].every((item: FieldValue) => b.has(item));
  }

  if (a instanceof Map || b instanceof Map) {
    if (!(a instanceof Map) || !(b instanceof Map) || a.size !== b.size) return false;
    return [...a].every(([k, v]: [FieldValue, FieldValue]) => b.has(k) && deepEqual(v, b.get(k)));
  }

  if (!isPlainMapping(a) || !isPlainMapping(b)) return false;
  const keys = Object.keys(a);
  if (keys.length !== Object.keys(b).length) return false;
  return keys.every((key) => Object.hasOwn(b, key) && deepEqual(a[key], b[key]));
}

/**
 * Loose equality used by `eq`, `in` and friends.
 *
 * Two nullish values are equal, one nullish value never is. Otherwise deep
 * structural equality, then numeric equality, then equal string forms.
 */
export function isEqual(a: FieldValue, b: FieldValue): boolean {
  const aNil = a === null || a === undefined;
  const bNil = b === null || b === undefined;
  if (aNil || bNil) return aNil && bNil;

  if (deepEqual(a, b)) return true;

  const n1 = toNumber(a);
  const n2 = toNumber(b);
  if (n1 !== undefined && n2 !== undefined) {
    return n1 === n2;
  }

  return toString(a) === toString(b);
}
