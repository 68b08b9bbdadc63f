import { DecodeError, InvalidArgumentError } from '../core/errors';
import type { FieldValue, Fields, FloatField, Tags, Timestamp, UnsignedField } from '../types/point.types';
import {
  escapeMeasurement,
  escapeStringField,
  escapeTag,
  unescapeMeasurement,
  unescapeStringField,
  unescapeTag,
} from './escape';
import { type Precision, fromNanoseconds, precisionMultiplier } from './precision';

const INT64_MIN = -(2n ** 63n);
const INT64_MAX = 2n ** 63n - 1n;
const UINT64_MAX = 2n ** 64n - 1n;

/**
 * Mark a number as a float so that integral values keep their type
 */
export function asFloat(value: number): FloatField {
  return { type: 'float', value };
}

/**
 * Mark a value as an unsigned integer (`u` suffix)
 */
export function asUnsigned(value: number | bigint): UnsignedField {
  return { type: 'unsigned', value };
}

const byKey = <T>([a]: readonly [string, T], [b]: readonly [string, T]): number =>
  a < b ? -1 : a > b ? 1 : 0;

/**
 * A single measurement: name, tags, fields and an optional timestamp.
 * Immutable once created.
 */
export class Point {
  private constructor(
    readonly name: string,
    private readonly tagPairs: ReadonlyArray<readonly [string, string]>,
    private readonly fieldPairs: ReadonlyArray<readonly [string, FieldValue]>,
    private readonly nanoseconds?: bigint
  ) {}

  /**
   * Build a point. Tags with an empty key or value and fields without a value
   * are left out. Without `time` the server assigns the reception time.
   * @throws InvalidArgumentError when the name is empty, no field is left or a value is out of range
   */
  static create(
    name: string,
    tags: Tags | undefined,
    fields: Record<string, FieldValue | null | undefined>,
    time?: Timestamp
  ): Point {
    if (!name) {
      throw new InvalidArgumentError('point without name is unsupported');
    }

    const tagPairs = Object.entries(tags ?? {})
      .filter(([key, value]) => key !== '' && value !== '')
      .sort(byKey);

    const fieldPairs: Array<[string, FieldValue]> = [];
    for (const [key, value] of Object.entries(fields)) {
      if (value === undefined || value === null) continue;
      if (key === '') {
        throw new InvalidArgumentError('field key must not be empty');
      }
      validateFieldValue(key, value);
      fieldPairs.push([key, value]);
    }

    if (fieldPairs.length === 0) {
      throw new InvalidArgumentError('point without fields is unsupported');
    }

    return new Point(name, tagPairs, fieldPairs.sort(byKey), toTimeNanoseconds(time));
  }

  get tags(): Tags {
    return Object.fromEntries(this.tagPairs);
  }

  get fields(): Fields {
    return Object.fromEntries(this.fieldPairs);
  }

  get time(): Date | undefined {
    if (this.nanoseconds === undefined) return undefined;
    return new Date(Number(this.nanoseconds / 1_000_000n));
  }

  get unixNano(): bigint | undefined {
    return this.nanoseconds;
  }

  /**
   * Line protocol with a nanosecond timestamp
   */
  toString(): string {
    return this.precisionString('ns');
  }

  /**
   * Line protocol with the timestamp scaled to `precision`.
   * Format: measurement,tag1=value1 field1=value1,field2=value2 timestamp
   */
  precisionString(precision: Precision): string {
    const measurement = escapeMeasurement(this.name);

    const tags = this.tagPairs.map(([key, value]) => `,${escapeTag(key)}=${escapeTag(value)}`).join('');

    const fields = this.fieldPairs
      .map(([key, value]) => `${escapeTag(key)}=${formatFieldValue(value)}`)
      .join(',');

    const line = `${measurement}${tags} ${fields}`;
    if (this.nanoseconds === undefined) {
      return line;
    }
    return `${line} ${fromNanoseconds(this.nanoseconds, precision)}`;
  }
}

function validateFieldValue(key: string, value: FieldValue): void {
  if (typeof value === 'number' || (typeof value === 'object' && value.type === 'float')) {
    const n = typeof value === 'number' ? value : value.value;
    if (Number.isNaN(n)) {
      throw new InvalidArgumentError(`NaN is an unsupported value for field ${key}`);
    }
    if (!Number.isFinite(n)) {
      throw new InvalidArgumentError(`+/-Inf is an unsupported value for field ${key}`);
    }
    if (typeof value === 'number' && Number.isInteger(n)) {
      checkRange(key, BigInt(n), INT64_MIN, INT64_MAX);
    }
    return;
  }

  if (typeof value === 'bigint') {
    checkRange(key, value, INT64_MIN, INT64_MAX);
    return;
  }

  if (typeof value === 'object' && value.type === 'unsigned') {
    if (typeof value.value === 'number' && !Number.isInteger(value.value)) {
      throw new InvalidArgumentError(`unsigned field ${key} must be an integer`);
    }
    checkRange(key, BigInt(value.value), 0n, UINT64_MAX);
  }
}

function checkRange(key: string, value: bigint, min: bigint, max: bigint): void {
  if (value < min || value > max) {
    throw new InvalidArgumentError(`value ${value} is out of range for field ${key}`);
  }
}

function toTimeNanoseconds(time: Timestamp | undefined): bigint | undefined {
  if (time === undefined) return undefined;
  if (typeof time === 'bigint') return time;

  const ms = time.getTime();
  if (Number.isNaN(ms)) {
    throw new InvalidArgumentError('invalid point time');
  }
  return BigInt(ms) * 1_000_000n;
}

/**
 * Format a field value according to line protocol rules
 */
function formatFieldValue(value: FieldValue): string {
  switch (typeof value) {
    case 'boolean':
      return value ? 'true' : 'false';
    case 'bigint':
      return `${value}i`;
    case 'number':
      if (Number.isSafeInteger(value)) return `${value}i`;
      // Integral but beyond 2^53: print every digit
      if (Number.isInteger(value)) return `${BigInt(value)}i`;
      return String(value);
    case 'string':
      return `"${escapeStringField(value)}"`;
    default:
      return value.type === 'float' ? String(value.value) : `${BigInt(value.value)}u`;
  }
}

// =============================================================================
// Parsing
// =============================================================================

/**
 * Split on `separator` where it is not backslash-escaped
 */
function splitUnescaped(input: string, separator: string): string[] {
  const parts: string[] = [];
  let start = 0;

  for (let i = 0; i < input.length; i++) {
    const ch = input[i];
    if (ch === '\\') {
      i++;
      continue;
    }
    if (ch === separator) {
      parts.push(input.slice(start, i));
      start = i + 1;
    }
  }

  parts.push(input.slice(start));
  return parts;
}

interface ScannedLine {
  /** Measurement and tags, still escaped */
  key: string;
  /** Raw field key and value pairs */
  fields: Array<[string, string]>;
  timestamp?: string;
  /** Index just past the line's newline */
  next: number;
}

function atLineEnd(text: string, i: number): boolean {
  if (i >= text.length || text[i] === '\n') return true;
  return text[i] === '\r' && (i + 1 === text.length || text[i + 1] === '\n');
}

function lineFrom(text: string, start: number): string {
  const end = text.indexOf('\n', start);
  return text.slice(start, end < 0 ? text.length : end).replace(/\r$/, '');
}

/**
 * Cut one line into its key, field and timestamp sections.
 * Quotes only matter in field values, where a `"` right after the `=` opens a string.
 */
function scanLine(text: string, start: number): ScannedLine {
  const invalid = (): DecodeError => new DecodeError(`invalid line protocol: ${lineFrom(text, start)}`);

  let i = start;
  while (text[i] === ' ' || text[i] === '\t') i++;

  const keyStart = i;
  for (; !atLineEnd(text, i) && text[i] !== ' '; i++) {
    if (text[i] === '\\') i++;
  }
  const key = text.slice(keyStart, i);

  while (text[i] === ' ') i++;
  if (key === '' || atLineEnd(text, i)) {
    throw invalid();
  }

  const fields: Array<[string, string]> = [];
  let partStart = i;
  let equals = -1;
  let inString = false;

  for (; ; i++) {
    if (i >= text.length && inString) {
      throw new DecodeError(`unbalanced quotes in "${lineFrom(text, start)}"`);
    }
    if (inString) {
      if (text[i] === '\\') i++;
      else if (text[i] === '"') inString = false;
      continue;
    }

    const ch = text[i];
    if (ch === '\\') {
      i++;
      continue;
    }
    if (ch === '"' && equals === i - 1) {
      inString = true;
      continue;
    }
    if (ch === '=' && equals < 0) {
      equals = i;
      continue;
    }
    if (ch === ',' || ch === ' ' || atLineEnd(text, i)) {
      const part = text.slice(partStart, i);
      if (equals < 0) {
        throw new DecodeError(`invalid field: ${part}`);
      }
      fields.push([text.slice(partStart, equals), text.slice(equals + 1, i)]);
      partStart = i + 1;
      equals = -1;
      if (ch !== ',') break;
    }
  }

  while (text[i] === ' ') i++;
  const timestampStart = i;
  while (!atLineEnd(text, i)) i++;
  const timestamp = text.slice(timestampStart, i).trimEnd();
  if (timestamp.includes(' ')) {
    throw invalid();
  }

  const newline = text.indexOf('\n', i);
  return {
    key,
    fields,
    timestamp: timestamp === '' ? undefined : timestamp,
    next: newline < 0 ? text.length : newline + 1,
  };
}

function toInteger(text: string): number | bigint {
  const value = BigInt(text);
  const asNumber = Number(value);
  return Number.isSafeInteger(asNumber) ? asNumber : value;
}

const FLOAT_PATTERN = /^[+-]?(\d+\.?\d*|\.\d+)([eE][+-]?\d+)?$/;
const STRING_PATTERN = /^"(?:[^"\\]|\\[\s\S])*"$/;

function parseFieldValue(key: string, raw: string): FieldValue {
  if (raw.startsWith('"')) {
    if (!STRING_PATTERN.test(raw)) {
      throw new DecodeError(`invalid string value for field ${key}: ${raw}`);
    }
    return unescapeStringField(raw.slice(1, -1));
  }

  if (/^(t|T|true|True|TRUE)$/.test(raw)) return true;
  if (/^(f|F|false|False|FALSE)$/.test(raw)) return false;

  if (/^[+-]?\d+i$/.test(raw)) {
    return toInteger(raw.slice(0, -1));
  }
  if (/^\d+u$/.test(raw)) {
    return asUnsigned(toInteger(raw.slice(0, -1)));
  }
  if (FLOAT_PATTERN.test(raw)) {
    const value = Number(raw);
    return Number.isInteger(value) ? asFloat(value) : value;
  }

  throw new DecodeError(`invalid value for field ${key}: ${raw}`);
}

function toPoint(scanned: ScannedLine, precision: Precision): Point {
  const [measurement, ...tagParts] = splitUnescaped(scanned.key, ',');

  const tags: Tags = {};
  for (const part of tagParts) {
    const pair = splitUnescaped(part, '=');
    if (pair.length !== 2) {
      throw new DecodeError(`invalid tag: ${part}`);
    }
    tags[unescapeTag(pair[0])] = unescapeTag(pair[1]);
  }

  const fields: Fields = {};
  for (const [rawKey, rawValue] of scanned.fields) {
    const fieldKey = unescapeTag(rawKey);
    fields[fieldKey] = parseFieldValue(fieldKey, rawValue);
  }

  let time: bigint | undefined;
  const { timestamp } = scanned;
  if (timestamp !== undefined) {
    if (!/^-?\d+$/.test(timestamp)) {
      throw new DecodeError(`invalid timestamp: ${timestamp}`);
    }
    time = BigInt(timestamp) * precisionMultiplier(precision);
  }

  try {
    return Point.create(unescapeMeasurement(measurement), tags, fields, time);
  } catch (error) {
    const message = error instanceof Error ? error.message : 'Unknown error';
    throw new DecodeError(`invalid line protocol: ${message}`);
  }
}

/**
 * Parse one line of line protocol.
 * The timestamp, when present, is read in `precision` (nanoseconds by default).
 */
export function parsePoint(line: string, precision: Precision = 'ns'): Point {
  const scanned = scanLine(line, 0);
  if (line.slice(scanned.next).trim() !== '') {
    throw new DecodeError(`invalid line protocol: ${line}`);
  }
  return toPoint(scanned, precision);
}

/**
 * Parse newline-separated points, skipping blank lines and `#` comments
 */
export function parsePoints(text: string, precision: Precision = 'ns'): Point[] {
  const points: Point[] = [];
  let i = 0;

  while (i < text.length) {
    const line = lineFrom(text, i);
    if (line.trim() === '' || line.trimStart().startsWith('#')) {
      i += line.length;
      // step over the \r\n or \n ending the skipped line
      while (i < text.length && text[i] !== '\n') i++;
      i++;
      continue;
    }

    const scanned = scanLine(text, i);
    points.push(toPoint(scanned, precision));
    i = scanned.next;
  }

  return points;
}
