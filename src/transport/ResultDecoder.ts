import { isLosslessNumber } from 'lossless-json';
import { DecodeError } from '../core/errors';
import type { QueryResponse, WireValue } from './QueryResponse';

/**
 * One decoded row: column name to value, in column order
 */
export type Row = Record<string, unknown>;

export interface DecodeOptions {
  /** Coerce numeric and timestamp columns by their declared type */
  convertNumber: boolean;
  /** Value used when a numeric column holds something that is not a number */
  defaultNumberValue?: unknown;
}

/**
 * How a column is coerced, resolved once from its wire type name
 */
export type ColumnKind =
  | { kind: 'integer' }
  | { kind: 'float' }
  | { kind: 'timestamp' }
  | { kind: 'other' };

export interface ColumnPlan {
  name: string;
  index: number;
  kind: ColumnKind;
}

const INTEGER_TYPES = new Set([
  'BIGINT',
  'INT',
  'TINYINT',
  'SMALLINT',
  'TINYINT UNSIGNED',
  'SMALLINT UNSIGNED',
  'INT UNSIGNED',
  'BIGINT UNSIGNED',
]);

const FLOAT_TYPES = new Set(['FLOAT', 'DOUBLE']);

/** Column name the server uses as a positional placeholder */
export const PLACEHOLDER_COLUMN = '_';

const INT64_MIN = -(2n ** 63n);
const INT64_MAX = 2n ** 63n - 1n;

const JSON_NUMBER = /^-?(0|[1-9]\d*)(\.\d+)?([eE][+-]?\d+)?$/;

// YYYY-MM-DDTHH:MM:SS[.fraction]Z, fraction up to nanoseconds
const TIMESTAMP_FORMAT = /^(\d{4})-(\d{2})-(\d{2})T(\d{2}):(\d{2}):(\d{2})(?:\.(\d{1,9}))?Z$/;

export function resolveColumnKind(typeName: string): ColumnKind {
  const normalized = typeName.trim().toUpperCase();
  if (INTEGER_TYPES.has(normalized)) return { kind: 'integer' };
  if (FLOAT_TYPES.has(normalized)) return { kind: 'float' };
  if (normalized === 'TIMESTAMP') return { kind: 'timestamp' };
  return { kind: 'other' };
}

/**
 * Validate column metadata and resolve how each column is decoded
 * @throws DecodeError if an entry is not `[name, type, size]`
 */
export function planColumns(columnMeta: WireValue[][]): ColumnPlan[] {
  return columnMeta.map((entry, index) => {
    if (entry.length !== 3) {
      throw new DecodeError(`column meta data length not equal 3 (column ${index})`);
    }
    const [name, type] = entry;
    if (typeof name !== 'string' || typeof type !== 'string') {
      throw new DecodeError(`column meta data must start with name and type strings (column ${index})`);
    }
    return { name, index, kind: resolveColumnKind(type) };
  });
}

/**
 * Text of a numeric-shaped wire value, or undefined
 */
function numericText(value: WireValue): string | undefined {
  if (isLosslessNumber(value)) return value.value;
  if (typeof value === 'number' && Number.isFinite(value)) return String(value);
  if (typeof value === 'string' && JSON_NUMBER.test(value)) return value;
  return undefined;
}

/**
 * Parse an integer the way a 64-bit signed parse does: non-integral text
 * gives 0, out-of-range values saturate.
 */
function toInt64(text: string): bigint {
  if (!/^[+-]?\d+$/.test(text)) {
    return 0n;
  }
  const value = BigInt(text);
  if (value > INT64_MAX) return INT64_MAX;
  if (value < INT64_MIN) return INT64_MIN;
  return value;
}

/**
 * Unix seconds of a `YYYY-MM-DDTHH:MM:SS[.fraction]Z` timestamp, 0 when unparsable
 */
export function parseTimestampSeconds(value: WireValue): number {
  if (typeof value !== 'string') return 0;

  const match = TIMESTAMP_FORMAT.exec(value);
  if (!match) return 0;

  const [year, month, day, hour, minute, second] = match.slice(1, 7).map(Number);
  // setUTCFullYear keeps years 0-99 as written, unlike Date.UTC
  const date = new Date(0);
  date.setUTCFullYear(year, month - 1, day);
  date.setUTCHours(hour, minute, second, 0);

  // Reject overflowing components such as month 13 or February 30
  if (
    date.getUTCFullYear() !== year ||
    date.getUTCMonth() !== month - 1 ||
    date.getUTCDate() !== day ||
    date.getUTCHours() !== hour ||
    date.getUTCMinutes() !== minute ||
    date.getUTCSeconds() !== second
  ) {
    return 0;
  }
  return date.getTime() / 1000;
}

function coerce(kind: ColumnKind, value: WireValue, defaultNumberValue: unknown): unknown {
  switch (kind.kind) {
    case 'integer': {
      const text = numericText(value);
      return text === undefined ? defaultNumberValue : toInt64(text);
    }
    case 'float': {
      const text = numericText(value);
      return text === undefined ? defaultNumberValue : Number(text);
    }
    case 'timestamp':
      return parseTimestampSeconds(value);
    case 'other':
      return value;
  }
}

/**
 * Project a response into one record per row, keyed by column name.
 * Placeholder columns are skipped. With `convertNumber` set, integer columns
 * become bigint, float columns number and timestamp columns Unix seconds.
 */
export function decodeRows(response: QueryResponse, options: DecodeOptions): Row[] {
  const columns = planColumns(response.columnMeta).filter((column) => column.name !== PLACEHOLDER_COLUMN);
  const defaultNumberValue = options.defaultNumberValue ?? null;

  return response.data.map((values) => {
    const row: Row = {};
    for (const column of columns) {
      const value = values[column.index];
      row[column.name] = options.convertNumber ? coerce(column.kind, value, defaultNumberValue) : value;
    }
    return row;
  });
}
