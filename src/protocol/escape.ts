/**
 * Single-pass string replacer: every occurrence of a key is replaced by its
 * value, scanning left to right, earliest and then longest match first.
 */
export type Replacer = (input: string) => string;

function escapeRegExp(value: string): string {
  return value.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}

export function createReplacer(pairs: ReadonlyArray<readonly [string, string]>): Replacer {
  const table = new Map(pairs);
  const keys = [...table.keys()].sort((a, b) => b.length - a.length);
  const pattern = new RegExp(keys.map(escapeRegExp).join('|'), 'g');

  return (input) => input.replace(pattern, (match) => table.get(match) ?? match);
}

// Reserved characters of the line protocol
const RESERVED: ReadonlyArray<readonly [string, string]> = [
  [',', '\\,'],
  ['"', '\\"'],
  [' ', '\\ '],
  ['=', '\\='],
];

const invert = (pairs: ReadonlyArray<readonly [string, string]>): Array<[string, string]> =>
  pairs.map(([plain, escaped]) => [escaped, plain]);

const escaper = createReplacer(RESERVED);
const unescaper = createReplacer(invert(RESERVED));

/**
 * Escape every reserved character (`,` `"` space `=`) with a backslash
 */
export function escapeString(input: string): string {
  return escaper(input);
}

/**
 * Inverse of {@link escapeString}
 */
export function unescapeString(input: string): string {
  if (!input.includes('\\')) {
    return input;
  }
  return unescaper(input);
}

// Per-element escaping used when serializing points

const MEASUREMENT: ReadonlyArray<readonly [string, string]> = [
  ['\\', '\\\\'],
  [',', '\\,'],
  [' ', '\\ '],
];

const TAG: ReadonlyArray<readonly [string, string]> = [
  ['\\', '\\\\'],
  [',', '\\,'],
  ['=', '\\='],
  [' ', '\\ '],
];

const STRING_FIELD: ReadonlyArray<readonly [string, string]> = [
  ['\\', '\\\\'],
  ['"', '\\"'],
];

export const escapeMeasurement = createReplacer(MEASUREMENT);
export const unescapeMeasurement = createReplacer(invert(MEASUREMENT));

/** Tag keys, tag values and field keys */
export const escapeTag = createReplacer(TAG);
export const unescapeTag = createReplacer(invert(TAG));

export const escapeStringField = createReplacer(STRING_FIELD);
export const unescapeStringField = createReplacer(invert(STRING_FIELD));
