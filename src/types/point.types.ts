/**
 * Point and line-protocol types
 */

/** Float value, even when integral (`asFloat(2)` serializes as `2`) */
export interface FloatField {
  type: 'float';
  value: number;
}

/** Unsigned integer value, serialized with a `u` suffix */
export interface UnsignedField {
  type: 'unsigned';
  value: number | bigint;
}

/**
 * A field value. Integral numbers and bigints are signed integers,
 * other numbers are floats.
 */
export type FieldValue = number | bigint | boolean | string | FloatField | UnsignedField;

export type Tags = Record<string, string>;

export type Fields = Record<string, FieldValue>;

/** Nanoseconds since the Unix epoch, or a Date */
export type Timestamp = Date | bigint;
