import { ConfigurationError } from '../core/errors';

/**
 * Time units a batch or a query may use, as duration unit suffixes.
 */
export const PRECISIONS = ['ns', 'us', 'µs', 'μs', 'ms', 's', 'm', 'h'] as const;

export type Precision = (typeof PRECISIONS)[number];

export const DEFAULT_PRECISION: Precision = 'ms';

const NANOSECONDS: Record<Precision, bigint> = {
  ns: 1n,
  us: 1_000n,
  'µs': 1_000n,
  'μs': 1_000n,
  ms: 1_000_000n,
  s: 1_000_000_000n,
  m: 60_000_000_000n,
  h: 3_600_000_000_000n,
};

export function isPrecision(value: unknown): value is Precision {
  return PRECISIONS.some((precision) => precision === value);
}

/**
 * Validate a precision unit
 * @throws ConfigurationError if the unit is not a duration unit
 */
export function parsePrecision(value: string): Precision {
  if (!isPrecision(value)) {
    throw new ConfigurationError(`invalid precision unit "${value}", expected one of ${PRECISIONS.join(', ')}`);
  }
  return value;
}

/**
 * Number of nanoseconds in one unit
 */
export function precisionMultiplier(precision: Precision): bigint {
  return NANOSECONDS[precision];
}

/**
 * Convert an integer timestamp expressed in `precision` to nanoseconds
 */
export function toNanoseconds(timestamp: number | bigint, precision: Precision): bigint {
  const value = typeof timestamp === 'bigint' ? timestamp : BigInt(Math.trunc(timestamp));
  return value * NANOSECONDS[precision];
}

/**
 * Scale nanoseconds down to `precision`, truncating toward zero
 */
export function fromNanoseconds(nanoseconds: bigint, precision: Precision): bigint {
  return nanoseconds / NANOSECONDS[precision];
}
