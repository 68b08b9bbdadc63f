import { type LosslessNumber, isLosslessNumber, parse } from 'lossless-json';
import { z } from 'zod';
import {
  ApplicationError,
  DecodeError,
  ERR_TABLE_NOT_EXIST,
  TABLE_NOT_EXIST_CODES,
} from '../core/errors';

/**
 * A value as it appeared on the wire. JSON numbers stay LosslessNumber so
 * that 64-bit integers are never rounded.
 */
export type WireValue = unknown;

const WireNumberSchema = z.custom<LosslessNumber>((value) => isLosslessNumber(value), {
  message: 'Expected a number',
});

const WireIntegerSchema = WireNumberSchema.transform((value, ctx) => {
  const parsed = Number(value.value);
  if (!Number.isInteger(parsed)) {
    ctx.addIssue({ code: z.ZodIssueCode.custom, message: `Expected an integer, got ${value.value}` });
    return z.NEVER;
  }
  return parsed;
});

/**
 * Body of the SQL endpoint
 */
export const QueryResponseSchema = z.object({
  code: WireIntegerSchema.nullish(),
  desc: z.string().nullish(),
  column_meta: z.array(z.array(z.unknown())).nullish(),
  data: z.array(z.array(z.unknown())).nullish(),
  rows: WireIntegerSchema.nullish(),
});

export interface QueryResponseInit {
  code?: number;
  desc?: string;
  columnMeta?: WireValue[][];
  data?: WireValue[][];
  rows?: number;
}

/**
 * Result of one SQL command
 */
export class QueryResponse {
  readonly code: number;
  readonly desc: string;
  /** Raw `[name, type, size]` entries */
  readonly columnMeta: WireValue[][];
  readonly data: WireValue[][];
  readonly rows: number;

  constructor(init: QueryResponseInit = {}) {
    this.code = init.code ?? 0;
    this.desc = init.desc ?? '';
    this.columnMeta = init.columnMeta ?? [];
    this.data = init.data ?? [];
    this.rows = init.rows ?? 0;
  }

  /**
   * Decode a JSON body, keeping every number lossless
   * @throws DecodeError if the body is not JSON or not a response object
   */
  static decode(body: string): QueryResponse {
    let raw: unknown;
    try {
      raw = parse(body);
    } catch (error) {
      const message = error instanceof Error ? error.message : 'Unknown error';
      throw new DecodeError(message);
    }

    const result = QueryResponseSchema.safeParse(raw);
    if (!result.success) {
      const errors = result.error.errors.map((e) => `${e.path.join('.') || 'body'}: ${e.message}`).join('; ');
      throw new DecodeError(errors);
    }

    const { code, desc, column_meta, data, rows } = result.data;
    return new QueryResponse({
      code: code ?? undefined,
      desc: desc ?? undefined,
      columnMeta: column_meta ?? undefined,
      data: data ?? undefined,
      rows: rows ?? undefined,
    });
  }

  /**
   * Application error carried by the payload, if any.
   * Missing tables come back as the {@link ERR_TABLE_NOT_EXIST} sentinel.
   */
  error(): ApplicationError | undefined {
    if (this.code === 0 && this.desc.length === 0) {
      return undefined;
    }
    if (TABLE_NOT_EXIST_CODES.includes(this.code)) {
      return ERR_TABLE_NOT_EXIST;
    }
    return new ApplicationError(this.code, this.desc);
  }
}
