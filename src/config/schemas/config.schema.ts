import { z } from 'zod';
import { CONTENT_ENCODINGS } from '../../types/http.types';
import { PRECISIONS } from '../../protocol/precision';

// =============================================================================
// HTTP Schema
// =============================================================================

export const HttpConfigSchema = z.object({
  userAgent: z.string().default('TSDBClient'),
  /** Request timeout in milliseconds, 0 for none */
  timeout: z.number().int().nonnegative().default(0),
  insecureSkipVerify: z.boolean().default(false),
  writeEncoding: z.enum(CONTENT_ENCODINGS).default(''),
});

// =============================================================================
// Client Schema
// =============================================================================

export const ClientConfigSchema = z.object({
  address: z
    .string()
    .url()
    .refine((value) => /^https?:\/\//i.test(value), {
      message: 'address must start with http:// or https://',
    })
    .default('http://127.0.0.1:6041'),
  database: z.string().default('iot'),
  username: z.string().default('root'),
  password: z.string().default('taosdata'),
  precision: z.enum(PRECISIONS).default('ms'),
  convertNumber: z.boolean().default(false),
  /** Value substituted when a numeric column holds a non-number */
  defaultNumberValue: z.union([z.number(), z.string(), z.null()]).default(null),
  http: HttpConfigSchema.default({}),
});

// =============================================================================
// Type Exports
// =============================================================================

export type HttpConfig = z.infer<typeof HttpConfigSchema>;
export type ClientConfig = z.infer<typeof ClientConfigSchema>;
/** Configuration as written by a user, before defaults */
export type ClientConfigInput = z.input<typeof ClientConfigSchema>;
