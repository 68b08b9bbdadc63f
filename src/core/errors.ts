import type { QueryResponse } from '../transport/QueryResponse';

/**
 * Base class for every error raised by the client.
 */
export class TsdbError extends Error {
  constructor(message: string) {
    super(message);
    this.name = new.target.name;
  }
}

/**
 * Invalid address, precision unit, encoding or schema value.
 * Raised at construction time, before any state is applied.
 */
export class ConfigurationError extends TsdbError {}

/**
 * Invalid argument passed to an operation (empty topic, missing channel...).
 */
export class InvalidArgumentError extends TsdbError {}

/**
 * Non-2xx HTTP status or unexpected content type from the server.
 */
export class TransportError extends TsdbError {
  readonly status?: number;
  readonly body?: string;
  /** Decoded payload, when the server sent one alongside the failure */
  readonly response?: QueryResponse;

  constructor(
    message: string,
    details: { status?: number; body?: string; response?: QueryResponse } = {}
  ) {
    super(message);
    this.status = details.status;
    this.body = details.body;
    this.response = details.response;
  }
}

/**
 * Malformed JSON body or column metadata.
 */
export class DecodeError extends TsdbError {}

/**
 * Non-zero code or non-empty description in an otherwise successful exchange.
 */
export class ApplicationError extends TsdbError {
  readonly code: number;
  readonly desc: string;

  constructor(code: number, desc: string) {
    super(desc || `application error code ${code}`);
    this.code = code;
    this.desc = desc;
  }
}

/**
 * Referenced table or stream does not exist.
 * Only one instance exists: {@link ERR_TABLE_NOT_EXIST}.
 */
export class TableNotExistError extends ApplicationError {}

export const TABLE_NOT_EXIST_CODES: readonly number[] = [9826, 9750];

export const ERR_TABLE_NOT_EXIST = new TableNotExistError(TABLE_NOT_EXIST_CODES[0], 'table does not exist');

export function isTableNotExist(error: unknown): error is TableNotExistError {
  return error === ERR_TABLE_NOT_EXIST;
}

/**
 * Normalize an unknown thrown value into an Error
 */
export function toError(value: unknown): Error {
  return value instanceof Error ? value : new Error(String(value));
}
