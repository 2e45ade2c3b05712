import { inspect } from 'node:util';

import { isError, isNonEmptyString, isObject } from './type-guards.js';

export type ExtractionErrorCode =
  | 'UNSUPPORTED_BINARY'
  | 'PDF_PARSE'
  | 'PDF_ENCRYPTED'
  | 'PDF_TOO_LARGE'
  | 'DECODE'
  | 'HTML_CONVERSION'
  | 'FETCH_HTTP'
  | 'UNKNOWN';

const STATUS_BY_CODE: Readonly<Record<ExtractionErrorCode, number>> = {
  UNSUPPORTED_BINARY: 415,
  PDF_PARSE: 422,
  PDF_ENCRYPTED: 422,
  PDF_TOO_LARGE: 413,
  DECODE: 422,
  HTML_CONVERSION: 422,
  FETCH_HTTP: 502,
  UNKNOWN: 500,
};

export class ExtractionError extends Error {
  readonly code: ExtractionErrorCode;
  readonly statusCode: number;
  readonly details: Readonly<Record<string, unknown>>;

  constructor(
    code: ExtractionErrorCode,
    message: string,
    details: Record<string, unknown> = {},
    options?: ErrorOptions
  ) {
    super(message, options);
    this.name = 'ExtractionError';
    this.code = code;
    this.statusCode = STATUS_BY_CODE[code];
    this.details = Object.freeze({ ...details });
    Error.captureStackTrace(this, this.constructor);
  }
}

export interface ErrorPayload {
  readonly code: string;
  readonly message: string;
  readonly details: Readonly<Record<string, unknown>>;
}

export const UNKNOWN_ERROR_MESSAGE =
  'An unknown error occurred while fetching the content';

export function toPayloadCode(code: ExtractionErrorCode): string {
  return code === 'FETCH_HTTP' ? 'ERR_FETCH_HTTP' : `ERR_FETCH_${code}`;
}

/**
 * Maps any thrown value to the payload handed to tool callers. Only
 * `ExtractionError` messages pass through; anything else is replaced by a
 * generic message so internal diagnostics never reach the caller.
 */
export function toErrorPayload(error: unknown, url: string): ErrorPayload {
  if (error instanceof ExtractionError) {
    return {
      code: toPayloadCode(error.code),
      message: error.message,
      details: { url, ...error.details },
    };
  }

  return {
    code: toPayloadCode('UNKNOWN'),
    message: UNKNOWN_ERROR_MESSAGE,
    details: {
      url,
      hint: 'Please try again later or provide a different URL.',
    },
  };
}

/** First line is the human-readable message, second line the JSON payload. */
export function buildErrorPayload(payload: ErrorPayload): string {
  const body = JSON.stringify({
    code: payload.code,
    message: payload.message,
    details: payload.details,
  });
  return `${payload.message}\n${body}`;
}

export function getErrorMessage(error: unknown): string {
  if (isError(error)) return error.message;
  if (isNonEmptyString(error)) return error;
  if (isObject(error)) {
    const { message } = error;
    if (isNonEmptyString(message)) return message;
  }
  return formatUnknownError(error);
}

function formatUnknownError(error: unknown): string {
  if (error === null || error === undefined) return 'Unknown error';
  try {
    return inspect(error, {
      depth: 2,
      maxStringLength: 200,
      breakLength: Infinity,
      compact: true,
      colors: false,
    });
  } catch {
    return 'Unknown error';
  }
}
