/**
 * HTTP error handling for the client
 */

import { TidewireError } from '@tidewire/core';

import { TransportFailure } from '../transport/failure.js';
import type {
  HeaderErrorReason,
  HttpErrorCode,
  HttpErrorDetails,
  TransportErrorCode,
} from '../types/public/errors.js';

// Re-export TidewireError for consumers that import from this module
export { TidewireError } from '@tidewire/core';

/**
 * Error class for every failure raised by the HTTP client.
 *
 * The `code` tells which stage failed: encoding or decoding JSON
 * (`serialization_error`), building a header (`header_error`), or talking to
 * the host transport (`transport_error`).
 */
export class TidewireHttpError extends TidewireError {
  /** Categorized HTTP error code */
  declare readonly code: HttpErrorCode;
  /** Original transport code (only for transport_error) */
  readonly transportCode: TransportErrorCode | undefined;
  /** Rejected header name (only for header_error) */
  readonly headerName: string | undefined;

  constructor(details: HttpErrorDetails) {
    super(details.message, details.code, details.cause);
    this.name = 'TidewireHttpError';
    this.transportCode = details.transportCode;
    this.headerName = details.headerName;
  }

  /**
   * Creates a human-readable string representation
   */
  override toString(): string {
    const parts = [`TidewireHttpError [${this.code}]: ${this.message}`];
    if (this.headerName !== undefined) {
      parts.push(`  Header: ${this.headerName}`);
    }
    if (this.transportCode !== undefined) {
      parts.push(`  Transport: ${this.transportCode.type}`);
    }
    return parts.join('\n');
  }

  /**
   * Converts to a plain object for logging/serialization
   */
  override toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      code: this.code,
      message: this.message,
      ...(this.headerName !== undefined && { headerName: this.headerName }),
      ...(this.transportCode !== undefined && { transportCode: this.transportCode }),
    };
  }
}

/**
 * Creates a serialization error (unencodable value, malformed JSON, shape mismatch)
 */
export function createSerializationError(cause: unknown): TidewireHttpError {
  const message = cause instanceof Error ? cause.message : 'Failed to process JSON';
  return new TidewireHttpError({
    code: 'serialization_error',
    message: `JSON serialization error: ${message}`,
    cause,
  });
}

const HEADER_REASONS: Record<HeaderErrorReason, string> = {
  invalid_syntax: 'invalid syntax',
  forbidden: 'forbidden header',
  immutable: 'headers are immutable',
};

/**
 * Creates a header construction error
 */
export function createHeaderError(name: string, reason: HeaderErrorReason): TidewireHttpError {
  return new TidewireHttpError({
    code: 'header_error',
    message: `Header error: ${HEADER_REASONS[reason]} (${JSON.stringify(name)})`,
    headerName: name,
  });
}

/**
 * Creates a transport error carrying the host transport's code
 */
export function createTransportError(transportCode: TransportErrorCode, cause?: unknown): TidewireHttpError {
  return new TidewireHttpError({
    code: 'transport_error',
    message: `HTTP error: ${describeTransportErrorCode(transportCode)}`,
    transportCode,
    cause,
  });
}

/**
 * Renders a transport error code as text
 */
export function describeTransportErrorCode(code: TransportErrorCode): string {
  switch (code.type) {
    case 'dns_error':
      return code.rcode ? `DNS error (${code.rcode})` : 'DNS error';
    case 'internal_error':
      return code.message ? `internal error: ${code.message}` : 'internal error';
    default:
      return code.type.replace(/_/g, ' ');
  }
}

/**
 * Normalizes anything thrown during an exchange into a TidewireHttpError.
 * Transport failures keep their code; other errors become internal transport errors.
 */
export function normalizeError(error: unknown): TidewireHttpError {
  if (error instanceof TidewireHttpError) {
    return error;
  }
  if (error instanceof TransportFailure) {
    return createTransportError(error.code, error);
  }
  const message = error instanceof Error ? error.message : String(error);
  return createTransportError({ type: 'internal_error', message }, error);
}

/**
 * Re-expresses any error as a transport error code for the extension boundary.
 *
 * Transport errors return their original code unchanged. Everything else
 * collapses into `internal_error` carrying the rendered message, so only the
 * text of serialization and header failures survives.
 */
export function toTransportErrorCode(error: unknown): TransportErrorCode {
  if (error instanceof TidewireHttpError && error.transportCode !== undefined) {
    return error.transportCode;
  }
  if (error instanceof TransportFailure) {
    return error.code;
  }
  const message = error instanceof Error ? error.message : String(error);
  return { type: 'internal_error', message };
}

/**
 * Type guard to check if an error is any TidewireError (base class).
 */
export function isTidewireError(error: unknown): error is TidewireError {
  return error instanceof TidewireError;
}

/**
 * Type guard to check if an error is a TidewireHttpError
 */
export function isTidewireHttpError(error: unknown): error is TidewireHttpError {
  return error instanceof TidewireHttpError;
}
