import type { TransportErrorCode } from '../types/public/errors.js';

/**
 * Failure raised by a host transport.
 *
 * Transports reject with this error so the client can carry the transport's
 * own error code through to its callers.
 */
export class TransportFailure extends Error {
  readonly code: TransportErrorCode;

  constructor(code: TransportErrorCode, message?: string, options?: { cause?: unknown }) {
    super(message ?? `Transport failure: ${code.type}`, options);
    this.name = 'TransportFailure';
    this.code = code;
  }
}

export function isTransportFailure(error: unknown): error is TransportFailure {
  return error instanceof TransportFailure;
}
