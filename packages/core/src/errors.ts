/**
 * Base error class for all Tidewire errors.
 *
 * The HTTP client and the extension boundary both throw subclasses of this
 * error, so a single `instanceof` check covers every failure the SDK raises.
 *
 * @example
 * ```typescript
 * try {
 *   const response = await client.send(request);
 *   const payload = await response.json();
 * } catch (error) {
 *   if (error instanceof TidewireError) {
 *     console.log(error.code);     // 'transport_error', 'serialization_error', ...
 *     console.log(error.toJSON());
 *   }
 * }
 * ```
 */

import type { TidewireErrorCode } from './types/errors.js';

export class TidewireError extends Error {
  /**
   * Error code describing the type of error.
   * Typed loosely at the base level so subclasses can narrow it to their own unions.
   */
  readonly code: TidewireErrorCode | (string & {});

  /**
   * The underlying error that caused this error, if any.
   */
  override readonly cause: unknown;

  constructor(message: string, code: TidewireErrorCode | (string & {}) = 'tidewire_error', cause?: unknown) {
    super(message);
    this.name = 'TidewireError';
    this.code = code;
    this.cause = cause;

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, this.constructor);
    }

    Object.setPrototypeOf(this, new.target.prototype);
  }

  /**
   * Creates a human-readable string representation
   */
  override toString(): string {
    return `${this.name} [${this.code}]: ${this.message}`;
  }

  /**
   * Converts to a plain object for logging/serialization
   */
  toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      code: this.code,
      message: this.message,
    };
  }
}
