/**
 * Incoming response and body materialization.
 *
 * @module
 */

import { UNBOUNDED_READ_CEILING } from '../constants.js';
import type { IncomingResponse, InputStream } from '../transport/types.js';
import type { JsonDecoder } from '../types/public/http.js';
import { createSerializationError, normalizeError } from './errors.js';
import type { Fields } from './fields.js';

const lossyDecoder = new TextDecoder('utf-8', { ignoreBOM: true });
const strictDecoder = new TextDecoder('utf-8', { fatal: true, ignoreBOM: true });

/**
 * Parses the first `Content-Length` value as an unsigned decimal integer
 */
export function parseContentLength(headers: Fields): number | undefined {
  const value = headers.firstText('Content-Length');
  if (value === undefined || !/^\d+$/.test(value)) {
    return undefined;
  }
  const length = Number(value);
  return Number.isSafeInteger(length) ? length : undefined;
}

function concat(chunks: Uint8Array[], total: number): Uint8Array {
  const result = new Uint8Array(total);
  let offset = 0;
  for (const chunk of chunks) {
    result.set(chunk, offset);
    offset += chunk.byteLength;
  }
  return result;
}

/**
 * Reads a stream to closure, one chunk per read.
 *
 * @example
 * ```typescript
 * for await (const chunk of readChunks(response.inputStream(), 16 * 1024)) {
 *   output.write(chunk);
 * }
 * ```
 */
export async function* readChunks(stream: InputStream, maxBytes: number): AsyncGenerator<Uint8Array> {
  for (;;) {
    let chunk: Uint8Array | null;
    try {
      chunk = await stream.read(maxBytes);
    } catch (error) {
      throw normalizeError(error);
    }
    if (chunk === null) {
      return;
    }
    yield chunk;
  }
}

/**
 * An HTTP response whose body can be materialized exactly once.
 *
 * `bytes()`, `text()`, `json()` and `inputStream()` each take the body;
 * calling any of them a second time throws a `TypeError`.
 */
export class HttpResponse {
  readonly statusCode: number;
  /** Immutable response headers */
  readonly headers: Fields;
  private incoming: IncomingResponse | undefined;

  constructor(incoming: IncomingResponse) {
    this.statusCode = incoming.status;
    this.headers = incoming.headers;
    this.incoming = incoming;
  }

  /** Whether the body has been taken */
  get bodyUsed(): boolean {
    return this.incoming === undefined;
  }

  /**
   * Reads the whole body.
   *
   * A valid `Content-Length` caps the total read; each read asks for at most
   * the bytes still outstanding. Without one, reads continue until the stream
   * closes.
   *
   * @throws {TidewireHttpError} `transport_error` when a read fails
   */
  async bytes(): Promise<Uint8Array> {
    const stream = this.take();
    let remaining = parseContentLength(this.headers) ?? UNBOUNDED_READ_CEILING;
    const chunks: Uint8Array[] = [];
    let total = 0;

    try {
      while (remaining > 0) {
        const chunk = await stream.read(remaining);
        if (chunk === null) {
          return concat(chunks, total);
        }
        chunks.push(chunk);
        total += chunk.byteLength;
        remaining -= chunk.byteLength;
      }
      // Ceiling reached before the stream reported closure
      await stream.cancel();
    } catch (error) {
      throw normalizeError(error);
    }

    return concat(chunks, total);
  }

  /**
   * Reads the whole body and decodes it as UTF-8, replacing invalid sequences
   */
  async text(): Promise<string> {
    return lossyDecoder.decode(await this.bytes());
  }

  /**
   * Reads the whole body and parses it as JSON.
   * Pass a decoder (e.g. a zod schema) to validate the shape.
   *
   * @throws {TidewireHttpError} `serialization_error` on malformed JSON or a rejected shape
   */
  json(): Promise<unknown>;
  json<T>(decoder: JsonDecoder<T>): Promise<T>;
  async json<T>(decoder?: JsonDecoder<T>): Promise<unknown> {
    const bytes = await this.bytes();

    let value: unknown;
    try {
      value = JSON.parse(strictDecoder.decode(bytes));
    } catch (error) {
      throw createSerializationError(error);
    }

    if (!decoder) {
      return value;
    }
    try {
      return decoder.parse(value);
    } catch (error) {
      throw createSerializationError(error);
    }
  }

  /**
   * Hands over the raw body stream for callers that stream instead of buffer
   */
  inputStream(): InputStream {
    return this.take();
  }

  /**
   * Releases the body without reading it. Does nothing if the body was already taken.
   */
  async discard(): Promise<void> {
    if (this.bodyUsed) {
      return;
    }
    try {
      await this.take().cancel();
    } catch (error) {
      throw normalizeError(error);
    }
  }

  private take(): InputStream {
    const incoming = this.incoming;
    if (!incoming) {
      throw new TypeError('Response body has already been consumed');
    }
    this.incoming = undefined;
    return incoming.consume();
  }
}
