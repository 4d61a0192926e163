/**
 * Host transport contract.
 *
 * The client does not open sockets itself. It drives one exchange at a time
 * through these primitives: build an outgoing request, write its body in
 * chunks, finish the body, wait for the response head, then read the
 * response body with bounded reads.
 *
 * @module
 */

import type { Fields } from '../http/fields.js';
import type { HttpMethod } from '../types/public/http.js';

/**
 * URL scheme of an outgoing request
 */
export type Scheme = { tag: 'http' } | { tag: 'https' } | { tag: 'other'; value: string };

/**
 * Transport-level description of one outgoing request
 */
export interface OutgoingRequest {
  method: HttpMethod;
  scheme: Scheme;
  /** `host[:port]`, with userinfo when the URL carries it */
  authority: string;
  /** Path, followed by `?query` when the URL has a non-empty query */
  pathWithQuery: string;
  headers: Fields;
  /** Whether the caller will write a body through `PendingExchange.body` */
  hasBody: boolean;
}

/**
 * Writer for an outgoing body. Single use: `finish` closes it.
 */
export interface OutgoingBodyWriter {
  /** Writes one chunk and resolves once the transport has taken it */
  write(chunk: Uint8Array): Promise<void>;
  /** Ends the body. No trailers are sent. */
  finish(): Promise<void>;
}

/**
 * Readable side of a response body. Single owner, single use.
 */
export interface InputStream {
  /**
   * Reads up to `maxBytes` bytes.
   * Resolves with a non-empty chunk, or `null` once the stream is closed.
   * Rejects with a TransportFailure when the read fails.
   */
  read(maxBytes: number): Promise<Uint8Array | null>;
  /** Releases the stream without reading the rest of it */
  cancel(): Promise<void>;
}

/**
 * Response head as delivered by the transport
 */
export interface IncomingResponse {
  readonly status: number;
  /** Immutable response headers */
  readonly headers: Fields;
  /** Takes ownership of the body stream. May be called once. */
  consume(): InputStream;
}

/**
 * One in-flight exchange
 */
export interface PendingExchange {
  /** Present when the outgoing request declared a body */
  readonly body: OutgoingBodyWriter | undefined;
  /** Waits for the response head */
  response(): Promise<IncomingResponse>;
}

/**
 * Host transport
 */
export interface HttpTransport {
  /**
   * Starts an exchange.
   * @throws {TransportFailure} When the request cannot be dispatched at all
   */
  handle(request: OutgoingRequest): PendingExchange;
}
