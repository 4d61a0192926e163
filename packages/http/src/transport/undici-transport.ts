/**
 * Default Node.js host transport backed by undici.
 *
 * @module
 */

import { Readable } from 'node:stream';

import { AsyncEventQueue } from '@tidewire/core';
import { request, type Dispatcher } from 'undici';

import { Fields } from '../http/fields.js';
import type { TransportErrorCode } from '../types/public/errors.js';
import { TransportFailure } from './failure.js';
import type {
  HttpTransport,
  IncomingResponse,
  InputStream,
  OutgoingBodyWriter,
  OutgoingRequest,
  PendingExchange,
} from './types.js';

const DISPATCHER_METHODS: ReadonlySet<string> = new Set<Dispatcher.HttpMethod>([
  'GET',
  'HEAD',
  'POST',
  'PUT',
  'DELETE',
  'CONNECT',
  'OPTIONS',
  'TRACE',
  'PATCH',
]);

/** Node and undici error codes mapped to transport error codes */
const ERROR_CODES: Record<string, TransportErrorCode> = {
  EAI_AGAIN: { type: 'dns_timeout' },
  ECONNREFUSED: { type: 'connection_refused' },
  ECONNRESET: { type: 'connection_reset' },
  EPIPE: { type: 'connection_terminated' },
  ETIMEDOUT: { type: 'connection_timeout' },
  EHOSTUNREACH: { type: 'destination_unavailable' },
  ENETUNREACH: { type: 'destination_unavailable' },
  EPROTO: { type: 'tls_protocol_error' },
  CERT_HAS_EXPIRED: { type: 'tls_certificate_error' },
  DEPTH_ZERO_SELF_SIGNED_CERT: { type: 'tls_certificate_error' },
  SELF_SIGNED_CERT_IN_CHAIN: { type: 'tls_certificate_error' },
  UNABLE_TO_VERIFY_LEAF_SIGNATURE: { type: 'tls_certificate_error' },
  ERR_TLS_CERT_ALTNAME_INVALID: { type: 'tls_certificate_error' },
  UND_ERR_CONNECT_TIMEOUT: { type: 'connection_timeout' },
  UND_ERR_HEADERS_TIMEOUT: { type: 'http_response_timeout' },
  UND_ERR_BODY_TIMEOUT: { type: 'http_response_timeout' },
  UND_ERR_SOCKET: { type: 'connection_terminated' },
  UND_ERR_CLOSED: { type: 'connection_terminated' },
  UND_ERR_ABORTED: { type: 'connection_terminated' },
  UND_ERR_HEADERS_OVERFLOW: { type: 'http_protocol_error' },
  UND_ERR_REQ_CONTENT_LENGTH_MISMATCH: { type: 'http_request_body_size' },
  UND_ERR_RES_CONTENT_LENGTH_MISMATCH: { type: 'http_response_incomplete' },
};

function isDispatcherMethod(method: string): method is Dispatcher.HttpMethod {
  return DISPATCHER_METHODS.has(method);
}

function errorCodeOf(error: unknown): string | undefined {
  if (typeof error === 'object' && error !== null && 'code' in error && typeof error.code === 'string') {
    return error.code;
  }
  return undefined;
}

/**
 * Maps a Node or undici error to a TransportFailure
 */
export function toTransportFailure(error: unknown): TransportFailure {
  if (error instanceof TransportFailure) {
    return error;
  }

  const message = error instanceof Error ? error.message : String(error);
  const code = errorCodeOf(error);

  if (code === 'ENOTFOUND') {
    return new TransportFailure({ type: 'dns_error', rcode: code }, message, { cause: error });
  }
  if (code !== undefined && code.startsWith('HPE_')) {
    return new TransportFailure({ type: 'http_protocol_error' }, message, { cause: error });
  }
  if (code !== undefined && code.startsWith('ERR_SSL_')) {
    return new TransportFailure({ type: 'tls_protocol_error' }, message, { cause: error });
  }

  const mapped = code === undefined ? undefined : ERROR_CODES[code];
  return new TransportFailure(mapped ?? { type: 'internal_error', message }, message, { cause: error });
}

function latin1(value: Uint8Array): string {
  return Buffer.from(value).toString('latin1');
}

function toDispatcherHeaders(fields: Fields): Record<string, string | string[]> {
  const headers: Record<string, string | string[]> = {};
  for (const [name, value] of fields.toList()) {
    const key = name.toLowerCase();
    const existing = headers[key];
    const text = latin1(value);
    if (existing === undefined) {
      headers[key] = text;
    } else if (Array.isArray(existing)) {
      existing.push(text);
    } else {
      headers[key] = [existing, text];
    }
  }
  return headers;
}

function toIncomingFields(headers: Record<string, string | string[] | undefined>): Fields {
  const pairs: Array<[string, Uint8Array]> = [];
  for (const [name, value] of Object.entries(headers)) {
    if (value === undefined) continue;
    for (const item of Array.isArray(value) ? value : [value]) {
      pairs.push([name, Buffer.from(item, 'latin1')]);
    }
  }
  return Fields.fromIncoming(pairs);
}

/**
 * Bounded reads over a Node readable stream.
 * Chunks larger than the requested size are split and the rest kept for the next read.
 */
export class ReadableInputStream implements InputStream {
  private readonly iterator: AsyncIterator<unknown>;
  private pending: Uint8Array | undefined;

  constructor(private readonly readable: Readable) {
    this.iterator = readable[Symbol.asyncIterator]();
  }

  async read(maxBytes: number): Promise<Uint8Array | null> {
    if (maxBytes <= 0) {
      throw new RangeError('maxBytes must be positive');
    }

    let chunk = this.pending;
    this.pending = undefined;

    while (chunk === undefined || chunk.byteLength === 0) {
      let result: IteratorResult<unknown>;
      try {
        result = await this.iterator.next();
      } catch (error) {
        throw toTransportFailure(error);
      }
      if (result.done) {
        return null;
      }
      chunk = toChunk(result.value);
    }

    if (chunk.byteLength > maxBytes) {
      this.pending = chunk.subarray(maxBytes);
      return chunk.subarray(0, maxBytes);
    }
    return chunk;
  }

  cancel(): Promise<void> {
    this.pending = undefined;
    this.readable.destroy();
    return Promise.resolve();
  }
}

function toChunk(value: unknown): Uint8Array {
  if (value instanceof Uint8Array) {
    return value;
  }
  if (typeof value === 'string') {
    return Buffer.from(value);
  }
  throw new TransportFailure({ type: 'internal_error', message: 'Response body produced a non-byte chunk' });
}

class QueueBodyWriter implements OutgoingBodyWriter {
  constructor(
    private readonly queue: AsyncEventQueue<Uint8Array>,
    private readonly dispatched: () => Promise<unknown>
  ) {}

  async write(chunk: Uint8Array): Promise<void> {
    try {
      await this.queue.push(chunk);
    } catch (error) {
      throw await this.uploadFailure(error);
    }
  }

  finish(): Promise<void> {
    this.queue.end();
    return Promise.resolve();
  }

  /**
   * When undici stops consuming the body, the queue only knows its consumer
   * went away. A rejected dispatch carries the actual transport code.
   */
  private async uploadFailure(error: unknown): Promise<TransportFailure> {
    try {
      await this.dispatched();
    } catch (dispatchError) {
      return toTransportFailure(dispatchError);
    }
    return toTransportFailure(error);
  }
}

class UndiciExchange implements PendingExchange {
  readonly body: OutgoingBodyWriter | undefined;
  private readonly pending: Promise<IncomingResponse>;

  constructor(url: string, outgoing: OutgoingRequest, method: Dispatcher.HttpMethod, dispatcher?: Dispatcher) {
    const queue = outgoing.hasBody ? new AsyncEventQueue<Uint8Array>() : undefined;
    this.body = queue ? new QueueBodyWriter(queue, () => this.pending) : undefined;

    this.pending = request(url, {
      method,
      headers: toDispatcherHeaders(outgoing.headers),
      ...(queue && { body: Readable.from(queue, { objectMode: false }) }),
      ...(dispatcher && { dispatcher }),
    }).then(
      (data): IncomingResponse => {
        let consumed = false;
        return {
          status: data.statusCode,
          headers: toIncomingFields(data.headers),
          consume: () => {
            if (consumed) {
              throw new TransportFailure({ type: 'internal_error', message: 'Response body already taken' });
            }
            consumed = true;
            return new ReadableInputStream(data.body);
          },
        };
      },
      (error: unknown) => {
        throw toTransportFailure(error);
      }
    );

    // A failed dispatch must release a writer still waiting on the body queue
    this.pending.catch((error: unknown) => {
      queue?.abort(toTransportFailure(error));
    });
  }

  response(): Promise<IncomingResponse> {
    return this.pending;
  }
}

export interface UndiciTransportOptions {
  /**
   * undici dispatcher to send through, e.g. an `Agent` or a `MockAgent` in tests
   * @default the global dispatcher
   */
  dispatcher?: Dispatcher;
}

/**
 * Host transport on top of `undici.request`.
 *
 * @example
 * ```typescript
 * import { Agent } from 'undici';
 *
 * const transport = new UndiciTransport({ dispatcher: new Agent({ connections: 4 }) });
 * const client = new HttpClient({ transport });
 * ```
 */
export class UndiciTransport implements HttpTransport {
  private readonly dispatcher: Dispatcher | undefined;

  constructor(options: UndiciTransportOptions = {}) {
    this.dispatcher = options.dispatcher;
  }

  handle(outgoing: OutgoingRequest): PendingExchange {
    if (outgoing.scheme.tag === 'other') {
      throw new TransportFailure(
        { type: 'http_protocol_error' },
        `Unsupported scheme "${outgoing.scheme.value}"`
      );
    }
    if (!isDispatcherMethod(outgoing.method)) {
      throw new TransportFailure(
        { type: 'http_request_method_invalid' },
        `Unsupported method "${outgoing.method}"`
      );
    }

    const url = `${outgoing.scheme.tag}://${outgoing.authority}${outgoing.pathWithQuery}`;
    return new UndiciExchange(url, outgoing, outgoing.method, this.dispatcher);
  }
}
