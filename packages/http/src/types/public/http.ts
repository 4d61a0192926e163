/**
 * Public types for the HTTP client
 *
 * The client talks to the network through a pluggable host transport (see
 * `HttpTransport`), so these types describe requests and responses in terms
 * of raw header bytes and single-use body streams.
 */

import type { HttpTransport } from '../../transport/types.js';

/**
 * Well-known HTTP methods. Any other method token is accepted as a string.
 */
export type KnownHttpMethod = 'GET' | 'HEAD' | 'POST' | 'PUT' | 'DELETE' | 'CONNECT' | 'OPTIONS' | 'TRACE' | 'PATCH';

export type HttpMethod = KnownHttpMethod | (string & {});

/**
 * Query parameters
 */
export type QueryParams = Record<string, string | number | boolean | undefined>;

/**
 * Decodes an already-parsed JSON value into a typed shape.
 * A zod schema satisfies this interface.
 */
export interface JsonDecoder<T> {
  parse(value: unknown): T;
}

/**
 * Metadata provided to observability hooks
 */
export interface HttpRequestMeta {
  /** Request start timestamp (Date.now()) */
  startTime: number;
  url: string;
  method: HttpMethod;
  /** Request headers, lowercased names, repeated values joined with ", " */
  headers: Record<string, string>;
}

/**
 * Metadata provided to response/error hooks
 */
export interface HttpResponseMeta extends HttpRequestMeta {
  /** Request duration in milliseconds */
  durationMs: number;
  /** Response status code (if available) */
  status?: number;
  /** Whether a redirect hop was taken */
  redirected: boolean;
}

/**
 * Metadata provided when a Location header is followed
 */
export interface HttpRedirectMeta extends HttpRequestMeta {
  /** Status code of the response that carried the Location header */
  status: number;
  /** Absolute URL the request is re-sent to */
  location: string;
}

/**
 * Observability hooks for monitoring exchanges
 */
export interface HttpObservabilityHooks {
  /**
   * Called before the first exchange starts
   */
  onRequest?: (meta: HttpRequestMeta) => void;
  /**
   * Called before the single redirect hop is sent
   */
  onRedirect?: (meta: HttpRedirectMeta) => void;
  /**
   * Called once the final response head is available
   */
  onResponse?: (meta: HttpResponseMeta) => void;
  /**
   * Called when the exchange fails
   */
  onError?: (error: Error, meta: HttpResponseMeta) => void;
}

/**
 * Configuration options for the HTTP client
 */
export interface HttpClientOptions {
  /**
   * Host transport used for every exchange
   * @default UndiciTransport
   */
  transport?: HttpTransport;
  /**
   * Observability hooks for monitoring exchanges
   */
  hooks?: HttpObservabilityHooks;
}
