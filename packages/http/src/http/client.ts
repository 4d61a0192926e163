/**
 * HTTP client for the Tidewire SDK.
 *
 * @module
 *
 * @example Sending a request with the default undici transport
 * ```typescript
 * import { HttpClient, HttpRequest } from '@tidewire/http';
 *
 * const client = new HttpClient({
 *   hooks: {
 *     onRequest: (meta) => console.log(`${meta.method} ${meta.url}`),
 *     onResponse: (meta) => console.log(`${meta.status} in ${meta.durationMs}ms`),
 *     onError: (err) => console.error(`Error:`, err.message),
 *   },
 * });
 *
 * const response = await client.send(new HttpRequest('GET', 'https://api.example.com/items'));
 * const items = await response.json();
 * ```
 *
 * @example Plugging in a custom host transport
 * ```typescript
 * import type { HttpTransport, OutgoingRequest, PendingExchange } from '@tidewire/http';
 *
 * class RecordingTransport implements HttpTransport {
 *   handle(request: OutgoingRequest): PendingExchange {
 *     // open the exchange on your own connection primitives
 *   }
 * }
 *
 * const client = new HttpClient({ transport: new RecordingTransport() });
 * ```
 */

import { UndiciTransport } from '../transport/undici-transport.js';
import type { HttpTransport } from '../transport/types.js';
import type {
  HttpClientOptions,
  HttpObservabilityHooks,
  HttpRequestMeta,
  HttpResponseMeta,
} from '../types/public/http.js';
import { normalizeError } from './errors.js';
import { followRedirectOnce } from './redirect.js';
import type { HttpRequest } from './request.js';
import type { HttpResponse } from './response.js';
import { executeExchange } from './transmitter.js';

export class HttpClient {
  private readonly transport: HttpTransport;
  private readonly hooks: HttpObservabilityHooks;

  constructor(options: HttpClientOptions = {}) {
    this.transport = options.transport ?? new UndiciTransport();
    this.hooks = options.hooks ?? {};
  }

  /**
   * Sends a request and returns the response once its head is available.
   *
   * A response carrying an absolute `Location` URL is followed exactly once,
   * re-sending the original method, headers and body.
   *
   * @throws {TidewireHttpError} `transport_error` when any exchange fails
   */
  async send(request: HttpRequest): Promise<HttpResponse> {
    const startTime = Date.now();
    const requestMeta: HttpRequestMeta = {
      startTime,
      url: request.url.href,
      method: request.method,
      headers: request.headers.toRecord(),
    };
    let redirected = false;
    let response: HttpResponse | undefined;

    try {
      this.hooks.onRequest?.(requestMeta);

      const first = await executeExchange(this.transport, request, request.url);
      response = await followRedirectOnce(first, (location) => {
        redirected = true;
        this.hooks.onRedirect?.({ ...requestMeta, status: first.statusCode, location: location.href });
        return executeExchange(this.transport, request, location);
      });

      const responseMeta: HttpResponseMeta = {
        ...requestMeta,
        durationMs: Date.now() - startTime,
        status: response.statusCode,
        redirected,
      };
      this.hooks.onResponse?.(responseMeta);

      return response;
    } catch (error) {
      const errorMeta: HttpResponseMeta = {
        ...requestMeta,
        durationMs: Date.now() - startTime,
        ...(response && { status: response.statusCode }),
        redirected,
      };

      const normalizedError = normalizeError(error);
      this.hooks.onError?.(normalizedError, errorMeta);

      // A response that fails a hook is never returned; release its body
      if (response) {
        await response.discard().catch((discardError: unknown) => {
          this.hooks.onError?.(normalizeError(discardError), errorMeta);
        });
      }

      throw normalizedError;
    }
  }
}
