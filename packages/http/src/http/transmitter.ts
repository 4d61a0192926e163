/**
 * Executes one exchange over the host transport.
 *
 * @module
 */

import { BODY_CHUNK_SIZE } from '../constants.js';
import { TransportFailure } from '../transport/failure.js';
import type { HttpTransport } from '../transport/types.js';
import { normalizeError } from './errors.js';
import type { HttpRequest } from './request.js';
import { HttpResponse } from './response.js';
import { toOutgoingRequest } from './url.js';

/**
 * Splits bytes into consecutive views of at most `size` bytes
 */
export function* chunkBytes(bytes: Uint8Array, size: number = BODY_CHUNK_SIZE): Generator<Uint8Array> {
  for (let offset = 0; offset < bytes.byteLength; offset += size) {
    yield bytes.subarray(offset, offset + size);
  }
}

/**
 * Sends `request` to `url` and waits for the response head.
 *
 * The body, when present, is written in fixed-size chunks, each awaited
 * before the next, then finished without trailers. Nothing is retried.
 *
 * @throws {TidewireHttpError} `transport_error` for any failure along the way
 */
export async function executeExchange(transport: HttpTransport, request: HttpRequest, url: URL): Promise<HttpResponse> {
  const body = request.body;
  const outgoing = toOutgoingRequest(url, request.method, request.headers, body !== undefined);

  try {
    const exchange = transport.handle(outgoing);

    if (body !== undefined) {
      const writer = exchange.body;
      if (!writer) {
        throw new TransportFailure({ type: 'internal_error', message: 'Transport did not open a request body' });
      }
      for (const chunk of chunkBytes(body)) {
        await writer.write(chunk);
      }
      await writer.finish();
    }

    return new HttpResponse(await exchange.response());
  } catch (error) {
    throw normalizeError(error);
  }
}
