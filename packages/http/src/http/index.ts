/**
 * HTTP client module.
 * @module
 */

// Client
export { HttpClient } from './client.js';

// Request and response
export { HttpRequest } from './request.js';
export { HttpResponse, parseContentLength, readChunks } from './response.js';
export { Fields, decodeFieldValue } from './fields.js';
export type { FieldValue } from './fields.js';

// Exchange internals
export { chunkBytes, executeExchange } from './transmitter.js';
export { followRedirectOnce, redirectTarget } from './redirect.js';

// Errors
export {
  createHeaderError,
  createSerializationError,
  createTransportError,
  describeTransportErrorCode,
  isTidewireError,
  isTidewireHttpError,
  normalizeError,
  TidewireError,
  TidewireHttpError,
  toTransportErrorCode,
} from './errors.js';

// URL utilities
export {
  buildUrl,
  joinUrl,
  parseAbsoluteUrl,
  toAuthority,
  toOutgoingRequest,
  toPathWithQuery,
  toScheme,
} from './url.js';
