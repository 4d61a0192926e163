export type {
  HttpTransport,
  IncomingResponse,
  InputStream,
  OutgoingBodyWriter,
  OutgoingRequest,
  PendingExchange,
  Scheme,
} from './types.js';

export { TransportFailure, isTransportFailure } from './failure.js';
export { ReadableInputStream, UndiciTransport, toTransportFailure } from './undici-transport.js';
export type { UndiciTransportOptions } from './undici-transport.js';
