export type {
  HttpErrorCode,
  HttpErrorDetails,
  HeaderErrorReason,
  SimpleTransportErrorType,
  TransportErrorCode,
  TransportErrorType,
} from './errors.js';

export type {
  HttpClientOptions,
  HttpMethod,
  HttpObservabilityHooks,
  HttpRedirectMeta,
  HttpRequestMeta,
  HttpResponseMeta,
  JsonDecoder,
  KnownHttpMethod,
  QueryParams,
} from './http.js';
