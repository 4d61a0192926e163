/**
 * Error types for the HTTP client
 *
 * Every client failure is a TidewireHttpError. Transport failures also carry
 * the host transport's own error code so it can be handed back unchanged.
 */

import type { HttpErrorCode } from '@tidewire/core';
export type { HttpErrorCode } from '@tidewire/core';

/**
 * Transport failure classes that carry no extra payload
 */
export type SimpleTransportErrorType =
  | 'dns_timeout'
  | 'destination_not_found'
  | 'destination_unavailable'
  | 'connection_refused'
  | 'connection_terminated'
  | 'connection_reset'
  | 'connection_timeout'
  | 'tls_protocol_error'
  | 'tls_certificate_error'
  | 'http_request_body_size'
  | 'http_request_method_invalid'
  | 'http_request_uri_invalid'
  | 'http_protocol_error'
  | 'http_response_incomplete'
  | 'http_response_timeout';

/**
 * Error code reported by the host transport
 */
export type TransportErrorCode =
  | { type: SimpleTransportErrorType }
  | {
      type: 'dns_error';
      /** Resolver response code, e.g. `ENOTFOUND` */
      rcode?: string | undefined;
    }
  | {
      type: 'internal_error';
      message?: string | undefined;
    };

export type TransportErrorType = TransportErrorCode['type'];

/**
 * Reasons a header field can be rejected
 */
export type HeaderErrorReason = 'invalid_syntax' | 'forbidden' | 'immutable';

/**
 * Error details for TidewireHttpError
 */
export interface HttpErrorDetails {
  code: HttpErrorCode;
  message: string;
  /** Original transport code (only for transport_error) */
  transportCode?: TransportErrorCode | undefined;
  /** Header name (only for header_error) */
  headerName?: string | undefined;
  cause?: unknown;
}
