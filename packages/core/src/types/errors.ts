/**
 * Error codes raised by the HTTP client
 */
export type HttpErrorCode = 'serialization_error' | 'header_error' | 'transport_error';

/**
 * Error codes raised at the extension boundary
 */
export type ExtensionErrorCode = 'extension_error' | 'registration_error';

/**
 * All possible SDK error codes
 */
export type TidewireErrorCode = HttpErrorCode | ExtensionErrorCode | 'tidewire_error';
