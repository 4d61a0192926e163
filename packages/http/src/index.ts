/**
 * @tidewire/http
 *
 * Minimal HTTP client over pluggable host transport primitives
 */

// Constants
export * from './constants.js';

// HTTP module
export * from './http/index.js';

// Host transport
export * from './transport/index.js';

// Public types
export * from './types/public/index.js';
