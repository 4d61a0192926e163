/**
 * @tidewire/core
 *
 * Shared internals for @tidewire/http and @tidewire/kitsu.
 */

// Base error
export { TidewireError } from './errors.js';

// Producer/consumer queue
export { AsyncEventQueue } from './async-queue.js';

// Types
export type { ExtensionErrorCode, HttpErrorCode, TidewireErrorCode } from './types/index.js';
