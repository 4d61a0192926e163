export type { ExtensionErrorCode, HttpErrorCode, TidewireErrorCode } from './errors.js';
