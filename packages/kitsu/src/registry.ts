/**
 * Process-wide extension registration. Exactly one implementation may be
 * registered; the host looks it up through `getExtension()`.
 */

import { TidewireError } from '@tidewire/core';

import type { Extractor } from './extension.js';

let registered: Extractor | undefined;

export function registerExtension(extension: Extractor): void {
  if (registered) {
    throw new TidewireError('An extension is already registered', 'registration_error');
  }
  registered = extension;
}

export function getExtension(): Extractor {
  if (!registered) {
    throw new TidewireError('No extension registered', 'registration_error');
  }
  return registered;
}

/** @internal Clears the registration between tests */
export function resetExtensionRegistry(): void {
  registered = undefined;
}
