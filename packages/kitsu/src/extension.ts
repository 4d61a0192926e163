/**
 * Capability interface every catalog extension implements, and the error
 * that crosses the extension boundary.
 *
 * @module
 */

import { TidewireError } from '@tidewire/core';
import { describeTransportErrorCode, toTransportErrorCode, type TransportErrorCode } from '@tidewire/http';

import type { EpisodesPage, FilterCategory, SearchFilter, Series, SeriesPage, Video } from './types.js';

export interface Extractor {
  filters(): Promise<FilterCategory[]>;
  search(query: string, page: number | undefined, filters: SearchFilter[]): Promise<SeriesPage>;
  getSeriesInfo(seriesId: string): Promise<Series>;
  getSeriesEpisodes(seriesId: string, page?: number): Promise<EpisodesPage>;
  getSeriesVideos(seriesId: string, episodeId: string): Promise<Video[]>;
}

/**
 * Failure reported by an extension operation.
 *
 * Only the transport code survives the boundary: transport failures keep
 * their original code, every other failure becomes `internal_error` with the
 * rendered message.
 */
export class ExtensionError extends TidewireError {
  readonly transportCode: TransportErrorCode;

  constructor(transportCode: TransportErrorCode, cause?: unknown) {
    super(`Extension error: ${describeTransportErrorCode(transportCode)}`, 'extension_error', cause);
    this.name = 'ExtensionError';
    this.transportCode = transportCode;
  }

  override toJSON(): Record<string, unknown> {
    return { ...super.toJSON(), transportCode: this.transportCode };
  }
}

/**
 * Maps any failure to an ExtensionError
 */
export function toExtensionError(error: unknown): ExtensionError {
  if (error instanceof ExtensionError) {
    return error;
  }
  return new ExtensionError(toTransportErrorCode(error), error);
}

export function notImplemented(): ExtensionError {
  return new ExtensionError({ type: 'internal_error', message: 'Not implemented' });
}
