/**
 * @tidewire/kitsu
 *
 * Catalog extension interface and the Kitsu implementation
 */

export { KITSU_API_BASE_URL, KITSU_API_BASE_URL_ENV, KITSU_PAGE_LIMIT } from './constants.js';
export { ExtensionError, notImplemented, toExtensionError } from './extension.js';
export type { Extractor } from './extension.js';
export { KitsuExtension } from './kitsu.js';
export type { KitsuExtensionOptions } from './kitsu.js';
export { toEpisode, toImageResource, toSeries } from './mapping.js';
export { getExtension, registerExtension, resetExtensionRegistry } from './registry.js';
export {
  animeDataSchema,
  animeResponseSchema,
  episodeDataSchema,
  episodesResponseSchema,
  searchResponseSchema,
} from './schema.js';
export type { AnimeData, AnimeResponse, EpisodeData, EpisodesResponse, SearchResponse } from './schema.js';
export type {
  Episode,
  EpisodesPage,
  Filter,
  FilterCategory,
  SearchFilter,
  Series,
  SeriesPage,
  Video,
} from './types.js';
