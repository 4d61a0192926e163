/**
 * Catalog extension backed by the Kitsu REST API.
 *
 * @module
 *
 * @example
 * ```typescript
 * import { getExtension, KitsuExtension, registerExtension } from '@tidewire/kitsu';
 *
 * registerExtension(new KitsuExtension());
 *
 * const page = await getExtension().search('frieren', 1, []);
 * console.log(page.series.map((series) => series.title));
 * ```
 */

import { buildUrl, HttpClient, HttpRequest, type JsonDecoder, type QueryParams } from '@tidewire/http';

import { KITSU_API_BASE_URL, KITSU_API_BASE_URL_ENV, KITSU_PAGE_LIMIT } from './constants.js';
import { notImplemented, toExtensionError, type Extractor } from './extension.js';
import { toEpisode, toSeries } from './mapping.js';
import { animeResponseSchema, episodesResponseSchema, searchResponseSchema } from './schema.js';
import type { EpisodesPage, FilterCategory, SearchFilter, Series, SeriesPage, Video } from './types.js';

export interface KitsuExtensionOptions {
  /**
   * API base URL
   * @default process.env.KITSU_API_BASE_URL, then 'https://kitsu.io/api/edge'
   */
  base_url?: string;
  /**
   * Items per page for search and episode listings
   * @default 10
   */
  page_limit?: number;
  /** HTTP client to send through. Defaults to one on the undici transport. */
  http_client?: HttpClient;
}

export class KitsuExtension implements Extractor {
  private readonly baseUrl: string;
  private readonly pageLimit: number;
  private readonly http: HttpClient;

  constructor(options: KitsuExtensionOptions = {}) {
    this.baseUrl = options.base_url ?? process.env[KITSU_API_BASE_URL_ENV] ?? KITSU_API_BASE_URL;
    this.pageLimit = options.page_limit ?? KITSU_PAGE_LIMIT;
    if (!Number.isInteger(this.pageLimit) || this.pageLimit <= 0) {
      throw new RangeError('page_limit must be a positive integer');
    }
    this.http = options.http_client ?? new HttpClient();
  }

  filters(): Promise<FilterCategory[]> {
    return Promise.reject(notImplemented());
  }

  /**
   * Searches anime by text. Filters are accepted for interface parity and ignored.
   */
  async search(query: string, page?: number, _filters: SearchFilter[] = []): Promise<SeriesPage> {
    const response = await this.get(
      '/anime',
      { 'filter[text]': query, ...this.pageParams(page) },
      searchResponseSchema
    );

    return {
      series: response.data.map(toSeries),
      hasNextPage: Boolean(response.links?.next),
    };
  }

  async getSeriesInfo(seriesId: string): Promise<Series> {
    const response = await this.get(`/anime/${encodeURIComponent(seriesId)}`, undefined, animeResponseSchema);
    return toSeries(response.data);
  }

  async getSeriesEpisodes(seriesId: string, page?: number): Promise<EpisodesPage> {
    const response = await this.get(
      '/episodes',
      { 'filter[mediaId]': seriesId, ...this.pageParams(page) },
      episodesResponseSchema
    );

    return {
      episodes: response.data.map(toEpisode),
      hasNextPage: Boolean(response.links?.next),
    };
  }

  getSeriesVideos(_seriesId: string, _episodeId: string): Promise<Video[]> {
    return Promise.reject(notImplemented());
  }

  /** Page numbers start at 1; anything lower is treated as the first page */
  private pageParams(page: number | undefined): QueryParams {
    const index = Math.max((page ?? 1) - 1, 0);
    return {
      'page[limit]': this.pageLimit,
      'page[offset]': index * this.pageLimit,
    };
  }

  private async get<T>(path: string, query: QueryParams | undefined, decoder: JsonDecoder<T>): Promise<T> {
    try {
      const url = buildUrl(this.baseUrl, path, query);
      const response = await this.http.send(
        new HttpRequest('GET', url).withHeader('Accept', 'application/vnd.api+json')
      );
      return await response.json(decoder);
    } catch (error) {
      throw toExtensionError(error);
    }
  }
}
