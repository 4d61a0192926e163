/**
 * Provider-agnostic catalog types returned by extensions.
 *
 * Image resources are ready-to-send GET requests, so a caller can fetch a
 * poster or thumbnail with the same `HttpClient` it already holds.
 */

import type { HttpRequest } from '@tidewire/http';

export interface Series {
  id: string;
  title: string;
  posterResource?: HttpRequest;
  synopsis?: string;
  /** Provider-specific kind, e.g. `anime` */
  type?: string;
}

export interface SeriesPage {
  series: Series[];
  hasNextPage: boolean;
}

export interface Episode {
  id: string;
  number: number;
  title?: string;
  description?: string;
  thumbnailResource?: HttpRequest;
}

export interface EpisodesPage {
  episodes: Episode[];
  hasNextPage: boolean;
}

export interface Filter {
  id: string;
  displayName: string;
}

/**
 * A group of filters the provider can search by, e.g. genres
 */
export interface FilterCategory {
  id: string;
  displayName: string;
  filters: Filter[];
}

/**
 * Filters selected for a search, keyed by category id
 */
export interface SearchFilter {
  id: string;
  values: string[];
}

export interface Video {
  videoResource: HttpRequest;
  server: string;
  /** Width and height in pixels */
  resolution: [number, number];
}
