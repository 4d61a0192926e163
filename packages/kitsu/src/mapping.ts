import { HttpRequest, parseAbsoluteUrl } from '@tidewire/http';

import type { AnimeData, EpisodeData } from './schema.js';
import type { Episode, Series } from './types.js';

/**
 * Turns an image URL into a GET request. Unparsable URLs are dropped.
 */
export function toImageResource(original: string | null | undefined): HttpRequest | undefined {
  if (original === null || original === undefined) {
    return undefined;
  }
  const url = parseAbsoluteUrl(original);
  return url ? new HttpRequest('GET', url) : undefined;
}

export function toSeries(anime: AnimeData): Series {
  const { canonicalTitle, synopsis, posterImage } = anime.attributes;
  const posterResource = toImageResource(posterImage?.original);

  return {
    id: anime.id,
    title: canonicalTitle,
    ...(posterResource && { posterResource }),
    ...(typeof synopsis === 'string' && { synopsis }),
    type: anime.type,
  };
}

export function toEpisode(episode: EpisodeData): Episode {
  const { number, canonicalTitle, synopsis, thumbnail } = episode.attributes;
  const thumbnailResource = toImageResource(thumbnail?.original);

  return {
    id: episode.id,
    number,
    ...(typeof canonicalTitle === 'string' && { title: canonicalTitle }),
    ...(typeof synopsis === 'string' && { description: synopsis }),
    ...(thumbnailResource && { thumbnailResource }),
  };
}
