/**
 * zod schemas for the Kitsu JSON:API responses this extension reads.
 * Only the fields mapped into catalog types are declared; the rest pass through unchecked.
 */

import { z } from 'zod';

const imageResourceSchema = z.object({
  original: z.string().nullish(),
});

export const animeDataSchema = z.object({
  id: z.string(),
  type: z.string(),
  attributes: z.object({
    canonicalTitle: z.string(),
    synopsis: z.string().nullish(),
    posterImage: imageResourceSchema.nullish(),
  }),
});

export const episodeDataSchema = z.object({
  id: z.string(),
  attributes: z.object({
    number: z.number().int().nonnegative(),
    canonicalTitle: z.string().nullish(),
    synopsis: z.string().nullish(),
    thumbnail: imageResourceSchema.nullish(),
  }),
});

const linksSchema = z
  .object({
    next: z.string().nullish(),
  })
  .nullish();

export const animeResponseSchema = z.object({
  data: animeDataSchema,
});

export const searchResponseSchema = z.object({
  data: z.array(animeDataSchema),
  links: linksSchema,
});

export const episodesResponseSchema = z.object({
  data: z.array(episodeDataSchema),
  links: linksSchema,
});

export type AnimeData = z.infer<typeof animeDataSchema>;
export type EpisodeData = z.infer<typeof episodeDataSchema>;
export type AnimeResponse = z.infer<typeof animeResponseSchema>;
export type SearchResponse = z.infer<typeof searchResponseSchema>;
export type EpisodesResponse = z.infer<typeof episodesResponseSchema>;
