/**
 * TMDB API response shapes, validated at the client boundary.
 * Only the fields the classifier reads are declared; zod strips the rest.
 * @see https://developer.themoviedb.org/reference/intro/getting-started
 */

import { z } from 'zod';

export interface TMDBClientOptions {
  apiKey: string;
  baseUrl?: string;
  language?: string;
  timeoutMs?: number;
  rateLimit?: number;
  rateLimitWindow?: number;
}

const nullableDate = z.string().nullish();

export const tmdbMovieResultSchema = z.object({
  id: z.number(),
  title: z.string(),
  original_title: z.string().optional(),
  release_date: nullableDate,
});

export const tmdbTvResultSchema = z.object({
  id: z.number(),
  name: z.string(),
  original_name: z.string().optional(),
  first_air_date: nullableDate,
});

export const tmdbMovieSearchResponseSchema = z.object({
  page: z.number().optional(),
  results: z.array(tmdbMovieResultSchema),
  total_results: z.number().optional(),
});

export const tmdbTvSearchResponseSchema = z.object({
  page: z.number().optional(),
  results: z.array(tmdbTvResultSchema),
  total_results: z.number().optional(),
});

export const tmdbKeywordSchema = z.object({
  id: z.number(),
  name: z.string(),
});

// Movies list keywords under `keywords`, TV shows under `results`
export const tmdbMovieKeywordsResponseSchema = z.object({
  id: z.number(),
  keywords: z.array(tmdbKeywordSchema),
});

export const tmdbTvKeywordsResponseSchema = z.object({
  id: z.number(),
  results: z.array(tmdbKeywordSchema),
});

export const tmdbErrorSchema = z.object({
  status_code: z.number().optional(),
  status_message: z.string().optional(),
});

export type TMDBMovieResult = z.infer<typeof tmdbMovieResultSchema>;
export type TMDBTvResult = z.infer<typeof tmdbTvResultSchema>;
export type TMDBMovieSearchResponse = z.infer<typeof tmdbMovieSearchResponseSchema>;
export type TMDBTvSearchResponse = z.infer<typeof tmdbTvSearchResponseSchema>;
export type TMDBKeyword = z.infer<typeof tmdbKeywordSchema>;
