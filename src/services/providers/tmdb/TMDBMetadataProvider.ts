import { TMDBClient } from './TMDBClient.js';
import { MetadataProvider, ProviderMatch, ProviderMediaType } from '../../../types/providers/metadata.js';
import { logger } from '../../../middleware/logging.js';
import { getErrorMessage } from '../../../utils/errorHandling.js';

/**
 * Reduces TMDB search results to the first match. Keyword lookups never
 * fail the caller: an error is logged and reported as no keywords.
 */
export class TMDBMetadataProvider implements MetadataProvider {
  constructor(private readonly client: TMDBClient) {}

  async searchMovie(title: string, year?: number): Promise<ProviderMatch | null> {
    const response = await this.client.searchMovies(title, year);
    const first = response.results[0];
    if (!first) {
      return null;
    }
    const releaseYear = parseYear(first.release_date);
    return {
      id: first.id,
      title: first.title,
      ...(releaseYear !== undefined && { year: releaseYear }),
    };
  }

  async searchTv(title: string): Promise<ProviderMatch | null> {
    const response = await this.client.searchTv(title);
    const first = response.results[0];
    if (!first) {
      return null;
    }
    const airYear = parseYear(first.first_air_date);
    return {
      id: first.id,
      title: first.name,
      ...(airYear !== undefined && { year: airYear }),
    };
  }

  async getKeywords(id: number, mediaType: ProviderMediaType): Promise<string[]> {
    try {
      const keywords =
        mediaType === 'movie' ? await this.client.getMovieKeywords(id) : await this.client.getTvKeywords(id);
      return keywords.map(keyword => keyword.name);
    } catch (error) {
      logger.warn('[TMDBMetadataProvider] Keyword lookup failed', {
        service: 'TMDBMetadataProvider',
        operation: 'getKeywords',
        providerId: id,
        mediaType,
        error: getErrorMessage(error),
      });
      return [];
    }
  }
}

function parseYear(date: string | null | undefined): number | undefined {
  if (!date || date.length < 4) {
    return undefined;
  }
  const year = parseInt(date.slice(0, 4), 10);
  return isNaN(year) ? undefined : year;
}
