import { ClassificationResult, ParsedFilename } from '../../types/media.js';
import { MetadataProvider } from '../../types/providers/metadata.js';
import { ClassificationError } from '../../errors/index.js';
import { logger } from '../../middleware/logging.js';
import { parseFilename } from './filenameParser.js';

const ANIME_KEYWORD = 'anime';

/**
 * Turns a file name into a ClassificationResult through the metadata
 * provider. Provider errors propagate to the caller.
 */
export class MetadataClassifier {
  /**
   * @param provider lookups are skipped when null, so every file is unknown
   */
  constructor(private readonly provider: MetadataProvider | null) {}

  async classify(filename: string): Promise<ClassificationResult> {
    return this.classifyParsed(parseFilename(filename));
  }

  async classifyParsed(parsed: ParsedFilename): Promise<ClassificationResult> {
    if (!parsed.title) {
      throw new ClassificationError(parsed.original, `Could not extract a title from '${parsed.original}'`, {
        service: 'MetadataClassifier',
        operation: 'classify',
      });
    }

    const unknown: ClassificationResult = {
      category: 'unknown',
      title: parsed.title,
      isAnime: false,
      ...(parsed.year !== undefined && { year: parsed.year }),
      ...(parsed.season !== undefined && { season: parsed.season }),
      ...(parsed.episode !== undefined && { episode: parsed.episode }),
    };

    if (!this.provider) {
      return unknown;
    }

    if (parsed.kind === 'episode') {
      const show = await this.provider.searchTv(parsed.title);
      if (!show) {
        logger.info('[MetadataClassifier] No TV match', {
          service: 'MetadataClassifier',
          operation: 'classify',
          title: parsed.title,
        });
        return unknown;
      }
      const isAnime = await this.hasAnimeKeyword(show.id, 'tv');
      return {
        category: isAnime ? 'anime' : 'tv',
        title: show.title,
        season: parsed.season ?? 1,
        episode: parsed.episode ?? 1,
        isAnime,
        providerId: show.id,
      };
    }

    const movie = await this.provider.searchMovie(parsed.title, parsed.year);
    if (!movie) {
      logger.info('[MetadataClassifier] No movie match', {
        service: 'MetadataClassifier',
        operation: 'classify',
        title: parsed.title,
        year: parsed.year,
      });
      return unknown;
    }
    const isAnime = await this.hasAnimeKeyword(movie.id, 'movie');
    const year = movie.year ?? parsed.year;
    return {
      category: isAnime ? 'anime' : 'movie',
      title: movie.title,
      ...(year !== undefined && { year }),
      isAnime,
      providerId: movie.id,
    };
  }

  private async hasAnimeKeyword(id: number, mediaType: 'movie' | 'tv'): Promise<boolean> {
    if (!this.provider) {
      return false;
    }
    const keywords = await this.provider.getKeywords(id, mediaType);
    return keywords.some(keyword => keyword.toLowerCase() === ANIME_KEYWORD);
  }
}
