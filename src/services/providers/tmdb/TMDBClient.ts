/**
 * TMDB v3 client limited to the search and keyword endpoints.
 *
 * Every GET passes through the network retry policy and a sliding-window
 * rate limiter, and its body is validated with zod before it is returned.
 */

import axios, { AxiosAdapter, AxiosError, AxiosInstance } from 'axios';
import { z } from 'zod';
import { logger } from '../../../middleware/logging.js';
import { RateLimiter } from './RateLimiter.js';
import { toError } from '../../../utils/errorHandling.js';
import {
  ApplicationError,
  AuthenticationError,
  ResourceNotFoundError,
  RateLimitError,
  ProviderError,
  ProviderServerError,
  NetworkError,
  ErrorCode,
  ErrorContext,
  NETWORK_RETRY_POLICY,
  RetryPolicy,
  RetryStrategy,
} from '../../../errors/index.js';
import {
  TMDBClientOptions,
  TMDBKeyword,
  TMDBMovieSearchResponse,
  TMDBTvSearchResponse,
  tmdbErrorSchema,
  tmdbMovieKeywordsResponseSchema,
  tmdbMovieSearchResponseSchema,
  tmdbTvKeywordsResponseSchema,
  tmdbTvSearchResponseSchema,
} from '../../../types/providers/tmdb.js';

export interface TMDBClientInternals {
  /** Replaces the HTTP adapter; used to answer requests in process */
  adapter?: AxiosAdapter;
  retryPolicy?: Partial<RetryPolicy>;
}

export class TMDBClient {
  private readonly client: AxiosInstance;
  private readonly rateLimiter: RateLimiter;
  private readonly retryStrategy: RetryStrategy;
  private readonly apiKey: string;
  private readonly language: string;

  constructor(options: TMDBClientOptions, internals: TMDBClientInternals = {}) {
    this.apiKey = options.apiKey;
    this.language = options.language || 'en-US';

    this.rateLimiter = new RateLimiter(options.rateLimit ?? 40, options.rateLimitWindow ?? 10);

    this.retryStrategy = new RetryStrategy({
      ...NETWORK_RETRY_POLICY,
      ...internals.retryPolicy,
      onRetry: (error, attemptNumber, delayMs) => {
        logger.info('[TMDBClient] Retrying request', {
          service: 'TMDBClient',
          error: error.message,
          attemptNumber,
          delayMs,
        });
      },
    });

    this.client = axios.create({
      baseURL: options.baseUrl || 'https://api.themoviedb.org/3',
      headers: {
        'Content-Type': 'application/json;charset=utf-8',
      },
      timeout: options.timeoutMs ?? 10000,
      ...(internals.adapter && { adapter: internals.adapter }),
    });
  }

  searchMovies(query: string, year?: number): Promise<TMDBMovieSearchResponse> {
    return this.request('/search/movie', tmdbMovieSearchResponseSchema, {
      ...SEARCH_DEFAULTS,
      query,
      ...(year !== undefined && { year }),
    });
  }

  searchTv(query: string): Promise<TMDBTvSearchResponse> {
    return this.request('/search/tv', tmdbTvSearchResponseSchema, { ...SEARCH_DEFAULTS, query });
  }

  async getMovieKeywords(movieId: number): Promise<TMDBKeyword[]> {
    return (await this.request(`/movie/${movieId}/keywords`, tmdbMovieKeywordsResponseSchema)).keywords;
  }

  async getTvKeywords(tvId: number): Promise<TMDBKeyword[]> {
    return (await this.request(`/tv/${tvId}/keywords`, tmdbTvKeywordsResponseSchema)).results;
  }

  private request<T>(endpoint: string, schema: z.ZodType<T, z.ZodTypeDef, unknown>, params: QueryParams = {}): Promise<T> {
    return this.retryStrategy.execute(
      () =>
        this.rateLimiter.execute(async () => {
          const data = await this.client
            .get<unknown>(endpoint, { params: { api_key: this.apiKey, language: this.language, ...params } })
            .then(
              (response) => response.data,
              (error: unknown) => {
                throw toProviderFailure(error, endpoint);
              }
            );

          const parsed = schema.safeParse(data);
          if (!parsed.success) {
            throw new ProviderError(
              `Unexpected TMDB response from ${endpoint}`,
              PROVIDER,
              ErrorCode.PROVIDER_INVALID_RESPONSE,
              false,
              { operation: 'request', metadata: { endpoint, issues: parsed.error.issues.map((issue) => issue.message) } }
            );
          }
          logger.debug('[TMDBClient] Request answered', { service: 'TMDBClient', endpoint });
          return parsed.data;
        }),
      `TMDB ${endpoint}`
    );
  }
}

type QueryParams = Record<string, string | number | boolean>;

const PROVIDER = 'TMDB';
const SEARCH_DEFAULTS: QueryParams = { include_adult: false, page: 1 };
const DEFAULT_RETRY_AFTER_SECONDS = 60;

/**
 * Map an axios failure onto the provider error family. 401 and 404 are
 * final; 429, 5xx and transport failures are retryable.
 */
function toProviderFailure(error: unknown, endpoint: string): ApplicationError {
  const context: ErrorContext = { service: 'TMDBClient', operation: 'request', metadata: { endpoint } };

  if (!axios.isAxiosError(error)) {
    return new NetworkError(`TMDB request failed: ${endpoint}`, ErrorCode.NETWORK_CONNECTION_FAILED, endpoint, context, toError(error));
  }
  if (!error.response) {
    const timedOut = error.code === 'ECONNABORTED' || error.code === 'ETIMEDOUT';
    return new NetworkError(
      timedOut ? `TMDB request timeout: ${endpoint}` : `TMDB network error: ${error.message}`,
      timedOut ? ErrorCode.NETWORK_TIMEOUT : ErrorCode.NETWORK_CONNECTION_FAILED,
      endpoint,
      { ...context, metadata: { endpoint, code: error.code } },
      error
    );
  }

  const { status } = error.response;
  const statusContext: ErrorContext = { ...context, metadata: { endpoint, status } };
  const message = statusMessage(error);
  switch (status) {
    case 401:
      return new AuthenticationError(`TMDB authentication failed: ${message}`, statusContext, error);
    case 404:
      return new ResourceNotFoundError('TMDB resource', endpoint, `Resource not found: ${message}`, statusContext);
    case 429:
      return new RateLimitError(PROVIDER, retryAfterSeconds(error), `Rate limit exceeded: ${message}`, statusContext);
    default:
      return new ProviderServerError(
        PROVIDER,
        status,
        status >= 500 ? `Server error: ${message}` : `API error (${status}): ${message}`,
        statusContext,
        error
      );
  }
}

function statusMessage(error: AxiosError): string {
  const body = tmdbErrorSchema.safeParse(error.response?.data);
  return (body.success && body.data.status_message) || error.message;
}

function retryAfterSeconds(error: AxiosError): number {
  const header: unknown = error.response?.headers['retry-after'];
  const seconds = typeof header === 'string' ? Number.parseInt(header, 10) : Number.NaN;
  return Number.isNaN(seconds) ? DEFAULT_RETRY_AFTER_SECONDS : seconds;
}
