import path from 'path';
import { AppConfig } from './types.js';
import { DEFAULT_MEDIA_EXTENSIONS, MIB } from './constants.js';

export const DEFAULT_BASE_DIR = '/data/jellyfin';

/**
 * Build the default configuration rooted at a base directory.
 * Every library folder defaults to a named child of the base.
 */
export function buildDefaultConfig(baseDir: string = DEFAULT_BASE_DIR): AppConfig {
  return {
    transport: {},
    adminIds: [],
    paths: {
      baseDir,
      downloads: path.join(baseDir, 'Downloads'),
      movies: path.join(baseDir, 'Movies'),
      tv: path.join(baseDir, 'TV'),
      anime: path.join(baseDir, 'Anime'),
      music: path.join(baseDir, 'Music'),
      other: path.join(baseDir, 'Other'),
      logs: path.join(baseDir, 'logs'),
      lowConfidenceLog: path.join(baseDir, 'low_confidence_log.csv'),
    },
    database: {
      filename: path.join(baseDir, 'mediashelf.sqlite'),
    },
    providers: {
      tmdb: {
        baseUrl: 'https://api.themoviedb.org/3',
        language: 'en-US',
        rateLimit: 40,
        rateLimitWindow: 10, // 40 requests per 10 seconds
        timeoutMs: 10000,
      },
    },
    downloads: {
      maxConcurrent: 3,
      maxDurationSeconds: 7200, // 2 hours
      largeFileThresholdBytes: 500 * MIB,
      progressIntervalRegularSeconds: 15,
      progressIntervalLargeSeconds: 60,
      mediaExtensions: [...DEFAULT_MEDIA_EXTENSIONS],
    },
    confidence: {
      low: 0.6,
      high: 0.8,
      bulkSimilarity: 0.8,
    },
    sessions: {
      ttlMinutes: 30,
      sweepIntervalSeconds: 300,
    },
    commandRate: {
      maxCommands: 10,
      windowSeconds: 60,
    },
    files: {
      retryAttempts: 3,
      retryInitialDelayMs: 1000,
      retryMaxDelayMs: 10000,
    },
    logging: {
      level: 'info',
      file: {
        enabled: true,
        path: path.join(baseDir, 'logs'),
        maxSize: '10',
        maxFiles: 14,
      },
      console: {
        enabled: true,
        colorize: true,
      },
    },
    shutdownTimeoutSeconds: 60,
  };
}

export const defaultConfig: AppConfig = buildDefaultConfig();
