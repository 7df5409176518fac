import dotenv from 'dotenv';
import path from 'path';
import { z } from 'zod';
import { AppConfig, LogLevel } from './types.js';
import { buildDefaultConfig, DEFAULT_BASE_DIR } from './defaults.js';
import { MIB } from './constants.js';
import { ConfigurationError } from '../errors/index.js';

const appConfigSchema = z
  .object({
    adminIds: z.array(z.number().int()),
    downloads: z.object({
      maxConcurrent: z.number().int().min(1, 'MAX_CONCURRENT_DOWNLOADS must be at least 1'),
      maxDurationSeconds: z.number().int().positive(),
      largeFileThresholdBytes: z.number().int().positive(),
      progressIntervalRegularSeconds: z.number().positive(),
      progressIntervalLargeSeconds: z.number().positive(),
      mediaExtensions: z.array(z.string().startsWith('.')).min(1),
    }),
    confidence: z.object({
      low: z.number().min(0).max(1),
      high: z.number().min(0).max(1),
      bulkSimilarity: z.number().min(0).max(1),
    }),
    sessions: z.object({
      ttlMinutes: z.number().positive(),
      sweepIntervalSeconds: z.number().min(0),
    }),
    commandRate: z.object({
      maxCommands: z.number().int().min(1, 'COMMAND_RATE_LIMIT must be at least 1'),
      windowSeconds: z.number().int().positive(),
    }),
    shutdownTimeoutSeconds: z.number().positive(),
  })
  .refine(config => config.confidence.low <= config.confidence.high, {
    message: 'LOW_CONFIDENCE must not exceed HIGH_CONFIDENCE',
    path: ['confidence'],
  });

export class ConfigManager {
  private static instance: ConfigManager | undefined;
  private config: AppConfig;

  constructor(private readonly env: NodeJS.ProcessEnv = process.env) {
    this.config = this.loadConfig();
  }

  static getInstance(): ConfigManager {
    if (!ConfigManager.instance) {
      dotenv.config();
      const manager = new ConfigManager();
      manager.validate();
      ConfigManager.instance = manager;
    }
    return ConfigManager.instance;
  }

  private loadConfig(): AppConfig {
    const baseDir = path.resolve(this.getString('BASE_DIR', DEFAULT_BASE_DIR));
    const config = buildDefaultConfig(baseDir);

    // Chat transport credentials are handed to the adapter untouched
    config.transport.apiId = this.getOptionalNumber('API_ID');
    config.transport.apiHash = this.env.API_HASH;
    config.transport.botToken = this.env.BOT_TOKEN;
    config.adminIds = this.getNumberArray('ADMIN_IDS');

    // Directories
    config.paths.downloads = this.getPath('DOWNLOAD_DIR', config.paths.downloads);
    config.paths.movies = this.getPath('MOVIES_DIR', config.paths.movies);
    config.paths.tv = this.getPath('TV_DIR', config.paths.tv);
    config.paths.anime = this.getPath('ANIME_DIR', config.paths.anime);
    config.paths.music = this.getPath('MUSIC_DIR', config.paths.music);
    config.paths.other = this.getPath('OTHER_DIR', config.paths.other);
    config.paths.logs = this.getPath('LOG_DIR', config.paths.logs);
    config.paths.lowConfidenceLog = this.getPath('LOW_CONFIDENCE_LOG', config.paths.lowConfidenceLog);
    config.database.filename = this.getPath('DB_FILE', config.database.filename);

    // Provider
    config.providers.tmdb.apiKey = this.env.TMDB_API_KEY;
    config.providers.tmdb.language = this.getString('TMDB_LANGUAGE', config.providers.tmdb.language);

    // Downloads
    config.downloads.maxConcurrent = this.getNumber('MAX_CONCURRENT_DOWNLOADS', config.downloads.maxConcurrent);
    config.downloads.maxDurationSeconds = this.getNumber('MAX_DOWNLOAD_DURATION', config.downloads.maxDurationSeconds);
    config.downloads.largeFileThresholdBytes =
      this.getNumber('LARGE_FILE_THRESHOLD_MB', config.downloads.largeFileThresholdBytes / MIB) * MIB;
    config.downloads.progressIntervalRegularSeconds = this.getNumber(
      'PROGRESS_INTERVAL_REGULAR',
      config.downloads.progressIntervalRegularSeconds
    );
    config.downloads.progressIntervalLargeSeconds = this.getNumber(
      'PROGRESS_INTERVAL_LARGE',
      config.downloads.progressIntervalLargeSeconds
    );
    const extensions = this.getStringArray('MEDIA_EXTENSIONS');
    if (extensions.length > 0) {
      config.downloads.mediaExtensions = extensions.map(ext =>
        (ext.startsWith('.') ? ext : `.${ext}`).toLowerCase()
      );
    }

    // Confidence gate
    config.confidence.low = this.getFloat('LOW_CONFIDENCE', config.confidence.low);
    config.confidence.high = this.getFloat('HIGH_CONFIDENCE', config.confidence.high);
    config.confidence.bulkSimilarity = this.getFloat('BULK_SIMILARITY', config.confidence.bulkSimilarity);

    // Sessions and shutdown
    config.sessions.ttlMinutes = this.getNumber('SESSION_TTL_MINUTES', config.sessions.ttlMinutes);
    config.sessions.sweepIntervalSeconds = this.getNumber(
      'SESSION_SWEEP_SECONDS',
      config.sessions.sweepIntervalSeconds
    );
    config.commandRate.maxCommands = this.getNumber('COMMAND_RATE_LIMIT', config.commandRate.maxCommands);
    config.commandRate.windowSeconds = this.getNumber('COMMAND_RATE_WINDOW', config.commandRate.windowSeconds);
    config.shutdownTimeoutSeconds = this.getNumber('SHUTDOWN_TIMEOUT_SECONDS', config.shutdownTimeoutSeconds);

    // Logging
    config.logging.level = this.getEnum<LogLevel>('LOG_LEVEL', config.logging.level, [
      'error',
      'warn',
      'info',
      'debug',
    ]);
    config.logging.file.enabled = this.getBoolean('LOG_FILE_ENABLED', config.logging.file.enabled);
    config.logging.file.path = config.paths.logs;
    config.logging.console.enabled = this.getBoolean('LOG_CONSOLE_ENABLED', config.logging.console.enabled);

    return config;
  }

  private getString(key: string, defaultValue: string): string {
    const value = this.env[key];
    return value && value.trim() !== '' ? value.trim() : defaultValue;
  }

  private getPath(key: string, defaultValue: string): string {
    return path.resolve(this.getString(key, defaultValue));
  }

  private getNumber(key: string, defaultValue: number): number {
    const value = this.env[key];
    if (!value) {
      return defaultValue;
    }
    const parsed = parseInt(value, 10);
    if (isNaN(parsed)) {
      throw new ConfigurationError(key, `Environment variable ${key} must be a valid number`);
    }
    return parsed;
  }

  private getOptionalNumber(key: string): number | undefined {
    const value = this.env[key];
    return value ? this.getNumber(key, 0) : undefined;
  }

  private getFloat(key: string, defaultValue: number): number {
    const value = this.env[key];
    if (!value) {
      return defaultValue;
    }
    const parsed = parseFloat(value);
    if (isNaN(parsed)) {
      throw new ConfigurationError(key, `Environment variable ${key} must be a valid number`);
    }
    return parsed;
  }

  private getBoolean(key: string, defaultValue: boolean): boolean {
    const value = this.env[key];
    if (!value) {
      return defaultValue;
    }
    return value.toLowerCase() === 'true' || value === '1';
  }

  private getStringArray(key: string): string[] {
    const value = this.env[key];
    if (!value) {
      return [];
    }
    return value
      .split(',')
      .map(item => item.trim())
      .filter(item => item.length > 0);
  }

  private getNumberArray(key: string): number[] {
    return this.getStringArray(key).map(item => {
      const parsed = parseInt(item, 10);
      if (isNaN(parsed)) {
        throw new ConfigurationError(key, `Environment variable ${key} must list numeric ids`);
      }
      return parsed;
    });
  }

  private getEnum<T extends string>(key: string, defaultValue: T, validValues: readonly T[]): T {
    const value = this.env[key];
    if (!value) {
      return defaultValue;
    }
    const match = validValues.find(candidate => candidate === value);
    if (!match) {
      throw new ConfigurationError(key, `Environment variable ${key} must be one of: ${validValues.join(', ')}`);
    }
    return match;
  }

  getConfig(): AppConfig {
    return this.config;
  }

  reload(): void {
    this.config = this.loadConfig();
  }

  /**
   * Validate the merged configuration, throwing on the first group of problems
   */
  validate(): void {
    const result = appConfigSchema.safeParse(this.config);
    if (!result.success) {
      const issues = result.error.issues.map(issue => `${issue.path.join('.')}: ${issue.message}`);
      throw new ConfigurationError('config', `Configuration validation failed:\n${issues.join('\n')}`);
    }
  }
}
