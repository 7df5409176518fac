export type LogLevel = 'error' | 'warn' | 'info' | 'debug';

export interface TransportConfig {
  apiId?: number | undefined;
  apiHash?: string | undefined;
  botToken?: string | undefined;
}

export interface PathsConfig {
  baseDir: string;
  downloads: string;
  movies: string;
  tv: string;
  anime: string;
  music: string;
  other: string;
  logs: string;
  lowConfidenceLog: string;
}

export interface DatabaseConfig {
  filename: string;
}

export interface ProviderConfig {
  tmdb: {
    apiKey?: string | undefined;
    baseUrl: string;
    language: string;
    rateLimit: number;
    rateLimitWindow: number; // seconds
    timeoutMs: number;
  };
}

export interface DownloadConfig {
  maxConcurrent: number;
  maxDurationSeconds: number;
  largeFileThresholdBytes: number;
  progressIntervalRegularSeconds: number;
  progressIntervalLargeSeconds: number;
  mediaExtensions: string[];
}

export interface ConfidenceConfig {
  low: number;
  high: number;
  bulkSimilarity: number;
}

export interface CommandRateConfig {
  maxCommands: number;
  windowSeconds: number;
}

export interface SessionConfig {
  ttlMinutes: number;
  sweepIntervalSeconds: number;
}

export interface FileOperationsConfig {
  retryAttempts: number;
  retryInitialDelayMs: number;
  retryMaxDelayMs: number;
}

export interface LoggingConfig {
  level: LogLevel;
  file: {
    enabled: boolean;
    path: string;
    maxSize: string;
    maxFiles: number;
  };
  console: {
    enabled: boolean;
    colorize: boolean;
  };
}

export interface AppConfig {
  transport: TransportConfig;
  adminIds: number[];
  paths: PathsConfig;
  database: DatabaseConfig;
  providers: ProviderConfig;
  downloads: DownloadConfig;
  confidence: ConfidenceConfig;
  sessions: SessionConfig;
  commandRate: CommandRateConfig;
  files: FileOperationsConfig;
  logging: LoggingConfig;
  shutdownTimeoutSeconds: number;
}
