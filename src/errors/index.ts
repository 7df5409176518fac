export {
  ApplicationError,
  ErrorCode,
  ValidationError,
  ResourceNotFoundError,
  AuthenticationError,
  AuthorizationError,
  ConfigurationError,
  InvalidStateError,
  DatabaseError,
  DuplicateKeyError,
  FileSystemError,
  FileNotFoundError,
  PermissionError,
  StorageError,
  NetworkError,
  ProviderError,
  RateLimitError,
  ProviderServerError,
  DownloadCancelledError,
  ClassificationError,
} from './ApplicationError.js';
export type { ErrorContext, ApplicationErrorOptions } from './ApplicationError.js';

export {
  RetryStrategy,
  DEFAULT_RETRY_POLICY,
  NETWORK_RETRY_POLICY,
  FILESYSTEM_RETRY_POLICY,
  TRANSIENT_FS_CODES,
  createRetryStrategy,
} from './RetryStrategy.js';
export type { RetryPolicy, RetryResult } from './RetryStrategy.js';
