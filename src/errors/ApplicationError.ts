import { CancelReason } from '../types/download.js';

/**
 * Machine-readable failure codes, grouped by the layer that raises them.
 */
export enum ErrorCode {
  VALIDATION_INPUT_INVALID = 'VALIDATION_INPUT_INVALID',
  RESOURCE_NOT_FOUND = 'RESOURCE_NOT_FOUND',
  CONFIG_INVALID = 'CONFIG_INVALID',
  SYSTEM_INVALID_STATE = 'SYSTEM_INVALID_STATE',

  AUTH_AUTHENTICATION_FAILED = 'AUTH_AUTHENTICATION_FAILED',
  AUTH_AUTHORIZATION_DENIED = 'AUTH_AUTHORIZATION_DENIED',

  DATABASE_CONNECTION_FAILED = 'DATABASE_CONNECTION_FAILED',
  DATABASE_QUERY_FAILED = 'DATABASE_QUERY_FAILED',
  DATABASE_DUPLICATE_KEY = 'DATABASE_DUPLICATE_KEY',

  FS_FILE_NOT_FOUND = 'FS_FILE_NOT_FOUND',
  FS_PERMISSION_DENIED = 'FS_PERMISSION_DENIED',
  FS_STORAGE_FULL = 'FS_STORAGE_FULL',
  FS_WRITE_FAILED = 'FS_WRITE_FAILED',

  NETWORK_CONNECTION_FAILED = 'NETWORK_CONNECTION_FAILED',
  NETWORK_TIMEOUT = 'NETWORK_TIMEOUT',
  PROVIDER_RATE_LIMIT = 'PROVIDER_RATE_LIMIT',
  PROVIDER_SERVER_ERROR = 'PROVIDER_SERVER_ERROR',
  PROVIDER_INVALID_RESPONSE = 'PROVIDER_INVALID_RESPONSE',

  DOWNLOAD_CANCELLED = 'DOWNLOAD_CANCELLED',
  DOWNLOAD_TIMED_OUT = 'DOWNLOAD_TIMED_OUT',
  CLASSIFICATION_FAILED = 'CLASSIFICATION_FAILED',
}

/**
 * Structured fields merged into log lines and error_log rows
 */
export interface ErrorContext {
  service?: string;
  operation?: string;
  entityType?: string;
  entityId?: string | number;
  attemptNumber?: number;
  metadata?: Record<string, unknown>;
}

export interface ApplicationErrorOptions {
  retryable?: boolean;
  context?: ErrorContext;
  cause?: Error;
}

function withMetadata(context: ErrorContext | undefined, extra: Record<string, unknown>): ErrorContext {
  return { ...context, metadata: { ...context?.metadata, ...extra } };
}

export abstract class ApplicationError extends Error {
  public readonly code: ErrorCode;
  /** Read by RetryStrategy; false unless a subclass says otherwise */
  public readonly retryable: boolean;
  public readonly context: ErrorContext;

  protected constructor(message: string, code: ErrorCode, options: ApplicationErrorOptions = {}) {
    super(message, options.cause ? { cause: options.cause } : undefined);
    this.name = new.target.name;
    this.code = code;
    this.retryable = options.retryable ?? false;
    this.context = options.context ?? {};
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

// --- caller mistakes --------------------------------------------------------

export class ValidationError extends ApplicationError {
  constructor(message: string, context?: ErrorContext, cause?: Error) {
    super(message, ErrorCode.VALIDATION_INPUT_INVALID, { context, cause });
  }
}

export class ResourceNotFoundError extends ApplicationError {
  constructor(
    public readonly resourceType: string,
    public readonly resourceId: string | number,
    message?: string,
    context?: ErrorContext
  ) {
    super(message ?? `${resourceType} not found: ${resourceId}`, ErrorCode.RESOURCE_NOT_FOUND, {
      context: { ...context, entityType: resourceType, entityId: resourceId },
    });
  }
}

export class AuthenticationError extends ApplicationError {
  constructor(message: string, context?: ErrorContext, cause?: Error) {
    super(message, ErrorCode.AUTH_AUTHENTICATION_FAILED, { context, cause });
  }
}

/**
 * A chat user asked for something their role does not allow
 */
export class AuthorizationError extends ApplicationError {
  constructor(
    public readonly action: string,
    public readonly userId: number,
    message?: string,
    context?: ErrorContext
  ) {
    super(message ?? `User ${userId} is not authorized to ${action}`, ErrorCode.AUTH_AUTHORIZATION_DENIED, {
      context: withMetadata({ ...context, operation: action }, { userId }),
    });
  }
}

export class ConfigurationError extends ApplicationError {
  constructor(public readonly configKey: string, message?: string, context?: ErrorContext) {
    super(message ?? `Configuration error: ${configKey}`, ErrorCode.CONFIG_INVALID, {
      context: withMetadata(context, { configKey }),
    });
  }
}

export class InvalidStateError extends ApplicationError {
  constructor(
    public readonly expectedState: string,
    public readonly actualState: string,
    message?: string,
    context?: ErrorContext
  ) {
    super(
      message ?? `Invalid state: expected '${expectedState}', got '${actualState}'`,
      ErrorCode.SYSTEM_INVALID_STATE,
      { context: withMetadata(context, { expectedState, actualState }) }
    );
  }
}

// --- storage ----------------------------------------------------------------

export class DatabaseError extends ApplicationError {
  constructor(
    message: string,
    code: ErrorCode = ErrorCode.DATABASE_QUERY_FAILED,
    retryable = true,
    context?: ErrorContext,
    cause?: Error
  ) {
    super(message, code, { retryable, context, cause });
  }
}

export class DuplicateKeyError extends DatabaseError {
  constructor(
    public readonly table: string,
    public readonly key: string,
    message?: string,
    context?: ErrorContext
  ) {
    super(
      message ?? `Duplicate key in table '${table}': ${key}`,
      ErrorCode.DATABASE_DUPLICATE_KEY,
      false,
      withMetadata(context, { table, key })
    );
  }
}

export class FileSystemError extends ApplicationError {
  constructor(
    message: string,
    code: ErrorCode,
    public readonly path: string,
    retryable = false,
    context?: ErrorContext,
    cause?: Error
  ) {
    super(message, code, { retryable, context: withMetadata(context, { path }), cause });
  }
}

export class FileNotFoundError extends FileSystemError {
  constructor(path: string, message?: string, context?: ErrorContext) {
    super(message ?? `File not found: ${path}`, ErrorCode.FS_FILE_NOT_FOUND, path, false, context);
  }
}

export class PermissionError extends FileSystemError {
  constructor(path: string, public readonly operation: string, message?: string, context?: ErrorContext) {
    super(message ?? `Permission denied for ${operation}: ${path}`, ErrorCode.FS_PERMISSION_DENIED, path, false, {
      ...context,
      operation,
    });
  }
}

/**
 * Raised before a transfer starts when the download volume cannot hold it
 */
export class StorageError extends FileSystemError {
  constructor(
    path: string,
    public readonly requiredBytes: number,
    public readonly availableBytes: number,
    context?: ErrorContext
  ) {
    super(
      `Insufficient space at ${path}: need ${requiredBytes} bytes, ${availableBytes} available`,
      ErrorCode.FS_STORAGE_FULL,
      path,
      false,
      withMetadata(context, { requiredBytes, availableBytes })
    );
  }
}

// --- metadata provider ------------------------------------------------------

export class NetworkError extends ApplicationError {
  constructor(
    message: string,
    code: ErrorCode = ErrorCode.NETWORK_CONNECTION_FAILED,
    public readonly url?: string,
    context?: ErrorContext,
    cause?: Error
  ) {
    super(message, code, { retryable: true, context: withMetadata(context, { url }), cause });
  }
}

export class ProviderError extends ApplicationError {
  constructor(
    message: string,
    public readonly providerName: string,
    code: ErrorCode,
    retryable: boolean,
    context?: ErrorContext,
    cause?: Error
  ) {
    super(message, code, { retryable, context: { ...context, service: providerName }, cause });
  }
}

export class RateLimitError extends ProviderError {
  constructor(providerName: string, public readonly retryAfter?: number, message?: string, context?: ErrorContext) {
    super(
      message ?? `Rate limit exceeded for provider: ${providerName}`,
      providerName,
      ErrorCode.PROVIDER_RATE_LIMIT,
      true,
      withMetadata(context, { retryAfter })
    );
  }
}

/**
 * Non-2xx answer other than 401, 404 and 429. Only 5xx is worth retrying.
 */
export class ProviderServerError extends ProviderError {
  constructor(
    providerName: string,
    public readonly httpStatusCode: number,
    message?: string,
    context?: ErrorContext,
    cause?: Error
  ) {
    super(
      message ?? `Provider server error (${httpStatusCode}): ${providerName}`,
      providerName,
      ErrorCode.PROVIDER_SERVER_ERROR,
      httpStatusCode >= 500,
      withMetadata(context, { httpStatusCode }),
      cause
    );
  }
}

// --- downloads and classification -------------------------------------------

export class DownloadCancelledError extends ApplicationError {
  constructor(public readonly downloadId: string, public readonly reason: CancelReason, context?: ErrorContext) {
    super(
      `Download ${downloadId} cancelled (${reason})`,
      reason === 'timeout' ? ErrorCode.DOWNLOAD_TIMED_OUT : ErrorCode.DOWNLOAD_CANCELLED,
      { context: { ...context, entityType: 'download', entityId: downloadId } }
    );
  }
}

/**
 * No title could be read from a file name, or classification hit a
 * provider or file system failure
 */
export class ClassificationError extends ApplicationError {
  constructor(public readonly filename: string, message?: string, context?: ErrorContext, cause?: Error) {
    super(message ?? `Failed to classify ${filename}`, ErrorCode.CLASSIFICATION_FAILED, {
      context: withMetadata(context, { filename }),
      cause,
    });
  }
}
