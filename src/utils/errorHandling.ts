/**
 * Narrowing helpers for values caught as `unknown`.
 */

function stringField(value: unknown, field: 'message' | 'code'): string | undefined {
  if (typeof value !== 'object' || value === null || !(field in value)) {
    return undefined;
  }
  const found: unknown = Reflect.get(value, field);
  return typeof found === 'string' ? found : undefined;
}

/**
 * Text suitable for a log line or a chat notice
 */
export function getErrorMessage(error: unknown): string {
  if (typeof error === 'string') {
    return error;
  }
  return stringField(error, 'message') ?? 'An unknown error occurred';
}

/** `code` of a Node system error or a sqlite3 failure */
export function getErrorCode(error: unknown): string | undefined {
  return stringField(error, 'code');
}

export function toError(error: unknown): Error {
  return error instanceof Error ? error : new Error(getErrorMessage(error));
}
