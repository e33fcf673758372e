export type ErrorKind = 'network' | 'parse' | 'storage' | 'extraction';

export type NetworkErrorCode = 'timeout' | 'http' | 'connection' | 'too_large' | 'rate_limited' | 'unknown';

export abstract class FeedtermError extends Error {
  abstract readonly kind: ErrorKind;

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

export class NetworkError extends FeedtermError {
  readonly kind = 'network' as const;

  constructor(
    message: string,
    readonly code: NetworkErrorCode,
    readonly status: number | null = null,
    options?: { cause?: unknown }
  ) {
    super(message, options);
  }
}

export class ParseError extends FeedtermError {
  readonly kind = 'parse' as const;
}

export class StorageError extends FeedtermError {
  readonly kind = 'storage' as const;
}

export class ExtractionError extends FeedtermError {
  readonly kind = 'extraction' as const;

  constructor(message: string, readonly status: number | null = null, options?: { cause?: unknown }) {
    super(message, options);
  }
}

export type AppError = NetworkError | ParseError | StorageError | ExtractionError;

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

function isAppError(error: unknown): error is AppError {
  return error instanceof NetworkError
    || error instanceof ParseError
    || error instanceof StorageError
    || error instanceof ExtractionError;
}

/**
 * Classify a failure from the HTTP layer or a feed library by its message.
 * rss-parser and fetch only report most failures as plain Errors.
 */
export function categorizeNetworkError(error: unknown): AppError {
  if (isAppError(error)) return error;
  const msg = errorMessage(error);
  const cause = error instanceof Error ? error : undefined;

  if (error instanceof Error && (error.name === 'TimeoutError' || error.name === 'AbortError')) {
    return new NetworkError('Request timed out', 'timeout', null, { cause });
  }

  // HTTP status code errors (e.g., "Status code 403")
  const statusMatch = msg.match(/status\s*(?:code\s*)?(\d{3})/i);
  if (statusMatch) {
    const status = parseInt(statusMatch[1], 10);
    return new NetworkError(`HTTP error: status ${status}`, 'http', status, { cause });
  }

  if (/ETIMEDOUT|ECONNABORTED|timed? ?out/i.test(msg)) {
    return new NetworkError('Request timed out', 'timeout', null, { cause });
  }

  if (/ECONNREFUSED|ECONNRESET|ENOTFOUND|EAI_AGAIN|fetch failed|socket hang up|network/i.test(msg)) {
    return new NetworkError(`Connection failed: ${msg}`, 'connection', null, { cause });
  }

  if (/parse|invalid xml|not a valid|unexpected close tag|non-whitespace before first tag/i.test(msg)) {
    return new ParseError(`Parse error: ${msg}`, { cause });
  }

  return new NetworkError(msg, 'unknown', null, { cause });
}

/**
 * Convert anything thrown inside a background task into a typed error.
 * Network-facing work is classified by message; other kinds are wrapped as-is.
 */
export function toAppError(error: unknown, kind: ErrorKind): AppError {
  if (isAppError(error)) return error;
  const cause = error instanceof Error ? error : undefined;

  switch (kind) {
    case 'network':
      return categorizeNetworkError(error);
    case 'parse':
      return new ParseError(errorMessage(error), { cause });
    case 'storage':
      return new StorageError(errorMessage(error), { cause });
    case 'extraction':
      return new ExtractionError(errorMessage(error), null, { cause });
  }
}
