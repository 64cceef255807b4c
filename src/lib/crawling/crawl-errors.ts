/**
 * Crawl Error Handling
 * Fetch failure taxonomy and configuration errors.
 * No failure is retried: every error is terminal for its page or domain.
 */

export enum FetchErrorType {
  NETWORK_ERROR = 'NETWORK_ERROR',
  TIMEOUT = 'TIMEOUT',
  ABORTED = 'ABORTED',
  TLS_ERROR = 'TLS_ERROR',
  TOO_MANY_REDIRECTS = 'TOO_MANY_REDIRECTS',
  BODY_TOO_LARGE = 'BODY_TOO_LARGE',
  HTTP_STATUS = 'HTTP_STATUS',
  UNKNOWN = 'UNKNOWN',
}

export class FetchError extends Error {
  readonly type: FetchErrorType;
  readonly statusCode?: number;

  constructor(type: FetchErrorType, message: string, statusCode?: number) {
    super(message);
    this.name = 'FetchError';
    this.type = type;
    this.statusCode = statusCode;
  }
}

export class CrawlConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'CrawlConfigError';
  }
}

function errorMessage(error: unknown): string {
  if (error instanceof Error) return error.message;
  return String(error);
}

function errorCode(error: unknown): string | undefined {
  if (typeof error === 'object' && error !== null && 'code' in error) {
    const { code } = error;
    return typeof code === 'string' ? code : undefined;
  }
  return undefined;
}

/**
 * Map any thrown value onto a FetchError
 */
export function classifyFetchError(error: unknown, statusCode?: number): FetchError {
  if (error instanceof FetchError) {
    return error;
  }

  const message = errorMessage(error);
  const code = errorCode(error) ?? '';

  if (error instanceof Error && error.name === 'AbortError') {
    return new FetchError(FetchErrorType.ABORTED, 'Request aborted', statusCode);
  }

  if (
    code === 'ETIMEDOUT' ||
    code === 'ESOCKETTIMEDOUT' ||
    message.toLowerCase().includes('timeout') ||
    message.toLowerCase().includes('timed out')
  ) {
    return new FetchError(FetchErrorType.TIMEOUT, 'Request timed out', statusCode);
  }

  if (
    ['ECONNREFUSED', 'ECONNRESET', 'ENOTFOUND', 'EAI_AGAIN', 'EHOSTUNREACH', 'EPIPE'].includes(code)
  ) {
    return new FetchError(FetchErrorType.NETWORK_ERROR, `Network connection failed (${code})`, statusCode);
  }

  if (code.startsWith('ERR_TLS') || code.startsWith('ERR_SSL') || message.includes('SSL')) {
    return new FetchError(FetchErrorType.TLS_ERROR, `TLS handshake failed: ${message}`, statusCode);
  }

  if (statusCode !== undefined) {
    return new FetchError(FetchErrorType.HTTP_STATUS, `HTTP ${statusCode}`, statusCode);
  }

  return new FetchError(FetchErrorType.UNKNOWN, message || 'Unknown error', statusCode);
}

export function describeError(error: unknown): string {
  return errorMessage(error);
}
