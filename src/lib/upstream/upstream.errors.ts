/**
 * Upstream Error Handling
 * Error taxonomy for third-party data providers
 */

export enum UpstreamErrorType {
  NETWORK_ERROR = 'NETWORK_ERROR',
  TIMEOUT = 'TIMEOUT',
  HTTP_ERROR = 'HTTP_ERROR',
  RATE_LIMITED = 'RATE_LIMITED',
  PARSE_ERROR = 'PARSE_ERROR',
  EMPTY_RESPONSE = 'EMPTY_RESPONSE',
  NOT_CONFIGURED = 'NOT_CONFIGURED',
  CIRCUIT_OPEN = 'CIRCUIT_OPEN',
  UNKNOWN = 'UNKNOWN',
}

export class UpstreamError extends Error {
  readonly provider: string;
  readonly type: UpstreamErrorType;
  readonly statusCode?: number;

  constructor(provider: string, type: UpstreamErrorType, message: string, statusCode?: number) {
    super(`${provider}: ${message}`);
    this.name = 'UpstreamError';
    this.provider = provider;
    this.type = type;
    this.statusCode = statusCode;
  }
}

export function describeError(error: unknown): string {
  if (error instanceof Error) {
    return error.message;
  }
  return String(error);
}

export function errorCode(error: unknown): string | undefined {
  if (typeof error === 'object' && error !== null && 'code' in error && typeof error.code === 'string') {
    return error.code;
  }
  return undefined;
}

/**
 * Map any thrown value from an upstream call onto the taxonomy
 */
export function classifyUpstreamError(provider: string, error: unknown): UpstreamError {
  if (error instanceof UpstreamError) {
    return error;
  }

  const message = describeError(error);
  const name = error instanceof Error ? error.name : '';
  const code = errorCode(error);

  // Timeout errors
  if (
    name === 'AbortError' ||
    name === 'TimeoutError' ||
    message.includes('timeout') ||
    message.includes('Timed out') ||
    code === 'ETIMEDOUT'
  ) {
    return new UpstreamError(provider, UpstreamErrorType.TIMEOUT, 'Request timed out');
  }

  // Circuit breaker rejections (opossum uses code EOPENBREAKER)
  if (code === 'EOPENBREAKER' || message.includes('Breaker is open')) {
    return new UpstreamError(provider, UpstreamErrorType.CIRCUIT_OPEN, 'Circuit breaker is open');
  }

  // Network errors
  if (
    code === 'ECONNREFUSED' ||
    code === 'ECONNRESET' ||
    code === 'ENOTFOUND' ||
    code === 'EAI_AGAIN' ||
    message.includes('fetch failed') ||
    message.includes('network')
  ) {
    return new UpstreamError(provider, UpstreamErrorType.NETWORK_ERROR, 'Network connection failed');
  }

  // Parse errors
  if (error instanceof SyntaxError || message.includes('JSON')) {
    return new UpstreamError(provider, UpstreamErrorType.PARSE_ERROR, 'Failed to parse response');
  }

  return new UpstreamError(provider, UpstreamErrorType.UNKNOWN, message || 'Unknown error');
}

/**
 * Error type for a non-2xx HTTP status
 */
export function statusErrorType(statusCode: number): UpstreamErrorType {
  return statusCode === 429 ? UpstreamErrorType.RATE_LIMITED : UpstreamErrorType.HTTP_ERROR;
}
