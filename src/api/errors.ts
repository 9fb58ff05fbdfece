/**
 * API Errors
 *
 * Two failure families reach callers of the remote API:
 * - ConnectivityError: the server could not be reached. Readers fall back to
 *   the local cache.
 * - ApiError: the server answered with a rejection. Shown to the user as is.
 */

export type ConnectivityErrorKind = 'timeout' | 'dns' | 'refused' | 'reset' | 'network';

export class ConnectivityError extends Error {
  constructor(
    readonly kind: ConnectivityErrorKind,
    message: string,
    readonly cause?: unknown
  ) {
    super(message);
    this.name = 'ConnectivityError';
  }
}

export class ApiError extends Error {
  constructor(
    readonly status: number,
    message: string,
    readonly detail?: unknown
  ) {
    super(message);
    this.name = 'ApiError';
  }
}

const CODE_KINDS: Record<string, ConnectivityErrorKind> = {
  ENOTFOUND: 'dns',
  EAI_AGAIN: 'dns',
  ECONNREFUSED: 'refused',
  ECONNRESET: 'reset',
  EPIPE: 'reset',
  UND_ERR_SOCKET: 'reset',
  ETIMEDOUT: 'timeout',
  UND_ERR_CONNECT_TIMEOUT: 'timeout',
  UND_ERR_HEADERS_TIMEOUT: 'timeout',
  UND_ERR_BODY_TIMEOUT: 'timeout',
  ENETUNREACH: 'network',
  EHOSTUNREACH: 'network',
};

function errorCode(value: unknown): string | undefined {
  if (typeof value === 'object' && value !== null && 'code' in value && typeof value.code === 'string') {
    return value.code;
  }
  return undefined;
}

/**
 * Map a low-level fetch failure to a ConnectivityError, or null when the
 * error is not about reaching the server.
 */
export function toConnectivityError(error: unknown): ConnectivityError | null {
  if (error instanceof ConnectivityError) return error;
  if (!(error instanceof Error)) return null;

  if (error.name === 'AbortError' || error.name === 'TimeoutError') {
    return new ConnectivityError('timeout', 'Request timed out', error);
  }

  const code = errorCode(error) ?? errorCode(error.cause);
  const kind = code ? CODE_KINDS[code] : undefined;
  if (kind) {
    return new ConnectivityError(kind, `Connection failed (${code})`, error);
  }

  // undici reports every other transport failure as this TypeError
  if (error instanceof TypeError && error.message === 'fetch failed') {
    return new ConnectivityError('network', 'Network request failed', error);
  }

  return null;
}

/**
 * The single classification every collection uses to decide on cache fallback.
 */
export function isConnectivityError(error: unknown): boolean {
  return toConnectivityError(error) !== null;
}

export function errorMessage(error: unknown, fallback = 'Unknown error'): string {
  if (error instanceof Error) return error.message;
  if (typeof error === 'string') return error;
  return fallback;
}
