/**
 * Fetch Error Handling
 * Classification of transport and filesystem failures.
 * Failures are returned as values; callers decide whether to log or report them.
 */

export enum FetchErrorType {
  NETWORK_ERROR = 'NETWORK_ERROR',
  TIMEOUT = 'TIMEOUT',
  HTTP_STATUS = 'HTTP_STATUS',
  NOT_FOUND = 'NOT_FOUND',
  READ_ERROR = 'READ_ERROR',
  UNSUPPORTED = 'UNSUPPORTED',
  UNKNOWN = 'UNKNOWN',
}

export interface FetchFailure {
  type: FetchErrorType;
  message: string;
  statusCode?: number;
}

const NETWORK_CODES = ['ECONNREFUSED', 'ECONNRESET', 'ENOTFOUND', 'EAI_AGAIN', 'EHOSTUNREACH', 'ENETUNREACH'];
const TIMEOUT_CODES = ['ETIMEDOUT', 'ESOCKETTIMEDOUT', 'UND_ERR_CONNECT_TIMEOUT', 'UND_ERR_HEADERS_TIMEOUT'];
const READ_CODES = ['EACCES', 'EISDIR', 'EPERM', 'EMFILE'];

function readString(value: unknown, key: string): string | undefined {
  if (typeof value === 'object' && value !== null && key in value) {
    const field: unknown = Reflect.get(value, key);
    return typeof field === 'string' ? field : undefined;
  }
  return undefined;
}

function getCause(error: unknown): unknown {
  return typeof error === 'object' && error !== null && 'cause' in error ? error.cause : undefined;
}

/**
 * Error code of the error or of its cause (fetch wraps socket errors in `cause`)
 */
export function getErrorCode(error: unknown): string | undefined {
  return readString(error, 'code') ?? readString(getCause(error), 'code');
}

/**
 * Human-readable message, including the underlying cause when there is one
 */
export function describeError(error: unknown): string {
  const message = error instanceof Error ? error.message : String(error);
  const causeMessage = readString(getCause(error), 'message');
  return causeMessage && causeMessage !== message ? `${message}: ${causeMessage}` : message;
}

/**
 * Classify a thrown error into a fetch failure
 */
export function classifyError(error: unknown): FetchFailure {
  const name = readString(error, 'name');
  const code = getErrorCode(error);
  const message = describeError(error);

  // AbortController timeouts
  if (name === 'AbortError' || name === 'TimeoutError' || (code && TIMEOUT_CODES.includes(code))) {
    return { type: FetchErrorType.TIMEOUT, message: 'Request timed out' };
  }

  if (code === 'ENOENT') {
    return { type: FetchErrorType.NOT_FOUND, message };
  }

  if (code && READ_CODES.includes(code)) {
    return { type: FetchErrorType.READ_ERROR, message };
  }

  if (code && NETWORK_CODES.includes(code)) {
    return { type: FetchErrorType.NETWORK_ERROR, message };
  }

  if (message.includes('not implemented') || message.includes('Invalid URL') || message.includes('unknown scheme')) {
    return { type: FetchErrorType.UNSUPPORTED, message };
  }

  if (message.includes('fetch failed') || message.includes('network')) {
    return { type: FetchErrorType.NETWORK_ERROR, message };
  }

  return { type: FetchErrorType.UNKNOWN, message: message || 'Unknown error' };
}
