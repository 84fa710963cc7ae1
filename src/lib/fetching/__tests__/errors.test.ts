/**
 * Fetch Error Classification Tests
 */

import { FetchErrorType, classifyError, describeError, getErrorCode } from '../errors';

function withCode(message: string, code: string): Error {
  return Object.assign(new Error(message), { code });
}

describe('fetch errors', () => {
  describe('getErrorCode', () => {
    it('should read the code from the error or its cause', () => {
      expect(getErrorCode(withCode('boom', 'ENOENT'))).toBe('ENOENT');
      expect(getErrorCode(new TypeError('fetch failed', { cause: withCode('reset', 'ECONNRESET') }))).toBe('ECONNRESET');
      expect(getErrorCode('plain string')).toBeUndefined();
    });
  });

  describe('describeError', () => {
    it('should append a distinct cause message', () => {
      const error = new TypeError('fetch failed', { cause: new Error('getaddrinfo ENOTFOUND nowhere.example') });

      expect(describeError(error)).toBe('fetch failed: getaddrinfo ENOTFOUND nowhere.example');
      expect(describeError(new Error('same', { cause: new Error('same') }))).toBe('same');
      expect(describeError('text')).toBe('text');
    });
  });

  describe('classifyError', () => {
    it('should classify aborted requests as timeouts', () => {
      const abort = Object.assign(new Error('This operation was aborted'), { name: 'AbortError' });

      expect(classifyError(abort)).toEqual({ type: FetchErrorType.TIMEOUT, message: 'Request timed out' });
      expect(classifyError(withCode('slow', 'ETIMEDOUT')).type).toBe(FetchErrorType.TIMEOUT);
    });

    it('should classify filesystem errors', () => {
      expect(classifyError(withCode('no such file', 'ENOENT'))).toEqual({
        type: FetchErrorType.NOT_FOUND,
        message: 'no such file',
      });
      expect(classifyError(withCode('permission denied', 'EACCES')).type).toBe(FetchErrorType.READ_ERROR);
    });

    it('should classify network errors', () => {
      const error = new TypeError('fetch failed', { cause: withCode('connect ECONNREFUSED 127.0.0.1:80', 'ECONNREFUSED') });

      expect(classifyError(error)).toEqual({
        type: FetchErrorType.NETWORK_ERROR,
        message: 'fetch failed: connect ECONNREFUSED 127.0.0.1:80',
      });
      expect(classifyError(new TypeError('fetch failed')).type).toBe(FetchErrorType.NETWORK_ERROR);
    });

    it('should classify unsupported schemes', () => {
      expect(classifyError(new TypeError('fetch failed', { cause: new Error('not implemented... yet...') })).type).toBe(
        FetchErrorType.UNSUPPORTED
      );
      expect(classifyError(new TypeError('Invalid URL')).type).toBe(FetchErrorType.UNSUPPORTED);
    });

    it('should fall back to unknown', () => {
      expect(classifyError(new Error('odd'))).toEqual({ type: FetchErrorType.UNKNOWN, message: 'odd' });
      expect(classifyError(new Error(''))).toEqual({ type: FetchErrorType.UNKNOWN, message: 'Unknown error' });
    });
  });
});
