import { createErrorLogObject, emptyResult, getErrorMessage, toFetchError } from '../../utils/error.utils';

describe('error.utils', () => {
  describe('getErrorMessage', () => {
    it('should read Error, string and message-like objects', () => {
      expect(getErrorMessage(new Error('boom'))).toBe('boom');
      expect(getErrorMessage('plain')).toBe('plain');
      expect(getErrorMessage({ message: 'shaped' })).toBe('shaped');
    });

    it('should handle null and other values', () => {
      expect(getErrorMessage(null)).toBe('Unknown error (null/undefined)');
      expect(getErrorMessage({ code: 42 })).toBe('{"code":42}');
    });
  });

  describe('createErrorLogObject', () => {
    it('should keep the type and stack of an Error', () => {
      const log = createErrorLogObject(new TypeError('bad'));
      expect(log.errorMessage).toBe('bad');
      expect(log.errorType).toBe('TypeError');
      expect(log.stack).toContain('bad');
    });

    it('should use a string code as the type', () => {
      expect(createErrorLogObject({ code: 'ECONNRESET', message: 'reset' })).toEqual({
        errorMessage: 'reset',
        errorType: 'Error(ECONNRESET)',
      });
    });
  });

  it('should build failed fetch results', () => {
    expect(toFetchError(new Error('timeout'))).toEqual({ ok: false, reason: 'ERROR', error: 'timeout' });
    expect(emptyResult('no rows')).toEqual({ ok: false, reason: 'EMPTY', error: 'no rows' });
  });
});
