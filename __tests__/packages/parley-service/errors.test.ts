import { ErrorCode, ParleyError, isParleyError, toParleyError } from '@parley/service';

describe('ParleyError', () => {
  test('carries code, message, recoverable flag and cause', () => {
    const cause = new Error('disk full');
    const err = new ParleyError(ErrorCode.StorageWriteError, 'write failed', true, cause);

    expect(err).toBeInstanceOf(Error);
    expect(err.name).toBe('ParleyError');
    expect(err.code).toBe(ErrorCode.StorageWriteError);
    expect(err.message).toBe('write failed');
    expect(err.recoverable).toBe(true);
    expect(err.cause).toBe(cause);
  });

  test('is not recoverable by default', () => {
    expect(new ParleyError(ErrorCode.NotFound, 'x').recoverable).toBe(false);
  });

  test('isParleyError optionally matches the code', () => {
    const err = new ParleyError(ErrorCode.NotFound, 'x');
    expect(isParleyError(err)).toBe(true);
    expect(isParleyError(err, ErrorCode.NotFound)).toBe(true);
    expect(isParleyError(err, ErrorCode.InvalidState)).toBe(false);
    expect(isParleyError(new Error('x'))).toBe(false);
  });

  test('toParleyError wraps foreign errors as Internal', () => {
    const original = new TypeError('bad');
    const wrapped = toParleyError(original);
    expect(wrapped.code).toBe(ErrorCode.Internal);
    expect(wrapped.message).toBe('bad');
    expect(wrapped.cause).toBe(original);
    expect(toParleyError('oops').message).toBe('oops');
  });

  test('toParleyError returns ParleyErrors unchanged', () => {
    const err = new ParleyError(ErrorCode.InvalidState, 'x');
    expect(toParleyError(err)).toBe(err);
  });
});
