import { describe, expect, it } from 'vitest';

import {
  AuthError,
  CancelledError,
  ConnectionError,
  DeepdubError,
  HttpError,
  OrderingError,
  UnrecoverableError,
  describeError,
  isDeepdubError,
  isTransientError,
} from './errors';

describe('errors', () => {
  it('names errors after their class and carries a code', () => {
    const error = new OrderingError(3, 5);
    expect(error).toBeInstanceOf(DeepdubError);
    expect(error.name).toBe('OrderingError');
    expect(error.code).toBe('ordering');
    expect(error.message).toBe('Audio chunk out of order: expected seq 3, received 5');
  });

  it('only treats connection errors as transient', () => {
    expect(isTransientError(new ConnectionError('dropped'))).toBe(true);
    expect(isTransientError(new AuthError('denied', 401))).toBe(false);
    expect(isTransientError(new CancelledError())).toBe(false);
    expect(isTransientError(new Error('plain'))).toBe(false);
  });

  it('keeps the cause of an unrecoverable error', () => {
    const cause = new ConnectionError('dropped');
    const error = new UnrecoverableError('gave up', { cause });
    expect(error.cause).toBe(cause);
    expect(isDeepdubError(error)).toBe(true);
  });

  it('formats http errors from the status line', () => {
    expect(new HttpError(500, 'Internal Server Error', null).message).toBe(
      'HTTP 500 Internal Server Error',
    );
    expect(new HttpError(404, '', { detail: 'missing' }).message).toBe('HTTP 404 Error');
  });

  it('describes unknown failures', () => {
    expect(describeError(new Error('boom'))).toBe('boom');
    expect(describeError('bare')).toBe('bare');
  });
});
