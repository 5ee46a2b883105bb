import { describe, expect, it } from 'vitest';

import { invalidArgumentError, isServiceError, ServiceError } from '../errors';

describe('ServiceError', () => {
  it('carries status code, code and details from the factory', () => {
    const error = invalidArgumentError('Bad weights', { signal: 'experience' });

    expect(error).toBeInstanceOf(ServiceError);
    expect(error.statusCode).toBe(400);
    expect(error.code).toBe('invalid_argument');
    expect(error.details).toEqual({ signal: 'experience' });
  });

  it('keeps the cause', () => {
    const cause = new Error('root');
    const error = new ServiceError('wrapped', { cause });

    expect(error.cause).toBe(cause);
    expect(error.statusCode).toBe(500);
    expect(error.code).toBe('internal');
  });

  it('isServiceError optionally checks the code', () => {
    const error = invalidArgumentError('nope');

    expect(isServiceError(error)).toBe(true);
    expect(isServiceError(error, 'invalid_argument')).toBe(true);
    expect(isServiceError(error, 'bad_request')).toBe(false);
    expect(isServiceError(new Error('plain'))).toBe(false);
  });
});
