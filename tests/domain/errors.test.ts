import { describe, it, expect } from 'vitest';
import { ApiError, ErrorCode } from '../../src/domain/index.js';
import type { ErrorCategory } from '../../src/domain/index.js';

const CATEGORIES: ErrorCategory[] = ['auth', 'authz', 'validation', 'notfound', 'domain', 'ratelimit', 'internal'];

function withCode(code: number): ApiError {
  return new ApiError({ code, message: `code ${code}` });
}

describe('ApiError', () => {
  it('defaults field, metadata and status', () => {
    const err = withCode(ErrorCode.RateLimited);
    expect(err.field).toBe('');
    expect(err.metadata).toEqual({});
    expect(err.status).toBe('unknown');
    expect(err.name).toBe('ApiError');
    expect(err).toBeInstanceOf(Error);
  });

  it('is() compares codes for equality', () => {
    const err = withCode(ErrorCode.DomainNotVerified);
    expect(err.is(ErrorCode.DomainNotVerified)).toBe(true);
    expect(err.is(ErrorCode.DomainNotOwned)).toBe(false);
  });

  const cases: Array<[number, ErrorCategory]> = [
    [100, 'auth'],
    [199, 'auth'],
    [200, 'authz'],
    [307, 'validation'],
    [400, 'notfound'],
    [409, 'notfound'],
    [501, 'domain'],
    [603, 'ratelimit'],
    [900, 'internal'],
    [5000, 'internal'],
  ];

  it.each(cases)('code %i belongs only to %s', (code, category) => {
    const err = withCode(code);
    for (const c of CATEGORIES) {
      expect(err.isCategory(c)).toBe(c === category);
    }
  });

  it.each([0, 410, 411, 450, 499, 700, 810, 899])('code %i belongs to no category', (code) => {
    const err = withCode(code);
    for (const c of CATEGORIES) {
      expect(err.isCategory(c)).toBe(false);
    }
  });

  it('returns false for an unknown category name', () => {
    expect(withCode(ErrorCode.Internal).isCategory('billing')).toBe(false);
    expect(withCode(ErrorCode.Internal).isCategory('toString')).toBe(false);
  });

  it('does not share metadata with its input', () => {
    const metadata = { limit: '100' };
    const err = new ApiError({ code: ErrorCode.DailyLimitExceeded, message: 'limit', metadata });
    metadata.limit = '200';
    expect(err.metadata).toEqual({ limit: '100' });
    expect(Object.isFrozen(err.metadata)).toBe(true);
  });
});
