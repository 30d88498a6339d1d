import { describe, it, expect } from 'vitest';
import {
  getPgErrorCode,
  isConcurrencyFailure,
  isUniqueViolation,
} from './pg-errors';

describe('pg-errors', () => {
  const pgError = (code: string) =>
    Object.assign(new Error('postgres error'), { code });

  it('should read the SQLSTATE from a driver error', () => {
    expect(getPgErrorCode(pgError('23505'))).toBe('23505');
  });

  it('should follow wrapped causes', () => {
    const wrapped = new Error('query failed', { cause: pgError('40P01') });

    expect(getPgErrorCode(wrapped)).toBe('40P01');
  });

  it('should return undefined for values without a code', () => {
    expect(getPgErrorCode(new Error('plain'))).toBeUndefined();
    expect(getPgErrorCode('boom')).toBeUndefined();
    expect(getPgErrorCode(null)).toBeUndefined();
  });

  it('should classify unique violations', () => {
    expect(isUniqueViolation(pgError('23505'))).toBe(true);
    expect(isUniqueViolation(pgError('23503'))).toBe(false);
  });

  it('should classify lost races as concurrency failures', () => {
    expect(isConcurrencyFailure(pgError('40001'))).toBe(true);
    expect(isConcurrencyFailure(pgError('40P01'))).toBe(true);
    expect(isConcurrencyFailure(pgError('55P03'))).toBe(true);
    expect(isConcurrencyFailure(pgError('23505'))).toBe(false);
  });
});
