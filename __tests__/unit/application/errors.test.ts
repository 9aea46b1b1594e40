import { describe, it, expect } from 'vitest';
import {
  DataError, GatewayAuthError, TransientGatewayError, ValidationError, buildErrorEventMeta, isTransient, toEngineError,
} from '../../../src/application/errors';

describe('toEngineError', () => {
  it('classifies network codes as transient', () => {
    const e = toEngineError(Object.assign(new Error('socket hang up'), { code: 'econnreset' }), { action: 'placeOrder' });
    expect(e).toBeInstanceOf(TransientGatewayError);
    expect(e.code).toBe('ECONNRESET');
    expect(e.retryable).toBe(true);
    expect(e.context).toEqual({ action: 'placeOrder' });
  });

  it('classifies by HTTP status, including axios-style responses', () => {
    expect(toEngineError({ response: { status: 429 } }).code).toBe('RATE_LIMITED');
    expect(toEngineError({ status: 502 })).toBeInstanceOf(TransientGatewayError);
    expect(toEngineError({ response: { status: 401 } })).toBeInstanceOf(GatewayAuthError);
    expect(toEngineError({ status: 400 }).code).toBe('HTTP_400');
  });

  it('never reads the message text', () => {
    const e = toEngineError(new Error('ETIMEDOUT while connecting'));
    expect(e).toBeInstanceOf(ValidationError);
    expect(e.code).toBe('UNCLASSIFIED');
    expect(isTransient(e)).toBe(false);
  });

  it('passes engine errors through', () => {
    const own = new DataError('STALE', 'old book');
    expect(toEngineError(own)).toBe(own);
    expect(own.name).toBe('DataError');
    expect(own.kind).toBe('DATA');
  });
});

describe('buildErrorEventMeta', () => {
  it('merges the caller context over the error context', () => {
    const e = new ValidationError('INVALID_SIZE', 'below minimum', { symbol: 'BTCUSDT', action: 'placeOrder' });
    expect(buildErrorEventMeta(e, { state: 'Open' })).toEqual({
      kind: 'VALIDATION',
      code: 'INVALID_SIZE',
      message: 'below minimum',
      context: { symbol: 'BTCUSDT', action: 'placeOrder', state: 'Open' },
    });
  });
});
