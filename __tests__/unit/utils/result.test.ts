import { describe, it, expect } from 'vitest';
import { ok, err, type Result } from '../../../src/utils/result';

describe('utils/result', () => {
  it('ok returns expected shape', () => {
    expect(ok(123)).toEqual({ ok: true, value: 123 });
  });

  it('err returns expected shape', () => {
    expect(err({ code: 'E_TEST', message: 'failed' })).toEqual({ ok: false, error: { code: 'E_TEST', message: 'failed' } });
  });

  it('narrows on ok', () => {
    const parse = (s: string): Result<number, string> => (Number.isFinite(Number(s)) ? ok(Number(s)) : err(`not a number: ${s}`));
    const a = parse('4');
    const b = parse('x');
    expect(a.ok ? a.value : -1).toBe(4);
    expect(b.ok ? '' : b.error).toBe('not a number: x');
  });
});
