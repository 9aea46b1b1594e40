import { describe, it, expect } from 'vitest';
import { parseArgs, runPaperSession } from '../../../src/tools/paper-run';

describe('paper-run', () => {
  it('parses flags with defaults', () => {
    expect(parseArgs([])).toEqual({ candles: 1440, seed: 42, balance: 10_000, symbol: undefined, persist: false, json: false });
    expect(parseArgs(['--candles', '50', '--seed', '3', '--symbol', 'ethusdt', '--json', '--balance', 'x'])).toEqual({
      candles: 50, seed: 3, balance: 10_000, symbol: 'ETHUSDT', persist: false, json: true,
    });
  });

  it('replays a seeded session to the same summary', async () => {
    const args = { candles: 120, seed: 11, balance: 10_000, persist: false, json: true };
    const first = await runPaperSession(args, {});
    const second = await runPaperSession(args, {});
    expect(second).toEqual(first);
    expect(first.symbol).toBe('BTCUSDT');
    expect(first.candles).toBe(120);
    expect(first.wins + first.losses).toBe(first.closed);
  });

  it('refuses an invalid configuration', async () => {
    await expect(runPaperSession({ candles: 1, seed: 1, balance: 1, persist: false, json: false }, { LEVERAGE: '9' }))
      .rejects.toMatchObject({ code: 'CONFIG_INVALID', message: 'invalid configuration: leverage 9 outside [1, 5]' });
  });
});
