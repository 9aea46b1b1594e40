import { describe, it, expect } from 'vitest';
import { buildEngineConfig } from '../../../src/config/engine-config';
import { validateConfig } from '../../../src/config/validate-config';
import { setupJsonLogs, captureLogs } from '../helpers/logging';

describe('validateConfig', () => {
  it('accepts the defaults', () => {
    expect(validateConfig(buildEngineConfig())).toEqual({ valid: true, errors: [], warnings: [] });
  });

  it('lists every violated bound', () => {
    const cfg = buildEngineConfig({
      risk: { leverage: 6, maxTradesPerDay: 0 },
      indicators: { emaFastPeriod: 21 },
      lifecycle: { takeProfit: [{ atrMultiple: 1, fraction: 0.7 }, { atrMultiple: 2, fraction: 0.7 }] },
    });
    const r = validateConfig(cfg);
    expect(r.valid).toBe(false);
    expect(r.errors).toEqual([
      'leverage 6 outside [1, 5]',
      'maxTradesPerDay must be an integer in 1..50',
      'emaFastPeriod must be below emaSlowPeriod',
      'take-profit fractions sum to 1.4 (> 1)',
    ]);
  });

  it('bounds the trailing distance only in trailing mode', () => {
    expect(validateConfig(buildEngineConfig({ lifecycle: { trailMode: 'trailing', trailingStopPct: 0 } })).errors).toEqual(['trailingStopPct must be in (0, 100)']);
    expect(validateConfig(buildEngineConfig({ lifecycle: { trailMode: 'ladder', trailingStopPct: 0 } })).errors).toEqual([]);
  });

  it('checks symbols and the candle window', () => {
    const r = validateConfig(buildEngineConfig({ symbols: ['btc'], candleWindow: 30 }));
    expect(r.errors).toEqual(['symbol format invalid: btc', 'candleWindow 30 shorter than the longest lookback (51)']);
  });

  it('warns once per distinct warning', () => {
    setupJsonLogs();
    const logs = captureLogs();
    const cfg = buildEngineConfig({ risk: { maxDailyLoss: 5 }, lifecycle: { takeProfit: [{ atrMultiple: 1, fraction: 0.5 }] } });
    const r = validateConfig(cfg);
    validateConfig(cfg);
    expect(r.valid).toBe(true);
    expect(r.warnings).toEqual([
      'maxDailyLoss below riskPerTrade: one stopped trade halts the day',
      'take-profit fractions sum to 0.5; the final target closes the remainder',
    ]);
    expect(logs.filter(l => l.category === 'CONFIG' && l.level === 'WARN').map(l => l.message)).toEqual(r.warnings);
  });
});
