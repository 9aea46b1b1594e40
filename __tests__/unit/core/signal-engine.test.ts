import { describe, it, expect } from 'vitest';
import { SignalEngine, signalId, trendMomentumRule, vwapBandRule, type SignalRule } from '../../../src/core/signal-engine';
import { buildEngineConfig, type SignalConfig } from '../../../src/config/engine-config';
import type { ConfirmationMetrics, IndicatorReading, IndicatorState } from '../../../src/types/domain';

const ASOF = Date.UTC(2024, 0, 1, 12, 0);

function ready(value: number, history: number[] = [value]): IndicatorReading {
  return { status: 'ready', value, history };
}

const warming: IndicatorReading = { status: 'warming', have: 3, need: 14 };

interface StateInput {
  fast?: IndicatorReading;
  slow?: IndicatorReading;
  rsi?: number;
  atr?: IndicatorReading;
  vwap?: number;
  close?: number;
}

function state(o: StateInput = {}): IndicatorState {
  return {
    symbol: 'BTCUSDT',
    asOf: ASOF,
    close: o.close ?? 103,
    readings: {
      sma: ready(100),
      emaFast: o.fast ?? ready(101),
      emaSlow: o.slow ?? ready(100),
      atr: o.atr ?? ready(2),
      rsi: ready(o.rsi ?? 55),
      vwap: ready(o.vwap ?? 100),
    },
  };
}

function fresh(imbalanceRatio = 0.3, relativeVolume = 1.5): ConfirmationMetrics {
  return { status: 'fresh', imbalanceRatio, relativeVolume, unusualVolume: relativeVolume >= 1.5, bookAt: ASOF };
}

function signalConfig(o: Partial<SignalConfig> = {}): SignalConfig {
  return buildEngineConfig({ signal: o }).signal;
}

describe('signal rules', () => {
  const cfg = signalConfig();

  it('trend momentum follows the EMA relation and abstains in the exhaustion zone', () => {
    expect(trendMomentumRule(state(), cfg)).toEqual({ rule: 'trend-momentum', direction: 'long', weight: 0.6 });
    expect(trendMomentumRule(state({ fast: ready(99) }), cfg)).toEqual({ rule: 'trend-momentum', direction: 'short', weight: 0.6 });
    expect(trendMomentumRule(state({ rsi: 75 }), cfg)).toBeNull();
    expect(trendMomentumRule(state({ fast: ready(99), rsi: 25 }), cfg)).toBeNull();
    expect(trendMomentumRule(state({ fast: ready(100) }), cfg)).toBeNull();
    expect(trendMomentumRule(state({ slow: warming }), cfg)).toBeNull();
  });

  it('requires a cross inside the history when configured', () => {
    const strict = signalConfig({ requireFreshCross: true });
    const crossed = state({ fast: ready(101, [99, 100.5, 101]), slow: ready(100, [100, 100.2, 100]) });
    const steady = state({ fast: ready(101, [101, 101, 101]), slow: ready(100, [100, 100, 100]) });
    expect(trendMomentumRule(crossed, strict)?.direction).toBe('long');
    expect(trendMomentumRule(steady, strict)).toBeNull();
    expect(trendMomentumRule(steady, cfg)?.direction).toBe('long');
  });

  it('vwap band votes with the move and fades the extreme', () => {
    expect(vwapBandRule(state({ close: 103 }), cfg)).toEqual({ rule: 'vwap-band', direction: 'long', weight: 0.4 });
    expect(vwapBandRule(state({ close: 97 }), cfg)).toEqual({ rule: 'vwap-band', direction: 'short', weight: 0.4 });
    expect(vwapBandRule(state({ close: 107 }), cfg)).toEqual({ rule: 'vwap-reversion', direction: 'short', weight: 0.4 });
    expect(vwapBandRule(state({ close: 94 }), cfg)).toEqual({ rule: 'vwap-reversion', direction: 'long', weight: 0.4 });
    expect(vwapBandRule(state({ close: 100.5 }), cfg)).toBeNull();
  });
});

describe('SignalEngine', () => {
  const engine = new SignalEngine(signalConfig());

  it('emits a signal when the rules agree and confirmation passes', () => {
    const d = engine.decide('BTCUSDT', state(), fresh());
    expect(d.kind).toBe('signal');
    if (d.kind !== 'signal') return;
    expect(d.signal).toEqual({
      id: `BTCUSDT-${ASOF}-long`,
      symbol: 'BTCUSDT',
      direction: 'long',
      confidence: 1,
      triggers: ['trend-momentum', 'vwap-band'],
      timestamp: ASOF,
      referencePrice: 103,
      atr: 2,
    });
    expect(Object.isFrozen(d.signal)).toBe(true);
  });

  it('is deterministic for identical inputs', () => {
    const a = engine.evaluate('BTCUSDT', state(), fresh());
    const b = engine.evaluate('BTCUSDT', state(), fresh());
    expect(a).toEqual(b);
    expect(a?.id).toBe(signalId('BTCUSDT', ASOF, 'long'));
  });

  it('signals short on an extreme fade that agrees with the trend', () => {
    const s = engine.evaluate('BTCUSDT', state({ fast: ready(99), close: 107 }), fresh(-0.4));
    expect(s?.direction).toBe('short');
    expect(s?.triggers).toEqual(['trend-momentum', 'vwap-reversion']);
  });

  it('reports why no signal was produced', () => {
    const cases: Array<[IndicatorState, ConfirmationMetrics, string]> = [
      [state({ atr: warming }), fresh(), 'WARMING'],
      [state({ rsi: 75, close: 100.5 }), fresh(), 'NO_VOTES'],
      [state({ close: 97 }), fresh(), 'CONFLICT'],
      [state(), { status: 'stale', reason: 'order book 20000ms old' }, 'METRICS_NOT_FRESH'],
      [state(), fresh(-0.2), 'IMBALANCE_DISAGREES'],
      [state(), fresh(0), 'IMBALANCE_DISAGREES'],
      [state(), fresh(0.3, 1.0), 'LOW_VOLUME'],
      [state({ fast: ready(100) }), fresh(), 'LOW_CONFIDENCE'],
    ];
    for (const [s, m, reason] of cases) {
      const d = engine.decide('BTCUSDT', s, m);
      expect(d.kind === 'none' ? d.reason : d.kind).toBe(reason);
    }
  });

  it('checks confirmation only after the rules agree', () => {
    const d = engine.decide('BTCUSDT', state({ close: 97 }), { status: 'warming', reason: 'no trades yet' });
    expect(d.kind === 'none' && d.reason).toBe('CONFLICT');
  });

  it('describes the gate that failed', () => {
    const low = engine.decide('BTCUSDT', state(), fresh(0.3, 1.0));
    expect(low.kind === 'none' && low.detail).toBe('relative volume 1.00 < 1.2');
    const stale = engine.decide('BTCUSDT', state(), { status: 'stale', reason: 'last trade 16000ms old' });
    expect(stale.kind === 'none' && stale.detail).toBe('confirmation stale: last trade 16000ms old');
  });

  it('applies the minimum imbalance threshold', () => {
    const strict = new SignalEngine(signalConfig({ minImbalance: 0.5 }));
    expect(strict.decide('BTCUSDT', state(), fresh(0.3)).kind).toBe('none');
    expect(strict.decide('BTCUSDT', state(), fresh(0.6)).kind).toBe('signal');
  });

  it('accepts custom rules', () => {
    const alwaysShort: SignalRule = () => ({ rule: 'always-short', direction: 'short', weight: 0.9 });
    const custom = new SignalEngine(signalConfig(), [alwaysShort]);
    const s = custom.evaluate('ETHUSDT', state(), fresh(-0.1));
    expect(s?.id).toBe(`ETHUSDT-${ASOF}-short`);
    expect(s?.confidence).toBe(0.9);
  });
});
