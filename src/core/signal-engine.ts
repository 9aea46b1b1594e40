import type { SignalConfig } from '../config/engine-config';
import type { ConfirmationMetrics, Direction, IndicatorReading, IndicatorState, Signal } from '../types/domain';
import { clamp } from '../utils/toolkit';
import { readyValue } from './indicator-pipeline';

export interface RuleVote {
  readonly rule: string;
  readonly direction: Direction;
  readonly weight: number;
}

/** A rule votes or abstains (null). Rules never see each other's output. */
export type SignalRule = (state: IndicatorState, cfg: SignalConfig) => RuleVote | null;

export type NoSignalReason =
  | 'WARMING'
  | 'NO_VOTES'
  | 'CONFLICT'
  | 'METRICS_NOT_FRESH'
  | 'IMBALANCE_DISAGREES'
  | 'LOW_VOLUME'
  | 'LOW_CONFIDENCE';

export type SignalDecision =
  | { readonly kind: 'signal'; readonly signal: Signal; readonly votes: readonly RuleVote[] }
  | { readonly kind: 'none'; readonly reason: NoSignalReason; readonly detail: string; readonly votes: readonly RuleVote[] };

function trendOf(fast: number, slow: number): Direction | null {
  if (fast > slow) return 'long';
  if (fast < slow) return 'short';
  return null;
}

/** True when the fast/slow relation flipped into `dir` within the retained history. */
function freshCross(fast: IndicatorReading, slow: IndicatorReading, dir: Direction): boolean {
  if (fast.status !== 'ready' || slow.status !== 'ready') return false;
  const n = Math.min(fast.history.length, slow.history.length);
  const f = fast.history.slice(fast.history.length - n);
  const s = slow.history.slice(slow.history.length - n);
  for (let i = 0; i < n - 1; i++) {
    if (trendOf(f[i], s[i]) !== dir) return true;
  }
  return false;
}

export const trendMomentumRule: SignalRule = (state, cfg) => {
  const { emaFast, emaSlow, rsi } = state.readings;
  const fast = readyValue(emaFast);
  const slow = readyValue(emaSlow);
  const r = readyValue(rsi);
  if (fast === null || slow === null || r === null) return null;
  const direction = trendOf(fast, slow);
  if (direction === null) return null;
  if (cfg.requireFreshCross && !freshCross(emaFast, emaSlow, direction)) return null;
  // exhaustion zone: no entries late into the move
  if (direction === 'long' && r >= cfg.rsiOverbought) return null;
  if (direction === 'short' && r <= cfg.rsiOversold) return null;
  return { rule: 'trend-momentum', direction, weight: cfg.trendWeight };
};

export const vwapBandRule: SignalRule = (state, cfg) => {
  const vwap = readyValue(state.readings.vwap);
  const atr = readyValue(state.readings.atr);
  if (vwap === null || atr === null || atr <= 0) return null;
  const deviation = (state.close - vwap) / atr;
  const size = Math.abs(deviation);
  if (size >= cfg.extremeBand) {
    return { rule: 'vwap-reversion', direction: deviation > 0 ? 'short' : 'long', weight: cfg.reversionWeight };
  }
  if (size >= cfg.band) {
    return { rule: 'vwap-band', direction: deviation > 0 ? 'long' : 'short', weight: cfg.reversionWeight };
  }
  return null;
};

export const DEFAULT_RULES: readonly SignalRule[] = [trendMomentumRule, vwapBandRule];

export function signalId(symbol: string, timestamp: number, direction: Direction): string {
  return `${symbol}-${timestamp}-${direction}`;
}

/**
 * Combines rule votes with the confirmation gate. Pure: the same inputs give the same decision.
 */
export class SignalEngine {
  constructor(
    private readonly cfg: SignalConfig,
    private readonly rules: readonly SignalRule[] = DEFAULT_RULES,
  ) {}

  decide(symbol: string, state: IndicatorState, metrics: ConfirmationMetrics): SignalDecision {
    const none = (reason: NoSignalReason, detail: string, votes: readonly RuleVote[] = []): SignalDecision =>
      ({ kind: 'none', reason, detail, votes });

    const atr = readyValue(state.readings.atr);
    if (atr === null || atr <= 0) return none('WARMING', 'ATR not ready');

    const votes: RuleVote[] = [];
    for (const rule of this.rules) {
      const vote = rule(state, this.cfg);
      if (vote) votes.push(vote);
    }
    if (votes.length === 0) return none('NO_VOTES', 'no rule voted');
    const direction = votes[0].direction;
    if (votes.some(v => v.direction !== direction)) return none('CONFLICT', 'rules disagree on direction', votes);

    if (metrics.status !== 'fresh') return none('METRICS_NOT_FRESH', `confirmation ${metrics.status}: ${metrics.reason}`, votes);
    const signed = direction === 'long' ? metrics.imbalanceRatio : -metrics.imbalanceRatio;
    if (!(signed > 0) || signed < this.cfg.minImbalance) {
      return none('IMBALANCE_DISAGREES', `imbalance ${metrics.imbalanceRatio.toFixed(3)} against ${direction}`, votes);
    }
    if (metrics.relativeVolume < this.cfg.minRelativeVolume) {
      return none('LOW_VOLUME', `relative volume ${metrics.relativeVolume.toFixed(2)} < ${this.cfg.minRelativeVolume}`, votes);
    }

    const confidence = clamp(votes.reduce((acc, v) => acc + v.weight, 0), 0, 1);
    if (confidence < this.cfg.minConfidence) return none('LOW_CONFIDENCE', `confidence ${confidence.toFixed(2)} < ${this.cfg.minConfidence}`, votes);

    const signal: Signal = Object.freeze({
      id: signalId(symbol, state.asOf, direction),
      symbol,
      direction,
      confidence,
      triggers: Object.freeze(votes.map(v => v.rule)),
      timestamp: state.asOf,
      referencePrice: state.close,
      atr,
    });
    return { kind: 'signal', signal, votes };
  }

  evaluate(symbol: string, state: IndicatorState, metrics: ConfirmationMetrics): Signal | null {
    const d = this.decide(symbol, state, metrics);
    return d.kind === 'signal' ? d.signal : null;
  }
}
