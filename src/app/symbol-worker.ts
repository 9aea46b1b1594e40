import { isEngineError, toEngineError, type EngineError } from '../application/errors';
import { getEventBus, type EventBus } from '../application/events/bus';
import type { EngineConfig } from '../config/engine-config';
import { IndicatorPipeline } from '../core/indicator-pipeline';
import { MarketAnalyzer } from '../core/market-analyzer';
import type { PositionLifecycle } from '../core/position-lifecycle';
import type { Denial, RiskManager } from '../core/risk';
import type { NoSignalReason, SignalEngine } from '../core/signal-engine';
import type { MarketUpdate, Signal } from '../types/domain';
import { log } from '../utils/logger';

export type CycleOutcome =
  | { kind: 'observed' }
  | { kind: 'skipped'; reason: 'DATA_ERROR' | 'POSITION_ACTIVE' | 'FAILED'; detail: string }
  | { kind: 'no-signal'; reason: NoSignalReason; detail: string }
  | { kind: 'denied'; signal: Signal; error: Denial }
  | { kind: 'submitted'; signal: Signal; positionId: string }
  | { kind: 'entry-failed'; signal: Signal; error: EngineError };

export interface SymbolWorkerDeps {
  symbol: string;
  config: EngineConfig;
  signals: SignalEngine;
  risk: RiskManager;
  lifecycle: PositionLifecycle;
  bus?: EventBus;
  now?: () => number;
}

/**
 * One symbol's pipeline: closed candle → indicators → confirmation → signal →
 * risk gate → lifecycle. Updates are handled strictly in arrival order.
 */
export class SymbolWorker {
  readonly symbol: string;
  readonly pipeline: IndicatorPipeline;
  readonly analyzer: MarketAnalyzer;
  private readonly signals: SignalEngine;
  private readonly risk: RiskManager;
  private readonly lifecycle: PositionLifecycle;
  private readonly bus: EventBus;
  private readonly now: () => number;
  private readonly maxAgeMs: number;
  private iterator: AsyncIterator<MarketUpdate> | null = null;
  private stopped = false;
  private startedAt: number;
  private receivedAt: number | null = null;
  private staleReported = false;

  constructor(deps: SymbolWorkerDeps) {
    const { symbol, config } = deps;
    this.symbol = symbol;
    this.pipeline = new IndicatorPipeline(symbol, config.indicators, config.candleWindow, config.resetBoundary);
    this.analyzer = new MarketAnalyzer(symbol, config.analyzer);
    this.signals = deps.signals;
    this.risk = deps.risk;
    this.lifecycle = deps.lifecycle;
    this.bus = deps.bus ?? getEventBus();
    this.now = deps.now ?? Date.now;
    this.maxAgeMs = config.analyzer.maxAgeMs;
    this.startedAt = this.now();
  }

  /** Consumes `stream` until it ends or `stop()` is called. */
  async run(stream: AsyncIterable<MarketUpdate>): Promise<void> {
    const it = stream[Symbol.asyncIterator]();
    this.iterator = it;
    this.stopped = false;
    this.startedAt = this.now();
    try {
      while (!this.stopped) {
        const next = await it.next();
        if (next.done) break;
        await this.handle(next.value);
      }
    } finally {
      this.iterator = null;
    }
    log('INFO', 'WORKER', 'market data loop ended', { symbol: this.symbol });
  }

  async stop(): Promise<void> {
    this.stopped = true;
    const it = this.iterator;
    if (it?.return) await it.return();
  }

  async handle(update: MarketUpdate): Promise<CycleOutcome> {
    this.receivedAt = this.now();
    this.staleReported = false;
    try {
      if (update.type !== 'candle') {
        this.analyzer.onMarketUpdate(update);
        if (update.type === 'trade') await this.lifecycle.onPrice(this.symbol, update.trade.price);
        return { kind: 'observed' };
      }
      const state = this.pipeline.onClosedCandle(update.candle);
      await this.lifecycle.onPrice(this.symbol, update.candle.close);
      const current = this.lifecycle.stateOf(this.symbol);
      if (current !== 'Idle') return { kind: 'skipped', reason: 'POSITION_ACTIVE', detail: current };

      const decision = this.signals.decide(this.symbol, state, this.analyzer.metrics(this.now()));
      if (decision.kind === 'none') {
        log('DEBUG', 'SIGNAL', 'no signal', { symbol: this.symbol, reason: decision.reason, detail: decision.detail });
        return { kind: 'no-signal', reason: decision.reason, detail: decision.detail };
      }
      return await this.enter(decision.signal);
    } catch (e) {
      return this.onFailure(e);
    }
  }

  private async enter(signal: Signal): Promise<CycleOutcome> {
    this.bus.publish({ type: 'SIGNAL_GENERATED', symbol: this.symbol, signal });
    const approval = await this.risk.authorize(signal);
    if (!approval.ok) {
      const error = approval.error;
      this.bus.publish({ type: 'ENTRY_DENIED', symbol: this.symbol, signalId: signal.id, kind: error.kind, code: error.code, message: error.message });
      return { kind: 'denied', signal, error };
    }
    const opened = await this.lifecycle.open(signal, approval.value);
    if (!opened.ok) return { kind: 'entry-failed', signal, error: opened.error };
    return { kind: 'submitted', signal, positionId: opened.value.id };
  }

  private onFailure(e: unknown): CycleOutcome {
    const tagged = toEngineError(e, { symbol: this.symbol, action: 'handleUpdate' });
    if (isEngineError(e) && tagged.kind === 'DATA') {
      log('WARN', 'WORKER', 'cycle skipped on bad data', { symbol: this.symbol, code: tagged.code, message: tagged.message });
      this.bus.publish({ type: 'DATA_ERROR', symbol: this.symbol, code: tagged.code, message: tagged.message });
      return { kind: 'skipped', reason: 'DATA_ERROR', detail: tagged.code };
    }
    log('ERROR', 'WORKER', 'cycle failed, no signal this cycle', { symbol: this.symbol, error: e });
    return { kind: 'skipped', reason: 'FAILED', detail: tagged.message };
  }

  /**
   * Publishes DATA_STALE once when nothing arrived for maxAgeMs. Cleared by the
   * next update. Returns true when an event was published.
   */
  checkStale(now = this.now()): boolean {
    if (this.staleReported) return false;
    const since = this.receivedAt ?? this.startedAt;
    const age = now - since;
    if (age <= this.maxAgeMs) return false;
    this.staleReported = true;
    this.bus.publish({
      type: 'DATA_STALE',
      symbol: this.symbol,
      lastUpdateAt: this.receivedAt,
      ageMs: this.receivedAt === null ? null : age,
    });
    return true;
  }
}
