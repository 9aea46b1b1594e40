import { ReconciliationError, toEngineError } from '../application/errors';
import { getEventBus, type EventBus } from '../application/events/bus';
import { formatPositions } from '../application/events/format-event';
import { registerLoggerSubscriber } from '../application/events/subscribers/logger-subscriber';
import { registerNotificationSubscriber } from '../application/events/subscribers/notification-subscriber';
import { SerialQueue } from '../application/serial-queue';
import { GatewayService } from '../adapters/gateway-service';
import { FileStateStore } from '../adapters/state-store-fs';
import type { EngineConfig } from '../config/engine-config';
import { SymbolSpecs } from '../config/symbols';
import type { EngineStateStore, GatewayAdapter, NotificationChannel } from '../contracts';
import { PositionLifecycle } from '../core/position-lifecycle';
import { RiskManager } from '../core/risk';
import { DEFAULT_RULES, SignalEngine, type SignalRule } from '../core/signal-engine';
import type { MarketUpdate, Position, RiskState, SymbolState, VenuePosition } from '../types/domain';
import { log } from '../utils/logger';
import { SymbolWorker, type CycleOutcome } from './symbol-worker';

export type EngineCommand =
  | { type: 'pause' }
  | { type: 'resume' }
  | { type: 'closeAll' }
  | { type: 'status' }
  | { type: 'positions' }
  | { type: 'clearHalt' }
  | { type: 'clearReview'; symbol: string };

export interface SymbolStatus {
  symbol: string;
  state: SymbolState;
  reviewReason: string | null;
  lastUpdateAt: number | null;
}

export interface EngineStatus {
  running: boolean;
  risk: RiskState;
  halted: boolean;
  reservedEntries: number;
  symbols: SymbolStatus[];
}

export type CommandResult =
  | { command: 'status'; ok: true; message: string; data: EngineStatus }
  | { command: 'positions'; ok: true; message: string; data: Position[] }
  | { command: EngineCommand['type']; ok: boolean; message: string; data?: undefined };

export interface EngineDeps {
  config: EngineConfig;
  /** Raw venue adapter; the engine wraps it with retries. */
  gateway: GatewayAdapter;
  specs?: SymbolSpecs;
  store?: EngineStateStore;
  bus?: EventBus;
  notifier?: NotificationChannel;
  rules?: readonly SignalRule[];
  now?: () => number;
  /** Register the logger subscriber on start. Default true. */
  logEvents?: boolean;
}

export interface StartOptions {
  /**
   * Subscribe each worker to the gateway's market-data stream. When false the
   * caller drives the workers with `feed()`.
   */
  streams?: boolean;
}

function sizeMatches(a: number, b: number, step: number): boolean {
  return Math.abs(a - b) <= Math.max(step / 2, 1e-9);
}

/**
 * Wires the per-symbol workers, the shared risk manager and the lifecycle to a
 * venue, and owns startup reconciliation, housekeeping and operator commands.
 */
export class ScalpingEngine {
  readonly config: EngineConfig;
  readonly gateway: GatewayService;
  readonly risk: RiskManager;
  readonly lifecycle: PositionLifecycle;
  readonly signals: SignalEngine;
  private readonly specs: SymbolSpecs;
  private readonly store?: EngineStateStore;
  private readonly bus: EventBus;
  private readonly notifier?: NotificationChannel;
  private readonly now: () => number;
  private readonly logEvents: boolean;
  private readonly workers = new Map<string, SymbolWorker>();
  private readonly commands = new SerialQueue();
  private loops: Promise<void>[] = [];
  private teardown: Array<() => void> = [];
  private timer: NodeJS.Timeout | null = null;
  private housekeeping: Promise<void> | null = null;
  private running = false;

  constructor(deps: EngineDeps) {
    const { config } = deps;
    this.config = config;
    this.bus = deps.bus ?? getEventBus();
    this.now = deps.now ?? Date.now;
    this.specs = deps.specs ?? new SymbolSpecs();
    this.store = deps.store ?? (config.persistence.enabled ? new FileStateStore(config.persistence.dir) : undefined);
    this.notifier = deps.notifier;
    this.logEvents = deps.logEvents ?? true;
    this.gateway = new GatewayService(deps.gateway, config.retry);
    this.signals = new SignalEngine(config.signal, deps.rules ?? DEFAULT_RULES);
    this.risk = new RiskManager({
      config: config.risk,
      boundary: config.resetBoundary,
      specs: this.specs,
      margin: () => this.gateway.queryMargin(),
      bus: this.bus,
      store: this.store,
      now: this.now,
    });
    this.lifecycle = new PositionLifecycle({
      config: config.lifecycle,
      specs: this.specs,
      gateway: this.gateway,
      risk: this.risk,
      bus: this.bus,
      store: this.store,
      now: this.now,
    });
    for (const symbol of config.symbols) {
      this.workers.set(symbol, new SymbolWorker({ symbol, config, signals: this.signals, risk: this.risk, lifecycle: this.lifecycle, bus: this.bus, now: this.now }));
    }
  }

  get isRunning(): boolean { return this.running; }

  worker(symbol: string): SymbolWorker | undefined {
    return this.workers.get(symbol);
  }

  async start(opts: StartOptions = {}): Promise<void> {
    if (this.running) return;
    if (this.logEvents) this.teardown.push(registerLoggerSubscriber(this.bus));
    if (this.notifier) this.teardown.push(registerNotificationSubscriber(this.notifier, undefined, this.bus));

    await this.risk.restore();
    if (this.store) this.lifecycle.restore(await this.store.loadPositions());
    await this.reconcile();

    this.teardown.push(this.gateway.subscribeOrderUpdates(update => {
      void this.lifecycle.onOrderUpdate(update).catch((e: unknown) => {
        log('ERROR', 'ENGINE', 'order update handling failed', { symbol: update.symbol, orderId: update.orderId, error: e });
      });
    }));

    this.running = true;
    for (const w of this.workers.values()) {
      if (opts.streams === false) continue;
      this.loops.push(w.run(this.gateway.subscribeMarketData(w.symbol)).catch((e: unknown) => {
        log('ERROR', 'ENGINE', 'market data loop failed', { symbol: w.symbol, error: e });
      }));
    }
    const every = this.config.engine.housekeepingIntervalMs;
    if (every > 0) {
      this.timer = setInterval(() => { void this.runHousekeeping(); }, every);
      this.timer.unref();
    }
    log('INFO', 'ENGINE', 'started', { symbols: this.config.symbols });
  }

  async stop(): Promise<void> {
    if (!this.running) return;
    this.running = false;
    if (this.timer) clearInterval(this.timer);
    this.timer = null;
    await Promise.all([...this.workers.values()].map(w => w.stop()));
    await Promise.all(this.loops);
    this.loops = [];
    if (this.housekeeping) await this.housekeeping;
    await this.lifecycle.idle();
    for (const off of this.teardown.splice(0)) off();
    await this.bus.flush();
    log('INFO', 'ENGINE', 'stopped');
  }

  /** Hands one update to its symbol's worker (manual driving). */
  async feed(update: MarketUpdate): Promise<CycleOutcome | null> {
    const w = this.workers.get(update.symbol);
    return w ? w.handle(update) : null;
  }

  /** Waits for queued lifecycle work and event handlers to finish. */
  async settle(): Promise<void> {
    await this.lifecycle.idle();
    await this.bus.flush();
    await this.lifecycle.idle();
  }

  /**
   * Compares local positions with the venue. Any disagreement puts the symbol
   * into ManualReview; nothing is auto-corrected. A symbol restored in
   * ManualReview is reported again.
   */
  async reconcile(): Promise<string[]> {
    const venue = await this.gateway.queryPositions();
    const venueBySymbol = new Map<string, VenuePosition>(venue.map(v => [v.symbol, v]));
    const symbols = new Set<string>([...this.config.symbols, ...this.lifecycle.symbols(), ...venueBySymbol.keys()]);
    const flagged: string[] = [];
    for (const symbol of symbols) {
      const local = this.lifecycle.positionOf(symbol);
      const remote = venueBySymbol.get(symbol) ?? null;
      const held = local && local.state !== 'EntryPending' ? local : null;
      const step = this.specs.get(symbol).qtyStep;
      let problem: string | null = null;
      if (held && !remote) problem = `local ${held.direction} ${held.remainingSize} not found at venue`;
      else if (!held && remote) problem = `venue holds ${remote.direction} ${remote.size} unknown locally`;
      else if (held && remote && (held.direction !== remote.direction || !sizeMatches(held.remainingSize, remote.size, step))) {
        problem = `local ${held.direction} ${held.remainingSize} vs venue ${remote.direction} ${remote.size}`;
      }
      let code = 'POSITION_MISMATCH';
      const pendingReview = this.lifecycle.stateOf(symbol) === 'ManualReview' ? this.lifecycle.reviewReasonOf(symbol) : null;
      if (!problem && pendingReview !== null) {
        code = 'REVIEW_PENDING';
        problem = `still in manual review: ${pendingReview}`;
      }
      if (!problem) continue;
      const error = new ReconciliationError(code, problem, { symbol, action: 'reconcile' });
      log('ERROR', 'ENGINE', 'reconciliation mismatch', { symbol, code: error.code, message: error.message });
      await this.lifecycle.markManualReview(symbol, error.message);
      this.bus.publish({
        type: 'RECONCILIATION_REQUIRED',
        symbol,
        local: held ? { direction: held.direction, size: held.remainingSize } : null,
        venue: remote,
        message: error.message,
      });
      flagged.push(symbol);
    }
    return flagged;
  }

  /** One housekeeping pass: rollover, entry timeouts, staleness. Never overlaps itself. */
  runHousekeeping(): Promise<void> {
    if (this.housekeeping) return this.housekeeping;
    const pass = (async () => {
      const now = this.now();
      await this.risk.checkRollover();
      await this.lifecycle.checkTimeouts(now);
      for (const w of this.workers.values()) w.checkStale(now);
    })()
      .catch((e: unknown) => { log('ERROR', 'ENGINE', 'housekeeping failed', { error: e }); })
      .finally(() => { this.housekeeping = null; });
    this.housekeeping = pass;
    return pass;
  }

  status(): EngineStatus {
    return {
      running: this.running,
      risk: this.risk.snapshot(),
      halted: this.risk.isHalted(this.now()),
      reservedEntries: this.risk.reservedCount,
      symbols: this.config.symbols.map(symbol => ({
        symbol,
        state: this.lifecycle.stateOf(symbol),
        reviewReason: this.lifecycle.reviewReasonOf(symbol),
        lastUpdateAt: this.workers.get(symbol)?.analyzer.lastUpdateAt() ?? null,
      })),
    };
  }

  /** Operator commands run one at a time, off the market-data loops. */
  submitCommand(cmd: EngineCommand): Promise<CommandResult> {
    return this.commands.run(async () => {
      const result = await this.execute(cmd).catch((e: unknown): CommandResult => {
        const tagged = toEngineError(e, { action: cmd.type });
        return { command: cmd.type, ok: false, message: `${tagged.code}: ${tagged.message}` };
      });
      this.bus.publish({ type: 'COMMAND_EXECUTED', command: cmd.type, ok: result.ok, message: result.message });
      return result;
    });
  }

  private async execute(cmd: EngineCommand): Promise<CommandResult> {
    switch (cmd.type) {
      case 'pause':
        await this.risk.pause();
        return { command: cmd.type, ok: true, message: 'new entries paused' };
      case 'resume':
        await this.risk.resume();
        return { command: cmd.type, ok: true, message: 'new entries resumed' };
      case 'closeAll': {
        const n = await this.lifecycle.closeAll();
        return { command: cmd.type, ok: true, message: `close requested for ${n} symbol(s)` };
      }
      case 'clearHalt':
        await this.risk.clearHalt();
        return { command: cmd.type, ok: true, message: 'risk halt cleared until next reset' };
      case 'clearReview': {
        const cleared = await this.lifecycle.clearReview(cmd.symbol);
        return { command: cmd.type, ok: cleared, message: cleared ? `${cmd.symbol} back to Idle` : `${cmd.symbol} is not in manual review` };
      }
      case 'status': {
        const data = this.status();
        const states = data.symbols.map(s => `${s.symbol}=${s.state}`).join(' ');
        return { command: cmd.type, ok: true, message: `${data.halted ? 'halted' : data.risk.paused ? 'paused' : 'active'}; trades ${data.risk.dailyTradeCount}, pnl ${data.risk.dailyRealizedPnl.toFixed(2)}; ${states}`, data };
      }
      case 'positions': {
        const data = this.lifecycle.snapshots();
        return { command: cmd.type, ok: true, message: formatPositions(data), data };
      }
    }
  }
}
