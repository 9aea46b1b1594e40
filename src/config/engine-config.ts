import path from 'path';
import { z } from 'zod';
import { ValidationError } from '../application/errors';
import type { ResetBoundary } from '../utils/day-boundary';

export interface TakeProfitStep {
  /** Distance from entry in ATR multiples. */
  atrMultiple: number;
  /** Fraction of the original size closed at this level. */
  fraction: number;
}

/**
 * `ladder`: breakeven after the first target, then the previous target.
 * `trailing`: follows price at a fixed percentage.
 */
export type TrailMode = 'none' | 'breakeven' | 'ladder' | 'trailing';

export interface IndicatorConfig {
  smaPeriod: number;
  emaFastPeriod: number;
  emaSlowPeriod: number;
  rsiPeriod: number;
  atrPeriod: number;
  vwapMode: 'session' | 'rolling';
  vwapPeriod: number;
  historyLength: number;
}

export interface AnalyzerConfig {
  depth: number;
  volumeWindowMs: number;
  baselineWindows: number;
  maxAgeMs: number;
  unusualVolumeMultiplier: number;
}

export interface SignalConfig {
  trendWeight: number;
  reversionWeight: number;
  requireFreshCross: boolean;
  rsiOverbought: number;
  rsiOversold: number;
  band: number;
  extremeBand: number;
  minImbalance: number;
  minRelativeVolume: number;
  minConfidence: number;
}

export interface RiskConfig {
  riskPerTrade: number;
  stopMultiplier: number;
  maxTradesPerDay: number;
  maxDailyLoss: number;
  maxPositionSize: number;
  leverage: number;
  minLeverage: number;
  maxLeverage: number;
  persistHaltAcrossRestart: boolean;
}

export interface LifecycleConfig {
  entryType: 'limit' | 'market';
  entryTimeoutMs: number;
  takeProfit: TakeProfitStep[];
  trailMode: TrailMode;
  breakevenTriggerAtr: number;
  /** Distance of the trailing stop from price, in percent. */
  trailingStopPct: number;
  /** Smallest trailing move, in percent of the current stop. */
  trailMinStepPct: number;
  archiveSize: number;
}

export interface RetryConfig {
  attempts: number;
  backoffMs: number;
  maxBackoffMs: number;
  jitter: number;
}

export interface EngineConfig {
  symbols: string[];
  candleWindow: number;
  indicators: IndicatorConfig;
  analyzer: AnalyzerConfig;
  signal: SignalConfig;
  risk: RiskConfig;
  lifecycle: LifecycleConfig;
  resetBoundary: ResetBoundary;
  retry: RetryConfig;
  persistence: { enabled: boolean; dir: string };
  notify: { webhookUrl?: string; timeoutMs: number };
  engine: { housekeepingIntervalMs: number };
}

const TRUTHY = ['1', 'true', 'yes', 'on'];

function num(def: number) {
  return z.string().optional().transform((val, ctx) => {
    if (val == null || val.trim() === '') return def;
    const n = Number(val);
    if (!Number.isFinite(n)) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, message: `expected a number, got "${val}"` });
      return z.NEVER;
    }
    return n;
  });
}

function flag(def: boolean) {
  return z.string().optional().transform(val => (val == null || val.trim() === '' ? def : TRUTHY.includes(val.trim().toLowerCase())));
}

const ladderSchema = z.string().optional().transform((val, ctx): TakeProfitStep[] => {
  if (val == null || val.trim() === '') return [{ atrMultiple: 1, fraction: 0.5 }, { atrMultiple: 2, fraction: 0.5 }];
  const steps: TakeProfitStep[] = [];
  for (const part of val.split(',')) {
    const [m, f] = part.split(':').map(s => Number(s.trim()));
    if (!Number.isFinite(m) || !Number.isFinite(f) || m <= 0 || f <= 0) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, message: `bad take-profit step "${part}" (expected multiple:fraction)` });
      return z.NEVER;
    }
    steps.push({ atrMultiple: m, fraction: f });
  }
  return steps.sort((a, b) => a.atrMultiple - b.atrMultiple);
});

// Zod schema for environment validation
const envSchema = z.object({
  SYMBOLS: z.string().optional().default('BTCUSDT'),
  CANDLE_WINDOW: num(200),
  SMA_PERIOD: num(50),
  EMA_FAST: num(9),
  EMA_SLOW: num(21),
  RSI_PERIOD: num(14),
  ATR_PERIOD: num(14),
  VWAP_MODE: z.enum(['session', 'rolling']).optional().default('session'),
  VWAP_PERIOD: num(50),
  OB_DEPTH: num(10),
  VOLUME_WINDOW_MS: num(60_000),
  VOLUME_BASELINE_WINDOWS: num(20),
  MARKET_DATA_MAX_AGE_MS: num(15_000),
  UNUSUAL_VOLUME_MULT: num(1.5),
  TREND_WEIGHT: num(0.6),
  REVERSION_WEIGHT: num(0.4),
  REQUIRE_FRESH_CROSS: flag(false),
  RSI_OVERBOUGHT: num(70),
  RSI_OVERSOLD: num(30),
  VWAP_BAND_ATR: num(1),
  VWAP_EXTREME_ATR: num(3),
  MIN_IMBALANCE: num(0),
  MIN_RELATIVE_VOLUME: num(1.2),
  MIN_CONFIDENCE: num(0.5),
  RISK_PER_TRADE: num(10),
  STOP_ATR_MULT: num(1.5),
  MAX_TRADES_PER_DAY: num(12),
  MAX_DAILY_LOSS: num(50),
  MAX_POSITION_SIZE: num(1_000_000),
  LEVERAGE: num(3),
  MIN_LEVERAGE: num(1),
  MAX_LEVERAGE: num(5),
  RISK_PERSIST_HALT: flag(true),
  ENTRY_ORDER_TYPE: z.enum(['limit', 'market']).optional().default('limit'),
  ENTRY_TIMEOUT_MS: num(30_000),
  TP_LADDER: ladderSchema,
  TRAIL_MODE: z.enum(['none', 'breakeven', 'ladder', 'trailing']).optional().default('ladder'),
  BREAKEVEN_TRIGGER_ATR: num(0.75),
  TRAILING_STOP_PCT: num(0.2),
  TRAIL_MIN_STEP_PCT: num(0.1),
  POSITION_ARCHIVE_SIZE: num(100),
  RESET_MODE: z.enum(['utc', 'exchange']).optional().default('utc'),
  RESET_UTC_OFFSET_MIN: num(0),
  RETRY_ATTEMPTS: num(3),
  RETRY_BACKOFF_MS: num(200),
  RETRY_MAX_BACKOFF_MS: num(2_000),
  RETRY_JITTER: num(0.2),
  PERSIST_STATE: flag(true),
  STATE_DIR: z.string().optional(),
  NOTIFY_WEBHOOK_URL: z.string().optional(),
  NOTIFY_TIMEOUT_MS: num(5_000),
  HOUSEKEEPING_MS: num(1_000),
});

export function parseSymbols(raw: string): string[] {
  const out = raw.split(',').map(s => s.trim().toUpperCase().replace(/[/_-]/g, '')).filter(Boolean);
  return Array.from(new Set(out));
}

/**
 * Parses engine configuration from environment variables. Missing values fall
 * back to defaults; malformed values throw a ValidationError listing every issue.
 */
export function loadEngineConfig(env: NodeJS.ProcessEnv = process.env, cwd = process.cwd()): EngineConfig {
  const parsed = envSchema.safeParse(env);
  if (!parsed.success) {
    const detail = parsed.error.issues.map(i => `${i.path.join('.')}: ${i.message}`).join('; ');
    throw new ValidationError('CONFIG_INVALID', `invalid configuration: ${detail}`, { action: 'loadEngineConfig' });
  }
  const e = parsed.data;
  const webhookUrl = e.NOTIFY_WEBHOOK_URL?.trim();
  return {
    symbols: parseSymbols(e.SYMBOLS),
    candleWindow: e.CANDLE_WINDOW,
    indicators: {
      smaPeriod: e.SMA_PERIOD,
      emaFastPeriod: e.EMA_FAST,
      emaSlowPeriod: e.EMA_SLOW,
      rsiPeriod: e.RSI_PERIOD,
      atrPeriod: e.ATR_PERIOD,
      vwapMode: e.VWAP_MODE,
      vwapPeriod: e.VWAP_PERIOD,
      historyLength: 3,
    },
    analyzer: {
      depth: e.OB_DEPTH,
      volumeWindowMs: e.VOLUME_WINDOW_MS,
      baselineWindows: e.VOLUME_BASELINE_WINDOWS,
      maxAgeMs: e.MARKET_DATA_MAX_AGE_MS,
      unusualVolumeMultiplier: e.UNUSUAL_VOLUME_MULT,
    },
    signal: {
      trendWeight: e.TREND_WEIGHT,
      reversionWeight: e.REVERSION_WEIGHT,
      requireFreshCross: e.REQUIRE_FRESH_CROSS,
      rsiOverbought: e.RSI_OVERBOUGHT,
      rsiOversold: e.RSI_OVERSOLD,
      band: e.VWAP_BAND_ATR,
      extremeBand: e.VWAP_EXTREME_ATR,
      minImbalance: e.MIN_IMBALANCE,
      minRelativeVolume: e.MIN_RELATIVE_VOLUME,
      minConfidence: e.MIN_CONFIDENCE,
    },
    risk: {
      riskPerTrade: e.RISK_PER_TRADE,
      stopMultiplier: e.STOP_ATR_MULT,
      maxTradesPerDay: e.MAX_TRADES_PER_DAY,
      maxDailyLoss: e.MAX_DAILY_LOSS,
      maxPositionSize: e.MAX_POSITION_SIZE,
      leverage: e.LEVERAGE,
      minLeverage: e.MIN_LEVERAGE,
      maxLeverage: e.MAX_LEVERAGE,
      persistHaltAcrossRestart: e.RISK_PERSIST_HALT,
    },
    lifecycle: {
      entryType: e.ENTRY_ORDER_TYPE,
      entryTimeoutMs: e.ENTRY_TIMEOUT_MS,
      takeProfit: e.TP_LADDER,
      trailMode: e.TRAIL_MODE,
      breakevenTriggerAtr: e.BREAKEVEN_TRIGGER_ATR,
      trailingStopPct: e.TRAILING_STOP_PCT,
      trailMinStepPct: e.TRAIL_MIN_STEP_PCT,
      archiveSize: e.POSITION_ARCHIVE_SIZE,
    },
    resetBoundary: { mode: e.RESET_MODE, utcOffsetMinutes: e.RESET_UTC_OFFSET_MIN },
    retry: {
      attempts: e.RETRY_ATTEMPTS,
      backoffMs: e.RETRY_BACKOFF_MS,
      maxBackoffMs: e.RETRY_MAX_BACKOFF_MS,
      jitter: e.RETRY_JITTER,
    },
    persistence: {
      enabled: e.PERSIST_STATE,
      dir: path.resolve(cwd, e.STATE_DIR || '.state'),
    },
    notify: { webhookUrl: webhookUrl ? webhookUrl : undefined, timeoutMs: e.NOTIFY_TIMEOUT_MS },
    engine: { housekeepingIntervalMs: e.HOUSEKEEPING_MS },
  };
}

let __cachedEngineConfig: EngineConfig | null = null;
export function getEngineConfig(): EngineConfig {
  if (!__cachedEngineConfig) __cachedEngineConfig = loadEngineConfig();
  return __cachedEngineConfig;
}

/**
 * Test helper: reset cached engine config so subsequent calls re-read env.
 */
export function resetConfigCache() {
  __cachedEngineConfig = null;
}

export interface ConfigOverrides {
  symbols?: string[];
  candleWindow?: number;
  indicators?: Partial<IndicatorConfig>;
  analyzer?: Partial<AnalyzerConfig>;
  signal?: Partial<SignalConfig>;
  risk?: Partial<RiskConfig>;
  lifecycle?: Partial<LifecycleConfig>;
  resetBoundary?: Partial<ResetBoundary>;
  retry?: Partial<RetryConfig>;
  persistence?: Partial<EngineConfig['persistence']>;
  notify?: Partial<EngineConfig['notify']>;
  engine?: Partial<EngineConfig['engine']>;
}

/** Section-wise shallow merge over `base` (defaults when omitted). */
export function buildEngineConfig(o: ConfigOverrides = {}, base: EngineConfig = loadEngineConfig({})): EngineConfig {
  return {
    symbols: o.symbols ?? base.symbols,
    candleWindow: o.candleWindow ?? base.candleWindow,
    indicators: { ...base.indicators, ...o.indicators },
    analyzer: { ...base.analyzer, ...o.analyzer },
    signal: { ...base.signal, ...o.signal },
    risk: { ...base.risk, ...o.risk },
    lifecycle: { ...base.lifecycle, ...o.lifecycle },
    resetBoundary: { ...base.resetBoundary, ...o.resetBoundary },
    retry: { ...base.retry, ...o.retry },
    persistence: { ...base.persistence, ...o.persistence },
    notify: { ...base.notify, ...o.notify },
    engine: { ...base.engine, ...o.engine },
  };
}
