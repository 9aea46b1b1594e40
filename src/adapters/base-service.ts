import { sleep } from "../utils/toolkit";
import { logger as defaultLogger } from "../utils/logger";
import type { Level, Logger } from "../utils/logger";
import { isTransient, toEngineError, type EngineError, type ErrorContext } from "../application/errors";
import type { RetryConfig } from "../config/engine-config";

export type LogLevel = Extract<Level, 'DEBUG' | 'INFO' | 'WARN' | 'ERROR'>;

export interface RetryOptions extends Partial<RetryConfig> {
  category?: string;
  context?: ErrorContext;
}

export const DEFAULT_RETRY: RetryConfig = { attempts: 3, backoffMs: 200, maxBackoffMs: 2000, jitter: 0.2 };

/**
 * Delay before retry `i` (0-based): backoffMs·2^i capped at maxBackoffMs, then ±jitter.
 */
export function backoffDelay(i: number, cfg: RetryConfig, rand: () => number = Math.random): number {
  const base = Math.min(cfg.maxBackoffMs, cfg.backoffMs * Math.pow(2, i));
  if (!(cfg.jitter > 0)) return base;
  const sign = rand() < 0.5 ? -1 : 1;
  return Math.max(0, Math.floor(base * (1 + sign * cfg.jitter * rand())));
}

export class BaseService {
  protected logger?: Logger;
  protected retry: RetryConfig;

  constructor(retry: Partial<RetryConfig> = {}, logger?: Logger) {
    this.retry = { ...DEFAULT_RETRY, ...retry };
    this.logger = logger;
  }

  setLogger(logger: Logger) { this.logger = logger; }

  /**
   * Runs `fn`, retrying only TransientGatewayError with bounded exponential backoff.
   * Any other failure is tagged and rethrown at once; the final transient failure
   * is rethrown after `attempts` tries.
   */
  async withRetry<T>(fn: () => Promise<T>, label: string, options: RetryOptions = {}): Promise<T> {
    const cfg: RetryConfig = {
      attempts: options.attempts ?? this.retry.attempts,
      backoffMs: options.backoffMs ?? this.retry.backoffMs,
      maxBackoffMs: options.maxBackoffMs ?? this.retry.maxBackoffMs,
      jitter: options.jitter ?? this.retry.jitter,
    };
    const max = Math.max(1, Math.floor(cfg.attempts));
    const category = options.category || 'API';
    const context: ErrorContext = { action: label, ...options.context };
    let lastErr: EngineError | undefined;
    for (let i = 0; i < max; i++) {
      try {
        return await fn();
      } catch (e) {
        const tagged = toEngineError(e, context);
        lastErr = tagged;
        if (!isTransient(tagged)) {
          this.clog(category, 'ERROR', 'failed', { ...context, retries: i, cause: { kind: tagged.kind, code: tagged.code, message: tagged.message } });
          throw tagged;
        }
        if (i < max - 1) {
          const delay = backoffDelay(i, cfg);
          this.clog(category, 'WARN', 'retry', { ...context, retries: i + 1, delayMs: delay, cause: { code: tagged.code, message: tagged.message } });
          await sleep(delay);
        }
      }
    }
    const finalErr = lastErr ?? toEngineError(new Error(`${label} failed`), context);
    this.clog(category, 'ERROR', 'failed', { ...context, retries: max, cause: { code: finalErr.code, message: finalErr.message } });
    throw finalErr;
  }

  log(level: LogLevel, message: string, meta?: unknown) {
    const lg = this.logger ?? defaultLogger;
    switch (level) {
      case 'DEBUG': return lg.debug(message, meta);
      case 'INFO': return lg.info(message, meta);
      case 'WARN': return lg.warn(message, meta);
      case 'ERROR': return lg.error(message, meta);
    }
  }
  clog(category: string, level: LogLevel, message: string, meta?: unknown) {
    const lg = this.logger ?? defaultLogger;
    if (lg.log) return lg.log(level, category, message, meta);
    return this.log(level, message, meta);
  }
}

export default BaseService;
