import type { EngineConfig } from './engine-config';
import { warnOnce, log } from '../utils/logger';

export interface ValidationResult {
  valid: boolean;
  errors: string[];
  warnings: string[];
}

const SYMBOL_RE = /^[A-Z0-9]+$/;

export function validateConfig(cfg: EngineConfig): ValidationResult {
  const errors: string[] = [];
  const warnings: string[] = [];
  const { risk, indicators, lifecycle, signal, analyzer } = cfg;

  if (cfg.symbols.length === 0) errors.push('at least one symbol required');
  for (const s of cfg.symbols) if (!SYMBOL_RE.test(s)) errors.push(`symbol format invalid: ${s}`);

  if (!(risk.minLeverage >= 1) || risk.maxLeverage < risk.minLeverage) errors.push('leverage bounds invalid');
  else if (risk.leverage < risk.minLeverage || risk.leverage > risk.maxLeverage) {
    errors.push(`leverage ${risk.leverage} outside [${risk.minLeverage}, ${risk.maxLeverage}]`);
  }
  if (!(risk.riskPerTrade > 0)) errors.push('riskPerTrade must be > 0');
  if (!(risk.stopMultiplier > 0)) errors.push('stopMultiplier must be > 0');
  if (!Number.isInteger(risk.maxTradesPerDay) || risk.maxTradesPerDay < 1 || risk.maxTradesPerDay > 50) errors.push('maxTradesPerDay must be an integer in 1..50');
  if (!(risk.maxDailyLoss > 0)) errors.push('maxDailyLoss must be > 0');
  if (!(risk.maxPositionSize > 0)) errors.push('maxPositionSize must be > 0');

  const periods = [indicators.smaPeriod, indicators.emaFastPeriod, indicators.emaSlowPeriod, indicators.rsiPeriod, indicators.atrPeriod];
  if (periods.some(p => !Number.isInteger(p) || p <= 0)) errors.push('indicator periods must be positive integers');
  if (indicators.emaFastPeriod >= indicators.emaSlowPeriod) errors.push('emaFastPeriod must be below emaSlowPeriod');
  const longest = Math.max(...periods, indicators.vwapMode === 'rolling' ? indicators.vwapPeriod : 0) + 1;
  if (cfg.candleWindow < longest) errors.push(`candleWindow ${cfg.candleWindow} shorter than the longest lookback (${longest})`);

  if (lifecycle.takeProfit.length === 0) errors.push('take-profit ladder required');
  const tpSum = lifecycle.takeProfit.reduce((acc, s) => acc + s.fraction, 0);
  if (tpSum > 1 + 1e-9) errors.push(`take-profit fractions sum to ${tpSum} (> 1)`);
  if (!(lifecycle.entryTimeoutMs > 0)) errors.push('entryTimeoutMs must be > 0');
  if (lifecycle.trailMode === 'trailing' && !(lifecycle.trailingStopPct > 0 && lifecycle.trailingStopPct < 100)) errors.push('trailingStopPct must be in (0, 100)');
  if (!(lifecycle.trailMinStepPct >= 0)) errors.push('trailMinStepPct must be >= 0');

  if (signal.minConfidence < 0 || signal.minConfidence > 1) errors.push('minConfidence must be in [0,1]');
  if (signal.extremeBand <= signal.band) errors.push('extremeBand must exceed band');
  if (signal.rsiOversold >= signal.rsiOverbought) errors.push('rsiOversold must be below rsiOverbought');
  if (!(analyzer.volumeWindowMs > 0) || !(analyzer.baselineWindows >= 1)) errors.push('volume window settings invalid');

  if (risk.maxDailyLoss < risk.riskPerTrade) warnings.push('maxDailyLoss below riskPerTrade: one stopped trade halts the day');
  if (cfg.resetBoundary.mode === 'exchange' && cfg.resetBoundary.utcOffsetMinutes === 0) warnings.push('exchange reset mode without RESET_UTC_OFFSET_MIN behaves like utc');
  if (tpSum < 1 - 1e-9) warnings.push(`take-profit fractions sum to ${tpSum}; the final target closes the remainder`);

  // Emit warnOnce for each warning (stable id prefix)
  for (const w of warnings) warnOnce('cfg:' + w, w);
  if (errors.length) log('WARN', 'CONFIG', 'invalid engine config detected', { errors, warnings });
  return { valid: errors.length === 0, errors, warnings };
}
