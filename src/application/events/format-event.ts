import type { Level } from '../../utils/logger';
import type { Position } from '../../types/domain';
import type { EngineEvent } from './types';

function px(n: number): string {
  return String(Number(n.toFixed(6)));
}

function money(n: number): string {
  return `${n >= 0 ? '+' : ''}${n.toFixed(2)}`;
}

function pct(f: number): string {
  return `${Math.round(f * 100)}%`;
}

/** One-line human message for notifications and the event log. */
export function formatEvent(e: EngineEvent): string {
  switch (e.type) {
    case 'SIGNAL_GENERATED':
      return `${e.symbol} signal ${e.signal.direction} conf=${e.signal.confidence.toFixed(2)} [${e.signal.triggers.join(',')}] @ ${px(e.signal.referencePrice)}`;
    case 'ENTRY_DENIED':
      return `${e.symbol} entry denied: ${e.code} (${e.message})`;
    case 'ENTRY_SUBMITTED':
      return `${e.symbol} entry ${e.direction} ${px(e.size)} ${e.price === null ? 'at market' : `@ ${px(e.price)}`} (order ${e.orderId})`;
    case 'POSITION_OPENED': {
      const tps = e.takeProfits.map(t => `${px(t.price)}x${pct(t.fraction)}`).join(' ');
      return `${e.symbol} opened ${e.direction} ${px(e.size)} @ ${px(e.entryPrice)} SL ${px(e.stopLossPrice)}${tps ? ` TP ${tps}` : ''}`;
    }
    case 'ENTRY_CANCELLED':
      return `${e.symbol} entry cancelled (${e.reason})${e.detail ? `: ${e.detail}` : ''}`;
    case 'TAKE_PROFIT_HIT':
      return `${e.symbol} TP${e.level + 1} filled ${px(e.size)} @ ${px(e.price)} pnl ${money(e.pnl)}, remaining ${px(e.remainingSize)}`;
    case 'STOP_MOVED':
      return `${e.symbol} stop ${px(e.from)} -> ${px(e.to)} (${e.reason})`;
    case 'STOP_LOSS_HIT':
      return `${e.symbol} stop-loss ${px(e.size)} @ ${px(e.price)} pnl ${money(e.pnl)}`;
    case 'POSITION_CLOSED':
      return `${e.symbol} closed by ${e.reason}, pnl ${money(e.realizedPnl)}`;
    case 'RISK_HALT':
      return `risk halt: daily pnl ${money(e.dailyRealizedPnl)} reached -${e.maxDailyLoss}, entries stopped until ${new Date(e.haltedUntil).toISOString()}`;
    case 'RISK_RESET':
      return `risk counters reset for ${e.day} (was ${e.previousDay})`;
    case 'ORDER_ERROR':
      return `${e.symbol} order error in ${e.state} during ${e.action}: ${e.kind}/${e.code} ${e.message}`;
    case 'DATA_ERROR':
      return `${e.symbol} data error ${e.code}: ${e.message}`;
    case 'DATA_STALE':
      return `${e.symbol} market data stale${e.ageMs === null ? ' (never received)' : ` for ${Math.round(e.ageMs / 1000)}s`}`;
    case 'RECONCILIATION_REQUIRED':
      return `${e.symbol} needs manual review: ${e.message}`;
    case 'COMMAND_EXECUTED':
      return `command ${e.command} ${e.ok ? 'ok' : 'failed'}: ${e.message}`;
  }
}

const LEVELS: Partial<Record<EngineEvent['type'], Level>> = {
  SIGNAL_GENERATED: 'DEBUG',
  ENTRY_DENIED: 'DEBUG',
  RISK_HALT: 'WARN',
  DATA_ERROR: 'WARN',
  DATA_STALE: 'WARN',
  ORDER_ERROR: 'ERROR',
  RECONCILIATION_REQUIRED: 'ERROR',
};

export function eventLevel(e: EngineEvent): Level {
  return LEVELS[e.type] ?? 'INFO';
}

export function formatPositions(positions: readonly Position[]): string {
  if (positions.length === 0) return 'no open positions';
  return positions
    .map(p => `${p.symbol} ${p.state} ${p.direction} ${px(p.remainingSize)}/${px(p.size)} @ ${px(p.entryPrice)} SL ${p.stopLossPrice === null ? '-' : px(p.stopLossPrice)} pnl ${money(p.realizedPnl)}`)
    .join('\n');
}
