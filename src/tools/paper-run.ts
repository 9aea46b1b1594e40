#!/usr/bin/env node
import dotenv from 'dotenv';
import { PaperGateway } from '../adapters/paper-gateway';
import { WebhookNotifier } from '../adapters/webhook-notifier';
import { ScalpingEngine } from '../app/engine';
import { ValidationError } from '../application/errors';
import { InMemoryEventBus } from '../application/events/bus';
import { buildEngineConfig, loadEngineConfig } from '../config/engine-config';
import { loadSymbolSpecs } from '../config/symbols';
import { validateConfig } from '../config/validate-config';
import { log } from '../utils/logger';
import { SyntheticMarket, updateTime } from './synthetic-market';

export interface PaperArgs {
  candles: number;
  seed: number;
  balance: number;
  symbol?: string;
  persist: boolean;
  json: boolean;
}

export interface PaperSummary {
  symbol: string;
  candles: number;
  seed: number;
  signals: number;
  denied: number;
  opened: number;
  closed: number;
  wins: number;
  losses: number;
  pnl: number;
  errors: number;
  venueRealizedPnl: number;
  equity: number;
  finalState: string;
  halted: boolean;
}

function readFlag(argv: string[], name: string): string | undefined {
  const i = argv.indexOf(`--${name}`);
  return i >= 0 ? argv[i + 1] : undefined;
}

export function parseArgs(argv: string[]): PaperArgs {
  const n = (name: string, def: number) => {
    const v = Number(readFlag(argv, name));
    return Number.isFinite(v) && v > 0 ? v : def;
  };
  return {
    candles: Math.floor(n('candles', 1440)),
    seed: Math.floor(n('seed', 42)),
    balance: n('balance', 10_000),
    symbol: readFlag(argv, 'symbol')?.toUpperCase(),
    persist: argv.includes('--persist'),
    json: argv.includes('--json'),
  };
}

/**
 * Drives the engine over a seeded synthetic market against the paper venue,
 * then closes everything and tallies the session.
 */
export async function runPaperSession(args: PaperArgs, env: NodeJS.ProcessEnv = process.env): Promise<PaperSummary> {
  const base = loadEngineConfig(env);
  const symbol = args.symbol ?? base.symbols[0];
  const config = buildEngineConfig({
    symbols: [symbol],
    persistence: { enabled: args.persist },
    engine: { housekeepingIntervalMs: 0 },
  }, base);
  const check = validateConfig(config);
  if (!check.valid) {
    throw new ValidationError('CONFIG_INVALID', `invalid configuration: ${check.errors.join('; ')}`, { action: 'paperRun' });
  }

  const market = new SyntheticMarket({ symbol, seed: args.seed, candleMs: 60_000 });
  let clock = market.closeTime - market.candleMs;
  const now = () => clock;
  const bus = new InMemoryEventBus(now);
  const gateway = new PaperGateway({ balance: args.balance, leverage: config.risk.leverage, now });
  const notifier = config.notify.webhookUrl ? new WebhookNotifier(config.notify.webhookUrl, { timeoutMs: config.notify.timeoutMs }) : undefined;
  const engine = new ScalpingEngine({ config, gateway, specs: loadSymbolSpecs(), bus, notifier, now });

  const tally = { signals: 0, denied: 0, opened: 0, closed: 0, wins: 0, losses: 0, pnl: 0, errors: 0 };
  bus.subscribe('SIGNAL_GENERATED', () => { tally.signals++; });
  bus.subscribe('ENTRY_DENIED', () => { tally.denied++; });
  bus.subscribe('POSITION_OPENED', () => { tally.opened++; });
  bus.subscribe('ORDER_ERROR', () => { tally.errors++; });
  bus.subscribe('POSITION_CLOSED', e => {
    tally.closed++;
    tally.pnl += e.realizedPnl;
    if (e.realizedPnl > 0) tally.wins++;
    else tally.losses++;
  });

  await engine.start({ streams: false });
  for (let i = 0; i < args.candles; i++) {
    for (const update of market.next()) {
      clock = updateTime(update, market.candleMs);
      gateway.push(update);
      await engine.feed(update);
      await engine.settle();
    }
    await engine.runHousekeeping();
  }
  await engine.submitCommand({ type: 'closeAll' });
  await engine.settle();
  const status = engine.status();
  await engine.stop();

  return {
    symbol,
    candles: args.candles,
    seed: args.seed,
    ...tally,
    pnl: Number(tally.pnl.toFixed(2)),
    venueRealizedPnl: Number(gateway.realizedPnl.toFixed(2)),
    equity: Number(gateway.equity.toFixed(2)),
    finalState: status.symbols.map(s => `${s.symbol}=${s.state}`).join(' '),
    halted: status.halted,
  };
}

async function main() {
  dotenv.config();
  const args = parseArgs(process.argv.slice(2));
  const summary = await runPaperSession(args);
  if (args.json) {
    console.log(JSON.stringify(summary));
    return;
  }
  console.log(`paper run ${summary.symbol}: ${summary.candles} candles (seed ${summary.seed})`);
  console.log(`  signals ${summary.signals}, denied ${summary.denied}, opened ${summary.opened}, closed ${summary.closed} (${summary.wins}W/${summary.losses}L)`);
  console.log(`  realized pnl ${summary.pnl}, venue pnl ${summary.venueRealizedPnl}, equity ${summary.equity}`);
  console.log(`  order errors ${summary.errors}, final ${summary.finalState}${summary.halted ? ' (halted)' : ''}`);
}

if (require.main === module) {
  main().catch((err: unknown) => {
    log('FATAL', 'PAPER', 'paper run failed', { error: err });
    process.exitCode = 1;
  });
}
