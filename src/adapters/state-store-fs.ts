import path from "path";
import { z } from "zod";
import { writeFileAtomic, readJsonFile } from "../utils/fs-atomic";
import { log } from "../utils/logger";
import { DataError } from "../application/errors";
import type { EngineStateStore } from "../contracts";
import type { Position, RiskState } from "../types/domain";

const direction = z.enum(['long', 'short']);

const riskSchema = z.object({
  day: z.string(),
  dailyRealizedPnl: z.number(),
  dailyTradeCount: z.number().int().min(0),
  lastResetAt: z.number(),
  haltedUntil: z.number().nullable(),
  paused: z.boolean(),
  haltOverridden: z.boolean().default(false),
  consumedSignalIds: z.array(z.string()).default([]),
});

const positionSchema = z.object({
  id: z.string(),
  symbol: z.string(),
  direction,
  signalId: z.string(),
  reservationId: z.string(),
  requestedSize: z.number(),
  atr: z.number(),
  submittedAt: z.number(),
  state: z.enum(['EntryPending', 'Open', 'PartiallyClosed', 'Closed']),
  entryOrderId: z.string().nullable(),
  entryPrice: z.number(),
  size: z.number(),
  remainingSize: z.number(),
  stopLossPrice: z.number().nullable(),
  stopOrderId: z.string().nullable(),
  closeOrderId: z.string().nullable(),
  takeProfitLevels: z.array(z.object({
    index: z.number().int(),
    price: z.number(),
    fraction: z.number(),
    size: z.number(),
    orderId: z.string().nullable(),
    filled: z.boolean(),
  })),
  exits: z.array(z.object({
    reason: z.enum(['take-profit', 'stop-loss', 'close']),
    price: z.number(),
    size: z.number(),
    fraction: z.number(),
    pnl: z.number(),
    ts: z.number(),
  })),
  realizedPnl: z.number(),
  openedAt: z.number().nullable(),
  closedAt: z.number().nullable(),
  movedToBreakeven: z.boolean(),
  reviewReason: z.string().nullable().default(null),
  fills: z.record(z.object({ size: z.number(), notional: z.number() })).default({}),
});

function parseOrThrow<S extends z.ZodTypeAny>(schema: S, raw: unknown, file: string): z.output<S> {
  const parsed = schema.safeParse(raw);
  if (!parsed.success) {
    const detail = parsed.error.issues.slice(0, 3).map(i => `${i.path.join('.')}: ${i.message}`).join('; ');
    throw new DataError('STATE_CORRUPT', `persisted state rejected (${path.basename(file)}): ${detail}`, { action: 'loadState' });
  }
  return parsed.data;
}

/**
 * JSON files under `dir`, written atomically (temp file, fsync, rename).
 * A corrupt file fails loudly instead of starting from empty counters.
 */
export class FileStateStore implements EngineStateStore {
  constructor(private readonly dir: string) {}

  private file(name: string) { return path.join(this.dir, name); }

  private read(file: string): unknown {
    try {
      return readJsonFile(file);
    } catch (err) {
      throw new DataError('STATE_CORRUPT', `persisted state unreadable (${path.basename(file)})`, { action: 'loadState' }, err);
    }
  }

  async loadRisk(): Promise<RiskState | null> {
    const f = this.file('risk.json');
    const raw = this.read(f);
    return raw === undefined ? null : parseOrThrow(riskSchema, raw, f);
  }

  async saveRisk(state: RiskState): Promise<void> {
    this.write('risk.json', state);
  }

  async loadPositions(): Promise<Position[]> {
    const f = this.file('positions.json');
    const raw = this.read(f);
    return raw === undefined ? [] : parseOrThrow(z.array(positionSchema), raw, f);
  }

  async savePositions(positions: Position[]): Promise<void> {
    this.write('positions.json', positions);
  }

  private write(name: string, data: unknown) {
    const file = this.file(name);
    try {
      writeFileAtomic(file, JSON.stringify(data, null, 2));
    } catch (err) {
      log('ERROR', 'STATE', 'state store write failed', { file, error: err });
      throw err;
    }
  }
}

/** Keeps state in memory; copies on the way in and out. */
export class MemoryStateStore implements EngineStateStore {
  private risk: RiskState | null = null;
  private positions: Position[] = [];
  saves = 0;

  constructor(initial: { risk?: RiskState | null; positions?: Position[] } = {}) {
    this.risk = initial.risk ?? null;
    this.positions = initial.positions ?? [];
  }

  async loadRisk(): Promise<RiskState | null> {
    return this.risk ? { ...this.risk, consumedSignalIds: [...this.risk.consumedSignalIds] } : null;
  }

  async saveRisk(state: RiskState): Promise<void> {
    this.saves++;
    this.risk = { ...state, consumedSignalIds: [...state.consumedSignalIds] };
  }

  async loadPositions(): Promise<Position[]> {
    return this.positions.map(clonePosition);
  }

  async savePositions(positions: Position[]): Promise<void> {
    this.saves++;
    this.positions = positions.map(clonePosition);
  }
}

export function clonePosition(p: Position): Position {
  return {
    ...p,
    takeProfitLevels: p.takeProfitLevels.map(l => ({ ...l })),
    exits: p.exits.map(e => ({ ...e })),
    fills: Object.fromEntries(Object.entries(p.fills).map(([id, f]) => [id, { ...f }])),
  };
}
