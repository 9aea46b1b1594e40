import fs from 'fs';
import path from 'path';
import { z } from 'zod';
import { warnOnce } from '../utils/logger';

export interface SymbolSpec {
  /** Smallest order quantity the venue accepts. */
  minQty: number;
  /** Quantity increment; sizes are floored to it. */
  qtyStep: number;
  /** Stop never sits nearer than this fraction of the entry price. */
  minStopDistancePct: number;
}

export const DEFAULT_SYMBOL_SPEC: SymbolSpec = { minQty: 0.001, qtyStep: 0.001, minStopDistancePct: 0.002 };

const specSchema = z.object({
  minQty: z.number().positive(),
  qtyStep: z.number().positive(),
  minStopDistancePct: z.number().min(0).max(0.5),
});

const fileSchema = z.object({
  default: specSchema.optional(),
  symbols: z.record(specSchema).default({}),
});

export class SymbolSpecs {
  constructor(
    private readonly specs: ReadonlyMap<string, SymbolSpec> = new Map(),
    readonly fallback: SymbolSpec = DEFAULT_SYMBOL_SPEC,
  ) {}

  get(symbol: string): SymbolSpec {
    return this.specs.get(symbol.toUpperCase()) ?? this.fallback;
  }

  has(symbol: string): boolean {
    return this.specs.has(symbol.toUpperCase());
  }

  static from(record: Record<string, SymbolSpec>, fallback: SymbolSpec = DEFAULT_SYMBOL_SPEC): SymbolSpecs {
    const map = new Map<string, SymbolSpec>();
    for (const [k, v] of Object.entries(record)) map.set(k.toUpperCase(), v);
    return new SymbolSpecs(map, fallback);
  }
}

/**
 * Reads per-symbol trading constraints from config/symbols.json (or SYMBOLS_CONFIG_FILE).
 * A missing or invalid file yields the defaults and a single warning.
 */
export function loadSymbolSpecs(cwd = process.cwd(), env: NodeJS.ProcessEnv = process.env): SymbolSpecs {
  const override = env.SYMBOLS_CONFIG_FILE;
  const file = override ? path.resolve(cwd, override) : path.resolve(cwd, 'config', 'symbols.json');
  let raw: string;
  try {
    raw = fs.readFileSync(file, 'utf8');
  } catch (e) {
    warnOnce(`symbols-missing:${file}`, 'symbol config not found, using default symbol spec', { file, error: e });
    return new SymbolSpecs();
  }
  let json: unknown;
  try {
    json = JSON.parse(raw);
  } catch (e) {
    warnOnce(`symbols-json:${file}`, 'symbol config is not valid JSON, using default symbol spec', { file, error: e });
    return new SymbolSpecs();
  }
  const parsed = fileSchema.safeParse(json);
  if (!parsed.success) {
    warnOnce(`symbols-invalid:${file}`, 'symbol config rejected, using default symbol spec', { file, issues: parsed.error.issues.map(i => `${i.path.join('.')}: ${i.message}`) });
    return new SymbolSpecs();
  }
  return SymbolSpecs.from(parsed.data.symbols, parsed.data.default ?? DEFAULT_SYMBOL_SPEC);
}
