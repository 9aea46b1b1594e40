import { vi, expect } from 'vitest';

export interface CapturedLog {
  level: string;
  category?: string;
  message: string;
  data?: unknown;
}

export function setupJsonLogs() {
  process.env.TEST_MODE = '0';
  process.env.LOG_JSON = '1';
  process.env.LOG_LEVEL = 'DEBUG';
}

function parseLine(line: unknown): CapturedLog | null {
  try {
    const e: unknown = JSON.parse(String(line));
    if (typeof e !== 'object' || e === null) return null;
    const level = 'level' in e ? e.level : undefined;
    const message = 'message' in e ? e.message : undefined;
    if (typeof level !== 'string' || typeof message !== 'string') return null;
    const category = 'category' in e && typeof e.category === 'string' ? e.category : undefined;
    const data = 'data' in e && Array.isArray(e.data) ? e.data[0] : undefined;
    return { level, category, message, data };
  } catch {
    // plain-text line: not a structured log
    return null;
  }
}

/** Collects JSON log lines; requires setupJsonLogs(). Console output is silenced. */
export function captureLogs(): CapturedLog[] {
  const logs: CapturedLog[] = [];
  const sink = (line: unknown) => {
    const parsed = parseLine(line);
    if (parsed) logs.push(parsed);
  };
  vi.spyOn(console, 'log').mockImplementation(sink);
  vi.spyOn(console, 'warn').mockImplementation(sink);
  vi.spyOn(console, 'error').mockImplementation(sink);
  return logs;
}

export function expectJsonLog(logs: CapturedLog[], category: string, level: string, msgIncludes?: string, metaKeys?: string[]) {
  const hit = logs.find(l => l.category === category && l.level === level && (!msgIncludes || l.message.includes(msgIncludes)));
  expect(hit, `expected log ${category}/${level} containing '${msgIncludes}'`).toBeTruthy();
  if (hit && metaKeys && metaKeys.length) {
    for (const k of metaKeys) expect(hit.data, `missing meta ${k}`).toHaveProperty(k);
  }
  return hit;
}
