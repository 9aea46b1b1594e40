/**
 * Sleep helper.
 * - When FAST_CI=1, waits are shortened to at most TEST_SLEEP_MS (default 5ms).
 */
export function sleep(ms: number): Promise<void> {
  let delay = Math.max(0, ms);
  if (process.env.FAST_CI === '1') {
    const cap = Math.max(0, Number(process.env.TEST_SLEEP_MS || '5'));
    delay = Math.min(delay, cap);
  }
  return new Promise(r => setTimeout(r, delay));
}

export function generateId(prefix = ''): string {
  const id = `${Date.now()}-${Math.random().toString(36).slice(2, 8)}`;
  return prefix ? `${prefix}-${id}` : id;
}

export function clamp(v: number, lo: number, hi: number): number {
  return Math.min(hi, Math.max(lo, v));
}

/**
 * Floor a quantity to the venue's lot step.
 * The small epsilon keeps values like 0.3 / 0.1 from flooring to 2 steps.
 */
export function floorToStep(qty: number, step: number): number {
  if (!(step > 0)) return qty;
  const steps = Math.floor(qty / step + 1e-9);
  const decimals = Math.max(0, Math.ceil(-Math.log10(step)));
  return Number((steps * step).toFixed(decimals));
}

/** Absolute-tolerance comparison for quantities after lot rounding. */
export function nearlyEqual(a: number, b: number, eps = 1e-9): boolean {
  return Math.abs(a - b) <= eps;
}
