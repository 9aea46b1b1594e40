import { afterEach, beforeEach, vi } from 'vitest';
import { InMemoryEventBus, setEventBus } from '../application/events/bus';
import { resetConfigCache } from '../config/engine-config';
import { resetWarnOnce } from '../utils/logger';

let envSnapshot: NodeJS.ProcessEnv;

beforeEach(() => {
  envSnapshot = { ...process.env };
  process.env.TEST_MODE = '1';
  process.env.FAST_CI = '1';
  setEventBus(new InMemoryEventBus());
});

afterEach(() => {
  vi.restoreAllMocks();
  vi.clearAllTimers();
  vi.useRealTimers();
  process.env = envSnapshot;
  resetConfigCache();
  resetWarnOnce();
});
