import { describe, it, expect, vi, beforeEach } from 'vitest';

const { post } = vi.hoisted(() => ({ post: vi.fn() }));
vi.mock('axios', () => ({ default: { post } }));

import { WebhookNotifier } from '../../../src/adapters/webhook-notifier';
import type { EngineEvent } from '../../../src/application/events/types';
import type { Logger } from '../../../src/utils/logger';

const quiet: Logger = { debug: () => undefined, info: () => undefined, warn: () => undefined, error: () => undefined };
const event: EngineEvent = { type: 'RISK_RESET', day: '2024-01-02', previousDay: '2024-01-01', eventId: '1-1', ts: 1 };
const URL = 'https://hooks.example.test/notify';

describe('WebhookNotifier', () => {
  beforeEach(() => { post.mockReset(); });

  it('posts the text and the event as JSON', async () => {
    post.mockResolvedValueOnce({ status: 200, data: 'ok' });
    const n = new WebhookNotifier(URL, { timeoutMs: 1500, logger: quiet });
    await n.send(event, 'risk counters reset');
    expect(post).toHaveBeenCalledWith(
      URL,
      { text: 'risk counters reset', event },
      { timeout: 1500, headers: { 'Content-Type': 'application/json' } },
    );
    expect(n.name).toBe('webhook');
  });

  it('retries a transient failure once by default', async () => {
    post.mockRejectedValueOnce(Object.assign(new Error('reset'), { code: 'ECONNRESET' }));
    post.mockResolvedValueOnce({ status: 200, data: 'ok' });
    const n = new WebhookNotifier(URL, { retry: { backoffMs: 1, jitter: 0 }, logger: quiet });
    await n.send(event, 'x');
    expect(post).toHaveBeenCalledTimes(2);
  });

  it('gives up after the retry budget', async () => {
    post.mockRejectedValue({ response: { status: 503 } });
    const n = new WebhookNotifier(URL, { retry: { backoffMs: 1, jitter: 0 }, logger: quiet });
    await expect(n.send(event, 'x')).rejects.toMatchObject({ code: 'HTTP_503', context: { action: 'notify', type: 'RISK_RESET', eventId: '1-1' } });
    expect(post).toHaveBeenCalledTimes(2);
  });

  it('does not retry a rejected request', async () => {
    post.mockRejectedValue({ response: { status: 404 } });
    const n = new WebhookNotifier(URL, { logger: quiet });
    await expect(n.send(event, 'x')).rejects.toMatchObject({ code: 'HTTP_404' });
    expect(post).toHaveBeenCalledTimes(1);
  });
});
