import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import { createSilentLogger } from '../src/services/DebugLogger';
import { RoverApiClient } from '../src/services/RoverApiClient';
import { StatusPoller } from '../src/services/StatusPoller';
import { FetchLike } from '../src/types';
import { json } from './helpers';

function clientWith(fetchImpl: FetchLike) {
  const logger = createSilentLogger();
  const client = new RoverApiClient({
    statusUrl: 'http://rover.test:5000/api/status',
    controlBaseUrl: 'http://rover.test:5000/api/control',
    statusTimeoutMs: 3000,
    controlTimeoutMs: 2000,
    logger,
    fetchImpl,
  });
  return { client, logger };
}

describe('StatusPoller', () => {
  beforeEach(() => {
    vi.useFakeTimers();
  });

  afterEach(() => {
    vi.useRealTimers();
  });

  it('polls immediately and then on every interval', async () => {
    let battery = 90;
    const { client, logger } = clientWith(async () => json({ battery: battery-- }));
    const seen: unknown[] = [];
    const poller = new StatusPoller({ client, intervalMs: 5000, logger, onStatus: s => seen.push(s) });

    poller.start();
    await poller.settled();
    expect(seen).toEqual([{ battery: 90 }]);

    await vi.advanceTimersByTimeAsync(5000);
    await poller.settled();
    expect(seen).toEqual([{ battery: 90 }, { battery: 89 }]);
    expect(poller.getLatest()).toEqual({ battery: 89 });

    poller.stop();
    await vi.advanceTimersByTimeAsync(10000);
    expect(seen).toHaveLength(2);
    expect(poller.isRunning()).toBe(false);
  });

  it('logs failed polls and keeps going', async () => {
    const { client, logger } = clientWith(async () => json({}, 500));
    const onStatus = vi.fn();
    const poller = new StatusPoller({ client, intervalMs: 5000, logger, onStatus });

    poller.start();
    await poller.settled();
    poller.stop();

    expect(onStatus).not.toHaveBeenCalled();
    expect(logger.getLogs().at(-1)).toMatchObject({
      type: 'warn',
      message: 'Error fetching server status: Server returned status: 500',
    });
  });
});
