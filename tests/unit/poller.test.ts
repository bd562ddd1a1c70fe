import pino from 'pino';
import { describe, expect, test, vi } from 'vitest';

import { Poller, pollFor, waitFor, type WaitOptions } from '../../src/poll/poller.js';

function makeClock(): Required<Pick<WaitOptions, 'now' | 'sleep'>> & { sleeps: number[] } {
  let current = 0;
  const sleeps: number[] = [];
  return {
    sleeps,
    now: () => current,
    sleep: async (ms: number) => {
      sleeps.push(ms);
      current += ms;
    }
  };
}

describe('waitFor', () => {
  test('checks once with a zero timeout', async () => {
    const predicate = vi.fn(() => true);

    await expect(waitFor(predicate, { timeoutMs: 0 })).resolves.toBe(true);
    expect(predicate).toHaveBeenCalledTimes(1);
  });

  test('still checks once when the timeout is zero or negative and the check fails', async () => {
    const predicate = vi.fn(() => false);

    await expect(waitFor(predicate, { timeoutMs: 0 })).resolves.toBe(false);
    await expect(waitFor(predicate, { timeoutMs: -5 })).resolves.toBe(false);
    expect(predicate).toHaveBeenCalledTimes(2);
  });

  test('gives up once the timeout elapses', async () => {
    const predicate = vi.fn(() => false);
    const started = Date.now();

    await expect(waitFor(predicate, { timeoutMs: 50, intervalMs: 10 })).resolves.toBe(false);

    const elapsed = Date.now() - started;
    expect(elapsed).toBeGreaterThanOrEqual(49);
    expect(elapsed).toBeLessThan(2_000);
    expect(predicate.mock.calls.length).toBeGreaterThan(1);
  });

  test('returns as soon as the predicate holds', async () => {
    const clock = makeClock();
    const predicate = vi.fn().mockReturnValueOnce(false).mockReturnValueOnce(0).mockReturnValue('running');

    await expect(waitFor(predicate, clock)).resolves.toBe(true);
    expect(predicate).toHaveBeenCalledTimes(3);
    expect(clock.sleeps).toEqual([100, 100]);
  });

  test('shortens the last sleep to the deadline', async () => {
    const clock = makeClock();
    const predicate = vi.fn(() => false);

    await expect(waitFor(predicate, { ...clock, timeoutMs: 250, intervalMs: 100 })).resolves.toBe(false);
    expect(predicate).toHaveBeenCalledTimes(4);
    expect(clock.sleeps).toEqual([100, 100, 50]);
  });

  test('awaits async predicates', async () => {
    const clock = makeClock();
    let calls = 0;
    const predicate = async () => {
      calls += 1;
      return calls >= 2 ? { running: true } : null;
    };

    await expect(waitFor(predicate, clock)).resolves.toBe(true);
    expect(calls).toBe(2);
  });

  test('propagates predicate errors without retrying', async () => {
    const clock = makeClock();
    const predicate = vi
      .fn()
      .mockReturnValueOnce(false)
      .mockReturnValueOnce(false)
      .mockImplementationOnce(() => {
        throw new Error('device unreachable');
      });

    await expect(waitFor(predicate, { ...clock, timeoutMs: 10_000 })).rejects.toThrow('device unreachable');
    expect(predicate).toHaveBeenCalledTimes(3);
  });

  test('retries through errors the caller suppresses', async () => {
    const clock = makeClock();
    const refused = new Error('connection refused');
    const predicate = vi
      .fn()
      .mockImplementationOnce(() => {
        throw refused;
      })
      .mockReturnValue(true);

    await expect(waitFor(predicate, { ...clock, suppress: (error) => error === refused })).resolves.toBe(true);
    expect(predicate).toHaveBeenCalledTimes(2);
    expect(clock.sleeps).toEqual([100]);
  });

  test('still propagates errors the caller does not suppress', async () => {
    const clock = makeClock();
    const predicate = vi.fn(() => {
      throw new Error('bad credentials');
    });

    await expect(
      waitFor(predicate, { ...clock, suppress: (error) => error instanceof Error && error.message === 'timed out' })
    ).rejects.toThrow('bad credentials');
    expect(predicate).toHaveBeenCalledTimes(1);
  });

  test('rejects unusable intervals', async () => {
    await expect(waitFor(() => true, { intervalMs: 0 })).rejects.toMatchObject({
      code: 'BAD_REQUEST',
      message: 'intervalMs must be a positive number, got 0'
    });
    await expect(waitFor(() => true, { timeoutMs: Number.POSITIVE_INFINITY })).rejects.toMatchObject({
      code: 'BAD_REQUEST'
    });
  });
});

describe('pollFor', () => {
  test('returns the first value that is not null or undefined', async () => {
    const clock = makeClock();
    const produce = vi.fn().mockReturnValueOnce(undefined).mockReturnValueOnce(null).mockReturnValue(0);

    await expect(pollFor<number>(produce, clock)).resolves.toBe(0);
    expect(produce).toHaveBeenCalledTimes(3);
  });

  test('resolves undefined at the deadline', async () => {
    await expect(pollFor(() => null, { timeoutMs: 0 })).resolves.toBeUndefined();
  });
});

describe('Poller', () => {
  test('applies defaults from config', async () => {
    const poller = Poller.fromConfig({ waitTimeoutMs: 0, waitIntervalMs: 5 });
    const predicate = vi.fn(() => false);

    await expect(poller.waitFor(predicate)).resolves.toBe(false);
    expect(predicate).toHaveBeenCalledTimes(1);
    expect(poller.timeoutMs).toBe(0);
  });

  test('lets a call override its defaults', async () => {
    const clock = makeClock();
    const poller = new Poller({ ...clock, timeoutMs: 0, intervalMs: 20 });
    const predicate = vi.fn().mockReturnValueOnce(false).mockReturnValue(true);

    await expect(poller.waitFor(predicate, { timeoutMs: 1_000 })).resolves.toBe(true);
    expect(clock.sleeps).toEqual([20]);
  });

  test('keeps its defaults when a call passes undefined overrides', async () => {
    const clock = makeClock();
    const poller = new Poller({ ...clock, timeoutMs: 0 });
    const predicate = vi.fn(() => false);

    await expect(poller.waitFor(predicate, { timeoutMs: undefined, intervalMs: undefined })).resolves.toBe(false);
    expect(predicate).toHaveBeenCalledTimes(1);
    await expect(poller.waitForOrThrow(() => false, 'link down', { timeoutMs: undefined })).rejects.toMatchObject({
      message: 'link down (not observed within 0 ms)'
    });
  });

  test('throws a timeout error when asked to', async () => {
    const poller = new Poller({ timeoutMs: 0 });

    await expect(poller.waitForOrThrow(() => false, 'daemon sleeper never started')).rejects.toMatchObject({
      code: 'TIMEOUT',
      message: 'daemon sleeper never started (not observed within 0 ms)'
    });
    await expect(poller.waitForOrThrow(() => true, 'unused')).resolves.toBeUndefined();
  });

  test('logs when the deadline is reached', async () => {
    const lines: Record<string, unknown>[] = [];
    const logger = pino(
      { level: 'debug', base: undefined },
      {
        write(message: string) {
          const parsed: Record<string, unknown> = JSON.parse(message);
          lines.push(parsed);
        }
      }
    );
    const poller = new Poller({ timeoutMs: 0, logger });

    await poller.waitFor(() => false);

    expect(lines).toHaveLength(1);
    expect(lines[0]).toMatchObject({ level: 20, msg: 'Wait deadline reached', timeoutMs: 0 });
  });
});
