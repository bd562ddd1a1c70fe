import { setTimeout as delay } from 'node:timers/promises';

import type { Logger } from 'pino';

import type { AppConfig } from '../config.js';
import { DutError } from '../errors.js';

export const DEFAULT_WAIT_TIMEOUT_MS = 30_000;
export const DEFAULT_WAIT_INTERVAL_MS = 100;

export type Predicate = () => unknown;

export type Producer<T> = () => T | null | undefined | Promise<T | null | undefined>;

export interface WaitOptions {
  timeoutMs?: number;
  intervalMs?: number;
  now?: () => number;
  sleep?: (ms: number) => Promise<void>;
  /** Errors it returns true for count as a miss and the wait goes on. */
  suppress?: (error: unknown) => boolean;
}

function sleepFor(ms: number): Promise<void> {
  return delay(ms);
}

function resolveTiming(options: WaitOptions): { timeoutMs: number; intervalMs: number } {
  const timeoutMs = options.timeoutMs ?? DEFAULT_WAIT_TIMEOUT_MS;
  const intervalMs = options.intervalMs ?? DEFAULT_WAIT_INTERVAL_MS;

  if (!Number.isFinite(timeoutMs)) {
    throw new DutError('BAD_REQUEST', `timeoutMs must be a finite number, got ${timeoutMs}`);
  }
  if (!Number.isFinite(intervalMs) || intervalMs <= 0) {
    throw new DutError('BAD_REQUEST', `intervalMs must be a positive number, got ${intervalMs}`);
  }
  return { timeoutMs, intervalMs };
}

async function attempt<T>(
  produce: Producer<T>,
  suppress: WaitOptions['suppress']
): Promise<T | null | undefined> {
  try {
    return await produce();
  } catch (error) {
    if (suppress?.(error)) {
      return undefined;
    }
    throw error;
  }
}

/**
 * Calls `produce` until it yields a value other than null or undefined, or until
 * `timeoutMs` has passed. It always runs at least once, so a zero timeout is a
 * single check. Errors thrown by `produce` end the wait immediately unless
 * `suppress` accepts them.
 */
export async function pollFor<T>(produce: Producer<T>, options: WaitOptions = {}): Promise<T | undefined> {
  const { timeoutMs, intervalMs } = resolveTiming(options);
  const now = options.now ?? Date.now;
  const sleep = options.sleep ?? sleepFor;
  const deadline = now() + timeoutMs;

  for (;;) {
    const value = await attempt(produce, options.suppress);
    if (value !== null && value !== undefined) {
      return value;
    }

    const remaining = deadline - now();
    if (remaining <= 0) {
      return undefined;
    }
    await sleep(Math.min(intervalMs, remaining));
  }
}

/** Resolves `true` as soon as `predicate` returns something truthy, `false` at the deadline. */
export async function waitFor(predicate: Predicate, options: WaitOptions = {}): Promise<boolean> {
  const observed = await pollFor<boolean>(async () => ((await predicate()) ? true : undefined), options);
  return observed === true;
}

export interface PollerOptions extends WaitOptions {
  logger?: Logger;
}

export class Poller {
  constructor(private readonly defaults: PollerOptions = {}) {}

  static fromConfig(config: Pick<AppConfig, 'waitTimeoutMs' | 'waitIntervalMs'>, logger?: Logger): Poller {
    return new Poller({ timeoutMs: config.waitTimeoutMs, intervalMs: config.waitIntervalMs, logger });
  }

  private merge(options: WaitOptions): WaitOptions {
    const { defaults } = this;
    return {
      timeoutMs: options.timeoutMs ?? defaults.timeoutMs,
      intervalMs: options.intervalMs ?? defaults.intervalMs,
      now: options.now ?? defaults.now,
      sleep: options.sleep ?? defaults.sleep,
      suppress: options.suppress ?? defaults.suppress
    };
  }

  get timeoutMs(): number {
    return this.defaults.timeoutMs ?? DEFAULT_WAIT_TIMEOUT_MS;
  }

  async waitFor(predicate: Predicate, options: WaitOptions = {}): Promise<boolean> {
    const merged = this.merge(options);
    const observed = await waitFor(predicate, merged);
    if (!observed) {
      this.defaults.logger?.debug({ timeoutMs: merged.timeoutMs ?? DEFAULT_WAIT_TIMEOUT_MS }, 'Wait deadline reached');
    }
    return observed;
  }

  async pollFor<T>(produce: Producer<T>, options: WaitOptions = {}): Promise<T | undefined> {
    return pollFor(produce, this.merge(options));
  }

  async waitForOrThrow(predicate: Predicate, message: string, options: WaitOptions = {}): Promise<void> {
    if (await this.waitFor(predicate, options)) {
      return;
    }
    const timeoutMs = this.merge(options).timeoutMs ?? DEFAULT_WAIT_TIMEOUT_MS;
    throw new DutError('TIMEOUT', `${message} (not observed within ${timeoutMs} ms)`, { details: { timeoutMs } });
  }
}
