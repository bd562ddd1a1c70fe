import { z } from 'zod/v4';

import { DutError } from './errors.js';

export type KeyCollisionPolicy = 'error' | 'last-wins';

export interface AppConfig {
  deviceHostname?: string;
  deviceConsoleUrl?: string;
  deviceDialect?: string;

  waitTimeoutMs: number;
  waitIntervalMs: number;
  keyCollision: KeyCollisionPolicy;

  logLevel: string;
  logPretty: boolean;
}

const envSchema = z.object({
  DUT_HOSTNAME: z.string().optional(),
  DUT_CONSOLE_URL: z.string().optional(),
  DUT_DIALECT: z.string().optional(),

  DUT_WAIT_TIMEOUT_MS: z.string().optional(),
  DUT_WAIT_INTERVAL_MS: z.string().optional(),
  DUT_KEY_COLLISION: z.string().optional(),

  DUT_LOG_LEVEL: z.string().optional(),
  DUT_LOG_PRETTY: z.string().optional()
});

function parseBoolean(raw: string | undefined, defaultValue: boolean): boolean {
  if (raw === undefined) {
    return defaultValue;
  }

  const normalized = raw.trim().toLowerCase();
  if (['1', 'true', 'yes', 'on'].includes(normalized)) {
    return true;
  }
  if (['0', 'false', 'no', 'off'].includes(normalized)) {
    return false;
  }

  return defaultValue;
}

function parseNumber(raw: string | undefined, defaultValue: number, min: number, max: number): number {
  if (raw === undefined || raw.trim() === '') {
    return defaultValue;
  }
  const n = Number(raw);
  if (!Number.isFinite(n)) {
    return defaultValue;
  }
  return Math.min(max, Math.max(min, Math.floor(n)));
}

function parseKeyCollision(raw: string | undefined): KeyCollisionPolicy {
  const normalized = raw?.trim().toLowerCase().replace(/_/g, '-');
  if (normalized === 'last-wins') {
    return 'last-wins';
  }
  return 'error';
}

function parseDialect(raw: string | undefined): string | undefined {
  const normalized = raw?.trim().toLowerCase();
  return normalized ? normalized : undefined;
}

function parseOptionalString(raw: string | undefined): string | undefined {
  const trimmed = raw?.trim();
  return trimmed ? trimmed : undefined;
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const parsed = envSchema.parse(env);

  return {
    deviceHostname: parseOptionalString(parsed.DUT_HOSTNAME),
    deviceConsoleUrl: parseOptionalString(parsed.DUT_CONSOLE_URL),
    deviceDialect: parseDialect(parsed.DUT_DIALECT),

    waitTimeoutMs: parseNumber(parsed.DUT_WAIT_TIMEOUT_MS, 30_000, 0, 3_600_000),
    waitIntervalMs: parseNumber(parsed.DUT_WAIT_INTERVAL_MS, 100, 1, 60_000),
    keyCollision: parseKeyCollision(parsed.DUT_KEY_COLLISION),

    logLevel: parsed.DUT_LOG_LEVEL?.trim() || 'info',
    logPretty: parseBoolean(parsed.DUT_LOG_PRETTY, false)
  };
}

export function requireDeviceTarget(config: AppConfig): { hostname?: string; consoleUrl?: string } {
  if (!config.deviceHostname && !config.deviceConsoleUrl) {
    throw new DutError('CONFIG', 'You must specify a device: set DUT_HOSTNAME or DUT_CONSOLE_URL.');
  }
  return { hostname: config.deviceHostname, consoleUrl: config.deviceConsoleUrl };
}
