import type { Logger } from 'pino';

import { DutError } from '../errors.js';
import type { Poller } from '../poll/poller.js';
import { EOS_DIALECT, MOS_DIALECT } from '../translate/dialects.js';
import type { DeviceSession } from './deviceSession.js';

/** Plain-text CLI channel (SSH or console), used here only to toggle the management API. */
export interface CliTransport {
  sendCommands(lines: readonly string[]): Promise<string[]>;
}

export interface ManagementApiScripts {
  enable: readonly string[];
  disable: readonly string[];
  warmup?: string;
}

const MANAGEMENT_API_SCRIPTS: Readonly<Record<string, ManagementApiScripts>> = {
  [EOS_DIALECT]: {
    enable: [
      'configure',
      'management api http-commands',
      'no shutdown',
      'validate-output',
      'management http-server',
      'protocol http',
      'end'
    ],
    disable: [
      'configure',
      'management http-server',
      'no protocol http',
      'management api http-commands',
      'shutdown',
      'no validate-output',
      'end'
    ],
    warmup: 'wait-for-warmup Capi CapiApp'
  },
  [MOS_DIALECT]: {
    enable: ['configure', 'management http', 'no protocol secure', 'management api', 'no shutdown', 'end'],
    disable: ['configure', 'management api', 'shutdown', 'management http', 'default protocol', 'end']
  }
};

export function managementApiScripts(dialect: string): ManagementApiScripts {
  const known = Object.prototype.hasOwnProperty.call(MANAGEMENT_API_SCRIPTS, dialect);
  const scripts = known ? MANAGEMENT_API_SCRIPTS[dialect] : undefined;
  if (!scripts) {
    throw new DutError('UNKNOWN_DIALECT', `No management API scripts for dialect "${dialect}"`, {
      details: { dialect }
    });
  }
  return scripts;
}

/** Standard operating environment: a passwordless admin and local exec authorization. */
export const SOFTENING_SCRIPT: readonly string[] = [
  'enable',
  'configure',
  'username admin privilege 15 nopassword',
  'aaa authorization exec default local'
];

export async function softenDevice(cli: CliTransport, logger?: Logger): Promise<void> {
  logger?.debug({ lines: SOFTENING_SCRIPT }, 'Softening device');
  await cli.sendCommands(SOFTENING_SCRIPT);
}

export interface ManagementApiOptions {
  cli: CliTransport;
  dialect: string;
  poller: Poller;
  /** Resolves null while the API is not accepting connections yet. */
  connect: () => Promise<DeviceSession | null>;
  logger?: Logger;
}

/**
 * Enables the device's management API over the CLI, waits until `connect`
 * yields a session, runs `body`, and disables the API again afterwards.
 */
export async function withManagementApi<T>(
  options: ManagementApiOptions,
  body: (session: DeviceSession) => Promise<T>
): Promise<T> {
  const scripts = managementApiScripts(options.dialect);

  options.logger?.debug({ dialect: options.dialect }, 'Enabling management API');
  await options.cli.sendCommands(scripts.enable);

  try {
    if (scripts.warmup) {
      await options.cli.sendCommands([scripts.warmup]);
    }

    const session = await options.poller.pollFor<DeviceSession>(options.connect);
    if (!session) {
      throw new DutError(
        'TIMEOUT',
        `Management API on the ${options.dialect} device did not accept connections within ${options.poller.timeoutMs} ms`,
        { details: { dialect: options.dialect, timeoutMs: options.poller.timeoutMs } }
      );
    }

    return await body(session);
  } finally {
    options.logger?.debug({ dialect: options.dialect }, 'Disabling management API');
    await options.cli.sendCommands(scripts.disable);
  }
}
