import { describe, expect, test, vi } from 'vitest';

import { Poller } from '../../src/poll/poller.js';
import { DeviceSession, type CommandTransport } from '../../src/session/deviceSession.js';
import {
  SOFTENING_SCRIPT,
  managementApiScripts,
  softenDevice,
  withManagementApi,
  type CliTransport
} from '../../src/session/managementApi.js';

class FakeCli implements CliTransport {
  readonly sent: string[][] = [];

  async sendCommands(lines: readonly string[]): Promise<string[]> {
    this.sent.push([...lines]);
    return lines.map(() => '');
  }
}

const versionApi: CommandTransport = {
  sendCommand: async () => ({ version: '4.26.1FX-7130' }),
  sendCommands: async (lines) => lines.map(() => ({ version: '4.26.1FX-7130' }))
};

function instantPoller(timeoutMs = 1_000): Poller {
  let now = 0;
  return new Poller({
    timeoutMs,
    intervalMs: 10,
    now: () => now,
    sleep: async (ms) => {
      now += ms;
    }
  });
}

describe('managementApiScripts', () => {
  test('knows both dialects', () => {
    expect(managementApiScripts('mos')).toEqual({
      enable: ['configure', 'management http', 'no protocol secure', 'management api', 'no shutdown', 'end'],
      disable: ['configure', 'management api', 'shutdown', 'management http', 'default protocol', 'end']
    });
    expect(managementApiScripts('eos').warmup).toBe('wait-for-warmup Capi CapiApp');
  });

  test('fails on other dialects', () => {
    expect(() => managementApiScripts('junos')).toThrow('No management API scripts for dialect "junos"');
  });

  test('ignores names inherited from Object.prototype', () => {
    expect(() => managementApiScripts('toString')).toThrow('No management API scripts for dialect "toString"');
    expect(() => managementApiScripts('constructor')).toThrow('No management API scripts for dialect "constructor"');
  });
});

describe('softenDevice', () => {
  test('sends the standard setup script in one batch', async () => {
    const cli = new FakeCli();

    await softenDevice(cli);

    expect(cli.sent).toEqual([
      ['enable', 'configure', 'username admin privilege 15 nopassword', 'aaa authorization exec default local']
    ]);
    expect(cli.sent[0]).toEqual([...SOFTENING_SCRIPT]);
  });
});

describe('withManagementApi', () => {
  test('enables the API, waits for a connection, and disables it afterwards', async () => {
    const cli = new FakeCli();
    const session = new DeviceSession({ transport: versionApi, dialect: 'eos' });
    const connect = vi
      .fn<() => Promise<DeviceSession | null>>()
      .mockResolvedValueOnce(null)
      .mockResolvedValueOnce(null)
      .mockResolvedValue(session);

    const version = await withManagementApi({ cli, dialect: 'eos', poller: instantPoller(), connect }, async (api) => {
      expect(api).toBe(session);
      return api.sendCommand('show version');
    });

    const scripts = managementApiScripts('eos');
    expect(version).toEqual({ version: '4.26.1FX-7130' });
    expect(connect).toHaveBeenCalledTimes(3);
    expect(cli.sent).toEqual([[...scripts.enable], ['wait-for-warmup Capi CapiApp'], [...scripts.disable]]);
  });

  test('skips the warmup step on mos', async () => {
    const cli = new FakeCli();
    const session = new DeviceSession({ transport: versionApi, dialect: 'mos' });

    await withManagementApi(
      { cli, dialect: 'mos', poller: instantPoller(), connect: async () => session },
      async () => undefined
    );

    const scripts = managementApiScripts('mos');
    expect(cli.sent).toEqual([[...scripts.enable], [...scripts.disable]]);
  });

  test('times out when the API never accepts connections and still disables it', async () => {
    const cli = new FakeCli();
    const body = vi.fn(async () => undefined);

    await expect(
      withManagementApi({ cli, dialect: 'mos', poller: instantPoller(0), connect: async () => null }, body)
    ).rejects.toMatchObject({
      code: 'TIMEOUT',
      message: 'Management API on the mos device did not accept connections within 0 ms'
    });
    expect(body).not.toHaveBeenCalled();
    expect(cli.sent.at(-1)).toEqual([...managementApiScripts('mos').disable]);
  });

  test('disables the API when the body fails', async () => {
    const cli = new FakeCli();
    const session = new DeviceSession({ transport: versionApi, dialect: 'mos' });

    await expect(
      withManagementApi({ cli, dialect: 'mos', poller: instantPoller(), connect: async () => session }, async () => {
        throw new Error('assertion failed');
      })
    ).rejects.toThrow('assertion failed');
    expect(cli.sent).toHaveLength(2);
  });

  test('sends nothing for an unknown dialect', async () => {
    const cli = new FakeCli();

    await expect(
      withManagementApi({ cli, dialect: 'junos', poller: instantPoller(), connect: async () => null }, async () => 1)
    ).rejects.toMatchObject({ code: 'UNKNOWN_DIALECT' });
    expect(cli.sent).toEqual([]);
  });
});
