import type { Logger } from 'pino';

import { loadConfig, type AppConfig } from './config.js';
import { createLogger } from './logger.js';
import { Poller } from './poll/poller.js';
import { DeviceSession, type CommandTransport } from './session/deviceSession.js';
import { createDefaultTranslator } from './translate/dialects.js';
import type { Translator } from './translate/translator.js';

export interface DutRuntime {
  config: AppConfig;
  logger: Logger;
  translator: Translator;
  poller: Poller;
  /** Opens a session in DUT_DIALECT, or the canonical dialect when unset. */
  openSession(transport: CommandTransport, dialect?: string): DeviceSession;
}

export function createRuntime(config: AppConfig = loadConfig(), logger?: Logger): DutRuntime {
  const runtimeLogger = logger ?? createLogger(config.logLevel, { pretty: config.logPretty });

  const translator = createDefaultTranslator({ keyCollision: config.keyCollision, logger: runtimeLogger });

  return {
    config,
    logger: runtimeLogger,
    translator,
    poller: Poller.fromConfig(config, runtimeLogger),
    openSession: (transport, dialect) =>
      new DeviceSession({
        transport,
        dialect: dialect ?? config.deviceDialect ?? translator.canonicalDialect,
        translator,
        logger: runtimeLogger
      })
  };
}
