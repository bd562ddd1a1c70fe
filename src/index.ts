export { loadConfig, requireDeviceTarget, type AppConfig, type KeyCollisionPolicy } from './config.js';
export { createLogger, type CreateLoggerOptions } from './logger.js';
export { DutError, asDutError, ensureError, errorHint, type ErrorCode, type ErrorHint } from './errors.js';

export { splitCommands, type CommandInput } from './translate/commands.js';
export {
  camelToSnake,
  isReplyObject,
  normalizeKeys,
  type KeyTransform,
  type NormalizeKeysOptions,
  type Reply,
  type ReplyObject
} from './translate/keyNormalizer.js';
export {
  UNTRANSLATABLE,
  applyRules,
  compileRules,
  expandTemplate,
  type CompiledRule,
  type Replacement,
  type RuleOutcome,
  type RuleSpec
} from './translate/patternMatcher.js';
export {
  DEFAULT_CANONICAL_DIALECT,
  Translator,
  type DialectDefinition,
  type DialectExtension,
  type TranslatorOptions
} from './translate/translator.js';
export { EOS_DIALECT, MOS_DIALECT, MOS_RULES, createDefaultTranslator } from './translate/dialects.js';

export {
  compileCapabilityPattern,
  extractSku,
  matchesDevice,
  type CapabilityPattern
} from './capability/capabilityMatcher.js';
export {
  evaluateRequirements,
  onlyDeviceType,
  onlyDialects,
  shouldSkip,
  skipDeviceType,
  type CapabilityRequirement,
  type DeviceIdentity,
  type RequirementDecision
} from './capability/requirements.js';

export {
  DEFAULT_WAIT_INTERVAL_MS,
  DEFAULT_WAIT_TIMEOUT_MS,
  Poller,
  pollFor,
  waitFor,
  type Predicate,
  type PollerOptions,
  type Producer,
  type WaitOptions
} from './poll/poller.js';

export {
  DeviceSession,
  type CommandTransport,
  type DeviceSessionOptions,
  type SendOptions
} from './session/deviceSession.js';
export {
  SOFTENING_SCRIPT,
  managementApiScripts,
  softenDevice,
  withManagementApi,
  type CliTransport,
  type ManagementApiOptions,
  type ManagementApiScripts
} from './session/managementApi.js';

export { createRuntime, type DutRuntime } from './runtime.js';
