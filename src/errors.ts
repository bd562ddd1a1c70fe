export type ErrorCode =
  | 'INVALID_PATTERN'
  | 'UNKNOWN_DIALECT'
  | 'KEY_COLLISION'
  | 'UNTRANSLATABLE_COMMAND'
  | 'BAD_REQUEST'
  | 'CONFIG'
  | 'TRANSPORT'
  | 'TIMEOUT'
  | 'INTERNAL'
  | 'UNKNOWN';

export interface ErrorHint {
  retryable: boolean;
  fixHint: string;
}

const ERROR_HINTS: Record<ErrorCode, ErrorHint> = {
  INVALID_PATTERN: {
    retryable: false,
    fixHint: 'Fix the regular expression or replacement template of the named rule.'
  },
  UNKNOWN_DIALECT: {
    retryable: false,
    fixHint: 'Register a rule table for the dialect, or connect with a translator that knows it.'
  },
  KEY_COLLISION: {
    retryable: false,
    fixHint: 'Two reply keys normalize to the same name; use keyCollision "last-wins" or a different key transform.'
  },
  UNTRANSLATABLE_COMMAND: {
    retryable: false,
    fixHint: 'The device dialect has no equivalent command; gate the test with onlyDialects.'
  },
  BAD_REQUEST: {
    retryable: false,
    fixHint: 'Fix the arguments passed to the call.'
  },
  CONFIG: {
    retryable: false,
    fixHint: 'Set DUT_HOSTNAME or DUT_CONSOLE_URL and check the other DUT_* variables.'
  },
  TRANSPORT: {
    retryable: true,
    fixHint: 'Check device reachability and that the management API is enabled, then retry.'
  },
  TIMEOUT: {
    retryable: true,
    fixHint: 'Increase the wait timeout or check that the device applied the configuration.'
  },
  INTERNAL: {
    retryable: true,
    fixHint: 'Retry once; if it fails again, inspect debug logs.'
  },
  UNKNOWN: {
    retryable: true,
    fixHint: 'Retry once; if it fails again, inspect debug logs.'
  }
};

export function errorHint(code: ErrorCode): ErrorHint {
  const hint = ERROR_HINTS[code] ?? ERROR_HINTS.UNKNOWN;
  return { retryable: hint.retryable, fixHint: hint.fixHint };
}

export class DutError extends Error {
  public readonly code: ErrorCode;
  public readonly details?: Record<string, unknown>;

  constructor(
    code: ErrorCode,
    message: string,
    options?: {
      cause?: unknown;
      details?: Record<string, unknown>;
    }
  ) {
    super(message, { cause: options?.cause });
    this.name = 'DutError';
    this.code = code;
    this.details = options?.details;
  }
}

export function ensureError(value: unknown): Error {
  if (value instanceof Error) {
    return value;
  }
  return new Error(typeof value === 'string' ? value : JSON.stringify(value));
}

export function asDutError(value: unknown, fallbackCode: ErrorCode = 'INTERNAL'): DutError {
  if (value instanceof DutError) {
    return value;
  }

  const err = ensureError(value);

  if (err.name === 'AbortError') {
    return new DutError('TIMEOUT', err.message, { cause: err });
  }

  return new DutError(fallbackCode, err.message, { cause: err });
}
