import { DutError, ensureError } from '../errors.js';

export type CapabilityPattern = string | RegExp;

const SKU_PATTERN = /DCS-7\S*/;

/**
 * Compiles a device-type pattern. Matching searches anywhere in the identifier,
 * so `DCS-7130` also matches `XDCS-7130`; anchor with `^` for a prefix match.
 */
export function compileCapabilityPattern(pattern: CapabilityPattern): RegExp {
  const source = typeof pattern === 'string' ? pattern : pattern.source;
  // g and y make test() stateful.
  const flags = typeof pattern === 'string' ? '' : pattern.flags.replace(/[gy]/g, '');
  try {
    return new RegExp(source, flags);
  } catch (error) {
    throw new DutError('INVALID_PATTERN', `Invalid device-type pattern /${source}/: ${ensureError(error).message}`, {
      cause: error,
      details: { pattern: source }
    });
  }
}

export function matchesDevice(identifier: string, pattern: CapabilityPattern): boolean {
  return compileCapabilityPattern(pattern).test(identifier);
}

/** Pulls the SKU (e.g. `DCS-7130-48L-R`) out of `show version` text output. */
export function extractSku(showVersionOutput: string): string {
  const match = SKU_PATTERN.exec(showVersionOutput);
  if (!match) {
    throw new DutError('BAD_REQUEST', 'No DCS-7 SKU found in show version output', {
      details: { output: showVersionOutput.slice(0, 200) }
    });
  }
  return match[0];
}
