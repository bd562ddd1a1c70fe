import { DutError } from '../errors.js';
import { compileCapabilityPattern, type CapabilityPattern } from './capabilityMatcher.js';

export interface DeviceIdentity {
  dialect: string;
  sku: string;
}

export type CapabilityRequirement =
  | { kind: 'only-device-type'; pattern: RegExp }
  | { kind: 'skip-device-type'; pattern: RegExp }
  | { kind: 'only-dialects'; dialects: readonly string[] };

export type RequirementDecision = { run: true } | { run: false; reasons: string[] };

export function onlyDeviceType(pattern: CapabilityPattern): CapabilityRequirement {
  return { kind: 'only-device-type', pattern: compileCapabilityPattern(pattern) };
}

export function skipDeviceType(pattern: CapabilityPattern): CapabilityRequirement {
  return { kind: 'skip-device-type', pattern: compileCapabilityPattern(pattern) };
}

export function onlyDialects(...dialects: string[]): CapabilityRequirement {
  if (!dialects.length) {
    throw new DutError('BAD_REQUEST', 'onlyDialects needs at least one dialect');
  }
  return { kind: 'only-dialects', dialects };
}

/**
 * All requirements must hold for a test to run. Dialect requirements stack by
 * union, the way several dialect markers on one test allow any of them.
 */
export function evaluateRequirements(
  requirements: readonly CapabilityRequirement[],
  device: DeviceIdentity
): RequirementDecision {
  const reasons: string[] = [];
  const allowedDialects = new Set<string>();

  for (const requirement of requirements) {
    switch (requirement.kind) {
      case 'only-device-type':
        if (!requirement.pattern.test(device.sku)) {
          reasons.push(`Skipped on this SKU: ${device.sku} (only runs on ${requirement.pattern.source})`);
        }
        break;
      case 'skip-device-type':
        if (requirement.pattern.test(device.sku)) {
          reasons.push(`Skipped on this SKU: ${device.sku}`);
        }
        break;
      case 'only-dialects':
        for (const dialect of requirement.dialects) {
          allowedDialects.add(dialect);
        }
        break;
    }
  }

  if (allowedDialects.size && !allowedDialects.has(device.dialect)) {
    reasons.push(`cannot run on platform ${device.dialect}`);
  }

  return reasons.length ? { run: false, reasons } : { run: true };
}

export function shouldSkip(requirements: readonly CapabilityRequirement[], device: DeviceIdentity): boolean {
  return !evaluateRequirements(requirements, device).run;
}
