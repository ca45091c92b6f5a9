/**
 * Update policy defaults, layering and validation.
 */

import { UpdatePolicy } from '../domain/session';
import { ABSOLUTE_MAX_REMEDIATION_ATTEMPTS, DEFAULT_MAX_REMEDIATION_ATTEMPTS } from './remediation';

export const DEFAULT_UPDATE_TIMEOUT_MS = 30 * 60 * 1000;
/** Largest delay a timer accepts; Node fires longer ones after 1ms. */
export const MAX_UPDATE_TIMEOUT_MS = 2_147_483_647;

export const DEFAULT_POLICY: UpdatePolicy = {
  maxRemediationAttempts: DEFAULT_MAX_REMEDIATION_ATTEMPTS,
  autoProceedOnCritical: false,
  timeoutMs: DEFAULT_UPDATE_TIMEOUT_MS,
  rebuildOnNoMatch: false,
};

/**
 * Merge policy layers over `base`; later layers win. Undefined fields in a
 * layer leave the earlier value alone.
 */
export function resolvePolicy(
  base: UpdatePolicy,
  ...layers: Array<Partial<UpdatePolicy> | undefined>
): UpdatePolicy {
  const resolved = { ...base };
  for (const layer of layers) {
    if (!layer) continue;
    if (layer.maxRemediationAttempts !== undefined) resolved.maxRemediationAttempts = layer.maxRemediationAttempts;
    if (layer.autoProceedOnCritical !== undefined) resolved.autoProceedOnCritical = layer.autoProceedOnCritical;
    if (layer.timeoutMs !== undefined) resolved.timeoutMs = layer.timeoutMs;
    if (layer.rebuildOnNoMatch !== undefined) resolved.rebuildOnNoMatch = layer.rebuildOnNoMatch;
  }
  return resolved;
}

/** Returns every problem with `policy`; empty means valid. */
export function validatePolicy(policy: UpdatePolicy): string[] {
  const errors: string[] = [];
  const max = policy.maxRemediationAttempts;
  if (!Number.isInteger(max) || max < 0 || max > ABSOLUTE_MAX_REMEDIATION_ATTEMPTS) {
    errors.push(`maxRemediationAttempts must be an integer between 0 and ${ABSOLUTE_MAX_REMEDIATION_ATTEMPTS}, got ${max}`);
  }
  if (!Number.isFinite(policy.timeoutMs) || policy.timeoutMs <= 0) {
    errors.push(`timeoutMs must be a positive number, got ${policy.timeoutMs}`);
  } else if (policy.timeoutMs > MAX_UPDATE_TIMEOUT_MS) {
    errors.push(`timeoutMs must be at most ${MAX_UPDATE_TIMEOUT_MS}, got ${policy.timeoutMs}`);
  }
  if (typeof policy.autoProceedOnCritical !== 'boolean') {
    errors.push('autoProceedOnCritical must be a boolean');
  }
  if (typeof policy.rebuildOnNoMatch !== 'boolean') {
    errors.push('rebuildOnNoMatch must be a boolean');
  }
  return errors;
}

/**
 * Read a policy override from an untrusted JSON body. Unknown keys are
 * ignored; wrongly typed known keys are reported.
 */
export function parsePolicyOverrides(value: unknown): { policy: Partial<UpdatePolicy>; errors: string[] } {
  const policy: Partial<UpdatePolicy> = {};
  const errors: string[] = [];
  if (value === undefined || value === null) return { policy, errors };
  if (typeof value !== 'object' || Array.isArray(value)) {
    return { policy, errors: ['policy must be an object'] };
  }
  const input = new Map(Object.entries(value));

  const max = input.get('maxRemediationAttempts');
  if (max !== undefined) {
    if (typeof max === 'number') policy.maxRemediationAttempts = max;
    else errors.push('maxRemediationAttempts must be a number');
  }
  const timeout = input.get('timeoutMs');
  if (timeout !== undefined) {
    if (typeof timeout === 'number') policy.timeoutMs = timeout;
    else errors.push('timeoutMs must be a number');
  }
  const autoProceed = input.get('autoProceedOnCritical');
  if (autoProceed !== undefined) {
    if (typeof autoProceed === 'boolean') policy.autoProceedOnCritical = autoProceed;
    else errors.push('autoProceedOnCritical must be a boolean');
  }
  const rebuild = input.get('rebuildOnNoMatch');
  if (rebuild !== undefined) {
    if (typeof rebuild === 'boolean') policy.rebuildOnNoMatch = rebuild;
    else errors.push('rebuildOnNoMatch must be a boolean');
  }
  return { policy, errors };
}
