/**
 * Remediation engine.
 *
 * A closed, ordered list of (predicate, transform) rules. The first rule
 * whose predicate accepts the build failure rewrites the revision; when
 * none does the engine answers NoMatch and the caller stops remediating.
 * Attempts beyond the configured maximum answer NoMatch unconditionally,
 * which bounds every remediation loop.
 */

import { Revision, RevisionPatch, deriveRevision, samePatch } from '../domain/revision';
import { BuildFailure } from './builder-adapter';
import { DEFAULT_REMEDIATION_RULES, RemediationRule } from './remediation-rules';

export const DEFAULT_MAX_REMEDIATION_ATTEMPTS = 3;
/** No policy may raise the bound past this. */
export const ABSOLUTE_MAX_REMEDIATION_ATTEMPTS = 10;

export type RemediationResult =
  | { matched: true; ruleId: string; patch: RevisionPatch; revision: Revision }
  | { matched: false; reason: 'no-match' | 'attempt-limit' };

export interface RemediationEngineOptions {
  rules?: readonly RemediationRule[];
  maxAttempts?: number;
}

export class RemediationEngine {
  private readonly rules: readonly RemediationRule[];
  readonly maxAttempts: number;

  constructor(options: RemediationEngineOptions = {}) {
    this.rules = options.rules ?? DEFAULT_REMEDIATION_RULES;
    this.maxAttempts = Math.min(
      options.maxAttempts ?? DEFAULT_MAX_REMEDIATION_ATTEMPTS,
      ABSOLUTE_MAX_REMEDIATION_ATTEMPTS,
    );
  }

  /**
   * Find a fix for `failure`. `attemptNumber` counts from 1; numbers above
   * the maximum are refused without consulting the rules.
   */
  remediate(failure: BuildFailure, revision: Revision, attemptNumber: number): RemediationResult {
    if (attemptNumber > this.maxAttempts) {
      return { matched: false, reason: 'attempt-limit' };
    }
    for (const rule of this.rules) {
      if (!rule.predicate(failure)) continue;
      const patch = rule.transform(failure);
      // The same fix already failed to help once; try the next rule.
      if (revision.patches.some((existing) => samePatch(existing, patch))) continue;
      return { matched: true, ruleId: rule.id, patch, revision: deriveRevision(revision, patch) };
    }
    return { matched: false, reason: 'no-match' };
  }

  ruleIds(): string[] {
    return this.rules.map((r) => r.id);
  }
}
