/**
 * Update session domain model.
 *
 * One session per orchestration run. The step log and remediation history
 * only ever grow; once an outcome is set the session is frozen and archived.
 */

import { TypedError } from './errors';
import { IssueReport } from './issue';
import { Revision, RevisionPatch } from './revision';

/** Orchestrator states. `done`, `aborted` and `rolled-back` are terminal. */
export enum UpdateState {
  Fetching = 'fetching',
  RiskCheck = 'risk-check',
  Building = 'building',
  Remediating = 'remediating',
  Activating = 'activating',
  RollingBack = 'rolling-back',
  Done = 'done',
  Aborted = 'aborted',
  RolledBack = 'rolled-back',
}

/**
 * Valid state transitions. Rolling back and aborting are reachable from
 * every state after the risk check; before it only aborting is.
 */
export const VALID_UPDATE_TRANSITIONS: Record<UpdateState, UpdateState[]> = {
  [UpdateState.Fetching]: [UpdateState.RiskCheck, UpdateState.Done, UpdateState.Aborted],
  [UpdateState.RiskCheck]: [UpdateState.Building, UpdateState.Aborted],
  [UpdateState.Building]: [UpdateState.Activating, UpdateState.Remediating, UpdateState.RollingBack, UpdateState.Aborted],
  [UpdateState.Remediating]: [UpdateState.Building, UpdateState.RollingBack, UpdateState.Aborted],
  [UpdateState.Activating]: [UpdateState.Done, UpdateState.RollingBack, UpdateState.Aborted],
  [UpdateState.RollingBack]: [UpdateState.RolledBack],
  [UpdateState.Done]: [],
  [UpdateState.Aborted]: [],
  [UpdateState.RolledBack]: [],
};

export enum SessionOutcome {
  Success = 'success',
  RolledBack = 'rolled-back',
  Aborted = 'aborted',
}

export enum StepStatus {
  Ok = 'ok',
  Failed = 'failed',
}

export enum FailureClass {
  FetchError = 'fetch-error',
  BuildError = 'build-error',
  ValidationError = 'validation-error',
  SwitchError = 'switch-error',
}

export type StepName =
  | 'fetch'
  | 'noop'
  | 'risk-check'
  | 'build'
  | 'remediate'
  | 'stage'
  | 'activate'
  | 'health-check'
  | 'rollback'
  | 'cancel';

/** One entry of the audit trail. */
export interface StepResult {
  stepName: StepName;
  startedAt: string;
  endedAt: string;
  durationMs: number;
  status: StepStatus;
  failureClass?: FailureClass;
  detail: string;
  error?: TypedError;
}

export interface RemediationAttempt {
  attemptNumber: number;
  /** Failure signature the attempt responded to (e.g. "missing-dependency"). */
  matchedFailureClass: string;
  /** Rule that matched; null when no rule matched. */
  ruleId: string | null;
  transformApplied: RevisionPatch | null;
  resultingRevisionId?: string;
  /** The build step run after this attempt, once it has finished. */
  resultingStepResult?: StepResult;
}

/** Effective policy for one session. */
export interface UpdatePolicy {
  maxRemediationAttempts: number;
  autoProceedOnCritical: boolean;
  timeoutMs: number;
  /** Rebuild the unchanged revision after a NoMatch instead of stopping. */
  rebuildOnNoMatch: boolean;
}

export interface UpdateSession {
  sessionId: string;
  targetId: string;
  /** Revision being built; replaced by each successful remediation. Null when the fetch failed. */
  revision: Revision | null;
  /** Revision as fetched from the configuration source. */
  fetchedRevisionId?: string;
  /** Generation that was active when the session started. */
  baselineGenerationId: number | null;
  candidateGenerationId?: number;
  policy: UpdatePolicy;
  startedAt: string;
  completedAt?: string;
  state: UpdateState;
  steps: StepResult[];
  remediations: RemediationAttempt[];
  remediationAttempts: number;
  issues: IssueReport[];
  notices: string[];
  outcome?: SessionOutcome;
  failureClass?: FailureClass;
  error?: TypedError;
  /** Set when a switch operation failed and the pointer needs a human. */
  manualActionRequired: boolean;
}

/** Terminal states map one-to-one onto outcomes. */
export const TERMINAL_OUTCOMES: Partial<Record<UpdateState, SessionOutcome>> = {
  [UpdateState.Done]: SessionOutcome.Success,
  [UpdateState.Aborted]: SessionOutcome.Aborted,
  [UpdateState.RolledBack]: SessionOutcome.RolledBack,
};
