/**
 * Update orchestrator: the control loop of one update session.
 *
 * Drives a target from fetching a revision through the risk check, bounded
 * build remediation and the atomic generation switch, to exactly one of
 * three outcomes: success, rolled-back or aborted. Every step is recorded on
 * the session; failures inside a session are recorded, never thrown.
 *
 * Terminal sessions are frozen, archived, audited and reported exactly once.
 */

import { v4 as uuid } from 'uuid';
import { TargetDefinition } from '../adapters/interfaces';
import { TargetRegistry } from '../adapters/target-registry';
import { AuditInput, AuditService } from '../audit/audit-service';
import {
  TypedError,
  buildFailedError,
  createTypedError,
  fetchError,
  healthCheckFailedError,
  invalidRevisionError,
  remediationExhaustedError,
  riskAbortError,
  sessionAlreadyRunningError,
  sessionCanceledError,
  sessionTimeoutError,
  switchError,
  targetNotFoundError,
  validationError,
} from '../domain/errors';
import { Generation } from '../domain/generation';
import { IssueRecommendation, IssueVerdict, isBlockingReport } from '../domain/issue';
import { Revision, describePatch, originRevisionId, validateRevision } from '../domain/revision';
import {
  FailureClass,
  RemediationAttempt,
  SessionOutcome,
  StepName,
  StepResult,
  StepStatus,
  UpdatePolicy,
  UpdateSession,
  UpdateState,
} from '../domain/session';
import { GenerationStore, GenerationStoreError, GenerationStoreRegistry } from '../generations/generation-store';
import { Reporter } from '../reporting/reporter';
import { Store } from '../storage/store';
import { logger as rootLogger, Logger } from '../logger';
import { BuildFailure, BuildOutcome, BuilderAdapter } from './builder-adapter';
import { CancellationError, raceAbort } from './cancellation';
import { IssueDetector } from './issue-detector';
import { DEFAULT_POLICY, resolvePolicy, validatePolicy } from './policy';
import { RemediationEngine, RemediationResult } from './remediation';
import { RemediationRule } from './remediation-rules';
import { isTerminalUpdateState, outcomeFor, transitionUpdateState } from './state-machine';

/** Orchestrator dependencies. */
export interface OrchestratorDeps {
  store: Store;
  generations: GenerationStoreRegistry;
  targets: TargetRegistry;
  auditService: AuditService;
  reporter: Reporter;
  /** Configured default policy; targets and callers override it. */
  defaultPolicy?: UpdatePolicy;
  rules?: readonly RemediationRule[];
}

export interface RunUpdateOptions {
  /** Aborting cancels the session. */
  signal?: AbortSignal;
  /** Recorded on audit entries; defaults to the system actor. */
  actorId?: string;
}

/** The update orchestrator. */
export class UpdateOrchestrator {
  private readonly defaultPolicy: UpdatePolicy;
  /** Targets with a session in flight. */
  private runningTargets = new Set<string>();
  private readonly log: Logger;

  constructor(private deps: OrchestratorDeps) {
    this.defaultPolicy = deps.defaultPolicy ?? DEFAULT_POLICY;
    this.log = rootLogger.child({ module: 'orchestrator' });
  }

  /** True while a session for `targetId` is running. */
  isRunning(targetId: string): boolean {
    return this.runningTargets.has(targetId);
  }

  /**
   * Run one update session for a target and return the terminal session.
   *
   * Throws `OrchestratorError` only when no session could be started:
   * unknown target, invalid policy, a session already in flight for the
   * target, or an unreadable generation store.
   */
  async runUpdate(
    targetId: string,
    policy?: Partial<UpdatePolicy>,
    options: RunUpdateOptions = {},
  ): Promise<UpdateSession> {
    const target = this.deps.targets.get(targetId);
    if (!target) {
      throw new OrchestratorError(targetNotFoundError(targetId));
    }

    const resolved = resolvePolicy(this.defaultPolicy, target.policy, policy);
    const problems = validatePolicy(resolved);
    if (problems.length > 0) {
      throw new OrchestratorError(
        validationError(`Invalid update policy: ${problems.join('; ')}`, { problems }),
      );
    }

    if (this.runningTargets.has(targetId)) {
      throw new OrchestratorError(sessionAlreadyRunningError(targetId));
    }
    this.runningTargets.add(targetId);

    try {
      let store: GenerationStore;
      try {
        store = await this.deps.generations.forTarget(targetId);
      } catch (err) {
        if (err instanceof GenerationStoreError) throw new OrchestratorError(err.typedError);
        throw err;
      }

      const run = new SessionRun(target, store, resolved, {
        auditService: this.deps.auditService,
        rules: this.deps.rules,
        actorId: options.actorId,
      });
      const session = await run.execute(options.signal);
      await this.finish(session, options.actorId);
      return session;
    } finally {
      this.runningTargets.delete(targetId);
    }
  }

  /** Freeze, archive, audit and report a terminal session. */
  private async finish(session: UpdateSession, actorId?: string): Promise<void> {
    deepFreeze(session);

    try {
      await this.deps.store.sessions.append(session);
    } catch (err) {
      this.log.error('Session archive failed', {
        targetId: session.targetId,
        sessionId: session.sessionId,
        error: errorMessage(err),
      });
    }

    try {
      await this.deps.auditService.record({
        targetId: session.targetId,
        actorId,
        action: 'update.completed',
        resourceType: 'session',
        resourceId: session.sessionId,
        outcome: session.outcome === SessionOutcome.Success ? 'success' : 'failure',
        details: {
          outcome: session.outcome,
          revisionId: session.revision?.id ?? null,
          failureClass: session.failureClass ?? null,
          errorCode: session.error?.code ?? null,
          remediationAttempts: session.remediationAttempts,
        },
      });
    } catch (err) {
      this.log.error('Audit record failed', { sessionId: session.sessionId, error: errorMessage(err) });
    }

    await this.deps.reporter.report(session);

    this.log.info('Update session finished', {
      targetId: session.targetId,
      sessionId: session.sessionId,
      outcome: session.outcome,
      revisionId: session.revision?.id,
    });
  }
}

interface SessionRunOptions {
  auditService: AuditService;
  rules?: readonly RemediationRule[];
  actorId?: string;
}

/**
 * One session's worth of state. Each `handle*` method performs the work of
 * one state and ends with a transition.
 */
class SessionRun {
  readonly session: UpdateSession;
  private readonly controller = new AbortController();
  private cancelReason: TypedError | undefined;
  private readonly detector: IssueDetector;
  private readonly builder: BuilderAdapter;
  private readonly remediation: RemediationEngine;
  private readonly log: Logger;

  private lastFailure: BuildFailure | undefined;
  private artifactRef: string | undefined;
  /** Set after the first NoMatch; later attempts skip the rules. */
  private noMatchSeen = false;

  constructor(
    private readonly target: TargetDefinition,
    private readonly store: GenerationStore,
    policy: UpdatePolicy,
    private readonly options: SessionRunOptions,
  ) {
    const sessionId = `ses_${uuid()}`;
    this.session = {
      sessionId,
      targetId: target.id,
      revision: null,
      baselineGenerationId: store.current()?.id ?? null,
      policy: { ...policy },
      startedAt: new Date().toISOString(),
      state: UpdateState.Fetching,
      steps: [],
      remediations: [],
      remediationAttempts: 0,
      issues: [],
      notices: [],
      manualActionRequired: false,
    };
    this.detector = new IssueDetector(target.issueRegistry);
    this.builder = new BuilderAdapter(target.builder);
    this.remediation = new RemediationEngine({ rules: options.rules, maxAttempts: policy.maxRemediationAttempts });
    this.log = rootLogger.child({ module: 'orchestrator', targetId: target.id, sessionId });
  }

  private get signal(): AbortSignal {
    return this.controller.signal;
  }

  async execute(external?: AbortSignal): Promise<UpdateSession> {
    const { sessionId } = this.session;
    const onExternalAbort = () => this.cancel(sessionCanceledError(sessionId, abortReason(external)));
    if (external?.aborted) {
      onExternalAbort();
    } else {
      external?.addEventListener('abort', onExternalAbort, { once: true });
    }
    const timeoutMs = this.session.policy.timeoutMs;
    const timer = setTimeout(() => this.cancel(sessionTimeoutError(sessionId, timeoutMs)), timeoutMs);

    this.log.info('Update session started', { baselineGenerationId: this.session.baselineGenerationId });
    await this.audit({
      action: 'update.started',
      resourceType: 'session',
      resourceId: sessionId,
      outcome: 'success',
      details: { policy: this.session.policy, baselineGenerationId: this.session.baselineGenerationId },
    });

    try {
      while (!isTerminalUpdateState(this.session.state)) {
        await this.step();
      }
    } finally {
      clearTimeout(timer);
      external?.removeEventListener('abort', onExternalAbort);
    }
    return this.session;
  }

  private async step(): Promise<void> {
    const state = this.session.state;
    if (this.signal.aborted && state !== UpdateState.RollingBack) {
      this.handleCancellation();
      return;
    }
    switch (state) {
      case UpdateState.Fetching:
        return this.handleFetch();
      case UpdateState.RiskCheck:
        return this.handleRiskCheck();
      case UpdateState.Building:
        return this.handleBuild();
      case UpdateState.Remediating:
        return this.handleRemediation();
      case UpdateState.Activating:
        return this.handleActivation();
      case UpdateState.RollingBack:
        return this.handleRollback();
      default:
        return;
    }
  }

  // ─── States ──────────────────────────────────────────────────────────────

  private async handleFetch(): Promise<void> {
    const started = Date.now();
    let fetched: Revision;
    try {
      fetched = await raceAbort(() => this.target.source.fetchLatest({ signal: this.signal }), this.signal);
    } catch (err) {
      if (this.signal.aborted) return this.handleCancellation();
      const error = fetchError(this.target.id, errorMessage(err));
      this.recordStep('fetch', started, StepStatus.Failed, error.message, { failureClass: FailureClass.FetchError, error });
      return this.fail(UpdateState.Aborted, FailureClass.FetchError, error);
    }

    const problems = validateRevision(fetched);
    if (problems.length > 0) {
      const error = invalidRevisionError(this.target.id, problems);
      this.recordStep('fetch', started, StepStatus.Failed, error.message, { failureClass: FailureClass.FetchError, error });
      return this.fail(UpdateState.Aborted, FailureClass.FetchError, error);
    }

    const revision = normalizeRevision(fetched);
    this.session.revision = revision;
    this.session.fetchedRevisionId = revision.id;
    this.recordStep('fetch', started, StepStatus.Ok, `fetched revision ${revision.id} (${revision.components.length} component(s))`);

    const current = this.store.current();
    if (current && originRevisionId(current.revision) === revision.id) {
      this.recordStep('noop', Date.now(), StepStatus.Ok, `revision ${revision.id} is already active as generation ${current.id}`);
      return this.transition(UpdateState.Done);
    }
    this.transition(UpdateState.RiskCheck);
  }

  private async handleRiskCheck(): Promise<void> {
    const started = Date.now();
    const revision = this.requireRevision();
    let verdict: IssueVerdict;
    try {
      verdict = await this.detector.evaluate(revision, this.signal);
    } catch (err) {
      if (err instanceof CancellationError) return this.handleCancellation();
      throw err;
    }

    this.session.issues = verdict.reports.map((report) => ({ ...report }));
    if (verdict.notice) this.session.notices.push(verdict.notice);

    if (verdict.blocking) {
      const components = [...new Set(verdict.reports.filter(isBlockingReport).map((r) => r.component))];
      if (!this.session.policy.autoProceedOnCritical) {
        const error = riskAbortError(this.target.id, components);
        this.recordStep('risk-check', started, StepStatus.Failed, error.message, { error });
        this.session.error = error;
        return this.transition(UpdateState.Aborted);
      }
      this.session.notices.push(`critical issues overridden by autoProceedOnCritical: ${components.join(', ')}`);
    } else if (
      verdict.recommendation === IssueRecommendation.Delay ||
      verdict.recommendation === IssueRecommendation.Caution
    ) {
      this.session.notices.push(`issue registry recommends ${verdict.recommendation} for this revision`);
    }

    const detail = verdict.skipped
      ? 'risk check skipped'
      : `${verdict.reports.length} issue(s), recommendation ${verdict.recommendation}`;
    this.recordStep('risk-check', started, StepStatus.Ok, detail);
    this.transition(UpdateState.Building);
  }

  private async handleBuild(): Promise<void> {
    const started = Date.now();
    const revision = this.requireRevision();
    let outcome: BuildOutcome;
    try {
      outcome = await this.builder.build(revision, this.signal);
    } catch (err) {
      if (err instanceof CancellationError) return this.handleCancellation();
      throw err;
    }

    if (outcome.ok) {
      this.artifactRef = outcome.artifactRef;
      const step = this.recordStep('build', started, StepStatus.Ok, `built revision ${revision.id} as ${outcome.artifactRef}`);
      this.attachToPendingAttempt(step);
      return this.transition(UpdateState.Activating);
    }

    const { failure } = outcome;
    this.lastFailure = failure;
    const error = buildFailedError(this.target.id, revision.id, failure.failureClass, failure.exitSignal);
    const step = this.recordStep('build', started, StepStatus.Failed, error.message, { failureClass: FailureClass.BuildError, error });
    this.attachToPendingAttempt(step);
    this.session.failureClass = FailureClass.BuildError;
    this.session.error = error;

    if (this.session.remediationAttempts < this.session.policy.maxRemediationAttempts) {
      return this.transition(UpdateState.Remediating);
    }
    this.escalate('attempt-limit', failure);
  }

  private async handleRemediation(): Promise<void> {
    const started = Date.now();
    const failure = this.lastFailure;
    if (!failure) {
      throw new OrchestratorError(sessionInvalidState(this.session.sessionId, 'remediating without a build failure'));
    }
    const revision = this.requireRevision();
    const attemptNumber = this.session.remediationAttempts + 1;
    this.session.remediationAttempts = attemptNumber;

    const result: RemediationResult = this.noMatchSeen
      ? { matched: false, reason: 'no-match' }
      : this.remediation.remediate(failure, revision, attemptNumber);

    if (result.matched) {
      const attempt: RemediationAttempt = {
        attemptNumber,
        matchedFailureClass: failure.failureClass,
        ruleId: result.ruleId,
        transformApplied: result.patch,
        resultingRevisionId: result.revision.id,
      };
      this.session.remediations.push(attempt);
      this.session.revision = result.revision;
      this.recordStep(
        'remediate',
        started,
        StepStatus.Ok,
        `${result.ruleId}: ${describePatch(result.patch)} (revision ${result.revision.id})`,
      );
      await this.audit({
        action: 'remediation.applied',
        resourceType: 'revision',
        resourceId: result.revision.id,
        outcome: 'success',
        details: { ruleId: result.ruleId, patch: result.patch, parentId: revision.id, attemptNumber },
      });
      return this.transition(UpdateState.Building);
    }

    this.noMatchSeen = true;
    this.session.remediations.push({
      attemptNumber,
      matchedFailureClass: failure.failureClass,
      ruleId: null,
      transformApplied: null,
    });
    this.recordStep(
      'remediate',
      started,
      StepStatus.Failed,
      result.reason === 'no-match'
        ? `no remediation rule matches "${failure.failureClass}"`
        : `remediation limit of ${this.session.policy.maxRemediationAttempts} reached`,
      { failureClass: FailureClass.BuildError },
    );

    if (result.reason === 'no-match' && this.session.policy.rebuildOnNoMatch) {
      return this.transition(UpdateState.Building);
    }
    this.escalate(result.reason, failure);
  }

  private async handleActivation(): Promise<void> {
    const revision = this.requireRevision();
    const artifactRef = this.artifactRef;
    if (artifactRef === undefined) {
      throw new OrchestratorError(sessionInvalidState(this.session.sessionId, 'activating without a built artifact'));
    }

    let started = Date.now();
    let candidate: Generation;
    try {
      candidate = await this.store.stage(revision, artifactRef);
    } catch (err) {
      const error = err instanceof GenerationStoreError
        ? err.typedError
        : switchError('STAGE_FAILED', `Could not stage revision ${revision.id}: ${errorMessage(err)}`, this.target.id);
      this.recordStep('stage', started, StepStatus.Failed, error.message, { failureClass: FailureClass.SwitchError, error });
      this.session.manualActionRequired = true;
      return this.fail(UpdateState.RollingBack, FailureClass.SwitchError, error);
    }
    this.session.candidateGenerationId = candidate.id;
    this.recordStep('stage', started, StepStatus.Ok, `staged generation ${candidate.id}`);
    if (this.signal.aborted) return this.handleCancellation();

    started = Date.now();
    const result = await this.store.activate(candidate);
    if (!result.success) {
      this.recordStep('activate', started, StepStatus.Failed, result.error.message, {
        failureClass: FailureClass.SwitchError,
        error: result.error,
      });
      this.session.manualActionRequired = true;
      await this.audit({
        action: 'generation.activated',
        resourceType: 'generation',
        resourceId: String(candidate.id),
        outcome: 'failure',
        details: { errorCode: result.error.code },
      });
      return this.fail(UpdateState.RollingBack, FailureClass.SwitchError, result.error);
    }
    this.recordStep('activate', started, StepStatus.Ok, `generation ${candidate.id} is active`);
    await this.audit({
      action: 'generation.activated',
      resourceType: 'generation',
      resourceId: String(candidate.id),
      outcome: 'success',
      details: { revisionId: revision.id, previousGenerationId: this.session.baselineGenerationId },
    });
    if (this.signal.aborted) return this.handleCancellation();

    const healthCheck = this.target.healthCheck;
    if (healthCheck) {
      started = Date.now();
      const active = result.active ?? candidate;
      try {
        await raceAbort(() => healthCheck.check(active, { signal: this.signal }), this.signal);
      } catch (err) {
        if (this.signal.aborted) return this.handleCancellation();
        const error = healthCheckFailedError(this.target.id, candidate.id, errorMessage(err));
        this.recordStep('health-check', started, StepStatus.Failed, error.message, {
          failureClass: FailureClass.ValidationError,
          error,
        });
        return this.fail(UpdateState.RollingBack, FailureClass.ValidationError, error);
      }
      this.recordStep('health-check', started, StepStatus.Ok, `generation ${candidate.id} is healthy`);
    }

    this.transition(UpdateState.Done);
  }

  private async handleRollback(): Promise<void> {
    const started = Date.now();
    const candidateId = this.session.candidateGenerationId;
    const candidate = candidateId === undefined ? undefined : this.store.get(candidateId);
    if (!candidate) {
      this.recordStep('rollback', started, StepStatus.Ok, 'no candidate generation was staged; active generation unchanged');
      return this.transition(UpdateState.RolledBack);
    }

    const result = await this.store.rollback(candidate);
    if (!result.success) {
      this.recordStep('rollback', started, StepStatus.Failed, result.error.message, {
        failureClass: FailureClass.SwitchError,
        error: result.error,
      });
      this.session.manualActionRequired = true;
    } else if (result.changed) {
      const restored = result.active ? `restored generation ${result.active.id}` : 'no generation active';
      this.recordStep('rollback', started, StepStatus.Ok, `${restored}; generation ${candidate.id} rolled back`);
    } else {
      this.recordStep('rollback', started, StepStatus.Ok, `generation ${candidate.id} was never active; active generation unchanged`);
    }

    await this.audit({
      action: 'generation.rolled-back',
      resourceType: 'generation',
      resourceId: String(candidate.id),
      outcome: result.success ? 'success' : 'failure',
      details: result.success
        ? { restoredGenerationId: result.active?.id ?? null, changed: result.changed }
        : { errorCode: result.error.code },
    });
    this.transition(UpdateState.RolledBack);
  }

  /** Cancellation before activation aborts; from activation on it rolls back. */
  private handleCancellation(): void {
    const reason = this.cancelReason ?? sessionCanceledError(this.session.sessionId);
    this.recordStep('cancel', Date.now(), StepStatus.Failed, reason.message, { error: reason });
    this.session.error = reason;
    this.session.failureClass = undefined;
    this.transition(this.session.state === UpdateState.Activating ? UpdateState.RollingBack : UpdateState.Aborted);
  }

  // ─── Helpers ─────────────────────────────────────────────────────────────

  /** Out of remediation: roll back, or abort when there is nothing to protect. */
  private escalate(reason: 'no-match' | 'attempt-limit', failure: BuildFailure): void {
    const error = remediationExhaustedError(this.target.id, reason, this.session.remediationAttempts, failure.failureClass);
    this.log.warn('Remediation exhausted', { reason, attempts: this.session.remediationAttempts });
    const next = this.session.baselineGenerationId === null ? UpdateState.Aborted : UpdateState.RollingBack;
    this.fail(next, FailureClass.BuildError, error);
  }

  private fail(next: UpdateState, failureClass: FailureClass, error: TypedError): void {
    this.session.failureClass = failureClass;
    this.session.error = error;
    this.transition(next);
  }

  private cancel(reason: TypedError): void {
    if (this.signal.aborted || isTerminalUpdateState(this.session.state)) return;
    this.cancelReason = reason;
    this.log.warn('Update session canceled', { code: reason.code, state: this.session.state });
    this.controller.abort();
  }

  private transition(next: UpdateState): void {
    const from = this.session.state;
    const result = transitionUpdateState(this.session.sessionId, from, next);
    if (!result.success) {
      throw new OrchestratorError(result.error);
    }
    this.session.state = result.newStatus;
    this.log.debug('Session state changed', { from, to: result.newStatus });

    const outcome = outcomeFor(result.newStatus);
    if (outcome) {
      this.session.outcome = outcome;
      this.session.completedAt = new Date().toISOString();
    }
  }

  private recordStep(
    stepName: StepName,
    startedMs: number,
    status: StepStatus,
    detail: string,
    extra: { failureClass?: FailureClass; error?: TypedError } = {},
  ): StepResult {
    const endedMs = Date.now();
    const step: StepResult = {
      stepName,
      startedAt: new Date(startedMs).toISOString(),
      endedAt: new Date(endedMs).toISOString(),
      durationMs: endedMs - startedMs,
      status,
      detail,
      ...(extra.failureClass ? { failureClass: extra.failureClass } : {}),
      ...(extra.error ? { error: extra.error } : {}),
    };
    this.session.steps.push(step);

    if (status === StepStatus.Failed) {
      const context = { stepName, failureClass: extra.failureClass, code: extra.error?.code, detail };
      if (extra.failureClass === FailureClass.SwitchError) this.log.error('Step failed', context);
      else this.log.warn('Step failed', context);
    }
    return step;
  }

  /** Link a build result to the remediation attempt that preceded it. */
  private attachToPendingAttempt(step: StepResult): void {
    const last = this.session.remediations[this.session.remediations.length - 1];
    if (last && !last.resultingStepResult) {
      last.resultingStepResult = step;
    }
  }

  private requireRevision(): Revision {
    const revision = this.session.revision;
    if (!revision) {
      throw new OrchestratorError(sessionInvalidState(this.session.sessionId, `${this.session.state} without a revision`));
    }
    return revision;
  }

  private async audit(input: Omit<AuditInput, 'targetId' | 'actorId'>): Promise<void> {
    try {
      await this.options.auditService.record({ ...input, targetId: this.target.id, actorId: this.options.actorId });
    } catch (err) {
      this.log.error('Audit record failed', { action: input.action, error: errorMessage(err) });
    }
  }
}

/** Error thrown when a session cannot be started or the orchestrator is misused. */
export class OrchestratorError extends Error {
  constructor(public typedError: TypedError) {
    super(typedError.message);
    this.name = 'OrchestratorError';
  }
}

function sessionInvalidState(sessionId: string, message: string): TypedError {
  return createTypedError({ code: 'SESSION.INVALID_STATE', message: `Session ${sessionId}: ${message}`, sessionId });
}

/** Copy a fetched revision into a fresh object with every field populated. */
function normalizeRevision(raw: Revision): Revision {
  return {
    id: raw.id,
    components: [...raw.components],
    payloadRef: raw.payloadRef,
    ...(raw.parentId ? { parentId: raw.parentId } : {}),
    patches: Array.isArray(raw.patches) ? raw.patches.map((patch) => ({ ...patch })) : [],
    fetchedAt: raw.fetchedAt || new Date().toISOString(),
  };
}

function abortReason(signal?: AbortSignal): string | undefined {
  const reason: unknown = signal?.reason;
  if (typeof reason === 'string') return reason;
  if (reason instanceof Error && reason.name !== 'AbortError') return reason.message;
  return undefined;
}

function deepFreeze<T>(value: T): T {
  if (typeof value === 'object' && value !== null && !Object.isFrozen(value)) {
    Object.freeze(value);
    for (const child of Object.values(value)) deepFreeze(child);
  }
  return value;
}

function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
