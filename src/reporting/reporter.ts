/**
 * Session reporter.
 *
 * Turns a terminal session into a structured report and a human-readable
 * summary, then hands the summary to the target's notification channel.
 * Dispatch happens once per session; delivery failures are logged and
 * never change the session.
 */

import { NotificationChannel } from '../adapters/interfaces';
import { IssueReport } from '../domain/issue';
import { describePatch } from '../domain/revision';
import {
  FailureClass,
  RemediationAttempt,
  SessionOutcome,
  StepResult,
  StepStatus,
  UpdateSession,
} from '../domain/session';
import { logger as rootLogger, Logger } from '../logger';

export interface UpdateReport {
  sessionId: string;
  targetId: string;
  outcome: SessionOutcome | 'incomplete';
  revisionId: string | null;
  fetchedRevisionId: string | null;
  startedAt: string;
  completedAt: string | null;
  baselineGenerationId: number | null;
  candidateGenerationId: number | null;
  failureClass: FailureClass | null;
  error: { code: string; message: string } | null;
  manualActionRequired: boolean;
  /** Detail of the switch failure that needs a human, when there is one. */
  manualAction: string | null;
  notices: string[];
  issues: IssueReport[];
  steps: StepResult[];
  remediations: RemediationAttempt[];
  remediationAttempts: number;
  maxRemediationAttempts: number;
}

const OUTCOME_LABELS: Record<UpdateReport['outcome'], string> = {
  [SessionOutcome.Success]: 'SUCCEEDED',
  [SessionOutcome.RolledBack]: 'ROLLED BACK',
  [SessionOutcome.Aborted]: 'ABORTED',
  incomplete: 'INCOMPLETE',
};

export function buildReport(session: UpdateSession): UpdateReport {
  const switchFailures = session.steps.filter(
    (s) => s.status === StepStatus.Failed && s.failureClass === FailureClass.SwitchError,
  );
  const lastSwitchFailure = switchFailures[switchFailures.length - 1];
  return {
    sessionId: session.sessionId,
    targetId: session.targetId,
    outcome: session.outcome ?? 'incomplete',
    revisionId: session.revision?.id ?? null,
    fetchedRevisionId: session.fetchedRevisionId ?? null,
    startedAt: session.startedAt,
    completedAt: session.completedAt ?? null,
    baselineGenerationId: session.baselineGenerationId,
    candidateGenerationId: session.candidateGenerationId ?? null,
    failureClass: session.failureClass ?? null,
    error: session.error ? { code: session.error.code, message: session.error.message } : null,
    manualActionRequired: session.manualActionRequired,
    manualAction: session.manualActionRequired && lastSwitchFailure ? lastSwitchFailure.detail : null,
    notices: [...session.notices],
    issues: [...session.issues],
    steps: [...session.steps],
    remediations: [...session.remediations],
    remediationAttempts: session.remediationAttempts,
    maxRemediationAttempts: session.policy.maxRemediationAttempts,
  };
}

export function formatReport(report: UpdateReport): string {
  const lines: string[] = [];
  lines.push(`[genswitch] ${report.targetId}: update ${OUTCOME_LABELS[report.outcome]} (session ${report.sessionId})`);

  if (report.revisionId === null) {
    lines.push('Revision: none (fetch failed)');
  } else if (report.fetchedRevisionId !== null && report.fetchedRevisionId !== report.revisionId) {
    lines.push(`Revision: ${report.revisionId} (fetched as ${report.fetchedRevisionId})`);
  } else {
    lines.push(`Revision: ${report.revisionId}`);
  }
  lines.push(
    `Generations: baseline ${formatGeneration(report.baselineGenerationId)}, candidate ${formatGeneration(report.candidateGenerationId)}`,
  );

  if (report.error) {
    const cls = report.failureClass ? `[${report.failureClass}] ` : '';
    lines.push(`Failure: ${cls}${report.error.code}: ${report.error.message}`);
  }
  if (report.manualActionRequired) {
    lines.push(`MANUAL ACTION REQUIRED: ${report.manualAction ?? 'a generation switch failed'}`);
  }

  if (report.notices.length > 0) {
    lines.push('Notices:');
    for (const notice of report.notices) lines.push(`  - ${notice}`);
  }
  if (report.issues.length > 0) {
    lines.push('Issues:');
    for (const issue of report.issues) {
      lines.push(`  - ${issue.component} [${issue.severity}, ${issue.recommendation}]: ${issue.summary}`);
    }
  }

  lines.push('Steps:');
  report.steps.forEach((step, index) => {
    const cls = step.failureClass ? ` [${step.failureClass}]` : '';
    lines.push(`  ${index + 1}. ${step.stepName} ${step.status}${cls} (${step.durationMs}ms): ${step.detail}`);
  });

  lines.push(`Remediation attempts: ${report.remediationAttempts}/${report.maxRemediationAttempts}`);
  for (const attempt of report.remediations) {
    lines.push(`  ${attempt.attemptNumber}. ${formatAttempt(attempt)}`);
  }

  return lines.join('\n');
}

function formatGeneration(id: number | null): string {
  return id === null ? 'none' : `#${id}`;
}

function formatAttempt(attempt: RemediationAttempt): string {
  if (attempt.ruleId === null || attempt.transformApplied === null) {
    return `${attempt.matchedFailureClass} -> no match`;
  }
  const revision = attempt.resultingRevisionId ? ` (revision ${attempt.resultingRevisionId})` : '';
  return `${attempt.matchedFailureClass} -> ${attempt.ruleId}: ${describePatch(attempt.transformApplied)}${revision}`;
}

/** Resolves the channel a target's reports go to. */
export type ChannelResolver = (targetId: string) => NotificationChannel;

export class Reporter {
  private dispatched = new Set<string>();
  private readonly log: Logger;

  constructor(private readonly resolveChannel: ChannelResolver, log?: Logger) {
    this.log = log ?? rootLogger.child({ module: 'reporter' });
  }

  /**
   * Dispatch the session's summary. Returns false when the session was
   * already reported or delivery failed.
   */
  async report(session: UpdateSession): Promise<boolean> {
    if (this.dispatched.has(session.sessionId)) {
      this.log.warn('Session already reported; not dispatching again', { sessionId: session.sessionId });
      return false;
    }
    this.dispatched.add(session.sessionId);

    const message = formatReport(buildReport(session));
    try {
      await this.resolveChannel(session.targetId).send(message, {
        sessionId: session.sessionId,
        targetId: session.targetId,
      });
      return true;
    } catch (err) {
      this.log.error('Report delivery failed', {
        sessionId: session.sessionId,
        targetId: session.targetId,
        error: err instanceof Error ? err.message : 'Unknown error',
      });
      return false;
    }
  }
}
