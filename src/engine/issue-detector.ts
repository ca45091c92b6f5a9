/**
 * Issue detector: risk check of an incoming revision against the issue
 * registry.
 *
 * Fails open: when the registry cannot be reached, or answers with something
 * other than a list of reports, the verdict is empty and marked skipped, so
 * registry downtime never blocks routine updates.
 * Cancellation is the exception and propagates.
 */

import { IssueRegistry } from '../adapters/interfaces';
import { IssueVerdict, IssueRecommendation, aggregateIssues, isIssueReport } from '../domain/issue';
import { Revision } from '../domain/revision';
import { CancellationError, raceAbort } from './cancellation';

export const RISK_SKIPPED_NOTICE = 'risk assessment skipped';

export class IssueDetector {
  constructor(private readonly registry?: IssueRegistry) {}

  async evaluate(revision: Revision, signal: AbortSignal): Promise<IssueVerdict> {
    if (revision.components.length === 0) {
      return aggregateIssues([]);
    }
    const registry = this.registry;
    if (!registry) {
      return skipped('no issue registry configured');
    }

    let answer: unknown;
    try {
      answer = await raceAbort(() => registry.queryIssues([...revision.components], { signal }), signal);
    } catch (err) {
      if (signal.aborted) throw err instanceof CancellationError ? err : new CancellationError();
      return skipped(`issue registry unreachable (${err instanceof Error ? err.message : String(err)})`);
    }
    // Registries are usually remote; an answer that is not a report list counts as no answer.
    if (!Array.isArray(answer) || !answer.every(isIssueReport)) {
      return skipped('issue registry returned a malformed answer');
    }
    const reports = answer;

    // Reports for components outside the revision are not this session's concern.
    const wanted = new Set(revision.components);
    return aggregateIssues(reports.filter((r) => wanted.has(r.component)));
  }
}

function skipped(reason: string): IssueVerdict {
  return {
    reports: [],
    recommendation: IssueRecommendation.Proceed,
    blocking: false,
    skipped: true,
    notice: `${RISK_SKIPPED_NOTICE}: ${reason}`,
  };
}
