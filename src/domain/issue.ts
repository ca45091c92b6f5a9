/**
 * Issue domain model.
 *
 * Known-defect reports returned by an issue registry for the components a
 * revision touches, and the aggregate verdict a session acts on.
 */

export enum IssueSeverity {
  Critical = 'critical',
  High = 'high',
  Medium = 'medium',
  Low = 'low',
}

export enum IssueRecommendation {
  Proceed = 'proceed',
  Caution = 'caution',
  Delay = 'delay',
  Abort = 'abort',
}

export interface IssueReport {
  component: string;
  severity: IssueSeverity;
  summary: string;
  recommendation: IssueRecommendation;
}

/** Higher is worse. */
export const SEVERITY_RANK: Record<IssueSeverity, number> = {
  [IssueSeverity.Low]: 0,
  [IssueSeverity.Medium]: 1,
  [IssueSeverity.High]: 2,
  [IssueSeverity.Critical]: 3,
};

/** Higher is worse. */
export const RECOMMENDATION_RANK: Record<IssueRecommendation, number> = {
  [IssueRecommendation.Proceed]: 0,
  [IssueRecommendation.Caution]: 1,
  [IssueRecommendation.Delay]: 2,
  [IssueRecommendation.Abort]: 3,
};

/** Aggregate of every report for one revision. */
export interface IssueVerdict {
  reports: IssueReport[];
  /** Worst severity among the reports; absent when there are none. */
  severity?: IssueSeverity;
  /** Worst recommendation among the reports; `proceed` when there are none. */
  recommendation: IssueRecommendation;
  /** True when any report is critical with an abort recommendation. */
  blocking: boolean;
  /** True when the registry could not be consulted. */
  skipped: boolean;
  notice?: string;
}

const SEVERITIES: ReadonlySet<string> = new Set(Object.values(IssueSeverity));
const RECOMMENDATIONS: ReadonlySet<string> = new Set(Object.values(IssueRecommendation));

/** Shape check for reports decoded from a registry answer. */
export function isIssueReport(value: unknown): value is IssueReport {
  if (typeof value !== 'object' || value === null) return false;
  if (!('component' in value) || typeof value.component !== 'string') return false;
  if (!('summary' in value) || typeof value.summary !== 'string') return false;
  if (!('severity' in value) || typeof value.severity !== 'string' || !SEVERITIES.has(value.severity)) return false;
  return 'recommendation' in value && typeof value.recommendation === 'string' && RECOMMENDATIONS.has(value.recommendation);
}

/** A report that stops the session unless the policy overrides it. */
export function isBlockingReport(report: IssueReport): boolean {
  return report.severity === IssueSeverity.Critical && report.recommendation === IssueRecommendation.Abort;
}

/** Fold reports into a verdict; the worst case wins. */
export function aggregateIssues(reports: IssueReport[]): IssueVerdict {
  let severity: IssueSeverity | undefined;
  let recommendation = IssueRecommendation.Proceed;
  for (const report of reports) {
    if (severity === undefined || SEVERITY_RANK[report.severity] > SEVERITY_RANK[severity]) {
      severity = report.severity;
    }
    if (RECOMMENDATION_RANK[report.recommendation] > RECOMMENDATION_RANK[recommendation]) {
      recommendation = report.recommendation;
    }
  }
  return {
    reports,
    severity,
    recommendation,
    blocking: reports.some(isBlockingReport),
    skipped: false,
  };
}
