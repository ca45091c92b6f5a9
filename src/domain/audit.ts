/**
 * Audit trail domain model.
 *
 * Immutable, queryable audit records for update sessions and pointer switches.
 */

/** Audit event categories. */
export type AuditAction =
  | 'update.started'
  | 'update.completed'
  | 'generation.activated'
  | 'generation.rolled-back'
  | 'remediation.applied';

/** Resource types for audit records. */
export type AuditResourceType = 'session' | 'generation' | 'revision';

/** Audit outcome. */
export type AuditOutcome = 'success' | 'failure';

/** An immutable audit record. */
export interface AuditRecord {
  id: string;
  timestamp: string;
  targetId: string;
  actorId: string;
  action: AuditAction;
  resourceType: AuditResourceType;
  resourceId: string;
  outcome: AuditOutcome;
  /** Additional context about the action. */
  details?: Record<string, unknown>;
}
