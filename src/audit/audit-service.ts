/**
 * Audit Trail Service.
 *
 * Records immutable, queryable audit records for update sessions and
 * generation switches.
 */

import { v4 as uuid } from 'uuid';
import { AuditRecord, AuditAction, AuditResourceType, AuditOutcome } from '../domain/audit';
import { Store } from '../storage/store';

/** Actor recorded for actions the orchestrator takes on its own. */
export const SYSTEM_ACTOR = 'system:orchestrator';

/** Input for creating an audit record. */
export interface AuditInput {
  targetId: string;
  actorId?: string;
  action: AuditAction;
  resourceType: AuditResourceType;
  resourceId: string;
  outcome: AuditOutcome;
  details?: Record<string, unknown>;
}

/** Audit query options. */
export interface AuditQueryOptions {
  targetId: string;
  limit?: number;
  offset?: number;
}

/** The audit service. */
export class AuditService {
  constructor(private store: Store) {}

  /** Record an audit event. */
  async record(input: AuditInput): Promise<AuditRecord> {
    const record: AuditRecord = {
      id: `aud_${uuid()}`,
      timestamp: new Date().toISOString(),
      targetId: input.targetId,
      actorId: input.actorId ?? SYSTEM_ACTOR,
      action: input.action,
      resourceType: input.resourceType,
      resourceId: input.resourceId,
      outcome: input.outcome,
      details: input.details,
    };

    return this.store.audit.create(record);
  }

  /** Query a target's audit records, oldest first. */
  async query(options: AuditQueryOptions): Promise<AuditRecord[]> {
    return this.store.audit.listByTarget(options.targetId, {
      limit: options.limit,
      offset: options.offset,
    });
  }
}
