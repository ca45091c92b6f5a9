/**
 * Storage layer interfaces.
 *
 * Defines the contract for data persistence with pluggable backends.
 * Every store is keyed by target: one generation log and pointer, one
 * session archive and one audit trail per target system.
 */

import { AuditRecord } from '../domain/audit';
import { GenerationSnapshot } from '../domain/generation';
import { UpdateSession } from '../domain/session';

/** Generic list query options. */
export interface ListOptions {
  limit?: number;
  offset?: number;
}

/** Paginated list result with metadata. */
export interface ListResult<T> {
  items: T[];
  total: number;
  limit: number;
  offset: number;
  hasMore: boolean;
}

/**
 * Persistence for a target's generation log and pointer.
 *
 * `write` is a compare-and-swap: it must replace the whole snapshot in one
 * step, and only when the stored version still equals `expectedVersion`.
 * Readers of the backend see either the old snapshot or the new one.
 */
export interface GenerationBackend {
  read(targetId: string): Promise<GenerationSnapshot | null>;
  write(targetId: string, snapshot: GenerationSnapshot, expectedVersion: number): Promise<void>;
}

/** Archive of terminal sessions, kept for audit and history queries. */
export interface SessionArchive {
  append(session: UpdateSession): Promise<UpdateSession>;
  getById(targetId: string, sessionId: string): Promise<UpdateSession | null>;
  /** Newest first. */
  listByTarget(targetId: string, options?: ListOptions): Promise<UpdateSession[]>;
  countByTarget(targetId: string): Promise<number>;
}

/** Store interface for audit records. */
export interface AuditStore {
  create(record: AuditRecord): Promise<AuditRecord>;
  listByTarget(targetId: string, options?: ListOptions): Promise<AuditRecord[]>;
}

/** Raised by a backend when the stored version moved under a writer. */
export class ConcurrentWriteError extends Error {
  constructor(
    public readonly targetId: string,
    public readonly expectedVersion: number,
    public readonly actualVersion: number,
  ) {
    super(`Generation snapshot for "${targetId}" is at version ${actualVersion}, expected ${expectedVersion}`);
    this.name = 'ConcurrentWriteError';
  }
}

/** Build a paginated ListResult from items and total count. */
export function toListResult<T>(items: T[], total: number, options?: ListOptions): ListResult<T> {
  const limit = options?.limit ?? 100;
  const offset = options?.offset ?? 0;
  return {
    items,
    total,
    limit,
    offset,
    hasMore: offset + items.length < total,
  };
}

/** Composite store interface. */
export interface Store {
  generations: GenerationBackend;
  sessions: SessionArchive;
  audit: AuditStore;
}
