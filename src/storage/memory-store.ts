/**
 * In-memory storage implementation.
 *
 * Reference implementation for development and testing. Values are deep
 * copied on the way in and on the way out, so callers never hold a
 * reference into the store's internal state.
 */

import { AuditRecord } from '../domain/audit';
import { GenerationSnapshot } from '../domain/generation';
import { UpdateSession } from '../domain/session';
import {
  Store,
  GenerationBackend,
  SessionArchive,
  AuditStore,
  ListOptions,
  ConcurrentWriteError,
} from './store';

function applyListOptions<T>(items: T[], options?: ListOptions): T[] {
  const offset = options?.offset ?? 0;
  const limit = options?.limit ?? 100;
  return items.slice(offset, offset + limit);
}

/**
 * Deep copy through structuredClone.
 *
 * Nested arrays (steps, remediations, generations) would otherwise be
 * shared between the caller and the store.
 */
export function deepCopy<T>(obj: T): T {
  return structuredClone(obj);
}

/**
 * Generation backend holding one snapshot reference per target.
 * A write swaps the reference, so a snapshot is replaced whole or not at all.
 */
export class MemoryGenerationBackend implements GenerationBackend {
  private data = new Map<string, GenerationSnapshot>();

  async read(targetId: string): Promise<GenerationSnapshot | null> {
    const snapshot = this.data.get(targetId);
    return snapshot ? deepCopy(snapshot) : null;
  }

  async write(targetId: string, snapshot: GenerationSnapshot, expectedVersion: number): Promise<void> {
    const actualVersion = this.data.get(targetId)?.version ?? 0;
    if (actualVersion !== expectedVersion) {
      throw new ConcurrentWriteError(targetId, expectedVersion, actualVersion);
    }
    this.data.set(targetId, deepCopy(snapshot));
  }
}

class MemorySessionArchive implements SessionArchive {
  /** Per target, in append order. */
  private data = new Map<string, UpdateSession[]>();

  async append(session: UpdateSession): Promise<UpdateSession> {
    const list = this.data.get(session.targetId) ?? [];
    list.push(deepCopy(session));
    this.data.set(session.targetId, list);
    return deepCopy(session);
  }

  async getById(targetId: string, sessionId: string): Promise<UpdateSession | null> {
    const found = this.data.get(targetId)?.find((s) => s.sessionId === sessionId);
    return found ? deepCopy(found) : null;
  }

  async listByTarget(targetId: string, options?: ListOptions): Promise<UpdateSession[]> {
    const items = [...(this.data.get(targetId) ?? [])].reverse();
    return applyListOptions(items, options).map(deepCopy);
  }

  async countByTarget(targetId: string): Promise<number> {
    return this.data.get(targetId)?.length ?? 0;
  }
}

class MemoryAuditStore implements AuditStore {
  private data: AuditRecord[] = [];

  async create(record: AuditRecord): Promise<AuditRecord> {
    this.data.push(deepCopy(record));
    return deepCopy(record);
  }

  async listByTarget(targetId: string, options?: ListOptions): Promise<AuditRecord[]> {
    const items = this.data.filter((r) => r.targetId === targetId);
    return applyListOptions(items, options).map(deepCopy);
  }
}

/** Create a new in-memory store instance. */
export function createMemoryStore(generations?: GenerationBackend): Store {
  return {
    generations: generations ?? new MemoryGenerationBackend(),
    sessions: new MemorySessionArchive(),
    audit: new MemoryAuditStore(),
  };
}
