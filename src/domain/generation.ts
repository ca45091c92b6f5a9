/**
 * Generation domain model.
 *
 * A generation is one immutable, fully built system state for a target.
 * Status changes are written as new record versions by the generation
 * store; a generation is never edited in place or deleted.
 */

import { Revision } from './revision';

/** Generation lifecycle states. */
export enum GenerationStatus {
  Pending = 'pending',
  Active = 'active',
  Superseded = 'superseded',
  RolledBack = 'rolled-back',
}

export interface Generation {
  /** Ordinal, starting at 1 per target. */
  id: number;
  targetId: string;
  revision: Revision;
  /** Opaque handle to the built artifact, as returned by the builder. */
  artifactRef: string;
  status: GenerationStatus;
  createdAt: string;
  activatedAt?: string;
  /** Set when the generation leaves the active (or pending) state. */
  endedAt?: string;
}

/**
 * The single pointer record of a target.
 *
 * `previousId` is the most recent superseded generation, the one a rollback
 * restores. `rolledBack` is set by a rollback and cleared by the next
 * activation; a second rollback in a row is a no-op.
 */
export interface GenerationPointer {
  activeId: number | null;
  previousId: number | null;
  rolledBack: boolean;
}

/** Everything persisted for one target: the generation log plus the pointer. */
export interface GenerationSnapshot {
  /** Incremented on every committed write; used for compare-and-swap. */
  version: number;
  targetId: string;
  pointer: GenerationPointer;
  generations: Generation[];
}

/** Empty snapshot for a target that has never been written. */
export function emptySnapshot(targetId: string): GenerationSnapshot {
  return {
    version: 0,
    targetId,
    pointer: { activeId: null, previousId: null, rolledBack: false },
    generations: [],
  };
}
