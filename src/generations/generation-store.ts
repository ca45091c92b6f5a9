/**
 * Generation store: immutable generations plus the single active pointer
 * of one target.
 *
 * The committed snapshot is held in memory and swapped by reference only
 * after the backend accepted the write. A failed write therefore leaves
 * `current()` exactly where it was: callers observe the old pointer or the
 * new one, never anything in between.
 *
 * `stage`, `activate` and `rollback` are serialized by the target's lock.
 * `current`, `get` and `list` read the committed snapshot and never wait.
 */

import { Generation, GenerationSnapshot, GenerationStatus, emptySnapshot } from '../domain/generation';
import { TypedError, switchError } from '../domain/errors';
import { Revision } from '../domain/revision';
import { GenerationBackend } from '../storage/store';
import { deepCopy } from '../storage/memory-store';
import { TargetLock } from './target-lock';
import { logger as rootLogger, Logger } from '../logger';

/** Result of an activate or rollback call. */
export type SwitchResult =
  | {
      success: true;
      /** Active generation after the call. */
      active: Generation | null;
      /** False when the call was a no-op. */
      changed: boolean;
    }
  | { success: false; error: TypedError };

/** Thrown for store-level failures that are not switch results (corruption, staging). */
export class GenerationStoreError extends Error {
  constructor(public typedError: TypedError) {
    super(typedError.message);
    this.name = 'GenerationStoreError';
  }
}

export class GenerationStore {
  private readonly lock: TargetLock;
  private readonly log: Logger;

  private constructor(
    public readonly targetId: string,
    private readonly backend: GenerationBackend,
    private snapshot: GenerationSnapshot,
  ) {
    this.lock = new TargetLock(targetId);
    this.log = rootLogger.child({ targetId, module: 'generation-store' });
  }

  /** Load (or initialise) the store for a target. Fails on a corrupt snapshot. */
  static async open(targetId: string, backend: GenerationBackend): Promise<GenerationStore> {
    let stored: unknown;
    try {
      stored = await backend.read(targetId);
    } catch (err) {
      throw new GenerationStoreError(
        switchError('STORE_CORRUPT', `Generation store for "${targetId}" is unreadable: ${errorMessage(err)}`, targetId),
      );
    }
    const snapshot = stored ?? emptySnapshot(targetId);
    const problems = checkSnapshot(snapshot);
    if (problems.length > 0 || !isSnapshotShape(snapshot)) {
      throw new GenerationStoreError(
        switchError('STORE_CORRUPT', `Generation store for "${targetId}" is corrupt: ${problems.join('; ')}`, targetId, { problems }),
      );
    }
    return new GenerationStore(targetId, backend, snapshot);
  }

  /** The active generation, or null before the first activation. */
  current(): Generation | null {
    const { activeId } = this.snapshot.pointer;
    if (activeId === null) return null;
    const active = this.snapshot.generations.find((g) => g.id === activeId);
    return active ? deepCopy(active) : null;
  }

  get(id: number): Generation | undefined {
    const found = this.snapshot.generations.find((g) => g.id === id);
    return found ? deepCopy(found) : undefined;
  }

  /** All generations, oldest first. */
  list(): Generation[] {
    return this.snapshot.generations.map(deepCopy);
  }

  /** Append a pending generation. Does not affect `current()`. */
  async stage(revision: Revision, artifactRef: string): Promise<Generation> {
    return this.lock.run(async () => {
      const snap = this.snapshot;
      const nextId = snap.generations.reduce((max, g) => Math.max(max, g.id), 0) + 1;
      const generation: Generation = {
        id: nextId,
        targetId: this.targetId,
        revision: deepCopy(revision),
        artifactRef,
        status: GenerationStatus.Pending,
        createdAt: new Date().toISOString(),
      };
      const next: GenerationSnapshot = {
        ...snap,
        version: snap.version + 1,
        generations: [...snap.generations, generation],
      };
      try {
        await this.commit(next, snap.version);
      } catch (err) {
        throw new GenerationStoreError(
          switchError('STAGE_FAILED', `Could not stage generation ${nextId}: ${errorMessage(err)}`, this.targetId),
        );
      }
      this.log.debug('Generation staged', { generationId: nextId, revisionId: revision.id });
      return deepCopy(generation);
    });
  }

  /**
   * Point the target at `generation` and supersede the previously active one,
   * in a single snapshot write.
   */
  async activate(generation: Generation): Promise<SwitchResult> {
    return this.lock.run<SwitchResult>(async () => {
      const snap = this.snapshot;
      const target = snap.generations.find((g) => g.id === generation.id);
      if (!target) {
        return this.fail('UNKNOWN_GENERATION', `Generation ${generation.id} does not belong to target "${this.targetId}"`);
      }
      if (snap.pointer.activeId === target.id) {
        return { success: true, active: deepCopy(target), changed: false };
      }
      if (target.status !== GenerationStatus.Pending) {
        return this.fail('NOT_PENDING', `Generation ${target.id} is ${target.status} and cannot be activated`);
      }

      const now = new Date().toISOString();
      const previousActiveId = snap.pointer.activeId;
      const generations = snap.generations.map((g) => {
        if (g.id === target.id) return { ...g, status: GenerationStatus.Active, activatedAt: now };
        if (g.id === previousActiveId) return { ...g, status: GenerationStatus.Superseded, endedAt: now };
        return g;
      });
      const next: GenerationSnapshot = {
        ...snap,
        version: snap.version + 1,
        pointer: { activeId: target.id, previousId: previousActiveId, rolledBack: false },
        generations,
      };

      try {
        await this.commit(next, snap.version);
      } catch (err) {
        return this.fail('ACTIVATION_FAILED', `Activation of generation ${target.id} failed: ${errorMessage(err)}`);
      }
      this.log.info('Generation activated', { generationId: target.id, supersededId: previousActiveId });
      return { success: true, active: this.current(), changed: true };
    });
  }

  /**
   * Restore the most recently superseded generation and mark the failed one
   * rolled back.
   *
   * When `failed` is given but is not the active generation, it never
   * reached the pointer: the pointer stays put and a pending `failed` is
   * marked rolled back. Rolling back twice in a row is a no-op.
   */
  async rollback(failed?: Generation): Promise<SwitchResult> {
    return this.lock.run<SwitchResult>(async () => {
      const snap = this.snapshot;
      const { pointer } = snap;

      if (failed && pointer.activeId !== failed.id) {
        return this.discard(snap, failed.id);
      }
      if (pointer.rolledBack) {
        return { success: true, active: this.current(), changed: false };
      }
      if (pointer.activeId === null || pointer.previousId === null) {
        return this.fail('NO_PRIOR_GENERATION', `Target "${this.targetId}" has no prior generation to roll back to`);
      }

      const now = new Date().toISOString();
      const failedId = pointer.activeId;
      const restoredId = pointer.previousId;
      const generations = snap.generations.map((g) => {
        if (g.id === failedId) return { ...g, status: GenerationStatus.RolledBack, endedAt: now };
        if (g.id === restoredId) return { ...g, status: GenerationStatus.Active, activatedAt: now, endedAt: undefined };
        return g;
      });
      const next: GenerationSnapshot = {
        ...snap,
        version: snap.version + 1,
        pointer: { activeId: restoredId, previousId: null, rolledBack: true },
        generations,
      };

      try {
        await this.commit(next, snap.version);
      } catch (err) {
        return this.fail('ROLLBACK_FAILED', `Rollback of generation ${failedId} failed: ${errorMessage(err)}`);
      }
      this.log.warn('Generation rolled back', { failedId, restoredId });
      return { success: true, active: this.current(), changed: true };
    });
  }

  /** Retire a generation that never became active. Must run under the lock. */
  private async discard(snap: GenerationSnapshot, generationId: number): Promise<SwitchResult> {
    const target = snap.generations.find((g) => g.id === generationId);
    if (!target || target.status !== GenerationStatus.Pending) {
      return { success: true, active: this.current(), changed: false };
    }
    const now = new Date().toISOString();
    const next: GenerationSnapshot = {
      ...snap,
      version: snap.version + 1,
      generations: snap.generations.map((g) =>
        g.id === generationId ? { ...g, status: GenerationStatus.RolledBack, endedAt: now } : g,
      ),
    };
    try {
      await this.commit(next, snap.version);
    } catch (err) {
      return this.fail('ROLLBACK_FAILED', `Could not retire generation ${generationId}: ${errorMessage(err)}`);
    }
    return { success: true, active: this.current(), changed: false };
  }

  private async commit(next: GenerationSnapshot, expectedVersion: number): Promise<void> {
    await this.backend.write(this.targetId, next, expectedVersion);
    this.snapshot = next;
  }

  private fail(code: string, message: string): SwitchResult {
    this.log.error('Generation switch failed', { code, message });
    return { success: false, error: switchError(code, message, this.targetId) };
  }
}

/**
 * Opens and caches one store per target, so every session for a target
 * shares the same lock and snapshot.
 */
export class GenerationStoreRegistry {
  private stores = new Map<string, Promise<GenerationStore>>();

  constructor(private readonly backend: GenerationBackend) {}

  forTarget(targetId: string): Promise<GenerationStore> {
    let store = this.stores.get(targetId);
    if (!store) {
      store = GenerationStore.open(targetId, this.backend);
      this.stores.set(targetId, store);
      // Do not cache a failed open; the next caller retries the read.
      void store.catch(() => this.stores.delete(targetId));
    }
    return store;
  }
}

const GENERATION_STATUSES: ReadonlySet<string> = new Set(Object.values(GenerationStatus));

function isIdOrNull(value: unknown): value is number | null {
  return value === null || (typeof value === 'number' && Number.isInteger(value));
}

function isGenerationShape(value: unknown): value is Generation {
  if (typeof value !== 'object' || value === null) return false;
  if (!('id' in value) || typeof value.id !== 'number' || !Number.isInteger(value.id)) return false;
  if (!('status' in value) || typeof value.status !== 'string' || !GENERATION_STATUSES.has(value.status)) return false;
  if (!('artifactRef' in value) || typeof value.artifactRef !== 'string') return false;
  return 'revision' in value && typeof value.revision === 'object' && value.revision !== null;
}

/** Structural problem of a decoded snapshot, or null when it has the expected shape. */
function describeShapeProblem(value: unknown): string | null {
  if (typeof value !== 'object' || value === null) return 'snapshot is not an object';
  if (!('version' in value) || typeof value.version !== 'number') return 'snapshot has no numeric version';
  const pointer: unknown = 'pointer' in value ? value.pointer : undefined;
  if (typeof pointer !== 'object' || pointer === null) return 'snapshot has no pointer';
  if (!('activeId' in pointer) || !isIdOrNull(pointer.activeId) || !('previousId' in pointer) || !isIdOrNull(pointer.previousId)) {
    return 'pointer ids are malformed';
  }
  if (!('rolledBack' in pointer) || typeof pointer.rolledBack !== 'boolean') return 'pointer has no rolledBack flag';
  const generations: unknown = 'generations' in value ? value.generations : undefined;
  if (!Array.isArray(generations)) return 'snapshot has no generation list';
  const index = generations.findIndex((g: unknown) => !isGenerationShape(g));
  return index === -1 ? null : `generation entry ${index} is malformed`;
}

function isSnapshotShape(value: unknown): value is GenerationSnapshot {
  return describeShapeProblem(value) === null;
}

/**
 * Invariants a loaded snapshot must satisfy. Returns problems; empty means
 * sound. The shape is checked first since backends hand back decoded JSON.
 */
export function checkSnapshot(value: unknown): string[] {
  const shapeProblem = describeShapeProblem(value);
  if (shapeProblem !== null) return [shapeProblem];
  if (!isSnapshotShape(value)) return ['snapshot is malformed'];
  const snapshot = value;
  const problems: string[] = [];
  const ids = new Set<number>();
  for (const g of snapshot.generations) {
    if (ids.has(g.id)) problems.push(`duplicate generation id ${g.id}`);
    ids.add(g.id);
  }

  const active = snapshot.generations.filter((g) => g.status === GenerationStatus.Active);
  if (active.length > 1) {
    problems.push(`${active.length} generations are active`);
  }
  const { activeId, previousId } = snapshot.pointer;
  if (activeId === null && active.length > 0) {
    problems.push(`generation ${active[0].id} is active but the pointer is empty`);
  }
  if (activeId !== null && (active.length !== 1 || active[0].id !== activeId)) {
    problems.push(`pointer names generation ${activeId} but it is not the active generation`);
  }
  if (previousId !== null) {
    const previous = snapshot.generations.find((g) => g.id === previousId);
    if (!previous || previous.status !== GenerationStatus.Superseded) {
      problems.push(`previous pointer names generation ${previousId} but it is not superseded`);
    }
  }
  return problems;
}

function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : 'Unknown error';
}
