/**
 * Generation store: atomic pointer switches, rollback and corruption checks.
 */

import { GenerationStore, GenerationStoreError, GenerationStoreRegistry, checkSnapshot } from '../../src/generations/generation-store';
import { GenerationSnapshot, GenerationStatus, emptySnapshot } from '../../src/domain/generation';
import { MemoryGenerationBackend } from '../../src/storage/memory-store';
import { setLogHandler, resetLogHandler } from '../../src/logger';
import { FlakyBackend, makeRevision } from '../helpers/fakes';

beforeAll(() => setLogHandler(() => undefined));
afterAll(() => resetLogHandler());

async function storeWithActive(backend = new FlakyBackend()): Promise<{ store: GenerationStore; backend: FlakyBackend }> {
  const store = await GenerationStore.open('web-1', backend);
  const first = await store.stage(makeRevision('R0'), 'artifact-0');
  await store.activate(first);
  return { store, backend };
}

describe('GenerationStore', () => {
  test('current() is null before the first activation', async () => {
    const store = await GenerationStore.open('web-1', new MemoryGenerationBackend());
    expect(store.current()).toBeNull();
    const staged = await store.stage(makeRevision('R1'), 'artifact-1');
    expect(staged).toMatchObject({ id: 1, status: GenerationStatus.Pending, artifactRef: 'artifact-1' });
    expect(store.current()).toBeNull();
  });

  test('activation supersedes the previous generation', async () => {
    const { store } = await storeWithActive();
    const next = await store.stage(makeRevision('R1'), 'artifact-1');

    const result = await store.activate(next);

    expect(result.success).toBe(true);
    if (!result.success) return;
    expect(result.changed).toBe(true);
    expect(result.active?.id).toBe(2);
    expect(store.current()?.revision.id).toBe('R1');
    expect(store.get(1)?.status).toBe(GenerationStatus.Superseded);
    expect(store.list().filter((g) => g.status === GenerationStatus.Active)).toHaveLength(1);
  });

  test('activating the active generation is a no-op', async () => {
    const { store, backend } = await storeWithActive();
    const active = store.current();
    if (!active) throw new Error('expected an active generation');
    const writes = backend.writes;

    const result = await store.activate(active);

    expect(result).toMatchObject({ success: true, changed: false });
    expect(backend.writes).toBe(writes);
  });

  test('a failed write leaves the pointer where it was', async () => {
    const { store, backend } = await storeWithActive();
    const next = await store.stage(makeRevision('R1'), 'artifact-1');
    const before = store.current();
    backend.shouldFail = () => true;

    const result = await store.activate(next);

    expect(result.success).toBe(false);
    if (result.success) return;
    expect(result.error.code).toBe('SWITCH.ACTIVATION_FAILED');
    expect(result.error.message).toBe('Activation of generation 2 failed: disk full');
    expect(store.current()).toEqual(before);
    expect(store.get(2)?.status).toBe(GenerationStatus.Pending);
    // The persisted snapshot agrees with memory.
    const persisted = await backend.read('web-1');
    expect(persisted?.pointer.activeId).toBe(1);
  });

  test('rejects generations that are not pending or unknown', async () => {
    const { store } = await storeWithActive();
    const next = await store.stage(makeRevision('R1'), 'artifact-1');
    await store.activate(next);
    const superseded = store.get(1);
    if (!superseded) throw new Error('expected generation 1');

    expect(await store.activate(superseded)).toMatchObject({ success: false, error: { code: 'SWITCH.NOT_PENDING' } });
    expect(await store.activate({ ...superseded, id: 42 })).toMatchObject({
      success: false,
      error: { code: 'SWITCH.UNKNOWN_GENERATION' },
    });
  });

  test('stage failures throw a store error', async () => {
    const { store, backend } = await storeWithActive();
    backend.shouldFail = () => true;
    await expect(store.stage(makeRevision('R1'), 'artifact-1')).rejects.toBeInstanceOf(GenerationStoreError);
    expect(store.list()).toHaveLength(1);
  });

  describe('rollback', () => {
    test('restores the superseded generation exactly', async () => {
      const { store } = await storeWithActive();
      const baseline = store.current();
      const next = await store.stage(makeRevision('R1'), 'artifact-1');
      await store.activate(next);

      const result = await store.rollback(next);

      expect(result).toMatchObject({ success: true, changed: true });
      const restored = store.current();
      expect(restored?.id).toBe(baseline?.id);
      expect(restored?.revision).toEqual(baseline?.revision);
      expect(restored?.artifactRef).toBe('artifact-0');
      expect(store.get(2)?.status).toBe(GenerationStatus.RolledBack);
    });

    test('a second rollback is a no-op', async () => {
      const { store, backend } = await storeWithActive();
      const next = await store.stage(makeRevision('R1'), 'artifact-1');
      await store.activate(next);
      await store.rollback();
      const writes = backend.writes;

      const again = await store.rollback();

      expect(again).toMatchObject({ success: true, changed: false });
      expect(again.success && again.active?.id).toBe(1);
      expect(backend.writes).toBe(writes);
    });

    test('fails without a prior generation', async () => {
      const { store } = await storeWithActive();
      const result = await store.rollback();
      expect(result).toMatchObject({ success: false, error: { code: 'SWITCH.NO_PRIOR_GENERATION' } });
      expect(store.current()?.id).toBe(1);
    });

    test('a never-activated candidate is retired without moving the pointer', async () => {
      const { store } = await storeWithActive();
      const next = await store.stage(makeRevision('R1'), 'artifact-1');

      const result = await store.rollback(next);

      expect(result).toMatchObject({ success: true, changed: false });
      expect(store.current()?.id).toBe(1);
      expect(store.get(2)?.status).toBe(GenerationStatus.RolledBack);
    });

    test('a failed rollback write keeps the failed generation active', async () => {
      const { store, backend } = await storeWithActive();
      const next = await store.stage(makeRevision('R1'), 'artifact-1');
      await store.activate(next);
      backend.shouldFail = () => true;

      const result = await store.rollback(next);

      expect(result).toMatchObject({ success: false, error: { code: 'SWITCH.ROLLBACK_FAILED' } });
      expect(store.current()?.id).toBe(2);
    });
  });

  test('switches on one target run one at a time', async () => {
    const { store } = await storeWithActive();
    const a = await store.stage(makeRevision('R1'), 'artifact-1');
    const b = await store.stage(makeRevision('R2'), 'artifact-2');

    const [first, second] = await Promise.all([store.activate(a), store.activate(b)]);

    expect(first.success && second.success).toBe(true);
    expect(store.current()?.id).toBe(b.id);
    expect(store.get(a.id)?.status).toBe(GenerationStatus.Superseded);
    expect(checkSnapshot({
      version: 0,
      targetId: 'web-1',
      pointer: { activeId: b.id, previousId: a.id, rolledBack: false },
      generations: store.list(),
    })).toEqual([]);
  });

  test('a store reopened from the backend sees the committed pointer', async () => {
    const backend = new FlakyBackend();
    const { store } = await storeWithActive(backend);
    const next = await store.stage(makeRevision('R1'), 'artifact-1');
    await store.activate(next);

    const reopened = await GenerationStore.open('web-1', backend);
    expect(reopened.current()?.id).toBe(2);
  });
});

describe('checkSnapshot', () => {
  test('flags two active generations', async () => {
    const { store } = await storeWithActive();
    const [first] = store.list();
    const corrupt: GenerationSnapshot = {
      ...emptySnapshot('web-1'),
      version: 3,
      pointer: { activeId: 1, previousId: null, rolledBack: false },
      generations: [first, { ...first, id: 2 }],
    };
    expect(checkSnapshot(corrupt)).toEqual([
      '2 generations are active',
      'pointer names generation 1 but it is not the active generation',
    ]);
  });

  test('checks the shape before the invariants', () => {
    expect(checkSnapshot(null)).toEqual(['snapshot is not an object']);
    expect(checkSnapshot({ version: '1', pointer: {}, generations: [] })).toEqual(['snapshot has no numeric version']);
    expect(checkSnapshot({ version: 1, generations: [] })).toEqual(['snapshot has no pointer']);
    expect(checkSnapshot({ version: 1, pointer: { activeId: null, previousId: null, rolledBack: false } })).toEqual([
      'snapshot has no generation list',
    ]);
    expect(checkSnapshot({
      version: 1,
      pointer: { activeId: null, previousId: null, rolledBack: false },
      generations: [{ id: 1, status: 'exploded', artifactRef: 'a', revision: {} }],
    })).toEqual(['generation entry 0 is malformed']);
  });

  test('open() refuses a corrupt snapshot', async () => {
    const backend = new MemoryGenerationBackend();
    await backend.write('web-1', {
      ...emptySnapshot('web-1'),
      version: 1,
      pointer: { activeId: 5, previousId: null, rolledBack: false },
    }, 0);

    await expect(GenerationStore.open('web-1', backend)).rejects.toMatchObject({
      typedError: { code: 'SWITCH.STORE_CORRUPT' },
    });
  });
});

describe('GenerationStoreRegistry', () => {
  test('returns one store per target', async () => {
    const registry = new GenerationStoreRegistry(new MemoryGenerationBackend());
    const a = await registry.forTarget('web-1');
    const b = await registry.forTarget('web-1');
    const c = await registry.forTarget('db-1');
    expect(a).toBe(b);
    expect(c).not.toBe(a);
  });
});
