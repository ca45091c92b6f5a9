/**
 * Memory store isolation and ordering.
 *
 * Mutations to returned objects must not reach the store's internal state.
 */

import { createMemoryStore, MemoryGenerationBackend } from '../../src/storage/memory-store';
import { ConcurrentWriteError } from '../../src/storage/store';
import { emptySnapshot } from '../../src/domain/generation';
import { SessionOutcome, UpdateSession, UpdateState } from '../../src/domain/session';
import { DEFAULT_POLICY } from '../../src/engine/policy';
import { makeRevision } from '../helpers/fakes';

function session(sessionId: string, targetId = 'web-1'): UpdateSession {
  return {
    sessionId,
    targetId,
    revision: makeRevision('R1'),
    baselineGenerationId: null,
    policy: { ...DEFAULT_POLICY },
    startedAt: '2026-01-01T00:00:00.000Z',
    completedAt: '2026-01-01T00:01:00.000Z',
    state: UpdateState.Done,
    steps: [],
    remediations: [],
    remediationAttempts: 0,
    issues: [],
    notices: ['first notice'],
    outcome: SessionOutcome.Success,
    manualActionRequired: false,
  };
}

describe('MemorySessionArchive', () => {
  test('lists sessions newest first with paging', async () => {
    const store = createMemoryStore();
    for (const id of ['ses_1', 'ses_2', 'ses_3']) {
      await store.sessions.append(session(id));
    }
    await store.sessions.append(session('ses_other', 'db-1'));

    const all = await store.sessions.listByTarget('web-1');
    expect(all.map((s) => s.sessionId)).toEqual(['ses_3', 'ses_2', 'ses_1']);
    const page = await store.sessions.listByTarget('web-1', { limit: 1, offset: 1 });
    expect(page.map((s) => s.sessionId)).toEqual(['ses_2']);
    expect(await store.sessions.countByTarget('web-1')).toBe(3);
    expect(await store.sessions.countByTarget('unknown')).toBe(0);
  });

  test('returned sessions are copies', async () => {
    const store = createMemoryStore();
    const original = session('ses_1');
    await store.sessions.append(original);
    original.notices.push('mutated after append');

    const fetched = await store.sessions.getById('web-1', 'ses_1');
    expect(fetched?.notices).toEqual(['first notice']);
    fetched?.notices.push('mutated after read');

    const again = await store.sessions.getById('web-1', 'ses_1');
    expect(again?.notices).toEqual(['first notice']);
  });

  test('getById is scoped to the target', async () => {
    const store = createMemoryStore();
    await store.sessions.append(session('ses_1'));
    expect(await store.sessions.getById('db-1', 'ses_1')).toBeNull();
  });
});

describe('MemoryGenerationBackend', () => {
  test('reads null for an unknown target', async () => {
    expect(await new MemoryGenerationBackend().read('web-1')).toBeNull();
  });

  test('writes only when the version matches', async () => {
    const backend = new MemoryGenerationBackend();
    const first = { ...emptySnapshot('web-1'), version: 1 };
    await backend.write('web-1', first, 0);

    await expect(backend.write('web-1', { ...first, version: 2 }, 0)).rejects.toBeInstanceOf(ConcurrentWriteError);
    expect((await backend.read('web-1'))?.version).toBe(1);

    await backend.write('web-1', { ...first, version: 2 }, 1);
    expect((await backend.read('web-1'))?.version).toBe(2);
  });

  test('snapshots are copied on the way in', async () => {
    const backend = new MemoryGenerationBackend();
    const snapshot = { ...emptySnapshot('web-1'), version: 1 };
    await backend.write('web-1', snapshot, 0);
    snapshot.pointer.activeId = 9;
    expect((await backend.read('web-1'))?.pointer.activeId).toBeNull();
  });
});

describe('MemoryAuditStore', () => {
  test('filters by target in insertion order', async () => {
    const store = createMemoryStore();
    for (const [id, targetId] of [['aud_1', 'web-1'], ['aud_2', 'db-1'], ['aud_3', 'web-1']]) {
      await store.audit.create({
        id,
        timestamp: '2026-01-01T00:00:00.000Z',
        targetId,
        actorId: 'system:orchestrator',
        action: 'update.started',
        resourceType: 'session',
        resourceId: 'ses_1',
        outcome: 'success',
      });
    }
    const records = await store.audit.listByTarget('web-1');
    expect(records.map((r) => r.id)).toEqual(['aud_1', 'aud_3']);
  });
});
