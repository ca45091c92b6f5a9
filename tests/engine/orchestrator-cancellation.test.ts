/**
 * Cancellation, timeout and per-target exclusivity of update sessions.
 */

import { HealthCheck, CallOptions } from '../../src/adapters/interfaces';
import { Generation } from '../../src/domain/generation';
import { SessionOutcome, UpdateState, StepStatus } from '../../src/domain/session';
import { setLogHandler, resetLogHandler } from '../../src/logger';
import {
  HangingBuilder,
  StaticSource,
  createHarness,
  deferred,
  makeRevision,
} from '../helpers/fakes';

beforeAll(() => setLogHandler(() => undefined));
afterAll(() => resetLogHandler());

describe('UpdateOrchestrator cancellation', () => {
  test('an external abort during the build aborts the session', async () => {
    const controller = new AbortController();
    const builder = new HangingBuilder(() => controller.abort('operator request'));
    const { ctx, orchestrator } = await createHarness({ baseline: makeRevision('R0'), builder });

    const session = await orchestrator.runUpdate('web-1', undefined, { signal: controller.signal });

    expect(session.outcome).toBe(SessionOutcome.Aborted);
    expect(session.state).toBe(UpdateState.Aborted);
    expect(session.error?.code).toBe('SESSION.CANCELED');
    expect(session.error?.message).toBe('Session canceled: operator request');
    expect(session.steps.map((s) => s.stepName)).toEqual(['fetch', 'risk-check', 'cancel']);
    const store = await ctx.generations.forTarget('web-1');
    expect(store.list()).toHaveLength(1);
  });

  test('a signal aborted before the start never fetches', async () => {
    const controller = new AbortController();
    controller.abort();
    const source = new StaticSource(makeRevision('R1'));
    const { orchestrator } = await createHarness({ baseline: makeRevision('R0'), source });

    const session = await orchestrator.runUpdate('web-1', undefined, { signal: controller.signal });

    expect(source.calls).toBe(0);
    expect(session.outcome).toBe(SessionOutcome.Aborted);
    expect(session.steps).toHaveLength(1);
    expect(session.steps[0]).toMatchObject({ stepName: 'cancel', status: StepStatus.Failed, detail: 'Session canceled' });
  });

  test('the session timeout aborts a hanging build', async () => {
    const builder = new HangingBuilder();
    const { orchestrator } = await createHarness({ baseline: makeRevision('R0'), builder });

    const session = await orchestrator.runUpdate('web-1', { timeoutMs: 20 });

    expect(builder.calls).toBe(1);
    expect(session.outcome).toBe(SessionOutcome.Aborted);
    expect(session.error?.code).toBe('SESSION.TIMEOUT');
    expect(session.error?.message).toBe('Session exceeded timeout of 20ms');
  });

  test('cancellation after activation rolls back', async () => {
    const controller = new AbortController();
    const healthCheck: HealthCheck = {
      check: (_generation: Generation, options: CallOptions) =>
        new Promise<void>((_resolve, reject) => {
          options.signal.addEventListener('abort', () => reject(new Error('check interrupted')), { once: true });
          controller.abort();
        }),
    };
    const { ctx, orchestrator } = await createHarness({ baseline: makeRevision('R0'), healthCheck });

    const session = await orchestrator.runUpdate('web-1', undefined, { signal: controller.signal });

    expect(session.outcome).toBe(SessionOutcome.RolledBack);
    expect(session.error?.code).toBe('SESSION.CANCELED');
    expect(session.steps.map((s) => s.stepName)).toEqual([
      'fetch', 'risk-check', 'build', 'stage', 'activate', 'cancel', 'rollback',
    ]);
    const store = await ctx.generations.forTarget('web-1');
    expect(store.current()?.id).toBe(1);
  });

  test('aborting after the session finished changes nothing', async () => {
    const controller = new AbortController();
    const { orchestrator } = await createHarness({ baseline: makeRevision('R0') });

    const session = await orchestrator.runUpdate('web-1', undefined, { signal: controller.signal });
    controller.abort();

    expect(session.outcome).toBe(SessionOutcome.Success);
    expect(session.steps.some((s) => s.stepName === 'cancel')).toBe(false);
  });
});

describe('UpdateOrchestrator exclusivity', () => {
  test('rejects a second session for a target while one is running', async () => {
    const started = deferred();
    const controller = new AbortController();
    const builder = new HangingBuilder(() => started.resolve());
    const { orchestrator } = await createHarness({ baseline: makeRevision('R0'), builder });

    const first = orchestrator.runUpdate('web-1', undefined, { signal: controller.signal });
    await started.promise;

    expect(orchestrator.isRunning('web-1')).toBe(true);
    await expect(orchestrator.runUpdate('web-1')).rejects.toMatchObject({
      typedError: { code: 'SESSION.ALREADY_RUNNING' },
    });

    controller.abort();
    const session = await first;
    expect(session.outcome).toBe(SessionOutcome.Aborted);
    expect(orchestrator.isRunning('web-1')).toBe(false);
  });

  test('sessions for different targets run side by side', async () => {
    const started = deferred();
    const controller = new AbortController();
    const blocked = await createHarness({
      targetId: 'web-1',
      baseline: makeRevision('R0'),
      builder: new HangingBuilder(() => started.resolve()),
    });
    blocked.ctx.targets.register({
      id: 'db-1',
      source: new StaticSource(makeRevision('D1')),
      builder: { build: async () => ({ ok: true, artifactRef: 'db-artifact' }) },
    });

    const first = blocked.orchestrator.runUpdate('web-1', undefined, { signal: controller.signal });
    await started.promise;
    const other = await blocked.orchestrator.runUpdate('db-1');

    expect(other.outcome).toBe(SessionOutcome.Success);
    expect(other.notices).toEqual(['risk assessment skipped: no issue registry configured']);

    controller.abort();
    await first;
  });
});
