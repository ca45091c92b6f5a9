/**
 * In-process collaborators for orchestrator and API tests.
 */

import {
  Builder,
  BuildResult,
  CallOptions,
  ConfigurationSource,
  HealthCheck,
  IssueRegistry,
  NotificationChannel,
  TargetDefinition,
} from '../../src/adapters/interfaces';
import { Generation, GenerationSnapshot } from '../../src/domain/generation';
import { IssueReport } from '../../src/domain/issue';
import { Revision } from '../../src/domain/revision';
import { UpdatePolicy } from '../../src/domain/session';
import { createAppContext, AppContext } from '../../src/server';
import { RemediationRule } from '../../src/engine/remediation-rules';
import { MemoryGenerationBackend } from '../../src/storage/memory-store';
import { createMemoryStore } from '../../src/storage/memory-store';
import { UpdateOrchestrator } from '../../src/engine/orchestrator';
import { GenerationBackend } from '../../src/storage/store';

export const FETCHED_AT = '2026-01-01T00:00:00.000Z';

export function makeRevision(id: string, components: string[] = ['openssl', 'nginx']): Revision {
  return { id, components, payloadRef: `payload/${id}`, patches: [], fetchedAt: FETCHED_AT };
}

export function buildOk(artifactRef: string): BuildResult {
  return { ok: true, artifactRef };
}

export function buildFail(log: string, failureClass?: string): BuildResult {
  return { ok: false, error: { log, exitSignal: 1, ...(failureClass ? { class: failureClass } : {}) } };
}

/** Returns a fixed revision, or throws a fixed error. */
export class StaticSource implements ConfigurationSource {
  calls = 0;

  constructor(private next: Revision | Error) {}

  async fetchLatest(): Promise<Revision> {
    this.calls++;
    if (this.next instanceof Error) throw this.next;
    return this.next;
  }
}

/** Plays back build results in order; repeats `fallback` once the script runs out. */
export class ScriptedBuilder implements Builder {
  readonly built: Revision[] = [];

  constructor(private script: Array<BuildResult | Error> = [], private fallback: BuildResult = buildOk('artifact')) {}

  async build(revision: Revision): Promise<BuildResult> {
    this.built.push(revision);
    const next = this.script.shift() ?? this.fallback;
    if (next instanceof Error) throw next;
    return next;
  }
}

/** Builder whose call only ends when the session's signal fires. */
export class HangingBuilder implements Builder {
  calls = 0;

  constructor(private onStart?: () => void) {}

  build(_revision: Revision, options: CallOptions): Promise<BuildResult> {
    this.calls++;
    return new Promise<BuildResult>((_resolve, reject) => {
      options.signal.addEventListener('abort', () => reject(new Error('build interrupted')), { once: true });
      this.onStart?.();
    });
  }
}

export class StaticIssueRegistry implements IssueRegistry {
  queries: string[][] = [];

  constructor(private reports: IssueReport[] | Error = []) {}

  async queryIssues(componentNames: string[]): Promise<IssueReport[]> {
    this.queries.push(componentNames);
    if (this.reports instanceof Error) throw this.reports;
    return this.reports;
  }
}

export class RecordingChannel implements NotificationChannel {
  messages: Array<{ message: string; sessionId: string; targetId: string }> = [];

  async send(message: string, meta: { sessionId: string; targetId: string }): Promise<void> {
    this.messages.push({ message, ...meta });
  }
}

export class FailingHealthCheck implements HealthCheck {
  checked: Generation[] = [];

  constructor(private message: string) {}

  async check(generation: Generation): Promise<void> {
    this.checked.push(generation);
    throw new Error(this.message);
  }
}

/** Memory backend that rejects the writes `shouldFail` picks. */
export class FlakyBackend implements GenerationBackend {
  readonly inner = new MemoryGenerationBackend();
  writes = 0;
  shouldFail: (snapshot: GenerationSnapshot) => boolean = () => false;

  read(targetId: string): Promise<GenerationSnapshot | null> {
    return this.inner.read(targetId);
  }

  async write(targetId: string, snapshot: GenerationSnapshot, expectedVersion: number): Promise<void> {
    this.writes++;
    if (this.shouldFail(snapshot)) {
      throw new Error('disk full');
    }
    await this.inner.write(targetId, snapshot, expectedVersion);
  }
}

export interface HarnessOptions {
  targetId?: string;
  source?: ConfigurationSource;
  builder?: Builder;
  issueRegistry?: IssueRegistry;
  healthCheck?: HealthCheck;
  policy?: Partial<UpdatePolicy>;
  rules?: readonly RemediationRule[];
  backend?: GenerationBackend;
  /** Revision of an active baseline generation; none when omitted. */
  baseline?: Revision;
}

export interface Harness {
  ctx: AppContext;
  orchestrator: UpdateOrchestrator;
  target: TargetDefinition;
  channel: RecordingChannel;
}

/** App context with one registered target, optionally with an active baseline generation. */
export async function createHarness(options: HarnessOptions = {}): Promise<Harness> {
  const channel = new RecordingChannel();
  const target: TargetDefinition = {
    id: options.targetId ?? 'web-1',
    source: options.source ?? new StaticSource(makeRevision('R1')),
    builder: options.builder ?? new ScriptedBuilder(),
    issueRegistry: options.issueRegistry ?? new StaticIssueRegistry(),
    healthCheck: options.healthCheck,
    channel,
    policy: options.policy,
  };
  const ctx = createAppContext({
    store: createMemoryStore(options.backend),
    targets: [target],
  });
  const orchestrator = options.rules
    ? new UpdateOrchestrator({ ...ctx, rules: options.rules })
    : ctx.orchestrator;

  if (options.baseline) {
    const store = await ctx.generations.forTarget(target.id);
    const generation = await store.stage(options.baseline, 'artifact-0');
    await store.activate(generation);
  }
  return { ctx, orchestrator, target, channel };
}

/** A promise plus its resolve function. */
export function deferred(): { promise: Promise<void>; resolve: () => void } {
  let resolve: () => void = () => undefined;
  const promise = new Promise<void>((r) => {
    resolve = r;
  });
  return { promise, resolve };
}
