/**
 * Contracts of the external collaborators a target provides.
 *
 * The orchestrator only ever talks to these interfaces. Every potentially
 * slow call receives the session's abort signal and should stop early
 * when it fires; the orchestrator stops waiting either way.
 */

import { Generation } from '../domain/generation';
import { IssueReport } from '../domain/issue';
import { Revision } from '../domain/revision';
import { UpdatePolicy } from '../domain/session';

export interface CallOptions {
  signal: AbortSignal;
}

/** Supplies the newest desired-state revision. */
export interface ConfigurationSource {
  fetchLatest(options: CallOptions): Promise<Revision>;
}

/** Structured failure reported by a builder. */
export interface BuildError {
  /** Raw build log text. */
  log: string;
  /** Exit code or signal name of the build process, when known. */
  exitSignal: number | string | null;
  /** Failure signature, when the builder already knows it (e.g. "missing-dependency"). */
  class?: string;
  /** Extra classification hints (e.g. `{ dependency: "libfoo" }`). */
  hints?: Record<string, string>;
}

export type BuildResult =
  | { ok: true; artifactRef: string }
  | { ok: false; error: BuildError };

/** Compiles a revision into a deployable artifact. No retries expected. */
export interface Builder {
  build(revision: Revision, options: CallOptions): Promise<BuildResult>;
}

/**
 * Reports known defects for components. Throwing means "unreachable";
 * the risk check then fails open.
 */
export interface IssueRegistry {
  queryIssues(componentNames: string[], options: CallOptions): Promise<IssueReport[]>;
}

/** Delivers a human-readable message. Best-effort. */
export interface NotificationChannel {
  send(message: string, meta: { sessionId: string; targetId: string }): Promise<void>;
}

/** Optional post-activation validation of a freshly switched generation. */
export interface HealthCheck {
  check(generation: Generation, options: CallOptions): Promise<void>;
}

/** Everything the orchestrator needs to update one target. */
export interface TargetDefinition {
  id: string;
  source: ConfigurationSource;
  builder: Builder;
  issueRegistry?: IssueRegistry;
  channel?: NotificationChannel;
  healthCheck?: HealthCheck;
  /** Per-target overrides of the configured default policy. */
  policy?: Partial<UpdatePolicy>;
}
