/**
 * Builder adapter.
 *
 * Wraps a target's builder: one call, no retries, cancellable. Failures
 * come back as a classified `BuildFailure` that remediation rules can
 * match against; the retry policy lives in the orchestrator.
 */

import { Builder, BuildError, BuildResult } from '../adapters/interfaces';
import { Revision } from '../domain/revision';
import { CancellationError, raceAbort } from './cancellation';

/** Failure signature used when nothing in the log is recognised. */
export const UNKNOWN_FAILURE = 'unknown';
/** Failure signature used when the builder threw instead of reporting. */
export const BUILDER_CRASHED = 'builder-crashed';

export interface BuildFailure {
  revisionId: string;
  /** Failure signature, e.g. "missing-dependency". */
  failureClass: string;
  log: string;
  exitSignal: number | string | null;
  /** Values extracted from the log or supplied by the builder (dependency name, option path, ...). */
  hints: Record<string, string>;
}

export type BuildOutcome =
  | { ok: true; artifactRef: string; durationMs: number }
  | { ok: false; failure: BuildFailure; durationMs: number };

interface LogSignature {
  failureClass: string;
  pattern: RegExp;
  /** Names of the pattern's capture groups, in order. */
  captures: string[];
}

/** Checked in order; the first matching signature classifies the log. */
const LOG_SIGNATURES: LogSignature[] = [
  {
    failureClass: 'missing-dependency',
    pattern: /(?:missing dependency|dependency not found|cannot find package)[:\s]+['"`]?([A-Za-z0-9@/._+-]*[A-Za-z0-9_+-])['"`]?(?:[\s.]|$)/im,
    captures: ['dependency'],
  },
  {
    failureClass: 'renamed-option',
    pattern: /option ['"`]?([\w.-]*[\w-])['"`]? (?:has been|was) renamed to ['"`]?([\w.-]*[\w-])['"`]?(?:[\s.]|$)/im,
    captures: ['option', 'replacement'],
  },
  {
    failureClass: 'hash-mismatch',
    pattern: /hash mismatch (?:in|for) ['"`]?([^'"`\s:]+)['"`]?/im,
    captures: ['source'],
  },
  {
    failureClass: 'conflicting-definition',
    pattern: /option ['"`]?([\w.-]*[\w-])['"`]? has conflicting definition/im,
    captures: ['option'],
  },
  {
    failureClass: 'out-of-space',
    pattern: /no space left on device/im,
    captures: [],
  },
];

/** Classify a raw build log and extract the hints its signature carries. */
export function classifyBuildLog(log: string): { failureClass: string; hints: Record<string, string> } {
  for (const signature of LOG_SIGNATURES) {
    const match = signature.pattern.exec(log);
    if (!match) continue;
    const hints: Record<string, string> = {};
    signature.captures.forEach((name, index) => {
      const value = match[index + 1];
      if (value) hints[name] = value;
    });
    return { failureClass: signature.failureClass, hints };
  }
  return { failureClass: UNKNOWN_FAILURE, hints: {} };
}

/**
 * Turn a builder's error into a `BuildFailure`. A class reported by the
 * builder wins over log classification; log hints are kept when both agree.
 */
export function toBuildFailure(revisionId: string, error: BuildError): BuildFailure {
  const classified = classifyBuildLog(error.log);
  const failureClass = error.class ?? classified.failureClass;
  const logHints = classified.failureClass === failureClass ? classified.hints : {};
  return {
    revisionId,
    failureClass,
    log: error.log,
    exitSignal: error.exitSignal,
    hints: { ...logHints, ...error.hints },
  };
}

export class BuilderAdapter {
  constructor(private readonly builder: Builder) {}

  /**
   * Build `revision` once. Rejects with `CancellationError` when `signal`
   * fires first; every other failure, a malformed result included, is
   * returned, not thrown.
   */
  async build(revision: Revision, signal: AbortSignal): Promise<BuildOutcome> {
    const started = Date.now();
    let result: unknown;
    try {
      result = await raceAbort(() => this.builder.build(revision, { signal }), signal);
    } catch (err) {
      if (signal.aborted) throw err instanceof CancellationError ? err : new CancellationError();
      return {
        ok: false,
        durationMs: Date.now() - started,
        failure: {
          revisionId: revision.id,
          failureClass: BUILDER_CRASHED,
          log: err instanceof Error ? err.message : String(err),
          exitSignal: null,
          hints: {},
        },
      };
    }

    const durationMs = Date.now() - started;
    if (!isBuildResult(result)) {
      return {
        ok: false,
        durationMs,
        failure: {
          revisionId: revision.id,
          failureClass: BUILDER_CRASHED,
          log: 'builder returned a malformed result',
          exitSignal: null,
          hints: {},
        },
      };
    }
    if (result.ok) {
      return { ok: true, artifactRef: result.artifactRef, durationMs };
    }
    return { ok: false, failure: toBuildFailure(revision.id, result.error), durationMs };
  }
}

function isStringRecord(value: unknown): value is Record<string, string> {
  return typeof value === 'object' && value !== null && Object.values(value).every((v) => typeof v === 'string');
}

function isBuildError(value: unknown): value is BuildError {
  if (typeof value !== 'object' || value === null) return false;
  if (!('log' in value) || typeof value.log !== 'string') return false;
  if (!('exitSignal' in value)) return false;
  const { exitSignal } = value;
  if (exitSignal !== null && typeof exitSignal !== 'number' && typeof exitSignal !== 'string') return false;
  if ('class' in value && value.class !== undefined && typeof value.class !== 'string') return false;
  return !('hints' in value) || value.hints === undefined || isStringRecord(value.hints);
}

/** Shape check for whatever the builder resolved with. */
export function isBuildResult(value: unknown): value is BuildResult {
  if (typeof value !== 'object' || value === null || !('ok' in value)) return false;
  if (value.ok === true) return 'artifactRef' in value && typeof value.artifactRef === 'string';
  if (value.ok === false) return 'error' in value && isBuildError(value.error);
  return false;
}
