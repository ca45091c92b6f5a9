/**
 * Typed error model for machine-actionable error handling.
 *
 * Session failures are recorded as typed errors on the session rather than
 * thrown, so a report can explain every failure without re-running the
 * pipeline. Only API misuse (unknown target, bad policy, concurrent session)
 * is thrown, wrapped in an error class that carries the typed error.
 */

/** Top-level error domain namespaces. */
export type ErrorDomain =
  | 'FETCH'
  | 'RISK'
  | 'BUILD'
  | 'REMEDIATION'
  | 'SWITCH'
  | 'SESSION'
  | 'TARGET'
  | 'VALIDATION'
  | 'NOTIFY'
  | 'SYSTEM';

/** Typed suggested fix an operator (or agent) can apply. */
export interface SuggestedFix {
  type: string;
  params: Record<string, unknown>;
  description?: string;
}

/** The core typed error structure recorded on sessions and returned by the API. */
export interface TypedError {
  /** Namespaced error code (e.g., "SWITCH.NO_PRIOR_GENERATION"). */
  code: string;
  /** Human-readable error message. */
  message: string;
  targetId?: string;
  sessionId?: string;
  /** Whether the same operation is expected to succeed without changes. */
  retryable: boolean;
  /** Structured detail payload. */
  details?: Record<string, unknown>;
  /** Machine-actionable remediation suggestions. */
  suggestedFixes: SuggestedFix[];
}

/** Create a typed error with defaults. */
export function createTypedError(params: {
  code: string;
  message: string;
  targetId?: string;
  sessionId?: string;
  retryable?: boolean;
  details?: Record<string, unknown>;
  suggestedFixes?: SuggestedFix[];
}): TypedError {
  return {
    code: params.code,
    message: params.message,
    targetId: params.targetId,
    sessionId: params.sessionId,
    retryable: params.retryable ?? false,
    details: params.details,
    suggestedFixes: params.suggestedFixes ?? [],
  };
}

// --- Common error factory functions ---

export function validationError(message: string, details?: Record<string, unknown>, fixes?: SuggestedFix[]): TypedError {
  return createTypedError({
    code: 'VALIDATION.POLICY',
    message,
    retryable: false,
    details,
    suggestedFixes: fixes,
  });
}

export function notFoundError(resourceType: string, resourceId: string): TypedError {
  return createTypedError({
    code: 'VALIDATION.NOT_FOUND',
    message: `${resourceType} not found: ${resourceId}`,
    retryable: false,
  });
}

export function targetNotFoundError(targetId: string): TypedError {
  return createTypedError({
    code: 'TARGET.NOT_FOUND',
    message: `Target not registered: ${targetId}`,
    targetId,
    retryable: false,
    suggestedFixes: [
      { type: 'REGISTER_TARGET', params: { targetId }, description: `Register a target definition for "${targetId}"` },
    ],
  });
}

export function fetchError(targetId: string, message: string, details?: Record<string, unknown>): TypedError {
  return createTypedError({
    code: 'FETCH.FAILED',
    message: `Could not fetch a revision: ${message}`,
    targetId,
    retryable: true,
    details,
  });
}

export function invalidRevisionError(targetId: string, problems: string[]): TypedError {
  return createTypedError({
    code: 'FETCH.INVALID_REVISION',
    message: `Configuration source returned an invalid revision: ${problems.join('; ')}`,
    targetId,
    retryable: false,
    details: { problems },
  });
}

export function riskAbortError(targetId: string, components: string[]): TypedError {
  return createTypedError({
    code: 'RISK.ABORT',
    message: `Critical issues with an abort recommendation affect: ${components.join(', ')}`,
    targetId,
    retryable: false,
    details: { components },
    suggestedFixes: [
      { type: 'WAIT_FOR_FIX', params: { components }, description: 'Wait until the registry clears the critical issues' },
      { type: 'AUTO_PROCEED_ON_CRITICAL', params: { autoProceedOnCritical: true }, description: 'Override the risk check for this session' },
    ],
  });
}

export function buildFailedError(
  targetId: string,
  revisionId: string,
  failureClass: string,
  exitSignal: number | string | null,
): TypedError {
  return createTypedError({
    code: 'BUILD.FAILED',
    message: `Build of revision ${revisionId} failed (${failureClass})`,
    targetId,
    retryable: true,
    details: { revisionId, failureClass, exitSignal },
  });
}

export function remediationExhaustedError(
  targetId: string,
  reason: 'no-match' | 'attempt-limit',
  attempts: number,
  failureClass: string,
): TypedError {
  const message = reason === 'no-match'
    ? `No remediation rule matches build failure "${failureClass}"`
    : `Remediation limit reached after ${attempts} attempt(s); last failure "${failureClass}"`;
  return createTypedError({
    code: 'REMEDIATION.EXHAUSTED',
    message,
    targetId,
    retryable: false,
    details: { reason, attempts, failureClass },
    suggestedFixes: reason === 'attempt-limit'
      ? [{ type: 'INCREASE_REMEDIATION_LIMIT', params: { maxRemediationAttempts: attempts + 1 } }]
      : [{ type: 'FIX_CONFIGURATION', params: { failureClass }, description: 'Fix the revision by hand; the build log is in the report' }],
  });
}

/**
 * Activation or rollback failure. Never retried; the report frames it as
 * requiring manual action.
 */
export function switchError(code: string, message: string, targetId?: string, details?: Record<string, unknown>): TypedError {
  return createTypedError({
    code: `SWITCH.${code}`,
    message,
    targetId,
    retryable: false,
    details,
    suggestedFixes: [
      { type: 'MANUAL_INTERVENTION', params: {}, description: 'Inspect the generation store and restore the active pointer by hand' },
    ],
  });
}

export function healthCheckFailedError(targetId: string, generationId: number, message: string): TypedError {
  return createTypedError({
    code: 'VALIDATION.HEALTH_CHECK',
    message: `Generation ${generationId} failed its health check: ${message}`,
    targetId,
    retryable: false,
    details: { generationId },
  });
}

export function sessionCanceledError(sessionId: string, reason?: string): TypedError {
  return createTypedError({
    code: 'SESSION.CANCELED',
    message: reason ? `Session canceled: ${reason}` : 'Session canceled',
    sessionId,
    retryable: true,
    details: reason ? { reason } : undefined,
  });
}

export function sessionTimeoutError(sessionId: string, timeoutMs: number): TypedError {
  return createTypedError({
    code: 'SESSION.TIMEOUT',
    message: `Session exceeded timeout of ${timeoutMs}ms`,
    sessionId,
    retryable: true,
    details: { timeoutMs },
    suggestedFixes: [
      { type: 'INCREASE_TIMEOUT', params: { timeoutMs: timeoutMs * 2 } },
    ],
  });
}

export function sessionAlreadyRunningError(targetId: string): TypedError {
  return createTypedError({
    code: 'SESSION.ALREADY_RUNNING',
    message: `An update session is already running for target "${targetId}"`,
    targetId,
    retryable: true,
  });
}

export function sessionInvalidTransition(sessionId: string, from: string, to: string): TypedError {
  return createTypedError({
    code: 'SESSION.INVALID_TRANSITION',
    message: `Cannot transition session from "${from}" to "${to}"`,
    sessionId,
    retryable: false,
    details: { from, to },
  });
}

/** API error response wrapper. */
export interface ApiErrorResponse {
  error: TypedError;
}

/** Construct an API error response. */
export function apiError(error: TypedError): ApiErrorResponse {
  return { error };
}
