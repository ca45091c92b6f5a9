/**
 * Update session state machine.
 *
 * Enforces valid state transitions for sessions,
 * producing typed errors on invalid transitions.
 */

import { UpdateState, VALID_UPDATE_TRANSITIONS, TERMINAL_OUTCOMES, SessionOutcome } from '../domain/session';
import { TypedError, sessionInvalidTransition } from '../domain/errors';

/** Result of a state transition attempt. */
export type TransitionResult<S> =
  | { success: true; newStatus: S }
  | { success: false; error: TypedError };

/** Attempt a session state transition. */
export function transitionUpdateState(
  sessionId: string,
  current: UpdateState,
  target: UpdateState,
): TransitionResult<UpdateState> {
  const validTargets = VALID_UPDATE_TRANSITIONS[current];
  if (!validTargets.includes(target)) {
    return { success: false, error: sessionInvalidTransition(sessionId, current, target) };
  }
  return { success: true, newStatus: target };
}

/** Check if a session state is terminal. */
export function isTerminalUpdateState(state: UpdateState): boolean {
  return VALID_UPDATE_TRANSITIONS[state].length === 0;
}

/** Outcome recorded when a session enters `state`; undefined for non-terminal states. */
export function outcomeFor(state: UpdateState): SessionOutcome | undefined {
  return TERMINAL_OUTCOMES[state];
}
