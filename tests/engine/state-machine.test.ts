import { transitionUpdateState, isTerminalUpdateState, outcomeFor } from '../../src/engine/state-machine';
import { UpdateState, SessionOutcome } from '../../src/domain/session';

describe('Update State Machine', () => {
  test('valid transition: fetching -> risk-check', () => {
    const result = transitionUpdateState('ses_1', UpdateState.Fetching, UpdateState.RiskCheck);
    expect(result).toEqual({ success: true, newStatus: UpdateState.RiskCheck });
  });

  test('valid transition: fetching -> done (no-op update)', () => {
    const result = transitionUpdateState('ses_1', UpdateState.Fetching, UpdateState.Done);
    expect(result.success).toBe(true);
  });

  test('valid transition: building -> remediating -> building', () => {
    expect(transitionUpdateState('ses_1', UpdateState.Building, UpdateState.Remediating).success).toBe(true);
    expect(transitionUpdateState('ses_1', UpdateState.Remediating, UpdateState.Building).success).toBe(true);
  });

  test('valid transition: activating -> rolling-back -> rolled-back', () => {
    expect(transitionUpdateState('ses_1', UpdateState.Activating, UpdateState.RollingBack).success).toBe(true);
    expect(transitionUpdateState('ses_1', UpdateState.RollingBack, UpdateState.RolledBack).success).toBe(true);
  });

  test('invalid transition: risk-check -> activating', () => {
    const result = transitionUpdateState('ses_1', UpdateState.RiskCheck, UpdateState.Activating);
    expect(result.success).toBe(false);
    if (result.success) return;
    expect(result.error.code).toBe('SESSION.INVALID_TRANSITION');
    expect(result.error.sessionId).toBe('ses_1');
  });

  test('invalid transition: rolling-back -> aborted', () => {
    expect(transitionUpdateState('ses_1', UpdateState.RollingBack, UpdateState.Aborted).success).toBe(false);
  });

  test('no transition leaves a terminal state', () => {
    for (const terminal of [UpdateState.Done, UpdateState.Aborted, UpdateState.RolledBack]) {
      for (const target of Object.values(UpdateState)) {
        expect(transitionUpdateState('ses_1', terminal, target).success).toBe(false);
      }
    }
  });

  test('terminal states', () => {
    expect(isTerminalUpdateState(UpdateState.Done)).toBe(true);
    expect(isTerminalUpdateState(UpdateState.Aborted)).toBe(true);
    expect(isTerminalUpdateState(UpdateState.RolledBack)).toBe(true);
    expect(isTerminalUpdateState(UpdateState.RollingBack)).toBe(false);
    expect(isTerminalUpdateState(UpdateState.Fetching)).toBe(false);
  });

  test('outcomes map one-to-one onto terminal states', () => {
    expect(outcomeFor(UpdateState.Done)).toBe(SessionOutcome.Success);
    expect(outcomeFor(UpdateState.Aborted)).toBe(SessionOutcome.Aborted);
    expect(outcomeFor(UpdateState.RolledBack)).toBe(SessionOutcome.RolledBack);
    expect(outcomeFor(UpdateState.Building)).toBeUndefined();
  });
});
