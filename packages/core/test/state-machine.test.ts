/**
 * Session State Machine Tests
 *
 * Tests for the per-connection session lifecycle.
 */

import { describe, it, expect } from 'vitest';
import {
  SessionStateMachine,
  isTerminalSessionState,
  isValidSessionTransition,
} from '../src/state-machine/index.js';

describe('isTerminalSessionState', () => {
  it('should identify terminal states', () => {
    expect(isTerminalSessionState('completed')).toBe(true);
    expect(isTerminalSessionState('unauthenticated')).toBe(true);
    expect(isTerminalSessionState('forbidden')).toBe(true);
    expect(isTerminalSessionState('incomplete')).toBe(true);
    expect(isTerminalSessionState('failed')).toBe(true);
  });

  it('should identify non-terminal states', () => {
    expect(isTerminalSessionState('awaiting_username')).toBe(false);
    expect(isTerminalSessionState('awaiting_password')).toBe(false);
    expect(isTerminalSessionState('authenticating')).toBe(false);
    expect(isTerminalSessionState('awaiting_transfer')).toBe(false);
    expect(isTerminalSessionState('streaming')).toBe(false);
  });
});

describe('isValidSessionTransition', () => {
  it('should allow the happy path', () => {
    expect(isValidSessionTransition('awaiting_username', 'awaiting_password')).toBe(true);
    expect(isValidSessionTransition('awaiting_password', 'authenticating')).toBe(true);
    expect(isValidSessionTransition('authenticating', 'awaiting_transfer')).toBe(true);
    expect(isValidSessionTransition('awaiting_transfer', 'streaming')).toBe(true);
    expect(isValidSessionTransition('streaming', 'completed')).toBe(true);
  });

  it('should reject skipped and backward transitions', () => {
    expect(isValidSessionTransition('awaiting_username', 'awaiting_transfer')).toBe(false);
    expect(isValidSessionTransition('authenticating', 'streaming')).toBe(false);
    expect(isValidSessionTransition('streaming', 'awaiting_transfer')).toBe(false);
    expect(isValidSessionTransition('completed', 'streaming')).toBe(false);
  });

  it('should only allow forbidden from awaiting_transfer', () => {
    expect(isValidSessionTransition('awaiting_transfer', 'forbidden')).toBe(true);
    expect(isValidSessionTransition('streaming', 'forbidden')).toBe(false);
    expect(isValidSessionTransition('authenticating', 'forbidden')).toBe(false);
  });
});

describe('SessionStateMachine', () => {
  it('should start awaiting the username', () => {
    const sm = new SessionStateMachine();
    expect(sm.getState()).toBe('awaiting_username');
    expect(sm.isTerminal()).toBe(false);
  });

  it('should walk the full successful lifecycle', () => {
    const sm = new SessionStateMachine();

    expect(sm.transition({ type: 'RECEIVE_USERNAME', username: 'mfg1' }).newState).toBe('awaiting_password');
    expect(sm.transition({ type: 'RECEIVE_PASSWORD' }).newState).toBe('authenticating');
    expect(sm.transition({ type: 'AUTH_SUCCEEDED', department: 'Manufacturing' }).newState).toBe('awaiting_transfer');
    expect(
      sm.transition({ type: 'TRANSFER_ACCEPTED', filename: 'a.txt', declaredLength: 5 }).newState,
    ).toBe('streaming');

    const result = sm.transition({ type: 'STREAM_COMPLETED', bytesWritten: 5 });
    expect(result).toEqual({ success: true, newState: 'completed' });
    expect(sm.isTerminal()).toBe(true);
  });

  it('should end unauthenticated when the peer closes before credentials', () => {
    const sm = new SessionStateMachine();
    const result = sm.transition({ type: 'AUTH_FAILED', reason: 'closed' });
    expect(result.success).toBe(true);
    expect(sm.getState()).toBe('unauthenticated');
  });

  it('should end forbidden on access denial', () => {
    const sm = new SessionStateMachine('awaiting_transfer');
    sm.transition({ type: 'ACCESS_DENIED', department: 'Distribution' });
    expect(sm.getState()).toBe('forbidden');
  });

  it('should end incomplete when the stream is interrupted', () => {
    const sm = new SessionStateMachine('streaming');
    sm.transition({ type: 'STREAM_INTERRUPTED', bytesWritten: 2 });
    expect(sm.getState()).toBe('incomplete');
  });

  it('should reject events that do not apply to the current state', () => {
    const sm = new SessionStateMachine();
    const result = sm.transition({ type: 'STREAM_COMPLETED', bytesWritten: 1 });

    expect(result.success).toBe(false);
    expect(result.newState).toBe('awaiting_username');
    expect(result.error).toBe('Invalid event STREAM_COMPLETED for state awaiting_username');
  });

  it('should not leave a terminal state', () => {
    const sm = new SessionStateMachine('completed');
    expect(sm.transition({ type: 'FAIL', reason: 'late' }).success).toBe(false);
    expect(sm.getState()).toBe('completed');
  });

  it('should fail from any non-terminal state', () => {
    const sm = new SessionStateMachine('authenticating');
    expect(sm.transition({ type: 'FAIL', reason: 'io' }).newState).toBe('failed');
  });
});
