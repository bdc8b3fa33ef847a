import type { Department } from '../types/department.js';

export type SessionState =
  | 'awaiting_username'
  | 'awaiting_password'
  | 'authenticating'
  | 'awaiting_transfer'
  | 'streaming'
  | 'completed'
  | 'unauthenticated'
  | 'forbidden'
  | 'incomplete'
  | 'failed';

// ========== Transition Table ==========

const SESSION_TRANSITIONS: Record<SessionState, SessionState[]> = {
  awaiting_username: ['awaiting_password', 'unauthenticated', 'failed'],
  awaiting_password: ['authenticating', 'unauthenticated', 'failed'],
  authenticating: ['awaiting_transfer', 'unauthenticated', 'failed'],
  awaiting_transfer: ['streaming', 'forbidden', 'failed'],
  streaming: ['completed', 'incomplete', 'failed'],
  completed: [],
  unauthenticated: [],
  forbidden: [],
  incomplete: [],
  failed: [],
};

export function isTerminalSessionState(state: SessionState): boolean {
  return SESSION_TRANSITIONS[state].length === 0;
}

export function isValidSessionTransition(
  from: SessionState,
  to: SessionState,
): boolean {
  return SESSION_TRANSITIONS[from].includes(to);
}

// ========== Events ==========

export type SessionEvent =
  | { type: 'RECEIVE_USERNAME'; username: string }
  | { type: 'RECEIVE_PASSWORD' }
  | { type: 'AUTH_SUCCEEDED'; department: Department }
  | { type: 'AUTH_FAILED'; reason: string }
  | { type: 'TRANSFER_ACCEPTED'; filename: string; declaredLength: number }
  | { type: 'ACCESS_DENIED'; department: string }
  | { type: 'STREAM_COMPLETED'; bytesWritten: number }
  | { type: 'STREAM_INTERRUPTED'; bytesWritten: number }
  | { type: 'FAIL'; reason: string };

export interface SessionTransitionResult {
  success: boolean;
  newState: SessionState;
  error?: string;
}

// ========== State Machine ==========

export class SessionStateMachine {
  private state: SessionState = 'awaiting_username';

  constructor(initialState?: SessionState) {
    if (initialState) {
      this.state = initialState;
    }
  }

  getState(): SessionState {
    return this.state;
  }

  isTerminal(): boolean {
    return isTerminalSessionState(this.state);
  }

  transition(event: SessionEvent): SessionTransitionResult {
    const targetState = this.getTargetState(event);

    if (!targetState) {
      return {
        success: false,
        newState: this.state,
        error: `Invalid event ${event.type} for state ${this.state}`,
      };
    }

    if (!isValidSessionTransition(this.state, targetState)) {
      return {
        success: false,
        newState: this.state,
        error: `Invalid transition from ${this.state} to ${targetState}`,
      };
    }

    this.state = targetState;
    return {
      success: true,
      newState: this.state,
    };
  }

  private getTargetState(event: SessionEvent): SessionState | null {
    switch (event.type) {
      case 'RECEIVE_USERNAME':
        return this.state === 'awaiting_username' ? 'awaiting_password' : null;

      case 'RECEIVE_PASSWORD':
        return this.state === 'awaiting_password' ? 'authenticating' : null;

      case 'AUTH_SUCCEEDED':
        return this.state === 'authenticating' ? 'awaiting_transfer' : null;

      // A close before credentials are complete also leaves the session unauthenticated
      case 'AUTH_FAILED':
        return ['awaiting_username', 'awaiting_password', 'authenticating'].includes(this.state)
          ? 'unauthenticated'
          : null;

      case 'TRANSFER_ACCEPTED':
        return this.state === 'awaiting_transfer' ? 'streaming' : null;

      case 'ACCESS_DENIED':
        return this.state === 'awaiting_transfer' ? 'forbidden' : null;

      case 'STREAM_COMPLETED':
        return this.state === 'streaming' ? 'completed' : null;

      case 'STREAM_INTERRUPTED':
        return this.state === 'streaming' ? 'incomplete' : null;

      case 'FAIL':
        return isTerminalSessionState(this.state) ? null : 'failed';

      default:
        return null;
    }
  }
}
