/**
 * @deptdrop/core
 *
 * deptdrop Protocol Core - Types, Framing, Session State Machine, and Errors
 */

// Types
export * from './types/index.js';

// Utils
export * from './utils/index.js';

// Framing
export * from './protocol/index.js';

// State Machine - Session
export {
  SessionStateMachine,
  isTerminalSessionState,
  isValidSessionTransition,
  type SessionState,
  type SessionEvent,
  type SessionTransitionResult,
} from './state-machine/index.js';

// Errors
export * from './errors/index.js';
