export {
  SessionStateMachine,
  isTerminalSessionState,
  isValidSessionTransition,
  type SessionState,
  type SessionEvent,
  type SessionTransitionResult,
} from './session.js';
