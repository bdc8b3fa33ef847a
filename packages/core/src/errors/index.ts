/**
 * deptdrop Error Codes
 */
export const ErrorCodes = {
  CONNECT_FAILED: 'CONNECT_FAILED',
  AUTH_FAILED: 'AUTH_FAILED',
  PROTOCOL_ERROR: 'PROTOCOL_ERROR',
  ACCESS_DENIED: 'ACCESS_DENIED',
  IO_FAILED: 'IO_FAILED',
  PARTIAL_TRANSFER: 'PARTIAL_TRANSFER',
  TIMEOUT: 'TIMEOUT',
} as const;

export type ErrorCode = typeof ErrorCodes[keyof typeof ErrorCodes];

/**
 * Wire shape of an error response. Kept here so errors can render themselves
 * without depending on the protocol module.
 */
export interface ErrorResponseBody {
  status: 'error';
  code: ErrorCode;
  message: string;
  hint?: string;
}

/**
 * Base class for deptdrop errors
 */
export class DeptdropError extends Error {
  constructor(
    public readonly code: ErrorCode,
    message: string,
    public readonly hint?: string,
  ) {
    super(message);
    this.name = 'DeptdropError';
  }

  toResponse(): ErrorResponseBody {
    const body: ErrorResponseBody = {
      status: 'error',
      code: this.code,
      message: this.message,
    };
    if (this.hint) body.hint = this.hint;
    return body;
  }

  /**
   * Rebuild an error reported by the peer.
   */
  static fromResponse(response: ErrorResponseBody): DeptdropError {
    return new DeptdropError(response.code, response.message, response.hint);
  }
}

/**
 * Error: Client could not reach the server
 */
export class ConnectFailedError extends DeptdropError {
  constructor(target: string, reason: string) {
    super(
      ErrorCodes.CONNECT_FAILED,
      `Connection failed: ${reason} (${target})`,
      'Check that the server is running and reachable',
    );
    this.name = 'ConnectFailedError';
  }
}

/**
 * Error: Unknown account, or account in neither department group
 */
export class AuthFailedError extends DeptdropError {
  constructor(reason: string = 'Authentication failed') {
    super(ErrorCodes.AUTH_FAILED, reason);
    this.name = 'AuthFailedError';
  }
}

/**
 * Error: Malformed or short receive
 */
export class ProtocolError extends DeptdropError {
  constructor(reason: string) {
    super(ErrorCodes.PROTOCOL_ERROR, `Protocol error: ${reason}`);
    this.name = 'ProtocolError';
  }
}

/**
 * Error: Peer closed the connection before a message was complete
 */
export class ConnectionClosedError extends ProtocolError {
  constructor(
    public readonly expectedBytes: number,
    public readonly receivedBytes: number,
  ) {
    super(`connection closed after ${receivedBytes} of ${expectedBytes} bytes`);
    this.name = 'ConnectionClosedError';
  }
}

/**
 * Error: Declared department does not match the resolved department
 */
export class AccessDeniedError extends DeptdropError {
  constructor(public readonly department: string) {
    super(
      ErrorCodes.ACCESS_DENIED,
      `Error: You don't have access to the ${department} department`,
    );
    this.name = 'AccessDeniedError';
  }
}

/**
 * Error: Destination file could not be created or written
 */
export class IoFailedError extends DeptdropError {
  constructor(reason: string, hint?: string) {
    super(ErrorCodes.IO_FAILED, reason, hint);
    this.name = 'IoFailedError';
  }
}

/**
 * Error: Peer disconnected mid-stream
 */
export class PartialTransferError extends DeptdropError {
  constructor(
    public readonly receivedBytes: number,
    public readonly expectedBytes: number,
  ) {
    super(
      ErrorCodes.PARTIAL_TRANSFER,
      `Transfer incomplete: received ${receivedBytes} of ${expectedBytes} bytes`,
    );
    this.name = 'PartialTransferError';
  }
}

/**
 * Error: Peer stalled past the idle deadline
 */
export class TimeoutError extends DeptdropError {
  constructor(public readonly idleMs: number) {
    super(
      ErrorCodes.TIMEOUT,
      `Connection idle for more than ${idleMs}ms`,
    );
    this.name = 'TimeoutError';
  }
}

export function isDeptdropError(error: unknown): error is DeptdropError {
  return error instanceof DeptdropError;
}
