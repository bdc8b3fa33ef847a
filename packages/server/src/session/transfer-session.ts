/**
 * Transfer Session
 *
 * Runs the server side of the protocol for one connection:
 * credentials → identity → transfer header → guarded write → final response.
 */

import type { Socket } from 'node:net';
import { basename } from 'node:path';
import {
  AccessDeniedError,
  FIELD_LIMITS,
  IoFailedError,
  PartialTransferError,
  ProtocolError,
  SessionStateMachine,
  StreamReader,
  TimeoutError,
  authenticatedResponse,
  encodeResponse,
  generateSessionId,
  isDeptdropError,
  readyResponse,
  transferredResponse,
  type Department,
  type Identity,
  type ServerResponse,
  type SessionEvent,
  type SessionState,
  type TransferRequest,
} from '@deptdrop/core';
import type { IdentityResolver } from '../identity/resolver.js';
import type { TransferWriter, TransferWriteResult } from '../writer/transfer-writer.js';
import type { ServerHooks } from '../config.js';

export interface TransferSessionOptions {
  resolver: IdentityResolver;
  writer: TransferWriter;
  chunkSize: number;
  /** 0 disables the idle deadline */
  idleTimeoutMs: number;
  hooks?: ServerHooks;
  sessionId?: string;
}

export interface SessionOutcome {
  sessionId: string;
  remote: string;
  state: SessionState;
  username?: string;
  department?: Department;
  filename?: string;
  bytesWritten?: number;
  error?: Error;
}

export class TransferSession {
  readonly id: string;
  readonly remote: string;

  private socket: Socket;
  private options: TransferSessionOptions;
  private reader: StreamReader;
  private stateMachine = new SessionStateMachine();
  private outcome: SessionOutcome;

  constructor(socket: Socket, options: TransferSessionOptions) {
    this.socket = socket;
    this.options = options;
    this.id = options.sessionId ?? generateSessionId();
    this.remote = `${socket.remoteAddress ?? 'unknown'}:${socket.remotePort ?? 0}`;
    this.reader = new StreamReader(socket, {
      highWaterMark: Math.max(options.chunkSize * 16, 16 * 1024),
    });
    this.outcome = { sessionId: this.id, remote: this.remote, state: this.stateMachine.getState() };
  }

  get state(): SessionState {
    return this.stateMachine.getState();
  }

  async run(): Promise<SessionOutcome> {
    const { idleTimeoutMs, hooks } = this.options;
    this.socket.on('timeout', () => {
      this.socket.destroy(new TimeoutError(idleTimeoutMs));
    });
    this.armIdleTimer();

    try {
      const identity = await this.authenticate();
      const request = await this.receiveTransferRequest(identity);
      const result = await this.receiveFile(identity, request);
      const filename = basename(result.destination);

      this.apply({ type: 'STREAM_COMPLETED', bytesWritten: result.bytesWritten });
      await this.respond(transferredResponse(filename, request.department, result.bytesWritten));

      console.log(
        `[Deptdrop:Session] ${this.id} File '${filename}' transferred by user '${identity.username}' to ${request.department} department (${result.bytesWritten} bytes)`,
      );
    } catch (error) {
      await this.fail(error);
    } finally {
      this.close();
    }

    this.outcome.state = this.stateMachine.getState();
    hooks?.onSessionCompleted?.({ ...this.outcome });
    return { ...this.outcome };
  }

  private async authenticate(): Promise<Identity> {
    const username = await this.reader.readText('username', FIELD_LIMITS.username, { minBytes: 1 });
    this.apply({ type: 'RECEIVE_USERNAME', username });
    this.outcome.username = username;

    // Accepted as a well-formed message only; credentials are never compared.
    await this.reader.readFrame('password', FIELD_LIMITS.password);
    this.apply({ type: 'RECEIVE_PASSWORD' });

    const identity = await this.options.resolver.authenticate(username);
    this.apply({ type: 'AUTH_SUCCEEDED', department: identity.department });
    this.outcome.department = identity.department;
    this.options.hooks?.onAuthenticated?.(this.id, identity);

    await this.respond(authenticatedResponse(identity.department));
    console.log(
      `[Deptdrop:Session] ${this.id} User '${identity.username}' authenticated from ${this.remote} (${identity.department})`,
    );
    return identity;
  }

  private async receiveTransferRequest(identity: Identity): Promise<TransferRequest> {
    // The client may still be asking its user which file to send
    this.socket.setTimeout(0);
    const department = await this.reader.readText('department', FIELD_LIMITS.department, { minBytes: 1 });
    this.armIdleTimer();
    const filename = await this.reader.readText('filename', FIELD_LIMITS.filename, { minBytes: 1 });
    const declaredLength = await this.reader.readUInt32();
    this.outcome.filename = filename;

    if (department !== identity.department) {
      throw new AccessDeniedError(department);
    }

    return { department: identity.department, filename, declaredLength };
  }

  private receiveFile(identity: Identity, request: TransferRequest): Promise<TransferWriteResult> {
    const source = this.reader.stream(request.declaredLength, this.options.chunkSize);

    // Waiting for the write lock is not peer idleness
    this.socket.setTimeout(0);

    return this.options.writer.write(
      {
        identity,
        department: request.department,
        filename: request.filename,
        declaredLength: request.declaredLength,
      },
      source,
      {
        onLocked: () => {
          if (this.socket.destroyed) {
            throw new ProtocolError('peer disconnected while waiting for the write lock');
          }
          this.armIdleTimer();
        },
        onOpened: async (destination) => {
          this.apply({
            type: 'TRANSFER_ACCEPTED',
            filename: request.filename,
            declaredLength: request.declaredLength,
          });
          this.outcome.filename = basename(destination);
          await this.respond(readyResponse(basename(destination), request.declaredLength));
        },
      },
    ).then((result) => {
      this.outcome.bytesWritten = result.bytesWritten;
      return result;
    });
  }

  private async fail(error: unknown): Promise<void> {
    const err = error instanceof Error ? error : new Error(String(error));
    const from = this.stateMachine.getState();

    this.stateMachine.transition(this.failureEvent(err));
    this.outcome.error = err;
    if (err instanceof PartialTransferError) {
      this.outcome.bytesWritten = err.receivedBytes;
    }

    console.error(
      `[Deptdrop:Session] ${this.id} ${from} -> ${this.stateMachine.getState()}` +
      `${this.outcome.username ? ` (user '${this.outcome.username}')` : ''}: ${err.message}`,
    );
    this.options.hooks?.onError?.(this.id, err);

    if (this.socket.writable) {
      const reported = isDeptdropError(err) ? err : new IoFailedError('Error: Internal server error');
      await this.respond(reported.toResponse()).catch((sendError: unknown) => {
        console.warn(`[Deptdrop:Session] ${this.id} Could not report failure to peer:`, sendError);
      });
    }
  }

  private failureEvent(err: Error): SessionEvent {
    switch (this.stateMachine.getState()) {
      case 'awaiting_username':
      case 'awaiting_password':
      case 'authenticating':
        return { type: 'AUTH_FAILED', reason: err.message };
      case 'awaiting_transfer':
        return err instanceof AccessDeniedError
          ? { type: 'ACCESS_DENIED', department: err.department }
          : { type: 'FAIL', reason: err.message };
      case 'streaming':
        return err instanceof PartialTransferError
          ? { type: 'STREAM_INTERRUPTED', bytesWritten: err.receivedBytes }
          : { type: 'FAIL', reason: err.message };
      default:
        return { type: 'FAIL', reason: err.message };
    }
  }

  private armIdleTimer(): void {
    if (this.options.idleTimeoutMs > 0) {
      this.socket.setTimeout(this.options.idleTimeoutMs);
    }
  }

  private apply(event: SessionEvent): void {
    const result = this.stateMachine.transition(event);
    if (!result.success) {
      throw new ProtocolError(result.error ?? `unexpected ${event.type}`);
    }
    this.outcome.state = result.newState;
  }

  private respond(response: ServerResponse): Promise<void> {
    return new Promise((resolve, reject) => {
      if (!this.socket.writable) {
        reject(new ProtocolError('connection is no longer writable'));
        return;
      }
      this.socket.write(encodeResponse(response), (err) => {
        if (err) reject(err);
        else resolve();
      });
    });
  }

  private close(): void {
    this.socket.setTimeout(0);
    if (this.socket.destroyed) return;
    this.socket.end(() => this.socket.destroy());
  }
}
