/**
 * Transfer Client
 *
 * Client side of the upload protocol over one TCP connection.
 *
 * @example
 * ```typescript
 * import { TransferClient } from '@deptdrop/client';
 *
 * const client = new TransferClient({ host: '10.0.0.5', port: 8080 });
 * await client.connect();
 * await client.authenticate({ username: 'mfg1', password: '' });
 * const result = await client.transfer('./report.csv', 'Manufacturing');
 * await client.close();
 * ```
 */

import * as net from 'node:net';
import { createReadStream } from 'node:fs';
import { stat } from 'node:fs/promises';
import { basename } from 'node:path';
import {
  ConnectFailedError,
  DeptdropError,
  FIELD_LIMITS,
  IoFailedError,
  MAX_DECLARED_LENGTH,
  ProtocolError,
  StreamReader,
  TimeoutError,
  decodeResponse,
  encodeFrame,
  encodeLength,
  isAuthSuccess,
  isDepartment,
  isTransferSuccess,
  type Department,
  type FieldName,
  type OkResponse,
  type ServerResponse,
} from '@deptdrop/core';
import { resolveClientConfig, type ClientConfig, type ResolvedClientConfig } from './config.js';

export interface Credentials {
  username: string;
  /** Sent to the server but not verified there */
  password: string;
}

export interface AuthenticationResult {
  department: Department;
  message: string;
}

export interface TransferResult {
  filename: string;
  department: Department;
  bytes: number;
  message: string;
}

export class TransferClient {
  private config: ResolvedClientConfig;
  private socket?: net.Socket;
  private reader?: StreamReader;

  constructor(config: ClientConfig = {}) {
    this.config = resolveClientConfig(config);
  }

  get isConnected(): boolean {
    return !!this.socket && !this.socket.destroyed;
  }

  get target(): string {
    return `${this.config.host}:${this.config.port}`;
  }

  /**
   * Open the connection. A failure is final; there is no retry.
   */
  async connect(): Promise<void> {
    if (this.socket) throw new Error('TransferClient already connected');

    const socket = net.connect({ host: this.config.host, port: this.config.port });
    const reader = new StreamReader(socket);

    await new Promise<void>((resolve, reject) => {
      const timer = setTimeout(() => {
        cleanup();
        socket.destroy();
        reject(new ConnectFailedError(this.target, `timed out after ${this.config.connectTimeoutMs}ms`));
      }, this.config.connectTimeoutMs);

      const onConnect = () => {
        cleanup();
        resolve();
      };
      const onError = (err: Error) => {
        cleanup();
        reject(new ConnectFailedError(this.target, err.message));
      };
      const cleanup = () => {
        clearTimeout(timer);
        socket.off('connect', onConnect);
        socket.off('error', onError);
      };

      socket.once('connect', onConnect);
      socket.once('error', onError);
    });

    this.socket = socket;
    this.reader = reader;
  }

  async authenticate(credentials: Credentials): Promise<AuthenticationResult> {
    const username = encodeField('username', credentials.username, 1);
    const password = encodeField('password', credentials.password, 0);

    await this.send(Buffer.concat([username, password]));
    const response = this.expectOk(await this.readResponse());
    if (!isAuthSuccess(response) || !response.department) {
      throw new ProtocolError(`unexpected authentication response: ${response.message}`);
    }

    return { department: response.department, message: response.message };
  }

  /**
   * Upload one local file. The file is checked before anything is sent, so a
   * missing file leaves the session untouched.
   */
  async transfer(filePath: string, department: Department): Promise<TransferResult> {
    const totalBytes = await localFileSize(filePath);
    const filename = basename(filePath);

    if (!isDepartment(department)) {
      throw new ProtocolError(`unknown department '${String(department)}'`);
    }

    await this.send(Buffer.concat([
      encodeField('department', department, 1),
      encodeField('filename', filename, 1),
      encodeLength(totalBytes),
    ]));

    // Rejections arrive here, before any file byte is sent. Acceptance
    // waits for the server's write lock, so it has its own deadline.
    this.expectOk(await this.readResponse(this.config.readyTimeoutMs));

    try {
      await this.streamFile(filePath, totalBytes);
    } catch (error) {
      throw await this.preferServerError(error);
    }

    const response = this.expectOk(await this.readResponse());
    if (!isTransferSuccess(response)) {
      throw new ProtocolError(`unexpected transfer response: ${response.message}`);
    }

    return {
      filename: response.filename ?? filename,
      department: response.department ?? department,
      bytes: response.bytes ?? totalBytes,
      message: response.message,
    };
  }

  async close(): Promise<void> {
    const socket = this.socket;
    this.socket = undefined;
    this.reader = undefined;
    if (!socket || socket.destroyed) return;

    await new Promise<void>((resolve) => {
      socket.once('close', () => resolve());
      socket.end(() => socket.destroy());
    });
  }

  private async streamFile(filePath: string, totalBytes: number): Promise<void> {
    const { chunkSize, onProgress } = this.config;
    let bytesSent = 0;

    const file = createReadStream(filePath, { highWaterMark: chunkSize });
    try {
      for await (const data of file) {
        if (!Buffer.isBuffer(data)) continue;
        const chunk = data.length > totalBytes - bytesSent ? data.subarray(0, totalBytes - bytesSent) : data;
        await this.send(chunk);
        bytesSent += chunk.length;
        onProgress?.({ bytesSent, totalBytes, percent: (bytesSent / totalBytes) * 100 });
        if (bytesSent >= totalBytes) break;
      }
    } finally {
      file.destroy();
    }

    if (bytesSent < totalBytes) {
      throw new IoFailedError(
        `Error reading file: ${filePath} shrank to ${bytesSent} bytes while sending`,
        'Retry once the file is no longer being written',
      );
    }
  }

  /**
   * The server reports write failures and then closes; surface its message
   * rather than the local send error when one is waiting.
   */
  private async preferServerError(error: unknown): Promise<unknown> {
    const reader = this.reader;
    if (!reader || reader.bufferedBytes === 0) return error;
    try {
      const response = decodeResponse(await reader.readFrame('response', FIELD_LIMITS.response));
      return response.status === 'error' ? DeptdropError.fromResponse(response) : error;
    } catch {
      return error;
    }
  }

  private expectOk(response: ServerResponse): OkResponse {
    if (response.status === 'error') {
      throw DeptdropError.fromResponse(response);
    }
    return response;
  }

  /**
   * Read one response; a timeout of 0 waits forever.
   */
  private async readResponse(timeoutMs: number = this.config.responseTimeoutMs): Promise<ServerResponse> {
    const socket = this.requireSocket();
    const reader = this.reader;
    if (!reader) throw new Error('TransferClient not connected');

    const timer = timeoutMs > 0
      ? setTimeout(() => socket.destroy(new TimeoutError(timeoutMs)), timeoutMs)
      : undefined;
    try {
      return decodeResponse(await reader.readFrame('response', FIELD_LIMITS.response));
    } finally {
      clearTimeout(timer);
    }
  }

  private send(data: Buffer): Promise<void> {
    const socket = this.requireSocket();
    if (!socket.writable) {
      return Promise.reject(new ProtocolError('connection is no longer writable'));
    }
    if (socket.write(data)) return Promise.resolve();

    return new Promise((resolve, reject) => {
      const onDrain = () => {
        cleanup();
        resolve();
      };
      const onClose = () => {
        cleanup();
        reject(new ProtocolError('connection closed while sending'));
      };
      const cleanup = () => {
        socket.off('drain', onDrain);
        socket.off('close', onClose);
      };
      socket.on('drain', onDrain);
      socket.on('close', onClose);
    });
  }

  private requireSocket(): net.Socket {
    if (!this.socket) throw new Error('TransferClient not connected');
    return this.socket;
  }
}

function encodeField(field: FieldName, value: string, minBytes: number): Buffer {
  const body = Buffer.from(value, 'utf-8');
  const limit = FIELD_LIMITS[field];
  if (body.length > limit) {
    throw new ProtocolError(`${field} is ${body.length} bytes, limit is ${limit}`);
  }
  if (body.length < minBytes) {
    throw new ProtocolError(`${field} is empty`);
  }
  return encodeFrame(body);
}

async function localFileSize(filePath: string): Promise<number> {
  let size: number;
  try {
    const info = await stat(filePath);
    if (!info.isFile()) {
      throw new Error('not a regular file');
    }
    size = info.size;
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    throw new IoFailedError(`Error: Cannot access file '${filePath}': ${reason}`);
  }

  if (size > MAX_DECLARED_LENGTH) {
    throw new IoFailedError(
      `Error: File '${filePath}' is ${size} bytes, limit is ${MAX_DECLARED_LENGTH}`,
    );
  }
  return size;
}
