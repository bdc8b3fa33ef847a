/**
 * Transfer Server
 *
 * Connection Dispatcher: accepts TCP connections and runs one independent
 * TransferSession per connection. Sessions are not awaited and not capped;
 * the listen backlog is the only bound.
 */

import * as net from 'node:net';
import type { Socket } from 'node:net';
import type { IdentityStore } from '../identity/types.js';
import { IdentityResolver } from '../identity/resolver.js';
import { TransferWriter } from '../writer/transfer-writer.js';
import type { WriteLock } from '../writer/write-lock.js';
import { TransferSession } from '../session/transfer-session.js';
import { type ServerConfig, type ResolvedServerConfig, resolveServerConfig } from '../config.js';

export interface TransferServerOptions {
  config?: ServerConfig;
  identityStore: IdentityStore;
  /** Defaults to the process-wide lock */
  lock?: WriteLock;
}

export interface ServerAddress {
  host: string;
  port: number;
}

export class TransferServer {
  private config: ResolvedServerConfig;
  private resolver: IdentityResolver;
  private writer: TransferWriter;
  private server?: net.Server;
  private sockets = new Set<Socket>();
  private _address?: ServerAddress;

  constructor(options: TransferServerOptions) {
    this.config = resolveServerConfig(options.config);
    this.resolver = new IdentityResolver(options.identityStore);
    this.writer = new TransferWriter({
      departmentDirs: this.config.departmentDirs,
      lock: options.lock,
      verbose: this.config.verbose,
    });
  }

  get address(): ServerAddress {
    if (!this._address) throw new Error('TransferServer not started');
    return this._address;
  }

  get isRunning(): boolean {
    return !!this.server;
  }

  /** Connections currently open */
  get activeConnections(): number {
    return this.sockets.size;
  }

  get resolvedConfig(): ResolvedServerConfig {
    return this.config;
  }

  async start(): Promise<ServerAddress> {
    if (this.server && this._address) return this._address;

    const server = net.createServer((socket) => this.handleConnection(socket));

    await new Promise<void>((resolve, reject) => {
      const onListenError = (err: Error) => reject(err);
      server.once('error', onListenError);
      server.listen(
        { host: this.config.host, port: this.config.port, backlog: this.config.backlog },
        () => {
          server.off('error', onListenError);
          resolve();
        },
      );
    });

    // Accept-time failures must not stop the listener
    server.on('error', (err) => {
      console.warn('[Deptdrop:Dispatcher] Accept failed:', err);
    });

    const bound = server.address();
    const port = typeof bound === 'object' && bound !== null ? bound.port : this.config.port;
    this.server = server;
    this._address = { host: this.config.host, port };

    console.log(`[Deptdrop:Dispatcher] Listening on ${this.config.host}:${port}`);
    return this._address;
  }

  async stop(): Promise<void> {
    const server = this.server;
    if (!server) return;

    const dropped = this.activeConnections;
    for (const socket of this.sockets) {
      socket.destroy();
    }
    this.sockets.clear();

    await new Promise<void>((resolve, reject) => {
      server.close((err) => {
        if (err) reject(err);
        else resolve();
      });
    });

    this.server = undefined;
    this._address = undefined;
    console.log(`[Deptdrop:Dispatcher] Stopped (${dropped} open connections dropped)`);
  }

  private handleConnection(socket: Socket): void {
    this.sockets.add(socket);
    socket.once('close', () => this.sockets.delete(socket));

    const session = new TransferSession(socket, {
      resolver: this.resolver,
      writer: this.writer,
      chunkSize: this.config.chunkSize,
      idleTimeoutMs: this.config.idleTimeoutMs,
      hooks: this.config.hooks,
    });

    console.log(`[Deptdrop:Dispatcher] New connection from ${session.remote} (${session.id})`);
    this.config.hooks.onSessionStarted?.(session.id, session.remote);

    session.run().then(
      (outcome) => {
        console.log(`[Deptdrop:Dispatcher] Connection closed with ${outcome.remote} (${outcome.sessionId}: ${outcome.state})`);
      },
      (err: unknown) => {
        console.error(`[Deptdrop:Dispatcher] Session ${session.id} crashed:`, err);
        socket.destroy();
      },
    );
  }
}
