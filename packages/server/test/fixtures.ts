import * as net from 'node:net';
import { once } from 'node:events';
import {
  FIELD_LIMITS,
  StreamReader,
  decodeResponse,
  encodeFrame,
  encodeLength,
  type ServerResponse,
} from '@deptdrop/core';
import { MemoryIdentityStore } from '../src/identity/memory-identity-store.js';

/**
 * mfg1: Manufacturing member
 * dist1: Distribution by primary gid
 * both1: in both groups
 * loner: in neither
 */
export function createIdentityStore(): MemoryIdentityStore {
  return new MemoryIdentityStore({
    accounts: [
      { username: 'mfg1', uid: 1001, gid: 1001 },
      { username: 'dist1', uid: 1002, gid: 2001 },
      { username: 'both1', uid: 1003, gid: 1003 },
      { username: 'loner', uid: 1004, gid: 1004 },
    ],
    groups: [
      { name: 'Manufacturing', gid: 3001, members: ['mfg1', 'both1'] },
      { name: 'Distribution', gid: 2001, members: ['both1'] },
    ],
  });
}

export interface RawClient {
  socket: net.Socket;
  reader: StreamReader;
  readResponse(): Promise<ServerResponse>;
  /** Settles when the socket closes, for any reason */
  closed: Promise<unknown>;
}

export async function connectRaw(port: number): Promise<RawClient> {
  const socket = net.connect({ host: '127.0.0.1', port });
  await once(socket, 'connect');
  const reader = new StreamReader(socket);
  return {
    socket,
    reader,
    closed: new Promise((resolve) => socket.once('close', resolve)),
    readResponse: async () => decodeResponse(await reader.readFrame('response', FIELD_LIMITS.response)),
  };
}

export function sendCredentials(client: RawClient, username: string, password = 'test-secret'): void {
  client.socket.write(Buffer.concat([encodeFrame(username), encodeFrame(password)]));
}

export function sendHeader(client: RawClient, department: string, filename: string, length: number): void {
  client.socket.write(Buffer.concat([encodeFrame(department), encodeFrame(filename), encodeLength(length)]));
}
