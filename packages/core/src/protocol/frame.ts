/**
 * Frame codec
 *
 * Every message before the file payload travels as a 4-byte unsigned
 * big-endian length followed by that many bytes, so message boundaries do not
 * depend on how the transport splits or coalesces writes.
 */

import { ProtocolError } from '../errors/index.js';
import {
  LENGTH_FIELD_BYTES,
  MAX_DECLARED_LENGTH,
  serverResponseSchema,
  type ServerResponse,
} from '../types/messages.js';

export function encodeLength(length: number): Buffer {
  if (!Number.isInteger(length) || length < 0 || length > MAX_DECLARED_LENGTH) {
    throw new ProtocolError(`length ${length} does not fit in ${LENGTH_FIELD_BYTES} bytes`);
  }
  const header = Buffer.alloc(LENGTH_FIELD_BYTES);
  header.writeUInt32BE(length, 0);
  return header;
}

export function encodeFrame(payload: string | Buffer): Buffer {
  const body = typeof payload === 'string' ? Buffer.from(payload, 'utf-8') : payload;
  return Buffer.concat([encodeLength(body.length), body]);
}

export function encodeResponse(response: ServerResponse): Buffer {
  return encodeFrame(JSON.stringify(response));
}

export function decodeResponse(body: Buffer): ServerResponse {
  let parsed: unknown;
  try {
    parsed = JSON.parse(body.toString('utf-8'));
  } catch {
    throw new ProtocolError('response is not valid JSON');
  }

  const result = serverResponseSchema.safeParse(parsed);
  if (!result.success) {
    throw new ProtocolError(`unexpected response shape: ${result.error.issues[0]?.message ?? 'invalid'}`);
  }
  return result.data;
}
