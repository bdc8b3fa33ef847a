/**
 * Frame Codec Tests
 */

import { describe, it, expect } from 'vitest';
import {
  encodeLength,
  encodeFrame,
  encodeResponse,
  decodeResponse,
} from '../src/protocol/frame.js';
import {
  authenticatedResponse,
  transferredResponse,
  readyResponse,
  isAuthSuccess,
  isTransferSuccess,
} from '../src/types/messages.js';
import { AccessDeniedError, ProtocolError } from '../src/errors/index.js';

describe('encodeLength', () => {
  it('should write a 4-byte big-endian unsigned integer', () => {
    expect([...encodeLength(5)]).toEqual([0, 0, 0, 5]);
    expect([...encodeLength(0x01020304)]).toEqual([1, 2, 3, 4]);
    expect([...encodeLength(0xffffffff)]).toEqual([255, 255, 255, 255]);
  });

  it('should reject values that do not fit', () => {
    expect(() => encodeLength(-1)).toThrow(ProtocolError);
    expect(() => encodeLength(0x100000000)).toThrow(ProtocolError);
    expect(() => encodeLength(1.5)).toThrow(ProtocolError);
  });
});

describe('encodeFrame', () => {
  it('should prefix the UTF-8 byte length', () => {
    expect([...encodeFrame('mfg1')]).toEqual([0, 0, 0, 4, 0x6d, 0x66, 0x67, 0x31]);
  });

  it('should count bytes rather than characters', () => {
    const frame = encodeFrame('é');
    expect(frame.readUInt32BE(0)).toBe(2);
    expect(frame.length).toBe(6);
  });

  it('should encode an empty payload as a bare header', () => {
    expect([...encodeFrame('')]).toEqual([0, 0, 0, 0]);
  });
});

describe('responses', () => {
  it('should keep the authentication success marker', () => {
    const response = authenticatedResponse('Manufacturing');
    expect(response.message).toBe('Authentication successful. Department: Manufacturing');
    expect(isAuthSuccess(response)).toBe(true);
    expect(isTransferSuccess(response)).toBe(false);
  });

  it('should keep the transfer success marker', () => {
    const response = transferredResponse('a.txt', 'Distribution', 5);
    expect(response.message).toBe("File 'a.txt' successfully transferred to Distribution department");
    expect(isTransferSuccess(response)).toBe(true);
  });

  it('should not treat the ready response as a final success', () => {
    const response = readyResponse('a.txt', 5);
    expect(response.message).toBe("Ready to receive 5 bytes for 'a.txt'");
    expect(isTransferSuccess(response)).toBe(false);
  });

  it('should decode what it encodes', () => {
    const frame = encodeResponse(new AccessDeniedError('Distribution').toResponse());
    const decoded = decodeResponse(frame.subarray(4));
    expect(decoded).toEqual({
      status: 'error',
      code: 'ACCESS_DENIED',
      message: "Error: You don't have access to the Distribution department",
    });
  });

  it('should reject bodies that are not JSON', () => {
    expect(() => decodeResponse(Buffer.from('Authentication successful'))).toThrow(
      'Protocol error: response is not valid JSON',
    );
  });

  it('should reject unknown error codes', () => {
    const body = Buffer.from(JSON.stringify({ status: 'error', code: 'NOPE', message: 'x' }));
    expect(() => decodeResponse(body)).toThrow(ProtocolError);
  });

  it('should reject unknown departments', () => {
    const body = Buffer.from(JSON.stringify({ status: 'ok', message: 'x', department: 'Sales' }));
    expect(() => decodeResponse(body)).toThrow(ProtocolError);
  });
});
