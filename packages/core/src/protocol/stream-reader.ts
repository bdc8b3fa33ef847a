/**
 * Stream Reader
 *
 * Pull-style reads (exact byte counts, frames, bounded chunks) over a push-style
 * Readable such as a net.Socket. Buffers at most roughly `highWaterMark` bytes,
 * pausing the underlying stream above it.
 */

import type { Readable } from 'node:stream';
import { ConnectionClosedError, ProtocolError } from '../errors/index.js';
import { LENGTH_FIELD_BYTES } from '../types/messages.js';

export interface StreamReaderOptions {
  highWaterMark?: number;
}

export interface ReadFrameOptions {
  /** Smallest acceptable payload size (default: 0) */
  minBytes?: number;
}

const DEFAULT_HIGH_WATER_MARK = 64 * 1024;

export class StreamReader {
  private chunks: Buffer[] = [];
  private buffered = 0;
  private ended = false;
  private failure: Error | null = null;
  private notify: (() => void) | null = null;
  private readonly highWaterMark: number;

  constructor(
    private readonly source: Readable,
    options: StreamReaderOptions = {},
  ) {
    this.highWaterMark = options.highWaterMark ?? DEFAULT_HIGH_WATER_MARK;

    source.on('data', (chunk: Buffer | string) => this.onData(chunk));
    source.on('end', () => this.onEnd());
    source.on('close', () => this.onEnd());
    source.on('error', (err: Error) => this.onError(err));
  }

  /** Bytes received but not yet consumed */
  get bufferedBytes(): number {
    return this.buffered;
  }

  async readExact(length: number): Promise<Buffer> {
    while (this.buffered < length) {
      this.throwIfClosed(length);
      await this.waitForData();
    }
    return this.take(length);
  }

  /**
   * Resolve with between 1 and `maxBytes` bytes, whatever has arrived.
   */
  async readAvailable(maxBytes: number): Promise<Buffer> {
    while (this.buffered === 0) {
      this.throwIfClosed(maxBytes);
      await this.waitForData();
    }
    return this.take(Math.min(maxBytes, this.buffered));
  }

  async readUInt32(): Promise<number> {
    const bytes = await this.readExact(LENGTH_FIELD_BYTES);
    return bytes.readUInt32BE(0);
  }

  async readFrame(label: string, maxBytes: number, options: ReadFrameOptions = {}): Promise<Buffer> {
    const length = await this.readUInt32();
    if (length > maxBytes) {
      throw new ProtocolError(`${label} is ${length} bytes, limit is ${maxBytes}`);
    }
    if (length < (options.minBytes ?? 0)) {
      throw new ProtocolError(`${label} is empty`);
    }
    return this.readExact(length);
  }

  async readText(label: string, maxBytes: number, options: ReadFrameOptions = {}): Promise<string> {
    const body = await this.readFrame(label, maxBytes, options);
    return body.toString('utf-8');
  }

  /**
   * Yield exactly `length` bytes as chunks of at most `chunkSize`.
   */
  async *stream(length: number, chunkSize: number): AsyncGenerator<Buffer> {
    if (!Number.isInteger(chunkSize) || chunkSize <= 0) {
      throw new RangeError(`chunkSize must be a positive integer, got ${chunkSize}`);
    }
    let remaining = length;
    while (remaining > 0) {
      const chunk = await this.readAvailable(Math.min(chunkSize, remaining));
      remaining -= chunk.length;
      yield chunk;
    }
  }

  private onData(chunk: Buffer | string): void {
    const buffer = typeof chunk === 'string' ? Buffer.from(chunk, 'utf-8') : chunk;
    this.chunks.push(buffer);
    this.buffered += buffer.length;
    if (this.buffered >= this.highWaterMark) {
      this.source.pause();
    }
    this.wake();
  }

  private onEnd(): void {
    this.ended = true;
    this.wake();
  }

  private onError(err: Error): void {
    this.failure = err;
    this.wake();
  }

  private throwIfClosed(expected: number): void {
    if (this.failure) {
      throw this.failure;
    }
    if (this.ended) {
      throw new ConnectionClosedError(expected, this.buffered);
    }
  }

  private waitForData(): Promise<void> {
    if (this.notify) {
      throw new Error('StreamReader does not support concurrent reads');
    }
    return new Promise((resolve) => {
      this.notify = resolve;
    });
  }

  private wake(): void {
    const notify = this.notify;
    this.notify = null;
    notify?.();
  }

  private take(length: number): Buffer {
    const out = Buffer.allocUnsafe(length);
    let offset = 0;

    while (offset < length) {
      const head = this.chunks[0];
      if (!head) break;
      const needed = length - offset;
      if (head.length <= needed) {
        head.copy(out, offset);
        offset += head.length;
        this.chunks.shift();
      } else {
        head.copy(out, offset, 0, needed);
        this.chunks[0] = head.subarray(needed);
        offset += needed;
      }
    }

    this.buffered -= length;
    if (this.buffered < this.highWaterMark && this.source.isPaused()) {
      this.source.resume();
    }
    return out;
  }
}
