/**
 * TransferWriter Tests
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import * as fs from 'node:fs';
import * as os from 'node:os';
import * as path from 'node:path';
import {
  IoFailedError,
  PartialTransferError,
  ProtocolError,
  type Department,
  type Identity,
} from '@deptdrop/core';
import { TransferWriter, describeIoError, resolveDestination } from '../src/writer/transfer-writer.js';
import { WriteLock } from '../src/writer/write-lock.js';

const mfg1: Identity = { username: 'mfg1', uid: 1001, gid: 1001, department: 'Manufacturing' };
const both1: Identity = { username: 'both1', uid: 1003, gid: 1003, department: 'Manufacturing' };

async function* chunks(...parts: string[]): AsyncGenerator<Buffer> {
  for (const part of parts) {
    await new Promise((resolve) => setImmediate(resolve));
    yield Buffer.from(part);
  }
}

async function* failingAfter(part: string): AsyncGenerator<Buffer> {
  yield Buffer.from(part);
  throw new Error('connection reset');
}

describe('resolveDestination', () => {
  it('should keep only the final path component', () => {
    expect(resolveDestination('/srv/Manufacturing', 'a.txt')).toBe(path.join('/srv/Manufacturing', 'a.txt'));
    expect(resolveDestination('/srv/Manufacturing', '../../etc/passwd')).toBe(
      path.join('/srv/Manufacturing', 'passwd'),
    );
  });

  it('should reject names without a usable final component', () => {
    expect(() => resolveDestination('/srv/Manufacturing', 'dir/')).toThrow(ProtocolError);
    expect(() => resolveDestination('/srv/Manufacturing', '.')).toThrow(ProtocolError);
    expect(() => resolveDestination('/srv/Manufacturing', 'dir/..')).toThrow(
      "Protocol error: invalid filename 'dir/..'",
    );
  });
});

describe('describeIoError', () => {
  it('should describe fs errors without their paths', async () => {
    const error = await fs.promises.open('/nonexistent-deptdrop/secret/a.txt', 'r').catch((err: unknown) => err);

    expect(describeIoError(error)).toBe('no such file or directory (ENOENT)');
  });

  it('should fall back for errors without a system code', () => {
    expect(describeIoError(new Error('/srv/private/path'))).toBe('unexpected I/O error');
  });
});

describe('TransferWriter', () => {
  let tempDir: string;
  let departmentDirs: Record<Department, string>;
  let lock: WriteLock;
  let writer: TransferWriter;

  beforeEach(async () => {
    tempDir = await fs.promises.mkdtemp(path.join(os.tmpdir(), 'deptdrop-writer-'));
    departmentDirs = {
      Manufacturing: path.join(tempDir, 'Manufacturing'),
      Distribution: path.join(tempDir, 'Distribution'),
    };
    await fs.promises.mkdir(departmentDirs.Manufacturing);
    await fs.promises.mkdir(departmentDirs.Distribution);
    lock = new WriteLock();
    writer = new TransferWriter({ departmentDirs, lock });
  });

  afterEach(async () => {
    await fs.promises.rm(tempDir, { recursive: true, force: true });
  });

  function request(identity: Identity, filename: string, declaredLength: number) {
    return { identity, department: identity.department, filename, declaredLength };
  }

  it('should store the payload and its attribution', async () => {
    const result = await writer.write(request(mfg1, 'a.txt', 5), chunks('AB', 'CDE'));

    const destination = path.join(departmentDirs.Manufacturing, 'a.txt');
    expect(result.destination).toBe(destination);
    expect(result.attributionPath).toBe(`${destination}.owner`);
    expect(result.bytesWritten).toBe(5);
    expect(result.attributionWritten).toBe(true);
    expect(await fs.promises.readFile(destination, 'utf-8')).toBe('ABCDE');
    expect(await fs.promises.readFile(`${destination}.owner`, 'utf-8')).toBe('mfg1');
    expect(lock.isLocked).toBe(false);
  });

  it('should create an empty file for a zero-length upload', async () => {
    const result = await writer.write(request(mfg1, 'empty.bin', 0), chunks());

    expect(result.bytesWritten).toBe(0);
    expect(await fs.promises.readFile(result.destination, 'utf-8')).toBe('');
  });

  it('should truncate an existing file', async () => {
    const destination = path.join(departmentDirs.Manufacturing, 'a.txt');
    await fs.promises.writeFile(destination, 'previous contents');

    await writer.write(request(mfg1, 'a.txt', 3), chunks('new'));

    expect(await fs.promises.readFile(destination, 'utf-8')).toBe('new');
  });

  it('should ignore bytes beyond the declared length', async () => {
    const result = await writer.write(request(mfg1, 'a.txt', 5), chunks('ABCDEFG'));

    expect(result.bytesWritten).toBe(5);
    expect(await fs.promises.readFile(result.destination, 'utf-8')).toBe('ABCDE');
  });

  it('should leave a partial file without attribution when the source ends early', async () => {
    const destination = path.join(departmentDirs.Manufacturing, 'a.txt');

    const error = await writer.write(request(mfg1, 'a.txt', 5), chunks('ABC')).catch((err: unknown) => err);

    expect(error).toBeInstanceOf(PartialTransferError);
    expect(error).toHaveProperty('message', 'Transfer incomplete: received 3 of 5 bytes');
    expect(await fs.promises.readFile(destination, 'utf-8')).toBe('ABC');
    expect(fs.existsSync(`${destination}.owner`)).toBe(false);
    expect(lock.isLocked).toBe(false);
  });

  it('should report a failing source as a partial transfer', async () => {
    await expect(writer.write(request(mfg1, 'a.txt', 5), failingAfter('AB'))).rejects.toThrow(
      'Transfer incomplete: received 2 of 5 bytes',
    );
  });

  it('should fail with IoFailedError when the file cannot be created', async () => {
    const missing = new TransferWriter({
      departmentDirs: { ...departmentDirs, Manufacturing: path.join(tempDir, 'missing') },
      lock,
    });

    const error = await missing.write(request(mfg1, 'a.txt', 1), chunks('A')).catch((err: unknown) => err);

    expect(error).toBeInstanceOf(IoFailedError);
    expect(error).toHaveProperty('message', 'Error: Cannot create file: no such file or directory (ENOENT)');
    expect(lock.isLocked).toBe(false);
  });

  it('should not touch the destination when onLocked throws', async () => {
    await expect(
      writer.write(request(mfg1, 'a.txt', 1), chunks('A'), {
        onLocked: () => { throw new Error('peer gone'); },
      }),
    ).rejects.toThrow('peer gone');

    expect(fs.existsSync(path.join(departmentDirs.Manufacturing, 'a.txt'))).toBe(false);
    expect(lock.isLocked).toBe(false);
  });

  it('should call onOpened under the lock after creating the file', async () => {
    const seen: Array<{ destination: string; exists: boolean; locked: boolean }> = [];

    await writer.write(request(mfg1, 'a.txt', 1), chunks('A'), {
      onOpened: (destination) => {
        seen.push({ destination, exists: fs.existsSync(destination), locked: lock.isLocked });
      },
    });

    expect(seen).toEqual([
      { destination: path.join(departmentDirs.Manufacturing, 'a.txt'), exists: true, locked: true },
    ]);
  });

  it('should serialize writers to the same name', async () => {
    const first = writer.write(request(mfg1, 'shared.txt', 6), chunks('AAA', 'AAA'));
    const second = writer.write(request(both1, 'shared.txt', 6), chunks('BB', 'BB', 'BB'));
    expect(lock.pending).toBe(1);

    await Promise.all([first, second]);

    const destination = path.join(departmentDirs.Manufacturing, 'shared.txt');
    expect(await fs.promises.readFile(destination, 'utf-8')).toBe('BBBBBB');
    expect(await fs.promises.readFile(`${destination}.owner`, 'utf-8')).toBe('both1');
  });
});
