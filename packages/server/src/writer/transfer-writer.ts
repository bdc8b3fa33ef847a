/**
 * Transfer Writer
 *
 * Stores one inbound byte stream under a department root and records who
 * uploaded it. Create, copy, chown and attribution run as one critical
 * section under the write lock, so an `.owner` file only appears once its data
 * file is complete.
 */

import { chown, open, writeFile, type FileHandle } from 'node:fs/promises';
import { join } from 'node:path';
import { getSystemErrorMap } from 'node:util';
import {
  IoFailedError,
  PartialTransferError,
  ProtocolError,
  type Department,
  type Identity,
} from '@deptdrop/core';
import { sharedWriteLock, type WriteLock } from './write-lock.js';

export const ATTRIBUTION_SUFFIX = '.owner';

export interface TransferWriterConfig {
  departmentDirs: Record<Department, string>;
  lock?: WriteLock;
  verbose?: boolean;
}

export interface TransferWriteRequest {
  identity: Identity;
  department: Department;
  filename: string;
  declaredLength: number;
}

export interface TransferWriteOptions {
  /** Called once the lock is held, before the destination is touched; throwing aborts the write */
  onLocked?: () => void;
  /** Called under the lock once the destination is open, before any byte is read */
  onOpened?: (destination: string) => Promise<void> | void;
}

export interface TransferWriteResult {
  destination: string;
  attributionPath: string;
  bytesWritten: number;
  ownershipApplied: boolean;
  attributionWritten: boolean;
}

/**
 * Keep only the final path component, so the destination is always a direct
 * child of the department root.
 */
export function resolveDestination(root: string, filename: string): string {
  const name = filename.slice(filename.lastIndexOf('/') + 1);
  if (name.length === 0 || name === '.' || name === '..') {
    throw new ProtocolError(`invalid filename '${filename}'`);
  }
  return join(root, name);
}

export class TransferWriter {
  private departmentDirs: Record<Department, string>;
  private lock: WriteLock;
  private verbose: boolean;

  constructor(config: TransferWriterConfig) {
    this.departmentDirs = config.departmentDirs;
    this.lock = config.lock ?? sharedWriteLock;
    this.verbose = config.verbose ?? false;
  }

  async write(
    request: TransferWriteRequest,
    source: AsyncIterable<Buffer>,
    options: TransferWriteOptions = {},
  ): Promise<TransferWriteResult> {
    const destination = resolveDestination(this.departmentDirs[request.department], request.filename);
    const attributionPath = `${destination}${ATTRIBUTION_SUFFIX}`;

    const release = await this.lock.acquire();
    try {
      options.onLocked?.();
      const handle = await this.create(destination);
      let bytesWritten: number;
      try {
        await options.onOpened?.(destination);
        bytesWritten = await this.copy(handle, source, request.declaredLength, destination);
      } finally {
        await handle.close().catch((err: unknown) => {
          console.warn(`[Deptdrop:Writer] Close failed for ${destination}:`, err);
        });
      }

      const ownershipApplied = await this.applyOwnership(destination, request.identity);
      const attributionWritten = await this.writeAttribution(attributionPath, request.identity.username);

      return { destination, attributionPath, bytesWritten, ownershipApplied, attributionWritten };
    } finally {
      release();
    }
  }

  private async create(destination: string): Promise<FileHandle> {
    try {
      return await open(destination, 'w');
    } catch (error) {
      throw new IoFailedError(`Error: Cannot create file: ${describeIoError(error)}`);
    }
  }

  private async copy(
    handle: FileHandle,
    source: AsyncIterable<Buffer>,
    declaredLength: number,
    destination: string,
  ): Promise<number> {
    let written = 0;

    try {
      for await (const chunk of source) {
        const remaining = declaredLength - written;
        const piece = chunk.length > remaining ? chunk.subarray(0, remaining) : chunk;
        await this.writeFully(handle, piece);
        written += piece.length;

        if (this.verbose) {
          console.log(`[Deptdrop:Writer] ${destination}: +${piece.length} bytes, ${declaredLength - written} remaining`);
        }
        if (written >= declaredLength) break;
      }
    } catch (error) {
      if (error instanceof IoFailedError) throw error;
      console.warn(`[Deptdrop:Writer] Source failed after ${written} bytes: ${errorMessage(error)}`);
      throw new PartialTransferError(written, declaredLength);
    }

    if (written < declaredLength) {
      throw new PartialTransferError(written, declaredLength);
    }
    return written;
  }

  private async writeFully(handle: FileHandle, data: Buffer): Promise<void> {
    let offset = 0;
    try {
      while (offset < data.length) {
        const { bytesWritten } = await handle.write(data, offset, data.length - offset);
        offset += bytesWritten;
      }
    } catch (error) {
      throw new IoFailedError(`Error: Cannot write file: ${describeIoError(error)}`);
    }
  }

  /**
   * Hand the file to the uploader's uid; group stays as created. Advisory only.
   */
  private async applyOwnership(destination: string, identity: Identity): Promise<boolean> {
    try {
      await chown(destination, identity.uid, -1);
      return true;
    } catch (error) {
      console.warn(
        `[Deptdrop:Writer] Could not set owner of ${destination} to ${identity.username} (uid ${identity.uid}): ${errorMessage(error)}`,
      );
      return false;
    }
  }

  private async writeAttribution(attributionPath: string, username: string): Promise<boolean> {
    try {
      await writeFile(attributionPath, username);
      return true;
    } catch (error) {
      if (this.verbose) {
        console.log(`[Deptdrop:Writer] Attribution skipped for ${attributionPath}: ${errorMessage(error)}`);
      }
      return false;
    }
  }
}

/**
 * System error text without the paths Node puts into fs error messages,
 * e.g. "no such file or directory (ENOENT)". Sent to the peer.
 */
export function describeIoError(error: unknown): string {
  if (error instanceof Error && 'errno' in error && typeof error.errno === 'number') {
    const entry = getSystemErrorMap().get(error.errno);
    if (entry) return `${entry[1]} (${entry[0]})`;
  }
  if (error instanceof Error && 'code' in error && typeof error.code === 'string') {
    return error.code;
  }
  return 'unexpected I/O error';
}

function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
