import type { Department } from '@deptdrop/core';
import type { ClientConfig } from './config.js';
import { TransferClient, type Credentials, type TransferResult } from './transfer-client.js';

export interface UploadOptions {
  filePath: string;
  department: Department;
  credentials: Credentials;
  config?: ClientConfig;
}

/**
 * Connect, authenticate, upload one file and disconnect.
 */
export async function uploadFile(options: UploadOptions): Promise<TransferResult> {
  const client = new TransferClient(options.config);
  await client.connect();
  try {
    await client.authenticate(options.credentials);
    return await client.transfer(options.filePath, options.department);
  } finally {
    await client.close();
  }
}
