/**
 * deptdrop Client Configuration
 */

import { existsSync } from 'node:fs';
import { resolve } from 'node:path';
import { config as loadDotenv } from 'dotenv';
import { z } from 'zod';

export interface TransferProgress {
  bytesSent: number;
  totalBytes: number;
  /** 0-100 */
  percent: number;
}

export interface ClientConfig {
  host?: string;
  port?: number;
  /** Bytes read from the local file per write */
  chunkSize?: number;
  connectTimeoutMs?: number;
  /** How long to wait for each server response */
  responseTimeoutMs?: number;
  /**
   * How long to wait for the server to accept the file. The server holds it
   * back while other uploads own the write lock; 0 waits forever.
   */
  readyTimeoutMs?: number;
  onProgress?: (progress: TransferProgress) => void;
}

export const DEFAULT_CLIENT_CONFIG = {
  host: '127.0.0.1',
  port: 8080,
  chunkSize: 1024,
  connectTimeoutMs: 10_000,
  responseTimeoutMs: 30_000,
  readyTimeoutMs: 0,
} as const;

export interface ResolvedClientConfig {
  host: string;
  port: number;
  chunkSize: number;
  connectTimeoutMs: number;
  responseTimeoutMs: number;
  readyTimeoutMs: number;
  onProgress?: (progress: TransferProgress) => void;
}

export function resolveClientConfig(config: ClientConfig = {}): ResolvedClientConfig {
  const chunkSize = config.chunkSize ?? DEFAULT_CLIENT_CONFIG.chunkSize;
  if (!Number.isInteger(chunkSize) || chunkSize <= 0) {
    throw new Error(`Invalid client config: chunkSize must be a positive integer, got ${chunkSize}`);
  }

  return {
    host: config.host ?? DEFAULT_CLIENT_CONFIG.host,
    port: config.port ?? DEFAULT_CLIENT_CONFIG.port,
    chunkSize,
    connectTimeoutMs: config.connectTimeoutMs ?? DEFAULT_CLIENT_CONFIG.connectTimeoutMs,
    responseTimeoutMs: config.responseTimeoutMs ?? DEFAULT_CLIENT_CONFIG.responseTimeoutMs,
    readyTimeoutMs: config.readyTimeoutMs ?? DEFAULT_CLIENT_CONFIG.readyTimeoutMs,
    onProgress: config.onProgress,
  };
}

const clientEnvSchema = z.object({
  DEPTDROP_SERVER_HOST: z.string().min(1).optional(),
  DEPTDROP_SERVER_PORT: z.coerce.number().int().min(1).max(65535).optional(),
  DEPTDROP_CHUNK_SIZE: z.coerce.number().int().positive().optional(),
  DEPTDROP_CONNECT_TIMEOUT_MS: z.coerce.number().int().positive().optional(),
  DEPTDROP_RESPONSE_TIMEOUT_MS: z.coerce.number().int().positive().optional(),
  DEPTDROP_READY_TIMEOUT_MS: z.coerce.number().int().nonnegative().optional(),
});

export function clientConfigFromEnv(env: NodeJS.ProcessEnv = process.env): ClientConfig {
  const result = clientEnvSchema.safeParse(env);
  if (!result.success) {
    const issue = result.error.issues[0];
    throw new Error(
      `Invalid client environment: ${issue?.path.join('.') ?? 'unknown'}: ${issue?.message ?? 'invalid'}`,
    );
  }

  const parsed = result.data;
  return {
    host: parsed.DEPTDROP_SERVER_HOST,
    port: parsed.DEPTDROP_SERVER_PORT,
    chunkSize: parsed.DEPTDROP_CHUNK_SIZE,
    connectTimeoutMs: parsed.DEPTDROP_CONNECT_TIMEOUT_MS,
    responseTimeoutMs: parsed.DEPTDROP_RESPONSE_TIMEOUT_MS,
    readyTimeoutMs: parsed.DEPTDROP_READY_TIMEOUT_MS,
  };
}

export function loadClientConfig(envFile?: string): ClientConfig {
  const envPath = resolve(envFile ?? '.env');
  if (existsSync(envPath)) {
    loadDotenv({ path: envPath });
  }
  return clientConfigFromEnv(process.env);
}
