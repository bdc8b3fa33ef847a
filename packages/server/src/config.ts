/**
 * deptdrop Server Configuration
 */

import { existsSync } from 'node:fs';
import { join, resolve } from 'node:path';
import { config as loadDotenv } from 'dotenv';
import { z } from 'zod';
import type { Department, Identity } from '@deptdrop/core';
import type { SessionOutcome } from './session/transfer-session.js';

// ========== Hooks ==========

export interface ServerHooks {
  onSessionStarted?: (sessionId: string, remote: string) => void;
  onAuthenticated?: (sessionId: string, identity: Identity) => void;
  onSessionCompleted?: (outcome: SessionOutcome) => void;
  onError?: (sessionId: string, error: Error) => void;
}

// ========== Config ==========

export interface ServerConfig {
  host?: string;
  port?: number;
  /** Pending-connection queue length passed to listen() */
  backlog?: number;
  /** Parent of the per-department directories */
  storageRoot?: string;
  /** Per-department overrides of `<storageRoot>/<Department>` */
  departmentDirs?: Partial<Record<Department, string>>;
  /** Upper bound of each socket read and file write during streaming */
  chunkSize?: number;
  /** Close a connection idle for this long; 0 waits forever */
  idleTimeoutMs?: number;
  /** Create missing department directories at startup */
  ensureDirectories?: boolean;
  /** Log every received chunk */
  verbose?: boolean;
  hooks?: ServerHooks;
}

// ========== Defaults ==========

export const DEFAULT_SERVER_CONFIG = {
  host: '0.0.0.0',
  port: 8080,
  backlog: 10,
  storageRoot: '/tmp/fileserver',
  chunkSize: 1024,
  idleTimeoutMs: 30_000,
  ensureDirectories: false,
  verbose: false,
} as const;

// ========== Resolved ==========

export interface ResolvedServerConfig {
  host: string;
  port: number;
  backlog: number;
  storageRoot: string;
  departmentDirs: Record<Department, string>;
  chunkSize: number;
  idleTimeoutMs: number;
  ensureDirectories: boolean;
  verbose: boolean;
  hooks: ServerHooks;
}

export function resolveServerConfig(config: ServerConfig = {}): ResolvedServerConfig {
  const storageRoot = config.storageRoot ?? DEFAULT_SERVER_CONFIG.storageRoot;
  const chunkSize = config.chunkSize ?? DEFAULT_SERVER_CONFIG.chunkSize;
  if (!Number.isInteger(chunkSize) || chunkSize <= 0) {
    throw new Error(`Invalid server config: chunkSize must be a positive integer, got ${chunkSize}`);
  }

  return {
    host: config.host ?? DEFAULT_SERVER_CONFIG.host,
    port: config.port ?? DEFAULT_SERVER_CONFIG.port,
    backlog: config.backlog ?? DEFAULT_SERVER_CONFIG.backlog,
    storageRoot,
    departmentDirs: {
      Manufacturing: config.departmentDirs?.Manufacturing ?? join(storageRoot, 'Manufacturing'),
      Distribution: config.departmentDirs?.Distribution ?? join(storageRoot, 'Distribution'),
    },
    chunkSize,
    idleTimeoutMs: config.idleTimeoutMs ?? DEFAULT_SERVER_CONFIG.idleTimeoutMs,
    ensureDirectories: config.ensureDirectories ?? DEFAULT_SERVER_CONFIG.ensureDirectories,
    verbose: config.verbose ?? DEFAULT_SERVER_CONFIG.verbose,
    hooks: config.hooks ?? {},
  };
}

// ========== Environment ==========

const booleanFlag = z
  .enum(['true', 'false', '1', '0', 'yes', 'no'])
  .transform((value) => value === 'true' || value === '1' || value === 'yes');

const serverEnvSchema = z.object({
  DEPTDROP_HOST: z.string().min(1).optional(),
  DEPTDROP_PORT: z.coerce.number().int().min(0).max(65535).optional(),
  DEPTDROP_BACKLOG: z.coerce.number().int().positive().optional(),
  DEPTDROP_STORAGE_ROOT: z.string().min(1).optional(),
  DEPTDROP_MANUFACTURING_DIR: z.string().min(1).optional(),
  DEPTDROP_DISTRIBUTION_DIR: z.string().min(1).optional(),
  DEPTDROP_CHUNK_SIZE: z.coerce.number().int().positive().optional(),
  DEPTDROP_IDLE_TIMEOUT_MS: z.coerce.number().int().nonnegative().optional(),
  DEPTDROP_ENSURE_DIRECTORIES: booleanFlag.optional(),
  DEPTDROP_VERBOSE: booleanFlag.optional(),
});

/**
 * Build a server config from `DEPTDROP_*` environment variables.
 * Unset variables fall through to the defaults in {@link resolveServerConfig}.
 */
export function serverConfigFromEnv(env: NodeJS.ProcessEnv = process.env): ServerConfig {
  const result = serverEnvSchema.safeParse(env);
  if (!result.success) {
    const issue = result.error.issues[0];
    throw new Error(
      `Invalid server environment: ${issue?.path.join('.') ?? 'unknown'}: ${issue?.message ?? 'invalid'}`,
    );
  }

  const parsed = result.data;
  const departmentDirs: Partial<Record<Department, string>> = {};
  if (parsed.DEPTDROP_MANUFACTURING_DIR) departmentDirs.Manufacturing = parsed.DEPTDROP_MANUFACTURING_DIR;
  if (parsed.DEPTDROP_DISTRIBUTION_DIR) departmentDirs.Distribution = parsed.DEPTDROP_DISTRIBUTION_DIR;

  return {
    host: parsed.DEPTDROP_HOST,
    port: parsed.DEPTDROP_PORT,
    backlog: parsed.DEPTDROP_BACKLOG,
    storageRoot: parsed.DEPTDROP_STORAGE_ROOT,
    departmentDirs,
    chunkSize: parsed.DEPTDROP_CHUNK_SIZE,
    idleTimeoutMs: parsed.DEPTDROP_IDLE_TIMEOUT_MS,
    ensureDirectories: parsed.DEPTDROP_ENSURE_DIRECTORIES,
    verbose: parsed.DEPTDROP_VERBOSE,
  };
}

/**
 * Load `.env` (when present) into process.env, then read the server config.
 */
export function loadServerConfig(envFile?: string): ServerConfig {
  const envPath = resolve(envFile ?? '.env');
  if (existsSync(envPath)) {
    loadDotenv({ path: envPath });
    console.log(`[Deptdrop:Config] Loaded ${envPath}`);
  }
  return serverConfigFromEnv(process.env);
}
