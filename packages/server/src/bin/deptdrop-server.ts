#!/usr/bin/env node
/**
 * deptdrop-server CLI
 *
 * Usage: deptdrop-server [--port 8080] [--host 0.0.0.0] [--root /tmp/fileserver] [--env .env]
 */

import { loadServerConfig, type ServerConfig } from '../config.js';
import { HostIdentityStore } from '../identity/host-identity-store.js';
import { ensureDepartmentRoots } from '../bootstrap/department-roots.js';
import { TransferServer } from '../dispatcher/transfer-server.js';

interface CliArgs {
  port?: number;
  host?: string;
  storageRoot?: string;
  envFile?: string;
}

function parseArgs(args: string[]): CliArgs {
  const parsed: CliArgs = {};

  for (let i = 0; i < args.length; i++) {
    const value = args[i + 1];
    if (args[i] === '--port' && value) {
      parsed.port = parseInt(value, 10);
      i++;
    } else if (args[i] === '--host' && value) {
      parsed.host = value;
      i++;
    } else if (args[i] === '--root' && value) {
      parsed.storageRoot = value;
      i++;
    } else if (args[i] === '--env' && value) {
      parsed.envFile = value;
      i++;
    }
  }

  return parsed;
}

async function main(): Promise<void> {
  const args = parseArgs(process.argv.slice(2));
  if (args.port !== undefined && Number.isNaN(args.port)) {
    console.error('Usage: deptdrop-server [--port 8080] [--host 0.0.0.0] [--root <dir>] [--env <file>]');
    process.exit(1);
  }

  const fromEnv = loadServerConfig(args.envFile);
  const config: ServerConfig = {
    ...fromEnv,
    port: args.port ?? fromEnv.port,
    host: args.host ?? fromEnv.host,
    storageRoot: args.storageRoot ?? fromEnv.storageRoot,
  };

  const identityStore = new HostIdentityStore();
  const server = new TransferServer({ config, identityStore });

  const { ensureDirectories, departmentDirs } = server.resolvedConfig;
  if (ensureDirectories) {
    await ensureDepartmentRoots(departmentDirs, identityStore);
  }

  await server.start();

  const shutdown = async (): Promise<void> => {
    console.log('\n[Deptdrop:Server] Shutting down...');
    await server.stop();
    process.exit(0);
  };

  process.on('SIGINT', () => {
    shutdown().catch((err: unknown) => {
      console.error('[Deptdrop:Server] Shutdown failed:', err);
      process.exit(1);
    });
  });
  process.on('SIGTERM', () => {
    shutdown().catch((err: unknown) => {
      console.error('[Deptdrop:Server] Shutdown failed:', err);
      process.exit(1);
    });
  });

  console.log('[Deptdrop:Server] Waiting for connections...');
}

main().catch((err: unknown) => {
  console.error('[Deptdrop:Server] Fatal:', err);
  process.exit(1);
});
