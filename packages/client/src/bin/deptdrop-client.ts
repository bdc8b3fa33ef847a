#!/usr/bin/env node
/**
 * deptdrop-client CLI
 *
 * Usage: deptdrop-client [--host 127.0.0.1] [--port 8080] [--env .env]
 */

import { isDeptdropError } from '@deptdrop/core';
import { loadClientConfig, type ClientConfig } from '../config.js';
import { TransferClient } from '../transfer-client.js';
import { createPrompter } from '../prompts.js';
import { runInteractiveUpload } from '../interactive.js';

interface CliArgs {
  host?: string;
  port?: number;
  envFile?: string;
}

function parseArgs(args: string[]): CliArgs {
  const parsed: CliArgs = {};

  for (let i = 0; i < args.length; i++) {
    const value = args[i + 1];
    if (args[i] === '--host' && value) {
      parsed.host = value;
      i++;
    } else if (args[i] === '--port' && value) {
      parsed.port = parseInt(value, 10);
      i++;
    } else if (args[i] === '--env' && value) {
      parsed.envFile = value;
      i++;
    }
  }

  return parsed;
}

async function main(): Promise<number> {
  const args = parseArgs(process.argv.slice(2));
  if (args.port !== undefined && Number.isNaN(args.port)) {
    console.error('Usage: deptdrop-client [--host 127.0.0.1] [--port 8080] [--env <file>]');
    return 1;
  }

  const fromEnv = loadClientConfig(args.envFile);
  const config: ClientConfig = {
    ...fromEnv,
    host: args.host ?? fromEnv.host,
    port: args.port ?? fromEnv.port,
    onProgress: ({ percent }) => {
      process.stdout.write(`\rTransferring: ${percent.toFixed(2)}% complete`);
    },
  };

  const prompter = createPrompter();
  const client = new TransferClient(config);
  try {
    const result = await runInteractiveUpload(client, prompter);
    process.stdout.write('\n');
    console.log(`Server response: ${result.message}`);
    console.log('File transfer completed successfully.');
    return 0;
  } catch (error) {
    process.stdout.write('\n');
    if (isDeptdropError(error)) {
      console.log(error.message);
      if (error.hint) console.log(`Hint: ${error.hint}`);
    } else {
      console.error(error);
    }
    console.log('File transfer failed.');
    return 1;
  } finally {
    prompter.close();
    await client.close();
  }
}

main().then(
  (code) => process.exit(code),
  (err: unknown) => {
    console.error('[Deptdrop:Client] Fatal:', err);
    process.exit(1);
  },
);
