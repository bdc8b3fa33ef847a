/**
 * Interactive prompts for the upload client
 */

import { createInterface, type Interface } from 'node:readline/promises';
import { DEPARTMENTS, type Department } from '@deptdrop/core';
import type { Credentials } from './transfer-client.js';

/**
 * Anything that can ask a question and return the answered line.
 */
export interface Prompter {
  question(query: string): Promise<string>;
}

export function createPrompter(
  input: NodeJS.ReadableStream = process.stdin,
  output: NodeJS.WritableStream = process.stdout,
): Interface {
  return createInterface({ input, output });
}

export async function promptCredentials(prompter: Prompter): Promise<Credentials> {
  const username = await prompter.question('Username: ');
  const password = await prompter.question('Password: ');
  return { username: username.trim(), password };
}

export async function promptFilePath(prompter: Prompter): Promise<string> {
  return (await prompter.question('Enter the file path to transfer: ')).trim();
}

export const DEPARTMENT_MENU =
  '\nSelect destination department:\n' +
  DEPARTMENTS.map((department, index) => `${index + 1}. ${department}\n`).join('') +
  'Choice: ';

/**
 * Ask until the answer is one of the listed numbers.
 */
export async function promptDepartment(
  prompter: Prompter,
  log: (line: string) => void = console.log,
): Promise<Department> {
  for (;;) {
    const answer = (await prompter.question(DEPARTMENT_MENU)).trim();
    const department = /^\d+$/.test(answer) ? DEPARTMENTS[Number(answer) - 1] : undefined;
    if (department) return department;
    log('Invalid choice. Please try again.');
  }
}
