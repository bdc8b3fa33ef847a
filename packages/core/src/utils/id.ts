/**
 * ID Generation Utilities
 */

import { randomBytes } from 'node:crypto';

/**
 * Generate a prefixed random hex ID.
 *
 * @example
 * generateId('sess') // "sess_a1b2c3d4e5f6"
 * generateId('up', 8) // "up_a1b2c3d4"
 */
export function generateId(prefix: string, hexChars: number = 12): string {
  const id = randomBytes(Math.ceil(hexChars / 2)).toString('hex').slice(0, hexChars);
  return prefix ? `${prefix}_${id}` : id;
}

/**
 * Generate an ID for one accepted connection, used to correlate log lines.
 */
export function generateSessionId(): string {
  return generateId('sess');
}
