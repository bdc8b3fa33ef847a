/**
 * Host Identity Store
 *
 * Looks accounts and groups up through `getent`, so every configured
 * name-service source (files, LDAP, sssd) is consulted.
 */

import { spawn } from 'node:child_process';
import type { HostAccount, HostGroup } from '@deptdrop/core';
import { isGroupMember, type IdentityStore } from './types.js';

export interface HostIdentityStoreConfig {
  /** Lookup command (default: getent) */
  command?: string;
}

/** getent exit status for "key not found" */
const NOT_FOUND_EXIT_CODE = 2;

/**
 * Parse one `passwd` line: name:password:uid:gid:gecos:home:shell
 */
export function parsePasswdEntry(line: string): HostAccount | undefined {
  const fields = line.trim().split(':');
  if (fields.length < 4) return undefined;

  const [username, , uid, gid] = fields;
  if (!username || !isNumericId(uid) || !isNumericId(gid)) return undefined;

  return { username, uid: Number(uid), gid: Number(gid) };
}

/**
 * Parse one `group` line: name:password:gid:member1,member2
 */
export function parseGroupEntry(line: string): HostGroup | undefined {
  const fields = line.trim().split(':');
  if (fields.length < 3) return undefined;

  const [name, , gid, memberList = ''] = fields;
  if (!name || !isNumericId(gid)) return undefined;

  return {
    name,
    gid: Number(gid),
    members: memberList.split(',').filter((member) => member.length > 0),
  };
}

function isNumericId(value: string | undefined): value is string {
  return value !== undefined && /^\d+$/.test(value);
}

/**
 * Names that getent would misread as options or that cannot occur in the
 * colon-separated databases.
 */
function isQueryableName(name: string): boolean {
  return name.length > 0 && !name.startsWith('-') && !/[:\s\0]/.test(name);
}

export class HostIdentityStore implements IdentityStore {
  private command: string;

  constructor(config: HostIdentityStoreConfig = {}) {
    this.command = config.command ?? 'getent';
  }

  async lookupUser(username: string): Promise<HostAccount | undefined> {
    if (!isQueryableName(username)) return undefined;

    const output = await this.query('passwd', username);
    const account = output === null ? undefined : parsePasswdEntry(firstLine(output));
    // getent also matches numeric keys against uid
    return account?.username === username ? account : undefined;
  }

  async lookupGroup(name: string): Promise<HostGroup | undefined> {
    if (!isQueryableName(name)) return undefined;

    const output = await this.query('group', name);
    const group = output === null ? undefined : parseGroupEntry(firstLine(output));
    return group?.name === name ? group : undefined;
  }

  async isMemberOfGroup(username: string, groupName: string): Promise<boolean> {
    const group = await this.lookupGroup(groupName);
    if (!group) return false;
    if (group.members.includes(username)) return true;
    return isGroupMember(username, await this.lookupUser(username), group);
  }

  private query(database: 'passwd' | 'group', key: string): Promise<string | null> {
    return new Promise((resolve, reject) => {
      const proc = spawn(this.command, [database, key]);

      let stdout = '';
      let stderr = '';

      proc.stdout.on('data', (data: Buffer) => { stdout += data.toString(); });
      proc.stderr.on('data', (data: Buffer) => { stderr += data.toString(); });

      proc.on('close', (code) => {
        if (code === 0) {
          resolve(stdout);
        } else if (code === NOT_FOUND_EXIT_CODE) {
          resolve(null);
        } else {
          reject(new Error(`${this.command} ${database} failed (exit ${code}): ${stderr.trim() || stdout.trim()}`));
        }
      });

      proc.on('error', reject);
    });
  }
}

function firstLine(output: string): string {
  return output.split('\n')[0] ?? '';
}
