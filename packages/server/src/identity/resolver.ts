/**
 * Identity Resolver
 *
 * Maps a username to an Identity pinned to exactly one department.
 */

import {
  AuthFailedError,
  DEFAULT_DEPARTMENT,
  DEPARTMENTS,
  type Department,
  type Identity,
} from '@deptdrop/core';
import type { IdentityStore } from './types.js';

export type ResolveResult =
  | { status: 'resolved'; identity: Identity }
  | { status: 'not_found' }
  | { status: 'not_authorized' };

export const AUTH_FAILURE_MESSAGES = {
  not_found: 'Authentication failed: User not found',
  not_authorized: 'Authentication failed: User not in required groups',
  lookup_failed: 'Authentication failed: Identity lookup unavailable',
} as const;

/**
 * Choose the department for an account in one or more department groups.
 * Manufacturing takes precedence when both apply.
 */
export function pickDepartment(memberOf: readonly Department[]): Department | undefined {
  if (memberOf.includes(DEFAULT_DEPARTMENT)) return DEFAULT_DEPARTMENT;
  return memberOf[0];
}

export class IdentityResolver {
  constructor(private store: IdentityStore) {}

  async resolve(username: string): Promise<ResolveResult> {
    const account = await this.store.lookupUser(username);
    if (!account) {
      return { status: 'not_found' };
    }

    const memberOf: Department[] = [];
    for (const department of DEPARTMENTS) {
      if (await this.store.isMemberOfGroup(username, department)) {
        memberOf.push(department);
      }
    }

    const department = pickDepartment(memberOf);
    if (!department) {
      return { status: 'not_authorized' };
    }

    return {
      status: 'resolved',
      identity: {
        username: account.username,
        uid: account.uid,
        gid: account.gid,
        department,
      },
    };
  }

  /**
   * Resolve or throw the AuthFailedError reported to the peer.
   */
  async authenticate(username: string): Promise<Identity> {
    let result: ResolveResult;
    try {
      result = await this.resolve(username);
    } catch (error) {
      console.error('[Deptdrop:Identity] Lookup failed:', error);
      throw new AuthFailedError(AUTH_FAILURE_MESSAGES.lookup_failed);
    }

    if (result.status !== 'resolved') {
      throw new AuthFailedError(AUTH_FAILURE_MESSAGES[result.status]);
    }
    return result.identity;
  }
}
