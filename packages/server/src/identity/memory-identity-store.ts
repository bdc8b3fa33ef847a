import type { HostAccount, HostGroup } from '@deptdrop/core';
import { isGroupMember, type IdentityStore } from './types.js';

export interface MemoryIdentityStoreData {
  accounts?: HostAccount[];
  groups?: HostGroup[];
}

/**
 * Identity store backed by in-process maps. Useful for tests and for
 * deployments that keep their own account list.
 */
export class MemoryIdentityStore implements IdentityStore {
  private accounts = new Map<string, HostAccount>();
  private groups = new Map<string, HostGroup>();

  constructor(data: MemoryIdentityStoreData = {}) {
    for (const account of data.accounts ?? []) this.addAccount(account);
    for (const group of data.groups ?? []) this.addGroup(group);
  }

  addAccount(account: HostAccount): void {
    this.accounts.set(account.username, account);
  }

  addGroup(group: HostGroup): void {
    this.groups.set(group.name, group);
  }

  async lookupUser(username: string): Promise<HostAccount | undefined> {
    return this.accounts.get(username);
  }

  async lookupGroup(name: string): Promise<HostGroup | undefined> {
    return this.groups.get(name);
  }

  async isMemberOfGroup(username: string, groupName: string): Promise<boolean> {
    return isGroupMember(username, this.accounts.get(username), this.groups.get(groupName));
  }
}
