import type { HostAccount, HostGroup } from '@deptdrop/core';

/**
 * Read-only view of the host account and group databases.
 */
export interface IdentityStore {
  lookupUser(username: string): Promise<HostAccount | undefined>;
  lookupGroup(name: string): Promise<HostGroup | undefined>;
  isMemberOfGroup(username: string, groupName: string): Promise<boolean>;
}

/**
 * A user belongs to a group when listed as an explicit member or when the
 * group is the user's primary group.
 */
export function isGroupMember(
  username: string,
  account: HostAccount | undefined,
  group: HostGroup | undefined,
): boolean {
  if (!group) return false;
  if (group.members.includes(username)) return true;
  return account !== undefined && account.gid === group.gid;
}
