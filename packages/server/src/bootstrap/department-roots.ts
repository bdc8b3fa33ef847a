/**
 * Department directory bootstrap
 *
 * Creates missing department roots and hands each to its department group.
 * Production deployments normally provision these externally; the server only
 * runs this when `ensureDirectories` is set.
 */

import { chown, mkdir } from 'node:fs/promises';
import { DEPARTMENTS, type Department } from '@deptdrop/core';
import type { IdentityStore } from '../identity/types.js';

export interface DepartmentRootStatus {
  department: Department;
  path: string;
  /** gid applied to the directory, when the group exists and chown succeeded */
  groupId?: number;
}

export async function ensureDepartmentRoots(
  departmentDirs: Record<Department, string>,
  identityStore: IdentityStore,
): Promise<DepartmentRootStatus[]> {
  const statuses: DepartmentRootStatus[] = [];

  for (const department of DEPARTMENTS) {
    const path = departmentDirs[department];
    await mkdir(path, { recursive: true, mode: 0o770 });

    const status: DepartmentRootStatus = { department, path };
    const group = await identityStore.lookupGroup(department);
    if (!group) {
      console.warn(`[Deptdrop:Bootstrap] ${department} group not found, ${path} keeps its current group`);
    } else {
      try {
        await chown(path, -1, group.gid);
        status.groupId = group.gid;
      } catch (error) {
        console.warn(`[Deptdrop:Bootstrap] Could not assign ${path} to group ${department} (gid ${group.gid}):`, error);
      }
    }

    statuses.push(status);
  }

  return statuses;
}
