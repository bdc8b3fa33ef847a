import type { Department } from './department.js';

/** Entry from the host account database */
export interface HostAccount {
  username: string;
  uid: number;
  /** Primary group id */
  gid: number;
}

/** Entry from the host group database */
export interface HostGroup {
  name: string;
  gid: number;
  /** Explicitly listed members (does not include primary-group users) */
  members: string[];
}

/**
 * Authenticated uploader, established once per session.
 */
export interface Identity {
  username: string;
  uid: number;
  gid: number;
  department: Department;
}

export interface TransferRequest {
  department: Department;
  /** As sent by the client; may contain path separators */
  filename: string;
  declaredLength: number;
}
