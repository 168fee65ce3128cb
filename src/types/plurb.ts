import type { PlurbStatus, StatusRecord } from './status.js';

export interface Task {
  name: string;
  body: string;
}

/**
 * One isolated unit of work: a worktree, its branch, and its status record.
 * Derived from the filesystem on every call, never stored.
 */
export interface Plurb {
  id: string;
  taskName: string;
  branch: string;
  path: string;
  /** Null for degraded plurbs. */
  record: StatusRecord | null;
  status: PlurbStatus;
  /** Why the record could not be loaded. Only set on degraded plurbs. */
  problem?: string;
}
