import fs from 'node:fs/promises';
import { branchName, plurbPath, worktreesDir } from '../lib/paths.js';
import { compareIds, slugFromPlurbId } from '../lib/id.js';
import { readStatus, type ReadStatusOptions } from './status.js';
import { taskForSlug } from './tasks.js';
import type { Plurb, Task } from '../types/plurb.js';
import type { StatusRecord } from '../types/status.js';

export interface ListPlurbsOptions {
  /** Catalog used to recover task names for records that lack one. */
  tasks?: Task[];
  read?: ReadStatusOptions;
}

/** Plurb ids present on disk, sorted. */
export async function listPlurbIds(workspaceRoot: string): Promise<string[]> {
  let entries;
  try {
    entries = await fs.readdir(worktreesDir(workspaceRoot), { withFileTypes: true });
  } catch (err) {
    if ((err as NodeJS.ErrnoException).code === 'ENOENT') return [];
    throw err;
  }
  return entries
    .filter((entry) => entry.isDirectory())
    .map((entry) => entry.name)
    .sort(compareIds);
}

export function resolveTaskName(id: string, record: StatusRecord | null, tasks: Task[] = []): string {
  if (record?.task_name) return record.task_name;
  const slug = slugFromPlurbId(id);
  return taskForSlug(slug, tasks)?.name ?? slug;
}

export async function loadPlurb(workspaceRoot: string, id: string, options?: ListPlurbsOptions): Promise<Plurb> {
  const wtPath = plurbPath(workspaceRoot, id);
  const base = { id, branch: branchName(id), path: wtPath };

  try {
    const record = await readStatus(wtPath, options?.read);
    return {
      ...base,
      taskName: resolveTaskName(id, record, options?.tasks),
      record,
      status: record.status,
    };
  } catch (err) {
    return {
      ...base,
      taskName: resolveTaskName(id, null, options?.tasks),
      record: null,
      status: 'unknown',
      problem: err instanceof Error ? err.message : String(err),
    };
  }
}

/**
 * Enumerate every plurb in the workspace. A plurb whose record cannot be
 * loaded comes back degraded rather than failing the whole listing.
 */
export async function listPlurbs(workspaceRoot: string, options?: ListPlurbsOptions): Promise<Plurb[]> {
  const ids = await listPlurbIds(workspaceRoot);
  return Promise.all(ids.map((id) => loadPlurb(workspaceRoot, id, options)));
}
