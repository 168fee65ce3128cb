import fs from 'node:fs/promises';
import path from 'node:path';

const CONFIG_FILE = 'pluribus.config';
const TODO_FILE = 'todo.md';
const WORKTREES_DIR = 'worktrees';
const PLURB_STATE_DIR = '.pluribus';

export const BRANCH_PREFIX = 'pluribus/';

export function configPath(workspaceRoot: string): string {
  return path.join(workspaceRoot, CONFIG_FILE);
}

export function todoPath(workspaceRoot: string): string {
  return path.join(workspaceRoot, TODO_FILE);
}

export function worktreesDir(workspaceRoot: string): string {
  return path.join(workspaceRoot, WORKTREES_DIR);
}

export function plurbPath(workspaceRoot: string, plurbId: string): string {
  return path.join(worktreesDir(workspaceRoot), plurbId);
}

export function clonedRepoPath(workspaceRoot: string): string {
  return path.join(workspaceRoot, 'myrepo');
}

export function plurbStateDir(worktreePath: string): string {
  return path.join(worktreePath, PLURB_STATE_DIR);
}

export function statusFilePath(worktreePath: string): string {
  return path.join(plurbStateDir(worktreePath), 'status');
}

export function agentOutputPath(worktreePath: string): string {
  return path.join(plurbStateDir(worktreePath), 'agent-output.json');
}

export function promptFilePath(worktreePath: string): string {
  return path.join(plurbStateDir(worktreePath), 'prompt.md');
}

/** True when a watched path (relative to the worktrees dir) is some plurb's status record. */
export function isStatusFile(relativePath: string): boolean {
  const parts = relativePath.split(/[\\/]/);
  return parts.length === 3 && parts[1] === PLURB_STATE_DIR && parts[2] === 'status';
}

export function branchName(plurbId: string): string {
  return `${BRANCH_PREFIX}${plurbId}`;
}

/**
 * Walk up from `start` to the first directory holding a pluribus.config.
 */
export async function findWorkspaceRoot(start: string = process.cwd()): Promise<string | null> {
  let current = path.resolve(start);
  while (true) {
    try {
      await fs.access(configPath(current));
      return current;
    } catch {
      const parent = path.dirname(current);
      if (parent === current) return null;
      current = parent;
    }
  }
}
