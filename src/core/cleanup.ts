import { branchName } from '../lib/paths.js';
import { warn } from '../lib/output.js';
import { listPlurbIds } from './registry.js';
import { deleteBranch, listBranches, pruneWorktrees } from './worktree.js';

export interface OrphanDeletion {
  deleted: string[];
  /** Already gone by the time we got to them. */
  skipped: string[];
  failed: { branch: string; error: string }[];
}

/**
 * `pluribus/` branches whose plurb directory is gone. Stale worktree
 * bookkeeping is pruned first so git does not consider them checked out.
 */
export async function findOrphans(repoPath: string, workspaceRoot: string): Promise<string[]> {
  try {
    await pruneWorktrees(repoPath);
  } catch (err) {
    warn(`git worktree prune failed: ${err instanceof Error ? err.message : String(err)}`);
  }

  const live = new Set((await listPlurbIds(workspaceRoot)).map(branchName));
  const branches = await listBranches(repoPath);
  return branches.filter((branch) => !live.has(branch)).sort();
}

export async function deleteOrphans(repoPath: string, branches: string[]): Promise<OrphanDeletion> {
  const result: OrphanDeletion = { deleted: [], skipped: [], failed: [] };

  for (const branch of branches) {
    try {
      if (await deleteBranch(repoPath, branch)) {
        result.deleted.push(branch);
      } else {
        result.skipped.push(branch);
      }
    } catch (err) {
      result.failed.push({ branch, error: err instanceof Error ? err.message : String(err) });
    }
  }

  return result;
}
