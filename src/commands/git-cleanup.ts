import { info, success, warn } from '../lib/output.js';
import { confirm } from '../lib/prompt.js';
import { deleteOrphans, findOrphans } from '../core/cleanup.js';
import { requireWorkspace } from '../core/workspace.js';
import { canPrompt } from './pick.js';

export interface GitCleanupOptions {
  force?: boolean;
  input?: boolean;
}

/** Delete `pluribus/` branches whose plurb no longer exists. */
export async function gitCleanupCommand(options: GitCleanupOptions): Promise<void> {
  const { root, repoPath } = await requireWorkspace();
  const orphans = await findOrphans(repoPath, root);

  if (orphans.length === 0) {
    info('No orphan branches found');
    return;
  }

  console.log(`Found ${orphans.length} orphan branch(es):`);
  for (const branch of orphans) console.log(`  ${branch}`);

  if (!options.force) {
    if (!canPrompt(options.input)) {
      info('Re-run with --force to delete them');
      return;
    }
    if (!(await confirm(`Delete ${orphans.length} branch(es)?`))) {
      info('Nothing deleted');
      return;
    }
  }

  const result = await deleteOrphans(repoPath, orphans);
  for (const branch of result.deleted) success(`Deleted ${branch}`);
  for (const branch of result.skipped) info(`Already gone: ${branch}`);
  for (const { branch, error } of result.failed) warn(`Failed to delete ${branch}: ${error}`);

  if (result.failed.length > 0) {
    process.exitCode = 1;
  }
}
