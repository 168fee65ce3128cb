import { success, info } from '../lib/output.js';
import { confirm } from '../lib/prompt.js';
import { deletePlurb } from '../core/lifecycle.js';
import { requireWorkspace } from '../core/workspace.js';
import { canPrompt, pickPlurb } from './pick.js';

export interface DeleteOptions {
  force?: boolean;
  input?: boolean;
}

export async function deleteCommand(identifier: string, options: DeleteOptions): Promise<void> {
  const { root, repoPath } = await requireWorkspace();
  const plurb = await pickPlurb(root, identifier, options.input);

  await deletePlurb(plurb, {
    repoPath,
    force: options.force,
    confirm: canPrompt(options.input)
      ? (reasons) => confirm(`${plurb.id} has ${reasons.join(' and ')}. Delete anyway?`)
      : undefined,
  });

  success(`Deleted worktree for ${plurb.id}`);
  info(`Branch ${plurb.branch} was kept; remove it with: pluribus git-cleanup`);
}
