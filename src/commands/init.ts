import path from 'node:path';
import { configPath, todoPath } from '../lib/paths.js';
import { InvalidArgsError } from '../lib/errors.js';
import { info, success } from '../lib/output.js';
import { promptText } from '../lib/prompt.js';
import { initWorkspace } from '../core/workspace.js';
import { canPrompt } from './pick.js';

export interface InitOptions {
  path?: string;
  input?: boolean;
}

export async function initCommand(repo: string | undefined, options: InitOptions): Promise<void> {
  const workspaceRoot = path.resolve(options.path ?? '.');

  let repoInput = repo;
  if (!repoInput) {
    if (!canPrompt(options.input)) {
      throw new InvalidArgsError('A repository (local path, owner/repo or git URL) is required');
    }
    repoInput = await promptText('Repository (local path, owner/repo or git URL)');
  }

  const result = await initWorkspace({ workspaceRoot, repo: repoInput, onProgress: success });

  success(`Initialized Pluribus workspace at ${result.workspaceRoot}`);
  info(`Configuration: ${configPath(result.workspaceRoot)}`);
  info(`Tasks: ${todoPath(result.workspaceRoot)}${result.todoCreated ? ' (example written)' : ''}`);
  info(`Repository: ${result.repoPath}`);
}
