import fs from 'node:fs/promises';
import path from 'node:path';
import { clonedRepoPath, configPath, findWorkspaceRoot, todoPath, worktreesDir } from '../lib/paths.js';
import { AlreadyInitializedError, NotInWorkspaceError, RepoNotConfiguredError } from '../lib/errors.js';
import { exampleTodo } from '../bundled/prompts.js';
import { loadConfig, saveConfig } from './config.js';
import { cloneRepo, isGitRepo } from './worktree.js';
import type { Config } from '../types/config.js';

export type RepoSource =
  | { kind: 'remote'; url: string }
  | { kind: 'local'; path: string };

const URL_PREFIXES = ['http://', 'https://', 'git@', 'ssh://', 'file://'];

async function pathExists(p: string): Promise<boolean> {
  try {
    await fs.access(p);
    return true;
  } catch {
    return false;
  }
}

/**
 * Classify what the user typed for `init`:
 *
 * - git URLs are cloned as given
 * - `/…` and `.…` are local paths, as is anything that exists on disk
 * - any other `owner/repo` is GitHub shorthand
 */
export async function parseRepoInput(input: string, cwd: string = process.cwd()): Promise<RepoSource> {
  const value = input.trim();
  if (URL_PREFIXES.some((prefix) => value.startsWith(prefix))) {
    return { kind: 'remote', url: value };
  }

  const local = path.resolve(cwd, value);
  if (value.startsWith('/') || value.startsWith('.') || (await pathExists(local))) {
    return { kind: 'local', path: local };
  }
  if (value.includes('/')) {
    return { kind: 'remote', url: `https://github.com/${value}.git` };
  }
  return { kind: 'local', path: local };
}

export interface InitWorkspaceOptions {
  workspaceRoot: string;
  repo: string;
  onProgress?: (message: string) => void;
}

export interface InitWorkspaceResult {
  workspaceRoot: string;
  repoPath: string;
  repoUrl?: string;
  todoCreated: boolean;
}

export async function initWorkspace(options: InitWorkspaceOptions): Promise<InitWorkspaceResult> {
  const root = path.resolve(options.workspaceRoot);
  const progress = options.onProgress ?? (() => {});

  await fs.mkdir(root, { recursive: true });
  if (await pathExists(configPath(root))) {
    throw new AlreadyInitializedError(root);
  }

  const source = await parseRepoInput(options.repo);
  let repoPath: string;
  let repoUrl: string | undefined;
  if (source.kind === 'remote') {
    repoPath = clonedRepoPath(root);
    repoUrl = source.url;
    try {
      await cloneRepo(source.url, repoPath);
    } catch (err) {
      throw new RepoNotConfiguredError(
        `failed to clone ${source.url}: ${err instanceof Error ? err.message : String(err)}`,
      );
    }
    progress(`Cloned ${source.url} into ${repoPath}`);
  } else {
    repoPath = source.path;
    if (!(await isGitRepo(repoPath))) {
      throw new RepoNotConfiguredError(`${repoPath} is not a git repository`);
    }
  }

  await fs.mkdir(worktreesDir(root), { recursive: true });

  let todoCreated = false;
  if (!(await pathExists(todoPath(root)))) {
    await fs.writeFile(todoPath(root), exampleTodo, 'utf-8');
    todoCreated = true;
  }

  await saveConfig(root, { repoPath, ...(repoUrl ? { repoUrl } : {}) });

  return { workspaceRoot: root, repoPath, ...(repoUrl ? { repoUrl } : {}), todoCreated };
}

export async function requireWorkspaceRoot(cwd: string = process.cwd()): Promise<string> {
  const root = await findWorkspaceRoot(cwd);
  if (!root) throw new NotInWorkspaceError(cwd);
  return root;
}

export interface Workspace {
  root: string;
  config: Config;
  repoPath: string;
}

/** Workspace root, parsed config and a repository that git recognises. */
export async function requireWorkspace(cwd: string = process.cwd()): Promise<Workspace> {
  const root = await requireWorkspaceRoot(cwd);
  const config = await loadConfig(root);
  if (!config.repoPath) {
    throw new RepoNotConfiguredError('pluribus.config has no repoPath');
  }

  const repoPath = path.resolve(root, config.repoPath);
  if (!(await isGitRepo(repoPath))) {
    throw new RepoNotConfiguredError(`${repoPath} is not a git repository`);
  }
  return { root, config, repoPath };
}
