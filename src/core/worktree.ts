import fs from 'node:fs/promises';
import path from 'node:path';
import { execa } from 'execa';
import { BRANCH_PREFIX } from '../lib/paths.js';
import { execaEnv } from '../lib/env.js';

const STATE_DIR_PATTERN = '.pluribus/';

function exitedWith(err: unknown, code: number): boolean {
  return typeof err === 'object' && err !== null && 'exitCode' in err && err.exitCode === code;
}

export async function isGitRepo(dir: string): Promise<boolean> {
  try {
    await execa('git', ['rev-parse', '--git-dir'], { ...execaEnv, cwd: dir });
    return true;
  } catch {
    return false;
  }
}

export async function cloneRepo(url: string, dest: string): Promise<void> {
  await execa('git', ['clone', url, dest], { ...execaEnv, stdio: 'inherit' });
}

export async function createWorktree(repoPath: string, wtPath: string, branch: string): Promise<void> {
  await fs.mkdir(path.dirname(wtPath), { recursive: true });
  await execa('git', ['worktree', 'add', wtPath, '-b', branch], { ...execaEnv, cwd: repoPath });
}

/**
 * Remove a worktree directory and its git bookkeeping. The branch stays.
 */
export async function removeWorktree(repoPath: string, wtPath: string): Promise<void> {
  await execa('git', ['worktree', 'remove', '--force', wtPath], { ...execaEnv, cwd: repoPath });
}

export async function pruneWorktrees(repoPath: string): Promise<void> {
  await execa('git', ['worktree', 'prune'], { ...execaEnv, cwd: repoPath });
}

/**
 * Keep plurb state files out of `git status` and `git add -A` in every
 * worktree by listing them in the shared info/exclude file.
 */
export async function excludeStateDir(repoPath: string): Promise<void> {
  const result = await execa('git', ['rev-parse', '--git-common-dir'], { ...execaEnv, cwd: repoPath });
  const commonDir = path.resolve(repoPath, result.stdout.trim());
  const excludeFile = path.join(commonDir, 'info', 'exclude');

  let current = '';
  try {
    current = await fs.readFile(excludeFile, 'utf-8');
  } catch (err) {
    if ((err as NodeJS.ErrnoException).code !== 'ENOENT') throw err;
  }
  if (current.split('\n').some((line) => line.trim() === STATE_DIR_PATTERN)) return;

  await fs.mkdir(path.dirname(excludeFile), { recursive: true });
  const separator = current && !current.endsWith('\n') ? '\n' : '';
  await fs.appendFile(excludeFile, `${separator}${STATE_DIR_PATTERN}\n`, 'utf-8');
}

/** Uncommitted changes in a worktree, ignoring plurb state files. */
export async function hasUncommittedChanges(wtPath: string): Promise<boolean> {
  const result = await execa('git', ['status', '--porcelain'], { ...execaEnv, cwd: wtPath });
  return result.stdout
    .split('\n')
    .filter((line) => line.trim())
    .some((line) => !line.slice(3).startsWith(STATE_DIR_PATTERN.slice(0, -1)));
}

/**
 * Commits on the worktree's HEAD that no other local branch and no remote
 * contains, i.e. work that exists only on this plurb's branch.
 */
export async function hasUnsharedCommits(wtPath: string, branch: string): Promise<boolean> {
  const result = await execa(
    'git',
    ['rev-list', '--count', 'HEAD', '--not', `--exclude=${branch}`, '--branches', '--remotes'],
    { ...execaEnv, cwd: wtPath },
  );
  return Number.parseInt(result.stdout.trim(), 10) > 0;
}

export async function listBranches(repoPath: string, prefix: string = BRANCH_PREFIX): Promise<string[]> {
  const result = await execa(
    'git',
    ['for-each-ref', '--format=%(refname:short)', `refs/heads/${prefix}`],
    { ...execaEnv, cwd: repoPath },
  );
  return result.stdout
    .split('\n')
    .map((line) => line.trim())
    .filter(Boolean);
}

export async function branchExists(repoPath: string, branch: string): Promise<boolean> {
  try {
    await execa('git', ['show-ref', '--verify', '--quiet', `refs/heads/${branch}`], { ...execaEnv, cwd: repoPath });
    return true;
  } catch (err) {
    if (exitedWith(err, 1)) return false;
    throw err;
  }
}

/**
 * Force-delete a local branch. Returns false when the branch is already gone.
 */
export async function deleteBranch(repoPath: string, branch: string): Promise<boolean> {
  if (!(await branchExists(repoPath, branch))) return false;
  await execa('git', ['branch', '-D', branch], { ...execaEnv, cwd: repoPath });
  return true;
}
