import { describe, test, expect, vi, beforeEach, afterEach } from 'vitest';
import fs from 'node:fs/promises';
import os from 'node:os';
import path from 'node:path';
import { makeAgentConfig } from '../test-fixtures.js';
import type { Plurb } from '../types/plurb.js';

const git = vi.hoisted(() => ({ branches: new Set<string>() }));

// In-memory git: branches live in a set, worktrees are plain directories
vi.mock('./worktree.js', () => ({
  branchExists: vi.fn(async (_repo: string, branch: string) => git.branches.has(branch)),
  createWorktree: vi.fn(async (_repo: string, wtPath: string, branch: string) => {
    await fs.mkdir(wtPath, { recursive: true });
    git.branches.add(branch);
  }),
  excludeStateDir: vi.fn(async () => {}),
  hasUncommittedChanges: vi.fn(async () => true),
  hasUnsharedCommits: vi.fn(async () => false),
  removeWorktree: vi.fn(async (_repo: string, wtPath: string) => {
    await fs.rm(wtPath, { recursive: true, force: true });
  }),
  pruneWorktrees: vi.fn(async () => {}),
  listBranches: vi.fn(async () => [...git.branches]),
  deleteBranch: vi.fn(async (_repo: string, branch: string) => git.branches.delete(branch)),
}));

vi.mock('./agent.js', async (importOriginal) => ({
  ...(await importOriginal<typeof import('./agent.js')>()),
  spawnAgent: vi.fn(async () => 4242),
  waitForSessionId: vi.fn(async () => null),
}));

// Force the polling feed so the test does not depend on recursive fs.watch
vi.mock('node:fs', async (importOriginal) => {
  const actual = await importOriginal<typeof import('node:fs')>();
  const watch = () => {
    throw new Error('recursive watch unsupported');
  };
  return { ...actual, watch, default: { ...actual, watch } };
});

import { loadTasks } from './tasks.js';
import { createPlurb, deletePlurb } from './lifecycle.js';
import { listPlurbs } from './registry.js';
import { updateStatus } from './status.js';
import { startStatusWatcher } from './watcher.js';
import { findOrphans } from './cleanup.js';
import { UnsafeDeleteError } from '../lib/errors.js';
import { todoPath } from '../lib/paths.js';

const REPO = '/tmp/repo';

let root: string;

beforeEach(async () => {
  vi.clearAllMocks();
  git.branches.clear();
  root = await fs.mkdtemp(path.join(os.tmpdir(), 'pluribus-flow-'));
  await fs.mkdir(path.join(root, 'worktrees'));
  await fs.writeFile(
    todoPath(root),
    '# Tasks\n\n## Add X\nAdd the X feature.\n\n## Fix Y\nFix the Y bug.\n',
  );
});

afterEach(async () => {
  await fs.rm(root, { recursive: true, force: true });
});

/** Run the aggregator until a snapshot satisfies `done`, applying `onFirst` after the first one. */
function watchUntil(
  done: (plurbs: Plurb[]) => boolean,
  onFirst: () => Promise<unknown>,
): Promise<Plurb[][]> {
  return new Promise((resolve, reject) => {
    const seen: Plurb[][] = [];
    const watcher = startStatusWatcher(root, (plurbs) => {
      seen.push(plurbs);
      if (seen.length === 1) {
        onFirst().catch(reject);
        return;
      }
      if (done(plurbs)) {
        watcher.stop();
        resolve(seen);
      }
    }, { debounceMs: 5, rescanIntervalMs: 20, onError: reject });
  });
}

describe('workspace flow', () => {
  test('given a two-task catalog, should carry a plurb from workon to git-cleanup', async () => {
    const tasks = await loadTasks(todoPath(root));
    expect(tasks.map((t) => t.name)).toEqual(['Add X', 'Fix Y']);

    const { plurb } = await createPlurb({
      workspaceRoot: root,
      repoPath: REPO,
      task: tasks[0],
      agent: makeAgentConfig(),
      sessionCaptureMs: 0,
    });
    expect(plurb.branch).toMatch(/^pluribus\/add-x-[a-z0-9]{5}$/);
    expect(plurb.status).toBe('pending');

    // The agent reports completion through the status file
    const snapshots = await watchUntil(
      (plurbs) => plurbs[0]?.status === 'completed',
      () => updateStatus(plurb.path, { status: 'completed', progress_percent: 100, phase: 'done' }),
    );
    expect(snapshots[0].map((p) => [p.id, p.status])).toEqual([[plurb.id, 'pending']]);
    const final = snapshots[snapshots.length - 1][0];
    expect(final.record?.progress_percent).toBe(100);
    expect(final.taskName).toBe('Add X');

    await expect(deletePlurb(plurb, { repoPath: REPO })).rejects.toBeInstanceOf(UnsafeDeleteError);
    expect(await listPlurbs(root)).toHaveLength(1);

    await deletePlurb(plurb, { repoPath: REPO, force: true });
    expect(await listPlurbs(root)).toEqual([]);

    expect(await findOrphans(REPO, root)).toEqual([plurb.branch]);
  });
});
