import { branchName, plurbPath } from '../lib/paths.js';
import { plurbId, plurbSuffix, slugFromPlurbId } from '../lib/id.js';
import { slugifyTaskName } from '../lib/name.js';
import {
  AlreadyActiveError,
  CancelledError,
  DegradedPlurbError,
  IdAllocationExhaustedError,
  UnsafeDeleteError,
  WorkspaceCreationFailedError,
} from '../lib/errors.js';
import {
  branchExists,
  createWorktree,
  excludeStateDir,
  hasUncommittedChanges,
  hasUnsharedCommits,
  removeWorktree,
} from './worktree.js';
import { createInitialStatus, updateStatus, writeStatus } from './status.js';
import { readTaskPrompt, renderTaskPrompt, writeTaskPrompt } from './prompt.js';
import { agentLiveness, spawnAgent, waitForSessionId } from './agent.js';
import { listPlurbIds } from './registry.js';
import { taskForSlug } from './tasks.js';
import type { Plurb, Task } from '../types/plurb.js';
import type { AgentConfig } from '../types/config.js';
import type { AgentInfo, StatusRecord } from '../types/status.js';

export const MAX_ID_ATTEMPTS = 10;

// ─── Allocation ──────────────────────────────────────────────────────────────

export interface AllocateOptions {
  maxAttempts?: number;
  suffix?: () => string;
}

/**
 * Draw suffixes until the id is free both as a registry directory and as a
 * `pluribus/<id>` branch.
 */
export async function allocatePlurbId(
  workspaceRoot: string,
  repoPath: string,
  slug: string,
  options?: AllocateOptions,
): Promise<string> {
  const maxAttempts = options?.maxAttempts ?? MAX_ID_ATTEMPTS;
  const suffix = options?.suffix ?? plurbSuffix;
  const taken = new Set(await listPlurbIds(workspaceRoot));

  for (let attempt = 0; attempt < maxAttempts; attempt++) {
    const id = plurbId(slug, suffix());
    if (taken.has(id)) continue;
    if (await branchExists(repoPath, branchName(id))) continue;
    return id;
  }
  throw new IdAllocationExhaustedError(slug, maxAttempts);
}

// ─── Create ──────────────────────────────────────────────────────────────────

export interface CreatePlurbOptions {
  workspaceRoot: string;
  repoPath: string;
  task: Task;
  agent: AgentConfig;
  agentArgs?: Record<string, string>;
  sessionCaptureMs?: number;
  /** Step-by-step progress for the command surface. */
  onProgress?: (message: string) => void;
}

export interface LaunchResult {
  plurb: Plurb;
  pid: number;
  sessionId: string | null;
}

function agentInfo(agent: AgentConfig): AgentInfo {
  return {
    name: agent.name,
    started_at: new Date().toISOString(),
    metadata: { command: agent.command },
  };
}

function toPlurb(id: string, taskName: string, path: string, record: StatusRecord): Plurb {
  return { id, taskName, branch: branchName(id), path, record, status: record.status };
}

/**
 * Allocate, check out, seed and launch a new plurb for `task`.
 *
 * Once the status record is seeded the plurb exists. A later spawn failure
 * still throws, leaving a pending plurb that `resume` can retry.
 */
export async function createPlurb(options: CreatePlurbOptions): Promise<LaunchResult> {
  const { workspaceRoot, repoPath, task, agent } = options;
  const progress = options.onProgress ?? (() => {});

  const id = await allocatePlurbId(workspaceRoot, repoPath, slugifyTaskName(task.name));
  const branch = branchName(id);
  const wtPath = plurbPath(workspaceRoot, id);

  try {
    await excludeStateDir(repoPath);
    await createWorktree(repoPath, wtPath, branch);
  } catch (err) {
    throw new WorkspaceCreationFailedError(id, err instanceof Error ? err.message : String(err));
  }
  progress(`Created worktree ${wtPath} on ${branch}`);

  await writeStatus(wtPath, createInitialStatus(id, task.name));
  const prompt = renderTaskPrompt(id, task, wtPath);
  const promptFile = await writeTaskPrompt(wtPath, prompt);
  progress('Initialized status record');

  const pid = await spawnAgent({
    agent,
    plurbId: id,
    taskName: task.name,
    worktreePath: wtPath,
    repoPath,
    prompt,
    promptFile,
    agentArgs: options.agentArgs,
  });
  let record = await updateStatus(wtPath, {
    agent_pid: pid,
    agent: agentInfo(agent),
    claude_instance_active: true,
  });
  progress(`Spawned ${agent.name} (pid ${pid})`);

  const sessionId = await waitForSessionId(wtPath, options.sessionCaptureMs ?? 3000);
  if (sessionId) {
    record = await updateStatus(wtPath, { session_id: sessionId });
    progress('Captured session id for resumption');
  }

  return { plurb: toPlurb(id, task.name, wtPath, record), pid, sessionId };
}

// ─── Resume ──────────────────────────────────────────────────────────────────

export interface ResumePlurbOptions {
  repoPath: string;
  agent: AgentConfig;
  /** Catalog used to rebuild the prompt when prompt.md is gone. */
  tasks?: Task[];
  agentArgs?: Record<string, string>;
  force?: boolean;
  sessionCaptureMs?: number;
  onWarning?: (message: string) => void;
}

/** Several task names can share a slug, so the recorded name wins. */
function taskForPlurb(plurb: Plurb, tasks: Task[]): Task {
  const byName = tasks.find((t) => t.name === plurb.taskName);
  if (byName) return byName;
  const bySlug = plurb.record?.task_name ? undefined : taskForSlug(slugFromPlurbId(plurb.id), tasks);
  return bySlug ?? { name: plurb.taskName, body: '' };
}

/**
 * Launch an agent on an existing plurb, continuing its recorded session when
 * the agent supports it. The status record is patched, never reseeded.
 */
export async function resumePlurb(plurb: Plurb, options: ResumePlurbOptions): Promise<LaunchResult> {
  const { record } = plurb;
  if (!record) {
    throw new DegradedPlurbError(plurb.id, plurb.problem ?? 'no status record');
  }
  const warn = options.onWarning ?? (() => {});

  const liveness = agentLiveness(record);
  if (liveness === 'active' && !options.force) {
    throw new AlreadyActiveError(plurb.id, record.agent_pid);
  }
  if (liveness === 'stale') {
    const pid = record.agent_pid !== null ? `pid ${record.agent_pid}` : 'no recorded pid';
    warn(`${plurb.id} is marked active but its agent (${pid}) is not running; resuming`);
  }

  let prompt = await readTaskPrompt(plurb.path);
  if (prompt === null) {
    prompt = renderTaskPrompt(plurb.id, taskForPlurb(plurb, options.tasks ?? []), plurb.path);
  }
  const promptFile = await writeTaskPrompt(plurb.path, prompt);

  const pid = await spawnAgent({
    agent: options.agent,
    plurbId: plurb.id,
    taskName: plurb.taskName,
    worktreePath: plurb.path,
    repoPath: options.repoPath,
    prompt,
    promptFile,
    agentArgs: options.agentArgs,
    sessionId: record.session_id,
  });
  let updated = await updateStatus(plurb.path, {
    agent_pid: pid,
    agent: agentInfo(options.agent),
    claude_instance_active: true,
  });

  const sessionId = await waitForSessionId(plurb.path, options.sessionCaptureMs ?? 3000);
  if (sessionId && sessionId !== updated.session_id) {
    updated = await updateStatus(plurb.path, { session_id: sessionId });
  }

  return { plurb: toPlurb(plurb.id, plurb.taskName, plurb.path, updated), pid, sessionId: updated.session_id };
}

// ─── Delete ──────────────────────────────────────────────────────────────────

export interface DeletePlurbOptions {
  repoPath: string;
  force?: boolean;
  /** Asked when unsaved work is found. Without it, unsaved work is an error. */
  confirm?: (reasons: string[]) => Promise<boolean>;
}

/** Reasons deleting this plurb's worktree would lose work. */
export async function unsavedWork(plurb: Plurb): Promise<string[]> {
  const reasons: string[] = [];
  if (await hasUncommittedChanges(plurb.path)) reasons.push('uncommitted changes');
  if (await hasUnsharedCommits(plurb.path, plurb.branch)) reasons.push('unpushed commits');
  return reasons;
}

/**
 * Remove the plurb's worktree and with it the status record. The branch is
 * kept; `git-cleanup` reclaims it later.
 */
export async function deletePlurb(plurb: Plurb, options: DeletePlurbOptions): Promise<void> {
  if (!options.force) {
    const reasons = await unsavedWork(plurb);
    if (reasons.length > 0) {
      if (!options.confirm) throw new UnsafeDeleteError(plurb.id, reasons);
      if (!(await options.confirm(reasons))) throw new CancelledError();
    }
  }
  await removeWorktree(options.repoPath, plurb.path);
}
