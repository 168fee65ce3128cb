import fs from 'node:fs/promises';
import { execa } from 'execa';
import { agentOutputPath, plurbStateDir, statusFilePath } from '../lib/paths.js';
import { execaEnv } from '../lib/env.js';
import { AgentSpawnError } from '../lib/errors.js';
import { renderTemplate, type TemplateContext } from './template.js';
import type { AgentConfig } from '../types/config.js';
import type { StatusRecord } from '../types/status.js';

export interface AgentLaunch {
  agent: AgentConfig;
  plurbId: string;
  taskName: string;
  worktreePath: string;
  repoPath: string;
  prompt: string;
  promptFile: string;
  agentArgs?: Record<string, string>;
  /** Resume this agent session through `resumeArgs` when the agent has them. */
  sessionId?: string | null;
}

/** Liveness of the agent a status record claims is working on the plurb. */
export type AgentLiveness = 'active' | 'stale' | 'idle';

export function buildAgentEnv(launch: AgentLaunch): Record<string, string> {
  const env: Record<string, string> = {
    PLURIBUS_TASK_ID: launch.plurbId,
    PLURIBUS_TASK_NAME: launch.taskName,
    PLURIBUS_WORKTREE_DIR: launch.worktreePath,
    PLURIBUS_REPO_ROOT: launch.repoPath,
    PLURIBUS_STATUS_FILE: statusFilePath(launch.worktreePath),
    PLURIBUS_PROMPT_FILE: launch.promptFile,
  };
  for (const [key, value] of Object.entries(launch.agentArgs ?? {})) {
    env[`PLURIBUS_AGENT_ARG_${key.toUpperCase()}`] = value;
  }
  return env;
}

/**
 * Pick `resumeArgs` when resuming a known session, else `args`, and fill in
 * the placeholders. Each entry stays one argv element.
 */
export function buildAgentArgs(launch: AgentLaunch): string[] {
  const { agent, sessionId } = launch;
  const template = sessionId && agent.resumeArgs ? agent.resumeArgs : agent.args;
  const context: TemplateContext = {
    PROMPT: launch.prompt,
    PROMPT_FILE: launch.promptFile,
    TASK_ID: launch.plurbId,
    TASK_NAME: launch.taskName,
    WORKTREE_DIR: launch.worktreePath,
    STATUS_FILE: statusFilePath(launch.worktreePath),
    SESSION_ID: sessionId ?? undefined,
  };
  return template.map((arg) => renderTemplate(arg, context));
}

export async function runSetup(script: string, worktreePath: string): Promise<void> {
  try {
    await execa(script, { ...execaEnv, shell: true, cwd: worktreePath, stdio: 'inherit' });
  } catch (err) {
    throw new AgentSpawnError(`Setup script failed: ${err instanceof Error ? err.message : String(err)}`);
  }
}

/**
 * Start the agent in its own process group with output going to the plurb's
 * agent-output file, and return without waiting for it. Returns the pid.
 */
export async function spawnAgent(launch: AgentLaunch): Promise<number> {
  const { agent, worktreePath } = launch;

  if (agent.setup) {
    await runSetup(agent.setup, worktreePath);
  }

  await fs.mkdir(plurbStateDir(worktreePath), { recursive: true });
  const output = await fs.open(agentOutputPath(worktreePath), 'w');

  try {
    const subprocess = execa(agent.command, buildAgentArgs(launch), {
      cwd: worktreePath,
      env: {
        ...execaEnv.env,
        ...buildAgentEnv(launch),
        // Spawned Claude instances must not think they are nested
        CLAUDECODE: undefined,
      },
      detached: true,
      cleanup: false,
      reject: false,
      stdin: 'ignore',
      stdout: output.fd,
      stderr: output.fd,
    });

    if (subprocess.pid === undefined) {
      const result = await subprocess;
      const reason = result instanceof Error ? result.message : `exited with code ${String(result.exitCode)}`;
      throw new AgentSpawnError(`Failed to start ${agent.command}: ${reason}`);
    }

    subprocess.unref();
    return subprocess.pid;
  } finally {
    await output.close();
  }
}

/** Pull a `session_id` out of agent output: one JSON document or JSON lines. */
export function parseSessionId(content: string): string | null {
  const trimmed = content.trim();
  if (!trimmed) return null;

  for (const candidate of [trimmed, ...trimmed.split('\n').reverse()]) {
    const text = candidate.trim();
    if (!text.startsWith('{')) continue;
    let data: unknown;
    try {
      data = JSON.parse(text);
    } catch {
      continue;
    }
    if (typeof data === 'object' && data !== null && 'session_id' in data && typeof data.session_id === 'string') {
      return data.session_id;
    }
  }
  return null;
}

export async function readSessionId(worktreePath: string): Promise<string | null> {
  try {
    return parseSessionId(await fs.readFile(agentOutputPath(worktreePath), 'utf-8'));
  } catch (err) {
    if ((err as NodeJS.ErrnoException).code === 'ENOENT') return null;
    throw err;
  }
}

/**
 * Poll the agent output for a session id. Gives up after `timeoutMs`
 * (at least one read is always made).
 */
export async function waitForSessionId(
  worktreePath: string,
  timeoutMs: number,
  intervalMs: number = 100,
): Promise<string | null> {
  const deadline = Date.now() + timeoutMs;
  while (true) {
    const sessionId = await readSessionId(worktreePath);
    if (sessionId) return sessionId;
    if (Date.now() + intervalMs > deadline) return null;
    await new Promise((resolve) => setTimeout(resolve, intervalMs));
  }
}

export function isProcessAlive(pid: number): boolean {
  try {
    process.kill(pid, 0);
    return true;
  } catch (err) {
    // EPERM: the process exists but belongs to someone else
    return (err as NodeJS.ErrnoException).code === 'EPERM';
  }
}

/**
 * `claude_instance_active` is advisory. A flag whose pid is gone (or was
 * never recorded) is stale.
 */
export function agentLiveness(
  record: Pick<StatusRecord, 'claude_instance_active' | 'agent_pid'>,
  probe: (pid: number) => boolean = isProcessAlive,
): AgentLiveness {
  if (!record.claude_instance_active) return 'idle';
  if (record.agent_pid !== null && probe(record.agent_pid)) return 'active';
  return 'stale';
}
