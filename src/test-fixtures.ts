import type { StatusRecord } from './types/status.js';
import type { Plurb, Task } from './types/plurb.js';
import type { AgentConfig, Config } from './types/config.js';

export function makeStatus(overrides?: Partial<StatusRecord>): StatusRecord {
  return {
    task_id: 'fix-bug-ab12c',
    task_name: 'Fix bug',
    status: 'pending',
    phase: 'pending',
    progress_percent: 0,
    last_update: '2026-01-01T00:00:00.000Z',
    claude_instance_active: false,
    agent_pid: null,
    agent: null,
    session_id: null,
    pr_url: null,
    blocker: null,
    notes: null,
    ...overrides,
  };
}

export function makePlurb(overrides?: Partial<Plurb>): Plurb {
  const id = overrides?.id ?? 'fix-bug-ab12c';
  const record = overrides && 'record' in overrides
    ? overrides.record ?? null
    : makeStatus({ task_id: id });
  return {
    id,
    taskName: 'Fix bug',
    branch: `pluribus/${id}`,
    path: `/tmp/ws/worktrees/${id}`,
    record,
    status: record?.status ?? 'unknown',
    ...overrides,
  };
}

export function makeTask(overrides?: Partial<Task>): Task {
  return {
    name: 'Fix bug',
    body: 'The login form rejects valid emails.',
    ...overrides,
  };
}

export function makeAgentConfig(overrides?: Partial<AgentConfig>): AgentConfig {
  return {
    name: 'fake-agent',
    command: 'fake-agent',
    args: ['--prompt-file', '{{PROMPT_FILE}}'],
    ...overrides,
  };
}

export function makeConfig(overrides?: Partial<Config>): Config {
  return {
    repoPath: '/tmp/repo',
    watchInterval: 5,
    sessionCaptureMs: 0,
    agents: {},
    ...overrides,
  };
}
