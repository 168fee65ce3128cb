export type StatusValue =
  | 'pending'
  | 'in_progress'
  | 'blocked'
  | 'completed'
  | 'failed';

/** Status shown for a plurb whose record is missing or unreadable. */
export type PlurbStatus = StatusValue | 'unknown';

export interface AgentInfo {
  name: string;
  started_at: string;
  metadata: Record<string, unknown>;
}

/**
 * Durable state of one plurb, stored as JSON at `<worktree>/.pluribus/status`.
 *
 * Keys are snake_case because the agent process writes this file too. Keys
 * this interface does not name are kept as-is on every read-modify-write.
 */
export interface StatusRecord {
  task_id: string;
  task_name?: string;
  status: StatusValue;
  phase: string;
  progress_percent: number;
  last_update: string;
  claude_instance_active: boolean;
  agent_pid: number | null;
  agent: AgentInfo | null;
  session_id: string | null;
  pr_url: string | null;
  blocker: string | null;
  notes: string | null;
  [extra: string]: unknown;
}
