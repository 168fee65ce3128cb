export interface AgentConfig {
  name: string;
  command: string;
  args: string[];
  /** Used instead of `args` when resuming a plurb that has a recorded session id. */
  resumeArgs?: string[];
  /** Shell script run in the worktree before the agent starts. */
  setup?: string;
}

export interface Config {
  repoPath?: string;
  repoUrl?: string;
  defaultAgent?: string;
  /** Seconds between full rescans in `pluribus watch`. */
  watchInterval: number;
  /** How long `workon` waits for the agent to report a session id. */
  sessionCaptureMs: number;
  agents: Record<string, AgentConfig>;
}
