export class PluribusError extends Error {
  constructor(
    message: string,
    public readonly code: string,
    public readonly exitCode: number = 1,
  ) {
    super(message);
    this.name = 'PluribusError';
  }
}

export class NotInWorkspaceError extends PluribusError {
  constructor(dir: string) {
    super(
      `Not in a Pluribus workspace: ${dir} (no pluribus.config found). Run 'pluribus init' first.`,
      'NOT_IN_WORKSPACE',
    );
    this.name = 'NotInWorkspaceError';
  }
}

export class AlreadyInitializedError extends PluribusError {
  constructor(dir: string) {
    super(
      `Workspace already initialized: ${dir} (pluribus.config exists)`,
      'ALREADY_INITIALIZED',
    );
    this.name = 'AlreadyInitializedError';
  }
}

export class RepoNotConfiguredError extends PluribusError {
  constructor(detail: string) {
    super(`Repository not configured or missing: ${detail}`, 'REPO_NOT_CONFIGURED');
    this.name = 'RepoNotConfiguredError';
  }
}

export class ConfigError extends PluribusError {
  constructor(message: string) {
    super(message, 'CONFIG_ERROR');
    this.name = 'ConfigError';
  }
}

export class CatalogError extends PluribusError {
  constructor(message: string) {
    super(message, 'CATALOG_ERROR');
    this.name = 'CatalogError';
  }
}

export class TaskNotFoundError extends PluribusError {
  constructor(query: string) {
    super(`Task not found: ${query}`, 'TASK_NOT_FOUND');
    this.name = 'TaskNotFoundError';
  }
}

export class PlurbNotFoundError extends PluribusError {
  constructor(identifier: string) {
    super(`No plurb matches: ${identifier}`, 'PLURB_NOT_FOUND');
    this.name = 'PlurbNotFoundError';
  }
}

export class AmbiguousIdentifierError extends PluribusError {
  constructor(
    identifier: string,
    public readonly candidates: string[],
    kind: 'plurb' | 'task' = 'plurb',
  ) {
    const list = candidates.map((c) => `  ${c}`).join('\n');
    const noun = kind === 'plurb' ? 'plurb ids' : 'task names';
    super(
      `"${identifier}" matches ${candidates.length} ${kind}s:\n${list}\n\nRe-run with one of the ${noun} above.`,
      'AMBIGUOUS_IDENTIFIER',
    );
    this.name = 'AmbiguousIdentifierError';
  }
}

export class IdAllocationExhaustedError extends PluribusError {
  constructor(slug: string, attempts: number) {
    super(
      `Could not allocate a unique plurb id for "${slug}" after ${attempts} attempts`,
      'ID_ALLOCATION_EXHAUSTED',
    );
    this.name = 'IdAllocationExhaustedError';
  }
}

export class WorkspaceCreationFailedError extends PluribusError {
  constructor(plurbId: string, reason: string) {
    super(`Failed to create worktree for ${plurbId}: ${reason}`, 'WORKSPACE_CREATION_FAILED');
    this.name = 'WorkspaceCreationFailedError';
  }
}

export class AgentNotFoundError extends PluribusError {
  constructor(name: string, available: string[]) {
    super(
      `Unknown agent: ${name}. Available: ${available.join(', ')}`,
      'AGENT_NOT_FOUND',
    );
    this.name = 'AgentNotFoundError';
  }
}

export class AgentSpawnError extends PluribusError {
  constructor(message: string) {
    super(message, 'AGENT_SPAWN_FAILED');
    this.name = 'AgentSpawnError';
  }
}

export class AlreadyActiveError extends PluribusError {
  constructor(plurbId: string, pid: number | null) {
    const owner = pid !== null ? ` (pid ${pid})` : '';
    super(
      `An agent is already active on ${plurbId}${owner}. Use --force to launch another one anyway.`,
      'ALREADY_ACTIVE',
    );
    this.name = 'AlreadyActiveError';
  }
}

export class DegradedPlurbError extends PluribusError {
  constructor(plurbId: string, problem: string) {
    super(
      `Plurb ${plurbId} has no usable status record (${problem}). Inspect or delete its worktree.`,
      'PLURB_DEGRADED',
    );
    this.name = 'DegradedPlurbError';
  }
}

export class UnsafeDeleteError extends PluribusError {
  constructor(plurbId: string, reasons: string[]) {
    super(
      `Refusing to delete ${plurbId}: ${reasons.join(' and ')}. Use --force to delete anyway.`,
      'UNSAFE_DELETE',
    );
    this.name = 'UnsafeDeleteError';
  }
}

export type StatusReadFailure = 'missing' | 'malformed' | 'invalid';

export class StatusReadError extends PluribusError {
  constructor(
    filePath: string,
    public readonly reason: StatusReadFailure,
    detail?: string,
  ) {
    super(
      `Status record ${reason}: ${filePath}${detail ? ` (${detail})` : ''}`,
      'STATUS_READ_FAILED',
    );
    this.name = 'StatusReadError';
  }
}

export class InvalidArgsError extends PluribusError {
  constructor(message: string) {
    super(message, 'INVALID_ARGS');
    this.name = 'InvalidArgsError';
  }
}

export class CancelledError extends PluribusError {
  constructor() {
    super('Cancelled', 'CANCELLED');
    this.name = 'CancelledError';
  }
}
