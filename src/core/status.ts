import fs from 'node:fs/promises';
import writeFileAtomic from 'write-file-atomic';
import { z } from 'zod';
import { plurbStateDir, statusFilePath } from '../lib/paths.js';
import { StatusReadError } from '../lib/errors.js';
import type { StatusRecord } from '../types/status.js';

export const STATUS_VALUES = ['pending', 'in_progress', 'blocked', 'completed', 'failed'] as const;

const AgentInfoSchema = z.object({
  name: z.string(),
  started_at: z.string(),
  metadata: z.record(z.string(), z.unknown()).default({}),
}).passthrough();

/**
 * Agents own this file after the seed write, so the schema is lenient: typed
 * fields that are absent get null defaults and unknown keys pass through.
 */
const StatusRecordSchema = z.object({
  task_id: z.string(),
  task_name: z.string().optional(),
  status: z.enum(STATUS_VALUES),
  phase: z.string().default(''),
  progress_percent: z.number().int().min(0).max(100).default(0),
  last_update: z.string(),
  claude_instance_active: z.boolean().default(false),
  agent_pid: z.number().int().nullable().default(null),
  agent: AgentInfoSchema.nullable().default(null),
  session_id: z.string().nullable().default(null),
  pr_url: z.string().nullable().default(null),
  blocker: z.string().nullable().default(null),
  notes: z.string().nullable().default(null),
}).passthrough();

export interface ReadStatusOptions {
  /** Extra attempts after the first one for missing or truncated files. */
  retries?: number;
  /** Delay before the first retry; doubles on each attempt. */
  minDelayMs?: number;
}

export function createInitialStatus(taskId: string, taskName: string, now: Date = new Date()): StatusRecord {
  return {
    task_id: taskId,
    task_name: taskName,
    status: 'pending',
    phase: 'pending',
    progress_percent: 0,
    last_update: now.toISOString(),
    claude_instance_active: false,
    agent_pid: null,
    agent: null,
    session_id: null,
    pr_url: null,
    blocker: null,
    notes: null,
  };
}

/** Validate a parsed status document. Throws StatusReadError('invalid') on schema failure. */
export function parseStatus(data: unknown, filePath: string): StatusRecord {
  const result = StatusRecordSchema.safeParse(data);
  if (!result.success) {
    const detail = result.error.issues
      .map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
      .join('; ');
    throw new StatusReadError(filePath, 'invalid', detail);
  }
  return result.data;
}

/**
 * Read and validate a plurb's status record.
 *
 * The file is written by an independent process, so a missing file or a
 * JSON syntax error is retried with exponential backoff before it is
 * reported. Schema violations are reported immediately.
 */
export async function readStatus(worktreePath: string, options?: ReadStatusOptions): Promise<StatusRecord> {
  const retries = options?.retries ?? 3;
  const minDelayMs = options?.minDelayMs ?? 50;
  const filePath = statusFilePath(worktreePath);

  let lastError: StatusReadError | undefined;
  for (let attempt = 0; attempt <= retries; attempt++) {
    if (attempt > 0) {
      await new Promise((resolve) => setTimeout(resolve, minDelayMs * 2 ** (attempt - 1)));
    }

    let raw: string;
    try {
      raw = await fs.readFile(filePath, 'utf-8');
    } catch (err) {
      if ((err as NodeJS.ErrnoException).code !== 'ENOENT') throw err;
      lastError = new StatusReadError(filePath, 'missing');
      continue;
    }

    let data: unknown;
    try {
      data = JSON.parse(raw);
    } catch (err) {
      lastError = new StatusReadError(filePath, 'malformed', err instanceof Error ? err.message : String(err));
      continue;
    }

    return parseStatus(data, filePath);
  }

  throw lastError ?? new StatusReadError(filePath, 'missing');
}

export async function writeStatus(worktreePath: string, record: StatusRecord): Promise<void> {
  await fs.mkdir(plurbStateDir(worktreePath), { recursive: true });
  await writeFileAtomic(statusFilePath(worktreePath), JSON.stringify(record, null, 2) + '\n');
}

/**
 * Read-modify-write. Keys the patch does not mention, including ones this
 * module does not know about, are written back unchanged.
 */
export async function updateStatus(
  worktreePath: string,
  patch: Partial<StatusRecord>,
  options?: ReadStatusOptions,
): Promise<StatusRecord> {
  const current = await readStatus(worktreePath, options);
  const updated: StatusRecord = {
    ...current,
    ...patch,
    last_update: new Date().toISOString(),
  };
  await writeStatus(worktreePath, updated);
  return updated;
}
