import { describe, test, expect, beforeEach, afterEach } from 'vitest';
import fs from 'node:fs/promises';
import os from 'node:os';
import path from 'node:path';
import {
  createInitialStatus,
  readStatus,
  writeStatus,
  updateStatus,
  parseStatus,
} from './status.js';
import { StatusReadError } from '../lib/errors.js';
import { statusFilePath } from '../lib/paths.js';
import { makeStatus } from '../test-fixtures.js';

let worktree: string;

beforeEach(async () => {
  worktree = await fs.mkdtemp(path.join(os.tmpdir(), 'pluribus-status-'));
});

afterEach(async () => {
  await fs.rm(worktree, { recursive: true, force: true });
});

describe('createInitialStatus', () => {
  test('given a plurb id and task name, should seed a pending record', () => {
    const now = new Date('2026-01-01T00:00:00.000Z');

    expect(createInitialStatus('add-x-ab12c', 'Add X', now)).toEqual({
      task_id: 'add-x-ab12c',
      task_name: 'Add X',
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
    });
  });
});

describe('writeStatus / readStatus', () => {
  test('given a record with unknown fields, should read back field-for-field equal', async () => {
    const record = makeStatus({
      status: 'in_progress',
      agent: { name: 'claude', started_at: '2026-01-01T00:00:00.000Z', metadata: { model: 'x', turns: 3 } },
      interventions: [{ type: 'ask_user_question', answered: false }],
      work_summary: 'Halfway there',
    });

    await writeStatus(worktree, record);
    const actual = await readStatus(worktree);

    expect(actual).toEqual(record);
  });

  test('given a write, should store pretty JSON with a trailing newline', async () => {
    const record = makeStatus();

    await writeStatus(worktree, record);
    const raw = await fs.readFile(statusFilePath(worktree), 'utf-8');

    expect(raw).toBe(JSON.stringify(record, null, 2) + '\n');
  });

  test('given a minimal agent-written record, should default the optional fields', async () => {
    await fs.mkdir(path.dirname(statusFilePath(worktree)), { recursive: true });
    await fs.writeFile(statusFilePath(worktree), JSON.stringify({
      task_id: 'add-x-ab12c',
      status: 'blocked',
      last_update: '2026-01-02T00:00:00.000Z',
    }));

    const record = await readStatus(worktree);

    expect(record).toEqual({
      task_id: 'add-x-ab12c',
      status: 'blocked',
      phase: '',
      progress_percent: 0,
      last_update: '2026-01-02T00:00:00.000Z',
      claude_instance_active: false,
      agent_pid: null,
      agent: null,
      session_id: null,
      pr_url: null,
      blocker: null,
      notes: null,
    });
  });

  test('given a missing file, should throw StatusReadError with reason missing after retries', async () => {
    const err = await readStatus(worktree, { retries: 2, minDelayMs: 1 }).catch((e: unknown) => e);

    expect(err).toBeInstanceOf(StatusReadError);
    expect((err as StatusReadError).reason).toBe('missing');
  });

  test('given truncated JSON, should throw StatusReadError with reason malformed', async () => {
    await fs.mkdir(path.dirname(statusFilePath(worktree)), { recursive: true });
    await fs.writeFile(statusFilePath(worktree), '{"task_id": "add-x');

    const err = await readStatus(worktree, { retries: 1, minDelayMs: 1 }).catch((e: unknown) => e);

    expect(err).toBeInstanceOf(StatusReadError);
    expect((err as StatusReadError).reason).toBe('malformed');
  });

  test('given a file that appears during the retry window, should return it', async () => {
    const record = makeStatus();
    setTimeout(() => {
      void writeStatus(worktree, record);
    }, 5);

    const actual = await readStatus(worktree, { retries: 6, minDelayMs: 10 });

    expect(actual).toEqual(record);
  });

  test('given an unknown status value, should throw StatusReadError with reason invalid', async () => {
    await fs.mkdir(path.dirname(statusFilePath(worktree)), { recursive: true });
    await fs.writeFile(statusFilePath(worktree), JSON.stringify({
      ...makeStatus(),
      status: 'exploded',
    }));

    const err = await readStatus(worktree, { retries: 0 }).catch((e: unknown) => e);

    expect(err).toBeInstanceOf(StatusReadError);
    expect((err as StatusReadError).reason).toBe('invalid');
    expect((err as StatusReadError).message).toContain('status');
  });
});

describe('parseStatus', () => {
  test('given progress above 100, should reject', () => {
    expect(() => parseStatus({ ...makeStatus(), progress_percent: 140 }, '/tmp/status'))
      .toThrow(StatusReadError);
  });

  test('given fractional progress, should reject', () => {
    expect(() => parseStatus({ ...makeStatus(), progress_percent: 42.5 }, '/tmp/status'))
      .toThrow(StatusReadError);
  });

  test('given a non-object, should reject', () => {
    expect(() => parseStatus([1, 2], '/tmp/status')).toThrow(StatusReadError);
  });
});

describe('updateStatus', () => {
  test('given a patch, should merge it and keep unknown fields', async () => {
    await writeStatus(worktree, makeStatus({ custom_flag: true, notes: 'keep me' }));

    const updated = await updateStatus(worktree, { agent_pid: 4242, claude_instance_active: true });
    const reread = await readStatus(worktree);

    expect(reread).toEqual(updated);
    expect(reread.agent_pid).toBe(4242);
    expect(reread.claude_instance_active).toBe(true);
    expect(reread.notes).toBe('keep me');
    expect(reread.custom_flag).toBe(true);
  });

  test('given a patch, should refresh last_update', async () => {
    await writeStatus(worktree, makeStatus({ last_update: '2020-01-01T00:00:00.000Z' }));

    const updated = await updateStatus(worktree, { session_id: 'sess-1' });

    expect(updated.last_update).not.toBe('2020-01-01T00:00:00.000Z');
    expect(Date.parse(updated.last_update)).toBeGreaterThan(Date.parse('2020-01-01T00:00:00.000Z'));
  });
});
