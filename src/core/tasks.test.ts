import { describe, test, expect, beforeEach, afterEach } from 'vitest';
import fs from 'node:fs/promises';
import os from 'node:os';
import path from 'node:path';
import { parseTasks, loadTasks, loadTasksIfPresent, findTasks, taskForSlug } from './tasks.js';
import { CatalogError } from '../lib/errors.js';

const TODO = `# Tasks

## Add database migration system
This task involves creating a migration framework.

Keep it reversible.

## Add JWT authentication
Implement JWT-based auth for the API.

## Refactor logging
`;

describe('parseTasks', () => {
  test('given headings, should return tasks in document order', () => {
    const tasks = parseTasks(TODO);

    expect(tasks.map((t) => t.name)).toEqual([
      'Add database migration system',
      'Add JWT authentication',
      'Refactor logging',
    ]);
  });

  test('given body text with blank lines, should join non-blank lines', () => {
    const [first] = parseTasks(TODO);

    expect(first.body).toBe('This task involves creating a migration framework.\nKeep it reversible.');
  });

  test('given a task without body, should return empty body', () => {
    const tasks = parseTasks(TODO);

    expect(tasks[2]).toEqual({ name: 'Refactor logging', body: '' });
  });

  test('given text before the first task heading, should ignore it', () => {
    const tasks = parseTasks('Intro text\n## Only task\nbody\n');

    expect(tasks).toEqual([{ name: 'Only task', body: 'body' }]);
  });

  test('given nested headings inside a body, should skip them', () => {
    const tasks = parseTasks('## Task\n### Notes\nline\n');

    expect(tasks).toEqual([{ name: 'Task', body: 'line' }]);
  });

  test('given CRLF line endings, should parse the same', () => {
    const tasks = parseTasks('## Add X\r\nDo X\r\n## Add Y\r\n');

    expect(tasks).toEqual([
      { name: 'Add X', body: 'Do X' },
      { name: 'Add Y', body: '' },
    ]);
  });

  test('given duplicate task names, should keep both', () => {
    const tasks = parseTasks('## Fix bug\none\n## Fix bug\ntwo\n');

    expect(tasks).toHaveLength(2);
  });

  test('given no task headings, should return empty', () => {
    expect(parseTasks('# Tasks\n\nnothing here\n')).toEqual([]);
  });
});

describe('loadTasks', () => {
  let dir: string;

  beforeEach(async () => {
    dir = await fs.mkdtemp(path.join(os.tmpdir(), 'pluribus-tasks-'));
  });

  afterEach(async () => {
    await fs.rm(dir, { recursive: true, force: true });
  });

  test('given a todo file, should return its tasks', async () => {
    const file = path.join(dir, 'todo.md');
    await fs.writeFile(file, '## Add X\n## Add Y\n');

    const tasks = await loadTasks(file);

    expect(tasks.map((t) => t.name)).toEqual(['Add X', 'Add Y']);
  });

  test('given a missing file, should throw CatalogError', async () => {
    await expect(loadTasks(path.join(dir, 'todo.md'))).rejects.toBeInstanceOf(CatalogError);
  });

  test('given a file without task headings, should throw CatalogError', async () => {
    const file = path.join(dir, 'todo.md');
    await fs.writeFile(file, '# Tasks\n');

    await expect(loadTasks(file)).rejects.toThrow('No tasks defined');
  });

  test('given a missing file and the lenient loader, should return no tasks', async () => {
    expect(await loadTasksIfPresent(path.join(dir, 'todo.md'))).toEqual([]);
  });
});

describe('findTasks', () => {
  const tasks = parseTasks(TODO);

  test('given an exact name, should return that task', () => {
    expect(findTasks('Refactor logging', tasks).map((t) => t.name)).toEqual(['Refactor logging']);
  });

  test('given a different case, should match case-insensitively', () => {
    expect(findTasks('refactor LOGGING', tasks).map((t) => t.name)).toEqual(['Refactor logging']);
  });

  test('given a fragment, should match by substring', () => {
    expect(findTasks('database', tasks).map((t) => t.name)).toEqual(['Add database migration system']);
  });

  test('given a fragment shared by several tasks, should return all of them', () => {
    expect(findTasks('add', tasks)).toHaveLength(2);
  });

  test('given no match, should return empty', () => {
    expect(findTasks('deploy', tasks)).toEqual([]);
  });
});

describe('taskForSlug', () => {
  test('given the slug of a listed task, should return the task', () => {
    const tasks = parseTasks(TODO);

    expect(taskForSlug('add-jwt-authentication', tasks)?.name).toBe('Add JWT authentication');
  });

  test('given an unknown slug, should return undefined', () => {
    expect(taskForSlug('gone', parseTasks(TODO))).toBeUndefined();
  });
});
