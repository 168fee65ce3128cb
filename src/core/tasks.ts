import fs from 'node:fs/promises';
import { CatalogError } from '../lib/errors.js';
import { slugifyTaskName } from '../lib/name.js';
import type { Task } from '../types/plurb.js';

const TASK_HEADING = '## ';

/**
 * Split a todo document into tasks. Every `## ` heading starts a task; its body
 * is the non-blank, non-heading lines up to the next task heading.
 */
export function parseTasks(content: string): Task[] {
  const tasks: Task[] = [];
  let current: { name: string; lines: string[] } | null = null;

  const flush = () => {
    if (current) {
      tasks.push({ name: current.name, body: current.lines.join('\n').trim() });
    }
  };

  for (const line of content.split(/\r?\n/)) {
    if (line.startsWith(TASK_HEADING)) {
      flush();
      current = { name: line.slice(TASK_HEADING.length).trim(), lines: [] };
    } else if (current && line.trim() && !line.startsWith('#')) {
      current.lines.push(line);
    }
  }
  flush();

  return tasks.filter((task) => task.name.length > 0);
}

export async function loadTasks(todoPath: string): Promise<Task[]> {
  let content: string;
  try {
    content = await fs.readFile(todoPath, 'utf-8');
  } catch (err) {
    if ((err as NodeJS.ErrnoException).code === 'ENOENT') {
      throw new CatalogError(`Task list not found: ${todoPath}`);
    }
    throw err;
  }

  const tasks = parseTasks(content);
  if (tasks.length === 0) {
    throw new CatalogError(`No tasks defined in ${todoPath} (add a "## Task name" heading)`);
  }
  return tasks;
}

/** Like loadTasks, but an absent or empty catalog is just no tasks. */
export async function loadTasksIfPresent(todoPath: string): Promise<Task[]> {
  try {
    return await loadTasks(todoPath);
  } catch (err) {
    if (err instanceof CatalogError) return [];
    throw err;
  }
}

/**
 * Tasks matching a user query: exact name, else case-insensitive name, else
 * case-insensitive substring. More than one result means the query is ambiguous.
 */
export function findTasks(query: string, tasks: Task[]): Task[] {
  const exact = tasks.filter((t) => t.name === query);
  if (exact.length > 0) return exact;

  const needle = query.toLowerCase();
  const insensitive = tasks.filter((t) => t.name.toLowerCase() === needle);
  if (insensitive.length > 0) return insensitive;

  return tasks.filter((t) => t.name.toLowerCase().includes(needle));
}

/** The catalog task a plurb slug was derived from, if it is still listed. */
export function taskForSlug(slug: string, tasks: Task[]): Task | undefined {
  return tasks.find((t) => slugifyTaskName(t.name) === slug);
}
