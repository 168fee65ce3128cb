import { todoPath } from '../lib/paths.js';
import { AmbiguousIdentifierError, InvalidArgsError, TaskNotFoundError } from '../lib/errors.js';
import { choose, isInteractive } from '../lib/prompt.js';
import { listPlurbs } from '../core/registry.js';
import { selectPlurb } from '../core/resolve.js';
import { findTasks, loadTasksIfPresent } from '../core/tasks.js';
import type { Plurb, Task } from '../types/plurb.js';

/** `input` is false under the global `--no-input` flag. */
export function canPrompt(input?: boolean): boolean {
  return input !== false && isInteractive();
}

function plurbLabel(plurb: Plurb): string {
  return `${plurb.id}  ${plurb.taskName} (${plurb.status})`;
}

/** Resolve a plurb argument against the workspace, asking when it is ambiguous. */
export async function pickPlurb(workspaceRoot: string, identifier: string, input?: boolean): Promise<Plurb> {
  const tasks = await loadTasksIfPresent(todoPath(workspaceRoot));
  const plurbs = await listPlurbs(workspaceRoot, { tasks });
  return selectPlurb(identifier, plurbs, {
    choose: canPrompt(input)
      ? (candidates) => choose(`"${identifier}" matches ${candidates.length} plurbs:`, candidates, plurbLabel)
      : undefined,
  });
}

export async function pickTask(tasks: Task[], query: string | undefined, input?: boolean): Promise<Task> {
  const interactive = canPrompt(input);

  if (query === undefined) {
    if (!interactive) throw new InvalidArgsError('A task name is required when not running interactively');
    return choose('Available tasks:', tasks, (t) => t.name);
  }

  const matches = findTasks(query, tasks);
  if (matches.length === 0) throw new TaskNotFoundError(query);
  if (matches.length === 1) return matches[0];
  if (!interactive) {
    throw new AmbiguousIdentifierError(query, matches.map((t) => t.name), 'task');
  }
  return choose(`"${query}" matches ${matches.length} tasks:`, matches, (t) => t.name);
}
