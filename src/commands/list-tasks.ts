import { todoPath } from '../lib/paths.js';
import { dim, heading } from '../lib/output.js';
import { loadTasks } from '../core/tasks.js';
import { requireWorkspaceRoot } from '../core/workspace.js';
import type { Task } from '../types/plurb.js';

const PREVIEW_LINES = 2;

export function formatTaskList(tasks: Task[]): string {
  return tasks
    .map((task, i) => {
      const lines = [heading(`${i + 1}. ${task.name}`)];
      const preview = task.body.split('\n').slice(0, PREVIEW_LINES);
      for (const line of preview) {
        if (line) lines.push(`   ${dim(line)}`);
      }
      return lines.join('\n');
    })
    .join('\n');
}

export async function listTasksCommand(): Promise<void> {
  const root = await requireWorkspaceRoot();
  const tasks = await loadTasks(todoPath(root));
  console.log(formatTaskList(tasks));
}
