import fs from 'node:fs/promises';
import { branchName, plurbStateDir, promptFilePath, statusFilePath } from '../lib/paths.js';
import { taskPromptTemplate } from '../bundled/prompts.js';
import { renderTemplate } from './template.js';
import type { Task } from '../types/plurb.js';

/** Task description plus the status-reporting instructions every agent receives. */
export function renderTaskPrompt(plurbId: string, task: Task, worktreePath: string): string {
  return renderTemplate(taskPromptTemplate, {
    TASK_NAME: task.name,
    TASK_BODY: task.body || '(no description)',
    TASK_ID: plurbId,
    BRANCH: branchName(plurbId),
    WORKTREE_DIR: worktreePath,
    STATUS_FILE: statusFilePath(worktreePath),
  });
}

export async function writeTaskPrompt(worktreePath: string, content: string): Promise<string> {
  const file = promptFilePath(worktreePath);
  await fs.mkdir(plurbStateDir(worktreePath), { recursive: true });
  await fs.writeFile(file, content, 'utf-8');
  return file;
}

/** The prompt written at creation, or null when it is gone. */
export async function readTaskPrompt(worktreePath: string): Promise<string | null> {
  try {
    return await fs.readFile(promptFilePath(worktreePath), 'utf-8');
  } catch (err) {
    if ((err as NodeJS.ErrnoException).code === 'ENOENT') return null;
    throw err;
  }
}
