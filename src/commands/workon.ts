import { todoPath } from '../lib/paths.js';
import { parseAgentArgs } from '../lib/vars.js';
import { info, success } from '../lib/output.js';
import { resolveAgentConfig } from '../core/config.js';
import { createPlurb } from '../core/lifecycle.js';
import { loadTasks } from '../core/tasks.js';
import { requireWorkspace } from '../core/workspace.js';
import { pickTask } from './pick.js';

export interface WorkonOptions {
  agent?: string;
  agentArg?: string[];
  input?: boolean;
}

export async function workonCommand(taskQuery: string | undefined, options: WorkonOptions): Promise<void> {
  const { root, config, repoPath } = await requireWorkspace();
  const tasks = await loadTasks(todoPath(root));

  const agentArgs = parseAgentArgs(options.agentArg ?? []);
  const agent = resolveAgentConfig(config, options.agent);
  const task = await pickTask(tasks, taskQuery, options.input);

  const { plurb } = await createPlurb({
    workspaceRoot: root,
    repoPath,
    task,
    agent,
    agentArgs,
    sessionCaptureMs: config.sessionCaptureMs,
    onProgress: success,
  });

  console.log();
  success(`Plurb ${plurb.id} is ready with ${agent.name} running`);
  info(`Task: ${task.name}`);
  info(`Worktree: ${plurb.path}`);
  info(`Branch: ${plurb.branch}`);
  info('Monitor progress with: pluribus watch');
  info(`Resume later with: pluribus resume ${plurb.id}`);
}
