import { todoPath } from '../lib/paths.js';
import { parseAgentArgs } from '../lib/vars.js';
import { info, success, warn } from '../lib/output.js';
import { resolveAgentConfig } from '../core/config.js';
import { resumePlurb } from '../core/lifecycle.js';
import { loadTasksIfPresent } from '../core/tasks.js';
import { requireWorkspace } from '../core/workspace.js';
import { pickPlurb } from './pick.js';

export interface ResumeOptions {
  agent?: string;
  agentArg?: string[];
  force?: boolean;
  input?: boolean;
}

export async function resumeCommand(identifier: string, options: ResumeOptions): Promise<void> {
  const { root, config, repoPath } = await requireWorkspace();
  const agentArgs = parseAgentArgs(options.agentArg ?? []);

  const plurb = await pickPlurb(root, identifier, options.input);
  const agent = resolveAgentConfig(config, options.agent, plurb.record?.agent?.name);

  const result = await resumePlurb(plurb, {
    repoPath,
    agent,
    agentArgs,
    tasks: await loadTasksIfPresent(todoPath(root)),
    force: options.force,
    sessionCaptureMs: config.sessionCaptureMs,
    onWarning: warn,
  });

  success(`Resumed ${plurb.id} with ${agent.name} (pid ${result.pid})`);
  if (result.sessionId) {
    info(`Session: ${result.sessionId}`);
  }
}
