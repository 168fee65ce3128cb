#!/usr/bin/env node
import { Command, CommanderError } from 'commander';
import { PluribusError } from './lib/errors.js';
import { outputError } from './lib/output.js';

const program = new Command();

program
  .name('pluribus')
  .description('Run parallel coding agents on isolated git worktrees')
  .version('0.1.0')
  .option('--no-input', 'Never prompt; fail instead of asking');

function input(): boolean {
  return program.opts<{ input: boolean }>().input;
}

function collectArgs(value: string, previous: string[]): string[] {
  return previous.concat([value]);
}

program
  .command('init')
  .description('Create a workspace for a repository')
  .argument('[repo]', 'Local path, owner/repo, or git URL')
  .option('--path <dir>', 'Workspace directory (default: current directory)')
  .action(async (repo: string | undefined, options: { path?: string }) => {
    const { initCommand } = await import('./commands/init.js');
    await initCommand(repo, { ...options, input: input() });
  });

program
  .command('list-tasks')
  .description('List tasks from todo.md')
  .action(async () => {
    const { listTasksCommand } = await import('./commands/list-tasks.js');
    await listTasksCommand();
  });

program
  .command('workon')
  .description('Start a plurb for a task')
  .argument('[task]', 'Task name or part of one')
  .option('-a, --agent <name>', 'Agent to launch')
  .option('--agent-arg <key=value>', 'Extra agent argument (repeatable)', collectArgs, [])
  .action(async (task: string | undefined, options: { agent?: string; agentArg: string[] }) => {
    const { workonCommand } = await import('./commands/workon.js');
    await workonCommand(task, { ...options, input: input() });
  });

program
  .command('resume')
  .description('Relaunch the agent for an existing plurb')
  .argument('<identifier>', 'Plurb id or task name')
  .option('-a, --agent <name>', 'Agent to launch')
  .option('--agent-arg <key=value>', 'Extra agent argument (repeatable)', collectArgs, [])
  .option('-f, --force', 'Resume even if the agent appears to be running')
  .action(async (identifier: string, options: { agent?: string; agentArg: string[]; force?: boolean }) => {
    const { resumeCommand } = await import('./commands/resume.js');
    await resumeCommand(identifier, { ...options, input: input() });
  });

program
  .command('status')
  .description('Show every plurb in the workspace')
  .option('--json', 'Output as JSON')
  .action(async (options: { json?: boolean }) => {
    const { statusCommand } = await import('./commands/status.js');
    await statusCommand(options);
  });

program
  .command('watch')
  .description('Live status table, refreshed as status files change')
  .option('-i, --interval <seconds>', 'Full rescan interval')
  .action(async (options: { interval?: string }) => {
    const { watchCommand } = await import('./commands/watch.js');
    await watchCommand(options);
  });

program
  .command('details')
  .description('Show everything known about one plurb')
  .argument('<identifier>', 'Plurb id or task name')
  .option('--json', 'Output as JSON')
  .action(async (identifier: string, options: { json?: boolean }) => {
    const { detailsCommand } = await import('./commands/details.js');
    await detailsCommand(identifier, { ...options, input: input() });
  });

program
  .command('delete')
  .description('Remove a plurb worktree (its branch is kept)')
  .argument('<identifier>', 'Plurb id or task name')
  .option('-f, --force', 'Delete even with uncommitted or unpushed work')
  .action(async (identifier: string, options: { force?: boolean }) => {
    const { deleteCommand } = await import('./commands/delete.js');
    await deleteCommand(identifier, { ...options, input: input() });
  });

program
  .command('git-cleanup')
  .description('Delete pluribus branches that no longer have a plurb')
  .option('-f, --force', 'Delete without asking')
  .action(async (options: { force?: boolean }) => {
    const { gitCleanupCommand } = await import('./commands/git-cleanup.js');
    await gitCleanupCommand({ ...options, input: input() });
  });

// Error handling
program.exitOverride();

async function main() {
  try {
    await program.parseAsync(process.argv);
  } catch (err) {
    if (err instanceof CommanderError) {
      if (err.code === 'commander.helpDisplayed' || err.code === 'commander.version' || err.code === 'commander.help') {
        process.exit(0);
      }
      process.exit(err.exitCode);
    }
    if (err instanceof PluribusError) {
      outputError(err, process.argv.includes('--json'));
      process.exit(err.exitCode);
    }
    outputError(err, false);
    process.exit(1);
  }
}

void main();
