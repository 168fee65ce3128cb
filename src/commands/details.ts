import { agentOutputPath, promptFilePath, statusFilePath } from '../lib/paths.js';
import { formatStatus, heading, output, warn } from '../lib/output.js';
import { agentLiveness } from '../core/agent.js';
import { hasUncommittedChanges, hasUnsharedCommits } from '../core/worktree.js';
import { requireWorkspaceRoot } from '../core/workspace.js';
import { pickPlurb } from './pick.js';
import { plurbJson } from './status.js';
import type { Plurb } from '../types/plurb.js';

export interface DetailsOptions {
  json?: boolean;
  input?: boolean;
}

export interface GitState {
  uncommittedChanges: boolean;
  unpushedCommits: boolean;
}

async function gitState(plurb: Plurb): Promise<GitState | null> {
  try {
    return {
      uncommittedChanges: await hasUncommittedChanges(plurb.path),
      unpushedCommits: await hasUnsharedCommits(plurb.path, plurb.branch),
    };
  } catch (err) {
    warn(`Could not read git state: ${err instanceof Error ? err.message : String(err)}`);
    return null;
  }
}

function displayValue(value: unknown): string {
  if (value === null || value === undefined) return '—';
  if (typeof value === 'object') return JSON.stringify(value);
  return String(value);
}

export function formatDetails(plurb: Plurb, git: GitState | null): string {
  const lines: string[] = [heading(`${plurb.id}  ${plurb.taskName}`), ''];
  const field = (label: string, value: string) => lines.push(`  ${label.padEnd(22)} ${value}`);

  field('status', formatStatus(plurb.status));
  field('branch', plurb.branch);
  field('worktree', plurb.path);
  field('status file', statusFilePath(plurb.path));
  field('prompt file', promptFilePath(plurb.path));
  field('agent output', agentOutputPath(plurb.path));
  if (plurb.problem) field('problem', plurb.problem);

  if (plurb.record) {
    field('agent liveness', agentLiveness(plurb.record));
    lines.push('', heading('Record'));
    for (const [key, value] of Object.entries(plurb.record)) {
      field(key, displayValue(value));
    }
  }

  lines.push('', heading('Git'));
  if (git) {
    field('uncommitted changes', git.uncommittedChanges ? 'yes' : 'no');
    field('unpushed commits', git.unpushedCommits ? 'yes' : 'no');
  } else {
    field('state', 'unavailable');
  }
  return lines.join('\n');
}

export async function detailsCommand(identifier: string, options: DetailsOptions): Promise<void> {
  const root = await requireWorkspaceRoot();
  const plurb = await pickPlurb(root, identifier, options.json ? false : options.input);
  const git = await gitState(plurb);

  if (options.json) {
    output({ ...plurbJson(plurb), git }, true);
    return;
  }
  console.log(formatDetails(plurb, git));
}
