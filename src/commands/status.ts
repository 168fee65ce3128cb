import { todoPath } from '../lib/paths.js';
import { formatAge, formatStatus, formatTable, output, type Column } from '../lib/output.js';
import { agentLiveness, type AgentLiveness } from '../core/agent.js';
import { listPlurbs } from '../core/registry.js';
import { loadTasksIfPresent } from '../core/tasks.js';
import { requireWorkspaceRoot } from '../core/workspace.js';
import type { Plurb } from '../types/plurb.js';

export interface StatusOptions {
  json?: boolean;
}

interface Row {
  plurb: Plurb;
  agent: AgentLiveness | null;
}

function liveness(plurb: Plurb): AgentLiveness | null {
  return plurb.record ? agentLiveness(plurb.record) : null;
}

function note(plurb: Plurb): string {
  if (plurb.problem) return plurb.problem;
  const record = plurb.record;
  return record?.blocker ?? record?.pr_url ?? record?.notes ?? '';
}

export function formatPlurbTable(plurbs: Plurb[], now: Date = new Date()): string {
  const rows: Row[] = plurbs.map((plurb) => ({ plurb, agent: liveness(plurb) }));
  const columns: Column<Row>[] = [
    { header: 'ID', value: (r) => r.plurb.id },
    { header: 'Task', value: (r) => r.plurb.taskName },
    { header: 'Status', value: (r) => formatStatus(r.plurb.status) },
    { header: 'Progress', value: (r) => (r.plurb.record ? `${r.plurb.record.progress_percent}%` : '—') },
    { header: 'Phase', value: (r) => r.plurb.record?.phase || '—' },
    { header: 'Agent', value: (r) => r.agent ?? '—' },
    { header: 'Updated', value: (r) => formatAge(r.plurb.record?.last_update, now) },
    { header: 'Note', value: (r) => note(r.plurb) },
  ];
  return formatTable(rows, columns);
}

export function plurbJson(plurb: Plurb): Record<string, unknown> {
  return {
    id: plurb.id,
    taskName: plurb.taskName,
    branch: plurb.branch,
    path: plurb.path,
    status: plurb.status,
    agent: liveness(plurb),
    ...(plurb.problem ? { problem: plurb.problem } : {}),
    record: plurb.record,
  };
}

export async function statusCommand(options: StatusOptions): Promise<void> {
  const root = await requireWorkspaceRoot();
  const tasks = await loadTasksIfPresent(todoPath(root));
  const plurbs = await listPlurbs(root, { tasks });

  if (options.json) {
    output({ plurbs: plurbs.map(plurbJson) }, true);
    return;
  }

  if (plurbs.length === 0) {
    console.log('No plurbs yet. Use `pluribus workon <task>` to start one.');
    return;
  }
  console.log(formatPlurbTable(plurbs));
}
