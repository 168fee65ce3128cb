import { todoPath } from '../lib/paths.js';
import { InvalidArgsError } from '../lib/errors.js';
import { dim, heading, info, warn } from '../lib/output.js';
import { loadConfig } from '../core/config.js';
import { loadTasksIfPresent } from '../core/tasks.js';
import { startStatusWatcher } from '../core/watcher.js';
import { requireWorkspaceRoot } from '../core/workspace.js';
import { formatPlurbTable } from './status.js';

export interface WatchOptions {
  interval?: string;
}

function parseInterval(value: string): number {
  const seconds = Number(value);
  if (!Number.isFinite(seconds) || seconds <= 0) {
    throw new InvalidArgsError(`Invalid interval: "${value}" (expected a positive number of seconds)`);
  }
  return seconds;
}

/** Live status table until Ctrl+C. */
export async function watchCommand(options: WatchOptions): Promise<void> {
  const root = await requireWorkspaceRoot();
  const config = await loadConfig(root);
  const seconds = options.interval !== undefined ? parseInterval(options.interval) : config.watchInterval;
  const tasks = await loadTasksIfPresent(todoPath(root));

  const controller = new AbortController();
  const onSigint = () => controller.abort();
  process.once('SIGINT', onSigint);

  const watcher = startStatusWatcher(root, (plurbs) => {
    console.clear();
    console.log(heading(`Pluribus — ${plurbs.length} plurb(s)`));
    console.log(dim(`${new Date().toLocaleTimeString()} · full rescan every ${seconds}s · Ctrl+C to stop`));
    console.log();
    console.log(formatPlurbTable(plurbs));
  }, {
    rescanIntervalMs: seconds * 1000,
    tasks,
    signal: controller.signal,
    onError: (err) => warn(`Refresh failed: ${err instanceof Error ? err.message : String(err)}`),
  });

  if (watcher.kind === 'poll') {
    warn('Recursive file watching is unavailable here; polling instead');
  }

  await new Promise<void>((resolve) => {
    controller.signal.addEventListener('abort', () => resolve(), { once: true });
  });
  process.off('SIGINT', onSigint);
  console.log();
  info('Stopped watching');
}
