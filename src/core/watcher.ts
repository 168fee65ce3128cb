import fs from 'node:fs';
import { isStatusFile, worktreesDir } from '../lib/paths.js';
import { compareIds } from '../lib/id.js';
import { listPlurbs, loadPlurb, type ListPlurbsOptions } from './registry.js';
import type { Plurb } from '../types/plurb.js';

/** One plurb's record changed, or something changed that needs a full rescan. */
export type Change = { kind: 'plurb'; id: string } | { kind: 'rescan' };

export type ChangeFn = (change: Change) => void;

export type ErrorFn = (error: unknown) => void;

export type PublishFn = (plurbs: Plurb[]) => void;

export interface ChangeFeed {
  kind: 'native' | 'poll';
  close(): void;
}

export interface StatusWatcher {
  kind: ChangeFeed['kind'];
  stop(): void;
}

export interface StatusWatcherOptions extends ListPlurbsOptions {
  debounceMs?: number;
  /** Full rescan period. Also the tick of the polling feed. */
  rescanIntervalMs?: number;
  onError?: ErrorFn;
  signal?: AbortSignal;
}

/**
 * Recursive `fs.watch` on the worktrees directory. Status writes map to their
 * plurb; a top-level entry appearing or vanishing, or an event without a file
 * name, asks for a rescan. Throws where recursive watching is unsupported.
 */
export function createNativeFeed(dir: string, onChange: ChangeFn, onError?: ErrorFn): ChangeFeed {
  const watcher = fs.watch(dir, { recursive: true }, (_event, filename) => {
    if (!filename) {
      onChange({ kind: 'rescan' });
      return;
    }
    const parts = filename.split(/[\\/]/);
    if (parts.length === 1) {
      onChange({ kind: 'rescan' });
    } else if (isStatusFile(filename)) {
      onChange({ kind: 'plurb', id: parts[0] });
    }
  });
  watcher.on('error', (err) => onError?.(err));

  return {
    kind: 'native',
    close() {
      watcher.close();
    },
  };
}

export function createPollFeed(intervalMs: number, onChange: ChangeFn): ChangeFeed {
  const timer = setInterval(() => onChange({ kind: 'rescan' }), intervalMs);
  return {
    kind: 'poll',
    close() {
      clearInterval(timer);
    },
  };
}

export function createChangeFeed(
  dir: string,
  intervalMs: number,
  onChange: ChangeFn,
  onError?: ErrorFn,
): ChangeFeed {
  try {
    return createNativeFeed(dir, onChange, onError);
  } catch {
    return createPollFeed(intervalMs, onChange);
  }
}

/**
 * Publish a sorted snapshot of every plurb, then a fresh one whenever a status
 * record changes.
 *
 * Change events are debounced and only the plurbs they name are re-read. A
 * periodic full rescan repairs anything the feed coalesced or dropped.
 * Refreshes never overlap: changes that arrive during one are folded into the
 * next. Nothing is published after `stop()` or an abort.
 */
export function startStatusWatcher(
  workspaceRoot: string,
  publish: PublishFn,
  options?: StatusWatcherOptions,
): StatusWatcher {
  const debounceMs = options?.debounceMs ?? 200;
  const rescanIntervalMs = options?.rescanIntervalMs ?? 5000;
  const onError = options?.onError;
  const readOptions: ListPlurbsOptions = { tasks: options?.tasks, read: options?.read };

  const snapshot = new Map<string, Plurb>();
  const pendingIds = new Set<string>();
  let pendingFull = true;
  let debounceTimer: ReturnType<typeof setTimeout> | null = null;
  let refreshing = false;
  let stopped = false;

  function report(err: unknown): void {
    if (!stopped) onError?.(err);
  }

  async function refresh(): Promise<void> {
    const full = pendingFull;
    const ids = [...pendingIds];
    pendingFull = false;
    pendingIds.clear();

    if (full) {
      const plurbs = await listPlurbs(workspaceRoot, readOptions);
      snapshot.clear();
      for (const plurb of plurbs) snapshot.set(plurb.id, plurb);
    } else {
      const plurbs = await Promise.all(ids.map((id) => loadPlurb(workspaceRoot, id, readOptions)));
      for (const plurb of plurbs) snapshot.set(plurb.id, plurb);
    }

    if (stopped) return;
    publish([...snapshot.values()].sort((a, b) => compareIds(a.id, b.id)));
  }

  async function flush(): Promise<void> {
    if (refreshing || stopped) return;
    refreshing = true;
    try {
      while (!stopped && (pendingFull || pendingIds.size > 0)) {
        try {
          await refresh();
        } catch (err) {
          report(err);
        }
      }
    } finally {
      refreshing = false;
    }
  }

  function onChange(change: Change): void {
    if (stopped) return;
    if (change.kind === 'rescan') pendingFull = true;
    else pendingIds.add(change.id);

    if (debounceTimer) clearTimeout(debounceTimer);
    debounceTimer = setTimeout(() => {
      debounceTimer = null;
      flush().catch(report);
    }, debounceMs);
  }

  const feed = createChangeFeed(worktreesDir(workspaceRoot), rescanIntervalMs, onChange, report);
  const rescanTimer = feed.kind === 'native'
    ? setInterval(() => onChange({ kind: 'rescan' }), rescanIntervalMs)
    : null;

  function stop(): void {
    if (stopped) return;
    stopped = true;
    if (debounceTimer) clearTimeout(debounceTimer);
    if (rescanTimer) clearInterval(rescanTimer);
    feed.close();
  }

  if (options?.signal?.aborted) {
    stop();
  } else {
    options?.signal?.addEventListener('abort', stop, { once: true });
    flush().catch(report);
  }

  return { kind: feed.kind, stop };
}
