import type { PlurbStatus } from '../types/status.js';

const RESET = '\x1b[0m';
const BOLD = '\x1b[1m';
const DIM = '\x1b[2m';
const RED = '\x1b[31m';
const GREEN = '\x1b[32m';
const YELLOW = '\x1b[33m';
const BLUE = '\x1b[34m';
const CYAN = '\x1b[36m';
const GRAY = '\x1b[90m';

const ANSI_PATTERN = /\x1b\[[0-9;]*m/g;

const STATUS_COLORS: Record<PlurbStatus, string> = {
  pending: GRAY,
  in_progress: GREEN,
  blocked: YELLOW,
  completed: BLUE,
  failed: RED,
  unknown: RED + BOLD,
};

export function formatStatus(status: PlurbStatus): string {
  const color = STATUS_COLORS[status] ?? RESET;
  return `${color}${status}${RESET}`;
}

export function stripAnsi(text: string): string {
  return text.replace(ANSI_PATTERN, '');
}

export function output(data: unknown, json: boolean): void {
  if (json) {
    console.log(JSON.stringify(data, null, 2));
  } else {
    console.log(data);
  }
}

export function outputError(error: unknown, json: boolean): void {
  const message = error instanceof Error ? error.message : String(error);
  if (json) {
    const code = error instanceof Error && 'code' in error && typeof error.code === 'string'
      ? error.code
      : 'UNKNOWN';
    console.error(JSON.stringify({ error: message, code }));
  } else {
    console.error(`${RED}Error:${RESET} ${message}`);
  }
}

export interface Column<Row> {
  header: string;
  width?: number;
  value: (row: Row) => string;
}

export function formatTable<Row>(rows: Row[], columns: Column<Row>[]): string {
  if (rows.length === 0) return 'No results.';

  const cells = rows.map((row) => columns.map((col) => col.value(row)));

  // Widths ignore ANSI escapes
  const widths = columns.map((col, i) => {
    const maxDataLen = cells.reduce((max, rowCells) => Math.max(max, stripAnsi(rowCells[i]).length), 0);
    return col.width ?? Math.max(col.header.length, maxDataLen);
  });

  const header = columns
    .map((col, i) => `${BOLD}${col.header.padEnd(widths[i])}${RESET}`)
    .join('  ');

  const separator = widths.map((w) => DIM + '─'.repeat(w) + RESET).join('  ');

  const body = cells.map((rowCells) =>
    rowCells
      .map((val, i) => {
        const padding = Math.max(0, widths[i] - stripAnsi(val).length);
        return val + ' '.repeat(padding);
      })
      .join('  '),
  ).join('\n');

  return `${header}\n${separator}\n${body}`;
}

export function formatAge(iso: string | null | undefined, now: Date = new Date()): string {
  if (!iso) return '—';
  const then = new Date(iso).getTime();
  if (isNaN(then)) return '—';
  const diffMin = Math.floor((now.getTime() - then) / 60_000);
  if (diffMin < 1) return 'just now';
  if (diffMin < 60) return `${diffMin}m ago`;
  const diffHr = Math.floor(diffMin / 60);
  if (diffHr < 24) return `${diffHr}h ${diffMin % 60}m ago`;
  return `${Math.floor(diffHr / 24)}d ago`;
}

export function heading(text: string): string {
  return `${BOLD}${text}${RESET}`;
}

export function dim(text: string): string {
  return `${DIM}${text}${RESET}`;
}

export function info(message: string): void {
  console.log(`${CYAN}▸${RESET} ${message}`);
}

export function success(message: string): void {
  console.log(`${GREEN}✓${RESET} ${message}`);
}

export function warn(message: string): void {
  console.log(`${YELLOW}⚠${RESET} ${message}`);
}
