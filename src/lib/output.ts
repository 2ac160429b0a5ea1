import { ArborError } from './errors.js';
import type { AheadBehind } from '../types/worktree.js';
import type { WorktreeState } from '../types/request.js';

const RESET = '\x1b[0m';
const BOLD = '\x1b[1m';
const DIM = '\x1b[2m';
const RED = '\x1b[31m';
const GREEN = '\x1b[32m';
const YELLOW = '\x1b[33m';
const CYAN = '\x1b[36m';
const GRAY = '\x1b[90m';

const ANSI_PATTERN = /\x1b\[[0-9;]*m/g;

const STATE_COLORS: Record<WorktreeState, string> = {
  listed: GRAY,
  'session-pending': YELLOW,
  'session-ready': GREEN,
  deleting: RED,
};

export function stripAnsi(value: string): string {
  return value.replace(ANSI_PATTERN, '');
}

export function formatState(state: WorktreeState): string {
  return `${STATE_COLORS[state]}${state}${RESET}`;
}

/** `↑2 ↓1`, or an empty string when in sync. */
export function formatAheadBehind({ ahead, behind }: AheadBehind): string {
  const parts: string[] = [];
  if (ahead > 0) parts.push(`${GREEN}↑${ahead}${RESET}`);
  if (behind > 0) parts.push(`${YELLOW}↓${behind}${RESET}`);
  return parts.join(' ');
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
    const code = error instanceof ArborError ? error.code : 'UNKNOWN';
    console.error(JSON.stringify({ error: message, code }));
  } else {
    console.error(`${RED}Error:${RESET} ${message}`);
  }
}

export interface Column {
  header: string;
  key: string;
  width?: number;
  format?: (value: unknown) => string;
}

export function formatTable(rows: Record<string, unknown>[], columns: Column[]): string {
  if (rows.length === 0) return 'No results.';

  const cell = (col: Column, row: Record<string, unknown>) =>
    col.format ? col.format(row[col.key]) : String(row[col.key] ?? '');

  const widths = columns.map((col) => {
    const maxDataLen = rows.reduce((max, row) => Math.max(max, stripAnsi(cell(col, row)).length), 0);
    return col.width ?? Math.max(col.header.length, maxDataLen);
  });

  const header = columns
    .map((col, i) => `${BOLD}${col.header.padEnd(widths[i])}${RESET}`)
    .join('  ');

  const separator = widths.map((w) => DIM + '─'.repeat(w) + RESET).join('  ');

  const body = rows.map((row) =>
    columns
      .map((col, i) => {
        const val = cell(col, row);
        const padding = Math.max(0, widths[i] - stripAnsi(val).length);
        return val + ' '.repeat(padding);
      })
      .join('  '),
  ).join('\n');

  return `${header}\n${separator}\n${body}`;
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

export function reportWarnings(warnings: readonly ArborError[]): void {
  for (const w of warnings) warn(w.message);
}
