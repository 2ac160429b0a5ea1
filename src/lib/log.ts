import fs from 'node:fs/promises';
import { debugLogPath } from './paths.js';

export type LogFn = (message: string) => void;

export function debugEnabled(): boolean {
  const value = process.env.ARBOR_DEBUG;
  return value !== undefined && value !== '' && value !== '0';
}

export function formatLogLine(message: string, now: Date = new Date()): string {
  return `[${now.toISOString()}] ${message}\n`;
}

/**
 * Append a line to the debug log. No-op unless ARBOR_DEBUG is set.
 * The terminal belongs to the user (or to tmux), so nothing goes to stdout.
 */
export async function appendDebugLog(message: string): Promise<void> {
  if (!debugEnabled()) return;
  await fs.appendFile(debugLogPath(), formatLogLine(message), 'utf-8');
}

export const debugLog: LogFn = (message) => {
  appendDebugLog(message).catch((err: unknown) => {
    const reason = err instanceof Error ? err.message : String(err);
    process.stderr.write(`arbor: could not write debug log: ${reason}\n`);
  });
};
