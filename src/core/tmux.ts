import { execa, ExecaError } from 'execa';
import { TmuxNotFoundError } from '../lib/errors.js';
import { execaEnv } from '../lib/env.js';
import type { SessionBackend } from '../types/session.js';

const HISTORY_LIMIT = '50000';

export async function checkTmux(): Promise<void> {
  try {
    await execa('tmux', ['-V'], execaEnv);
  } catch {
    throw new TmuxNotFoundError();
  }
}

export async function sessionExists(name: string): Promise<boolean> {
  try {
    // Use '=' prefix for exact session name matching to avoid tmux prefix ambiguity
    // (e.g., 'arbor-fix' would otherwise match 'arbor-fix-terminal')
    await execa('tmux', ['has-session', '-t', `=${name}`], execaEnv);
    return true;
  } catch {
    return false;
  }
}

export async function newSession(name: string, cwd: string, command?: string): Promise<void> {
  const args = ['new-session', '-d', '-s', name, '-c', cwd];
  if (command) {
    args.push(command);
  }
  await execa('tmux', args, execaEnv);
  await execa('tmux', ['set-option', '-t', `=${name}`, 'history-limit', HISTORY_LIMIT], execaEnv);
}

/**
 * Hand the terminal to the session. Inside tmux the client is switched and
 * the call returns immediately; outside, tmux owns the TTY until detach.
 */
export async function attachSession(name: string): Promise<void> {
  if (isInsideTmux()) {
    await execa('tmux', ['switch-client', '-t', `=${name}`], execaEnv);
    return;
  }
  await execa('tmux', ['attach-session', '-t', `=${name}`], { ...execaEnv, stdio: 'inherit' });
}

export async function killSession(name: string): Promise<void> {
  await execa('tmux', ['kill-session', '-t', `=${name}`], execaEnv);
}

export async function renameSession(oldName: string, newName: string): Promise<void> {
  await execa('tmux', ['rename-session', '-t', `=${oldName}`, newName], execaEnv);
}

export async function listSessions(): Promise<string[]> {
  try {
    const result = await execa('tmux', ['list-sessions', '-F', '#{session_name}'], execaEnv);
    return result.stdout.trim().split('\n').filter(Boolean);
  } catch (err) {
    // No server running means no sessions
    if (isTmuxNotFoundError(err)) return [];
    throw err;
  }
}

export function isInsideTmux(): boolean {
  return !!process.env.TMUX;
}

/**
 * Check if a tmux error is a benign "not found" error (target already gone,
 * or no server running at all).
 */
export function isTmuxNotFoundError(err: unknown): boolean {
  if (!(err instanceof ExecaError)) return false;
  const msg = (String(err.stderr ?? '')).toLowerCase();
  return msg.includes("can't find") ||
    msg.includes('not found') ||
    msg.includes('no such') ||
    msg.includes('no server running') ||
    msg.includes('error connecting to');
}

export class TmuxBackend implements SessionBackend {
  checkAvailable(): Promise<void> { return checkTmux(); }
  hasSession(name: string): Promise<boolean> { return sessionExists(name); }
  newSession(name: string, cwd: string, command?: string): Promise<void> { return newSession(name, cwd, command); }
  attachSession(name: string): Promise<void> { return attachSession(name); }
  killSession(name: string): Promise<void> { return killSession(name); }
  renameSession(oldName: string, newName: string): Promise<void> { return renameSession(oldName, newName); }
  listSessions(): Promise<string[]> { return listSessions(); }
  isInsideSession(): boolean { return isInsideTmux(); }
}
