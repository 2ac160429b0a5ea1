import fs from 'node:fs/promises';
import { ArborError } from '../lib/errors.js';
import { envVar } from '../lib/env.js';

/**
 * Instruction for the shell wrapper: arbor writes one line, exits, and the
 * wrapper cds into `path` and attaches to `sessionName` itself.
 *
 * Line format (unversioned; readers tolerate missing trailing fields):
 *   path|branch|auto_agent|terminal_only|script_command|session_name|agent_initialized
 */
export interface HandoffRecord {
  path: string;
  branch: string;
  autoAgent: boolean;
  terminalOnly: boolean;
  /** Command the wrapper runs when it has to create the session. */
  scriptCommand: string;
  sessionName: string;
  agentInitialized: boolean;
}

const SEPARATOR = '|';
const MIN_FIELDS = 3;

export function handoffFile(): string | undefined {
  return process.env[envVar('SWITCH_FILE')] || undefined;
}

export function formatHandoff(record: HandoffRecord): string {
  const fields = [
    record.path,
    record.branch,
    String(record.autoAgent),
    String(record.terminalOnly),
    record.scriptCommand,
    record.sessionName,
    String(record.agentInitialized),
  ];
  const bad = fields.find((f) => f.includes(SEPARATOR) || /[\r\n]/.test(f));
  if (bad !== undefined) {
    throw new ArborError(`Cannot hand off a value containing "|" or a newline: ${JSON.stringify(bad)}`, 'INVALID_ARGS');
  }
  return fields.join(SEPARATOR);
}

export function parseHandoff(text: string): HandoffRecord {
  const line = text.split('\n', 1)[0].trim();
  const fields = line.split(SEPARATOR);
  // The shell wrapper only acts on lines with at least two separators
  if (fields.length < MIN_FIELDS || !fields[0]) {
    throw new ArborError(`Malformed hand-off line: ${JSON.stringify(line)}`, 'INVALID_ARGS');
  }
  const [path, branch, autoAgent, terminalOnly, scriptCommand, sessionName, agentInitialized] = fields;
  return {
    path,
    branch,
    autoAgent: autoAgent === 'true',
    terminalOnly: terminalOnly === 'true',
    scriptCommand: scriptCommand ?? '',
    sessionName: sessionName ?? '',
    agentInitialized: agentInitialized === 'true',
  };
}

export async function writeHandoff(file: string, record: HandoffRecord): Promise<void> {
  await fs.writeFile(file, formatHandoff(record), 'utf-8');
}
