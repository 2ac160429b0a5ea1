import path from 'node:path';
import { openContext } from '../core/context.js';
import { sessionKey } from '../core/reconciler.js';
import {
  formatAheadBehind,
  formatState,
  formatTable,
  output,
  type Column,
} from '../lib/output.js';
import type { SessionRegistry } from '../core/sessions.js';
import type { Snapshot, WorktreeState } from '../types/request.js';
import { SESSION_KINDS, type SessionKind } from '../types/session.js';

export interface ListOptions {
  json?: boolean;
}

export interface WorktreeRow {
  path: string;
  branch: string;
  isRoot: boolean;
  state: WorktreeState;
  selected: boolean;
  dirty: boolean;
  ahead: number;
  behind: number;
  sessions: SessionKind[];
  agentInitialized: boolean;
  prUrl?: string;
}

/** Snapshot rows with live session existence, queried per worktree. */
export async function buildRows(snapshot: Snapshot, registry: SessionRegistry): Promise<WorktreeRow[]> {
  return Promise.all(snapshot.worktrees.map(async (view) => {
    const wt = view.worktree;
    const key = sessionKey(wt);
    const sessions: SessionKind[] = [];
    for (const kind of SESSION_KINDS) {
      if (await registry.exists(registry.deriveName(key, kind))) sessions.push(kind);
    }
    return {
      path: wt.path,
      branch: wt.branch,
      isRoot: wt.isRoot,
      state: view.state,
      selected: wt.path === snapshot.selectedPath,
      dirty: wt.hasUncommittedChanges,
      ahead: wt.aheadBehind.ahead,
      behind: wt.aheadBehind.behind,
      sessions,
      agentInitialized: view.agentInitialized,
      prUrl: wt.prUrl,
    };
  }));
}

export function renderRows(rows: WorktreeRow[], repoRoot: string): string {
  const columns: Column[] = [
    { header: '', key: 'marker' },
    { header: 'Branch', key: 'branch' },
    { header: 'Path', key: 'path' },
    { header: 'State', key: 'state', format: (v) => formatState(toState(v)) },
    { header: 'Sessions', key: 'sessions' },
    { header: 'Sync', key: 'sync' },
    { header: 'PR', key: 'pr' },
  ];
  const display = rows.map((row) => ({
    marker: row.selected ? '>' : ' ',
    branch: `${row.branch || '(detached)'}${row.dirty ? ' *' : ''}${row.isRoot ? ' (root)' : ''}`,
    path: path.relative(repoRoot, row.path) || '.',
    state: row.state,
    sessions: row.sessions.join(', '),
    sync: formatAheadBehind({ ahead: row.ahead, behind: row.behind }),
    pr: row.prUrl ?? '',
  }));
  return formatTable(display, columns);
}

function toState(value: unknown): WorktreeState {
  switch (value) {
    case 'session-pending':
    case 'session-ready':
    case 'deleting':
      return value;
    default:
      return 'listed';
  }
}

export async function listCommand(options: ListOptions = {}): Promise<void> {
  const { repoRoot, baseBranch, registry, reconciler } = await openContext();
  const snapshot = reconciler.snapshot();
  const rows = await buildRows(snapshot, registry);

  if (options.json) {
    output({ repoRoot, baseBranch, selectedPath: snapshot.selectedPath, worktrees: rows }, true);
    return;
  }
  console.log(renderRows(rows, repoRoot));
}
