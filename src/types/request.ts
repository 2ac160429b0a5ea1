import type { ArborError, OperationInProgressError } from '../lib/errors.js';
import type { SessionKind } from './session.js';
import type { Worktree } from './worktree.js';

export type ReconcileRequest =
  | { kind: 'switch'; path: string; session: SessionKind }
  | { kind: 'create'; branch: string; fromExisting?: boolean; baseBranch?: string }
  | { kind: 'delete'; path: string; force?: boolean }
  | { kind: 'refresh' }
  | { kind: 'fetch' }
  | { kind: 'pull'; path: string; baseBranch?: string }
  | { kind: 'push'; path: string }
  | { kind: 'rename-branch'; path: string; newBranch: string }
  | { kind: 'change-base-branch'; path: string; newBase: string }
  | { kind: 'checkout'; path: string; branch: string }
  | { kind: 'kill-session'; path: string; session: SessionKind }
  | { kind: 'record-pr'; path: string; url: string };

export type RequestKind = ReconcileRequest['kind'];

export type WorktreeState = 'listed' | 'session-pending' | 'session-ready' | 'deleting';

interface ResultBase {
  requestId: string;
  kind: RequestKind;
  /** Worktree the request targeted; the repository root for repository-wide requests. */
  path: string;
}

export interface OkResult extends ResultBase {
  status: 'ok';
  worktree?: Worktree;
  sessionName?: string;
  /** Session was created by this request rather than found. */
  created?: boolean;
  added?: string[];
  removed?: string[];
  warnings: ArborError[];
}

export interface FailedResult extends ResultBase {
  status: 'failed';
  error: ArborError;
}

export interface RejectedResult extends ResultBase {
  status: 'rejected';
  error: OperationInProgressError;
}

/** Result of an out-of-band task whose worktree vanished or was superseded. */
export interface DiscardedResult extends ResultBase {
  status: 'discarded';
}

export type ResultEvent = OkResult | FailedResult | RejectedResult | DiscardedResult;

export interface WorktreeView {
  worktree: Worktree;
  state: WorktreeState;
  agentInitialized: boolean;
  pending?: RequestKind;
}

export interface Snapshot {
  repoRoot: string;
  worktrees: WorktreeView[];
  /** Default cursor: last switched-to worktree, else the first entry. */
  selectedPath?: string;
}
