export interface AheadBehind {
  ahead: number;
  behind: number;
}

export interface Worktree {
  /** Absolute path; unique key, never changes. */
  path: string;
  /** Empty when HEAD is detached. */
  branch: string;
  isRoot: boolean;
  hasUncommittedChanges: boolean;
  aheadBehind: AheadBehind;
  prUrl?: string;
  lastKnownCommitHash: string;
}

export interface CreateWorktreeSpec {
  branch: string;
  /** Check out an existing branch instead of cutting a new one. */
  fromExisting?: boolean;
  baseBranch?: string;
}

/** Version-control primitives the reconciler drives. Implementations keep no state. */
export interface WorktreeRepository {
  readonly repoRoot: string;
  listWorktrees(): Promise<Worktree[]>;
  pathFor(branch: string): string;
  createWorktree(branch: string, fromExisting: boolean, baseBranch?: string): Promise<Worktree>;
  deleteWorktree(wtPath: string, force: boolean): Promise<void>;
  fetch(): Promise<void>;
  pull(wtPath: string, baseBranch: string): Promise<void>;
  push(wtPath: string, branch: string): Promise<void>;
  renameBranch(oldName: string, newName: string): Promise<void>;
  changeBaseBranch(wtPath: string, newBase: string): Promise<void>;
  checkout(wtPath: string, branch: string): Promise<void>;
}
