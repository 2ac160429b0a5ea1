export type ErrorSeverity = 'error' | 'warning';

export class ArborError extends Error {
  public severity: ErrorSeverity = 'error';

  constructor(
    message: string,
    public readonly code: string,
    public readonly exitCode: number = 1,
  ) {
    super(message);
    this.name = 'ArborError';
  }
}

export class TmuxNotFoundError extends ArborError {
  constructor() {
    super(
      'tmux is not installed or not in PATH. Install it with: brew install tmux',
      'TMUX_NOT_FOUND',
    );
    this.name = 'TmuxNotFoundError';
  }
}

export class NotAGitRepositoryError extends ArborError {
  constructor(dir: string) {
    super(
      `Not a git repository: ${dir}`,
      'NOT_GIT_REPO',
    );
    this.name = 'NotAGitRepositoryError';
  }
}

export class WorktreeNotFoundError extends ArborError {
  constructor(ref: string) {
    super(
      `Worktree not found: ${ref}`,
      'WORKTREE_NOT_FOUND',
    );
    this.name = 'WorktreeNotFoundError';
  }
}

export class BranchAlreadyCheckedOutError extends ArborError {
  constructor(branch: string, where?: string) {
    super(
      where
        ? `Branch ${branch} is already checked out at ${where}`
        : `Branch ${branch} is already checked out in another worktree`,
      'BRANCH_CHECKED_OUT',
    );
    this.name = 'BranchAlreadyCheckedOutError';
  }
}

export class InvalidBranchNameError extends ArborError {
  constructor(branch: string) {
    super(
      `Invalid branch name: ${JSON.stringify(branch)}`,
      'INVALID_BRANCH_NAME',
    );
    this.name = 'InvalidBranchNameError';
  }
}

export class UncommittedChangesError extends ArborError {
  constructor(wtPath: string) {
    super(
      `Worktree has uncommitted changes: ${wtPath}. Use --force to delete anyway.`,
      'UNCOMMITTED_CHANGES',
    );
    this.name = 'UncommittedChangesError';
  }
}

export class WorktreeCreationFailedError extends ArborError {
  constructor(
    branch: string,
    public readonly stderr: string,
  ) {
    super(
      `Failed to create worktree for ${branch}: ${stderr || 'unknown git error'}`,
      'WORKTREE_CREATE_FAILED',
    );
    this.name = 'WorktreeCreationFailedError';
  }
}

export class RemoteUnreachableError extends ArborError {
  constructor(detail: string) {
    super(`Remote unreachable: ${detail}`, 'REMOTE_UNREACHABLE');
    this.name = 'RemoteUnreachableError';
  }
}

export class MergeConflictError extends ArborError {
  constructor(detail: string) {
    super(`Merge conflict: ${detail}`, 'MERGE_CONFLICT');
    this.name = 'MergeConflictError';
  }
}

export class AuthenticationRequiredError extends ArborError {
  constructor(detail: string) {
    super(`Authentication required: ${detail}`, 'AUTH_REQUIRED');
    this.name = 'AuthenticationRequiredError';
  }
}

export class GitCommandError extends ArborError {
  constructor(
    command: string,
    public readonly stderr: string,
  ) {
    super(`git ${command} failed: ${stderr || 'unknown error'}`, 'GIT_FAILED');
    this.name = 'GitCommandError';
  }
}

export class SessionNotFoundError extends ArborError {
  constructor(name: string) {
    super(`Session not found: ${name}`, 'SESSION_NOT_FOUND');
    this.name = 'SessionNotFoundError';
  }
}

export class SessionCreateFailedError extends ArborError {
  constructor(name: string, detail: string) {
    super(`Failed to create session ${name}: ${detail}`, 'SESSION_CREATE_FAILED');
    this.name = 'SessionCreateFailedError';
  }
}

export class OperationInProgressError extends ArborError {
  constructor(
    target: string,
    public readonly pendingKind: string,
  ) {
    super(
      `Operation in progress for ${target} (${pendingKind}). Retry once it finishes.`,
      'OPERATION_IN_PROGRESS',
    );
    this.name = 'OperationInProgressError';
  }
}

export class SetupScriptFailedError extends ArborError {
  constructor(
    command: string,
    public readonly scriptExitCode: number | undefined,
    detail?: string,
  ) {
    const reason = scriptExitCode === undefined
      ? detail ?? 'could not be started'
      : `exited with code ${scriptExitCode}`;
    super(`Setup script "${command}" ${reason}`, 'SETUP_SCRIPT_FAILED');
    this.name = 'SetupScriptFailedError';
    this.severity = 'warning';
  }
}

export class ConfigLockError extends ArborError {
  constructor() {
    super(
      'Could not acquire config lock. Another arbor process may be writing it.',
      'CONFIG_LOCK',
    );
    this.name = 'ConfigLockError';
  }
}

export function toArborError(err: unknown): ArborError {
  if (err instanceof ArborError) return err;
  const message = err instanceof Error ? err.message : String(err);
  return new ArborError(message, 'UNKNOWN');
}
