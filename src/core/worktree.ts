import { execa, ExecaError } from 'execa';
import { WORKTREES_DIR, worktreePath as getWorktreePath } from '../lib/paths.js';
import { worktreeDirName } from '../lib/name.js';
import {
  ArborError,
  AuthenticationRequiredError,
  BranchAlreadyCheckedOutError,
  GitCommandError,
  InvalidBranchNameError,
  MergeConflictError,
  NotAGitRepositoryError,
  RemoteUnreachableError,
  UncommittedChangesError,
  WorktreeCreationFailedError,
  WorktreeNotFoundError,
} from '../lib/errors.js';
import { gitOptions } from '../lib/env.js';
import type { AheadBehind, Worktree, WorktreeRepository } from '../types/worktree.js';

/**
 * The main checkout, even when `cwd` is inside a linked worktree: config
 * records, `.arbor.yaml` and `.worktrees/` all hang off it.
 */
export async function getRepoRoot(cwd?: string): Promise<string> {
  const dir = cwd ?? process.cwd();
  let stdout: string;
  try {
    const result = await execa('git', ['worktree', 'list', '--porcelain'], gitOptions(dir));
    stdout = result.stdout;
  } catch {
    throw new NotAGitRepositoryError(dir);
  }
  const main = parseWorktreeList(stdout)[0];
  if (!main) throw new NotAGitRepositoryError(dir);
  return main.path;
}

export async function getCurrentBranch(cwd?: string): Promise<string> {
  const result = await execa('git', ['branch', '--show-current'], gitOptions(cwd ?? process.cwd()));
  return result.stdout.trim();
}

/**
 * Branch new worktrees are cut from when nothing is configured:
 * origin's HEAD, then the root checkout's branch, then `main`.
 */
export async function getDefaultBranch(repoRoot: string): Promise<string> {
  try {
    const result = await execa(
      'git',
      ['symbolic-ref', '--short', 'refs/remotes/origin/HEAD'],
      gitOptions(repoRoot),
    );
    const ref = result.stdout.trim();
    if (ref) return ref.replace(/^origin\//, '');
  } catch {
    // No remote HEAD
  }
  try {
    const current = await getCurrentBranch(repoRoot);
    if (current) return current;
  } catch {
    // Detached or unreadable
  }
  return 'main';
}

export interface PorcelainEntry {
  path: string;
  head: string;
  branch: string;
  bare: boolean;
  detached: boolean;
  prunable: boolean;
}

/** Parse `git worktree list --porcelain`. The main worktree is always first. */
export function parseWorktreeList(stdout: string): PorcelainEntry[] {
  const entries: PorcelainEntry[] = [];
  let current: PorcelainEntry | null = null;

  for (const line of stdout.split('\n')) {
    if (line.startsWith('worktree ')) {
      if (current) entries.push(current);
      current = {
        path: line.slice('worktree '.length),
        head: '',
        branch: '',
        bare: false,
        detached: false,
        prunable: false,
      };
      continue;
    }
    if (!current) continue;
    if (line.startsWith('HEAD ')) {
      current.head = line.slice('HEAD '.length);
    } else if (line.startsWith('branch ')) {
      current.branch = line.slice('branch '.length).replace(/^refs\/heads\//, '');
    } else if (line === 'bare') {
      current.bare = true;
    } else if (line === 'detached') {
      current.detached = true;
    } else if (line === 'prunable' || line.startsWith('prunable ')) {
      current.prunable = true;
    }
  }
  if (current) entries.push(current);
  return entries;
}

/** Parse `git rev-list --left-right --count <base>...HEAD` ("behind<TAB>ahead"). */
export function parseAheadBehind(stdout: string): AheadBehind {
  const [left, right] = stdout.trim().split(/\s+/);
  const behind = Number.parseInt(left ?? '', 10);
  const ahead = Number.parseInt(right ?? '', 10);
  return {
    ahead: Number.isNaN(ahead) ? 0 : ahead,
    behind: Number.isNaN(behind) ? 0 : behind,
  };
}

/**
 * Root first, then branches by most recent commit, then path.
 * `recency` maps branch name to rank (0 = most recent).
 */
export function sortWorktrees(worktrees: Worktree[], recency: Map<string, number>): Worktree[] {
  const rank = (wt: Worktree) => recency.get(wt.branch) ?? Number.POSITIVE_INFINITY;
  return [...worktrees].sort((a, b) => {
    if (a.isRoot !== b.isRoot) return a.isRoot ? -1 : 1;
    const byRank = rank(a) - rank(b);
    if (byRank !== 0 && !Number.isNaN(byRank)) return byRank;
    return a.path < b.path ? -1 : a.path > b.path ? 1 : 0;
  });
}

/** Map stderr from fetch/pull/push onto the remote error taxonomy. */
export function classifyRemoteError(stderr: string): ArborError | undefined {
  if (/CONFLICT|Automatic merge failed/.test(stderr)) {
    return new MergeConflictError(firstLine(stderr));
  }
  if (/Authentication failed|could not read Username|could not read Password|terminal prompts disabled|Permission denied|returned error: 403/i.test(stderr)) {
    return new AuthenticationRequiredError(firstLine(stderr));
  }
  if (/Could not resolve host|unable to access|Connection refused|Connection timed out|Network is unreachable|Could not read from remote repository|does not appear to be a git repository/i.test(stderr)) {
    return new RemoteUnreachableError(firstLine(stderr));
  }
  return undefined;
}

function firstLine(text: string): string {
  return text.split('\n').map((l) => l.trim()).find(Boolean) ?? text;
}

function stderrOf(err: unknown): string {
  if (err instanceof ExecaError) return String(err.stderr ?? '').trim();
  return err instanceof Error ? err.message : String(err);
}

/**
 * Worktree operations backed by the git CLI. Stateless apart from the
 * repository root: callers re-list to observe the effect of a mutation.
 */
export class GitWorktreeRepository implements WorktreeRepository {
  constructor(
    public readonly repoRoot: string,
    private readonly defaultBase: string,
  ) {}

  private async git(cwd: string, args: string[]): Promise<string> {
    const result = await execa('git', args, gitOptions(cwd));
    return result.stdout.trim();
  }

  private async ensureRepository(): Promise<void> {
    try {
      await this.git(this.repoRoot, ['rev-parse', '--git-dir']);
    } catch {
      throw new NotAGitRepositoryError(this.repoRoot);
    }
  }

  private async listEntries(): Promise<PorcelainEntry[]> {
    await this.ensureRepository();
    const stdout = await this.git(this.repoRoot, ['worktree', 'list', '--porcelain']);
    return parseWorktreeList(stdout).filter((e) => !e.bare && !e.prunable);
  }

  private async branchRecency(): Promise<Map<string, number>> {
    const recency = new Map<string, number>();
    try {
      const stdout = await this.git(this.repoRoot, [
        'for-each-ref',
        '--sort=-committerdate',
        '--format=%(refname:short)',
        'refs/heads/',
      ]);
      stdout.split('\n').filter(Boolean).forEach((name, i) => recency.set(name, i));
    } catch {
      // No branches yet
    }
    return recency;
  }

  /** Our own worktree directory under the root is not a change. */
  private async isDirty(wtPath: string): Promise<boolean> {
    const stdout = await this.git(wtPath, ['status', '--porcelain', '--', '.', `:(exclude)${WORKTREES_DIR}`]);
    return stdout.length > 0;
  }

  private async aheadBehind(wtPath: string): Promise<AheadBehind> {
    for (const ref of ['@{upstream}', this.defaultBase]) {
      try {
        const stdout = await this.git(wtPath, ['rev-list', '--left-right', '--count', `${ref}...HEAD`]);
        return parseAheadBehind(stdout);
      } catch {
        // Try the next reference
      }
    }
    return { ahead: 0, behind: 0 };
  }

  private async describe(entry: PorcelainEntry, isRoot: boolean): Promise<Worktree> {
    const [hasUncommittedChanges, aheadBehind] = await Promise.all([
      this.isDirty(entry.path).catch(() => false),
      this.aheadBehind(entry.path),
    ]);
    return {
      path: entry.path,
      branch: entry.detached ? '' : entry.branch,
      isRoot,
      hasUncommittedChanges,
      aheadBehind,
      lastKnownCommitHash: entry.head,
    };
  }

  async listWorktrees(): Promise<Worktree[]> {
    const entries = await this.listEntries();
    const rootPath = entries[0]?.path;
    const [worktrees, recency] = await Promise.all([
      Promise.all(entries.map((e) => this.describe(e, e.path === rootPath))),
      this.branchRecency(),
    ]);
    return sortWorktrees(worktrees, recency);
  }

  pathFor(branch: string): string {
    return getWorktreePath(this.repoRoot, worktreeDirName(branch, 'worktree'));
  }

  private async validateBranchName(branch: string): Promise<void> {
    if (!branch.trim()) throw new InvalidBranchNameError(branch);
    try {
      await this.git(this.repoRoot, ['check-ref-format', '--branch', branch]);
    } catch {
      throw new InvalidBranchNameError(branch);
    }
  }

  async createWorktree(branch: string, fromExisting: boolean, baseBranch?: string): Promise<Worktree> {
    await this.validateBranchName(branch);
    const wtPath = this.pathFor(branch);

    let args: string[];
    if (fromExisting) {
      const holder = (await this.listEntries()).find((e) => e.branch === branch);
      if (holder) throw new BranchAlreadyCheckedOutError(branch, holder.path);
      args = ['worktree', 'add', wtPath, branch];
    } else {
      args = ['worktree', 'add', '-b', branch, wtPath, baseBranch ?? this.defaultBase];
    }

    try {
      await this.git(this.repoRoot, args);
    } catch (err) {
      const stderr = stderrOf(err);
      if (/already checked out|is already used by worktree/.test(stderr)) {
        throw new BranchAlreadyCheckedOutError(branch);
      }
      throw new WorktreeCreationFailedError(branch, stderr);
    }

    const head = await this.git(wtPath, ['rev-parse', 'HEAD']);
    return {
      path: wtPath,
      branch,
      isRoot: false,
      hasUncommittedChanges: false,
      aheadBehind: { ahead: 0, behind: 0 },
      lastKnownCommitHash: head,
    };
  }

  async deleteWorktree(wtPath: string, force: boolean): Promise<void> {
    const entries = await this.listEntries();
    const index = entries.findIndex((e) => e.path === wtPath);
    if (index === -1) throw new WorktreeNotFoundError(wtPath);
    if (index === 0) throw new ArborError(`Cannot delete the root worktree: ${wtPath}`, 'ROOT_WORKTREE');

    if (!force && await this.isDirty(wtPath)) {
      throw new UncommittedChangesError(wtPath);
    }

    const args = ['worktree', 'remove', wtPath];
    if (force) {
      args.push('--force');
    }
    try {
      await this.git(this.repoRoot, args);
    } catch (err) {
      const stderr = stderrOf(err);
      if (/modified or untracked files/.test(stderr)) throw new UncommittedChangesError(wtPath);
      if (/is not a working tree/.test(stderr)) throw new WorktreeNotFoundError(wtPath);
      throw new GitCommandError('worktree remove', stderr);
    }
  }

  private async remote(cwd: string, args: string[]): Promise<void> {
    try {
      await this.git(cwd, args);
    } catch (err) {
      const stderr = stderrOf(err);
      throw classifyRemoteError(stderr) ?? new GitCommandError(args[0] ?? 'remote', stderr);
    }
  }

  async fetch(): Promise<void> {
    await this.remote(this.repoRoot, ['fetch', '--all', '--prune']);
  }

  async pull(wtPath: string, baseBranch: string): Promise<void> {
    await this.remote(wtPath, ['pull', '--no-rebase', 'origin', baseBranch]);
  }

  async push(wtPath: string, branch: string): Promise<void> {
    await this.remote(wtPath, ['push', '-u', 'origin', branch]);
  }

  async renameBranch(oldName: string, newName: string): Promise<void> {
    await this.validateBranchName(newName);
    try {
      await this.git(this.repoRoot, ['branch', '-m', oldName, newName]);
    } catch (err) {
      throw new GitCommandError('branch -m', stderrOf(err));
    }
  }

  async changeBaseBranch(wtPath: string, newBase: string): Promise<void> {
    try {
      await this.git(this.repoRoot, ['rev-parse', '--verify', '--quiet', newBase]);
    } catch {
      throw new ArborError(`Base branch not found: ${newBase}`, 'BRANCH_NOT_FOUND');
    }
    try {
      await this.git(wtPath, ['branch', `--set-upstream-to=${newBase}`]);
    } catch (err) {
      throw new GitCommandError('branch --set-upstream-to', stderrOf(err));
    }
  }

  async checkout(wtPath: string, branch: string): Promise<void> {
    try {
      await this.git(wtPath, ['checkout', branch]);
    } catch (err) {
      const stderr = stderrOf(err);
      if (/already checked out|is already used by worktree/.test(stderr)) {
        throw new BranchAlreadyCheckedOutError(branch);
      }
      if (/would be overwritten/.test(stderr)) throw new UncommittedChangesError(wtPath);
      if (/did not match any|invalid reference/.test(stderr)) throw new InvalidBranchNameError(branch);
      throw new GitCommandError('checkout', stderr);
    }
  }
}
