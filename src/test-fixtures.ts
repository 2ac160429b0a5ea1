import path from 'node:path';
import {
  BranchAlreadyCheckedOutError,
  UncommittedChangesError,
  WorktreeNotFoundError,
} from './lib/errors.js';
import { worktreeDirName } from './lib/name.js';
import type { RepoStateStore } from './core/reconciler.js';
import type { SessionBackend } from './types/session.js';
import type { Worktree, WorktreeRepository } from './types/worktree.js';

export const TEST_ROOT = '/tmp/project';

export function makeWorktree(overrides?: Partial<Worktree>): Worktree {
  return {
    path: `${TEST_ROOT}/.worktrees/feature-auth`,
    branch: 'feature-auth',
    isRoot: false,
    hasUncommittedChanges: false,
    aheadBehind: { ahead: 0, behind: 0 },
    lastKnownCommitHash: 'abc1234',
    ...overrides,
  };
}

export function makeRootWorktree(overrides?: Partial<Worktree>): Worktree {
  return makeWorktree({ path: TEST_ROOT, branch: 'main', isRoot: true, ...overrides });
}

export interface Deferred<T> {
  promise: Promise<T>;
  resolve: (value: T) => void;
  reject: (err: unknown) => void;
}

export function deferred<T = void>(): Deferred<T> {
  let resolve: (value: T) => void = () => {};
  let reject: (err: unknown) => void = () => {};
  const promise = new Promise<T>((res, rej) => {
    resolve = res;
    reject = rej;
  });
  return { promise, resolve, reject };
}

/** Git stand-in: worktrees live in an array, mutations apply to it directly. */
export class FakeWorktreeRepository implements WorktreeRepository {
  worktrees: Worktree[];
  calls: string[] = [];
  /** When set, remote operations wait on it. */
  remoteGate: Promise<void> | null = null;
  remoteError: Error | null = null;
  listError: Error | null = null;
  /** When set, listWorktrees waits on it. */
  listGate: Promise<void> | null = null;

  constructor(
    public readonly repoRoot: string = TEST_ROOT,
    worktrees?: Worktree[],
  ) {
    this.worktrees = worktrees ?? [makeRootWorktree({ path: repoRoot })];
  }

  async listWorktrees(): Promise<Worktree[]> {
    this.calls.push('list');
    if (this.listGate) await this.listGate;
    if (this.listError) throw this.listError;
    return this.worktrees.map((wt) => structuredClone(wt));
  }

  pathFor(branch: string): string {
    return path.join(this.repoRoot, '.worktrees', worktreeDirName(branch, 'worktree'));
  }

  async createWorktree(branch: string, fromExisting: boolean, baseBranch?: string): Promise<Worktree> {
    this.calls.push(`create ${branch} ${fromExisting} ${baseBranch ?? ''}`.trim());
    const holder = this.worktrees.find((wt) => wt.branch === branch);
    if (holder) throw new BranchAlreadyCheckedOutError(branch, holder.path);
    const wt = makeWorktree({ path: this.pathFor(branch), branch, lastKnownCommitHash: 'new0000' });
    this.worktrees.push(wt);
    return structuredClone(wt);
  }

  async deleteWorktree(wtPath: string, force: boolean): Promise<void> {
    this.calls.push(`delete ${wtPath} ${force}`);
    const wt = this.worktrees.find((w) => w.path === wtPath);
    if (!wt) throw new WorktreeNotFoundError(wtPath);
    if (wt.hasUncommittedChanges && !force) throw new UncommittedChangesError(wtPath);
    this.worktrees = this.worktrees.filter((w) => w.path !== wtPath);
  }

  private async remote(call: string): Promise<void> {
    this.calls.push(call);
    if (this.remoteGate) await this.remoteGate;
    if (this.remoteError) throw this.remoteError;
  }

  fetch(): Promise<void> {
    return this.remote('fetch');
  }

  pull(wtPath: string, baseBranch: string): Promise<void> {
    return this.remote(`pull ${wtPath} ${baseBranch}`);
  }

  push(wtPath: string, branch: string): Promise<void> {
    return this.remote(`push ${wtPath} ${branch}`);
  }

  async renameBranch(oldName: string, newName: string): Promise<void> {
    this.calls.push(`rename ${oldName} ${newName}`);
    for (const wt of this.worktrees) {
      if (wt.branch === oldName) wt.branch = newName;
    }
  }

  async changeBaseBranch(wtPath: string, newBase: string): Promise<void> {
    this.calls.push(`base ${wtPath} ${newBase}`);
  }

  async checkout(wtPath: string, branch: string): Promise<void> {
    this.calls.push(`checkout ${wtPath} ${branch}`);
    const wt = this.worktrees.find((w) => w.path === wtPath);
    if (wt) wt.branch = branch;
  }
}

export interface FakeSession {
  cwd: string;
  command?: string;
}

/** Multiplexer stand-in. `attachGate` holds attaches open until released. */
export class FakeSessionBackend implements SessionBackend {
  sessions = new Map<string, FakeSession>();
  created: Array<{ name: string } & FakeSession> = [];
  attached: string[] = [];
  killed: string[] = [];
  hasCalls = 0;
  attachGate: Promise<void> | null = null;
  createError: Error | null = null;
  inside = false;

  async checkAvailable(): Promise<void> {}

  async hasSession(name: string): Promise<boolean> {
    this.hasCalls++;
    return this.sessions.has(name);
  }

  async newSession(name: string, cwd: string, command?: string): Promise<void> {
    if (this.createError) throw this.createError;
    this.sessions.set(name, { cwd, command });
    this.created.push({ name, cwd, command });
  }

  async attachSession(name: string): Promise<void> {
    this.attached.push(name);
    if (this.attachGate) await this.attachGate;
  }

  async killSession(name: string): Promise<void> {
    this.killed.push(name);
    this.sessions.delete(name);
  }

  async renameSession(oldName: string, newName: string): Promise<void> {
    const session = this.sessions.get(oldName);
    if (!session) throw new Error(`can't find session: ${oldName}`);
    this.sessions.delete(oldName);
    this.sessions.set(newName, session);
  }

  async listSessions(): Promise<string[]> {
    return [...this.sessions.keys()];
  }

  isInsideSession(): boolean {
    return this.inside;
  }
}

export class MemoryRepoStateStore implements RepoStateStore {
  lastSelected: string | undefined;
  initialized = new Set<string>();
  pullRequests = new Map<string, string>();
  failWrites = false;

  lastSelectedBranch(): string | undefined {
    return this.lastSelected;
  }

  isAgentInitialized(wtPath: string): boolean {
    return this.initialized.has(wtPath);
  }

  async setLastSelectedBranch(branch: string): Promise<void> {
    if (this.failWrites) throw new Error('disk full');
    this.lastSelected = branch;
  }

  async setAgentInitialized(wtPath: string, initialized: boolean): Promise<void> {
    if (this.failWrites) throw new Error('disk full');
    if (initialized) this.initialized.add(wtPath);
    else this.initialized.delete(wtPath);
  }

  pullRequestUrl(wtPath: string): string | undefined {
    return this.pullRequests.get(wtPath);
  }

  async setPullRequestUrl(wtPath: string, url: string | undefined): Promise<void> {
    if (this.failWrites) throw new Error('disk full');
    if (url) this.pullRequests.set(wtPath, url);
    else this.pullRequests.delete(wtPath);
  }

  async forgetMissing(livePaths: ReadonlySet<string>): Promise<void> {
    const stale = [...this.initialized, ...this.pullRequests.keys()].filter((p) => !livePaths.has(p));
    if (stale.length === 0) return;
    if (this.failWrites) throw new Error('disk full');
    for (const p of stale) {
      this.initialized.delete(p);
      this.pullRequests.delete(p);
    }
  }
}
