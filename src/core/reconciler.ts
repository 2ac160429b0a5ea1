import { requestId as newRequestId } from '../lib/id.js';
import {
  ArborError,
  OperationInProgressError,
  SessionNotFoundError,
  SetupScriptFailedError,
  WorktreeNotFoundError,
  toArborError,
} from '../lib/errors.js';
import { debugLog, type LogFn } from '../lib/log.js';
import { DEFAULT_AGENT, buildAgentCommand } from './agent.js';
import { runSetupScript, setupScriptEnv, type SetupScriptRunner } from './setup-script.js';
import type { SessionRegistry } from './sessions.js';
import type { AgentSettings } from '../types/config.js';
import type {
  FailedResult,
  OkResult,
  ReconcileRequest,
  RequestKind,
  ResultEvent,
  Snapshot,
  WorktreeState,
  WorktreeView,
} from '../types/request.js';
import { SESSION_KINDS, type SessionKind } from '../types/session.js';
import type { CreateWorktreeSpec, Worktree, WorktreeRepository } from '../types/worktree.js';

/** Write-through persistence for bookkeeping that should survive restarts. */
export interface RepoStateStore {
  lastSelectedBranch(): string | undefined;
  isAgentInitialized(wtPath: string): boolean;
  setLastSelectedBranch(branch: string): Promise<void>;
  setAgentInitialized(wtPath: string, initialized: boolean): Promise<void>;
  pullRequestUrl(wtPath: string): string | undefined;
  /** undefined clears it. */
  setPullRequestUrl(wtPath: string, url: string | undefined): Promise<void>;
  /** Drop agent and pull-request records for every path not in `livePaths`. */
  forgetMissing(livePaths: ReadonlySet<string>): Promise<void>;
}

export interface ReconcilerOptions {
  repository: WorktreeRepository;
  sessions: SessionRegistry;
  baseBranch: string;
  agent?: AgentSettings;
  setupScript?: string;
  runSetupScript?: SetupScriptRunner;
  store?: RepoStateStore;
  log?: LogFn;
}

export type SnapshotListener = (snapshot: Snapshot) => void;
export type ResultListener = (event: ResultEvent) => void;

interface Entry {
  worktree: Worktree;
  state: WorktreeState;
  agentInitialized: boolean;
}

interface Ticket {
  requestId: string;
  kind: RequestKind;
}

interface Completion {
  type: 'completion';
  requestId: string;
  kind: RequestKind;
  /** Ticket key: a worktree path, or REPOSITORY_KEY. */
  key: string;
  path: string;
  finish: () => ResultEvent;
}

type Message =
  | { type: 'request'; requestId: string; request: ReconcileRequest }
  | Completion;

const REPOSITORY_KEY = '\0repository';

/** Session names are derived from the branch; detached worktrees fall back to their directory. */
export function sessionKey(wt: Worktree): string {
  return wt.branch || wt.path.split('/').filter(Boolean).pop() || '';
}

/**
 * Display order: root first, then most recently switched-to branch,
 * then branch name, then path.
 */
export function compareForDisplay(recent: readonly string[]) {
  const rank = (branch: string) => {
    const i = branch ? recent.indexOf(branch) : -1;
    return i === -1 ? Number.POSITIVE_INFINITY : i;
  };
  return (a: Worktree, b: Worktree): number => {
    if (a.isRoot !== b.isRoot) return a.isRoot ? -1 : 1;
    const ra = rank(a.branch);
    const rb = rank(b.branch);
    if (ra !== rb) return ra < rb ? -1 : 1;
    if (a.branch !== b.branch) return a.branch < b.branch ? -1 : 1;
    return a.path < b.path ? -1 : a.path > b.path ? 1 : 0;
  };
}

function cloneWorktree(wt: Worktree): Worktree {
  return { ...wt, aheadBehind: { ...wt.aheadBehind } };
}

/**
 * Owns the canonical worktree set and drives session lifecycles.
 *
 * Every request and every background completion goes through one inbox that
 * is drained one message at a time. Requests run to completion or to their
 * first unbounded wait (attach, fetch, pull, push, setup script); that wait
 * runs out of band and its outcome comes back through the inbox, where it is
 * applied only if its ticket is still current for the worktree.
 *
 * A worktree holds at most one ticket. While it does, further requests for
 * the same path are rejected with OperationInProgressError, never queued.
 */
export class Reconciler {
  readonly repoRoot: string;

  private readonly repository: WorktreeRepository;
  private readonly sessions: SessionRegistry;
  private readonly baseBranch: string;
  private readonly agent: AgentSettings;
  private readonly setupScript: string | undefined;
  private readonly runSetup: SetupScriptRunner;
  private readonly store: RepoStateStore | undefined;
  private readonly log: LogFn;

  private readonly entries = new Map<string, Entry>();
  private readonly tickets = new Map<string, Ticket>();
  private readonly waiters = new Map<string, (event: ResultEvent) => void>();
  private readonly snapshotListeners = new Set<SnapshotListener>();
  private readonly resultListeners = new Set<ResultListener>();

  private readonly inbox: Message[] = [];
  private draining = false;
  private queuedRefresh: Promise<ResultEvent> | null = null;
  private refreshRunning = false;
  /** Most recently switched-to branches, most recent first. */
  private recent: string[] = [];

  constructor(options: ReconcilerOptions) {
    this.repository = options.repository;
    this.repoRoot = options.repository.repoRoot;
    this.sessions = options.sessions;
    this.baseBranch = options.baseBranch;
    this.agent = options.agent ?? DEFAULT_AGENT;
    this.setupScript = options.setupScript?.trim() || undefined;
    this.runSetup = options.runSetupScript ?? runSetupScript;
    this.store = options.store;
    this.log = options.log ?? debugLog;

    const last = this.store?.lastSelectedBranch();
    if (last) this.recent = [last];
  }

  // --- Public surface ---

  submit(request: ReconcileRequest): Promise<ResultEvent> {
    if (request.kind === 'refresh' && this.queuedRefresh) {
      return this.queuedRefresh;
    }
    const requestId = newRequestId();
    const result = new Promise<ResultEvent>((resolve) => {
      this.waiters.set(requestId, resolve);
    });
    if (request.kind === 'refresh') this.queuedRefresh = result;
    this.post({ type: 'request', requestId, request });
    return result;
  }

  handleSwitch(path: string, kind: SessionKind): Promise<ResultEvent> {
    return this.submit({ kind: 'switch', path, session: kind });
  }

  handleCreate(spec: CreateWorktreeSpec): Promise<ResultEvent> {
    return this.submit({ kind: 'create', ...spec });
  }

  handleDelete(path: string, force = false): Promise<ResultEvent> {
    return this.submit({ kind: 'delete', path, force });
  }

  handleRefresh(): Promise<ResultEvent> {
    return this.submit({ kind: 'refresh' });
  }

  /** True while a refresh is queued or running. */
  isRefreshPending(): boolean {
    return this.queuedRefresh !== null || this.refreshRunning;
  }

  isFetchPending(): boolean {
    return this.tickets.has(REPOSITORY_KEY);
  }

  snapshot(): Snapshot {
    const order = compareForDisplay(this.recent);
    const worktrees: WorktreeView[] = [...this.entries.values()]
      .sort((a, b) => order(a.worktree, b.worktree))
      .map((entry) => ({
        worktree: cloneWorktree(entry.worktree),
        state: entry.state,
        agentInitialized: entry.agentInitialized,
        pending: this.tickets.get(entry.worktree.path)?.kind,
      }));
    const latest = this.recent[0];
    const selected = worktrees.find((v) => latest !== undefined && v.worktree.branch === latest) ?? worktrees[0];
    return { repoRoot: this.repoRoot, worktrees, selectedPath: selected?.worktree.path };
  }

  sessionName(path: string, kind: SessionKind): string {
    const entry = this.entries.get(path);
    if (!entry) throw new WorktreeNotFoundError(path);
    return this.sessions.deriveName(sessionKey(entry.worktree), kind);
  }

  subscribe(listener: SnapshotListener): () => void {
    this.snapshotListeners.add(listener);
    return () => {
      this.snapshotListeners.delete(listener);
    };
  }

  onResult(listener: ResultListener): () => void {
    this.resultListeners.add(listener);
    return () => {
      this.resultListeners.delete(listener);
    };
  }

  // --- Loop ---

  private post(message: Message): void {
    this.inbox.push(message);
    if (!this.draining) {
      this.drain().catch((err: unknown) => this.log(`loop: ${toArborError(err).message}`));
    }
  }

  private async drain(): Promise<void> {
    this.draining = true;
    try {
      let message = this.inbox.shift();
      while (message) {
        await this.process(message);
        this.notify();
        message = this.inbox.shift();
      }
    } finally {
      this.draining = false;
    }
  }

  private async process(message: Message): Promise<void> {
    if (message.type === 'completion') {
      this.complete(message);
      return;
    }

    const { requestId, request } = message;
    if (request.kind === 'refresh') this.queuedRefresh = null;

    let event: ResultEvent | undefined;
    try {
      event = await this.execute(requestId, request);
    } catch (err) {
      const base = { requestId, kind: request.kind, path: this.targetPath(request) };
      event = err instanceof OperationInProgressError
        ? { ...base, status: 'rejected', error: err }
        : { ...base, status: 'failed', error: toArborError(err) };
      this.log(`${request.kind} ${base.path}: ${event.status} (${event.error.code})`);
    }
    // undefined: finished out of band, settled by its completion
    if (event) this.settle(event);
  }

  private complete(message: Completion): void {
    const ticket = this.tickets.get(message.key);
    if (!ticket || ticket.requestId !== message.requestId) {
      this.log(`${message.kind} ${message.path}: late result discarded`);
      this.settle({
        requestId: message.requestId,
        kind: message.kind,
        path: message.path,
        status: 'discarded',
      });
      return;
    }
    this.tickets.delete(message.key);
    let event: ResultEvent;
    try {
      event = message.finish();
    } catch (err) {
      event = this.failed(message.requestId, message.kind, message.path, err);
    }
    this.settle(event);
  }

  private settle(event: ResultEvent): void {
    const resolve = this.waiters.get(event.requestId);
    this.waiters.delete(event.requestId);
    resolve?.(event);
    for (const listener of this.resultListeners) {
      try {
        listener(event);
      } catch (err) {
        this.log(`result listener: ${toArborError(err).message}`);
      }
    }
  }

  private notify(): void {
    if (this.snapshotListeners.size === 0) return;
    const snapshot = this.snapshot();
    for (const listener of this.snapshotListeners) {
      try {
        listener(snapshot);
      } catch (err) {
        this.log(`snapshot listener: ${toArborError(err).message}`);
      }
    }
  }

  /**
   * Run `task` outside the loop. Its outcome is posted back as a completion;
   * the task itself never touches reconciler state.
   */
  private dispatch(
    completion: Omit<Completion, 'type' | 'finish'>,
    task: () => Promise<void>,
    onSuccess: () => ResultEvent,
    onFailure: (error: ArborError) => ResultEvent,
  ): void {
    task()
      .then(
        () => this.post({ type: 'completion', ...completion, finish: onSuccess }),
        (err: unknown) => {
          const error = toArborError(err);
          this.post({ type: 'completion', ...completion, finish: () => onFailure(error) });
        },
      )
      .catch((err: unknown) => this.log(`dispatch ${completion.kind}: ${toArborError(err).message}`));
  }

  private execute(requestId: string, request: ReconcileRequest): Promise<ResultEvent | undefined> {
    switch (request.kind) {
      case 'switch':
        return this.switchTo(requestId, request.path, request.session);
      case 'create':
        return this.create(requestId, request.branch, request.fromExisting ?? false, request.baseBranch);
      case 'delete':
        return this.remove(requestId, request.path, request.force ?? false);
      case 'refresh':
        return this.refresh(requestId);
      case 'fetch':
        return this.fetch(requestId);
      case 'pull':
        return this.remoteForWorktree(requestId, 'pull', request.path, (wt) =>
          this.repository.pull(wt.path, request.baseBranch ?? this.baseBranch));
      case 'push':
        return this.remoteForWorktree(requestId, 'push', request.path, async (wt) => {
          if (!wt.branch) {
            throw new ArborError(`Cannot push a detached HEAD: ${wt.path}`, 'INVALID_ARGS');
          }
          await this.repository.push(wt.path, wt.branch);
        });
      case 'rename-branch':
        return this.renameBranch(requestId, request.path, request.newBranch);
      case 'change-base-branch':
        return this.changeBaseBranch(requestId, request.path, request.newBase);
      case 'checkout':
        return this.checkout(requestId, request.path, request.branch);
      case 'kill-session':
        return this.killSession(requestId, request.path, request.session);
      case 'record-pr':
        return this.recordPr(requestId, request.path, request.url);
    }
  }

  // --- Helpers ---

  private targetPath(request: ReconcileRequest): string {
    switch (request.kind) {
      case 'create':
        return this.repository.pathFor(request.branch);
      case 'refresh':
      case 'fetch':
        return this.repoRoot;
      default:
        return request.path;
    }
  }

  /** Admission gate: the worktree must exist and hold no ticket. */
  private admit(path: string): Entry {
    const entry = this.entries.get(path);
    if (!entry) throw new WorktreeNotFoundError(path);
    const ticket = this.tickets.get(path);
    if (ticket) throw new OperationInProgressError(path, ticket.kind);
    return entry;
  }

  private newEntry(wt: Worktree): Entry {
    const prUrl = wt.prUrl ?? this.store?.pullRequestUrl(wt.path);
    return {
      worktree: { ...cloneWorktree(wt), ...(prUrl ? { prUrl } : {}) },
      state: 'listed',
      agentInitialized: this.store?.isAgentInitialized(wt.path) ?? false,
    };
  }

  private ok(
    requestId: string,
    kind: RequestKind,
    path: string,
    extra: Partial<Omit<OkResult, 'requestId' | 'kind' | 'path' | 'status'>> = {},
  ): OkResult {
    return { requestId, kind, path, status: 'ok', warnings: [], ...extra };
  }

  private failed(requestId: string, kind: RequestKind, path: string, err: unknown): FailedResult {
    return { requestId, kind, path, status: 'failed', error: toArborError(err) };
  }

  private async persist(warnings: ArborError[], write: (store: RepoStateStore) => Promise<void>): Promise<void> {
    if (!this.store) return;
    try {
      await write(this.store);
    } catch (err) {
      warnings.push(toArborError(err));
    }
  }

  private async touchBranch(branch: string, warnings: ArborError[]): Promise<void> {
    if (!branch) return;
    this.recent = [branch, ...this.recent.filter((b) => b !== branch)];
    await this.persist(warnings, (store) => store.setLastSelectedBranch(branch));
  }

  private requestRefresh(): void {
    this.submit({ kind: 'refresh' })
      .then((event) => {
        if (event.status === 'failed') this.log(`follow-up refresh: ${event.error.message}`);
      })
      .catch((err: unknown) => this.log(`follow-up refresh: ${toArborError(err).message}`));
  }

  // --- Handlers ---

  private async switchTo(requestId: string, path: string, kind: SessionKind): Promise<undefined> {
    const entry = this.admit(path);
    const name = this.sessions.deriveName(sessionKey(entry.worktree), kind);
    this.tickets.set(path, { requestId, kind: 'switch' });
    entry.state = 'session-pending';

    const warnings: ArborError[] = [];
    let created = false;
    try {
      if (!(await this.sessions.exists(name))) {
        const command = kind === 'agent'
          ? buildAgentCommand(this.agent, entry.agentInitialized)
          : undefined;
        this.log(`switch ${path}: creating ${name}${command ? ` (${command})` : ''}`);
        await this.sessions.create(name, entry.worktree.path, command);
        created = true;
        if (kind === 'agent' && !entry.agentInitialized) {
          entry.agentInitialized = true;
          await this.persist(warnings, (store) => store.setAgentInitialized(path, true));
        }
      }
    } catch (err) {
      this.tickets.delete(path);
      entry.state = 'listed';
      throw err;
    }
    await this.touchBranch(entry.worktree.branch, warnings);

    this.dispatch(
      { requestId, kind: 'switch', key: path, path },
      () => this.sessions.attach(name),
      () => {
        entry.state = 'session-ready';
        return this.ok(requestId, 'switch', path, { sessionName: name, created, warnings });
      },
      (error) => {
        entry.state = 'listed';
        return this.failed(requestId, 'switch', path, error);
      },
    );
    return undefined;
  }

  private async create(
    requestId: string,
    branch: string,
    fromExisting: boolean,
    baseBranch: string | undefined,
  ): Promise<ResultEvent | undefined> {
    const base = fromExisting ? baseBranch : baseBranch ?? this.baseBranch;
    const wt = await this.repository.createWorktree(branch, fromExisting, base);
    this.entries.set(wt.path, this.newEntry(wt));
    this.log(`create ${wt.path} (${branch})`);

    const script = this.setupScript;
    if (!script) {
      return this.ok(requestId, 'create', wt.path, { worktree: cloneWorktree(wt) });
    }

    this.tickets.set(wt.path, { requestId, kind: 'create' });
    const env = setupScriptEnv(wt.path, this.repoRoot, wt.branch);
    this.dispatch(
      { requestId, kind: 'create', key: wt.path, path: wt.path },
      () => this.runSetup(script, wt.path, env),
      () => this.ok(requestId, 'create', wt.path, { worktree: cloneWorktree(wt) }),
      (error) => {
        // Best effort: the worktree stays, the failure becomes a warning
        const warning = error instanceof SetupScriptFailedError
          ? error
          : new SetupScriptFailedError(script, undefined, error.message);
        return this.ok(requestId, 'create', wt.path, { worktree: cloneWorktree(wt), warnings: [warning] });
      },
    );
    return undefined;
  }

  private async remove(requestId: string, path: string, force: boolean): Promise<ResultEvent> {
    const entry = this.admit(path);
    if (entry.worktree.isRoot) {
      throw new ArborError(`Cannot delete the root worktree: ${path}`, 'ROOT_WORKTREE');
    }
    this.tickets.set(path, { requestId, kind: 'delete' });
    entry.state = 'deleting';

    try {
      await this.repository.deleteWorktree(path, force);
    } catch (err) {
      this.tickets.delete(path);
      entry.state = 'listed';
      throw err;
    }

    const warnings: ArborError[] = [];
    for (const kind of SESSION_KINDS) {
      const name = this.sessions.deriveName(sessionKey(entry.worktree), kind);
      try {
        await this.sessions.kill(name);
      } catch (err) {
        if (!(err instanceof SessionNotFoundError)) warnings.push(toArborError(err));
      }
    }

    this.entries.delete(path);
    this.tickets.delete(path);
    if (entry.agentInitialized) {
      await this.persist(warnings, (store) => store.setAgentInitialized(path, false));
    }
    if (entry.worktree.prUrl) {
      await this.persist(warnings, (store) => store.setPullRequestUrl(path, undefined));
    }
    this.log(`delete ${path}: gone`);
    return this.ok(requestId, 'delete', path, {
      worktree: cloneWorktree(entry.worktree),
      removed: [path],
      warnings,
    });
  }

  /**
   * Diff the on-disk listing into the canonical set by path. New paths are
   * added, missing paths dropped along with their tickets (so late results
   * for them are discarded), and surviving entries only take the mutable
   * fields. Branch, path and root-ness are never overwritten here.
   */
  private async refresh(requestId: string): Promise<ResultEvent> {
    this.refreshRunning = true;
    try {
      const listed = await this.repository.listWorktrees();
      const seen = new Set<string>();
      const added: string[] = [];
      const removed: string[] = [];

      for (const wt of listed) {
        seen.add(wt.path);
        const entry = this.entries.get(wt.path);
        if (!entry) {
          this.entries.set(wt.path, this.newEntry(wt));
          added.push(wt.path);
          continue;
        }
        entry.worktree = {
          ...entry.worktree,
          hasUncommittedChanges: wt.hasUncommittedChanges,
          aheadBehind: { ...wt.aheadBehind },
          lastKnownCommitHash: wt.lastKnownCommitHash,
        };
      }

      for (const path of [...this.entries.keys()]) {
        if (seen.has(path)) continue;
        this.entries.delete(path);
        this.tickets.delete(path);
        removed.push(path);
      }

      if (added.length || removed.length) {
        this.log(`refresh: +${added.length} -${removed.length} (${this.entries.size} worktrees)`);
      }
      // Worktrees removed behind our back, this run or an earlier one
      const warnings: ArborError[] = [];
      await this.persist(warnings, (store) => store.forgetMissing(seen));
      return this.ok(requestId, 'refresh', this.repoRoot, { added, removed, warnings });
    } finally {
      this.refreshRunning = false;
    }
  }

  private async fetch(requestId: string): Promise<undefined> {
    const ticket = this.tickets.get(REPOSITORY_KEY);
    if (ticket) throw new OperationInProgressError(this.repoRoot, ticket.kind);
    this.tickets.set(REPOSITORY_KEY, { requestId, kind: 'fetch' });

    this.dispatch(
      { requestId, kind: 'fetch', key: REPOSITORY_KEY, path: this.repoRoot },
      () => this.repository.fetch(),
      () => {
        this.requestRefresh();
        return this.ok(requestId, 'fetch', this.repoRoot);
      },
      (error) => this.failed(requestId, 'fetch', this.repoRoot, error),
    );
    return undefined;
  }

  private async remoteForWorktree(
    requestId: string,
    kind: 'pull' | 'push',
    path: string,
    task: (wt: Worktree) => Promise<void>,
  ): Promise<undefined> {
    const entry = this.admit(path);
    const wt = cloneWorktree(entry.worktree);
    this.tickets.set(path, { requestId, kind });

    this.dispatch(
      { requestId, kind, key: path, path },
      () => task(wt),
      () => {
        this.requestRefresh();
        return this.ok(requestId, kind, path);
      },
      (error) => this.failed(requestId, kind, path, error),
    );
    return undefined;
  }

  private async renameBranch(requestId: string, path: string, newBranch: string): Promise<ResultEvent> {
    const entry = this.admit(path);
    const oldBranch = entry.worktree.branch;
    if (!oldBranch) {
      throw new ArborError(`Cannot rename a detached HEAD: ${path}`, 'INVALID_ARGS');
    }
    await this.repository.renameBranch(oldBranch, newBranch);

    const warnings: ArborError[] = [];
    for (const kind of SESSION_KINDS) {
      const from = this.sessions.deriveName(oldBranch, kind);
      const to = this.sessions.deriveName(newBranch, kind);
      if (from === to) continue;
      try {
        await this.sessions.rename(from, to);
      } catch (err) {
        if (!(err instanceof SessionNotFoundError)) warnings.push(toArborError(err));
      }
    }

    entry.worktree = { ...entry.worktree, branch: newBranch };
    if (this.recent.includes(oldBranch)) {
      this.recent = this.recent.map((b) => (b === oldBranch ? newBranch : b));
      if (this.recent[0] === newBranch) {
        await this.persist(warnings, (store) => store.setLastSelectedBranch(newBranch));
      }
    }
    return this.ok(requestId, 'rename-branch', path, { worktree: cloneWorktree(entry.worktree), warnings });
  }

  private async changeBaseBranch(requestId: string, path: string, newBase: string): Promise<ResultEvent> {
    this.admit(path);
    await this.repository.changeBaseBranch(path, newBase);
    this.requestRefresh();
    return this.ok(requestId, 'change-base-branch', path);
  }

  private async checkout(requestId: string, path: string, branch: string): Promise<ResultEvent> {
    const entry = this.admit(path);
    await this.repository.checkout(path, branch);
    entry.worktree = { ...entry.worktree, branch };
    this.requestRefresh();
    return this.ok(requestId, 'checkout', path, { worktree: cloneWorktree(entry.worktree) });
  }

  private async killSession(requestId: string, path: string, kind: SessionKind): Promise<ResultEvent> {
    const entry = this.admit(path);
    const key = sessionKey(entry.worktree);
    const name = this.sessions.deriveName(key, kind);
    try {
      await this.sessions.kill(name);
    } catch (err) {
      // Already gone is the outcome we wanted
      if (!(err instanceof SessionNotFoundError)) throw err;
    }
    const other = this.sessions.deriveName(key, kind === 'agent' ? 'terminal' : 'agent');
    entry.state = (await this.sessions.exists(other)) ? 'session-ready' : 'listed';
    return this.ok(requestId, 'kill-session', path, { sessionName: name });
  }

  private async recordPr(requestId: string, path: string, url: string): Promise<ResultEvent> {
    const entry = this.admit(path);
    entry.worktree = { ...entry.worktree, prUrl: url };
    const warnings: ArborError[] = [];
    await this.persist(warnings, (store) => store.setPullRequestUrl(path, url));
    return this.ok(requestId, 'record-pr', path, { worktree: cloneWorktree(entry.worktree), warnings });
  }
}
