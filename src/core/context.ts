import path from 'node:path';
import { ArborError } from '../lib/errors.js';
import {
  ConfigRepoStateStore,
  loadConfig,
  loadRepoSettings,
  resolveRepoConfig,
} from './config.js';
import { Reconciler, type RepoStateStore } from './reconciler.js';
import { SessionRegistry } from './sessions.js';
import { TmuxBackend } from './tmux.js';
import { GitWorktreeRepository, getDefaultBranch, getRepoRoot } from './worktree.js';
import type { RepoSettings, ResolvedRepoConfig } from '../types/config.js';
import type { OkResult, ResultEvent, Snapshot, WorktreeView } from '../types/request.js';
import type { SessionBackend } from '../types/session.js';

export interface ArborContext {
  repoRoot: string;
  baseBranch: string;
  config: ResolvedRepoConfig;
  settings: RepoSettings;
  backend: SessionBackend;
  registry: SessionRegistry;
  store: RepoStateStore;
  reconciler: Reconciler;
}

export interface OpenContextOptions {
  cwd?: string;
  backend?: SessionBackend;
}

/** Wire the repository, session registry and reconciler for the repo containing `cwd`, then load it. */
export async function openContext(options: OpenContextOptions = {}): Promise<ArborContext> {
  const repoRoot = await getRepoRoot(options.cwd);
  const [global, settings] = await Promise.all([loadConfig(), loadRepoSettings(repoRoot)]);
  const config = resolveRepoConfig(global, repoRoot);
  const baseBranch = config.baseBranch ?? await getDefaultBranch(repoRoot);

  const backend = options.backend ?? new TmuxBackend();
  const registry = new SessionRegistry(backend, settings.sessionPrefix);
  const store = new ConfigRepoStateStore(repoRoot, config);
  const reconciler = new Reconciler({
    repository: new GitWorktreeRepository(repoRoot, baseBranch),
    sessions: registry,
    baseBranch,
    agent: settings.agent,
    setupScript: settings.setupScript,
    store,
  });

  unwrap(await reconciler.handleRefresh());
  return { repoRoot, baseBranch, config, settings, backend, registry, store, reconciler };
}

/** Resolve a worktree by path, then branch name, then directory name. */
export function resolveTarget(snapshot: Snapshot, target: string, cwd: string = process.cwd()): WorktreeView {
  const absolute = path.resolve(cwd, target);
  const byPath = snapshot.worktrees.find((v) => v.worktree.path === absolute);
  if (byPath) return byPath;
  const byBranch = snapshot.worktrees.find((v) => v.worktree.branch === target);
  if (byBranch) return byBranch;
  const byDir = snapshot.worktrees.find((v) => path.basename(v.worktree.path) === target);
  if (byDir) return byDir;
  throw new ArborError(
    `Could not resolve target: ${target}. Try a worktree path, branch or directory name.`,
    'TARGET_NOT_FOUND',
  );
}

/** Successful result, or its error thrown. */
export function unwrap(event: ResultEvent): OkResult {
  switch (event.status) {
    case 'ok':
      return event;
    case 'failed':
    case 'rejected':
      throw event.error;
    case 'discarded':
      throw new ArborError(`Worktree disappeared before ${event.kind} finished: ${event.path}`, 'WORKTREE_NOT_FOUND');
  }
}
