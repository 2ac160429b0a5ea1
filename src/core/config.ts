import fs from 'node:fs/promises';
import lockfile from 'proper-lockfile';
import writeFileAtomic from 'write-file-atomic';
import YAML from 'yaml';
import { ConfigLockError } from '../lib/errors.js';
import { configDir, configPath, repoSettingsPath } from '../lib/paths.js';
import { DEFAULT_AGENT } from './agent.js';
import { DEFAULT_SESSION_PREFIX } from './sessions.js';
import type { RepoStateStore } from './reconciler.js';
import type {
  AgentSettings,
  GlobalConfig,
  RepoConfig,
  RepoSettings,
  ResolvedRepoConfig,
} from '../types/config.js';

export const DEFAULT_EDITOR = 'code';
export const DEFAULT_FETCH_INTERVAL_SEC = 10;
export const DEFAULT_THEME = 'matrix';

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function str(value: unknown): string | undefined {
  return typeof value === 'string' ? value : undefined;
}

function num(value: unknown): number | undefined {
  return typeof value === 'number' && Number.isFinite(value) ? value : undefined;
}

function strList(value: unknown): string[] | undefined {
  if (!Array.isArray(value)) return undefined;
  return value.filter((item): item is string => typeof item === 'string');
}

function strMap(value: unknown): Record<string, string> | undefined {
  if (!isRecord(value)) return undefined;
  const out: Record<string, string> = {};
  for (const [key, item] of Object.entries(value)) {
    if (typeof item === 'string') out[key] = item;
  }
  return out;
}

function parseRepoConfig(value: unknown): RepoConfig {
  if (!isRecord(value)) return {};
  return {
    baseBranch: str(value.baseBranch),
    lastSelectedBranch: str(value.lastSelectedBranch),
    editor: str(value.editor),
    autoFetchInterval: num(value.autoFetchInterval),
    theme: str(value.theme),
    initializedWorktrees: strList(value.initializedWorktrees),
    pullRequests: strMap(value.pullRequests),
  };
}

/** Fields of the wrong type are dropped; the rest of the file still loads. */
export function parseConfig(raw: string): GlobalConfig {
  const doc: unknown = YAML.parse(raw);
  const config: GlobalConfig = { repositories: {} };
  if (!isRecord(doc)) return config;

  const theme = str(doc.defaultTheme);
  if (theme !== undefined) config.defaultTheme = theme;
  if (isRecord(doc.repositories)) {
    for (const [root, repo] of Object.entries(doc.repositories)) {
      config.repositories[root] = parseRepoConfig(repo);
    }
  }
  return config;
}

export async function loadConfig(): Promise<GlobalConfig> {
  try {
    const raw = await fs.readFile(configPath(), 'utf-8');
    return parseConfig(raw);
  } catch (err) {
    if (err instanceof Error && 'code' in err && err.code === 'ENOENT') {
      return { repositories: {} };
    }
    throw err;
  }
}

export async function writeConfig(config: GlobalConfig): Promise<void> {
  await fs.mkdir(configDir(), { recursive: true });
  // undefined fields are left out of the output
  await writeFileAtomic(configPath(), YAML.stringify(config, { indent: 2 }));
}

/**
 * Read-modify-write under a lock so concurrent arbor processes
 * (one per terminal) don't drop each other's changes.
 */
export async function updateConfig(
  updater: (config: GlobalConfig) => GlobalConfig | Promise<GlobalConfig>,
): Promise<GlobalConfig> {
  await fs.mkdir(configDir(), { recursive: true });
  let release: (() => Promise<void>) | undefined;

  try {
    release = await lockfile.lock(configPath(), {
      realpath: false,
      stale: 10_000,
      retries: {
        retries: 5,
        minTimeout: 100,
        maxTimeout: 1000,
      },
    });
  } catch {
    throw new ConfigLockError();
  }

  try {
    const config = await loadConfig();
    const updated = await updater(config);
    await writeConfig(updated);
    return updated;
  } finally {
    if (release) {
      await release();
    }
  }
}

export function updateRepoConfig(
  repoRoot: string,
  patch: (repo: RepoConfig) => RepoConfig,
): Promise<GlobalConfig> {
  return updateConfig((config) => ({
    ...config,
    repositories: {
      ...config.repositories,
      [repoRoot]: patch(config.repositories[repoRoot] ?? {}),
    },
  }));
}

export function resolveRepoConfig(config: GlobalConfig, repoRoot: string): ResolvedRepoConfig {
  const repo = config.repositories[repoRoot] ?? {};
  const interval = repo.autoFetchInterval;
  return {
    repoRoot,
    baseBranch: repo.baseBranch || undefined,
    lastSelectedBranch: repo.lastSelectedBranch || undefined,
    editor: repo.editor || DEFAULT_EDITOR,
    autoFetchIntervalSec: interval !== undefined && interval > 0 ? interval : DEFAULT_FETCH_INTERVAL_SEC,
    theme: repo.theme || config.defaultTheme || DEFAULT_THEME,
    initializedWorktrees: repo.initializedWorktrees ?? [],
    pullRequests: repo.pullRequests ?? {},
  };
}

export function parseRepoSettings(raw: string): RepoSettings {
  const doc: unknown = YAML.parse(raw);
  const settings: RepoSettings = { sessionPrefix: DEFAULT_SESSION_PREFIX, agent: { ...DEFAULT_AGENT } };
  if (!isRecord(doc)) return settings;

  const script = str(doc.setupScript)?.trim();
  if (script) settings.setupScript = script;
  const prefix = str(doc.sessionPrefix)?.trim();
  if (prefix) settings.sessionPrefix = prefix;
  if (isRecord(doc.agent)) {
    const agent: AgentSettings = settings.agent;
    // Empty strings are kept: an empty command means a plain shell
    agent.command = str(doc.agent.command) ?? agent.command;
    agent.args = str(doc.agent.args) ?? agent.args;
    agent.resumeFlag = str(doc.agent.resumeFlag) ?? agent.resumeFlag;
  }
  return settings;
}

export async function loadRepoSettings(repoRoot: string): Promise<RepoSettings> {
  try {
    const raw = await fs.readFile(repoSettingsPath(repoRoot), 'utf-8');
    return parseRepoSettings(raw);
  } catch (err) {
    if (err instanceof Error && 'code' in err && err.code === 'ENOENT') {
      return parseRepoSettings('');
    }
    throw err;
  }
}

/** Reconciler persistence backed by the repository's entry in the global config. */
export class ConfigRepoStateStore implements RepoStateStore {
  private lastSelected: string | undefined;
  private readonly initialized: Set<string>;
  private readonly pullRequests: Map<string, string>;

  constructor(
    private readonly repoRoot: string,
    resolved: ResolvedRepoConfig,
  ) {
    this.lastSelected = resolved.lastSelectedBranch;
    this.initialized = new Set(resolved.initializedWorktrees);
    this.pullRequests = new Map(Object.entries(resolved.pullRequests));
  }

  lastSelectedBranch(): string | undefined {
    return this.lastSelected;
  }

  isAgentInitialized(wtPath: string): boolean {
    return this.initialized.has(wtPath);
  }

  async setLastSelectedBranch(branch: string): Promise<void> {
    if (this.lastSelected === branch) return;
    this.lastSelected = branch;
    await updateRepoConfig(this.repoRoot, (repo) => ({ ...repo, lastSelectedBranch: branch }));
  }

  async setAgentInitialized(wtPath: string, initialized: boolean): Promise<void> {
    if (this.initialized.has(wtPath) === initialized) return;
    if (initialized) this.initialized.add(wtPath);
    else this.initialized.delete(wtPath);
    await updateRepoConfig(this.repoRoot, (repo) => {
      const current = new Set(repo.initializedWorktrees ?? []);
      if (initialized) current.add(wtPath);
      else current.delete(wtPath);
      return { ...repo, initializedWorktrees: [...current].sort() };
    });
  }

  pullRequestUrl(wtPath: string): string | undefined {
    return this.pullRequests.get(wtPath);
  }

  async setPullRequestUrl(wtPath: string, url: string | undefined): Promise<void> {
    if (this.pullRequests.get(wtPath) === url) return;
    if (url) this.pullRequests.set(wtPath, url);
    else this.pullRequests.delete(wtPath);
    await updateRepoConfig(this.repoRoot, (repo) => {
      const next = { ...repo.pullRequests };
      if (url) next[wtPath] = url;
      else delete next[wtPath];
      return { ...repo, pullRequests: next };
    });
  }

  async forgetMissing(livePaths: ReadonlySet<string>): Promise<void> {
    const staleAgents = [...this.initialized].filter((p) => !livePaths.has(p));
    const stalePrs = [...this.pullRequests.keys()].filter((p) => !livePaths.has(p));
    if (staleAgents.length === 0 && stalePrs.length === 0) return;
    for (const p of staleAgents) this.initialized.delete(p);
    for (const p of stalePrs) this.pullRequests.delete(p);
    await updateRepoConfig(this.repoRoot, (repo) => {
      const next = { ...repo.pullRequests };
      for (const p of stalePrs) delete next[p];
      return {
        ...repo,
        initializedWorktrees: (repo.initializedWorktrees ?? []).filter((p) => !staleAgents.includes(p)),
        pullRequests: next,
      };
    });
  }
}
