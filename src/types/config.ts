export interface RepoConfig {
  baseBranch?: string;
  lastSelectedBranch?: string;
  editor?: string;
  /** Seconds; 0 or absent means the default. */
  autoFetchInterval?: number;
  theme?: string;
  initializedWorktrees?: string[];
  /** Worktree path to pull-request URL. */
  pullRequests?: Record<string, string>;
}

export interface GlobalConfig {
  defaultTheme?: string;
  repositories: Record<string, RepoConfig>;
}

export interface AgentSettings {
  /** Empty string: agent sessions start a plain shell. */
  command: string;
  args: string;
  resumeFlag: string;
}

export interface RepoSettings {
  setupScript?: string;
  sessionPrefix: string;
  agent: AgentSettings;
}

export interface ResolvedRepoConfig {
  repoRoot: string;
  baseBranch?: string;
  lastSelectedBranch?: string;
  editor: string;
  autoFetchIntervalSec: number;
  theme: string;
  initializedWorktrees: string[];
  pullRequests: Record<string, string>;
}
