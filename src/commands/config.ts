import { loadConfig, resolveRepoConfig, updateRepoConfig } from '../core/config.js';
import { getRepoRoot } from '../core/worktree.js';
import { ArborError } from '../lib/errors.js';
import { output } from '../lib/output.js';
import type { RepoConfig } from '../types/config.js';

export interface ConfigOptions {
  baseBranch?: string;
  interval?: string;
  editor?: string;
  theme?: string;
  json?: boolean;
}

export function parseInterval(raw: string): number {
  const seconds = Number(raw);
  if (!Number.isInteger(seconds) || seconds < 0) {
    throw new ArborError(`Interval must be a whole number of seconds: ${raw}`, 'INVALID_ARGS');
  }
  return seconds;
}

/** Changes requested on the command line; undefined when nothing was passed. */
export function configPatch(options: ConfigOptions): Partial<RepoConfig> | undefined {
  const patch: Partial<RepoConfig> = {};
  if (options.baseBranch !== undefined) patch.baseBranch = options.baseBranch;
  if (options.interval !== undefined) patch.autoFetchInterval = parseInterval(options.interval);
  if (options.editor !== undefined) patch.editor = options.editor;
  if (options.theme !== undefined) patch.theme = options.theme;
  return Object.keys(patch).length > 0 ? patch : undefined;
}

export async function configCommand(options: ConfigOptions = {}): Promise<void> {
  const repoRoot = await getRepoRoot();
  const patch = configPatch(options);

  const global = patch
    ? await updateRepoConfig(repoRoot, (repo) => ({ ...repo, ...patch }))
    : await loadConfig();
  const resolved = resolveRepoConfig(global, repoRoot);

  if (options.json) {
    output(resolved, true);
    return;
  }
  console.log(`repository      ${resolved.repoRoot}`);
  console.log(`base branch     ${resolved.baseBranch ?? '(auto)'}`);
  console.log(`editor          ${resolved.editor}`);
  console.log(`fetch interval  ${resolved.autoFetchIntervalSec}s`);
  console.log(`theme           ${resolved.theme}`);
}
