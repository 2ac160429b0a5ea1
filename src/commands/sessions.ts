import { getRepoRoot } from '../core/worktree.js';
import { loadRepoSettings } from '../core/config.js';
import { SessionRegistry } from '../core/sessions.js';
import { TmuxBackend } from '../core/tmux.js';
import { output } from '../lib/output.js';

export interface SessionsOptions {
  json?: boolean;
}

/** Sessions carrying this repository's prefix, including ones whose worktree is gone. */
export async function sessionsCommand(options: SessionsOptions = {}): Promise<void> {
  const repoRoot = await getRepoRoot();
  const settings = await loadRepoSettings(repoRoot);
  const registry = new SessionRegistry(new TmuxBackend(), settings.sessionPrefix);

  const names: string[] = [];
  for await (const name of registry.listAll()) names.push(name);

  if (options.json) {
    output({ prefix: registry.prefix, sessions: names }, true);
    return;
  }
  if (names.length === 0) {
    console.log(`No sessions with prefix "${registry.prefix}".`);
    return;
  }
  for (const name of names) console.log(name);
}
