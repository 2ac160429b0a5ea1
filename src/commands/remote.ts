import { openContext, resolveTarget, unwrap } from '../core/context.js';
import { info, output, success } from '../lib/output.js';

export interface RemoteOptions {
  base?: string;
  json?: boolean;
}

export async function fetchCommand(options: RemoteOptions = {}): Promise<void> {
  const { repoRoot, reconciler } = await openContext();
  if (!options.json) info('Fetching...');

  unwrap(await reconciler.submit({ kind: 'fetch' }));

  if (options.json) {
    output({ repoRoot, fetched: true }, true);
    return;
  }
  success('Fetched from remote');
}

export async function pullCommand(target: string, options: RemoteOptions = {}): Promise<void> {
  const { baseBranch, reconciler } = await openContext();
  const view = resolveTarget(reconciler.snapshot(), target);
  const base = options.base ?? baseBranch;

  const result = unwrap(await reconciler.submit({ kind: 'pull', path: view.worktree.path, baseBranch: base }));

  if (options.json) {
    output({ path: result.path, base }, true);
    return;
  }
  success(`Merged ${base} into ${view.worktree.branch || result.path}`);
}

export async function pushCommand(target: string, options: RemoteOptions = {}): Promise<void> {
  const { reconciler } = await openContext();
  const view = resolveTarget(reconciler.snapshot(), target);

  const result = unwrap(await reconciler.submit({ kind: 'push', path: view.worktree.path }));

  if (options.json) {
    output({ path: result.path, branch: view.worktree.branch }, true);
    return;
  }
  success(`Pushed ${view.worktree.branch}`);
}
