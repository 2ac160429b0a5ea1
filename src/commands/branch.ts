import { openContext, resolveTarget, unwrap } from '../core/context.js';
import { output, reportWarnings, success } from '../lib/output.js';

export interface BranchOptions {
  json?: boolean;
}

/** Rename the worktree's branch; its sessions follow the new name. */
export async function renameCommand(target: string, newBranch: string, options: BranchOptions = {}): Promise<void> {
  const { reconciler } = await openContext();
  const view = resolveTarget(reconciler.snapshot(), target);
  const oldBranch = view.worktree.branch;

  const result = unwrap(await reconciler.submit({ kind: 'rename-branch', path: view.worktree.path, newBranch }));

  if (options.json) {
    output({ path: result.path, from: oldBranch, to: newBranch }, true);
    return;
  }
  success(`Renamed ${oldBranch} to ${newBranch}`);
  reportWarnings(result.warnings);
}

export async function checkoutCommand(target: string, branch: string, options: BranchOptions = {}): Promise<void> {
  const { reconciler } = await openContext();
  const view = resolveTarget(reconciler.snapshot(), target);

  const result = unwrap(await reconciler.submit({ kind: 'checkout', path: view.worktree.path, branch }));

  if (options.json) {
    output({ path: result.path, branch }, true);
    return;
  }
  success(`Checked out ${branch} in ${result.path}`);
}

export async function baseCommand(target: string, newBase: string, options: BranchOptions = {}): Promise<void> {
  const { reconciler } = await openContext();
  const view = resolveTarget(reconciler.snapshot(), target);

  const result = unwrap(await reconciler.submit({ kind: 'change-base-branch', path: view.worktree.path, newBase }));

  if (options.json) {
    output({ path: result.path, base: newBase }, true);
    return;
  }
  success(`${view.worktree.branch || result.path} now tracks ${newBase}`);
}
