import { openContext, resolveTarget, unwrap } from '../core/context.js';
import { output, reportWarnings, success } from '../lib/output.js';

export interface DeleteOptions {
  force?: boolean;
  json?: boolean;
}

export async function deleteCommand(target: string, options: DeleteOptions = {}): Promise<void> {
  const { reconciler } = await openContext();
  const view = resolveTarget(reconciler.snapshot(), target);

  const result = unwrap(await reconciler.handleDelete(view.worktree.path, options.force ?? false));

  if (options.json) {
    output({
      path: result.path,
      branch: view.worktree.branch,
      warnings: result.warnings.map((w) => ({ code: w.code, message: w.message })),
    }, true);
    return;
  }
  success(`Deleted worktree ${result.path}`);
  reportWarnings(result.warnings);
}
