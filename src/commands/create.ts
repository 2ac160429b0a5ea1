import { openContext, unwrap } from '../core/context.js';
import { output, reportWarnings, success } from '../lib/output.js';

export interface CreateOptions {
  existing?: boolean;
  base?: string;
  json?: boolean;
}

export async function createCommand(branch: string, options: CreateOptions = {}): Promise<void> {
  const { reconciler } = await openContext();

  const result = unwrap(await reconciler.handleCreate({
    branch,
    fromExisting: options.existing ?? false,
    baseBranch: options.base,
  }));

  if (options.json) {
    output({
      path: result.path,
      branch,
      warnings: result.warnings.map((w) => ({ code: w.code, message: w.message })),
    }, true);
    return;
  }
  success(`Created worktree ${result.path} (${branch})`);
  reportWarnings(result.warnings);
}
