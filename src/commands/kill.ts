import { openContext, resolveTarget, unwrap } from '../core/context.js';
import { output, success } from '../lib/output.js';

export interface KillOptions {
  terminal?: boolean;
  json?: boolean;
}

export async function killCommand(target: string, options: KillOptions = {}): Promise<void> {
  const { reconciler } = await openContext();
  const view = resolveTarget(reconciler.snapshot(), target);
  const session = options.terminal ? 'terminal' : 'agent';

  const result = unwrap(await reconciler.submit({ kind: 'kill-session', path: view.worktree.path, session }));

  if (options.json) {
    output({ path: result.path, sessionName: result.sessionName }, true);
    return;
  }
  success(`Killed ${result.sessionName ?? session}`);
}
