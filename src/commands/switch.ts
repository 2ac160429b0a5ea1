import { buildAgentCommand } from '../core/agent.js';
import { openContext, resolveTarget, unwrap, type ArborContext } from '../core/context.js';
import { handoffFile, writeHandoff, type HandoffRecord } from '../core/handoff.js';
import { info, output, reportWarnings, success } from '../lib/output.js';
import type { WorktreeView } from '../types/request.js';
import type { SessionKind } from '../types/session.js';

export interface SwitchOptions {
  terminal?: boolean;
  json?: boolean;
}

export function buildHandoffRecord(ctx: ArborContext, view: WorktreeView, kind: SessionKind): HandoffRecord {
  const command = kind === 'agent'
    ? buildAgentCommand(ctx.settings.agent, view.agentInitialized)
    : undefined;
  return {
    path: view.worktree.path,
    branch: view.worktree.branch,
    autoAgent: command !== undefined,
    terminalOnly: kind === 'terminal',
    scriptCommand: command ?? '',
    sessionName: ctx.reconciler.sessionName(view.worktree.path, kind),
    agentInitialized: view.agentInitialized,
  };
}

/**
 * With ARBOR_SWITCH_FILE set (the shell wrapper), write the hand-off line and
 * let the wrapper attach. Otherwise create and attach the session here.
 */
export async function switchCommand(target: string, options: SwitchOptions = {}): Promise<void> {
  const ctx = await openContext();
  const kind: SessionKind = options.terminal ? 'terminal' : 'agent';
  const view = resolveTarget(ctx.reconciler.snapshot(), target);

  const file = handoffFile();
  if (file) {
    const record = buildHandoffRecord(ctx, view, kind);
    await writeHandoff(file, record);
    // The wrapper starts the agent; the next switch should resume it
    if (record.autoAgent) await ctx.store.setAgentInitialized(record.path, true);
    if (record.branch) await ctx.store.setLastSelectedBranch(record.branch);
    if (options.json) output(record, true);
    return;
  }

  await ctx.backend.checkAvailable();
  const inside = ctx.backend.isInsideSession();
  if (!inside && !options.json) {
    info(`Attaching to ${ctx.reconciler.sessionName(view.worktree.path, kind)} (detach to return)`);
  }
  const result = unwrap(await ctx.reconciler.handleSwitch(view.worktree.path, kind));

  if (options.json) {
    output({ path: result.path, sessionName: result.sessionName, created: result.created ?? false }, true);
    return;
  }
  if (inside) success(`Switched to ${result.sessionName ?? view.worktree.path}`);
  reportWarnings(result.warnings);
}
