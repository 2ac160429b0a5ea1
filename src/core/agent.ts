import type { AgentSettings } from '../types/config.js';

export const DEFAULT_AGENT: AgentSettings = {
  command: 'claude',
  args: '--permission-mode plan',
  resumeFlag: '--continue',
};

/**
 * Start command for an agent session. `resume` continues the previous
 * conversation in this worktree. No agent command configured means the
 * session starts the user's shell.
 */
export function buildAgentCommand(agent: AgentSettings, resume: boolean): string | undefined {
  if (!agent.command.trim()) return undefined;
  return [agent.command, resume ? agent.resumeFlag : '', agent.args]
    .map((part) => part.trim())
    .filter(Boolean)
    .join(' ');
}
