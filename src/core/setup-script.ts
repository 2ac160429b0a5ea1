import { execa, ExecaError } from 'execa';
import { SetupScriptFailedError } from '../lib/errors.js';
import { envVar, execaEnv } from '../lib/env.js';

export type SetupScriptRunner = (
  command: string,
  cwd: string,
  env: Record<string, string>,
) => Promise<void>;

export function setupScriptEnv(wtPath: string, repoRoot: string, branch: string): Record<string, string> {
  return {
    WORKSPACE_PATH: wtPath,
    ROOT_PATH: repoRoot,
    BRANCH: branch,
    [envVar('WORKSPACE_PATH')]: wtPath,
    [envVar('ROOT_PATH')]: repoRoot,
    [envVar('BRANCH')]: branch,
  };
}

/**
 * Run the repository's setup script through the shell in a new worktree.
 * Any failure is a SetupScriptFailedError (a warning; the worktree stays).
 */
export const runSetupScript: SetupScriptRunner = async (command, cwd, env) => {
  try {
    await execa(command, {
      shell: true,
      cwd,
      env: { ...execaEnv.env, ...env },
      stdin: 'ignore',
    });
  } catch (err) {
    if (err instanceof ExecaError && typeof err.exitCode === 'number') {
      throw new SetupScriptFailedError(command, err.exitCode);
    }
    throw new SetupScriptFailedError(command, undefined, err instanceof Error ? err.message : String(err));
  }
};
