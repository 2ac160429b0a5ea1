import os from 'node:os';
import path from 'node:path';

const CONFIG_DIR_NAME = 'arbor';
const REPO_SETTINGS_FILE = '.arbor.yaml';
export const WORKTREES_DIR = '.worktrees';

export function configDir(): string {
  const override = process.env.ARBOR_CONFIG_DIR;
  if (override) return override;
  return path.join(os.homedir(), '.config', CONFIG_DIR_NAME);
}

export function configPath(): string {
  return path.join(configDir(), 'config.yaml');
}

export function repoSettingsPath(repoRoot: string): string {
  return path.join(repoRoot, REPO_SETTINGS_FILE);
}

export function worktreeBaseDir(repoRoot: string): string {
  return path.join(repoRoot, WORKTREES_DIR);
}

export function worktreePath(repoRoot: string, dirName: string): string {
  return path.join(worktreeBaseDir(repoRoot), dirName);
}

export function debugLogPath(): string {
  return path.join(os.tmpdir(), `${CONFIG_DIR_NAME}-debug.log`);
}
