/**
 * Augmented environment for execa calls.
 *
 * GUI-launched shells (IDEs, terminal apps started from the dock) often run
 * without the login PATH, so Homebrew, MacPorts and Nix installs of git and
 * tmux would otherwise be invisible.
 */

const extraDirs = [
  '/opt/homebrew/bin',
  '/opt/homebrew/sbin',
  '/opt/local/bin',        // MacPorts
];

const home = process.env.HOME ?? '';
if (home) {
  extraDirs.push(`${home}/.nix-profile/bin`);
}

const augmentedPath = [...extraDirs, process.env.PATH].filter(Boolean).join(':');

export const execaEnv = {
  env: { PATH: augmentedPath },
};

export function gitOptions(cwd: string) {
  return { ...execaEnv, cwd };
}

/** Name of an environment variable carrying the product prefix. */
export function envVar(suffix: string): string {
  return `ARBOR_${suffix}`;
}
