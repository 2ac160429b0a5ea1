/**
 * Reduce an arbitrary string to the character set tmux accepts in session
 * names: `[A-Za-z0-9_-]`, single hyphens only, no leading or trailing hyphen.
 *
 * Lossy: `fix/a` and `fix-a` both become `fix-a`.
 */
export function sanitizeSessionName(raw: string): string {
  return raw
    .replace(/[^A-Za-z0-9_-]/g, '-')
    .replace(/-{2,}/g, '-')
    .replace(/^-+|-+$/g, '');
}

/**
 * Directory name for a branch's worktree under `.worktrees/`.
 * Slashes become hyphens so nested branch names stay one level deep.
 */
export function worktreeDirName(branch: string, fallback: string): string {
  const name = branch
    // Control characters → removed
    .replace(/[\x00-\x1f\x7f]+/g, '')
    // Path separators and whitespace → hyphens
    .replace(/[\s/\\]+/g, '-')
    // Characters that are awkward in paths → hyphens
    .replace(/[~^:?*[\]@{}<>|"'`$]+/g, '-')
    .replace(/-{2,}/g, '-')
    .replace(/^[-.]+|[-.]+$/g, '');

  return name || fallback;
}
