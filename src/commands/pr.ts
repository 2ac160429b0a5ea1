import { openContext, resolveTarget, unwrap } from '../core/context.js';
import { ArborError } from '../lib/errors.js';
import { output, reportWarnings, success } from '../lib/output.js';

export interface PrOptions {
  json?: boolean;
}

export function validatePrUrl(url: string): string {
  let parsed: URL;
  try {
    parsed = new URL(url);
  } catch {
    throw new ArborError(`Not a URL: ${url}`, 'INVALID_ARGS');
  }
  if (parsed.protocol !== 'https:' && parsed.protocol !== 'http:') {
    throw new ArborError(`Pull request URL must be http(s): ${url}`, 'INVALID_ARGS');
  }
  return parsed.toString();
}

/** Remember a pull-request URL for display; arbor never calls the hosting API. */
export async function prCommand(target: string, url: string, options: PrOptions = {}): Promise<void> {
  const prUrl = validatePrUrl(url);
  const { reconciler } = await openContext();
  const view = resolveTarget(reconciler.snapshot(), target);

  const result = unwrap(await reconciler.submit({ kind: 'record-pr', path: view.worktree.path, url: prUrl }));

  if (options.json) {
    output({ path: result.path, prUrl }, true);
    return;
  }
  success(`Recorded ${prUrl} for ${view.worktree.branch || result.path}`);
  reportWarnings(result.warnings);
}
