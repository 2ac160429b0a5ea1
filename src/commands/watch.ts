import { openContext } from '../core/context.js';
import { Notifications, type Notification } from '../core/notifications.js';
import { startRefreshScheduler } from '../core/scheduler.js';
import { toArborError } from '../lib/errors.js';
import { debugLog } from '../lib/log.js';
import { buildRows, renderRows } from './list.js';

const REFRESH_INTERVAL_MS = 2000;

const MARKS: Record<Notification['severity'], string> = {
  success: '✓',
  info: '▸',
  warning: '⚠',
  error: '✗',
};

export interface WatchOptions {
  fetch?: boolean;
}

/** Keep the worktree table on screen, refreshing until interrupted. */
export async function watchCommand(options: WatchOptions = {}): Promise<void> {
  const { repoRoot, config, registry, reconciler } = await openContext();
  const notifications = new Notifications();
  let lastFrame = '';

  const render = async () => {
    const snapshot = reconciler.snapshot();
    const table = renderRows(await buildRows(snapshot, registry), repoRoot);
    const notes = notifications.list().map((n) => `${MARKS[n.severity]} ${n.message}`);
    const frame = [table, '', ...notes].join('\n');
    if (frame === lastFrame) return;
    lastFrame = frame;
    console.clear();
    console.log(frame);
  };

  const redraw = () => {
    render().catch((err: unknown) => debugLog(`watch render: ${toArborError(err).message}`));
  };

  const unsubscribeSnapshots = reconciler.subscribe(redraw);
  const unsubscribeResults = reconciler.onResult((event) => {
    notifications.fromResult(event);
  });
  const unsubscribeNotes = notifications.subscribe(redraw);
  const scheduler = startRefreshScheduler(reconciler, {
    refreshIntervalMs: REFRESH_INTERVAL_MS,
    fetchIntervalMs: options.fetch === false ? 0 : config.autoFetchIntervalSec * 1000,
  });
  redraw();

  await new Promise<void>((resolve) => {
    process.once('SIGINT', () => resolve());
  });

  scheduler.stop();
  unsubscribeSnapshots();
  unsubscribeResults();
  unsubscribeNotes();
  notifications.clear();
}
