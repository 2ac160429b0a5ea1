import { toArborError } from '../lib/errors.js';
import { debugLog, type LogFn } from '../lib/log.js';
import type { Reconciler } from './reconciler.js';
import type { ReconcileRequest } from '../types/request.js';

export type SchedulerTarget = Pick<Reconciler, 'submit' | 'isRefreshPending' | 'isFetchPending'>;

export interface SchedulerOptions {
  refreshIntervalMs: number;
  /** Periodic `git fetch`; omitted or 0 disables it. */
  fetchIntervalMs?: number;
  log?: LogFn;
}

export interface RefreshScheduler {
  stop(): void;
}

/**
 * Periodically submits refresh (and optionally fetch) requests. A tick is
 * skipped while the previous one is still queued or running.
 */
export function startRefreshScheduler(target: SchedulerTarget, options: SchedulerOptions): RefreshScheduler {
  const log = options.log ?? debugLog;

  const send = (request: ReconcileRequest) => {
    target.submit(request)
      .then((event) => {
        if (event.status === 'failed') log(`scheduled ${request.kind}: ${event.error.message}`);
      })
      .catch((err: unknown) => log(`scheduled ${request.kind}: ${toArborError(err).message}`));
  };

  const timers: NodeJS.Timeout[] = [];

  timers.push(setInterval(() => {
    if (target.isRefreshPending()) {
      log('scheduled refresh skipped: previous still pending');
      return;
    }
    send({ kind: 'refresh' });
  }, options.refreshIntervalMs));

  const fetchMs = options.fetchIntervalMs ?? 0;
  if (fetchMs > 0) {
    timers.push(setInterval(() => {
      if (target.isFetchPending()) {
        log('scheduled fetch skipped: previous still pending');
        return;
      }
      send({ kind: 'fetch' });
    }, fetchMs));
  }

  return {
    stop() {
      for (const timer of timers) clearInterval(timer);
      timers.length = 0;
    },
  };
}
