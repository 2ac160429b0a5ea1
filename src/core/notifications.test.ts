import { describe, test, expect, vi, beforeEach, afterEach } from 'vitest';
import { Notifications } from './notifications.js';
import {
  ArborError,
  OperationInProgressError,
  SetupScriptFailedError,
} from '../lib/errors.js';

const PATH = '/tmp/project/.worktrees/feature-auth';

beforeEach(() => {
  vi.useFakeTimers();
});

afterEach(() => {
  vi.useRealTimers();
});

describe('Notifications', () => {
  test('given a failed result, should add an error and dismiss it after the delay', () => {
    const notifications = new Notifications();

    notifications.fromResult({
      requestId: 'rq-test0001',
      kind: 'delete',
      path: PATH,
      status: 'failed',
      error: new ArborError('Worktree has uncommitted changes', 'UNCOMMITTED_CHANGES'),
    });

    expect(notifications.list(PATH)).toEqual([
      { id: 1, path: PATH, severity: 'error', message: 'Worktree has uncommitted changes' },
    ]);

    vi.advanceTimersByTime(2999);
    expect(notifications.list()).toHaveLength(1);
    vi.advanceTimersByTime(1);
    expect(notifications.list()).toEqual([]);
  });

  test('given warnings on a success, should add one warning each', () => {
    const notifications = new Notifications();

    const added = notifications.fromResult({
      requestId: 'rq-test0002',
      kind: 'create',
      path: PATH,
      status: 'ok',
      warnings: [new SetupScriptFailedError('npm install', 1)],
    });

    expect(added.map((n) => [n.severity, n.message])).toEqual([
      ['warning', 'Setup script "npm install" exited with code 1'],
    ]);
  });

  test('given a rejection, should add an info message', () => {
    const notifications = new Notifications();

    const [added] = notifications.fromResult({
      requestId: 'rq-test0003',
      kind: 'switch',
      path: PATH,
      status: 'rejected',
      error: new OperationInProgressError(PATH, 'delete'),
    });

    expect(added.severity).toBe('info');
    expect(added.message).toBe(`Operation in progress for ${PATH} (delete). Retry once it finishes.`);
  });

  test('given routine or discarded results, should stay silent', () => {
    const notifications = new Notifications();

    notifications.fromResult({ requestId: 'rq-1', kind: 'refresh', path: '/tmp/project', status: 'ok', warnings: [] });
    notifications.fromResult({ requestId: 'rq-2', kind: 'pull', path: PATH, status: 'discarded' });

    expect(notifications.list()).toEqual([]);
  });

  test('given a subscriber, should report every change', () => {
    const notifications = new Notifications(100);
    const listener = vi.fn();
    notifications.subscribe(listener);

    notifications.fromResult({ requestId: 'rq-1', kind: 'push', path: PATH, status: 'ok', warnings: [] });
    vi.advanceTimersByTime(100);

    expect(listener).toHaveBeenCalledTimes(2);
    expect(listener.mock.calls[0][0]).toEqual([{ id: 1, path: PATH, severity: 'success', message: 'Pushed branch' }]);
    expect(listener.mock.calls[1][0]).toEqual([]);
  });

  test('given a manual dismiss, should cancel the timer', () => {
    const notifications = new Notifications();
    const listener = vi.fn();
    const n = notifications.push(PATH, 'info', 'hello');
    notifications.subscribe(listener);

    notifications.dismiss(n.id);
    vi.advanceTimersByTime(5000);

    expect(listener).toHaveBeenCalledTimes(1);
    expect(notifications.list()).toEqual([]);
  });
});
