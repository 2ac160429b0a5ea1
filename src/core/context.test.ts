import { describe, test, expect } from 'vitest';
import { resolveTarget, unwrap } from './context.js';
import { OperationInProgressError } from '../lib/errors.js';
import { TEST_ROOT, makeRootWorktree, makeWorktree } from '../test-fixtures.js';
import type { Snapshot } from '../types/request.js';

const snapshot: Snapshot = {
  repoRoot: TEST_ROOT,
  worktrees: [
    { worktree: makeRootWorktree(), state: 'listed', agentInitialized: false },
    { worktree: makeWorktree(), state: 'listed', agentInitialized: false },
    {
      worktree: makeWorktree({ path: `${TEST_ROOT}/.worktrees/fix-login`, branch: 'fix/login' }),
      state: 'listed',
      agentInitialized: false,
    },
  ],
};

describe('resolveTarget', () => {
  test('given a relative path, should resolve it against cwd', () => {
    const found = resolveTarget(snapshot, '.worktrees/feature-auth', TEST_ROOT);

    expect(found.worktree.branch).toBe('feature-auth');
  });

  test('given a branch name, should match it', () => {
    expect(resolveTarget(snapshot, 'fix/login', '/elsewhere').worktree.path).toBe(`${TEST_ROOT}/.worktrees/fix-login`);
  });

  test('given a directory name, should match the basename', () => {
    expect(resolveTarget(snapshot, 'fix-login', '/elsewhere').worktree.branch).toBe('fix/login');
  });

  test('given nothing matching, should throw TARGET_NOT_FOUND', () => {
    expect(() => resolveTarget(snapshot, 'nope', '/elsewhere')).toThrow('Could not resolve target: nope');
  });
});

describe('unwrap', () => {
  test('given an ok result, should return it', () => {
    const event = { requestId: 'rq-1', kind: 'refresh' as const, path: TEST_ROOT, status: 'ok' as const, warnings: [] };

    expect(unwrap(event)).toBe(event);
  });

  test('given a rejection, should throw its error', () => {
    const error = new OperationInProgressError(TEST_ROOT, 'fetch');

    expect(() => unwrap({ requestId: 'rq-1', kind: 'fetch', path: TEST_ROOT, status: 'rejected', error })).toThrow(error);
  });

  test('given a discarded result, should throw WORKTREE_NOT_FOUND', () => {
    expect(() => unwrap({ requestId: 'rq-1', kind: 'pull', path: TEST_ROOT, status: 'discarded' }))
      .toThrow(`Worktree disappeared before pull finished: ${TEST_ROOT}`);
  });
});
