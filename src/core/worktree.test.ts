import { describe, test, expect, vi, beforeEach } from 'vitest';

// --- Mocks ---

const { FakeExecaError } = vi.hoisted(() => {
  class FakeExecaError extends Error {
    constructor(public readonly stderr: string) {
      super(stderr);
    }
  }
  return { FakeExecaError };
});

type GitRoute = (args: string[], cwd: string) => string;

const routes: Array<{ match: string; respond: GitRoute | string | Error }> = [];

const mockExeca = vi.fn(async (_file: string, args: string[], options?: { cwd?: string }) => {
  const joined = args.join(' ');
  const route = routes.find((r) => joined.startsWith(r.match));
  if (!route) throw new FakeExecaError(`unexpected git ${joined}`);
  if (route.respond instanceof Error) throw route.respond;
  const stdout = typeof route.respond === 'string'
    ? route.respond
    : route.respond(args, options?.cwd ?? '');
  return { stdout, stderr: '' };
});

vi.mock('execa', () => ({
  execa: (file: string, args: string[], options?: { cwd?: string }) => mockExeca(file, args, options),
  ExecaError: FakeExecaError,
}));

vi.mock('../lib/env.js', () => ({
  execaEnv: { env: { PATH: '/usr/bin' } },
  gitOptions: (cwd: string) => ({ env: { PATH: '/usr/bin' }, cwd }),
}));

// --- Imports (after mocks) ---

import {
  GitWorktreeRepository,
  classifyRemoteError,
  getRepoRoot,
  parseAheadBehind,
  parseWorktreeList,
  sortWorktrees,
} from './worktree.js';
import {
  AuthenticationRequiredError,
  BranchAlreadyCheckedOutError,
  InvalidBranchNameError,
  MergeConflictError,
  NotAGitRepositoryError,
  RemoteUnreachableError,
  UncommittedChangesError,
  WorktreeCreationFailedError,
  WorktreeNotFoundError,
} from '../lib/errors.js';
import { makeWorktree } from '../test-fixtures.js';

const ROOT = '/tmp/project';

const PORCELAIN = [
  `worktree ${ROOT}`,
  'HEAD 1111111111111111111111111111111111111111',
  'branch refs/heads/main',
  '',
  `worktree ${ROOT}/.worktrees/feature-x`,
  'HEAD 2222222222222222222222222222222222222222',
  'branch refs/heads/feature-x',
  '',
  `worktree ${ROOT}/.worktrees/old`,
  'HEAD 3333333333333333333333333333333333333333',
  'detached',
  '',
  `worktree ${ROOT}/.worktrees/gone`,
  'HEAD 4444444444444444444444444444444444444444',
  'branch refs/heads/gone',
  'prunable gitdir file points to non-existent location',
  '',
].join('\n');

function route(match: string, respond: GitRoute | string | Error): void {
  routes.push({ match, respond });
}

beforeEach(() => {
  vi.clearAllMocks();
  routes.length = 0;
});

describe('parseWorktreeList', () => {
  test('given porcelain output, should parse every entry in order', () => {
    const entries = parseWorktreeList(PORCELAIN);

    expect(entries.map((e) => e.path)).toEqual([
      ROOT,
      `${ROOT}/.worktrees/feature-x`,
      `${ROOT}/.worktrees/old`,
      `${ROOT}/.worktrees/gone`,
    ]);
    expect(entries[1].branch).toBe('feature-x');
    expect(entries[1].head).toBe('2222222222222222222222222222222222222222');
    expect(entries[2].detached).toBe(true);
    expect(entries[2].branch).toBe('');
    expect(entries[3].prunable).toBe(true);
  });

  test('given empty output, should return no entries', () => {
    expect(parseWorktreeList('')).toEqual([]);
  });
});

describe('parseAheadBehind', () => {
  test('given "behind<TAB>ahead", should map left to behind and right to ahead', () => {
    expect(parseAheadBehind('3\t5')).toEqual({ ahead: 5, behind: 3 });
  });

  test('given garbage, should return zeros', () => {
    expect(parseAheadBehind('')).toEqual({ ahead: 0, behind: 0 });
  });
});

describe('sortWorktrees', () => {
  test('given mixed entries, should put root first then by recency then by path', () => {
    const root = makeWorktree({ path: '/r', branch: 'main', isRoot: true });
    const a = makeWorktree({ path: '/r/.worktrees/a', branch: 'a' });
    const b = makeWorktree({ path: '/r/.worktrees/b', branch: 'b' });
    const c = makeWorktree({ path: '/r/.worktrees/c', branch: 'c' });
    const recency = new Map([['b', 0], ['main', 1], ['a', 2]]);

    const sorted = sortWorktrees([c, a, root, b], recency);

    expect(sorted.map((w) => w.branch)).toEqual(['main', 'b', 'a', 'c']);
  });
});

describe('classifyRemoteError', () => {
  test('given a merge conflict, should return MergeConflictError', () => {
    const err = classifyRemoteError('Auto-merging a.ts\nCONFLICT (content): Merge conflict in a.ts');
    expect(err).toBeInstanceOf(MergeConflictError);
    expect(err?.message).toBe('Merge conflict: Auto-merging a.ts');
  });

  test('given an auth failure, should return AuthenticationRequiredError', () => {
    const err = classifyRemoteError("fatal: Authentication failed for 'https://example.test/repo.git/'");
    expect(err).toBeInstanceOf(AuthenticationRequiredError);
  });

  test('given an unresolvable host, should return RemoteUnreachableError', () => {
    const err = classifyRemoteError("fatal: unable to access 'https://example.test/': Could not resolve host: example.test");
    expect(err).toBeInstanceOf(RemoteUnreachableError);
  });

  test('given unrelated stderr, should return undefined', () => {
    expect(classifyRemoteError('fatal: something else')).toBeUndefined();
  });
});

describe('getRepoRoot', () => {
  test('given a cwd inside a linked worktree, should return the main checkout', async () => {
    route('worktree list --porcelain', PORCELAIN);

    const root = await getRepoRoot(`${ROOT}/.worktrees/feature-x`);

    expect(root).toBe(ROOT);
    expect(mockExeca.mock.calls[0][2]).toMatchObject({ cwd: `${ROOT}/.worktrees/feature-x` });
  });

  test('given a directory outside any repository, should throw NotAGitRepositoryError', async () => {
    route('worktree list --porcelain', new FakeExecaError('fatal: not a git repository'));

    await expect(getRepoRoot('/tmp/elsewhere')).rejects.toBeInstanceOf(NotAGitRepositoryError);
  });
});

describe('GitWorktreeRepository', () => {
  const repo = new GitWorktreeRepository(ROOT, 'main');

  describe('listWorktrees', () => {
    test('given a repository, should describe live worktrees with root first', async () => {
      route('rev-parse --git-dir', '.git');
      route('worktree list --porcelain', PORCELAIN);
      route('for-each-ref', 'feature-x\nmain');
      route('status --porcelain', (_args, cwd) => (cwd.endsWith('feature-x') ? ' M a.ts' : ''));
      route('rev-list --left-right --count @{upstream}...HEAD', (_args, cwd) => {
        if (cwd === ROOT) return '0\t0';
        throw new FakeExecaError('fatal: no upstream configured');
      });
      route('rev-list --left-right --count main...HEAD', '1\t2');

      const worktrees = await repo.listWorktrees();

      expect(worktrees.map((w) => w.path)).toEqual([
        ROOT,
        `${ROOT}/.worktrees/feature-x`,
        `${ROOT}/.worktrees/old`,
      ]);
      expect(worktrees[0].isRoot).toBe(true);
      expect(worktrees[1]).toEqual({
        path: `${ROOT}/.worktrees/feature-x`,
        branch: 'feature-x',
        isRoot: false,
        hasUncommittedChanges: true,
        aheadBehind: { ahead: 2, behind: 1 },
        lastKnownCommitHash: '2222222222222222222222222222222222222222',
      });
      expect(worktrees[2].branch).toBe('');
    });

    test('given the root holding the worktrees directory, should not count it as a change', async () => {
      route('rev-parse --git-dir', '.git');
      route('worktree list --porcelain', `worktree ${ROOT}\nHEAD 1111111\nbranch refs/heads/main\n`);
      route('for-each-ref', 'main');
      route('status --porcelain', (args) => (args.includes(':(exclude).worktrees') ? '' : '?? .worktrees/'));
      route('rev-list', '0\t0');

      const [root] = await repo.listWorktrees();

      expect(root.hasUncommittedChanges).toBe(false);
      const statusCall = mockExeca.mock.calls.find((c) => c[1][0] === 'status');
      expect(statusCall?.[1]).toEqual(['status', '--porcelain', '--', '.', ':(exclude).worktrees']);
    });

    test('given a directory without git metadata, should throw NotAGitRepositoryError', async () => {
      route('rev-parse --git-dir', new FakeExecaError('fatal: not a git repository'));

      await expect(repo.listWorktrees()).rejects.toBeInstanceOf(NotAGitRepositoryError);
    });
  });

  describe('createWorktree', () => {
    test('given a new branch, should cut it from the base branch', async () => {
      route('check-ref-format --branch feature-x', 'feature-x');
      route('worktree add', '');
      route('rev-parse HEAD', 'abc123');

      const wt = await repo.createWorktree('feature-x', false, 'develop');

      const addCall = mockExeca.mock.calls.find((c) => c[1][0] === 'worktree');
      expect(addCall?.[1]).toEqual(['worktree', 'add', '-b', 'feature-x', `${ROOT}/.worktrees/feature-x`, 'develop']);
      expect(wt).toEqual({
        path: `${ROOT}/.worktrees/feature-x`,
        branch: 'feature-x',
        isRoot: false,
        hasUncommittedChanges: false,
        aheadBehind: { ahead: 0, behind: 0 },
        lastKnownCommitHash: 'abc123',
      });
    });

    test('given no base branch, should use the default base', async () => {
      route('check-ref-format', 'x');
      route('worktree add', '');
      route('rev-parse HEAD', 'abc123');

      await repo.createWorktree('fix/login', false);

      const addCall = mockExeca.mock.calls.find((c) => c[1][0] === 'worktree');
      expect(addCall?.[1]).toEqual(['worktree', 'add', '-b', 'fix/login', `${ROOT}/.worktrees/fix-login`, 'main']);
    });

    test('given an existing branch already checked out, should throw BranchAlreadyCheckedOutError', async () => {
      route('check-ref-format', 'feature-x');
      route('rev-parse --git-dir', '.git');
      route('worktree list --porcelain', PORCELAIN);

      await expect(repo.createWorktree('feature-x', true)).rejects.toBeInstanceOf(BranchAlreadyCheckedOutError);
    });

    test('given an invalid branch name, should throw InvalidBranchNameError', async () => {
      route('check-ref-format', new FakeExecaError('fatal: invalid'));

      await expect(repo.createWorktree('bad..name', false)).rejects.toBeInstanceOf(InvalidBranchNameError);
    });

    test('given git failing, should wrap stderr in WorktreeCreationFailedError', async () => {
      route('check-ref-format', 'x');
      route('worktree add', new FakeExecaError("fatal: invalid reference: nope"));

      const err = await repo.createWorktree('feature-y', false, 'nope').catch((e: unknown) => e);

      expect(err).toBeInstanceOf(WorktreeCreationFailedError);
      expect(err).toHaveProperty('stderr', 'fatal: invalid reference: nope');
    });
  });

  describe('deleteWorktree', () => {
    test('given uncommitted changes without force, should throw UncommittedChangesError', async () => {
      route('rev-parse --git-dir', '.git');
      route('worktree list --porcelain', PORCELAIN);
      route('status --porcelain', ' M a.ts');

      await expect(repo.deleteWorktree(`${ROOT}/.worktrees/feature-x`, false))
        .rejects.toBeInstanceOf(UncommittedChangesError);
      expect(mockExeca.mock.calls.some((c) => c[1][1] === 'remove')).toBe(false);
    });

    test('given force, should remove with --force without checking status', async () => {
      route('rev-parse --git-dir', '.git');
      route('worktree list --porcelain', PORCELAIN);
      route('worktree remove', '');

      await repo.deleteWorktree(`${ROOT}/.worktrees/feature-x`, true);

      const removeCall = mockExeca.mock.calls.find((c) => c[1][1] === 'remove');
      expect(removeCall?.[1]).toEqual(['worktree', 'remove', `${ROOT}/.worktrees/feature-x`, '--force']);
    });

    test('given an unknown path, should throw WorktreeNotFoundError', async () => {
      route('rev-parse --git-dir', '.git');
      route('worktree list --porcelain', PORCELAIN);

      await expect(repo.deleteWorktree('/elsewhere', false)).rejects.toBeInstanceOf(WorktreeNotFoundError);
    });

    test('given the root path, should refuse', async () => {
      route('rev-parse --git-dir', '.git');
      route('worktree list --porcelain', PORCELAIN);

      await expect(repo.deleteWorktree(ROOT, true)).rejects.toMatchObject({ code: 'ROOT_WORKTREE' });
    });
  });

  describe('remote operations', () => {
    test('given an auth failure on push, should throw AuthenticationRequiredError', async () => {
      route('push', new FakeExecaError('remote: Permission denied to user.'));

      await expect(repo.push(`${ROOT}/.worktrees/feature-x`, 'feature-x'))
        .rejects.toBeInstanceOf(AuthenticationRequiredError);
    });

    test('given a conflict on pull, should throw MergeConflictError', async () => {
      route('pull', new FakeExecaError('CONFLICT (content): Merge conflict in a.ts'));

      await expect(repo.pull(`${ROOT}/.worktrees/feature-x`, 'main'))
        .rejects.toBeInstanceOf(MergeConflictError);
    });

    test('given an unclassified failure, should throw GitCommandError', async () => {
      route('fetch', new FakeExecaError('fatal: weird'));

      await expect(repo.fetch()).rejects.toMatchObject({ code: 'GIT_FAILED' });
    });

    test('given success, should run pull in the worktree against origin', async () => {
      route('pull', '');

      await repo.pull(`${ROOT}/.worktrees/feature-x`, 'main');

      expect(mockExeca).toHaveBeenCalledWith(
        'git',
        ['pull', '--no-rebase', 'origin', 'main'],
        { env: { PATH: '/usr/bin' }, cwd: `${ROOT}/.worktrees/feature-x` },
      );
    });
  });

  describe('checkout', () => {
    test('given local changes in the way, should throw UncommittedChangesError', async () => {
      route('checkout', new FakeExecaError('error: Your local changes to the following files would be overwritten by checkout'));

      await expect(repo.checkout(ROOT, 'other')).rejects.toBeInstanceOf(UncommittedChangesError);
    });
  });

  describe('changeBaseBranch', () => {
    test('given a missing base, should throw BRANCH_NOT_FOUND', async () => {
      route('rev-parse --verify', new FakeExecaError(''));

      await expect(repo.changeBaseBranch(`${ROOT}/.worktrees/feature-x`, 'nope'))
        .rejects.toMatchObject({ code: 'BRANCH_NOT_FOUND' });
    });

    test('given an existing base, should set the upstream', async () => {
      route('rev-parse --verify', 'abc');
      route('branch --set-upstream-to=develop', '');

      await repo.changeBaseBranch(`${ROOT}/.worktrees/feature-x`, 'develop');

      expect(mockExeca).toHaveBeenLastCalledWith(
        'git',
        ['branch', '--set-upstream-to=develop'],
        { env: { PATH: '/usr/bin' }, cwd: `${ROOT}/.worktrees/feature-x` },
      );
    });
  });
});
