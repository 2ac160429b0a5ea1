import { describe, test, expect, vi, beforeEach, afterEach } from 'vitest';

const { FakeExecaError } = vi.hoisted(() => {
  class FakeExecaError extends Error {
    constructor(public readonly stderr: string) {
      super(stderr);
    }
  }
  return { FakeExecaError };
});

const mockExeca = vi.fn(async (_file: string, _args: string[], _options?: Record<string, unknown>) => ({ stdout: '' }));

vi.mock('execa', () => ({
  execa: (file: string, args: string[], options?: Record<string, unknown>) => mockExeca(file, args, options),
  ExecaError: FakeExecaError,
}));

vi.mock('../lib/env.js', () => ({
  execaEnv: { env: { PATH: '/usr/bin' } },
}));

import {
  attachSession,
  checkTmux,
  isTmuxNotFoundError,
  listSessions,
  newSession,
  sessionExists,
} from './tmux.js';

function argsOf(call: number): string[] {
  return mockExeca.mock.calls[call][1];
}

beforeEach(() => {
  mockExeca.mockReset();
  mockExeca.mockResolvedValue({ stdout: '' });
});

afterEach(() => {
  vi.unstubAllEnvs();
});

describe('checkTmux', () => {
  test('given tmux missing, should throw TmuxNotFoundError', async () => {
    mockExeca.mockRejectedValueOnce(new FakeExecaError('command not found'));

    await expect(checkTmux()).rejects.toMatchObject({ code: 'TMUX_NOT_FOUND' });
  });
});

describe('sessionExists', () => {
  test('given has-session succeeds, should match the exact name', async () => {
    expect(await sessionExists('arbor-fix')).toBe(true);
    expect(argsOf(0)).toEqual(['has-session', '-t', '=arbor-fix']);
  });

  test('given has-session fails, should return false', async () => {
    mockExeca.mockRejectedValueOnce(new FakeExecaError("can't find session: arbor-fix"));

    expect(await sessionExists('arbor-fix')).toBe(false);
  });
});

describe('newSession', () => {
  test('given a start command, should pass it last and raise the history limit', async () => {
    await newSession('arbor-fix', '/tmp/project/.worktrees/fix', 'claude --continue');

    expect(argsOf(0)).toEqual([
      'new-session', '-d', '-s', 'arbor-fix', '-c', '/tmp/project/.worktrees/fix', 'claude --continue',
    ]);
    expect(argsOf(1)).toEqual(['set-option', '-t', '=arbor-fix', 'history-limit', '50000']);
  });

  test('given no command, should start the default shell', async () => {
    await newSession('arbor-fix-terminal', '/tmp/project');

    expect(argsOf(0)).toEqual(['new-session', '-d', '-s', 'arbor-fix-terminal', '-c', '/tmp/project']);
  });
});

describe('attachSession', () => {
  test('given a client inside tmux, should switch the client', async () => {
    vi.stubEnv('TMUX', '/tmp/tmux-1000/default,123,0');

    await attachSession('arbor-fix');

    expect(argsOf(0)).toEqual(['switch-client', '-t', '=arbor-fix']);
  });

  test('given a plain terminal, should attach with inherited stdio', async () => {
    vi.stubEnv('TMUX', '');

    await attachSession('arbor-fix');

    expect(argsOf(0)).toEqual(['attach-session', '-t', '=arbor-fix']);
    expect(mockExeca.mock.calls[0][2]).toMatchObject({ stdio: 'inherit' });
  });
});

describe('listSessions', () => {
  test('given sessions, should return one name per line', async () => {
    mockExeca.mockResolvedValueOnce({ stdout: 'arbor-main\narbor-fix-terminal\n' });

    expect(await listSessions()).toEqual(['arbor-main', 'arbor-fix-terminal']);
  });

  test('given no server running, should return an empty list', async () => {
    mockExeca.mockRejectedValueOnce(new FakeExecaError('no server running on /tmp/tmux-1000/default'));

    expect(await listSessions()).toEqual([]);
  });

  test('given another failure, should rethrow', async () => {
    mockExeca.mockRejectedValueOnce(new FakeExecaError('protocol version mismatch'));

    await expect(listSessions()).rejects.toThrow('protocol version mismatch');
  });
});

describe('isTmuxNotFoundError', () => {
  test('given a plain Error, should return false', () => {
    expect(isTmuxNotFoundError(new Error("can't find session"))).toBe(false);
  });

  test('given a missing target, should return true', () => {
    expect(isTmuxNotFoundError(new FakeExecaError("can't find session: x"))).toBe(true);
  });
});
