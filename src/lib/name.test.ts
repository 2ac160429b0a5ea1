import { describe, test, expect } from 'vitest';
import { sanitizeSessionName, worktreeDirName } from './name.js';

describe('sanitizeSessionName', () => {
  test('given slashes and punctuation, should replace with single hyphens', () => {
    expect(sanitizeSessionName('Fix/Bug #42!')).toBe('Fix-Bug-42');
  });

  test('given dots and colons, should replace with hyphens', () => {
    expect(sanitizeSessionName('release/v1.2:rc')).toBe('release-v1-2-rc');
  });

  test('given mixed case, should keep case', () => {
    expect(sanitizeSessionName('MyFeature')).toBe('MyFeature');
  });

  test('given underscores and hyphens, should keep them', () => {
    expect(sanitizeSessionName('snake_case-name')).toBe('snake_case-name');
  });

  test('given leading and trailing separators, should trim them', () => {
    expect(sanitizeSessionName('--/wip/--')).toBe('wip');
  });

  test('given only invalid characters, should return empty string', () => {
    expect(sanitizeSessionName('/#!')).toBe('');
  });

  test('given already sanitized output, should be idempotent', () => {
    const once = sanitizeSessionName('feat/öüä//thing..');
    expect(sanitizeSessionName(once)).toBe(once);
    expect(once).toBe('feat-thing');
  });
});

describe('worktreeDirName', () => {
  test('given nested branch, should flatten slashes', () => {
    expect(worktreeDirName('feature/auth/login', 'wt')).toBe('feature-auth-login');
  });

  test('given whitespace, should convert to hyphens', () => {
    expect(worktreeDirName('fix login bug', 'wt')).toBe('fix-login-bug');
  });

  test('given leading dots, should strip them', () => {
    expect(worktreeDirName('.hidden', 'wt')).toBe('hidden');
  });

  test('given nothing usable, should return fallback', () => {
    expect(worktreeDirName('///', 'wt-fallback')).toBe('wt-fallback');
  });
});
