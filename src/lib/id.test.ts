import { describe, test, expect } from 'vitest';
import { requestId } from './id.js';

describe('requestId', () => {
  test('matches rq-{8 lowercase alphanumeric}', () => {
    expect(requestId()).toMatch(/^rq-[a-z0-9]{8}$/);
  });

  test('generates unique ids', () => {
    const ids = new Set(Array.from({ length: 50 }, () => requestId()));
    expect(ids.size).toBe(50);
  });
});
