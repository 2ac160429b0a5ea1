import { describe, test, expect } from 'vitest';
import { configPatch, parseInterval } from './config.js';

describe('parseInterval', () => {
  test('given whole seconds, should return them', () => {
    expect(parseInterval('30')).toBe(30);
    expect(parseInterval('0')).toBe(0);
  });

  test('given a negative or fractional value, should throw INVALID_ARGS', () => {
    expect(() => parseInterval('-5')).toThrow('Interval must be a whole number of seconds: -5');
    expect(() => parseInterval('1.5')).toThrow('Interval must be a whole number of seconds: 1.5');
  });

  test('given text, should throw', () => {
    expect(() => parseInterval('soon')).toThrow('Interval must be a whole number of seconds: soon');
  });
});

describe('configPatch', () => {
  test('given no flags, should return undefined', () => {
    expect(configPatch({ json: true })).toBeUndefined();
  });

  test('given flags, should map them onto repository settings', () => {
    expect(configPatch({ baseBranch: 'develop', interval: '60', editor: 'vim', theme: 'dusk' })).toEqual({
      baseBranch: 'develop',
      autoFetchInterval: 60,
      editor: 'vim',
      theme: 'dusk',
    });
  });

  test('given only an interval, should leave other settings out', () => {
    expect(configPatch({ interval: '0' })).toEqual({ autoFetchInterval: 0 });
  });
});
