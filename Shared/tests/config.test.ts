import { describe, it, expect, afterEach } from 'vitest';
import { homedir } from 'node:os';
import {
  expandPath,
  getEnvString,
  getEnvNumber,
  getEnvFloat,
  getEnvBoolean,
} from '../Utils/config.js';

const TEST_KEY = '__FLOTILLA_TEST_VAR__';

describe('expandPath', () => {
  it('expands a leading ~/', () => {
    expect(expandPath('~/agents')).toBe(`${homedir()}/agents`);
  });

  it('expands a bare ~', () => {
    expect(expandPath('~')).toBe(homedir());
  });

  it('leaves other paths alone', () => {
    expect(expandPath('/srv/agents')).toBe('/srv/agents');
    expect(expandPath('agents/~')).toBe('agents/~');
  });
});

describe('env helpers', () => {
  afterEach(() => {
    delete process.env[TEST_KEY];
  });

  it('getEnvString returns the value or the default', () => {
    expect(getEnvString(TEST_KEY)).toBeUndefined();
    expect(getEnvString(TEST_KEY, 'fallback')).toBe('fallback');
    process.env[TEST_KEY] = '';
    expect(getEnvString(TEST_KEY, 'fallback')).toBe('');
  });

  it('getEnvNumber parses integers', () => {
    process.env[TEST_KEY] = '8100';
    expect(getEnvNumber(TEST_KEY)).toBe(8100);
    process.env[TEST_KEY] = '3.9';
    expect(getEnvNumber(TEST_KEY)).toBe(3);
    process.env[TEST_KEY] = 'abc';
    expect(getEnvNumber(TEST_KEY, 5000)).toBe(5000);
  });

  it('getEnvFloat keeps the fraction', () => {
    process.env[TEST_KEY] = '0.5';
    expect(getEnvFloat(TEST_KEY)).toBe(0.5);
    process.env[TEST_KEY] = 'soon';
    expect(getEnvFloat(TEST_KEY, 30)).toBe(30);
  });

  it('getEnvBoolean recognizes true/false/1/0', () => {
    process.env[TEST_KEY] = 'TRUE';
    expect(getEnvBoolean(TEST_KEY)).toBe(true);
    process.env[TEST_KEY] = '0';
    expect(getEnvBoolean(TEST_KEY, true)).toBe(false);
    process.env[TEST_KEY] = 'maybe';
    expect(getEnvBoolean(TEST_KEY, true)).toBe(true);
    delete process.env[TEST_KEY];
    expect(getEnvBoolean(TEST_KEY, false)).toBe(false);
  });
});
