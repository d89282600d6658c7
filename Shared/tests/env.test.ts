import { describe, it, expect, afterEach } from 'vitest';
import { mkdtempSync, mkdirSync, writeFileSync, rmSync } from 'node:fs';
import { join } from 'node:path';
import { tmpdir } from 'node:os';
import { pathToFileURL } from 'node:url';
import { expandEnvVars, loadEnvSafely } from '../Utils/env.js';

describe('expandEnvVars', () => {
  const env = { HOME: '/home/agent', TOKEN: 'test-secret' };

  it('expands bare and braced references', () => {
    expect(expandEnvVars('$HOME/bin', env)).toBe('/home/agent/bin');
    expect(expandEnvVars('Bearer ${TOKEN}', env)).toBe('Bearer test-secret');
  });

  it('leaves unknown variables as written', () => {
    expect(expandEnvVars('$MISSING and ${ALSO_MISSING}', env)).toBe('$MISSING and ${ALSO_MISSING}');
  });

  it('returns plain strings unchanged', () => {
    expect(expandEnvVars('python3', env)).toBe('python3');
  });
});

describe('loadEnvSafely', () => {
  const KEY = '__FLOTILLA_DOTENV_TEST__';
  let root: string | undefined;

  afterEach(() => {
    delete process.env[KEY];
    if (root) rmSync(root, { recursive: true, force: true });
    root = undefined;
  });

  it('loads .env from the directory above the entry file', () => {
    root = mkdtempSync(join(tmpdir(), 'flotilla-env-'));
    mkdirSync(join(root, 'src'));
    writeFileSync(join(root, '.env'), `${KEY}=loaded\n`);
    const entry = pathToFileURL(join(root, 'src', 'index.ts')).href;

    expect(loadEnvSafely(entry, 1)).toBe(join(root, '.env'));
    expect(process.env[KEY]).toBe('loaded');
  });

  it('returns null when no .env exists', () => {
    root = mkdtempSync(join(tmpdir(), 'flotilla-env-'));
    const entry = pathToFileURL(join(root, 'index.ts')).href;
    expect(loadEnvSafely(entry, 0)).toBeNull();
  });
});
