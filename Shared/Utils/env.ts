import { config as dotenvConfig } from 'dotenv';
import { existsSync } from 'node:fs';
import { resolve, dirname } from 'node:path';
import { fileURLToPath } from 'node:url';

/**
 * Load .env from the package root without letting dotenv print to stdout.
 *
 * @param importMetaUrl - pass `import.meta.url` from the entry point
 * @param levelsUp - directories up from the entry file to the package root
 * @returns the path that was loaded, or null when no .env exists
 */
export function loadEnvSafely(importMetaUrl: string, levelsUp = 1): string | null {
  let dir = dirname(fileURLToPath(importMetaUrl));
  for (let i = 0; i < levelsUp; i++) {
    dir = dirname(dir);
  }
  const envPath = resolve(dir, '.env');
  if (!existsSync(envPath)) return null;
  dotenvConfig({ path: envPath, quiet: true });
  return envPath;
}

const ENV_REFERENCE = /\$\{([A-Za-z_][A-Za-z0-9_]*)\}|\$([A-Za-z_][A-Za-z0-9_]*)/g;

/**
 * Expand `$VAR` and `${VAR}` references against an environment.
 * Unknown variables are left as written.
 */
export function expandEnvVars(
  value: string,
  env: NodeJS.ProcessEnv = process.env
): string {
  return value.replace(ENV_REFERENCE, (match: string, braced?: string, bare?: string) => {
    const name = braced ?? bare;
    if (name === undefined) return match;
    const resolved = env[name];
    return resolved === undefined ? match : resolved;
  });
}
