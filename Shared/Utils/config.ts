import { homedir } from 'node:os';

/**
 * Expand a leading `~` to the user's home directory.
 */
export function expandPath(path: string): string {
  if (path === '~') return homedir();
  if (path.startsWith('~/')) return `${homedir()}${path.slice(1)}`;
  return path;
}

export function getEnvString(key: string): string | undefined;
export function getEnvString(key: string, defaultValue: string): string;
export function getEnvString(key: string, defaultValue?: string): string | undefined {
  const value = process.env[key];
  return value !== undefined ? value : defaultValue;
}

/** Integer env var; non-numeric values fall back to the default. */
export function getEnvNumber(key: string): number | undefined;
export function getEnvNumber(key: string, defaultValue: number): number;
export function getEnvNumber(key: string, defaultValue?: number): number | undefined {
  const value = process.env[key];
  if (value === undefined) return defaultValue;
  const parsed = parseInt(value, 10);
  return Number.isNaN(parsed) ? defaultValue : parsed;
}

export function getEnvFloat(key: string): number | undefined;
export function getEnvFloat(key: string, defaultValue: number): number;
export function getEnvFloat(key: string, defaultValue?: number): number | undefined {
  const value = process.env[key];
  if (value === undefined) return defaultValue;
  const parsed = parseFloat(value);
  return Number.isNaN(parsed) ? defaultValue : parsed;
}

/** Accepts true/false/1/0 (case-insensitive); anything else yields the default. */
export function getEnvBoolean(key: string): boolean | undefined;
export function getEnvBoolean(key: string, defaultValue: boolean): boolean;
export function getEnvBoolean(key: string, defaultValue?: boolean): boolean | undefined {
  const value = process.env[key];
  if (value === undefined) return defaultValue;
  const normalized = value.trim().toLowerCase();
  if (normalized === 'true' || normalized === '1') return true;
  if (normalized === 'false' || normalized === '0') return false;
  return defaultValue;
}
