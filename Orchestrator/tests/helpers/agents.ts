/**
 * Temporary directories and agent definitions for deployment tests.
 */

import { mkdirSync, mkdtempSync, writeFileSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import AdmZip from 'adm-zip';
import { DeploymentServerConfigSchema, type DeploymentServerConfig, type DeploymentServerConfigInput } from '../../src/config/schema.js';

export function makeTempDir(prefix: string): string {
  return mkdtempSync(join(tmpdir(), `flotilla-${prefix}-`));
}

export function agentToml(name: string, extra = ''): string {
  return `[agent]\nname = "${name}"\nversion = "1.2.0"\nentry_point = "main.py"\n${extra}`;
}

/** Write `<root>/<dir>/agent.toml` and return its path */
export function writeAgent(root: string, name: string, dir = name, extra = ''): string {
  const agentDir = join(root, dir);
  mkdirSync(agentDir, { recursive: true });
  const configPath = join(agentDir, 'agent.toml');
  writeFileSync(configPath, agentToml(name, extra));
  return configPath;
}

export function zipPackage(files: Record<string, string>): Buffer {
  const zip = new AdmZip();
  for (const [path, content] of Object.entries(files)) {
    zip.addFile(path, Buffer.from(content));
  }
  return zip.toBuffer();
}

/** Fast timings so lifecycle tests finish quickly */
export function testServerConfig(root: string, overrides: DeploymentServerConfigInput = {}): DeploymentServerConfig {
  return DeploymentServerConfigSchema.parse({
    agentsDirectory: join(root, 'agents'),
    storagePath: join(root, 'data'),
    startupGracePeriodMs: 20,
    stopTimeoutMs: 200,
    restartDelayMs: 0,
    ...overrides,
  });
}

export const alwaysFree = async (): Promise<boolean> => true;
