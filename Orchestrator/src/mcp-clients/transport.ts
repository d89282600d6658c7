import { StdioClientTransport } from '@modelcontextprotocol/sdk/client/stdio.js';
import { StreamableHTTPClientTransport } from '@modelcontextprotocol/sdk/client/streamableHttp.js';
import type { Transport } from '@modelcontextprotocol/sdk/shared/transport.js';
import { expandEnvVars } from '@flotilla/shared/Utils/env.js';
import { logger } from '@flotilla/shared/Utils/logger.js';
import type { MCPServerConfig } from '../config/schema.js';

/**
 * Environment for a stdio provider: the inherited environment with the
 * provider's own variables (after `$VAR` expansion) layered on top.
 */
export function buildProviderEnv(
  overrides: Record<string, string>,
  base: NodeJS.ProcessEnv = process.env
): Record<string, string> {
  const env: Record<string, string> = {};
  for (const [key, value] of Object.entries(base)) {
    if (value !== undefined) env[key] = value;
  }
  for (const [key, value] of Object.entries(overrides)) {
    env[key] = expandEnvVars(value, base);
  }
  return env;
}

/**
 * Transport for a configured provider. stdio spawns the provider with
 * piped stdio and forwards its stderr to the log; http uses streamable
 * HTTP. sse is not supported and yields null.
 */
export function createTransport(name: string, config: MCPServerConfig): Transport | null {
  const log = logger.child(`mcp:${name}`);

  switch (config.transport) {
    case 'stdio': {
      if (!config.command) return null;
      const transport = new StdioClientTransport({
        command: expandEnvVars(config.command),
        args: config.args.map((arg) => expandEnvVars(arg)),
        env: buildProviderEnv(config.env),
        cwd: config.cwd,
        stderr: 'pipe',
      });

      transport.stderr?.on('data', (chunk: Buffer) => {
        for (const line of chunk.toString().split('\n').filter(Boolean)) {
          log.info(line);
        }
      });
      return transport;
    }
    case 'http': {
      if (!config.url) return null;
      return new StreamableHTTPClientTransport(new URL(config.url), {
        requestInit: { headers: config.headers },
      });
    }
    case 'sse':
      log.error(`Transport '${config.transport}' is not supported`);
      return null;
  }
}
