#!/usr/bin/env -S node --import tsx

import { readFileSync } from 'node:fs';
import type { Server } from 'node:http';
import { dirname, join, resolve } from 'node:path';
import { fileURLToPath } from 'node:url';
import { parseArgs } from 'node:util';
import { loadEnvSafely } from '@flotilla/shared/Utils/env.js';
import { logger } from '@flotilla/shared/Utils/logger.js';
import { loadConfig, type DeploymentServerConfigInput } from './config/index.js';
import { createDeploymentApi } from './deployment/api.js';
import { SubprocessEnvironmentBuilder } from './deployment/environment.js';
import { MetricsCollector } from './deployment/metrics.js';
import { PackageInstaller } from './deployment/package-installer.js';
import { DeploymentServer } from './deployment/supervisor.js';
import { MCPServerManager } from './mcp-clients/server-manager.js';

const __dirname = dirname(fileURLToPath(import.meta.url));

function readVersion(): string {
  try {
    const pkg: unknown = JSON.parse(readFileSync(resolve(__dirname, '../package.json'), 'utf-8'));
    if (typeof pkg === 'object' && pkg !== null && 'version' in pkg && typeof pkg.version === 'string') {
      return pkg.version;
    }
  } catch (error) {
    logger.debug('package.json not readable', { error });
  }
  return 'unknown';
}

const USAGE = `Usage: flotilla [options]

  --config <path>       JSON or TOML configuration file
  --host <host>         API bind address
  --port <port>         API port
  --agents-dir <path>   Directory scanned for agent definitions
  --base-port <port>    First port handed to agents
  --max-agents <n>      Agent limit (and size of the port range)
  --no-auto-restart     Do not restart agents that exit
  --version             Print the version and exit
  --help                Show this help`;

function toInt(flag: string, value: string | undefined): number | undefined {
  if (value === undefined) return undefined;
  const parsed = parseInt(value, 10);
  if (isNaN(parsed)) {
    throw new Error(`--${flag} expects a number, got '${value}'`);
  }
  return parsed;
}

function parseCli(argv: string[]): { configPath?: string; overrides: Partial<DeploymentServerConfigInput>; version: boolean; help: boolean } {
  const { values } = parseArgs({
    args: argv,
    options: {
      config: { type: 'string' },
      host: { type: 'string' },
      port: { type: 'string' },
      'agents-dir': { type: 'string' },
      'base-port': { type: 'string' },
      'max-agents': { type: 'string' },
      'no-auto-restart': { type: 'boolean', default: false },
      version: { type: 'boolean', default: false },
      help: { type: 'boolean', default: false },
    },
    strict: true,
  });

  return {
    configPath: values.config,
    version: values.version === true,
    help: values.help === true,
    overrides: {
      host: values.host,
      apiPort: toInt('port', values.port),
      agentsDirectory: values['agents-dir'],
      basePort: toInt('base-port', values['base-port']),
      maxAgents: toInt('max-agents', values['max-agents']),
      restartOnFailure: values['no-auto-restart'] ? false : undefined,
    },
  };
}

function listen(app: ReturnType<typeof createDeploymentApi>, port: number, host: string): Promise<Server> {
  return new Promise((resolveListen, reject) => {
    const server = app.listen(port, host, () => resolveListen(server));
    server.once('error', reject);
  });
}

async function main(): Promise<void> {
  const cli = parseCli(process.argv.slice(2));
  if (cli.help) {
    console.log(USAGE);
    return;
  }
  if (cli.version) {
    console.log(`flotilla ${readVersion()}`);
    return;
  }

  loadEnvSafely(import.meta.url, 2);
  const config = loadConfig({ configPath: cli.configPath, overrides: cli.overrides });
  logger.setLevel(config.logLevel);

  if (!config.deployment.enabled) {
    logger.warn('Deployment server disabled in configuration, nothing to do');
    return;
  }

  const metrics = new MetricsCollector({ collectDefaults: true });
  const server = new DeploymentServer(config.deployment, { metrics });
  const validation = await server.initialize();
  if (!validation.valid) {
    await server.shutdown();
    throw new Error(`Startup validation failed:\n  ${validation.issues.join('\n  ')}`);
  }

  const installer = new PackageInstaller(server, {
    packagesDir: join(config.deployment.storagePath, 'packages'),
    environment: new SubprocessEnvironmentBuilder({ pythonCommand: config.deployment.pythonCommand }),
    metrics,
  });
  const app = createDeploymentApi({ server, installer, metrics, apiKey: config.deployment.auth.apiKey });
  const httpServer = await listen(app, config.deployment.apiPort, config.deployment.host);

  const providers = new MCPServerManager(config.mcpServers);
  if (Object.keys(config.mcpServers).length > 0) {
    await providers.connectAll();
  }

  console.error(await server.generateStartupReport());
  logger.info(`Control plane listening on http://${config.deployment.host}:${config.deployment.apiPort}`);
  if (!config.deployment.auth.apiKey) {
    logger.warn('FLOTILLA_API_KEY is not set, the control plane is unauthenticated');
  }

  let shuttingDown = false;
  const shutdown = async (signal: string): Promise<void> => {
    if (shuttingDown) return;
    shuttingDown = true;
    logger.info(`Received ${signal}, shutting down`);
    await new Promise<void>((resolveClose) => httpServer.close(() => resolveClose()));
    await providers.disconnectAll();
    await server.shutdown();
    logger.info('Shutdown complete');
  };

  for (const signal of ['SIGINT', 'SIGTERM'] as const) {
    process.on(signal, () => {
      shutdown(signal)
        .then(() => process.exit(0))
        .catch((error: unknown) => {
          logger.error('Shutdown failed', { error });
          process.exit(1);
        });
    });
  }
}

main().catch((error: unknown) => {
  logger.error('Fatal error', { error });
  process.exit(1);
});
