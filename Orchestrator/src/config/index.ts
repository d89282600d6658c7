import { existsSync, readFileSync } from 'node:fs';
import { dirname, extname, isAbsolute, resolve } from 'node:path';
import { parse as parseToml } from 'smol-toml';
import { logger } from '@flotilla/shared/Utils/logger.js';
import { ConfigurationError } from '@flotilla/shared/Types/errors.js';
import {
  expandPath,
  getEnvString,
  getEnvNumber,
  getEnvFloat,
  getEnvBoolean,
} from '@flotilla/shared/Utils/config.js';
import { PathManager } from '@flotilla/shared/Utils/paths.js';
import { ConfigSchema, type Config, type DeploymentServerConfigInput } from './schema.js';

export interface LoadConfigOptions {
  /** JSON or TOML file; omitted means defaults + environment only */
  configPath?: string;
  /** Applied last, e.g. from CLI flags */
  overrides?: Partial<DeploymentServerConfigInput>;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Parse a JSON or TOML document into a plain object.
 * The format is picked from the extension; anything but .toml is read as JSON.
 */
export function parseConfigFile(path: string): Record<string, unknown> {
  let raw: string;
  try {
    raw = readFileSync(path, 'utf-8');
  } catch (error) {
    throw new ConfigurationError(`Cannot read config file ${path}`, { source: path, cause: error });
  }

  let parsed: unknown;
  try {
    parsed = extname(path).toLowerCase() === '.toml' ? parseToml(raw) : JSON.parse(raw);
  } catch (error) {
    throw new ConfigurationError(`Cannot parse config file ${path}`, { source: path, cause: error });
  }

  if (!isRecord(parsed)) {
    throw new ConfigurationError(`Config file ${path} must contain an object`, { source: path });
  }
  return parsed;
}

/** Drop undefined values so they do not shadow file settings. */
function defined(values: Record<string, unknown>): Record<string, unknown> {
  return Object.fromEntries(Object.entries(values).filter(([, value]) => value !== undefined));
}

function envOverrides(): Record<string, unknown> {
  const apiKey = getEnvString('FLOTILLA_API_KEY');
  return defined({
    host: getEnvString('FLOTILLA_HOST'),
    apiPort: getEnvNumber('FLOTILLA_API_PORT'),
    basePort: getEnvNumber('FLOTILLA_BASE_PORT'),
    maxAgents: getEnvNumber('FLOTILLA_MAX_AGENTS'),
    healthCheckInterval: getEnvFloat('FLOTILLA_HEALTH_CHECK_INTERVAL'),
    restartOnFailure: getEnvBoolean('FLOTILLA_RESTART_ON_FAILURE'),
    agentsDirectory: getEnvString('FLOTILLA_AGENTS_DIR'),
    storagePath: getEnvString('FLOTILLA_STORAGE_PATH'),
    pythonCommand: getEnvString('FLOTILLA_PYTHON'),
    auth: apiKey ? { apiKey } : undefined,
  });
}

function resolveDir(path: string, baseDir: string): string {
  const expanded = expandPath(path);
  return isAbsolute(expanded) ? expanded : resolve(baseDir, expanded);
}

/**
 * Build the effective configuration: defaults, then the config file, then
 * FLOTILLA_* environment variables, then explicit overrides.
 * Relative directories resolve against the config file's directory.
 */
export function loadConfig(options: LoadConfigOptions = {}): Config {
  const file = options.configPath ? parseConfigFile(options.configPath) : {};
  const baseDir = options.configPath ? dirname(resolve(options.configPath)) : process.cwd();
  const fileDeployment = isRecord(file.deployment) ? file.deployment : {};
  const paths = PathManager.getInstance();

  const rawConfig = {
    ...file,
    deployment: {
      agentsDirectory: paths.getAgentsDir(),
      storagePath: paths.getDataDir(),
      ...fileDeployment,
      ...envOverrides(),
      ...defined(options.overrides ?? {}),
    },
    logLevel: getEnvString('LOG_LEVEL') ?? file.logLevel,
  };

  const result = ConfigSchema.safeParse(rawConfig);
  if (!result.success) {
    const issues = result.error.errors.map((issue) => `${issue.path.join('.')}: ${issue.message}`);
    logger.error('Configuration validation failed', { issues });
    throw new ConfigurationError(`Invalid configuration: ${issues.join('; ')}`, { issues });
  }

  const config = result.data;
  config.deployment.agentsDirectory = resolveDir(config.deployment.agentsDirectory, baseDir);
  config.deployment.storagePath = resolveDir(config.deployment.storagePath, baseDir);

  if (!existsSync(config.deployment.agentsDirectory)) {
    logger.warn('Agents directory does not exist yet', { path: config.deployment.agentsDirectory });
  }

  logger.info('Configuration loaded', {
    source: options.configPath ?? 'defaults',
    apiPort: config.deployment.apiPort,
    basePort: config.deployment.basePort,
    maxAgents: config.deployment.maxAgents,
    mcpServers: Object.keys(config.mcpServers),
  });
  return config;
}

export * from './schema.js';
