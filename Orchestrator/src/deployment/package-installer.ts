import { createHash, randomUUID } from 'node:crypto';
import { existsSync, readdirSync } from 'node:fs';
import { rename, rm } from 'node:fs/promises';
import { isAbsolute, join, relative, resolve, sep } from 'node:path';
import AdmZip from 'adm-zip';
import { logger } from '@flotilla/shared/Utils/logger.js';
import { ConfigurationError } from '@flotilla/shared/Types/errors.js';
import { findDefinitionFile, loadAgentDefinition, type AgentDefinition } from '../config/agent-definition.js';
import { DeploymentError } from '../utils/errors.js';
import type { EnvironmentBuilder } from './environment.js';
import type { MetricsCollector } from './metrics.js';
import { detectRuntime } from './runtime.js';
import { definitionMetadata, type DeploymentServer } from './supervisor.js';

const log = logger.child('installer');

export interface DeployOptions {
  /** Original upload name; must end in .zip when given */
  filename?: string;
  /** Reinstall even if a package with the same checksum is known */
  force?: boolean;
}

export interface DeployResult {
  status: 'deployed' | 'already_installed';
  name: string;
  checksum: string;
  configPath: string;
  message: string;
}

export interface PackageInstallerOptions {
  /** Where packages are extracted (agent_<checksum8> subdirectories) */
  packagesDir: string;
  environment: EnvironmentBuilder;
  metrics: MetricsCollector;
}

export function packageChecksum(data: Buffer): string {
  return createHash('md5').update(data).digest('hex');
}

function isInside(parent: string, child: string): boolean {
  const rel = relative(parent, child);
  return rel !== '' && !rel.startsWith('..') && !isAbsolute(rel);
}

function readDefinition(configPath: string): AgentDefinition {
  try {
    return loadAgentDefinition(configPath);
  } catch (error) {
    const detail = error instanceof ConfigurationError ? error.message : String(error);
    throw new DeploymentError(`Invalid agent definition: ${detail}`, 400);
  }
}

function openZip(data: Buffer): AdmZip {
  try {
    return new AdmZip(data);
  } catch (error) {
    throw new DeploymentError(`Invalid ZIP archive: ${error instanceof Error ? error.message : String(error)}`, 400);
  }
}

/**
 * Turns an uploaded ZIP into a registered agent: checksum, extraction,
 * definition lookup, environment build, registration.
 *
 * Everything up to the environment build happens in a staging directory.
 * Only then, under the agent's lock, is a running predecessor stopped and
 * the staged package moved into place. A failed deploy removes the staging
 * directory and leaves any installed agent as it was.
 */
export class PackageInstaller {
  private readonly packagesDir: string;
  private readonly environment: EnvironmentBuilder;
  private readonly metrics: MetricsCollector;

  constructor(
    private readonly server: DeploymentServer,
    options: PackageInstallerOptions
  ) {
    this.packagesDir = resolve(options.packagesDir);
    this.environment = options.environment;
    this.metrics = options.metrics;
  }

  async deploy(data: Buffer, options: DeployOptions = {}): Promise<DeployResult> {
    const began = Date.now();
    if (options.filename !== undefined && !options.filename.toLowerCase().endsWith('.zip')) {
      this.metrics.recordDeployment('failure');
      throw new DeploymentError('File must be a ZIP archive', 400);
    }

    const checksum = packageChecksum(data);
    log.info('Deploying package', { checksum, bytes: data.length, force: options.force ?? false });

    if (!options.force) {
      const existing = this.server.findByChecksum(checksum);
      this.metrics.recordChecksumLookup(existing !== null);
      if (existing) {
        this.metrics.recordDeployment('already_installed');
        log.info(`Agent ${existing.name} already installed with this checksum`);
        return {
          status: 'already_installed',
          name: existing.name,
          checksum,
          configPath: existing.configPath,
          message: `Agent ${existing.name} is already installed`,
        };
      }
    }

    const installDir = join(this.packagesDir, `agent_${checksum.slice(0, 8)}`);
    const stagingDir = join(this.packagesDir, `.staging_${checksum.slice(0, 8)}_${randomUUID()}`);
    let agentName: string | null = null;
    try {
      this.extract(data, stagingDir);

      const stagedRoot = this.locateAgentRoot(stagingDir);
      const stagedConfig = stagedRoot ? findDefinitionFile(stagedRoot) : null;
      if (!stagedRoot || !stagedConfig) {
        throw new DeploymentError('No agent.toml or agent.json found in package', 400);
      }

      const definition = readDefinition(stagedConfig);
      const name = definition.agent.name;
      agentName = name;

      const known = this.server.getAgentStatus(name);
      if (!known && this.server.listAgents().length >= this.server.config.maxAgents) {
        throw new DeploymentError(`Agent limit reached (${this.server.config.maxAgents})`, 409);
      }

      await this.environment.prepare(stagedRoot, detectRuntime(definition.agent.entry_point));

      const configPath = join(installDir, relative(stagingDir, stagedConfig));
      await this.server.registerAgent(name, configPath, checksum, {
        metadata: definitionMetadata(definition),
        startedAt: began,
        install: () => this.swapIn(stagingDir, installDir),
      });
      if (known && !isInside(installDir, resolve(known.configPath))) {
        await this.removePackage(known.configPath);
      }

      const seconds = (Date.now() - began) / 1000;
      this.metrics.recordDeployment('success', seconds);
      log.info(`Deployed agent ${name}`, { checksum, seconds });
      return {
        status: 'deployed',
        name,
        checksum,
        configPath,
        message: `Agent ${name} deployed successfully`,
      };
    } catch (error) {
      await rm(stagingDir, { recursive: true, force: true });
      this.metrics.recordDeployment('failure');
      const failure =
        error instanceof DeploymentError
          ? error
          : new DeploymentError(`Deployment failed: ${error instanceof Error ? error.message : String(error)}`, 500);
      this.server.getStore()?.recordDeployment({
        agentName: agentName ?? `agent_${checksum.slice(0, 8)}`,
        checksum,
        action: 'deploy',
        result: 'failure',
        durationMs: Date.now() - began,
        error: failure.message,
      });
      log.error('Deployment failed', { checksum, status: failure.statusCode, error: failure.message });
      throw failure;
    }
  }

  /**
   * Delete an extracted package directory, if `configPath` lives in one.
   */
  async removePackage(configPath: string): Promise<boolean> {
    const target = resolve(configPath);
    if (!isInside(this.packagesDir, target)) return false;
    const [top] = relative(this.packagesDir, target).split(sep);
    if (!top) return false;
    await rm(join(this.packagesDir, top), { recursive: true, force: true });
    log.info('Removed package directory', { path: join(this.packagesDir, top) });
    return true;
  }

  /**
   * Move the staged package to its install directory. An existing install
   * is set aside first and put back if the move fails.
   */
  private async swapIn(stagingDir: string, installDir: string): Promise<void> {
    const backup = existsSync(installDir) ? `${installDir}.previous` : null;
    if (backup) {
      await rm(backup, { recursive: true, force: true });
      await rename(installDir, backup);
    }
    try {
      await rename(stagingDir, installDir);
    } catch (error) {
      if (backup) await rename(backup, installDir);
      throw error;
    }
    if (backup) await rm(backup, { recursive: true, force: true });
    log.debug('Installed package', { path: installDir });
  }

  private extract(data: Buffer, extractDir: string): void {
    const zip = openZip(data);
    const entries = zip.getEntries();
    for (const entry of entries) {
      const target = resolve(extractDir, entry.entryName);
      if (!isInside(extractDir, target) && target !== extractDir) {
        throw new DeploymentError(`Package entry escapes extraction directory: ${entry.entryName}`, 400);
      }
    }
    zip.extractAllTo(extractDir, true);
    log.debug(`Extracted ${entries.length} entries`, { path: extractDir });
  }

  /**
   * The definition sits at the archive root, or inside a single top-level
   * directory when the package was zipped from its parent folder.
   */
  private locateAgentRoot(extractDir: string): string | null {
    if (findDefinitionFile(extractDir)) return extractDir;
    if (!existsSync(extractDir)) return null;
    const children = readdirSync(extractDir, { withFileTypes: true }).filter(
      (entry) => entry.isDirectory() && !entry.name.startsWith('__MACOSX')
    );
    if (children.length !== 1) return null;
    const nested = join(extractDir, children[0].name);
    return findDefinitionFile(nested) ? nested : null;
  }
}
