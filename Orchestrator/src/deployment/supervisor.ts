import { existsSync, mkdirSync, readdirSync } from 'node:fs';
import { join } from 'node:path';
import { setTimeout as sleep } from 'node:timers/promises';
import { logger } from '@flotilla/shared/Utils/logger.js';
import type { DeploymentServerConfig, RemoteServer } from '../config/schema.js';
import { findDefinitionFile, loadAgentDefinition, type AgentDefinition } from '../config/agent-definition.js';
import { KeyedLock } from '../utils/keyed-lock.js';
import { PortManager, isPortFree, type PortCheck } from './port-manager.js';
import { ChildProcessLauncher, type ProcessLauncher } from './process-launcher.js';
import { detectRuntimeVersion, resolveLaunch } from './runtime.js';
import { generateDiagnostics } from './diagnostics.js';
import { MetadataStore, type AgentRecordInput } from './metadata-store.js';
import { MetricsCollector } from './metrics.js';
import type { DeploymentAction } from './store-schema.js';
import {
  createAgentInstance,
  toStatusReport,
  type AgentInstance,
  type AgentStatus,
  type AgentStatusReport,
} from './types.js';

const log = logger.child('deployment');

/** How far past the configured API port auto-discovery looks */
const API_PORT_SEARCH_SPAN = 100;

export interface DeploymentServerDeps {
  launcher?: ProcessLauncher;
  portManager?: PortManager;
  /** null disables persistence; omitted opens <storagePath>/flotilla.db */
  store?: MetadataStore | null;
  metrics?: MetricsCollector;
  /** Bind test used for the API port */
  portCheck?: PortCheck;
  runtimeVersion?: (command: string) => Promise<string | null>;
  fetch?: typeof fetch;
}

export interface RegisterOptions {
  /** Stored with the agent record */
  metadata?: Record<string, unknown>;
  /** When the deployment began (epoch ms), for the history entry */
  startedAt?: number;
  /** Puts the package files in place once any running predecessor is stopped */
  install?: () => Promise<void>;
}

export interface ServerValidation {
  valid: boolean;
  apiPort: number;
  issues: string[];
  warnings: string[];
}

/** The part of a definition kept in the agent's metadata blob */
export function definitionMetadata(definition: AgentDefinition): Record<string, unknown> {
  const { version, description, author, capabilities, entry_point } = definition.agent;
  return { version, description, author, capabilities, entryPoint: entry_point };
}

function errorText(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/**
 * Supervises local agent processes: discovery, port allocation, start/stop,
 * liveness monitoring with bounded automatic restarts, and persistence of
 * every status change.
 *
 * Operations on one agent are serialized; different agents proceed
 * concurrently.
 */
export class DeploymentServer {
  readonly config: DeploymentServerConfig;
  readonly portManager: PortManager;
  readonly metrics: MetricsCollector;

  private readonly agents = new Map<string, AgentInstance>();
  private readonly lock = new KeyedLock();
  private readonly launcher: ProcessLauncher;
  private readonly portCheck: PortCheck;
  private readonly runtimeVersion: (command: string) => Promise<string | null>;
  private readonly fetchImpl: typeof fetch;

  private store: MetadataStore | null;
  private readonly ownsStore: boolean;
  private healthAbort: AbortController | null = null;
  private healthLoop: Promise<void> | null = null;
  private initialized = false;

  constructor(config: DeploymentServerConfig, deps: DeploymentServerDeps = {}) {
    this.config = config;
    this.launcher = deps.launcher ?? new ChildProcessLauncher();
    this.portCheck = deps.portCheck ?? isPortFree;
    this.portManager =
      deps.portManager ??
      new PortManager({
        basePort: config.basePort,
        maxPorts: config.maxAgents,
        host: '127.0.0.1',
        portCheck: this.portCheck,
      });
    this.metrics = deps.metrics ?? new MetricsCollector();
    this.runtimeVersion = deps.runtimeVersion ?? detectRuntimeVersion;
    this.fetchImpl = deps.fetch ?? fetch;

    if (deps.store !== undefined) {
      this.store = deps.store;
      this.ownsStore = false;
    } else {
      this.store = null;
      this.ownsStore = true;
    }
  }

  // ─── Lifecycle ───────────────────────────────────────────────────

  /**
   * Validate the environment, restore persisted agents, scan the agents
   * directory and start the health loop.
   */
  async initialize(): Promise<ServerValidation> {
    const validation = await this.validateLocalServer();
    for (const issue of validation.issues) log.error(issue);
    for (const warning of validation.warnings) log.warn(warning);

    if (this.ownsStore && !this.store) {
      const dbPath = join(this.config.storagePath, 'flotilla.db');
      try {
        this.store = new MetadataStore(dbPath);
      } catch (error) {
        log.error('Metadata store unavailable, agent state will not be persisted', { path: dbPath, error });
      }
    }
    await this.portManager.setRegistryPath(join(this.config.storagePath, 'ports.json'));

    this.restoreFromStore();
    this.discover();
    this.startHealthLoop();
    this.initialized = true;
    this.updateGauges();

    log.info('Deployment server initialized', {
      agents: this.agents.size,
      basePort: this.config.basePort,
      maxAgents: this.config.maxAgents,
    });
    return validation;
  }

  /**
   * Stop the health loop, then every running agent, and release all ports.
   */
  async shutdown(): Promise<void> {
    log.info('Shutting down deployment server');
    this.healthAbort?.abort();
    if (this.healthLoop) await this.healthLoop;
    this.healthAbort = null;
    this.healthLoop = null;

    const active = [...this.agents.values()].filter((a) => a.status === 'running' || a.status === 'starting');
    await Promise.all(active.map((agent) => this.stop(agent.name)));

    this.portManager.cleanup();
    await this.portManager.flush();
    if (this.ownsStore) {
      this.store?.close();
      this.store = null;
    }
    this.initialized = false;
    this.updateGauges();
  }

  isInitialized(): boolean {
    return this.initialized;
  }

  // ─── Discovery ───────────────────────────────────────────────────

  /**
   * Bring back agents recorded in the store. Previous processes are not
   * adopted, so every restored agent starts out as discovered; the last
   * failure details and logs are kept. Ports held in the registry by
   * owners that are not restored are released.
   */
  restoreFromStore(): number {
    if (!this.store) return 0;
    let restored = 0;
    for (const record of this.store.listAgents()) {
      if (!existsSync(record.configPath)) {
        log.warn(`Skipping restored agent ${record.name}: definition file missing`, { path: record.configPath });
        continue;
      }
      if (this.agents.has(record.name)) continue;
      const agent = createAgentInstance(record.name, record.configPath, record.checksum);
      agent.restartCount = record.restartCount;
      agent.healthStatus = record.healthStatus;
      agent.lastHealthCheck = record.lastHealthCheck ? new Date(record.lastHealthCheck) : null;
      agent.exitCode = record.exitCode;
      agent.failureReason = record.failureReason;
      agent.errorMessage = record.errorMessage;
      agent.stdoutLog = record.stdoutLog;
      agent.stderrLog = record.stderrLog;
      agent.metadata = record.metadata;
      agent.port = this.portManager.getPort(record.name) ?? null;
      this.agents.set(record.name, agent);
      this.persist(agent);
      restored++;
    }
    for (const owner of this.portManager.getOwners()) {
      if (!this.agents.has(owner)) this.portManager.release(owner);
    }
    if (restored > 0) log.info(`Restored ${restored} agents from metadata store`);
    return restored;
  }

  /**
   * Scan the agents directory for agent.toml / agent.json definitions.
   * New agents are added as discovered; known agents only get their
   * definition path refreshed. A broken definition is logged and skipped.
   * @returns names found in this scan
   */
  discover(): string[] {
    const dir = this.config.agentsDirectory;
    if (!existsSync(dir)) {
      log.warn('Agents directory not found', { path: dir });
      return [];
    }

    const found: string[] = [];
    for (const entry of readdirSync(dir, { withFileTypes: true })) {
      if (!entry.isDirectory() || entry.name.startsWith('.')) continue;
      const configPath = findDefinitionFile(join(dir, entry.name));
      if (!configPath) continue;

      try {
        const definition = loadAgentDefinition(configPath);
        const name = definition.agent.name;
        const existing = this.agents.get(name);
        if (existing) {
          if (existing.status !== 'running' && existing.status !== 'starting') {
            existing.configPath = configPath;
            existing.metadata = definitionMetadata(definition);
          }
        } else {
          const agent = createAgentInstance(name, configPath);
          agent.metadata = definitionMetadata(definition);
          agent.port = this.portManager.getPort(name) ?? null;
          this.agents.set(name, agent);
          this.persist(agent);
          log.info(`Discovered agent ${name}`, { path: configPath });
        }
        found.push(name);
      } catch (error) {
        log.error(`Failed to load agent definition in ${entry.name}`, { error: errorText(error) });
      }
    }
    this.updateGauges();
    return found;
  }

  /**
   * Add or replace an agent from a deployed package and record the deploy.
   * Replacing stops the old process first and resets the restart count.
   * `install` runs after that stop, still under the agent's lock; when it
   * throws, the previous registration stays in place.
   */
  registerAgent(
    name: string,
    configPath: string,
    checksum: string | null,
    options: RegisterOptions = {}
  ): Promise<AgentStatusReport> {
    return this.lock.run(name, async () => {
      const existing = this.agents.get(name);
      if (existing && (existing.status === 'running' || existing.status === 'starting')) {
        await this.stopUnlocked(name);
      }
      if (options.install) {
        try {
          await options.install();
        } catch (error) {
          log.error(`Installing package for ${name} failed, keeping the previous registration`, {
            error: errorText(error),
          });
          throw error;
        }
      }
      if (existing) this.releasePort(existing);

      const agent = createAgentInstance(name, configPath, checksum);
      agent.metadata = options.metadata ?? {};
      this.agents.set(name, agent);
      const saved = this.store?.saveDeployment(this.toRecord(agent), {
        agentName: name,
        checksum,
        action: 'deploy',
        result: 'success',
        durationMs: Date.now() - (options.startedAt ?? Date.now()),
      });
      if (saved === false) log.warn(`Deployment of ${name} was not persisted`);
      this.updateGauges();
      log.info(`Registered agent ${name}`, { path: configPath, checksum });
      return toStatusReport(agent);
    });
  }

  /**
   * Un-deploy: stop the agent and forget it everywhere.
   * @returns the removed agent's last status, or null if unknown
   */
  removeAgent(name: string): Promise<AgentStatusReport | null> {
    return this.lock.run(name, async () => {
      const agent = this.agents.get(name);
      if (!agent) return null;
      await this.stopUnlocked(name);
      this.releasePort(agent);
      this.agents.delete(name);
      this.store?.deleteAgent(name);
      this.store?.recordDeployment({ agentName: name, checksum: agent.checksum, action: 'undeploy', result: 'success' });
      this.updateGauges();
      log.info(`Removed agent ${name}`);
      return toStatusReport(agent);
    });
  }

  // ─── Process control ─────────────────────────────────────────────

  start(name: string): Promise<boolean> {
    return this.lock.run(name, () => this.startUnlocked(name));
  }

  stop(name: string): Promise<boolean> {
    return this.lock.run(name, () => this.stopUnlocked(name));
  }

  restart(name: string): Promise<boolean> {
    return this.lock.run(name, () => this.restartUnlocked(name, 'restart'));
  }

  private async startUnlocked(name: string): Promise<boolean> {
    const agent = this.agents.get(name);
    if (!agent) {
      log.error(`Agent not found: ${name}`);
      return false;
    }
    if (agent.status === 'running' && agent.process?.isAlive()) {
      log.warn(`Agent already running: ${name}`);
      return true;
    }

    const began = Date.now();
    let runtimeCommand: string | undefined;
    try {
      const definition = loadAgentDefinition(agent.configPath);
      const port = await this.portManager.allocate(name);
      agent.port = port;

      const launch = resolveLaunch(name, agent.configPath, definition, port, {
        pythonCommand: this.config.pythonCommand,
      });
      runtimeCommand = launch.command;
      log.info(`Starting agent ${name} on port ${port}`, { command: launch.command, args: launch.args });

      this.setStatus(agent, 'starting');
      const proc = this.launcher.launch(launch, name);
      agent.process = proc;
      agent.pid = proc.pid ?? null;
      agent.startTime = new Date();
      agent.exitCode = null;
      agent.failureReason = null;
      agent.errorMessage = null;
      agent.stdoutLog = null;
      agent.stderrLog = null;

      const exitedEarly = await proc.waitForExit(this.config.startupGracePeriodMs);
      if (!exitedEarly && proc.isAlive()) {
        agent.healthStatus = 'unknown';
        this.setStatus(agent, 'running');
        this.record(agent, 'start', 'success', began);
        this.metrics.recordStart('success');
        this.updateGauges();
        log.info(`Agent ${name} started (PID: ${agent.pid})`);
        return true;
      }

      const output = proc.output();
      const reason = proc.spawnError
        ? `Failed to launch: ${proc.spawnError.message}`
        : `Process exited with code ${proc.exitCode ?? 'null'} during startup`;
      await this.failStart(agent, reason, began, output.stdout, output.stderr, proc.exitCode, runtimeCommand);
      return false;
    } catch (error) {
      await this.failStart(agent, errorText(error), began, '', '', null, runtimeCommand);
      return false;
    }
  }

  private async failStart(
    agent: AgentInstance,
    reason: string,
    began: number,
    stdout: string,
    stderr: string,
    exitCode: number | null,
    runtimeCommand: string | undefined
  ): Promise<void> {
    const port = agent.port ?? undefined;
    agent.stdoutLog = stdout;
    agent.stderrLog = stderr;
    agent.exitCode = exitCode;
    agent.failureReason = reason;
    agent.process = null;
    agent.pid = null;
    agent.startTime = null;
    this.releasePort(agent);

    const runtimeVersion = runtimeCommand ? await this.runtimeVersion(runtimeCommand) : null;
    agent.errorMessage = generateDiagnostics({
      agentName: agent.name,
      status: 'failed',
      configPath: agent.configPath,
      exitCode,
      port,
      errorMessage: reason,
      stdout,
      stderr,
      runtimeVersion,
      runtimeCommand,
    });
    this.setStatus(agent, 'failed');
    this.record(agent, 'start', 'failure', began, reason);
    this.metrics.recordStart('failure');
    this.metrics.recordFailure(agent.name, 'startup');
    this.updateGauges();
    log.error(`Agent ${agent.name} failed to start: ${reason}`);
  }

  private async stopUnlocked(name: string): Promise<boolean> {
    const agent = this.agents.get(name);
    if (!agent) {
      log.error(`Agent not found: ${name}`);
      return false;
    }
    const proc = agent.process;
    if (!proc || (agent.status !== 'running' && agent.status !== 'starting')) {
      log.debug(`Agent not running: ${name}`);
      return true;
    }

    const began = Date.now();
    try {
      log.info(`Stopping agent ${name} (PID: ${agent.pid})`);
      proc.terminate();
      if (!(await proc.waitForExit(this.config.stopTimeoutMs))) {
        log.warn(`Force killing agent ${name}`);
        proc.kill();
        await proc.waitForExit(this.config.stopTimeoutMs);
      }

      const output = proc.output();
      agent.stdoutLog = output.stdout;
      agent.stderrLog = output.stderr;
      agent.exitCode = proc.exitCode;
      agent.process = null;
      agent.pid = null;
      agent.startTime = null;
      this.releasePort(agent);
      this.setStatus(agent, 'stopped');
      this.record(agent, 'stop', 'success', began);
      this.metrics.recordStop();
      this.updateGauges();
      log.info(`Agent ${name} stopped`);
      return true;
    } catch (error) {
      log.error(`Failed to stop agent ${name}`, { error: errorText(error) });
      this.record(agent, 'stop', 'failure', began, errorText(error));
      return false;
    }
  }

  private async restartUnlocked(name: string, action: 'restart' | 'health_restart'): Promise<boolean> {
    const agent = this.agents.get(name);
    if (!agent) {
      log.error(`Agent not found: ${name}`);
      return false;
    }
    agent.restartCount++;
    this.metrics.recordRestart(action === 'restart' ? 'manual' : 'health_check');
    log.info(`Restarting agent ${name} (restart ${agent.restartCount})`);

    const began = Date.now();
    await this.stopUnlocked(name);
    if (this.config.restartDelayMs > 0) await sleep(this.config.restartDelayMs);
    const started = await this.startUnlocked(name);
    this.record(agent, action, started ? 'success' : 'failure', began);
    return started;
  }

  // ─── Health monitoring ───────────────────────────────────────────

  private startHealthLoop(): void {
    if (this.healthLoop) return;
    const abort = new AbortController();
    const intervalMs = Math.max(1, Math.round(this.config.healthCheckInterval * 1000));
    this.healthAbort = abort;

    this.healthLoop = (async () => {
      while (!abort.signal.aborted) {
        try {
          await sleep(intervalMs, undefined, { signal: abort.signal });
        } catch (error) {
          if (abort.signal.aborted) break;
          throw error;
        }
        await this.runHealthChecks();
      }
    })().catch((error: unknown) => {
      log.error('Health loop stopped unexpectedly', { error: errorText(error) });
    });
    log.debug(`Health loop started (every ${intervalMs}ms)`);
  }

  /**
   * One liveness sweep over every running agent. An agent whose process
   * has exited is marked failed and, within the restart budget, restarted.
   */
  async runHealthChecks(): Promise<void> {
    const running = [...this.agents.values()].filter((a) => a.status === 'running').map((a) => a.name);
    await Promise.all(running.map((name) => this.lock.run(name, () => this.checkAgent(name))));
    this.updateGauges();
  }

  private async checkAgent(name: string): Promise<void> {
    const agent = this.agents.get(name);
    if (!agent || agent.status !== 'running') return;

    try {
      const proc = agent.process;
      agent.lastHealthCheck = new Date();
      if (proc?.isAlive()) {
        agent.healthStatus = 'healthy';
        this.metrics.recordHealthCheck('healthy');
        return;
      }

      const exitCode = proc?.exitCode ?? null;
      if (proc) {
        const output = proc.output();
        agent.stdoutLog = output.stdout;
        agent.stderrLog = output.stderr;
      }
      agent.exitCode = exitCode;
      agent.healthStatus = 'unhealthy';
      agent.failureReason = `Process exited unexpectedly (code ${exitCode ?? 'null'})`;
      agent.errorMessage = agent.failureReason;
      agent.process = null;
      agent.pid = null;
      agent.startTime = null;
      this.releasePort(agent);
      this.setStatus(agent, 'failed');
      this.metrics.recordHealthCheck('unhealthy');
      this.metrics.recordFailure(name, 'exited');
      log.warn(`Agent ${name} is no longer running`, { exitCode });

      if (!this.config.restartOnFailure) return;
      if (agent.restartCount >= this.config.maxRestarts) {
        log.error(`Agent ${name} exceeded max restarts (${this.config.maxRestarts}), leaving it failed`);
        return;
      }
      await this.restartUnlocked(name, 'health_restart');
    } catch (error) {
      this.metrics.recordHealthCheck('error');
      log.error(`Health check failed for ${name}`, { error: errorText(error) });
    }
  }

  // ─── Queries ─────────────────────────────────────────────────────

  getAgent(name: string): AgentInstance | undefined {
    return this.agents.get(name);
  }

  getAgentStatus(name: string): AgentStatusReport | null {
    const agent = this.agents.get(name);
    return agent ? toStatusReport(agent) : null;
  }

  listAgents(): AgentStatusReport[] {
    return [...this.agents.values()].sort((a, b) => a.name.localeCompare(b.name)).map((a) => toStatusReport(a));
  }

  findByChecksum(checksum: string): AgentStatusReport | null {
    for (const agent of this.agents.values()) {
      if (agent.checksum === checksum) return toStatusReport(agent);
    }
    const record = this.store?.getAgentByChecksum(checksum);
    return record ? this.getAgentStatus(record.name) : null;
  }

  getStore(): MetadataStore | null {
    return this.store;
  }

  /**
   * Diagnostics for an agent's last failure (or current state), built from
   * the captured logs and a fresh look at its directory.
   */
  async getDiagnostics(name: string): Promise<string | null> {
    const agent = this.agents.get(name);
    if (!agent) return null;

    let runtimeCommand: string | undefined;
    try {
      const definition = loadAgentDefinition(agent.configPath);
      runtimeCommand = resolveLaunch(name, agent.configPath, definition, agent.port ?? this.config.basePort, {
        pythonCommand: this.config.pythonCommand,
      }).command;
    } catch (error) {
      log.debug(`Cannot resolve launch command for ${name}`, { error: errorText(error) });
    }

    return generateDiagnostics({
      agentName: name,
      status: agent.status,
      configPath: agent.configPath,
      exitCode: agent.exitCode,
      port: agent.port ?? undefined,
      errorMessage: agent.failureReason ?? undefined,
      stdout: agent.stdoutLog ?? '',
      stderr: agent.stderrLog ?? '',
      runtimeVersion: runtimeCommand ? await this.runtimeVersion(runtimeCommand) : null,
      runtimeCommand,
    });
  }

  // ─── Validation & reporting ──────────────────────────────────────

  /**
   * Check the agents directory and the API port. With autoDiscoverPort a
   * busy API port is swapped for the next free one and written back to
   * the configuration.
   */
  async validateLocalServer(): Promise<ServerValidation> {
    const issues: string[] = [];
    const warnings: string[] = [];
    const { host, basePort, maxAgents } = this.config;

    if (!existsSync(this.config.agentsDirectory)) {
      try {
        mkdirSync(this.config.agentsDirectory, { recursive: true });
        warnings.push(`Created missing agents directory ${this.config.agentsDirectory}`);
      } catch (error) {
        issues.push(`Agents directory ${this.config.agentsDirectory} is missing and cannot be created: ${errorText(error)}`);
      }
    }

    const apiPort = this.config.apiPort;
    if (apiPort >= basePort && apiPort < basePort + maxAgents) {
      warnings.push(`API port ${apiPort} lies inside the agent port range ${basePort}-${basePort + maxAgents - 1}`);
    }

    if (!(await this.portCheck(apiPort, host))) {
      if (this.config.autoDiscoverPort) {
        const replacement = await this.findFreeApiPort(apiPort + 1);
        if (replacement !== null) {
          warnings.push(`API port ${apiPort} is in use, using ${replacement} instead`);
          this.config.apiPort = replacement;
        } else {
          issues.push(`API port ${apiPort} is in use and no free port was found nearby`);
        }
      } else {
        issues.push(`API port ${apiPort} is already in use (enable autoDiscoverPort or choose another port)`);
      }
    }

    return { valid: issues.length === 0, apiPort: this.config.apiPort, issues, warnings };
  }

  private async findFreeApiPort(from: number): Promise<number | null> {
    const { basePort, maxAgents, host } = this.config;
    for (let port = from; port < from + API_PORT_SEARCH_SPAN && port <= 65535; port++) {
      if (port >= basePort && port < basePort + maxAgents) continue;
      if (await this.portCheck(port, host)) return port;
    }
    return null;
  }

  /** GET <remote>/health with a short deadline */
  async checkRemoteServer(remote: RemoteServer): Promise<boolean> {
    if (!remote.enabled) return false;
    try {
      const response = await this.fetchImpl(`http://${remote.host}:${remote.port}/health`, {
        signal: AbortSignal.timeout(5000),
      });
      return response.ok;
    } catch (error) {
      log.debug(`Remote server ${remote.name} unreachable`, { error: errorText(error) });
      return false;
    }
  }

  async generateStartupReport(): Promise<string> {
    const c = this.config;
    const lines = [
      'Flotilla deployment server',
      `  API:            http://${c.host}:${c.apiPort}`,
      `  Agent ports:    ${c.basePort}-${c.basePort + c.maxAgents - 1} (${this.portManager.getAvailableCount()} free)`,
      `  Agents dir:     ${c.agentsDirectory}`,
      `  Storage:        ${c.storagePath}${this.store ? '' : ' (persistence disabled)'}`,
      `  Health checks:  every ${c.healthCheckInterval}s, auto-restart ${c.restartOnFailure ? `on (max ${c.maxRestarts})` : 'off'}`,
      `  Auth:           ${c.auth.apiKey ? 'API key required' : 'open'}`,
    ];

    const agents = this.listAgents();
    lines.push('', `Agents (${agents.length}):`);
    if (agents.length === 0) lines.push('  (none)');
    for (const agent of agents) {
      lines.push(`  - ${agent.name} [${agent.status}]${agent.port !== null ? ` port ${agent.port}` : ''}`);
    }

    if (c.remoteServers.length > 0) {
      lines.push('', 'Remote servers:');
      const results = await Promise.all(c.remoteServers.map((r) => this.checkRemoteServer(r)));
      c.remoteServers.forEach((remote, i) => {
        const state = !remote.enabled ? 'disabled' : results[i] ? 'reachable' : 'unreachable';
        lines.push(`  - ${remote.name} ${remote.host}:${remote.port} (${state})`);
      });
    }
    return lines.join('\n');
  }

  // ─── Internals ───────────────────────────────────────────────────

  private setStatus(agent: AgentInstance, status: AgentStatus): void {
    agent.status = status;
    this.persist(agent);
  }

  private persist(agent: AgentInstance): void {
    this.store?.upsertAgent(this.toRecord(agent));
  }

  private toRecord(agent: AgentInstance): AgentRecordInput {
    return {
      name: agent.name,
      configPath: agent.configPath,
      checksum: agent.checksum,
      status: agent.status,
      port: agent.port,
      pid: agent.pid,
      restartCount: agent.restartCount,
      startTime: agent.startTime?.toISOString() ?? null,
      lastHealthCheck: agent.lastHealthCheck?.toISOString() ?? null,
      healthStatus: agent.healthStatus,
      exitCode: agent.exitCode,
      failureReason: agent.failureReason,
      errorMessage: agent.errorMessage,
      stdoutLog: agent.stdoutLog,
      stderrLog: agent.stderrLog,
      metadata: agent.metadata,
    };
  }

  private record(
    agent: AgentInstance,
    action: DeploymentAction,
    result: 'success' | 'failure',
    began: number,
    error?: string
  ): void {
    this.store?.recordDeployment({
      agentName: agent.name,
      checksum: agent.checksum,
      action,
      result,
      durationMs: Date.now() - began,
      error: error ?? null,
    });
  }

  private releasePort(agent: AgentInstance): void {
    if (agent.port === null) return;
    this.portManager.release(agent.name);
    agent.port = null;
  }

  private updateGauges(): void {
    const counts: Partial<Record<AgentStatus, number>> = {};
    let alive = 0;
    for (const agent of this.agents.values()) {
      counts[agent.status] = (counts[agent.status] ?? 0) + 1;
      if (agent.process?.isAlive()) alive++;
    }
    this.metrics.updateAgentCounts(counts);
    this.metrics.setAllocatedPorts(this.portManager.getAllocatedPorts().size);
    this.metrics.setActiveProcesses(alive);
  }
}
