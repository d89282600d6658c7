import { Counter, Gauge, Histogram, Registry, collectDefaultMetrics } from 'prom-client';
import { AGENT_STATUSES, type AgentStatus } from './types.js';

export interface MetricsOptions {
  /** Also export Node.js process metrics (event loop lag, heap, fds) */
  collectDefaults?: boolean;
}

/**
 * Prometheus metrics for one deployment server.
 *
 * Each collector owns its registry, so several servers (or tests) can live
 * in one process without duplicate-registration errors. Labels stay low
 * cardinality: agent names only appear on the failure counter.
 */
export class MetricsCollector {
  readonly registry = new Registry();

  private readonly agentsTotal: Gauge<'status'>;
  private readonly deploymentsTotal: Counter<'result'>;
  private readonly deploymentDuration: Histogram;
  private readonly startsTotal: Counter<'result'>;
  private readonly stopsTotal: Counter;
  private readonly restartsTotal: Counter<'reason'>;
  private readonly failuresTotal: Counter<'agent' | 'reason'>;
  private readonly healthChecksTotal: Counter<'result'>;
  private readonly allocatedPorts: Gauge;
  private readonly activeProcesses: Gauge;
  private readonly apiRequestsTotal: Counter<'method' | 'route' | 'status'>;
  private readonly apiRequestDuration: Histogram<'method' | 'route'>;
  private readonly authAttemptsTotal: Counter<'result'>;
  private readonly checksumLookups: Counter<'result'>;

  constructor(options: MetricsOptions = {}) {
    const registers = [this.registry];
    this.registry.setDefaultLabels({ app: 'flotilla' });
    if (options.collectDefaults) {
      collectDefaultMetrics({ register: this.registry });
    }

    this.agentsTotal = new Gauge({
      name: 'flotilla_agents_total',
      help: 'Known agents by status',
      labelNames: ['status'],
      registers,
    });
    this.deploymentsTotal = new Counter({
      name: 'flotilla_agent_deployments_total',
      help: 'Package deployments by result',
      labelNames: ['result'],
      registers,
    });
    this.deploymentDuration = new Histogram({
      name: 'flotilla_deployment_duration_seconds',
      help: 'Time from upload to registered agent',
      buckets: [0.5, 1, 5, 15, 30, 60, 120, 300],
      registers,
    });
    this.startsTotal = new Counter({
      name: 'flotilla_agent_starts_total',
      help: 'Agent start attempts by result',
      labelNames: ['result'],
      registers,
    });
    this.stopsTotal = new Counter({
      name: 'flotilla_agent_stops_total',
      help: 'Agents stopped',
      registers,
    });
    this.restartsTotal = new Counter({
      name: 'flotilla_agent_restarts_total',
      help: 'Agent restarts by trigger',
      labelNames: ['reason'],
      registers,
    });
    this.failuresTotal = new Counter({
      name: 'flotilla_agent_failures_total',
      help: 'Agent failures by agent and cause',
      labelNames: ['agent', 'reason'],
      registers,
    });
    this.healthChecksTotal = new Counter({
      name: 'flotilla_health_checks_total',
      help: 'Liveness checks by result',
      labelNames: ['result'],
      registers,
    });
    this.allocatedPorts = new Gauge({
      name: 'flotilla_allocated_ports',
      help: 'Ports currently reserved for agents',
      registers,
    });
    this.activeProcesses = new Gauge({
      name: 'flotilla_active_processes',
      help: 'Agent processes currently alive',
      registers,
    });
    this.apiRequestsTotal = new Counter({
      name: 'flotilla_api_requests_total',
      help: 'Control-plane requests',
      labelNames: ['method', 'route', 'status'],
      registers,
    });
    this.apiRequestDuration = new Histogram({
      name: 'flotilla_api_request_duration_seconds',
      help: 'Control-plane request latency',
      labelNames: ['method', 'route'],
      buckets: [0.005, 0.01, 0.05, 0.1, 0.5, 1, 5],
      registers,
    });
    this.authAttemptsTotal = new Counter({
      name: 'flotilla_auth_attempts_total',
      help: 'API key checks by result',
      labelNames: ['result'],
      registers,
    });
    this.checksumLookups = new Counter({
      name: 'flotilla_checksum_lookups_total',
      help: 'Package checksum lookups by hit or miss',
      labelNames: ['result'],
      registers,
    });
  }

  updateAgentCounts(counts: Partial<Record<AgentStatus, number>>): void {
    for (const status of AGENT_STATUSES) {
      this.agentsTotal.set({ status }, counts[status] ?? 0);
    }
  }

  recordDeployment(result: 'success' | 'failure' | 'already_installed', durationSeconds?: number): void {
    this.deploymentsTotal.inc({ result });
    if (durationSeconds !== undefined && result === 'success') {
      this.deploymentDuration.observe(durationSeconds);
    }
  }

  recordStart(result: 'success' | 'failure'): void {
    this.startsTotal.inc({ result });
  }

  recordStop(): void {
    this.stopsTotal.inc();
  }

  recordRestart(reason: 'manual' | 'health_check'): void {
    this.restartsTotal.inc({ reason });
  }

  recordFailure(agent: string, reason: string): void {
    this.failuresTotal.inc({ agent, reason });
  }

  recordHealthCheck(result: 'healthy' | 'unhealthy' | 'error'): void {
    this.healthChecksTotal.inc({ result });
  }

  setAllocatedPorts(count: number): void {
    this.allocatedPorts.set(count);
  }

  setActiveProcesses(count: number): void {
    this.activeProcesses.set(count);
  }

  recordApiRequest(method: string, route: string, status: number, durationSeconds: number): void {
    this.apiRequestsTotal.inc({ method, route, status: String(status) });
    this.apiRequestDuration.observe({ method, route }, durationSeconds);
  }

  recordAuthAttempt(result: 'success' | 'failure'): void {
    this.authAttemptsTotal.inc({ result });
  }

  recordChecksumLookup(hit: boolean): void {
    this.checksumLookups.inc({ result: hit ? 'hit' : 'miss' });
  }

  /** Prometheus text exposition */
  render(): Promise<string> {
    return this.registry.metrics();
  }

  get contentType(): string {
    return this.registry.contentType;
  }
}
