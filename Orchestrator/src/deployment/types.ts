import type { ManagedProcess } from './process-launcher.js';

export const AGENT_STATUSES = ['discovered', 'starting', 'running', 'stopped', 'failed'] as const;
export type AgentStatus = (typeof AGENT_STATUSES)[number];

export type HealthStatus = 'unknown' | 'healthy' | 'unhealthy';

/**
 * Live supervisor-side view of one agent.
 * `process`, `pid` and `startTime` are only set while starting or running;
 * `port` only while a slot is reserved.
 */
export interface AgentInstance {
  name: string;
  configPath: string;
  checksum: string | null;
  status: AgentStatus;
  process: ManagedProcess | null;
  pid: number | null;
  port: number | null;
  startTime: Date | null;
  /** Only a fresh deployment resets this */
  restartCount: number;
  lastHealthCheck: Date | null;
  healthStatus: HealthStatus;
  /** One-line cause of the last failure */
  failureReason: string | null;
  /** Full diagnostics for the last failure */
  errorMessage: string | null;
  stdoutLog: string | null;
  stderrLog: string | null;
  exitCode: number | null;
  /** Descriptive fields from the definition, stored as a JSON blob */
  metadata: Record<string, unknown>;
}

/** JSON shape returned by the control plane for one agent */
export interface AgentStatusReport {
  name: string;
  status: AgentStatus;
  port: number | null;
  pid: number | null;
  checksum: string | null;
  configPath: string;
  healthStatus: HealthStatus;
  restartCount: number;
  startTime: string | null;
  uptimeSeconds: number | null;
  lastHealthCheck: string | null;
  exitCode: number | null;
  failureReason: string | null;
  errorMessage: string | null;
}

export function createAgentInstance(name: string, configPath: string, checksum: string | null = null): AgentInstance {
  return {
    name,
    configPath,
    checksum,
    status: 'discovered',
    process: null,
    pid: null,
    port: null,
    startTime: null,
    restartCount: 0,
    lastHealthCheck: null,
    healthStatus: 'unknown',
    failureReason: null,
    errorMessage: null,
    stdoutLog: null,
    stderrLog: null,
    exitCode: null,
    metadata: {},
  };
}

export function toStatusReport(agent: AgentInstance, now: Date = new Date()): AgentStatusReport {
  return {
    name: agent.name,
    status: agent.status,
    port: agent.port,
    pid: agent.pid,
    checksum: agent.checksum,
    configPath: agent.configPath,
    healthStatus: agent.healthStatus,
    restartCount: agent.restartCount,
    startTime: agent.startTime?.toISOString() ?? null,
    uptimeSeconds:
      agent.status === 'running' && agent.startTime
        ? Math.floor((now.getTime() - agent.startTime.getTime()) / 1000)
        : null,
    lastHealthCheck: agent.lastHealthCheck?.toISOString() ?? null,
    exitCode: agent.exitCode,
    failureReason: agent.failureReason,
    errorMessage: agent.errorMessage,
  };
}
