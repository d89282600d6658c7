import type { AgentStatus, HealthStatus } from './types.js';

// SQL schema for the deployment metadata database

export const SCHEMA_SQL = `
-- One row per known agent, updated on every status change
CREATE TABLE IF NOT EXISTS agents (
    name TEXT PRIMARY KEY,
    config_path TEXT NOT NULL,
    checksum TEXT,
    status TEXT NOT NULL DEFAULT 'discovered'
        CHECK (status IN ('discovered', 'starting', 'running', 'stopped', 'failed')),
    port INTEGER,
    pid INTEGER,
    restart_count INTEGER NOT NULL DEFAULT 0,
    start_time TEXT,
    last_health_check TEXT,
    health_status TEXT NOT NULL DEFAULT 'unknown'
        CHECK (health_status IN ('unknown', 'healthy', 'unhealthy')),
    exit_code INTEGER,
    failure_reason TEXT,
    error_message TEXT,
    stdout_log TEXT,
    stderr_log TEXT,
    -- free-form JSON object
    metadata TEXT NOT NULL DEFAULT '{}',
    created_at TEXT NOT NULL,
    updated_at TEXT NOT NULL
);

CREATE INDEX IF NOT EXISTS idx_agents_checksum ON agents(checksum);
CREATE INDEX IF NOT EXISTS idx_agents_status ON agents(status);

-- Append-only log of lifecycle actions
CREATE TABLE IF NOT EXISTS deployment_history (
    id INTEGER PRIMARY KEY AUTOINCREMENT,
    agent_name TEXT NOT NULL,
    checksum TEXT,
    action TEXT NOT NULL
        CHECK (action IN ('deploy', 'start', 'stop', 'restart', 'undeploy', 'health_restart')),
    result TEXT NOT NULL CHECK (result IN ('success', 'failure')),
    duration_ms INTEGER NOT NULL DEFAULT 0 CHECK (duration_ms >= 0),
    error TEXT,
    created_at TEXT NOT NULL
);

CREATE INDEX IF NOT EXISTS idx_history_agent ON deployment_history(agent_name);
CREATE INDEX IF NOT EXISTS idx_history_date ON deployment_history(created_at);
`;

export type DeploymentAction = 'deploy' | 'start' | 'stop' | 'restart' | 'undeploy' | 'health_restart';
export type DeploymentResult = 'success' | 'failure';

// Row shapes as stored
export interface AgentRow {
  name: string;
  config_path: string;
  checksum: string | null;
  status: AgentStatus;
  port: number | null;
  pid: number | null;
  restart_count: number;
  start_time: string | null;
  last_health_check: string | null;
  health_status: HealthStatus;
  exit_code: number | null;
  failure_reason: string | null;
  error_message: string | null;
  stdout_log: string | null;
  stderr_log: string | null;
  metadata: string;
  created_at: string;
  updated_at: string;
}

export interface HistoryRow {
  id: number;
  agent_name: string;
  checksum: string | null;
  action: DeploymentAction;
  result: DeploymentResult;
  duration_ms: number;
  error: string | null;
  created_at: string;
}
