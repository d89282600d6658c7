import Database from 'better-sqlite3';
import { z } from 'zod';
import { existsSync, mkdirSync } from 'node:fs';
import { dirname } from 'node:path';
import { logger } from '@flotilla/shared/Utils/logger.js';
import { DatabaseError } from '@flotilla/shared/Types/errors.js';
import { AGENT_STATUSES, type AgentStatus, type HealthStatus } from './types.js';
import {
  SCHEMA_SQL,
  type AgentRow,
  type HistoryRow,
  type DeploymentAction,
  type DeploymentResult,
} from './store-schema.js';

const log = logger.child('metadata-store');

export interface AgentRecord {
  name: string;
  configPath: string;
  checksum: string | null;
  status: AgentStatus;
  port: number | null;
  pid: number | null;
  restartCount: number;
  startTime: string | null;
  lastHealthCheck: string | null;
  healthStatus: HealthStatus;
  exitCode: number | null;
  /** One-line cause of the last failure */
  failureReason: string | null;
  /** Diagnostics report for the last failure */
  errorMessage: string | null;
  stdoutLog: string | null;
  stderrLog: string | null;
  metadata: Record<string, unknown>;
  createdAt: string;
  updatedAt: string;
}

/** Omitted optional fields are stored empty (null, 0, 'unknown', {}) */
export type AgentRecordInput = Pick<AgentRecord, 'name' | 'configPath' | 'checksum' | 'status'> &
  Partial<Omit<AgentRecord, 'name' | 'configPath' | 'checksum' | 'status' | 'createdAt' | 'updatedAt'>>;

type AgentParams = Omit<AgentRecord, 'metadata' | 'createdAt' | 'updatedAt'> & { metadata: string; now: string };

export interface HistoryEntry {
  agentName: string;
  checksum?: string | null;
  action: DeploymentAction;
  result: DeploymentResult;
  durationMs?: number;
  error?: string | null;
}

export interface HistoryRecord extends Required<HistoryEntry> {
  id: number;
  createdAt: string;
}

export interface HistoryQuery {
  agentName?: string;
  limit?: number;
}

export interface StoreStatistics {
  totalAgents: number;
  byStatus: Record<AgentStatus, number>;
  totalDeployments: number;
  recentFailures: number;
}

const MetadataSchema = z.record(z.unknown());

function parseMetadata(name: string, text: string): Record<string, unknown> {
  try {
    const parsed = MetadataSchema.safeParse(JSON.parse(text));
    if (parsed.success) return parsed.data;
  } catch (error) {
    log.warn('Unreadable agent metadata', { name, error: message(error) });
    return {};
  }
  log.warn('Agent metadata is not a JSON object', { name });
  return {};
}

function toRecord(row: AgentRow): AgentRecord {
  return {
    name: row.name,
    configPath: row.config_path,
    checksum: row.checksum,
    status: row.status,
    port: row.port,
    pid: row.pid,
    restartCount: row.restart_count,
    startTime: row.start_time,
    lastHealthCheck: row.last_health_check,
    healthStatus: row.health_status,
    exitCode: row.exit_code,
    failureReason: row.failure_reason,
    errorMessage: row.error_message,
    stdoutLog: row.stdout_log,
    stderrLog: row.stderr_log,
    metadata: parseMetadata(row.name, row.metadata),
    createdAt: row.created_at,
    updatedAt: row.updated_at,
  };
}

function toHistory(row: HistoryRow): HistoryRecord {
  return {
    id: row.id,
    agentName: row.agent_name,
    checksum: row.checksum,
    action: row.action,
    result: row.result,
    durationMs: row.duration_ms,
    error: row.error,
    createdAt: row.created_at,
  };
}

function message(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

function openDatabase(path: string): Database.Database {
  try {
    const db = new Database(path);
    db.pragma('journal_mode = WAL');
    db.pragma('busy_timeout = 5000');
    db.exec(SCHEMA_SQL);
    return db;
  } catch (error) {
    throw new DatabaseError(`Failed to initialize metadata store: ${message(error)}`, path, error);
  }
}

/**
 * SQLite-backed record of agents and their deployment history.
 *
 * Only opening the database can throw. Afterwards every failure is logged
 * and reported through the return value: reads give null or [], writes
 * give false.
 */
export class MetadataStore {
  private readonly db: Database.Database;

  constructor(readonly path: string) {
    if (path !== ':memory:') {
      const dir = dirname(path);
      if (!existsSync(dir)) {
        mkdirSync(dir, { recursive: true });
        log.info('Created database directory', { path: dir });
      }
    }

    this.db = openDatabase(path);
    log.info('Metadata store initialized', { path });
  }

  upsertAgent(record: AgentRecordInput): boolean {
    const now = new Date().toISOString();
    try {
      this.writeAgent(record, now);
      return true;
    } catch (error) {
      log.error('Failed to save agent', { name: record.name, error: message(error) });
      return false;
    }
  }

  getAgent(name: string): AgentRecord | null {
    try {
      const row = this.db.prepare<[string], AgentRow>('SELECT * FROM agents WHERE name = ?').get(name);
      return row ? toRecord(row) : null;
    } catch (error) {
      log.error('Failed to read agent', { name, error: message(error) });
      return null;
    }
  }

  getAgentByChecksum(checksum: string): AgentRecord | null {
    try {
      const row = this.db
        .prepare<[string], AgentRow>('SELECT * FROM agents WHERE checksum = ? ORDER BY updated_at DESC LIMIT 1')
        .get(checksum);
      return row ? toRecord(row) : null;
    } catch (error) {
      log.error('Failed to look up checksum', { checksum, error: message(error) });
      return null;
    }
  }

  listAgents(status?: AgentStatus): AgentRecord[] {
    try {
      const rows = status
        ? this.db.prepare<[string], AgentRow>('SELECT * FROM agents WHERE status = ? ORDER BY name').all(status)
        : this.db.prepare<[], AgentRow>('SELECT * FROM agents ORDER BY name').all();
      return rows.map(toRecord);
    } catch (error) {
      log.error('Failed to list agents', { error: message(error) });
      return [];
    }
  }

  deleteAgent(name: string): boolean {
    try {
      const result = this.db.prepare<[string]>('DELETE FROM agents WHERE name = ?').run(name);
      return result.changes > 0;
    } catch (error) {
      log.error('Failed to delete agent', { name, error: message(error) });
      return false;
    }
  }

  recordDeployment(entry: HistoryEntry): boolean {
    try {
      this.insertHistory(entry);
      return true;
    } catch (error) {
      log.error('Failed to record deployment history', { agent: entry.agentName, error: message(error) });
      return false;
    }
  }

  /**
   * Upsert the agent and append a history row in one transaction.
   */
  saveDeployment(record: AgentRecordInput, entry: HistoryEntry): boolean {
    const now = new Date().toISOString();
    const save = this.db.transaction(() => {
      this.writeAgent(record, now);
      this.insertHistory(entry, now);
    });

    try {
      save();
      return true;
    } catch (error) {
      log.error('Failed to save deployment (rolled back)', { name: record.name, error: message(error) });
      return false;
    }
  }

  /** History rows, most recent first */
  getHistory(query: HistoryQuery = {}): HistoryRecord[] {
    const limit = query.limit ?? 50;
    try {
      const rows = query.agentName
        ? this.db
            .prepare<[string, number], HistoryRow>(
              'SELECT * FROM deployment_history WHERE agent_name = ? ORDER BY id DESC LIMIT ?'
            )
            .all(query.agentName, limit)
        : this.db
            .prepare<[number], HistoryRow>('SELECT * FROM deployment_history ORDER BY id DESC LIMIT ?')
            .all(limit);
      return rows.map(toHistory);
    } catch (error) {
      log.error('Failed to read deployment history', { error: message(error) });
      return [];
    }
  }

  getStatistics(now: Date = new Date()): StoreStatistics {
    const byStatus: Record<AgentStatus, number> = {
      discovered: 0,
      starting: 0,
      running: 0,
      stopped: 0,
      failed: 0,
    };
    const stats: StoreStatistics = { totalAgents: 0, byStatus, totalDeployments: 0, recentFailures: 0 };

    try {
      const counts = this.db
        .prepare<[], { status: string; count: number }>('SELECT status, COUNT(*) AS count FROM agents GROUP BY status')
        .all();
      for (const { status, count } of counts) {
        const known = AGENT_STATUSES.find((s) => s === status);
        if (known) byStatus[known] = count;
        stats.totalAgents += count;
      }

      const total = this.db.prepare<[], { count: number }>('SELECT COUNT(*) AS count FROM deployment_history').get();
      stats.totalDeployments = total?.count ?? 0;

      const since = new Date(now.getTime() - 24 * 60 * 60 * 1000).toISOString();
      const failures = this.db
        .prepare<[string], { count: number }>(
          "SELECT COUNT(*) AS count FROM deployment_history WHERE result = 'failure' AND created_at >= ?"
        )
        .get(since);
      stats.recentFailures = failures?.count ?? 0;
    } catch (error) {
      log.error('Failed to compute statistics', { error: message(error) });
    }
    return stats;
  }

  close(): void {
    try {
      this.db.close();
      log.info('Metadata store closed');
    } catch (error) {
      log.error('Failed to close metadata store', { error: message(error) });
    }
  }

  private writeAgent(record: AgentRecordInput, now: string): void {
    this.db
      .prepare<[AgentParams]>(
        `INSERT INTO agents (
           name, config_path, checksum, status, port, pid, restart_count, start_time, last_health_check,
           health_status, exit_code, failure_reason, error_message, stdout_log, stderr_log, metadata,
           created_at, updated_at)
         VALUES (
           @name, @configPath, @checksum, @status, @port, @pid, @restartCount, @startTime, @lastHealthCheck,
           @healthStatus, @exitCode, @failureReason, @errorMessage, @stdoutLog, @stderrLog, @metadata,
           @now, @now)
         ON CONFLICT(name) DO UPDATE SET
           config_path = excluded.config_path,
           checksum = excluded.checksum,
           status = excluded.status,
           port = excluded.port,
           pid = excluded.pid,
           restart_count = excluded.restart_count,
           start_time = excluded.start_time,
           last_health_check = excluded.last_health_check,
           health_status = excluded.health_status,
           exit_code = excluded.exit_code,
           failure_reason = excluded.failure_reason,
           error_message = excluded.error_message,
           stdout_log = excluded.stdout_log,
           stderr_log = excluded.stderr_log,
           metadata = excluded.metadata,
           updated_at = excluded.updated_at`
      )
      .run({
        name: record.name,
        configPath: record.configPath,
        checksum: record.checksum,
        status: record.status,
        port: record.port ?? null,
        pid: record.pid ?? null,
        restartCount: record.restartCount ?? 0,
        startTime: record.startTime ?? null,
        lastHealthCheck: record.lastHealthCheck ?? null,
        healthStatus: record.healthStatus ?? 'unknown',
        exitCode: record.exitCode ?? null,
        failureReason: record.failureReason ?? null,
        errorMessage: record.errorMessage ?? null,
        stdoutLog: record.stdoutLog ?? null,
        stderrLog: record.stderrLog ?? null,
        metadata: JSON.stringify(record.metadata ?? {}),
        now,
      });
  }

  private insertHistory(entry: HistoryEntry, createdAt: string = new Date().toISOString()): void {
    this.db
      .prepare<[string, string | null, DeploymentAction, DeploymentResult, number, string | null, string]>(
        `INSERT INTO deployment_history (agent_name, checksum, action, result, duration_ms, error, created_at)
         VALUES (?, ?, ?, ?, ?, ?, ?)`
      )
      .run(
        entry.agentName,
        entry.checksum ?? null,
        entry.action,
        entry.result,
        Math.round(entry.durationMs ?? 0),
        entry.error ?? null,
        createdAt
      );
  }
}
