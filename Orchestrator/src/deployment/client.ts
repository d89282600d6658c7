import { readFile } from 'node:fs/promises';
import { basename } from 'node:path';
import { z } from 'zod';
import { NetworkError } from '@flotilla/shared/Types/errors.js';
import type { DeployResult } from './package-installer.js';
import { AGENT_STATUSES, type AgentStatusReport } from './types.js';

export interface DeploymentClientOptions {
  baseUrl: string;
  apiKey?: string;
  timeoutMs?: number;
  fetch?: typeof fetch;
}

const StatusSchema = z.enum(AGENT_STATUSES);

const AgentSummarySchema = z.object({
  name: z.string(),
  status: StatusSchema,
  port: z.number().nullable(),
  pid: z.number().nullable(),
  checksum: z.string().nullable(),
  configPath: z.string(),
});
export type AgentSummary = z.infer<typeof AgentSummarySchema>;

const AgentListSchema = z.object({ agents: z.array(AgentSummarySchema) });

const AgentStatusReportSchema = AgentSummarySchema.extend({
  healthStatus: z.enum(['unknown', 'healthy', 'unhealthy']),
  restartCount: z.number(),
  startTime: z.string().nullable(),
  uptimeSeconds: z.number().nullable(),
  lastHealthCheck: z.string().nullable(),
  exitCode: z.number().nullable(),
  failureReason: z.string().nullable(),
  errorMessage: z.string().nullable(),
}) satisfies z.ZodType<AgentStatusReport>;

const ChecksumLookupSchema = z.discriminatedUnion('exists', [
  z.object({
    exists: z.literal(true),
    name: z.string(),
    status: StatusSchema,
    port: z.number().nullable(),
    running: z.boolean(),
  }),
  z.object({ exists: z.literal(false), message: z.string() }),
]);
export type ChecksumLookup = z.infer<typeof ChecksumLookupSchema>;

const ActionResultSchema = z.object({
  success: z.boolean(),
  message: z.string().optional(),
  error: z.string().optional(),
  agent: AgentStatusReportSchema.nullable(),
});
export type ActionResult = z.infer<typeof ActionResultSchema>;

const DeployResultSchema = z.object({
  status: z.enum(['deployed', 'already_installed']),
  name: z.string(),
  checksum: z.string(),
  configPath: z.string(),
  message: z.string(),
}) satisfies z.ZodType<DeployResult>;

/**
 * Thin HTTP client for a remote deployment server's control plane.
 * Every response body is validated before it is returned.
 */
export class DeploymentClient {
  private readonly baseUrl: string;
  private readonly apiKey: string | undefined;
  private readonly timeoutMs: number;
  private readonly fetchImpl: typeof fetch;

  constructor(options: DeploymentClientOptions) {
    this.baseUrl = options.baseUrl.replace(/\/+$/, '');
    this.apiKey = options.apiKey;
    this.timeoutMs = options.timeoutMs ?? 30_000;
    this.fetchImpl = options.fetch ?? fetch;
  }

  async health(): Promise<boolean> {
    try {
      const response = await this.fetchImpl(`${this.baseUrl}/health`, { signal: AbortSignal.timeout(5000) });
      return response.ok;
    } catch {
      return false;
    }
  }

  async listAgents(): Promise<AgentSummary[]> {
    const body = await this.request(AgentListSchema, 'GET', '/agents');
    return body.agents;
  }

  checkChecksum(checksum: string): Promise<ChecksumLookup> {
    return this.request(ChecksumLookupSchema, 'POST', `/check?checksum=${encodeURIComponent(checksum)}`);
  }

  async deployFile(path: string, force = false): Promise<DeployResult> {
    const data = await readFile(path);
    const form = new FormData();
    form.append('file', new Blob([data], { type: 'application/zip' }), basename(path));
    return this.request(DeployResultSchema, 'POST', `/deploy${force ? '?force=true' : ''}`, form);
  }

  start(name: string): Promise<ActionResult> {
    return this.request(ActionResultSchema, 'POST', '/start', { agent_name: name });
  }

  stop(name: string): Promise<ActionResult> {
    return this.request(ActionResultSchema, 'POST', '/stop', { agent_name: name });
  }

  restart(name: string): Promise<ActionResult> {
    return this.request(ActionResultSchema, 'POST', '/restart', { agent_name: name });
  }

  status(name: string): Promise<AgentStatusReport> {
    return this.request(AgentStatusReportSchema, 'GET', `/status/${encodeURIComponent(name)}`);
  }

  private async request<T>(
    schema: z.ZodType<T>,
    method: string,
    path: string,
    body?: FormData | Record<string, unknown>
  ): Promise<T> {
    const headers: Record<string, string> = {};
    if (this.apiKey) headers['X-API-Key'] = this.apiKey;
    let payload: FormData | string | undefined;
    if (body instanceof FormData) {
      payload = body;
    } else if (body !== undefined) {
      headers['Content-Type'] = 'application/json';
      payload = JSON.stringify(body);
    }

    let response: Response;
    try {
      response = await this.fetchImpl(`${this.baseUrl}${path}`, {
        method,
        headers,
        body: payload,
        signal: AbortSignal.timeout(this.timeoutMs),
      });
    } catch (error) {
      throw new NetworkError(`${method} ${path} failed: ${error instanceof Error ? error.message : String(error)}`, null, error);
    }

    if (!response.ok) {
      const parsed: unknown = await response.json().catch(() => null);
      const message =
        parsed !== null && typeof parsed === 'object' && 'error' in parsed && typeof parsed.error === 'string'
          ? parsed.error
          : response.statusText;
      throw new NetworkError(`${method} ${path} returned ${response.status}: ${message}`, response.status);
    }
    const parsed = schema.safeParse(await response.json().catch(() => null));
    if (!parsed.success) {
      const issues = parsed.error.errors.map((issue) => `${issue.path.join('.') || 'body'}: ${issue.message}`);
      throw new NetworkError(`${method} ${path} returned an unexpected body: ${issues.join('; ')}`, response.status);
    }
    return parsed.data;
  }
}
