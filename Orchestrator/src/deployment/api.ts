import express, { type NextFunction, type Request, type Response } from 'express';
import multer from 'multer';
import { z } from 'zod';
import { logger } from '@flotilla/shared/Utils/logger.js';
import { DeploymentError } from '../utils/errors.js';
import type { MetricsCollector } from './metrics.js';
import type { PackageInstaller } from './package-installer.js';
import type { DeploymentServer } from './supervisor.js';

const log = logger.child('api');

/** Upload ceiling for agent packages */
const MAX_PACKAGE_BYTES = 200 * 1024 * 1024;

const AgentActionSchema = z.object({
  agent_name: z.string().min(1, 'agent_name is required'),
});

export interface DeploymentApiOptions {
  server: DeploymentServer;
  installer: PackageInstaller;
  metrics: MetricsCollector;
  /** When set, every route except /health and /metrics needs a matching X-API-Key */
  apiKey?: string;
}

type AsyncHandler = (req: Request, res: Response) => Promise<void>;

function handle(fn: AsyncHandler) {
  return (req: Request, res: Response, next: NextFunction): void => {
    fn(req, res).catch(next);
  };
}

function isTruthyFlag(value: unknown): boolean {
  if (typeof value === 'boolean') return value;
  if (typeof value !== 'string') return false;
  return ['1', 'true', 'yes'].includes(value.toLowerCase());
}

function routeLabel(req: Request): string {
  const path: unknown = req.route?.path;
  return typeof path === 'string' ? `${req.baseUrl}${path}` : 'unmatched';
}

/**
 * HTTP control plane for the deployment server.
 */
export function createDeploymentApi(options: DeploymentApiOptions): express.Express {
  const { server, installer, metrics, apiKey } = options;
  const startedAt = Date.now();
  const upload = multer({ storage: multer.memoryStorage(), limits: { fileSize: MAX_PACKAGE_BYTES } });
  const app = express();

  app.use(express.json());

  app.use((req: Request, res: Response, next: NextFunction) => {
    const began = process.hrtime.bigint();
    res.on('finish', () => {
      const seconds = Number(process.hrtime.bigint() - began) / 1e9;
      metrics.recordApiRequest(req.method, routeLabel(req), res.statusCode, seconds);
      log.debug(`${req.method} ${req.originalUrl} -> ${res.statusCode}`);
    });
    next();
  });

  // ─── Open routes ─────────────────────────────────────────────────

  app.get('/health', (_req: Request, res: Response) => {
    res.json({
      status: server.isInitialized() ? 'ok' : 'initializing',
      service: 'flotilla',
      agents: server.listAgents().length,
      uptime: Math.floor((Date.now() - startedAt) / 1000),
    });
  });

  app.get(
    '/metrics',
    handle(async (_req, res) => {
      res.set('Content-Type', metrics.contentType);
      res.send(await metrics.render());
    })
  );

  // ─── Authentication ──────────────────────────────────────────────

  if (apiKey) {
    app.use((req: Request, res: Response, next: NextFunction) => {
      if (req.get('X-API-Key') === apiKey) {
        metrics.recordAuthAttempt('success');
        next();
        return;
      }
      metrics.recordAuthAttempt('failure');
      log.warn('Rejected request with missing or invalid API key', { method: req.method, path: req.path, ip: req.ip });
      res.status(401).json({ error: 'Invalid or missing API key' });
    });
  }

  // ─── Agents ──────────────────────────────────────────────────────

  app.get('/agents', (_req: Request, res: Response) => {
    const agents = server.listAgents().map((agent) => ({
      name: agent.name,
      status: agent.status,
      port: agent.port,
      pid: agent.pid,
      checksum: agent.checksum,
      configPath: agent.configPath,
    }));
    res.json({ agents, count: agents.length });
  });

  app.post('/check', (req: Request, res: Response) => {
    const checksum = req.query.checksum;
    if (typeof checksum !== 'string' || checksum === '') {
      res.status(400).json({ error: 'checksum query parameter is required' });
      return;
    }
    const agent = server.findByChecksum(checksum);
    metrics.recordChecksumLookup(agent !== null);
    if (!agent) {
      res.json({ exists: false, message: 'No agent with this checksum is installed' });
      return;
    }
    res.json({
      exists: true,
      name: agent.name,
      status: agent.status,
      port: agent.port,
      running: agent.status === 'running',
    });
  });

  app.post(
    '/deploy',
    upload.single('file'),
    handle(async (req, res) => {
      const file = req.file;
      if (!file) {
        res.status(400).json({ error: "No file uploaded (multipart field 'file')" });
        return;
      }
      const bodyForce: unknown = req.body?.force;
      const result = await installer.deploy(file.buffer, {
        filename: file.originalname,
        force: isTruthyFlag(req.query.force) || isTruthyFlag(bodyForce),
      });
      res.json(result);
    })
  );

  for (const action of ['start', 'stop', 'restart'] as const) {
    app.post(
      `/${action}`,
      handle(async (req, res) => {
        const parsed = AgentActionSchema.safeParse(req.body ?? {});
        if (!parsed.success) {
          res.status(400).json({ error: parsed.error.errors.map((e) => e.message).join('; ') });
          return;
        }
        const name = parsed.data.agent_name;
        if (!server.getAgent(name)) {
          res.status(404).json({ error: `Agent not found: ${name}` });
          return;
        }

        const ok = await server[action](name);
        const status = server.getAgentStatus(name);
        if (!ok) {
          res.status(500).json({
            success: false,
            error: status?.failureReason ?? `Failed to ${action} agent ${name}`,
            agent: status,
          });
          return;
        }
        res.json({ success: true, message: `Agent ${name} ${action === 'stop' ? 'stopped' : `${action}ed`}`, agent: status });
      })
    );
  }

  app.get('/status/:agentName', (req: Request, res: Response) => {
    const status = server.getAgentStatus(req.params.agentName);
    if (!status) {
      res.status(404).json({ error: `Agent not found: ${req.params.agentName}` });
      return;
    }
    res.json(status);
  });

  app.get(
    '/agents/:agentName/diagnostics',
    handle(async (req, res) => {
      const report = await server.getDiagnostics(req.params.agentName);
      if (report === null) {
        res.status(404).json({ error: `Agent not found: ${req.params.agentName}` });
        return;
      }
      res.type('text/plain').send(report);
    })
  );

  app.delete(
    '/agents/:agentName',
    handle(async (req, res) => {
      const removed = await server.removeAgent(req.params.agentName);
      if (!removed) {
        res.status(404).json({ error: `Agent not found: ${req.params.agentName}` });
        return;
      }
      const packageRemoved = await installer.removePackage(removed.configPath);
      res.json({ success: true, name: removed.name, packageRemoved });
    })
  );

  // ─── Errors ──────────────────────────────────────────────────────

  app.use((error: unknown, req: Request, res: Response, _next: NextFunction) => {
    if (error instanceof DeploymentError) {
      res.status(error.statusCode).json({ error: error.message });
      return;
    }
    if (error instanceof multer.MulterError) {
      res.status(400).json({ error: error.message });
      return;
    }
    if (error instanceof SyntaxError) {
      res.status(400).json({ error: 'Malformed JSON body' });
      return;
    }
    log.error(`Unhandled error on ${req.method} ${req.path}`, { error });
    res.status(500).json({ error: error instanceof Error ? error.message : 'Internal server error' });
  });

  return app;
}
