import { z } from 'zod';

// Federation metadata for a peer deployment server (reachability check only)
export const RemoteServerSchema = z.object({
  name: z.string().min(1),
  host: z.string().min(1),
  port: z.number().int().positive(),
  enabled: z.boolean().default(true),
  description: z.string().optional(),
});

export type RemoteServer = z.infer<typeof RemoteServerSchema>;

export const DeploymentAuthSchema = z.object({
  // When set, every control-plane route except /health and /metrics needs X-API-Key
  apiKey: z.string().min(1).optional(),
});

export const DeploymentServerConfigSchema = z.object({
  enabled: z.boolean().default(true),
  host: z.string().default('127.0.0.1'),
  apiPort: z.number().int().positive().default(8080),

  // Agent ports are drawn from [basePort, basePort + maxAgents)
  basePort: z.number().int().positive().default(8100),
  maxAgents: z.number().int().positive().default(10),

  /** Seconds between liveness sweeps; fractions allowed */
  healthCheckInterval: z.number().positive().default(30),
  restartOnFailure: z.boolean().default(true),
  maxRestarts: z.number().int().nonnegative().default(3),

  agentsDirectory: z.string().default('./agents'),
  remoteServers: z.array(RemoteServerSchema).default([]),

  // Pick another API port when the configured one is busy
  autoDiscoverPort: z.boolean().default(true),

  /** Holds flotilla.db, ports.json and extracted packages */
  storagePath: z.string().default('./data'),

  startupGracePeriodMs: z.number().int().nonnegative().default(2000),
  stopTimeoutMs: z.number().int().positive().default(5000),
  restartDelayMs: z.number().int().nonnegative().default(1000),
  pythonCommand: z.string().default('python3'),

  auth: DeploymentAuthSchema.default({}),
});

export type DeploymentServerConfig = z.infer<typeof DeploymentServerConfigSchema>;
export type DeploymentServerConfigInput = z.input<typeof DeploymentServerConfigSchema>;

// Tool provider reached through the protocol client
export const MCPServerConfigSchema = z
  .object({
    transport: z.enum(['stdio', 'http', 'sse']).default('stdio'),
    command: z.string().optional(),
    args: z.array(z.string()).default([]),
    env: z.record(z.string()).default({}),
    cwd: z.string().optional(),
    url: z.string().url().optional(),
    headers: z.record(z.string()).default({}),
    /** Per-request deadline in milliseconds */
    timeout: z.number().positive().default(30000),
    enabled: z.boolean().default(true),
    description: z.string().optional(),
  })
  .superRefine((server, ctx) => {
    if (server.transport === 'stdio' && !server.command) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, path: ['command'], message: 'stdio providers need a command' });
    }
    if (server.transport !== 'stdio' && !server.url) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, path: ['url'], message: `${server.transport} providers need a url` });
    }
  });

export type MCPServerConfig = z.infer<typeof MCPServerConfigSchema>;

// Parent LLM settings that agent definitions inherit from
export const LLMConfigSchema = z.object({
  baseUrl: z.string().default('http://localhost'),
  port: z.number().int().positive().default(11434),
  model: z.string().default('llama2'),
  requestTimeout: z.number().positive().default(30),
  maxTokens: z.number().int().positive().default(2048),
  temperature: z.number().min(0).max(2).default(0.7),
  topP: z.number().min(0).max(1).default(0.9),
  systemPrompt: z.string().optional(),
});

export type LLMConfig = z.infer<typeof LLMConfigSchema>;

export const ConfigSchema = z.object({
  deployment: DeploymentServerConfigSchema.default({}),
  mcpServers: z.record(z.string(), MCPServerConfigSchema).default({}),
  llm: LLMConfigSchema.default({}),
  logLevel: z.enum(['debug', 'info', 'warn', 'error']).default('info'),
});

export type Config = z.infer<typeof ConfigSchema>;
