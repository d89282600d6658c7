import { existsSync } from 'node:fs';
import { basename, dirname, extname, join } from 'node:path';
import { z } from 'zod';
import { ConfigurationError } from '@flotilla/shared/Types/errors.js';
import { parseConfigFile } from './index.js';
import { MCPServerConfigSchema, type LLMConfig } from './schema.js';

/** Definition files looked up in each agent directory, in order of preference */
export const DEFINITION_FILES = ['agent.toml', 'agent.json'] as const;

// [agent] section
export const AgentMetadataSchema = z.object({
  name: z.string().min(1),
  version: z.string().default('1.0.0'),
  description: z.string().optional(),
  author: z.string().optional(),
  license: z.string().optional(),
  capabilities: z.array(z.string()).default([]),
  /** Relative to the definition file; runtime is inferred from the extension */
  entry_point: z.string().default('main.py'),
});

// [llm] section: per-agent overrides of the parent LLM settings
export const AgentLLMSchema = z.object({
  model: z.string().optional(),
  temperature: z.number().min(0).max(2).optional(),
  top_p: z.number().min(0).max(1).optional(),
  max_tokens: z.number().int().positive().optional(),
  request_timeout: z.number().positive().optional(),
  system_prompt: z.string().optional(),
});

export type AgentLLMSettings = z.infer<typeof AgentLLMSchema>;

export const AgentDependenciesSchema = z.object({
  /** Version constraint such as ">=3.9" */
  python: z.string().optional(),
  node: z.string().optional(),
  packages: z.array(z.string()).default([]),
});

// Advisory only; nothing enforces these limits
export const AgentResourcesSchema = z.object({
  cpu_limit: z.number().positive().optional(),
  memory_limit: z.string().optional(),
  timeout: z.number().positive().optional(),
});

export const SubAgentSchema = z.object({
  url: z.string().url(),
  auth_token: z.string().optional(),
  health_check_interval: z.number().positive().default(30),
});

export const AgentDefinitionSchema = z.object({
  agent: AgentMetadataSchema,
  llm: AgentLLMSchema.optional(),
  dependencies: AgentDependenciesSchema.optional(),
  resources: AgentResourcesSchema.optional(),
  mcp_servers: z.record(z.string(), MCPServerConfigSchema).default({}),
  sub_agents: z.record(z.string(), SubAgentSchema).default({}),
});

export type AgentDefinition = z.infer<typeof AgentDefinitionSchema>;

/**
 * Find the definition file in an agent directory (agent.toml wins over agent.json).
 */
export function findDefinitionFile(agentDir: string): string | null {
  for (const file of DEFINITION_FILES) {
    const candidate = join(agentDir, file);
    if (existsSync(candidate)) return candidate;
  }
  return null;
}

/**
 * Legacy agent.json files carry the metadata at the top level instead of
 * under `agent`; lift it into the sectioned layout before validation.
 */
function normalizeLegacyJson(raw: Record<string, unknown>, path: string): Record<string, unknown> {
  if (raw.agent !== undefined) return raw;
  const { llm, dependencies, resources, mcp_servers, sub_agents, ...metadata } = raw;
  return {
    agent: { name: basename(dirname(path)), ...metadata },
    llm,
    dependencies,
    resources,
    mcp_servers,
    sub_agents,
  };
}

/**
 * Load and validate an agent definition file.
 * @throws ConfigurationError when the file is unreadable or fails validation
 */
export function loadAgentDefinition(path: string): AgentDefinition {
  let raw = parseConfigFile(path);
  if (extname(path).toLowerCase() === '.json') {
    raw = normalizeLegacyJson(raw, path);
  }

  const result = AgentDefinitionSchema.safeParse(raw);
  if (!result.success) {
    const issues = result.error.errors.map((issue) => `${issue.path.join('.')}: ${issue.message}`);
    throw new ConfigurationError(`Invalid agent definition ${path}: ${issues.join('; ')}`, { source: path, issues });
  }
  return result.data;
}

/**
 * Resolve an agent's effective LLM settings.
 * Agent values win, unset values inherit from the parent, and the network
 * location (baseUrl, port) always comes from the parent.
 */
export function mergeLLMConfig(parent: LLMConfig, agent: AgentLLMSettings | undefined): LLMConfig {
  return {
    baseUrl: parent.baseUrl,
    port: parent.port,
    model: agent?.model ?? parent.model,
    temperature: agent?.temperature ?? parent.temperature,
    topP: agent?.top_p ?? parent.topP,
    maxTokens: agent?.max_tokens ?? parent.maxTokens,
    requestTimeout: agent?.request_timeout ?? parent.requestTimeout,
    systemPrompt: agent?.system_prompt ?? parent.systemPrompt,
  };
}
