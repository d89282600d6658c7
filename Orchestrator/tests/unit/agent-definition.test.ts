import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdirSync, rmSync, writeFileSync } from 'node:fs';
import { join } from 'node:path';
import { ConfigurationError } from '@flotilla/shared/Types/errors.js';
import {
  findDefinitionFile,
  loadAgentDefinition,
  mergeLLMConfig,
} from '../../src/config/agent-definition.js';
import { LLMConfigSchema } from '../../src/config/schema.js';
import { makeTempDir, writeAgent } from '../helpers/agents.js';

let root: string;

beforeEach(() => {
  root = makeTempDir('definition');
});

afterEach(() => {
  rmSync(root, { recursive: true, force: true });
});

describe('loadAgentDefinition', () => {
  it('reads a TOML definition with defaults filled in', () => {
    const path = writeAgent(root, 'weather', 'weather', '[llm]\nmodel = "mistral"\ntemperature = 0.2\n');

    const definition = loadAgentDefinition(path);

    expect(definition.agent).toEqual({
      name: 'weather',
      version: '1.2.0',
      entry_point: 'main.py',
      capabilities: [],
    });
    expect(definition.llm).toEqual({ model: 'mistral', temperature: 0.2 });
    expect(definition.mcp_servers).toEqual({});
    expect(definition.sub_agents).toEqual({});
  });

  it('reads tool providers and sub-agents', () => {
    const extra = [
      '[mcp_servers.files]',
      'command = "files-server"',
      'args = ["--root", "/srv/files"]',
      '',
      '[sub_agents.summarizer]',
      'url = "http://127.0.0.1:8200"',
      '',
    ].join('\n');
    const path = writeAgent(root, 'weather', 'weather', extra);

    const definition = loadAgentDefinition(path);

    expect(definition.mcp_servers.files).toMatchObject({
      transport: 'stdio',
      command: 'files-server',
      args: ['--root', '/srv/files'],
      timeout: 30000,
    });
    expect(definition.sub_agents.summarizer).toEqual({
      url: 'http://127.0.0.1:8200',
      health_check_interval: 30,
    });
  });

  it('lifts legacy top-level JSON metadata and names the agent after its directory', () => {
    const dir = join(root, 'legacy-bot');
    mkdirSync(dir);
    const path = join(dir, 'agent.json');
    writeFileSync(path, JSON.stringify({ version: '0.3.0', entry_point: 'bot.js', llm: { model: 'phi' } }));

    const definition = loadAgentDefinition(path);

    expect(definition.agent.name).toBe('legacy-bot');
    expect(definition.agent.version).toBe('0.3.0');
    expect(definition.agent.entry_point).toBe('bot.js');
    expect(definition.llm).toEqual({ model: 'phi' });
  });

  it('rejects a definition without a name', () => {
    const dir = join(root, 'nameless');
    mkdirSync(dir);
    const path = join(dir, 'agent.toml');
    writeFileSync(path, '[agent]\nversion = "1.0.0"\n');

    expect(() => loadAgentDefinition(path)).toThrow(ConfigurationError);
    expect(() => loadAgentDefinition(path)).toThrow(`Invalid agent definition ${path}: agent.name: Required`);
    expect(() => loadAgentDefinition(path)).toThrow(
      expect.objectContaining({ source: path, issues: ['agent.name: Required'] })
    );
  });

  it('rejects malformed TOML', () => {
    const dir = join(root, 'broken');
    mkdirSync(dir);
    const path = join(dir, 'agent.toml');
    writeFileSync(path, '[agent\nname = ');

    expect(() => loadAgentDefinition(path)).toThrow(`Cannot parse config file ${path}`);
  });
});

describe('findDefinitionFile', () => {
  it('prefers agent.toml over agent.json', () => {
    const path = writeAgent(root, 'weather');
    writeFileSync(join(root, 'weather', 'agent.json'), '{"name":"weather"}');

    expect(findDefinitionFile(join(root, 'weather'))).toBe(path);
  });

  it('falls back to agent.json', () => {
    const dir = join(root, 'legacy');
    mkdirSync(dir);
    writeFileSync(join(dir, 'agent.json'), '{"name":"legacy"}');

    expect(findDefinitionFile(dir)).toBe(join(dir, 'agent.json'));
  });

  it('returns null for a directory without a definition', () => {
    expect(findDefinitionFile(root)).toBeNull();
  });
});

describe('mergeLLMConfig', () => {
  const parent = LLMConfigSchema.parse({ baseUrl: 'http://llm.internal', port: 9000, systemPrompt: 'Be brief.' });

  it('inherits everything when the agent sets nothing', () => {
    expect(mergeLLMConfig(parent, undefined)).toEqual(parent);
  });

  it('lets agent values win but keeps the parent location', () => {
    const merged = mergeLLMConfig(parent, { model: 'mistral', top_p: 0.5, max_tokens: 512 });

    expect(merged).toEqual({
      baseUrl: 'http://llm.internal',
      port: 9000,
      model: 'mistral',
      temperature: 0.7,
      topP: 0.5,
      maxTokens: 512,
      requestTimeout: 30,
      systemPrompt: 'Be brief.',
    });
  });
});
