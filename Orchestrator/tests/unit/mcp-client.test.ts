import { describe, it, expect, afterEach } from 'vitest';
import { MCPServerConfigSchema } from '../../src/config/schema.js';
import { MCPClient } from '../../src/mcp-clients/mcp-client.js';
import { buildProviderEnv, createTransport } from '../../src/mcp-clients/transport.js';
import { NotConnectedError, ProtocolError } from '../../src/utils/errors.js';
import { createTestProvider, providerConfig, tool, type ProviderOptions, type TestProvider } from '../helpers/mcp-provider.js';

describe('MCPClient', () => {
  const open: MCPClient[] = [];

  async function connected(
    options: ProviderOptions = {},
    timeout = 30000
  ): Promise<{ client: MCPClient; provider: TestProvider }> {
    const provider = createTestProvider(options);
    const client = new MCPClient('test', providerConfig(timeout), await provider.connect());
    open.push(client);
    expect(await client.connect()).toBe(true);
    return { client, provider };
  }

  afterEach(async () => {
    await Promise.all(open.splice(0).map((client) => client.disconnect()));
  });

  describe('connect', () => {
    it('stores capabilities and server info from the handshake', async () => {
      const { client } = await connected();

      expect(client.connectionState).toBe('connected');
      expect(client.getServerInfo()).toMatchObject({ name: 'test-provider', version: '2.1.0' });
      expect(client.getCapabilities()?.tools).toBeDefined();
      expect(client.getCapabilities()?.resources?.subscribe).toBe(true);
    });

    it('does not list tools during the handshake', async () => {
      const { provider } = await connected();

      expect(provider.calls['tools/list']).toBeUndefined();
    });

    it('ignores tools offered in the handshake and asks for them again', async () => {
      const { client, provider } = await connected({
        handshakeTools: [tool('stale')],
        toolPages: [[tool('fresh')]],
      });

      const page = await client.listTools();

      expect(page.tools.map((t) => t.name)).toEqual(['fresh']);
      expect(provider.calls['tools/list']).toBe(1);
    });

    it('returns false for an unsupported transport', async () => {
      const config = MCPServerConfigSchema.parse({ transport: 'sse', url: 'http://127.0.0.1:9/sse' });
      const client = new MCPClient('legacy', config);

      expect(await client.connect()).toBe(false);
      expect(client.connectionState).toBe('disconnected');
    });
  });

  describe('requests', () => {
    it('lists tools page by page', async () => {
      const { client } = await connected({ toolPages: [[tool('a'), tool('b')], [tool('c')]] });

      const first = await client.listTools();
      expect(first.tools.map((t) => t.name)).toEqual(['a', 'b']);
      expect(first.nextCursor).toBe('1');

      const second = await client.listTools(first.nextCursor);
      expect(second.tools.map((t) => t.name)).toEqual(['c']);
      expect(second.nextCursor).toBeUndefined();
    });

    it('calls a tool and returns the result', async () => {
      const { client } = await connected();

      const result = await client.callTool('echo', { text: 'hi' });

      expect(result.content).toEqual([{ type: 'text', text: 'echo:{"text":"hi"}' }]);
    });

    it('serializes concurrent requests', async () => {
      const { client, provider } = await connected();

      const results = await Promise.all([client.callTool('one'), client.callTool('two'), client.listTools()]);

      expect(results).toHaveLength(3);
      expect(provider.calls['tools/call']).toBe(2);
      expect(provider.calls['tools/list']).toBe(1);
    });

    it('turns an error response into a ProtocolError', async () => {
      const { client } = await connected();

      const failure = client.callTool('reject');

      await expect(failure).rejects.toBeInstanceOf(ProtocolError);
      await expect(failure).rejects.toMatchObject({ rpcCode: -32602, mcpName: 'test' });
      await expect(failure).rejects.toThrow('bad arguments for reject');
    });

    it.each([
      ['tools/list', (client: MCPClient) => client.listTools()],
      ['tools/call', (client: MCPClient) => client.callTool('echo')],
      ['resources/list', (client: MCPClient) => client.listResources()],
      ['resources/read', (client: MCPClient) => client.readResource('memo://notes')],
      ['resources/templates/list', (client: MCPClient) => client.listResourceTemplates()],
      ['prompts/list', (client: MCPClient) => client.listPrompts()],
      ['prompts/get', (client: MCPClient) => client.getPrompt('greet')],
    ])('turns an error answer to %s into a ProtocolError', async (method, send) => {
      const { client, provider } = await connected({ failing: true });

      const failure = send(client);

      await expect(failure).rejects.toBeInstanceOf(ProtocolError);
      await expect(failure).rejects.toMatchObject({ rpcCode: -32603, mcpName: 'test' });
      await expect(failure).rejects.toThrow(`${method} failed`);
      expect(provider.calls[method]).toBe(1);
    });

    it.each([
      ['resources/subscribe', (client: MCPClient) => client.subscribeResource('memo://notes')],
      ['resources/unsubscribe', (client: MCPClient) => client.unsubscribeResource('memo://notes')],
    ])('turns an error answer to %s into a ProtocolError', async (method, send) => {
      const { client } = await connected({ failing: true });

      await expect(send(client)).rejects.toMatchObject({ name: 'ProtocolError', rpcCode: -32603 });
    });

    it('gives up on a provider that does not answer in time', async () => {
      const { client } = await connected({ slowMs: 1000 }, 100);

      await expect(client.callTool('slow')).rejects.toThrow('No response from test for tools/call');
    });

    it('reads resources and templates', async () => {
      const { client } = await connected();

      expect((await client.listResources()).resources[0].uri).toBe('memo://notes');
      expect((await client.readResource('memo://notes')).contents[0]).toMatchObject({ text: 'remember the milk' });
      expect((await client.listResourceTemplates()).resourceTemplates[0].uriTemplate).toBe('memo://{name}');
    });

    it('fetches prompts with arguments', async () => {
      const { client } = await connected();

      expect((await client.listPrompts()).prompts.map((p) => p.name)).toEqual(['greet']);
      const prompt = await client.getPrompt('greet', { who: 'Ada' });
      expect(prompt.messages[0].content).toEqual({ type: 'text', text: 'Hello, Ada' });
    });
  });

  describe('subscriptions', () => {
    it('subscribes when the provider supports it', async () => {
      const { client, provider } = await connected();

      expect(await client.subscribeResource('memo://notes')).toBe(true);
      expect(provider.subscriptions.has('memo://notes')).toBe(true);

      expect(await client.unsubscribeResource('memo://notes')).toBe(true);
      expect(provider.subscriptions.size).toBe(0);
    });

    it('returns false without the subscribe capability', async () => {
      const { client, provider } = await connected({ capabilities: { tools: {}, resources: {} } });

      expect(await client.subscribeResource('memo://notes')).toBe(false);
      expect(provider.calls['resources/subscribe']).toBeUndefined();
    });
  });

  describe('setLoggingLevel', () => {
    it('forwards the level', async () => {
      const { client, provider } = await connected();

      expect(await client.setLoggingLevel('warning')).toBe(true);
      expect(provider.loggingLevel).toBe('warning');
    });

    it('sends the level even when logging is not advertised', async () => {
      const { client, provider } = await connected({ capabilities: { tools: {} } });

      expect(await client.setLoggingLevel('debug')).toBe(false);
      expect(provider.calls['logging/setLevel']).toBe(1);
    });

    it('returns false when the provider rejects the level', async () => {
      const { client, provider } = await connected({ failing: true });

      expect(await client.setLoggingLevel('error')).toBe(false);
      expect(provider.calls['logging/setLevel']).toBe(1);
    });

    it('returns false when not connected', async () => {
      const client = new MCPClient('idle', providerConfig());
      expect(await client.setLoggingLevel('debug')).toBe(false);
    });
  });

  describe('provider requests', () => {
    it('answers pings', async () => {
      const { provider } = await connected();

      await expect(provider.server.ping()).resolves.toEqual({});
    });
  });

  describe('disconnect', () => {
    it('is idempotent and blocks further requests', async () => {
      const { client } = await connected();

      await client.disconnect();
      await client.disconnect();

      expect(client.connectionState).toBe('disconnected');
      await expect(client.listTools()).rejects.toBeInstanceOf(NotConnectedError);
    });

    it('rejects requests before connecting', async () => {
      const client = new MCPClient('idle', providerConfig());

      await expect(client.callTool('echo')).rejects.toBeInstanceOf(NotConnectedError);
      await expect(client.subscribeResource('memo://x')).rejects.toThrow("Not connected to MCP server 'idle'");
    });
  });
});

describe('provider transport', () => {
  it('expands variables and layers them over the inherited environment', () => {
    const env = buildProviderEnv(
      { API_TOKEN: '${SECRET}', DATA_DIR: '$HOME/data', PLAIN: 'value' },
      { SECRET: 'test-secret', HOME: '/home/test', PATH: '/usr/bin' }
    );

    expect(env).toEqual({
      SECRET: 'test-secret',
      HOME: '/home/test',
      PATH: '/usr/bin',
      API_TOKEN: 'test-secret',
      DATA_DIR: '/home/test/data',
      PLAIN: 'value',
    });
  });

  it('has no transport for sse providers', () => {
    const config = MCPServerConfigSchema.parse({ transport: 'sse', url: 'http://127.0.0.1:9/sse' });
    expect(createTransport('legacy', config)).toBeNull();
  });

  it('builds a streamable HTTP transport for http providers', () => {
    const config = MCPServerConfigSchema.parse({ transport: 'http', url: 'http://127.0.0.1:9/mcp' });
    expect(createTransport('remote', config)).not.toBeNull();
  });
});
