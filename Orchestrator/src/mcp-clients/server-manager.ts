import { logger } from '@flotilla/shared/Utils/logger.js';
import type { MCPServerConfig } from '../config/schema.js';
import { ToolRegistry } from '../routing/tool-registry.js';
import { ToolNotFoundError } from '../utils/errors.js';
import { MCPClient, type CallToolOutcome } from './mcp-client.js';
import type { TransportFactory } from './types.js';

const log = logger.child('mcp-manager');

/** Stop paging a provider's tool list after this many pages */
const MAX_TOOL_PAGES = 100;

export interface ServerSummary {
  name: string;
  state: MCPClient['connectionState'];
  transport: MCPServerConfig['transport'];
  tools: number;
  serverInfo: { name: string; version: string } | null;
}

/**
 * Owns one MCPClient per configured provider and keeps the tool registry
 * in step with what each provider offers.
 */
export class MCPServerManager {
  readonly registry: ToolRegistry;
  private readonly clients = new Map<string, MCPClient>();

  constructor(
    private readonly servers: Record<string, MCPServerConfig>,
    options: { registry?: ToolRegistry; transportFactory?: TransportFactory } = {}
  ) {
    this.registry = options.registry ?? new ToolRegistry();
    for (const [name, config] of Object.entries(servers)) {
      if (!config.enabled) {
        log.info(`Provider ${name} disabled, skipping`);
        continue;
      }
      this.clients.set(name, new MCPClient(name, config, options.transportFactory));
    }
  }

  /**
   * Connect every enabled provider concurrently and register its tools.
   * One provider failing does not affect the others.
   * @returns names of the providers that connected
   */
  async connectAll(): Promise<string[]> {
    const names = [...this.clients.keys()];
    const results = await Promise.all(names.map((name) => this.connectOne(name)));
    const connected = names.filter((_, i) => results[i]);
    log.info(`Connected ${connected.length}/${names.length} providers`, { tools: this.registry.size });
    return connected;
  }

  async disconnectAll(): Promise<void> {
    await Promise.all(
      [...this.clients.entries()].map(async ([name, client]) => {
        await client.disconnect();
        this.registry.unregisterServer(name);
      })
    );
  }

  /**
   * Route a tool call to whichever provider registered the tool.
   * @throws ToolNotFoundError, NotConnectedError, ProtocolError
   */
  async executeTool(toolName: string, args: Record<string, unknown> = {}): Promise<CallToolOutcome> {
    const server = this.registry.getServerForTool(toolName);
    const client = server ? this.clients.get(server) : undefined;
    if (!client) throw new ToolNotFoundError(toolName);
    log.debug(`Routing ${toolName} to ${client.name}`);
    return client.callTool(toolName, args);
  }

  getClient(name: string): MCPClient | null {
    return this.clients.get(name) ?? null;
  }

  listServers(): ServerSummary[] {
    return [...this.clients.entries()].map(([name, client]) => ({
      name,
      state: client.connectionState,
      transport: this.servers[name].transport,
      tools: this.registry.listServerTools(name).length,
      serverInfo: client.getServerInfo(),
    }));
  }

  private async connectOne(name: string): Promise<boolean> {
    const client = this.clients.get(name);
    if (!client) return false;
    try {
      if (!(await client.connect())) return false;

      let cursor: string | undefined;
      let pages = 0;
      do {
        const page = await client.listTools(cursor);
        this.registry.register(name, page.tools);
        cursor = page.nextCursor;
        pages++;
      } while (cursor && pages < MAX_TOOL_PAGES);

      log.info(`Provider ${name} ready`, { tools: this.registry.listServerTools(name).length });
      return true;
    } catch (error) {
      log.error(`Provider ${name} failed during setup`, { error });
      this.registry.unregisterServer(name);
      await client.disconnect();
      return false;
    }
  }
}
