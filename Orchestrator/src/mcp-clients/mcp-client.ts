import { Client } from '@modelcontextprotocol/sdk/client/index.js';
import type { RequestOptions } from '@modelcontextprotocol/sdk/shared/protocol.js';
import {
  ErrorCode,
  McpError,
  type GetPromptResult,
  type Implementation,
  type ListPromptsResult,
  type ListResourcesResult,
  type ListResourceTemplatesResult,
  type ListToolsResult,
  type ReadResourceResult,
  type ServerCapabilities,
} from '@modelcontextprotocol/sdk/types.js';
import { Logger, logger } from '@flotilla/shared/Utils/logger.js';
import type { MCPServerConfig } from '../config/schema.js';
import { NotConnectedError, ProtocolError } from '../utils/errors.js';
import { createTransport } from './transport.js';
import type { ConnectionState, LoggingLevel, TransportFactory } from './types.js';

export const CLIENT_INFO: Implementation = { name: 'flotilla', version: '0.1.0' };

export type CallToolOutcome = Awaited<ReturnType<Client['callTool']>>;

/**
 * One connection to a tool provider.
 *
 * Requests are serialized: at most one is in flight per provider. Every
 * request carries the provider's `timeout`; a request that gets no answer
 * in time fails with a ProtocolError. Pings from the provider are answered
 * by the underlying client. Tools are never cached from the handshake;
 * callers list them explicitly.
 */
export class MCPClient {
  private client: Client | null = null;
  private state: ConnectionState = 'disconnected';
  private capabilities: ServerCapabilities | null = null;
  private serverInfo: Implementation | null = null;
  private queue: Promise<unknown> = Promise.resolve();
  private readonly logger: Logger;
  private readonly transportFactory: TransportFactory;

  constructor(
    public readonly name: string,
    private readonly config: MCPServerConfig,
    transportFactory?: TransportFactory
  ) {
    this.logger = logger.child(`mcp:${name}`);
    this.transportFactory = transportFactory ?? createTransport;
  }

  // ─── Connection ──────────────────────────────────────────────────

  get connectionState(): ConnectionState {
    return this.state;
  }

  get isConnected(): boolean {
    return this.state === 'connected';
  }

  getCapabilities(): ServerCapabilities | null {
    return this.capabilities;
  }

  getServerInfo(): Implementation | null {
    return this.serverInfo;
  }

  /**
   * Open the transport and run the initialize handshake.
   * @returns false when the transport is unsupported or the handshake fails
   */
  async connect(): Promise<boolean> {
    if (this.state !== 'disconnected') {
      this.logger.warn(`Already ${this.state}`);
      return this.state === 'connected';
    }

    const transport = this.transportFactory(this.name, this.config);
    if (!transport) {
      this.logger.error(`Cannot create '${this.config.transport}' transport for ${this.name}`);
      return false;
    }

    this.state = 'connecting';
    const client = new Client(CLIENT_INFO, { capabilities: {} });
    client.onclose = () => {
      if (this.client === client && this.state !== 'disconnected') {
        this.logger.warn(`Connection to ${this.name} closed`);
        this.reset();
      }
    };
    client.onerror = (error) => {
      this.logger.error(`Transport error from ${this.name}`, { error });
    };

    try {
      await client.connect(transport, { timeout: this.config.timeout });
    } catch (error) {
      this.logger.error(`Failed to connect to ${this.name}`, { error });
      this.state = 'disconnected';
      await client.close().catch((closeError: unknown) => {
        this.logger.debug('Close after failed connect raised', { error: closeError });
      });
      return false;
    }

    this.client = client;
    this.capabilities = client.getServerCapabilities() ?? null;
    this.serverInfo = client.getServerVersion() ?? null;
    this.state = 'connected';
    this.logger.info(`Connected to ${this.name}`, {
      server: this.serverInfo?.name,
      version: this.serverInfo?.version,
    });
    return true;
  }

  /** Close the transport (terminating a stdio provider). Safe to call twice. */
  async disconnect(): Promise<void> {
    const client = this.client;
    if (!client) {
      this.state = 'disconnected';
      return;
    }
    this.reset();
    try {
      await client.close();
      this.logger.info(`Disconnected from ${this.name}`);
    } catch (error) {
      this.logger.warn(`Error while closing ${this.name}`, { error });
    }
  }

  // ─── Tools ───────────────────────────────────────────────────────

  listTools(cursor?: string): Promise<ListToolsResult> {
    return this.request('tools/list', (client, options) => client.listTools(cursor ? { cursor } : undefined, options));
  }

  callTool(name: string, args: Record<string, unknown> = {}): Promise<CallToolOutcome> {
    return this.request('tools/call', (client, options) =>
      client.callTool({ name, arguments: args }, undefined, options)
    );
  }

  // ─── Resources ───────────────────────────────────────────────────

  listResources(cursor?: string): Promise<ListResourcesResult> {
    return this.request('resources/list', (client, options) =>
      client.listResources(cursor ? { cursor } : undefined, options)
    );
  }

  readResource(uri: string): Promise<ReadResourceResult> {
    return this.request('resources/read', (client, options) => client.readResource({ uri }, options));
  }

  /** @returns false when the provider does not support subscriptions */
  async subscribeResource(uri: string): Promise<boolean> {
    this.requireConnection();
    if (!this.capabilities?.resources?.subscribe) {
      this.logger.warn(`${this.name} does not support resource subscriptions`);
      return false;
    }
    await this.request('resources/subscribe', (client, options) => client.subscribeResource({ uri }, options));
    return true;
  }

  async unsubscribeResource(uri: string): Promise<boolean> {
    await this.request('resources/unsubscribe', (client, options) => client.unsubscribeResource({ uri }, options));
    return true;
  }

  listResourceTemplates(cursor?: string): Promise<ListResourceTemplatesResult> {
    return this.request('resources/templates/list', (client, options) =>
      client.listResourceTemplates(cursor ? { cursor } : undefined, options)
    );
  }

  // ─── Prompts ─────────────────────────────────────────────────────

  listPrompts(cursor?: string): Promise<ListPromptsResult> {
    return this.request('prompts/list', (client, options) =>
      client.listPrompts(cursor ? { cursor } : undefined, options)
    );
  }

  getPrompt(name: string, args?: Record<string, string>): Promise<GetPromptResult> {
    return this.request('prompts/get', (client, options) =>
      client.getPrompt(args ? { name, arguments: args } : { name }, options)
    );
  }

  // ─── Logging ─────────────────────────────────────────────────────

  /**
   * Sent whether or not the provider advertises logging. Never throws;
   * false when not connected or when the provider rejects the request.
   */
  async setLoggingLevel(level: LoggingLevel): Promise<boolean> {
    if (!this.isConnected) return false;
    try {
      await this.request('logging/setLevel', (client, options) => client.setLoggingLevel(level, options));
      return true;
    } catch (error) {
      this.logger.warn(`Failed to set logging level on ${this.name}`, { error });
      return false;
    }
  }

  // ─── Internals ───────────────────────────────────────────────────

  private requireConnection(): Client {
    if (this.state !== 'connected' || !this.client) {
      throw new NotConnectedError(this.name);
    }
    return this.client;
  }

  /**
   * Queue one request behind any in flight and translate failures into
   * ProtocolErrors.
   */
  private async request<T>(
    method: string,
    send: (client: Client, options: RequestOptions) => Promise<T>
  ): Promise<T> {
    const client = this.requireConnection();
    const run = async (): Promise<T> => {
      this.logger.debug(`-> ${method}`);
      try {
        return await send(client, { timeout: this.config.timeout });
      } catch (error) {
        throw this.toProtocolError(method, error);
      }
    };
    const result = this.queue.then(run, run);
    this.queue = result.catch(() => undefined);
    return result;
  }

  private toProtocolError(method: string, error: unknown): ProtocolError {
    if (error instanceof McpError) {
      if (error.code === ErrorCode.RequestTimeout || error.code === ErrorCode.ConnectionClosed) {
        this.logger.error(`No response from ${this.name} for ${method}`, { error: error.message });
        return new ProtocolError(`No response from ${this.name} for ${method}`, this.name, error.code);
      }
      this.logger.warn(`${this.name} returned an error for ${method}`, { code: error.code, message: error.message });
      return new ProtocolError(error.message, this.name, error.code, error.data);
    }
    const message = error instanceof Error ? error.message : String(error);
    this.logger.error(`Request ${method} to ${this.name} failed`, { error: message });
    return new ProtocolError(`No response from ${this.name} for ${method}: ${message}`, this.name);
  }

  private reset(): void {
    this.client = null;
    this.state = 'disconnected';
    this.capabilities = null;
    this.serverInfo = null;
    this.queue = Promise.resolve();
  }
}
