/**
 * ToolRegistry - maps every discovered tool name to the provider that owns it.
 *
 * Names are global: a later registration of the same name moves the tool to
 * the new provider (with a warning).
 */

import { logger, Logger } from '@flotilla/shared/Utils/logger.js';
import type { MCPToolDefinition } from '../mcp-clients/types.js';

export interface RegisteredTool {
  server: string;
  definition: MCPToolDefinition;
}

export class ToolRegistry {
  private tools = new Map<string, RegisteredTool>();
  private logger: Logger;

  constructor() {
    this.logger = logger.child('tool-registry');
  }

  /**
   * Register a provider's tools.
   * @returns how many tools were registered
   */
  register(server: string, tools: ReadonlyArray<Partial<MCPToolDefinition>>): number {
    let count = 0;
    for (const tool of tools) {
      if (!tool.name) {
        this.logger.warn(`Skipping tool without a name from ${server}`);
        continue;
      }
      const existing = this.tools.get(tool.name);
      if (existing && existing.server !== server) {
        this.logger.warn(`Tool '${tool.name}' from ${existing.server} overwritten by ${server}`);
      }
      this.tools.set(tool.name, {
        server,
        definition: {
          name: tool.name,
          description: tool.description,
          inputSchema: tool.inputSchema ?? { type: 'object' },
          annotations: tool.annotations,
        },
      });
      count++;
    }
    this.logger.debug(`Registered ${count} tools from ${server}`);
    return count;
  }

  /** @returns how many tools were removed */
  unregisterServer(server: string): number {
    let removed = 0;
    for (const [name, entry] of this.tools) {
      if (entry.server === server) {
        this.tools.delete(name);
        removed++;
      }
    }
    if (removed > 0) this.logger.debug(`Unregistered ${removed} tools from ${server}`);
    return removed;
  }

  getTool(name: string): MCPToolDefinition | null {
    return this.tools.get(name)?.definition ?? null;
  }

  getServerForTool(name: string): string | null {
    return this.tools.get(name)?.server ?? null;
  }

  listTools(): RegisteredTool[] {
    return [...this.tools.values()];
  }

  listServerTools(server: string): MCPToolDefinition[] {
    return [...this.tools.values()].filter((t) => t.server === server).map((t) => t.definition);
  }

  clear(): void {
    this.tools.clear();
  }

  get size(): number {
    return this.tools.size;
  }
}
