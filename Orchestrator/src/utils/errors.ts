import { BaseError } from '@flotilla/shared/Types/errors.js';

/**
 * Base error for the orchestrator package.
 */
export class OrchestratorError extends BaseError {
  constructor(message: string, code: string, details?: unknown) {
    super(message, code, details);
    this.name = 'OrchestratorError';
  }
}

/** No free port left in the configured range */
export class ResourceExhaustedError extends OrchestratorError {
  constructor(message: string, details?: unknown) {
    super(message, 'RESOURCE_EXHAUSTED', details);
    this.name = 'ResourceExhaustedError';
  }
}

export class MCPClientError extends OrchestratorError {
  constructor(
    message: string,
    public mcpName: string,
    details?: unknown
  ) {
    super(message, 'MCP_CLIENT_ERROR', details);
    this.name = 'MCPClientError';
  }
}

export class NotConnectedError extends MCPClientError {
  constructor(mcpName: string) {
    super(`Not connected to MCP server '${mcpName}'`, mcpName);
    this.name = 'NotConnectedError';
  }
}

/**
 * The provider answered with a JSON-RPC error, or not at all.
 * `rpcCode` is the provider's error code when one was returned.
 */
export class ProtocolError extends MCPClientError {
  constructor(
    message: string,
    mcpName: string,
    public rpcCode?: number,
    details?: unknown
  ) {
    super(message, mcpName, details);
    this.name = 'ProtocolError';
  }
}

export class ToolNotFoundError extends OrchestratorError {
  constructor(public toolName: string) {
    super(`Tool '${toolName}' is not registered`, 'TOOL_NOT_FOUND');
    this.name = 'ToolNotFoundError';
  }
}

/**
 * Deployment failure with the HTTP status the control plane should answer with.
 */
export class DeploymentError extends OrchestratorError {
  constructor(
    message: string,
    public statusCode: number,
    details?: unknown
  ) {
    super(message, 'DEPLOYMENT_ERROR', details);
    this.name = 'DeploymentError';
  }
}
