import { BaseError } from '@guarded-mcp/shared/Types/errors.js';

export { ConfigurationError, ValidationError } from '@guarded-mcp/shared/Types/errors.js';

/**
 * Base error for everything thrown by the client package.
 */
export class ClientError extends BaseError {
  constructor(message: string, code: string, details?: unknown) {
    super(message, code, details);
    this.name = 'ClientError';
  }
}

/**
 * Transport-level failure talking to a tool server (non-2xx, timeout, refused connection).
 */
export class MCPClientError extends ClientError {
  constructor(
    message: string,
    public serverUrl: string,
    details?: unknown
  ) {
    super(message, 'MCP_CLIENT_ERROR', details);
    this.name = 'MCPClientError';
  }
}

/**
 * The server answered, but not with a usable JSON-RPC envelope, or with an `error` member.
 */
export class MCPProtocolError extends ClientError {
  constructor(message: string, details?: unknown) {
    super(message, 'MCP_PROTOCOL_ERROR', details);
    this.name = 'MCPProtocolError';
  }
}

export class ToolNotFoundError extends ClientError {
  constructor(public toolName: string) {
    super(`Tool '${toolName}' not found`, 'TOOL_NOT_FOUND', { toolName });
    this.name = 'ToolNotFoundError';
  }
}

export class ServerUnavailableError extends ClientError {
  constructor(
    public toolName: string,
    public serverUrl: string
  ) {
    super(`Server for tool '${toolName}' not available`, 'SERVER_UNAVAILABLE', { toolName, serverUrl });
    this.name = 'ServerUnavailableError';
  }
}

export class SecurityError extends ClientError {
  constructor(message: string, details?: unknown) {
    super(message, 'SECURITY_ERROR', details);
    this.name = 'SecurityError';
  }
}

/**
 * Raised when screening flags content (or blocks it in fail-closed mode).
 * `categories` and `scores` come from the flagged side of the exchange.
 */
export class SecurityViolation extends SecurityError {
  constructor(
    message: string,
    public categories: Record<string, boolean> = {},
    public scores: Record<string, number> = {}
  ) {
    super(message, { categories, scores });
    this.name = 'SecurityViolation';
  }
}

/**
 * Screening API errors (auth failures, HTTP errors, malformed responses).
 */
export class GuardClientError extends ClientError {
  public readonly statusCode?: number;

  constructor(message: string, statusCode?: number) {
    super(message, 'GUARD_CLIENT_ERROR', statusCode ? { statusCode } : undefined);
    this.name = 'GuardClientError';
    this.statusCode = statusCode;
  }
}
