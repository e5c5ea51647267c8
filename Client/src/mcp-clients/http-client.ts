import { Logger, logger } from '@guarded-mcp/shared/Utils/logger.js';
import { SecurityManager } from '../security/security-manager.js';
import type { ScreeningStats } from '../security/types.js';
import { MCPClientError, MCPProtocolError, SecurityViolation } from '../utils/errors.js';
import { formatRequest, isJsonObject } from '../utils/helpers.js';
import {
  MCPResponseSchema,
  type IMCPClient,
  type JsonObject,
  type MCPClientOptions,
  type MCPResponse,
} from './types.js';

export const DEFAULT_TIMEOUT_MS = 30000;

/**
 * Client for a single tool server speaking JSON-RPC over HTTP POST.
 *
 * When a SecurityManager is attached, every request is screened before it is
 * sent and every non-empty result after it comes back; tool listings are
 * filtered through tool screening.
 */
export class MCPClient implements IMCPClient {
  readonly serverUrl: string;
  readonly timeout: number;
  readonly securityManager: SecurityManager | undefined;
  /** Only a manager this client created is closed with it; a passed-in one may be shared. */
  private readonly ownsSecurityManager: boolean;
  private closed = false;
  protected logger: Logger;

  constructor(serverUrl: string, options: MCPClientOptions = {}) {
    this.serverUrl = serverUrl.replace(/\/+$/, '');
    this.timeout = options.timeout ?? DEFAULT_TIMEOUT_MS;

    const enableSecurity = options.enableSecurity ?? true;
    this.ownsSecurityManager = enableSecurity && !options.securityManager;
    this.securityManager = enableSecurity
      ? options.securityManager ?? new SecurityManager()
      : undefined;

    this.logger = logger.child(`mcp:${this.serverUrl}`);
  }

  get isClosed(): boolean {
    return this.closed;
  }

  protected getHeaders(): Record<string, string> {
    return {
      'Content-Type': 'application/json',
      Accept: 'application/json',
    };
  }

  /**
   * Probe `<origin>/health`. Never throws.
   */
  async connect(): Promise<boolean> {
    try {
      const response = await fetch(new URL('/health', this.serverUrl), {
        method: 'GET',
        headers: { Accept: 'application/json' },
        signal: AbortSignal.timeout(this.timeout),
      });
      return response.status === 200;
    } catch (error) {
      this.logger.error('Failed to connect to MCP server', { error });
      return false;
    }
  }

  /**
   * Send a JSON-RPC request, screening it on the way out and its result on the way back.
   */
  async sendRequest(method: string, params?: JsonObject): Promise<MCPResponse> {
    if (this.closed) {
      throw new MCPClientError('MCP client is closed', this.serverUrl);
    }

    if (this.securityManager) {
      try {
        await this.securityManager.screenServerInteraction(method, params);
      } catch (error) {
        if (error instanceof SecurityViolation) {
          this.logger.error('Security violation detected in request', { method, error: error.message });
        }
        throw error;
      }
    }

    const body = await this.post(formatRequest(method, params ?? {}, '1'));
    const mcpResponse = this.toResponse(body);

    if (this.securityManager && mcpResponse.result && Object.keys(mcpResponse.result).length > 0) {
      try {
        await this.securityManager.screenResponse(method, mcpResponse.result);
      } catch (error) {
        if (error instanceof SecurityViolation) {
          this.logger.error('Security violation detected in response', { method, error: error.message });
        }
        throw error;
      }
    }

    return mcpResponse;
  }

  /**
   * List the server's tools. With screening on, flagged tools are removed from `result.tools`.
   */
  async listTools(): Promise<MCPResponse> {
    const response = await this.sendRequest('tools/list');

    if (this.securityManager && response.result) {
      const tools = Array.isArray(response.result.tools)
        ? response.result.tools.filter(isJsonObject)
        : [];
      response.result.tools = await this.securityManager.screenToolsList(tools);

      const stats = this.securityManager.getScreeningStats();
      if (stats.toolsScreened > 0) {
        this.logger.info(
          `Security screening: ${stats.toolsScreened} tools screened, ` +
            `${stats.violationsDetected} violations detected`
        );
      }
    }

    return response;
  }

  async callTool(toolName: string, args: JsonObject): Promise<MCPResponse> {
    return this.sendRequest('tools/call', {
      name: toolName,
      arguments: args,
    });
  }

  getSecurityStats(): ScreeningStats | null {
    return this.securityManager ? this.securityManager.getScreeningStats() : null;
  }

  async close(): Promise<void> {
    if (this.closed) return;
    this.closed = true;
    if (this.securityManager && this.ownsSecurityManager) {
      await this.securityManager.close();
    }
    this.logger.debug('MCP client closed');
  }

  private async post(payload: unknown): Promise<unknown> {
    let response: Response;
    try {
      response = await fetch(this.serverUrl, {
        method: 'POST',
        headers: this.getHeaders(),
        body: JSON.stringify(payload),
        signal: AbortSignal.timeout(this.timeout),
      });
    } catch (error) {
      if (error instanceof Error && error.name === 'TimeoutError') {
        this.logger.error('Request timed out', { timeout: this.timeout });
        throw new MCPClientError(
          `MCP request timed out after ${this.timeout}ms. Check that the server at ${this.serverUrl} is running.`,
          this.serverUrl,
          { timeout: this.timeout }
        );
      }
      this.logger.error('Request failed', { error });
      throw new MCPClientError(
        `MCP request failed: ${error instanceof Error ? error.message : 'Unknown error'}`,
        this.serverUrl,
        { error }
      );
    }

    if (!response.ok) {
      const errorText = await response.text().catch(() => '');
      this.logger.error('Request failed', { status: response.status });
      throw new MCPClientError(
        `MCP call failed: ${response.status} ${response.statusText}`,
        this.serverUrl,
        { status: response.status, body: errorText }
      );
    }

    try {
      return await response.json();
    } catch {
      throw new MCPProtocolError('MCP server returned invalid JSON', { serverUrl: this.serverUrl });
    }
  }

  private toResponse(body: unknown): MCPResponse {
    const parsed = MCPResponseSchema.safeParse(body);
    if (!parsed.success) {
      this.logger.warn('Unexpected response shape', { issues: parsed.error.issues });
      throw new MCPProtocolError('Invalid MCP response format', {
        serverUrl: this.serverUrl,
        issues: parsed.error.issues,
      });
    }

    const response: MCPResponse = {};
    if (parsed.data.result) response.result = parsed.data.result;
    if (parsed.data.error) response.error = parsed.data.error;
    if (parsed.data.id !== undefined && parsed.data.id !== null) response.id = parsed.data.id;
    return response;
  }
}
