/**
 * MultiMCPClient - tool discovery and routing across several tool servers
 *
 * This module provides:
 * 1. One single-server client per server, keyed by normalized origin
 * 2. A unified tool namespace built from every server's tools/list
 * 3. Call-by-name routing to the server that owns the tool
 *
 * When two servers advertise the same tool name, the server with the higher
 * priority owns it; at equal priority the later-added server wins.
 */

import { logger, Logger } from '@guarded-mcp/shared/Utils/logger.js';
import { MCPClient, DEFAULT_TIMEOUT_MS } from '../mcp-clients/http-client.js';
import type { IMCPClient, JsonObject, MCPClientOptions, MCPResponse } from '../mcp-clients/types.js';
import type { SecurityManager } from '../security/security-manager.js';
import type { ServerConfig } from '../config/schema.js';
import { ServerUnavailableError, ToolNotFoundError } from '../utils/errors.js';
import { isJsonObject, normalizeServerUrl } from '../utils/helpers.js';

export interface MCPTool {
  readonly name: string;
  readonly description: string;
  readonly serverUrl: string;
  readonly parameters: Readonly<JsonObject>;
}

export interface MCPServer {
  url: string;
  name?: string;
  client: IMCPClient;
  tools: MCPTool[];
  connected: boolean;
  priority: number;
}

export type ClientFactory = (serverUrl: string, options: MCPClientOptions) => IMCPClient;

export interface MultiMCPClientOptions {
  securityManager?: SecurityManager;
  enableSecurity?: boolean;
  /** Default request timeout in milliseconds */
  timeout?: number;
  /** Discover tools as soon as a server is added */
  autoDiscover?: boolean;
  /** Start refreshing every server's tools on this interval, in milliseconds */
  refreshInterval?: number;
  createClient?: ClientFactory;
}

export interface AddServerOptions {
  name?: string;
  priority?: number;
  timeout?: number;
}

export interface ServerInfo {
  name?: string;
  connected: boolean;
  priority: number;
  toolCount: number;
  tools: string[];
}

export interface RoutingStats {
  serversAdded: number;
  toolsDiscovered: number;
  requestsRouted: number;
  routingErrors: number;
}

export interface MultiClientStats extends RoutingStats {
  totalServers: number;
  totalTools: number;
}

const defaultClientFactory: ClientFactory = (serverUrl, options) => new MCPClient(serverUrl, options);

export class MultiMCPClient {
  private servers: Map<string, MCPServer> = new Map();
  private tools: Map<string, MCPTool> = new Map();
  private stats: RoutingStats = {
    serversAdded: 0,
    toolsDiscovered: 0,
    requestsRouted: 0,
    routingErrors: 0,
  };
  private refreshTimer: NodeJS.Timeout | undefined;
  private refreshing = false;
  private readonly createClient: ClientFactory;
  private readonly securityManager: SecurityManager | undefined;
  private readonly enableSecurity: boolean;
  private readonly timeout: number;
  private readonly autoDiscover: boolean;
  private logger: Logger;

  constructor(options: MultiMCPClientOptions = {}) {
    this.securityManager = options.securityManager;
    this.enableSecurity = options.enableSecurity ?? true;
    this.timeout = options.timeout ?? DEFAULT_TIMEOUT_MS;
    this.autoDiscover = options.autoDiscover ?? true;
    this.createClient = options.createClient ?? defaultClientFactory;
    this.logger = logger.child('multi-client');

    if (options.refreshInterval !== undefined) {
      this.startAutoRefresh(options.refreshInterval);
    }
  }

  /**
   * Add a server, check its health and discover its tools.
   * Returns false when it is already registered, unhealthy, or fails to set up.
   */
  async addServer(serverUrl: string, options: AddServerOptions = {}): Promise<boolean> {
    let client: IMCPClient | undefined;
    try {
      const normalizedUrl = normalizeServerUrl(serverUrl);

      if (this.servers.has(normalizedUrl)) {
        this.logger.warn(`Server ${normalizedUrl} already exists`);
        return false;
      }

      client = this.createClient(normalizedUrl, {
        timeout: options.timeout ?? this.timeout,
        securityManager: this.securityManager,
        enableSecurity: this.enableSecurity,
      });

      if (!(await client.connect())) {
        this.logger.error(`Failed to connect to server ${normalizedUrl}`);
        await this.closeRejected(client);
        return false;
      }

      const server: MCPServer = {
        url: normalizedUrl,
        client,
        tools: [],
        connected: true,
        priority: options.priority ?? 0,
      };
      if (options.name) server.name = options.name;

      if (this.autoDiscover) {
        await this.discoverTools(server);
      }

      this.servers.set(normalizedUrl, server);
      this.stats.serversAdded++;
      this.rebuildToolIndex();

      this.logger.info(`Added server ${normalizedUrl} with ${server.tools.length} tools`);
      return true;
    } catch (error) {
      this.logger.error(`Error adding server ${serverUrl}`, { error });
      if (client) await this.closeRejected(client);
      return false;
    }
  }

  /**
   * Add every enabled server from the config, in order.
   */
  async addServers(configs: ServerConfig[]): Promise<Array<{ name: string; url: string; added: boolean }>> {
    const results: Array<{ name: string; url: string; added: boolean }> = [];
    for (const config of configs) {
      if (!config.enabled) continue;
      const added = await this.addServer(config.url, {
        name: config.name,
        priority: config.priority,
        timeout: config.timeout,
      });
      results.push({ name: config.name, url: config.url, added });
    }
    return results;
  }

  async removeServer(serverUrl: string): Promise<boolean> {
    const normalizedUrl = this.tryNormalize(serverUrl);
    const server = normalizedUrl ? this.servers.get(normalizedUrl) : undefined;
    if (!normalizedUrl || !server) {
      return false;
    }

    this.servers.delete(normalizedUrl);
    this.rebuildToolIndex();
    await server.client.close();

    this.logger.info(`Removed server ${normalizedUrl}`);
    return true;
  }

  /**
   * Rediscover tools on one server, or on all of them.
   */
  async refreshTools(serverUrl?: string): Promise<void> {
    if (serverUrl) {
      const normalizedUrl = this.tryNormalize(serverUrl);
      const server = normalizedUrl ? this.servers.get(normalizedUrl) : undefined;
      if (server) {
        await this.discoverTools(server);
      }
    } else {
      for (const server of this.servers.values()) {
        await this.discoverTools(server);
      }
    }
    this.rebuildToolIndex();
  }

  listTools(): MCPTool[] {
    return Array.from(this.tools.values());
  }

  findTool(toolName: string): MCPTool | undefined {
    return this.tools.get(toolName);
  }

  /**
   * Case-insensitive substring search over tool names and descriptions.
   */
  searchTools(query: string): MCPTool[] {
    const queryLower = query.toLowerCase();
    return this.listTools().filter(
      (tool) =>
        tool.name.toLowerCase().includes(queryLower) ||
        tool.description.toLowerCase().includes(queryLower)
    );
  }

  /**
   * Route a tool call to the server that owns the tool.
   */
  async callTool(toolName: string, args: JsonObject): Promise<MCPResponse> {
    const tool = this.findTool(toolName);
    if (!tool) {
      throw new ToolNotFoundError(toolName);
    }

    const server = this.servers.get(tool.serverUrl);
    if (!server) {
      throw new ServerUnavailableError(toolName, tool.serverUrl);
    }

    try {
      this.stats.requestsRouted++;
      this.logger.info(`Routing ${toolName} → ${server.url}`);
      return await server.client.callTool(toolName, args);
    } catch (error) {
      this.stats.routingErrors++;
      this.logger.error(`Error calling tool '${toolName}'`, { error });
      throw error;
    }
  }

  getServerInfo(): Record<string, ServerInfo> {
    const info: Record<string, ServerInfo> = {};
    for (const [url, server] of this.servers) {
      const entry: ServerInfo = {
        connected: server.connected,
        priority: server.priority,
        toolCount: server.tools.length,
        tools: server.tools.map((tool) => tool.name),
      };
      if (server.name) entry.name = server.name;
      info[url] = entry;
    }
    return info;
  }

  getServerCount(): number {
    return this.servers.size;
  }

  getStats(): MultiClientStats {
    return {
      ...this.stats,
      totalServers: this.servers.size,
      totalTools: this.tools.size,
    };
  }

  /**
   * Refresh every server's tools on an interval. A tick is skipped while the
   * previous refresh is still running.
   */
  startAutoRefresh(intervalMs: number): void {
    this.stopAutoRefresh();
    this.refreshTimer = setInterval(() => {
      if (this.refreshing) return;
      this.refreshing = true;
      this.refreshTools()
        .catch((error: unknown) => this.logger.error('Scheduled tool refresh failed', { error }))
        .finally(() => {
          this.refreshing = false;
        });
    }, intervalMs);
    this.refreshTimer.unref();
    this.logger.debug(`Auto refresh every ${intervalMs}ms`);
  }

  stopAutoRefresh(): void {
    if (this.refreshTimer) {
      clearInterval(this.refreshTimer);
      this.refreshTimer = undefined;
    }
  }

  async close(): Promise<void> {
    this.stopAutoRefresh();
    const servers = Array.from(this.servers.values());
    this.servers.clear();
    this.tools.clear();
    for (const server of servers) {
      try {
        await server.client.close();
      } catch (error) {
        this.logger.warn(`Error closing client for ${server.url}`, { error });
      }
    }
  }

  /** Close a client that never made it into the registry. */
  private async closeRejected(client: IMCPClient): Promise<void> {
    try {
      await client.close();
    } catch (error) {
      this.logger.warn(`Error closing client for ${client.serverUrl}`, { error });
    }
  }

  private tryNormalize(serverUrl: string): string | undefined {
    try {
      return normalizeServerUrl(serverUrl);
    } catch {
      return undefined;
    }
  }

  /**
   * Replace a server's tool list from its tools/list result.
   * On failure the previous list is kept.
   */
  private async discoverTools(server: MCPServer): Promise<void> {
    try {
      const response = await server.client.listTools();
      if (response.error) {
        this.logger.error(`Error listing tools from ${server.url}`, { error: response.error });
        return;
      }

      const advertised = response.result?.tools;
      const toolsData: unknown[] = Array.isArray(advertised) ? advertised : [];
      server.tools = toolsData.filter(isJsonObject).map((toolData) => toTool(toolData, server.url));
      this.stats.toolsDiscovered += server.tools.length;
      this.logger.debug(`Discovered ${server.tools.length} tools from ${server.url}`);
    } catch (error) {
      this.logger.error(`Error discovering tools from ${server.url}`, { error });
    }
  }

  /**
   * Rebuild the name → tool index from every registered server.
   */
  private rebuildToolIndex(): void {
    const index = new Map<string, MCPTool>();
    const owners = new Map<string, number>();

    for (const server of this.servers.values()) {
      for (const tool of server.tools) {
        const currentPriority = owners.get(tool.name);
        if (currentPriority !== undefined && server.priority < currentPriority) {
          this.logger.debug(`Tool ${tool.name} on ${server.url} shadowed by a higher-priority server`);
          continue;
        }
        if (currentPriority !== undefined) {
          this.logger.debug(`Tool ${tool.name} now routed to ${server.url}`);
        }
        index.set(tool.name, tool);
        owners.set(tool.name, server.priority);
      }
    }

    this.tools = index;
  }
}

function toTool(toolData: JsonObject, serverUrl: string): MCPTool {
  const parameters = isJsonObject(toolData.inputSchema)
    ? toolData.inputSchema
    : isJsonObject(toolData.parameters) ? toolData.parameters : {};
  return Object.freeze({
    name: typeof toolData.name === 'string' ? toolData.name : 'Unknown',
    description: typeof toolData.description === 'string' ? toolData.description : '',
    serverUrl,
    parameters,
  });
}
