export { MCPClient, DEFAULT_TIMEOUT_MS } from './mcp-clients/http-client.js';
export type {
  IMCPClient,
  JsonObject,
  MCPClientOptions,
  MCPError,
  MCPRequest,
  MCPResponse,
} from './mcp-clients/types.js';

export {
  MultiMCPClient,
  type AddServerOptions,
  type ClientFactory,
  type MCPServer,
  type MCPTool,
  type MultiClientStats,
  type MultiMCPClientOptions,
  type RoutingStats,
  type ServerInfo,
} from './core/multi-client.js';

export { LakeraClient, DEFAULT_GUARD_BASE_URL, GUARD_REGIONS, type LakeraClientOptions } from './security/guard-client.js';
export { SecurityManager, type SecurityManagerOptions } from './security/security-manager.js';
export type {
  ContentScreener,
  FailMode,
  GuardMessage,
  GuardResult,
  ScreeningStats,
} from './security/types.js';

export * from './config/index.js';

export {
  ClientError,
  ConfigurationError,
  GuardClientError,
  MCPClientError,
  MCPProtocolError,
  SecurityError,
  SecurityViolation,
  ServerUnavailableError,
  ToolNotFoundError,
  ValidationError,
} from './utils/errors.js';

export {
  formatRequest,
  normalizeServerUrl,
  parseResponse,
  parseToolArguments,
  safeJsonParse,
  validateUrl,
} from './utils/helpers.js';
