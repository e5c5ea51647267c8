/**
 * Request formatting and response parsing for the tool server protocol,
 * plus small input checks shared by the clients and the CLI.
 */
import type { JsonObject, MCPRequest } from '../mcp-clients/types.js';
import { MCPProtocolError, ValidationError } from './errors.js';

export function isJsonObject(value: unknown): value is JsonObject {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Build a JSON-RPC 2.0 request. `params` is omitted when empty.
 */
export function formatRequest(method: string, params?: JsonObject, requestId = '1'): MCPRequest {
  const request: MCPRequest = {
    jsonrpc: '2.0',
    method,
    id: requestId,
  };

  if (params && Object.keys(params).length > 0) {
    request.params = params;
  }

  return request;
}

/**
 * Unwrap a JSON-RPC 2.0 response to its `result` (empty object when absent).
 * A response carrying an `error` member is thrown as MCPProtocolError.
 */
export function parseResponse(responseData: JsonObject): JsonObject {
  if (responseData.jsonrpc !== '2.0') {
    throw new MCPProtocolError('Invalid JSON-RPC response format', { response: responseData });
  }

  if ('error' in responseData && responseData.error !== undefined && responseData.error !== null) {
    const error = isJsonObject(responseData.error) ? responseData.error : {};
    const code = error.code ?? 'unknown';
    const message = typeof error.message === 'string' ? error.message : 'Unknown error';
    throw new MCPProtocolError(`MCP Error ${String(code)}: ${message}`, { error: responseData.error });
  }

  return isJsonObject(responseData.result) ? responseData.result : {};
}

export function validateUrl(url: string): boolean {
  if (!url) {
    return false;
  }
  return url.startsWith('http://') || url.startsWith('https://');
}

/**
 * Parse JSON text into an object; null for invalid JSON or non-object values.
 */
export function safeJsonParse(data: string): JsonObject | null {
  try {
    const parsed: unknown = JSON.parse(data);
    return isJsonObject(parsed) ? parsed : null;
  } catch {
    return null;
  }
}

/**
 * Reduce a server URL to its origin (scheme://host[:port]); servers are keyed by it.
 */
export function normalizeServerUrl(serverUrl: string): string {
  let parsed: URL;
  try {
    parsed = new URL(serverUrl);
  } catch {
    throw new ValidationError(`Invalid server URL: ${serverUrl}`, { url: serverUrl });
  }
  return `${parsed.protocol}//${parsed.host}`;
}

/**
 * Parse the `--arguments` JSON given to a tool call. Missing or empty means no arguments.
 */
export function parseToolArguments(json?: string): JsonObject {
  if (!json) {
    return {};
  }
  const parsed = safeJsonParse(json);
  if (parsed === null) {
    throw new ValidationError('Invalid JSON format for arguments', { arguments: json });
  }
  return parsed;
}

/**
 * Render a value for inclusion in screened text.
 */
export function stringifyForScreening(value: unknown): string {
  if (typeof value === 'string') return value;
  try {
    return JSON.stringify(value) ?? String(value);
  } catch {
    return String(value);
  }
}
