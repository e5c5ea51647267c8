/**
 * Wire types for the JSON-RPC-shaped tool server protocol, and the client
 * interface the multi-server client routes through.
 */
import { z } from 'zod';
import type { ScreeningStats } from '../security/types.js';
import type { SecurityManager } from '../security/security-manager.js';

export type JsonObject = Record<string, unknown>;

export interface MCPRequest {
  jsonrpc: '2.0';
  method: string;
  params?: JsonObject;
  id: string;
}

export const MCPErrorSchema = z
  .object({
    code: z.union([z.number(), z.string()]).optional(),
    message: z.string().optional(),
    data: z.unknown().optional(),
  })
  .passthrough();

export type MCPError = z.infer<typeof MCPErrorSchema>;

export const MCPResponseSchema = z.object({
  jsonrpc: z.literal('2.0').optional(),
  result: z.record(z.unknown()).nullish(),
  error: MCPErrorSchema.nullish(),
  id: z.union([z.string(), z.number()]).nullish(),
});

export interface MCPResponse {
  result?: JsonObject;
  error?: MCPError;
  id?: string | number;
}

export interface MCPClientOptions {
  /** Request timeout in milliseconds */
  timeout?: number;
  securityManager?: SecurityManager;
  enableSecurity?: boolean;
}

/**
 * What the multi-server client needs from a single-server client.
 */
export interface IMCPClient {
  readonly serverUrl: string;

  connect(): Promise<boolean>;
  sendRequest(method: string, params?: JsonObject): Promise<MCPResponse>;
  listTools(): Promise<MCPResponse>;
  callTool(toolName: string, args: JsonObject): Promise<MCPResponse>;
  getSecurityStats(): ScreeningStats | null;
  close(): Promise<void>;
}
