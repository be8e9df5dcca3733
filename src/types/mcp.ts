// This file defines minimal JSON-RPC and MCP protocol payload types used by the dispatcher and the HTTP transport.

export interface JsonRpcRequest {
  jsonrpc: '2.0';
  id?: string | number | null;
  method: string;
  params?: Record<string, unknown>;
}

export interface JsonRpcError {
  code: number;
  message: string;
  data?: unknown;
}

export interface JsonRpcResponse {
  jsonrpc: '2.0';
  id: string | number | null;
  result?: unknown;
  error?: JsonRpcError;
}

// These codes are part of the wire contract and must stay verbatim.
export const RPC_ERROR_CODES = {
  connectionClosed: -32000,
  requestTimeout: -32001,
  parseError: -32700,
  invalidRequest: -32600,
  methodNotFound: -32601,
  invalidParams: -32602,
  internalError: -32603
} as const;

export type DispatchOutcome =
  | { ok: true; result: Record<string, unknown> }
  | { ok: false; error: JsonRpcError };

export interface McpTool {
  name: string;
  description?: string;
  inputSchema: Record<string, unknown>;
}

export interface McpPromptArgument {
  name: string;
  description?: string;
  required: boolean;
}

export interface McpPrompt {
  name: string;
  description?: string;
  arguments: McpPromptArgument[];
}

export interface McpResource {
  name: string;
  uri: string;
  description?: string;
  mimeType?: string;
}

export interface McpResourceTemplate {
  name: string;
  uriTemplate: string;
  description?: string;
  mimeType?: string;
}

export interface Implementation {
  name: string;
  version: string;
}

export type LoggingLevel = 'debug' | 'info' | 'notice' | 'warning' | 'error' | 'critical' | 'alert' | 'emergency';
