// This module implements the streamable HTTP JSON-RPC endpoint that frames requests for the MCP dispatcher.

import { randomUUID } from 'node:crypto';
import type { FastifyBaseLogger, FastifyInstance, FastifyReply, FastifyRequest } from 'fastify';
import { CancellationToken, nodeScheduler, type Scheduler } from './cancellation.js';
import { SUPPORTED_METHODS, type McpServer } from './mcp-server.js';
import type { ServerConfig } from '../config/config.js';
import { RPC_ERROR_CODES, type DispatchOutcome, type JsonRpcRequest, type JsonRpcResponse } from '../types/mcp.js';
import { AppError, normalizeError } from '../utils/errors.js';
import { isRecord } from '../utils/json.js';
import { errorForLog } from '../utils/logger.js';
import { LATEST_PROTOCOL_VERSION, MCP_SERVER_VERSION } from '../version.js';

export const SESSION_HEADER = 'mcp-session-id';

export interface McpRouteDeps {
  server: McpServer;
  config: Pick<ServerConfig, 'requestTimeoutMs'>;
  scheduler?: Scheduler;
}

// This helper creates a canonical JSON-RPC error payload.
function rpcError(id: string | number | null, code: number, message: string, data?: unknown): JsonRpcResponse {
  return {
    jsonrpc: '2.0',
    id,
    error: data === undefined ? { code, message } : { code, message, data }
  };
}

function isRequestId(value: unknown): value is string | number | null | undefined {
  return value === undefined || value === null || typeof value === 'string' || typeof value === 'number';
}

// This helper validates that a payload is structurally a JSON-RPC request or notification.
function isJsonRpcRequest(value: unknown): value is JsonRpcRequest {
  if (!isRecord(value)) {
    return false;
  }

  return (
    value.jsonrpc === '2.0' &&
    typeof value.method === 'string' &&
    isRequestId(value.id) &&
    (value.params === undefined || isRecord(value.params))
  );
}

function readSessionHeader(request: FastifyRequest): string | null {
  const header = request.headers[SESSION_HEADER];
  return typeof header === 'string' && header.length > 0 ? header : null;
}

// This helper renders one drained notification as a server-sent event block.
function toServerSentEvent(sequence: number, message: Record<string, unknown>): string {
  return `id: ${sequence}\nevent: message\ndata: ${JSON.stringify(message)}\n\n`;
}

/**
 * Handles one JSON-RPC message. Notifications return null; requests always produce a response whose error body
 * comes from the dispatcher's typed-error mapping.
 */
async function handleRpcMessage(
  message: JsonRpcRequest,
  deps: McpRouteDeps,
  logger: FastifyBaseLogger
): Promise<JsonRpcResponse | null> {
  if (message.id === undefined) {
    deps.server.handleNotification(message.method, message.params ?? {});
    return null;
  }

  const requestId = message.id;
  const rpcTraceId = randomUUID();
  const timeoutMs = deps.config.requestTimeoutMs;
  const scheduler = deps.scheduler ?? nodeScheduler;
  const token =
    timeoutMs > 0
      ? CancellationToken.timeout(timeoutMs, scheduler, `Request timed out after ${timeoutMs}ms`)
      : CancellationToken.none();

  logger.info(
    { event: 'mcp_rpc_request_received', rpcTraceId, rpcRequestId: requestId, method: message.method },
    'mcp_rpc_request_received'
  );

  let outcome: DispatchOutcome;
  try {
    outcome = await deps.server.handle(message.method, message.params ?? {}, {
      requestId,
      token,
      logger: logger.child({ rpcTraceId })
    });
  } finally {
    token.dispose();
  }

  return outcome.ok
    ? { jsonrpc: '2.0', id: requestId, result: outcome.result }
    : { jsonrpc: '2.0', id: requestId, error: outcome.error };
}

class JsonBodyParseError extends AppError {
  public constructor(cause: unknown) {
    super(400, 'parse_error', 'Request body is not valid JSON.');
    this.name = 'JsonBodyParseError';
    this.cause = cause;
  }
}

// This function registers the MCP endpoint inside its own scope so JSON parsing failures map to JSON-RPC errors.
export function registerMcpRoutes(fastify: FastifyInstance, deps: McpRouteDeps): void {
  void fastify.register(async (scope) => {
    scope.removeContentTypeParser('application/json');
    scope.addContentTypeParser('application/json', { parseAs: 'string' }, (_request, body, done) => {
      try {
        done(null, JSON.parse(String(body)));
      } catch (error) {
        done(new JsonBodyParseError(error), undefined);
      }
    });

    scope.setErrorHandler((error, request, reply) => {
      const normalized = normalizeError(error);
      const status = error.statusCode ?? normalized.statusCode;

      request.log.error(
        { event: 'mcp_request_failed', code: normalized.code, statusCode: status, error: errorForLog(error) },
        'mcp_request_failed'
      );

      if (normalized instanceof JsonBodyParseError) {
        reply.code(400).send(rpcError(null, RPC_ERROR_CODES.parseError, 'Parse error'));
        return;
      }

      // Framework-level rejections such as an oversized body are the client's fault.
      if (status < 500) {
        reply.code(status).send(rpcError(null, RPC_ERROR_CODES.invalidRequest, 'Invalid request'));
        return;
      }

      reply.code(status).send(rpcError(null, RPC_ERROR_CODES.internalError, 'Internal error'));
    });

    scope.get('/mcp', async (request, reply) => {
      const accept = request.headers.accept ?? '';

      if (!accept.includes('text/event-stream')) {
        request.log.info({ event: 'mcp_transport_discovery' }, 'mcp_transport_discovery');
        return {
          name: deps.server.serverInfo.name,
          version: MCP_SERVER_VERSION,
          transport: 'streamable-http',
          endpoint: '/mcp',
          protocolVersion: LATEST_PROTOCOL_VERSION,
          methods: [...SUPPORTED_METHODS]
        };
      }

      const drained = deps.server.notifications.drain();
      request.log.info({ event: 'mcp_notifications_streamed', count: drained.length }, 'mcp_notifications_streamed');

      const body = drained
        .map((notification) =>
          toServerSentEvent(notification.sequence, {
            jsonrpc: '2.0',
            method: notification.kind,
            params: notification.payload
          })
        )
        .join('');

      reply.header('content-type', 'text/event-stream').header('cache-control', 'no-cache');
      return body;
    });

    scope.post('/mcp', async (request: FastifyRequest, reply: FastifyReply) => {
      const requestLogger = request.log.child({ component: 'mcp' });
      const activeSession = deps.server.sessions.getSessionId();
      const presentedSession = readSessionHeader(request);

      if (presentedSession !== null && presentedSession !== activeSession) {
        requestLogger.warn({ event: 'mcp_session_mismatch' }, 'mcp_session_mismatch');
        reply.code(404).send(rpcError(null, RPC_ERROR_CODES.invalidRequest, 'Unknown session.'));
        return;
      }

      const payload: unknown = request.body;
      if (payload === undefined || payload === null) {
        requestLogger.warn({ event: 'mcp_post_missing_payload' }, 'mcp_post_missing_payload');
        reply.code(400).send(rpcError(null, RPC_ERROR_CODES.invalidRequest, 'Missing JSON-RPC request payload.'));
        return;
      }

      const batch = Array.isArray(payload);
      const messages: unknown[] = Array.isArray(payload) ? payload : [payload];

      if (batch && messages.length === 0) {
        reply.code(400).send(rpcError(null, RPC_ERROR_CODES.invalidRequest, 'Empty JSON-RPC batch.'));
        return;
      }

      requestLogger.info(
        { event: 'mcp_post_received', batch, messageCount: messages.length },
        'mcp_post_received'
      );

      // Batch members run in parallel so a notifications/cancelled member can reach a running request.
      const responses = await Promise.all(
        messages.map((message) => {
          if (!isJsonRpcRequest(message)) {
            requestLogger.warn({ event: 'mcp_post_invalid_request_object' }, 'mcp_post_invalid_request_object');
            return rpcError(null, RPC_ERROR_CODES.invalidRequest, 'Invalid JSON-RPC request object.');
          }

          return handleRpcMessage(message, deps, requestLogger);
        })
      );
      const answered = responses.filter((response): response is JsonRpcResponse => response !== null);

      const initialized = messages.some(
        (message, index) => isJsonRpcRequest(message) && message.method === 'initialize' && !responses[index]?.error
      );
      const sessionId = deps.server.sessions.getSessionId();
      if (initialized && sessionId) {
        reply.header(SESSION_HEADER, sessionId);
      }

      if (answered.length === 0) {
        reply.code(202).send();
        return;
      }

      if (!batch && answered[0]?.error?.code === RPC_ERROR_CODES.invalidRequest) {
        reply.code(400).send(answered[0]);
        return;
      }

      reply.send(batch ? answered : answered[0]);
    });
  });
}
