// This module wires the HTTP routes, request logging hooks, and the MCP dispatcher into one Fastify application.

import Fastify, { type FastifyInstance } from 'fastify';
import { registerDemoCatalog } from './catalog/demo-catalog.js';
import type { ServerConfig } from './config/config.js';
import type { Scheduler } from './mcp/cancellation.js';
import { McpServer } from './mcp/mcp-server.js';
import { registerMcpRoutes } from './mcp/protocol.js';
import {
  LATEST_PROTOCOL_VERSION,
  MCP_SERVER_NAME,
  MCP_SERVER_VERSION,
  SUPPORTED_PROTOCOL_VERSIONS
} from './version.js';
import { AppError, normalizeError } from './utils/errors.js';
import { buildLoggerOptions, errorForLog, sanitizeForLog } from './utils/logger.js';

export interface ServerResources {
  app: FastifyInstance;
  mcp: McpServer;
}

export interface CreateServerOptions {
  mcp?: McpServer;
  scheduler?: Scheduler;
}

// This map stores high-resolution request start times without widening Fastify's request type.
const requestStartTimes = new WeakMap<object, bigint>();

// This helper builds a safe header snapshot for request diagnostics without leaking secrets.
function buildRequestHeaderSnapshot(headers: Record<string, unknown>): unknown {
  return sanitizeForLog({
    host: headers.host ?? null,
    'user-agent': headers['user-agent'] ?? null,
    accept: headers.accept ?? null,
    'content-type': headers['content-type'] ?? null,
    'content-length': headers['content-length'] ?? null,
    'mcp-session-id': headers['mcp-session-id'] ? '[present]' : null
  });
}

// This function builds and configures the full HTTP application around one MCP dispatcher.
export function createServer(config: ServerConfig, options: CreateServerOptions = {}): ServerResources {
  const app = Fastify({
    logger: buildLoggerOptions(config.logLevel),
    bodyLimit: config.bodyLimitBytes
  });

  const mcp =
    options.mcp ??
    new McpServer({
      logger: app.log.child({ component: 'mcp_core' }),
      duplicatePolicy: config.duplicatePolicy,
      instructions: config.instructions
    });

  if (!options.mcp && config.demoCatalog) {
    registerDemoCatalog(mcp);
    app.log.info(
      { event: 'demo_catalog_registered', tools: mcp.tools.count(), prompts: mcp.prompts.count() },
      'demo_catalog_registered'
    );
  }

  // This hook enriches request logs with consistent route and request-id metadata.
  app.addHook('onRequest', async (request) => {
    requestStartTimes.set(request, process.hrtime.bigint());

    request.log.info(
      {
        event: 'http_request_start',
        requestId: request.id,
        method: request.method,
        path: request.url,
        headers: buildRequestHeaderSnapshot(request.headers)
      },
      'http_request_start'
    );
  });

  // This hook logs response completion including status and duration for request tracing.
  app.addHook('onResponse', async (request, reply) => {
    const startTime = requestStartTimes.get(request);
    const durationMs = startTime ? Number(process.hrtime.bigint() - startTime) / 1_000_000 : undefined;

    request.log.info(
      {
        event: 'http_request_complete',
        requestId: request.id,
        statusCode: reply.statusCode,
        method: request.method,
        path: request.url,
        durationMs
      },
      'http_request_complete'
    );
  });

  // This endpoint exposes a lightweight liveness signal.
  app.get('/health', async () => {
    app.log.debug({ event: 'health_check' }, 'health_check');

    return {
      ok: true,
      status: mcp.isClosed() ? 'closed' : 'alive',
      ts: new Date().toISOString()
    };
  });

  app.get('/version', async () => {
    return {
      ok: true,
      name: MCP_SERVER_NAME,
      version: MCP_SERVER_VERSION,
      protocolVersion: LATEST_PROTOCOL_VERSION,
      supportedProtocolVersions: [...SUPPORTED_PROTOCOL_VERSIONS]
    };
  });

  registerMcpRoutes(app, { server: mcp, config, scheduler: options.scheduler });

  // This hook cancels in-flight invocations before the listener shuts down.
  app.addHook('onClose', async () => {
    mcp.close();
  });

  app.setErrorHandler((error, request, reply) => {
    const normalized = normalizeError(error);
    const status = error.statusCode ?? normalized.statusCode;

    request.log.error(
      {
        event: 'http_request_failed',
        requestId: request.id,
        code: normalized.code,
        details: sanitizeForLog(normalized.details),
        error: errorForLog(error)
      },
      'http_request_failed'
    );

    reply.status(status).send({
      ok: false,
      error: {
        code: normalized.code,
        message: status >= 500 ? 'An unexpected error occurred.' : normalized.message
      }
    });
  });

  app.setNotFoundHandler((request, reply) => {
    const error = new AppError(404, 'not_found', `Route not found: ${request.method} ${request.url}`);

    request.log.warn(
      {
        event: 'http_route_not_found',
        requestId: request.id,
        method: request.method,
        path: request.url
      },
      'http_route_not_found'
    );

    reply.status(404).send({
      ok: false,
      error: {
        code: error.code,
        message: error.message
      }
    });
  });

  return { app, mcp };
}
