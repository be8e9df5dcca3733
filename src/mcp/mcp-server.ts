// This module routes protocol method names to the registries and converts typed failures into protocol errors.

import { CancellationManager, CancellationToken, raceWithToken } from './cancellation.js';
import { CapabilitySet } from './capability-set.js';
import { NOTIFICATION_KINDS, NotificationQueue } from './notification-queue.js';
import { PromptRegistry } from './prompt-registry.js';
import {
  LOGGING_LEVELS,
  callToolParamsSchema,
  cancelledParamsSchema,
  getPromptParamsSchema,
  initializeParamsSchema,
  paginatedParamsSchema,
  parseParams,
  resourceUriParamsSchema,
  setLevelParamsSchema
} from './request-schemas.js';
import { ResourceRegistry } from './resource-registry.js';
import type { RegistryOptions } from './registry.js';
import { SchemaValidator } from './schema-validator.js';
import { SessionManager } from './session-manager.js';
import { ToolRegistry } from './tool-registry.js';
import type { DuplicatePolicy, InvocationContext } from '../types/domain.js';
import {
  RPC_ERROR_CODES,
  type DispatchOutcome,
  type Implementation,
  type JsonRpcError,
  type LoggingLevel
} from '../types/mcp.js';
import {
  AppError,
  CancellationError,
  ConnectionClosedError,
  NotFoundError,
  ProtocolError,
  ValidationError
} from '../utils/errors.js';
import { errorForLog, getFallbackLogger, sanitizeForLog, type LogSink } from '../utils/logger.js';
import {
  LATEST_PROTOCOL_VERSION,
  MCP_SERVER_NAME,
  MCP_SERVER_VERSION,
  SUPPORTED_PROTOCOL_VERSIONS,
  isSupportedProtocolVersion
} from '../version.js';

export const SUPPORTED_METHODS = [
  'initialize',
  'ping',
  'tools/list',
  'tools/call',
  'resources/list',
  'resources/templates/list',
  'resources/read',
  'resources/subscribe',
  'resources/unsubscribe',
  'prompts/list',
  'prompts/get',
  'logging/setLevel'
] as const;

export type SupportedMethod = (typeof SUPPORTED_METHODS)[number];

export interface McpServerOptions {
  serverInfo?: Implementation;
  instructions?: string;
  capabilities?: CapabilitySet | Record<string, unknown>;
  logger?: LogSink;
  duplicatePolicy?: DuplicatePolicy;
  queue?: NotificationQueue;
  sessions?: SessionManager;
  cancellations?: CancellationManager;
  clock?: () => number;
}

export interface DispatchMeta {
  requestId?: string | number | null;
  token?: CancellationToken;
  logger?: LogSink;
}

export interface ClientState {
  protocolVersion: string;
  clientInfo: Implementation | null;
  capabilities: CapabilitySet;
  initializedAt: number;
  ready: boolean;
}

function isSupportedMethod(method: string): method is SupportedMethod {
  return SUPPORTED_METHODS.some((supported) => supported === method);
}

// Levels are ordered from least to most severe.
function levelRank(level: LoggingLevel): number {
  return LOGGING_LEVELS.indexOf(level);
}

function rpcErrorBody(code: number, message: string, data?: unknown): JsonRpcError {
  return data === undefined ? { code, message } : { code, message, data };
}

/**
 * Maps a typed failure to its protocol error. Messages are fixed per kind and `data` only carries structured
 * detail the peer supplied or can act on; handler fault text stays in the logs.
 */
export function toRpcError(error: unknown): JsonRpcError {
  if (error instanceof NotFoundError) {
    return rpcErrorBody(RPC_ERROR_CODES.invalidParams, `Unknown ${error.kind}`, {
      kind: error.kind,
      target: error.target
    });
  }

  if (error instanceof ValidationError) {
    return rpcErrorBody(RPC_ERROR_CODES.invalidParams, 'Invalid params', error.violation);
  }

  if (error instanceof ProtocolError) {
    return rpcErrorBody(RPC_ERROR_CODES.invalidParams, 'Unsupported protocol version', {
      supported: [...error.supported],
      requested: error.requested
    });
  }

  if (error instanceof CancellationError) {
    return rpcErrorBody(RPC_ERROR_CODES.requestTimeout, 'Request cancelled', { reason: error.reason });
  }

  if (error instanceof ConnectionClosedError) {
    return rpcErrorBody(RPC_ERROR_CODES.connectionClosed, 'Connection closed');
  }

  return rpcErrorBody(RPC_ERROR_CODES.internalError, 'Internal error');
}

/**
 * Protocol dispatcher owning the three registries, the declared capabilities, the notification queue and the
 * session. One instance serves one peer.
 */
export class McpServer {
  public readonly tools: ToolRegistry;
  public readonly resources: ResourceRegistry;
  public readonly prompts: PromptRegistry;
  public readonly notifications: NotificationQueue;
  public readonly sessions: SessionManager;
  public readonly cancellations: CancellationManager;
  public readonly serverInfo: Implementation;

  private capabilities: CapabilitySet;
  private readonly instructions: string | undefined;
  private readonly logger: LogSink;
  private readonly clock: () => number;
  private readonly subscriptions = new Set<string>();
  private client: ClientState | null = null;
  private logLevel: LoggingLevel = 'info';
  private closed = false;

  public constructor(options: McpServerOptions = {}) {
    this.logger = options.logger ?? getFallbackLogger();
    this.clock = options.clock ?? Date.now;
    this.serverInfo = options.serverInfo ?? { name: MCP_SERVER_NAME, version: MCP_SERVER_VERSION };
    this.instructions = options.instructions;
    this.notifications = options.queue ?? new NotificationQueue({ logger: this.logger });
    this.sessions = options.sessions ?? new SessionManager({ logger: this.logger });
    this.cancellations = options.cancellations ?? new CancellationManager({ logger: this.logger, clock: this.clock });

    const registryOptions: RegistryOptions = {
      queue: this.notifications,
      validator: new SchemaValidator(),
      logger: this.logger,
      duplicatePolicy: options.duplicatePolicy
    };
    this.tools = new ToolRegistry(registryOptions);
    this.resources = new ResourceRegistry(registryOptions);
    this.prompts = new PromptRegistry(registryOptions);

    this.capabilities = CapabilitySet.fromRecord({
      tools: { listChanged: true },
      prompts: { listChanged: true },
      resources: { listChanged: true, subscribe: true },
      logging: {}
    });

    if (options.capabilities) {
      this.registerCapabilities(options.capabilities);
    }
  }

  public registerCapabilities(capabilities: CapabilitySet | Record<string, unknown>): void {
    const incoming = capabilities instanceof CapabilitySet ? capabilities : CapabilitySet.fromRecord(capabilities);
    this.capabilities = this.capabilities.merge(incoming);
  }

  public getCapabilities(): CapabilitySet {
    return this.capabilities.merge(new CapabilitySet());
  }

  public getClientState(): ClientState | null {
    return this.client;
  }

  public getLogLevel(): LoggingLevel {
    return this.logLevel;
  }

  public isClosed(): boolean {
    return this.closed;
  }

  public isSubscribed(uri: string): boolean {
    return this.subscriptions.has(uri);
  }

  public async handle(method: string, params: unknown = {}, meta: DispatchMeta = {}): Promise<DispatchOutcome> {
    const startedAt = this.clock();
    const requestId = meta.requestId ?? null;
    const logger = meta.logger ?? this.logger;
    const token = meta.token ?? new CancellationToken();

    // An id may only name one in-flight request, otherwise cancellation would reach the wrong one.
    if (requestId !== null && this.cancellations.has(requestId)) {
      logger.warn({ event: 'mcp_duplicate_request_id', method, requestId }, 'mcp_duplicate_request_id');
      return {
        ok: false,
        error: rpcErrorBody(RPC_ERROR_CODES.invalidRequest, 'Duplicate request id', { requestId })
      };
    }

    const tracked = !this.closed;

    if (tracked && requestId !== null) {
      this.cancellations.register(requestId, method, token);
    }

    try {
      if (this.closed) {
        throw new ConnectionClosedError();
      }

      if (!isSupportedMethod(method)) {
        logger.warn({ event: 'mcp_method_not_found', method, requestId }, 'mcp_method_not_found');
        return {
          ok: false,
          error: rpcErrorBody(RPC_ERROR_CODES.methodNotFound, 'Method not found', { method })
        };
      }

      const context: InvocationContext = { token, logger, sessionId: this.sessions.getSessionId() };
      const result = await raceWithToken(this.route(method, params, context), token);

      logger.info(
        { event: 'mcp_dispatch_completed', method, requestId, durationMs: this.clock() - startedAt },
        'mcp_dispatch_completed'
      );
      return { ok: true, result };
    } catch (error) {
      const mapped = toRpcError(error);
      const details = error instanceof AppError ? sanitizeForLog(error.details) : null;

      logger.error(
        {
          event: 'mcp_dispatch_failed',
          method,
          requestId,
          rpcCode: mapped.code,
          details,
          error: errorForLog(error),
          durationMs: this.clock() - startedAt
        },
        'mcp_dispatch_failed'
      );
      return { ok: false, error: mapped };
    } finally {
      if (tracked && requestId !== null) {
        this.cancellations.unregister(requestId);
      }
    }
  }

  // Unknown or malformed notifications are logged and dropped; notifications never produce a reply.
  public handleNotification(method: string, params: unknown = {}): void {
    if (method === 'notifications/initialized') {
      if (this.client) {
        this.client.ready = true;
      }
      this.logger.info({ event: 'mcp_client_initialized' }, 'mcp_client_initialized');
      return;
    }

    if (method === 'notifications/cancelled') {
      const parsed = cancelledParamsSchema.safeParse(params);
      if (!parsed.success) {
        this.logger.warn({ event: 'mcp_cancel_notification_invalid' }, 'mcp_cancel_notification_invalid');
        return;
      }

      this.cancellations.cancel(parsed.data.requestId, parsed.data.reason);
      return;
    }

    this.logger.debug({ event: 'mcp_notification_ignored', method }, 'mcp_notification_ignored');
  }

  public notifyResourceUpdated(uri: string, payload: Record<string, unknown> = {}): boolean {
    if (!this.subscriptions.has(uri)) {
      return false;
    }

    this.notifications.enqueue(NOTIFICATION_KINDS.resourceUpdated, { ...payload, uri });
    return true;
  }

  // Messages below the peer-selected threshold are dropped.
  public sendLogMessage(level: LoggingLevel, message: string, data?: unknown): boolean {
    if (levelRank(level) < levelRank(this.logLevel)) {
      return false;
    }

    this.notifications.enqueue(NOTIFICATION_KINDS.message, {
      level,
      logger: this.serverInfo.name,
      data: data === undefined ? message : { message, data }
    });
    return true;
  }

  public close(): void {
    if (this.closed) {
      return;
    }

    this.closed = true;
    const cancelled = this.cancellations.cancelAll('Server closed');
    this.subscriptions.clear();
    this.sessions.clear();
    this.logger.info({ event: 'mcp_server_closed', cancelled }, 'mcp_server_closed');
  }

  private async route(
    method: SupportedMethod,
    params: unknown,
    context: InvocationContext
  ): Promise<Record<string, unknown>> {
    switch (method) {
      case 'initialize':
        return this.initialize(params);

      case 'ping':
        return {};

      case 'tools/list':
        parseParams(paginatedParamsSchema, params);
        return { tools: this.tools.list() };

      case 'tools/call': {
        const { name, arguments: args } = parseParams(callToolParamsSchema, params);
        return { ...(await this.tools.execute(name, args, context)) };
      }

      case 'resources/list':
        parseParams(paginatedParamsSchema, params);
        return { resources: this.resources.list() };

      case 'resources/templates/list':
        parseParams(paginatedParamsSchema, params);
        return { resourceTemplates: this.resources.listTemplates() };

      case 'resources/read': {
        const { uri } = parseParams(resourceUriParamsSchema, params);
        return { ...(await this.resources.read(uri, context)) };
      }

      case 'resources/subscribe': {
        const { uri } = parseParams(resourceUriParamsSchema, params);
        this.subscriptions.add(uri);
        this.logger.info({ event: 'mcp_resource_subscribed', uri }, 'mcp_resource_subscribed');
        return {};
      }

      case 'resources/unsubscribe': {
        const { uri } = parseParams(resourceUriParamsSchema, params);
        this.subscriptions.delete(uri);
        this.logger.info({ event: 'mcp_resource_unsubscribed', uri }, 'mcp_resource_unsubscribed');
        return {};
      }

      case 'prompts/list':
        parseParams(paginatedParamsSchema, params);
        return { prompts: this.prompts.list() };

      case 'prompts/get': {
        const { name, arguments: args } = parseParams(getPromptParamsSchema, params);
        return { ...(await this.prompts.execute(name, args, context)) };
      }

      case 'logging/setLevel': {
        const { level } = parseParams(setLevelParamsSchema, params);
        this.logLevel = level;
        this.logger.info({ event: 'mcp_log_level_set', level }, 'mcp_log_level_set');
        return {};
      }
    }
  }

  private initialize(params: unknown): Record<string, unknown> {
    const { protocolVersion, capabilities, clientInfo } = parseParams(initializeParamsSchema, params);

    if (!isSupportedProtocolVersion(protocolVersion)) {
      throw new ProtocolError(
        typeof protocolVersion === 'string' ? protocolVersion : null,
        SUPPORTED_PROTOCOL_VERSIONS
      );
    }

    this.client = {
      protocolVersion,
      clientInfo: clientInfo ?? null,
      capabilities: this.parseClientCapabilities(capabilities),
      initializedAt: this.clock(),
      ready: false
    };
    const sessionId = this.sessions.generateSessionId();

    this.logger.info(
      {
        event: 'mcp_initialized',
        requestedVersion: protocolVersion,
        negotiatedVersion: LATEST_PROTOCOL_VERSION,
        clientName: clientInfo?.name ?? null,
        sessionId
      },
      'mcp_initialized'
    );

    const result: Record<string, unknown> = {
      protocolVersion: LATEST_PROTOCOL_VERSION,
      capabilities: this.capabilities.toRecord(),
      serverInfo: { ...this.serverInfo }
    };
    if (this.instructions !== undefined) {
      result.instructions = this.instructions;
    }
    return result;
  }

  private parseClientCapabilities(capabilities: Record<string, unknown>): CapabilitySet {
    try {
      return CapabilitySet.fromRecord(capabilities);
    } catch (error) {
      if (error instanceof AppError && error.code === 'invalid_capability') {
        throw new ValidationError({ path: 'capabilities', constraint: 'params', message: error.message });
      }
      throw error;
    }
  }
}
