// This module provides the typed error taxonomy that registries, the validator, and the dispatcher raise.

import type { CancellationToken } from '../mcp/cancellation.js';
import type { EntityKind } from '../types/domain.js';

export class AppError extends Error {
  public readonly statusCode: number;
  public readonly code: string;
  public readonly details?: unknown;

  public constructor(statusCode: number, code: string, message: string, details?: unknown) {
    super(message);
    this.name = 'AppError';
    this.statusCode = statusCode;
    this.code = code;
    this.details = details;
  }
}

// This type describes the single violation reported by fail-fast argument validation.
export interface SchemaViolation {
  path: string;
  constraint: 'required' | 'type' | 'enum' | 'params';
  expected?: unknown;
  message: string;
}

export class NotFoundError extends AppError {
  public readonly kind: EntityKind;
  public readonly target: string;

  public constructor(kind: EntityKind, target: string) {
    super(404, 'not_found', `${kind} not found: ${target}`, { kind, target });
    this.name = 'NotFoundError';
    this.kind = kind;
    this.target = target;
  }
}

export class ValidationError extends AppError {
  public readonly violation: SchemaViolation;

  public constructor(violation: SchemaViolation) {
    super(400, 'validation_error', 'Schema validation failed', violation);
    this.name = 'ValidationError';
    this.violation = violation;
  }
}

export class CancellationError extends AppError {
  public readonly reason: string | null;
  public readonly token: CancellationToken;

  public constructor(token: CancellationToken) {
    super(408, 'request_cancelled', token.reason ?? 'Operation was cancelled', { reason: token.reason });
    this.name = 'CancellationError';
    this.reason = token.reason;
    this.token = token;
  }
}

export class ProtocolError extends AppError {
  public readonly requested: string | null;
  public readonly supported: readonly string[];

  public constructor(requested: string | null, supported: readonly string[]) {
    super(400, 'unsupported_protocol_version', `Unsupported protocol version: ${requested ?? 'none'}`, {
      requested,
      supported
    });
    this.name = 'ProtocolError';
    this.requested = requested;
    this.supported = supported;
  }
}

export class InternalError extends AppError {
  public constructor(message: string, cause: unknown) {
    super(500, 'internal_error', message);
    this.name = 'InternalError';
    this.cause = cause;
  }
}

export class DuplicateEntityError extends AppError {
  public constructor(kind: EntityKind, name: string) {
    super(409, 'duplicate_entity', `${kind} already registered: ${name}`, { kind, name });
    this.name = 'DuplicateEntityError';
  }
}

export class ConnectionClosedError extends AppError {
  public constructor() {
    super(503, 'connection_closed', 'Server connection is closed.');
    this.name = 'ConnectionClosedError';
  }
}

// This helper normalizes unknown failures into an AppError without leaking internals.
export function normalizeError(error: unknown): AppError {
  if (error instanceof AppError) {
    return error;
  }

  return new InternalError('An unexpected error occurred.', error);
}
