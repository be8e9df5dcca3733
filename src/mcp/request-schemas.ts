// This module defines zod schemas for the params of every dispatched method and notification.

import { z } from 'zod';
import type { LoggingLevel } from '../types/mcp.js';
import { ValidationError } from '../utils/errors.js';

export const LOGGING_LEVELS = [
  'debug',
  'info',
  'notice',
  'warning',
  'error',
  'critical',
  'alert',
  'emergency'
] as const satisfies readonly LoggingLevel[];

const argumentMapSchema = z.record(z.unknown());

export const initializeParamsSchema = z.object({
  // The version is checked during negotiation so an unsupported or missing value reports a protocol failure.
  protocolVersion: z.unknown().optional(),
  capabilities: argumentMapSchema.default({}),
  clientInfo: z
    .object({
      name: z.string(),
      version: z.string()
    })
    .optional()
});

export const paginatedParamsSchema = z.object({
  cursor: z.string().optional()
});

export const callToolParamsSchema = z.object({
  name: z.string().min(1),
  arguments: argumentMapSchema.default({})
});

export const getPromptParamsSchema = z.object({
  name: z.string().min(1),
  arguments: argumentMapSchema.default({})
});

export const resourceUriParamsSchema = z.object({
  uri: z.string().min(1)
});

export const setLevelParamsSchema = z.object({
  level: z.enum(LOGGING_LEVELS)
});

export const cancelledParamsSchema = z.object({
  requestId: z.union([z.string(), z.number()]),
  reason: z.string().optional()
});

/**
 * Parses method params and reports the first zod issue as a structured violation, so malformed params surface
 * through the same error kind as argument validation.
 */
export function parseParams<TSchema extends z.ZodTypeAny>(schema: TSchema, params: unknown): z.output<TSchema> {
  const parsed = schema.safeParse(params ?? {});
  if (parsed.success) {
    return parsed.data;
  }

  const issue = parsed.error.issues[0];
  throw new ValidationError({
    path: issue && issue.path.length > 0 ? issue.path.join('.') : 'params',
    constraint: 'params',
    message: issue?.message ?? 'Invalid params'
  });
}
