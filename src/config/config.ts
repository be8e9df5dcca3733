// This module parses process environment variables into one validated runtime configuration object.

import type { LevelWithSilent } from 'pino';
import { z } from 'zod';
import { AppError } from '../utils/errors.js';
import { LOG_LEVELS } from '../utils/logger.js';

const booleanFlagSchema = z
  .enum(['true', 'false', '1', '0', 'yes', 'no'])
  .transform((value) => value === 'true' || value === '1' || value === 'yes');

const envSchema = z.object({
  HOST: z.string().min(1).default('0.0.0.0'),
  PORT: z.coerce.number().int().min(0).max(65535).default(8080),
  LOG_LEVEL: z.enum(LOG_LEVELS).default('info'),
  MCP_REQUEST_TIMEOUT_MS: z.coerce.number().int().min(0).default(30_000),
  MCP_DUPLICATE_POLICY: z.enum(['overwrite', 'reject']).default('overwrite'),
  MCP_BODY_LIMIT_BYTES: z.coerce.number().int().positive().default(1024 * 1024),
  MCP_DEMO_CATALOG: booleanFlagSchema.default('true'),
  MCP_INSTRUCTIONS: z.string().min(1).optional()
});

export interface ServerConfig {
  host: string;
  port: number;
  logLevel: LevelWithSilent;
  requestTimeoutMs: number;
  duplicatePolicy: 'overwrite' | 'reject';
  bodyLimitBytes: number;
  demoCatalog: boolean;
  instructions?: string;
}

// Empty strings count as unset so container templates can leave variables blank.
function withoutBlankValues(env: NodeJS.ProcessEnv): Record<string, string> {
  const entries = Object.entries(env).filter(
    (entry): entry is [string, string] => typeof entry[1] === 'string' && entry[1].trim() !== ''
  );
  return Object.fromEntries(entries.map(([key, value]) => [key, value.trim()]));
}

export function loadServerConfig(env: NodeJS.ProcessEnv = process.env): ServerConfig {
  const parsed = envSchema.safeParse(withoutBlankValues(env));

  if (!parsed.success) {
    throw new AppError(500, 'invalid_config', 'Server configuration is invalid.', {
      issues: parsed.error.issues.map((issue) => ({ variable: issue.path.join('.'), message: issue.message }))
    });
  }

  const data = parsed.data;
  const config: ServerConfig = {
    host: data.HOST,
    port: data.PORT,
    logLevel: data.LOG_LEVEL,
    requestTimeoutMs: data.MCP_REQUEST_TIMEOUT_MS,
    duplicatePolicy: data.MCP_DUPLICATE_POLICY,
    bodyLimitBytes: data.MCP_BODY_LIMIT_BYTES,
    demoCatalog: data.MCP_DEMO_CATALOG
  };

  if (data.MCP_INSTRUCTIONS !== undefined) {
    config.instructions = data.MCP_INSTRUCTIONS;
  }

  return config;
}
