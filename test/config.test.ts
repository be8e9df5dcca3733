// This test suite verifies environment parsing, defaults, and the structured error raised for invalid settings.

import { describe, expect, it } from 'vitest';
import { loadServerConfig } from '../src/config/config.js';
import { AppError } from '../src/utils/errors.js';

describe('server config', () => {
  it('applies defaults when the environment is empty', () => {
    expect(loadServerConfig({})).toEqual({
      host: '0.0.0.0',
      port: 8080,
      logLevel: 'info',
      requestTimeoutMs: 30000,
      duplicatePolicy: 'overwrite',
      bodyLimitBytes: 1048576,
      demoCatalog: true
    });
  });

  it('parses explicit values and trims whitespace', () => {
    const config = loadServerConfig({
      HOST: ' 127.0.0.1 ',
      PORT: '9000',
      LOG_LEVEL: 'debug',
      MCP_REQUEST_TIMEOUT_MS: '0',
      MCP_DUPLICATE_POLICY: 'reject',
      MCP_BODY_LIMIT_BYTES: '2048',
      MCP_DEMO_CATALOG: 'no',
      MCP_INSTRUCTIONS: 'Use the calculator for arithmetic.'
    });

    expect(config).toEqual({
      host: '127.0.0.1',
      port: 9000,
      logLevel: 'debug',
      requestTimeoutMs: 0,
      duplicatePolicy: 'reject',
      bodyLimitBytes: 2048,
      demoCatalog: false,
      instructions: 'Use the calculator for arithmetic.'
    });
  });

  it('treats blank values as unset', () => {
    const config = loadServerConfig({ PORT: '   ', MCP_INSTRUCTIONS: '' });

    expect(config.port).toBe(8080);
    expect(config.instructions).toBeUndefined();
  });

  it('reports every invalid variable by name', () => {
    let caught: unknown = null;
    try {
      loadServerConfig({ PORT: 'eighty', MCP_DUPLICATE_POLICY: 'merge' });
    } catch (error) {
      caught = error;
    }

    expect(caught).toBeInstanceOf(AppError);
    if (caught instanceof AppError) {
      expect(caught.code).toBe('invalid_config');
      expect(caught.statusCode).toBe(500);
      const details = caught.details;
      expect(details).toMatchObject({
        issues: expect.arrayContaining([
          expect.objectContaining({ variable: 'PORT' }),
          expect.objectContaining({ variable: 'MCP_DUPLICATE_POLICY' })
        ])
      });
    }
  });
});
