// This is the process entrypoint that starts the HTTP server and handles graceful shutdown.

import { loadServerConfig, type ServerConfig } from './config/config.js';
import { createServer } from './server.js';
import { AppError } from './utils/errors.js';
import { createLogger, errorForLog } from './utils/logger.js';

// This helper aborts startup with a structured log line when the environment is invalid.
function loadConfigOrExit(): ServerConfig {
  try {
    return loadServerConfig();
  } catch (error) {
    createLogger('error').error(
      {
        event: 'config_load_failed',
        details: error instanceof AppError ? error.details : undefined,
        error: errorForLog(error)
      },
      'config_load_failed'
    );
    process.exit(1);
  }
}

const config = loadConfigOrExit();
const { host, port } = config;
const { app } = createServer(config);

// This helper closes the listener, which also cancels in-flight MCP invocations.
async function shutdown(signal: string): Promise<void> {
  app.log.info({ event: 'shutdown_started', signal }, 'shutdown_started');
  await app.close();
  app.log.info({ event: 'shutdown_completed', signal }, 'shutdown_completed');
  process.exit(0);
}

process.on('SIGTERM', () => {
  void shutdown('SIGTERM');
});

process.on('SIGINT', () => {
  void shutdown('SIGINT');
});

app
  .listen({ host, port })
  .then(() => {
    app.log.info({ event: 'server_started', host, port }, 'server_started');
  })
  .catch((error: unknown) => {
    app.log.error({ event: 'server_start_failed', error: errorForLog(error) }, 'server_start_failed');
    process.exit(1);
  });
