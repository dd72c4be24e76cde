/**
 * Gateway entry point
 * Loads configuration and starts HTTP server
 */

import { getConfig } from './config.js';
import { Logger } from './logger.js';
import { createApp } from './server.js';

// Load and validate configuration (fails fast if invalid)
const config = getConfig();
const logger = new Logger('gateway', config.logLevel);

const app = createApp(config, logger);

// Start server on all interfaces
const server = app.listen(config.listenPort, () => {
  logger.info(`Listening on port ${config.listenPort}`);
  logger.info(`Static: ${config.staticUrlPrefix} -> ${config.staticRoot}`);
  if (config.media) {
    logger.info(`Media: ${config.media.prefix} -> ${config.media.root}`);
  }
  logger.info(`Backend: uwsgi://${config.backend.host}:${config.backend.port}`);
  logger.info(
    `Max body: ${config.maxBodyBytes === 0 ? 'unlimited' : `${config.maxBodyBytes} bytes`}, ` +
      `backend timeout: ${config.backendTimeoutMs}ms`
  );
});

server.on('error', (error) => {
  logger.error('Server error:', error);
  process.exitCode = 1;
});

function shutdown(signal: NodeJS.Signals): void {
  logger.info(`${signal} received, closing listener`);
  server.close((error) => {
    if (error) {
      logger.error('Error while closing:', error);
      process.exitCode = 1;
    }
  });
  server.closeIdleConnections();
}

process.once('SIGINT', shutdown);
process.once('SIGTERM', shutdown);
