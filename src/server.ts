/**
 * Server Entry Point — HTTP Surface & Graceful Shutdown
 * Layer: Entry Point (top of the dependency tree)
 *
 * Starts one HTTP process. Runs and their workbooks live in this process's
 * memory, so the server is deliberately not clustered: a poll or download
 * routed to another worker would not find the run.
 *
 * On SIGTERM/SIGINT the server stops accepting connections, lets in-flight
 * requests finish and exits. Background runs still in progress are abandoned.
 */
import { config } from '@core/config';
import { logger } from '@core/logger';
import { createApp } from '@interfaces/http/app';

const app = createApp();

const server = app.listen(config.port, () => {
  logger.info(
    { pid: process.pid, port: config.port, registry: config.registry.apiUrl },
    `Public register export listening on :${config.port}`,
  );
});

const shutdown = (signal: string): void => {
  logger.info({ pid: process.pid, signal }, 'Graceful shutdown initiated');
  server.close((err) => {
    if (err) {
      logger.error({ err }, 'Error while closing the HTTP server');
      process.exit(1);
    }
    process.exit(0);
  });
};

process.on('SIGTERM', () => shutdown('SIGTERM'));
process.on('SIGINT', () => shutdown('SIGINT'));
