#!/usr/bin/env node

/**
 * CLI entry point
 *
 * Loads `.env`, validates configuration, then serves the tools over stdio.
 */

import 'dotenv/config';
import { loadConfigOrReport } from './config.js';
import { toError } from './errors.js';
import { createLogger } from './logger.js';
import { WorkbenchMCPServer } from './mcp-server.js';

async function main(): Promise<void> {
  const logger = createLogger();

  const config = loadConfigOrReport(process.env);
  if (!config) {
    process.exit(1);
  }

  logger.info('Configuration loaded', {
    host: config.host,
    projectId: config.projectId ?? null,
    requestTimeoutMs: config.requestTimeoutMs,
  });

  const server = new WorkbenchMCPServer(config, { logger });
  await server.runStdio();

  const shutdown = async (signal: string): Promise<void> => {
    logger.info(`Received ${signal}, shutting down gracefully...`);
    try {
      await server.stop();
      logger.info('Server stopped successfully');
      process.exit(0);
    } catch (error) {
      logger.error('Error during shutdown', toError(error));
      process.exit(1);
    }
  };

  process.on('SIGTERM', () => void shutdown('SIGTERM'));
  process.on('SIGINT', () => void shutdown('SIGINT'));
}

main().catch((error: unknown) => {
  createLogger().error('Fatal error', toError(error));
  process.exit(1);
});
