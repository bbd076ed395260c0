/**
 * Availability Monitor - Service Entry Point
 *
 * Runs the aggregation loop for the lifetime of the process and serves its
 * health, readiness and report over HTTP.
 *
 * Startup:
 * 1. Validate service and aggregator configuration (exit 1 on failure)
 * 2. Start the aggregation loop; the first pass runs immediately
 * 3. Start the HTTP server
 *
 * Shutdown (SIGTERM/SIGINT): abort the loop, close the server, wait for the
 * loop to return, exit.
 */

import type { Server } from 'node:http';
import pino from 'pino';
import {
  createAggregatorRuntime,
  createLogger,
  errorMessage,
  loadConfig as loadAgentConfig,
  validateConfig,
} from '@availability-monitor/aggregator-agent';
import { createApp } from './app.js';
import { loadConfig, logAgentAbort, logAgentStarted, validateEnvironment } from './config.js';

// ============================================================================
// CONFIGURATION
// ============================================================================

const config = loadConfig();
// stdout carries the diagnostic report; logs go to stderr.
const logger = pino({
  level: config.logLevel,
  name: config.serviceName,
}, pino.destination(2));

const agentConfig = loadAgentConfig();

const envErrors = [...validateEnvironment(), ...validateConfig(agentConfig)];
if (envErrors.length > 0) {
  logAgentAbort('startup_assertion_failed', envErrors);
  logger.error({ errors: envErrors }, 'Environment validation failed');
  process.exit(1);
}

// ============================================================================
// AGGREGATOR & HTTP SERVER
// ============================================================================

const { aggregator, store } = createAggregatorRuntime(agentConfig, createLogger(agentConfig));
const controller = new AbortController();

const aggregation = aggregator.start(controller.signal).catch((error: unknown) => {
  logAgentAbort('aggregator_failed', [errorMessage(error)]);
  logger.fatal({ err: error }, 'Aggregator loop failed');
  process.exit(1);
});

const app = createApp({ config, logger, aggregator, store });

const server: Server = app.listen(config.port, () => {
  logAgentStarted({ port: config.port, version: config.serviceVersion });
  logger.info({
    port: config.port,
    service: config.serviceName,
    version: config.serviceVersion,
    environment: config.environment,
    interval_ms: agentConfig.aggregation_interval_ms,
    sources: agentConfig.sources.map((source) => source.name),
    exporters: agentConfig.exporters,
  }, 'Availability monitor started');
});

// ============================================================================
// GRACEFUL SHUTDOWN
// ============================================================================

let shuttingDown = false;

async function shutdown(signal: NodeJS.Signals): Promise<void> {
  if (shuttingDown) return;
  shuttingDown = true;
  logger.info({ signal }, 'Shutdown signal received, shutting down gracefully');

  controller.abort();
  await new Promise<void>((resolve, reject) => {
    server.close((error) => (error ? reject(error) : resolve()));
  });
  await aggregation;

  logger.info('Shutdown complete');
  process.exit(0);
}

for (const signal of ['SIGTERM', 'SIGINT'] as const) {
  process.on(signal, () => {
    shutdown(signal).catch((error: unknown) => {
      logger.error({ err: error }, 'Shutdown failed');
      process.exit(1);
    });
  });
}

export { app };
