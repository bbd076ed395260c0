/**
 * Availability Monitor - HTTP Application
 *
 * Read-only front door over a running aggregator: health, readiness and the
 * latest report. Handlers never wait for an aggregation pass.
 */

import express, { type Express, type NextFunction, type Request, type Response } from 'express';
import type { Logger } from 'pino';
import { pinoHttp } from 'pino-http';
import type { ServiceConfig } from './config.js';
import { healthCheck, readinessCheck, type ReportSource, type StoreProbe } from './health.js';

export interface AppDependencies {
  config: ServiceConfig;
  logger: Logger;
  aggregator: ReportSource;
  store: StoreProbe;
}

function errorBody(code: string, message: string) {
  return {
    success: false,
    error: {
      code,
      message,
      timestamp: new Date().toISOString(),
    },
  };
}

export function createApp({ config, logger, aggregator, store }: AppDependencies): Express {
  const app = express();

  app.use(pinoHttp({ logger }));

  // ==========================================================================
  // HEALTH ENDPOINTS
  // ==========================================================================

  app.get('/health', async (_req: Request, res: Response, next: NextFunction) => {
    try {
      // A degraded store is reported, not failed: the last report is still served.
      res.status(200).json(await healthCheck(aggregator, store, config));
    } catch (error) {
      next(error);
    }
  });

  app.get('/ready', (_req: Request, res: Response) => {
    const ready = readinessCheck(aggregator);
    res.status(ready.ready ? 200 : 503).json(ready);
  });

  // ==========================================================================
  // REPORT
  // ==========================================================================

  app.get('/report', (_req: Request, res: Response) => {
    const report = aggregator.getReport();
    if (!report) {
      res.status(503).json(errorBody('REPORT_NOT_READY', 'No aggregation pass has completed yet'));
      return;
    }
    res.json(report);
  });

  app.get('/', (_req: Request, res: Response) => {
    res.json({
      service: config.serviceName,
      version: config.serviceVersion,
      environment: config.environment,
      endpoints: {
        health: '/health',
        ready: '/ready',
        report: '/report',
      },
      timestamp: new Date().toISOString(),
    });
  });

  // ==========================================================================
  // ERROR HANDLING
  // ==========================================================================

  app.use((req: Request, res: Response) => {
    res.status(404).json(errorBody('NOT_FOUND', `Endpoint ${req.method} ${req.path} not found`));
  });

  app.use((err: Error, req: Request, res: Response, _next: NextFunction) => {
    logger.error({ err, path: req.path, method: req.method }, 'Unhandled error');
    res.status(500).json(errorBody('INTERNAL_ERROR', 'Internal server error'));
  });

  return app;
}
