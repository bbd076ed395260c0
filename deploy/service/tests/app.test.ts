/**
 * HTTP front door tests. The app runs on an ephemeral port against a fake
 * aggregator and store probe.
 */

import type { Server } from 'node:http';
import { describe, it, expect, beforeAll, afterAll, beforeEach } from 'vitest';
import { pino } from 'pino';
import {
  emptySummary,
  recordPass,
  resetMetrics,
  type Report,
  type StoreHealthStatus,
} from '@availability-monitor/aggregator-agent';
import { createApp } from '../src/app.js';
import type { ServiceConfig } from '../src/config.js';
import type { ReportSource, StoreProbe } from '../src/health.js';

const config: ServiceConfig = {
  serviceName: 'availability-monitor',
  serviceVersion: '1.0.0',
  environment: 'dev',
  port: 0,
  logLevel: 'silent',
};

const report: Report = {
  generated_at: '2024-03-01T03:00:00.000Z',
  ready: true,
  summaries: { 'nodes/node-a': { ...emptySummary(), down_time_ms: 10_800_000 } },
  up: { 'nodes/node-a': false },
};

class FakeAggregator implements ReportSource {
  report: Report | null = null;

  isReportReady(): boolean {
    return this.report !== null;
  }

  getReport(): Report | null {
    return this.report;
  }
}

class FakeStore implements StoreProbe {
  status: StoreHealthStatus = { healthy: true, latency_ms: 3, endpoint: 'http://store.test' };
  failure: Error | null = null;

  async healthCheck(): Promise<StoreHealthStatus> {
    if (this.failure) throw this.failure;
    return this.status;
  }
}

const aggregator = new FakeAggregator();
const store = new FakeStore();
let server: Server;
let baseUrl: string;

function listen(): Promise<Server> {
  const app = createApp({ config, logger: pino({ level: 'silent' }), aggregator, store });
  return new Promise((resolve) => {
    const started = app.listen(0, '127.0.0.1', () => resolve(started));
  });
}

function close(target: Server): Promise<void> {
  return new Promise((resolve, reject) => {
    target.close((error) => (error ? reject(error) : resolve()));
  });
}

describe('service app', () => {
  beforeAll(async () => {
    server = await listen();
    const address = server.address();
    if (address === null || typeof address === 'string') throw new Error('expected a TCP address');
    baseUrl = `http://127.0.0.1:${address.port}`;
  });

  afterAll(async () => {
    await close(server);
  });

  beforeEach(() => {
    aggregator.report = null;
    store.status = { healthy: true, latency_ms: 3, endpoint: 'http://store.test' };
    store.failure = null;
    resetMetrics();
  });

  describe('GET /ready', () => {
    it('returns 503 before the first report', async () => {
      const response = await fetch(`${baseUrl}/ready`);
      const body: unknown = await response.json();

      expect(response.status).toBe(503);
      expect(body).toMatchObject({
        ready: false,
        checks: [{ name: 'report', passed: false, error: 'No aggregation pass has completed yet' }],
      });
    });

    it('returns 200 once a report is published', async () => {
      aggregator.report = report;

      const response = await fetch(`${baseUrl}/ready`);
      const body: unknown = await response.json();

      expect(response.status).toBe(200);
      expect(body).toMatchObject({ ready: true, checks: [{ name: 'report', passed: true }] });
    });
  });

  describe('GET /report', () => {
    it('returns REPORT_NOT_READY before the first report', async () => {
      const response = await fetch(`${baseUrl}/report`);
      const body: unknown = await response.json();

      expect(response.status).toBe(503);
      expect(body).toMatchObject({ success: false, error: { code: 'REPORT_NOT_READY' } });
    });

    it('returns the latest report', async () => {
      aggregator.report = report;

      const response = await fetch(`${baseUrl}/report`);

      expect(response.status).toBe(200);
      expect(await response.json()).toEqual(report);
    });
  });

  describe('GET /health', () => {
    it('reports store and aggregator state', async () => {
      aggregator.report = report;
      recordPass(1, 12, true);

      const response = await fetch(`${baseUrl}/health`);
      const body: unknown = await response.json();

      expect(response.status).toBe(200);
      expect(body).toMatchObject({
        status: 'healthy',
        service: 'availability-monitor',
        version: '1.0.0',
        environment: 'dev',
        components: { store: { healthy: true, latency_ms: 3, endpoint: 'http://store.test' } },
        aggregator: {
          ready: true,
          last_report_at: '2024-03-01T03:00:00.000Z',
          metrics: { passes_total: 1, entities_summarized: 1, last_pass_duration_ms: 12 },
        },
      });
    });

    it('stays 200 with a degraded store', async () => {
      store.status = { healthy: false, latency_ms: 5000, endpoint: 'http://store.test', error: 'timeout' };

      const response = await fetch(`${baseUrl}/health`);
      const body: unknown = await response.json();

      expect(response.status).toBe(200);
      expect(body).toMatchObject({
        status: 'degraded',
        components: { store: { healthy: false, error: 'timeout' } },
        aggregator: { ready: false, last_report_at: null },
      });
    });

    it('maps unexpected failures to INTERNAL_ERROR', async () => {
      store.failure = new Error('health check crashed');

      const response = await fetch(`${baseUrl}/health`);
      const body: unknown = await response.json();

      expect(response.status).toBe(500);
      expect(body).toMatchObject({
        success: false,
        error: { code: 'INTERNAL_ERROR', message: 'Internal server error' },
      });
    });
  });

  it('describes the service at the root', async () => {
    const response = await fetch(`${baseUrl}/`);

    expect(await response.json()).toMatchObject({
      service: 'availability-monitor',
      endpoints: { health: '/health', ready: '/ready', report: '/report' },
    });
  });

  it('returns NOT_FOUND for unknown endpoints', async () => {
    const response = await fetch(`${baseUrl}/metrics`);
    const body: unknown = await response.json();

    expect(response.status).toBe(404);
    expect(body).toMatchObject({
      success: false,
      error: { code: 'NOT_FOUND', message: 'Endpoint GET /metrics not found' },
    });
  });
});
