/**
 * Health Check Endpoints
 *
 * Liveness reports the object store and aggregator state; readiness follows
 * the aggregator's report readiness only.
 */

import {
  getMetrics,
  type AggregatorMetrics,
  type Report,
  type StoreHealthStatus,
} from '@availability-monitor/aggregator-agent';
import type { ServiceConfig } from './config.js';

/**
 * The read side of the aggregator. Both calls are synchronous and never wait
 * for a running pass.
 */
export interface ReportSource {
  isReportReady(): boolean;
  getReport(): Report | null;
}

export interface StoreProbe {
  healthCheck(): Promise<StoreHealthStatus>;
}

export interface HealthCheckResult {
  status: 'healthy' | 'degraded';
  service: string;
  version: string;
  environment: string;
  components: {
    store: StoreHealthStatus;
  };
  aggregator: {
    ready: boolean;
    last_report_at: string | null;
    metrics: AggregatorMetrics;
  };
  timestamp: string;
}

export interface ReadinessResult {
  ready: boolean;
  checks: {
    name: string;
    passed: boolean;
    error?: string;
  }[];
  timestamp: string;
}

/**
 * Full health check including the object store
 */
export async function healthCheck(
  aggregator: ReportSource,
  store: StoreProbe,
  config: ServiceConfig
): Promise<HealthCheckResult> {
  const storeHealth = await store.healthCheck();

  return {
    status: storeHealth.healthy ? 'healthy' : 'degraded',
    service: config.serviceName,
    version: config.serviceVersion,
    environment: config.environment,
    components: {
      store: storeHealth,
    },
    aggregator: {
      ready: aggregator.isReportReady(),
      last_report_at: aggregator.getReport()?.generated_at ?? null,
      metrics: getMetrics(),
    },
    timestamp: new Date().toISOString(),
  };
}

/**
 * Kubernetes readiness probe
 */
export function readinessCheck(aggregator: ReportSource): ReadinessResult {
  const ready = aggregator.isReportReady();

  return {
    ready,
    checks: [
      {
        name: 'report',
        passed: ready,
        error: ready ? undefined : 'No aggregation pass has completed yet',
      },
    ],
    timestamp: new Date().toISOString(),
  };
}
