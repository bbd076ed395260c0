/**
 * Availability Aggregator Agent - Telemetry & Self-Observation
 *
 * Structured logging and pass counters for the aggregator itself.
 */

import pino, { type DestinationStream, type Logger } from 'pino';
import type { Config } from './config.js';

// ============================================================================
// LOGGING
// ============================================================================

/**
 * Logs go to stderr by default; stdout carries the line-oriented report.
 */
export function createLogger(
  config: Pick<Config, 'agent' | 'telemetry'>,
  destination: DestinationStream = pino.destination(2)
): Logger {
  return pino({
    name: config.agent.id,
    level: config.telemetry.log_level,
    base: { agent_version: config.agent.version },
  }, destination);
}

// ============================================================================
// METRICS TRACKING
// ============================================================================

export interface AggregatorMetrics {
  passes_total: number;
  pass_failures: number;
  entities_summarized: number;
  entity_errors: number;
  source_errors: number;
  exports_succeeded: number;
  exports_failed: number;
  last_pass_duration_ms: number;
  last_pass_at: string | null;
}

function initialMetrics(): AggregatorMetrics {
  return {
    passes_total: 0,
    pass_failures: 0,
    entities_summarized: 0,
    entity_errors: 0,
    source_errors: 0,
    exports_succeeded: 0,
    exports_failed: 0,
    last_pass_duration_ms: 0,
    last_pass_at: null,
  };
}

let metrics: AggregatorMetrics = initialMetrics();

// ============================================================================
// METRICS RECORDING
// ============================================================================

/**
 * Record the outcome of one aggregation pass.
 */
export function recordPass(
  entitiesSummarized: number,
  durationMs: number,
  success: boolean
): void {
  metrics.passes_total++;
  metrics.entities_summarized += entitiesSummarized;
  metrics.last_pass_duration_ms = durationMs;
  metrics.last_pass_at = new Date().toISOString();

  if (!success) {
    metrics.pass_failures++;
  }
}

export function recordEntityError(): void {
  metrics.entity_errors++;
}

export function recordSourceError(): void {
  metrics.source_errors++;
}

export function recordExport(success: boolean): void {
  if (success) {
    metrics.exports_succeeded++;
  } else {
    metrics.exports_failed++;
  }
}

// ============================================================================
// METRICS EXPORT
// ============================================================================

/**
 * Get current metrics snapshot.
 */
export function getMetrics(): AggregatorMetrics {
  return { ...metrics };
}

/**
 * Reset metrics (for testing)
 */
export function resetMetrics(): void {
  metrics = initialMetrics();
}
