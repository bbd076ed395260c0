/**
 * Availability Aggregator Agent - Zod Validation Schemas
 *
 * Wire contracts shared with the reconciliation layer (event logs) and with
 * report consumers (persisted report, /report endpoint).
 *
 * Durations are milliseconds. Timestamps on the wire are ISO-8601 strings.
 */

import { z } from 'zod';

// ============================================================================
// CONSTANTS
// ============================================================================

export const AGENT_ID = 'availability-aggregator-agent' as const;
export const AGENT_VERSION = '1.0.0' as const;

// ============================================================================
// EVENT LOG SCHEMAS
// ============================================================================

/**
 * A single availability transition as written by the reconciliation layer.
 */
export const EventRecordSchema = z.object({
  available: z.boolean(),
  at: z.string().datetime({ offset: true }).transform((value) => new Date(value)),
});

/**
 * One object-store value per tracked entity.
 */
export const EventLogDocumentSchema = z.object({
  events: z.array(EventRecordSchema),
});

// ============================================================================
// SUMMARY SCHEMA
// ============================================================================

const durationMs = z.number().nonnegative();
const count = z.number().int().nonnegative();

export const SummarySchema = z.object({
  up_time_ms: durationMs,
  down_time_ms: durationMs,
  time_to_first_available_ms: durationMs,
  interruption_count: count,
  recovery_count: count,
  total_up_between_interruptions_ms: durationMs,
  mean_up_between_interruptions_ms: durationMs,
  latest_up_between_interruptions_ms: durationMs,
  total_down_between_recoveries_ms: durationMs,
  mean_down_between_recoveries_ms: durationMs,
  latest_down_between_recoveries_ms: durationMs,
}).strict();

// ============================================================================
// REPORT SCHEMA
// ============================================================================

export const ReportSchema = z.object({
  generated_at: z.string().datetime(),
  ready: z.boolean(),
  summaries: z.record(z.string(), SummarySchema),
  // Current availability per entity: the flag of its most recent record.
  up: z.record(z.string(), z.boolean()),
}).strict();

// ============================================================================
// ERROR CODES
// ============================================================================

export const ErrorCodeSchema = z.enum([
  'CONFIG_INVALID',
  'ALREADY_RUNNING',
  'SOURCE_UNAVAILABLE',
  'EVENT_LOG_NOT_FOUND',
  'EVENT_LOG_INVALID',
  'EVENT_LOG_OUT_OF_ORDER',
  'EXPORT_FAILED',
]);

// ============================================================================
// TYPE EXPORTS
// ============================================================================

export type EventRecord = Readonly<z.output<typeof EventRecordSchema>>;
export type EventLog = readonly EventRecord[];
export type EventLogDocument = z.input<typeof EventLogDocumentSchema>;
export type Summary = z.infer<typeof SummarySchema>;
export type Report = z.infer<typeof ReportSchema>;
export type ErrorCode = z.infer<typeof ErrorCodeSchema>;
