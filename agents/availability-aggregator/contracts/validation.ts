/**
 * Validation utilities for the Availability Aggregator Agent.
 *
 * Turns raw object-store values into typed event logs and checks the
 * ordering invariant the summarizer relies on.
 */

import { ZodError } from 'zod';
import {
  EventLogDocumentSchema,
  ReportSchema,
  type ErrorCode,
  type EventLog,
  type Report,
} from './schemas.js';

// ============================================================================
// Result Types
// ============================================================================

export interface ValidationIssue {
  path: string;
  message: string;
}

export type ValidationResult<T> =
  | { success: true; data: T }
  | { success: false; code: ErrorCode; errors: ValidationIssue[] };

function fromZodError(error: ZodError): ValidationIssue[] {
  return error.errors.map((issue) => ({
    path: issue.path.join('.'),
    message: issue.message,
  }));
}

// ============================================================================
// Event Logs
// ============================================================================

/**
 * Index of the first record whose timestamp precedes its predecessor's,
 * or -1 when the log is ordered.
 */
export function findOrderViolation(log: EventLog): number {
  for (let i = 1; i < log.length; i++) {
    const previous = log[i - 1];
    const current = log[i];
    if (previous && current && current.at.getTime() < previous.at.getTime()) {
      return i;
    }
  }
  return -1;
}

/**
 * Parse a serialized event log document.
 *
 * @example
 * ```typescript
 * const result = parseEventLog('{"events":[{"available":false,"at":"2024-01-01T00:00:00Z"}]}');
 * if (result.success) {
 *   summarize(result.data, new Date());
 * }
 * ```
 */
export function parseEventLog(raw: string): ValidationResult<EventLog> {
  let json: unknown;
  try {
    json = JSON.parse(raw);
  } catch (error) {
    return {
      success: false,
      code: 'EVENT_LOG_INVALID',
      errors: [{ path: '', message: error instanceof Error ? error.message : String(error) }],
    };
  }

  const parsed = EventLogDocumentSchema.safeParse(json);
  if (!parsed.success) {
    return { success: false, code: 'EVENT_LOG_INVALID', errors: fromZodError(parsed.error) };
  }

  const log: EventLog = parsed.data.events;
  const violation = findOrderViolation(log);
  if (violation !== -1) {
    return {
      success: false,
      code: 'EVENT_LOG_OUT_OF_ORDER',
      errors: [{
        path: `events.${violation}.at`,
        message: 'timestamp precedes the previous record',
      }],
    };
  }

  return { success: true, data: log };
}

// ============================================================================
// Reports
// ============================================================================

export function validateReport(input: unknown): ValidationResult<Report> {
  const parsed = ReportSchema.safeParse(input);
  if (!parsed.success) {
    return { success: false, code: 'EXPORT_FAILED', errors: fromZodError(parsed.error) };
  }
  return { success: true, data: parsed.data };
}
