/**
 * Availability Aggregator Agent - Summarizer
 *
 * Reduces one entity's event log to its reliability summary.
 *
 * Timeline model:
 * - The first record must be unavailable; it anchors time zero at the start
 *   of the provisioning wait. Unanchored or empty logs yield a zero summary.
 * - The walk alternates between Down and Up phases. Only phase changes fire
 *   events; repeated flags keep accruing to the open interval.
 * - Down -> Up ends the provisioning wait the first time, a recovery after.
 * - Up -> Down always ends an interruption.
 * - The interval still open at `now` counts towards up/down time only.
 */

import type { EventLog, Summary } from '../contracts/schemas.js';

type Phase = 'down' | 'up';

/**
 * The all-zero summary returned for logs without a timeline.
 */
export function emptySummary(): Summary {
  return {
    up_time_ms: 0,
    down_time_ms: 0,
    time_to_first_available_ms: 0,
    interruption_count: 0,
    recovery_count: 0,
    total_up_between_interruptions_ms: 0,
    mean_up_between_interruptions_ms: 0,
    latest_up_between_interruptions_ms: 0,
    total_down_between_recoveries_ms: 0,
    mean_down_between_recoveries_ms: 0,
    latest_down_between_recoveries_ms: 0,
  };
}

/**
 * Whether the log starts with an unavailable record.
 */
export function isAnchored(log: EventLog): boolean {
  const first = log[0];
  return first !== undefined && !first.available;
}

/**
 * Summarize an event log as of `now`. Pure and total.
 */
export function summarize(log: EventLog, now: Date): Summary {
  const summary = emptySummary();
  const first = log[0];
  if (first === undefined || first.available) {
    return summary;
  }

  let phase: Phase = 'down';
  let intervalStart = first.at.getTime();
  let hasBeenUpOnce = false;

  for (const record of log.slice(1)) {
    const next: Phase = record.available ? 'up' : 'down';
    if (next === phase) {
      continue;
    }

    const elapsed = record.at.getTime() - intervalStart;

    if (phase === 'down') {
      summary.down_time_ms += elapsed;
      if (!hasBeenUpOnce) {
        summary.time_to_first_available_ms = elapsed;
      } else {
        summary.total_down_between_recoveries_ms += elapsed;
        summary.latest_down_between_recoveries_ms = elapsed;
        summary.recovery_count++;
      }
      hasBeenUpOnce = true;
    } else {
      summary.up_time_ms += elapsed;
      summary.total_up_between_interruptions_ms += elapsed;
      summary.latest_up_between_interruptions_ms = elapsed;
      summary.interruption_count++;
    }

    phase = next;
    intervalStart = record.at.getTime();
  }

  // Clock skew can put `now` before the last record.
  const trailing = Math.max(0, now.getTime() - intervalStart);
  if (phase === 'up') {
    summary.up_time_ms += trailing;
  } else {
    summary.down_time_ms += trailing;
  }

  summary.mean_up_between_interruptions_ms = summary.interruption_count > 0
    ? summary.total_up_between_interruptions_ms / summary.interruption_count
    : 0;
  summary.mean_down_between_recoveries_ms = summary.recovery_count > 0
    ? summary.total_down_between_recoveries_ms / summary.recovery_count
    : 0;

  return summary;
}

/**
 * Current availability: the flag of the most recent record.
 */
export function isCurrentlyUp(log: EventLog): boolean {
  return log[log.length - 1]?.available ?? false;
}
