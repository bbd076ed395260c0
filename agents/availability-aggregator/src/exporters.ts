/**
 * Availability Aggregator Agent - Report Exporters
 *
 * Sinks the aggregator fans each new report out to. Every export fully
 * replaces what the sink published before.
 */

import type { Writable } from 'node:stream';
import type { Report } from '../contracts/schemas.js';
import { isExporterName } from './config.js';
import { AggregationError } from './errors.js';
import type { ObjectStore } from './store-client.js';

// ============================================================================
// EXPORTER INTERFACE
// ============================================================================

export interface Exporter {
  readonly name: string;
  export(report: Report, signal?: AbortSignal): Promise<void>;
}

export type ExporterRegistry = Record<string, Exporter>;

// ============================================================================
// PERSISTENT STORE EXPORTER
// ============================================================================

/**
 * Writes the serialized report to one well-known object-store key.
 * Last writer wins.
 */
export class StoreExporter implements Exporter {
  readonly name = 'store';
  private readonly store: ObjectStore;
  private readonly key: string;

  constructor(store: ObjectStore, key: string) {
    this.store = store;
    this.key = key;
  }

  async export(report: Report, signal?: AbortSignal): Promise<void> {
    await this.store.put(this.key, JSON.stringify(report, null, 2), signal);
  }
}

// ============================================================================
// DIAGNOSTIC EXPORTER
// ============================================================================

/**
 * Render a duration as hours, minutes and seconds, e.g. `1h0m0s`, `1m30s`, `1.5s`.
 */
export function formatDuration(ms: number): string {
  if (ms <= 0) return '0s';

  const hours = Math.floor(ms / 3_600_000);
  const minutes = Math.floor((ms % 3_600_000) / 60_000);
  const seconds = (ms % 60_000) / 1000;

  if (hours > 0) return `${hours}h${minutes}m${seconds}s`;
  if (minutes > 0) return `${minutes}m${seconds}s`;
  return `${seconds}s`;
}

/**
 * One header line, then one line per entity sorted by ID.
 */
export function renderReport(report: Report): string[] {
  const ids = Object.keys(report.summaries).sort();
  const lines = [`availability report generated_at=${report.generated_at} entities=${ids.length}`];

  for (const id of ids) {
    const summary = report.summaries[id];
    if (!summary) continue;
    lines.push([
      id,
      `up=${report.up[id] ?? false}`,
      `up_time=${formatDuration(summary.up_time_ms)}`,
      `down_time=${formatDuration(summary.down_time_ms)}`,
      `time_to_first_available=${formatDuration(summary.time_to_first_available_ms)}`,
      `interruptions=${summary.interruption_count}`,
      `recoveries=${summary.recovery_count}`,
      `mean_up_between_interruptions=${formatDuration(summary.mean_up_between_interruptions_ms)}`,
      `mean_down_between_recoveries=${formatDuration(summary.mean_down_between_recoveries_ms)}`,
    ].join(' '));
  }

  return lines;
}

export class StdoutExporter implements Exporter {
  readonly name = 'stdout';
  private readonly stream: Writable;

  constructor(stream: Writable = process.stdout) {
    this.stream = stream;
  }

  async export(report: Report): Promise<void> {
    const text = `${renderReport(report).join('\n')}\n`;
    await new Promise<void>((resolve, reject) => {
      this.stream.write(text, (error) => (error ? reject(error) : resolve()));
    });
  }
}

// ============================================================================
// REGISTRY
// ============================================================================

export interface ExporterDependencies {
  store: ObjectStore;
  reportKey: string;
  stdout?: Writable;
}

/**
 * Build the registry for the enabled exporter names.
 */
export function createExporters(names: readonly string[], deps: ExporterDependencies): ExporterRegistry {
  const registry: ExporterRegistry = {};

  for (const name of names) {
    if (!isExporterName(name)) {
      throw new AggregationError('CONFIG_INVALID', `Unknown exporter: ${name}`, { exporter: name });
    }
    switch (name) {
      case 'store':
        registry[name] = new StoreExporter(deps.store, deps.reportKey);
        break;
      case 'stdout':
        registry[name] = new StdoutExporter(deps.stdout);
        break;
    }
  }

  return registry;
}
