/**
 * Availability Aggregator Agent - Aggregator
 *
 * Owns the recurring aggregation pass and the report/readiness state that
 * probes and exporters read.
 *
 * Pass:
 * 1. List every tracked entity across the event log sources; a source that
 *    cannot be listed drops only its entities
 * 2. Read and summarize each log; a bad log drops only that entity
 * 3. Freeze the new report and publish it with one assignment
 * 4. Fan the report out to every exporter; failures are logged, not raised
 *
 * Passes never overlap. Readiness flips to true after the first published
 * report and never flips back.
 */

import { setTimeout as delay } from 'node:timers/promises';
import type { Logger } from 'pino';
import type { Report, Summary } from '../contracts/schemas.js';
import { validateConfig, type Config } from './config.js';
import { AggregationError, errorMessage, isAggregationError } from './errors.js';
import { EventLogReader, type EntityRef, type EventLogSource } from './event-log-reader.js';
import { createExporters, type ExporterRegistry } from './exporters.js';
import { StoreClient } from './store-client.js';
import { isCurrentlyUp, summarize } from './summarizer.js';
import { recordEntityError, recordExport, recordPass, recordSourceError } from './telemetry.js';

export interface AggregatorOptions {
  source: EventLogSource;
  exporters: ExporterRegistry;
  intervalMs: number;
  logger: Logger;
  /** Clock used as `now` for every summary in a pass. */
  now?: () => Date;
}

function freezeReport(report: Report): Report {
  for (const summary of Object.values(report.summaries)) {
    Object.freeze(summary);
  }
  Object.freeze(report.summaries);
  Object.freeze(report.up);
  return Object.freeze(report);
}

/**
 * Resolves true after `ms`, false if the signal aborts first.
 */
async function sleep(ms: number, signal: AbortSignal): Promise<boolean> {
  try {
    await delay(ms, undefined, { signal });
    return true;
  } catch (error) {
    if (signal.aborted) return false;
    throw error;
  }
}

export class Aggregator {
  private readonly source: EventLogSource;
  private readonly exporters: ExporterRegistry;
  private readonly intervalMs: number;
  private readonly logger: Logger;
  private readonly now: () => Date;

  private currentReport: Report | null = null;
  private reportReady = false;
  private running = false;

  constructor(options: AggregatorOptions) {
    const errors: string[] = [];
    if (!Number.isFinite(options.intervalMs) || options.intervalMs <= 0) {
      errors.push(`interval must be a positive number of milliseconds (got: ${options.intervalMs})`);
    }
    for (const [name, exporter] of Object.entries(options.exporters)) {
      if (exporter.name !== name) {
        errors.push(`exporter registered as ${name} reports its name as ${exporter.name}`);
      }
    }
    if (Object.keys(options.exporters).length === 0) {
      errors.push('at least one exporter is required');
    }
    if (errors.length > 0) {
      throw new AggregationError('CONFIG_INVALID', `Invalid aggregator options: ${errors.join('; ')}`);
    }

    this.source = options.source;
    this.exporters = options.exporters;
    this.intervalMs = options.intervalMs;
    this.logger = options.logger;
    this.now = options.now ?? (() => new Date());
  }

  /**
   * True once a report has been published. Never blocks on a running pass.
   */
  isReportReady(): boolean {
    return this.reportReady;
  }

  /**
   * The latest complete report, or null before the first pass.
   */
  getReport(): Report | null {
    return this.currentReport;
  }

  /**
   * Run one pass now, then one per interval until `signal` aborts.
   * Pass failures are logged and the previous report stays current.
   */
  async start(signal: AbortSignal): Promise<void> {
    if (this.running) {
      throw new AggregationError('ALREADY_RUNNING', 'Aggregator loop is already running');
    }
    this.running = true;
    this.logger.info({ interval_ms: this.intervalMs, exporters: Object.keys(this.exporters) }, 'Aggregator started');

    try {
      while (!signal.aborted) {
        const tickStart = Date.now();

        try {
          await this.aggregate(signal);
        } catch (error) {
          if (signal.aborted) break;
          this.logger.error(
            { err: error, code: isAggregationError(error) ? error.code : undefined },
            'Aggregation pass failed, keeping previous report'
          );
        }

        const wait = Math.max(0, this.intervalMs - (Date.now() - tickStart));
        if (!(await sleep(wait, signal))) break;
      }
    } finally {
      this.running = false;
      this.logger.info('Aggregator stopped');
    }
  }

  /**
   * Run a single aggregation pass and return the report it published.
   */
  async aggregate(signal?: AbortSignal): Promise<Report> {
    const startTime = Date.now();
    const now = this.now();

    let entities: EntityRef[];
    try {
      const listing = await this.source.listEntities(signal);
      entities = listing.entities;
      for (const failure of listing.failures) {
        recordSourceError();
        this.logger.warn(
          { source: failure.source, code: failure.error.code, err: failure.error },
          'Skipping source for this pass'
        );
      }
    } catch (error) {
      recordPass(0, Date.now() - startTime, false);
      throw error;
    }

    const summaries: Record<string, Summary> = {};
    const up: Record<string, boolean> = {};
    let skipped = 0;

    for (const entity of entities) {
      signal?.throwIfAborted();

      try {
        const log = await this.source.readLog(entity, signal);
        summaries[entity.id] = summarize(log, now);
        up[entity.id] = isCurrentlyUp(log);
      } catch (error) {
        if (signal?.aborted) throw error;
        skipped++;
        recordEntityError();
        this.logger.warn(
          { entity: entity.id, code: isAggregationError(error) ? error.code : undefined, err: error },
          'Skipping entity for this pass'
        );
      }
    }

    const report = freezeReport({
      generated_at: now.toISOString(),
      ready: true,
      summaries,
      up,
    });
    this.currentReport = report;
    this.reportReady = true;

    if (!signal?.aborted) {
      await this.exportReport(report, signal);
    }

    const durationMs = Date.now() - startTime;
    recordPass(entities.length - skipped, durationMs, true);
    this.logger.info(
      { entities: entities.length - skipped, skipped, duration_ms: durationMs, generated_at: report.generated_at },
      'Aggregation pass completed'
    );

    return report;
  }

  private async exportReport(report: Report, signal?: AbortSignal): Promise<void> {
    await Promise.all(Object.entries(this.exporters).map(async ([name, exporter]) => {
      try {
        await exporter.export(report, signal);
        recordExport(true);
      } catch (error) {
        recordExport(false);
        const failure = new AggregationError(
          'EXPORT_FAILED',
          `Exporter ${name} failed: ${errorMessage(error)}`,
          { exporter: name, cause: error }
        );
        this.logger.error({ exporter: name, code: failure.code, err: error }, failure.message);
      }
    }));
  }
}

// ============================================================================
// RUNTIME FACTORY
// ============================================================================

export interface AggregatorRuntime {
  aggregator: Aggregator;
  store: StoreClient;
}

/**
 * Wire an aggregator from configuration. Throws CONFIG_INVALID when the
 * configuration cannot start a loop.
 */
export function createAggregatorRuntime(config: Config, logger: Logger): AggregatorRuntime {
  const errors = validateConfig(config);
  if (errors.length > 0) {
    throw new AggregationError('CONFIG_INVALID', `Invalid configuration: ${errors.join('; ')}`);
  }

  const store = new StoreClient(config.store);
  const aggregator = new Aggregator({
    source: new EventLogReader(store, config.sources),
    exporters: createExporters(config.exporters, { store, reportKey: config.report_key }),
    intervalMs: config.aggregation_interval_ms,
    logger,
  });

  return { aggregator, store };
}
