/**
 * Availability Aggregator Agent - Aggregator Tests
 *
 * Pass assembly, failure isolation, readiness and the timer loop.
 */

import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { pino } from 'pino';
import { Aggregator, createAggregatorRuntime } from '../src/aggregator.js';
import { EventLogReader, type EventLogSource } from '../src/event-log-reader.js';
import { StoreExporter, type Exporter } from '../src/exporters.js';
import { AggregationError } from '../src/errors.js';
import { emptySummary } from '../src/summarizer.js';
import { getMetrics, resetMetrics } from '../src/telemetry.js';
import { loadConfig, resetConfig } from '../src/config.js';
import { validateReport } from '../contracts/validation.js';
import type { EventLog, Report } from '../contracts/schemas.js';
import { HOUR, MemoryStore, T0, at } from './support/memory-store.js';

const logger = pino({ level: 'silent' });
const REPORT_KEY = 'reports/availability-report.json';
const SOURCES = [
  { name: 'jobsets', prefix: 'events/jobsets/' },
  { name: 'nodes', prefix: 'events/nodes/' },
];
const NOW = new Date(T0.getTime() + 3 * HOUR);

class RecordingExporter implements Exporter {
  readonly name: string;
  readonly reports: Report[] = [];

  constructor(name: string) {
    this.name = name;
  }

  async export(report: Report): Promise<void> {
    this.reports.push(report);
  }
}

class FailingExporter implements Exporter {
  readonly name = 'broken';
  calls = 0;

  async export(): Promise<void> {
    this.calls++;
    throw new Error('sink unreachable');
  }
}

function seededStore(): MemoryStore {
  const store = new MemoryStore();
  store.putLog('events/jobsets/default.trainer', {
    events: [
      { available: false, at: at(0) },
      { available: true, at: at(HOUR) },
      { available: false, at: at(2 * HOUR) },
      { available: true, at: at(3 * HOUR) },
    ],
  });
  store.putLog('events/nodes/node-a', {
    events: [{ available: false, at: at(0) }],
  });
  return store;
}

function createAggregator(
  store: MemoryStore,
  exporters: Exporter[] = [new RecordingExporter('recorder')],
  intervalMs = 1000
): Aggregator {
  return new Aggregator({
    source: new EventLogReader(store, SOURCES),
    exporters: Object.fromEntries(exporters.map((exporter) => [exporter.name, exporter])),
    intervalMs,
    logger,
    now: () => NOW,
  });
}

describe('Aggregator', () => {
  beforeEach(() => {
    resetMetrics();
  });

  describe('aggregate', () => {
    it('summarizes every tracked entity into one report', async () => {
      const aggregator = createAggregator(seededStore());

      const report = await aggregator.aggregate();

      expect(report).toEqual({
        generated_at: '2024-03-01T03:00:00.000Z',
        ready: true,
        summaries: {
          'jobsets/default.trainer': {
            ...emptySummary(),
            up_time_ms: HOUR,
            down_time_ms: 2 * HOUR,
            time_to_first_available_ms: HOUR,
            interruption_count: 1,
            recovery_count: 1,
            total_up_between_interruptions_ms: HOUR,
            mean_up_between_interruptions_ms: HOUR,
            latest_up_between_interruptions_ms: HOUR,
            total_down_between_recoveries_ms: HOUR,
            mean_down_between_recoveries_ms: HOUR,
            latest_down_between_recoveries_ms: HOUR,
          },
          'nodes/node-a': { ...emptySummary(), down_time_ms: 3 * HOUR },
        },
        up: {
          'jobsets/default.trainer': true,
          'nodes/node-a': false,
        },
      });
      expect(aggregator.getReport()).toBe(report);
    });

    it('publishes a frozen report', async () => {
      const aggregator = createAggregator(seededStore());

      const report = await aggregator.aggregate();

      expect(Object.isFrozen(report)).toBe(true);
      expect(Object.isFrozen(report.summaries)).toBe(true);
      expect(Object.isFrozen(report.summaries['nodes/node-a'])).toBe(true);
    });

    it('persists the report through the store exporter', async () => {
      const store = seededStore();
      const aggregator = createAggregator(store, [new StoreExporter(store, REPORT_KEY)]);

      const report = await aggregator.aggregate();

      const persisted = validateReport(JSON.parse(store.objects.get(REPORT_KEY) ?? 'null'));
      expect(persisted).toEqual({ success: true, data: report });
    });

    it('omits entities whose logs cannot be read or parsed', async () => {
      const store = seededStore();
      store.objects.set('events/nodes/node-corrupt', '{"events": [');
      store.putLog('events/nodes/node-unordered', {
        events: [
          { available: false, at: at(HOUR) },
          { available: true, at: at(0) },
        ],
      });
      store.putLog('events/nodes/node-flaky', { events: [{ available: false, at: at(0) }] });
      store.failingGets.add('events/nodes/node-flaky');
      const aggregator = createAggregator(store);

      const report = await aggregator.aggregate();

      expect(Object.keys(report.summaries).sort()).toEqual(['jobsets/default.trainer', 'nodes/node-a']);
      expect(aggregator.isReportReady()).toBe(true);
      expect(getMetrics()).toMatchObject({
        passes_total: 1,
        entities_summarized: 2,
        entity_errors: 3,
      });
    });

    it('runs every exporter even when one fails', async () => {
      const broken = new FailingExporter();
      const recorder = new RecordingExporter('recorder');
      const aggregator = createAggregator(seededStore(), [broken, recorder]);

      const report = await aggregator.aggregate();

      expect(broken.calls).toBe(1);
      expect(recorder.reports).toEqual([report]);
      expect(getMetrics()).toMatchObject({ exports_succeeded: 1, exports_failed: 1 });
    });

    it('publishes a partial report when one source cannot be listed', async () => {
      const store = seededStore();
      store.failingPrefixes.add('events/nodes/');
      const recorder = new RecordingExporter('recorder');
      const aggregator = createAggregator(store, [recorder]);

      const report = await aggregator.aggregate();

      expect(Object.keys(report.summaries)).toEqual(['jobsets/default.trainer']);
      expect(report.up).toEqual({ 'jobsets/default.trainer': true });
      expect(aggregator.isReportReady()).toBe(true);
      expect(recorder.reports).toEqual([report]);
      expect(getMetrics()).toMatchObject({
        passes_total: 1,
        pass_failures: 0,
        entities_summarized: 1,
        source_errors: 1,
      });
    });

    it('keeps the previous report when no source can be listed', async () => {
      const store = seededStore();
      const aggregator = createAggregator(store);
      const first = await aggregator.aggregate();

      store.failingPrefixes.add('events/jobsets/');
      store.failingPrefixes.add('events/nodes/');
      const error = await aggregator.aggregate().catch((e: unknown) => e);

      expect(error).toBeInstanceOf(AggregationError);
      expect(error).toHaveProperty('code', 'SOURCE_UNAVAILABLE');
      expect(aggregator.getReport()).toBe(first);
      expect(aggregator.isReportReady()).toBe(true);
      expect(getMetrics()).toMatchObject({ passes_total: 2, pass_failures: 1 });
    });

    it('is not ready while no pass has succeeded', async () => {
      const store = seededStore();
      store.failingPrefixes.add('events/jobsets/');
      store.failingPrefixes.add('events/nodes/');
      const aggregator = createAggregator(store);

      expect(aggregator.isReportReady()).toBe(false);
      await expect(aggregator.aggregate()).rejects.toThrow(AggregationError);
      expect(aggregator.isReportReady()).toBe(false);
      expect(aggregator.getReport()).toBeNull();
    });

    it('serves the previous complete report while a pass is in flight', async () => {
      const log: EventLog = [{ available: false, at: T0 }];
      let blocking = false;
      let reads = 0;
      let release: () => void = () => undefined;
      const gate = new Promise<void>((resolve) => {
        release = resolve;
      });
      const source: EventLogSource = {
        listEntities: async () => ({
          entities: [{ id: 'nodes/node-a', source: 'nodes', key: 'events/nodes/node-a' }],
          failures: [],
        }),
        readLog: async () => {
          reads++;
          if (blocking) await gate;
          return log;
        },
      };
      let clock = NOW;
      const aggregator = new Aggregator({
        source,
        exporters: { recorder: new RecordingExporter('recorder') },
        intervalMs: 1000,
        logger,
        now: () => clock,
      });

      const first = await aggregator.aggregate();
      blocking = true;
      clock = new Date(NOW.getTime() + HOUR);
      const pending = aggregator.aggregate();
      await vi.waitFor(() => expect(reads).toBe(2));

      expect(aggregator.getReport()).toBe(first);
      expect(aggregator.getReport()?.generated_at).toBe('2024-03-01T03:00:00.000Z');

      release();
      const second = await pending;

      expect(aggregator.getReport()).toBe(second);
      expect(second.generated_at).toBe('2024-03-01T04:00:00.000Z');
      expect(second.summaries['nodes/node-a']?.down_time_ms).toBe(4 * HOUR);
    });

    it('abandons a pass when the signal aborts between entities', async () => {
      const controller = new AbortController();
      const source: EventLogSource = {
        listEntities: async () => ({
          entities: [
            { id: 'nodes/a', source: 'nodes', key: 'events/nodes/a' },
            { id: 'nodes/b', source: 'nodes', key: 'events/nodes/b' },
          ],
          failures: [],
        }),
        readLog: async () => {
          controller.abort();
          return [{ available: false, at: T0 }];
        },
      };
      const recorder = new RecordingExporter('recorder');
      const aggregator = new Aggregator({ source, exporters: { recorder }, intervalMs: 1000, logger });

      await expect(aggregator.aggregate(controller.signal)).rejects.toThrow();
      expect(aggregator.getReport()).toBeNull();
      expect(recorder.reports).toHaveLength(0);
    });
  });

  describe('start', () => {
    it('runs a pass immediately and keeps ticking until aborted', async () => {
      const recorder = new RecordingExporter('recorder');
      const aggregator = createAggregator(seededStore(), [recorder], 5);
      const controller = new AbortController();

      const running = aggregator.start(controller.signal);
      await vi.waitFor(() => expect(recorder.reports.length).toBeGreaterThanOrEqual(3));
      controller.abort();

      await expect(running).resolves.toBeUndefined();
      expect(aggregator.isReportReady()).toBe(true);
    });

    it('keeps reporting the healthy source while another stays down', async () => {
      const store = seededStore();
      store.failingPrefixes.add('events/nodes/');
      const recorder = new RecordingExporter('recorder');
      const aggregator = createAggregator(store, [recorder], 5);
      const controller = new AbortController();

      const running = aggregator.start(controller.signal);
      await vi.waitFor(() => expect(recorder.reports.length).toBeGreaterThanOrEqual(2));
      controller.abort();
      await running;

      expect(aggregator.isReportReady()).toBe(true);
      expect(Object.keys(aggregator.getReport()?.summaries ?? {})).toEqual(['jobsets/default.trainer']);
    });

    it('keeps running after a failed pass and becomes ready once one succeeds', async () => {
      const store = seededStore();
      store.failingPrefixes.add('events/jobsets/');
      store.failingPrefixes.add('events/nodes/');
      const aggregator = createAggregator(store, [new RecordingExporter('recorder')], 5);
      const controller = new AbortController();

      const running = aggregator.start(controller.signal);
      await vi.waitFor(() => expect(getMetrics().pass_failures).toBeGreaterThanOrEqual(2));
      expect(aggregator.isReportReady()).toBe(false);

      store.failingPrefixes.clear();
      await vi.waitFor(() => expect(aggregator.isReportReady()).toBe(true));

      store.failingPrefixes.add('events/jobsets/');
      store.failingPrefixes.add('events/nodes/');
      const failuresBefore = getMetrics().pass_failures;
      await vi.waitFor(() => expect(getMetrics().pass_failures).toBeGreaterThan(failuresBefore));
      expect(aggregator.isReportReady()).toBe(true);

      controller.abort();
      await running;
    });

    it('refuses to start twice', async () => {
      const aggregator = createAggregator(seededStore(), undefined, 1000);
      const controller = new AbortController();

      const running = aggregator.start(controller.signal);
      await expect(aggregator.start(controller.signal)).rejects.toMatchObject({ code: 'ALREADY_RUNNING' });

      controller.abort();
      await running;
    });

    it('returns at once when the signal is already aborted', async () => {
      const recorder = new RecordingExporter('recorder');
      const aggregator = createAggregator(seededStore(), [recorder]);

      await aggregator.start(AbortSignal.abort());

      expect(recorder.reports).toHaveLength(0);
    });
  });

  describe('construction', () => {
    it('rejects a non-positive interval', () => {
      expect(() => createAggregator(seededStore(), undefined, 0)).toThrow(AggregationError);
    });

    it('rejects an empty exporter registry', () => {
      expect(() => createAggregator(seededStore(), [])).toThrow('at least one exporter is required');
    });

    it('rejects exporters registered under another name', () => {
      expect(() => new Aggregator({
        source: new EventLogReader(seededStore(), SOURCES),
        exporters: { sink: new RecordingExporter('recorder') },
        intervalMs: 1000,
        logger,
      })).toThrow('exporter registered as sink reports its name as recorder');
    });
  });
});

describe('createAggregatorRuntime', () => {
  beforeEach(() => {
    resetConfig();
  });

  afterEach(() => {
    vi.unstubAllEnvs();
    resetConfig();
  });

  it('wires an aggregator from the environment', () => {
    vi.stubEnv('EXPORTERS', 'stdout');

    const runtime = createAggregatorRuntime(loadConfig(), logger);

    expect(runtime.aggregator.isReportReady()).toBe(false);
    expect(runtime.store.getPoolStats().max).toBe(5);
  });

  it('fails fast on invalid configuration', () => {
    vi.stubEnv('EXPORTERS', 'stdout,pagerduty');

    expect(() => createAggregatorRuntime(loadConfig(), logger)).toThrow(
      'Invalid configuration: EXPORTERS entries must be one of: store, stdout (got: pagerduty)'
    );
  });
});
