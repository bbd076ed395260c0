/**
 * Availability Aggregator Agent - Configuration
 *
 * Loads configuration from environment variables with sensible defaults.
 */

import { AGENT_ID, AGENT_VERSION } from '../contracts/schemas.js';

// ============================================================================
// EVENT LOG SOURCES
// ============================================================================

/**
 * A family of event logs stored under one key prefix, e.g. all JobSets.
 */
export interface EventLogSourceConfig {
  name: string;
  prefix: string;
}

// ============================================================================
// OBJECT STORE CLIENT CONFIGURATION
// ============================================================================

export interface StoreConfig {
  endpoint: string;
  apiKey: string;
  timeout_ms: number;
  max_retries: number;
  retry_base_delay_ms: number;
  pool_size: number;
}

// ============================================================================
// EXPORTERS
// ============================================================================

export const EXPORTER_NAMES = ['store', 'stdout'] as const;
export type ExporterName = (typeof EXPORTER_NAMES)[number];

export function isExporterName(value: string): value is ExporterName {
  return (EXPORTER_NAMES as readonly string[]).includes(value);
}

// ============================================================================
// TELEMETRY CONFIGURATION
// ============================================================================

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

const LOG_LEVELS: readonly LogLevel[] = ['debug', 'info', 'warn', 'error'];

export interface TelemetryConfig {
  log_level: LogLevel;
}

// ============================================================================
// COMPLETE CONFIGURATION
// ============================================================================

export interface Config {
  agent: {
    id: string;
    version: string;
  };
  aggregation_interval_ms: number;
  sources: EventLogSourceConfig[];
  report_key: string;
  // Raw names as configured; validateConfig rejects unknown ones.
  exporters: string[];
  store: StoreConfig;
  telemetry: TelemetryConfig;
}

// ============================================================================
// DEFAULT VALUES
// ============================================================================

const DEFAULT_AGGREGATION_INTERVAL_MS = 10_000;
const DEFAULT_SOURCES = 'jobsets=events/jobsets/,nodes=events/nodes/';
const DEFAULT_REPORT_KEY = 'reports/availability-report.json';
const DEFAULT_EXPORTERS = 'store,stdout';

// ============================================================================
// ENVIRONMENT VARIABLE PARSING
// ============================================================================

function getEnv(key: string, defaultValue: string): string {
  return process.env[key] ?? defaultValue;
}

function getEnvInt(key: string, defaultValue: number): number {
  const value = process.env[key];
  if (value === undefined) return defaultValue;
  const parsed = parseInt(value, 10);
  return isNaN(parsed) ? defaultValue : parsed;
}

function getEnvList(key: string, defaultValue: string): string[] {
  return getEnv(key, defaultValue)
    .split(',')
    .map((item) => item.trim())
    .filter((item) => item.length > 0);
}

function getLogLevel(): LogLevel {
  const value = getEnv('LOG_LEVEL', 'info').toLowerCase();
  return LOG_LEVELS.find((level) => level === value) ?? 'info';
}

/**
 * Parse `name=prefix` pairs. Entries without `=` use the prefix as the name.
 */
export function parseSources(value: string): EventLogSourceConfig[] {
  return value
    .split(',')
    .map((entry) => entry.trim())
    .filter((entry) => entry.length > 0)
    .map((entry) => {
      const separator = entry.indexOf('=');
      if (separator === -1) {
        return { name: entry.replace(/\/+$/, ''), prefix: entry };
      }
      return {
        name: entry.slice(0, separator).trim(),
        prefix: entry.slice(separator + 1).trim(),
      };
    });
}

// ============================================================================
// CONFIGURATION LOADER
// ============================================================================

let cachedConfig: Config | null = null;

/**
 * Load configuration from environment variables.
 * Configuration is cached after first load.
 */
export function loadConfig(): Config {
  if (cachedConfig) {
    return cachedConfig;
  }

  const config: Config = {
    agent: {
      id: getEnv('AGENT_ID', AGENT_ID),
      version: getEnv('AGENT_VERSION', AGENT_VERSION),
    },

    aggregation_interval_ms: getEnvInt('AGGREGATION_INTERVAL_MS', DEFAULT_AGGREGATION_INTERVAL_MS),
    sources: parseSources(getEnv('EVENT_LOG_SOURCES', DEFAULT_SOURCES)),
    report_key: getEnv('REPORT_KEY', DEFAULT_REPORT_KEY),
    exporters: getEnvList('EXPORTERS', DEFAULT_EXPORTERS),

    store: {
      endpoint: getEnv('STORE_ENDPOINT', 'http://localhost:9000'),
      apiKey: getEnv('STORE_API_KEY', ''),
      timeout_ms: getEnvInt('STORE_TIMEOUT_MS', 5000),
      max_retries: getEnvInt('STORE_MAX_RETRIES', 3),
      retry_base_delay_ms: getEnvInt('STORE_RETRY_BASE_DELAY_MS', 250),
      pool_size: getEnvInt('STORE_POOL_SIZE', 5),
    },

    telemetry: {
      log_level: getLogLevel(),
    },
  };

  cachedConfig = config;
  return config;
}

/**
 * Reset cached configuration (for testing)
 */
export function resetConfig(): void {
  cachedConfig = null;
}

/**
 * Check a configuration for values that make startup impossible.
 * Returns one message per problem; empty when the configuration is usable.
 */
export function validateConfig(config: Config): string[] {
  const errors: string[] = [];

  if (config.aggregation_interval_ms <= 0) {
    errors.push(`AGGREGATION_INTERVAL_MS must be positive (got: ${config.aggregation_interval_ms})`);
  }

  if (config.sources.length === 0) {
    errors.push('EVENT_LOG_SOURCES must name at least one source');
  }

  const names = new Set<string>();
  for (const source of config.sources) {
    if (!source.name || !source.prefix) {
      errors.push(`EVENT_LOG_SOURCES entry needs a name and a prefix (got: ${source.name}=${source.prefix})`);
    }
    if (names.has(source.name)) {
      errors.push(`EVENT_LOG_SOURCES names must be unique (duplicate: ${source.name})`);
    }
    names.add(source.name);
  }

  if (config.exporters.length === 0) {
    errors.push('EXPORTERS must enable at least one exporter');
  }
  for (const name of config.exporters) {
    if (!isExporterName(name)) {
      errors.push(`EXPORTERS entries must be one of: ${EXPORTER_NAMES.join(', ')} (got: ${name})`);
    }
  }

  if (config.exporters.includes('store') && !config.report_key) {
    errors.push('REPORT_KEY is required when the store exporter is enabled');
  }

  if (!config.store.endpoint) {
    errors.push('STORE_ENDPOINT is required');
  }

  if (config.store.pool_size <= 0) {
    errors.push(`STORE_POOL_SIZE must be positive (got: ${config.store.pool_size})`);
  }

  return errors;
}
