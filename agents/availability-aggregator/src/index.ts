/**
 * Availability Aggregator Agent - Main Exports
 *
 * Turns per-entity availability event logs into reliability reports on a
 * fixed cadence and publishes them through pluggable exporters.
 */

// ============================================================================
// CONTRACTS
// ============================================================================

export {
  // Constants
  AGENT_ID,
  AGENT_VERSION,

  // Schemas
  EventRecordSchema,
  EventLogDocumentSchema,
  SummarySchema,
  ReportSchema,
  ErrorCodeSchema,

  // Validation
  findOrderViolation,
  parseEventLog,
  validateReport,

  // Types
  type EventRecord,
  type EventLog,
  type EventLogDocument,
  type Summary,
  type Report,
  type ErrorCode,
  type ValidationIssue,
  type ValidationResult,
} from '../contracts/index.js';

// ============================================================================
// CONFIGURATION
// ============================================================================

export {
  loadConfig,
  resetConfig,
  validateConfig,
  parseSources,
  isExporterName,
  EXPORTER_NAMES,
  type Config,
  type EventLogSourceConfig,
  type ExporterName,
  type LogLevel,
  type StoreConfig,
  type TelemetryConfig,
} from './config.js';

// ============================================================================
// SUMMARIZER
// ============================================================================

export {
  summarize,
  emptySummary,
  isAnchored,
  isCurrentlyUp,
} from './summarizer.js';

// ============================================================================
// OBJECT STORE & EVENT LOGS
// ============================================================================

export {
  StoreClient,
  StoreRequestError,
  type ObjectStore,
  type StoreHealthStatus,
} from './store-client.js';

export {
  EventLogReader,
  type EntityRef,
  type EntityListing,
  type EventLogSource,
  type SourceFailure,
} from './event-log-reader.js';

// ============================================================================
// EXPORTERS
// ============================================================================

export {
  StoreExporter,
  StdoutExporter,
  createExporters,
  formatDuration,
  renderReport,
  type Exporter,
  type ExporterRegistry,
  type ExporterDependencies,
} from './exporters.js';

// ============================================================================
// AGGREGATOR
// ============================================================================

export {
  Aggregator,
  createAggregatorRuntime,
  type AggregatorOptions,
  type AggregatorRuntime,
} from './aggregator.js';

// ============================================================================
// ERRORS & TELEMETRY
// ============================================================================

export {
  AggregationError,
  isAggregationError,
  errorMessage,
  type AggregationErrorContext,
} from './errors.js';

export {
  createLogger,
  recordPass,
  recordEntityError,
  recordSourceError,
  recordExport,
  getMetrics,
  resetMetrics,
  type AggregatorMetrics,
} from './telemetry.js';
