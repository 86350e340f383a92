/**
 * pii-sweep - PII detection and additive write-back over an Elasticsearch index
 *
 * Library entry. The command line lives in cli.ts.
 */

// =============================================================================
// Detection
// =============================================================================

export type {
  DetectionFragment,
  DetectorDefinition,
  DetectorSpec,
  Normalizer,
  RawMatch,
  Validator,
} from "./detectors/types.js";
export { compileDetector, DetectorRegistry } from "./detectors/registry.js";
export {
  BUILTIN_DEFINITIONS,
  loadDefinitionsFile,
  mergeDefinitions,
  parseDefinitions,
} from "./detectors/definitions.js";
export {
  luhnCheck,
  mod97Check,
  normalizeSeparators,
  NORMALIZERS,
  qcPermCodeCheck,
  ramqCheck,
  resolveNormalizer,
  resolveValidator,
  toAsciiDigits,
  VALIDATORS,
} from "./detectors/rules.js";

// =============================================================================
// Retrieval
// =============================================================================

export type {
  BulkItemResult,
  DocumentStore,
  ScrollPage,
  ScrollRequest,
  StoredDocument,
  UpdateAction,
} from "./scanner/store.js";
export { ElasticsearchStore, type ElasticsearchOptions } from "./scanner/elasticsearch.js";
export { buildScanQuery, scanDocuments, type ScanOptions } from "./scanner/scanner.js";
export { extractFields, getNestedPath, getPath, type ExtractOptions, type FieldValue } from "./scanner/extract.js";
export {
  backoffDelay,
  DEFAULT_RETRY_POLICY,
  withRetry,
  type RetryHooks,
  type RetryPolicy,
} from "./scanner/retry.js";

// =============================================================================
// Pipeline
// =============================================================================

export { MatchCollector, dedupeKey, type CollectedMatches, type RetainedMatch } from "./pipeline/collector.js";
export { checkFieldMap, parseFieldMap, targetFields } from "./pipeline/field-map.js";
export {
  APPEND_IF_ABSENT_SCRIPT,
  BulkUpdater,
  buildUpdateAction,
  existingValues,
  reconcile,
} from "./pipeline/reconcile.js";
export { exitCodeFor, formatSummary, runExtraction, type RunDeps, type RunOptions } from "./pipeline/runner.js";
export type { DedupeScope, FieldMap, RunOutcome, RunSummary, UpdateBatch } from "./pipeline/types.js";

// =============================================================================
// Audit, Config, Errors
// =============================================================================

export { AUDIT_COLUMNS, MultiAuditSink, toAuditRow, type AuditRecord, type AuditSink } from "./audit/types.js";
export { CsvAuditSink } from "./audit/csv-sink.js";
export { SqliteAuditSink, type StoredRun } from "./audit/sqlite-sink.js";
export { DEFAULT_CONFIG, loadConfigFile, loadFromEnv, resolveConfig, validateConfig, type SweepConfig } from "./config.js";
export { buildRegistry, executeSweep, type SweepDeps } from "./sweep.js";
export { createLogger, silentLogger, type Logger } from "./logger.js";
export {
  ConfigurationError,
  PiiSweepError,
  ReconciliationError,
  RetrievalError,
  StoreRequestError,
} from "./errors.js";
