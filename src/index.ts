/**
 * Module: Package Entry Point
 * Purpose: Public API of the reference table ingestion core.
 * - `createIngestionCore()` wires config, registry, store and version manager.
 * - Lower-level pieces (header resolution, row transformation, readers) are exported
 *   for callers that only need to preview or validate a file.
 */
export * from "./types.js";
export * from "./errors.js";
export { createIngestionCore, IngestionCore, type IngestionCoreOptions } from "./ingest.js";
export { initEnv, loadConfig, type IngestConfig } from "./config.js";
export {
  SourceRegistry,
  DataSourceConfigSchema,
  DEFAULT_SOURCES_URL,
  parseSourceConfig,
  parseSourceConfigs,
  loadSourceConfigsFromFile,
  isAdditiveAliasChange,
  type DataSourceConfigInput,
  type SourceRegistryOptions,
} from "./registry.js";
export {
  normalizeHeader,
  resolveHeaders,
  detectHeaderRow,
  type DuplicateHeader,
  type HeaderResolution,
  type HeaderRowDetection,
} from "./headers.js";
export { transformRow, transformRecords, keyOf, type TransformedRow, type LocatedRow } from "./transform.js";
export { coerceValue, parseDateFlexible, applySpecialValues } from "./sanitize.js";
export { readTabular, SUPPORTED_EXTENSIONS } from "./tabular.js";
export { buildReport, columnStats, summarizeReport, type RowCounters } from "./report.js";
export { SqliteVersionStore, currentViewName } from "./store.js";
export { logger, createLogger } from "./logger.js";
