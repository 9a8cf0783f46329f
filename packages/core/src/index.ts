/**
 * @querytune/core barrel export
 *
 * Core logic behind the CLI: configuration, the Trino engine handle,
 * SQL inspection, plan signals, metadata, model providers and the
 * optimization pipeline.
 */

// Configuration
export type {
  LlmProvider,
  LogLevel,
  EngineConfig,
  AzureModelConfig,
  ModelConfig,
  OptimizerSettings,
  QuerytuneConfig,
} from './config/config.js';
export { ConfigError, loadConfig, defaultOptimizerSettings, parseSessionProperties } from './config/config.js';

// Logging
export { logger, setLogLevel } from './util/logger.js';

// Engine
export type { EngineRow, EngineExecutor } from './engine/types.js';
export { TrinoExecutor, createEngineExecutor, collectRows, buildSessionProperties } from './engine/trino.js';

// SQL inspection
export type { SqlInspector } from './sql/inspector.js';
export { createSqlInspector, isQueryOnly } from './sql/inspector.js';
export type { TableReference } from './sql/tables.js';
export { extractTables, formatTableName, qualifyTable, tableRef } from './sql/tables.js';
export { normalizeSql, parseSql } from './sql/parse.js';

// Plans
export type { PlanResult } from './plan/explain.js';
export { runExplain, extractEstimatedRows, planTextFromRows } from './plan/explain.js';

// Metadata
export type { ColumnInfo, TableMetadata, TableProperties, MetadataOptions } from './metadata/gather.js';
export { gatherMetadata, inferPartitionCandidates } from './metadata/gather.js';

// Models
export * from './llm/index.js';

// Candidate gates
export type { GateResult } from './policy/candidate.js';
export { checkReadOnly, isImproved, DEFAULT_IMPROVEMENT_TOLERANCE } from './policy/candidate.js';

// Optimization
export type {
  OptimizerDeps,
  OptimizationOutcome,
  OptimizationSuccess,
  OptimizationFailure,
} from './optimize/orchestrator.js';
export { optimizeSql, EMPTY_SQL_ERROR, NOT_IMPROVED_ERROR } from './optimize/orchestrator.js';
export { unifiedDiff } from './optimize/diff.js';
export type { OptimizePayload, PlanPayload } from './optimize/payload.js';
export { toOptimizePayload, toPlanPayload } from './optimize/payload.js';
