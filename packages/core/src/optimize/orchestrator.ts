/**
 * Optimization orchestration.
 * Baseline EXPLAIN → table metadata → model rewrite → read-only gate →
 * candidate EXPLAIN → improvement check, retried with repair prompts up to
 * `maxFixAttempts` times.
 */

import type { OptimizerSettings } from '../config/config.js';
import type { EngineExecutor } from '../engine/types.js';
import { runExplain, type PlanResult } from '../plan/explain.js';
import { gatherMetadata, type TableMetadata } from '../metadata/gather.js';
import { createSqlInspector, type SqlInspector } from '../sql/inspector.js';
import { formatTableName } from '../sql/tables.js';
import { buildFixPrompt, buildOptimizePrompt, type PromptLimits } from '../llm/prompt.js';
import { requestRewrite } from '../llm/output.js';
import type { RewriteModel, RiskLevel } from '../llm/types.js';
import { checkReadOnly, isImproved } from '../policy/candidate.js';
import { unifiedDiff } from './diff.js';
import { logger } from '../util/logger.js';

export interface OptimizerDeps {
  engine: EngineExecutor;
  model: RewriteModel;
  /** Defaults to the node-sql-parser inspector for `settings.sqlDialect` */
  inspector?: SqlInspector;
}

interface OutcomeBase {
  originalSql: string;
  explainBefore: PlanResult;
  /** Fully-qualified names of the referenced tables */
  tables: string[];
  metadata: TableMetadata[];
  attempts: number;
  diff: string;
  changes?: string[];
  assumptions?: string[];
  risk?: RiskLevel;
}

export interface OptimizationSuccess extends OutcomeBase {
  ok: true;
  optimizedSql: string;
  explainAfter: PlanResult;
}

export interface OptimizationFailure extends OutcomeBase {
  ok: false;
  /** Last candidate produced, if any */
  optimizedSql?: string;
  /**
   * Plan of the last candidate that reached EXPLAIN, if any. A later candidate
   * stopped by the read-only gate leaves it in place, so it may belong to an
   * earlier candidate than `optimizedSql`.
   */
  explainAfter?: PlanResult;
  error: string;
}

export type OptimizationOutcome = OptimizationSuccess | OptimizationFailure;

/** Per-run loop state; never shared between runs. */
interface AttemptState {
  attempts: number;
  candidateSql?: string;
  explainAfter?: PlanResult;
  lastError?: string;
  changes?: string[];
  assumptions?: string[];
  risk?: RiskLevel;
}

export const EMPTY_SQL_ERROR = 'Empty SQL';
export const NOT_IMPROVED_ERROR =
  'Candidate SQL is not a measurable improvement: EXPLAIN row estimate exceeds the baseline tolerance.';

function promptLimits(settings: OptimizerSettings): PromptLimits {
  return {
    planTextLimit: settings.planTextLimit,
    metadataJsonLimit: settings.metadataJsonLimit,
    maxColumnsPerTable: settings.maxColumnsPerTable,
  };
}

function rejectInput(originalSql: string, error: string): OptimizationFailure {
  return {
    ok: false,
    originalSql,
    explainBefore: { ok: false, text: '', error },
    tables: [],
    metadata: [],
    attempts: 0,
    diff: '',
    error,
  };
}

export async function optimizeSql(
  settings: OptimizerSettings,
  deps: OptimizerDeps,
  sql: string,
): Promise<OptimizationOutcome> {
  const { engine, model } = deps;
  const inspector = deps.inspector ?? createSqlInspector(settings.sqlDialect);

  // 1. Input guards
  const originalSql = sql.trim();
  if (!originalSql) {
    return rejectInput('', EMPTY_SQL_ERROR);
  }

  const inputGate = checkReadOnly(inspector, originalSql, settings.readOnlyMode, 'input');
  if (!inputGate.allowed) {
    logger.info('Input rejected by read-only gate');
    return rejectInput(originalSql, inputGate.reason);
  }

  // 2. Baseline plan
  logger.info('Optimization started', { model: model.name, maxFixAttempts: settings.maxFixAttempts });
  const explainBefore = await runExplain(engine, originalSql);
  if (!explainBefore.ok) {
    logger.warn('Baseline EXPLAIN failed; no rewrite attempted', { error: explainBefore.error });
    return {
      ok: false,
      originalSql,
      explainBefore,
      tables: [],
      metadata: [],
      attempts: 0,
      diff: '',
      error: `EXPLAIN failed for original SQL: ${explainBefore.error ?? 'unknown error'}`,
    };
  }
  logger.debug('Baseline plan obtained', { estimatedRows: explainBefore.estimatedRows });

  // 3. Tables and metadata
  const tableRefs = inspector.extractTables(originalSql);
  const tables = tableRefs.map(formatTableName);
  const metadata = await gatherMetadata(engine, tableRefs, {
    defaultCatalog: settings.defaultCatalog,
    defaultSchema: settings.defaultSchema,
    partitionCandidateNames: settings.partitionCandidateNames,
    ddlSnippetLimit: settings.ddlSnippetLimit,
  });
  logger.debug('Metadata gathered', { tables });

  // 4. Rewrite attempts
  const limits = promptLimits(settings);
  const state: AttemptState = { attempts: 0 };

  for (let i = 0; i <= settings.maxFixAttempts; i++) {
    state.attempts = i + 1;

    const prompt =
      i === 0
        ? buildOptimizePrompt({ originalSql, planText: explainBefore.text, metadata, limits })
        : buildFixPrompt({
            originalSql,
            planText: explainBefore.text,
            metadata,
            limits,
            candidateSql: state.candidateSql ?? '',
            feedback: state.lastError ?? 'Unknown failure',
          });

    const rewrite = await requestRewrite(model, prompt);
    const candidateSql = rewrite.optimizedSql?.trim();
    if (!rewrite.ok || !candidateSql) {
      state.lastError = rewrite.error ?? 'LLM returned empty output';
      logger.info(`Attempt ${state.attempts}: no usable rewrite`, { error: state.lastError });
      continue;
    }

    state.candidateSql = candidateSql;
    state.changes = rewrite.changes ?? [];
    state.assumptions = rewrite.assumptions ?? [];
    state.risk = rewrite.risk ?? 'unknown';

    const gate = checkReadOnly(inspector, candidateSql, settings.readOnlyMode, 'candidate');
    if (!gate.allowed) {
      state.lastError = gate.reason;
      logger.info(`Attempt ${state.attempts}: candidate rejected by read-only gate`);
      continue;
    }

    const explainAfter = await runExplain(engine, candidateSql);
    state.explainAfter = explainAfter;
    if (!explainAfter.ok) {
      state.lastError = `EXPLAIN failed: ${explainAfter.error ?? 'unknown error'}`;
      logger.info(`Attempt ${state.attempts}: candidate EXPLAIN failed`, { error: explainAfter.error });
      continue;
    }

    if (isImproved(explainBefore, explainAfter, settings.improvementTolerance)) {
      logger.info(`Attempt ${state.attempts}: candidate accepted`, {
        estimatedRowsBefore: explainBefore.estimatedRows,
        estimatedRowsAfter: explainAfter.estimatedRows,
      });
      return {
        ok: true,
        originalSql,
        optimizedSql: candidateSql,
        explainBefore,
        explainAfter,
        tables,
        metadata,
        attempts: state.attempts,
        diff: unifiedDiff(originalSql, candidateSql, settings.diffContextLines),
        changes: state.changes,
        assumptions: state.assumptions,
        risk: state.risk,
      };
    }

    state.lastError = NOT_IMPROVED_ERROR;
    logger.info(`Attempt ${state.attempts}: candidate not improved`, {
      estimatedRowsBefore: explainBefore.estimatedRows,
      estimatedRowsAfter: explainAfter.estimatedRows,
    });
  }

  // 5. Exhausted
  const error = state.lastError ?? 'Failed to produce a valid optimized query';
  logger.warn('Optimization gave up', { attempts: state.attempts, error });
  const failure: OptimizationFailure = {
    ok: false,
    originalSql,
    explainBefore,
    tables,
    metadata,
    attempts: state.attempts,
    diff: state.candidateSql ? unifiedDiff(originalSql, state.candidateSql, settings.diffContextLines) : '',
    error,
    changes: state.changes,
    assumptions: state.assumptions,
    risk: state.risk,
  };
  if (state.candidateSql) failure.optimizedSql = state.candidateSql;
  if (state.explainAfter) failure.explainAfter = state.explainAfter;
  return failure;
}
