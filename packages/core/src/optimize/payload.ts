/**
 * Outward JSON shape of an optimization outcome, as the CLI prints it.
 * Keys are snake_case; absent values are `null` rather than missing.
 */

import type { PlanResult } from '../plan/explain.js';
import { formatTableName } from '../sql/tables.js';
import type { OptimizationOutcome } from './orchestrator.js';

export interface PlanPayload {
  ok: boolean;
  error: string | null;
  text: string;
  estimated_rows: number | null;
}

export interface OptimizePayload {
  ok: boolean;
  attempts: number;
  tables: string[];
  llm: {
    risk: string | null;
    changes: string[];
    assumptions: string[];
  };
  original_sql: string;
  optimized_sql: string | null;
  diff: string;
  explain_before: PlanPayload;
  explain_after: PlanPayload | null;
  metadata: Array<{
    table: string;
    partition_candidates: string[];
    columns: Array<{ name: string; type: string }>;
  }>;
  error: string | null;
}

export function toPlanPayload(plan: PlanResult): PlanPayload {
  return {
    ok: plan.ok,
    error: plan.error ?? null,
    text: plan.text,
    estimated_rows: plan.estimatedRows ?? null,
  };
}

export function toOptimizePayload(outcome: OptimizationOutcome): OptimizePayload {
  return {
    ok: outcome.ok,
    attempts: outcome.attempts,
    tables: outcome.tables,
    llm: {
      risk: outcome.risk ?? null,
      changes: outcome.changes ?? [],
      assumptions: outcome.assumptions ?? [],
    },
    original_sql: outcome.originalSql,
    optimized_sql: outcome.optimizedSql ?? null,
    diff: outcome.diff,
    explain_before: toPlanPayload(outcome.explainBefore),
    explain_after: outcome.explainAfter ? toPlanPayload(outcome.explainAfter) : null,
    metadata: outcome.metadata.map((tm) => ({
      table: formatTableName(tm.table),
      partition_candidates: tm.partitionCandidates,
      columns: tm.columns.map((c) => ({ name: c.name, type: c.type })),
    })),
    error: outcome.ok ? null : outcome.error,
  };
}
