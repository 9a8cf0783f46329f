/**
 * Plan signal extraction: ask the engine to EXPLAIN a statement and scrape
 * the few numeric signals the plan text reliably carries.
 */

import type { EngineExecutor, EngineRow } from '../engine/types.js';
import { normalizeSql } from '../sql/parse.js';

export interface PlanResult {
  ok: boolean;
  /** Plan text, one line per plan fragment row; empty when `ok` is false */
  text: string;
  error?: string;
  /** Row-count estimate of the first estimate block, when one could be read */
  estimatedRows?: number;
}

// Trino prints estimates as `Estimates: {rows: 1000 (8.79kB), ...}`;
// unknown estimates print as `rows: ?` and do not match.
const ROWS_ESTIMATE_RE = /\brows:\s*([0-9]+(?:\.[0-9]+)?(?:[eE][+-]?[0-9]+)?)/;

/**
 * Run `EXPLAIN <sql>` and return the plan. Engine failures become a
 * PlanResult with `ok: false`; this function never rejects.
 */
export async function runExplain(engine: EngineExecutor, sql: string): Promise<PlanResult> {
  let rows: EngineRow[];
  try {
    rows = await engine.execute(`EXPLAIN ${normalizeSql(sql)}`);
  } catch (err: unknown) {
    const msg = err instanceof Error ? err.message : String(err);
    return { ok: false, text: '', error: msg };
  }

  const text = planTextFromRows(rows);
  const result: PlanResult = { ok: true, text };
  const estimatedRows = extractEstimatedRows(text);
  if (estimatedRows !== undefined) {
    result.estimatedRows = estimatedRows;
  }
  return result;
}

/** First column of every row, null rows skipped, joined by newlines. */
export function planTextFromRows(rows: readonly EngineRow[]): string {
  const lines: string[] = [];
  for (const row of rows) {
    const first = row[0];
    if (first === null || first === undefined) continue;
    lines.push(String(first));
  }
  return lines.join('\n');
}

/** Advisory: undefined when no estimate is present or it is not a finite number. */
export function extractEstimatedRows(planText: string): number | undefined {
  const match = ROWS_ESTIMATE_RE.exec(planText);
  if (!match) return undefined;
  const value = Number(match[1]);
  return Number.isFinite(value) ? value : undefined;
}
