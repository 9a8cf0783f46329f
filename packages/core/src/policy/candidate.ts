/**
 * Candidate gates: the read-only check and the plan-based improvement check.
 * Both are pure; the plans are produced elsewhere.
 */

import type { PlanResult } from '../plan/explain.js';
import type { SqlInspector } from '../sql/inspector.js';

export const DEFAULT_IMPROVEMENT_TOLERANCE = 0.05;

export type GateResult = { allowed: true } | { allowed: false; reason: string };

/**
 * Read-only gate. Only enforced in read-only mode; unparseable SQL is rejected.
 */
export function checkReadOnly(
  inspector: SqlInspector,
  sql: string,
  readOnlyMode: boolean,
  subject: 'input' | 'candidate',
): GateResult {
  if (!readOnlyMode || inspector.isQueryOnly(sql)) {
    return { allowed: true };
  }
  return {
    allowed: false,
    reason:
      subject === 'input'
        ? 'Only SELECT queries are allowed in read-only mode.'
        : 'Candidate SQL is not a single SELECT query (read-only mode).',
  };
}

/**
 * A candidate is improved when its plan was obtained and, if both sides
 * carry a row estimate, the candidate's is at most `tolerance` above the
 * baseline's. With either estimate missing, a successful explain suffices.
 */
export function isImproved(
  baseline: PlanResult,
  candidate: PlanResult,
  tolerance: number = DEFAULT_IMPROVEMENT_TOLERANCE,
): boolean {
  if (!candidate.ok) return false;
  if (baseline.estimatedRows !== undefined && candidate.estimatedRows !== undefined) {
    return candidate.estimatedRows <= baseline.estimatedRows * (1 + tolerance);
  }
  return true;
}
