/**
 * Prompt construction for SQL rewriting.
 * Both builders are pure: same inputs, same prompt text.
 */

import type { TableMetadata } from '../metadata/gather.js';
import { formatTableName } from '../sql/tables.js';

export interface PromptLimits {
  /** Max characters of baseline plan text included */
  planTextLimit: number;
  /** Max characters of table metadata JSON included */
  metadataJsonLimit: number;
  /** Max columns listed per table */
  maxColumnsPerTable: number;
}

export interface OptimizePromptInput {
  originalSql: string;
  planText: string;
  metadata: readonly TableMetadata[];
  limits: PromptLimits;
}

export interface FixPromptInput extends OptimizePromptInput {
  candidateSql: string;
  feedback: string;
}

export const SYSTEM_PROMPT = `You are a SQL optimization assistant for Trino, a distributed query engine.
You rewrite a query so that it runs more efficiently while returning exactly the same result.

Rules:
- Output valid Trino SQL: a single read-only statement.
- Preserve semantics. Never add tables, never drop filters the query already has.
- Prefer adding partition predicates when the provided partition candidates allow it.
- Keep predicates on partition and filter columns sargable (no functions wrapped around them).
- Reply with one JSON object only. No markdown, no prose before or after it.`;

const JSON_FORMAT_INSTRUCTIONS = `Respond with ONLY a JSON object matching this exact schema:
{
  "optimized_sql": "<the rewritten query>",
  "changes": ["<short description of each change>", ...],
  "assumptions": ["<assumption you relied on>", ...],
  "risk": "<low|medium|high>"
}

Rules:
- Do NOT wrap in markdown code fences.
- Do NOT include any text before or after the JSON.`;

const REWRITE_GUIDANCE = [
  'If the query filters on a timestamp and a table has a date-like partition candidate (ds, event_date, dt, ...), add a matching predicate on the partition column so partitions can be pruned.',
  'Rewrite predicates such as date(ts) = DATE \'...\' or substr(ds, 1, 10) = ... into range predicates on the raw column.',
  'Push filters and projections down as close to the scans as possible.',
  'In joins, keep the smaller input on the left side; keep the small side small with early filters and projections so it can be broadcast.',
  'For selective dimension-to-fact joins, keep join keys and filters in a shape that allows dynamic filtering.',
  'Prefer equality joins on normalized keys over joins on derived expressions or wide composite keys.',
  'If one key value dominates a join or aggregation, consider handling it separately or salting the key.',
  'When the output is aggregated by a dimension, aggregate the fact table first and join the dimensions afterwards.',
  'Where approximate results are acceptable, use approx_distinct and the other approx_* aggregates instead of exact DISTINCT counts.',
  'Replace DISTINCT over wide rows used only for de-duplication with GROUP BY on a key or row_number() over the key.',
  'Replace SELECT * with explicit columns when that does not change what the query returns.',
  'Keep ORDER BY paired with LIMIT; avoid ORDER BY without LIMIT on large results. Keep an existing LIMIT.',
  'Replace long OR chains on one column with IN (...).',
  'Use a CTE when the same sub-query appears more than once; Trino may inline CTEs, so do not rely on them for reuse.',
  'Partition window functions by the smallest necessary key set and filter before windowing.',
  'Mention UNION (as opposed to UNION ALL) in the changes when you keep it, since it forces a distinct step.',
];

/** Compact JSON projection of the metadata, capped by the limits. */
export function metadataToCompactJson(metadata: readonly TableMetadata[], maxColumnsPerTable: number): string {
  const payload = metadata.map((tm) => {
    const hint: Record<string, string> = {};
    if (tm.properties.hasWithProperties) hint.has_with_properties = 'true';
    if (tm.properties.ddlSnippet) hint.create_table_snippet = tm.properties.ddlSnippet;
    return {
      table: formatTableName(tm.table),
      partition_candidates: tm.partitionCandidates,
      columns: tm.columns.slice(0, maxColumnsPerTable).map((c) => ({ name: c.name, type: c.type })),
      properties_hint: hint,
    };
  });
  return JSON.stringify(payload);
}

function contextSections(input: OptimizePromptInput): string[] {
  const metaJson = metadataToCompactJson(input.metadata, input.limits.maxColumnsPerTable);
  return [
    `EXPLAIN_PLAN_BEFORE:\n${input.planText.slice(0, input.limits.planTextLimit)}`,
    `TABLE_METADATA_JSON:\n${metaJson.slice(0, input.limits.metadataJsonLimit)}`,
  ];
}

export function buildOptimizePrompt(input: OptimizePromptInput): string {
  const guidance = REWRITE_GUIDANCE.map((line) => `- ${line}`).join('\n');
  return [
    'Optimize this Trino SQL query.',
    `ORIGINAL_SQL:\n${input.originalSql}`,
    ...contextSections(input),
    `Guidance (hints, apply only where they keep the result identical):\n${guidance}\n- Correctness always comes first.`,
    JSON_FORMAT_INSTRUCTIONS,
  ].join('\n\n');
}

/** Repair prompt: shows the rejected candidate and why it was rejected. */
export function buildFixPrompt(input: FixPromptInput): string {
  return [
    'Your previous rewrite failed validation or did not improve the plan.',
    `ORIGINAL_SQL:\n${input.originalSql}`,
    `CANDIDATE_SQL:\n${input.candidateSql}`,
    `VALIDATION_ERROR_OR_FEEDBACK:\n${input.feedback}`,
    ...contextSections(input),
    'Task:\n- Repair the candidate so that it is valid Trino SQL.\n- Preserve the semantics of ORIGINAL_SQL.\n- Prefer partition pruning improvements when they are safe.',
    JSON_FORMAT_INSTRUCTIONS,
  ].join('\n\n');
}
