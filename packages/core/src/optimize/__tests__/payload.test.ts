import { describe, it } from 'node:test';
import assert from 'node:assert/strict';
import { toOptimizePayload } from '../payload.js';
import type { OptimizationFailure, OptimizationSuccess } from '../orchestrator.js';
import { tableRef } from '../../sql/tables.js';

const METADATA = [
  {
    table: tableRef('events', 'default', 'hive'),
    columns: [{ name: 'ds', type: 'varchar' }],
    partitionCandidates: ['ds'],
    properties: { hasWithProperties: true },
  },
];

describe('toOptimizePayload', () => {
  it('renders a success outcome', () => {
    const outcome: OptimizationSuccess = {
      ok: true,
      originalSql: 'SELECT * FROM events',
      optimizedSql: 'SELECT ds FROM events',
      explainBefore: { ok: true, text: 'before', estimatedRows: 1000 },
      explainAfter: { ok: true, text: 'after', estimatedRows: 900 },
      tables: ['events'],
      metadata: METADATA,
      attempts: 1,
      diff: 'diff text',
      changes: ['narrowed projection'],
      assumptions: [],
      risk: 'low',
    };

    assert.deepEqual(toOptimizePayload(outcome), {
      ok: true,
      attempts: 1,
      tables: ['events'],
      llm: { risk: 'low', changes: ['narrowed projection'], assumptions: [] },
      original_sql: 'SELECT * FROM events',
      optimized_sql: 'SELECT ds FROM events',
      diff: 'diff text',
      explain_before: { ok: true, error: null, text: 'before', estimated_rows: 1000 },
      explain_after: { ok: true, error: null, text: 'after', estimated_rows: 900 },
      metadata: [{ table: 'hive.default.events', partition_candidates: ['ds'], columns: [{ name: 'ds', type: 'varchar' }] }],
      error: null,
    });
  });

  it('renders absent values of a failure as null', () => {
    const outcome: OptimizationFailure = {
      ok: false,
      originalSql: 'SELECT * FROM events',
      explainBefore: { ok: false, text: '', error: 'Table not found' },
      tables: [],
      metadata: [],
      attempts: 0,
      diff: '',
      error: 'EXPLAIN failed for original SQL: Table not found',
    };

    assert.deepEqual(toOptimizePayload(outcome), {
      ok: false,
      attempts: 0,
      tables: [],
      llm: { risk: null, changes: [], assumptions: [] },
      original_sql: 'SELECT * FROM events',
      optimized_sql: null,
      diff: '',
      explain_before: { ok: false, error: 'Table not found', text: '', estimated_rows: null },
      explain_after: null,
      metadata: [],
      error: 'EXPLAIN failed for original SQL: Table not found',
    });
  });
});
