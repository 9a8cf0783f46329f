import { describe, it } from 'node:test';
import assert from 'node:assert/strict';
import type { OptimizationFailure, OptimizationSuccess, SqlInspector } from '@querytune/core';
import { tableRef } from '@querytune/core';
import { buildTablesReport, formatOptimizeReport, formatPlanReport, formatTablesReport } from '../output.js';

const SUCCESS: OptimizationSuccess = {
  ok: true,
  originalSql: 'SELECT * FROM events',
  optimizedSql: 'SELECT id FROM events',
  explainBefore: { ok: true, text: 'plan before', estimatedRows: 1000 },
  explainAfter: { ok: true, text: 'plan after', estimatedRows: 900 },
  tables: ['events'],
  metadata: [],
  attempts: 1,
  diff: '--- original.sql\n+++ optimized.sql',
  changes: ['narrowed projection'],
  assumptions: [],
  risk: 'low',
};

describe('formatOptimizeReport', () => {
  it('summarizes a success', () => {
    assert.equal(
      formatOptimizeReport(SUCCESS, false),
      [
        'Optimized in 1 attempt(s).',
        'Tables: events',
        'Estimated rows: 1000 -> 900',
        'Risk: low',
        'Changes:',
        '  - narrowed projection',
        '',
        '--- original.sql\n+++ optimized.sql',
      ].join('\n'),
    );
  });

  it('appends both plans when verbose', () => {
    const report = formatOptimizeReport(SUCCESS, true);
    assert.ok(report.endsWith('\n-- EXPLAIN (before) --\nplan before\n\n-- EXPLAIN (after) --\nplan after'));
  });

  it('reports a failure before any attempt', () => {
    const failure: OptimizationFailure = {
      ok: false,
      originalSql: 'SELECT * FROM nope',
      explainBefore: { ok: false, text: '', error: 'Table not found' },
      tables: [],
      metadata: [],
      attempts: 0,
      diff: '',
      error: 'EXPLAIN failed for original SQL: Table not found',
    };
    assert.equal(
      formatOptimizeReport(failure, false),
      'Optimization failed after 0 attempt(s): EXPLAIN failed for original SQL: Table not found',
    );
  });
});

describe('formatPlanReport', () => {
  it('shows the estimate above the plan', () => {
    assert.equal(formatPlanReport({ ok: true, text: 'Fragment 0' }), 'Estimated rows: unknown\n\nFragment 0');
  });
});

describe('tables report', () => {
  const inspector: SqlInspector = {
    extractTables: () => [tableRef('events', 'web'), tableRef('users')],
    isQueryOnly: () => true,
  };

  it('lists formatted table names and the read-only verdict', () => {
    const report = buildTablesReport(inspector, 'SELECT 1');
    assert.deepEqual(report, { tables: ['web.events', 'users'], query_only: true });
    assert.equal(formatTablesReport(report), 'Tables:\n  web.events\n  users\nRead-only query: yes');
  });

  it('shows a placeholder without tables', () => {
    assert.equal(formatTablesReport({ tables: [], query_only: false }), 'Tables:\n  (none)\nRead-only query: no');
  });
});
