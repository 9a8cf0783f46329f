import { describe, it } from 'node:test';
import assert from 'node:assert/strict';
import { buildFixPrompt, buildOptimizePrompt, metadataToCompactJson, type PromptLimits } from '../prompt.js';
import type { TableMetadata } from '../../metadata/gather.js';
import { tableRef } from '../../sql/tables.js';

const LIMITS: PromptLimits = { planTextLimit: 12_000, metadataJsonLimit: 12_000, maxColumnsPerTable: 200 };

const EVENTS: TableMetadata = {
  table: tableRef('events', 'default', 'hive'),
  columns: [
    { name: 'id', type: 'bigint' },
    { name: 'ds', type: 'varchar' },
  ],
  partitionCandidates: ['ds'],
  properties: { hasWithProperties: true, ddlSnippet: 'CREATE TABLE hive.default.events' },
};

describe('metadataToCompactJson', () => {
  it('projects metadata into the compact shape', () => {
    assert.equal(
      metadataToCompactJson([EVENTS], 200),
      '[{"table":"hive.default.events","partition_candidates":["ds"],' +
        '"columns":[{"name":"id","type":"bigint"},{"name":"ds","type":"varchar"}],' +
        '"properties_hint":{"has_with_properties":"true","create_table_snippet":"CREATE TABLE hive.default.events"}}]',
    );
  });

  it('caps the columns per table', () => {
    const parsed: unknown = JSON.parse(metadataToCompactJson([EVENTS], 1));
    assert.deepEqual(parsed, [
      {
        table: 'hive.default.events',
        partition_candidates: ['ds'],
        columns: [{ name: 'id', type: 'bigint' }],
        properties_hint: { has_with_properties: 'true', create_table_snippet: 'CREATE TABLE hive.default.events' },
      },
    ]);
  });

  it('leaves the hint empty without properties', () => {
    const bare: TableMetadata = { ...EVENTS, properties: {} };
    assert.ok(metadataToCompactJson([bare], 200).endsWith('"properties_hint":{}}]'));
  });
});

describe('buildOptimizePrompt', () => {
  const input = {
    originalSql: 'SELECT * FROM events',
    planText: 'Fragment 0 [SINGLE]',
    metadata: [EVENTS],
    limits: LIMITS,
  };

  it('lays out the sections in order', () => {
    const prompt = buildOptimizePrompt(input);
    const order = ['Optimize this Trino SQL query.', 'ORIGINAL_SQL:\nSELECT * FROM events', 'EXPLAIN_PLAN_BEFORE:\nFragment 0 [SINGLE]', 'TABLE_METADATA_JSON:\n[{', 'Guidance', 'Respond with ONLY a JSON object'];
    const positions = order.map((marker) => prompt.indexOf(marker));
    assert.ok(positions.every((p) => p >= 0), `missing section: ${JSON.stringify(positions)}`);
    assert.deepEqual([...positions].sort((a, b) => a - b), positions);
  });

  it('is deterministic', () => {
    assert.equal(buildOptimizePrompt(input), buildOptimizePrompt(input));
  });

  it('truncates the plan text', () => {
    const prompt = buildOptimizePrompt({ ...input, planText: 'abcdef', limits: { ...LIMITS, planTextLimit: 3 } });
    assert.ok(prompt.includes('EXPLAIN_PLAN_BEFORE:\nabc\n\nTABLE_METADATA_JSON:'));
  });

  it('truncates the metadata JSON', () => {
    const prompt = buildOptimizePrompt({ ...input, limits: { ...LIMITS, metadataJsonLimit: 10 } });
    assert.ok(prompt.includes('TABLE_METADATA_JSON:\n[{"table":\n\n'));
  });
});

describe('buildFixPrompt', () => {
  it('carries the candidate and the feedback', () => {
    const prompt = buildFixPrompt({
      originalSql: 'SELECT * FROM events',
      planText: 'Fragment 0 [SINGLE]',
      metadata: [],
      limits: LIMITS,
      candidateSql: 'SELEC id FROM events',
      feedback: 'EXPLAIN failed: syntax error near X',
    });

    assert.ok(prompt.startsWith('Your previous rewrite failed validation or did not improve the plan.\n\n'));
    assert.ok(prompt.includes('CANDIDATE_SQL:\nSELEC id FROM events\n\n'));
    assert.ok(prompt.includes('VALIDATION_ERROR_OR_FEEDBACK:\nEXPLAIN failed: syntax error near X\n\n'));
    assert.ok(prompt.includes('TABLE_METADATA_JSON:\n[]'));
  });
});
