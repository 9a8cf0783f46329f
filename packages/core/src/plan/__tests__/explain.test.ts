import { describe, it } from 'node:test';
import assert from 'node:assert/strict';
import { extractEstimatedRows, planTextFromRows, runExplain } from '../explain.js';
import { FakeEngine, planRows } from '../../optimize/__tests__/fakes.js';

describe('runExplain', () => {
  it('prefixes EXPLAIN and drops trailing semicolons', async () => {
    const engine = new FakeEngine().on('EXPLAIN', () => planRows(42));

    const plan = await runExplain(engine, '  SELECT id FROM events; ');

    assert.deepEqual(engine.calls, ['EXPLAIN SELECT id FROM events']);
    assert.equal(plan.ok, true);
    assert.equal(plan.estimatedRows, 42);
    assert.equal(plan.error, undefined);
  });

  it('turns engine errors into a failed plan', async () => {
    const engine = new FakeEngine().on('EXPLAIN', () => {
      throw new Error("line 1:15: Table 'hive.default.nope' does not exist");
    });

    const plan = await runExplain(engine, 'SELECT * FROM nope');

    assert.deepEqual(plan, {
      ok: false,
      text: '',
      error: "line 1:15: Table 'hive.default.nope' does not exist",
    });
  });

  it('leaves the estimate unset when the plan has none', async () => {
    const engine = new FakeEngine().on('EXPLAIN', () => [['Fragment 0 [SINGLE]'], ['    Output layout: [id]']]);

    const plan = await runExplain(engine, 'SELECT id FROM events');

    assert.equal(plan.ok, true);
    assert.equal(plan.text, 'Fragment 0 [SINGLE]\n    Output layout: [id]');
    assert.equal('estimatedRows' in plan, false);
  });
});

describe('planTextFromRows', () => {
  it('joins first columns and skips null rows', () => {
    assert.equal(planTextFromRows([['a', 'ignored'], [null], [], ['b']]), 'a\nb');
  });
});

describe('extractEstimatedRows', () => {
  it('reads the first estimate block', () => {
    const text = 'Estimates: {rows: 1200 (10kB), cpu: ?}\nEstimates: {rows: 5 (1kB), cpu: ?}';
    assert.equal(extractEstimatedRows(text), 1200);
  });

  it('reads fractional and exponent forms', () => {
    assert.equal(extractEstimatedRows('Estimates: {rows: 12.5 (1kB)}'), 12.5);
    assert.equal(extractEstimatedRows('Estimates: {rows: 1.5E6 (100MB)}'), 1_500_000);
  });

  it('ignores unknown estimates', () => {
    assert.equal(extractEstimatedRows('Estimates: {rows: ? (?), cpu: ?}'), undefined);
    assert.equal(extractEstimatedRows(''), undefined);
  });
});
