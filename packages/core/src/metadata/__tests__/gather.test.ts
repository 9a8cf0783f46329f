import { describe, it, before } from 'node:test';
import assert from 'node:assert/strict';
import { fetchColumns, fetchProperties, gatherMetadata, inferPartitionCandidates } from '../gather.js';
import { tableRef } from '../../sql/tables.js';
import { DEFAULT_PARTITION_CANDIDATE_NAMES } from '../../config/schema.js';
import { setLogLevel } from '../../util/logger.js';
import { FakeEngine } from '../../optimize/__tests__/fakes.js';

const NAMES = DEFAULT_PARTITION_CANDIDATE_NAMES.split(',');

const OPTS = {
  defaultCatalog: 'hive',
  defaultSchema: 'default',
  partitionCandidateNames: NAMES,
  ddlSnippetLimit: 2000,
};

before(() => {
  setLogLevel('error');
});

describe('inferPartitionCandidates', () => {
  it('finds ds among the columns', () => {
    const columns = [
      { name: 'id', type: 'bigint' },
      { name: 'ds', type: 'varchar' },
      { name: 'value', type: 'double' },
    ];
    assert.deepEqual(inferPartitionCandidates(columns, NAMES), ['ds']);
  });

  it('finds nothing without a matching column', () => {
    const columns = [
      { name: 'id', type: 'bigint' },
      { name: 'value', type: 'double' },
    ];
    assert.deepEqual(inferPartitionCandidates(columns, NAMES), []);
  });

  it('follows the candidate list order and ignores case', () => {
    const columns = [
      { name: 'Hour', type: 'integer' },
      { name: 'EVENT_DATE', type: 'date' },
    ];
    assert.deepEqual(inferPartitionCandidates(columns, NAMES), ['event_date', 'hour']);
  });
});

describe('fetchColumns', () => {
  it('maps DESCRIBE rows and skips nameless ones', async () => {
    const engine = new FakeEngine().on('DESCRIBE', () => [
      ['id', 'bigint', '', ''],
      ['', 'varchar', '', ''],
      [null, 'varchar', '', ''],
      ['note'],
    ]);

    const columns = await fetchColumns(engine, tableRef('events', 'web', 'hive'));

    assert.deepEqual(engine.calls, ['DESCRIBE hive.web.events']);
    assert.deepEqual(columns, [
      { name: 'id', type: 'bigint' },
      { name: 'note', type: 'unknown' },
    ]);
  });
});

describe('fetchProperties', () => {
  it('caps the DDL snippet and flags a WITH clause', async () => {
    const ddl = "CREATE TABLE hive.web.events (\n   id bigint\n)\nWITH (\n   format = 'ORC'\n)";
    const engine = new FakeEngine().on('SHOW CREATE TABLE', () => [[ddl]]);

    const props = await fetchProperties(engine, tableRef('events', 'web', 'hive'), 12);

    assert.deepEqual(props, { ddlSnippet: 'CREATE TABLE', hasWithProperties: true });
  });

  it('returns nothing for empty output', async () => {
    const engine = new FakeEngine().on('SHOW CREATE TABLE', () => []);
    assert.deepEqual(await fetchProperties(engine, tableRef('events'), 100), {});
  });
});

describe('gatherMetadata', () => {
  it('qualifies tables and keeps input order', async () => {
    const engine = new FakeEngine()
      .on('DESCRIBE hive.default.events', () => [['ds', 'varchar']])
      .on('DESCRIBE iceberg.web.users', () => [['id', 'bigint']])
      .on('SHOW CREATE TABLE', () => []);

    const metadata = await gatherMetadata(engine, [tableRef('events'), tableRef('users', 'web', 'iceberg')], OPTS);

    assert.deepEqual(
      metadata.map((m) => [m.table, m.partitionCandidates]),
      [
        [{ catalog: 'hive', schema: 'default', table: 'events' }, ['ds']],
        [{ catalog: 'iceberg', schema: 'web', table: 'users' }, []],
      ],
    );
  });

  it('fetches a repeated table once', async () => {
    const engine = new FakeEngine().on('DESCRIBE', () => [['id', 'bigint']]).on('SHOW CREATE TABLE', () => []);

    const metadata = await gatherMetadata(engine, [tableRef('events'), tableRef('events', 'default')], OPTS);

    assert.equal(metadata.length, 2);
    assert.deepEqual(engine.calls, ['DESCRIBE hive.default.events', 'SHOW CREATE TABLE hive.default.events']);
  });

  it('degrades to empty values when the engine fails', async () => {
    const engine = new FakeEngine()
      .on('DESCRIBE', () => {
        throw new Error('Access Denied: Cannot show columns');
      })
      .on('SHOW CREATE TABLE', () => {
        throw new Error('Access Denied: Cannot show create table');
      });

    const metadata = await gatherMetadata(engine, [tableRef('events')], OPTS);

    assert.equal(metadata.length, 1);
    assert.deepEqual(metadata[0].columns, []);
    assert.deepEqual(metadata[0].partitionCandidates, []);
    assert.deepEqual(metadata[0].properties, {});
  });
});
