/**
 * Schema metadata for the tables a query references: columns, a DDL hint
 * and partition-column candidates. Everything here is advisory: fetch
 * failures degrade to empty values and are logged, never thrown.
 */

import type { EngineExecutor } from '../engine/types.js';
import {
  formatTableName,
  qualifyTable,
  tableKey,
  type TableReference,
} from '../sql/tables.js';
import { planTextFromRows } from '../plan/explain.js';
import { logger } from '../util/logger.js';

export interface ColumnInfo {
  name: string;
  type: string;
}

export interface TableProperties {
  /** DDL carries a `WITH (...)` properties clause */
  hasWithProperties?: boolean;
  /** Leading part of SHOW CREATE TABLE output, length-capped */
  ddlSnippet?: string;
}

export interface TableMetadata {
  /** Reference with catalog and schema filled from defaults */
  table: TableReference;
  columns: ColumnInfo[];
  partitionCandidates: string[];
  properties: TableProperties;
}

export interface MetadataOptions {
  defaultCatalog: string;
  defaultSchema: string;
  partitionCandidateNames: readonly string[];
  ddlSnippetLimit: number;
}

const WITH_PROPERTIES_MARKER = /\bWITH\s*\(/i;

/**
 * `DESCRIBE` rows are `Column | Type | Extra | Comment`. Rows without a
 * name are skipped; a missing type becomes `unknown`.
 */
export async function fetchColumns(engine: EngineExecutor, table: TableReference): Promise<ColumnInfo[]> {
  const rows = await engine.execute(`DESCRIBE ${formatTableName(table)}`);
  const columns: ColumnInfo[] = [];
  for (const row of rows) {
    const name = row[0];
    if (name === null || name === undefined || String(name) === '') continue;
    const type = row.length > 1 && row[1] !== null && row[1] !== undefined ? String(row[1]) : 'unknown';
    columns.push({ name: String(name), type });
  }
  return columns;
}

export async function fetchProperties(
  engine: EngineExecutor,
  table: TableReference,
  ddlSnippetLimit: number,
): Promise<TableProperties> {
  const rows = await engine.execute(`SHOW CREATE TABLE ${formatTableName(table)}`);
  const ddl = planTextFromRows(rows);
  if (!ddl) return {};

  const props: TableProperties = { ddlSnippet: ddl.slice(0, ddlSnippetLimit) };
  if (WITH_PROPERTIES_MARKER.test(ddl)) {
    props.hasWithProperties = true;
  }
  return props;
}

/**
 * Names from the candidate list (in list order) that appear among the
 * columns, compared case-insensitively. A name-based stand-in for real
 * partition introspection, which is connector-specific.
 */
export function inferPartitionCandidates(
  columns: readonly ColumnInfo[],
  candidateNames: readonly string[],
): string[] {
  const present = new Set(columns.map((c) => c.name.toLowerCase()));
  const out: string[] = [];
  for (const name of candidateNames) {
    const lower = name.toLowerCase();
    if (present.has(lower) && !out.includes(lower)) {
      out.push(lower);
    }
  }
  return out;
}

/**
 * One TableMetadata per input reference, in input order. Requests run
 * sequentially; a table repeated in the input is fetched once.
 */
export async function gatherMetadata(
  engine: EngineExecutor,
  tables: readonly TableReference[],
  opts: MetadataOptions,
): Promise<TableMetadata[]> {
  const fetched = new Map<string, TableMetadata>();
  const out: TableMetadata[] = [];

  for (const ref of tables) {
    const table = qualifyTable(ref, opts.defaultCatalog, opts.defaultSchema);
    const key = tableKey(table);
    const cached = fetched.get(key);
    if (cached) {
      out.push(cached);
      continue;
    }

    const fqtn = formatTableName(table);
    let columns: ColumnInfo[] = [];
    try {
      columns = await fetchColumns(engine, table);
    } catch (err: unknown) {
      const msg = err instanceof Error ? err.message : String(err);
      logger.warn(`Column fetch failed for ${fqtn}; continuing without columns`, { error: msg });
    }

    let properties: TableProperties = {};
    try {
      properties = await fetchProperties(engine, table, opts.ddlSnippetLimit);
    } catch (err: unknown) {
      const msg = err instanceof Error ? err.message : String(err);
      logger.warn(`Property fetch failed for ${fqtn}; continuing without properties`, { error: msg });
    }

    const meta: TableMetadata = {
      table,
      columns,
      partitionCandidates: inferPartitionCandidates(columns, opts.partitionCandidateNames),
      properties,
    };
    fetched.set(key, meta);
    out.push(meta);
  }

  return out;
}
