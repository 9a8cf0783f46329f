/**
 * Table references and their extraction from parsed SQL.
 */

import { parseSql, isRecord } from './parse.js';
import { logger } from '../util/logger.js';

/** A table as written in a query: catalog and schema are optional. */
export interface TableReference {
  readonly catalog?: string;
  readonly schema?: string;
  readonly table: string;
}

export function tableRef(table: string, schema?: string, catalog?: string): TableReference {
  const ref: { catalog?: string; schema?: string; table: string } = { table };
  if (schema) ref.schema = schema;
  if (catalog) ref.catalog = catalog;
  return ref;
}

/** Canonical dotted form, omitting absent parts: `catalog.schema.table`. */
export function formatTableName(ref: TableReference): string {
  return [ref.catalog, ref.schema, ref.table].filter((p): p is string => Boolean(p)).join('.');
}

/** Identity key: two references with the same triple are the same table. */
export function tableKey(ref: TableReference): string {
  return [ref.catalog ?? '', ref.schema ?? '', ref.table].join('\u0000').toLowerCase();
}

/** Fill a missing catalog/schema from the session defaults. */
export function qualifyTable(ref: TableReference, defaultCatalog: string, defaultSchema: string): TableReference {
  return tableRef(ref.table, ref.schema || defaultSchema, ref.catalog || defaultCatalog);
}

/**
 * Every table referenced anywhere in the statement (joins, sub-queries,
 * CTE bodies, set operations), in first-appearance order, deduplicated.
 * Names introduced by a WITH clause are excluded. Unparseable SQL yields [].
 */
export function extractTables(sql: string, dialect: string): TableReference[] {
  const parsed = parseSql(sql, dialect);
  if (!parsed.ok) {
    logger.warn('Table extraction skipped: SQL did not parse', { error: parsed.error });
    return [];
  }

  const found: TableReference[] = [];
  const cteNames = new Set<string>();
  for (const stmt of parsed.statements) {
    walk(stmt, found, cteNames);
  }

  const seen = new Set<string>();
  const out: TableReference[] = [];
  for (const ref of found) {
    if (!ref.catalog && !ref.schema && cteNames.has(ref.table.toLowerCase())) continue;
    const key = tableKey(ref);
    if (seen.has(key)) continue;
    seen.add(key);
    out.push(ref);
  }
  return out;
}

// ── AST traversal ────────────────────────────────────────────────────

function walk(node: unknown, found: TableReference[], cteNames: Set<string>): void {
  if (Array.isArray(node)) {
    for (const item of node) walk(item, found, cteNames);
    return;
  }
  if (!isRecord(node)) return;

  if (Array.isArray(node.with)) {
    for (const cte of node.with) {
      const name = cteName(cte);
      if (name) cteNames.add(name.toLowerCase());
    }
  }

  if (Array.isArray(node.from)) {
    for (const entry of node.from) {
      const ref = fromEntryToRef(entry);
      if (ref) found.push(ref);
    }
  }

  for (const value of Object.values(node)) {
    if (typeof value === 'object' && value !== null) {
      walk(value, found, cteNames);
    }
  }
}

function cteName(cte: unknown): string | null {
  if (!isRecord(cte)) return null;
  const { name } = cte;
  if (typeof name === 'string') return name;
  if (isRecord(name) && typeof name.value === 'string') return name.value;
  return null;
}

/**
 * node-sql-parser shapes: `{ db, table }` for one- and two-part names;
 * three-part names additionally carry `schema`, with `db` holding the catalog.
 */
function fromEntryToRef(entry: unknown): TableReference | null {
  if (!isRecord(entry) || typeof entry.table !== 'string' || !entry.table) return null;
  const db = typeof entry.db === 'string' && entry.db ? entry.db : undefined;
  const schema = typeof entry.schema === 'string' && entry.schema ? entry.schema : undefined;
  if (schema) {
    return tableRef(entry.table, schema, db);
  }
  return tableRef(entry.table, db);
}
