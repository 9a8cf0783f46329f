/**
 * The SQL inspection contract the pipeline consumes, and its default
 * implementation on node-sql-parser.
 */

import { parseSql } from './parse.js';
import { extractTables, type TableReference } from './tables.js';

export interface SqlInspector {
  /** Ordered, deduplicated table references */
  extractTables(sql: string): TableReference[];
  /** True only for a single, non-mutating query statement */
  isQueryOnly(sql: string): boolean;
}

/**
 * A statement is query-only when it parses, is a single statement, and that
 * statement is a SELECT (a WITH ... SELECT parses as a SELECT).
 */
export function isQueryOnly(sql: string, dialect: string): boolean {
  const parsed = parseSql(sql, dialect);
  if (!parsed.ok) return false;
  return parsed.statementCount === 1 && parsed.kind === 'select';
}

export function createSqlInspector(dialect: string): SqlInspector {
  return {
    extractTables: (sql) => extractTables(sql, dialect),
    isQueryOnly: (sql) => isQueryOnly(sql, dialect),
  };
}
