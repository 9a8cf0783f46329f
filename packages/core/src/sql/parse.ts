/**
 * AST-based SQL parsing on node-sql-parser.
 * The dialect is the parser's `database` option (e.g. 'trino', 'PostgresQL').
 */

import pkg from 'node-sql-parser';
const { Parser } = pkg;

const parser = new Parser();

export type SqlKind =
  | 'select'
  | 'insert'
  | 'update'
  | 'delete'
  | 'create'
  | 'alter'
  | 'drop'
  | 'truncate'
  | 'unknown';

export interface ParseResult {
  /** Every statement's AST */
  statements: unknown[];
  statementCount: number;
  /** Kind of the first statement */
  kind: SqlKind;
  /** Original SQL with trailing semicolons stripped */
  normalizedSql: string;
}

export interface ParseError {
  ok: false;
  error: string;
}

export type ParseOutcome = ({ ok: true } & ParseResult) | ParseError;

const KNOWN_KINDS: readonly SqlKind[] = [
  'select',
  'insert',
  'update',
  'delete',
  'create',
  'alter',
  'drop',
  'truncate',
];

export function normalizeSql(sql: string): string {
  return sql.trim().replace(/;+\s*$/, '');
}

/**
 * Parse SQL into ASTs. Never throws.
 */
export function parseSql(sql: string, dialect: string): ParseOutcome {
  const normalizedSql = normalizeSql(sql);

  if (!normalizedSql) {
    return { ok: false, error: 'Empty SQL statement' };
  }

  try {
    const astResult: unknown = parser.astify(normalizedSql, { database: dialect });
    const statements: unknown[] = Array.isArray(astResult) ? astResult : [astResult];

    if (statements.length === 0) {
      return { ok: false, error: 'No statements found' };
    }

    const first = statements[0];
    return {
      ok: true,
      statements,
      statementCount: statements.length,
      kind: kindOf(first),
      normalizedSql,
    };
  } catch (err: unknown) {
    const msg = err instanceof Error ? err.message : String(err);
    return { ok: false, error: `SQL parse error: ${msg}` };
  }
}

function kindOf(stmt: unknown): SqlKind {
  if (!isRecord(stmt) || typeof stmt.type !== 'string') return 'unknown';
  const raw = stmt.type.toLowerCase();
  return KNOWN_KINDS.find((k) => k === raw) ?? 'unknown';
}

export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}
