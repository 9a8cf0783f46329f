import type { Command } from 'commander';
import type { OptimizationOutcome, PlanResult, SqlInspector } from '@querytune/core';
import { formatTableName } from '@querytune/core';
import { CliError } from './errors.js';

export interface OutputOptions {
  json: boolean;
  quiet: boolean;
  verbose: boolean;
  debug: boolean;
}

export function outputOptionsFromCommand(command: Command): OutputOptions {
  const opts = command.optsWithGlobals();
  return {
    json: Boolean(opts.json),
    quiet: Boolean(opts.quiet),
    verbose: Boolean(opts.verbose),
    debug: Boolean(opts.debug),
  };
}

export function printJson(value: unknown): void {
  console.log(JSON.stringify(value, null, 2));
}

export function printError(error: unknown, output: OutputOptions): void {
  const isCliError = error instanceof CliError;
  const message = isCliError ? error.message : error instanceof Error ? error.message : String(error);

  if (output.json) {
    const payload: Record<string, unknown> = {
      ok: false,
      code: isCliError ? error.code : 'INTERNAL_ERROR',
      message,
    };
    if (output.debug) {
      payload.details = isCliError
        ? error.details ?? null
        : error instanceof Error
          ? { stack: error.stack }
          : { raw: String(error) };
    }
    printJson(payload);
    return;
  }

  console.error(`Error: ${message}`);
  if (output.debug) {
    if (isCliError && error.details !== undefined) {
      console.error('Details:', JSON.stringify(error.details, null, 2));
    } else if (error instanceof Error && error.stack) {
      console.error(error.stack);
    }
  }
}

/**
 * `{ ok, data }` under --json; otherwise the human report. The report is
 * printed even with --quiet when the command did not succeed.
 */
export function printCommandResult(ok: boolean, value: unknown, output: OutputOptions, humanReport?: string): void {
  if (output.json) {
    printJson({ ok, data: value });
    return;
  }
  if (humanReport && (ok ? !output.quiet : true)) {
    console.log(humanReport);
  }
}

// ── Human reports ────────────────────────────────────────────────────

function estimateLabel(plan: PlanResult | undefined): string {
  if (!plan) return 'n/a';
  if (!plan.ok) return 'failed';
  return plan.estimatedRows === undefined ? 'unknown' : String(plan.estimatedRows);
}

function bulletList(title: string, items: readonly string[] | undefined): string[] {
  if (!items || items.length === 0) return [];
  return [`${title}:`, ...items.map((item) => `  - ${item}`)];
}

export function formatOptimizeReport(outcome: OptimizationOutcome, verbose: boolean): string {
  const lines: string[] = [];
  if (outcome.ok) {
    lines.push(`Optimized in ${outcome.attempts} attempt(s).`);
  } else {
    lines.push(`Optimization failed after ${outcome.attempts} attempt(s): ${outcome.error}`);
  }

  if (outcome.tables.length > 0) {
    lines.push(`Tables: ${outcome.tables.join(', ')}`);
  }
  if (outcome.attempts > 0) {
    lines.push(`Estimated rows: ${estimateLabel(outcome.explainBefore)} -> ${estimateLabel(outcome.explainAfter)}`);
  }
  if (outcome.risk) {
    lines.push(`Risk: ${outcome.risk}`);
  }
  lines.push(...bulletList('Changes', outcome.changes));
  lines.push(...bulletList('Assumptions', outcome.assumptions));

  if (outcome.diff) {
    lines.push('', outcome.diff);
  }

  if (verbose) {
    lines.push('', '-- EXPLAIN (before) --', outcome.explainBefore.text || '(none)');
    if (outcome.explainAfter) {
      lines.push('', '-- EXPLAIN (after) --', outcome.explainAfter.text || '(none)');
    }
  }
  return lines.join('\n');
}

export function formatPlanReport(plan: PlanResult): string {
  return [`Estimated rows: ${estimateLabel(plan)}`, '', plan.text].join('\n');
}

export interface TablesReport {
  tables: string[];
  query_only: boolean;
}

export function buildTablesReport(inspector: SqlInspector, sql: string): TablesReport {
  return {
    tables: inspector.extractTables(sql).map(formatTableName),
    query_only: inspector.isQueryOnly(sql),
  };
}

export function formatTablesReport(report: TablesReport): string {
  const lines = report.tables.length > 0 ? report.tables.map((t) => `  ${t}`) : ['  (none)'];
  return ['Tables:', ...lines, `Read-only query: ${report.query_only ? 'yes' : 'no'}`].join('\n');
}
