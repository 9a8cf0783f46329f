#!/usr/bin/env node

/**
 * querytune CLI entrypoint.
 */

import { Command, CommanderError } from 'commander';
import dotenv from 'dotenv';
import {
  ConfigError,
  createEngineExecutor,
  createRewriteModel,
  createSqlInspector,
  loadConfig,
  optimizeSql,
  runExplain,
  setLogLevel,
  toOptimizePayload,
  toPlanPayload,
  type QuerytuneConfig,
  type RewriteModel,
} from '@querytune/core';
import {
  EXIT_CODE_SUCCESS,
  EXIT_CODE_USAGE,
  fromConfigError,
  outcomeExitCode,
  runtimeError,
  toExitCode,
  usageError,
} from './errors.js';
import { readSqlInput, type SqlInputOptions } from './input.js';
import {
  buildTablesReport,
  formatOptimizeReport,
  formatPlanReport,
  formatTablesReport,
  outputOptionsFromCommand,
  printCommandResult,
  printError,
  type OutputOptions,
} from './output.js';

const VERSION = '0.3.0';

// ── Helpers ──────────────────────────────────────────────────────────

async function runCommand(command: Command, fn: (output: OutputOptions) => Promise<void>): Promise<void> {
  const output = outputOptionsFromCommand(command);
  try {
    await fn(output);
  } catch (error: unknown) {
    printError(error, output);
    process.exitCode = toExitCode(error);
  }
}

function withExamples(cmd: Command, lines: string[]): Command {
  const rendered = lines.map((line) => `  ${line}`).join('\n');
  cmd.addHelpText('after', `\nExamples:\n${rendered}\n`);
  return cmd;
}

function withSqlInput(cmd: Command): Command {
  return cmd
    .option('--sql <sql>', 'SQL statement to process')
    .option('--file <path>', 'Read the SQL statement from a file');
}

/** Reads `.env`, validates the environment and applies the log level. */
function loadRuntimeConfig(output: OutputOptions): QuerytuneConfig {
  dotenv.config();
  let cfg: QuerytuneConfig;
  try {
    cfg = loadConfig(process.env);
  } catch (error: unknown) {
    if (error instanceof ConfigError) throw fromConfigError(error);
    throw error;
  }
  setLogLevel(output.debug ? 'debug' : output.quiet ? 'error' : cfg.logLevel);
  return cfg;
}

function buildModel(cfg: QuerytuneConfig): RewriteModel {
  try {
    return createRewriteModel(cfg.model);
  } catch (error: unknown) {
    const msg = error instanceof Error ? error.message : String(error);
    throw runtimeError(`Cannot set up the ${cfg.model.provider} model: ${msg}`, 'MODEL_SETUP_FAILED');
  }
}

// ── Program ──────────────────────────────────────────────────────────

const program = new Command();

program
  .name('querytune')
  .description('querytune: plan-checked SQL rewriting for Trino')
  .option('--json', 'Machine-readable JSON output', false)
  .option('--quiet', 'Suppress non-essential logs', false)
  .option('--verbose', 'Show additional context', false)
  .option('--debug', 'Show internal error details and stacks', false)
  .showHelpAfterError('(run with --help for usage)')
  .helpOption('-h, --help', 'display help')
  .version(VERSION, '-v, --version', 'Show version number');

program.exitOverride();
program.addHelpText(
  'after',
  `
Configuration is read from the environment (and a .env file):
  TRINO_HOST, TRINO_USER, AI_API_KEY are required; see .env.example.
`,
);

// ── optimize ─────────────────────────────────────────────────────────

withExamples(
  withSqlInput(
    program
      .command('optimize')
      .description('Rewrite a query with the model and keep it only if the plan improves'),
  ).action(async function (this: Command, opts: SqlInputOptions) {
    await runCommand(this, async (output) => {
      const sql = await readSqlInput(opts);
      const cfg = loadRuntimeConfig(output);
      const model = buildModel(cfg);
      const engine = createEngineExecutor(cfg.engine);

      const outcome = await optimizeSql(cfg.optimizer, { engine, model }, sql);

      printCommandResult(
        outcome.ok,
        toOptimizePayload(outcome),
        output,
        formatOptimizeReport(outcome, output.verbose),
      );
      process.exitCode = outcomeExitCode(outcome.ok);
    });
  }),
  [
    'querytune optimize --sql "SELECT * FROM events WHERE ts > TIMESTAMP \'2024-01-01 00:00:00\'"',
    'querytune optimize --file query.sql --json',
    'cat query.sql | querytune optimize --verbose',
  ],
);

// ── explain ──────────────────────────────────────────────────────────

withExamples(
  withSqlInput(
    program.command('explain').description('Show the engine plan and its row estimate'),
  ).action(async function (this: Command, opts: SqlInputOptions) {
    await runCommand(this, async (output) => {
      const sql = await readSqlInput(opts);
      const cfg = loadRuntimeConfig(output);
      const plan = await runExplain(createEngineExecutor(cfg.engine), sql);
      if (!plan.ok) {
        throw runtimeError(`EXPLAIN failed: ${plan.error ?? 'unknown error'}`, 'EXPLAIN_FAILED');
      }
      printCommandResult(true, toPlanPayload(plan), output, formatPlanReport(plan));
    });
  }),
  ['querytune explain --sql "SELECT count(*) FROM events"', 'querytune explain --file query.sql --json'],
);

// ── tables ───────────────────────────────────────────────────────────

withExamples(
  withSqlInput(
    program
      .command('tables')
      .description('List the tables a query references (no engine or model needed)')
      .option('--dialect <name>', 'node-sql-parser dialect', 'trino'),
  ).action(async function (this: Command, opts: SqlInputOptions & { dialect: string }) {
    await runCommand(this, async (output) => {
      const sql = await readSqlInput(opts);
      const report = buildTablesReport(createSqlInspector(opts.dialect), sql);
      printCommandResult(true, report, output, formatTablesReport(report));
    });
  }),
  ['querytune tables --sql "SELECT * FROM a JOIN b ON a.id = b.id"', 'querytune tables --file query.sql --json'],
);

// ── parse ────────────────────────────────────────────────────────────

async function main(): Promise<void> {
  try {
    await program.parseAsync(process.argv);
    if (process.exitCode === undefined) {
      process.exitCode = EXIT_CODE_SUCCESS;
    }
  } catch (error: unknown) {
    const output = outputOptionsFromCommand(program);
    if (error instanceof CommanderError) {
      if (error.code === 'commander.helpDisplayed' || error.code === 'commander.version') {
        process.exitCode = EXIT_CODE_SUCCESS;
        return;
      }
      printError(usageError(error.message), output);
      process.exitCode = EXIT_CODE_USAGE;
      return;
    }
    printError(error, output);
    process.exitCode = toExitCode(error);
  }
}

void main();
