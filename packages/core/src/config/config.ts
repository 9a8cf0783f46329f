/**
 * Configuration for a querytune process.
 *
 * `loadConfig` turns a flat env-style record into a validated, typed
 * `QuerytuneConfig` once at startup. Core modules never read the
 * environment themselves; they receive the section they need.
 */

import { createAjv, formatAjvErrors } from '../util/ajv.js';
import {
  envConfigSchema,
  DEFAULT_PARTITION_CANDIDATE_NAMES,
  type EnvConfigRecord,
} from './schema.js';

export type LlmProvider = EnvConfigRecord['LLM_PROVIDER'];
export type LogLevel = EnvConfigRecord['LOG_LEVEL'];

export interface EngineConfig {
  host: string;
  port: number;
  user: string;
  catalog: string;
  schema: string;
  httpScheme: 'http' | 'https';
  basicUser?: string;
  basicPassword?: string;
  /** Client tag reported to the coordinator */
  source: string;
  sessionProperties: Record<string, string>;
  explainTimeoutSeconds: number;
}

export interface AzureModelConfig {
  endpoint: string;
  deployment: string;
  apiVersion: string;
}

export interface ModelConfig {
  provider: LlmProvider;
  apiKey: string;
  model: string;
  temperature: number;
  maxTokens: number;
  /** Present only when provider is `azure_openai` */
  azure?: AzureModelConfig;
}

/** Everything the optimization pipeline itself needs. */
export interface OptimizerSettings {
  /** Fix attempts after the initial rewrite; total attempts = maxFixAttempts + 1 */
  maxFixAttempts: number;
  /** Only accept query-only statements, for the input and every candidate */
  readOnlyMode: boolean;
  /** Candidate row estimate may exceed the baseline by this fraction */
  improvementTolerance: number;
  /** Ordered, matched case-insensitively against column names */
  partitionCandidateNames: readonly string[];
  defaultCatalog: string;
  defaultSchema: string;
  planTextLimit: number;
  metadataJsonLimit: number;
  maxColumnsPerTable: number;
  ddlSnippetLimit: number;
  diffContextLines: number;
  /** node-sql-parser `database` option */
  sqlDialect: string;
}

export interface QuerytuneConfig {
  engine: EngineConfig;
  model: ModelConfig;
  optimizer: OptimizerSettings;
  logLevel: LogLevel;
}

export class ConfigError extends Error {
  readonly violations: string;

  constructor(violations: string) {
    super(`Invalid configuration: ${violations}`);
    this.name = 'ConfigError';
    this.violations = violations;
  }
}

const CONFIG_KEYS = Object.keys(envConfigSchema.properties);

const ajv = createAjv({ coerceTypes: true, useDefaults: true });
const validateEnv = ajv.compile<EnvConfigRecord>(envConfigSchema);

/** Optimizer defaults, matching what `loadConfig` produces for an empty record. */
export function defaultOptimizerSettings(): OptimizerSettings {
  return {
    maxFixAttempts: 2,
    readOnlyMode: true,
    improvementTolerance: 0.05,
    partitionCandidateNames: splitNameList(DEFAULT_PARTITION_CANDIDATE_NAMES),
    defaultCatalog: 'hive',
    defaultSchema: 'default',
    planTextLimit: 12_000,
    metadataJsonLimit: 12_000,
    maxColumnsPerTable: 200,
    ddlSnippetLimit: 2000,
    diffContextLines: 3,
    sqlDialect: 'trino',
  };
}

/**
 * Validate and type a flat configuration record (usually `process.env`).
 * Empty strings count as unset.
 * @throws ConfigError listing every violation
 */
export function loadConfig(env: Record<string, string | undefined>): QuerytuneConfig {
  const raw: Record<string, unknown> = {};
  for (const key of CONFIG_KEYS) {
    const value = env[key];
    if (value !== undefined && value.trim() !== '') {
      raw[key] = value.trim();
    }
  }

  if (!validateEnv(raw)) {
    throw new ConfigError(formatAjvErrors(validateEnv.errors));
  }

  const engine: EngineConfig = {
    host: raw.TRINO_HOST,
    port: raw.TRINO_PORT,
    user: raw.TRINO_USER,
    catalog: raw.TRINO_CATALOG,
    schema: raw.TRINO_SCHEMA,
    httpScheme: raw.TRINO_HTTP_SCHEME,
    basicUser: raw.TRINO_BASIC_USER,
    basicPassword: raw.TRINO_BASIC_PASSWORD,
    source: raw.TRINO_SOURCE,
    sessionProperties: parseSessionProperties(raw.TRINO_SESSION_PROPERTIES),
    explainTimeoutSeconds: raw.EXPLAIN_TIMEOUT_SECONDS,
  };

  const model: ModelConfig = {
    provider: raw.LLM_PROVIDER,
    apiKey: raw.AI_API_KEY,
    model: raw.AI_MODEL,
    temperature: raw.AI_TEMPERATURE,
    maxTokens: raw.AI_MAX_TOKENS,
  };
  if (raw.LLM_PROVIDER === 'azure_openai' && raw.AZURE_OPENAI_ENDPOINT && raw.AZURE_OPENAI_DEPLOYMENT) {
    model.azure = {
      endpoint: raw.AZURE_OPENAI_ENDPOINT,
      deployment: raw.AZURE_OPENAI_DEPLOYMENT,
      apiVersion: raw.AZURE_OPENAI_API_VERSION,
    };
  }

  const optimizer: OptimizerSettings = {
    maxFixAttempts: raw.MAX_FIX_ATTEMPTS,
    readOnlyMode: raw.READ_ONLY_MODE,
    improvementTolerance: raw.IMPROVEMENT_TOLERANCE,
    partitionCandidateNames: splitNameList(raw.PARTITION_CANDIDATE_NAMES),
    defaultCatalog: raw.TRINO_CATALOG,
    defaultSchema: raw.TRINO_SCHEMA,
    planTextLimit: raw.PLAN_TEXT_LIMIT,
    metadataJsonLimit: raw.METADATA_JSON_LIMIT,
    maxColumnsPerTable: raw.MAX_COLUMNS_PER_TABLE,
    ddlSnippetLimit: raw.DDL_SNIPPET_LIMIT,
    diffContextLines: raw.DIFF_CONTEXT_LINES,
    sqlDialect: raw.SQL_DIALECT,
  };

  return { engine, model, optimizer, logLevel: raw.LOG_LEVEL };
}

function splitNameList(value: string): string[] {
  return value
    .split(',')
    .map((name) => name.trim().toLowerCase())
    .filter((name) => name.length > 0);
}

/**
 * Session properties arrive as a JSON object string. Anything that is not
 * a JSON object yields no properties; scalar values are stringified.
 */
export function parseSessionProperties(json: string): Record<string, string> {
  let parsed: unknown;
  try {
    parsed = JSON.parse(json);
  } catch {
    return {};
  }
  if (!parsed || typeof parsed !== 'object' || Array.isArray(parsed)) {
    return {};
  }
  const props: Record<string, string> = {};
  for (const [key, value] of Object.entries(parsed)) {
    if (value === null || typeof value === 'object') continue;
    props[key] = String(value);
  }
  return props;
}
