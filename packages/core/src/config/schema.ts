/**
 * JSON Schema for the flat, env-style configuration record.
 * Validated with ajv using `coerceTypes` and `useDefaults`, so string values
 * from the environment become numbers/booleans and missing keys get defaults.
 */

export const DEFAULT_PARTITION_CANDIDATE_NAMES =
  'ds,date,event_date,dt,day,hour,event_hour,partition_date';

export const envConfigSchema = {
  type: 'object' as const,
  properties: {
    TRINO_HOST: { type: 'string' as const, minLength: 1 },
    TRINO_PORT: { type: 'integer' as const, minimum: 1, maximum: 65535, default: 443 },
    TRINO_USER: { type: 'string' as const, minLength: 1 },
    TRINO_CATALOG: { type: 'string' as const, minLength: 1, default: 'hive' },
    TRINO_SCHEMA: { type: 'string' as const, minLength: 1, default: 'default' },
    TRINO_HTTP_SCHEME: { type: 'string' as const, enum: ['http', 'https'], default: 'https' },
    TRINO_BASIC_USER: { type: 'string' as const },
    TRINO_BASIC_PASSWORD: { type: 'string' as const },
    TRINO_SOURCE: { type: 'string' as const, minLength: 1, default: 'querytune' },
    TRINO_SESSION_PROPERTIES: { type: 'string' as const, default: '{}' },
    EXPLAIN_TIMEOUT_SECONDS: { type: 'integer' as const, minimum: 1, default: 60 },

    LLM_PROVIDER: {
      type: 'string' as const,
      enum: ['openai', 'azure_openai', 'anthropic', 'gemini'],
      default: 'openai',
    },
    AI_API_KEY: { type: 'string' as const, minLength: 1 },
    AI_MODEL: { type: 'string' as const, minLength: 1, default: 'gpt-4.1-mini' },
    AI_TEMPERATURE: { type: 'number' as const, minimum: 0, maximum: 2, default: 0 },
    AI_MAX_TOKENS: { type: 'integer' as const, minimum: 1, default: 2048 },
    AZURE_OPENAI_ENDPOINT: { type: 'string' as const },
    AZURE_OPENAI_DEPLOYMENT: { type: 'string' as const },
    AZURE_OPENAI_API_VERSION: { type: 'string' as const, default: '2024-10-21' },

    MAX_FIX_ATTEMPTS: { type: 'integer' as const, minimum: 0, default: 2 },
    READ_ONLY_MODE: { type: 'boolean' as const, default: true },
    IMPROVEMENT_TOLERANCE: { type: 'number' as const, minimum: 0, default: 0.05 },
    PARTITION_CANDIDATE_NAMES: { type: 'string' as const, default: DEFAULT_PARTITION_CANDIDATE_NAMES },
    PLAN_TEXT_LIMIT: { type: 'integer' as const, minimum: 1, default: 12_000 },
    METADATA_JSON_LIMIT: { type: 'integer' as const, minimum: 1, default: 12_000 },
    MAX_COLUMNS_PER_TABLE: { type: 'integer' as const, minimum: 1, default: 200 },
    DDL_SNIPPET_LIMIT: { type: 'integer' as const, minimum: 0, default: 2000 },
    DIFF_CONTEXT_LINES: { type: 'integer' as const, minimum: 0, default: 3 },
    SQL_DIALECT: { type: 'string' as const, minLength: 1, default: 'trino' },

    LOG_LEVEL: { type: 'string' as const, enum: ['error', 'warn', 'info', 'debug'], default: 'info' },
  },
  required: ['TRINO_HOST', 'TRINO_USER', 'AI_API_KEY'] as const,
  if: {
    type: 'object' as const,
    properties: { LLM_PROVIDER: { type: 'string' as const, const: 'azure_openai' } },
    required: ['LLM_PROVIDER'] as const,
  },
  then: {
    type: 'object' as const,
    required: ['AZURE_OPENAI_ENDPOINT', 'AZURE_OPENAI_DEPLOYMENT'] as const,
  },
};

/** Shape of the record after a successful validation (defaults applied). */
export interface EnvConfigRecord {
  TRINO_HOST: string;
  TRINO_PORT: number;
  TRINO_USER: string;
  TRINO_CATALOG: string;
  TRINO_SCHEMA: string;
  TRINO_HTTP_SCHEME: 'http' | 'https';
  TRINO_BASIC_USER?: string;
  TRINO_BASIC_PASSWORD?: string;
  TRINO_SOURCE: string;
  TRINO_SESSION_PROPERTIES: string;
  EXPLAIN_TIMEOUT_SECONDS: number;
  LLM_PROVIDER: 'openai' | 'azure_openai' | 'anthropic' | 'gemini';
  AI_API_KEY: string;
  AI_MODEL: string;
  AI_TEMPERATURE: number;
  AI_MAX_TOKENS: number;
  AZURE_OPENAI_ENDPOINT?: string;
  AZURE_OPENAI_DEPLOYMENT?: string;
  AZURE_OPENAI_API_VERSION: string;
  MAX_FIX_ATTEMPTS: number;
  READ_ONLY_MODE: boolean;
  IMPROVEMENT_TOLERANCE: number;
  PARTITION_CANDIDATE_NAMES: string;
  PLAN_TEXT_LIMIT: number;
  METADATA_JSON_LIMIT: number;
  MAX_COLUMNS_PER_TABLE: number;
  DDL_SNIPPET_LIMIT: number;
  DIFF_CONTEXT_LINES: number;
  SQL_DIALECT: string;
  LOG_LEVEL: 'error' | 'warn' | 'info' | 'debug';
}
