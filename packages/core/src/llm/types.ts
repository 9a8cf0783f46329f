/**
 * Model-facing types: the capability interface every provider implements,
 * and the structured rewrite the pipeline extracts from a completion.
 */

export type RiskLevel = 'low' | 'medium' | 'high' | 'unknown';

export type CompletionResult = { ok: true; text: string } | { ok: false; error: string };

/**
 * A generative model turned into a prompt → text function.
 * Implementations resolve with a failure value instead of rejecting.
 */
export interface RewriteModel {
  /** Provider label for logs, e.g. `openai:gpt-4.1-mini` */
  readonly name: string;
  complete(prompt: string): Promise<CompletionResult>;
}

/** Wire shape the model is instructed to return */
export interface RewritePayload {
  optimized_sql: string;
  changes: string[];
  assumptions: string[];
  risk: 'low' | 'medium' | 'high';
}

export interface RewriteResult {
  ok: boolean;
  optimizedSql?: string;
  /** Human-readable list of what the rewrite changed */
  changes?: string[];
  assumptions?: string[];
  risk?: RiskLevel;
  rawOutput?: string;
  error?: string;
}
