/**
 * Parsing of raw model output into a RewriteResult.
 * The only leniency is a surrounding markdown code fence; everything else
 * must be exactly the JSON contract in `schema_json.ts`.
 */

import { createAjv, formatAjvErrors } from '../util/ajv.js';
import { rewritePayloadSchema } from './schema_json.js';
import type { CompletionResult, RewriteModel, RewritePayload, RewriteResult } from './types.js';

const ajv = createAjv();
const validatePayload = ajv.compile<RewritePayload>(rewritePayloadSchema);

const FENCE_RE = /^```[a-zA-Z0-9_-]*[ \t]*\r?\n?([\s\S]*?)\r?\n?```$/;

/** Remove one code fence wrapping the whole text, if present. */
export function stripCodeFence(text: string): string {
  const trimmed = text.trim();
  const match = FENCE_RE.exec(trimmed);
  return match ? match[1].trim() : trimmed;
}

export function parseRewriteOutput(raw: string): RewriteResult {
  const body = stripCodeFence(raw);
  if (!body) {
    return { ok: false, rawOutput: raw, error: 'LLM returned empty output' };
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(body);
  } catch {
    const snippet = body.slice(0, 100) + (body.length > 100 ? '...' : '');
    return { ok: false, rawOutput: raw, error: `LLM returned invalid output: Invalid JSON: ${snippet}` };
  }

  if (!validatePayload(parsed)) {
    return {
      ok: false,
      rawOutput: raw,
      error: `LLM returned invalid output: ${formatAjvErrors(validatePayload.errors)}`,
    };
  }

  return {
    ok: true,
    optimizedSql: parsed.optimized_sql,
    changes: parsed.changes,
    assumptions: parsed.assumptions,
    risk: parsed.risk,
    rawOutput: raw,
  };
}

/** One model call turned into a RewriteResult. Never rejects. */
export async function requestRewrite(model: RewriteModel, prompt: string): Promise<RewriteResult> {
  let completion: CompletionResult;
  try {
    completion = await model.complete(prompt);
  } catch (err: unknown) {
    const msg = err instanceof Error ? err.message : String(err);
    return { ok: false, error: `LLM call failed: ${msg}` };
  }
  if (!completion.ok) {
    return { ok: false, error: `LLM call failed: ${completion.error}` };
  }
  return parseRewriteOutput(completion.text);
}
