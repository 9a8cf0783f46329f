/**
 * LLM module barrel export.
 */

export type {
  RiskLevel,
  CompletionResult,
  RewriteModel,
  RewritePayload,
  RewriteResult,
} from './types.js';
export { OpenAIRewriteModel, ANTHROPIC_OPENAI_BASE_URL } from './openai.js';
export type { ChatModelOptions } from './openai.js';
export { GeminiRewriteModel } from './gemini.js';
export { createRewriteModel } from './provider.js';
export { SYSTEM_PROMPT, buildOptimizePrompt, buildFixPrompt, metadataToCompactJson } from './prompt.js';
export type { PromptLimits, OptimizePromptInput, FixPromptInput } from './prompt.js';
export { parseRewriteOutput, requestRewrite, stripCodeFence } from './output.js';
export { rewritePayloadSchema } from './schema_json.js';
