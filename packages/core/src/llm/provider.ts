/**
 * Provider selection: one RewriteModel per configured backend, chosen once.
 */

import type { ModelConfig } from '../config/config.js';
import { createAnthropicModel, createAzureOpenAIModel, createOpenAIModel } from './openai.js';
import { GeminiRewriteModel } from './gemini.js';
import type { RewriteModel } from './types.js';

export function createRewriteModel(cfg: ModelConfig): RewriteModel {
  switch (cfg.provider) {
    case 'openai':
      return createOpenAIModel(cfg);
    case 'azure_openai':
      return createAzureOpenAIModel(cfg);
    case 'anthropic':
      return createAnthropicModel(cfg);
    case 'gemini':
      return new GeminiRewriteModel(cfg);
  }
}
