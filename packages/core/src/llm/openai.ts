/**
 * Chat-completions provider. Backs three configurations with one class:
 * OpenAI itself, Azure OpenAI deployments, and Anthropic through its
 * OpenAI-compatible endpoint.
 */

import OpenAI, { AzureOpenAI } from 'openai';
import type { ModelConfig } from '../config/config.js';
import { SYSTEM_PROMPT } from './prompt.js';
import type { CompletionResult, RewriteModel } from './types.js';

export const ANTHROPIC_OPENAI_BASE_URL = 'https://api.anthropic.com/v1/';

export interface ChatModelOptions {
  model: string;
  temperature: number;
  maxTokens: number;
}

export class OpenAIRewriteModel implements RewriteModel {
  readonly name: string;
  private client: OpenAI;
  private opts: ChatModelOptions;

  constructor(client: OpenAI, opts: ChatModelOptions, label = 'openai') {
    this.client = client;
    this.opts = opts;
    this.name = `${label}:${opts.model}`;
  }

  async complete(prompt: string): Promise<CompletionResult> {
    try {
      const response = await this.client.chat.completions.create({
        model: this.opts.model,
        messages: [
          { role: 'system', content: SYSTEM_PROMPT },
          { role: 'user', content: prompt },
        ],
        temperature: this.opts.temperature,
        max_tokens: this.opts.maxTokens,
      });

      const content = response.choices[0]?.message?.content;
      if (!content) {
        return { ok: false, error: 'Model returned an empty response.' };
      }
      return { ok: true, text: content };
    } catch (err: unknown) {
      const msg = err instanceof Error ? err.message : String(err);
      return { ok: false, error: msg };
    }
  }
}

function chatOptions(cfg: ModelConfig): ChatModelOptions {
  return { model: cfg.model, temperature: cfg.temperature, maxTokens: cfg.maxTokens };
}

export function createOpenAIModel(cfg: ModelConfig): OpenAIRewriteModel {
  return new OpenAIRewriteModel(new OpenAI({ apiKey: cfg.apiKey }), chatOptions(cfg), 'openai');
}

export function createAzureOpenAIModel(cfg: ModelConfig): OpenAIRewriteModel {
  if (!cfg.azure) {
    throw new Error('Azure OpenAI requires AZURE_OPENAI_ENDPOINT and AZURE_OPENAI_DEPLOYMENT.');
  }
  const client = new AzureOpenAI({
    apiKey: cfg.apiKey,
    endpoint: cfg.azure.endpoint,
    deployment: cfg.azure.deployment,
    apiVersion: cfg.azure.apiVersion,
  });
  return new OpenAIRewriteModel(client, chatOptions(cfg), 'azure_openai');
}

export function createAnthropicModel(cfg: ModelConfig): OpenAIRewriteModel {
  const client = new OpenAI({ apiKey: cfg.apiKey, baseURL: ANTHROPIC_OPENAI_BASE_URL });
  return new OpenAIRewriteModel(client, chatOptions(cfg), 'anthropic');
}
