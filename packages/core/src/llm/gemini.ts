/**
 * Gemini provider on @google/genai.
 */

import { GoogleGenAI } from '@google/genai';
import type { ModelConfig } from '../config/config.js';
import { SYSTEM_PROMPT } from './prompt.js';
import type { CompletionResult, RewriteModel } from './types.js';

export class GeminiRewriteModel implements RewriteModel {
  readonly name: string;
  private client: GoogleGenAI;
  private cfg: ModelConfig;

  constructor(cfg: ModelConfig) {
    this.client = new GoogleGenAI({ apiKey: cfg.apiKey });
    this.cfg = cfg;
    this.name = `gemini:${cfg.model}`;
  }

  async complete(prompt: string): Promise<CompletionResult> {
    try {
      const response = await this.client.models.generateContent({
        model: this.cfg.model,
        contents: prompt,
        config: {
          systemInstruction: SYSTEM_PROMPT,
          temperature: this.cfg.temperature,
          maxOutputTokens: this.cfg.maxTokens,
        },
      });
      const text = response.text;
      if (!text) {
        return { ok: false, error: 'Model returned an empty response.' };
      }
      return { ok: true, text };
    } catch (err: unknown) {
      const msg = err instanceof Error ? err.message : String(err);
      return { ok: false, error: msg };
    }
  }
}
