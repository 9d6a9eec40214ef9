/**
 * Language Model Strategies
 */

import { GoogleGenerativeAI } from '@google/generative-ai';
import type { GenerateContentResult } from '@google/generative-ai';
import { GENERATION_CONFIG } from '../../constants/pipeline-constants.js';

/**
 * Text-in, text-out model used by the generation step
 *
 * Implementations reject on any failure; the caller maps rejections to
 * ModelUnavailableError.
 */
export interface LanguageModel {
  readonly modelId: string;
  generate(prompt: string): Promise<string>;
}

/**
 * The generation call used from a GenerativeModel
 */
export interface GenerationClient {
  generateContent(prompt: string): Promise<GenerateContentResult>;
}

export interface GeminiLanguageModelOptions {
  apiKey: string;

  /** Model name, default gemini-1.5-flash */
  model?: string;

  /** Client override (defaults to a GoogleGenerativeAI model) */
  client?: GenerationClient;
}

export class GeminiLanguageModel implements LanguageModel {
  readonly modelId: string;
  private readonly client: GenerationClient;

  constructor(options: GeminiLanguageModelOptions) {
    this.modelId = options.model ?? GENERATION_CONFIG.DEFAULT_MODEL;
    this.client =
      options.client ??
      new GoogleGenerativeAI(options.apiKey).getGenerativeModel({ model: this.modelId });
  }

  async generate(prompt: string): Promise<string> {
    const result = await this.client.generateContent(prompt);
    // text() throws when the response was blocked or has no candidates
    return result.response.text();
  }
}
