/**
 * OpenAI LLM Strategy
 * Uses the OpenAI chat completions API for inference
 */

import OpenAI from 'openai';
import { BaseLLMStrategy, SYSTEM_PROMPT, errorMessage } from './llm-base.strategy';
import type { CompletionFn, LLMResponse } from './llm-base.strategy';
import { InferenceStrategyType } from '../inference.types';
import { env } from '../../../config/env';

/**
 * Completion through any OpenAI-compatible endpoint
 */
export function openAICompletion(client: OpenAI): CompletionFn {
  return async ({ model, system, prompt, signal }) => {
    const response = await client.chat.completions.create(
      {
        model,
        messages: [
          { role: 'system', content: system },
          { role: 'user', content: prompt },
        ],
        temperature: 0.3,
        max_tokens: 2000,
      },
      { signal }
    );
    return response.choices[0]?.message?.content || '';
  };
}

export class OpenAILLMStrategy extends BaseLLMStrategy {
  name = 'OpenAI';
  type = InferenceStrategyType.OPENAI;

  private completion: CompletionFn | null;

  constructor(completion?: CompletionFn) {
    super();
    this.completion = completion ?? null;
  }

  protected isProviderAvailable(): boolean {
    return this.completion !== null || !!env.OPENAI_API_KEY;
  }

  /**
   * Models to try, in order
   */
  protected getModels(): string[] {
    return [env.OPENAI_MODEL];
  }

  protected createClient(): OpenAI {
    return new OpenAI({ apiKey: env.OPENAI_API_KEY });
  }

  /**
   * Whether a failed model should be skipped in favour of the next one
   */
  protected shouldTryNextModel(_error: unknown): boolean {
    return false;
  }

  private getCompletion(): CompletionFn {
    if (!this.completion) {
      this.completion = openAICompletion(this.createClient());
    }
    return this.completion;
  }

  protected async callLLM(prompt: string, signal?: AbortSignal): Promise<LLMResponse> {
    const complete = this.getCompletion();
    const models = this.getModels();
    let lastError: unknown = null;

    for (const model of models) {
      try {
        const text = await complete({ model, system: SYSTEM_PROMPT, prompt, signal });
        if (!text) {
          throw new Error(`Empty response from ${this.name}`);
        }
        return { text, modelName: model };
      } catch (error) {
        lastError = error;
        if (this.shouldTryNextModel(error)) {
          console.log(`❌ Model ${model} not available on ${this.name}, trying next...`);
          continue;
        }
        throw this.describeError(error);
      }
    }

    throw new Error(
      `${this.name} has no usable model. Last error: ${errorMessage(lastError)}. Tried models: ${models.join(', ')}`
    );
  }

  private describeError(error: unknown): Error {
    if (error instanceof OpenAI.APIError) {
      if (error.status === 429) {
        return new Error(`${this.name} rate limit exceeded`);
      }
      if (error.status === 401) {
        return new Error(`${this.name} API key is invalid`);
      }
    }
    return new Error(`${this.name} API error: ${errorMessage(error) || 'Unknown error'}`);
  }
}
