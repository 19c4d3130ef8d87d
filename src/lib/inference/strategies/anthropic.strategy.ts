/**
 * Anthropic LLM Strategy
 * Uses the Anthropic messages API for inference
 */

import Anthropic from '@anthropic-ai/sdk';
import { BaseLLMStrategy, SYSTEM_PROMPT, errorMessage } from './llm-base.strategy';
import type { CompletionFn, LLMResponse } from './llm-base.strategy';
import { InferenceStrategyType } from '../inference.types';
import { env } from '../../../config/env';

export function anthropicCompletion(client: Anthropic): CompletionFn {
  return async ({ model, system, prompt, signal }) => {
    const response = await client.messages.create(
      {
        model,
        max_tokens: 2000,
        system,
        messages: [{ role: 'user', content: prompt }],
      },
      { signal }
    );
    const block = response.content[0];
    return block?.type === 'text' ? block.text : '';
  };
}

export class AnthropicLLMStrategy extends BaseLLMStrategy {
  name = 'Anthropic';
  type = InferenceStrategyType.ANTHROPIC;

  private completion: CompletionFn | null;

  constructor(completion?: CompletionFn) {
    super();
    this.completion = completion ?? null;
  }

  protected isProviderAvailable(): boolean {
    return this.completion !== null || !!env.ANTHROPIC_API_KEY;
  }

  protected async callLLM(prompt: string, signal?: AbortSignal): Promise<LLMResponse> {
    if (!this.completion) {
      this.completion = anthropicCompletion(new Anthropic({ apiKey: env.ANTHROPIC_API_KEY }));
    }

    const model = env.ANTHROPIC_MODEL;

    try {
      const text = await this.completion({ model, system: SYSTEM_PROMPT, prompt, signal });
      if (!text) {
        throw new Error('Empty response from Anthropic');
      }
      return { text, modelName: model };
    } catch (error) {
      if (error instanceof Anthropic.APIError) {
        if (error.status === 429) {
          throw new Error('Anthropic rate limit exceeded. Please try again later.');
        }
        if (error.status === 401) {
          throw new Error('Anthropic API key is invalid');
        }
      }
      throw new Error(`Anthropic API error: ${errorMessage(error) || 'Unknown error'}`);
    }
  }
}
