/**
 * Groq LLM Strategy
 * Groq's OpenAI-compatible endpoint, walking a list of candidate models
 */

import OpenAI from 'openai';
import { OpenAILLMStrategy } from './openai.strategy';
import { errorMessage } from './llm-base.strategy';
import type { CompletionFn } from './llm-base.strategy';
import { InferenceStrategyType } from '../inference.types';
import { env } from '../../../config/env';

export const GROQ_BASE_URL = 'https://api.groq.com/openai/v1';

export const GROQ_CANDIDATE_MODELS = [
  'llama-3.3-70b-versatile',
  'llama-3.1-8b-instant',
  'mixtral-8x7b-32768',
];

export class GroqLLMStrategy extends OpenAILLMStrategy {
  name = 'Groq';
  type = InferenceStrategyType.GROQ;

  private readonly hasCompletion: boolean;

  constructor(completion?: CompletionFn) {
    super(completion);
    this.hasCompletion = completion !== undefined;
  }

  protected isProviderAvailable(): boolean {
    return this.hasCompletion || !!env.GROQ_API_KEY;
  }

  protected getModels(): string[] {
    const preferred = env.GROQ_MODEL ? [env.GROQ_MODEL] : [];
    return [...new Set([...preferred, ...GROQ_CANDIDATE_MODELS])];
  }

  protected createClient(): OpenAI {
    return new OpenAI({ apiKey: env.GROQ_API_KEY, baseURL: GROQ_BASE_URL });
  }

  protected shouldTryNextModel(error: unknown): boolean {
    const message = errorMessage(error).toLowerCase();
    return message.includes('decommissioned') || message.includes('model_not_found');
  }
}
