/**
 * Gemini LLM Strategy
 * Uses Google Gemini through GeminiService
 */

import { BaseLLMStrategy, SYSTEM_PROMPT } from './llm-base.strategy';
import type { LLMResponse } from './llm-base.strategy';
import { InferenceStrategyType } from '../inference.types';
import { geminiService, GeminiService } from '../../gemini';

export class GeminiLLMStrategy extends BaseLLMStrategy {
  name = 'Gemini';
  type = InferenceStrategyType.GEMINI;

  constructor(private readonly service: GeminiService = geminiService) {
    super();
  }

  protected isProviderAvailable(): boolean {
    return this.service.isAvailable();
  }

  protected async callLLM(prompt: string, signal?: AbortSignal): Promise<LLMResponse> {
    return this.service.generateText(`${SYSTEM_PROMPT}\n${prompt}`, signal);
  }
}
