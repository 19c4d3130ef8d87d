/**
 * Inference Strategies
 * Export all inference strategies
 */

export * from './llm-base.strategy';
export * from './openai.strategy';
export * from './groq.strategy';
export * from './anthropic.strategy';
export * from './gemini.strategy';
export * from './heuristic.strategy';

import { OpenAILLMStrategy } from './openai.strategy';
import { GroqLLMStrategy } from './groq.strategy';
import { AnthropicLLMStrategy } from './anthropic.strategy';
import { GeminiLLMStrategy } from './gemini.strategy';
import { HeuristicInferenceStrategy } from './heuristic.strategy';
import { inferenceManager, InferenceManager } from '../inference.manager';
import type { IInferenceStrategy } from '../inference.strategy';

/**
 * Register the hosted-model strategies that have credentials, in
 * preference order
 */
export function registerLLMStrategies(manager: InferenceManager = inferenceManager): void {
  const candidates: IInferenceStrategy[] = [
    new OpenAILLMStrategy(),
    new GroqLLMStrategy(),
    new AnthropicLLMStrategy(),
    new GeminiLLMStrategy(),
  ];

  for (const strategy of candidates) {
    if (strategy.isAvailable()) {
      manager.registerStrategy(strategy);
      console.log(`✅ Registered ${strategy.name} inference strategy`);
    }
  }

  if (manager.getAvailableStrategies().length === 0) {
    console.warn('⚠️  No LLM inference strategies available. Configure API keys to enable them.');
  }
}

/**
 * Register the heuristic strategy (always available, no API key needed)
 */
export function registerHeuristicStrategy(manager: InferenceManager = inferenceManager): void {
  manager.registerStrategy(new HeuristicInferenceStrategy());
  console.log('✅ Registered heuristic inference strategy');
}

/**
 * Register all available inference strategies
 */
export function registerAllStrategies(manager: InferenceManager = inferenceManager): void {
  registerLLMStrategies(manager);
  registerHeuristicStrategy(manager);

  const available = manager.getAvailableStrategies();
  console.log(`📊 Inference chain: ${available.join(' -> ')}`);
}
