/**
 * Inference Manager
 * Runs inference strategies in order and falls back to local inference
 */

import { InferenceStrategyType, InferenceContext, InferenceResult } from './inference.types';
import { IInferenceStrategy } from './inference.strategy';
import { inferLocal } from './heuristics/local-inference';

export interface InferenceAttempt {
  strategy: string;
  error: string;
}

export class InferenceManager {
  private strategies: IInferenceStrategy[] = [];

  /**
   * Register a strategy at the end of the chain, or at `position`.
   * A strategy with the same name is replaced.
   */
  registerStrategy(strategy: IInferenceStrategy, position?: number): void {
    this.unregisterStrategy(strategy.name);

    if (position === undefined || position >= this.strategies.length) {
      this.strategies.push(strategy);
    } else {
      this.strategies.splice(Math.max(0, position), 0, strategy);
    }
  }

  unregisterStrategy(name: string): boolean {
    const index = this.strategies.findIndex((strategy) => strategy.name === name);
    if (index === -1) {
      return false;
    }
    this.strategies.splice(index, 1);
    return true;
  }

  getStrategy(name: string): IInferenceStrategy | null {
    return this.strategies.find((strategy) => strategy.name === name) || null;
  }

  /**
   * Names of configured strategies, in chain order
   */
  getAvailableStrategies(): string[] {
    return this.strategies.filter((strategy) => strategy.isAvailable()).map((strategy) => strategy.name);
  }

  clear(): void {
    this.strategies = [];
  }

  /**
   * Try every available strategy in order and return the first that
   * yields modules. Never throws.
   */
  async infer(context: InferenceContext): Promise<InferenceResult> {
    const attempts: InferenceAttempt[] = [];

    for (const strategy of this.strategies) {
      if (context.signal?.aborted) {
        console.warn('⚠️  Inference cancelled, using local inference');
        break;
      }
      if (!strategy.isAvailable()) {
        continue;
      }

      const startTime = Date.now();
      let result: InferenceResult;
      try {
        result = await strategy.infer(context);
      } catch (error) {
        result = {
          modules: [],
          success: false,
          strategy: strategy.type,
          strategyName: strategy.name,
          executionTime: Date.now() - startTime,
          error: error instanceof Error ? error.message : 'Unknown error during inference',
        };
      }

      if (result.success && result.modules.length > 0) {
        console.log(`✅ Modules inferred by ${strategy.name} (${result.modules.length})`);
        return { ...result, metadata: { ...result.metadata, attempts } };
      }

      const error = result.error || 'No modules returned';
      attempts.push({ strategy: strategy.name, error });
      console.warn(`⚠️  ${strategy.name} inference failed: ${error}`);
    }

    const startTime = Date.now();
    const modules = inferLocal(context.text, context.maxModules);
    return {
      modules,
      success: modules.length > 0,
      strategy: InferenceStrategyType.HEURISTIC,
      strategyName: 'heuristic',
      executionTime: Date.now() - startTime,
      error: modules.length > 0 ? undefined : 'No structure found in text',
      metadata: { attempts, fallback: true },
    };
  }
}

// Export singleton instance
export const inferenceManager = new InferenceManager();
