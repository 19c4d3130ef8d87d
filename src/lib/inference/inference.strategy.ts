/**
 * Inference Strategy
 * Base interface and abstract class for inference strategies
 */

import {
  InferenceStrategyType,
  InferenceContext,
  InferenceResult,
  Module,
} from './inference.types';

/**
 * Inference strategy interface
 */
export interface IInferenceStrategy {
  /**
   * Strategy name, unique within a manager
   */
  name: string;

  type: InferenceStrategyType;

  /**
   * Infer modules from context
   */
  infer(context: InferenceContext): Promise<InferenceResult>;

  /**
   * Check if strategy is available/configured
   */
  isAvailable(): boolean;
}

/**
 * Base inference strategy class
 * Provides common functionality for all strategies
 */
export abstract class BaseInferenceStrategy implements IInferenceStrategy {
  abstract name: string;
  abstract type: InferenceStrategyType;

  abstract infer(context: InferenceContext): Promise<InferenceResult>;

  abstract isAvailable(): boolean;

  /**
   * Drop modules without a name and keep the first of each name
   */
  protected validateModules(modules: Module[]): Module[] {
    const seen = new Set<string>();
    return modules.filter((module) => {
      const name = module.name.trim();
      if (!name || seen.has(name)) {
        return false;
      }
      seen.add(name);
      return true;
    });
  }

  /**
   * Create error result
   */
  protected createErrorResult(error: string, executionTime: number = 0): InferenceResult {
    return {
      modules: [],
      success: false,
      strategy: this.type,
      strategyName: this.name,
      executionTime,
      error,
    };
  }

  /**
   * Create success result
   */
  protected createSuccessResult(
    modules: Module[],
    executionTime: number,
    metadata?: Record<string, unknown>
  ): InferenceResult {
    return {
      modules: this.validateModules(modules),
      success: true,
      strategy: this.type,
      strategyName: this.name,
      executionTime,
      metadata,
    };
  }
}
