/**
 * Heuristic Inference Strategy
 * Wraps local heading-based inference; always available
 */

import { BaseInferenceStrategy } from '../inference.strategy';
import { InferenceStrategyType, InferenceContext, InferenceResult } from '../inference.types';
import { inferLocal } from '../heuristics/local-inference';
import type { LocalInferenceOptions } from '../heuristics/local-inference';

export class HeuristicInferenceStrategy extends BaseInferenceStrategy {
  name = 'heuristic';
  type = InferenceStrategyType.HEURISTIC;

  constructor(private readonly options: LocalInferenceOptions = {}) {
    super();
  }

  isAvailable(): boolean {
    return true;
  }

  async infer(context: InferenceContext): Promise<InferenceResult> {
    const startTime = Date.now();
    const modules = inferLocal(context.text, context.maxModules, this.options);

    if (modules.length === 0) {
      return this.createErrorResult('No structure found in text', Date.now() - startTime);
    }

    return this.createSuccessResult(modules, Date.now() - startTime, {
      moduleCount: modules.length,
    });
  }
}
