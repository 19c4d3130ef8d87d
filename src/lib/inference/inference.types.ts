/**
 * Inference Types
 * Type definitions for module/submodule inference
 */

/**
 * A top-level structural unit of the documentation
 */
export interface Module {
  name: string;
  description: string;

  /**
   * Submodule name -> description (later duplicates overwrite)
   */
  submodules: Record<string, string>;

  /**
   * 0-1, or 0-100 when reported by a model
   */
  confidence?: number;
}

/**
 * Serialized output shape of a module
 */
export interface ModuleRecord {
  module: string;
  Description: string;
  Submodules: Record<string, string>;
  confidence?: number;
}

/**
 * Inference strategy type enumeration
 */
export enum InferenceStrategyType {
  OPENAI = 'openai',
  GROQ = 'groq',
  ANTHROPIC = 'anthropic',
  GEMINI = 'gemini',
  HEURISTIC = 'heuristic',
  CUSTOM = 'custom',
}

/**
 * Inference context - input data for inference
 */
export interface InferenceContext {
  /**
   * Concatenated normalized text (or raw HTML fragments)
   */
  text: string;
  maxModules: number;
  signal?: AbortSignal;
}

/**
 * Inference result - output from an inference strategy
 */
export interface InferenceResult {
  modules: Module[];
  success: boolean;
  strategy: InferenceStrategyType;
  strategyName: string;
  executionTime: number; // Execution time in milliseconds
  error?: string;
  metadata?: Record<string, unknown>;
}
