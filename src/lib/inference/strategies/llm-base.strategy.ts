/**
 * Base LLM Strategy
 * Abstract base class for hosted-model inference strategies
 */

import { BaseInferenceStrategy } from '../inference.strategy';
import { InferenceStrategyType, InferenceContext, InferenceResult, Module } from '../inference.types';
import { fromRecords } from '../module-records';
import { env } from '../../../config/env';

export const PARSING_FAILED_MODULE = 'Parsing Failed';

export const SYSTEM_PROMPT =
  'You are a technical documentation analyst. You identify the product modules and submodules described by documentation and answer with JSON only.';

export interface LLMResponse {
  text: string;
  modelName?: string;
}

/**
 * Single chat-style completion used by the providers; injectable for tests
 */
export type CompletionFn = (request: {
  model: string;
  system: string;
  prompt: string;
  signal?: AbortSignal;
}) => Promise<string>;

export interface ParsedModules {
  modules: Module[];
  parsed: boolean;
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/**
 * Base LLM strategy with common functionality
 */
export abstract class BaseLLMStrategy extends BaseInferenceStrategy {
  abstract type: InferenceStrategyType;
  abstract name: string;

  /**
   * Provider-specific LLM call
   */
  protected abstract callLLM(prompt: string, signal?: AbortSignal): Promise<LLMResponse>;

  /**
   * Check if provider API is available
   */
  protected abstract isProviderAvailable(): boolean;

  /**
   * Get maximum content length for this provider (in characters)
   */
  protected getMaxContentLength(): number {
    return env.INFERENCE_MAX_CHARS;
  }

  isAvailable(): boolean {
    return this.isProviderAvailable();
  }

  async infer(context: InferenceContext): Promise<InferenceResult> {
    const startTime = Date.now();

    if (!this.isProviderAvailable()) {
      return this.createErrorResult(`${this.name} API key not configured`, Date.now() - startTime);
    }

    try {
      const prompt = this.buildPrompt(context);
      const { text, modelName } = await this.callLLM(prompt, context.signal);
      const { modules, parsed } = this.parseLLMResponse(text);

      if (modules.length === 0) {
        return this.createErrorResult(`${this.name} returned no modules`, Date.now() - startTime);
      }

      return this.createSuccessResult(modules.slice(0, context.maxModules), Date.now() - startTime, {
        modelName: modelName || 'unknown',
        parsed,
        rawResponse: text.substring(0, 500),
      });
    } catch (error) {
      console.error(`${this.name} inference error: ${errorMessage(error)}`);
      return this.createErrorResult(errorMessage(error) || 'Unknown error during LLM inference', Date.now() - startTime);
    }
  }

  protected buildPrompt(context: InferenceContext): string {
    const maxLength = this.getMaxContentLength();
    const content = context.text.length > maxLength ? context.text.substring(0, maxLength) : context.text;

    return `
Analyze the documentation below and identify the main product modules and their submodules.

INSTRUCTIONS:
- Return at least 5 modules when the content supports it, and no more than ${context.maxModules}
- Each module needs a short description of what it covers
- Submodules map a submodule name to a one-sentence description
- Return a JSON array only, with no surrounding prose

RESPONSE FORMAT:
[
  {
    "module": "Module name",
    "Description": "What this module covers",
    "Submodules": {
      "Submodule name": "What this submodule covers"
    }
  }
]

DOCUMENTATION:
${content}

JSON Response:`;
  }

  /**
   * Take the outermost JSON array from the reply. An unparseable reply
   * becomes a single sentinel module carrying the start of the raw text.
   */
  protected parseLLMResponse(text: string): ParsedModules {
    const cleanText = text
      .trim()
      .replace(/```(?:json)?\s*/gi, '')
      .replace(/```/g, '');

    const jsonMatch = cleanText.match(/\[[\s\S]*\]/);

    try {
      if (!jsonMatch) {
        throw new Error('No JSON array found in response');
      }
      const value: unknown = JSON.parse(jsonMatch[0]);
      if (!Array.isArray(value)) {
        throw new Error('Response is not an array');
      }
      return { modules: fromRecords(value), parsed: true };
    } catch (error) {
      console.warn(`⚠️  Failed to parse ${this.name} response: ${errorMessage(error)}`);
      return {
        modules: [
          {
            name: PARSING_FAILED_MODULE,
            description: `Could not parse AI response: ${text.substring(0, 200)}`,
            submodules: {},
          },
        ],
        parsed: false,
      };
    }
  }
}
