/**
 * Gemini AI Service
 * Google Generative AI text generation with model fallback
 */

import { GoogleGenerativeAI } from '@google/generative-ai';
import { env } from '../config/env';

// Default model names to try in order of preference
export const DEFAULT_MODELS = ['gemini-1.5-flash', 'gemini-1.5-pro', 'gemini-pro'];

/**
 * Runs one prompt against one named model
 */
export type ModelRunner = (modelName: string, prompt: string, signal?: AbortSignal) => Promise<string>;

export interface GeminiServiceOptions {
  models?: string[];
  maxRetries?: number;
  retryBaseDelay?: number; // ms, doubled per attempt
}

function messageOf(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

function googleRunner(apiKey: string): ModelRunner {
  const genAI = new GoogleGenerativeAI(apiKey);
  return async (modelName, prompt, signal) => {
    const model = genAI.getGenerativeModel({ model: modelName });
    const result = await model.generateContent(prompt, { signal });
    return result.response.text();
  };
}

export class GeminiService {
  private readonly runner: ModelRunner | null;
  private readonly models: string[];
  private readonly maxRetries: number;
  private readonly retryBaseDelay: number;

  constructor(runner?: ModelRunner, options: GeminiServiceOptions = {}) {
    if (runner) {
      this.runner = runner;
    } else {
      this.runner = env.GEMINI_API_KEY ? googleRunner(env.GEMINI_API_KEY) : null;
    }
    this.models = options.models ?? DEFAULT_MODELS;
    this.maxRetries = options.maxRetries ?? 3;
    this.retryBaseDelay = options.retryBaseDelay ?? 1000;
  }

  /**
   * Check if Gemini is available
   */
  isAvailable(): boolean {
    return this.runner !== null;
  }

  private sleep(ms: number, signal?: AbortSignal): Promise<void> {
    return new Promise((resolve) => {
      if (signal?.aborted) {
        resolve();
        return;
      }
      const timer = setTimeout(() => {
        signal?.removeEventListener('abort', onAbort);
        resolve();
      }, ms);
      const onAbort = () => {
        clearTimeout(timer);
        resolve();
      };
      signal?.addEventListener('abort', onAbort, { once: true });
    });
  }

  /**
   * Generate text, falling back across models. 503 and 429 are retried on
   * the same model; 404 moves on to the next one. An aborted `signal` stops
   * before the next attempt.
   */
  async generateText(prompt: string, signal?: AbortSignal): Promise<{ text: string; modelName: string }> {
    if (!this.runner) {
      throw new Error('Gemini API not initialized');
    }

    let lastError: unknown = null;

    for (const modelName of this.models) {
      const cleanModelName = modelName.replace(/^models\//, '');

      for (let attempt = 1; attempt <= this.maxRetries; attempt++) {
        if (signal?.aborted) {
          throw new Error('Gemini request cancelled');
        }

        try {
          const text = await this.runner(cleanModelName, prompt, signal);
          console.log(`✅ Successfully used Gemini model: ${cleanModelName}`);
          return { text, modelName: cleanModelName };
        } catch (error) {
          lastError = error;
          const message = messageOf(error);

          if (message.includes('503') || message.includes('overloaded')) {
            const delay = Math.pow(2, attempt) * this.retryBaseDelay;
            console.log(`⏳ Model ${cleanModelName} overloaded, retry ${attempt}/${this.maxRetries} in ${delay / 1000}s...`);
            await this.sleep(delay, signal);
            continue;
          }

          if (message.includes('429') || message.includes('rate limit')) {
            const delay = Math.pow(2, attempt) * 2 * this.retryBaseDelay;
            console.log(`⏳ Rate limited on ${cleanModelName}, retry ${attempt}/${this.maxRetries} in ${delay / 1000}s...`);
            await this.sleep(delay, signal);
            continue;
          }

          if (message.includes('404') || message.includes('not found')) {
            console.log(`❌ Model ${cleanModelName} not available, trying next...`);
            break;
          }

          throw error;
        }
      }
    }

    throw new Error(
      `Gemini API failed after retries. Last error: ${messageOf(lastError)}. ` +
        `Tried models: ${this.models.join(', ')}.`
    );
  }
}

// Export singleton instance
export const geminiService = new GeminiService();
