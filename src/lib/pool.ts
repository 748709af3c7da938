/**
 * Advisory Pool - concurrency management for language-model calls
 *
 * Features:
 * - Configurable max concurrency (semaphore-based)
 * - Adaptive backoff on rate limiting (429 errors)
 * - Automatic retries with exponential backoff
 * - Injectable generator so the model call can be stubbed
 */

import { APICallError, generateObject } from 'ai';
import { google } from '@ai-sdk/google';
import { z } from 'zod';

// ============================================
// Types
// ============================================

export const AdviceSchema = z.object({
  reasoning: z
    .string()
    .describe('Reasoning based on elevation, NDVI and compactness'),
  rating: z
    .number()
    .int()
    .min(1)
    .max(10)
    .describe('Archaeological potential from 1 (very unlikely) to 10 (highly likely)'),
  summary: z.string().describe('Brief summary of key considerations'),
});

export type Advice = z.infer<typeof AdviceSchema>;

export type TokenUsage = {
  promptTokens: number;
  completionTokens: number;
};

export type AdviceRequest = {
  model: string;
  prompt: string;
  temperature: number;
};

export type AdviceGenerator = (request: AdviceRequest) => Promise<{ object: Advice; usage?: TokenUsage }>;

export type PoolConfig = {
  /** Max concurrent API calls */
  maxConcurrency: number;
  /** Model name (e.g., 'gemini-1.5-flash') */
  model: string;
  /** Base delay for retries in ms (default: 2000) */
  baseDelayMs?: number;
  /** Max retry attempts (default: 6) */
  maxRetries?: number;
  /** Enable debug logging */
  debug?: boolean;
  /** Model call, defaults to Gemini through the AI SDK */
  generate?: AdviceGenerator;
};

type QueuedTask = {
  execute: () => Promise<void>;
};

// ============================================
// Default generator
// ============================================

export const generateWithGemini: AdviceGenerator = async ({ model, prompt, temperature }) => {
  const result = await generateObject({
    model: google(model),
    schema: AdviceSchema,
    prompt,
    temperature,
  });
  return {
    object: result.object,
    usage: { promptTokens: result.usage.promptTokens, completionTokens: result.usage.completionTokens },
  };
};

// ============================================
// Pool Implementation
// ============================================

export class AdvisoryPool {
  private config: Required<PoolConfig>;
  private inFlight = 0;
  private queue: QueuedTask[] = [];
  private globalBackoffUntil = 0;
  private consecutiveRateLimits = 0;
  private stats = {
    totalCalls: 0,
    totalPromptTokens: 0,
    totalCompletionTokens: 0,
    estimatedCost: 0,
  };

  constructor(config: PoolConfig) {
    this.config = {
      maxConcurrency: config.maxConcurrency,
      model: config.model,
      baseDelayMs: config.baseDelayMs ?? 2000,
      maxRetries: config.maxRetries ?? 6,
      debug: config.debug ?? false,
      generate: config.generate ?? generateWithGemini,
    };
  }

  /**
   * Ask the model for advice on one prompt, through the pool
   */
  async generateAdvice(prompt: string, temperature = 0.2): Promise<Advice> {
    return this.enqueue(() => this.executeWithRetry({ model: this.config.model, prompt, temperature }));
  }

  /**
   * Get current pool stats
   */
  getStats() {
    return {
      inFlight: this.inFlight,
      queued: this.queue.length,
      maxConcurrency: this.config.maxConcurrency,
      backoffActive: Date.now() < this.globalBackoffUntil,
    };
  }

  /**
   * Get usage statistics (calls, tokens, cost)
   */
  getUsageStats() {
    return { ...this.stats };
  }

  // ============================================
  // Private Methods
  // ============================================

  private async enqueue<T>(execute: () => Promise<T>): Promise<T> {
    // Wait for global backoff if active
    await this.waitForBackoff();

    // If we have capacity, execute immediately
    if (this.inFlight < this.config.maxConcurrency) {
      return this.runTask(execute);
    }

    // Otherwise, queue and wait
    return new Promise<T>((resolve, reject) => {
      this.queue.push({
        execute: () => this.runTask(execute).then(resolve, reject),
      });
      this.log(`Queued task (queue size: ${this.queue.length})`);
    });
  }

  private async runTask<T>(execute: () => Promise<T>): Promise<T> {
    this.inFlight++;
    this.log(`Starting task (in-flight: ${this.inFlight})`);

    try {
      const result = await execute();
      this.consecutiveRateLimits = 0; // Reset on success
      return result;
    } finally {
      this.inFlight--;
      this.log(`Completed task (in-flight: ${this.inFlight})`);
      this.processQueue();
    }
  }

  private processQueue() {
    if (this.inFlight >= this.config.maxConcurrency) return;
    if (Date.now() < this.globalBackoffUntil) {
      setTimeout(() => this.processQueue(), this.globalBackoffUntil - Date.now());
      return;
    }

    const task = this.queue.shift();
    if (!task) return;
    void task.execute();
  }

  private async waitForBackoff() {
    const now = Date.now();
    if (now < this.globalBackoffUntil) {
      const waitMs = this.globalBackoffUntil - now;
      this.log(`Waiting for global backoff: ${waitMs}ms`);
      await sleep(waitMs);
    }
  }

  private applyRateLimitBackoff() {
    this.consecutiveRateLimits++;
    // Exponential backoff: 4s, 8s, 16s, 32s, capped at 60s
    const backoffMs = Math.min(this.config.baseDelayMs * Math.pow(2, this.consecutiveRateLimits), 60000);
    this.globalBackoffUntil = Date.now() + backoffMs;
    this.log(`Rate limited! Global backoff for ${backoffMs}ms (consecutive: ${this.consecutiveRateLimits})`);
  }

  private async executeWithRetry(request: AdviceRequest): Promise<Advice> {
    let lastError: unknown;

    for (let attempt = 0; attempt < this.config.maxRetries; attempt++) {
      try {
        const result = await this.config.generate(request);

        this.stats.totalCalls++;
        if (result.usage) {
          this.stats.totalPromptTokens += result.usage.promptTokens;
          this.stats.totalCompletionTokens += result.usage.completionTokens;
          this.stats.estimatedCost += this.estimateCost(this.config.model, result.usage);
        }

        return result.object;
      } catch (error) {
        lastError = error;

        if (this.isRateLimitError(error)) {
          this.applyRateLimitBackoff();
          await this.waitForBackoff();
        } else if (this.isRetryableError(error)) {
          const delay = this.config.baseDelayMs * Math.pow(2, attempt);
          this.log(`Retryable error, waiting ${delay}ms (attempt ${attempt + 1}/${this.config.maxRetries})`);
          await sleep(delay);
        } else {
          // Non-retryable error, throw immediately
          throw error;
        }
      }
    }

    throw lastError;
  }

  private estimateCost(model: string, usage: TokenUsage): number {
    // Pricing per 1M tokens
    const pricing: Record<string, { input: number; output: number }> = {
      'gemini-1.5-pro': { input: 3.5, output: 10.5 },
      'gemini-1.5-flash': { input: 0.075, output: 0.3 },
      'gemini-2.0-flash': { input: 0.1, output: 0.4 },
    };

    // Normalize model name to find match
    const modelKey = Object.keys(pricing).find((k) => model.includes(k));
    const price = modelKey ? pricing[modelKey] : { input: 0, output: 0 };

    const inputCost = (usage.promptTokens / 1_000_000) * price.input;
    const outputCost = (usage.completionTokens / 1_000_000) * price.output;

    return inputCost + outputCost;
  }

  private statusOf(error: unknown): number | undefined {
    if (APICallError.isInstance(error)) return error.statusCode;
    if (typeof error === 'object' && error !== null && 'status' in error && typeof error.status === 'number') {
      return error.status;
    }
    return undefined;
  }

  private isRateLimitError(error: unknown): boolean {
    if (error instanceof Error) {
      const message = error.message.toLowerCase();
      return (
        message.includes('rate limit') ||
        message.includes('429') ||
        message.includes('too many requests') ||
        message.includes('quota') ||
        this.statusOf(error) === 429
      );
    }
    return false;
  }

  private isRetryableError(error: unknown): boolean {
    if (error instanceof Error) {
      const status = this.statusOf(error);
      // Retry on 5xx errors, timeouts, network errors
      return (
        (status !== undefined && status >= 500 && status < 600) ||
        error.message.includes('timeout') ||
        error.message.includes('ECONNRESET') ||
        error.message.includes('ETIMEDOUT') ||
        error.message.includes('other side closed') ||
        error.message.includes('fetch failed') ||
        error.message.includes('socket')
      );
    }
    return false;
  }

  private log(message: string) {
    if (this.config.debug) {
      console.log(`[AdvisoryPool] ${message}`);
    }
  }
}

// ============================================
// Helper
// ============================================

const sleep = (ms: number) => new Promise((resolve) => setTimeout(resolve, ms));

// ============================================
// Factory Function
// ============================================

export function createAdvisoryPool(config: PoolConfig): AdvisoryPool {
  return new AdvisoryPool(config);
}
