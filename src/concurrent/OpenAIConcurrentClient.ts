import OpenAI from 'openai';
import pLimit from 'p-limit';
import type { Logger } from 'winston';
import { OpenAIConfig } from '../config/openai.js';
import { createLogger } from '../utils/logger.js';
import {
  ChatMessage,
  CompletionClient,
  CompletionResponse,
  CompletionSettings,
  ResponseFormat,
  describeApiError,
} from './types.js';

/**
 * OpenAI Concurrent Client Options
 */
export interface OpenAIConcurrentClientOptions {
  model?: string;
  /**
   * Maximum concurrent API calls allowed. Excess calls queue.
   * Default: 20
   */
  maxConcurrentApiCalls?: number;
  /**
   * Maximum requests per second. Adds delay between requests.
   * Default: undefined (only concurrency limiting)
   */
  requestsPerSecond?: number;
  /** Injected SDK client; defaults to the configured one */
  client?: OpenAI;
}

/**
 * OpenAI Concurrent Client
 *
 * Wrapper for OpenAI chat completions with JSON output.
 * Handles retry logic, rate limiting, and error handling for concurrent requests.
 */
export class OpenAIConcurrentClient implements CompletionClient {
  private client: OpenAI;
  private logger: Logger;
  private defaultModel: string;
  private apiLimiter: ReturnType<typeof pLimit>;
  private minDelayMs: number;
  private lastRequestTime: number = 0;
  private rateLimitMutex: Promise<void> = Promise.resolve();

  constructor(scope: string, options?: OpenAIConcurrentClientOptions) {
    const maxConcurrentApiCalls = options?.maxConcurrentApiCalls ?? 20;
    const requestsPerSecond = options?.requestsPerSecond;

    this.apiLimiter = pLimit(maxConcurrentApiCalls);
    this.minDelayMs = requestsPerSecond ? Math.ceil(1000 / requestsPerSecond) : 0;

    this.client = options?.client ?? OpenAIConfig.getClient();
    this.defaultModel = options?.model || OpenAIConfig.getModel();
    this.logger = createLogger(`OpenAI:${scope}`);

    this.logger.debug('Client initialized', {
      model: this.defaultModel,
      maxConcurrentApiCalls,
      requestsPerSecond: requestsPerSecond ?? 'unlimited',
      minDelayMs: this.minDelayMs,
    });
  }

  /**
   * Enforce rate limiting by waiting if necessary
   * Uses a mutex to ensure sequential timing even with concurrent calls
   */
  private async enforceRateLimit(): Promise<void> {
    if (this.minDelayMs === 0) return;

    this.rateLimitMutex = this.rateLimitMutex.then(async () => {
      const elapsed = Date.now() - this.lastRequestTime;
      const waitTime = this.minDelayMs - elapsed;

      if (waitTime > 0) {
        this.logger.debug(`Rate limiting: waiting ${waitTime}ms`);
        await new Promise((resolve) => setTimeout(resolve, waitTime));
      }

      this.lastRequestTime = Date.now();
    });

    await this.rateLimitMutex;
  }

  /**
   * Make a chat completion request
   *
   * @param messages Chat messages (system + user)
   * @param responseFormat Response format configuration
   * @param settings Completion settings (model, tokens, temperature)
   */
  async complete(
    messages: ChatMessage[],
    responseFormat: ResponseFormat,
    settings: CompletionSettings = {}
  ): Promise<CompletionResponse> {
    return this.apiLimiter(async () => {
      this.logger.debug('API slot acquired', {
        activeCount: this.apiLimiter.activeCount,
        pendingCount: this.apiLimiter.pendingCount,
      });

      await this.enforceRateLimit();

      return this.retryWithBackoff(async () => {
        try {
          const response = await this.client.chat.completions.create({
            model: settings.model || this.defaultModel,
            messages: messages.map(toOpenAIMessage),
            response_format: responseFormat,
            ...(settings.maxOutputTokens ? { max_tokens: settings.maxOutputTokens } : {}),
            ...(settings.temperature !== undefined ? { temperature: settings.temperature } : {}),
          });

          const choice = response.choices[0];
          return {
            content: choice?.message.content ?? '',
            finishReason: mapFinishReason(choice?.finish_reason),
            usage: response.usage
              ? {
                  prompt: response.usage.prompt_tokens,
                  completion: response.usage.completion_tokens,
                  total: response.usage.total_tokens,
                }
              : undefined,
          };
        } catch (error) {
          const shape = describeApiError(error);
          if (isRateLimit(shape)) {
            this.logger.warn('Rate limit hit, will retry', {
              error: shape.message,
              retryAfter: shape.retryAfter,
            });
          } else {
            this.logger.error('API call failed', { error: shape.message, status: shape.status });
          }
          throw error;
        }
      });
    });
  }

  /**
   * Retry with Retry-After header support
   *
   * Uses the Retry-After header from 429 responses when available,
   * falls back to exponential backoff otherwise.
   *
   * @param fn Function to retry
   * @param maxRetries Maximum number of retries
   */
  private async retryWithBackoff<T>(fn: () => Promise<T>, maxRetries: number = 3): Promise<T> {
    let lastError: unknown = null;

    for (let attempt = 0; attempt <= maxRetries; attempt++) {
      try {
        return await fn();
      } catch (error) {
        lastError = error;
        const shape = describeApiError(error);

        if (!isRateLimit(shape) || attempt === maxRetries) {
          throw error;
        }

        let waitSeconds = shape.retryAfter ? parseInt(shape.retryAfter, 10) : NaN;
        if (isNaN(waitSeconds)) {
          // 2s, 4s, 8s ... plus jitter
          waitSeconds = Math.pow(2, attempt + 1) + Math.random() * 2;
        }
        waitSeconds = Math.min(waitSeconds, 60);

        this.logger.info('Rate limited, backing off', {
          waitSeconds: waitSeconds.toFixed(1),
          attempt: attempt + 1,
          maxRetries,
        });
        await new Promise((resolve) => setTimeout(resolve, waitSeconds * 1000));
      }
    }

    throw lastError ?? new Error('Retry failed');
  }
}

function isRateLimit(shape: { status?: number; code?: string }): boolean {
  return shape.status === 429 || shape.code === 'rate_limit_exceeded';
}

function toOpenAIMessage(message: ChatMessage): OpenAI.Chat.ChatCompletionMessageParam {
  switch (message.role) {
    case 'system':
      return { role: 'system', content: message.content };
    case 'user':
      return { role: 'user', content: message.content };
    case 'assistant':
      return { role: 'assistant', content: message.content };
  }
}

function mapFinishReason(reason: string | null | undefined): CompletionResponse['finishReason'] {
  switch (reason) {
    case 'stop':
      return 'stop';
    case 'length':
      return 'length';
    default:
      return 'other';
  }
}
