import Anthropic from '@anthropic-ai/sdk';
import pLimit from 'p-limit';
import type { Logger } from 'winston';
import { AnthropicConfig } from '../config/anthropic.js';
import { createLogger } from '../utils/logger.js';
import {
  ChatMessage,
  CompletionClient,
  CompletionResponse,
  CompletionSettings,
  ResponseFormat,
  describeApiError,
} from './types.js';

export interface ClaudeConcurrentClientOptions {
  model?: string;
  maxConcurrentApiCalls?: number;
  client?: Anthropic;
}

/**
 * Claude Concurrent Client
 *
 * Wrapper for Anthropic Messages API. JSON output is requested through the
 * system prompt and normalized to the shared CompletionResponse shape.
 */
export class ClaudeConcurrentClient implements CompletionClient {
  private client: Anthropic;
  private logger: Logger;
  private defaultModel: string;
  private apiLimiter: ReturnType<typeof pLimit>;

  constructor(scope: string, options?: ClaudeConcurrentClientOptions) {
    this.client = options?.client ?? AnthropicConfig.getClient();
    this.defaultModel = options?.model || AnthropicConfig.getModel();
    this.apiLimiter = pLimit(options?.maxConcurrentApiCalls ?? 20);
    this.logger = createLogger(`Claude:${scope}`);
  }

  /**
   * Make a Messages API request
   *
   * @param messages Chat messages (system extracted separately)
   * @param responseFormat Response format configuration
   * @param settings Completion settings (model, tokens, temperature)
   */
  async complete(
    messages: ChatMessage[],
    responseFormat: ResponseFormat,
    settings: CompletionSettings = {}
  ): Promise<CompletionResponse> {
    return this.apiLimiter(() =>
      this.retryWithBackoff(async () => {
        try {
          const response = await this.client.messages.create({
            model: settings.model || this.defaultModel,
            max_tokens: this.safeMaxTokens(settings.maxOutputTokens),
            system: buildSystemPrompt(messages, responseFormat),
            messages: messages.flatMap(toAnthropicMessage),
            stream: false,
            ...(settings.temperature !== undefined ? { temperature: settings.temperature } : {}),
          });

          return normalizeResponse(response);
        } catch (error) {
          const shape = describeApiError(error);
          if (isRateLimit(shape)) {
            this.logger.warn('Rate limit hit, will retry', { error: shape.message });
          } else {
            this.logger.error('API call failed', { error: shape.message, status: shape.status });
          }
          throw error;
        }
      })
    );
  }

  /**
   * The SDK refuses non-streaming requests whose token budget implies a
   * runtime over ten minutes; 20k tokens stays under that.
   */
  private safeMaxTokens(requested: number = 4096): number {
    const safe = Math.min(requested, 20000);
    if (requested > safe) {
      this.logger.warn(`Max tokens reduced from ${requested} to ${safe}`);
    }
    return safe;
  }

  /**
   * Retry with exponential backoff on rate limits
   */
  private async retryWithBackoff<T>(fn: () => Promise<T>, maxRetries: number = 3): Promise<T> {
    let lastError: unknown = null;

    for (let attempt = 0; attempt <= maxRetries; attempt++) {
      try {
        return await fn();
      } catch (error) {
        lastError = error;

        if (!isRateLimit(describeApiError(error)) || attempt === maxRetries) {
          throw error;
        }

        const waitSeconds = Math.pow(2, attempt);
        this.logger.info(`Retry attempt ${attempt + 1}/${maxRetries}`, { waitSeconds });
        await new Promise((resolve) => setTimeout(resolve, waitSeconds * 1000));
      }
    }

    throw lastError ?? new Error('Retry failed');
  }
}

function isRateLimit(shape: { status?: number; type?: string }): boolean {
  return shape.status === 429 || shape.type === 'rate_limit_error';
}

function buildSystemPrompt(messages: ChatMessage[], responseFormat: ResponseFormat): string {
  let systemPrompt = messages
    .filter((m) => m.role === 'system')
    .map((m) => m.content)
    .join('\n\n');

  if (responseFormat.type === 'json_schema') {
    systemPrompt +=
      `\n\nYou must respond with valid JSON that matches this exact schema:\n` +
      '```json\n' +
      JSON.stringify(responseFormat.json_schema.schema, null, 2) +
      '\n```\n\nReturn ONLY the JSON object, no markdown, no explanations.';
  } else if (responseFormat.type === 'json_object') {
    systemPrompt += '\n\nYou must respond with valid JSON only. No markdown, no code blocks, no explanations.';
  }

  return systemPrompt.trim();
}

function toAnthropicMessage(message: ChatMessage): Anthropic.MessageParam[] {
  switch (message.role) {
    case 'system':
      return [];
    case 'user':
      return [{ role: 'user', content: message.content }];
    case 'assistant':
      return [{ role: 'assistant', content: message.content }];
  }
}

function normalizeResponse(response: Anthropic.Message): CompletionResponse {
  let content = '';
  for (const block of response.content) {
    if (block.type === 'text') {
      content += block.text;
    }
  }

  return {
    content,
    finishReason: mapStopReason(response.stop_reason),
    usage: {
      prompt: response.usage.input_tokens,
      completion: response.usage.output_tokens,
      total: response.usage.input_tokens + response.usage.output_tokens,
    },
  };
}

function mapStopReason(stopReason: string | null): CompletionResponse['finishReason'] {
  switch (stopReason) {
    case 'end_turn':
    case 'stop_sequence':
      return 'stop';
    case 'max_tokens':
      return 'length';
    default:
      return 'other';
  }
}
