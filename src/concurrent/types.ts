/**
 * Shared completion-client contract
 *
 * Both provider clients normalize their responses to this shape so callers
 * never see provider-specific payloads.
 */

export interface ChatMessage {
  role: 'system' | 'user' | 'assistant';
  content: string;
}

export type ResponseFormat =
  | { type: 'text' }
  | { type: 'json_object' }
  | {
      type: 'json_schema';
      json_schema: {
        name: string;
        schema: Record<string, unknown>;
        strict?: boolean;
      };
    };

export interface CompletionSettings {
  model?: string;
  maxOutputTokens?: number;
  temperature?: number;
}

export interface TokenUsage {
  prompt: number;
  completion: number;
  total: number;
}

export interface CompletionResponse {
  content: string;
  finishReason: 'stop' | 'length' | 'other';
  usage?: TokenUsage;
}

export interface CompletionClient {
  complete(
    messages: ChatMessage[],
    responseFormat: ResponseFormat,
    settings?: CompletionSettings
  ): Promise<CompletionResponse>;
}

/**
 * Status/header view of an SDK error, read without trusting its shape
 */
export interface ApiErrorShape {
  status?: number;
  code?: string;
  type?: string;
  retryAfter?: string;
  message: string;
}

function readString(record: object, key: string): string | undefined {
  const value: unknown = Reflect.get(record, key);
  return typeof value === 'string' ? value : undefined;
}

export function describeApiError(error: unknown): ApiErrorShape {
  if (typeof error !== 'object' || error === null) {
    return { message: String(error) };
  }

  const status: unknown = Reflect.get(error, 'status');
  const nested: unknown = Reflect.get(error, 'error');
  const headers: unknown = Reflect.get(error, 'headers');

  let retryAfter: string | undefined;
  if (headers instanceof Headers) {
    retryAfter = headers.get('retry-after') ?? undefined;
  } else if (typeof headers === 'object' && headers !== null) {
    retryAfter = readString(headers, 'retry-after');
  }

  return {
    status: typeof status === 'number' ? status : undefined,
    code: readString(error, 'code'),
    type: typeof nested === 'object' && nested !== null ? readString(nested, 'type') : undefined,
    retryAfter,
    message: error instanceof Error ? error.message : String(error),
  };
}
