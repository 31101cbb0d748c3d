import Anthropic from '@anthropic-ai/sdk';
import dotenv from 'dotenv';
import { ConfigurationError } from '../domain/errors.js';
import { createLogger } from '../utils/logger.js';
import type { Env } from './resolution.js';

dotenv.config();

const logger = createLogger('AnthropicConfig');

const DEFAULT_MODEL = 'claude-sonnet-4-5-20250929';

// Judgment prompts are short; per-call deadlines come from the caller
const CLIENT_TIMEOUT_MS = 120_000;
const CLIENT_MAX_RETRIES = 2;

export interface AnthropicSettings {
  apiKey: string;
  model: string;
}

/**
 * Anthropic Configuration
 *
 * Credentials and model for JUDGMENT_PROVIDER=anthropic
 */
export class AnthropicConfig {
  private static client: Anthropic | null = null;

  static getConfig(env: Env = process.env): AnthropicSettings {
    const apiKey = env.ANTHROPIC_API_KEY;
    if (!apiKey) {
      throw new ConfigurationError('ANTHROPIC_API_KEY must be set to use the anthropic judgment provider');
    }
    return { apiKey, model: env.ANTHROPIC_MODEL || DEFAULT_MODEL };
  }

  static getClient(): Anthropic {
    if (!this.client) {
      const { apiKey, model } = this.getConfig();
      this.client = new Anthropic({ apiKey, timeout: CLIENT_TIMEOUT_MS, maxRetries: CLIENT_MAX_RETRIES });
      logger.info('Anthropic client initialized', { model });
    }
    return this.client;
  }

  static getModel(): string {
    return this.getConfig().model;
  }

  static validate(env: Env = process.env): boolean {
    try {
      this.getConfig(env);
      return true;
    } catch (error) {
      logger.error('Anthropic configuration invalid', {
        error: error instanceof Error ? error.message : String(error),
      });
      return false;
    }
  }
}
