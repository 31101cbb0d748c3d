import OpenAI from 'openai';
import dotenv from 'dotenv';
import { ConfigurationError } from '../domain/errors.js';
import { createLogger } from '../utils/logger.js';
import type { Env } from './resolution.js';

dotenv.config();

const logger = createLogger('OpenAIConfig');

const DEFAULT_MODEL = 'gpt-4o-mini';

export interface OpenAISettings {
  apiKey: string;
  organization?: string;
  model: string;
}

/**
 * OpenAI Configuration
 *
 * Credentials and model for JUDGMENT_PROVIDER=openai. Shared by the
 * judgment service and the chain explainer.
 */
export class OpenAIConfig {
  private static client: OpenAI | null = null;

  static getConfig(env: Env = process.env): OpenAISettings {
    const apiKey = env.OPENAI_API_KEY;
    if (!apiKey) {
      throw new ConfigurationError('OPENAI_API_KEY must be set to use the openai judgment provider');
    }

    return {
      apiKey,
      model: env.OPENAI_MODEL || DEFAULT_MODEL,
      ...(env.OPENAI_ORG_ID ? { organization: env.OPENAI_ORG_ID } : {}),
    };
  }

  /**
   * One SDK client per process
   */
  static getClient(): OpenAI {
    if (!this.client) {
      const { apiKey, organization, model } = this.getConfig();
      this.client = new OpenAI({ apiKey, organization });
      logger.info('OpenAI client initialized', { model, organization });
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
      logger.error('OpenAI configuration invalid', {
        error: error instanceof Error ? error.message : String(error),
      });
      return false;
    }
  }
}
