import { AnthropicConfig } from '../../config/anthropic.js';
import { OpenAIConfig } from '../../config/openai.js';
import { JudgmentProvider } from '../../config/resolution.js';
import { ClaudeConcurrentClient } from '../../concurrent/ClaudeConcurrentClient.js';
import { OpenAIConcurrentClient } from '../../concurrent/OpenAIConcurrentClient.js';
import { CompletionClient } from '../../concurrent/types.js';
import { createLogger } from '../../utils/logger.js';

const logger = createLogger('ProviderFactory');

/**
 * Provider Factory
 *
 * Creates the completion client behind judgment and explanation calls
 */
export class ProviderFactory {
  /**
   * Create completion client instance
   *
   * @param provider Provider type ('openai' or 'anthropic')
   * @param scope Label used in the client's log lines
   */
  static createClient(provider: JudgmentProvider, scope: string): CompletionClient {
    switch (provider) {
      case 'openai':
        logger.debug('Using OpenAI chat completions', { scope });
        return new OpenAIConcurrentClient(scope);

      case 'anthropic':
        logger.debug('Using Anthropic messages', { scope });
        return new ClaudeConcurrentClient(scope);
    }
  }

  /**
   * Validate provider configuration
   *
   * @returns true if configuration is valid
   */
  static validateProvider(provider: JudgmentProvider): boolean {
    switch (provider) {
      case 'openai':
        return OpenAIConfig.validate();
      case 'anthropic':
        return AnthropicConfig.validate();
    }
  }
}
