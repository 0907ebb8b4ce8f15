/**
 * Anthropic Messages API provider for the classifier
 */

import Anthropic, { NotFoundError } from '@anthropic-ai/sdk';
import { ModelUnavailableError, createLogger, type Logger } from '@cancel-triage/shared';
import type {
  IClassificationProvider,
  ProviderResponse,
} from '../services/triage/models/service-interfaces.js';

export interface AnthropicProviderOptions {
  timeoutMs?: number;
  maxTokens?: number;
  temperature?: number;
  logger?: Logger;
}

export class AnthropicProvider implements IClassificationProvider {
  private client: Anthropic;
  private maxTokens: number;
  private temperature: number;
  private logger: Logger;

  constructor(apiKey: string, options: AnthropicProviderOptions = {}) {
    const { timeoutMs = 30000, maxTokens = 400, temperature = 0 } = options;
    this.logger = options.logger ?? createLogger('Anthropic');

    // The classifier moves on to the next model instead of retrying one
    this.client = new Anthropic({ apiKey, timeout: timeoutMs, maxRetries: 0 });
    this.maxTokens = maxTokens;
    this.temperature = temperature;
  }

  async complete(systemInstruction: string, userText: string, model: string): Promise<ProviderResponse> {
    const startTime = Date.now();

    try {
      const message = await this.client.messages.create({
        model,
        max_tokens: this.maxTokens,
        temperature: this.temperature,
        system: systemInstruction,
        messages: [{ role: 'user', content: userText }],
      });

      this.logger.info(`${model} completed in ${Date.now() - startTime}ms (prompt: ${userText.length} chars)`);

      return {
        content: message.content.map(block =>
          block.type === 'text' ? { type: block.type, text: block.text } : { type: block.type }
        ),
      };
    } catch (error) {
      this.logger.error(`${model} failed after ${Date.now() - startTime}ms`);
      if (error instanceof NotFoundError) {
        throw new ModelUnavailableError(model, error.message, error);
      }
      throw error;
    }
  }
}
