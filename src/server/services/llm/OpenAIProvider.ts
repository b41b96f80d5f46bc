/**
 * OpenAI-compatible LLM Provider
 *
 * Implements LLMProvider for any chat-completions endpoint the openai SDK can
 * talk to: OpenAI itself, and Groq through its OpenAI-compatible baseURL.
 */

import OpenAI from 'openai';
import type { LLMProvider, LLMMessage, LLMGenerateOptions, LLMResponse } from './LLMProvider.js';
import { logger } from '../../utils/logger.js';
import { ExternalServiceError } from '../../types/errors.js';
import { ServiceConfigurationError } from '../../utils/serviceErrors.js';

/**
 * The slice of the SDK client this provider uses
 */
export interface OpenAIClient {
  chat: {
    completions: {
      create: (params: {
        model: string;
        messages: LLMMessage[];
        temperature?: number;
        max_tokens?: number;
      }) => Promise<{
        choices: Array<{
          message?: {
            content?: string | null;
          };
        }>;
        model: string;
        usage?: {
          prompt_tokens: number;
          completion_tokens: number;
          total_tokens: number;
        };
      }>;
    };
  };
}

export interface OpenAIProviderConfig {
  /** Provider label used in logs and errors: 'openai' or 'groq' */
  name: string;
  apiKey: string;
  baseUrl?: string;
  defaultModel: string;
  timeout?: number;
}

export class OpenAIProvider implements LLMProvider {
  private config: OpenAIProviderConfig;
  private client: OpenAIClient | null = null;

  constructor(config: OpenAIProviderConfig) {
    this.config = config;
  }

  getName(): string {
    return this.config.name;
  }

  async isAvailable(): Promise<boolean> {
    return Boolean(this.config.apiKey);
  }

  private getClient(): OpenAIClient {
    if (!this.client) {
      if (!this.config.apiKey) {
        throw new ServiceConfigurationError(this.config.name, [`${this.config.name.toUpperCase()}_API_KEY`]);
      }
      const sdk = new OpenAI({
        apiKey: this.config.apiKey,
        ...(this.config.baseUrl && { baseURL: this.config.baseUrl }),
        ...(this.config.timeout && { timeout: this.config.timeout }),
        maxRetries: 0,
      });
      this.client = {
        chat: {
          completions: {
            create: (params) => sdk.chat.completions.create(params),
          },
        },
      };
    }
    return this.client;
  }

  async generate(messages: LLMMessage[], options?: LLMGenerateOptions): Promise<LLMResponse> {
    const client = this.getClient();
    const model = options?.model || this.config.defaultModel;
    const temperature = options?.temperature ?? 0.7;
    const max_tokens = options?.max_tokens;

    try {
      const response = await client.chat.completions.create({
        model,
        messages: messages.map((msg) => ({
          role: msg.role,
          content: msg.content,
        })),
        temperature,
        ...(max_tokens && { max_tokens }),
      });

      const content = response.choices[0]?.message?.content?.trim();
      if (!content) {
        throw new ExternalServiceError(this.config.name, `Empty response from ${this.config.name}`, {
          reason: 'empty_response',
          provider: this.config.name,
          model,
        });
      }

      return {
        content,
        model: response.model,
        usage: response.usage
          ? {
              promptTokens: response.usage.prompt_tokens,
              completionTokens: response.usage.completion_tokens,
              totalTokens: response.usage.total_tokens,
            }
          : undefined,
      };
    } catch (error) {
      logger.error(
        { error: error instanceof Error ? error.message : String(error), model, provider: this.config.name },
        'Error calling chat completions'
      );
      throw error;
    }
  }

  /**
   * Set OpenAI client (for testing)
   */
  setClient(client: OpenAIClient): void {
    this.client = client;
  }
}
