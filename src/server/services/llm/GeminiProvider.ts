/**
 * Google Gemini LLM Provider
 *
 * Implements LLMProvider interface for the Gemini generateContent REST API.
 */

import type { AxiosInstance } from 'axios';
import axios from 'axios';
import { z } from 'zod';
import type { LLMProvider, LLMMessage, LLMGenerateOptions, LLMResponse } from './LLMProvider.js';
import { logger } from '../../utils/logger.js';
import { createHttpClient, HTTP_TIMEOUTS } from '../../config/httpClient.js';
import { ExternalServiceError } from '../../types/errors.js';
import { ServiceConfigurationError } from '../../utils/serviceErrors.js';

export interface GeminiProviderConfig {
  apiKey: string;
  /** API root including version, e.g. https://generativelanguage.googleapis.com/v1beta */
  baseUrl: string;
  defaultModel: string;
  timeout?: number;
}

const generateContentResponseSchema = z.object({
  candidates: z
    .array(
      z.object({
        content: z
          .object({
            parts: z.array(z.object({ text: z.string().optional() })).default([]),
          })
          .optional(),
      })
    )
    .default([]),
  modelVersion: z.string().optional(),
  usageMetadata: z
    .object({
      promptTokenCount: z.number().optional(),
      candidatesTokenCount: z.number().optional(),
      totalTokenCount: z.number().optional(),
    })
    .optional(),
});

export class GeminiProvider implements LLMProvider {
  private config: GeminiProviderConfig;
  private client: AxiosInstance | null = null;

  constructor(config: GeminiProviderConfig) {
    this.config = config;
  }

  getName(): string {
    return 'gemini';
  }

  async isAvailable(): Promise<boolean> {
    return Boolean(this.config.apiKey);
  }

  private getClient(): AxiosInstance {
    if (!this.client) {
      this.client = createHttpClient({
        baseURL: this.config.baseUrl,
        timeout: this.config.timeout || HTTP_TIMEOUTS.LONG,
        headers: {
          'Content-Type': 'application/json',
        },
      });
    }
    return this.client;
  }

  async generate(messages: LLMMessage[], options?: LLMGenerateOptions): Promise<LLMResponse> {
    if (!this.config.apiKey) {
      throw new ServiceConfigurationError('Gemini', ['GEMINI_API_KEY']);
    }

    const model = options?.model || this.config.defaultModel;
    const temperature = options?.temperature ?? 0.7;
    const maxTokens = options?.max_tokens;

    // Gemini takes one text prompt: system message first, then the rest
    const systemMessage = messages.find((m) => m.role === 'system');
    const otherMessages = messages.filter((m) => m.role !== 'system');
    let prompt = systemMessage ? `${systemMessage.content}\n\n` : '';
    prompt += otherMessages.map((m) => m.content).join('\n\n');

    try {
      const response = await this.getClient().post(
        `/models/${model}:generateContent`,
        {
          contents: [{ parts: [{ text: prompt }] }],
          generationConfig: {
            temperature,
            ...(maxTokens && { maxOutputTokens: maxTokens }),
          },
        },
        {
          params: { key: this.config.apiKey },
          timeout: this.config.timeout || HTTP_TIMEOUTS.LONG,
        }
      );

      const parsed = generateContentResponseSchema.safeParse(response.data);
      const content = parsed.success
        ? parsed.data.candidates[0]?.content?.parts[0]?.text?.trim()
        : undefined;
      if (!parsed.success || !content) {
        throw new ExternalServiceError('Gemini', 'Empty response from Gemini', {
          reason: 'empty_response',
          provider: 'gemini',
          model,
        });
      }

      const usageMetadata = parsed.data.usageMetadata;
      return {
        content,
        model: parsed.data.modelVersion || model,
        usage: usageMetadata
          ? {
              promptTokens: usageMetadata.promptTokenCount || 0,
              completionTokens: usageMetadata.candidatesTokenCount || 0,
              totalTokens: usageMetadata.totalTokenCount || 0,
            }
          : undefined,
      };
    } catch (error) {
      if (axios.isAxiosError(error) && (error.code === 'ECONNABORTED' || error.message.includes('timeout'))) {
        logger.error({ model, timeout: this.config.timeout }, 'Gemini API timeout');
        throw new ExternalServiceError(
          'Gemini',
          `Gemini API call timed out after ${this.config.timeout}ms. Consider increasing GEMINI_TIMEOUT or using a faster model.`,
          { reason: 'timeout', provider: 'gemini', model, timeout: this.config.timeout }
        );
      }
      if (axios.isAxiosError(error)) {
        logger.error({ model, status: error.response?.status }, 'Error calling Gemini API');
        throw new ExternalServiceError('Gemini', `Request failed with status ${error.response?.status ?? 'unknown'}`, {
          reason: 'http_error',
          provider: 'gemini',
          model,
          status: error.response?.status,
        });
      }
      throw error;
    }
  }

  /**
   * Set HTTP client (for testing)
   */
  setClient(client: AxiosInstance): void {
    this.client = client;
  }
}
