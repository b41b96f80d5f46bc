/**
 * LLM Provider Abstraction
 *
 * Provides a unified interface for different LLM providers (Gemini, Groq, OpenAI).
 * Providers throw on failure; LLMService turns that into a typed result.
 */

export interface LLMProvider {
  /**
   * Generate a completion from the LLM
   * @param messages Array of messages (system, user, assistant)
   * @param options Optional configuration (temperature, max_tokens, etc.)
   */
  generate(messages: LLMMessage[], options?: LLMGenerateOptions): Promise<LLMResponse>;

  /**
   * Check if the provider is configured
   */
  isAvailable(): Promise<boolean>;

  getName(): string;
}

export interface LLMMessage {
  role: 'system' | 'user' | 'assistant';
  content: string;
}

export interface LLMGenerateOptions {
  temperature?: number;
  max_tokens?: number;
  model?: string;
}

export interface LLMResponse {
  content: string;
  model: string;
  usage?: {
    promptTokens: number;
    completionTokens: number;
    totalTokens: number;
  };
}
