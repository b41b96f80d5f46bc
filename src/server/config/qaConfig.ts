/**
 * Question-answering configuration
 *
 * Built once at process start from the validated environment and passed by
 * reference into service wiring. Request-handling code never reads
 * process.env or getEnv() itself.
 */

import { getEnv } from './env.js';
import type {
  Env,
  TextGenerationProviderName,
  EmbeddingProviderName,
} from './env.js';
import { HTTP_TIMEOUTS } from './httpClient.js';
import { ServiceConfigurationError } from '../utils/serviceErrors.js';

export interface TextGenerationSettings {
  provider: TextGenerationProviderName;
  apiKey: string;
  baseUrl?: string;
  model: string;
  temperature: number;
  maxTokens: number;
  timeoutMs: number;
}

export interface EmbeddingSettings {
  provider: EmbeddingProviderName;
  apiKey: string;
  baseUrl?: string;
  model: string;
  dimensions: number;
  timeoutMs: number;
}

export type SimilarityIndexSettings =
  | { provider: 'pinecone'; apiKey: string; baseUrl: string; timeoutMs: number }
  | { provider: 'pgvector'; schema: string };

export interface QaConfig {
  generation: TextGenerationSettings;
  routing: TextGenerationSettings;
  embedding: EmbeddingSettings;
  similarityIndex: SimilarityIndexSettings;
  /** Character budget of the evidence context handed to generation */
  maxContextChars: number;
  /** Number of nearest matches requested from the similarity index */
  similarityTopK: number;
}

const EMBEDDING_DIMENSIONS: Record<EmbeddingProviderName, number> = {
  gemini: 3072,
  openai: 1536,
};

function requireValue(value: string | undefined, serviceName: string, variable: string): string {
  if (!value) {
    throw new ServiceConfigurationError(serviceName, [variable]);
  }
  return value;
}

function resolveTextProvider(
  env: Env,
  provider: TextGenerationProviderName,
  purpose: 'generation' | 'routing'
): TextGenerationSettings {
  const sampling =
    purpose === 'generation'
      ? { temperature: env.QNA_TEMPERATURE, maxTokens: env.QNA_MAX_TOKENS }
      : { temperature: 0, maxTokens: env.ROUTING_MAX_TOKENS };

  switch (provider) {
    case 'gemini':
      return {
        provider,
        apiKey: requireValue(env.GEMINI_API_KEY, 'Gemini', 'GEMINI_API_KEY'),
        baseUrl: env.GEMINI_BASE_URL,
        model: env.GEMINI_MODEL,
        timeoutMs: env.GEMINI_TIMEOUT,
        ...sampling,
      };
    case 'groq':
      return {
        provider,
        apiKey: requireValue(env.GROQ_API_KEY, 'Groq', 'GROQ_API_KEY'),
        baseUrl: env.GROQ_BASE_URL,
        model: purpose === 'generation' ? env.GROQ_MODEL : env.GROQ_ROUTING_MODEL,
        timeoutMs: HTTP_TIMEOUTS.LONG,
        ...sampling,
      };
    case 'openai':
      return {
        provider,
        apiKey: requireValue(env.OPENAI_API_KEY, 'OpenAI', 'OPENAI_API_KEY'),
        baseUrl: env.OPENAI_BASE_URL,
        model: purpose === 'generation' ? env.OPENAI_MODEL : env.OPENAI_ROUTING_MODEL,
        timeoutMs: HTTP_TIMEOUTS.LONG,
        ...sampling,
      };
  }
}

function resolveEmbeddingProvider(env: Env): EmbeddingSettings {
  const provider = env.LLM_EMBEDDING_PROVIDER;
  switch (provider) {
    case 'gemini':
      return {
        provider,
        apiKey: requireValue(env.GEMINI_API_KEY, 'Gemini embeddings', 'GEMINI_API_KEY'),
        baseUrl: env.GEMINI_BASE_URL,
        model: env.GEMINI_EMBEDDING_MODEL,
        dimensions: EMBEDDING_DIMENSIONS.gemini,
        timeoutMs: HTTP_TIMEOUTS.STANDARD,
      };
    case 'openai':
      return {
        provider,
        apiKey: requireValue(env.OPENAI_API_KEY, 'OpenAI embeddings', 'OPENAI_API_KEY'),
        baseUrl: env.OPENAI_BASE_URL,
        model: env.OPENAI_EMBEDDING_MODEL,
        dimensions: EMBEDDING_DIMENSIONS.openai,
        timeoutMs: HTTP_TIMEOUTS.STANDARD,
      };
  }
}

function resolveSimilarityIndex(env: Env): SimilarityIndexSettings {
  if (env.VECTOR_INDEX_PROVIDER === 'pgvector') {
    return { provider: 'pgvector', schema: env.PGVECTOR_SCHEMA };
  }
  const missing: string[] = [];
  if (!env.PINECONE_API_KEY) missing.push('PINECONE_API_KEY');
  if (!env.PINECONE_BASE_URL) missing.push('PINECONE_BASE_URL');
  if (!env.PINECONE_API_KEY || !env.PINECONE_BASE_URL) {
    throw new ServiceConfigurationError('Pinecone', missing);
  }
  return {
    provider: 'pinecone',
    apiKey: env.PINECONE_API_KEY,
    baseUrl: env.PINECONE_BASE_URL,
    timeoutMs: HTTP_TIMEOUTS.STANDARD,
  };
}

/**
 * Build the immutable QA configuration.
 * @throws {ServiceConfigurationError} When a selected provider is missing credentials
 */
export function loadQaConfig(env: Env = getEnv()): Readonly<QaConfig> {
  const config: QaConfig = {
    generation: resolveTextProvider(env, env.LLM_TEXT_GENERATION_PROVIDER, 'generation'),
    routing: resolveTextProvider(env, env.LLM_ROUTING_PROVIDER, 'routing'),
    embedding: resolveEmbeddingProvider(env),
    similarityIndex: resolveSimilarityIndex(env),
    maxContextChars: env.QNA_CONTEXT_MAX_CHARS,
    similarityTopK: env.QNA_SIMILARITY_TOP_K,
  };

  Object.freeze(config.generation);
  Object.freeze(config.routing);
  Object.freeze(config.embedding);
  Object.freeze(config.similarityIndex);
  return Object.freeze(config);
}
