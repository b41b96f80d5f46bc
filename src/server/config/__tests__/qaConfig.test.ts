import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { resetEnv, validateEnv } from '../env.js';
import { loadQaConfig } from '../qaConfig.js';
import { ServiceConfigurationError } from '../../utils/serviceErrors.js';

const MANAGED_KEYS = [
  'LLM_TEXT_GENERATION_PROVIDER',
  'LLM_ROUTING_PROVIDER',
  'LLM_EMBEDDING_PROVIDER',
  'VECTOR_INDEX_PROVIDER',
  'GEMINI_API_KEY',
  'GROQ_API_KEY',
  'OPENAI_API_KEY',
  'PINECONE_API_KEY',
  'PINECONE_BASE_URL',
  'PGVECTOR_SCHEMA',
  'QNA_CONTEXT_MAX_CHARS',
  'QNA_SIMILARITY_TOP_K',
  'ROUTING_MAX_TOKENS',
];

let saved: Record<string, string | undefined> = {};

function setEnv(values: Record<string, string>): void {
  Object.assign(process.env, values);
  resetEnv();
}

beforeEach(() => {
  saved = {};
  for (const key of MANAGED_KEYS) {
    saved[key] = process.env[key];
    delete process.env[key];
  }
  resetEnv();
});

afterEach(() => {
  for (const key of MANAGED_KEYS) {
    const value = saved[key];
    if (value === undefined) {
      delete process.env[key];
    } else {
      process.env[key] = value;
    }
  }
  resetEnv();
});

describe('validateEnv', () => {
  it('applies defaults for question answering', () => {
    const env = validateEnv();

    expect(env.NODE_ENV).toBe('test');
    expect(env.JWT_SECRET).toBeTruthy();
    expect(env.LLM_TEXT_GENERATION_PROVIDER).toBe('groq');
    expect(env.LLM_ROUTING_PROVIDER).toBe('groq');
    expect(env.LLM_EMBEDDING_PROVIDER).toBe('gemini');
    expect(env.VECTOR_INDEX_PROVIDER).toBe('pinecone');
    expect(env.QNA_CONTEXT_MAX_CHARS).toBe(8000);
    expect(env.QNA_SIMILARITY_TOP_K).toBe(3);
    expect(env.ROUTING_MAX_TOKENS).toBe(150);
  });

  it('accepts provider names in any case', () => {
    setEnv({ LLM_TEXT_GENERATION_PROVIDER: 'OpenAI' });

    expect(validateEnv().LLM_TEXT_GENERATION_PROVIDER).toBe('openai');
  });

  it('lists every invalid value in one error', () => {
    setEnv({ LLM_TEXT_GENERATION_PROVIDER: 'claude', QNA_SIMILARITY_TOP_K: '0' });

    expect(() => validateEnv()).toThrow(
      'Environment validation failed:\n' +
        '  - QNA_SIMILARITY_TOP_K: Invalid value "0". Must be between 1 and 50.\n' +
        '  - LLM_TEXT_GENERATION_PROVIDER: Invalid value "claude". Must be one of gemini, groq, openai.'
    );
  });
});

describe('loadQaConfig', () => {
  it('resolves the default providers and budgets', () => {
    setEnv({
      GROQ_API_KEY: 'test-groq',
      GEMINI_API_KEY: 'test-gemini',
      PINECONE_API_KEY: 'test-pinecone',
      PINECONE_BASE_URL: 'https://index.test',
    });

    const config = loadQaConfig();

    expect(config.generation).toMatchObject({
      provider: 'groq',
      apiKey: 'test-groq',
      model: 'llama-3.3-70b-versatile',
      temperature: 0.1,
      maxTokens: 1000,
    });
    expect(config.routing).toMatchObject({
      provider: 'groq',
      model: 'llama-3.1-8b-instant',
      temperature: 0,
      maxTokens: 150,
    });
    expect(config.embedding).toMatchObject({ provider: 'gemini', model: 'gemini-embedding-001', dimensions: 3072 });
    expect(config.similarityIndex).toEqual({
      provider: 'pinecone',
      apiKey: 'test-pinecone',
      baseUrl: 'https://index.test',
      timeoutMs: 30000,
    });
    expect(config.maxContextChars).toBe(8000);
    expect(config.similarityTopK).toBe(3);
  });

  it('is immutable', () => {
    setEnv({ GROQ_API_KEY: 'test-groq', GEMINI_API_KEY: 'test-gemini', VECTOR_INDEX_PROVIDER: 'pgvector' });

    const config = loadQaConfig();

    expect(Object.isFrozen(config)).toBe(true);
    expect(Object.isFrozen(config.generation)).toBe(true);
    expect(Object.isFrozen(config.similarityIndex)).toBe(true);
  });

  it('selects pgvector without Pinecone credentials', () => {
    setEnv({
      GROQ_API_KEY: 'test-groq',
      GEMINI_API_KEY: 'test-gemini',
      VECTOR_INDEX_PROVIDER: 'pgvector',
      PGVECTOR_SCHEMA: 'embeddings',
    });

    expect(loadQaConfig().similarityIndex).toEqual({ provider: 'pgvector', schema: 'embeddings' });
  });

  it('routes and answers with different providers when configured', () => {
    setEnv({
      LLM_TEXT_GENERATION_PROVIDER: 'gemini',
      LLM_ROUTING_PROVIDER: 'openai',
      LLM_EMBEDDING_PROVIDER: 'openai',
      GEMINI_API_KEY: 'test-gemini',
      OPENAI_API_KEY: 'test-openai',
      VECTOR_INDEX_PROVIDER: 'pgvector',
    });

    const config = loadQaConfig();

    expect(config.generation.provider).toBe('gemini');
    expect(config.generation.model).toBe('gemini-2.0-flash-lite');
    expect(config.routing.provider).toBe('openai');
    expect(config.embedding).toMatchObject({ provider: 'openai', model: 'text-embedding-3-small', dimensions: 1536 });
  });

  it('fails at startup when the selected provider has no key', () => {
    setEnv({ GEMINI_API_KEY: 'test-gemini', VECTOR_INDEX_PROVIDER: 'pgvector' });

    expect(() => loadQaConfig()).toThrow(ServiceConfigurationError);
    expect(() => loadQaConfig()).toThrow('Groq not configured. Missing: GROQ_API_KEY');
  });

  it('names every missing Pinecone setting', () => {
    setEnv({ GROQ_API_KEY: 'test-groq', GEMINI_API_KEY: 'test-gemini' });

    expect(() => loadQaConfig()).toThrow('Pinecone not configured. Missing: PINECONE_API_KEY, PINECONE_BASE_URL');
  });
});
