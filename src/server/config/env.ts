/**
 * Environment Variable Validation
 *
 * Centralized validation of all environment variables.
 * Every problem is collected and reported in one error, so a misconfigured
 * deployment fails once at startup with the full list.
 */

// Load dotenv early to ensure environment variables are available
import * as dotenv from 'dotenv';
dotenv.config();

export const TEXT_GENERATION_PROVIDERS = ['gemini', 'groq', 'openai'] as const;
export const EMBEDDING_PROVIDERS = ['gemini', 'openai'] as const;
export const VECTOR_INDEX_PROVIDERS = ['pinecone', 'pgvector'] as const;

export type TextGenerationProviderName = (typeof TEXT_GENERATION_PROVIDERS)[number];
export type EmbeddingProviderName = (typeof EMBEDDING_PROVIDERS)[number];
export type VectorIndexProviderName = (typeof VECTOR_INDEX_PROVIDERS)[number];

type NodeEnv = 'development' | 'production' | 'test';

/**
 * Helper function to safely parse a number from string with default
 */
function parseNumericEnv(value: string | undefined, defaultValue: number): number {
  if (!value) return defaultValue;
  const num = parseInt(value, 10);
  return isNaN(num) ? defaultValue : num;
}

function parseFloatEnv(value: string | undefined, defaultValue: number): number {
  if (!value) return defaultValue;
  const num = parseFloat(value);
  return isNaN(num) ? defaultValue : num;
}

function parseEnumEnv<T extends string>(
  name: string,
  value: string | undefined,
  allowed: readonly T[],
  defaultValue: T,
  errors: string[]
): T {
  const raw = (value || defaultValue).toLowerCase();
  const match = allowed.find((candidate) => candidate === raw);
  if (!match) {
    errors.push(`${name}: Invalid value "${value}". Must be one of ${allowed.join(', ')}.`);
    return defaultValue;
  }
  return match;
}

function isNodeEnv(value: string): value is NodeEnv {
  return value === 'development' || value === 'production' || value === 'test';
}

/**
 * Environment configuration type
 */
export interface Env {
  // Server Configuration
  NODE_ENV: NodeEnv;
  PORT: number;
  ALLOWED_ORIGINS?: string;

  // Security Configuration
  JWT_SECRET: string;

  // Database Configuration
  MONGODB_URI: string;
  DB_NAME: string;
  DB_MAX_POOL_SIZE: number;
  DB_SERVER_SELECTION_TIMEOUT_MS: number;

  // PostgreSQL / pgvector Configuration
  POSTGRES_HOST: string;
  POSTGRES_PORT: number;
  POSTGRES_DB: string;
  POSTGRES_USER: string;
  POSTGRES_PASSWORD?: string;
  PGVECTOR_SCHEMA: string;

  // Provider Selection
  LLM_TEXT_GENERATION_PROVIDER: TextGenerationProviderName;
  LLM_ROUTING_PROVIDER: TextGenerationProviderName;
  LLM_EMBEDDING_PROVIDER: EmbeddingProviderName;
  VECTOR_INDEX_PROVIDER: VectorIndexProviderName;

  // Google Gemini
  GEMINI_API_KEY?: string;
  GEMINI_BASE_URL: string;
  GEMINI_MODEL: string;
  GEMINI_EMBEDDING_MODEL: string;
  GEMINI_TIMEOUT: number;

  // Groq (OpenAI-compatible)
  GROQ_API_KEY?: string;
  GROQ_BASE_URL: string;
  GROQ_MODEL: string;
  GROQ_ROUTING_MODEL: string;

  // OpenAI
  OPENAI_API_KEY?: string;
  OPENAI_BASE_URL?: string;
  OPENAI_MODEL: string;
  OPENAI_ROUTING_MODEL: string;
  OPENAI_EMBEDDING_MODEL: string;

  // Pinecone
  PINECONE_API_KEY?: string;
  PINECONE_BASE_URL?: string;

  // Question answering
  QNA_CONTEXT_MAX_CHARS: number;
  QNA_SIMILARITY_TOP_K: number;
  QNA_TEMPERATURE: number;
  QNA_MAX_TOKENS: number;
  ROUTING_MAX_TOKENS: number;

  // Logging Configuration
  LOG_LEVEL?: string;
}

let validatedEnv: Env | null = null;

/**
 * Validate and return environment variables
 * @throws {Error} If required validation fails
 */
export function validateEnv(): Env {
  if (validatedEnv) {
    return validatedEnv;
  }

  const errors: string[] = [];

  const rawNodeEnv = process.env.NODE_ENV || 'development';
  let nodeEnv: NodeEnv = 'development';
  if (isNodeEnv(rawNodeEnv)) {
    nodeEnv = rawNodeEnv;
  } else {
    errors.push(`NODE_ENV: Invalid value "${rawNodeEnv}". Must be development, production, or test.`);
  }

  const port = parseNumericEnv(process.env.PORT, 4000);
  if (port < 1 || port > 65535) {
    errors.push(`PORT: Invalid value "${process.env.PORT}". Must be between 1 and 65535.`);
  }

  let jwtSecret = process.env.JWT_SECRET;
  // In test environment, provide a default if missing to avoid breaking tests
  if (nodeEnv === 'test' && !jwtSecret) {
    jwtSecret = 'test-secret';
  }
  if (!jwtSecret) {
    errors.push('JWT_SECRET: Environment variable is required.');
  } else if (jwtSecret.includes('change-in-production')) {
    errors.push('JWT_SECRET: You are using the default weak secret. Please set a secure unique secret.');
  }

  const maxPoolSize = parseNumericEnv(process.env.DB_MAX_POOL_SIZE, 10);
  if (maxPoolSize < 1) {
    errors.push(`DB_MAX_POOL_SIZE: Invalid value "${process.env.DB_MAX_POOL_SIZE}". Must be at least 1.`);
  }

  const maxContextChars = parseNumericEnv(process.env.QNA_CONTEXT_MAX_CHARS, 8000);
  if (maxContextChars < 100) {
    errors.push(`QNA_CONTEXT_MAX_CHARS: Invalid value "${process.env.QNA_CONTEXT_MAX_CHARS}". Must be at least 100.`);
  }

  const topK = parseNumericEnv(process.env.QNA_SIMILARITY_TOP_K, 3);
  if (topK < 1 || topK > 50) {
    errors.push(`QNA_SIMILARITY_TOP_K: Invalid value "${process.env.QNA_SIMILARITY_TOP_K}". Must be between 1 and 50.`);
  }

  const pgvectorSchema = process.env.PGVECTOR_SCHEMA || 'vector';
  if (!/^[a-z0-9_]+$/i.test(pgvectorSchema)) {
    errors.push(`PGVECTOR_SCHEMA: Invalid value "${pgvectorSchema}". Only alphanumeric characters and underscores are allowed.`);
  }

  const textGenerationProvider = parseEnumEnv(
    'LLM_TEXT_GENERATION_PROVIDER',
    process.env.LLM_TEXT_GENERATION_PROVIDER,
    TEXT_GENERATION_PROVIDERS,
    'groq',
    errors
  );
  const routingProvider = parseEnumEnv(
    'LLM_ROUTING_PROVIDER',
    process.env.LLM_ROUTING_PROVIDER,
    TEXT_GENERATION_PROVIDERS,
    'groq',
    errors
  );
  const embeddingProvider = parseEnumEnv(
    'LLM_EMBEDDING_PROVIDER',
    process.env.LLM_EMBEDDING_PROVIDER,
    EMBEDDING_PROVIDERS,
    'gemini',
    errors
  );
  const vectorIndexProvider = parseEnumEnv(
    'VECTOR_INDEX_PROVIDER',
    process.env.VECTOR_INDEX_PROVIDER,
    VECTOR_INDEX_PROVIDERS,
    'pinecone',
    errors
  );

  if (errors.length > 0) {
    throw new Error(`Environment validation failed:\n${errors.map((e) => `  - ${e}`).join('\n')}`);
  }

  validatedEnv = {
    NODE_ENV: nodeEnv,
    PORT: port,
    ALLOWED_ORIGINS: process.env.ALLOWED_ORIGINS,

    JWT_SECRET: jwtSecret ?? '',

    MONGODB_URI: process.env.MONGODB_URI || 'mongodb://localhost:27017',
    DB_NAME: process.env.DB_NAME || 'docqa',
    DB_MAX_POOL_SIZE: maxPoolSize,
    DB_SERVER_SELECTION_TIMEOUT_MS: parseNumericEnv(process.env.DB_SERVER_SELECTION_TIMEOUT_MS, 10000),

    POSTGRES_HOST: process.env.POSTGRES_HOST || 'localhost',
    POSTGRES_PORT: parseNumericEnv(process.env.POSTGRES_PORT, 5432),
    POSTGRES_DB: process.env.POSTGRES_DB || 'docqa',
    POSTGRES_USER: process.env.POSTGRES_USER || 'postgres',
    POSTGRES_PASSWORD: process.env.POSTGRES_PASSWORD,
    PGVECTOR_SCHEMA: pgvectorSchema,

    LLM_TEXT_GENERATION_PROVIDER: textGenerationProvider,
    LLM_ROUTING_PROVIDER: routingProvider,
    LLM_EMBEDDING_PROVIDER: embeddingProvider,
    VECTOR_INDEX_PROVIDER: vectorIndexProvider,

    GEMINI_API_KEY: process.env.GEMINI_API_KEY,
    GEMINI_BASE_URL: process.env.GEMINI_BASE_URL || 'https://generativelanguage.googleapis.com/v1beta',
    GEMINI_MODEL: process.env.GEMINI_MODEL || 'gemini-2.0-flash-lite',
    GEMINI_EMBEDDING_MODEL: process.env.GEMINI_EMBEDDING_MODEL || 'gemini-embedding-001',
    GEMINI_TIMEOUT: parseNumericEnv(process.env.GEMINI_TIMEOUT, 120000),

    GROQ_API_KEY: process.env.GROQ_API_KEY,
    GROQ_BASE_URL: process.env.GROQ_BASE_URL || 'https://api.groq.com/openai/v1',
    GROQ_MODEL: process.env.GROQ_MODEL || 'llama-3.3-70b-versatile',
    GROQ_ROUTING_MODEL: process.env.GROQ_ROUTING_MODEL || 'llama-3.1-8b-instant',

    OPENAI_API_KEY: process.env.OPENAI_API_KEY,
    OPENAI_BASE_URL: process.env.OPENAI_BASE_URL,
    OPENAI_MODEL: process.env.OPENAI_MODEL || 'gpt-4o-mini',
    OPENAI_ROUTING_MODEL: process.env.OPENAI_ROUTING_MODEL || 'gpt-4o-mini',
    OPENAI_EMBEDDING_MODEL: process.env.OPENAI_EMBEDDING_MODEL || 'text-embedding-3-small',

    PINECONE_API_KEY: process.env.PINECONE_API_KEY,
    PINECONE_BASE_URL: process.env.PINECONE_BASE_URL,

    QNA_CONTEXT_MAX_CHARS: maxContextChars,
    QNA_SIMILARITY_TOP_K: topK,
    QNA_TEMPERATURE: parseFloatEnv(process.env.QNA_TEMPERATURE, 0.1),
    QNA_MAX_TOKENS: parseNumericEnv(process.env.QNA_MAX_TOKENS, 1000),
    ROUTING_MAX_TOKENS: parseNumericEnv(process.env.ROUTING_MAX_TOKENS, 150),

    LOG_LEVEL: process.env.LOG_LEVEL,
  };

  return validatedEnv;
}

/**
 * Get validated environment variables
 * Validates on first call, then returns cached result
 */
export function getEnv(): Env {
  return validateEnv();
}

/**
 * Reset validated environment cache
 * Used for testing to allow re-validation after env vars change
 */
export function resetEnv(): void {
  validatedEnv = null;
}

export function isTest(): boolean {
  return getEnv().NODE_ENV === 'test';
}
