/**
 * Service Initialization
 *
 * The single place where providers are chosen. Everything downstream sees
 * only the capability interfaces.
 */

import type { QaConfig, SimilarityIndexSettings } from './qaConfig.js';
import { logger } from '../utils/logger.js';
import { createLLMProvider } from '../services/llm/LLMProviderFactory.js';
import { LLMService } from '../services/llm/LLMService.js';
import { createEmbeddingProvider } from '../embeddings/EmbeddingProviderFactory.js';
import { EmbeddingService } from '../embeddings/EmbeddingService.js';
import type { SimilarityIndex } from '../vector/SimilarityIndex.js';
import { PineconeProvider } from '../vector/PineconeProvider.js';
import { PgVectorProvider } from '../vector/PgVectorProvider.js';
import { DocumentMetadata } from '../models/DocumentMetadata.js';
import { UserDocument } from '../models/UserDocument.js';
import { QueryClassifier } from '../services/qa/QueryClassifier.js';
import { FieldLookupService } from '../services/qa/FieldLookupService.js';
import { SimilaritySearchService } from '../services/qa/SimilaritySearchService.js';
import { ContextAssembler } from '../services/qa/ContextAssembler.js';
import { AnswerGenerator } from '../services/qa/AnswerGenerator.js';
import { AnswerOrchestrator } from '../services/qa/AnswerOrchestrator.js';
import type { CorpusAccessor, FieldStoreAccessor } from '../services/qa/types.js';

export interface QaServices {
  orchestrator: AnswerOrchestrator;
  similaritySearch: SimilaritySearchService;
  similarityIndex: SimilarityIndex;
}

export interface ServiceOverrides {
  fieldStore?: FieldStoreAccessor;
  corpus?: CorpusAccessor;
  similarityIndex?: SimilarityIndex;
}

export function createSimilarityIndex(settings: SimilarityIndexSettings): SimilarityIndex {
  switch (settings.provider) {
    case 'pinecone':
      return new PineconeProvider({
        apiKey: settings.apiKey,
        baseUrl: settings.baseUrl,
        timeoutMs: settings.timeoutMs,
      });
    case 'pgvector':
      return new PgVectorProvider({ schema: settings.schema });
  }
}

/**
 * Build the question-answering services from the frozen configuration
 */
export function initializeServices(config: Readonly<QaConfig>, overrides: ServiceOverrides = {}): QaServices {
  const generation = new LLMService(createLLMProvider(config.generation), {
    model: config.generation.model,
    temperature: config.generation.temperature,
    maxTokens: config.generation.maxTokens,
  });
  const routing = new LLMService(createLLMProvider(config.routing), {
    model: config.routing.model,
    temperature: config.routing.temperature,
    maxTokens: config.routing.maxTokens,
  });
  const embeddings = new EmbeddingService(createEmbeddingProvider(config.embedding));

  const similarityIndex = overrides.similarityIndex ?? createSimilarityIndex(config.similarityIndex);
  const fieldStore: FieldStoreAccessor = overrides.fieldStore ?? DocumentMetadata;
  const corpus: CorpusAccessor = overrides.corpus ?? UserDocument;

  const similaritySearch = new SimilaritySearchService(embeddings, similarityIndex, corpus);
  const orchestrator = new AnswerOrchestrator({
    classifier: new QueryClassifier(routing),
    fieldLookup: new FieldLookupService(fieldStore),
    similaritySearch,
    corpus,
    assembler: new ContextAssembler(config.maxContextChars),
    generator: new AnswerGenerator(generation),
    similarityTopK: config.similarityTopK,
  });

  logger.info(
    {
      generation: `${config.generation.provider}/${config.generation.model}`,
      routing: `${config.routing.provider}/${config.routing.model}`,
      embedding: `${config.embedding.provider}/${config.embedding.model}`,
      similarityIndex: similarityIndex.getName(),
    },
    'Question answering services initialized'
  );

  return { orchestrator, similaritySearch, similarityIndex };
}
