/**
 * Prompt templates and fixed user-facing messages for question answering
 */

import { DOCUMENT_TYPES } from '../../types/document-type-registry.js';
import type { FieldRegistry } from '../../types/document-type-registry.js';

export const ANSWER_NOT_FOUND_SENTINEL = 'ANSWER_NOT_FOUND';

export const MESSAGES = {
  similarityNotFound: "I couldn't find any documents to answer your question.",
  similarityNoAnswer: "I found matching documents but couldn't retrieve their content.",
  aggregateNotFound:
    "I don't have any processed documents to answer your question. Please upload and process some documents first.",
  aggregateNoAnswer: "Found matching documents but couldn't retrieve their content.",
  unexpectedError: 'An error occurred while processing your question.',
  generationFailed: "I'm sorry, I encountered an issue processing your request.",
  generationUnavailable: "I apologize, but I'm having trouble accessing your documents right now.",
  answerNotFound: "I searched through your documents but couldn't find that specific information.",
} as const;

function renderFieldFamilies(registry: FieldRegistry): string {
  return registry.families.map((family) => `${family.family}: ${family.fields.join(', ')}`).join('\n');
}

function renderFieldExamples(registry: FieldRegistry): string {
  return registry.fieldExamples
    .map((example) => `"${example.question}" -> fields: ${JSON.stringify(example.fields)}`)
    .join('\n');
}

function renderDocumentTypeExamples(registry: FieldRegistry): string {
  return registry.documentTypeExamples
    .map((example) => `"${example.question}" -> document_types: ${JSON.stringify(example.documentTypes)}`)
    .join('\n');
}

/**
 * Instruction prompt for the query classifier
 */
export function buildRoutingPrompt(question: string, registry: FieldRegistry): string {
  return `You classify questions for a personal document assistant. Put the user's question into exactly ONE category, and extract field names and document types where they apply.

Categories:
- FIELD_LOOKUP: the answer is one or more specific values stored as structured fields of a document (a name, an ID number, a date, a phone number, an address, a roll number). No calculation is needed.
  Examples: "What is my PAN number?", "What is my mother's name?", "What are my parent's names?"

- SIMILARITY: the question needs the full content of a document to be read and understood: summaries, explanations, or details that structured fields cannot answer.
  Examples: "Summarize my marksheet", "What subjects did I study?", "Explain the terms in my invoice"

- AGGREGATE: the question compares, correlates, or aggregates information (sums, totals, averages, counts, overall spending) across several documents. Any question asking for a total or aggregate MUST be AGGREGATE.
  Examples: "Is my name the same on my passport and PAN card?", "Compare my two invoices", "Show all my documents", "How much did I spend on food in total?"

For FIELD_LOOKUP questions, use EXACT field names from this canonical list:
${renderFieldFamilies(registry)}

Field mapping examples:
${renderFieldExamples(registry)}

For AGGREGATE questions, also list the document types that are likely relevant, using EXACTLY these names: ${DOCUMENT_TYPES.join(', ')}. Use null when every document type is relevant.
${renderDocumentTypeExamples(registry)}

Respond with ONLY a JSON object and no other text:
{"type": "FIELD_LOOKUP|SIMILARITY|AGGREGATE", "fields": ["field1"] or null, "document_types": ["TYPE_NAME"] or null}

User question: ${question}
`;
}

/**
 * Answer prompt for the similarity route
 */
export function buildSimilarityPrompt(question: string, context: string): string {
  return `You are a precise document retrieval assistant.
Answer the user's question using ONLY the information provided below.
Be concise and direct. Do not add filler, conversational remarks, or advice nobody asked for.
Give exactly the answer requested.
If the answer is not in the provided documents, reply exactly with: "${ANSWER_NOT_FOUND_SENTINEL}"

USER QUESTION: ${question}

AVAILABLE INFORMATION:
${context}

ANSWER:
`;
}

/**
 * Analysis prompt for the aggregate route
 */
export function buildAggregatePrompt(question: string, context: string): string {
  return `You are a precise data analyst working across several of the user's documents.
Compare, correlate, or total the information using ONLY the documents provided below.
Be concise and direct, with no conversational filler.
Answer only what was asked. When comparing, state the exact value from each document and then the conclusion.
If the required information is missing, reply exactly with: "${ANSWER_NOT_FOUND_SENTINEL}"

USER QUESTION: ${question}

USER'S DOCUMENTS:
${context}

ANALYSIS:
`;
}
