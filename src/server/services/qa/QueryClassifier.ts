/**
 * Query Classifier
 *
 * One call to the cheap routing model per question. Any failure, malformed
 * reply, or unknown category yields the SIMILARITY fallback decision.
 */

import { FALLBACK_DECISION, isRoute } from './types.js';
import type { GenerationBackend, RouteDecision } from './types.js';
import { buildRoutingPrompt } from './prompts.js';
import { loadFieldRegistry } from '../../types/document-type-registry.js';
import type { FieldRegistry } from '../../types/document-type-registry.js';
import { createChildLogger } from '../../utils/logger.js';
import { describeError } from '../../types/errors.js';

function fallbackDecision(): RouteDecision {
  return { ...FALLBACK_DECISION, fieldHints: [] };
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function isUsableHint(value: string): boolean {
  return value.length > 0 && value.toLowerCase() !== 'null';
}

/**
 * Remove ```json ... ``` fences the model sometimes wraps its reply in
 */
export function stripCodeFences(content: string): string {
  const trimmed = content.trim();
  if (!trimmed.startsWith('```')) {
    return trimmed;
  }
  return trimmed.replace(/```json\s*/gi, '').replace(/```\s*/g, '').trim();
}

function parseFieldHints(classification: Record<string, unknown>): string[] {
  const hints: string[] = [];
  const fields = classification.fields;

  if (Array.isArray(fields)) {
    for (const field of fields) {
      const hint = String(field).trim();
      if (isUsableHint(hint)) {
        hints.push(hint);
      }
    }
  } else if (typeof fields === 'string' && isUsableHint(fields.trim())) {
    hints.push(fields.trim());
  }

  // Older prompt versions asked for a single "field"
  const legacyField = classification.field;
  if (hints.length === 0 && typeof legacyField === 'string' && isUsableHint(legacyField.trim())) {
    hints.push(legacyField.trim());
  }

  return hints;
}

function parseDocumentTypes(classification: Record<string, unknown>): string[] | null {
  const documentTypes = classification.document_types;
  if (!Array.isArray(documentTypes)) {
    return null;
  }
  const parsed = documentTypes
    .map((entry) => String(entry).trim().toUpperCase())
    .filter(isUsableHint);
  return parsed.length > 0 ? parsed : null;
}

/**
 * Parse the routing model's reply.
 * @returns The decision, or null when the reply is not a usable classification
 */
export function parseRouteDecision(content: string): RouteDecision | null {
  let classification: unknown;
  try {
    classification = JSON.parse(stripCodeFences(content));
  } catch {
    return null;
  }
  if (!isRecord(classification)) {
    return null;
  }

  const rawType = classification.type ?? 'SIMILARITY';
  if (typeof rawType !== 'string') {
    return null;
  }
  const route = rawType.trim().toUpperCase();
  if (!isRoute(route)) {
    return null;
  }

  return {
    route,
    fieldHints: parseFieldHints(classification),
    documentTypes: parseDocumentTypes(classification),
  };
}

export class QueryClassifier {
  private readonly registry: FieldRegistry;

  constructor(
    private readonly backend: GenerationBackend,
    registry?: FieldRegistry
  ) {
    this.registry = registry ?? loadFieldRegistry();
  }

  async classify(question: string): Promise<RouteDecision> {
    const log = createChildLogger({ service: 'QueryClassifier' });

    try {
      const result = await this.backend.generateText(buildRoutingPrompt(question, this.registry));
      if (!result.ok) {
        log.warn({ error: result.error }, 'Routing model failed, defaulting to SIMILARITY');
        return fallbackDecision();
      }

      const decision = parseRouteDecision(result.text);
      if (!decision) {
        log.warn({ raw: result.text }, 'Unusable routing reply, defaulting to SIMILARITY');
        return fallbackDecision();
      }

      log.info(
        { route: decision.route, fieldHints: decision.fieldHints, documentTypes: decision.documentTypes },
        'Question classified'
      );
      return decision;
    } catch (error) {
      log.error({ error: describeError(error) }, 'Classification failed, defaulting to SIMILARITY');
      return fallbackDecision();
    }
  }
}
