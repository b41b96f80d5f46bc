/**
 * Field lookup over structured field records
 */

import type { FieldRecord, FieldStoreAccessor } from './types.js';
import { createChildLogger } from '../../utils/logger.js';

/**
 * Last-resort value search term: the question's final word, punctuation
 * removed, if longer than two characters. A heuristic that misses
 * multi-word values.
 */
export function lastResortSearchTerm(question: string): string | null {
  const words = question.replace(/[?!.]/g, '').trim().split(/\s+/);
  const term = words[words.length - 1] ?? '';
  return term.length > 2 ? term : null;
}

/**
 * Render records as the answer text. One record gives "value (from TYPE)",
 * several give one "- name: value (from TYPE)" line each.
 */
export function formatFieldAnswer(records: FieldRecord[]): string {
  if (records.length === 1) {
    const [record] = records;
    return `${record.fieldValue} (from ${record.documentType})`;
  }
  return records
    .map((record) => `- ${record.fieldName}: ${record.fieldValue} (from ${record.documentType})`)
    .join('\n')
    .trim();
}

export class FieldLookupService {
  constructor(private readonly fieldStore: FieldStoreAccessor) {}

  /**
   * Exact then fuzzy name match per hint, accumulated across hints in hint
   * order; falls back to a value search on the question's last word.
   */
  async lookup(fieldHints: string[], question: string, userId: string): Promise<FieldRecord[]> {
    const log = createChildLogger({ service: 'FieldLookupService' });
    const results: FieldRecord[] = [];

    for (const hint of fieldHints) {
      let matches = await this.fieldStore.findByUserAndFieldNameExact(userId, hint);
      if (matches.length === 0) {
        matches = await this.fieldStore.findByUserAndFieldNameFuzzy(userId, hint);
      }
      log.debug({ hint, matchCount: matches.length }, 'Field hint searched');
      results.push(...matches);
    }

    if (results.length > 0) {
      return results;
    }

    const term = lastResortSearchTerm(question);
    if (!term) {
      return results;
    }
    log.debug({ term }, 'No field-name match, searching field values');
    return this.fieldStore.searchByValue(userId, term);
  }
}
