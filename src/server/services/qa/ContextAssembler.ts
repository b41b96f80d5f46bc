import type { EvidenceContext, EvidenceSection } from './types.js';
import { createChildLogger } from '../../utils/logger.js';

export const DEFAULT_MAX_CONTEXT_CHARS = 8000;

/**
 * Collapse runs of spaces/tabs to one space and runs of three or more
 * newlines to a blank line, then trim.
 */
export function normalizeWhitespace(text: string | null | undefined): string {
  if (!text) {
    return '';
  }
  return text
    .replace(/[ \t]+/g, ' ')
    .replace(/\n{3,}/g, '\n\n')
    .trim();
}

export function renderSection(label: string, body: string): string {
  return `${label}\n${body}\n\n`;
}

/**
 * Greedy, order-preserving concatenation of evidence sections under a
 * character budget. A section either fits whole or ends the context;
 * sections with no usable text are skipped.
 */
export class ContextAssembler {
  constructor(private readonly maxChars: number = DEFAULT_MAX_CONTEXT_CHARS) {}

  getMaxChars(): number {
    return this.maxChars;
  }

  build(sections: EvidenceSection[]): EvidenceContext {
    let text = '';
    let sectionCount = 0;

    for (const section of sections) {
      const body = normalizeWhitespace(section.text);
      if (!body) {
        continue;
      }

      const rendered = renderSection(section.label, body);
      if (text.length + rendered.length > this.maxChars) {
        createChildLogger({ service: 'ContextAssembler' }).warn(
          { includedSections: sectionCount, maxChars: this.maxChars, droppedLabel: section.label },
          'Context budget reached, remaining sections dropped'
        );
        return { text, sectionCount, truncated: true };
      }

      text += rendered;
      sectionCount++;
    }

    return { text, sectionCount, truncated: false };
  }
}
