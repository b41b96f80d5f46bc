/**
 * Answer generation with post-processing
 *
 * One backend call per prompt. Failures become a fixed apology; replies that
 * signal "not found" in any wording become one fixed message.
 */

import type { GenerationBackend } from './types.js';
import { MESSAGES } from './prompts.js';
import { createChildLogger } from '../../utils/logger.js';
import { describeError } from '../../types/errors.js';

export const NOT_FOUND_PHRASES = ['answer_not_found', "i don't have", 'cannot find'] as const;

export function signalsNotFound(text: string): boolean {
  const lower = text.toLowerCase();
  return NOT_FOUND_PHRASES.some((phrase) => lower.includes(phrase));
}

export class AnswerGenerator {
  constructor(private readonly backend: GenerationBackend) {}

  async invoke(prompt: string): Promise<string> {
    const log = createChildLogger({ service: 'AnswerGenerator' });

    try {
      const result = await this.backend.generateText(prompt);
      if (!result.ok) {
        log.warn({ error: result.error }, 'Answer generation failed');
        return MESSAGES.generationFailed;
      }

      const answer = result.text.trim();
      if (signalsNotFound(answer)) {
        log.info('Model reported the answer is not in the supplied context');
        return MESSAGES.answerNotFound;
      }
      return answer;
    } catch (error) {
      log.error({ error: describeError(error) }, 'Answer generation threw');
      return MESSAGES.generationUnavailable;
    }
  }
}
