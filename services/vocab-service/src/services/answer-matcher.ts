export interface AnswerPolicy {
  stripDiacritics: boolean;
  // Treat "to run" and "run" as the same English infinitive
  allowInfinitiveTo: boolean;
}

export const DEFAULT_ANSWER_POLICY: AnswerPolicy = {
  stripDiacritics: false,
  allowInfinitiveTo: true
};

const COMBINING_MARKS = /[\u0300-\u036f]/g;

export function normalizeAnswer(text: string, policy: AnswerPolicy = DEFAULT_ANSWER_POLICY): string {
  let normalized = text.trim().toLowerCase().replace(/\s+/g, ' ');
  if (policy.stripDiacritics) {
    normalized = normalized.normalize('NFD').replace(COMBINING_MARKS, '').normalize('NFC');
  }
  if (policy.allowInfinitiveTo && normalized.startsWith('to ')) {
    normalized = normalized.slice(3).trim();
  }
  return normalized;
}

/**
 * Decides whether a typed answer matches one of a card's accepted
 * translations after normalization.
 */
export class AnswerMatcher {
  private policy: AnswerPolicy;

  constructor(policy: Partial<AnswerPolicy> = {}) {
    this.policy = { ...DEFAULT_ANSWER_POLICY, ...policy };
  }

  matches(answer: string, acceptedTranslations: string[]): boolean {
    const given = normalizeAnswer(answer, this.policy);
    if (given.length === 0) {
      return false;
    }
    return acceptedTranslations.some(accepted => normalizeAnswer(accepted, this.policy) === given);
  }
}
