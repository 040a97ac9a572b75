import { FlashcardCard, VocabularyEntry } from '../types/vocabulary';
import {
  InsufficientVocabularyError,
  InvalidSessionStateError,
  NotFoundError,
  ValidationError
} from '../utils/errors';
import { logger } from '../utils/logger';
import { AnswerMatcher } from './answer-matcher';
import { splitTranslations } from './structured-extractor';
import { VocabularyStore } from './vocabulary-store';

export type SessionState = 'not-started' | 'in-progress' | 'completed';
export type CardOutcome = 'correct' | 'incorrect' | 'unanswered';
export type SamplingStrategy = 'uniform' | 'weakest-first';

export interface SessionCard {
  word: string;
  language: string;
  acceptedTranslations: string[];
  partOfSpeech: string | null;
  // Store-backed cards write their outcome back as a review
  source: 'store' | 'generated';
}

export interface CurrentItem {
  word: string;
  language: string;
  partOfSpeech: string | null;
  position: number;
  total: number;
}

export interface AnswerOutcome {
  correct: boolean;
  acceptedTranslations: string[];
  completed: boolean;
}

export interface SessionItemResult {
  word: string;
  outcome: CardOutcome;
  answer: string | null;
  acceptedTranslations: string[];
}

export interface SessionResult {
  language: string;
  items: SessionItemResult[];
  correct: number;
  attempted: number;
  total: number;
  score: number;
}

export interface FlashcardSessionDeps {
  store: Pick<VocabularyStore, 'find' | 'recordReview'>;
  matcher?: AnswerMatcher;
  random?: () => number;
}

/**
 * Draw `count` items without replacement, uniformly at random
 * (partial Fisher-Yates).
 */
export function sampleWithoutReplacement<T>(items: readonly T[], count: number, random: () => number = Math.random): T[] {
  const pool = [...items];
  const take = Math.min(count, pool.length);
  for (let i = 0; i < take; i++) {
    const j = i + Math.floor(random() * (pool.length - i));
    [pool[i], pool[j]] = [pool[j], pool[i]];
  }
  return pool.slice(0, take);
}

function toSessionCard(entry: VocabularyEntry): SessionCard {
  const accepted = splitTranslations(entry.translation);
  return {
    word: entry.word,
    language: entry.language,
    acceptedTranslations: accepted.length > 0 ? accepted : [entry.translation],
    partOfSpeech: entry.partOfSpeech,
    source: 'store'
  };
}

function byWeakness(a: VocabularyEntry, b: VocabularyEntry): number {
  if (a.confidenceScore !== b.confidenceScore) {
    return a.confidenceScore - b.confidenceScore;
  }
  const aTime = a.lastReviewed ? a.lastReviewed.getTime() : 0;
  const bTime = b.lastReviewed ? b.lastReviewed.getTime() : 0;
  return aTime - bTime;
}

/**
 * Flashcard Session
 * A single quiz run: not-started -> in-progress -> completed. Nothing about
 * an in-progress run is persisted; discarding the object abandons it.
 */
export class FlashcardSession {
  private store: Pick<VocabularyStore, 'find' | 'recordReview'>;
  private matcher: AnswerMatcher;
  private random: () => number;

  private state: SessionState = 'not-started';
  private language = '';
  private cards: SessionCard[] = [];
  private outcomes: CardOutcome[] = [];
  private answers: (string | null)[] = [];
  private index = 0;
  // Set while start() waits on the store, so a second start is refused
  private starting = false;

  constructor(deps: FlashcardSessionDeps) {
    this.store = deps.store;
    this.matcher = deps.matcher ?? new AnswerMatcher();
    this.random = deps.random ?? Math.random;
  }

  get currentState(): SessionState {
    return this.state;
  }

  get score(): number {
    return this.outcomes.filter(outcome => outcome === 'correct').length;
  }

  /**
   * Sample up to `count` distinct saved words for `language`. Asking for more
   * than exist yields a shorter session, never an error.
   */
  async start(language: string, count: number, strategy: SamplingStrategy = 'uniform'): Promise<CurrentItem> {
    this.requireStartable();
    if (!Number.isInteger(count) || count <= 0) {
      throw new ValidationError('count must be a positive integer', 'count');
    }

    const normalizedLanguage = language.trim().toLowerCase();
    this.starting = true;
    let entries: VocabularyEntry[];
    try {
      entries = await this.store.find({ language: normalizedLanguage }).toArray();
    } finally {
      this.starting = false;
    }
    if (entries.length === 0) {
      throw new InsufficientVocabularyError(normalizedLanguage);
    }

    let selected: VocabularyEntry[];
    if (strategy === 'weakest-first') {
      const weakest = [...entries].sort(byWeakness).slice(0, count);
      selected = sampleWithoutReplacement(weakest, weakest.length, this.random);
    } else {
      selected = sampleWithoutReplacement(entries, count, this.random);
    }

    logger.info('Flashcard session started', {
      language: normalizedLanguage,
      requested: count,
      sampled: selected.length,
      strategy
    });
    return this.begin(normalizedLanguage, selected.map(toSessionCard));
  }

  /**
   * Run over a generated batch instead of saved words. Outcomes are not
   * written back to the store.
   */
  startWithCards(language: string, cards: FlashcardCard[]): CurrentItem {
    this.requireStartable();
    const normalizedLanguage = language.trim().toLowerCase();
    const usable = cards.filter(card => card.word.trim().length > 0 && card.translations.length > 0);
    if (usable.length === 0) {
      throw new InsufficientVocabularyError(normalizedLanguage);
    }

    return this.begin(normalizedLanguage, usable.map(card => ({
      word: card.word,
      language: normalizedLanguage,
      acceptedTranslations: card.translations,
      partOfSpeech: card.partOfSpeech,
      source: 'generated'
    })));
  }

  currentItem(): CurrentItem {
    this.requireState('read the current item', 'in-progress');
    const card = this.cards[this.index];
    return {
      word: card.word,
      language: card.language,
      partOfSpeech: card.partOfSpeech,
      position: this.index + 1,
      total: this.cards.length
    };
  }

  async submitAnswer(userText: string): Promise<AnswerOutcome> {
    this.requireState('submit an answer', 'in-progress');
    const card = this.cards[this.index];
    const correct = this.matcher.matches(userText, card.acceptedTranslations);

    // Advance before any I/O so a concurrent submit cannot grade the same card twice
    this.outcomes[this.index] = correct ? 'correct' : 'incorrect';
    this.answers[this.index] = userText;
    this.advance();

    if (card.source === 'store') {
      await this.writeBack(card, correct);
    }

    return {
      correct,
      acceptedTranslations: card.acceptedTranslations,
      completed: this.state === 'completed'
    };
  }

  skip(): { acceptedTranslations: string[]; completed: boolean } {
    this.requireState('skip', 'in-progress');
    const card = this.cards[this.index];
    this.outcomes[this.index] = 'unanswered';
    this.advance();
    return { acceptedTranslations: card.acceptedTranslations, completed: this.state === 'completed' };
  }

  result(): SessionResult {
    this.requireState('read the result', 'completed');

    const items = this.cards.map((card, i) => ({
      word: card.word,
      outcome: this.outcomes[i],
      answer: this.answers[i],
      acceptedTranslations: card.acceptedTranslations
    }));
    const correct = items.filter(item => item.outcome === 'correct').length;
    const attempted = items.filter(item => item.outcome !== 'unanswered').length;

    return {
      language: this.language,
      items,
      correct,
      attempted,
      total: items.length,
      score: attempted > 0 ? correct / attempted : 0
    };
  }

  private begin(language: string, cards: SessionCard[]): CurrentItem {
    this.language = language;
    this.cards = cards;
    this.outcomes = cards.map((): CardOutcome => 'unanswered');
    this.answers = cards.map(() => null);
    this.index = 0;
    this.state = 'in-progress';
    return this.currentItem();
  }

  private advance(): void {
    this.index += 1;
    if (this.index >= this.cards.length) {
      this.state = 'completed';
      logger.info('Flashcard session completed', {
        language: this.language,
        correct: this.score,
        total: this.cards.length
      });
    }
  }

  private async writeBack(card: SessionCard, correct: boolean): Promise<void> {
    try {
      await this.store.recordReview(card.word, card.language, correct);
    } catch (error) {
      // The word was deleted mid-session; the quiz outcome still stands
      if (error instanceof NotFoundError) {
        logger.warn('Review not recorded, entry no longer exists', { word: card.word, language: card.language });
        return;
      }
      throw error;
    }
  }

  private requireStartable(): void {
    if (this.starting) {
      throw new InvalidSessionStateError('start', 'starting', 'not-started');
    }
    this.requireState('start', 'not-started');
  }

  private requireState(operation: string, expected: SessionState): void {
    if (this.state !== expected) {
      throw new InvalidSessionStateError(operation, this.state, expected);
    }
  }
}
