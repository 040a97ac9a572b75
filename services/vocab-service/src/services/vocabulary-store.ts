import { VocabularyRepository } from '../clients/vocabulary-repository';
import {
  EnrichmentResult,
  NewVocabularyEntry,
  VocabularyEntry,
  VocabularyFilter,
  VocabularyKey,
  VocabularyPatch,
  VocabularyStats,
  VOCABULARY_SORTS
} from '../types/vocabulary';
import { ConflictError, NotFoundError, ValidationError } from '../utils/errors';
import { KeyedLock } from '../utils/keyed-lock';
import { logger } from '../utils/logger';
import { newEntrySchema, patchSchema, toValidationError } from '../validators/vocabulary';

export type ConflictPolicy = 'reject' | 'update' | 'skip';

export interface AddOptions {
  onConflict?: ConflictPolicy;
}

export interface AddResult {
  entry: VocabularyEntry;
  outcome: 'created' | 'updated' | 'skipped';
}

export interface ScoringPolicy {
  // Fraction of the remaining distance moved per review, in (0, 1]
  step: number;
}

export interface VocabularyStoreOptions {
  scoring?: ScoringPolicy;
  now?: () => Date;
}

/**
 * Lazy, restartable view over a filtered entry list. Each iteration opens a
 * fresh cursor on the repository.
 */
export interface VocabularyQuery extends AsyncIterable<VocabularyEntry> {
  toArray(): Promise<VocabularyEntry[]>;
}

export const DEFAULT_CONFIDENCE_STEP = 0.2;

/**
 * Move a confidence score toward 1 on a correct answer and toward 0 on a
 * wrong one, by `step` of the remaining distance.
 */
export function adjustConfidence(current: number, wasCorrect: boolean, step: number): number {
  const start = Math.min(1, Math.max(0, current));
  const next = wasCorrect ? start + (1 - start) * step : start - start * step;
  return Math.min(1, Math.max(0, next));
}

function lockKey(key: VocabularyKey): string {
  return JSON.stringify([key.language, key.word]);
}

function normalizeKey(word: string, language: string): VocabularyKey {
  return { word: word.trim(), language: language.trim().toLowerCase() };
}

function optionalField(value: string | null | undefined): string | null {
  if (value === undefined || value === null) {
    return null;
  }
  return value.length > 0 ? value : null;
}

function patchFields(patch: VocabularyPatch): Partial<VocabularyEntry> {
  const fields: Partial<VocabularyEntry> = {};
  if (patch.translation !== undefined) {
    fields.translation = patch.translation;
  }
  if (patch.partOfSpeech !== undefined) {
    fields.partOfSpeech = optionalField(patch.partOfSpeech);
  }
  if (patch.exampleSentence !== undefined) {
    fields.exampleSentence = optionalField(patch.exampleSentence);
  }
  if (patch.notes !== undefined) {
    fields.notes = optionalField(patch.notes);
  }
  return fields;
}

/**
 * Vocabulary Store
 * Owns saved entries: (word, language) uniqueness, user edits, and the
 * review path that moves times reviewed and confidence.
 */
export class VocabularyStore {
  private repository: VocabularyRepository;
  private locks = new KeyedLock();
  private step: number;
  private now: () => Date;

  constructor(repository: VocabularyRepository, options: VocabularyStoreOptions = {}) {
    const step = options.scoring?.step ?? DEFAULT_CONFIDENCE_STEP;
    if (!(step > 0 && step <= 1)) {
      throw new ValidationError(`Confidence step must be in (0, 1], got ${step}`, 'step');
    }
    this.repository = repository;
    this.step = step;
    this.now = options.now ?? (() => new Date());
  }

  async initialize(): Promise<void> {
    await this.repository.ensureIndexes();
    logger.info('Vocabulary store initialized');
  }

  /**
   * Save a new entry. A clash on (word, language) is rejected unless the
   * caller asks to update the existing entry or skip.
   */
  async add(input: NewVocabularyEntry, options: AddOptions = {}): Promise<AddResult> {
    const { error, value } = newEntrySchema.validate(input);
    if (error) {
      throw toValidationError(error);
    }

    const key = normalizeKey(value.word, value.language);
    const onConflict = options.onConflict ?? 'reject';

    return this.locks.run(lockKey(key), async () => {
      const existing = await this.repository.findOne(key);
      if (existing) {
        return this.resolveConflict(existing, value, onConflict);
      }

      const entry: VocabularyEntry = {
        word: key.word,
        language: key.language,
        translation: value.translation,
        partOfSpeech: optionalField(value.partOfSpeech),
        exampleSentence: optionalField(value.exampleSentence),
        notes: optionalField(value.notes),
        dateAdded: this.now(),
        timesReviewed: 0,
        lastReviewed: null,
        confidenceScore: 0
      };

      try {
        await this.repository.insert(entry);
      } catch (insertError) {
        // Another process won the race; the unique index caught it
        if (insertError instanceof ConflictError && onConflict !== 'reject') {
          const winner = await this.repository.findOne(key);
          if (winner) {
            return this.resolveConflict(winner, value, onConflict);
          }
        }
        throw insertError;
      }

      logger.info('Vocabulary entry added', { word: key.word, language: key.language });
      return { entry, outcome: 'created' };
    });
  }

  /**
   * Save an accepted enrichment as a new entry.
   */
  async acceptEnrichment(enrichment: EnrichmentResult, options: AddOptions = {}): Promise<AddResult> {
    const notes = [
      enrichment.notes,
      enrichment.pronunciationHint ? `Pronunciation: ${enrichment.pronunciationHint}` : null,
      enrichment.gender ? `Gender: ${enrichment.gender}` : null
    ].filter((line): line is string => typeof line === 'string' && line.length > 0);

    return this.add({
      word: enrichment.word,
      language: enrichment.language,
      translation: enrichment.translation,
      partOfSpeech: enrichment.partOfSpeech,
      exampleSentence: enrichment.exampleSentence,
      notes: notes.length > 0 ? notes.join('\n') : null
    }, options);
  }

  async get(word: string, language: string): Promise<VocabularyEntry> {
    const key = normalizeKey(word, language);
    const entry = await this.repository.findOne(key);
    if (!entry) {
      throw new NotFoundError('Vocabulary entry', { language: key.language, word: key.word });
    }
    return entry;
  }

  /**
   * Edit translation, part of speech, example or notes. Identity and review
   * statistics cannot be patched.
   */
  async update(word: string, language: string, patch: VocabularyPatch): Promise<VocabularyEntry> {
    const { error, value } = patchSchema.validate(patch);
    if (error) {
      throw toValidationError(error);
    }

    const key = normalizeKey(word, language);
    return this.locks.run(lockKey(key), async () => {
      const updated = await this.repository.update(key, patchFields(value));
      if (!updated) {
        throw new NotFoundError('Vocabulary entry', { language: key.language, word: key.word });
      }
      logger.info('Vocabulary entry updated', { word: key.word, language: key.language, fields: Object.keys(value) });
      return updated;
    });
  }

  async remove(word: string, language: string): Promise<void> {
    const key = normalizeKey(word, language);
    await this.locks.run(lockKey(key), async () => {
      const deleted = await this.repository.delete(key);
      if (!deleted) {
        throw new NotFoundError('Vocabulary entry', { language: key.language, word: key.word });
      }
      logger.info('Vocabulary entry removed', { word: key.word, language: key.language });
    });
  }

  find(filter: VocabularyFilter = {}): VocabularyQuery {
    if (filter.sort !== undefined && !VOCABULARY_SORTS.includes(filter.sort)) {
      throw new ValidationError(`Unknown sort "${filter.sort}"`, 'sort');
    }
    if (filter.limit !== undefined && (!Number.isInteger(filter.limit) || filter.limit <= 0)) {
      throw new ValidationError('limit must be a positive integer', 'limit');
    }

    const normalized: VocabularyFilter = {
      ...filter,
      language: filter.language ? filter.language.trim().toLowerCase() : undefined
    };
    const repository = this.repository;

    return {
      [Symbol.asyncIterator]: () => repository.iterate(normalized)[Symbol.asyncIterator](),
      async toArray(): Promise<VocabularyEntry[]> {
        const entries: VocabularyEntry[] = [];
        for await (const entry of repository.iterate(normalized)) {
          entries.push(entry);
        }
        return entries;
      }
    };
  }

  /**
   * Record one flashcard answer: bump times reviewed, stamp last reviewed and
   * move the confidence score.
   */
  async recordReview(word: string, language: string, wasCorrect: boolean): Promise<VocabularyEntry> {
    const key = normalizeKey(word, language);
    return this.locks.run(lockKey(key), async () => {
      const current = await this.repository.findOne(key);
      if (!current) {
        throw new NotFoundError('Vocabulary entry', { language: key.language, word: key.word });
      }

      const confidenceScore = adjustConfidence(current.confidenceScore, wasCorrect, this.step);
      const updated = await this.repository.applyReview(key, { confidenceScore, reviewedAt: this.now() });
      if (!updated) {
        throw new NotFoundError('Vocabulary entry', { language: key.language, word: key.word });
      }
      return updated;
    });
  }

  async stats(language?: string): Promise<VocabularyStats> {
    const languages: Record<string, number> = {};
    let totalWords = 0;
    let reviewSum = 0;
    let confidenceSum = 0;

    for await (const entry of this.find({ language })) {
      totalWords += 1;
      languages[entry.language] = (languages[entry.language] || 0) + 1;
      reviewSum += entry.timesReviewed;
      confidenceSum += entry.confidenceScore;
    }

    return {
      totalWords,
      languages,
      averageReviews: totalWords > 0 ? reviewSum / totalWords : 0,
      averageConfidence: totalWords > 0 ? confidenceSum / totalWords : 0
    };
  }

  private async resolveConflict(
    existing: VocabularyEntry,
    input: NewVocabularyEntry,
    onConflict: ConflictPolicy
  ): Promise<AddResult> {
    const key = { word: existing.word, language: existing.language };

    if (onConflict === 'skip') {
      return { entry: existing, outcome: 'skipped' };
    }
    if (onConflict === 'reject') {
      throw new ConflictError(key);
    }

    const updated = await this.repository.update(key, patchFields({
      translation: input.translation,
      partOfSpeech: input.partOfSpeech,
      exampleSentence: input.exampleSentence,
      notes: input.notes
    }));
    if (!updated) {
      throw new NotFoundError('Vocabulary entry', { language: key.language, word: key.word });
    }
    logger.info('Vocabulary entry updated on conflict', key);
    return { entry: updated, outcome: 'updated' };
  }
}
