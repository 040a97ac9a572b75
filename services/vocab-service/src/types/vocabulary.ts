export const PARTS_OF_SPEECH = [
  'noun',
  'verb',
  'adjective',
  'adverb',
  'preposition',
  'conjunction',
  'pronoun',
  'interjection',
  'article',
  'determiner',
  'numeral',
  'phrase',
  'other'
] as const;

export type PartOfSpeech = typeof PARTS_OF_SPEECH[number];

export function isKnownPartOfSpeech(value: string): value is PartOfSpeech {
  return PARTS_OF_SPEECH.some(known => known === value);
}

/**
 * A saved word. Identity is the (word, language) pair.
 */
export interface VocabularyEntry {
  word: string;
  language: string;
  translation: string;
  partOfSpeech: string | null;
  exampleSentence: string | null;
  notes: string | null;
  dateAdded: Date;
  timesReviewed: number;
  lastReviewed: Date | null;
  confidenceScore: number;
}

export interface VocabularyKey {
  word: string;
  language: string;
}

export interface NewVocabularyEntry {
  word: string;
  language: string;
  translation: string;
  partOfSpeech?: string | null;
  exampleSentence?: string | null;
  notes?: string | null;
}

// Fields a user may edit; review statistics and identity are not among them
export interface VocabularyPatch {
  translation?: string;
  partOfSpeech?: string | null;
  exampleSentence?: string | null;
  notes?: string | null;
}

export type VocabularySort = 'newest' | 'oldest' | 'alphabetical' | 'most-reviewed' | 'least-confident';

export const VOCABULARY_SORTS: readonly VocabularySort[] = [
  'newest',
  'oldest',
  'alphabetical',
  'most-reviewed',
  'least-confident'
];

export interface VocabularyFilter {
  language?: string;
  search?: string;
  sort?: VocabularySort;
  limit?: number;
}

export interface ReviewUpdate {
  confidenceScore: number;
  reviewedAt: Date;
}

export interface VocabularyStats {
  totalWords: number;
  languages: Record<string, number>;
  averageReviews: number;
  averageConfidence: number;
}

/**
 * Ephemeral enrichment produced from model output; saved only when accepted.
 */
export interface EnrichmentResult {
  word: string;
  language: string;
  translation: string;
  partOfSpeech: string | null;
  exampleSentence: string | null;
  pronunciationHint: string | null;
  gender: string | null;
  notes: string | null;
}

export interface FlashcardCard {
  word: string;
  translations: string[];
  partOfSpeech: string | null;
}

export interface FlashcardBatch {
  language: string;
  requested: number;
  cards: FlashcardCard[];
  // Cards missing after de-duplication; callers may top up
  shortBy: number;
  categories: string[];
}
