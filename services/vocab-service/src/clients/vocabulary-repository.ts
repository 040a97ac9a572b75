import { Collection, CollationOptions, Db, Filter, MongoServerError, Sort } from 'mongodb';
import {
  ReviewUpdate,
  VocabularyEntry,
  VocabularyFilter,
  VocabularyKey,
  VocabularySort
} from '../types/vocabulary';
import { ConflictError } from '../utils/errors';

export const VOCABULARY_COLLECTION = 'vocabulary';

const DUPLICATE_KEY = 11000;

/**
 * Persistence seam for vocabulary entries. Implementations must reject a
 * second entry with the same (word, language) by throwing ConflictError.
 */
export interface VocabularyRepository {
  ensureIndexes(): Promise<void>;
  insert(entry: VocabularyEntry): Promise<void>;
  findOne(key: VocabularyKey): Promise<VocabularyEntry | null>;
  update(key: VocabularyKey, fields: Partial<VocabularyEntry>): Promise<VocabularyEntry | null>;
  applyReview(key: VocabularyKey, review: ReviewUpdate): Promise<VocabularyEntry | null>;
  delete(key: VocabularyKey): Promise<boolean>;
  iterate(filter: VocabularyFilter): AsyncIterable<VocabularyEntry>;
}

export interface FindQuery {
  filter: Filter<VocabularyEntry>;
  sort: Sort;
  collation?: CollationOptions;
  limit?: number;
}

const SORTS: Record<VocabularySort, Sort> = {
  newest: { dateAdded: -1, word: 1 },
  oldest: { dateAdded: 1, word: 1 },
  alphabetical: { word: 1 },
  'most-reviewed': { timesReviewed: -1, word: 1 },
  'least-confident': { confidenceScore: 1, lastReviewed: 1, word: 1 }
};

export function escapeRegex(text: string): string {
  return text.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}

/**
 * Translate a store filter into a MongoDB query.
 */
export function buildFindQuery(filter: VocabularyFilter): FindQuery {
  const query: Filter<VocabularyEntry> = {};

  if (filter.language) {
    query.language = filter.language;
  }

  const search = filter.search?.trim();
  if (search) {
    const pattern = escapeRegex(search);
    query.$or = [
      { word: { $regex: pattern, $options: 'i' } },
      { translation: { $regex: pattern, $options: 'i' } }
    ];
  }

  const sortKey = filter.sort ?? 'newest';
  return {
    filter: query,
    sort: SORTS[sortKey],
    // Case-insensitive ordering for word lists
    collation: sortKey === 'alphabetical' ? { locale: 'en', strength: 2 } : undefined,
    limit: filter.limit
  };
}

function toEntry(doc: VocabularyEntry): VocabularyEntry {
  return {
    word: doc.word,
    language: doc.language,
    translation: doc.translation,
    partOfSpeech: doc.partOfSpeech ?? null,
    exampleSentence: doc.exampleSentence ?? null,
    notes: doc.notes ?? null,
    dateAdded: doc.dateAdded,
    timesReviewed: doc.timesReviewed ?? 0,
    lastReviewed: doc.lastReviewed ?? null,
    confidenceScore: doc.confidenceScore ?? 0
  };
}

/**
 * MongoDB-backed repository. Uniqueness of (word, language) is enforced by
 * a unique index, so a racing writer in another process still gets a
 * ConflictError.
 */
export class MongoVocabularyRepository implements VocabularyRepository {
  private collection: Collection<VocabularyEntry>;

  constructor(db: Db) {
    this.collection = db.collection<VocabularyEntry>(VOCABULARY_COLLECTION);
  }

  async ensureIndexes(): Promise<void> {
    await this.collection.createIndex({ word: 1, language: 1 }, { unique: true, name: 'word_language_unique' });
    await this.collection.createIndex({ language: 1, dateAdded: -1 });
    await this.collection.createIndex({ language: 1, confidenceScore: 1 });
  }

  async insert(entry: VocabularyEntry): Promise<void> {
    try {
      // insertOne adds _id to the object it is given
      await this.collection.insertOne({ ...entry });
    } catch (error) {
      if (error instanceof MongoServerError && error.code === DUPLICATE_KEY) {
        throw new ConflictError({ word: entry.word, language: entry.language });
      }
      throw error;
    }
  }

  async findOne(key: VocabularyKey): Promise<VocabularyEntry | null> {
    const doc = await this.collection.findOne({ word: key.word, language: key.language });
    return doc ? toEntry(doc) : null;
  }

  async update(key: VocabularyKey, fields: Partial<VocabularyEntry>): Promise<VocabularyEntry | null> {
    const doc = await this.collection.findOneAndUpdate(
      { word: key.word, language: key.language },
      { $set: fields },
      { returnDocument: 'after' }
    );
    return doc ? toEntry(doc) : null;
  }

  async applyReview(key: VocabularyKey, review: ReviewUpdate): Promise<VocabularyEntry | null> {
    const doc = await this.collection.findOneAndUpdate(
      { word: key.word, language: key.language },
      {
        $set: {
          confidenceScore: review.confidenceScore,
          lastReviewed: review.reviewedAt
        },
        $inc: { timesReviewed: 1 }
      },
      { returnDocument: 'after' }
    );
    return doc ? toEntry(doc) : null;
  }

  async delete(key: VocabularyKey): Promise<boolean> {
    const result = await this.collection.deleteOne({ word: key.word, language: key.language });
    return result.deletedCount > 0;
  }

  async *iterate(filter: VocabularyFilter): AsyncGenerator<VocabularyEntry> {
    const query = buildFindQuery(filter);
    let cursor = this.collection.find(query.filter).sort(query.sort);
    if (query.collation) {
      cursor = cursor.collation(query.collation);
    }
    if (query.limit) {
      cursor = cursor.limit(query.limit);
    }

    try {
      for await (const doc of cursor) {
        yield toEntry(doc);
      }
    } finally {
      await cursor.close();
    }
  }
}
