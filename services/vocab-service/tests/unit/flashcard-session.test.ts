import { FlashcardSession, sampleWithoutReplacement } from '../../src/services/flashcard-session';
import { VocabularyStore } from '../../src/services/vocabulary-store';
import { InsufficientVocabularyError, InvalidSessionStateError } from '../../src/utils/errors';
import { InMemoryVocabularyRepository } from '../support/in-memory-repository';

const WORDS: Array<[string, string]> = [
  ['uno', 'one'],
  ['dos', 'two'],
  ['tres', 'three'],
  ['cuatro', 'four'],
  ['cinco', 'five'],
  ['seis', 'six'],
  ['siete', 'seven'],
  ['ocho', 'eight'],
  ['nueve', 'nine'],
  ['diez', 'ten']
];

describe('FlashcardSession', () => {
  let repository: InMemoryVocabularyRepository;
  let store: VocabularyStore;

  beforeEach(async () => {
    repository = new InMemoryVocabularyRepository();
    store = new VocabularyStore(repository);
    for (const [word, translation] of WORDS) {
      await store.add({ word, language: 'spanish', translation });
    }
  });

  function translationOf(word: string): string {
    const pair = WORDS.find(([candidate]) => candidate === word);
    return pair ? pair[1] : '';
  }

  describe('start', () => {
    it('should sample distinct words from the requested language', async () => {
      const session = new FlashcardSession({ store });

      const first = await session.start('spanish', 7);

      expect(session.currentState).toBe('in-progress');
      expect(first.position).toBe(1);
      expect(first.total).toBe(7);

      const seen = new Set<string>();
      while (session.currentState === 'in-progress') {
        const item = session.currentItem();
        seen.add(item.word);
        await session.submitAnswer(translationOf(item.word));
      }
      expect(seen.size).toBe(7);
      expect([...seen].every(word => WORDS.some(([candidate]) => candidate === word))).toBe(true);
    });

    it('should sample all 7 French words when 10 are requested', async () => {
      const french = ['chat', 'chien', 'maison', 'pain', 'eau', 'livre', 'arbre'];
      for (const word of french) {
        await store.add({ word, language: 'french', translation: `${word} (en)` });
      }
      const session = new FlashcardSession({ store });

      const first = await session.start('french', 10);

      expect(first.total).toBe(7);
      const drawn: string[] = [];
      while (session.currentState === 'in-progress') {
        drawn.push(session.currentItem().word);
        session.skip();
      }
      expect([...drawn].sort()).toEqual([...french].sort());
    });

    it('should shorten the session when fewer words exist', async () => {
      const session = new FlashcardSession({ store });

      const first = await session.start('spanish', 25);

      expect(first.total).toBe(10);
    });

    it('should refuse to start with no saved words', async () => {
      const session = new FlashcardSession({ store });

      await expect(session.start('german', 5)).rejects.toThrow(InsufficientVocabularyError);
      expect(session.currentState).toBe('not-started');
    });

    it('should draw the weakest words first', async () => {
      await store.recordReview('uno', 'spanish', true);
      await store.recordReview('dos', 'spanish', true);
      const seeded = await store.find({ language: 'spanish' }).toArray();
      const session = new FlashcardSession({ store, random: () => 0 });

      await session.start('spanish', seeded.length - 2, 'weakest-first');

      const drawn: string[] = [];
      while (session.currentState === 'in-progress') {
        drawn.push(session.currentItem().word);
        session.skip();
      }
      expect(drawn).not.toContain('uno');
      expect(drawn).not.toContain('dos');
      expect(drawn).toHaveLength(8);
    });
  });

  describe('answering', () => {
    it('should score 3 correct out of 5 as 0.6 with outcomes in order', async () => {
      const session = new FlashcardSession({ store });
      await session.start('spanish', 5);

      const plan = [true, false, true, false, true];
      const words: string[] = [];
      for (const correct of plan) {
        const item = session.currentItem();
        words.push(item.word);
        const outcome = await session.submitAnswer(correct ? translationOf(item.word) : 'wrong');
        expect(outcome.correct).toBe(correct);
      }

      const result = session.result();
      expect(session.currentState).toBe('completed');
      expect(result.score).toBeCloseTo(0.6);
      expect(result.correct).toBe(3);
      expect(result.attempted).toBe(5);
      expect(result.items.map(item => item.word)).toEqual(words);
      expect(result.items.map(item => item.outcome)).toEqual(['correct', 'incorrect', 'correct', 'incorrect', 'correct']);
    });

    it('should write each outcome back to the store', async () => {
      const session = new FlashcardSession({ store });
      const item = await session.start('spanish', 1);

      const outcome = await session.submitAnswer(`To ${translationOf(item.word).toUpperCase()}`);

      expect(outcome).toEqual({ correct: true, acceptedTranslations: [translationOf(item.word)], completed: true });
      const entry = await store.get(item.word, 'spanish');
      expect(entry.timesReviewed).toBe(1);
      expect(entry.confidenceScore).toBeCloseTo(0.2);
    });

    it('should keep going when a word is deleted mid-session', async () => {
      const session = new FlashcardSession({ store });
      const item = await session.start('spanish', 2);
      await store.remove(item.word, 'spanish');

      const outcome = await session.submitAnswer(translationOf(item.word));

      expect(outcome.correct).toBe(true);
      expect(session.currentItem().position).toBe(2);
    });

    it('should leave skipped cards out of the score', async () => {
      const session = new FlashcardSession({ store });
      const item = await session.start('spanish', 2);

      await session.submitAnswer(translationOf(item.word));
      session.skip();

      const result = session.result();
      expect(result.items[1].outcome).toBe('unanswered');
      expect(result.attempted).toBe(1);
      expect(result.score).toBe(1);
    });
  });

  describe('state errors', () => {
    it('should reject answers and results before start', async () => {
      const session = new FlashcardSession({ store });

      await expect(session.submitAnswer('one')).rejects.toThrow(InvalidSessionStateError);
      expect(() => session.currentItem()).toThrow(InvalidSessionStateError);
      expect(() => session.result()).toThrow(InvalidSessionStateError);
    });

    it('should refuse a second start while the first is still loading words', async () => {
      const session = new FlashcardSession({ store });

      const results = await Promise.allSettled([session.start('spanish', 2), session.start('spanish', 3)]);

      expect(results.map(result => result.status)).toEqual(['fulfilled', 'rejected']);
      const second = results[1];
      expect(second.status === 'rejected' && second.reason).toBeInstanceOf(InvalidSessionStateError);
      expect(session.currentItem().total).toBe(2);
    });

    it('should allow a new start after one fails for lack of words', async () => {
      const session = new FlashcardSession({ store });

      await expect(session.start('german', 2)).rejects.toThrow(InsufficientVocabularyError);
      const first = await session.start('spanish', 2);

      expect(first.total).toBe(2);
    });

    it('should reject answers and a restart after completion', async () => {
      const session = new FlashcardSession({ store });
      const item = await session.start('spanish', 1);
      await session.submitAnswer(translationOf(item.word));

      await expect(session.submitAnswer('one')).rejects.toThrow(InvalidSessionStateError);
      await expect(session.start('spanish', 1)).rejects.toThrow(InvalidSessionStateError);
      expect(() => session.currentItem()).toThrow(InvalidSessionStateError);
    });
  });

  describe('generated cards', () => {
    it('should quiz a generated batch without touching the store', async () => {
      const recordReview = jest.spyOn(store, 'recordReview');
      const session = new FlashcardSession({ store });

      session.startWithCards('French', [
        { word: 'chat', translations: ['cat'], partOfSpeech: 'noun' },
        { word: 'manger', translations: ['to eat'], partOfSpeech: 'verb' }
      ]);
      await session.submitAnswer('cat');
      await session.submitAnswer('eat');

      expect(session.result()).toEqual(expect.objectContaining({ language: 'french', correct: 2, score: 1 }));
      expect(recordReview).not.toHaveBeenCalled();
    });
  });

  describe('generated cards without usable items', () => {
    it('should name the normalised language in the error', () => {
      const session = new FlashcardSession({ store });

      expect(() => session.startWithCards(' French ', [{ word: 'chat', translations: [], partOfSpeech: null }]))
        .toThrow('No vocabulary saved for french');
    });
  });

  describe('sampleWithoutReplacement', () => {
    it('should return distinct items and cap at the pool size', () => {
      const drawn = sampleWithoutReplacement([1, 2, 3, 4], 10, () => 0.5);
      expect([...drawn].sort()).toEqual([1, 2, 3, 4]);
      expect(sampleWithoutReplacement([1, 2, 3], 2, () => 0)).toEqual([1, 2]);
    });
  });
});
