import { escapeCsvField, exportVocabularyCsv } from '../../src/services/vocabulary-export';
import { VocabularyEntry } from '../../src/types/vocabulary';

async function* entriesOf(entries: VocabularyEntry[]): AsyncGenerator<VocabularyEntry> {
  for (const entry of entries) {
    yield entry;
  }
}

describe('exportVocabularyCsv', () => {
  it('should write a header and one quoted-as-needed row per entry', async () => {
    const csv = await exportVocabularyCsv(entriesOf([
      {
        word: 'comer',
        language: 'spanish',
        translation: 'to eat, to dine',
        partOfSpeech: 'verb',
        exampleSentence: 'Vamos a "comer".',
        notes: null,
        dateAdded: new Date(Date.UTC(2024, 2, 5, 9, 30, 0)),
        timesReviewed: 3,
        lastReviewed: null,
        confidenceScore: 0.488
      }
    ]));

    expect(csv).toBe(
      'Word,Translation,Language,Part of Speech,Example Sentence,Notes,Date Added,Times Reviewed,Last Reviewed,Confidence Score\r\n' +
      'comer,"to eat, to dine",spanish,verb,"Vamos a ""comer"".",,2024-03-05 09:30:00,3,,0.49\r\n'
    );
  });

  it('should write only the header for an empty list', async () => {
    const csv = await exportVocabularyCsv(entriesOf([]));
    expect(csv.split('\r\n')).toHaveLength(2);
  });
});

describe('escapeCsvField', () => {
  it('should quote fields containing line breaks', () => {
    expect(escapeCsvField('line one\nline two')).toBe('"line one\nline two"');
    expect(escapeCsvField('plain')).toBe('plain');
  });
});
