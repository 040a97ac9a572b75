import { VocabularyEntry } from '../types/vocabulary';

export const EXPORT_COLUMNS = [
  'Word',
  'Translation',
  'Language',
  'Part of Speech',
  'Example Sentence',
  'Notes',
  'Date Added',
  'Times Reviewed',
  'Last Reviewed',
  'Confidence Score'
];

function formatDate(date: Date | null): string {
  return date ? date.toISOString().replace('T', ' ').slice(0, 19) : '';
}

export function escapeCsvField(value: string): string {
  if (/[",\r\n]/.test(value)) {
    return `"${value.replace(/"/g, '""')}"`;
  }
  return value;
}

export function toCsvRow(entry: VocabularyEntry): string {
  return [
    entry.word,
    entry.translation,
    entry.language,
    entry.partOfSpeech ?? '',
    entry.exampleSentence ?? '',
    entry.notes ?? '',
    formatDate(entry.dateAdded),
    String(entry.timesReviewed),
    formatDate(entry.lastReviewed),
    entry.confidenceScore.toFixed(2)
  ].map(escapeCsvField).join(',');
}

/**
 * Dump entries as CSV, one record per line, dates in UTC.
 */
export async function exportVocabularyCsv(entries: AsyncIterable<VocabularyEntry>): Promise<string> {
  const lines = [EXPORT_COLUMNS.map(escapeCsvField).join(',')];
  for await (const entry of entries) {
    lines.push(toCsvRow(entry));
  }
  return `${lines.join('\r\n')}\r\n`;
}
