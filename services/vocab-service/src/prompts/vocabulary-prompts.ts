import { PARTS_OF_SPEECH } from '../types/vocabulary';

export const JSON_ONLY_SYSTEM_PROMPT =
  'You are a language teacher providing vocabulary information. Always respond with valid JSON only, no markdown, no explanation.';

export const FLASHCARD_SYSTEM_PROMPT =
  'You are a language teacher creating vocabulary flashcards. Always respond with valid JSON only, no markdown, no explanation.';

export const CORRECTIVE_SYSTEM_PROMPT =
  'You repair malformed JSON produced by another assistant. Reply with the corrected JSON only, no markdown, no commentary.';

export const FLASHCARD_CATEGORIES = [
  'food',
  'animals',
  'colors',
  'family',
  'nature',
  'emotions',
  'daily activities',
  'clothing',
  'weather',
  'body parts',
  'transportation',
  'professions'
];

// Longest slice of a bad answer echoed back in a corrective prompt
const ECHO_LIMIT = 1500;

export function buildEnrichmentPrompt(word: string, language: string): string {
  return `Provide information about this ${language} word: "${word}"

Return ONLY a JSON object (no markdown blocks) with this exact format:
${enrichmentShape(language)}

If the word doesn't exist or is misspelled, still provide your best attempt.`;
}

export function buildFlashcardBatchPrompt(
  language: string,
  count: number,
  categories: string[],
  seed: number
): string {
  return `Generate exactly ${count} ${language} vocabulary words for beginners.

Focus on these categories: ${categories.join(', ')}
Seed for variety: ${seed}

IMPORTANT: Generate ${count} DIFFERENT words. Do not repeat a word. Avoid the most basic words like hello, house, water.

Return ONLY a JSON array (no markdown blocks) with this exact format:
${flashcardShape(language)}

For verbs: use infinitive form in ${language} and "to ..." in English.
List every accepted English translation in "translations".`;
}

export interface CorrectionContext {
  kind: 'enrichment' | 'flashcard-batch';
  language: string;
  word?: string;
  count?: number;
  problem: string;
  previousOutput: string;
}

export function buildCorrectivePrompt(context: CorrectionContext): string {
  const excerpt = context.previousOutput.length > ECHO_LIMIT
    ? `${context.previousOutput.slice(0, ECHO_LIMIT)}...`
    : context.previousOutput;

  const expected = context.kind === 'enrichment'
    ? `a JSON object for the ${context.language} word "${context.word ?? ''}" with this exact format:\n${enrichmentShape(context.language)}\n"translation" must not be empty.`
    : `a JSON array of exactly ${context.count ?? 0} distinct ${context.language} words with this exact format:\n${flashcardShape(context.language)}\nEvery item needs a non-empty "word" and at least one translation.`;

  return `Your previous answer could not be used.

Problem: ${context.problem}

Previous answer:
${excerpt}

Reply again with ONLY ${expected}`;
}

function enrichmentShape(language: string): string {
  return `{
  "translation": "English translation",
  "part_of_speech": "${PARTS_OF_SPEECH.join('/')}",
  "example_sentence": "Example sentence in ${language}",
  "pronunciation_hint": "Pronunciation guide if helpful",
  "gender": "masculine/feminine/neuter (only for languages with grammatical gender)",
  "notes": "Any useful notes about usage or context"
}`;
}

function flashcardShape(language: string): string {
  return `[
  {"word": "${language} word", "part_of_speech": "noun/verb/adjective", "translations": ["English translation"]}
]`;
}
