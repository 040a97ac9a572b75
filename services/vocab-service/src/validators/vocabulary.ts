import Joi from 'joi';
import { NewVocabularyEntry, VocabularyPatch } from '../types/vocabulary';
import { ValidationError } from '../utils/errors';

const optionalText = Joi.string().trim().allow('', null);

// ===================
// STORE INPUT
// ===================

export const newEntrySchema = Joi.object<NewVocabularyEntry>({
  word: Joi.string().trim().max(200).required(),
  language: Joi.string().trim().lowercase().max(64).required(),
  translation: Joi.string().trim().max(500).required(),
  partOfSpeech: Joi.string().trim().lowercase().max(40).allow('', null),
  exampleSentence: optionalText.max(1000),
  notes: optionalText.max(2000)
});

export const patchSchema = Joi.object<VocabularyPatch>({
  translation: Joi.string().trim().max(500),
  partOfSpeech: Joi.string().trim().lowercase().max(40).allow('', null),
  exampleSentence: optionalText.max(1000),
  notes: optionalText.max(2000)
}).min(1);

// ===================
// MODEL OUTPUT
// ===================

// Optional fields arrive in whatever shape the model chose; the extractor
// coerces them and only `translation` is held to a strict type.
export interface EnrichmentPayload {
  translation: string;
  part_of_speech?: unknown;
  example_sentence?: unknown;
  pronunciation_hint?: unknown;
  gender?: unknown;
  notes?: unknown;
}

export const enrichmentPayloadSchema = Joi.object<EnrichmentPayload>({
  translation: Joi.string().trim().required(),
  part_of_speech: Joi.any(),
  example_sentence: Joi.any(),
  pronunciation_hint: Joi.any(),
  gender: Joi.any(),
  notes: Joi.any()
})
  .rename('partOfSpeech', 'part_of_speech', { ignoreUndefined: true, override: true })
  .rename('example', 'example_sentence', { ignoreUndefined: true, override: true })
  .rename('exampleSentence', 'example_sentence', { ignoreUndefined: true, override: true })
  .rename('pronunciation', 'pronunciation_hint', { ignoreUndefined: true, override: true })
  .unknown(true);

export interface FlashcardPayloadItem {
  word: string;
  translation?: string | string[];
  translations?: string[];
  part_of_speech?: unknown;
}

export const flashcardItemSchema = Joi.object<FlashcardPayloadItem>({
  word: Joi.string().trim().required(),
  translation: Joi.alternatives().try(
    Joi.string().trim(),
    Joi.array().items(Joi.string().trim()).min(1)
  ),
  translations: Joi.array().items(Joi.string().trim()).min(1),
  part_of_speech: Joi.any()
})
  .or('translation', 'translations')
  .rename('partOfSpeech', 'part_of_speech', { ignoreUndefined: true, override: true })
  .unknown(true);

export function fieldOf(error: Joi.ValidationError): string {
  const detail = error.details[0];
  if (!detail) {
    return '';
  }
  if (detail.type === 'object.missing' && detail.context?.peers) {
    return String(detail.context.peers[0]);
  }
  return detail.path.join('.');
}

export function toValidationError(error: Joi.ValidationError): ValidationError {
  return new ValidationError(error.details[0]?.message ?? error.message, fieldOf(error) || undefined);
}
