import { GenerationOptions, InferenceGateway } from '../clients/inference-gateway';
import {
  buildCorrectivePrompt,
  buildEnrichmentPrompt,
  buildFlashcardBatchPrompt,
  CORRECTIVE_SYSTEM_PROMPT,
  FLASHCARD_CATEGORIES,
  FLASHCARD_SYSTEM_PROMPT,
  JSON_ONLY_SYSTEM_PROMPT
} from '../prompts/vocabulary-prompts';
import {
  EnrichmentResult,
  FlashcardBatch,
  FlashcardCard,
  isKnownPartOfSpeech
} from '../types/vocabulary';
import { ExtractionError, ExtractionReason, GatewayError } from '../utils/errors';
import { logger } from '../utils/logger';
import { enrichmentPayloadSchema, fieldOf, flashcardItemSchema, FlashcardPayloadItem } from '../validators/vocabulary';

export interface EnrichmentRequest {
  kind: 'enrichment';
  word: string;
  language: string;
}

export interface FlashcardBatchRequest {
  kind: 'flashcard-batch';
  language: string;
  count: number;
  categories?: string[];
}

export type ExtractionRequest = EnrichmentRequest | FlashcardBatchRequest;

export type ExtractionResult<T> =
  | { ok: true; value: T; attempts: 1 | 2; warnings: string[] }
  | { ok: false; error: ExtractionError };

type ParseOutcome<T> =
  | { ok: true; value: T; warnings: string[] }
  | { ok: false; reason: Exclude<ExtractionReason, 'gateway-unreachable'>; problem: string; field?: string };

export interface ExtractionCallOptions {
  model?: string;
  signal?: AbortSignal;
}

export interface StructuredExtractorOptions {
  generation?: GenerationOptions;
  random?: () => number;
}

const TRANSLATION_SEPARATOR = /[\/;]/;

// ===================
// PAYLOAD PARSING
// ===================

function stripCodeFence(text: string): string {
  const fenced = /```(?:json)?\s*([\s\S]*?)```/i.exec(text);
  return fenced ? fenced[1] : text;
}

function sliceBetween(text: string, open: string, close: string): string | null {
  const start = text.indexOf(open);
  const end = text.lastIndexOf(close);
  if (start === -1 || end <= start) {
    return null;
  }
  return text.slice(start, end + 1);
}

function parseJson(candidate: string | null): { ok: true; value: unknown } | { ok: false; problem: string } {
  if (candidate === null) {
    return { ok: false, problem: 'no JSON payload found in the answer' };
  }
  try {
    return { ok: true, value: JSON.parse(candidate) };
  } catch (error) {
    return { ok: false, problem: `invalid JSON: ${error instanceof Error ? error.message : String(error)}` };
  }
}

/**
 * Finds the JSON object embedded in a model answer, tolerating code fences
 * and prose around it.
 */
export function locateObjectPayload(text: string): { ok: true; value: unknown } | { ok: false; problem: string } {
  return parseJson(sliceBetween(stripCodeFence(text), '{', '}'));
}

/**
 * Finds the JSON array embedded in a model answer. An object wrapping the
 * array under `words`, `cards` or `flashcards` is accepted as well.
 */
export function locateArrayPayload(text: string): { ok: true; value: unknown[] } | { ok: false; problem: string } {
  const body = stripCodeFence(text);
  const firstBrace = body.indexOf('{');
  const firstBracket = body.indexOf('[');

  if (firstBrace !== -1 && (firstBracket === -1 || firstBrace < firstBracket)) {
    const wrapped = parseJson(sliceBetween(body, '{', '}'));
    if (wrapped.ok && typeof wrapped.value === 'object' && wrapped.value !== null) {
      for (const key of ['words', 'cards', 'flashcards']) {
        const inner: unknown = Reflect.get(wrapped.value, key);
        if (Array.isArray(inner)) {
          return { ok: true, value: inner };
        }
      }
    }
  }

  const parsed = parseJson(sliceBetween(body, '[', ']'));
  if (!parsed.ok) {
    return parsed;
  }
  if (!Array.isArray(parsed.value)) {
    return { ok: false, problem: 'expected a JSON array' };
  }
  return { ok: true, value: parsed.value };
}

function cleanText(value: string | null | undefined): string | null {
  if (typeof value !== 'string') {
    return null;
  }
  const trimmed = value.trim();
  return trimmed.length > 0 ? trimmed : null;
}

/**
 * Reduce an optional model field to text. Lists are joined, or cut to their
 * first element for single-valued fields; anything else that is not a string
 * is dropped. Every coercion leaves a warning.
 */
function coerceText(
  value: unknown,
  field: string,
  word: string,
  mode: 'join' | 'first',
  warnings: string[]
): string | null {
  if (value === undefined || value === null || typeof value === 'string') {
    return cleanText(value);
  }

  if (Array.isArray(value)) {
    const parts = value
      .filter((part): part is string => typeof part === 'string')
      .map(part => part.trim())
      .filter(part => part.length > 0);
    if (parts.length > 0) {
      if (mode === 'first') {
        warnings.push(`Took the first of ${value.length} values in "${field}" for "${word}"`);
        return parts[0];
      }
      warnings.push(`Joined ${value.length} values in "${field}" for "${word}"`);
      return parts.join(' ');
    }
  }

  warnings.push(`Dropped non-text "${field}" for "${word}"`);
  return null;
}

function normalizePartOfSpeech(value: string | null | undefined, word: string, warnings: string[]): string | null {
  const cleaned = cleanText(value);
  if (cleaned === null) {
    return null;
  }
  const lowered = cleaned.toLowerCase();
  if (!isKnownPartOfSpeech(lowered)) {
    warnings.push(`Unrecognized part of speech "${lowered}" for "${word}"`);
  }
  return lowered;
}

export function splitTranslations(value: string): string[] {
  return value
    .split(TRANSLATION_SEPARATOR)
    .map(part => part.trim())
    .filter(part => part.length > 0);
}

function collectTranslations(item: FlashcardPayloadItem): string[] {
  const raw: string[] = [];
  if (typeof item.translation === 'string') {
    raw.push(...splitTranslations(item.translation));
  } else if (Array.isArray(item.translation)) {
    raw.push(...item.translation);
  }
  if (item.translations) {
    raw.push(...item.translations);
  }

  const seen = new Set<string>();
  const translations: string[] = [];
  for (const translation of raw) {
    const key = translation.toLowerCase();
    if (translation.length > 0 && !seen.has(key)) {
      seen.add(key);
      translations.push(translation);
    }
  }
  return translations;
}

export function parseEnrichment(request: EnrichmentRequest, text: string): ParseOutcome<EnrichmentResult> {
  const located = locateObjectPayload(text);
  if (!located.ok) {
    return { ok: false, reason: 'malformed', problem: located.problem };
  }

  const { error, value } = enrichmentPayloadSchema.validate(located.value);
  if (error) {
    return { ok: false, reason: 'incomplete', problem: error.message, field: fieldOf(error) };
  }

  const warnings: string[] = [];
  return {
    ok: true,
    warnings,
    value: {
      word: request.word,
      language: request.language,
      translation: value.translation,
      partOfSpeech: normalizePartOfSpeech(
        coerceText(value.part_of_speech, 'part_of_speech', request.word, 'first', warnings),
        request.word,
        warnings
      ),
      exampleSentence: coerceText(value.example_sentence, 'example_sentence', request.word, 'join', warnings),
      pronunciationHint: coerceText(value.pronunciation_hint, 'pronunciation_hint', request.word, 'join', warnings),
      gender: coerceText(value.gender, 'gender', request.word, 'first', warnings),
      notes: coerceText(value.notes, 'notes', request.word, 'join', warnings)
    }
  };
}

export function parseFlashcardBatch(request: FlashcardBatchRequest, text: string): ParseOutcome<FlashcardBatch> {
  const located = locateArrayPayload(text);
  if (!located.ok) {
    return { ok: false, reason: 'malformed', problem: located.problem };
  }

  const warnings: string[] = [];
  const valid: FlashcardCard[] = [];
  let firstInvalid: { problem: string; field: string } | null = null;

  for (const [index, item] of located.value.entries()) {
    const { error, value } = flashcardItemSchema.validate(item);
    if (error) {
      firstInvalid = firstInvalid ?? { problem: error.message, field: `[${index}].${fieldOf(error)}` };
      warnings.push(`Dropped item ${index}: ${error.message}`);
      continue;
    }
    const translations = collectTranslations(value);
    if (translations.length === 0) {
      firstInvalid = firstInvalid ?? { problem: 'no usable translation', field: `[${index}].translation` };
      warnings.push(`Dropped item ${index}: no usable translation`);
      continue;
    }
    valid.push({
      word: value.word,
      translations,
      partOfSpeech: normalizePartOfSpeech(
        coerceText(value.part_of_speech, 'part_of_speech', value.word, 'first', warnings),
        value.word,
        warnings
      )
    });
  }

  if (valid.length === 0) {
    return {
      ok: false,
      reason: 'incomplete',
      problem: firstInvalid ? firstInvalid.problem : 'the array holds no flashcards',
      field: firstInvalid ? firstInvalid.field : undefined
    };
  }

  if (valid.length < request.count) {
    return {
      ok: false,
      reason: 'count-mismatch',
      problem: `expected ${request.count} flashcards, got ${valid.length}`
    };
  }

  // Duplicates are dropped first so surplus cards can fill their places
  const seen = new Set<string>();
  const unique: FlashcardCard[] = [];
  for (const card of valid) {
    const key = card.word.trim().toLowerCase();
    if (seen.has(key)) {
      warnings.push(`Dropped duplicate word "${card.word}"`);
      continue;
    }
    seen.add(key);
    unique.push(card);
  }

  const cards = unique.slice(0, request.count);
  return {
    ok: true,
    warnings,
    value: {
      language: request.language,
      requested: request.count,
      cards,
      shortBy: request.count - cards.length,
      categories: request.categories ?? []
    }
  };
}

// ===================
// EXTRACTOR
// ===================

/**
 * Turns free-form model answers into validated records. A failed parse gets
 * exactly one corrective round trip through the gateway; the second failure
 * is returned as an ExtractionError.
 */
export class StructuredExtractor {
  private gateway: InferenceGateway;
  private generation: GenerationOptions;
  private random: () => number;

  constructor(gateway: InferenceGateway, options: StructuredExtractorOptions = {}) {
    this.gateway = gateway;
    this.generation = options.generation ?? {};
    this.random = options.random ?? Math.random;
  }

  extract(request: EnrichmentRequest, rawText: string, options?: ExtractionCallOptions): Promise<ExtractionResult<EnrichmentResult>>;
  extract(request: FlashcardBatchRequest, rawText: string, options?: ExtractionCallOptions): Promise<ExtractionResult<FlashcardBatch>>;
  extract(
    request: ExtractionRequest,
    rawText: string,
    options: ExtractionCallOptions = {}
  ): Promise<ExtractionResult<EnrichmentResult> | ExtractionResult<FlashcardBatch>> {
    if (request.kind === 'enrichment') {
      const enrichment = request;
      return this.extractWithRetry(enrichment, rawText, text => parseEnrichment(enrichment, text), options);
    }
    const batch = request;
    return this.extractWithRetry(batch, rawText, text => parseFlashcardBatch(batch, text), options);
  }

  /**
   * Enrich a single word: translation, part of speech, example sentence.
   */
  async enrich(word: string, language: string, options: ExtractionCallOptions = {}): Promise<ExtractionResult<EnrichmentResult>> {
    const request: EnrichmentRequest = { kind: 'enrichment', word: word.trim(), language: language.trim() };

    let rawText: string;
    try {
      rawText = await this.gateway.generate(buildEnrichmentPrompt(request.word, request.language), {
        ...this.generation,
        system: JSON_ONLY_SYSTEM_PROMPT,
        model: options.model ?? this.generation.model,
        signal: options.signal
      });
    } catch (error) {
      return this.gatewayFailure(error, 'initial');
    }

    return this.extract(request, rawText, options);
  }

  /**
   * Generate a batch of flashcards. Categories and seed are randomised so
   * repeated calls produce different words.
   */
  async generateFlashcards(
    language: string,
    count: number,
    options: ExtractionCallOptions = {}
  ): Promise<ExtractionResult<FlashcardBatch>> {
    const categories = this.pickCategories(3);
    const seed = 1000 + Math.floor(this.random() * 9000);
    const request: FlashcardBatchRequest = { kind: 'flashcard-batch', language: language.trim(), count, categories };

    let rawText: string;
    try {
      rawText = await this.gateway.generate(buildFlashcardBatchPrompt(request.language, count, categories, seed), {
        ...this.generation,
        system: FLASHCARD_SYSTEM_PROMPT,
        temperature: 0.9,
        seed,
        model: options.model ?? this.generation.model,
        signal: options.signal
      });
    } catch (error) {
      return this.gatewayFailure(error, 'initial');
    }

    return this.extract(request, rawText, options);
  }

  private async extractWithRetry<T>(
    request: ExtractionRequest,
    rawText: string,
    parse: (text: string) => ParseOutcome<T>,
    options: ExtractionCallOptions
  ): Promise<ExtractionResult<T>> {
    const first = parse(rawText);
    if (first.ok) {
      return { ok: true, value: first.value, attempts: 1, warnings: first.warnings };
    }

    logger.warn('[EXTRACTOR] Model answer rejected, issuing corrective retry', {
      kind: request.kind,
      language: request.language,
      reason: first.reason,
      field: first.field
    });

    const correctivePrompt = buildCorrectivePrompt({
      kind: request.kind,
      language: request.language,
      word: request.kind === 'enrichment' ? request.word : undefined,
      count: request.kind === 'flashcard-batch' ? request.count : undefined,
      problem: first.field ? `${first.problem} (field: ${first.field})` : first.problem,
      previousOutput: rawText
    });

    let retryText: string;
    try {
      retryText = await this.gateway.generate(correctivePrompt, {
        ...this.generation,
        system: CORRECTIVE_SYSTEM_PROMPT,
        temperature: 0,
        model: options.model ?? this.generation.model,
        signal: options.signal
      });
    } catch (error) {
      return this.gatewayFailure(error, 'retry');
    }

    const second = parse(retryText);
    if (second.ok) {
      return { ok: true, value: second.value, attempts: 2, warnings: second.warnings };
    }

    logger.warn('[EXTRACTOR] Corrective retry rejected', {
      kind: request.kind,
      language: request.language,
      reason: second.reason,
      field: second.field
    });

    return {
      ok: false,
      error: new ExtractionError(second.reason, 'retry', second.problem, {
        field: second.field,
        rawText: retryText
      })
    };
  }

  private gatewayFailure(error: unknown, stage: 'initial' | 'retry'): { ok: false; error: ExtractionError } {
    if (!(error instanceof GatewayError)) {
      throw error;
    }
    return {
      ok: false,
      error: new ExtractionError('gateway-unreachable', stage, error.message, { cause: error })
    };
  }

  private pickCategories(count: number): string[] {
    const pool = [...FLASHCARD_CATEGORIES];
    const picked: string[] = [];
    while (picked.length < count && pool.length > 0) {
      const index = Math.floor(this.random() * pool.length);
      picked.push(...pool.splice(index, 1));
    }
    return picked;
  }
}
