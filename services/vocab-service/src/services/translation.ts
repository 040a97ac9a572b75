import { InferenceGateway } from '../clients/inference-gateway';
import { buildTranslationPrompt, TRANSLATOR_SYSTEM_PROMPT } from '../prompts/roleplay-prompts';
import { GatewayError } from '../utils/errors';
import { logger } from '../utils/logger';

export interface TranslationResult {
  originalText: string;
  translatedText: string;
  sourceLanguage: string;
  targetLanguage: string;
}

export interface TranslateOptions {
  model?: string;
  signal?: AbortSignal;
}

/**
 * Translation Service
 * Translates practice text into English through the local model, with a
 * small first-in first-out cache.
 */
export class TranslationService {
  private gateway: InferenceGateway;
  private cache: Map<string, string> = new Map();
  private readonly cacheSizeLimit: number;

  constructor(gateway: InferenceGateway, cacheSizeLimit = 1000) {
    this.gateway = gateway;
    this.cacheSizeLimit = cacheSizeLimit;
  }

  async translate(text: string, sourceLanguage: string, options: TranslateOptions = {}): Promise<TranslationResult> {
    const language = sourceLanguage.trim().toLowerCase();
    const cacheKey = JSON.stringify([options.model ?? '', language, text]);

    const cached = this.cache.get(cacheKey);
    if (cached !== undefined) {
      return { originalText: text, translatedText: cached, sourceLanguage: language, targetLanguage: 'english' };
    }

    const reply = await this.gateway.chat([{ role: 'user', content: buildTranslationPrompt(text, language) }], {
      system: TRANSLATOR_SYSTEM_PROMPT,
      temperature: 0,
      model: options.model,
      signal: options.signal
    });

    const translatedText = reply.trim();
    if (translatedText.length === 0) {
      throw new GatewayError('status', 'Model returned an empty translation', { model: options.model });
    }

    this.cacheTranslation(cacheKey, translatedText);
    logger.debug('[TRANSLATION] Translated text', { sourceLanguage: language, characters: text.length });
    return { originalText: text, translatedText, sourceLanguage: language, targetLanguage: 'english' };
  }

  getCacheStats(): { size: number; limit: number } {
    return { size: this.cache.size, limit: this.cacheSizeLimit };
  }

  private cacheTranslation(key: string, translation: string): void {
    if (this.cache.size >= this.cacheSizeLimit) {
      const firstKey = this.cache.keys().next().value;
      if (firstKey !== undefined) {
        this.cache.delete(firstKey);
      }
    }
    this.cache.set(key, translation);
  }
}
