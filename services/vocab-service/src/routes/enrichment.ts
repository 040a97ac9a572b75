import { Router, Request, Response, NextFunction } from 'express';
import Joi from 'joi';
import { StructuredExtractor } from '../services/structured-extractor';
import { ConflictPolicy, VocabularyStore } from '../services/vocabulary-store';
import { EnrichmentResult } from '../types/vocabulary';
import { abortOnClose } from '../utils/abort-on-close';

interface EnrichBody {
  word: string;
  language: string;
  model?: string;
}

interface AcceptBody {
  enrichment: EnrichmentResult;
  onConflict?: ConflictPolicy;
}

const optionalText = Joi.string().allow('', null).default(null);

// Validation schemas
const enrichSchema = Joi.object<EnrichBody>({
  word: Joi.string().trim().required(),
  language: Joi.string().trim().required(),
  model: Joi.string()
});

const acceptSchema = Joi.object<AcceptBody>({
  enrichment: Joi.object({
    word: Joi.string().required(),
    language: Joi.string().required(),
    translation: Joi.string().required(),
    partOfSpeech: optionalText,
    exampleSentence: optionalText,
    pronunciationHint: optionalText,
    gender: optionalText,
    notes: optionalText
  }).required(),
  onConflict: Joi.string().valid('reject', 'update', 'skip')
});

export function enrichmentRoutes(extractor: StructuredExtractor, store: VocabularyStore): Router {
  const router = Router();

  /**
   * POST /enrichment
   * Ask the model for translation, part of speech and an example sentence
   */
  router.post('/', async (req: Request, res: Response, next: NextFunction) => {
    try {
      const { error, value } = enrichSchema.validate(req.body);
      if (error) {
        return res.status(400).json({
          error: 'validation_error',
          details: error.details.map(detail => detail.message)
        });
      }

      const result = await extractor.enrich(value.word, value.language, {
        model: value.model,
        signal: abortOnClose(res)
      });
      if (!result.ok) {
        return next(result.error);
      }

      res.json({
        enrichment: result.value,
        attempts: result.attempts,
        warnings: result.warnings
      });
    } catch (error) {
      next(error);
    }
  });

  /**
   * POST /enrichment/accept
   * Save a reviewed enrichment as a vocabulary entry
   */
  router.post('/accept', async (req: Request, res: Response, next: NextFunction) => {
    try {
      const { error, value } = acceptSchema.validate(req.body);
      if (error) {
        return res.status(400).json({
          error: 'validation_error',
          details: error.details.map(detail => detail.message)
        });
      }

      const result = await store.acceptEnrichment(value.enrichment, { onConflict: value.onConflict });
      res.status(result.outcome === 'created' ? 201 : 200).json(result);
    } catch (error) {
      next(error);
    }
  });

  return router;
}
