import { Router, Request, Response, NextFunction } from 'express';
import Joi from 'joi';
import { ConflictPolicy, VocabularyStore } from '../services/vocabulary-store';
import { exportVocabularyCsv } from '../services/vocabulary-export';
import { NewVocabularyEntry, VocabularyFilter, VocabularyPatch, VOCABULARY_SORTS } from '../types/vocabulary';

interface AddBody extends NewVocabularyEntry {
  onConflict?: ConflictPolicy;
}

// Validation schemas
const listQuerySchema = Joi.object<VocabularyFilter>({
  language: Joi.string().trim(),
  search: Joi.string().trim().allow(''),
  sort: Joi.string().valid(...VOCABULARY_SORTS),
  limit: Joi.number().integer().min(1).max(1000)
});

const addSchema = Joi.object<AddBody>({
  word: Joi.string().required(),
  language: Joi.string().required(),
  translation: Joi.string().required(),
  partOfSpeech: Joi.string().allow('', null),
  exampleSentence: Joi.string().allow('', null),
  notes: Joi.string().allow('', null),
  onConflict: Joi.string().valid('reject', 'update', 'skip')
});

const patchBodySchema = Joi.object<VocabularyPatch>({
  translation: Joi.string(),
  partOfSpeech: Joi.string().allow('', null),
  exampleSentence: Joi.string().allow('', null),
  notes: Joi.string().allow('', null)
}).min(1);

function validationFailure(res: Response, error: Joi.ValidationError): void {
  res.status(400).json({
    error: 'validation_error',
    details: error.details.map(detail => detail.message)
  });
}

export function vocabularyRoutes(store: VocabularyStore): Router {
  const router = Router();

  /**
   * GET /vocabulary
   * List entries, newest first unless another sort is requested
   */
  router.get('/', async (req: Request, res: Response, next: NextFunction) => {
    try {
      const { error, value } = listQuerySchema.validate(req.query);
      if (error) {
        return validationFailure(res, error);
      }

      const entries = await store.find(value).toArray();
      res.json({ entries, count: entries.length });
    } catch (error) {
      next(error);
    }
  });

  router.get('/stats', async (req: Request, res: Response, next: NextFunction) => {
    try {
      const language = typeof req.query.language === 'string' && req.query.language ? req.query.language : undefined;
      res.json(await store.stats(language));
    } catch (error) {
      next(error);
    }
  });

  /**
   * GET /vocabulary/export
   * CSV dump of every matching entry
   */
  router.get('/export', async (req: Request, res: Response, next: NextFunction) => {
    try {
      const { error, value } = listQuerySchema.validate(req.query);
      if (error) {
        return validationFailure(res, error);
      }

      const csv = await exportVocabularyCsv(store.find(value));
      const stamp = new Date().toISOString().replace(/[-:]/g, '').replace('T', '_').slice(0, 15);
      res.setHeader('Content-Type', 'text/csv; charset=utf-8');
      res.setHeader('Content-Disposition', `attachment; filename="vocabulary_${stamp}.csv"`);
      res.send(csv);
    } catch (error) {
      next(error);
    }
  });

  router.post('/', async (req: Request, res: Response, next: NextFunction) => {
    try {
      const { error, value } = addSchema.validate(req.body);
      if (error) {
        return validationFailure(res, error);
      }

      const { onConflict, ...entry } = value;
      const result = await store.add(entry, { onConflict });
      res.status(result.outcome === 'created' ? 201 : 200).json(result);
    } catch (error) {
      next(error);
    }
  });

  router.get('/:language/:word', async (req: Request, res: Response, next: NextFunction) => {
    try {
      res.json(await store.get(req.params.word, req.params.language));
    } catch (error) {
      next(error);
    }
  });

  router.patch('/:language/:word', async (req: Request, res: Response, next: NextFunction) => {
    try {
      const { error, value } = patchBodySchema.validate(req.body);
      if (error) {
        return validationFailure(res, error);
      }

      res.json(await store.update(req.params.word, req.params.language, value));
    } catch (error) {
      next(error);
    }
  });

  router.delete('/:language/:word', async (req: Request, res: Response, next: NextFunction) => {
    try {
      await store.remove(req.params.word, req.params.language);
      res.status(204).send();
    } catch (error) {
      next(error);
    }
  });

  return router;
}
