import { Router, Request, Response, NextFunction } from 'express';
import Joi from 'joi';
import { SamplingStrategy } from '../services/flashcard-session';
import { SessionRegistry } from '../services/session-registry';
import { StructuredExtractor } from '../services/structured-extractor';
import { FlashcardCard } from '../types/vocabulary';
import { abortOnClose } from '../utils/abort-on-close';

interface GenerateBody {
  language: string;
  count: number;
  model?: string;
}

interface SessionBody {
  language: string;
  count?: number;
  strategy?: SamplingStrategy;
  cards?: FlashcardCard[];
}

interface AnswerBody {
  answer: string;
}

// Validation schemas
const generateSchema = Joi.object<GenerateBody>({
  language: Joi.string().trim().required(),
  count: Joi.number().integer().min(1).max(50).default(10),
  model: Joi.string()
});

const cardSchema = Joi.object<FlashcardCard>({
  word: Joi.string().trim().required(),
  translations: Joi.array().items(Joi.string().trim()).min(1).required(),
  partOfSpeech: Joi.string().allow(null).default(null)
});

const sessionSchema = Joi.object<SessionBody>({
  language: Joi.string().trim().required(),
  count: Joi.number().integer().min(1).max(100),
  strategy: Joi.string().valid('uniform', 'weakest-first').default('uniform'),
  cards: Joi.array().items(cardSchema).min(1)
}).xor('count', 'cards');

const answerSchema = Joi.object<AnswerBody>({
  answer: Joi.string().allow('').required()
});

function validationFailure(res: Response, error: Joi.ValidationError): void {
  res.status(400).json({
    error: 'validation_error',
    details: error.details.map(detail => detail.message)
  });
}

export function flashcardRoutes(extractor: StructuredExtractor, sessions: SessionRegistry): Router {
  const router = Router();

  /**
   * POST /flashcards/generate
   * Ask the model for a fresh batch of common words
   */
  router.post('/generate', async (req: Request, res: Response, next: NextFunction) => {
    try {
      const { error, value } = generateSchema.validate(req.body);
      if (error) {
        return validationFailure(res, error);
      }

      const result = await extractor.generateFlashcards(value.language, value.count, {
        model: value.model,
        signal: abortOnClose(res)
      });
      if (!result.ok) {
        return next(result.error);
      }

      res.json({
        batch: result.value,
        attempts: result.attempts,
        warnings: result.warnings
      });
    } catch (error) {
      next(error);
    }
  });

  /**
   * POST /flashcards/sessions
   * Start a quiz over saved words (count) or over a generated batch (cards)
   */
  router.post('/sessions', async (req: Request, res: Response, next: NextFunction) => {
    try {
      const { error, value } = sessionSchema.validate(req.body);
      if (error) {
        return validationFailure(res, error);
      }

      const { id, session } = sessions.create();
      try {
        const current = value.cards
          ? session.startWithCards(value.language, value.cards)
          : await session.start(value.language, value.count ?? 10, value.strategy);
        res.status(201).json({ sessionId: id, state: session.currentState, current });
      } catch (startError) {
        sessions.discard(id);
        throw startError;
      }
    } catch (error) {
      next(error);
    }
  });

  router.get('/sessions/:id/current', (req: Request, res: Response, next: NextFunction) => {
    try {
      const session = sessions.get(req.params.id);
      res.json({ state: session.currentState, current: session.currentItem() });
    } catch (error) {
      next(error);
    }
  });

  router.post('/sessions/:id/answer', async (req: Request, res: Response, next: NextFunction) => {
    try {
      const { error, value } = answerSchema.validate(req.body);
      if (error) {
        return validationFailure(res, error);
      }

      const session = sessions.get(req.params.id);
      const outcome = await session.submitAnswer(value.answer);
      res.json({
        ...outcome,
        next: outcome.completed ? null : session.currentItem()
      });
    } catch (error) {
      next(error);
    }
  });

  router.post('/sessions/:id/skip', (req: Request, res: Response, next: NextFunction) => {
    try {
      const session = sessions.get(req.params.id);
      const outcome = session.skip();
      res.json({
        ...outcome,
        next: outcome.completed ? null : session.currentItem()
      });
    } catch (error) {
      next(error);
    }
  });

  router.get('/sessions/:id/result', (req: Request, res: Response, next: NextFunction) => {
    try {
      res.json(sessions.get(req.params.id).result());
    } catch (error) {
      next(error);
    }
  });

  router.delete('/sessions/:id', (req: Request, res: Response) => {
    const removed = sessions.discard(req.params.id);
    res.status(removed ? 204 : 404).send();
  });

  return router;
}
