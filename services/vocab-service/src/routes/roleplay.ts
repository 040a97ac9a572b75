import { Router, Request, Response, NextFunction } from 'express';
import Joi from 'joi';
import { ChatMessage } from '../clients/inference-gateway';
import { CustomScenario, RoleplayService } from '../services/roleplay';
import { TranslationService } from '../services/translation';
import { abortOnClose } from '../utils/abort-on-close';

interface RoleplayBody {
  language: string;
  scenarioId?: string;
  custom?: CustomScenario;
  messages?: ChatMessage[];
  model?: string;
}

interface TranslateBody {
  text: string;
  sourceLanguage: string;
  model?: string;
}

// Validation schemas
const roleplaySchema = Joi.object<RoleplayBody>({
  language: Joi.string().trim().required(),
  scenarioId: Joi.string().trim(),
  custom: Joi.object({
    description: Joi.string().trim().max(500).required(),
    character: Joi.string().trim().max(100),
    setting: Joi.string().trim().max(100)
  }),
  messages: Joi.array().items(Joi.object({
    role: Joi.string().valid('user', 'assistant').required(),
    content: Joi.string().required()
  })),
  model: Joi.string()
}).xor('scenarioId', 'custom');

const translateSchema = Joi.object<TranslateBody>({
  text: Joi.string().trim().max(5000).required(),
  sourceLanguage: Joi.string().trim().required(),
  model: Joi.string()
});

function validationFailure(res: Response, error: Joi.ValidationError): void {
  res.status(400).json({
    error: 'validation_error',
    details: error.details.map(detail => detail.message)
  });
}

export function roleplayRoutes(roleplay: RoleplayService, translator: TranslationService): Router {
  const router = Router();

  router.get('/roleplay/scenarios', (_req: Request, res: Response) => {
    res.json({ scenarios: roleplay.listScenarios() });
  });

  /**
   * POST /roleplay
   * Without messages the character opens the scene; otherwise it answers the
   * learner's last line
   */
  router.post('/roleplay', async (req: Request, res: Response, next: NextFunction) => {
    try {
      const { error, value } = roleplaySchema.validate(req.body);
      if (error) {
        return validationFailure(res, error);
      }

      const scenario = roleplay.resolveScenario(value.scenarioId, value.custom);
      const options = { model: value.model, signal: abortOnClose(res) };
      const turn = value.messages && value.messages.length > 0
        ? await roleplay.respond(value.language, scenario, value.messages, options)
        : await roleplay.open(value.language, scenario, options);

      res.json({ scenario, ...turn });
    } catch (error) {
      next(error);
    }
  });

  /**
   * POST /translate
   * Translate practice text into English
   */
  router.post('/translate', async (req: Request, res: Response, next: NextFunction) => {
    try {
      const { error, value } = translateSchema.validate(req.body);
      if (error) {
        return validationFailure(res, error);
      }

      const result = await translator.translate(value.text, value.sourceLanguage, {
        model: value.model,
        signal: abortOnClose(res)
      });
      res.json(result);
    } catch (error) {
      next(error);
    }
  });

  return router;
}
