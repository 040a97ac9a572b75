import { Router, Request, Response, NextFunction } from 'express';
import Joi from 'joi';
import { ChatMessage, InferenceGateway } from '../clients/inference-gateway';
import { abortOnClose } from '../utils/abort-on-close';

interface ChatBody {
  messages: ChatMessage[];
  model?: string;
  targetLanguage?: string;
  temperature?: number;
}

const chatSchema = Joi.object<ChatBody>({
  messages: Joi.array().items(Joi.object({
    role: Joi.string().valid('user', 'assistant', 'system').required(),
    content: Joi.string().required()
  })).min(1).required(),
  model: Joi.string(),
  targetLanguage: Joi.string().trim(),
  temperature: Joi.number().min(0).max(2)
});

export function chatRoutes(gateway: InferenceGateway): Router {
  const router = Router();

  /**
   * POST /chat
   * Free conversation practice, optionally pinned to the language being learned
   */
  router.post('/chat', async (req: Request, res: Response, next: NextFunction) => {
    try {
      const { error, value } = chatSchema.validate(req.body);
      if (error) {
        return res.status(400).json({
          error: 'validation_error',
          details: error.details.map(detail => detail.message)
        });
      }

      const reply = await gateway.chat(value.messages, {
        model: value.model,
        targetLanguage: value.targetLanguage,
        temperature: value.temperature,
        signal: abortOnClose(res)
      });
      res.json({ message: { role: 'assistant', content: reply } });
    } catch (error) {
      next(error);
    }
  });

  // Models installed on the inference server
  router.get('/models', async (_req: Request, res: Response, next: NextFunction) => {
    try {
      res.json({ models: await gateway.listModels() });
    } catch (error) {
      next(error);
    }
  });

  return router;
}
