import { Router, Request, Response } from 'express';
import { InferenceGateway } from '../clients/inference-gateway';

export function healthRoutes(gateway: InferenceGateway, defaultModel: string, pingDb: () => Promise<boolean>): Router {
  const router = Router();

  // Basic health check
  router.get('/', async (_req: Request, res: Response) => {
    const database = await pingDb();
    res.status(database ? 200 : 503).json({
      status: database ? 'healthy' : 'degraded',
      service: 'vocab-service',
      timestamp: new Date().toISOString(),
      database: database ? 'connected' : 'unreachable',
      uptime: process.uptime()
    });
  });

  /**
   * GET /health/model?model=
   * Readiness probe for the "model loaded" indicator
   */
  router.get('/model', async (req: Request, res: Response) => {
    const model = typeof req.query.model === 'string' && req.query.model ? req.query.model : defaultModel;
    const ready = await gateway.isReady(model);
    res.json({ model, ready });
  });

  return router;
}
