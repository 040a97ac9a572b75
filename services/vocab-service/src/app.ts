import express, { Express } from 'express';
import cors from 'cors';
import helmet from 'helmet';
import morgan from 'morgan';
import { InferenceGateway } from './clients/inference-gateway';
import { config } from './config/environment';
import { errorHandler, notFoundHandler } from './middleware/error-handler';
import { chatRoutes } from './routes/chat';
import { enrichmentRoutes } from './routes/enrichment';
import { flashcardRoutes } from './routes/flashcards';
import { healthRoutes } from './routes/health';
import { roleplayRoutes } from './routes/roleplay';
import { vocabularyRoutes } from './routes/vocabulary';
import { RoleplayService } from './services/roleplay';
import { SessionRegistry } from './services/session-registry';
import { StructuredExtractor } from './services/structured-extractor';
import { TranslationService } from './services/translation';
import { VocabularyStore } from './services/vocabulary-store';
import { httpLogStream } from './utils/logger';

export interface AppDependencies {
  store: VocabularyStore;
  gateway: InferenceGateway;
  extractor: StructuredExtractor;
  sessions: SessionRegistry;
  roleplay?: RoleplayService;
  translator?: TranslationService;
  pingDb: () => Promise<boolean>;
  defaultModel?: string;
}

export function createApp(deps: AppDependencies): Express {
  const app = express();

  // Middleware
  app.use(helmet());
  app.use(cors({ origin: config.allowedOrigins }));
  app.use(express.json({ limit: '1mb' }));
  if (config.nodeEnv !== 'test') {
    app.use(morgan('combined', { stream: httpLogStream }));
  }

  // Routes
  app.use('/health', healthRoutes(deps.gateway, deps.defaultModel ?? config.ollama.model, deps.pingDb));
  app.use('/api/vocabulary', vocabularyRoutes(deps.store));
  app.use('/api/enrichment', enrichmentRoutes(deps.extractor, deps.store));
  app.use('/api/flashcards', flashcardRoutes(deps.extractor, deps.sessions));
  app.use('/api', chatRoutes(deps.gateway));
  app.use('/api', roleplayRoutes(
    deps.roleplay ?? new RoleplayService(deps.gateway),
    deps.translator ?? new TranslationService(deps.gateway)
  ));

  app.use(notFoundHandler);
  app.use(errorHandler);

  return app;
}
