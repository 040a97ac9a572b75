import { OllamaGateway } from './clients/inference-gateway';
import { closeConnection, getDb, pingDb } from './clients/mongodb';
import { MongoVocabularyRepository } from './clients/vocabulary-repository';
import { config, validateConfig } from './config/environment';
import { createApp } from './app';
import { AnswerMatcher } from './services/answer-matcher';
import { FlashcardSession } from './services/flashcard-session';
import { RoleplayService } from './services/roleplay';
import { SessionRegistry } from './services/session-registry';
import { StructuredExtractor } from './services/structured-extractor';
import { TranslationService } from './services/translation';
import { VocabularyStore } from './services/vocabulary-store';
import { logger } from './utils/logger';

async function main(): Promise<void> {
  validateConfig();

  const db = await getDb();
  const store = new VocabularyStore(new MongoVocabularyRepository(db), {
    scoring: { step: config.confidenceStep }
  });
  await store.initialize();

  const gateway = new OllamaGateway(config.ollama);
  const extractor = new StructuredExtractor(gateway, {
    generation: {
      model: config.ollama.model,
      temperature: config.ollama.temperature,
      maxTokens: config.ollama.maxTokens
    }
  });
  const matcher = new AnswerMatcher(config.answers);
  const ttlMs = config.sessionTtlMinutes * 60 * 1000;
  const sessions = new SessionRegistry(() => new FlashcardSession({ store, matcher }), ttlMs);

  // Drop idle flashcard sessions once a minute
  const sweeper = setInterval(() => sessions.sweep(), 60 * 1000);
  sweeper.unref();

  const roleplay = new RoleplayService(gateway);
  const translator = new TranslationService(gateway);

  const app = createApp({ store, gateway, extractor, sessions, roleplay, translator, pingDb });
  const server = app.listen(config.port, () => {
    logger.info(`Vocab service running on port ${config.port}`, {
      environment: config.nodeEnv,
      model: config.ollama.model
    });
  });

  const shutdown = (signal: string) => {
    logger.info(`${signal} received, shutting down gracefully`);
    clearInterval(sweeper);
    server.close(() => {
      logger.info('HTTP server closed');
      closeConnection()
        .then(() => process.exit(0))
        .catch(error => {
          logger.error('Error closing MongoDB connection', { message: error instanceof Error ? error.message : String(error) });
          process.exit(1);
        });
    });
  };

  process.on('SIGTERM', () => shutdown('SIGTERM'));
  process.on('SIGINT', () => shutdown('SIGINT'));
}

if (require.main === module) {
  main().catch(error => {
    logger.error('Failed to start vocab service', { message: error instanceof Error ? error.message : String(error) });
    process.exit(1);
  });
}
