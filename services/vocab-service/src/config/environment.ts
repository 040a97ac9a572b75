import dotenv from 'dotenv';

dotenv.config();

export const config = {
  // Server config
  port: parseInt(process.env.PORT || '8080'),
  nodeEnv: process.env.NODE_ENV || 'development',
  allowedOrigins: (process.env.ALLOWED_ORIGINS || 'http://localhost:3000').split(','),

  // Database config
  mongoUri: process.env.MONGO_URI || 'mongodb://localhost:27017',
  mongoDbName: process.env.MONGO_DB_NAME || 'vocab_practice',

  // Inference service (Ollama)
  ollama: {
    baseUrl: process.env.OLLAMA_BASE_URL || 'http://localhost:11434',
    model: process.env.OLLAMA_MODEL || 'llama3.1',
    timeoutMs: parseInt(process.env.OLLAMA_TIMEOUT_MS || '30000'),
    readyTimeoutMs: parseInt(process.env.OLLAMA_READY_TIMEOUT_MS || '5000'),
    temperature: parseFloat(process.env.LLM_TEMPERATURE || '0.3'),
    maxTokens: parseInt(process.env.LLM_MAX_TOKENS || '1024'),
  },

  // Practice policy
  confidenceStep: parseFloat(process.env.CONFIDENCE_STEP || '0.2'),
  answers: {
    stripDiacritics: process.env.ANSWER_STRIP_DIACRITICS === 'true',
    allowInfinitiveTo: process.env.ANSWER_ALLOW_INFINITIVE_TO !== 'false',
  },
  sessionTtlMinutes: parseInt(process.env.SESSION_TTL_MINUTES || '60'),

  // Logging
  logLevel: process.env.LOG_LEVEL || 'info',
  logDir: process.env.LOG_DIR || '',
};

export type AppConfig = typeof config;

// Validation
export function validateConfig(settings: AppConfig = config): void {
  const problems: string[] = [];

  if (!Number.isInteger(settings.port) || settings.port <= 0) {
    problems.push('PORT must be a positive integer');
  }
  if (!settings.mongoUri) {
    problems.push('MONGO_URI is required');
  }
  if (!(settings.ollama.timeoutMs > 0)) {
    problems.push('OLLAMA_TIMEOUT_MS must be positive');
  }
  if (!(settings.ollama.readyTimeoutMs > 0)) {
    problems.push('OLLAMA_READY_TIMEOUT_MS must be positive');
  }
  if (!(settings.confidenceStep > 0 && settings.confidenceStep <= 1)) {
    problems.push('CONFIDENCE_STEP must be in (0, 1]');
  }
  if (!(settings.sessionTtlMinutes > 0)) {
    problems.push('SESSION_TTL_MINUTES must be positive');
  }

  if (problems.length > 0) {
    throw new Error(`Invalid configuration: ${problems.join('; ')}`);
  }
}
