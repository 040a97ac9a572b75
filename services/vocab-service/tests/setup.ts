// Test setup file
import dotenv from 'dotenv';

// Load environment variables from .env.test if it exists, otherwise use defaults
dotenv.config({ path: '.env.test' });

process.env.NODE_ENV = 'test';
process.env.MONGO_URI = process.env.MONGO_URI || 'mongodb://localhost:27017';
process.env.MONGO_DB_NAME = process.env.MONGO_DB_NAME || 'vocab_practice_test';
process.env.OLLAMA_BASE_URL = process.env.OLLAMA_BASE_URL || 'http://ollama.test:11434';
process.env.OLLAMA_MODEL = process.env.OLLAMA_MODEL || 'test-model';
process.env.ALLOWED_ORIGINS = process.env.ALLOWED_ORIGINS || 'http://localhost:3000';
