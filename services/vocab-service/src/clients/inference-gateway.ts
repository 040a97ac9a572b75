/**
 * Inference Gateway
 * Talks to a local Ollama server. One request per call; retry policy is left
 * to callers that know what a usable answer looks like.
 */
import axios, { AxiosInstance } from 'axios';
import { GatewayError } from '../utils/errors';
import { logger } from '../utils/logger';

export interface ChatMessage {
  role: 'system' | 'user' | 'assistant';
  content: string;
}

export interface GenerationOptions {
  model?: string;
  temperature?: number;
  maxTokens?: number;
  // Pins the reply language with a system instruction
  targetLanguage?: string;
  system?: string;
  seed?: number;
  timeoutMs?: number;
  signal?: AbortSignal;
}

export interface InferenceGateway {
  generate(prompt: string, options?: GenerationOptions): Promise<string>;
  chat(messages: ChatMessage[], options?: GenerationOptions): Promise<string>;
  isReady(model?: string): Promise<boolean>;
  listModels(): Promise<string[]>;
}

export interface OllamaSettings {
  baseUrl: string;
  model: string;
  timeoutMs: number;
  readyTimeoutMs: number;
  temperature?: number;
  maxTokens?: number;
}

function readMessageContent(data: unknown): string | null {
  if (typeof data !== 'object' || data === null || !('message' in data)) {
    return null;
  }
  const message = data.message;
  if (typeof message !== 'object' || message === null || !('content' in message)) {
    return null;
  }
  return typeof message.content === 'string' ? message.content : null;
}

function readModelNames(data: unknown): string[] {
  if (typeof data !== 'object' || data === null || !('models' in data) || !Array.isArray(data.models)) {
    return [];
  }
  const names: string[] = [];
  for (const model of data.models) {
    if (typeof model === 'object' && model !== null && 'name' in model && typeof model.name === 'string') {
      names.push(model.name);
    }
  }
  return names;
}

export class OllamaGateway implements InferenceGateway {
  private http: AxiosInstance;
  private settings: OllamaSettings;

  constructor(settings: OllamaSettings, http?: AxiosInstance) {
    this.settings = settings;
    this.http = http ?? axios.create({
      baseURL: settings.baseUrl,
      timeout: settings.timeoutMs,
      headers: { 'Content-Type': 'application/json' }
    });
  }

  async generate(prompt: string, options: GenerationOptions = {}): Promise<string> {
    return this.chat([{ role: 'user', content: prompt }], options);
  }

  async chat(messages: ChatMessage[], options: GenerationOptions = {}): Promise<string> {
    const model = options.model || this.settings.model;
    const timeoutMs = options.timeoutMs ?? this.settings.timeoutMs;
    const startTime = Date.now();

    const systemMessages: ChatMessage[] = [];
    if (options.targetLanguage) {
      systemMessages.push({
        role: 'system',
        content: `You must respond only in ${options.targetLanguage}. Never use any other language regardless of the input language.`
      });
    }
    if (options.system) {
      systemMessages.push({ role: 'system', content: options.system });
    }

    const payload = {
      model,
      messages: [...systemMessages, ...messages],
      stream: false,
      options: {
        temperature: options.temperature ?? this.settings.temperature,
        num_predict: options.maxTokens ?? this.settings.maxTokens,
        seed: options.seed
      }
    };

    try {
      const response = await this.http.post<unknown>('/api/chat', payload, {
        timeout: timeoutMs,
        signal: options.signal
      });

      const content = readMessageContent(response.data);
      if (content === null) {
        throw new GatewayError('status', `Model ${model} returned a response without message content`, {
          model,
          statusCode: response.status
        });
      }

      logger.info('[INFERENCE] Generation completed', {
        model,
        durationMs: Date.now() - startTime,
        characters: content.length
      });
      return content;
    } catch (error) {
      const gatewayError = this.toGatewayError(error, model, timeoutMs);
      logger.warn('[INFERENCE] Generation failed', {
        model,
        kind: gatewayError.kind,
        durationMs: Date.now() - startTime,
        message: gatewayError.message
      });
      throw gatewayError;
    }
  }

  /**
   * Asks the model for a single token. Any failure means "not ready".
   */
  async isReady(model: string = this.settings.model): Promise<boolean> {
    try {
      await this.http.post('/api/generate', {
        model,
        prompt: 'test',
        stream: false,
        options: { num_predict: 1 }
      }, { timeout: this.settings.readyTimeoutMs });
      return true;
    } catch (error) {
      logger.debug('[INFERENCE] Readiness probe failed', {
        model,
        message: error instanceof Error ? error.message : String(error)
      });
      return false;
    }
  }

  async listModels(): Promise<string[]> {
    try {
      const response = await this.http.get<unknown>('/api/tags', { timeout: this.settings.readyTimeoutMs });
      return readModelNames(response.data);
    } catch (error) {
      throw this.toGatewayError(error, 'all', this.settings.readyTimeoutMs);
    }
  }

  private toGatewayError(error: unknown, model: string, timeoutMs: number): GatewayError {
    if (error instanceof GatewayError) {
      return error;
    }

    if (axios.isCancel(error)) {
      return new GatewayError('cancelled', `Request to model ${model} was cancelled`, { model });
    }

    if (axios.isAxiosError(error)) {
      if (error.response) {
        return new GatewayError(
          'status',
          `Inference service answered ${error.response.status} for model ${model}`,
          { model, statusCode: error.response.status }
        );
      }
      if (error.code === 'ECONNABORTED' || error.code === 'ETIMEDOUT') {
        return new GatewayError('timeout', `Model ${model} did not answer within ${timeoutMs}ms`, { model });
      }
      return new GatewayError('unreachable', `Inference service unreachable: ${error.message}`, { model });
    }

    const message = error instanceof Error ? error.message : String(error);
    return new GatewayError('unreachable', `Inference service unreachable: ${message}`, { model });
  }
}
