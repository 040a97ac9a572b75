import nock from 'nock';
import { OllamaGateway } from '../../src/clients/inference-gateway';
import { GatewayError } from '../../src/utils/errors';

const BASE_URL = 'http://ollama.test:11434';

function createGateway(timeoutMs = 1000, readyTimeoutMs = 500): OllamaGateway {
  return new OllamaGateway({
    baseUrl: BASE_URL,
    model: 'test-model',
    timeoutMs,
    readyTimeoutMs,
    temperature: 0.3,
    maxTokens: 256
  });
}

async function captureError(promise: Promise<unknown>): Promise<GatewayError> {
  try {
    await promise;
  } catch (error) {
    if (error instanceof GatewayError) {
      return error;
    }
    throw error;
  }
  throw new Error('expected the call to fail');
}

describe('OllamaGateway', () => {
  beforeAll(() => {
    nock.disableNetConnect();
  });

  afterEach(() => {
    nock.cleanAll();
  });

  afterAll(() => {
    nock.enableNetConnect();
  });

  describe('chat', () => {
    it('should send system pins before the conversation and return the reply', async () => {
      const scope = nock(BASE_URL)
        .post('/api/chat', {
          model: 'test-model',
          messages: [
            {
              role: 'system',
              content: 'You must respond only in Spanish. Never use any other language regardless of the input language.'
            },
            { role: 'system', content: 'Be brief.' },
            { role: 'user', content: 'Hello' }
          ],
          stream: false,
          options: { temperature: 0.3, num_predict: 256 }
        })
        .reply(200, { message: { role: 'assistant', content: 'Hola' }, done: true });

      const reply = await createGateway().chat([{ role: 'user', content: 'Hello' }], {
        targetLanguage: 'Spanish',
        system: 'Be brief.'
      });

      expect(reply).toBe('Hola');
      expect(scope.isDone()).toBe(true);
    });

    it('should let per-call options override the defaults', async () => {
      const scope = nock(BASE_URL)
        .post('/api/chat', {
          model: 'other-model',
          messages: [{ role: 'user', content: 'Name a colour' }],
          stream: false,
          options: { temperature: 0, num_predict: 256, seed: 42 }
        })
        .reply(200, { message: { role: 'assistant', content: 'rojo' } });

      const reply = await createGateway().generate('Name a colour', { model: 'other-model', temperature: 0, seed: 42 });

      expect(reply).toBe('rojo');
      expect(scope.isDone()).toBe(true);
    });

    it('should map an error status to a status failure', async () => {
      nock(BASE_URL).post('/api/chat').reply(500, { error: 'model crashed' });

      const error = await captureError(createGateway().generate('Hello'));

      expect(error.kind).toBe('status');
      expect(error.statusCode).toBe(500);
    });

    it('should treat a reply without content as a status failure', async () => {
      nock(BASE_URL).post('/api/chat').reply(200, { done: true });

      const error = await captureError(createGateway().generate('Hello'));

      expect(error.kind).toBe('status');
      expect(error.message).toBe('Model test-model returned a response without message content');
    });

    it('should map a refused connection to unreachable', async () => {
      nock(BASE_URL).post('/api/chat').replyWithError({ code: 'ECONNREFUSED', message: 'connect ECONNREFUSED' });

      const error = await captureError(createGateway().generate('Hello'));

      expect(error.kind).toBe('unreachable');
      expect(error.status).toBe(502);
    });

    it('should map a slow model to a timeout', async () => {
      nock(BASE_URL).post('/api/chat').delay(500).reply(200, { message: { content: 'late' } });

      const error = await captureError(createGateway().generate('Hello', { timeoutMs: 50 }));

      expect(error.kind).toBe('timeout');
      expect(error.status).toBe(504);
      expect(error.message).toBe('Model test-model did not answer within 50ms');
    });

    it('should report a cancelled request', async () => {
      nock(BASE_URL).post('/api/chat').reply(200, { message: { content: 'never read' } });
      const controller = new AbortController();
      controller.abort();

      const error = await captureError(createGateway().generate('Hello', { signal: controller.signal }));

      expect(error.kind).toBe('cancelled');
    });
  });

  describe('isReady', () => {
    it('should be true when the model answers a one-token prompt', async () => {
      nock(BASE_URL)
        .post('/api/generate', body => body.model === 'test-model' && body.options.num_predict === 1)
        .reply(200, { response: 'ok', done: true });

      await expect(createGateway().isReady()).resolves.toBe(true);
    });

    it('should be false when the model is missing', async () => {
      nock(BASE_URL).post('/api/generate').reply(404, { error: 'model not found' });

      await expect(createGateway().isReady('missing-model')).resolves.toBe(false);
    });

    it('should give up once the readiness timeout passes', async () => {
      nock(BASE_URL).post('/api/generate').delay(1000).reply(200, { response: 'ok', done: true });
      const startedAt = Date.now();

      await expect(createGateway(5000, 100).isReady()).resolves.toBe(false);
      expect(Date.now() - startedAt).toBeLessThan(900);
    });
  });

  describe('listModels', () => {
    it('should return installed model names', async () => {
      nock(BASE_URL).get('/api/tags').reply(200, {
        models: [{ name: 'llama3.1:latest' }, { name: 'mistral:7b' }, { size: 12 }]
      });

      await expect(createGateway().listModels()).resolves.toEqual(['llama3.1:latest', 'mistral:7b']);
    });

    it('should map a slow tag listing to a timeout', async () => {
      nock(BASE_URL).get('/api/tags').delay(1000).reply(200, { models: [] });

      const error = await captureError(createGateway(5000, 100).listModels());

      expect(error.kind).toBe('timeout');
      expect(error.message).toBe('Model all did not answer within 100ms');
    });

    it('should map a refused connection to unreachable', async () => {
      nock(BASE_URL).get('/api/tags').replyWithError({ code: 'ECONNREFUSED', message: 'connect ECONNREFUSED' });

      const error = await captureError(createGateway().listModels());

      expect(error.kind).toBe('unreachable');
    });
  });
});
