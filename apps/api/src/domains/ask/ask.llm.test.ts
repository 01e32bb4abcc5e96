import { describe, it, expect, vi, afterEach } from 'vitest';
import {
  createLanguageModel,
  createLlmClient,
  DISABLED_MODEL,
  LlmApiError,
} from './ask.llm.js';

function jsonResponse(body: unknown, status = 200): Response {
  return new Response(JSON.stringify(body), {
    status,
    headers: { 'Content-Type': 'application/json' },
  });
}

const CLIENT_CONFIG = {
  baseUrl: 'http://localhost:8080',
  model: 'test-model',
  apiKey: 'test-key',
  timeoutMs: 3000,
};

afterEach(() => {
  vi.unstubAllGlobals();
});

describe('createLanguageModel', () => {
  it('is disabled without an API key', () => {
    const model = createLanguageModel({
      apiKey: undefined,
      model: 'gpt-4o',
      baseUrl: 'https://api.openai.com',
      timeoutMs: 30000,
    });
    expect(model).toBe(DISABLED_MODEL);
  });

  it('builds a client from settings without exposing the key', () => {
    const model = createLanguageModel({
      apiKey: 'test-key',
      model: 'gpt-4o',
      baseUrl: 'https://api.openai.com',
      timeoutMs: 30000,
    });
    expect(model.enabled).toBe(true);
    if (model.enabled) {
      expect(model.client.config).toEqual({
        baseUrl: 'https://api.openai.com',
        model: 'gpt-4o',
        timeoutMs: 30000,
      });
    }
  });
});

describe('createLlmClient', () => {
  it('posts a chat completion request and returns the first choice', async () => {
    const fetchMock = vi.fn(async (_url: string, _init: RequestInit) =>
      jsonResponse({ choices: [{ message: { content: 'SELECT 1' }, finish_reason: 'stop' }] }),
    );
    vi.stubGlobal('fetch', fetchMock);

    const client = createLlmClient(CLIENT_CONFIG);
    const result = await client.chatCompletion(
      [{ role: 'user', content: 'hello' }],
      { temperature: 0.7, maxTokens: 300 },
    );

    expect(result).toEqual({ content: 'SELECT 1', finishReason: 'stop' });

    const [url, init] = fetchMock.mock.calls[0];
    expect(url).toBe('http://localhost:8080/v1/chat/completions');
    expect(init.method).toBe('POST');
    expect(init.headers).toEqual({
      'Content-Type': 'application/json',
      Authorization: 'Bearer test-key',
    });
    expect(JSON.parse(String(init.body))).toEqual({
      model: 'test-model',
      messages: [{ role: 'user', content: 'hello' }],
      temperature: 0.7,
      max_tokens: 300,
    });
  });

  it('applies default temperature and token limit', async () => {
    const fetchMock = vi.fn(async (_url: string, _init: RequestInit) =>
      jsonResponse({ choices: [{ message: { content: 'ok' }, finish_reason: 'stop' }] }),
    );
    vi.stubGlobal('fetch', fetchMock);

    await createLlmClient(CLIENT_CONFIG).chatCompletion([{ role: 'user', content: 'hi' }]);

    const body = JSON.parse(String(fetchMock.mock.calls[0][1].body));
    expect(body.temperature).toBe(0.1);
    expect(body.max_tokens).toBe(500);
  });

  it('returns null content when the API sends no choices', async () => {
    vi.stubGlobal('fetch', vi.fn(async () => jsonResponse({ choices: [] })));

    const result = await createLlmClient(CLIENT_CONFIG).chatCompletion([{ role: 'user', content: 'hi' }]);

    expect(result).toEqual({ content: null, finishReason: 'unknown' });
  });

  it('throws LlmApiError on a non-2xx status', async () => {
    vi.stubGlobal('fetch', vi.fn(async () => jsonResponse({ error: 'rate limited' }, 429)));

    const call = createLlmClient(CLIENT_CONFIG).chatCompletion([{ role: 'user', content: 'hi' }]);

    await expect(call).rejects.toBeInstanceOf(LlmApiError);
    await expect(call).rejects.toThrow('LLM API error: 429');
  });

  it('rejects a payload that is not a chat completion', async () => {
    vi.stubGlobal('fetch', vi.fn(async () => jsonResponse({ choices: 'nope' })));

    await expect(
      createLlmClient(CLIENT_CONFIG).chatCompletion([{ role: 'user', content: 'hi' }]),
    ).rejects.toThrow('LLM API returned an unexpected payload');
  });
});
