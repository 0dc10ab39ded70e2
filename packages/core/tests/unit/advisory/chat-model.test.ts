import { describe, expect, it, vi } from 'vitest';
import { OpenAiChatModel } from '../../../src/advisory/chat-model.js';
import { AdvisoryUnavailableError } from '../../../src/utils/errors.js';

function jsonResponse(body: unknown, status = 200): Response {
  return new Response(JSON.stringify(body), { status, headers: { 'Content-Type': 'application/json' } });
}

function completion(content: string | null) {
  return {
    model: 'gpt-4o-mini-2024-07-18',
    choices: [{ message: { role: 'assistant', content }, finish_reason: 'stop' }],
    usage: { prompt_tokens: 120, completion_tokens: 30, total_tokens: 150 },
  };
}

function createModel(fetchImpl: typeof fetch, baseUrl = 'https://api.example.test/v1'): OpenAiChatModel {
  return new OpenAiChatModel({ model: 'gpt-4o-mini', baseUrl, apiKey: 'test-key', timeoutSec: 2, fetchImpl });
}

describe('OpenAiChatModel', () => {
  it('posts a chat completion request and returns the message text', async () => {
    const fetchMock = vi.fn<typeof fetch>().mockResolvedValue(jsonResponse(completion('{"suggestions": []}')));
    const model = createModel(fetchMock);

    const result = await model.complete([{ role: 'user', content: 'hi' }], {
      temperature: 0.3,
      maxTokens: 500,
      jsonMode: true,
    });

    expect(result.text).toBe('{"suggestions": []}');
    expect(result.model).toBe('gpt-4o-mini-2024-07-18');
    expect(result.usage).toEqual({ inputTokens: 120, outputTokens: 30, totalTokens: 150 });
    expect(result.finishReason).toBe('stop');

    const call = fetchMock.mock.calls[0];
    const url = call?.[0];
    const init = call?.[1];
    expect(url).toBe('https://api.example.test/v1/chat/completions');
    expect(init?.method).toBe('POST');
    expect(init?.headers).toEqual({ 'Content-Type': 'application/json', Authorization: 'Bearer test-key' });
    expect(JSON.parse(String(init?.body))).toEqual({
      model: 'gpt-4o-mini',
      messages: [{ role: 'user', content: 'hi' }],
      temperature: 0.3,
      max_tokens: 500,
      response_format: { type: 'json_object' },
    });
  });

  it('joins the endpoint without doubling slashes', async () => {
    const fetchMock = vi.fn<typeof fetch>().mockResolvedValue(jsonResponse(completion('ok')));
    await createModel(fetchMock, 'http://localhost:8080/v1/').complete([]);
    expect(fetchMock.mock.calls[0]?.[0]).toBe('http://localhost:8080/v1/chat/completions');
  });

  it('omits the authorization header without an API key', async () => {
    const fetchMock = vi.fn<typeof fetch>().mockResolvedValue(jsonResponse(completion('ok')));
    const model = new OpenAiChatModel({ model: 'm', baseUrl: 'http://localhost/v1', timeoutSec: 1, fetchImpl: fetchMock });
    await model.complete([]);
    expect(fetchMock.mock.calls[0]?.[1]?.headers).toEqual({ 'Content-Type': 'application/json' });
  });

  it('raises AdvisoryUnavailableError with the status on an error response', async () => {
    const fetchMock = vi.fn<typeof fetch>().mockResolvedValue(new Response('slow down', { status: 429 }));
    const error = await createModel(fetchMock).complete([]).catch((err: unknown) => err);
    if (!(error instanceof AdvisoryUnavailableError)) throw error;
    expect(error.message).toBe('Advisory service responded with 429: slow down');
    expect(error.statusCode).toBe(429);
    expect(error.isRateLimit).toBe(true);
    expect(error.isAuthError).toBe(false);
  });

  it('wraps transport failures', async () => {
    const fetchMock = vi.fn<typeof fetch>().mockRejectedValue(new TypeError('fetch failed'));
    await expect(createModel(fetchMock).complete([])).rejects.toThrow('Advisory request failed: fetch failed');
  });

  it('reports timeouts in seconds', async () => {
    const timeout = new Error('The operation was aborted due to timeout');
    timeout.name = 'TimeoutError';
    const fetchMock = vi.fn<typeof fetch>().mockRejectedValue(timeout);
    await expect(createModel(fetchMock).complete([])).rejects.toThrow('Advisory request failed: timed out after 2s');
  });

  it('rejects a body that is not JSON', async () => {
    const fetchMock = vi.fn<typeof fetch>().mockResolvedValue(new Response('<html>', { status: 200 }));
    await expect(createModel(fetchMock).complete([])).rejects.toThrow(/non-JSON body/);
  });

  it('rejects an envelope without choices', async () => {
    const fetchMock = vi.fn<typeof fetch>().mockResolvedValue(jsonResponse({ choices: [] }));
    await expect(createModel(fetchMock).complete([])).rejects.toThrow('Advisory service returned an unexpected response envelope');
  });

  it('rejects empty message content', async () => {
    const fetchMock = vi.fn<typeof fetch>().mockResolvedValue(jsonResponse(completion(null)));
    await expect(createModel(fetchMock).complete([])).rejects.toThrow('Advisory service returned no message content');
  });
});
