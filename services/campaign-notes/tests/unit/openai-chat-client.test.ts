import { ConfigurationError, ProviderError } from '@lorekeeper/errors';
import { OpenAIChatClient } from '../../src/clients/openai-chat-client';
import { stubHttp, StubReply } from '../helpers/axios-stub';

function completion(content: string | null) {
  return {
    status: 200,
    data: {
      id: 'chatcmpl-1',
      model: 'gpt-4o-mini-2024-07-18',
      choices: [{ message: { role: 'assistant', content }, finish_reason: 'stop' }],
      usage: { prompt_tokens: 120, completion_tokens: 30, total_tokens: 150 },
    },
  };
}

function clientWith(replies: StubReply[]) {
  const http = stubHttp(replies);
  return { ...http, llm: new OpenAIChatClient({ apiKey: 'test-secret', retryDelayMs: 1, httpClient: http.client }) };
}

async function providerErrorFrom(promise: Promise<unknown>): Promise<ProviderError> {
  try {
    await promise;
  } catch (error) {
    if (error instanceof ProviderError) {
      return error;
    }
    throw error;
  }
  throw new Error('expected a ProviderError');
}

describe('OpenAIChatClient', () => {
  test('should map a completion to a generation', async () => {
    const { llm } = clientWith([completion('{"verdict":"new"}')]);

    const generation = await llm.generateWithRetry('gpt-4o-mini', 'system text', 'user text', 2);

    expect(generation).toMatchObject({
      content: '{"verdict":"new"}',
      tokensUsed: 150,
      promptTokens: 120,
      completionTokens: 30,
      model: 'gpt-4o-mini-2024-07-18',
    });
  });

  test('should send both prompts and request JSON output', async () => {
    const { llm, requests } = clientWith([completion('{}')]);

    await llm.generateWithRetry('gpt-4o-mini', 'system text', 'user text', 0);

    expect(requests[0].url).toBe('/chat/completions');
    expect(requests[0].body).toEqual({
      model: 'gpt-4o-mini',
      messages: [
        { role: 'system', content: 'system text' },
        { role: 'user', content: 'user text' },
      ],
      temperature: 0,
      response_format: { type: 'json_object' },
    });
  });

  test('should retry rate limited requests', async () => {
    const { llm, requests } = clientWith([{ status: 429, data: {} }, completion('{}')]);

    const generation = await llm.generateWithRetry('gpt-4o-mini', 's', 'u', 2);

    expect(generation.content).toBe('{}');
    expect(requests).toHaveLength(2);
  });

  test('should retry network errors', async () => {
    const { llm, requests } = clientWith([{ networkError: 'socket hang up' }, completion('{}')]);

    await llm.generateWithRetry('gpt-4o-mini', 's', 'u', 1);

    expect(requests).toHaveLength(2);
  });

  test('should not retry client errors', async () => {
    const { llm, requests } = clientWith([{ status: 400, data: {} }, completion('{}')]);

    const error = await providerErrorFrom(llm.generateWithRetry('gpt-4o-mini', 's', 'u', 3));

    expect(error.message).toBe('openai: chat completion failed');
    expect(error.context).toMatchObject({ status: 400, model: 'gpt-4o-mini' });
    expect(requests).toHaveLength(1);
  });

  test('should give up after the configured retries', async () => {
    const { llm, requests } = clientWith([
      { status: 500, data: {} },
      { status: 502, data: {} },
      { status: 503, data: {} },
    ]);

    const error = await providerErrorFrom(llm.generateWithRetry('gpt-4o-mini', 's', 'u', 2));

    expect(error.context).toMatchObject({ status: 503 });
    expect(requests).toHaveLength(3);
  });

  test('should reject responses of the wrong shape without retrying', async () => {
    const { llm, requests } = clientWith([{ status: 200, data: { choices: [] } }, completion('{}')]);

    const error = await providerErrorFrom(llm.generateWithRetry('gpt-4o-mini', 's', 'u', 2));

    expect(error.message).toBe('openai: completion response did not match schema');
    expect(requests).toHaveLength(1);
  });

  test('should reject empty completions', async () => {
    const { llm } = clientWith([completion('   ')]);

    const error = await providerErrorFrom(llm.generateWithRetry('gpt-4o-mini', 's', 'u', 0));

    expect(error.message).toBe('openai: completion returned no content');
  });

  test('should require an API key when no client is supplied', () => {
    expect(() => new OpenAIChatClient({ apiKey: '' })).toThrow(ConfigurationError);
  });
});
