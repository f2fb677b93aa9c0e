import { describe, expect, it, vi } from 'vitest';
import { createOpenAIClient } from '../../src/parser/openai.js';
import { LlmRequestError } from '../../src/utils/errors.js';

function jsonResponse(body: unknown, status = 200): Response {
  return new Response(JSON.stringify(body), {
    status,
    headers: { 'Content-Type': 'application/json' },
  });
}

function completion(content: string | null) {
  return { choices: [{ message: { role: 'assistant', content } }] };
}

function createClient(respond: () => Promise<Response>) {
  const fetchMock = vi.fn<typeof fetch>(respond);
  const client = createOpenAIClient({ apiKey: 'test-key', model: 'gpt-test', fetch: fetchMock });
  return { client, fetchMock };
}

async function captureError(promise: Promise<unknown>): Promise<unknown> {
  try {
    await promise;
  } catch (err) {
    return err;
  }
  throw new Error('expected the promise to reject');
}

describe('createOpenAIClient', () => {
  it('should post a chat completion request', async () => {
    const { client, fetchMock } = createClient(async () => jsonResponse(completion('{"actions":[]}')));

    await client.generate('system text', 'user text');

    expect(fetchMock).toHaveBeenCalledTimes(1);
    const [url, init] = fetchMock.mock.calls[0];
    expect(url).toBe('https://api.openai.com/v1/chat/completions');
    expect(init?.method).toBe('POST');
    expect(init?.headers).toEqual({
      'Content-Type': 'application/json',
      Authorization: 'Bearer test-key',
    });
    expect(JSON.parse(String(init?.body))).toEqual({
      model: 'gpt-test',
      messages: [
        { role: 'system', content: 'system text' },
        { role: 'user', content: 'user text' },
      ],
      temperature: 0.1,
      max_tokens: 1000,
    });
  });

  it('should return the trimmed message content', async () => {
    const { client } = createClient(async () => jsonResponse(completion('  {"actions":[]}\n')));
    await expect(client.generate('s', 'u')).resolves.toBe('{"actions":[]}');
  });

  it('should flag a 429 as rate limited', async () => {
    const { client } = createClient(async () => new Response('slow down', { status: 429 }));

    const err = await captureError(client.generate('s', 'u'));

    expect(err).toBeInstanceOf(LlmRequestError);
    expect(err).toMatchObject({
      message: 'Rate limit exceeded: slow down',
      status: 429,
      rateLimited: true,
    });
  });

  it('should report other HTTP errors with their status', async () => {
    const { client } = createClient(async () => new Response('boom', { status: 500 }));

    const err = await captureError(client.generate('s', 'u'));

    expect(err).toMatchObject({
      message: 'OpenAI API error (500): boom',
      status: 500,
      rateLimited: false,
    });
  });

  it('should wrap transport failures', async () => {
    const { client } = createClient(async () => {
      throw new TypeError('fetch failed');
    });

    await expect(client.generate('s', 'u')).rejects.toThrow('OpenAI API request failed: fetch failed');
  });

  it('should reject a response without choices', async () => {
    const { client } = createClient(async () => jsonResponse({ choices: [] }));

    await expect(client.generate('s', 'u')).rejects.toThrow(/^Unexpected OpenAI response shape: /);
  });

  it('should reject empty content', async () => {
    const { client } = createClient(async () => jsonResponse(completion('   ')));
    await expect(client.generate('s', 'u')).rejects.toThrow('Empty response from AI');
  });

  it('should reject null content', async () => {
    const { client } = createClient(async () => jsonResponse(completion(null)));
    await expect(client.generate('s', 'u')).rejects.toThrow('Empty response from AI');
  });

  it('should wrap a body that is not JSON', async () => {
    const { client } = createClient(async () => new Response('<html>gateway</html>', { status: 200 }));

    const err = await captureError(client.generate('s', 'u'));

    expect(err).toBeInstanceOf(LlmRequestError);
    expect(err).toMatchObject({ status: 200, rateLimited: false });
    expect(err).toHaveProperty('message', expect.stringMatching(/^OpenAI API returned invalid JSON: /));
  });
});
