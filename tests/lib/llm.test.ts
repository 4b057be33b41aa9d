import { afterAll, afterEach, beforeAll, describe, expect, it, vi } from 'vitest';
import { http, HttpResponse } from 'msw';
import { CompletionError } from '@/lib/errors';
import { createCompletionClient } from '@/lib/llm';
import { resetMswHandlers, server, startMswServer, stopMswServer } from '../mocks/server';

const ENDPOINT = 'https://llm.test/openai/v1/chat/completions';
const client = createCompletionClient({ apiKey: 'test-groq-key', baseUrl: 'https://llm.test/openai/v1', model: 'test-model' });

beforeAll(() => {
  startMswServer();
  vi.spyOn(console, 'error').mockImplementation(() => {});
});
afterEach(() => resetMswHandlers());
afterAll(() => {
  stopMswServer();
  vi.restoreAllMocks();
});

describe('createCompletionClient', () => {
  it('posts a single user message and returns the trimmed first choice', async () => {
    const bodies: unknown[] = [];
    const auth: (string | null)[] = [];
    server.use(
      http.post(ENDPOINT, async ({ request }) => {
        auth.push(request.headers.get('authorization'));
        bodies.push(await request.json());
        return HttpResponse.json({
          id: 'cmpl-1',
          choices: [{ index: 0, message: { role: 'assistant', content: '  A short summary.\n' } }],
        });
      }),
    );

    const out = await client.complete({ prompt: 'Summarize this', maxTokens: 150, temperature: 0.5 });

    expect(out).toBe('A short summary.');
    expect(auth).toEqual(['Bearer test-groq-key']);
    expect(bodies).toEqual([
      {
        model: 'test-model',
        messages: [{ role: 'user', content: 'Summarize this' }],
        max_tokens: 150,
        temperature: 0.5,
      },
    ]);
  });

  it('returns an empty string when there is no choice', async () => {
    server.use(http.post(ENDPOINT, () => HttpResponse.json({ choices: [] })));
    expect(await client.complete({ prompt: 'x', maxTokens: 10, temperature: 0 })).toBe('');
  });

  it('throws CompletionError on a non-success status', async () => {
    server.use(http.post(ENDPOINT, () => new HttpResponse('rate limited', { status: 429 })));

    const run = client.complete({ prompt: 'x', maxTokens: 10, temperature: 0 });
    await expect(run).rejects.toBeInstanceOf(CompletionError);
    await expect(run).rejects.toMatchObject({ status: 429, message: 'Completion API error 429: rate limited' });
  });

  it('throws CompletionError when the request cannot be sent', async () => {
    server.use(http.post(ENDPOINT, () => HttpResponse.error()));

    await expect(client.complete({ prompt: 'x', maxTokens: 10, temperature: 0 })).rejects.toBeInstanceOf(
      CompletionError,
    );
  });
});
