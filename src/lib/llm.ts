import * as v from 'valibot';
import type { LlmConfig } from './config';
import { CompletionError } from './errors';
import { errorMessage } from './utils';
import { CompletionResponseSchema } from '@/schema/completion';

export interface CompletionRequest {
  prompt: string;
  maxTokens: number;
  temperature: number;
}

export interface CompletionClient {
  complete(req: CompletionRequest): Promise<string>;
}

/**
 * Chat-completions client for an OpenAI-compatible endpoint (Groq by default).
 * Sends the prompt as a single user message and returns the first choice's
 * content, trimmed. Errors are not retried.
 */
export function createCompletionClient(config: LlmConfig): CompletionClient {
  const endpoint = `${config.baseUrl}/chat/completions`;

  return {
    async complete({ prompt, maxTokens, temperature }) {
      let resp: Response;
      try {
        resp = await fetch(endpoint, {
          method: 'POST',
          headers: {
            'Authorization': `Bearer ${config.apiKey}`,
            'Content-Type': 'application/json',
          },
          body: JSON.stringify({
            model: config.model,
            messages: [{ role: 'user', content: prompt }],
            max_tokens: maxTokens,
            temperature,
          }),
        });
      } catch (e: unknown) {
        throw new CompletionError(`Completion request failed: ${errorMessage(e)}`);
      }

      if (!resp.ok) {
        const errTxt = await resp.text();
        console.error('[llm] upstream error', { status: resp.status, sample: errTxt.slice(0, 400) });
        throw new CompletionError(`Completion API error ${resp.status}: ${errTxt.slice(0, 400)}`, resp.status);
      }

      const parsed = v.safeParse(CompletionResponseSchema, await resp.json());
      if (!parsed.success) {
        throw new CompletionError('Completion API returned an unexpected body', resp.status);
      }
      const content = parsed.output.choices[0]?.message?.content ?? '';
      return content.trim();
    },
  };
}
