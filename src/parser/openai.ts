import { z } from 'zod';
import { LlmRequestError, errorMessage } from '../utils/errors.js';
import type { LLMClient } from './client.js';

const COMPLETIONS_URL = 'https://api.openai.com/v1/chat/completions';

const chatResponseSchema = z.object({
  choices: z
    .array(
      z.object({
        message: z.object({
          content: z.string().nullable(),
        }),
      }),
    )
    .nonempty(),
});

export interface OpenAIClientOptions {
  apiKey: string;
  model: string;
  temperature?: number;
  maxTokens?: number;
  fetch?: typeof fetch;
}

export function createOpenAIClient(options: OpenAIClientOptions): LLMClient {
  const doFetch = options.fetch ?? fetch;

  return {
    async generate(systemPrompt: string, userPrompt: string): Promise<string> {
      let response: Response;
      try {
        response = await doFetch(COMPLETIONS_URL, {
          method: 'POST',
          headers: {
            'Content-Type': 'application/json',
            Authorization: `Bearer ${options.apiKey}`,
          },
          body: JSON.stringify({
            model: options.model,
            messages: [
              { role: 'system', content: systemPrompt },
              { role: 'user', content: userPrompt },
            ],
            temperature: options.temperature ?? 0.1,
            max_tokens: options.maxTokens ?? 1000,
          }),
        });
      } catch (err) {
        throw new LlmRequestError(`OpenAI API request failed: ${errorMessage(err)}`);
      }

      if (!response.ok) {
        const body = await response.text();
        if (response.status === 429) {
          throw new LlmRequestError(`Rate limit exceeded: ${body}`, {
            status: 429,
            rateLimited: true,
          });
        }
        throw new LlmRequestError(`OpenAI API error (${response.status}): ${body}`, {
          status: response.status,
        });
      }

      let body: unknown;
      try {
        body = await response.json();
      } catch (err) {
        throw new LlmRequestError(`OpenAI API returned invalid JSON: ${errorMessage(err)}`, {
          status: response.status,
        });
      }

      const parsed = chatResponseSchema.safeParse(body);
      if (!parsed.success) {
        throw new LlmRequestError(`Unexpected OpenAI response shape: ${parsed.error.message}`);
      }

      const content = parsed.data.choices[0].message.content?.trim();
      if (!content) {
        throw new LlmRequestError('Empty response from AI');
      }
      return content;
    },
  };
}
