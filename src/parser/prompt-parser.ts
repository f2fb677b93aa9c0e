import { z } from 'zod';
import { type TestAction, type TestScenario, createAction, createScenario, parseActionType } from '../scenario/types.js';
import { ParseError } from '../utils/errors.js';
import { logger } from '../utils/logger.js';
import type { RateLimiter } from '../utils/rate-limiter.js';
import type { LLMClient } from './client.js';
import { SYSTEM_PROMPT } from './system-prompt.js';

export const SCENARIO_NAME = 'AI Generated Test Scenario';

const rawActionSchema = z.object({
  type: z.string(),
  target: z.string().nullish(),
  value: z.string().nullish(),
  timeoutSeconds: z.number().int().positive().nullish(),
});

// Entries are checked one by one so a single malformed entry does not sink the rest.
const rawResultSchema = z.object({
  actions: z.array(z.unknown()),
});

const FENCE_PATTERN = /^```(?:json)?\s*([\s\S]*?)\s*```$/;

function stripCodeFence(text: string): string {
  const match = FENCE_PATTERN.exec(text.trim());
  return match ? match[1] : text.trim();
}

/** Turn the model's answer into actions, dropping malformed entries and unknown types. */
export function parseActions(answer: string): TestAction[] {
  let json: unknown;
  try {
    json = JSON.parse(stripCodeFence(answer));
  } catch {
    throw new ParseError('AI response is not valid JSON');
  }

  const parsed = rawResultSchema.safeParse(json);
  if (!parsed.success) {
    throw new ParseError(`Invalid JSON structure from AI: ${parsed.error.message}`);
  }

  const actions: TestAction[] = [];
  for (const [index, entry] of parsed.data.actions.entries()) {
    const checked = rawActionSchema.safeParse(entry);
    if (!checked.success) {
      logger.warn({ index, issues: checked.error.issues }, 'Dropping malformed action');
      continue;
    }
    const raw = checked.data;
    const type = parseActionType(raw.type);
    if (!type) {
      logger.warn({ type: raw.type }, 'Dropping action with unknown type');
      continue;
    }
    actions.push(
      createAction({
        type,
        target: raw.target ?? '',
        value: raw.value ?? '',
        timeoutSeconds: raw.timeoutSeconds ?? undefined,
      }),
    );
  }
  return actions;
}

export interface PromptParserOptions {
  client: LLMClient;
  rateLimiter: RateLimiter;
  cacheSize?: number;
}

export class PromptParser {
  private readonly client: LLMClient;
  private readonly rateLimiter: RateLimiter;
  private readonly cacheSize: number;
  // Holds actions, not scenarios: every parse hands out a scenario with a fresh id.
  // Map keeps insertion order, so the first key is the oldest entry.
  private readonly cache = new Map<string, readonly TestAction[]>();

  constructor(options: PromptParserOptions) {
    this.client = options.client;
    this.rateLimiter = options.rateLimiter;
    this.cacheSize = options.cacheSize ?? 50;
  }

  /**
   * Parse a prompt into a scenario. Throws ParseError when the model produced
   * nothing executable, and LlmRequestError when the request itself failed.
   */
  async parse(prompt: string, baseUrl = ''): Promise<TestScenario> {
    const cacheKey = `${prompt}|${baseUrl}`;
    let actions = this.cache.get(cacheKey);
    if (actions) {
      logger.info('Using cached AI parsing result');
    } else {
      actions = await this.requestActions(prompt);
      this.remember(cacheKey, actions);
    }

    return createScenario({
      name: SCENARIO_NAME,
      description: prompt,
      baseUrl: baseUrl || undefined,
      actions,
    });
  }

  private async requestActions(prompt: string): Promise<TestAction[]> {
    const answer = await this.rateLimiter.schedule(() => this.client.generate(SYSTEM_PROMPT, prompt));
    const actions = parseActions(answer);
    if (actions.length === 0) {
      throw new ParseError('Failed to parse prompt with AI. Please check your prompt and try again.');
    }
    logger.info({ actions: actions.length }, 'Successfully parsed with AI');
    return actions;
  }

  private remember(cacheKey: string, actions: readonly TestAction[]): void {
    this.cache.set(cacheKey, actions);
    if (this.cache.size > this.cacheSize) {
      const oldest = this.cache.keys().next();
      if (!oldest.done) this.cache.delete(oldest.value);
    }
  }
}
