import { z } from 'zod';
import { logger } from '../shared/logger.js';
import { ConfigError, HttpError, LlmError, ProviderAuthError } from '../shared/errors.js';
import { withBackoff, classifyLlmFailure } from '../shared/backoff.js';
import type { Config } from '../shared/config.js';

export interface LlmMessage {
  role: 'system' | 'user' | 'assistant';
  content: string;
}

export interface LlmResponse {
  content: string;
  model: string;
}

export type ProviderName = 'anthropic' | 'openai';

/**
 * One chat-completion backend. Implementations make a single HTTP call;
 * retries and time bounds live in LlmClient.
 */
export interface LlmProvider {
  readonly name: ProviderName;
  readonly model: string;
  complete(messages: LlmMessage[], maxTokens: number, signal: AbortSignal): Promise<string>;
}

// Partial response shapes; anything else is treated as a provider error.
const OpenAiResponseSchema = z.object({
  choices: z.array(z.object({ message: z.object({ content: z.string().nullable() }) })).min(1),
});

const AnthropicResponseSchema = z.object({
  content: z.array(z.object({ type: z.string(), text: z.string().optional() })),
});

async function ensureOk(response: Response, provider: ProviderName): Promise<void> {
  if (response.ok) return;
  // Drain the body; its content is never logged or attached.
  await response.arrayBuffer().catch((err: unknown) => {
    logger.debug({ provider, error: String(err) }, 'Could not drain error body');
  });
  if (response.status === 401 || response.status === 403) {
    throw new ProviderAuthError(`${provider} rejected the API key (HTTP ${response.status})`, {
      provider,
      status: response.status,
    });
  }
  throw new HttpError(`${provider} API error: HTTP ${response.status}`, response.status, { provider });
}

async function readJson(response: Response, provider: ProviderName): Promise<unknown> {
  try {
    return await response.json();
  } catch {
    throw new LlmError(`${provider} response is not valid JSON`, { provider });
  }
}

export class OpenAiProvider implements LlmProvider {
  readonly name = 'openai';

  constructor(
    private readonly apiKey: string,
    readonly model: string,
    private readonly baseUrl = 'https://api.openai.com/v1',
  ) {}

  async complete(messages: LlmMessage[], maxTokens: number, signal: AbortSignal): Promise<string> {
    const response = await fetch(`${this.baseUrl.replace(/\/+$/, '')}/chat/completions`, {
      method: 'POST',
      headers: {
        'Content-Type': 'application/json',
        Authorization: `Bearer ${this.apiKey}`,
      },
      body: JSON.stringify({ model: this.model, messages, max_tokens: maxTokens }),
      signal,
    });
    await ensureOk(response, this.name);

    const parsed = OpenAiResponseSchema.safeParse(await readJson(response, this.name));
    if (!parsed.success) throw new LlmError('Unexpected openai response shape', { provider: this.name });

    const content = parsed.data.choices[0]?.message.content;
    if (!content) throw new LlmError('openai returned empty content', { provider: this.name });
    return content;
  }
}

export class AnthropicProvider implements LlmProvider {
  readonly name = 'anthropic';

  constructor(
    private readonly apiKey: string,
    readonly model: string,
    private readonly baseUrl = 'https://api.anthropic.com',
  ) {}

  async complete(messages: LlmMessage[], maxTokens: number, signal: AbortSignal): Promise<string> {
    // The messages API takes the system prompt as a separate field.
    const system = messages
      .filter((m) => m.role === 'system')
      .map((m) => m.content)
      .join('\n\n');
    const turns = messages
      .filter((m) => m.role !== 'system')
      .map((m) => ({ role: m.role, content: m.content }));

    const response = await fetch(`${this.baseUrl.replace(/\/+$/, '')}/v1/messages`, {
      method: 'POST',
      headers: {
        'Content-Type': 'application/json',
        'x-api-key': this.apiKey,
        'anthropic-version': '2023-06-01',
      },
      body: JSON.stringify({
        model: this.model,
        max_tokens: maxTokens,
        ...(system ? { system } : {}),
        messages: turns,
      }),
      signal,
    });
    await ensureOk(response, this.name);

    const parsed = AnthropicResponseSchema.safeParse(await readJson(response, this.name));
    if (!parsed.success) {
      throw new LlmError('Unexpected anthropic response shape', { provider: this.name });
    }

    const content = parsed.data.content
      .filter((block) => block.type === 'text')
      .map((block) => block.text ?? '')
      .join('');
    if (!content) throw new LlmError('anthropic returned empty content', { provider: this.name });
    return content;
  }
}

/**
 * Pick the provider for this run: Anthropic when its key is set, otherwise
 * OpenAI. Never both. No key at all is a fatal configuration error.
 */
export function selectProvider(config: Config['llm']): LlmProvider {
  if (config.anthropic_api_key) {
    return new AnthropicProvider(
      config.anthropic_api_key,
      config.anthropic_model,
      config.anthropic_base_url,
    );
  }
  if (config.openai_api_key) {
    return new OpenAiProvider(config.openai_api_key, config.openai_model, config.openai_base_url);
  }
  throw new ConfigError('No LLM credentials configured: set ANTHROPIC_API_KEY or OPENAI_API_KEY');
}

export interface LlmClientOptions {
  timeoutMs: number;
  maxAttempts: number;
  baseDelayMs: number;
  maxOutputTokens: number;
  sleep?: (ms: number) => Promise<void>;
}

export class LlmClient {
  constructor(
    readonly provider: LlmProvider,
    private readonly options: LlmClientOptions,
  ) {}

  static fromConfig(
    config: Config['llm'],
    sleep?: (ms: number) => Promise<void>,
  ): LlmClient {
    return new LlmClient(selectProvider(config), {
      timeoutMs: config.timeout_ms,
      maxAttempts: config.max_attempts,
      baseDelayMs: config.backoff_base_ms,
      maxOutputTokens: config.max_output_tokens,
      sleep,
    });
  }

  get model(): string {
    return this.provider.model;
  }

  async chat(messages: LlmMessage[]): Promise<LlmResponse> {
    const content = await withBackoff(
      (signal) => this.provider.complete(messages, this.options.maxOutputTokens, signal),
      {
        label: `${this.provider.name} completion`,
        maxAttempts: this.options.maxAttempts,
        baseDelayMs: this.options.baseDelayMs,
        timeoutMs: this.options.timeoutMs,
        classify: classifyLlmFailure,
        sleep: this.options.sleep,
      },
    );

    logger.debug(
      { provider: this.provider.name, model: this.provider.model, chars: content.length },
      'LLM call completed',
    );
    return { content, model: this.provider.model };
  }
}
