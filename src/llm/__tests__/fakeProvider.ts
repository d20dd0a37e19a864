import { LlmClient, type LlmMessage, type LlmProvider } from '../client.js';

/** Scripted provider: each call consumes the next reply, or throws it. */
export class FakeProvider implements LlmProvider {
  readonly name = 'anthropic';
  readonly calls: LlmMessage[][] = [];

  constructor(
    private readonly replies: Array<string | Error>,
    readonly model = 'test-model',
  ) {}

  async complete(messages: LlmMessage[]): Promise<string> {
    this.calls.push(messages);
    const next = this.replies.shift();
    if (next === undefined) throw new Error('FakeProvider has no reply left');
    if (next instanceof Error) throw next;
    return next;
  }
}

export function fakeClient(provider: LlmProvider): LlmClient {
  return new LlmClient(provider, {
    timeoutMs: 1000,
    maxAttempts: 3,
    baseDelayMs: 0,
    maxOutputTokens: 500,
    sleep: async () => undefined,
  });
}

export const VALID_SUMMARY = JSON.stringify({
  eli5: 'A town picked buses over trains.',
  eli16: 'The council moved transit money from rail upkeep to new bus lanes.',
  why_this_matters: 'Commutes in the city will change next year.',
  what_changed: 'Budget priorities shifted to buses.',
  key_quotes: ['first lanes would open next spring'],
  confidence_unknowns: 'Costs beyond the first year are not given.',
});
