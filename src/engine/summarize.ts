import type Database from 'better-sqlite3';
import type { Config } from '../shared/config.js';
import type { LlmClient } from '../llm/client.js';
import { buildSummaryMessages, SUMMARY_SYSTEM_PROMPT } from '../llm/prompts.js';
import { parseWithRetry, SummarySchema, type Summary } from '../llm/parse.js';
import { selectPending, markSummarized, type PendingItem } from '../source/sourceDb.js';
import { InvariantError, ProviderAuthError, errorMessage } from '../shared/errors.js';
import { sleep as defaultSleep } from '../shared/utils.js';
import { logger } from '../shared/logger.js';

export interface SummarizeOptions {
  /** Lowers the per-run cap; can never raise it. */
  maxItems?: number;
  sleep?: (ms: number) => Promise<void>;
}

export interface SummarizeStats {
  selected: number;
  succeeded: number;
  failed: number;
  errors: Array<{ itemId: number; error: string }>;
  durationMs: number;
}

export async function summarizeItem(
  client: LlmClient,
  item: PendingItem,
  config: Config,
): Promise<Summary> {
  const messages = buildSummaryMessages({
    title: item.title,
    url: item.url,
    content: item.content_text,
    maxInputTokens: config.llm.max_input_tokens,
  });

  const response = await client.chat(messages);
  return parseWithRetry(SummarySchema, response.content, client, SUMMARY_SYSTEM_PROMPT);
}

/**
 * Summarize up to the configured cap of pending items, one at a time. A
 * failing item stays `new` for the next run; credential and invariant
 * failures abort the stage.
 */
export async function runSummarize(
  db: Database.Database,
  client: LlmClient,
  config: Config,
  options: SummarizeOptions = {},
): Promise<SummarizeStats> {
  const startTime = Date.now();
  const sleep = options.sleep ?? defaultSleep;
  const cap = Math.min(
    options.maxItems ?? config.summarize.max_items_per_run,
    config.summarize.max_items_per_run,
  );

  const pending = selectPending(db, cap);
  const stats: SummarizeStats = {
    selected: pending.length,
    succeeded: 0,
    failed: 0,
    errors: [],
    durationMs: 0,
  };

  logger.info(
    { pending: pending.length, cap, provider: client.provider.name, model: client.model },
    'Summarize starting',
  );

  for (const [index, item] of pending.entries()) {
    if (index > 0) await sleep(config.summarize.item_delay_ms);

    try {
      const summary = await summarizeItem(client, item, config);
      markSummarized(db, item.id, summary, client.model);
      stats.succeeded++;
      logger.debug({ itemId: item.id }, 'Item summarized');
    } catch (err) {
      if (err instanceof ProviderAuthError || err instanceof InvariantError) throw err;
      stats.failed++;
      const error = errorMessage(err);
      stats.errors.push({ itemId: item.id, error });
      logger.warn({ itemId: item.id, error }, 'Summarize failed, item left pending');
    }
  }

  stats.durationMs = Date.now() - startTime;
  logger.info(
    {
      selected: stats.selected,
      succeeded: stats.succeeded,
      failed: stats.failed,
      durationMs: stats.durationMs,
    },
    'Summarize complete',
  );

  return stats;
}
