import type Database from 'better-sqlite3';
import type { Config } from '../shared/config.js';
import type { SourceDescriptor } from '../shared/sourceList.js';
import type { FeedEntry, Source } from './adapter.js';
import { HttpFetcher } from './http.js';
import { parseFeed } from './rss.js';
import { resolveFeed } from './resolve.js';
import { extractEntry } from './extract.js';
import { urlFingerprint } from './dedup.js';
import {
  upsertSource,
  setFeedUrl,
  deactivateSource,
  recordFetch,
  fingerprintExists,
  insertItem,
} from './sourceDb.js';
import { DbError, InvariantError, errorMessage } from '../shared/errors.js';
import { sleep as defaultSleep } from '../shared/utils.js';
import { logger } from '../shared/logger.js';

export interface IngestOptions {
  /** Injected for tests; defaults to one built from config.ingest. */
  fetcher?: HttpFetcher;
  sleep?: (ms: number) => Promise<void>;
}

export interface IngestStats {
  sourcesProcessed: number;
  sourcesUnchanged: number;
  sourcesFailed: number;
  sourcesDeactivated: number;
  sourcesSkipped: number;
  itemsFetched: number;
  itemsNew: number;
  itemsDuplicate: number;
  errors: Array<{ source: string; error: string }>;
  durationMs: number;
}

function emptyStats(): IngestStats {
  return {
    sourcesProcessed: 0,
    sourcesUnchanged: 0,
    sourcesFailed: 0,
    sourcesDeactivated: 0,
    sourcesSkipped: 0,
    itemsFetched: 0,
    itemsNew: 0,
    itemsDuplicate: 0,
    errors: [],
    durationMs: 0,
  };
}

/**
 * Entries to ingest for one source, or null when there is nothing to do this
 * run (not modified, fetch failed, or the feed could not be resolved).
 *
 * A source that has never been fetched goes through the resolver even when
 * its feed location is explicit, so a bad `feed_url` or `channel_id` is
 * caught on the first run.
 */
async function loadEntries(
  db: Database.Database,
  descriptor: SourceDescriptor,
  source: Source,
  fetcher: HttpFetcher,
  stats: IngestStats,
): Promise<FeedEntry[] | null> {
  if (!source.feed_url || source.last_fetch_at === null) {
    const resolved = await resolveFeed(descriptor, fetcher);
    if (resolved.kind === 'unreachable') {
      // Nothing was rejected, only unreachable; the source stays active.
      stats.sourcesFailed++;
      stats.errors.push({ source: source.source_url, error: resolved.reason });
      logger.warn(
        { source: source.source_url, type: source.type, reason: resolved.reason },
        'Feed unreachable, will retry next run',
      );
      return null;
    }
    if (resolved.kind === 'unresolved') {
      deactivateSource(db, source.id);
      stats.sourcesDeactivated++;
      stats.errors.push({ source: source.source_url, error: resolved.reason });
      logger.warn(
        { source: source.source_url, type: source.type, reason: resolved.reason },
        'Feed unresolvable, source deactivated',
      );
      return null;
    }

    if (resolved.feedUrl !== source.feed_url) setFeedUrl(db, source.id, resolved.feedUrl);
    recordFetch(db, source.id, resolved.validators);
    logger.info({ source: source.source_url, feed: resolved.feedUrl }, 'Feed resolved');
    return resolved.entries;
  }

  const outcome = await fetcher.get(source.feed_url, {
    validators: { etag: source.etag, lastModified: source.last_modified },
  });

  if (outcome.kind === 'not_modified') {
    stats.sourcesUnchanged++;
    logger.info({ source: source.source_url }, 'Feed not modified');
    return null;
  }
  if (outcome.kind === 'failed') {
    // Transient origin trouble; the source stays active.
    stats.sourcesFailed++;
    stats.errors.push({ source: source.source_url, error: outcome.error });
    return null;
  }

  const entries = await parseFeed(outcome.body);
  recordFetch(db, source.id, outcome.validators);
  return entries;
}

async function ingestSource(
  db: Database.Database,
  config: Config,
  descriptor: SourceDescriptor,
  source: Source,
  fetcher: HttpFetcher,
  stats: IngestStats,
): Promise<void> {
  const entries = await loadEntries(db, descriptor, source, fetcher, stats);
  if (entries === null) return;

  stats.sourcesProcessed++;
  stats.itemsFetched += entries.length;
  let added = 0;

  for (const entry of entries) {
    // Skip known URLs before spending a page fetch on them.
    if (fingerprintExists(db, urlFingerprint(entry.url))) {
      stats.itemsDuplicate++;
      continue;
    }

    const draft = await extractEntry(entry, source.id, fetcher, {
      maxChars: config.ingest.max_chars_per_item,
      minFeedChars: config.ingest.min_feed_content_chars,
    });

    const result = insertItem(db, draft);
    if (result.status === 'inserted') {
      stats.itemsNew++;
      added++;
      logger.debug({ source: source.source_url, itemId: result.id, url: entry.url }, 'Item added');
    } else {
      stats.itemsDuplicate++;
    }
  }

  logger.info(
    { source: source.source_url, entries: entries.length, added },
    'Source ingested',
  );
}

/**
 * Ingest stage: upsert every listed source, then resolve, fetch and store new
 * items one source at a time. A failing source never stops the run; store
 * errors do.
 */
export async function runIngest(
  db: Database.Database,
  config: Config,
  descriptors: SourceDescriptor[],
  options: IngestOptions = {},
): Promise<IngestStats> {
  const startTime = Date.now();
  const stats = emptyStats();
  const sleep = options.sleep ?? defaultSleep;
  const fetcher = options.fetcher ?? HttpFetcher.fromConfig(config.ingest, options.sleep);

  if (descriptors.length === 0) {
    logger.info('Source list is empty');
    stats.durationMs = Date.now() - startTime;
    return stats;
  }

  for (const [index, descriptor] of descriptors.entries()) {
    if (index > 0) await sleep(config.ingest.source_delay_ms);

    const source = upsertSource(db, descriptor);
    if (!source.active) {
      stats.sourcesSkipped++;
      logger.debug({ source: source.source_url }, 'Source inactive, skipped');
      continue;
    }

    try {
      await ingestSource(db, config, descriptor, source, fetcher, stats);
    } catch (err) {
      if (err instanceof DbError || err instanceof InvariantError) throw err;
      stats.sourcesFailed++;
      const error = errorMessage(err);
      stats.errors.push({ source: source.source_url, error });
      logger.warn({ source: source.source_url, error }, 'Source ingest failed');
    }
  }

  stats.durationMs = Date.now() - startTime;
  logger.info(
    {
      sourcesProcessed: stats.sourcesProcessed,
      sourcesUnchanged: stats.sourcesUnchanged,
      sourcesFailed: stats.sourcesFailed,
      sourcesDeactivated: stats.sourcesDeactivated,
      itemsNew: stats.itemsNew,
      itemsDuplicate: stats.itemsDuplicate,
      durationMs: stats.durationMs,
    },
    'Ingest complete',
  );

  return stats;
}
