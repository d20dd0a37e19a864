import Parser from 'rss-parser';
import type { FeedEntry } from './adapter.js';
import { SourceError } from '../shared/errors.js';

interface CustomItem {
  id?: string;
  guid?: string;
  summary?: string;
  contentEncoded?: string;
}

const parser = new Parser<Record<string, unknown>, CustomItem>({
  customFields: {
    item: [['content:encoded', 'contentEncoded']],
  },
});

function isHttpUrl(value: string | undefined): value is string {
  return value !== undefined && /^https?:\/\//i.test(value);
}

function nonEmpty(value: string | undefined): string | null {
  const trimmed = value?.trim();
  return trimmed ? trimmed : null;
}

/**
 * Parse an RSS 2.0 or Atom document into feed entries.
 * Entries without a usable URL are dropped; a missing title becomes "Untitled".
 */
export async function parseFeed(xml: string): Promise<FeedEntry[]> {
  let feed;
  try {
    feed = await parser.parseString(xml);
  } catch (err) {
    throw new SourceError(`Feed parse failed: ${err instanceof Error ? err.message : String(err)}`);
  }

  const entries: FeedEntry[] = [];
  for (const item of feed.items ?? []) {
    const guid = nonEmpty(item.guid) ?? nonEmpty(item.id);
    const link = nonEmpty(item.link);
    const url = link ?? (isHttpUrl(guid ?? undefined) ? guid : null);
    if (!url) continue;

    entries.push({
      guid,
      title: nonEmpty(item.title) ?? 'Untitled',
      url,
      published_at: item.isoDate ?? null,
      content_html: nonEmpty(item.contentEncoded) ?? nonEmpty(item.content) ?? nonEmpty(item.summary),
    });
  }

  return entries;
}
