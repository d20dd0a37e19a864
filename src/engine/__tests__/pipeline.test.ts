import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import Database from 'better-sqlite3';
import { runMigrations } from '../../db/migrate.js';
import { getSourceByUrl, getItemsBySource, listRecentSummaries } from '../../source/sourceDb.js';
import { runIngest } from '../../source/ingest.js';
import { runSummarize } from '../summarize.js';
import { ConfigSchema, type Config } from '../../shared/config.js';
import { FakeProvider, fakeClient, VALID_SUMMARY } from '../../llm/__tests__/fakeProvider.js';

const FEED = `<?xml version="1.0"?>
<rss version="2.0"><channel><title>X</title>
  <item>
    <title>First post</title>
    <link>https://x.substack.com/p/1</link>
    <pubDate>Fri, 01 Mar 2024 08:00:00 GMT</pubDate>
    <description><![CDATA[<p>A first post long enough to stand on its own without a page fetch, covering what the newsletter will be about and how often it will arrive.</p>]]></description>
  </item>
</channel></rss>`;

let db: Database.Database;
let config: Config;
const originalFetch = globalThis.fetch;
const noWait = async (): Promise<void> => undefined;

beforeEach(() => {
  db = new Database(':memory:');
  db.pragma('foreign_keys = ON');
  runMigrations(db);
  config = ConfigSchema.parse({});
  globalThis.fetch = vi.fn().mockImplementation((url: string) =>
    Promise.resolve(
      url === 'https://x.substack.com/feed'
        ? new Response(FEED, { status: 200 })
        : new Response('Not Found', { status: 404 }),
    ),
  );
});

afterEach(() => {
  db.close();
  globalThis.fetch = originalFetch;
  vi.restoreAllMocks();
});

describe('fetch then summarize', () => {
  it('takes a substack post from feed to stored summary', async () => {
    const descriptor = { name: 'X', url: 'https://x.substack.com/', type: 'substack' as const };

    await runIngest(db, config, [descriptor], { sleep: noWait });
    await runIngest(db, config, [descriptor], { sleep: noWait });

    const source = getSourceByUrl(db, 'https://x.substack.com/');
    expect(source?.feed_url).toBe('https://x.substack.com/feed');
    const items = getItemsBySource(db, source?.id ?? -1);
    expect(items).toHaveLength(1);
    expect(items[0]?.status).toBe('new');

    const provider = new FakeProvider([VALID_SUMMARY], 'claude-haiku-4-5-20251001');
    const stats = await runSummarize(db, fakeClient(provider), config, { sleep: noWait });

    expect(stats.succeeded).toBe(1);
    const [summarized] = getItemsBySource(db, source?.id ?? -1);
    expect(summarized?.status).toBe('summarized');
    expect(summarized?.model_used).toBe('claude-haiku-4-5-20251001');

    const recent = listRecentSummaries(db, 10);
    expect(recent).toHaveLength(1);
    expect(recent[0]?.title).toBe('First post');
    expect(recent[0]?.source_name).toBe('X');
    expect(recent[0]?.published_at).toBe('2024-03-01T08:00:00.000Z');
  });
});
