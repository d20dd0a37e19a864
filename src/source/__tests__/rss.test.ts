import { describe, it, expect } from 'vitest';
import { parseFeed } from '../rss.js';
import { SourceError } from '../../shared/errors.js';

const SAMPLE_RSS = `<?xml version="1.0" encoding="UTF-8"?>
<rss version="2.0" xmlns:content="http://purl.org/rss/1.0/modules/content/">
  <channel>
    <title>Test Feed</title>
    <link>https://example.com</link>
    <item>
      <title>Article One</title>
      <link>https://example.com/article-1</link>
      <guid>guid-1</guid>
      <pubDate>Mon, 01 Jan 2024 00:00:00 GMT</pubDate>
      <description>First article excerpt</description>
    </item>
    <item>
      <title>Article Two</title>
      <link>https://example.com/article-2</link>
      <guid>guid-2</guid>
      <description>Second article excerpt</description>
      <content:encoded><![CDATA[<p>Full content of article two</p>]]></content:encoded>
    </item>
    <item>
      <title></title>
      <link>https://example.com/no-title</link>
    </item>
    <item>
      <title>Permalink Only</title>
      <guid>https://example.com/permalink</guid>
    </item>
    <item>
      <title>No Link</title>
    </item>
  </channel>
</rss>`;

const SAMPLE_ATOM = `<?xml version="1.0" encoding="UTF-8"?>
<feed xmlns="http://www.w3.org/2005/Atom">
  <title>Atom Feed</title>
  <entry>
    <title>Atom Entry</title>
    <link href="https://example.com/atom-1"/>
    <id>atom-1</id>
    <updated>2024-01-15T10:00:00Z</updated>
    <summary>Atom summary</summary>
  </entry>
</feed>`;

describe('parseFeed', () => {
  it('parses RSS items and drops entries without a URL', async () => {
    const entries = await parseFeed(SAMPLE_RSS);

    expect(entries.map((e) => e.url)).toEqual([
      'https://example.com/article-1',
      'https://example.com/article-2',
      'https://example.com/no-title',
      'https://example.com/permalink',
    ]);
    expect(entries[0]).toEqual({
      guid: 'guid-1',
      title: 'Article One',
      url: 'https://example.com/article-1',
      published_at: '2024-01-01T00:00:00.000Z',
      content_html: 'First article excerpt',
    });
  });

  it('prefers content:encoded over the description', async () => {
    const entries = await parseFeed(SAMPLE_RSS);
    expect(entries[1]?.content_html).toBe('<p>Full content of article two</p>');
  });

  it('defaults a missing title', async () => {
    const entries = await parseFeed(SAMPLE_RSS);
    expect(entries[2]?.title).toBe('Untitled');
    expect(entries[2]?.published_at).toBeNull();
  });

  it('parses Atom entries', async () => {
    const entries = await parseFeed(SAMPLE_ATOM);

    expect(entries).toHaveLength(1);
    expect(entries[0]?.title).toBe('Atom Entry');
    expect(entries[0]?.url).toBe('https://example.com/atom-1');
    expect(entries[0]?.guid).toBe('atom-1');
  });

  it('throws SourceError for non-feed input', async () => {
    await expect(parseFeed('this is not xml')).rejects.toBeInstanceOf(SourceError);
  });
});
