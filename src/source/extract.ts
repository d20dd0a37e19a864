import { Readability } from '@mozilla/readability';
import { JSDOM } from 'jsdom';
import type { FeedEntry, ItemDraft } from './adapter.js';
import { HTML_ACCEPT, type HttpFetcher } from './http.js';
import { errorMessage } from '../shared/errors.js';
import { logger } from '../shared/logger.js';
import { sliceCodeUnits } from '../shared/utils.js';

const BOILERPLATE = 'script, style, noscript, template, nav, footer, header, aside, form, iframe';
const BLOCKS = 'p, h1, h2, h3, h4, h5, h6, li, blockquote, pre';
const CONTENT_CLASS = /post|content|entry|article/i;

function collapse(text: string): string {
  return text.replace(/\s+/g, ' ').trim();
}

/**
 * Paragraph-level text of an element: one line per block, blank line between.
 * Blocks nested in other blocks are read through their outermost block.
 */
export function blockText(root: Element): string {
  const blocks = Array.from(root.querySelectorAll(BLOCKS))
    .filter((el) => !el.parentElement?.closest(BLOCKS))
    .map((el) => collapse(el.textContent ?? ''))
    .filter((t) => t.length > 0);

  if (blocks.length > 0) return blocks.join('\n\n');
  return collapse(root.textContent ?? '');
}

function findContentRoot(doc: Document): Element | null {
  const main = doc.querySelector('main') ?? doc.querySelector('article');
  if (main) return main;

  for (const el of Array.from(doc.querySelectorAll('[class]'))) {
    if (CONTENT_CLASS.test(el.getAttribute('class') ?? '')) return el;
  }
  return doc.body ?? doc.documentElement;
}

/**
 * Heuristic main-content text: drop boilerplate elements, then read the
 * first of main / article / a post-like class / body.
 */
export function htmlToText(html: string): string {
  if (!html.trim()) return '';
  const doc = new JSDOM(html).window.document;
  for (const el of Array.from(doc.querySelectorAll(BOILERPLATE))) {
    el.remove();
  }
  const root = findContentRoot(doc);
  return root ? blockText(root) : '';
}

/**
 * Article text from a full page. Readability first; the heuristic extractor
 * when Readability finds no article.
 */
export function extractMainText(html: string, url: string): string {
  try {
    const doc = new JSDOM(html, { url }).window.document;
    const article = new Readability(doc).parse();
    if (article?.content) {
      const text = htmlToText(article.content);
      if (text) return text;
    }
  } catch (err) {
    logger.debug({ url, error: errorMessage(err) }, 'Readability failed, using heuristic extraction');
  }
  return htmlToText(html);
}

export function truncateText(text: string, maxChars: number): string {
  return sliceCodeUnits(text, maxChars);
}

export interface ExtractOptions {
  maxChars: number;
  /** Feed-embedded text shorter than this triggers a page fetch. */
  minFeedChars: number;
}

async function fetchPageText(url: string, fetcher: HttpFetcher): Promise<string> {
  const outcome = await fetcher.get(url, { accept: HTML_ACCEPT });
  if (outcome.kind !== 'ok') return '';
  try {
    return extractMainText(outcome.body, url);
  } catch (err) {
    logger.debug({ url, error: errorMessage(err) }, 'Page extraction failed');
    return '';
  }
}

function feedText(entry: FeedEntry): string {
  if (!entry.content_html) return '';
  try {
    return htmlToText(entry.content_html);
  } catch (err) {
    logger.debug({ url: entry.url, error: errorMessage(err) }, 'Feed content extraction failed');
    return '';
  }
}

/**
 * Build an item draft from a feed entry. Never throws for content reasons:
 * a failed page fetch leaves whatever the feed itself carried, possibly empty.
 */
export async function extractEntry(
  entry: FeedEntry,
  sourceId: number,
  fetcher: HttpFetcher,
  options: ExtractOptions,
): Promise<ItemDraft> {
  let text = feedText(entry);

  if (text.length < options.minFeedChars) {
    const pageText = await fetchPageText(entry.url, fetcher);
    if (pageText.length > text.length) {
      text = pageText;
    }
  }

  return {
    source_id: sourceId,
    title: entry.title,
    url: entry.url,
    guid: entry.guid,
    published_at: entry.published_at,
    content_text: truncateText(text, options.maxChars),
  };
}
