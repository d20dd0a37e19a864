import { JSDOM } from 'jsdom';
import {
  explicitFeedUrl,
  type SourceDescriptor,
  type SourceType,
} from '../shared/sourceList.js';
import type { CacheValidators, FeedEntry } from './adapter.js';
import { HTML_ACCEPT, type HttpFetcher } from './http.js';
import { parseFeed } from './rss.js';
import { errorMessage } from '../shared/errors.js';
import { logger } from '../shared/logger.js';

/** Tried in order when a site advertises no feed. */
export const CONVENTIONAL_FEED_PATHS = [
  '/feed',
  '/rss',
  '/rss.xml',
  '/atom.xml',
  '/feed.xml',
  '/index.xml',
  '/feed/feed.xml',
  '/feed/atom.xml',
  '/feed/index.xml',
] as const;

export type ResolveResult =
  | {
      kind: 'resolved';
      feedUrl: string;
      entries: FeedEntry[];
      validators: CacheValidators;
    }
  | { kind: 'unresolved'; reason: string }
  /** Every candidate failed for transient reasons; try again next run. */
  | { kind: 'unreachable'; reason: string };

interface CandidateFailure {
  reason: string;
  temporary: boolean;
}

type CandidateStrategy = (url: URL, fetcher: HttpFetcher) => Promise<string[]>;

function withoutTrailingSlash(url: URL): string {
  return url.href.replace(/[?#].*$/, '').replace(/\/+$/, '');
}

/**
 * Feed links a page advertises via <link rel="alternate" type="...rss|atom...">,
 * resolved against the page URL.
 */
export function findAlternateFeedLinks(html: string, pageUrl: string): string[] {
  const doc = new JSDOM(html).window.document;
  const links: string[] = [];

  for (const link of Array.from(doc.querySelectorAll('link[rel][href]'))) {
    const rel = (link.getAttribute('rel') ?? '').toLowerCase().split(/\s+/);
    const type = (link.getAttribute('type') ?? '').toLowerCase();
    const href = link.getAttribute('href');
    if (!href || !rel.includes('alternate')) continue;
    if (!type.includes('rss') && !type.includes('atom')) continue;

    try {
      const resolved = new URL(href, pageUrl).href;
      if (!links.includes(resolved)) links.push(resolved);
    } catch {
      // unusable href
    }
  }

  return links;
}

export function mediumFeedUrl(url: URL): string | null {
  const host = url.hostname.toLowerCase().replace(/^www\./, '');
  if (host === 'medium.com') {
    // medium.com/@user or medium.com/<publication>
    const segment = url.pathname.split('/').find((s) => s.length > 0);
    return segment ? `https://medium.com/feed/${segment}` : null;
  }
  // Publication on a custom domain: the first host label names the publication.
  const label = host.split('.')[0];
  return label ? `https://medium.com/feed/${label}` : null;
}

const siteCandidates: CandidateStrategy = async (url, fetcher) => {
  const candidates: string[] = [];

  const page = await fetcher.get(url.href, { accept: HTML_ACCEPT });
  if (page.kind === 'ok') {
    try {
      candidates.push(...findAlternateFeedLinks(page.body, url.href));
    } catch (err) {
      logger.debug({ url: url.href, error: errorMessage(err) }, 'Feed link discovery failed');
    }
  }

  const base = withoutTrailingSlash(url);
  for (const path of CONVENTIONAL_FEED_PATHS) {
    const guess = base + path;
    if (!candidates.includes(guess)) candidates.push(guess);
  }
  return candidates;
};

const STRATEGIES: Record<SourceType, CandidateStrategy> = {
  // Channel-id resolution is a separate one-time tool; without an explicit
  // feed location there is nothing to try.
  youtube: async () => [],
  substack: async (url) => [`${url.origin}/feed`],
  medium: async (url) => {
    const feed = mediumFeedUrl(url);
    return feed ? [feed] : [];
  },
  site: siteCandidates,
  rss: async (url) => [url.href],
};

/**
 * Candidate feed locations for a source, in the order they are tried. An
 * explicit feed location is authoritative and is the only candidate.
 */
export async function feedCandidates(
  descriptor: Pick<SourceDescriptor, 'url' | 'type' | 'feed_url' | 'channel_id'>,
  fetcher: HttpFetcher,
): Promise<string[]> {
  const explicit = explicitFeedUrl(descriptor);
  if (explicit) return [explicit];

  let url: URL;
  try {
    url = new URL(descriptor.url);
  } catch {
    return [];
  }
  return STRATEGIES[descriptor.type](url, fetcher);
}

async function validateCandidate(
  candidate: string,
  fetcher: HttpFetcher,
): Promise<ResolveResult | CandidateFailure> {
  const outcome = await fetcher.get(candidate);
  if (outcome.kind === 'not_modified') {
    return { reason: `${candidate}: unexpected 304`, temporary: false };
  }
  if (outcome.kind === 'failed') {
    return { reason: `${candidate}: ${outcome.error}`, temporary: outcome.retryable };
  }

  try {
    const entries = await parseFeed(outcome.body);
    if (entries.length === 0) return { reason: `${candidate}: no entries`, temporary: false };
    return { kind: 'resolved', feedUrl: candidate, entries, validators: outcome.validators };
  } catch (err) {
    return { reason: `${candidate}: ${errorMessage(err)}`, temporary: false };
  }
}

/**
 * Find the first candidate that fetches and parses with at least one entry.
 * The validating payload is returned so the caller can ingest it directly.
 * When every candidate failed only for transient reasons the result is
 * `unreachable`, not `unresolved`.
 */
export async function resolveFeed(
  descriptor: Pick<SourceDescriptor, 'url' | 'type' | 'feed_url' | 'channel_id'>,
  fetcher: HttpFetcher,
): Promise<ResolveResult> {
  const candidates = await feedCandidates(descriptor, fetcher);
  if (candidates.length === 0) {
    const reason =
      descriptor.type === 'youtube'
        ? 'youtube source needs an explicit feed_url or channel_id'
        : `no feed candidates for ${descriptor.type} source`;
    return { kind: 'unresolved', reason };
  }

  let lastFailure = '';
  let allTemporary = true;
  for (const candidate of candidates) {
    const result = await validateCandidate(candidate, fetcher);
    if ('kind' in result) {
      logger.debug({ url: descriptor.url, feed: candidate }, 'Feed resolved');
      return result;
    }
    lastFailure = result.reason;
    allTemporary &&= result.temporary;
    logger.debug({ url: descriptor.url, reason: result.reason }, 'Feed candidate rejected');
  }

  const reason = `none of ${candidates.length} candidate(s) validated (last: ${lastFailure})`;
  return { kind: allTemporary ? 'unreachable' : 'unresolved', reason };
}
