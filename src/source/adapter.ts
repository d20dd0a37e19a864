import type { SourceType } from '../shared/sourceList.js';

/**
 * Database row shape for the sources table.
 */
export interface Source {
  id: number;
  name: string;
  source_url: string;
  feed_url: string | null;
  /** 1 when feed_url came from the source list, 0 when discovered. */
  feed_explicit: number;
  type: SourceType;
  active: number;
  last_fetch_at: string | null;
  etag: string | null;
  last_modified: string | null;
}

export type ItemStatus = 'new' | 'summarized';

/**
 * Database row shape for the items table.
 */
export interface Item {
  id: number;
  source_id: number;
  title: string;
  url: string;
  guid: string | null;
  published_at: string | null;
  fetched_at: string;
  content_text: string | null;
  url_hash: string;
  status: ItemStatus;
  summary_json: string | null;
  model_used: string | null;
}

export interface CacheValidators {
  etag: string | null;
  lastModified: string | null;
}

/**
 * One entry of a parsed RSS/Atom feed, before extraction.
 */
export interface FeedEntry {
  guid: string | null;
  title: string;
  url: string;
  published_at: string | null;
  content_html: string | null;
}

/**
 * Normalized item ready for insertion.
 */
export interface ItemDraft {
  source_id: number;
  title: string;
  url: string;
  guid: string | null;
  published_at: string | null;
  content_text: string;
}
