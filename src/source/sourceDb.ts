import type Database from 'better-sqlite3';
import type { Source, Item, ItemDraft, ItemStatus, CacheValidators } from './adapter.js';
import { explicitFeedUrl, type SourceDescriptor } from '../shared/sourceList.js';
import { urlFingerprint } from './dedup.js';
import { nowISO } from '../shared/utils.js';
import { DbError, InvariantError } from '../shared/errors.js';

// ================================================================
// Sources
// ================================================================

export function getSource(db: Database.Database, id: number): Source | undefined {
  return db.prepare('SELECT * FROM sources WHERE id = ?').get(id) as Source | undefined;
}

export function getSourceByUrl(db: Database.Database, sourceUrl: string): Source | undefined {
  return db.prepare('SELECT * FROM sources WHERE source_url = ?').get(sourceUrl) as
    | Source
    | undefined;
}

export function listSources(
  db: Database.Database,
  opts: { activeOnly?: boolean } = {},
): Source[] {
  const where = opts.activeOnly ? 'WHERE active = 1' : '';
  return db.prepare(`SELECT * FROM sources ${where} ORDER BY id`).all() as Source[];
}

/**
 * Create or update the source keyed by its canonical URL. Cache validators,
 * fetch time and the active flag survive an unchanged descriptor. A changed
 * type, or an explicit feed location that was added, changed or removed,
 * counts as a manual correction: the stored feed location is replaced (or
 * cleared for re-resolution), the fetch state is dropped so the new location
 * is validated on the next fetch, and the source is reactivated.
 */
export function upsertSource(db: Database.Database, descriptor: SourceDescriptor): Source {
  const explicit = explicitFeedUrl(descriptor);

  const run = db.transaction((): number => {
    const existing = getSourceByUrl(db, descriptor.url);

    if (!existing) {
      const result = db
        .prepare(
          `INSERT INTO sources (name, source_url, feed_url, feed_explicit, type, active)
           VALUES (?, ?, ?, ?, ?, 1)`,
        )
        .run(descriptor.name, descriptor.url, explicit, explicit ? 1 : 0, descriptor.type);
      return Number(result.lastInsertRowid);
    }

    const storedExplicit = existing.feed_explicit ? existing.feed_url : null;
    const corrected = existing.type !== descriptor.type || storedExplicit !== explicit;

    if (corrected) {
      db.prepare(
        `UPDATE sources
         SET name = ?, type = ?, feed_url = ?, feed_explicit = ?, active = 1,
             etag = NULL, last_modified = NULL, last_fetch_at = NULL
         WHERE id = ?`,
      ).run(descriptor.name, descriptor.type, explicit, explicit ? 1 : 0, existing.id);
    } else {
      db.prepare('UPDATE sources SET name = ? WHERE id = ?').run(descriptor.name, existing.id);
    }
    return existing.id;
  });

  try {
    const id = run();
    const source = getSource(db, id);
    if (!source) throw new DbError(`Source ${id} vanished after upsert`);
    return source;
  } catch (err) {
    if (err instanceof DbError) throw err;
    throw new DbError(`Failed to upsert source: ${err instanceof Error ? err.message : String(err)}`, {
      url: descriptor.url,
    });
  }
}

export function setFeedUrl(db: Database.Database, id: number, feedUrl: string): void {
  db.prepare('UPDATE sources SET feed_url = ? WHERE id = ?').run(feedUrl, id);
}

export function deactivateSource(db: Database.Database, id: number): void {
  db.prepare('UPDATE sources SET active = 0 WHERE id = ?').run(id);
}

export function activateSource(db: Database.Database, id: number): boolean {
  const result = db.prepare('UPDATE sources SET active = 1 WHERE id = ?').run(id);
  return result.changes > 0;
}

/**
 * Persist the validators from a successful (200) fetch. A 304 never reaches
 * here, so an unchanged feed keeps its validators and last_fetch_at.
 */
export function recordFetch(
  db: Database.Database,
  id: number,
  validators: CacheValidators,
  fetchedAt: string = nowISO(),
): void {
  db.prepare(
    'UPDATE sources SET etag = ?, last_modified = ?, last_fetch_at = ? WHERE id = ?',
  ).run(validators.etag, validators.lastModified, fetchedAt, id);
}

// ================================================================
// Items
// ================================================================

export type InsertItemResult =
  | { status: 'inserted'; id: number }
  | { status: 'already_present' };

export function fingerprintExists(db: Database.Database, urlHash: string): boolean {
  return db.prepare('SELECT 1 FROM items WHERE url_hash = ?').get(urlHash) !== undefined;
}

/**
 * Insert a new item in `new` state. An existing fingerprint makes this a
 * successful no-op.
 */
export function insertItem(
  db: Database.Database,
  draft: ItemDraft,
  fetchedAt: string = nowISO(),
): InsertItemResult {
  try {
    const result = db
      .prepare(
        `INSERT OR IGNORE INTO items
         (source_id, title, url, guid, published_at, fetched_at, content_text, url_hash, status)
         VALUES (?, ?, ?, ?, ?, ?, ?, ?, 'new')`,
      )
      .run(
        draft.source_id,
        draft.title,
        draft.url,
        draft.guid,
        draft.published_at,
        fetchedAt,
        draft.content_text,
        urlFingerprint(draft.url),
      );

    if (result.changes === 0) return { status: 'already_present' };
    return { status: 'inserted', id: Number(result.lastInsertRowid) };
  } catch (err) {
    throw new DbError(`Failed to insert item: ${err instanceof Error ? err.message : String(err)}`, {
      source_id: draft.source_id,
    });
  }
}

export function getItem(db: Database.Database, id: number): Item | undefined {
  return db.prepare('SELECT * FROM items WHERE id = ?').get(id) as Item | undefined;
}

export function getItemsBySource(db: Database.Database, sourceId: number): Item[] {
  return db
    .prepare('SELECT * FROM items WHERE source_id = ? ORDER BY id')
    .all(sourceId) as Item[];
}

export interface PendingItem {
  id: number;
  title: string;
  url: string;
  content_text: string | null;
}

/**
 * Up to `limit` items still in `new` state, most recently published first.
 */
export function selectPending(db: Database.Database, limit: number): PendingItem[] {
  if (limit <= 0) return [];
  return db
    .prepare(
      `SELECT id, title, url, content_text FROM items
       WHERE status = 'new'
       ORDER BY published_at IS NULL, published_at DESC, id
       LIMIT ?`,
    )
    .all(limit) as PendingItem[];
}

/**
 * The one transition an item makes: new -> summarized. Anything else is a
 * bug in the caller and raises InvariantError.
 */
export function markSummarized(
  db: Database.Database,
  id: number,
  payload: unknown,
  modelUsed: string,
): void {
  const result = db
    .prepare(
      `UPDATE items SET status = 'summarized', summary_json = ?, model_used = ?
       WHERE id = ? AND status = 'new'`,
    )
    .run(JSON.stringify(payload), modelUsed, id);

  if (result.changes === 1) return;

  const current = db.prepare('SELECT status FROM items WHERE id = ?').get(id) as
    | { status: ItemStatus }
    | undefined;
  if (!current) {
    throw new InvariantError(`Cannot summarize item ${id}: no such item`, { itemId: id });
  }
  throw new InvariantError(`Item ${id} is already ${current.status}`, {
    itemId: id,
    status: current.status,
  });
}

export function countItemsByStatus(db: Database.Database): Record<ItemStatus, number> {
  const rows = db
    .prepare('SELECT status, COUNT(*) AS count FROM items GROUP BY status')
    .all() as Array<{ status: ItemStatus; count: number }>;
  const counts: Record<ItemStatus, number> = { new: 0, summarized: 0 };
  for (const row of rows) counts[row.status] = row.count;
  return counts;
}

export function getSourceItemCounts(
  db: Database.Database,
): Array<{ source_id: number; count: number }> {
  return db
    .prepare('SELECT source_id, COUNT(*) AS count FROM items GROUP BY source_id')
    .all() as Array<{ source_id: number; count: number }>;
}

// ================================================================
// Downstream read
// ================================================================

export interface SummarizedItem {
  id: number;
  title: string;
  url: string;
  source_name: string;
  published_at: string | null;
  model_used: string | null;
  summary: unknown;
}

/**
 * Most recent summarized items, newest published first. This is the view a
 * renderer reads.
 */
export function listRecentSummaries(db: Database.Database, limit: number): SummarizedItem[] {
  const rows = db
    .prepare(
      `SELECT i.id, i.title, i.url, s.name AS source_name, i.published_at,
              i.model_used, i.summary_json
       FROM items i JOIN sources s ON i.source_id = s.id
       WHERE i.status = 'summarized'
       ORDER BY i.published_at DESC
       LIMIT ?`,
    )
    .all(limit) as Array<Omit<SummarizedItem, 'summary'> & { summary_json: string }>;

  return rows.map(({ summary_json, ...rest }) => ({
    ...rest,
    summary: JSON.parse(summary_json),
  }));
}
