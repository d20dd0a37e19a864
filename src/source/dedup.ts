import { sha256 } from '../shared/utils.js';

/**
 * Dedup key for an item: SHA-256 hex of its URL, exactly as ingested.
 * No normalization, so the key depends on the URL string alone.
 */
export function urlFingerprint(url: string): string {
  return sha256(url);
}
