import { z } from 'zod';
import fs from 'node:fs';
import { parse as yamlParse } from 'yaml';
import { ConfigError } from './errors.js';

export const SOURCE_TYPES = ['youtube', 'substack', 'medium', 'site', 'rss'] as const;

export type SourceType = (typeof SOURCE_TYPES)[number];

export const SourceDescriptorSchema = z.object({
  name: z.string().min(1),
  url: z.string().url(),
  type: z.enum(SOURCE_TYPES).default('site'),
  feed_url: z.string().url().optional(),
  channel_id: z.string().min(1).optional(),
});

export type SourceDescriptor = z.infer<typeof SourceDescriptorSchema>;

const YOUTUBE_FEED = 'https://www.youtube.com/feeds/videos.xml?channel_id=';

/**
 * Feed location the descriptor states outright, if any. An explicit feed_url
 * wins over a channel id.
 */
export function explicitFeedUrl(
  descriptor: Pick<SourceDescriptor, 'type' | 'feed_url' | 'channel_id'>,
): string | null {
  if (descriptor.feed_url) return descriptor.feed_url;
  if (descriptor.type === 'youtube' && descriptor.channel_id) {
    return YOUTUBE_FEED + encodeURIComponent(descriptor.channel_id);
  }
  return null;
}

export const SourceListSchema = z.object({
  sources: z.array(SourceDescriptorSchema).default([]),
});

export function parseSourceList(yamlText: string, origin = 'source list'): SourceDescriptor[] {
  let raw: unknown;
  try {
    raw = yamlParse(yamlText);
  } catch (err) {
    throw new ConfigError(`Invalid YAML in ${origin}`, {
      cause: err instanceof Error ? err.message : String(err),
    });
  }

  const parsed = SourceListSchema.safeParse(raw ?? {});
  if (!parsed.success) {
    throw new ConfigError(`Invalid ${origin}`, {
      errors: parsed.error.issues.map((i) => `${i.path.join('.')}: ${i.message}`),
    });
  }
  return parsed.data.sources;
}

/**
 * Load the declarative source list (YAML, `sources:` array). Order is kept;
 * the ingest stage processes sources in file order.
 */
export function loadSourceList(filePath: string): SourceDescriptor[] {
  if (!fs.existsSync(filePath)) {
    throw new ConfigError(`Source list not found: ${filePath}`, { path: filePath });
  }
  return parseSourceList(fs.readFileSync(filePath, 'utf-8'), filePath);
}
