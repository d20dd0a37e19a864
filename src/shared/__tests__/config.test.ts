import { describe, it, expect, afterEach } from 'vitest';
import {
  ConfigSchema,
  applyEnvOverrides,
  generateDefaultConfig,
  generateDefaultConfigYaml,
} from '../config.js';
import { ConfigError } from '../errors.js';

const ENV_KEYS = [
  'ANTHROPIC_API_KEY',
  'ANTHROPIC_MODEL',
  'OPENAI_API_KEY',
  'OPENAI_MODEL',
  'MAX_NEW_ITEMS_PER_RUN',
  'MAX_CHARS_PER_ITEM',
  'BRIEFWIRE_DB',
  'BRIEFWIRE_SOURCES',
];
const savedEnv = Object.fromEntries(ENV_KEYS.map((k) => [k, process.env[k]]));

afterEach(() => {
  for (const key of ENV_KEYS) {
    const value = savedEnv[key];
    if (value === undefined) delete process.env[key];
    else process.env[key] = value;
  }
});

describe('ConfigSchema', () => {
  it('produces valid defaults from empty object', () => {
    const result = ConfigSchema.safeParse({});
    expect(result.success).toBe(true);
    if (result.success) {
      expect(result.data.llm.anthropic_model).toBe('claude-haiku-4-5-20251001');
      expect(result.data.llm.openai_model).toBe('gpt-4o-mini');
      expect(result.data.llm.max_input_tokens).toBe(2000);
      expect(result.data.llm.max_output_tokens).toBe(500);
      expect(result.data.summarize.max_items_per_run).toBe(25);
      expect(result.data.ingest.min_feed_content_chars).toBe(100);
      expect(result.data.db.path).toBe('~/.briefwire/briefwire.db');
      expect(result.data.sources_file).toBe('./feeds.yaml');
    }
  });

  it('keeps defaults beside partial overrides', () => {
    const config = ConfigSchema.parse({ ingest: { max_chars_per_item: 4000 } });
    expect(config.ingest.max_chars_per_item).toBe(4000);
    expect(config.ingest.max_attempts).toBe(3);
  });

  it('rejects a non-positive item cap', () => {
    expect(ConfigSchema.safeParse({ summarize: { max_items_per_run: 0 } }).success).toBe(false);
  });
});

describe('applyEnvOverrides', () => {
  it('maps credentials, models and caps from the environment', () => {
    process.env['ANTHROPIC_API_KEY'] = 'test-secret';
    process.env['OPENAI_MODEL'] = 'gpt-test';
    process.env['MAX_NEW_ITEMS_PER_RUN'] = '5';
    process.env['MAX_CHARS_PER_ITEM'] = '1200';
    process.env['BRIEFWIRE_SOURCES'] = '/tmp/feeds.yaml';

    const config = ConfigSchema.parse(applyEnvOverrides({ llm: { timeout_ms: 1000 } }));

    expect(config.llm.anthropic_api_key).toBe('test-secret');
    expect(config.llm.openai_model).toBe('gpt-test');
    expect(config.llm.timeout_ms).toBe(1000);
    expect(config.summarize.max_items_per_run).toBe(5);
    expect(config.ingest.max_chars_per_item).toBe(1200);
    expect(config.sources_file).toBe('/tmp/feeds.yaml');
  });

  it('does not mutate the raw config', () => {
    process.env['BRIEFWIRE_DB'] = ':memory:';
    const raw = { db: { path: 'a.db' } };
    applyEnvOverrides(raw);
    expect(raw.db.path).toBe('a.db');
  });

  it('rejects a non-integer cap', () => {
    process.env['MAX_NEW_ITEMS_PER_RUN'] = 'lots';
    expect(() => applyEnvOverrides({})).toThrow(ConfigError);
  });
});

describe('generateDefaultConfigYaml', () => {
  it('returns the defaults as YAML', () => {
    const yaml = generateDefaultConfigYaml();
    expect(yaml).toContain('max_items_per_run: 25');
    expect(yaml).toContain('sources_file: ./feeds.yaml');
  });

  it('matches generateDefaultConfig', () => {
    expect(generateDefaultConfig().llm.max_attempts).toBe(3);
  });
});
