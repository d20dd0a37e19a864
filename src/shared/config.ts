import { z } from 'zod';
import { cosmiconfig } from 'cosmiconfig';
import fs from 'node:fs';
import path from 'node:path';
import { stringify as yamlStringify } from 'yaml';
import { resolvePath, getBriefwireDir } from './utils.js';
import { ConfigError } from './errors.js';
import { logger } from './logger.js';

export const ConfigSchema = z.object({
  llm: z
    .object({
      anthropic_api_key: z.string().default(''),
      anthropic_model: z.string().default('claude-haiku-4-5-20251001'),
      anthropic_base_url: z.string().default('https://api.anthropic.com'),
      openai_api_key: z.string().default(''),
      openai_model: z.string().default('gpt-4o-mini'),
      openai_base_url: z.string().default('https://api.openai.com/v1'),
      max_input_tokens: z.number().int().positive().default(2000),
      max_output_tokens: z.number().int().positive().default(500),
      timeout_ms: z.number().int().positive().default(60000),
      max_attempts: z.number().int().positive().default(3),
      backoff_base_ms: z.number().int().nonnegative().default(1000),
    })
    .default({}),

  ingest: z
    .object({
      max_chars_per_item: z.number().int().positive().default(8000),
      min_feed_content_chars: z.number().int().nonnegative().default(100),
      fetch_timeout_ms: z.number().int().positive().default(15000),
      user_agent: z.string().default('Briefwire/0.1 (+feed reader)'),
      max_attempts: z.number().int().positive().default(3),
      backoff_base_ms: z.number().int().nonnegative().default(1000),
      source_delay_ms: z.number().int().nonnegative().default(200),
    })
    .default({}),

  summarize: z
    .object({
      max_items_per_run: z.number().int().positive().default(25),
      item_delay_ms: z.number().int().nonnegative().default(500),
    })
    .default({}),

  db: z
    .object({
      path: z.string().default('~/.briefwire/briefwire.db'),
    })
    .default({}),

  sources_file: z.string().default('./feeds.yaml'),
});

export type Config = z.infer<typeof ConfigSchema>;

let cachedConfig: Config | null = null;

export function generateDefaultConfig(): Config {
  return ConfigSchema.parse({});
}

export function generateDefaultConfigYaml(): string {
  return yamlStringify(generateDefaultConfig());
}

export function writeDefaultConfig(configPath: string): void {
  const yaml = generateDefaultConfigYaml();
  fs.mkdirSync(path.dirname(configPath), { recursive: true });
  fs.writeFileSync(configPath, yaml, 'utf-8');
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return value !== null && typeof value === 'object' && !Array.isArray(value);
}

function section(raw: Record<string, unknown>, key: string): Record<string, unknown> {
  const existing = raw[key];
  const next = isRecord(existing) ? { ...existing } : {};
  raw[key] = next;
  return next;
}

function envInt(name: string): number | undefined {
  const value = process.env[name];
  if (value === undefined || value.trim() === '') return undefined;
  const parsed = Number(value);
  if (!Number.isInteger(parsed)) {
    throw new ConfigError(`${name} must be an integer, got "${value}"`);
  }
  return parsed;
}

/**
 * Overlay environment variables onto the raw file config. Credentials are
 * expected to come from the environment rather than the config file.
 */
export function applyEnvOverrides(rawConfig: Record<string, unknown>): Record<string, unknown> {
  const raw = { ...rawConfig };

  const llmEnv: Array<[string, string]> = [
    ['ANTHROPIC_API_KEY', 'anthropic_api_key'],
    ['ANTHROPIC_MODEL', 'anthropic_model'],
    ['OPENAI_API_KEY', 'openai_api_key'],
    ['OPENAI_MODEL', 'openai_model'],
  ];
  for (const [envName, key] of llmEnv) {
    const value = process.env[envName];
    if (value) section(raw, 'llm')[key] = value;
  }

  const maxItems = envInt('MAX_NEW_ITEMS_PER_RUN');
  if (maxItems !== undefined) section(raw, 'summarize')['max_items_per_run'] = maxItems;

  const maxChars = envInt('MAX_CHARS_PER_ITEM');
  if (maxChars !== undefined) section(raw, 'ingest')['max_chars_per_item'] = maxChars;

  const dbPath = process.env['BRIEFWIRE_DB'];
  if (dbPath) section(raw, 'db')['path'] = dbPath;

  const sourcesFile = process.env['BRIEFWIRE_SOURCES'];
  if (sourcesFile) raw['sources_file'] = sourcesFile;

  return raw;
}

export async function loadConfig(force = false): Promise<Config> {
  if (cachedConfig && !force) return cachedConfig;

  const explorer = cosmiconfig('briefwire', {
    searchPlaces: [
      'briefwire.config.yaml',
      'briefwire.config.yml',
      '.briefwirerc.yaml',
      '.briefwirerc.yml',
    ],
  });

  const envConfigPath = process.env['BRIEFWIRE_CONFIG'];
  const defaultConfigPath = path.join(getBriefwireDir(), 'config.yaml');

  let rawConfig: Record<string, unknown> = {};

  if (envConfigPath) {
    const resolved = resolvePath(envConfigPath);
    if (!fs.existsSync(resolved)) {
      throw new ConfigError(`Config file not found: ${resolved}`);
    }
    const result = await explorer.load(resolved);
    if (result && isRecord(result.config)) rawConfig = result.config;
  } else {
    const found = await explorer.search();
    if (found && isRecord(found.config)) {
      rawConfig = found.config;
      logger.debug({ path: found.filepath }, 'Config file found');
    } else if (fs.existsSync(defaultConfigPath)) {
      const result = await explorer.load(defaultConfigPath);
      if (result && isRecord(result.config)) rawConfig = result.config;
    } else {
      logger.debug('No config file found, using defaults');
    }
  }

  const parsed = ConfigSchema.safeParse(applyEnvOverrides(rawConfig));
  if (!parsed.success) {
    throw new ConfigError('Invalid configuration', {
      errors: parsed.error.flatten().fieldErrors,
    });
  }

  cachedConfig = parsed.data;
  return cachedConfig;
}

export function resetConfigCache(): void {
  cachedConfig = null;
}
