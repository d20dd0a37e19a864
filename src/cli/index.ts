#!/usr/bin/env node

import { Command } from 'commander';
import fs from 'node:fs';
import path from 'node:path';
import type Database from 'better-sqlite3';
import { loadConfig, writeDefaultConfig, type Config } from '../shared/config.js';
import { getBriefwireDir, getPackageRoot, resolvePath } from '../shared/utils.js';
import { loadSourceList } from '../shared/sourceList.js';
import { BriefwireError, errorMessage } from '../shared/errors.js';
import { logger } from '../shared/logger.js';
import { initDb, closeDb } from '../db/db.js';
import { runMigrations } from '../db/migrate.js';
import {
  listSources,
  getSourceByUrl,
  activateSource,
  getSourceItemCounts,
  countItemsByStatus,
  listRecentSummaries,
} from '../source/sourceDb.js';
import { runIngest, type IngestStats } from '../source/ingest.js';
import { LlmClient } from '../llm/client.js';
import { runSummarize, type SummarizeStats } from '../engine/summarize.js';

const program = new Command();

program
  .name('briefwire')
  .description('Ingest feeds and summarize new items with an LLM')
  .version('0.1.0');

// === init ===
program
  .command('init')
  .description('Create config, database, and an example source list')
  .action(async () => {
    await fatalOnError(async () => {
      const configPath = path.join(getBriefwireDir(), 'config.yaml');

      if (!fs.existsSync(configPath)) {
        writeDefaultConfig(configPath);
        log(`✓ ${configPath} created`);
      } else {
        log(`✓ ${configPath} already exists`);
      }

      const config = await loadConfig();
      const dbPath = resolvePath(config.db.path);
      const db = initDb(dbPath);
      const { applied } = runMigrations(db);
      log(
        applied.length > 0
          ? `✓ ${dbPath} created (${applied.length} migrations applied)`
          : `✓ ${dbPath} already up to date`,
      );
      closeDb();

      const sourcesPath = resolvePath(config.sources_file);
      const example = path.join(getPackageRoot(), 'feeds.example.yaml');
      if (!fs.existsSync(sourcesPath) && fs.existsSync(example)) {
        fs.copyFileSync(example, sourcesPath);
        log(`✓ ${sourcesPath} created from example`);
      }
    });
  });

// === doctor ===
program
  .command('doctor')
  .description('Check config, database, source list, and LLM credentials')
  .action(async () => {
    const results: string[] = [];

    try {
      const config = await loadConfig();
      results.push('Config: ok');

      const dbPath = resolvePath(config.db.path);
      if (!fs.existsSync(dbPath)) {
        results.push('DB: missing (run briefwire init)');
      } else {
        try {
          const db = initDb(dbPath);
          runMigrations(db);
          const counts = countItemsByStatus(db);
          results.push(`DB: ok (${counts.new} pending, ${counts.summarized} summarized)`);
          closeDb();
        } catch (err) {
          results.push(`DB: error (${errorMessage(err)})`);
        }
      }

      try {
        const sources = loadSourceList(resolvePath(config.sources_file));
        results.push(`Sources: ${sources.length} listed`);
      } catch (err) {
        results.push(`Sources: error (${errorMessage(err)})`);
      }

      if (config.llm.anthropic_api_key) {
        results.push(`LLM: anthropic (${config.llm.anthropic_model})`);
      } else if (config.llm.openai_api_key) {
        results.push(`LLM: openai (${config.llm.openai_model})`);
      } else {
        results.push('LLM: (unconfigured)');
      }
    } catch (err) {
      results.push(`Config: error (${errorMessage(err)})`);
      process.exitCode = 1;
    }

    log(results.join(' | '));
  });

// === fetch ===
program
  .command('fetch')
  .description('Upsert listed sources and ingest new items')
  .action(async () => {
    await fatalOnError(async () => {
      const { db, config, cleanup } = await getDb();
      try {
        const stats = await ingestStage(db, config);
        printIngestStats(stats);
      } finally {
        cleanup();
      }
    });
  });

// === summarize ===
program
  .command('summarize')
  .description('Summarize pending items (bounded by the per-run cap)')
  .option('-l, --limit <n>', 'Summarize at most n items this run')
  .action(async (opts: { limit?: string }) => {
    await fatalOnError(async () => {
      const { db, config, cleanup } = await getDb();
      try {
        const stats = await summarizeStage(db, config, parseLimit(opts.limit));
        printSummarizeStats(stats);
      } finally {
        cleanup();
      }
    });
  });

// === run ===
program
  .command('run')
  .description('Fetch, then summarize')
  .option('-l, --limit <n>', 'Summarize at most n items this run')
  .action(async (opts: { limit?: string }) => {
    await fatalOnError(async () => {
      const { db, config, cleanup } = await getDb();
      try {
        printIngestStats(await ingestStage(db, config));
        printSummarizeStats(await summarizeStage(db, config, parseLimit(opts.limit)));
      } finally {
        cleanup();
      }
    });
  });

// === sources ===
program
  .command('sources')
  .description('List known sources with item counts')
  .action(async () => {
    await fatalOnError(async () => {
      const { db, cleanup } = await getDb();
      try {
        const counts = new Map(getSourceItemCounts(db).map((c) => [c.source_id, c.count]));
        const sources = listSources(db);
        if (sources.length === 0) {
          log('No sources yet. Run briefwire fetch.');
          return;
        }
        for (const s of sources) {
          const state = s.active ? 'active  ' : 'inactive';
          log(`  [${state}] ${s.name} (${s.type}) ${s.source_url}`);
          log(`             feed: ${s.feed_url ?? '(unresolved)'}  items: ${counts.get(s.id) ?? 0}`);
        }
      } finally {
        cleanup();
      }
    });
  });

// === source activate ===
const sourceCmd = program.command('source').description('Manage a single source');

sourceCmd
  .command('activate <url>')
  .description('Reactivate a source deactivated after a failed resolution')
  .action(async (url: string) => {
    await fatalOnError(async () => {
      const { db, cleanup } = await getDb();
      try {
        const source = getSourceByUrl(db, url);
        if (!source) {
          log(`Source not found: ${url}`);
          process.exitCode = 1;
          return;
        }
        activateSource(db, source.id);
        log(`✓ ${source.name} reactivated`);
      } finally {
        cleanup();
      }
    });
  });

// === recent ===
program
  .command('recent')
  .description('Print recent summaries as JSON')
  .option('-n, --number <n>', 'How many', '10')
  .action(async (opts: { number: string }) => {
    await fatalOnError(async () => {
      const { db, cleanup } = await getDb();
      try {
        const limit = parseLimit(opts.number) ?? 10;
        log(JSON.stringify(listRecentSummaries(db, limit), null, 2));
      } finally {
        cleanup();
      }
    });
  });

// === Stages ===
async function ingestStage(db: Database.Database, config: Config): Promise<IngestStats> {
  const descriptors = loadSourceList(resolvePath(config.sources_file));
  log(`Ingesting ${descriptors.length} listed sources...`);
  return runIngest(db, config, descriptors);
}

async function summarizeStage(
  db: Database.Database,
  config: Config,
  limit: number | undefined,
): Promise<SummarizeStats> {
  // Fails with ConfigError when no credentials are set.
  const client = LlmClient.fromConfig(config.llm);
  log(`Summarizing with ${client.provider.name} (${client.model})...`);
  return runSummarize(db, client, config, { maxItems: limit });
}

function printIngestStats(stats: IngestStats): void {
  log(`\nIngest complete:`);
  log(`  Sources processed:   ${stats.sourcesProcessed}`);
  log(`  Sources unchanged:   ${stats.sourcesUnchanged}`);
  log(`  Sources failed:      ${stats.sourcesFailed}`);
  log(`  Sources deactivated: ${stats.sourcesDeactivated}`);
  log(`  Items fetched:       ${stats.itemsFetched}`);
  log(`  Items new:           ${stats.itemsNew}`);
  log(`  Items duplicate:     ${stats.itemsDuplicate}`);
  log(`  Duration:            ${stats.durationMs}ms`);

  if (stats.errors.length > 0) {
    log('\nErrors:');
    for (const e of stats.errors) log(`  ${e.source}: ${e.error}`);
  }
}

function printSummarizeStats(stats: SummarizeStats): void {
  log(`\nSummarize complete:`);
  log(`  Selected:  ${stats.selected}`);
  log(`  Succeeded: ${stats.succeeded}`);
  log(`  Failed:    ${stats.failed}`);
  log(`  Duration:  ${stats.durationMs}ms`);

  if (stats.errors.length > 0) {
    log('\nErrors:');
    for (const e of stats.errors) log(`  item ${e.itemId}: ${e.error}`);
  }
}

// === Helpers ===
function parseLimit(value: string | undefined): number | undefined {
  if (value === undefined) return undefined;
  const n = parseInt(value, 10);
  if (!Number.isInteger(n) || n < 0) {
    throw new BriefwireError(`Invalid number: ${value}`, 'INVALID_ARGUMENT');
  }
  return n;
}

async function getDb(): Promise<{
  db: Database.Database;
  config: Config;
  cleanup: () => void;
}> {
  const config = await loadConfig();
  const db = initDb(resolvePath(config.db.path));
  runMigrations(db);
  return { db, config, cleanup: closeDb };
}

/** Stage-level errors end the process with exit code 1. */
async function fatalOnError(action: () => Promise<void>): Promise<void> {
  try {
    await action();
  } catch (err) {
    const code = err instanceof BriefwireError ? err.code : 'UNEXPECTED';
    logger.error({ code, error: errorMessage(err) }, 'Command failed');
    log(`✗ ${errorMessage(err)}`);
    process.exitCode = 1;
  }
}

function log(msg: string): void {
  // eslint-disable-next-line no-console
  console.log(msg);
}

await program.parseAsync();
