import fs from 'node:fs';
import path from 'node:path';
import type Database from 'better-sqlite3';
import { DbError, errorMessage } from '../shared/errors.js';
import { logger } from '../shared/logger.js';
import { getPackageRoot } from '../shared/utils.js';

/** `NNN_description.sql`, applied in numeric order. */
const MIGRATION_FILE = /^(\d{3})_[\w-]+\.sql$/;

export interface Migration {
  name: string;
  sql: string;
}

export interface MigrationReport {
  applied: string[];
  skipped: string[];
}

export function defaultMigrationsDir(): string {
  return path.join(getPackageRoot(), 'src', 'db', 'migrations');
}

/**
 * Read every migration file in `dir`, ordered by number. A `.sql` file that
 * does not follow the naming scheme is an error rather than silently ignored.
 */
export function loadMigrations(dir: string): Migration[] {
  if (!fs.existsSync(dir)) {
    throw new DbError(`Migrations directory not found: ${dir}`, { dir });
  }

  const names = fs.readdirSync(dir).filter((f) => f.endsWith('.sql'));
  const misnamed = names.filter((f) => !MIGRATION_FILE.test(f));
  if (misnamed.length > 0) {
    throw new DbError(`Unrecognized migration file(s): ${misnamed.join(', ')}`, { dir });
  }

  return names
    .sort()
    .map((name) => ({ name, sql: fs.readFileSync(path.join(dir, name), 'utf-8') }));
}

function appliedNames(db: Database.Database): Set<string> {
  db.exec(`
    CREATE TABLE IF NOT EXISTS _migrations (
      name       TEXT PRIMARY KEY,
      applied_at TEXT NOT NULL DEFAULT (datetime('now'))
    );
  `);
  const rows = db.prepare('SELECT name FROM _migrations ORDER BY name').all() as Array<{
    name: string;
  }>;
  return new Set(rows.map((r) => r.name));
}

/**
 * Bring the schema up to date. Each migration runs in its own transaction
 * together with its bookkeeping row, so a failed file leaves nothing behind.
 */
export function runMigrations(
  db: Database.Database,
  dir: string = defaultMigrationsDir(),
): MigrationReport {
  const done = appliedNames(db);
  const report: MigrationReport = { applied: [], skipped: [...done] };
  const record = db.prepare('INSERT INTO _migrations (name) VALUES (?)');

  for (const migration of loadMigrations(dir)) {
    if (done.has(migration.name)) continue;

    const apply = db.transaction(() => {
      db.exec(migration.sql);
      record.run(migration.name);
    });

    try {
      apply();
    } catch (err) {
      throw new DbError(`Migration failed: ${migration.name}`, {
        migration: migration.name,
        cause: errorMessage(err),
      });
    }
    report.applied.push(migration.name);
    logger.info({ migration: migration.name }, 'Migration applied');
  }

  return report;
}
