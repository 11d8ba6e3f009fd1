/**
 * Applies the SQL files under `migrations/` in name order, once each.
 * Works with any better-sqlite3 instance, including in-memory test databases.
 */

import fs from 'fs';
import path from 'path';
import type Database from 'better-sqlite3';
import { Logger } from '../logger.js';

const logger = new Logger('migration-runner');

/**
 * @param migrationsPath - directory of `.sql` files (defaults to `migrations` in cwd)
 * @returns names of the migrations applied by this call
 */
export function runMigrations(db: Database.Database, migrationsPath?: string): string[] {
  db.exec(`
    CREATE TABLE IF NOT EXISTS schema_migrations (
      version TEXT PRIMARY KEY,
      applied_at DATETIME DEFAULT CURRENT_TIMESTAMP
    )
  `);

  const migrationsDir = migrationsPath || path.join(process.cwd(), 'migrations');

  const migrationFiles = fs
    .readdirSync(migrationsDir)
    .filter((file) => file.endsWith('.sql'))
    .sort();

  const appliedMigrations = new Set(
    db
      .prepare<[], { version: string }>('SELECT version FROM schema_migrations')
      .all()
      .map((row) => row.version),
  );

  const applied: string[] = [];
  for (const file of migrationFiles) {
    const version = path.basename(file, '.sql');
    if (appliedMigrations.has(version)) {
      continue;
    }

    const sql = fs.readFileSync(path.join(migrationsDir, file), 'utf8');

    try {
      db.transaction(() => {
        db.exec(sql);
        db.prepare('INSERT INTO schema_migrations (version) VALUES (?)').run(version);
      })();
      applied.push(version);
      logger.debug(`Applied migration ${file}`);
    } catch (error) {
      logger.error(`Failed to apply migration ${file}:`, error);
      throw error;
    }
  }

  return applied;
}
