import Database from 'better-sqlite3';
import fs from 'fs';
import { Logger } from '../logger.js';
import { getDatabasePath } from './getDatabasePath.js';
import { runMigrations } from './migration-runner.js';

const logger = new Logger('db');

/**
 * Opens (creating when needed) the SQLite file that backs the response cache and
 * brings its schema up to date. Pass ':memory:' for a throwaway database.
 */
export function openDatabase(dbPath: string = getDatabasePath()): Database.Database {
  if (dbPath !== ':memory:') {
    logger.debug(`Opening database at ${dbPath}`);
    if (!fs.existsSync(dbPath)) {
      logger.info(`Database file does not exist, creating ${dbPath}`);
    }
  }

  const db = new Database(dbPath);
  db.pragma('journal_mode = WAL');
  runMigrations(db);

  return db;
}
