import fs from 'fs';
import path from 'path';
import { API_CACHE_DB_PATH } from '../config.js';

/** Absolute path of the cache database; its directory is created if missing. */
export function getDatabasePath(configuredPath: string = API_CACHE_DB_PATH): string {
  const dbPath = path.resolve(process.cwd(), configuredPath);
  fs.mkdirSync(path.dirname(dbPath), { recursive: true });
  return dbPath;
}
