import type Database from 'better-sqlite3';
import { Logger } from '../logger.js';
import type { ApiResponseCacheEntity, ApiSource } from './entities.js';

const logger = new Logger('api-response-cache');

export interface ApiResponseCacheOptions {
  /** Responses older than this are refetched. */
  timeoutSeconds: number;
  /** Clock in epoch milliseconds. */
  now?: () => number;
}

/**
 * Raw API responses stored in SQLite with a time-based expiry.
 * Built once per run and handed to each data source.
 */
export class ApiResponseCache {
  private readonly timeoutMs: number;
  private readonly now: () => number;

  constructor(
    private readonly db: Database.Database,
    options: ApiResponseCacheOptions,
  ) {
    this.timeoutMs = options.timeoutSeconds * 1000;
    this.now = options.now ?? Date.now;
  }

  /** Returns the cached payload when it is still fresh. */
  get(cacheKey: string): string | null {
    const entry = this.db
      .prepare<[string], ApiResponseCacheEntity>('SELECT * FROM api_response_cache WHERE cache_key = ?')
      .get(cacheKey);

    if (!entry) {
      return null;
    }
    if (this.now() - entry.fetched_at >= this.timeoutMs) {
      logger.debug('Cached response expired', { cacheKey });
      return null;
    }
    return entry.payload;
  }

  set(cacheKey: string, source: ApiSource, payload: string): void {
    this.db
      .prepare(
        `INSERT INTO api_response_cache (cache_key, source, payload, fetched_at) VALUES (?, ?, ?, ?)
         ON CONFLICT (cache_key) DO UPDATE SET
           source = EXCLUDED.source,
           payload = EXCLUDED.payload,
           fetched_at = EXCLUDED.fetched_at`,
      )
      .run(cacheKey, source, payload, this.now());
  }

  /**
   * Returns the fresh cached payload for `cacheKey`, or calls `fetch` and stores its result.
   */
  async getOrFetch(cacheKey: string, source: ApiSource, fetch: () => Promise<string>): Promise<string> {
    const cached = this.get(cacheKey);
    if (cached !== null) {
      logger.debug('Cache hit', { cacheKey });
      return cached;
    }

    logger.debug('Cache miss, fetching', { cacheKey });
    const payload = await fetch();
    this.set(cacheKey, source, payload);
    return payload;
  }

  /** Every stored entry, fresh or not, oldest first. */
  entries(source?: ApiSource): ApiResponseCacheEntity[] {
    if (source) {
      return this.db
        .prepare<
          [string],
          ApiResponseCacheEntity
        >('SELECT * FROM api_response_cache WHERE source = ? ORDER BY fetched_at, cache_key')
        .all(source);
    }
    return this.db
      .prepare<[], ApiResponseCacheEntity>('SELECT * FROM api_response_cache ORDER BY fetched_at, cache_key')
      .all();
  }

  /** Drops every cached response. Returns how many were removed. */
  invalidate(): number {
    const { changes } = this.db.prepare('DELETE FROM api_response_cache').run();
    logger.info(`Cleared ${changes} cached API responses`);
    return changes;
  }
}
