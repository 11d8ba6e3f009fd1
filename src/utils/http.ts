import { Logger } from '../logger.js';
import { type RetryOptions, retryWithExponentialBackoff } from './retry.js';

const logger = new Logger('http');

/** An external API call failed for good (after retries, or with a status that will not change). */
export class DataSourceError extends Error {
  constructor(
    public readonly source: string,
    message: string,
    public readonly status?: number,
  ) {
    super(`${source}: ${message}`);
    this.name = 'DataSourceError';
  }

  /** Server errors, throttling and network failures are worth another try. */
  get isTransient(): boolean {
    return this.status === undefined || this.status === 429 || this.status >= 500;
  }
}

export interface HttpRequest {
  /** Names the API in errors and logs. */
  source: string;
  url: string;
  init?: RequestInit;
  retry?: RetryOptions;
}

async function readErrorDetails(response: Response): Promise<string> {
  try {
    const text = await response.text();
    return text ? ` - ${text.slice(0, 200)}` : '';
  } catch (error) {
    logger.debug('Could not read error body', { error });
    return '';
  }
}

async function requestOnce({ source, url, init = {} }: HttpRequest): Promise<string> {
  let response: Response;
  try {
    response = await fetch(url, init);
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    throw new DataSourceError(source, `request to ${url} failed: ${reason}`);
  }

  if (!response.ok) {
    const details = await readErrorDetails(response);
    throw new DataSourceError(source, `${response.status} ${response.statusText}${details}`, response.status);
  }

  return response.text();
}

/**
 * GETs (or sends) a request and returns the raw body text. Transient failures are
 * retried with exponential backoff; anything else throws a DataSourceError.
 */
export async function requestText(request: HttpRequest): Promise<string> {
  return retryWithExponentialBackoff(() => requestOnce(request), {
    ...request.retry,
    shouldRetry: (error) => !(error instanceof DataSourceError) || error.isTransient,
    onRetry: (error, attempt, delayMs) => {
      logger.warn(`${request.source} request failed (attempt ${attempt}), retrying in ${delayMs}ms`, {
        error: error.message,
      });
    },
  });
}

/** Parses a cached or fetched body, reporting malformed JSON against its source. */
export function parseJsonBody(source: string, body: string): unknown {
  try {
    const parsed: unknown = JSON.parse(body);
    return parsed;
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    throw new DataSourceError(source, `response is not valid JSON: ${reason}`);
  }
}

/** Builds `base + path?query`, dropping undefined query values. */
export function buildUrl(base: string, path: string, query: Record<string, string | number | undefined> = {}): string {
  const url = new URL(path, base.endsWith('/') ? base : `${base}/`);
  for (const [key, value] of Object.entries(query)) {
    if (value !== undefined) {
      url.searchParams.set(key, String(value));
    }
  }
  return url.toString();
}
