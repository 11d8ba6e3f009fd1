import { DateTime } from 'luxon';
import { ApiSource, type ApiResponseCacheEntity } from '../database/entities.js';

const SOURCE_TITLES: Record<ApiSource, string> = {
  [ApiSource.BambooHr]: 'BAMBOOHR',
  [ApiSource.PagerDuty]: 'PAGERDUTY',
  [ApiSource.Jira]: 'JIRA',
};

/** Raw cached responses grouped by source, each under its cache key and fetch time. */
export function renderCacheDump(entries: readonly ApiResponseCacheEntity[]): string {
  const sections = Object.values(ApiSource).map((source) => {
    const forSource = entries.filter((entry) => entry.source === source);
    let output = `==== RAW ${SOURCE_TITLES[source]} API RESPONSES ====\n`;
    if (forSource.length === 0) {
      return `${output}No cached ${source} responses found.\n`;
    }
    for (const entry of forSource) {
      const fetchedAt = DateTime.fromMillis(entry.fetched_at, { zone: 'utc' }).toISO() ?? String(entry.fetched_at);
      output += `-- ${entry.cache_key} (fetched ${fetchedAt}) --\n${entry.payload}\n`;
    }
    return output;
  });
  return sections.join('\n');
}
