/** Which external system a cached response came from. */
export enum ApiSource {
  BambooHr = 'bamboohr',
  PagerDuty = 'pagerduty',
  Jira = 'jira',
}

export interface ApiResponseCacheEntity {
  cache_key: string;
  source: ApiSource;
  /** Response body exactly as received. */
  payload: string;
  /** Epoch milliseconds. */
  fetched_at: number;
}
