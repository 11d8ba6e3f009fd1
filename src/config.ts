export const IS_PRODUCTION = process.env.NODE_ENV === 'production';

export const {
  BAMBOO_HR_API_KEY,
  BAMBOO_HR_SUBDOMAIN,
  PAGERDUTY_API_KEY,
  JIRA_BASE_URL,
  JIRA_API_KEY,
  SLACK_TOKEN,
} = process.env;

/** Planner settings and team rosters. */
export const PLANNER_CONFIG_PATH = process.env.PLANNER_CONFIG_PATH || 'config/planner.json';

/** SQLite file that holds cached API responses. */
export const API_CACHE_DB_PATH = process.env.API_CACHE_DB_PATH || '.api_cache/api_cache.db';

export class ConfigurationError extends Error {
  constructor(
    message: string,
    public readonly missing: string[] = [],
  ) {
    super(message);
    this.name = 'ConfigurationError';
  }
}

/**
 * Validates that required environment variables are set.
 * BambooHR and PagerDuty are needed for every report; Jira and Slack only when requested.
 */
export function validateEnvironmentVariables({
  requireJira = true,
  requireSlack = false,
}: {
  requireJira?: boolean;
  requireSlack?: boolean;
} = {}): {
  valid: boolean;
  missing: string[];
} {
  const missing: string[] = [];

  if (!BAMBOO_HR_API_KEY) {
    missing.push('BAMBOO_HR_API_KEY');
  }
  if (!BAMBOO_HR_SUBDOMAIN) {
    missing.push('BAMBOO_HR_SUBDOMAIN');
  }
  if (!PAGERDUTY_API_KEY) {
    missing.push('PAGERDUTY_API_KEY');
  }

  if (requireJira) {
    if (!JIRA_BASE_URL) {
      missing.push('JIRA_BASE_URL');
    }
    if (!JIRA_API_KEY) {
      missing.push('JIRA_API_KEY');
    }
  }

  if (requireSlack && !SLACK_TOKEN) {
    missing.push('SLACK_TOKEN');
  }

  return {
    valid: missing.length === 0,
    missing,
  };
}
