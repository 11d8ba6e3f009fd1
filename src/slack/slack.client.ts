import { WebClient } from '@slack/web-api';
import { ConfigurationError, SLACK_TOKEN } from '../config.js';

let slackClient: WebClient | undefined;

/** Created on first use so reports that never touch Slack need no token. */
export function getSlackClient(): WebClient {
  if (!slackClient) {
    if (!SLACK_TOKEN) {
      throw new ConfigurationError('Environment variable SLACK_TOKEN is not set', ['SLACK_TOKEN']);
    }
    slackClient = new WebClient(SLACK_TOKEN);
  }
  return slackClient;
}
