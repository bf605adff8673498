import { getLogger } from '@tube-to-pod/logging';
import type { SlackConfig } from './types.js';
import { AlertingService } from './alerting-service.js';

const log = getLogger('alerting');

const REQUIRED_ENV_VARS = ['SLACK_BOT_TOKEN', 'SLACK_CHANNEL_ID'] as const;

/**
 * Slack configuration from the environment, or null when alerting is not set up.
 * A half-configured environment is warned about rather than ignored.
 */
export function getSlackConfigFromEnv(env: NodeJS.ProcessEnv = process.env): SlackConfig | null {
  const botToken = env.SLACK_BOT_TOKEN?.trim();
  const channelId = env.SLACK_CHANNEL_ID?.trim();

  if (botToken && channelId) {
    return { botToken, channelId };
  }

  const missing = REQUIRED_ENV_VARS.filter(name => !env[name]?.trim());
  if (missing.length < REQUIRED_ENV_VARS.length) {
    log.warn(`Slack configuration incomplete, alerting disabled. Missing: ${missing.join(', ')}`);
  } else {
    log.warn('Slack alerting disabled (SLACK_BOT_TOKEN and SLACK_CHANNEL_ID are not set).');
  }
  return null;
}

/** A disabled service when Slack is not configured */
export function createAlertingServiceFromEnv(source?: string, env: NodeJS.ProcessEnv = process.env): AlertingService {
  return new AlertingService(getSlackConfigFromEnv(env) ?? undefined, source);
}
