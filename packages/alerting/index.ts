export type { AlertSeverity, AlertContext, AlertMessage, AlertMetadata, SlackConfig } from './types.js';

export { AlertingService } from './alerting-service.js';
export { SlackAlertClient } from './slack-client.js';
export { formatAlertForSlack } from './slack-formatter.js';
export type { FormattedSlackAlert, SlackAttachment, SlackField } from './slack-formatter.js';
export { createAlertingServiceFromEnv, getSlackConfigFromEnv } from './config.js';
