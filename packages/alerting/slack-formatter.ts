import type { AlertMessage, AlertMetadata, AlertSeverity } from './types.js';

export interface SlackField {
  title: string;
  value: string;
  short: boolean;
}

export interface SlackAttachment {
  color: string;
  fields: SlackField[];
  footer?: string;
  ts: string;
}

export interface FormattedSlackAlert {
  text: string;
  attachments: SlackAttachment[];
}

function getSeverityEmoji(severity: AlertSeverity): string {
  switch (severity) {
    case 'info':
      return ':information_source:';
    case 'warning':
      return ':warning:';
    case 'error':
      return ':x:';
    case 'critical':
      return ':rotating_light:';
  }
}

/**
 * Get the appropriate color for the severity level (for Slack attachments)
 */
function getSeverityColor(severity: AlertSeverity): string {
  switch (severity) {
    case 'info':
      return '#36a64f'; // green
    case 'warning':
      return '#ff9500'; // orange
    case 'error':
      return '#ff0000'; // red
    case 'critical':
      return '#8b0000'; // dark red
  }
}

/** First few lines of the stack, or just the message */
function formatErrorStack(error: Error): string {
  if (!error.stack) {
    return error.message;
  }
  return error.stack.split('\n').slice(0, 5).join('\n');
}

function formatMetadata(metadata: AlertMetadata): string {
  return Object.entries(metadata)
    .map(([key, value]) => `• *${key}:* ${JSON.stringify(value)}`)
    .join('\n');
}

export function formatAlertForSlack(alert: AlertMessage): FormattedSlackAlert {
  let text = `${getSeverityEmoji(alert.severity)} *${alert.severity.toUpperCase()} Alert*`;
  if (alert.mentionHere || alert.severity === 'critical') {
    text += ' <!here>';
  }

  const fields: SlackField[] = [
    { title: 'Message', value: alert.message, short: false },
    { title: 'Source', value: alert.context.source, short: true },
    { title: 'Environment', value: alert.context.environment, short: true },
    { title: 'Timestamp', value: alert.context.timestamp.toISOString(), short: true },
  ];

  if (alert.context.host) {
    fields.push({ title: 'Host', value: alert.context.host, short: true });
  }

  if (alert.error) {
    fields.push({ title: 'Error Details', value: formatErrorStack(alert.error), short: false });
  }

  if (alert.context.metadata && Object.keys(alert.context.metadata).length > 0) {
    fields.push({ title: 'Additional Context', value: formatMetadata(alert.context.metadata), short: false });
  }

  return {
    text,
    attachments: [
      {
        color: getSeverityColor(alert.severity),
        fields,
        footer: 'tube-to-pod alerts',
        ts: Math.floor(alert.context.timestamp.getTime() / 1000).toString(),
      },
    ],
  };
}
