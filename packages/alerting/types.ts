export type AlertSeverity = 'info' | 'warning' | 'error' | 'critical';

export type AlertMetadata = Record<string, string | number | boolean>;

export interface AlertContext {
  /** The entry point that raised the alert, e.g. `run-pipeline` */
  source: string;
  /** The environment where the error occurred (local, prod, etc.) */
  environment: string;
  /** Machine the job ran on */
  host?: string;
  timestamp: Date;
  /** Additional context data, such as run counts */
  metadata?: AlertMetadata;
}

export interface AlertMessage {
  severity: AlertSeverity;
  message: string;
  error?: Error;
  context: AlertContext;
  /** Whether to mention @here in the Slack message (auto-true for critical) */
  mentionHere?: boolean;
}

export interface SlackConfig {
  /** Slack bot token for sending messages */
  botToken: string;
  /** The channel ID where alerts should be sent */
  channelId: string;
}
