import os from 'os';
import { getLogger } from '@tube-to-pod/logging';
import type { AlertContext, AlertSeverity, SlackConfig } from './types.js';
import { SlackAlertClient } from './slack-client.js';

const log = getLogger('alerting');

export class AlertingService {
  private readonly slackClient: SlackAlertClient | null;

  constructor(slackConfig?: SlackConfig, private readonly defaultSource = 'tube-to-pod') {
    this.slackClient = slackConfig ? new SlackAlertClient(slackConfig) : null;
  }

  /**
   * Send an alert, filling in the context that can be detected.
   * Resolves false when alerting is disabled or delivery failed.
   */
  async sendAlert(
    severity: AlertSeverity,
    message: string,
    error?: Error,
    additionalContext?: Partial<AlertContext>
  ): Promise<boolean> {
    if (!this.slackClient) {
      log.debug(`Alerting disabled, not sending ${severity} alert: ${message}`);
      return false;
    }

    const context: AlertContext = {
      source: additionalContext?.source ?? this.defaultSource,
      environment: additionalContext?.environment ?? this.detectEnvironment(),
      host: additionalContext?.host ?? os.hostname(),
      timestamp: additionalContext?.timestamp ?? new Date(),
      metadata: additionalContext?.metadata,
    };

    return this.slackClient.sendAlert({
      severity,
      message,
      error,
      context,
      mentionHere: severity === 'critical',
    });
  }

  async sendError(message: string, error?: Error, context?: Partial<AlertContext>): Promise<boolean> {
    return this.sendAlert('error', message, error, context);
  }

  async sendCritical(message: string, error?: Error, context?: Partial<AlertContext>): Promise<boolean> {
    return this.sendAlert('critical', message, error, context);
  }

  isAlertingEnabled(): boolean {
    return this.slackClient !== null;
  }

  private detectEnvironment(): string {
    return process.env.NODE_ENV || process.env.ENVIRONMENT || 'local';
  }
}
