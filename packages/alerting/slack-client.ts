import { WebClient } from '@slack/web-api';
import { getLogger } from '@tube-to-pod/logging';
import type { AlertMessage, SlackConfig } from './types.js';
import { formatAlertForSlack } from './slack-formatter.js';

const log = getLogger('alerting');

export class SlackAlertClient {
  private readonly client: WebClient;

  constructor(private readonly config: SlackConfig) {
    this.client = new WebClient(config.botToken);
  }

  /**
   * Post an alert. Resolves false instead of throwing when Slack is unreachable,
   * so a failed alert never masks the failure being reported.
   */
  async sendAlert(alert: AlertMessage): Promise<boolean> {
    try {
      const formattedMessage = formatAlertForSlack(alert);

      await this.client.chat.postMessage({
        channel: this.config.channelId,
        text: formattedMessage.text,
        attachments: formattedMessage.attachments,
        unfurl_links: false,
        unfurl_media: false,
      });
      return true;
    } catch (error) {
      log.error('Failed to send Slack alert:', error);
      return false;
    }
  }
}
