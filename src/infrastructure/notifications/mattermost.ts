import type { Logger } from 'pino';
import type { EventRecorder } from '../../domain/index.js';
import type { MattermostConfig } from './config.js';

export type FetchFn = typeof fetch;

/**
 * Chat collaborator posting an end-of-run report to a Mattermost
 * incoming webhook.
 *
 * The aggregator forwards `info`/`error` events here; nothing is sent until
 * `sendMattermostNotification()` is called.
 */
export class MattermostNotifier {
  private readonly succeeded: string[] = [];
  private readonly failed: string[] = [];

  constructor(
    private readonly config: MattermostConfig,
    private readonly recorder: EventRecorder,
    private readonly log: Logger,
    private readonly fetchFn: FetchFn = fetch,
  ) {
    if (!config.webhookUrl) {
      recorder.critical('Mattermost config', 'Missing webhook URL. Notifications are disabled.');
    }
  }

  get isConfigured(): boolean {
    return Boolean(this.config.webhookUrl);
  }

  info(action: string): void {
    if (!this.succeeded.includes(action)) this.succeeded.push(action);
  }

  error(action: string): void {
    if (!this.failed.includes(action)) this.failed.push(action);
  }

  /** Markdown body of the report. */
  buildText(): string {
    const status = this.failed.length === 0 ? 'success' : 'failure';
    return [
      `#### Task report: ${status}`,
      ...this.succeeded.map((action) => `:white_check_mark: ${action}`),
      ...this.failed.map((action) => `:x: ${action}`),
    ].join('\n');
  }

  /** Rejects on network failure or a non-OK webhook response. */
  async sendMattermostNotification(): Promise<void> {
    const url = this.config.webhookUrl;
    if (!url) {
      this.recorder.critical('Mattermost notification', 'Not sent, webhook URL is missing.');
      return;
    }

    const body = JSON.stringify({
      text: this.buildText(),
      ...(this.config.channel ? { channel: this.config.channel } : {}),
      ...(this.config.username ? { username: this.config.username } : {}),
    });

    const response = await this.fetchFn(url, {
      method: 'POST',
      headers: { 'Content-Type': 'application/json' },
      body,
    });

    if (!response.ok) {
      throw new Error(`Mattermost webhook returned ${response.status}`);
    }

    this.log.info(
      { succeeded: this.succeeded.length, failed: this.failed.length },
      'Mattermost notification sent',
    );
  }
}
