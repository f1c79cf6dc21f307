/**
 * Operator alerts.
 * Plain-text messages posted to the alert webhooks (WEBHOOK_URL_ALERT),
 * falling back to the notification webhooks when no alert channel is set.
 */
import { Logger, logger as defaultLogger } from '../../lib/logger';
import type { DestinationSender } from './send';

export interface AlertNotifierOptions {
  sender: DestinationSender;
  alertDestinations: readonly string[];
  fallbackDestinations: readonly string[];
  logger?: Logger;
}

export class AlertNotifier {
  private readonly sender: DestinationSender;
  private readonly destinations: readonly string[];
  private readonly logger: Logger;

  constructor(options: AlertNotifierOptions) {
    this.sender = options.sender;
    this.destinations =
      options.alertDestinations.length > 0 ? options.alertDestinations : options.fallbackDestinations;
    this.logger = (options.logger ?? defaultLogger).child({ component: 'AlertNotifier' });
  }

  /**
   * Returns the number of alert channels that accepted the message
   */
  async alert(message: string): Promise<number> {
    if (this.destinations.length === 0) {
      this.logger.warn('Alert not sent (no WEBHOOK_URL_ALERT or WEBHOOK_URL configured)', { message });
      return 0;
    }

    let delivered = 0;
    for (const destination of this.destinations) {
      const outcome = await this.sender.send(destination, { content: `🚨 ${message}` });
      if (outcome.success) {
        delivered++;
      } else {
        this.logger.warn('Alert delivery failed', { detail: outcome.detail });
      }
    }
    return delivered;
  }
}
