/**
 * Notification Dispatcher
 * Sends one rendered notification per new item to every destination, in
 * order, pausing a fixed delay between items. A failed send is counted and
 * logged; it never stops the batch.
 */
import { DeliveryError, redactWebhookUrl, toError } from '../../lib/errors';
import { Logger, logger as defaultLogger } from '../../lib/logger';
import type { DispatchResult, SnapshotItem } from '../../types/entities';
import type { DestinationSender } from './send';

export interface DispatchSummary {
  sent: number;
  failed: number;
  results: DispatchResult[];
}

export interface NotificationDispatcherOptions<T extends SnapshotItem> {
  sender: DestinationSender;
  render: (item: T) => unknown;
  delayMs: number;
  sleep?: (ms: number) => Promise<void>;
  logger?: Logger;
}

export const sleep = (ms: number): Promise<void> =>
  new Promise((resolve) => {
    setTimeout(resolve, ms);
  });

export class NotificationDispatcher<T extends SnapshotItem> {
  private readonly sender: DestinationSender;
  private readonly render: (item: T) => unknown;
  private readonly delayMs: number;
  private readonly sleep: (ms: number) => Promise<void>;
  private readonly logger: Logger;

  constructor(options: NotificationDispatcherOptions<T>) {
    this.sender = options.sender;
    this.render = options.render;
    this.delayMs = options.delayMs;
    this.sleep = options.sleep ?? sleep;
    this.logger = (options.logger ?? defaultLogger).child({ component: 'NotificationDispatcher' });
  }

  async dispatch(items: readonly T[], destinations: readonly string[]): Promise<DispatchSummary> {
    const summary: DispatchSummary = { sent: 0, failed: 0, results: [] };

    if (items.length === 0 || destinations.length === 0) {
      if (items.length > 0) {
        this.logger.warn('No destinations configured; nothing dispatched', { items: items.length });
      }
      return summary;
    }

    for (const [index, item] of items.entries()) {
      if (index > 0 && this.delayMs > 0) {
        await this.sleep(this.delayMs);
      }

      let message: unknown;
      try {
        message = this.render(item);
      } catch (error) {
        // Nothing to send: every destination counts as failed for this item
        const cause = toError(error);
        this.logger.error('Failed to render notification', cause, { itemId: item.id });
        for (const destination of destinations) {
          this.record(summary, {
            itemId: item.id,
            destination,
            status: 'FAILURE',
            detail: `Render failed: ${cause.message}`,
          });
        }
        continue;
      }

      for (const destination of destinations) {
        this.record(summary, {
          itemId: item.id,
          destination,
          ...(await this.deliver(destination, message)),
        });
      }
    }

    this.logger.info('Dispatch completed', {
      items: items.length,
      destinations: destinations.length,
      sent: summary.sent,
      failed: summary.failed,
    });

    return summary;
  }

  private async deliver(
    destination: string,
    message: unknown
  ): Promise<Pick<DispatchResult, 'status' | 'detail'>> {
    try {
      const outcome = await this.sender.send(destination, message);
      return { status: outcome.success ? 'SUCCESS' : 'FAILURE', detail: outcome.detail };
    } catch (error) {
      const cause = toError(error);
      const failure = new DeliveryError(destination, `Send failed: ${cause.message}`);
      this.logger.error('Destination sender threw', cause, { destination: redactWebhookUrl(destination) });
      return { status: 'FAILURE', detail: failure.message };
    }
  }

  private record(summary: DispatchSummary, result: DispatchResult): void {
    summary.results.push(result);
    const context = {
      itemId: result.itemId,
      destination: redactWebhookUrl(result.destination),
      detail: result.detail,
    };

    if (result.status === 'SUCCESS') {
      summary.sent++;
      this.logger.info('Notification delivered', context);
    } else {
      summary.failed++;
      this.logger.warn('Notification delivery failed', context);
    }
  }
}
