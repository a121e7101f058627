/**
 * Outbound notifications.
 *
 * Operations queue notifications and hand them to the dispatcher only
 * after their commit succeeds. Delivery runs in the background; a failed
 * delivery is logged and never reaches the operation that caused it.
 */

import type { Logger } from "pino";

export type NotificationChannel = "sms" | "email";

export interface Notification {
  readonly channel: NotificationChannel;
  readonly recipientId: string;

  /** Phone number for SMS, address for email */
  readonly address: string;

  readonly subject?: string;
  readonly message: string;
  readonly swapRef?: string;
}

export interface NotificationSink {
  send(notification: Notification): Promise<void>;
}

export class NotificationDispatcher {
  private readonly pending = new Set<Promise<void>>();

  constructor(
    private readonly sink: NotificationSink,
    private readonly logger: Logger,
  ) {}

  dispatch(notifications: readonly Notification[]): void {
    for (const notification of notifications) {
      const delivery: Promise<void> = Promise.resolve()
        .then(() => this.sink.send(notification))
        .catch((err: unknown) => {
          this.logger.warn(
            {
              err,
              channel: notification.channel,
              recipientId: notification.recipientId,
              swapRef: notification.swapRef,
            },
            "Notification delivery failed",
          );
        })
        .finally(() => {
          this.pending.delete(delivery);
        });
      this.pending.add(delivery);
    }
  }

  /** Deliveries not yet settled */
  get inFlight(): number {
    return this.pending.size;
  }

  /**
   * Wait until every dispatched notification has settled.
   */
  async drain(): Promise<void> {
    while (this.pending.size > 0) {
      await Promise.all([...this.pending]);
    }
  }
}

/**
 * Keeps every notification in memory. Used in development and tests.
 */
export class MemoryNotificationSink implements NotificationSink {
  readonly sent: Notification[] = [];

  send(notification: Notification): Promise<void> {
    this.sent.push(notification);
    return Promise.resolve();
  }
}

/**
 * Writes each notification to the log instead of a gateway.
 */
export class LoggingNotificationSink implements NotificationSink {
  constructor(private readonly logger: Logger) {}

  send(notification: Notification): Promise<void> {
    this.logger.info(
      {
        channel: notification.channel,
        recipientId: notification.recipientId,
        swapRef: notification.swapRef,
      },
      notification.subject ?? notification.message,
    );
    return Promise.resolve();
  }
}
