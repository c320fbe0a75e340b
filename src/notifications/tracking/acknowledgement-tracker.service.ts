import {
  Inject,
  Injectable,
  Logger,
  OnApplicationBootstrap,
  OnModuleDestroy,
} from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { EventEmitter2 } from '@nestjs/event-emitter';
import pLimit from 'p-limit';
import {
  NOTIFICATION_SERVICE,
  NotificationService,
  ReceiptStatus,
} from '../interfaces/notification-service.interface';
import {
  CHAT_SESSION,
  ChatSession,
} from '../../chat/interfaces/chat-session.interface';
import { errorMessage } from '../../common/utils/error.util';
import { TrackedNotificationStore } from './tracked-notification.store';
import {
  TRACKER_EVENTS,
  TrackedNotification,
  TrackerEventName,
  TrackerTransitionEvent,
} from './tracked-notification.interface';

export const DEFAULT_ACK_POLL_INTERVAL_MS = 5000;

/**
 * Follows emergency notifications until Pushover reports them acknowledged
 * or failed, or until their tracking window ends.
 *
 * Pending -> Acknowledged (ack reaction applied)
 * Pending -> Expired (no reaction, no receipt query)
 * Pending -> Failed (no reaction)
 *
 * Every terminal transition removes the entry; only the caller that removes
 * it performs the transition's side effects.
 */
@Injectable()
export class AcknowledgementTracker
  implements OnApplicationBootstrap, OnModuleDestroy
{
  private readonly logger = new Logger(AcknowledgementTracker.name);
  private readonly concurrencyLimit = pLimit(5); // Max 5 concurrent receipt queries
  private timer?: NodeJS.Timeout;
  private polling = false;

  constructor(
    private readonly store: TrackedNotificationStore,
    @Inject(NOTIFICATION_SERVICE)
    private readonly notifications: NotificationService,
    @Inject(CHAT_SESSION) private readonly chat: ChatSession,
    private readonly eventEmitter: EventEmitter2,
    private readonly configService: ConfigService,
  ) {}

  onApplicationBootstrap(): void {
    this.start();
  }

  onModuleDestroy(): void {
    this.stop();
  }

  register(notification: TrackedNotification): void {
    this.store.add(notification);
    this.logger.log(
      `Tracking emergency notification ${notification.receiptId} for message ${notification.sourceMessageId} until ${new Date(notification.expiresAt).toISOString()}`,
    );
    this.emit(TRACKER_EVENTS.TRACKED, notification, Date.now());
  }

  get trackedCount(): number {
    return this.store.size;
  }

  start(
    intervalMs = this.configService.get<number>(
      'app.ackPollIntervalMs',
      DEFAULT_ACK_POLL_INTERVAL_MS,
    ),
  ): void {
    if (this.timer) return;

    this.timer = setInterval(() => {
      void this.tick();
    }, intervalMs);
    this.logger.log(
      `Emergency acknowledgement polling started (interval: ${intervalMs}ms)`,
    );
  }

  stop(): void {
    if (!this.timer) return;

    clearInterval(this.timer);
    this.timer = undefined;
    this.logger.log('Emergency acknowledgement polling stopped');
  }

  isRunning(): boolean {
    return this.timer !== undefined;
  }

  /**
   * Checks every entry pending at call time once.
   */
  async pollOnce(now: number = Date.now()): Promise<void> {
    const pending = this.store.snapshot();
    if (pending.length === 0) return;

    this.logger.debug(`Polling ${pending.length} tracked notification(s)`);
    await Promise.all(
      pending.map((notification) =>
        this.concurrencyLimit(() => this.check(notification, now)),
      ),
    );
  }

  private async tick(): Promise<void> {
    if (this.polling) {
      this.logger.debug('Previous poll still running, skipping tick');
      return;
    }

    this.polling = true;
    try {
      await this.pollOnce();
    } catch (error) {
      this.logger.error(`Acknowledgement poll failed: ${errorMessage(error)}`);
    } finally {
      this.polling = false;
    }
  }

  private async check(
    notification: TrackedNotification,
    now: number,
  ): Promise<void> {
    const { receiptId, sourceMessageId } = notification;
    if (!this.store.has(receiptId)) return;

    if (now >= notification.expiresAt) {
      if (this.store.remove(receiptId)) {
        this.logger.log(
          `Emergency notification ${receiptId} (message ${sourceMessageId}) expired without acknowledgement`,
        );
        this.emit(TRACKER_EVENTS.EXPIRED, notification, now);
      }
      return;
    }

    let status: ReceiptStatus;
    try {
      status = await this.notifications.getReceiptStatus(receiptId);
    } catch (error) {
      this.logger.warn(
        `Error checking receipt ${receiptId}, retrying next poll: ${errorMessage(error)}`,
      );
      return;
    }

    switch (status) {
      case 'acknowledged':
        if (!this.store.remove(receiptId)) return;
        this.logger.log(
          `Emergency notification ${receiptId} (message ${sourceMessageId}) was acknowledged`,
        );
        this.emit(TRACKER_EVENTS.ACKNOWLEDGED, notification, now);
        await this.applyAckReaction(notification);
        return;
      case 'failed':
        if (!this.store.remove(receiptId)) return;
        this.logger.warn(
          `Emergency notification ${receiptId} (message ${sourceMessageId}) failed, no longer tracking`,
        );
        this.emit(TRACKER_EVENTS.FAILED, notification, now);
        return;
      case 'pending':
        this.logger.debug(`Receipt ${receiptId} not yet acknowledged`);
        return;
    }
  }

  private async applyAckReaction(
    notification: TrackedNotification,
  ): Promise<void> {
    if (!notification.ackEmoji) return;

    try {
      await this.chat.addReaction(
        notification.sourceChannelId,
        notification.sourceMessageId,
        notification.ackEmoji,
      );
      this.logger.log(
        `Added ack emoji '${notification.ackEmoji}' to message ${notification.sourceMessageId}`,
      );
    } catch (error) {
      this.logger.error(
        `Error adding ack emoji '${notification.ackEmoji}' to message ${notification.sourceMessageId}: ${errorMessage(error)}`,
      );
    }
  }

  private emit(
    event: TrackerEventName,
    notification: TrackedNotification,
    at: number,
  ): void {
    const payload: TrackerTransitionEvent = { notification, at };
    this.eventEmitter.emit(event, payload);
  }
}
