import { Inject, Injectable, Logger } from '@nestjs/common';
import {
  NOTIFICATION_SERVICE,
  NotificationRequest,
  NotificationService,
} from './interfaces/notification-service.interface';
import {
  DispatchOutcome,
  NotificationResult,
  ReactionResult,
} from './interfaces/dispatch-outcome.interface';
import {
  CHAT_SESSION,
  ChatSession,
} from '../chat/interfaces/chat-session.interface';
import { AcknowledgementTracker } from './tracking/acknowledgement-tracker.service';
import {
  NOTIFICATION_TITLE,
  NotificationMessageUtil,
} from './utils/notification-message.util';
import { EMERGENCY_PRIORITY, Rule } from '../rules/interfaces/rule.interface';
import { MessageSnapshot } from '../rules/interfaces/message-snapshot.interface';
import {
  PriorityBaseline,
  describeBaseline,
  shouldSuppress,
} from '../rules/priority';
import { RulesService } from '../rules/rules.service';
import { errorMessage } from '../common/utils/error.util';

export const DEFAULT_EMERGENCY_EXPIRE_SECONDS = 3600;

/**
 * Carries out a matched rule's actions: the Pushover notification (unless a
 * notification at least as urgent was already sent for the message), the
 * acknowledgement tracking for emergency receipts, and the reaction.
 */
@Injectable()
export class NotificationDispatcher {
  private readonly logger = new Logger(NotificationDispatcher.name);

  constructor(
    @Inject(NOTIFICATION_SERVICE)
    private readonly notifications: NotificationService,
    @Inject(CHAT_SESSION) private readonly chat: ChatSession,
    private readonly tracker: AcknowledgementTracker,
    private readonly rulesService: RulesService,
  ) {}

  async dispatch(
    message: MessageSnapshot,
    rule: Rule,
    baseline: PriorityBaseline,
    label: string = rule.name || 'rule',
  ): Promise<DispatchOutcome> {
    const outcome: DispatchOutcome = {
      notification: 'skipped',
      tracked: false,
      reaction: 'none',
    };

    const { pushoverDestination, priority, reactionEmoji } = rule.actions;
    if (!pushoverDestination) {
      this.logger.debug(
        `Rule '${label}' has no Pushover destination, no notification to send`,
      );
    } else if (
      shouldSuppress(priority, baseline, this.rulesService.priorityOrder)
    ) {
      outcome.notification = 'suppressed';
      this.logger.log(
        `Suppressing Pushover notification for rule '${label}' on message ${message.id}: priority ${priority} is not more urgent than baseline ${describeBaseline(baseline)}`,
      );
    } else {
      Object.assign(
        outcome,
        await this.send(message, rule, pushoverDestination, label),
      );
    }

    if (reactionEmoji) {
      outcome.reaction = await this.react(message, reactionEmoji);
    }

    return outcome;
  }

  private async send(
    message: MessageSnapshot,
    rule: Rule,
    destination: string,
    label: string,
  ): Promise<{
    notification: NotificationResult;
    receiptId?: string;
    tracked: boolean;
  }> {
    const { priority, emergency } = rule.actions;
    const request: NotificationRequest = {
      destination,
      priority,
      title: NOTIFICATION_TITLE,
      message: NotificationMessageUtil.composeBody(message),
    };

    let expireSeconds = 0;
    if (priority === EMERGENCY_PRIORITY) {
      if (emergency) {
        expireSeconds = this.effectiveExpire(emergency.expire, label);
        request.emergency = { retry: emergency.retry, expire: expireSeconds };
      } else {
        this.logger.warn(
          `Rule '${label}' has emergency priority but no emergency parameters; acknowledgement will not be tracked`,
        );
      }
    }

    let receiptId: string | undefined;
    try {
      ({ receiptId } = await this.notifications.send(request));
    } catch (error) {
      this.logger.error(
        `Error sending Pushover notification for rule '${label}' on message ${message.id}: ${errorMessage(error)}`,
      );
      return { notification: 'failed', tracked: false };
    }

    this.logger.log(
      `Sent Pushover notification for rule '${label}' on message ${message.id} (priority ${priority})`,
    );

    if (!receiptId || !request.emergency) {
      return { notification: 'sent', receiptId, tracked: false };
    }

    this.tracker.register({
      sourceMessageId: message.id,
      sourceChannelId: message.channelId,
      receiptId,
      ackEmoji: emergency?.ackEmoji,
      expiresAt: Date.now() + expireSeconds * 1000,
    });
    return { notification: 'sent', receiptId, tracked: true };
  }

  private effectiveExpire(expire: number, label: string): number {
    if (expire > 0) return expire;

    this.logger.warn(
      `Rule '${label}' has non-positive emergency expire (${expire}), using ${DEFAULT_EMERGENCY_EXPIRE_SECONDS}s`,
    );
    return DEFAULT_EMERGENCY_EXPIRE_SECONDS;
  }

  private async react(
    message: MessageSnapshot,
    emoji: string,
  ): Promise<ReactionResult> {
    try {
      await this.chat.addReaction(message.channelId, message.id, emoji);
      this.logger.debug(`Added reaction '${emoji}' to message ${message.id}`);
      return 'applied';
    } catch (error) {
      this.logger.error(
        `Error adding reaction '${emoji}' to message ${message.id}: ${errorMessage(error)}`,
      );
      return 'failed';
    }
  }
}
