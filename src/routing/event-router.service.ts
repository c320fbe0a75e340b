import { Inject, Injectable, Logger } from '@nestjs/common';
import { OnEvent } from '@nestjs/event-emitter';
import {
  CHAT_SESSION,
  ChatSession,
} from '../chat/interfaces/chat-session.interface';
import {
  CHAT_EVENTS,
  MessageCreatedEvent,
  MessageUpdatedEvent,
  ReactionAddedEvent,
} from '../chat/interfaces/chat-events.interface';
import { MessageSnapshot } from '../rules/interfaces/message-snapshot.interface';
import { RuleSelector, ruleLabel } from '../rules/rule-selector.service';
import { RulesService } from '../rules/rules.service';
import {
  NO_BASELINE,
  PriorityBaseline,
  computeBaseline,
  describeBaseline,
} from '../rules/priority';
import { NotificationDispatcher } from '../notifications/notification-dispatcher.service';
import { DispatchOutcome } from '../notifications/interfaces/dispatch-outcome.interface';
import { errorMessage } from '../common/utils/error.util';

type EventKind = 'create' | 'edit' | 'reaction';

/**
 * Entry point for chat events: normalizes each one into a message snapshot
 * plus baseline, then runs rule selection and dispatch.
 *
 * Edits and reactions refetch the full message, since update payloads carry
 * unreliable reaction data.
 */
@Injectable()
export class EventRouter {
  private readonly logger = new Logger(EventRouter.name);

  constructor(
    @Inject(CHAT_SESSION) private readonly chat: ChatSession,
    private readonly selector: RuleSelector,
    private readonly rulesService: RulesService,
    private readonly dispatcher: NotificationDispatcher,
  ) {}

  @OnEvent(CHAT_EVENTS.MESSAGE_CREATED)
  async handleMessageCreate(
    event: MessageCreatedEvent,
  ): Promise<DispatchOutcome | undefined> {
    return this.guard('create', event.message.id, async () => {
      if (this.isFromBot(event.message.authorId)) {
        this.logger.debug(`Ignoring bot's own message ${event.message.id}`);
        return undefined;
      }
      return this.route('create', event.message, NO_BASELINE);
    });
  }

  @OnEvent(CHAT_EVENTS.MESSAGE_UPDATED)
  async handleMessageUpdate(
    event: MessageUpdatedEvent,
  ): Promise<DispatchOutcome | undefined> {
    return this.guard('edit', event.messageId, async () => {
      if (event.authorId && this.isFromBot(event.authorId)) {
        this.logger.debug(`Ignoring edit of bot's own message ${event.messageId}`);
        return undefined;
      }
      return this.refetchAndRoute('edit', event.channelId, event.messageId);
    });
  }

  @OnEvent(CHAT_EVENTS.REACTION_ADDED)
  async handleReactionAdd(
    event: ReactionAddedEvent,
  ): Promise<DispatchOutcome | undefined> {
    return this.guard('reaction', event.messageId, async () => {
      if (this.isFromBot(event.userId)) {
        this.logger.debug(
          `Ignoring bot's own reaction '${event.emoji}' on message ${event.messageId}`,
        );
        return undefined;
      }
      this.logger.debug(
        `Reaction '${event.emoji}' added by ${event.userId} on message ${event.messageId}`,
      );
      return this.refetchAndRoute('reaction', event.channelId, event.messageId);
    });
  }

  private async refetchAndRoute(
    kind: EventKind,
    channelId: string,
    messageId: string,
  ): Promise<DispatchOutcome | undefined> {
    let message: MessageSnapshot;
    try {
      message = await this.chat.fetchMessage(channelId, messageId);
    } catch (error) {
      this.logger.error(
        `Error fetching message ${messageId} in channel ${channelId} for ${kind} event: ${errorMessage(error)}`,
      );
      return undefined;
    }

    if (this.isFromBot(message.authorId)) {
      this.logger.debug(`Ignoring ${kind} event on bot's own message ${messageId}`);
      return undefined;
    }

    const baseline = computeBaseline(
      message,
      this.rulesService.rules,
      this.rulesService.priorityOrder,
    );
    return this.route(kind, message, baseline);
  }

  private async route(
    kind: EventKind,
    message: MessageSnapshot,
    baseline: PriorityBaseline,
  ): Promise<DispatchOutcome | undefined> {
    const match = this.selector.select(
      message,
      this.rulesService.rules,
      this.chat.getBotUserId(),
    );
    if (!match) {
      this.logger.debug(`No rule matched ${kind} event on message ${message.id}`);
      return undefined;
    }

    const label = ruleLabel(match.rule, match.index);
    const outcome = await this.dispatcher.dispatch(
      message,
      match.rule,
      baseline,
      label,
    );
    this.logger.log(
      `Processed ${kind} event on message ${message.id}: rule '${label}', baseline ${describeBaseline(baseline)}, notification ${outcome.notification}, reaction ${outcome.reaction}`,
    );
    return outcome;
  }

  private isFromBot(userId: string): boolean {
    const botUserId = this.chat.getBotUserId();
    return botUserId !== undefined && userId === botUserId;
  }

  private async guard(
    kind: EventKind,
    messageId: string,
    handler: () => Promise<DispatchOutcome | undefined>,
  ): Promise<DispatchOutcome | undefined> {
    try {
      return await handler();
    } catch (error) {
      this.logger.error(
        `Error handling ${kind} event for message ${messageId}: ${errorMessage(error)}`,
      );
      return undefined;
    }
  }
}
