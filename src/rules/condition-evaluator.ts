import { Injectable, Logger } from '@nestjs/common';
import { EmojiUtil } from '../common/utils/emoji.util';
import { RuleConditions } from './interfaces/rule.interface';
import { MessageSnapshot } from './interfaces/message-snapshot.interface';

/**
 * Tests one rule's conditions against one message.
 *
 * Every configured condition must pass (AND). Conditions that are absent or
 * empty are skipped, so a rule without conditions matches every message.
 */
@Injectable()
export class ConditionEvaluator {
  private readonly logger = new Logger(ConditionEvaluator.name);

  evaluate(
    message: MessageSnapshot,
    conditions: RuleConditions,
    botUserId: string | undefined,
    ruleName = 'rule',
  ): boolean {
    const prefix = `Rule '${ruleName}', message ${message.id}:`;

    if (conditions.channelId) {
      if (message.channelId !== conditions.channelId) {
        this.logger.debug(
          `${prefix} condition failed (channelId): ${message.channelId} != ${conditions.channelId}`,
        );
        return false;
      }
      this.logger.debug(`${prefix} condition passed (channelId)`);
    }

    if (conditions.messageHasEmoji && conditions.messageHasEmoji.length > 0) {
      const found = this.findQualifyingEmoji(
        message,
        conditions.messageHasEmoji,
        conditions.reactToAtMention === true,
        prefix,
      );
      if (!found) {
        this.logger.debug(
          `${prefix} condition failed (messageHasEmoji): none of [${conditions.messageHasEmoji.join(', ')}] found`,
        );
        return false;
      }
      this.logger.debug(
        `${prefix} condition passed (messageHasEmoji): found '${found}'`,
      );
    }

    if (conditions.contentIncludes && conditions.contentIncludes.length > 0) {
      const content = message.content.toLowerCase();
      for (const keyword of conditions.contentIncludes) {
        if (!content.includes(keyword.toLowerCase())) {
          this.logger.debug(
            `${prefix} condition failed (contentIncludes): keyword '${keyword}' not found`,
          );
          return false;
        }
      }
      this.logger.debug(`${prefix} condition passed (contentIncludes)`);
    }

    if (conditions.reactToAtMention) {
      if (!botUserId) {
        this.logger.debug(
          `${prefix} condition failed (reactToAtMention): bot identity unavailable`,
        );
        return false;
      }
      if (!message.mentionedUserIds.includes(botUserId)) {
        this.logger.debug(
          `${prefix} condition failed (reactToAtMention): bot ${botUserId} not mentioned`,
        );
        return false;
      }
      this.logger.debug(`${prefix} condition passed (reactToAtMention)`);
    }

    if (
      conditions.specificMentions &&
      conditions.specificMentions.length > 0
    ) {
      const mentioned = conditions.specificMentions.find(
        (id) =>
          message.mentionedUserIds.includes(id) ||
          message.mentionedRoleIds.includes(id),
      );
      if (mentioned === undefined) {
        this.logger.debug(
          `${prefix} condition failed (specificMentions): none of [${conditions.specificMentions.join(', ')}] mentioned`,
        );
        return false;
      }
      this.logger.debug(
        `${prefix} condition passed (specificMentions): ${mentioned} mentioned`,
      );
    }

    this.logger.debug(`${prefix} all active conditions passed`);
    return true;
  }

  /**
   * First configured emoji present among the message's reactions.
   * With reactToAtMention set, reactions the bot added itself only mark an
   * earlier notification and do not count as a trigger.
   */
  private findQualifyingEmoji(
    message: MessageSnapshot,
    wanted: string[],
    ignoreBotReactions: boolean,
    prefix: string,
  ): string | undefined {
    for (const emoji of wanted) {
      for (const reaction of message.reactions) {
        if (!EmojiUtil.matches(emoji, reaction.emoji)) continue;
        if (ignoreBotReactions && reaction.me) {
          this.logger.debug(
            `${prefix} reaction '${reaction.emoji}' was added by the bot, ignoring`,
          );
          continue;
        }
        return emoji;
      }
    }
    return undefined;
  }
}
