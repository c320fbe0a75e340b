import { EmojiUtil } from '../common/utils/emoji.util';
import { Rule } from './interfaces/rule.interface';
import { MessageSnapshot } from './interfaces/message-snapshot.interface';

/**
 * Direction of urgency on the numeric priority scale.
 * - ascending: smaller numbers are more urgent
 * - descending: larger numbers are more urgent (Pushover's own scale)
 */
export type PriorityOrder = 'ascending' | 'descending';

export const PRIORITY_ORDERS: readonly PriorityOrder[] = [
  'ascending',
  'descending',
];

/** Most urgent priority already signalled on a message, or NO_BASELINE */
export type PriorityBaseline = number | null;

export const NO_BASELINE = null;

export function isMoreUrgent(
  candidate: number,
  reference: number,
  order: PriorityOrder,
): boolean {
  return order === 'ascending' ? candidate < reference : candidate > reference;
}

export function isEqualOrLessUrgent(
  candidate: number,
  reference: number,
  order: PriorityOrder,
): boolean {
  return !isMoreUrgent(candidate, reference, order);
}

/**
 * Whether a notification at `priority` is redundant given what the bot has
 * already signalled on the message.
 */
export function shouldSuppress(
  priority: number,
  baseline: PriorityBaseline,
  order: PriorityOrder,
): boolean {
  return (
    baseline !== null && isEqualOrLessUrgent(priority, baseline, order)
  );
}

/**
 * Most urgent priority among rules whose reaction emoji the bot has already
 * put on the message.
 */
export function computeBaseline(
  message: MessageSnapshot,
  rules: readonly Rule[],
  order: PriorityOrder,
): PriorityBaseline {
  let baseline: PriorityBaseline = NO_BASELINE;

  for (const reaction of message.reactions) {
    if (!reaction.me) continue;
    for (const rule of rules) {
      const emoji = rule.actions.reactionEmoji;
      if (!emoji || !EmojiUtil.matches(emoji, reaction.emoji)) continue;
      const priority = rule.actions.priority;
      if (baseline === null || isMoreUrgent(priority, baseline, order)) {
        baseline = priority;
      }
    }
  }

  return baseline;
}

export function describeBaseline(baseline: PriorityBaseline): string {
  return baseline === null ? 'none' : String(baseline);
}
