/**
 * Pushover priority that requires acknowledgement (emergency).
 */
export const EMERGENCY_PRIORITY = 2;

/** Range Pushover accepts; anything outside is sent as normal priority */
export const MIN_PRIORITY = -2;
export const MAX_PRIORITY = 2;

export interface EmergencyParams {
  ackEmoji?: string;
  /** Seconds until Pushover stops retrying, also used as the tracking window */
  expire: number;
  /** Seconds between Pushover retries */
  retry: number;
}

export interface RuleConditions {
  channelId?: string;
  messageHasEmoji?: string[];
  reactToAtMention?: boolean;
  specificMentions?: string[];
  contentIncludes?: string[];
}

export interface RuleActions {
  pushoverDestination?: string;
  priority: number;
  reactionEmoji?: string;
  emergency?: EmergencyParams;
}

export interface Rule {
  name?: string;
  conditions: RuleConditions;
  actions: RuleActions;
}

export interface RuleMatch {
  rule: Rule;
  index: number;
}
