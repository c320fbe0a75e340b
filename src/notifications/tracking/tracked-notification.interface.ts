export interface TrackedNotification {
  sourceMessageId: string;
  sourceChannelId: string;
  receiptId: string;
  ackEmoji?: string;
  /** Epoch milliseconds */
  expiresAt: number;
}

export const TRACKER_EVENTS = {
  TRACKED: 'notification.tracked',
  ACKNOWLEDGED: 'notification.acknowledged',
  EXPIRED: 'notification.expired',
  FAILED: 'notification.failed',
} as const;

export type TrackerEventName =
  (typeof TRACKER_EVENTS)[keyof typeof TRACKER_EVENTS];

export interface TrackerTransitionEvent {
  notification: TrackedNotification;
  at: number;
}
