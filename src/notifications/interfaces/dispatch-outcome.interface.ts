export type NotificationResult = 'sent' | 'suppressed' | 'skipped' | 'failed';

export type ReactionResult = 'applied' | 'failed' | 'none';

export interface DispatchOutcome {
  notification: NotificationResult;
  receiptId?: string;
  /** True when an emergency receipt was registered for acknowledgement tracking */
  tracked: boolean;
  reaction: ReactionResult;
}
