export interface NotificationRequest {
  destination: string;
  priority: number;
  title: string;
  message: string;
  /** Emergency retry/expire, in seconds */
  emergency?: {
    retry: number;
    expire: number;
  };
}

export interface NotificationReceipt {
  /** Present only for emergency notifications */
  receiptId?: string;
}

export type ReceiptStatus = 'pending' | 'acknowledged' | 'failed';

export interface NotificationService {
  send(request: NotificationRequest): Promise<NotificationReceipt>;
  getReceiptStatus(receiptId: string): Promise<ReceiptStatus>;
}

export const NOTIFICATION_SERVICE = Symbol('NOTIFICATION_SERVICE');
