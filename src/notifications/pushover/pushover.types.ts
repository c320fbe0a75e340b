export const PUSHOVER_API_URL = 'https://api.pushover.net/1';

export const PushoverPriority = {
  LOWEST: -2,
  LOW: -1,
  NORMAL: 0,
  HIGH: 1,
  EMERGENCY: 2,
} as const;

export interface PushoverMessageResponse {
  status: number;
  request: string;
  /** Only for emergency priority */
  receipt?: string;
  errors?: string[];
}

export interface PushoverReceiptResponse {
  status: number;
  request: string;
  acknowledged: number;
  acknowledged_at?: number;
  acknowledged_by?: string;
  expired: number;
  expires_at?: number;
  errors?: string[];
}

export interface PushoverErrorBody {
  status?: number;
  errors?: string[];
}
