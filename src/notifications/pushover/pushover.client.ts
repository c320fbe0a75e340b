import { Injectable, Logger } from '@nestjs/common';
import { HttpService } from '@nestjs/axios';
import { ConfigService } from '@nestjs/config';
import { isAxiosError } from 'axios';
import {
  NotificationReceipt,
  NotificationRequest,
  NotificationService,
  ReceiptStatus,
} from '../interfaces/notification-service.interface';
import { RelayConfig } from '../../config/relay-config.interface';
import { CredentialMaskUtil } from '../../common/utils/credential-mask.util';
import { PushoverApiError } from './pushover-api.error';
import {
  PUSHOVER_API_URL,
  PushoverErrorBody,
  PushoverMessageResponse,
  PushoverPriority,
  PushoverReceiptResponse,
} from './pushover.types';

const KNOWN_PRIORITIES: readonly number[] = Object.values(PushoverPriority);

@Injectable()
export class PushoverClient implements NotificationService {
  private readonly logger = new Logger(PushoverClient.name);
  private readonly timeout: number = 10000; // 10 seconds

  constructor(
    private readonly httpService: HttpService,
    private readonly configService: ConfigService,
  ) {}

  async send(request: NotificationRequest): Promise<NotificationReceipt> {
    const appKey = this.appKey();
    if (!request.destination) {
      throw new PushoverApiError('Pushover destination is missing');
    }

    const priority = this.effectivePriority(request);
    const body = new URLSearchParams({
      token: appKey,
      user: request.destination,
      title: request.title,
      message: request.message,
      priority: String(priority),
    });
    if (priority === PushoverPriority.EMERGENCY && request.emergency) {
      body.set('retry', String(request.emergency.retry));
      body.set('expire', String(request.emergency.expire));
    }

    this.logger.debug(
      `Sending Pushover notification to ${CredentialMaskUtil.maskSecret(request.destination)} with priority ${priority}`,
    );

    let data: PushoverMessageResponse;
    try {
      const response = await this.httpService.axiosRef.post<PushoverMessageResponse>(
        `${PUSHOVER_API_URL}/messages.json`,
        body,
        { timeout: this.timeout },
      );
      data = response.data;
    } catch (error) {
      throw this.toApiError(error, 'Pushover send');
    }

    if (data.status !== 1) {
      throw new PushoverApiError(
        `Pushover send returned status ${data.status}: ${(data.errors ?? []).join(', ')}`,
        undefined,
        data.errors ?? [],
      );
    }

    this.logger.log(`Pushover notification accepted (request ${data.request})`);

    if (priority === PushoverPriority.EMERGENCY) {
      if (!data.receipt) {
        throw new PushoverApiError(
          `Pushover accepted emergency notification ${data.request} without a receipt`,
        );
      }
      return { receiptId: data.receipt };
    }
    return {};
  }

  async getReceiptStatus(receiptId: string): Promise<ReceiptStatus> {
    let data: PushoverReceiptResponse;
    try {
      const response = await this.httpService.axiosRef.get<PushoverReceiptResponse>(
        `${PUSHOVER_API_URL}/receipts/${encodeURIComponent(receiptId)}.json`,
        { params: { token: this.appKey() }, timeout: this.timeout },
      );
      data = response.data;
    } catch (error) {
      throw this.toApiError(error, `Pushover receipt ${receiptId} query`);
    }

    if (data.status !== 1) {
      this.logger.warn(
        `Pushover receipt ${receiptId} returned status ${data.status}: ${(data.errors ?? []).join(', ')}`,
      );
      return 'failed';
    }
    if (data.acknowledged === 1) {
      return 'acknowledged';
    }
    if (data.expired === 1) {
      return 'failed';
    }
    return 'pending';
  }

  private appKey(): string {
    const appKey = this.configService.get<RelayConfig>('relay')?.pushoverAppKey;
    if (!appKey) {
      throw new PushoverApiError('Pushover app key is missing from configuration');
    }
    return appKey;
  }

  /**
   * Emergency without retry/expire is downgraded to high; Pushover rejects it otherwise.
   */
  private effectivePriority(request: NotificationRequest): number {
    if (!KNOWN_PRIORITIES.includes(request.priority)) {
      this.logger.warn(
        `Unknown priority ${request.priority}, sending as normal priority`,
      );
      return PushoverPriority.NORMAL;
    }
    if (request.priority === PushoverPriority.EMERGENCY && !request.emergency) {
      this.logger.warn(
        'Emergency priority requested without emergency parameters, sending as high priority',
      );
      return PushoverPriority.HIGH;
    }
    return request.priority;
  }

  private toApiError(error: unknown, action: string): Error {
    if (isAxiosError<PushoverErrorBody>(error)) {
      const status = error.response?.status;
      const errors = error.response?.data?.errors ?? [];
      const detail = errors.length > 0 ? errors.join(', ') : error.message;
      return new PushoverApiError(
        `${action} failed${status ? ` with HTTP ${status}` : ''}: ${detail}`,
        status,
        errors,
      );
    }
    return error instanceof Error ? error : new Error(String(error));
  }
}
