import { Inject, Injectable } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { OnEvent } from '@nestjs/event-emitter';
import {
  CHAT_SESSION,
  ChatSession,
} from '../chat/interfaces/chat-session.interface';
import { AcknowledgementTracker } from '../notifications/tracking/acknowledgement-tracker.service';
import { TRACKER_EVENTS } from '../notifications/tracking/tracked-notification.interface';
import { SentryConfig } from '../config/sentry.config';
import * as packageJson from '../../package.json';

export interface TrackerCounters {
  tracked: number;
  acknowledged: number;
  expired: number;
  failed: number;
}

@Injectable()
export class HealthService {
  private readonly counters: TrackerCounters = {
    tracked: 0,
    acknowledged: 0,
    expired: 0,
    failed: 0,
  };

  constructor(
    @Inject(CHAT_SESSION) private readonly chat: ChatSession,
    private readonly tracker: AcknowledgementTracker,
    private readonly configService: ConfigService,
  ) {}

  @OnEvent(TRACKER_EVENTS.TRACKED)
  onTracked(): void {
    this.counters.tracked++;
  }

  @OnEvent(TRACKER_EVENTS.ACKNOWLEDGED)
  onAcknowledged(): void {
    this.counters.acknowledged++;
  }

  @OnEvent(TRACKER_EVENTS.EXPIRED)
  onExpired(): void {
    this.counters.expired++;
  }

  @OnEvent(TRACKER_EVENTS.FAILED)
  onFailed(): void {
    this.counters.failed++;
  }

  check() {
    const discordConnected = this.chat.isConnected();
    const sentry = this.configService.get<SentryConfig>('sentry');

    return {
      status: discordConnected ? 'healthy' : 'degraded',
      version: packageJson.version,
      discord: {
        connected: discordConnected,
      },
      notifications: {
        pending: this.tracker.trackedCount,
        ...this.counters,
      },
      sentry: {
        enabled: sentry?.enabled ?? false,
        configured: Boolean(sentry?.dsn),
      },
      timestamp: new Date().toISOString(),
    };
  }
}
