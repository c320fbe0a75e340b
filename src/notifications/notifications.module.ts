import { Module } from '@nestjs/common';
import { HttpModule } from '@nestjs/axios';
import { ChatModule } from '../chat/chat.module';
import { RulesModule } from '../rules/rules.module';
import { NOTIFICATION_SERVICE } from './interfaces/notification-service.interface';
import { PushoverClient } from './pushover/pushover.client';
import { TrackedNotificationStore } from './tracking/tracked-notification.store';
import { AcknowledgementTracker } from './tracking/acknowledgement-tracker.service';
import { NotificationDispatcher } from './notification-dispatcher.service';

@Module({
  imports: [HttpModule, ChatModule, RulesModule],
  providers: [
    { provide: NOTIFICATION_SERVICE, useClass: PushoverClient },
    TrackedNotificationStore,
    AcknowledgementTracker,
    NotificationDispatcher,
  ],
  exports: [NotificationDispatcher, AcknowledgementTracker],
})
export class NotificationsModule {}
