import { Module } from '@nestjs/common';
import { ChatModule } from '../chat/chat.module';
import { RulesModule } from '../rules/rules.module';
import { NotificationsModule } from '../notifications/notifications.module';
import { EventRouter } from './event-router.service';

@Module({
  imports: [ChatModule, RulesModule, NotificationsModule],
  providers: [EventRouter],
})
export class RoutingModule {}
