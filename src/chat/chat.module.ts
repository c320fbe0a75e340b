import { Module } from '@nestjs/common';
import { CHAT_SESSION } from './interfaces/chat-session.interface';
import { DiscordGateway } from './discord/discord.gateway';

@Module({
  providers: [
    DiscordGateway,
    { provide: CHAT_SESSION, useExisting: DiscordGateway },
  ],
  exports: [CHAT_SESSION],
})
export class ChatModule {}
