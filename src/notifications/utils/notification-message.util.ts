import { MessageSnapshot } from '../../rules/interfaces/message-snapshot.interface';

export const NOTIFICATION_TITLE = 'Discord Notification';

const DISCORD_CHANNELS_URL = 'https://discord.com/channels';

export class NotificationMessageUtil {
  /**
   * Jump link to the message; direct messages use `@me` in place of a guild.
   */
  static buildMessageLink(message: MessageSnapshot): string {
    const guild = message.guildId || '@me';
    return `${DISCORD_CHANNELS_URL}/${guild}/${message.channelId}/${message.id}`;
  }

  static composeBody(message: MessageSnapshot): string {
    return `${message.content}\n\nDiscord Link: ${this.buildMessageLink(message)}`;
  }
}
