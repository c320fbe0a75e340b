import { MessageSnapshot } from '../../rules/interfaces/message-snapshot.interface';

/**
 * The parts of a discord.js `Message` the routing engine reads.
 */
export interface DiscordMessageLike {
  id: string;
  channelId: string;
  guildId: string | null;
  content: string;
  author: { id: string };
  mentions: {
    users: { keys(): Iterable<string> };
    roles: { keys(): Iterable<string> };
  };
  reactions: {
    cache: {
      values(): Iterable<{ emoji: { name: string | null }; me: boolean }>;
    };
  };
}

export class DiscordSnapshotUtil {
  static toSnapshot(message: DiscordMessageLike): MessageSnapshot {
    const reactions: MessageSnapshot['reactions'] = [];
    for (const reaction of message.reactions.cache.values()) {
      if (!reaction.emoji.name) continue;
      reactions.push({ emoji: reaction.emoji.name, me: reaction.me });
    }

    return {
      id: message.id,
      channelId: message.channelId,
      guildId: message.guildId ?? undefined,
      authorId: message.author.id,
      content: message.content,
      mentionedUserIds: Array.from(message.mentions.users.keys()),
      mentionedRoleIds: Array.from(message.mentions.roles.keys()),
      reactions,
    };
  }
}
