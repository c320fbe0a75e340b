export interface ReactionSnapshot {
  /** Unicode emoji or custom emoji name */
  emoji: string;
  /** True when the bot is one of the reactors */
  me: boolean;
}

/**
 * Point-in-time read of a chat message, independent of the chat client library.
 */
export interface MessageSnapshot {
  id: string;
  channelId: string;
  guildId?: string;
  authorId: string;
  content: string;
  mentionedUserIds: string[];
  mentionedRoleIds: string[];
  reactions: ReactionSnapshot[];
}
