import { MessageSnapshot } from '../../rules/interfaces/message-snapshot.interface';

/**
 * Narrow view of the chat platform used by the routing engine.
 */
export interface ChatSession {
  /**
   * Bot's own user id, or undefined while the session is not ready
   */
  getBotUserId(): string | undefined;

  fetchMessage(channelId: string, messageId: string): Promise<MessageSnapshot>;

  /**
   * Adding a reaction the bot already holds is a no-op on the platform side
   */
  addReaction(
    channelId: string,
    messageId: string,
    emoji: string,
  ): Promise<void>;

  isConnected(): boolean;
}

export const CHAT_SESSION = Symbol('CHAT_SESSION');
