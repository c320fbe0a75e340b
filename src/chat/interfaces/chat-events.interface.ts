import { MessageSnapshot } from '../../rules/interfaces/message-snapshot.interface';

export const CHAT_EVENTS = {
  MESSAGE_CREATED: 'chat.message.created',
  MESSAGE_UPDATED: 'chat.message.updated',
  REACTION_ADDED: 'chat.reaction.added',
} as const;

export interface MessageCreatedEvent {
  message: MessageSnapshot;
}

export interface MessageUpdatedEvent {
  channelId: string;
  messageId: string;
  /** Author from the update delta, absent on partial updates */
  authorId?: string;
}

export interface ReactionAddedEvent {
  channelId: string;
  messageId: string;
  userId: string;
  emoji: string;
}
