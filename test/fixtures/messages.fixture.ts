import { MessageSnapshot } from '../../src/rules/interfaces/message-snapshot.interface';

export const BOT_USER_ID = 'bot-1';

export const createTestMessage = (
  overrides: Partial<MessageSnapshot> = {},
): MessageSnapshot => ({
  id: 'M1',
  channelId: 'C1',
  guildId: 'G1',
  authorId: 'user-1',
  content: 'queue is backing up',
  mentionedUserIds: [],
  mentionedRoleIds: [],
  reactions: [],
  ...overrides,
});
