import { Test, TestingModule } from '@nestjs/testing';
import { EventRouter } from './event-router.service';
import { CHAT_SESSION } from '../chat/interfaces/chat-session.interface';
import { NOTIFICATION_SERVICE } from '../notifications/interfaces/notification-service.interface';
import { NotificationDispatcher } from '../notifications/notification-dispatcher.service';
import { AcknowledgementTracker } from '../notifications/tracking/acknowledgement-tracker.service';
import { ConditionEvaluator } from '../rules/condition-evaluator';
import { RuleSelector } from '../rules/rule-selector.service';
import { RulesService } from '../rules/rules.service';
import { Rule } from '../rules/interfaces/rule.interface';
import { MessageSnapshot } from '../rules/interfaces/message-snapshot.interface';

describe('EventRouter', () => {
  let router: EventRouter;
  let selector: RuleSelector;

  const BOT_ID = 'bot-1';

  const opsRule: Rule = {
    name: 'ops',
    conditions: { channelId: 'C1' },
    actions: { pushoverDestination: 'U1', priority: 0, reactionEmoji: '✅' },
  };

  const mockRulesService = {
    rules: [opsRule] as Rule[],
    priorityOrder: 'ascending',
  };

  const mockChatSession = {
    getBotUserId: jest.fn(),
    fetchMessage: jest.fn(),
    addReaction: jest.fn(),
    isConnected: jest.fn().mockReturnValue(true),
  };

  const mockNotificationService = {
    send: jest.fn(),
    getReceiptStatus: jest.fn(),
  };

  const mockTracker = { register: jest.fn() };

  const message = (overrides: Partial<MessageSnapshot> = {}): MessageSnapshot => ({
    id: 'M1',
    channelId: 'C1',
    guildId: 'G1',
    authorId: 'user-1',
    content: 'server down',
    mentionedUserIds: [],
    mentionedRoleIds: [],
    reactions: [],
    ...overrides,
  });

  beforeEach(async () => {
    jest.clearAllMocks();
    mockRulesService.rules = [opsRule];
    mockChatSession.getBotUserId.mockReturnValue(BOT_ID);
    mockChatSession.addReaction.mockResolvedValue(undefined);
    mockNotificationService.send.mockResolvedValue({});

    const module: TestingModule = await Test.createTestingModule({
      providers: [
        EventRouter,
        RuleSelector,
        ConditionEvaluator,
        NotificationDispatcher,
        { provide: RulesService, useValue: mockRulesService },
        { provide: CHAT_SESSION, useValue: mockChatSession },
        { provide: NOTIFICATION_SERVICE, useValue: mockNotificationService },
        { provide: AcknowledgementTracker, useValue: mockTracker },
      ],
    }).compile();

    router = module.get<EventRouter>(EventRouter);
    selector = module.get<RuleSelector>(RuleSelector);
  });

  describe('handleMessageCreate', () => {
    it('should notify and react for a matching new message', async () => {
      const outcome = await router.handleMessageCreate({ message: message() });

      expect(outcome).toMatchObject({ notification: 'sent', reaction: 'applied' });
      expect(mockNotificationService.send).toHaveBeenCalledTimes(1);
      expect(mockChatSession.addReaction).toHaveBeenCalledWith('C1', 'M1', '✅');
      expect(mockChatSession.fetchMessage).not.toHaveBeenCalled();
    });

    it('should ignore a baseline on new messages', async () => {
      const outcome = await router.handleMessageCreate({
        message: message({ reactions: [{ emoji: '✅', me: true }] }),
      });

      expect(outcome?.notification).toBe('sent');
    });

    it('should ignore messages written by the bot', async () => {
      const select = jest.spyOn(selector, 'select');

      const outcome = await router.handleMessageCreate({
        message: message({ authorId: BOT_ID }),
      });

      expect(outcome).toBeUndefined();
      expect(select).not.toHaveBeenCalled();
    });

    it('should do nothing when no rule matches', async () => {
      const outcome = await router.handleMessageCreate({
        message: message({ channelId: 'C9' }),
      });

      expect(outcome).toBeUndefined();
      expect(mockNotificationService.send).not.toHaveBeenCalled();
      expect(mockChatSession.addReaction).not.toHaveBeenCalled();
    });

    it('should contain unexpected errors', async () => {
      jest.spyOn(selector, 'select').mockImplementation(() => {
        throw new Error('boom');
      });

      await expect(
        router.handleMessageCreate({ message: message() }),
      ).resolves.toBeUndefined();
    });
  });

  describe('handleMessageUpdate', () => {
    it('should suppress when the bot already reacted but still react', async () => {
      mockChatSession.fetchMessage.mockResolvedValue(
        message({ reactions: [{ emoji: '✅', me: true }] }),
      );

      const outcome = await router.handleMessageUpdate({
        channelId: 'C1',
        messageId: 'M1',
        authorId: 'user-1',
      });

      expect(mockChatSession.fetchMessage).toHaveBeenCalledWith('C1', 'M1');
      expect(outcome).toMatchObject({
        notification: 'suppressed',
        reaction: 'applied',
      });
      expect(mockNotificationService.send).not.toHaveBeenCalled();
      expect(mockChatSession.addReaction).toHaveBeenCalledWith('C1', 'M1', '✅');
    });

    it('should send a more urgent rule over an existing baseline', async () => {
      const urgentRule: Rule = {
        name: 'urgent',
        conditions: { contentIncludes: ['down'] },
        actions: { pushoverDestination: 'U1', priority: -1, reactionEmoji: '🚨' },
      };
      mockRulesService.rules = [urgentRule, opsRule];
      mockChatSession.fetchMessage.mockResolvedValue(
        message({ reactions: [{ emoji: '✅', me: true }] }),
      );

      const outcome = await router.handleMessageUpdate({
        channelId: 'C1',
        messageId: 'M1',
      });

      expect(outcome?.notification).toBe('sent');
      expect(mockNotificationService.send).toHaveBeenCalledWith(
        expect.objectContaining({ priority: -1 }),
      );
    });

    it('should ignore edits to the bot\'s own messages before fetching', async () => {
      const outcome = await router.handleMessageUpdate({
        channelId: 'C1',
        messageId: 'M1',
        authorId: BOT_ID,
      });

      expect(outcome).toBeUndefined();
      expect(mockChatSession.fetchMessage).not.toHaveBeenCalled();
    });

    it('should ignore refetched messages written by the bot', async () => {
      mockChatSession.fetchMessage.mockResolvedValue(
        message({ authorId: BOT_ID }),
      );

      const outcome = await router.handleMessageUpdate({
        channelId: 'C1',
        messageId: 'M1',
      });

      expect(outcome).toBeUndefined();
      expect(mockNotificationService.send).not.toHaveBeenCalled();
    });

    it('should stop when the message cannot be fetched', async () => {
      mockChatSession.fetchMessage.mockRejectedValue(new Error('Unknown Message'));

      const outcome = await router.handleMessageUpdate({
        channelId: 'C1',
        messageId: 'M1',
      });

      expect(outcome).toBeUndefined();
      expect(mockNotificationService.send).not.toHaveBeenCalled();
    });
  });

  describe('handleReactionAdd', () => {
    const reactionRule: Rule = {
      name: 'fire',
      conditions: { messageHasEmoji: ['🔥'] },
      actions: { pushoverDestination: 'U1', priority: 1, reactionEmoji: '👀' },
    };

    beforeEach(() => {
      mockRulesService.rules = [reactionRule];
    });

    it('should refetch and route reactions from users', async () => {
      mockChatSession.fetchMessage.mockResolvedValue(
        message({ reactions: [{ emoji: '🔥', me: false }] }),
      );

      const outcome = await router.handleReactionAdd({
        channelId: 'C1',
        messageId: 'M1',
        userId: 'user-2',
        emoji: '🔥',
      });

      expect(outcome).toMatchObject({ notification: 'sent', reaction: 'applied' });
      expect(mockChatSession.addReaction).toHaveBeenCalledWith('C1', 'M1', '👀');
    });

    it('should ignore the bot\'s own reactions', async () => {
      const outcome = await router.handleReactionAdd({
        channelId: 'C1',
        messageId: 'M1',
        userId: BOT_ID,
        emoji: '👀',
      });

      expect(outcome).toBeUndefined();
      expect(mockChatSession.fetchMessage).not.toHaveBeenCalled();
    });

    it('should suppress once the bot has reacted for the same rule', async () => {
      mockChatSession.fetchMessage.mockResolvedValue(
        message({
          reactions: [
            { emoji: '🔥', me: false },
            { emoji: '👀', me: true },
          ],
        }),
      );

      const outcome = await router.handleReactionAdd({
        channelId: 'C1',
        messageId: 'M1',
        userId: 'user-3',
        emoji: '🔥',
      });

      expect(outcome?.notification).toBe('suppressed');
      expect(mockNotificationService.send).not.toHaveBeenCalled();
    });
  });
});
