import { Test, TestingModule } from '@nestjs/testing';
import { ConfigService } from '@nestjs/config';
import { EventEmitter2 } from '@nestjs/event-emitter';
import { AcknowledgementTracker } from './acknowledgement-tracker.service';
import { TrackedNotificationStore } from './tracked-notification.store';
import {
  TRACKER_EVENTS,
  TrackedNotification,
} from './tracked-notification.interface';
import { NOTIFICATION_SERVICE } from '../interfaces/notification-service.interface';
import { CHAT_SESSION } from '../../chat/interfaces/chat-session.interface';

describe('AcknowledgementTracker', () => {
  let tracker: AcknowledgementTracker;
  let store: TrackedNotificationStore;

  const mockNotificationService = {
    send: jest.fn(),
    getReceiptStatus: jest.fn(),
  };

  const mockChatSession = {
    getBotUserId: jest.fn().mockReturnValue('bot-1'),
    fetchMessage: jest.fn(),
    addReaction: jest.fn(),
    isConnected: jest.fn().mockReturnValue(true),
  };

  const mockEventEmitter = {
    emit: jest.fn(),
  };

  const EXPIRES_AT = 1_700_000_000_000;

  const tracked = (
    receiptId: string,
    overrides: Partial<TrackedNotification> = {},
  ): TrackedNotification => ({
    sourceMessageId: `msg-${receiptId}`,
    sourceChannelId: 'channel-1',
    receiptId,
    ackEmoji: '✅',
    expiresAt: EXPIRES_AT,
    ...overrides,
  });

  beforeEach(async () => {
    jest.clearAllMocks();
    mockChatSession.addReaction.mockResolvedValue(undefined);

    const module: TestingModule = await Test.createTestingModule({
      providers: [
        AcknowledgementTracker,
        TrackedNotificationStore,
        { provide: NOTIFICATION_SERVICE, useValue: mockNotificationService },
        { provide: CHAT_SESSION, useValue: mockChatSession },
        { provide: EventEmitter2, useValue: mockEventEmitter },
        {
          provide: ConfigService,
          useValue: new ConfigService({ app: { ackPollIntervalMs: 1000 } }),
        },
      ],
    }).compile();

    tracker = module.get<AcknowledgementTracker>(AcknowledgementTracker);
    store = module.get<TrackedNotificationStore>(TrackedNotificationStore);
  });

  afterEach(() => {
    tracker.stop();
    jest.useRealTimers();
  });

  describe('register', () => {
    it('should store the notification and announce it', () => {
      tracker.register(tracked('r1'));

      expect(store.has('r1')).toBe(true);
      expect(tracker.trackedCount).toBe(1);
      expect(mockEventEmitter.emit).toHaveBeenCalledWith(
        TRACKER_EVENTS.TRACKED,
        expect.objectContaining({ notification: tracked('r1') }),
      );
    });
  });

  describe('pollOnce', () => {
    it('should do nothing when nothing is tracked', async () => {
      await tracker.pollOnce(EXPIRES_AT);

      expect(mockNotificationService.getReceiptStatus).not.toHaveBeenCalled();
    });

    it('should keep a pending entry one second before expiry', async () => {
      tracker.register(tracked('r1'));
      mockNotificationService.getReceiptStatus.mockResolvedValue('pending');

      await tracker.pollOnce(EXPIRES_AT - 1000);

      expect(mockNotificationService.getReceiptStatus).toHaveBeenCalledWith(
        'r1',
      );
      expect(store.has('r1')).toBe(true);
      expect(mockChatSession.addReaction).not.toHaveBeenCalled();
    });

    it('should expire an entry past its expiry without querying it', async () => {
      tracker.register(tracked('r1'));

      await tracker.pollOnce(EXPIRES_AT + 1000);

      expect(mockNotificationService.getReceiptStatus).not.toHaveBeenCalled();
      expect(store.has('r1')).toBe(false);
      expect(mockChatSession.addReaction).not.toHaveBeenCalled();
      expect(mockEventEmitter.emit).toHaveBeenCalledWith(
        TRACKER_EVENTS.EXPIRED,
        { notification: tracked('r1'), at: EXPIRES_AT + 1000 },
      );
    });

    it('should expire an entry exactly at its expiry time', async () => {
      tracker.register(tracked('r1'));

      await tracker.pollOnce(EXPIRES_AT);

      expect(store.has('r1')).toBe(false);
      expect(mockNotificationService.getReceiptStatus).not.toHaveBeenCalled();
    });

    it('should react exactly once when acknowledged', async () => {
      tracker.register(tracked('r1'));
      mockNotificationService.getReceiptStatus.mockResolvedValue(
        'acknowledged',
      );

      await tracker.pollOnce(EXPIRES_AT - 5000);
      await tracker.pollOnce(EXPIRES_AT - 4000);

      expect(mockChatSession.addReaction).toHaveBeenCalledTimes(1);
      expect(mockChatSession.addReaction).toHaveBeenCalledWith(
        'channel-1',
        'msg-r1',
        '✅',
      );
      expect(mockNotificationService.getReceiptStatus).toHaveBeenCalledTimes(1);
      expect(store.has('r1')).toBe(false);
    });

    it('should not react when acknowledged without an ack emoji', async () => {
      tracker.register(tracked('r1', { ackEmoji: undefined }));
      mockNotificationService.getReceiptStatus.mockResolvedValue(
        'acknowledged',
      );

      await tracker.pollOnce(EXPIRES_AT - 5000);

      expect(mockChatSession.addReaction).not.toHaveBeenCalled();
      expect(store.has('r1')).toBe(false);
    });

    it('should remove failed receipts without reacting', async () => {
      tracker.register(tracked('r1'));
      mockNotificationService.getReceiptStatus.mockResolvedValue('failed');

      await tracker.pollOnce(EXPIRES_AT - 5000);

      expect(store.has('r1')).toBe(false);
      expect(mockChatSession.addReaction).not.toHaveBeenCalled();
      expect(mockEventEmitter.emit).toHaveBeenCalledWith(
        TRACKER_EVENTS.FAILED,
        expect.objectContaining({ notification: tracked('r1') }),
      );
    });

    it('should keep entries whose query fails', async () => {
      tracker.register(tracked('r1'));
      mockNotificationService.getReceiptStatus.mockRejectedValue(
        new Error('timeout of 10000ms exceeded'),
      );

      await tracker.pollOnce(EXPIRES_AT - 5000);

      expect(store.has('r1')).toBe(true);
    });

    it('should keep the entry removed when the ack reaction fails', async () => {
      tracker.register(tracked('r1'));
      mockNotificationService.getReceiptStatus.mockResolvedValue(
        'acknowledged',
      );
      mockChatSession.addReaction.mockRejectedValue(new Error('Missing Access'));

      await expect(tracker.pollOnce(EXPIRES_AT - 5000)).resolves.toBeUndefined();
      expect(store.has('r1')).toBe(false);
    });

    it('should resolve each entry independently', async () => {
      tracker.register(tracked('acked'));
      tracker.register(tracked('waiting'));
      tracker.register(tracked('old', { expiresAt: EXPIRES_AT - 10_000 }));
      mockNotificationService.getReceiptStatus.mockImplementation(
        async (receiptId: string) =>
          receiptId === 'acked' ? 'acknowledged' : 'pending',
      );

      await tracker.pollOnce(EXPIRES_AT - 5000);

      expect(store.snapshot().map((n) => n.receiptId)).toEqual(['waiting']);
      expect(mockNotificationService.getReceiptStatus).toHaveBeenCalledTimes(2);
      expect(mockChatSession.addReaction).toHaveBeenCalledTimes(1);
    });
  });

  describe('start/stop', () => {
    it('should poll on the configured interval until stopped', async () => {
      jest.useFakeTimers();
      jest.setSystemTime(EXPIRES_AT - 60_000);
      tracker.register(tracked('r1'));
      mockNotificationService.getReceiptStatus.mockResolvedValue('pending');

      tracker.start();
      expect(tracker.isRunning()).toBe(true);

      await jest.advanceTimersByTimeAsync(1000);
      expect(mockNotificationService.getReceiptStatus).toHaveBeenCalledTimes(1);

      await jest.advanceTimersByTimeAsync(1000);
      expect(mockNotificationService.getReceiptStatus).toHaveBeenCalledTimes(2);

      tracker.stop();
      expect(tracker.isRunning()).toBe(false);

      await jest.advanceTimersByTimeAsync(5000);
      expect(mockNotificationService.getReceiptStatus).toHaveBeenCalledTimes(2);
    });

    it('should not start a second interval', async () => {
      jest.useFakeTimers();
      jest.setSystemTime(EXPIRES_AT - 60_000);
      tracker.register(tracked('r1'));
      mockNotificationService.getReceiptStatus.mockResolvedValue('pending');

      tracker.start(1000);
      tracker.start(1000);
      await jest.advanceTimersByTimeAsync(1000);

      expect(mockNotificationService.getReceiptStatus).toHaveBeenCalledTimes(1);
    });

    it('should skip ticks while a poll is still running', async () => {
      jest.useFakeTimers();
      jest.setSystemTime(EXPIRES_AT - 60_000);
      tracker.register(tracked('r1'));
      let release: (status: string) => void = () => undefined;
      mockNotificationService.getReceiptStatus.mockReturnValue(
        new Promise((resolve) => {
          release = resolve;
        }),
      );

      tracker.start(1000);
      await jest.advanceTimersByTimeAsync(3000);

      expect(mockNotificationService.getReceiptStatus).toHaveBeenCalledTimes(1);
      release('pending');
    });
  });
});
