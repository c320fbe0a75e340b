import {
  Injectable,
  Logger,
  OnApplicationBootstrap,
  OnApplicationShutdown,
} from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { EventEmitter2 } from '@nestjs/event-emitter';
import {
  Client,
  Events,
  GatewayIntentBits,
  Message,
  MessageReaction,
  PartialMessage,
  PartialMessageReaction,
  PartialUser,
  Partials,
  User,
} from 'discord.js';
import { ChatSession } from '../interfaces/chat-session.interface';
import {
  CHAT_EVENTS,
  MessageCreatedEvent,
  MessageUpdatedEvent,
  ReactionAddedEvent,
} from '../interfaces/chat-events.interface';
import { MessageSnapshot } from '../../rules/interfaces/message-snapshot.interface';
import { RelayConfig } from '../../config/relay-config.interface';
import { EmojiUtil } from '../../common/utils/emoji.util';
import { errorMessage } from '../../common/utils/error.util';
import { DiscordSnapshotUtil } from './discord-snapshot.util';

const LOGIN_TIMEOUT_MS = 30000;

/**
 * Single bot session on the Discord gateway. Inbound events are republished
 * as chat events; outbound calls go through the ChatSession methods.
 */
@Injectable()
export class DiscordGateway
  implements ChatSession, OnApplicationBootstrap, OnApplicationShutdown
{
  private readonly logger = new Logger(DiscordGateway.name);
  readonly client: Client;
  private connected = false;

  constructor(
    private readonly eventEmitter: EventEmitter2,
    private readonly configService: ConfigService,
  ) {
    this.client = new Client({
      intents: [
        GatewayIntentBits.Guilds,
        GatewayIntentBits.GuildMessages,
        GatewayIntentBits.MessageContent,
        GatewayIntentBits.DirectMessages,
        GatewayIntentBits.GuildMessageReactions,
        GatewayIntentBits.DirectMessageReactions,
      ],
      partials: [Partials.Message, Partials.Channel, Partials.Reaction],
    });
    this.setupEventHandlers();
  }

  async onApplicationBootstrap(): Promise<void> {
    const token = this.configService.get<RelayConfig>('relay')?.discordToken;
    if (!token) {
      throw new Error('Discord token is missing from configuration');
    }

    let timer: NodeJS.Timeout | undefined;
    try {
      await Promise.race([
        this.client.login(token),
        new Promise<never>((_, reject) => {
          timer = setTimeout(
            () => reject(new Error('Discord login timeout')),
            LOGIN_TIMEOUT_MS,
          );
        }),
      ]);
    } catch (error) {
      this.logger.error(`Failed to connect to Discord: ${errorMessage(error)}`);
      await this.client.destroy();
      throw error;
    } finally {
      clearTimeout(timer);
    }

    this.logger.log('Discord connection established');
  }

  async onApplicationShutdown(): Promise<void> {
    this.logger.log('Shutting down Discord session...');
    this.connected = false;
    try {
      await this.client.destroy();
    } catch (error) {
      this.logger.error(
        `Error closing Discord connection: ${errorMessage(error)}`,
      );
    }
  }

  getBotUserId(): string | undefined {
    return this.client.user?.id;
  }

  isConnected(): boolean {
    return this.connected && this.client.isReady();
  }

  async fetchMessage(
    channelId: string,
    messageId: string,
  ): Promise<MessageSnapshot> {
    const message = await this.fetchDiscordMessage(channelId, messageId);
    return DiscordSnapshotUtil.toSnapshot(message);
  }

  async addReaction(
    channelId: string,
    messageId: string,
    emoji: string,
  ): Promise<void> {
    const message = await this.fetchDiscordMessage(channelId, messageId, false);
    await message.react(EmojiUtil.toReactionIdentifier(emoji));
    this.logger.debug(`Discord reaction sent: ${emoji} to message ${messageId}`);
  }

  /**
   * `force` bypasses the message cache so reaction data is current.
   */
  private async fetchDiscordMessage(
    channelId: string,
    messageId: string,
    force = true,
  ): Promise<Message> {
    const channel = await this.client.channels.fetch(channelId);
    if (!channel || !channel.isTextBased()) {
      throw new Error(`Channel ${channelId} not found or not a text channel`);
    }
    return channel.messages.fetch({ message: messageId, force });
  }

  private setupEventHandlers(): void {
    this.client.once(Events.ClientReady, (readyClient) => {
      this.connected = true;
      this.logger.log(`Discord ready: ${readyClient.user.tag}`);
    });

    this.client.on(Events.MessageCreate, (message: Message) => {
      this.publish<MessageCreatedEvent>(CHAT_EVENTS.MESSAGE_CREATED, () => ({
        message: DiscordSnapshotUtil.toSnapshot(message),
      }));
    });

    this.client.on(
      Events.MessageUpdate,
      (_oldMessage: unknown, newMessage: Message | PartialMessage) => {
        this.publish<MessageUpdatedEvent>(CHAT_EVENTS.MESSAGE_UPDATED, () => ({
          channelId: newMessage.channelId,
          messageId: newMessage.id,
          authorId: newMessage.author?.id,
        }));
      },
    );

    this.client.on(
      Events.MessageReactionAdd,
      (
        reaction: MessageReaction | PartialMessageReaction,
        user: User | PartialUser,
      ) => {
        this.publish<ReactionAddedEvent>(CHAT_EVENTS.REACTION_ADDED, () => ({
          channelId: reaction.message.channelId,
          messageId: reaction.message.id,
          userId: user.id,
          emoji: reaction.emoji.name ?? '',
        }));
      },
    );

    this.client.on(Events.Error, (error: Error) => {
      this.logger.error(`Discord error: ${error.message}`);
    });

    this.client.on(Events.ShardDisconnect, () => {
      this.logger.warn('Discord disconnected');
      this.connected = false;
    });

    this.client.on(Events.ShardResume, () => {
      this.logger.log('Discord connection resumed');
      this.connected = true;
    });

    this.client.on(Events.ShardReady, () => {
      this.logger.log('Discord session re-established');
      this.connected = true;
    });
  }

  private publish<T>(event: string, build: () => T): void {
    try {
      this.eventEmitter.emit(event, build());
    } catch (error) {
      this.logger.error(
        `Error publishing Discord event ${event}: ${errorMessage(error)}`,
      );
    }
  }
}
