import { Client, GatewayIntentBits, type Message, Partials } from 'discord.js';
import { EventEmitter } from 'events';
import { formatReply } from './format.js';
import { logger } from './logger.js';
import type { ParticipantId } from './types.js';

const MAX_TRACKED_MESSAGE_IDS = 100;

/** The fields of a discord.js Message the bot reads. */
export interface IncomingMessage {
  id: string;
  channelId: string;
  content: string;
  webhookId: string | null;
  author: { id: string; tag: string; bot: boolean };
}

export interface InboundEvent<M extends IncomingMessage = Message> {
  kind: 'text' | 'tip';
  /** Null for webhook posts, which have no member behind them. */
  participantId: ParticipantId | null;
  authorTag: string;
  channelId: string;
  content: string;
  message: M;
}

export type ParsedContent =
  | { kind: 'text' }
  | { kind: 'command'; name: string };

function escapeRegExp(value: string): string {
  return value.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}

/**
 * `<prefix><word>` at the start of a message is a command; anything else is
 * free text. Command names are case-insensitive.
 */
export function parseContent(content: string, commandPrefix: string): ParsedContent {
  const pattern = new RegExp(`^${escapeRegExp(commandPrefix)}([A-Za-z0-9_]+)(?:\\s|$)`);
  const match = pattern.exec(content.trim());
  if (!match) return { kind: 'text' };
  return { kind: 'command', name: match[1].toLowerCase() };
}

export interface InboundFilter {
  botUserId: string | null;
  channelId?: string;
  commandPrefix: string;
}

/**
 * Turn a gateway message into an inbound event, or null when the bot should
 * not look at it at all.
 */
export function toInboundEvent<M extends IncomingMessage>(
  message: M,
  filter: InboundFilter
): InboundEvent<M> | null {
  const isWebhook = message.webhookId !== null;

  // Ignore our own messages and other bots
  if (message.author.id === filter.botUserId) return null;
  if (message.author.bot && !isWebhook) return null;

  if (filter.channelId && message.channelId !== filter.channelId) return null;
  if (!message.content.trim()) return null;

  const parsed = parseContent(message.content, filter.commandPrefix);
  if (parsed.kind === 'command' && parsed.name !== 'tip') return null;

  return {
    kind: parsed.kind === 'command' ? 'tip' : 'text',
    participantId: isWebhook ? null : message.author.id,
    authorTag: message.author.tag,
    channelId: message.channelId,
    content: message.content,
    message,
  };
}

export interface DiscordClientOptions {
  channelId?: string;
  commandPrefix: string;
}

/**
 * Gateway connection for the bot. Emits `inbound` with an InboundEvent for
 * every message worth handling, and `ready` once logged in.
 */
export class DiscordClient extends EventEmitter {
  private client: Client;
  private _isReady: boolean = false;
  private _lastGatewayEventAt: string | null = null;
  private _repliesSent: number = 0;
  private botUserId: string | null = null;
  private processedMessages: Set<string> = new Set();
  private options: DiscordClientOptions;

  constructor(options: DiscordClientOptions) {
    super();
    this.options = options;

    this.client = new Client({
      intents: [
        GatewayIntentBits.Guilds,
        GatewayIntentBits.GuildMessages,
        GatewayIntentBits.MessageContent,
        GatewayIntentBits.DirectMessages,
      ],
      // Required for DMs
      partials: [Partials.Channel],
    });

    this.setupEventHandlers();
  }

  get isReady(): boolean {
    return this._isReady;
  }

  /** ISO time of the last ready, disconnect, resume or message event. */
  get lastGatewayEventAt(): string | null {
    return this._lastGatewayEventAt;
  }

  get repliesSent(): number {
    return this._repliesSent;
  }

  private touchGateway(): void {
    this._lastGatewayEventAt = new Date().toISOString();
  }

  private setupEventHandlers(): void {
    this.client.once('ready', () => {
      this._isReady = true;
      this.botUserId = this.client.user?.id || null;
      this.touchGateway();
      logger.info('Discord', `Ready as ${this.client.user?.tag}`);
      this.emit('ready');
    });

    this.client.on('shardDisconnect', (_event, shardId) => {
      this._isReady = false;
      this.touchGateway();
      logger.warn('Discord', `Shard ${shardId} disconnected`);
    });

    this.client.on('shardResume', (shardId) => {
      this._isReady = true;
      this.touchGateway();
      logger.info('Discord', `Shard ${shardId} resumed`);
    });

    this.client.on('messageCreate', (message) => {
      this.touchGateway();

      const event = toInboundEvent(message, {
        botUserId: this.botUserId,
        channelId: this.options.channelId,
        commandPrefix: this.options.commandPrefix,
      });
      if (!event) return;

      // Deduplicate - prevent processing same message twice
      if (this.processedMessages.has(message.id)) {
        logger.debug('Discord', `Skipping duplicate message ${message.id}`);
        return;
      }
      this.processedMessages.add(message.id);

      // Clean up old message IDs (keep last 100)
      if (this.processedMessages.size > MAX_TRACKED_MESSAGE_IDS) {
        const toDelete = Array.from(this.processedMessages).slice(0, MAX_TRACKED_MESSAGE_IDS / 2);
        toDelete.forEach(id => this.processedMessages.delete(id));
      }

      this.emit('inbound', event);
    });

    this.client.on('error', (error) => {
      // discord.js reconnects on its own; nothing to rethrow
      logger.error('Discord', 'Client error', { error: error.message });
    });
  }

  async login(token: string): Promise<void> {
    await this.client.login(token);
  }

  async destroy(): Promise<void> {
    this._isReady = false;
    await this.client.destroy();
  }

  async replyToMessage(message: Message, content: string): Promise<Message | null> {
    try {
      const sent = await message.reply(formatReply(content));
      this._repliesSent++;
      logger.debug('Discord', `Replied to message in ${message.channelId}`);
      return sent;
    } catch (error) {
      const msg = error instanceof Error ? error.message : String(error);
      logger.error('Discord', `Failed to reply to message ${message.id}`, { error: msg });
      return null;
    }
  }
}
