import TelegramBot from 'node-telegram-bot-api';
import { MessageForwarder } from './message-forwarder.js';
import type {
  ForwardOutcome,
  ForwardingStorePort,
  IncomingMessage,
  MessageSenderPort,
  SendOptions,
} from './message-forwarder.js';

export function createTelegramBot(token: string): TelegramBot {
  return new TelegramBot(token, { polling: false });
}

/** Maps a Telegram update message to the forwarder's input. */
export function toIncomingMessage(msg: TelegramBot.Message): IncomingMessage {
  const from = msg.from;
  const fullName = from ? [from.first_name, from.last_name].filter(Boolean).join(' ') : '';

  return {
    chatId: String(msg.chat.id),
    chatType: msg.chat.type,
    threadId: msg.message_thread_id ?? null,
    messageId: msg.message_id,
    text: msg.text ?? null,
    sender: from
      ? { name: fullName || null, username: from.username ?? null, id: from.id }
      : null,
  };
}

/**
 * Binds a node-telegram-bot-api client to the forwarder: incoming messages
 * go through MessageForwarder, outgoing ones through this class.
 */
export class TelegramRelay implements MessageSenderPort {
  private readonly forwarder: MessageForwarder;

  constructor(
    private readonly bot: TelegramBot,
    store: ForwardingStorePort,
  ) {
    this.forwarder = new MessageForwarder(store, this);
  }

  async sendMessage(chatId: string, text: string, options: SendOptions): Promise<void> {
    await this.bot.sendMessage(chatId, text, {
      message_thread_id: options.threadId,
      reply_to_message_id: options.replyToMessageId,
    });
  }

  /** Handles one update; failures are logged so polling keeps going. */
  async onMessage(msg: TelegramBot.Message): Promise<ForwardOutcome | null> {
    try {
      return await this.forwarder.handle(toIncomingMessage(msg));
    } catch (err) {
      console.error(`[forwarder] Failed to handle message ${msg.message_id} from chat ${msg.chat.id}:`, err);
      return null;
    }
  }

  async start(): Promise<void> {
    this.bot.on('message', (msg) => {
      void this.onMessage(msg);
    });
    this.bot.on('polling_error', (err) => {
      console.error('[forwarder] Polling error:', err.message);
    });
    await this.bot.startPolling();
    console.log('[forwarder] Polling for messages...');
  }

  async stop(): Promise<void> {
    await this.bot.stopPolling();
  }
}
