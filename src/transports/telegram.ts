import { Bot, GrammyError, HttpError } from 'grammy';
import type { Relay } from '../relay/relay';
import type { InboundMessage, Logger, RelayOutcome, ReplyChannel, Transport } from '../types';
import { splitMessage } from './split';

export const TELEGRAM_MESSAGE_LIMIT = 4096;

/** The parts of a Telegram text message the relay reads. */
export interface TelegramTextMessage {
    chat: { id: number };
    from?: { id: number; first_name: string };
    text: string;
    date: number;
}

export function toInboundMessage(msg: TelegramTextMessage): InboundMessage {
    return {
        chatId: String(msg.chat.id),
        senderId: String(msg.from?.id ?? msg.chat.id),
        senderName: msg.from?.first_name,
        text: msg.text,
        timestamp: new Date(msg.date * 1000),
    };
}

export function describeBotError(error: unknown): string {
    if (error instanceof GrammyError) return `Telegram API error ${error.error_code}: ${error.description}`;
    if (error instanceof HttpError) return `Could not reach Telegram: ${String(error.error)}`;
    return error instanceof Error ? error.message : String(error);
}

export class TelegramTransport implements Transport {
    readonly platform = 'telegram';
    private bot: Bot;

    constructor(token: string, private relay: Relay, private logger: Logger = console) {
        this.bot = new Bot(token);

        this.bot.on('message:text', async (ctx) => {
            await relayTextMessage(this.relay, ctx.api, ctx.msg, this.logger);
        });
        this.bot.catch((err) => {
            this.logger.error(
                `Error while handling update ${err.ctx.update.update_id}: ${describeBotError(err.error)}`,
            );
        });
    }

    /** Resolves once polling stops. */
    async start(): Promise<void> {
        await this.bot.start({
            drop_pending_updates: true,
            onStart: (me) => this.logger.log(`Logged in as @${me.username}`),
        });
    }

    async stop(): Promise<void> {
        await this.bot.stop();
    }

}

/** The two Bot API calls a reply needs; grammY's `Api` satisfies it. */
export interface TelegramSender {
    sendMessage(chatId: number | string, text: string): Promise<unknown>;
    sendChatAction(chatId: number | string, action: 'typing'): Promise<unknown>;
}

export async function relayTextMessage(
    relay: Relay,
    sender: TelegramSender,
    msg: TelegramTextMessage,
    logger: Logger = console,
): Promise<RelayOutcome> {
    const outcome = await relay.handle(toInboundMessage(msg), replyChannel(sender, msg.chat.id));
    if (outcome.status === 'skipped') {
        logger.log(`Skipped message in ${msg.chat.id}: ${outcome.reason}`);
    }
    return outcome;
}

function replyChannel(sender: TelegramSender, chatId: number): ReplyChannel {
    return {
        send: async (reply) => {
            for (const part of splitMessage(reply.text, TELEGRAM_MESSAGE_LIMIT)) {
                await sender.sendMessage(reply.chatId, part);
            }
        },
        sendTyping: async () => {
            await sender.sendChatAction(chatId, 'typing');
        },
    };
}
