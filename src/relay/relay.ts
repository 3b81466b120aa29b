import type {
    BotCommand,
    CompletionClient,
    InboundMessage,
    Logger,
    OutboundReply,
    RelayOutcome,
    ReplyChannel,
} from '../types';
import { classifyMessage } from './events';

export interface RelayOptions {
    ai: CompletionClient;
    botName: string;
    /** Sent when the AI call fails. `null` drops the event instead. */
    fallbackReply: string | null;
    logger?: Logger;
}

function preview(text: string): string {
    return text.length > 50 ? `${text.slice(0, 50)}...` : text;
}

function describeError(error: unknown): string {
    return error instanceof Error ? error.message : String(error);
}

/**
 * Bridges one inbound chat message to one outbound reply.
 * `handle` never rejects: every failure is logged and reported in the outcome.
 */
export class Relay {
    private readonly ai: CompletionClient;
    private readonly botName: string;
    private readonly fallbackReply: string | null;
    private readonly logger: Logger;

    constructor(options: RelayOptions) {
        this.ai = options.ai;
        this.botName = options.botName;
        this.fallbackReply = options.fallbackReply;
        this.logger = options.logger ?? console;
    }

    async handle(message: InboundMessage, channel: ReplyChannel): Promise<RelayOutcome> {
        const event = classifyMessage(message);
        switch (event.kind) {
            case 'ignored':
                return { status: 'skipped', reason: event.reason };
            case 'command':
                return this.answerCommand(event.command, event.message, channel);
            case 'text':
                return this.relayText(event.message, channel);
        }
    }

    private async relayText(message: InboundMessage, channel: ReplyChannel): Promise<RelayOutcome> {
        const prompt = message.text.trim();
        this.logger.log(`Received message from ${message.senderId} in ${message.chatId}: ${preview(prompt)}`);

        await this.showTyping(message, channel);

        let completion: string;
        try {
            completion = await this.ai.complete(prompt);
        } catch (error) {
            this.logger.error(`${this.ai.provider} completion failed for chat ${message.chatId}:`, error);
            const fallbackSent = await this.sendFallback(message.chatId, channel);
            return { status: 'failed', error, fallbackSent };
        }

        const text = completion.trim();
        if (!text) {
            const error = new Error(`${this.ai.provider} returned an empty completion`);
            this.logger.error(error.message);
            const fallbackSent = await this.sendFallback(message.chatId, channel);
            return { status: 'failed', error, fallbackSent };
        }

        return this.deliver({ chatId: message.chatId, text }, channel);
    }

    private answerCommand(command: BotCommand, message: InboundMessage, channel: ReplyChannel): Promise<RelayOutcome> {
        this.logger.log(`Command /${command} from ${message.senderId} in ${message.chatId}`);
        return this.deliver({ chatId: message.chatId, text: this.commandText(command, message) }, channel);
    }

    private commandText(command: BotCommand, message: InboundMessage): string {
        switch (command) {
            case 'start': {
                const greeting = message.senderName ? `Hi ${message.senderName}!` : 'Hi!';
                return `${greeting} I'm ${this.botName}. Just send me a message and I'll reply. Use /help to see what I can do.`;
            }
            case 'help':
                return [
                    'Available commands:',
                    `/start - Start a conversation with ${this.botName}`,
                    '/help - Show this help message',
                    '',
                    'Any other message is answered by the AI.',
                ].join('\n');
        }
    }

    private async deliver(reply: OutboundReply, channel: ReplyChannel): Promise<RelayOutcome> {
        try {
            await channel.send(reply);
            this.logger.log(`Sent reply to ${reply.chatId}: ${preview(reply.text)}`);
            return { status: 'replied', reply };
        } catch (error) {
            this.logger.error(`Could not send reply to ${reply.chatId}:`, error);
            return { status: 'failed', error, fallbackSent: false };
        }
    }

    private async sendFallback(chatId: string, channel: ReplyChannel): Promise<boolean> {
        if (this.fallbackReply === null) return false;
        try {
            await channel.send({ chatId, text: this.fallbackReply });
            return true;
        } catch (error) {
            this.logger.error(`Could not send fallback reply to ${chatId}: ${describeError(error)}`);
            return false;
        }
    }

    private async showTyping(message: InboundMessage, channel: ReplyChannel): Promise<void> {
        if (!channel.sendTyping) return;
        try {
            await channel.sendTyping();
        } catch (error) {
            this.logger.warn(`Could not show typing indicator in ${message.chatId}: ${describeError(error)}`);
        }
    }
}
