import { Client, GatewayIntentBits, Partials, type Message } from 'discord.js';
import type { DiscordConfig } from '../config';
import type { Relay } from '../relay/relay';
import type { InboundMessage, Logger, ReplyChannel, Transport } from '../types';
import { splitMessage } from './split';

export const DISCORD_MESSAGE_LIMIT = 2000;

export interface MessageOrigin {
    authorIsBot: boolean;
    guildId: string | null;
    channelId: string;
}

/** Drops messages from bots and, when filters are set, from other guilds and channels. */
export function acceptsOrigin(origin: MessageOrigin, options: DiscordConfig): boolean {
    if (origin.authorIsBot) return false;
    if (options.guildId && origin.guildId !== options.guildId) return false;
    if (options.channelId && origin.channelId !== options.channelId) return false;
    return true;
}

export interface Addressing {
    content: string;
    isDirect: boolean;
    mentioned: boolean;
    repliedToBot: boolean;
}

/** In servers the bot only answers when spoken to; in DMs it always answers. */
export function isAddressedToBot(addressing: Addressing, triggers: string[]): boolean {
    if (addressing.isDirect || addressing.mentioned || addressing.repliedToBot) return true;
    const lower = addressing.content.toLowerCase();
    return triggers.some((t) => lower.includes(t));
}

export function stripBotMention(content: string, botId: string): string {
    return content.replace(new RegExp(`[ \\t]*<@!?${botId}>[ \\t]*`, 'g'), ' ').trim();
}

export interface DiscordMessageFields {
    channelId: string;
    authorId: string;
    displayName: string;
    content: string;
    createdAt: Date;
}

export function toInboundMessage(fields: DiscordMessageFields, botId: string): InboundMessage {
    return {
        chatId: fields.channelId,
        senderId: fields.authorId,
        senderName: fields.displayName,
        text: stripBotMention(fields.content, botId),
        timestamp: fields.createdAt,
    };
}

export class DiscordTransport implements Transport {
    readonly platform = 'discord';
    private client: Client;

    constructor(
        private token: string,
        private options: DiscordConfig,
        private relay: Relay,
        private logger: Logger = console,
    ) {
        this.client = new Client({
            intents: [
                GatewayIntentBits.Guilds,
                GatewayIntentBits.GuildMessages,
                GatewayIntentBits.MessageContent,
                GatewayIntentBits.DirectMessages,
            ],
            partials: [Partials.Channel],
        });

        this.client.on('ready', () => {
            this.logger.log(`Logged in as ${this.client.user?.tag}`);
        });
        this.client.on('error', (error) => {
            this.logger.error('Discord client error:', error);
        });
        this.client.on('messageCreate', async (message) => {
            await this.onMessage(message);
        });
    }

    async start(): Promise<void> {
        await this.client.login(this.token);
    }

    async stop(): Promise<void> {
        await this.client.destroy();
    }

    private async onMessage(message: Message): Promise<void> {
        const origin: MessageOrigin = {
            authorIsBot: message.author.bot,
            guildId: message.guildId,
            channelId: message.channelId,
        };
        if (!acceptsOrigin(origin, this.options)) return;

        const botUser = this.client.user;
        if (!botUser) return;

        const addressing: Addressing = {
            content: message.content,
            isDirect: !message.inGuild(),
            mentioned: message.mentions.users.has(botUser.id),
            repliedToBot: await this.isReplyToBot(message, botUser.id),
        };
        if (!isAddressedToBot(addressing, this.options.triggers)) return;

        const inbound = toInboundMessage(
            {
                channelId: message.channelId,
                authorId: message.author.id,
                displayName: message.member?.displayName ?? message.author.username,
                content: message.content,
                createdAt: message.createdAt,
            },
            botUser.id,
        );
        const outcome = await this.relay.handle(inbound, this.replyChannel(message));
        if (outcome.status === 'skipped') {
            this.logger.log(`Skipped message ${message.id}: ${outcome.reason}`);
        }
    }

    private async isReplyToBot(message: Message, botId: string): Promise<boolean> {
        if (!message.reference?.messageId) return false;
        try {
            const replied = await message.fetchReference();
            return replied.author.id === botId;
        } catch (error) {
            this.logger.warn('Could not fetch referenced message:', error);
            return false;
        }
    }

    private replyChannel(message: Message): ReplyChannel {
        return {
            send: async (reply) => {
                for (const part of splitMessage(reply.text, DISCORD_MESSAGE_LIMIT)) {
                    await message.reply(part);
                }
            },
            sendTyping: async () => {
                const channel = message.channel;
                if ('sendTyping' in channel) await channel.sendTyping();
            },
        };
    }
}
