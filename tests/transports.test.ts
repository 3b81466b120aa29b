import { describe, it, expect, vi } from 'vitest';
import { Relay } from '../src/relay/relay';
import {
    acceptsOrigin,
    isAddressedToBot,
    stripBotMention,
    toInboundMessage as toDiscordInbound,
} from '../src/transports/discord';
import { splitMessage } from '../src/transports/split';
import {
    describeBotError,
    relayTextMessage,
    toInboundMessage,
    type TelegramSender,
} from '../src/transports/telegram';
import type { Logger } from '../src/types';

function silentLogger(): Logger {
    return { log: vi.fn(), warn: vi.fn(), error: vi.fn() };
}

function relayAnswering(answer: string, logger: Logger) {
    const complete = vi.fn<(prompt: string) => Promise<string>>().mockResolvedValue(answer);
    const relay = new Relay({ ai: { provider: 'fake', complete }, botName: 'Testbot', fallbackReply: null, logger });
    return { relay, complete };
}

describe('splitMessage', () => {
    it('keeps short text whole', () => {
        expect(splitMessage('  short  ', 10)).toEqual(['short']);
    });

    it('returns nothing for blank text', () => {
        expect(splitMessage(' \n ', 10)).toEqual([]);
    });

    it('prefers to cut at a newline', () => {
        expect(splitMessage('aaaa\nbbbb\ncccc', 10)).toEqual(['aaaa\nbbbb', 'cccc']);
    });

    it('hard-cuts text without newlines', () => {
        expect(splitMessage('abcdefghijklm', 5)).toEqual(['abcde', 'fghij', 'klm']);
    });

    it('does not cut an emoji in half', () => {
        const parts = splitMessage('a' + '\u{1F600}'.repeat(3), 4);

        expect(parts).toEqual(['a\u{1F600}', '\u{1F600}\u{1F600}']);
    });
});

describe('Discord origin filters', () => {
    const origin = { authorIsBot: false, guildId: '111', channelId: '222' };
    const noFilters = { triggers: [] };

    it('drops messages written by bots', () => {
        expect(acceptsOrigin({ ...origin, authorIsBot: true }, noFilters)).toBe(false);
        expect(acceptsOrigin(origin, noFilters)).toBe(true);
    });

    it('keeps only the configured guild', () => {
        const options = { guildId: '111', triggers: [] };
        expect(acceptsOrigin(origin, options)).toBe(true);
        expect(acceptsOrigin({ ...origin, guildId: '999' }, options)).toBe(false);
        expect(acceptsOrigin({ ...origin, guildId: null }, options)).toBe(false);
    });

    it('keeps only the configured channel', () => {
        const options = { channelId: '222', triggers: [] };
        expect(acceptsOrigin(origin, options)).toBe(true);
        expect(acceptsOrigin({ ...origin, channelId: '333' }, options)).toBe(false);
    });
});

describe('Discord addressing', () => {
    const base = { content: 'nice weather', isDirect: false, mentioned: false, repliedToBot: false };

    it('ignores server chatter not aimed at the bot', () => {
        expect(isAddressedToBot(base, [])).toBe(false);
        expect(isAddressedToBot(base, ['bot'])).toBe(false);
    });

    it('answers direct messages, mentions and replies', () => {
        expect(isAddressedToBot({ ...base, isDirect: true }, [])).toBe(true);
        expect(isAddressedToBot({ ...base, mentioned: true }, [])).toBe(true);
        expect(isAddressedToBot({ ...base, repliedToBot: true }, [])).toBe(true);
    });

    it('answers messages containing a trigger word', () => {
        expect(isAddressedToBot({ ...base, content: "Hey BOT, what's up" }, ['bot'])).toBe(true);
    });

    it("strips only the bot's own mention", () => {
        expect(stripBotMention('<@123> hello  there', '123')).toBe('hello  there');
        expect(stripBotMention('hey <@123> there', '123')).toBe('hey there');
        expect(stripBotMention('<@!123>hi <@456>', '123')).toBe('hi <@456>');
        expect(stripBotMention('<@123>', '123')).toBe('');
    });

    it('keeps line breaks and indentation of the rest of the message', () => {
        const content = '<@1> fix this:\n```\nif (a) {\n    b();\n}\n```';

        expect(stripBotMention(content, '1')).toBe('fix this:\n```\nif (a) {\n    b();\n}\n```');
    });

    it('builds the inbound message from the channel and author', () => {
        const inbound = toDiscordInbound(
            {
                channelId: '222',
                authorId: '42',
                displayName: 'Ada',
                content: '<@123> hello',
                createdAt: new Date(0),
            },
            '123',
        );

        expect(inbound).toEqual({
            chatId: '222',
            senderId: '42',
            senderName: 'Ada',
            text: 'hello',
            timestamp: new Date(0),
        });
    });

    it('skips a message that only mentions the bot', async () => {
        const { relay, complete } = relayAnswering('Hi there!', silentLogger());
        const send = vi.fn(async () => {});
        const inbound = toDiscordInbound(
            { channelId: '222', authorId: '42', displayName: 'Ada', content: '<@!123>', createdAt: new Date(0) },
            '123',
        );

        const outcome = await relay.handle(inbound, { send });

        expect(outcome).toEqual({ status: 'skipped', reason: 'empty text' });
        expect(complete).not.toHaveBeenCalled();
        expect(send).not.toHaveBeenCalled();
    });
});

describe('Telegram messages', () => {
    it('maps a text message to an inbound message', () => {
        const inbound = toInboundMessage({
            chat: { id: -100 },
            from: { id: 42, first_name: 'Ada' },
            text: 'hello',
            date: 1700000000,
        });

        expect(inbound).toEqual({
            chatId: '-100',
            senderId: '42',
            senderName: 'Ada',
            text: 'hello',
            timestamp: new Date(1700000000000),
        });
    });

    it('falls back to the chat id when there is no sender', () => {
        const inbound = toInboundMessage({ chat: { id: 7 }, text: 'hello', date: 0 });
        expect(inbound.senderId).toBe('7');
        expect(inbound.senderName).toBeUndefined();
    });

    it('describes plain errors by their message', () => {
        expect(describeBotError(new Error('socket hang up'))).toBe('socket hang up');
        expect(describeBotError('odd')).toBe('odd');
    });
});

describe('Telegram relaying', () => {
    function fakeSender() {
        return {
            sendMessage: vi.fn<TelegramSender['sendMessage']>().mockResolvedValue(true),
            sendChatAction: vi.fn<TelegramSender['sendChatAction']>().mockResolvedValue(true),
        };
    }

    const message = (text: string) => ({
        chat: { id: -100 },
        from: { id: 42, first_name: 'Ada' },
        text,
        date: 1700000000,
    });

    it('relays a text message and replies in the same chat', async () => {
        const { relay, complete } = relayAnswering('Hi there!', silentLogger());
        const sender = fakeSender();

        const outcome = await relayTextMessage(relay, sender, message('hello'), silentLogger());

        expect(complete).toHaveBeenCalledWith('hello');
        expect(sender.sendChatAction).toHaveBeenCalledWith(-100, 'typing');
        expect(sender.sendMessage).toHaveBeenCalledTimes(1);
        expect(sender.sendMessage).toHaveBeenCalledWith('-100', 'Hi there!');
        expect(outcome.status).toBe('replied');
    });

    it('splits replies over the Telegram limit', async () => {
        const { relay } = relayAnswering('x'.repeat(5000), silentLogger());
        const sender = fakeSender();

        await relayTextMessage(relay, sender, message('write a lot'), silentLogger());

        expect(sender.sendMessage).toHaveBeenCalledTimes(2);
        expect(sender.sendMessage).toHaveBeenNthCalledWith(1, '-100', 'x'.repeat(4096));
        expect(sender.sendMessage).toHaveBeenNthCalledWith(2, '-100', 'x'.repeat(904));
    });

    it('logs and sends nothing for blank text', async () => {
        const { relay, complete } = relayAnswering('Hi there!', silentLogger());
        const sender = fakeSender();
        const logger = silentLogger();

        const outcome = await relayTextMessage(relay, sender, message('   '), logger);

        expect(outcome).toEqual({ status: 'skipped', reason: 'empty text' });
        expect(complete).not.toHaveBeenCalled();
        expect(sender.sendChatAction).not.toHaveBeenCalled();
        expect(sender.sendMessage).not.toHaveBeenCalled();
        expect(logger.log).toHaveBeenCalledWith('Skipped message in -100: empty text');
    });
});
