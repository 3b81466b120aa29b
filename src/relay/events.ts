import type { BotCommand, ChatEvent, InboundMessage } from '../types';

const COMMANDS: readonly BotCommand[] = ['start', 'help'];

function isBotCommand(name: string): name is BotCommand {
    return (COMMANDS as readonly string[]).includes(name);
}

/**
 * Sorts an inbound message into one of the event kinds the relay knows.
 * `/start` and `/help` (optionally as `/help@somebot`) are commands; any
 * other slash command is ignored, everything else is text for the AI.
 */
export function classifyMessage(message: InboundMessage): ChatEvent {
    const text = message.text.trim();
    if (!text) return { kind: 'ignored', message, reason: 'empty text' };

    const match = text.match(/^\/([a-z0-9_]+)(?:@\w+)?(?:\s|$)/i);
    if (match) {
        const name = match[1].toLowerCase();
        if (isBotCommand(name)) return { kind: 'command', command: name, message };
        return { kind: 'ignored', message, reason: `unknown command /${name}` };
    }

    return { kind: 'text', message };
}
