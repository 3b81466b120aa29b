export interface InboundMessage {
    chatId: string;
    senderId: string;
    senderName?: string;
    text: string;
    timestamp: Date;
}

export interface OutboundReply {
    chatId: string;
    text: string;
}

export type BotCommand = 'start' | 'help';

export type ChatEvent =
    | { kind: 'text'; message: InboundMessage }
    | { kind: 'command'; command: BotCommand; message: InboundMessage }
    | { kind: 'ignored'; message: InboundMessage; reason: string };

export type RelayOutcome =
    | { status: 'replied'; reply: OutboundReply }
    | { status: 'skipped'; reason: string }
    | { status: 'failed'; error: unknown; fallbackSent: boolean };

/** Where a reply for one inbound message goes. Built by the transport per event. */
export interface ReplyChannel {
    send(reply: OutboundReply): Promise<void>;
    sendTyping?(): Promise<void>;
}

export interface CompletionClient {
    readonly provider: string;
    complete(prompt: string): Promise<string>;
}

export interface Transport {
    readonly platform: string;
    start(): Promise<void>;
    stop(): Promise<void>;
}

export type Logger = Pick<Console, 'log' | 'warn' | 'error'>;
