import * as dotenv from 'dotenv';
import { createCompletionClient } from './ai';
import { ConfigError, loadConfig, type BotConfig } from './config';
import { Relay } from './relay/relay';
import { DiscordTransport } from './transports/discord';
import { TelegramTransport } from './transports/telegram';
import type { Logger, Transport } from './types';

export function createTransport(config: BotConfig, relay: Relay, logger: Logger = console): Transport {
    switch (config.platform) {
        case 'discord':
            return new DiscordTransport(config.token, config.discord, relay, logger);
        case 'telegram':
            return new TelegramTransport(config.token, relay, logger);
    }
}

export function createRelay(config: BotConfig, logger: Logger = console): Relay {
    return new Relay({
        ai: createCompletionClient(config.ai, logger),
        botName: config.botName,
        fallbackReply: config.fallbackReply,
        logger,
    });
}

async function main(): Promise<void> {
    dotenv.config();

    let config: BotConfig;
    try {
        config = loadConfig(process.env);
    } catch (error) {
        if (error instanceof ConfigError) {
            console.error('Cannot start: configuration is incomplete.');
            for (const problem of error.problems) console.error(`  - ${problem}`);
            process.exit(1);
        }
        throw error;
    }

    const transport = createTransport(config, createRelay(config));
    console.log(`Starting ${transport.platform} relay using ${config.ai.provider} (${config.ai.model})`);

    const shutdown = (signal: string) => {
        console.log(`Received ${signal}, shutting down...`);
        transport
            .stop()
            .then(() => process.exit(0))
            .catch((error: unknown) => {
                console.error('Error during shutdown:', error);
                process.exit(1);
            });
    };
    process.once('SIGINT', () => shutdown('SIGINT'));
    process.once('SIGTERM', () => shutdown('SIGTERM'));

    await transport.start();
}

if (require.main === module) {
    main().catch((error: unknown) => {
        console.error('Bot stopped due to error:', error);
        process.exit(1);
    });
}
