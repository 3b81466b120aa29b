import { z } from 'zod';

export type Platform = 'discord' | 'telegram';
export type AiProvider = 'ollama' | 'openai' | 'deepseek' | 'gemini';

export const DEFAULT_PERSONA = `You are a friendly, supportive chat companion. Keep replies concise but meaningful, stay warm and approachable, and answer the user's questions as well as you can. Never write long paragraphs unless asked.`;
export const DEFAULT_FALLBACK_REPLY = 'Sorry, I encountered an error while processing your request.';

const PROVIDER_DEFAULTS: Record<AiProvider, { model: string; baseUrl: string }> = {
    ollama: { model: 'llama2:7b-chat', baseUrl: 'http://localhost:11434/api/generate' },
    openai: { model: 'gpt-3.5-turbo', baseUrl: 'https://api.openai.com/v1' },
    deepseek: { model: 'deepseek-chat', baseUrl: 'https://api.deepseek.com/v1' },
    gemini: { model: 'gemini-1.5-flash', baseUrl: 'https://generativelanguage.googleapis.com/v1beta' },
};

const PROVIDER_KEY_VARS: Record<AiProvider, string | null> = {
    ollama: null,
    openai: 'OPENAI_API_KEY',
    deepseek: 'DEEPSEEK_API_KEY',
    gemini: 'GEMINI_API_KEY',
};

export interface AiConfig {
    provider: AiProvider;
    apiKey?: string;
    model: string;
    baseUrl: string;
    persona: string;
    maxTokens: number;
    temperature: number;
    timeoutMs: number;
    maxAttempts: number;
}

export interface DiscordConfig {
    guildId?: string;
    channelId?: string;
    triggers: string[];
}

export interface BotConfig {
    platform: Platform;
    token: string;
    botName: string;
    fallbackReply: string | null;
    ai: AiConfig;
    discord: DiscordConfig;
}

export class ConfigError extends Error {
    constructor(readonly problems: string[]) {
        super(`Invalid configuration: ${problems.join('; ')}`);
        this.name = 'ConfigError';
    }
}

// Blank values count as unset, the way a half-filled .env file reads.
function blankToUndefined(value: unknown): unknown {
    return typeof value === 'string' && !value.trim() ? undefined : value;
}

const optionalString = z
    .string()
    .optional()
    .transform((value) => (value && value.trim() ? value.trim() : undefined));

const platformSchema = z.preprocess(blankToUndefined, z.enum(['discord', 'telegram']).default('discord'));
const providerSchema = z.preprocess(
    blankToUndefined,
    z.enum(['ollama', 'openai', 'deepseek', 'gemini']).default('ollama'),
);

const numberSetting = <T extends z.ZodTypeAny>(schema: T) => z.preprocess(blankToUndefined, schema);

const envSchema = z.object({
    BOT_PLATFORM: platformSchema,
    DISCORD_TOKEN: optionalString,
    TELEGRAM_TOKEN: optionalString,
    AI_PROVIDER: providerSchema,
    AI_API_KEY: optionalString,
    OPENAI_API_KEY: optionalString,
    DEEPSEEK_API_KEY: optionalString,
    GEMINI_API_KEY: optionalString,
    AI_MODEL: optionalString,
    AI_BASE_URL: optionalString,
    OLLAMA_API_URL: optionalString,
    AI_MAX_TOKENS: numberSetting(z.coerce.number().int().positive().default(150)),
    AI_TEMPERATURE: numberSetting(z.coerce.number().min(0).max(2).default(0.7)),
    AI_TIMEOUT_MS: numberSetting(z.coerce.number().int().positive().default(30000)),
    AI_MAX_ATTEMPTS: numberSetting(z.coerce.number().int().min(1).max(10).default(3)),
    BOT_NAME: optionalString,
    BOT_PERSONA: optionalString,
    // Not blank-stripped: a blank fallback turns fallback replies off.
    FALLBACK_REPLY: z.string().optional(),
    TARGET_GUILD_ID: optionalString,
    TARGET_CHANNEL_ID: optionalString,
    BOT_TRIGGERS: optionalString,
});

type Env = Record<string, string | undefined>;

function isSet(value: string | undefined): boolean {
    return Boolean(value && value.trim());
}

/**
 * Checks the secrets against the raw environment so they are reported
 * even when other keys fail validation.
 */
function missingSecrets(env: Env): string[] {
    const problems: string[] = [];

    const platform = platformSchema.safeParse(env.BOT_PLATFORM);
    if (platform.success) {
        const tokenVar = platform.data === 'discord' ? 'DISCORD_TOKEN' : 'TELEGRAM_TOKEN';
        if (!isSet(env[tokenVar])) problems.push(`${tokenVar} must be set for platform ${platform.data}`);
    }

    const provider = providerSchema.safeParse(env.AI_PROVIDER);
    if (provider.success) {
        const keyVar = PROVIDER_KEY_VARS[provider.data];
        if (keyVar && !isSet(env.AI_API_KEY) && !isSet(env[keyVar])) {
            problems.push(`AI_API_KEY (or ${keyVar}) must be set for provider ${provider.data}`);
        }
    }

    return problems;
}

export function loadConfig(env: Env = process.env): BotConfig {
    const parsed = envSchema.safeParse(env);
    const problems: string[] = parsed.success
        ? []
        : parsed.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`);
    problems.push(...missingSecrets(env));
    if (!parsed.success || problems.length > 0) throw new ConfigError(problems);

    const vars = parsed.data;
    const token = vars.BOT_PLATFORM === 'discord' ? vars.DISCORD_TOKEN : vars.TELEGRAM_TOKEN;
    if (!token) throw new ConfigError([`no token for platform ${vars.BOT_PLATFORM}`]);

    const provider = vars.AI_PROVIDER;
    const apiKey = vars.AI_API_KEY ?? providerKey(vars, provider);
    const defaults = PROVIDER_DEFAULTS[provider];
    const baseUrl = vars.AI_BASE_URL ?? (provider === 'ollama' ? vars.OLLAMA_API_URL : undefined) ?? defaults.baseUrl;

    return {
        platform: vars.BOT_PLATFORM,
        token,
        botName: vars.BOT_NAME ?? 'Assistant',
        fallbackReply: resolveFallback(vars.FALLBACK_REPLY),
        ai: {
            provider,
            apiKey,
            model: vars.AI_MODEL ?? defaults.model,
            baseUrl: baseUrl.replace(/\/+$/, ''),
            persona: vars.BOT_PERSONA ?? DEFAULT_PERSONA,
            maxTokens: vars.AI_MAX_TOKENS,
            temperature: vars.AI_TEMPERATURE,
            timeoutMs: vars.AI_TIMEOUT_MS,
            maxAttempts: vars.AI_MAX_ATTEMPTS,
        },
        discord: {
            guildId: vars.TARGET_GUILD_ID,
            channelId: vars.TARGET_CHANNEL_ID,
            triggers: (vars.BOT_TRIGGERS ?? '')
                .split(',')
                .map((t) => t.trim().toLowerCase())
                .filter((t) => t.length > 0),
        },
    };
}

function providerKey(vars: z.infer<typeof envSchema>, provider: AiProvider): string | undefined {
    switch (provider) {
        case 'openai':
            return vars.OPENAI_API_KEY;
        case 'deepseek':
            return vars.DEEPSEEK_API_KEY;
        case 'gemini':
            return vars.GEMINI_API_KEY;
        case 'ollama':
            return undefined;
    }
}

// Unset keeps the default apology; set-but-blank turns fallback replies off.
function resolveFallback(raw: string | undefined): string | null {
    if (raw === undefined) return DEFAULT_FALLBACK_REPLY;
    const trimmed = raw.trim();
    return trimmed ? trimmed : null;
}
