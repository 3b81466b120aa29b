import { z } from 'zod';
import type { AiConfig } from '../config';
import type { CompletionClient } from '../types';
import { CompletionError } from './errors';
import { postJson, type FetchLike } from './http';

const chatCompletion = z.object({
    choices: z
        .array(z.object({ message: z.object({ content: z.string().nullable().optional() }) }))
        .default([]),
});

/** Chat-completions client for OpenAI and compatible APIs such as DeepSeek. */
class OpenAIClient implements CompletionClient {
    readonly provider: string;

    constructor(private config: AiConfig, private fetchImpl?: FetchLike) {
        this.provider = config.provider;
    }

    async complete(prompt: string): Promise<string> {
        const data = await postJson(
            this.provider,
            `${this.config.baseUrl}/chat/completions`,
            {
                model: this.config.model,
                messages: [
                    { role: 'system', content: this.config.persona },
                    { role: 'user', content: prompt },
                ],
                max_tokens: this.config.maxTokens,
                temperature: this.config.temperature,
            },
            { Authorization: `Bearer ${this.config.apiKey ?? ''}` },
            { timeoutMs: this.config.timeoutMs, fetchImpl: this.fetchImpl },
        );
        const parsed = chatCompletion.safeParse(data);
        const text = parsed.success ? parsed.data.choices[0]?.message.content?.trim() : undefined;
        if (!text) throw new CompletionError('empty', `${this.provider} returned no completion text`);
        return text;
    }
}

export default OpenAIClient;
