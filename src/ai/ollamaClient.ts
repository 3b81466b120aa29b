import { z } from 'zod';
import type { AiConfig } from '../config';
import type { CompletionClient } from '../types';
import { CompletionError } from './errors';
import { postJson, type FetchLike } from './http';

const generateResponse = z.object({ response: z.string().optional() });

class OllamaClient implements CompletionClient {
    readonly provider = 'ollama';
    private apiUrl: string;

    constructor(private config: AiConfig, private fetchImpl?: FetchLike) {
        this.apiUrl = config.baseUrl;
    }

    async complete(prompt: string): Promise<string> {
        const data = await postJson(
            this.provider,
            this.apiUrl,
            {
                prompt,
                system: this.config.persona,
                stream: false,
                model: this.config.model,
                options: { temperature: this.config.temperature, num_predict: this.config.maxTokens },
            },
            {},
            { timeoutMs: this.config.timeoutMs, fetchImpl: this.fetchImpl },
        );
        const parsed = generateResponse.safeParse(data);
        const text = parsed.success ? parsed.data.response?.trim() : undefined;
        if (!text) throw new CompletionError('empty', 'ollama returned no completion text');
        return text;
    }
}

export default OllamaClient;
