import { z } from 'zod';
import type { AiConfig } from '../config';
import type { CompletionClient } from '../types';
import { CompletionError } from './errors';
import { postJson, type FetchLike } from './http';

const generateContentResponse = z.object({
    candidates: z
        .array(
            z.object({
                content: z
                    .object({ parts: z.array(z.object({ text: z.string().optional() })).default([]) })
                    .optional(),
            }),
        )
        .default([]),
});

class GeminiClient implements CompletionClient {
    readonly provider = 'gemini';

    constructor(private config: AiConfig, private fetchImpl?: FetchLike) {}

    async complete(prompt: string): Promise<string> {
        const url = `${this.config.baseUrl}/models/${encodeURIComponent(this.config.model)}:generateContent`;
        const data = await postJson(
            this.provider,
            url,
            {
                systemInstruction: { parts: [{ text: this.config.persona }] },
                contents: [{ role: 'user', parts: [{ text: prompt }] }],
                generationConfig: {
                    temperature: this.config.temperature,
                    maxOutputTokens: this.config.maxTokens,
                    topP: 0.9,
                    topK: 40,
                },
            },
            { 'x-goog-api-key': this.config.apiKey ?? '' },
            { timeoutMs: this.config.timeoutMs, fetchImpl: this.fetchImpl },
        );
        const parsed = generateContentResponse.safeParse(data);
        const parts = parsed.success ? parsed.data.candidates[0]?.content?.parts ?? [] : [];
        const text = parts.map((part) => part.text ?? '').join('').trim();
        if (!text) throw new CompletionError('empty', 'gemini returned no completion text');
        return text;
    }
}

export default GeminiClient;
