import type { AiConfig } from '../config';
import type { CompletionClient, Logger } from '../types';
import { isTransientError } from './errors';
import GeminiClient from './geminiClient';
import type { FetchLike } from './http';
import OllamaClient from './ollamaClient';
import OpenAIClient from './openaiClient';
import { withRetry, type RetryOptions } from './retry';

export { CompletionError, isTransientError } from './errors';
export type { CompletionErrorKind } from './errors';

export function createProviderClient(config: AiConfig, fetchImpl?: FetchLike): CompletionClient {
    switch (config.provider) {
        case 'ollama':
            return new OllamaClient(config, fetchImpl);
        case 'openai':
        case 'deepseek':
            return new OpenAIClient(config, fetchImpl);
        case 'gemini':
            return new GeminiClient(config, fetchImpl);
    }
}

/** Wraps a client so transient failures are retried with backoff. */
export class RetryingCompletionClient implements CompletionClient {
    readonly provider: string;

    constructor(
        private inner: CompletionClient,
        private retry: Partial<RetryOptions>,
        private logger: Logger = console,
    ) {
        this.provider = inner.provider;
    }

    complete(prompt: string): Promise<string> {
        return withRetry(() => this.inner.complete(prompt), {
            ...this.retry,
            shouldRetry: isTransientError,
            onRetry: (error, attempt, delayMs) => {
                const message = error instanceof Error ? error.message : String(error);
                this.logger.warn(`${this.provider} attempt ${attempt} failed (${message}), retrying in ${delayMs}ms`);
            },
        });
    }
}

export function createCompletionClient(config: AiConfig, logger: Logger = console): CompletionClient {
    return new RetryingCompletionClient(createProviderClient(config), { maxAttempts: config.maxAttempts }, logger);
}
