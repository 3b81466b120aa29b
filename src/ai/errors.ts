import { FetchError } from 'node-fetch';

export type CompletionErrorKind =
    | 'network'
    | 'timeout'
    | 'rate_limit'
    | 'auth'
    | 'server'
    | 'request'
    | 'empty';

const TRANSIENT: ReadonlySet<CompletionErrorKind> = new Set(['network', 'timeout', 'rate_limit', 'server']);

export class CompletionError extends Error {
    constructor(
        readonly kind: CompletionErrorKind,
        message: string,
        readonly status?: number,
        options?: { cause?: unknown },
    ) {
        super(message, options);
        this.name = 'CompletionError';
    }

    get transient(): boolean {
        return TRANSIENT.has(this.kind);
    }
}

export function isTransientError(error: unknown): boolean {
    return error instanceof CompletionError && error.transient;
}

export function errorForStatus(provider: string, status: number, body: string): CompletionError {
    const detail = body.length > 200 ? `${body.slice(0, 200)}...` : body;
    const message = `${provider} responded with HTTP ${status}${detail ? `: ${detail}` : ''}`;
    if (status === 429) return new CompletionError('rate_limit', message, status);
    if (status === 401 || status === 403) return new CompletionError('auth', message, status);
    if (status >= 500) return new CompletionError('server', message, status);
    return new CompletionError('request', message, status);
}

/** Maps whatever the HTTP client threw into a CompletionError. */
export function toCompletionError(provider: string, error: unknown): CompletionError {
    if (error instanceof CompletionError) return error;
    if (error instanceof FetchError) {
        const kind = error.type === 'request-timeout' || error.type === 'body-timeout' ? 'timeout' : 'network';
        return new CompletionError(kind, `${provider} request failed: ${error.message}`, undefined, { cause: error });
    }
    const message = error instanceof Error ? error.message : String(error);
    return new CompletionError('network', `${provider} request failed: ${message}`, undefined, { cause: error });
}
