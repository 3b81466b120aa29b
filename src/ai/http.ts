import fetch from 'node-fetch';
import type { RequestInit, Response } from 'node-fetch';
import { CompletionError, errorForStatus, toCompletionError } from './errors';

export type FetchLike = (url: string, init: RequestInit) => Promise<Response>;

export interface HttpClientOptions {
    timeoutMs: number;
    fetchImpl?: FetchLike;
}

/** POSTs a JSON body and returns the parsed JSON reply, or throws a CompletionError. */
export async function postJson(
    provider: string,
    url: string,
    body: unknown,
    headers: Record<string, string>,
    options: HttpClientOptions,
): Promise<unknown> {
    const doFetch = options.fetchImpl ?? fetch;
    let response: Response;
    let raw: string;
    // The timeout also covers reading the body, so a slow body fails here too.
    try {
        response = await doFetch(url, {
            method: 'POST',
            headers: { 'Content-Type': 'application/json', ...headers },
            body: JSON.stringify(body),
            timeout: options.timeoutMs,
        });
        raw = await response.text();
    } catch (e) {
        throw toCompletionError(provider, e);
    }

    if (!response.ok) throw errorForStatus(provider, response.status, raw);

    try {
        const data: unknown = JSON.parse(raw);
        return data;
    } catch (e) {
        throw new CompletionError('empty', `${provider} returned a body that is not JSON`, response.status, { cause: e });
    }
}
