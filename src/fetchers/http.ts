/**
 * HTTP helpers for the tournament API
 * GET with bounded retry and exponential backoff on 5xx responses
 */
import { logger as defaultLogger, type Logger } from '../observability/logger.js';
import type { RetryPolicy } from './types.js';

export const USER_AGENT = 'tournament-export/1.0';
export const DEFAULT_TIMEOUT_MS = 30000;

export const DEFAULT_RETRY_POLICY: RetryPolicy = {
    maxAttempts: 3,
    baseDelayMs: 1000,
    maxDelayMs: 5000,
};

export class HttpError extends Error {
    constructor(
        public readonly status: number,
        public readonly statusText: string,
        public readonly url: string,
        public readonly body: string
    ) {
        super(`HTTP ${status}${statusText ? ` ${statusText}` : ''} for ${url}`);
        this.name = 'HttpError';
    }

    get retryable(): boolean {
        return isRetryableStatus(this.status);
    }
}

export function isRetryableStatus(status: number): boolean {
    return status >= 500 && status <= 599;
}

/**
 * Delay before the next attempt: base * 2^(attempt - 1), capped
 */
export function backoffDelay(attempt: number, policy: RetryPolicy): number {
    return Math.min(policy.baseDelayMs * Math.pow(2, attempt - 1), policy.maxDelayMs);
}

export async function toHttpError(response: Response, url: string): Promise<HttpError> {
    const body = await response.text();
    return new HttpError(response.status, response.statusText, url, body);
}

export interface GetOptions {
    headers: Record<string, string>;
    timeoutMs?: number;
    retry?: RetryPolicy;
    logger?: Logger;
}

/**
 * GET a JSON document. Only 5xx responses are retried; 4xx responses,
 * transport failures, timeouts and malformed JSON propagate immediately.
 */
export async function getJsonWithRetry(url: URL, options: GetOptions): Promise<unknown> {
    const retry = options.retry ?? DEFAULT_RETRY_POLICY;
    const log = options.logger ?? defaultLogger;
    const timeoutMs = options.timeoutMs ?? DEFAULT_TIMEOUT_MS;
    let lastError: HttpError | null = null;

    for (let attempt = 1; attempt <= retry.maxAttempts; attempt++) {
        const response = await fetch(url, {
            headers: options.headers,
            signal: AbortSignal.timeout(timeoutMs),
        });

        if (response.ok) {
            return response.json();
        }

        lastError = await toHttpError(response, url.toString());

        if (!lastError.retryable || attempt >= retry.maxAttempts) {
            throw lastError;
        }

        const delayMs = backoffDelay(attempt, retry);
        log.warn(`Request attempt ${attempt} failed, retrying`, {
            status: lastError.status,
            delayMs,
        });
        await new Promise(resolve => setTimeout(resolve, delayMs));
    }

    throw lastError || new Error(`Request failed after retries: ${url.toString()}`);
}
