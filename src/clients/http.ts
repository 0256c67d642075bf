/**
 * Shared HTTP plumbing for the source clients:
 * a bounded retry loop with a constant delay and a per-attempt timeout.
 */

import { toError } from '../errors.js';

export interface RetryPolicy {
    /** Total number of attempts, including the first one. */
    attempts: number;
    /** Fixed wait between attempts. */
    delayMs: number;
    /** Abort a single attempt after this long. */
    timeoutMs: number;
}

export const DEFAULT_RETRY_POLICY: RetryPolicy = {
    attempts: 2,
    delayMs: 1000,
    timeoutMs: 30_000,
};

export type FailedAttemptCallback = (attempt: number, reason: string) => void;

export type QueryParams = Record<string, string | number | boolean>;

function createTimeoutSignal(timeoutMs: number): { signal: AbortSignal; cleanup: () => void } {
    const controller = new AbortController();
    const timeoutId = setTimeout(() => controller.abort(), timeoutMs);

    return {
        signal: controller.signal,
        cleanup: () => clearTimeout(timeoutId),
    };
}

function isAbortError(error: Error): boolean {
    return error.name === 'AbortError';
}

function sleep(ms: number): Promise<void> {
    return new Promise(resolve => setTimeout(resolve, ms));
}

export function buildUrl(base: string, params: QueryParams): string {
    const url = new URL(base);
    for (const [key, value] of Object.entries(params)) {
        url.searchParams.set(key, String(value));
    }
    return url.toString();
}

/**
 * GET with retry. Resolves with the first successful response, or null once
 * every attempt has failed. Never rejects.
 */
export async function fetchWithRetry(
    url: string,
    init: RequestInit,
    policy: RetryPolicy,
    onFailedAttempt?: FailedAttemptCallback
): Promise<Response | null> {
    const attempts = Math.max(1, policy.attempts);

    for (let attempt = 0; attempt < attempts; attempt++) {
        const { signal, cleanup } = createTimeoutSignal(policy.timeoutMs);
        let reason = 'unknown failure';

        try {
            const response = await fetch(url, { ...init, method: 'GET', signal });
            if (response.ok) return response;
            // release the connection before the next attempt
            await response.body?.cancel();
            reason = `status ${response.status}`;
        } catch (error) {
            const err = toError(error);
            reason = isAbortError(err)
                ? `timeout after ${policy.timeoutMs}ms`
                : err.message;
        } finally {
            cleanup();
        }

        onFailedAttempt?.(attempt + 1, reason);

        if (attempt < attempts - 1) {
            await sleep(policy.delayMs);
        }
    }

    return null;
}
