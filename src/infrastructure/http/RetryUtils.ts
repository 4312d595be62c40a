/**
 * Retry Utilities
 *
 * Exponential backoff for transient failures of outbound HTTP calls.
 */

export interface RetryOptions {
    /** Maximum number of attempts (default: 3) */
    maxAttempts?: number;
    /** Initial backoff delay in milliseconds (default: 500) */
    initialBackoffMs?: number;
    /** Maximum backoff delay in milliseconds (default: 10000) */
    maxBackoffMs?: number;
    /** Backoff multiplier (default: 2) */
    backoffMultiplier?: number;
    /** Decides whether an error is worth another attempt (default: all errors) */
    isRetryable?: (error: unknown) => boolean;
    /** Called before each retry */
    onRetry?: (attempt: number, error: unknown, nextDelayMs: number) => void;
}

const DEFAULT_OPTIONS: Required<RetryOptions> = {
    maxAttempts: 3,
    initialBackoffMs: 500,
    maxBackoffMs: 10000,
    backoffMultiplier: 2,
    isRetryable: () => true,
    onRetry: () => { },
};

/**
 * Runs `fn`, retrying with exponential backoff.
 * @throws The last error once attempts are exhausted or the error is not retryable
 */
export async function withRetry<T>(fn: () => Promise<T>, options?: RetryOptions): Promise<T> {
    const opts = { ...DEFAULT_OPTIONS, ...options };
    let currentBackoff = opts.initialBackoffMs;

    for (let attempt = 1; ; attempt++) {
        try {
            return await fn();
        } catch (error) {
            if (attempt >= opts.maxAttempts || !opts.isRetryable(error)) {
                throw error;
            }

            const delay = Math.min(currentBackoff, opts.maxBackoffMs);
            opts.onRetry(attempt, error, delay);
            await sleep(delay);

            currentBackoff = Math.min(currentBackoff * opts.backoffMultiplier, opts.maxBackoffMs);
        }
    }
}

/**
 * Rate limits (429), server errors (5xx) and network errors are retryable.
 */
export function isRetryableHttpError(error: unknown): boolean {
    const status = statusOf(error);
    if (status === undefined) {
        return true;
    }
    return status === 429 || (status >= 500 && status < 600);
}

function statusOf(error: unknown): number | undefined {
    if (typeof error !== 'object' || error === null) {
        return undefined;
    }
    if ('response' in error && typeof error.response === 'object' && error.response !== null
        && 'status' in error.response && typeof error.response.status === 'number') {
        return error.response.status;
    }
    if ('status' in error && typeof error.status === 'number') {
        return error.status;
    }
    return undefined;
}

function sleep(ms: number): Promise<void> {
    return new Promise(resolve => setTimeout(resolve, ms));
}
