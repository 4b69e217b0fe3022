import { settings } from './config.js';
import { UpstreamUnavailableError } from './errors.js';

export interface RetryPolicy {
    maxAttempts: number; // total attempts, first call included
    baseDelayMs: number;
    maxDelayMs: number;
    jitterMs: number;
}

export const defaultRetryPolicy: RetryPolicy = {
    maxAttempts: settings.RETRY_MAX_ATTEMPTS,
    baseDelayMs: settings.RETRY_BASE_DELAY_MS,
    maxDelayMs: settings.RETRY_MAX_DELAY_MS,
    jitterMs: settings.RETRY_JITTER_MS,
};

export interface CallOptions {
    shouldRetry?: (error: unknown) => boolean;
    onRetry?: (error: unknown, attempt: number, delayMs: number) => void;
    // Checked before every retry; returning false gives up with the last error.
    canContinue?: () => boolean;
    sleep?: (ms: number) => Promise<void>;
    random?: () => number;
}

export function sleep(ms: number): Promise<void> {
    return new Promise(resolve => setTimeout(resolve, ms));
}

export function isRetryableUpstreamError(error: unknown): boolean {
    return error instanceof UpstreamUnavailableError && error.retryable;
}

export function backoffDelay(policy: RetryPolicy, attempt: number, random: () => number = Math.random): number {
    const exponential = policy.baseDelayMs * 2 ** (attempt - 1);
    const capped = Math.min(exponential, policy.maxDelayMs);
    return capped + Math.floor(random() * policy.jitterMs);
}

/**
 * Run `fn` under a retry policy. Rethrows the last error once attempts are
 * spent or the error is not retryable.
 */
export async function callWithPolicy<T>(
    fn: (attempt: number) => Promise<T>,
    policy: RetryPolicy = defaultRetryPolicy,
    options: CallOptions = {}
): Promise<T> {
    const shouldRetry = options.shouldRetry ?? isRetryableUpstreamError;
    const wait = options.sleep ?? sleep;
    const random = options.random ?? Math.random;
    const attempts = Math.max(1, policy.maxAttempts);

    let attempt = 1;
    while (true) {
        try {
            return await fn(attempt);
        } catch (error) {
            const exhausted = attempt >= attempts;
            if (exhausted || !shouldRetry(error) || (options.canContinue && !options.canContinue())) {
                throw error;
            }
            const delayMs = backoffDelay(policy, attempt, random);
            options.onRetry?.(error, attempt, delayMs);
            await wait(delayMs);
            attempt += 1;
        }
    }
}
