/**
 * Backoff for transaction retries after a serialization conflict.
 *
 * The delay grows with 2^attempt and is scaled by a jitter multiplier in
 * [0.5, 1.5) so competing callers stop colliding on the same rows.
 */

/** Base unit of the backoff in ms (0.1 s). */
export const DEFAULT_BASE_DELAY_MS = 100;

export const DEFAULT_MAX_RETRIES = 3;

/** Uniform source in [0, 1). Needs no cryptographic strength. */
export type RandomSource = () => number;

/**
 * Calculate the delay for a 1-based attempt.
 * Formula:  2^attempt * baseDelay * (random + 0.5)
 */
export function calculateBackoff(
    attempt: number,
    baseDelayMs: number = DEFAULT_BASE_DELAY_MS,
    random: RandomSource = Math.random
): number {
    return Math.pow(2, attempt) * baseDelayMs * (random() + 0.5);
}

/** Smallest delay `calculateBackoff` can return for the attempt. */
export function minimumBackoff(attempt: number, baseDelayMs: number = DEFAULT_BASE_DELAY_MS): number {
    return Math.pow(2, attempt) * baseDelayMs * 0.5;
}

export function assertValidRetryBound(maxRetries: number): void {
    if (!Number.isInteger(maxRetries) || maxRetries < 1) {
        throw new Error('maxRetries must be an integer of at least 1.');
    }
}
