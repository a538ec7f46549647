/**
 * @siteripper/utils
 *
 * Shared utility functions for siteripper packages
 */

export * from './filename.js';
export * from './url.js';
export * from './log-dedup.js';

/**
 * The current version of siteripper
 *
 * Used for the default user agent and the CLI version flag.
 */
export const VERSION = '0.1.0';

/**
 * Sleep for a given number of milliseconds
 */
export function sleep(ms: number): Promise<void> {
    return new Promise((resolve) => setTimeout(resolve, ms));
}

/**
 * Picks a random delay between `min` and `max` milliseconds.
 *
 * Returns 0 when either bound is zero or negative, which disables pacing.
 *
 * @param random - Source of randomness in [0, 1), injectable for tests
 */
export function randomDelay(
    min: number,
    max: number,
    random: () => number = Math.random,
): number {
    if (min <= 0 || max <= 0) {
        return 0;
    }
    const low = Math.min(min, max);
    const high = Math.max(min, max);
    return Math.round(low + (high - low) * random());
}
