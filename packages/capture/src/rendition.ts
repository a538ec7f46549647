/**
 * Picks the best of several renditions of the same media.
 */

/**
 * Numeric quality of a label such as `1080p`, `720p60` or `hd 540`: its
 * first run of digits. Labels without digits score -1.
 */
export function qualityScore(label: string): number {
    const digits = /\d+/.exec(label);
    return digits ? parseInt(digits[0], 10) : -1;
}

/**
 * Highest-quality rendition by label. Ties keep the order given.
 *
 * @returns The rendition, or null when there are none
 *
 * @example
 * ```typescript
 * selectBestRendition(['360p', '1080p', '720p'], (r) => r); // '1080p'
 * ```
 */
export function selectBestRendition<T>(
    renditions: readonly T[],
    labelOf: (rendition: T) => string,
): T | null {
    let best: T | null = null;
    let bestScore = -Infinity;
    for (const rendition of renditions) {
        const score = qualityScore(labelOf(rendition));
        if (score > bestScore) {
            best = rendition;
            bestScore = score;
        }
    }
    return best;
}
