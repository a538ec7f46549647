/**
 * Formatting helpers for terminal output.
 */

/**
 * Shortens a string to `maxLen` characters, ending in `...`.
 */
export function truncate(str: string, maxLen: number): string {
    if (str.length <= maxLen) {
        return str;
    }
    return str.slice(0, maxLen - 3) + '...';
}

/**
 * Formats a URL for log output: same-origin URLs show only their path and
 * query, others are shown whole.
 *
 * @param maxLen - Truncate the result to this many characters
 */
export function formatUrlForLog(
    url: string,
    baseOrigin: string,
    maxLen?: number,
): string {
    let display = url;
    try {
        const parsed = new URL(url);
        if (parsed.origin === new URL(baseOrigin).origin) {
            display = parsed.pathname + parsed.search;
        }
    } catch {
        // Not a parseable URL; show it as given
    }
    return maxLen ? truncate(display, maxLen) : display;
}

export function formatBytes(bytes: number): string {
    if (bytes <= 0) return '0 B';
    const k = 1024;
    const sizes = ['B', 'KB', 'MB', 'GB'];
    const i = Math.min(
        Math.floor(Math.log(bytes) / Math.log(k)),
        sizes.length - 1,
    );
    return `${(bytes / Math.pow(k, i)).toFixed(1)} ${sizes[i]}`;
}

/**
 * `850ms`, `12.3s` or `4m 05s`.
 */
export function formatDuration(ms: number): string {
    if (ms < 1000) {
        return `${Math.round(ms)}ms`;
    }
    const seconds = ms / 1000;
    if (seconds < 60) {
        return `${seconds.toFixed(1)}s`;
    }
    const minutes = Math.floor(seconds / 60);
    const rest = Math.floor(seconds % 60);
    return `${minutes}m ${rest.toString().padStart(2, '0')}s`;
}
