/**
 * Suppresses repeated log lines for the same URL or identifier.
 *
 * One instance is created per crawl run and handed to every component that
 * reports per-URL problems, so a site with hundreds of references to the
 * same broken asset logs it once.
 *
 * @example
 * ```typescript
 * const seen = new LogDeduplicator();
 * if (seen.firstTime(`fetch-fail:${url}`)) {
 *     log('warn', `Could not download ${url}`);
 * }
 * ```
 */
export class LogDeduplicator {
    private seen = new Set<string>();

    constructor(initialKeys: Iterable<string> = []) {
        for (const key of initialKeys) {
            this.seen.add(key);
        }
    }

    /**
     * Records `key` and reports whether this is its first occurrence.
     */
    firstTime(key: string): boolean {
        if (this.seen.has(key)) {
            return false;
        }
        this.seen.add(key);
        return true;
    }

    has(key: string): boolean {
        return this.seen.has(key);
    }

    get size(): number {
        return this.seen.size;
    }
}
