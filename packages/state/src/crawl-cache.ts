/**
 * `@siteripper/state` - Crawl cache
 *
 * The three persistent stores a crawl depends on:
 *
 * - `completed_urls`: pages fully processed, per crawl base
 * - `queued_urls`: pages enqueued but not yet processed, per crawl base
 * - `downloads`: URL to downloaded file, shared by every base in the run
 */

import type {
    DownloadCache,
    DownloadedFile,
    DownloadResult,
} from '@siteripper/types';
import { KeyValueStore, type KeyValueStoreOptions } from './kv-store.js';

export const COMPLETED_STORE = 'completed_urls';
export const QUEUED_STORE = 'queued_urls';
export const DOWNLOADS_STORE = 'downloads';

/** Separates the crawl base from the URL in per-base keys. */
const KEY_SEPARATOR = '\u0000';

const DOWNLOAD_RESULTS: ReadonlySet<string> = new Set<DownloadResult>([
    'SUCCESS',
    'SKIPPED',
    'FAIL',
]);

export interface CrawlCacheOptions {
    compactionThreshold?: number;
}

/**
 * Completed, queued and download records for one run.
 *
 * Each write is synced to disk before its promise resolves, so a crash
 * loses at most the page in flight.
 */
export class CrawlCache implements DownloadCache {
    private constructor(
        private readonly completed: KeyValueStore<string>,
        private readonly queued: KeyValueStore<string>,
        private readonly downloads: KeyValueStore<DownloadedFile>,
    ) {}

    /**
     * Opens the three stores under `cacheDir`.
     *
     * @throws {CorruptedStateError} When a store cannot be parsed
     * @throws {StateIOError} When a store cannot be accessed
     */
    static async open(
        cacheDir: string,
        options: CrawlCacheOptions = {},
    ): Promise<CrawlCache> {
        const stringOptions: KeyValueStoreOptions<string> = {
            decodeValue: decodeTimestamp,
            compactionThreshold: options.compactionThreshold,
        };
        const completed = await KeyValueStore.open(
            cacheDir,
            COMPLETED_STORE,
            stringOptions,
        );
        const queued = await KeyValueStore.open(
            cacheDir,
            QUEUED_STORE,
            stringOptions,
        );
        const downloads = await KeyValueStore.open(cacheDir, DOWNLOADS_STORE, {
            decodeValue: decodeDownloadedFile,
            compactionThreshold: options.compactionThreshold,
        });
        return new CrawlCache(completed, queued, downloads);
    }

    // ------------------------------------------------------------------
    // Completed pages
    // ------------------------------------------------------------------

    isCompleted(url: string, base: string): boolean {
        return this.completed.has(baseKey(base, url));
    }

    async markCompleted(url: string, base: string): Promise<void> {
        const key = baseKey(base, url);
        if (!this.completed.has(key)) {
            await this.completed.set(key, new Date().toISOString());
        }
    }

    completedUrls(base: string): string[] {
        return urlsUnder(this.completed, base);
    }

    // ------------------------------------------------------------------
    // Queued pages
    // ------------------------------------------------------------------

    /**
     * URLs enqueued under `base` and not yet dequeued, in enqueue order.
     */
    queuedUrls(base: string): string[] {
        return urlsUnder(this.queued, base);
    }

    async addQueued(url: string, base: string): Promise<void> {
        const key = baseKey(base, url);
        if (!this.queued.has(key)) {
            await this.queued.set(key, new Date().toISOString());
        }
    }

    async removeQueued(url: string, base: string): Promise<void> {
        await this.queued.delete(baseKey(base, url));
    }

    /**
     * Forgets every completed and queued page of `base`, for a crawl that
     * must not resume. Downloads stay cached.
     */
    async clearBase(base: string): Promise<void> {
        for (const url of this.completedUrls(base)) {
            await this.completed.delete(baseKey(base, url));
        }
        for (const url of this.queuedUrls(base)) {
            await this.queued.delete(baseKey(base, url));
        }
    }

    // ------------------------------------------------------------------
    // Downloads
    // ------------------------------------------------------------------

    cachedDownload(url: string): DownloadedFile | undefined {
        return this.downloads.get(url);
    }

    /**
     * Records `entry` under `url` and every alternate (pre-redirect) URL.
     * A URL that already has an entry keeps it.
     */
    async storeDownload(
        url: string,
        entry: DownloadedFile,
        altUrls: readonly string[] = [],
    ): Promise<void> {
        for (const key of new Set([url, ...altUrls])) {
            if (!this.downloads.has(key)) {
                await this.downloads.set(key, entry);
            }
        }
    }

    /**
     * Flushes and closes all three stores. Every store is closed even when
     * one of them fails; the first failure is rethrown.
     */
    async close(): Promise<void> {
        const results = await Promise.allSettled([
            this.completed.close(),
            this.queued.close(),
            this.downloads.close(),
        ]);
        for (const result of results) {
            if (result.status === 'rejected') {
                throw result.reason;
            }
        }
    }
}

/**
 * Opens the crawl cache, runs `fn` with it, and closes it whatever `fn`
 * does.
 */
export async function withCrawlCache<T>(
    cacheDir: string,
    fn: (cache: CrawlCache) => Promise<T>,
    options: CrawlCacheOptions = {},
): Promise<T> {
    const cache = await CrawlCache.open(cacheDir, options);
    try {
        return await fn(cache);
    } finally {
        await cache.close();
    }
}

function baseKey(base: string, url: string): string {
    return `${base}${KEY_SEPARATOR}${url}`;
}

function urlsUnder(store: KeyValueStore<string>, base: string): string[] {
    const prefix = `${base}${KEY_SEPARATOR}`;
    return store
        .entriesWithPrefix(prefix)
        .map(([key]) => key.slice(prefix.length));
}

function decodeTimestamp(raw: unknown): string {
    if (typeof raw !== 'string') {
        throw new Error('Expected a timestamp string');
    }
    return raw;
}

/**
 * Validates a download cache entry read back from disk.
 */
export function decodeDownloadedFile(raw: unknown): DownloadedFile {
    if (typeof raw !== 'object' || raw === null) {
        throw new Error('Download entry must be an object');
    }
    const result: unknown = Reflect.get(raw, 'result');
    const filename: unknown = Reflect.get(raw, 'filename');
    const headers: unknown = Reflect.get(raw, 'headers');

    if (!isDownloadResult(result)) {
        throw new Error(`Invalid download result: ${String(result)}`);
    }
    if (filename !== null && typeof filename !== 'string') {
        throw new Error('Download filename must be a string or null');
    }
    if (typeof headers !== 'object' || headers === null) {
        throw new Error('Download headers must be an object');
    }

    const decodedHeaders: Record<string, string> = {};
    for (const [name, value] of Object.entries(headers)) {
        if (typeof value === 'string') {
            decodedHeaders[name] = value;
        }
    }
    return { result, filename, headers: decodedHeaders };
}

function isDownloadResult(value: unknown): value is DownloadResult {
    return typeof value === 'string' && DOWNLOAD_RESULTS.has(value);
}
