/**
 * Content fetcher: downloads one URL into the output tree at most once per
 * run.
 *
 * Every download goes through the same steps: a download-cache lookup, the
 * request, a content-type check, a streamed write to a temporary file with
 * progress events, filename resolution, placement under the duplicate
 * policy, and a cache record under both the requested and the final URL.
 */

import { createHash } from 'crypto';
import { createReadStream, existsSync } from 'fs';
import { mkdir, open, rename, rm, unlink, type FileHandle } from 'fs/promises';
import { tmpdir } from 'os';
import { join } from 'path';
import {
    DuplicatePolicy,
    type DownloadCache,
    type DownloadedFile,
    type DownloadProgressCallback,
    type GroupByMapping,
    type VerboseCallback,
    type VerboseLevel,
} from '@siteripper/types';
import {
    DEFAULT_MAX_FILENAME_LENGTH,
    numberedFilename,
    shortenFilename,
} from '@siteripper/utils';
import { DEFAULT_HEADERS, FetchError, robustFetch } from './fetch.js';
import { ContentLengthMismatchError, DuplicateFileError } from './errors.js';
import {
    baseContentType,
    groupFolderFor,
    isIgnoredContentType,
    resolveFilename,
    sniffFileExtension,
} from './content-type.js';

/**
 * Options shared by every request of one fetcher.
 */
export interface ContentFetcherOptions {
    /** Where finished downloads are recorded. */
    cache: DownloadCache;
    userAgent?: string;
    /** Retry attempts for transient network errors. */
    retries?: number;
    /** Longest filename stem written. */
    maxFilenameLength?: number;
    onProgress?: DownloadProgressCallback;
    onVerbose?: VerboseCallback;
}

/**
 * One download.
 */
export interface FetchRequest {
    url: string;
    /** Preferred filename stem, e.g. a page title. */
    idealFilename?: string;
    /** Directory the file lands in; the system temp dir when omitted. */
    outDir?: string;
    headers?: Record<string, string>;
    duplicatePolicy?: DuplicatePolicy;
    /** Content types that are not kept (see `isIgnoredContentType`). */
    ignoredContentTypes?: readonly string[];
    /** Places the file in a sub-folder chosen by its extension. */
    groupBy?: GroupByMapping;
}

/** Body statuses that make a HEAD probe fall back to GET. */
const HEAD_REFUSED_STATUSES = new Set([400, 403, 405, 501]);

/**
 * Downloads URLs into the output tree, consulting and filling the download
 * cache.
 *
 * @example
 * ```typescript
 * const fetcher = new ContentFetcher({ cache });
 * const file = await fetcher.fetch({
 *     url: 'https://example.com/logo.png',
 *     outDir: '/out/data',
 *     duplicatePolicy: DuplicatePolicy.HASH_COMPARE,
 * });
 * if (file.result === 'SUCCESS') {
 *     console.log(file.filename);
 * }
 * ```
 */
export class ContentFetcher {
    private contentTypes = new Map<string, string | null>();
    private requestCount = 0;

    constructor(private readonly options: ContentFetcherOptions) {}

    /**
     * Number of HTTP requests sent so far.
     */
    get requests(): number {
        return this.requestCount;
    }

    /**
     * Downloads `request.url`, or returns its cached result without touching
     * the network.
     *
     * Network and HTTP failures yield `FAIL`, ignored content types yield
     * `SKIPPED`; neither throws.
     *
     * @throws {DuplicateFileError} Under the `THROW_ERROR` policy
     */
    async fetch(request: FetchRequest): Promise<DownloadedFile> {
        const { url } = request;
        const cached = this.validCacheEntry(url);
        if (cached) {
            this.verbose('debug', `Cache hit for ${url}`, { url });
            return cached;
        }

        let response: Response;
        try {
            response = await this.send(url, 'GET', request.headers);
        } catch (error) {
            const message =
                error instanceof FetchError
                    ? error.format()
                    : `Failed to fetch ${url}: ${String(error)}`;
            this.verbose('warn', message, { url });
            return this.record(url, url, {
                result: 'FAIL',
                filename: null,
                headers: {},
            });
        }

        const headers = headersToRecord(response.headers);

        if (!response.ok) {
            await cancelBody(response);
            this.verbose('warn', `HTTP ${response.status} for ${url}`, {
                url,
                status: response.status,
            });
            return this.record(url, url, {
                result: 'FAIL',
                filename: null,
                headers,
            });
        }

        const finalUrl = response.url || url;
        if (finalUrl !== url) {
            const cachedFinal = this.validCacheEntry(finalUrl);
            if (cachedFinal) {
                await cancelBody(response);
                return this.record(finalUrl, url, cachedFinal);
            }
        }

        const contentType = baseContentType(headers['content-type']);
        if (
            isIgnoredContentType(contentType, request.ignoredContentTypes ?? [])
        ) {
            await cancelBody(response);
            this.verbose('debug', `Skipping ${url} (${contentType})`, { url });
            return this.record(finalUrl, url, {
                result: 'SKIPPED',
                filename: null,
                headers,
            });
        }

        const outDir = request.outDir ?? tmpdir();
        await mkdir(outDir, { recursive: true });
        const stem = urlHash(finalUrl);
        const tempPath = join(outDir, `.${stem}.part`);

        let newHash: string;
        try {
            newHash = await this.streamToFile(response, finalUrl, tempPath);
        } catch (error) {
            await rm(tempPath, { force: true });
            const message =
                error instanceof Error ? error.message : String(error);
            this.verbose('error', message, { url: finalUrl });
            return this.record(finalUrl, url, {
                result: 'FAIL',
                filename: null,
                headers,
            });
        }

        const name = shortenFilename(
            await resolveFilename({
                url: finalUrl,
                contentType,
                contentDisposition: headers['content-disposition'] ?? null,
                sniff: () => sniffFileExtension(tempPath),
                fallbackStem: stem,
                idealFilename: request.idealFilename,
            }),
            this.options.maxFilenameLength ?? DEFAULT_MAX_FILENAME_LENGTH,
        );

        const targetDir = request.groupBy
            ? join(outDir, groupFolderFor(name, request.groupBy))
            : outDir;
        await mkdir(targetDir, { recursive: true });

        const filename = await placeFile(
            tempPath,
            join(targetDir, name),
            newHash,
            request.duplicatePolicy ?? DuplicatePolicy.FIND_VALID_FILE,
            finalUrl,
        );

        this.verbose('info', `Saved ${finalUrl} -> ${filename}`, {
            url: finalUrl,
            filename,
        });
        return this.record(finalUrl, url, {
            result: 'SUCCESS',
            filename,
            headers,
        });
    }

    /**
     * Content type of `url` without downloading its body: the cached
     * response headers, a HEAD request, or a GET whose body is discarded
     * when HEAD is refused. Results are remembered for the fetcher's life.
     *
     * @returns Lower-cased type without parameters, or null when unknown
     */
    async probeContentType(
        url: string,
        headers?: Record<string, string>,
    ): Promise<string | null> {
        if (this.contentTypes.has(url)) {
            return this.contentTypes.get(url) ?? null;
        }

        const cached = this.options.cache.cachedDownload(url);
        const cachedType = baseContentType(cached?.headers['content-type']);
        if (cachedType) {
            this.contentTypes.set(url, cachedType);
            return cachedType;
        }

        let contentType: string | null = null;
        try {
            let response = await this.send(url, 'HEAD', headers);
            if (HEAD_REFUSED_STATUSES.has(response.status)) {
                response = await this.send(url, 'GET', headers);
                await cancelBody(response);
            }
            if (response.ok) {
                contentType = baseContentType(
                    response.headers.get('content-type'),
                );
            }
        } catch (error) {
            const message =
                error instanceof Error ? error.message : String(error);
            this.verbose('warn', `Could not probe ${url}: ${message}`, { url });
        }

        this.contentTypes.set(url, contentType);
        return contentType;
    }

    /**
     * Fetches a small text resource (robots.txt, a sitemap, a manifest)
     * without caching it.
     *
     * @returns The body, or null on any failure
     */
    async fetchText(
        url: string,
        headers?: Record<string, string>,
    ): Promise<string | null> {
        try {
            const response = await this.send(url, 'GET', headers);
            if (!response.ok) {
                await cancelBody(response);
                this.verbose('debug', `HTTP ${response.status} for ${url}`, {
                    url,
                });
                return null;
            }
            return await response.text();
        } catch (error) {
            const message =
                error instanceof Error ? error.message : String(error);
            this.verbose('warn', `Could not fetch ${url}: ${message}`, { url });
            return null;
        }
    }

    /**
     * Streams the body of `url` onto the end of an open file. Used to
     * concatenate stream segments.
     *
     * @returns Number of bytes written
     * @throws {FetchError} On network failure or a non-2xx status
     */
    async appendToFile(
        url: string,
        handle: FileHandle,
        headers?: Record<string, string>,
    ): Promise<number> {
        const response = await this.send(url, 'GET', headers);
        if (!response.ok) {
            await cancelBody(response);
            throw new FetchError(url, new Error(`HTTP ${response.status}`));
        }

        let written = 0;
        for await (const chunk of readBody(response)) {
            await handle.write(chunk);
            written += chunk.byteLength;
        }
        return written;
    }

    private async send(
        url: string,
        method: 'GET' | 'HEAD',
        headers?: Record<string, string>,
    ): Promise<Response> {
        this.requestCount++;
        return robustFetch(url, {
            method,
            redirect: 'follow',
            retries: this.options.retries,
            headers: {
                ...DEFAULT_HEADERS,
                ...(this.options.userAgent
                    ? { 'User-Agent': this.options.userAgent }
                    : {}),
                ...headers,
            },
        });
    }

    private async streamToFile(
        response: Response,
        url: string,
        path: string,
    ): Promise<string> {
        const total = Number(response.headers.get('content-length') ?? 0) || 0;
        const hash = createHash('sha1');
        let received = 0;

        this.options.onProgress?.({
            type: 'download',
            phase: 'start',
            url,
            receivedBytes: 0,
            totalBytes: total,
        });

        const handle = await open(path, 'w');
        try {
            for await (const chunk of readBody(response)) {
                await handle.write(chunk);
                hash.update(chunk);
                received += chunk.byteLength;
                this.options.onProgress?.({
                    type: 'download',
                    phase: 'progress',
                    url,
                    receivedBytes: received,
                    totalBytes: total,
                });
            }
        } finally {
            await handle.close();
        }

        this.options.onProgress?.({
            type: 'download',
            phase: 'complete',
            url,
            receivedBytes: received,
            totalBytes: total,
        });

        if (total > 0 && received < total) {
            throw new ContentLengthMismatchError(url, total, received);
        }
        return hash.digest('hex');
    }

    /**
     * A cache entry that can be returned as-is: anything but a success whose
     * file has disappeared since it was recorded.
     */
    private validCacheEntry(url: string): DownloadedFile | undefined {
        const entry = this.options.cache.cachedDownload(url);
        if (!entry) {
            return undefined;
        }
        if (
            entry.result === 'SUCCESS' &&
            (!entry.filename || !existsSync(entry.filename))
        ) {
            return undefined;
        }
        return entry;
    }

    private async record(
        finalUrl: string,
        originalUrl: string,
        entry: DownloadedFile,
    ): Promise<DownloadedFile> {
        const alternates = originalUrl === finalUrl ? [] : [originalUrl];
        await this.options.cache.storeDownload(finalUrl, entry, alternates);
        return entry;
    }

    private verbose(
        level: VerboseLevel,
        message: string,
        data?: Record<string, unknown>,
    ): void {
        this.options.onVerbose?.({
            type: 'verbose',
            level,
            source: 'fetcher',
            message,
            data,
        });
    }
}

// ============================================================================
// PLACEMENT
// ============================================================================

/**
 * Moves a finished download to `target`, resolving a collision according to
 * `policy`.
 *
 * @returns The path the content now lives at
 */
export async function placeFile(
    tempPath: string,
    target: string,
    newHash: string,
    policy: DuplicatePolicy,
    url: string,
): Promise<string> {
    if (!existsSync(target)) {
        await rename(tempPath, target);
        return target;
    }

    switch (policy) {
        case DuplicatePolicy.OVERWRITE:
            await unlink(target);
            await rename(tempPath, target);
            return target;
        case DuplicatePolicy.THROW_ERROR:
            await unlink(tempPath);
            throw new DuplicateFileError(target, url);
        case DuplicatePolicy.SKIP:
            await unlink(tempPath);
            return target;
        case DuplicatePolicy.HASH_COMPARE:
            if ((await hashFile(target)) === newHash) {
                await unlink(tempPath);
                return target;
            }
            return moveToFreeName(tempPath, target);
        case DuplicatePolicy.FIND_VALID_FILE:
            return moveToFreeName(tempPath, target);
    }
}

async function moveToFreeName(tempPath: string, target: string) {
    let n = 1;
    let candidate = numberedFilename(target, n);
    while (existsSync(candidate)) {
        n++;
        candidate = numberedFilename(target, n);
    }
    await rename(tempPath, candidate);
    return candidate;
}

/**
 * SHA-1 of a file's content, hex encoded.
 */
export async function hashFile(path: string): Promise<string> {
    const hash = createHash('sha1');
    for await (const chunk of createReadStream(path)) {
        hash.update(chunk);
    }
    return hash.digest('hex');
}

function urlHash(url: string): string {
    return createHash('md5').update(url).digest('hex').slice(0, 12);
}

function headersToRecord(headers: Headers): Record<string, string> {
    const record: Record<string, string> = {};
    headers.forEach((value, name) => {
        record[name.toLowerCase()] = value;
    });
    return record;
}

async function* readBody(response: Response): AsyncGenerator<Uint8Array> {
    if (!response.body) {
        return;
    }
    const reader = response.body.getReader();
    try {
        while (true) {
            const { done, value } = await reader.read();
            if (done) {
                return;
            }
            yield value;
        }
    } finally {
        reader.releaseLock();
    }
}

async function cancelBody(response: Response): Promise<void> {
    if (response.body && !response.bodyUsed) {
        await response.body.cancel();
    }
}
