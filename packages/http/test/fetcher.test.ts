import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdtemp, rm, readdir, readFile, writeFile } from 'fs/promises';
import { join } from 'path';
import { tmpdir } from 'os';
import { http, HttpResponse } from 'msw';
import type {
    DownloadCache,
    DownloadedFile,
    DownloadProgressEvent,
} from '@siteripper/types';
import { server, pngBytes } from '../../../test/helpers/msw-handlers.js';
import {
    ContentFetcher,
    DuplicateFileError,
    loadGroupByMapping,
} from '../src/index.js';

class MemoryCache implements DownloadCache {
    readonly entries = new Map<string, DownloadedFile>();

    cachedDownload(url: string): DownloadedFile | undefined {
        return this.entries.get(url);
    }

    async storeDownload(
        url: string,
        entry: DownloadedFile,
        altUrls: readonly string[] = [],
    ): Promise<void> {
        for (const key of [url, ...altUrls]) {
            if (!this.entries.has(key)) {
                this.entries.set(key, entry);
            }
        }
    }
}

function png(url: string, body: Uint8Array = pngBytes()) {
    return http.get(url, () => {
        return new HttpResponse(body, {
            headers: { 'Content-Type': 'image/png' },
        });
    });
}

describe('ContentFetcher', () => {
    let dir: string;
    let cache: MemoryCache;
    let fetcher: ContentFetcher;

    beforeEach(async () => {
        dir = await mkdtemp(join(tmpdir(), 'fetcher-test-'));
        cache = new MemoryCache();
        fetcher = new ContentFetcher({ cache, retries: 0 });
    });

    afterEach(async () => {
        await rm(dir, { recursive: true, force: true });
    });

    it('should download a file under its URL basename', async () => {
        server.use(png('https://example.com/img/logo.png'));

        const file = await fetcher.fetch({
            url: 'https://example.com/img/logo.png',
            outDir: dir,
        });

        expect(file.result).toBe('SUCCESS');
        expect(file.filename).toBe(join(dir, 'logo.png'));
        expect(file.headers['content-type']).toBe('image/png');
        expect(new Uint8Array(await readFile(join(dir, 'logo.png')))).toEqual(
            pngBytes(),
        );
        expect(await readdir(dir)).toEqual(['logo.png']);
    });

    it('should serve the second fetch of a URL from the cache', async () => {
        let calls = 0;
        server.use(
            http.get('https://example.com/img/logo.png', () => {
                calls++;
                return new HttpResponse(pngBytes(), {
                    headers: { 'Content-Type': 'image/png' },
                });
            }),
        );

        const first = await fetcher.fetch({
            url: 'https://example.com/img/logo.png',
            outDir: dir,
        });
        const second = await fetcher.fetch({
            url: 'https://example.com/img/logo.png',
            outDir: dir,
        });

        expect(second).toEqual(first);
        expect(calls).toBe(1);
        expect(fetcher.requests).toBe(1);
    });

    it('should download again when the cached file was deleted', async () => {
        let calls = 0;
        server.use(
            http.get('https://example.com/img/logo.png', () => {
                calls++;
                return new HttpResponse(pngBytes(), {
                    headers: { 'Content-Type': 'image/png' },
                });
            }),
        );

        await fetcher.fetch({
            url: 'https://example.com/img/logo.png',
            outDir: dir,
        });
        await rm(join(dir, 'logo.png'));
        const again = await fetcher.fetch({
            url: 'https://example.com/img/logo.png',
            outDir: dir,
        });

        expect(calls).toBe(2);
        expect(again.filename).toBe(join(dir, 'logo.png'));
    });

    it('should skip ignored content types without writing a file', async () => {
        server.use(
            http.get('https://example.com/page', () => {
                return new HttpResponse('<html></html>', {
                    headers: { 'Content-Type': 'text/html; charset=utf-8' },
                });
            }),
        );

        const file = await fetcher.fetch({
            url: 'https://example.com/page',
            outDir: dir,
            ignoredContentTypes: ['text/html'],
        });

        expect(file.result).toBe('SKIPPED');
        expect(file.filename).toBeNull();
        expect(await readdir(dir)).toEqual([]);
        expect(cache.cachedDownload('https://example.com/page')?.result).toBe(
            'SKIPPED',
        );
    });

    it('should report HTTP errors as FAIL', async () => {
        const file = await fetcher.fetch({
            url: 'https://example.com/missing/a.png',
            outDir: dir,
        });

        expect(file.result).toBe('FAIL');
        expect(file.filename).toBeNull();
    });

    it('should record network failures so they are not retried', async () => {
        let hits = 0;
        server.use(
            http.get('https://cdn.example.com/down.png', () => {
                hits++;
                return HttpResponse.error();
            }),
        );

        const first = await fetcher.fetch({
            url: 'https://cdn.example.com/down.png',
            outDir: dir,
        });
        const second = await fetcher.fetch({
            url: 'https://cdn.example.com/down.png',
            outDir: dir,
        });

        expect(first).toEqual({ result: 'FAIL', filename: null, headers: {} });
        expect(second).toEqual(first);
        expect(hits).toBe(1);
        expect(cache.cachedDownload('https://cdn.example.com/down.png')?.result).toBe(
            'FAIL',
        );
    });

    it('should fail a body shorter than its Content-Length', async () => {
        server.use(
            http.get('https://example.com/short.png', () => {
                return new HttpResponse(pngBytes(), {
                    headers: {
                        'Content-Type': 'image/png',
                        'Content-Length': '100',
                    },
                });
            }),
        );

        const file = await fetcher.fetch({
            url: 'https://example.com/short.png',
            outDir: dir,
        });

        expect(file.result).toBe('FAIL');
        expect(await readdir(dir)).toEqual([]);
    });

    it('should reuse an identical file under HASH_COMPARE', async () => {
        server.use(
            png('https://cdn.example.com/a/logo.png'),
            png('https://cdn.example.com/b/logo.png'),
            png('https://cdn.example.com/c/logo.png', pngBytes(7)),
        );

        const first = await fetcher.fetch({
            url: 'https://cdn.example.com/a/logo.png',
            outDir: dir,
            duplicatePolicy: 'HASH_COMPARE',
        });
        const second = await fetcher.fetch({
            url: 'https://cdn.example.com/b/logo.png',
            outDir: dir,
            duplicatePolicy: 'HASH_COMPARE',
        });

        expect(first.filename).toBe(join(dir, 'logo.png'));
        expect(second.filename).toBe(join(dir, 'logo.png'));
        expect(await readdir(dir)).toEqual(['logo.png']);

        const different = await fetcher.fetch({
            url: 'https://cdn.example.com/c/logo.png',
            outDir: dir,
            duplicatePolicy: 'HASH_COMPARE',
        });
        expect(different.filename).toBe(join(dir, 'logo1.png'));
    });

    it('should refuse to replace a file under THROW_ERROR', async () => {
        server.use(png('https://example.com/img/logo.png'));
        await writeFile(join(dir, 'logo.png'), 'existing');

        await expect(
            fetcher.fetch({
                url: 'https://example.com/img/logo.png',
                outDir: dir,
                duplicatePolicy: 'THROW_ERROR',
            }),
        ).rejects.toThrow(DuplicateFileError);
        expect(await readdir(dir)).toEqual(['logo.png']);
    });

    it('should replace a file under OVERWRITE', async () => {
        server.use(png('https://example.com/img/logo.png'));
        await writeFile(join(dir, 'logo.png'), 'existing');

        const file = await fetcher.fetch({
            url: 'https://example.com/img/logo.png',
            outDir: dir,
            duplicatePolicy: 'OVERWRITE',
        });

        expect(file.filename).toBe(join(dir, 'logo.png'));
        expect(new Uint8Array(await readFile(join(dir, 'logo.png')))).toEqual(
            pngBytes(),
        );
    });

    it('should group files by extension and apply the ideal name', async () => {
        server.use(
            http.get('https://example.com/v/clip.mp4', () => {
                return new HttpResponse(new Uint8Array([1, 2, 3]), {
                    headers: { 'Content-Type': 'video/mp4' },
                });
            }),
        );
        const groupBy = await loadGroupByMapping();

        const file = await fetcher.fetch({
            url: 'https://example.com/v/clip.mp4',
            outDir: dir,
            groupBy,
            idealFilename: 'Lesson 1: Intro',
        });

        expect(file.filename).toBe(join(dir, 'videos', 'Lesson 1 Intro.mp4'));
    });

    it('should emit progress events', async () => {
        const events: DownloadProgressEvent[] = [];
        const reporting = new ContentFetcher({
            cache,
            retries: 0,
            onProgress: (event) => events.push(event),
        });
        server.use(png('https://example.com/img/logo.png'));

        await reporting.fetch({
            url: 'https://example.com/img/logo.png',
            outDir: dir,
        });

        expect(events[0].phase).toBe('start');
        const last = events[events.length - 1];
        expect(last.phase).toBe('complete');
        expect(last.url).toBe('https://example.com/img/logo.png');
        expect(last.receivedBytes).toBe(9);
    });

    describe('probeContentType', () => {
        it('should use a HEAD request', async () => {
            server.use(
                http.head('https://example.com/a', () => {
                    return new HttpResponse(null, {
                        headers: { 'Content-Type': 'text/html; charset=utf-8' },
                    });
                }),
            );

            expect(await fetcher.probeContentType('https://example.com/a')).toBe(
                'text/html',
            );
        });

        it('should fall back to GET when HEAD is refused', async () => {
            server.use(
                http.head('https://example.com/file', () => {
                    return new HttpResponse(null, { status: 405 });
                }),
                png('https://example.com/file'),
            );

            expect(
                await fetcher.probeContentType('https://example.com/file'),
            ).toBe('image/png');
        });

        it('should answer from the download cache', async () => {
            await cache.storeDownload('https://example.com/cached.pdf', {
                result: 'SUCCESS',
                filename: null,
                headers: { 'content-type': 'application/pdf' },
            });

            expect(
                await fetcher.probeContentType('https://example.com/cached.pdf'),
            ).toBe('application/pdf');
            expect(fetcher.requests).toBe(0);
        });
    });
});
