import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdtemp, readFile, readdir, rm, writeFile } from 'fs/promises';
import { join } from 'path';
import { tmpdir } from 'os';
import { http, HttpResponse } from 'msw';
import { ContentFetcher, loadGroupByMapping } from '@siteripper/http';
import { CrawlCache } from '@siteripper/state';
import { ScrapeElements, type GroupByMapping } from '@siteripper/types';
import { server, pngBytes } from '../../../test/helpers/msw-handlers.js';
import { CrawlQueue } from '../src/crawl-queue.js';
import { FailureLog, FAILED_IFRAMES_FILE } from '../src/failure-log.js';
import { defaultHandlers } from '../src/handlers/index.js';
import {
    EmbeddedPlayerHandler,
    VIDEO_SNIPPET,
} from '../src/handlers/embedded-player.js';
import type { StreamMuxer } from '../src/handlers/stream-assembly.js';
import type { AssetHandler } from '../src/handlers/types.js';
import { PageProcessor, type PageProcessorConfig } from '../src/page-processor.js';
import { FakePage, type FakeSiteOptions } from './helpers/fake-browser.js';

const BASE = 'https://example.com';

function page(html: string): string {
    return `<html><body>${html}</body></html>`;
}

function head(url: string, contentType: string, onHit?: () => void) {
    return http.head(url, () => {
        onHit?.();
        return new HttpResponse(null, {
            headers: { 'Content-Type': contentType },
        });
    });
}

function htmlHead(url: string) {
    return head(url, 'text/html; charset=utf-8');
}

function binary(url: string, body: Uint8Array, contentType: string, onHit?: () => void) {
    return http.get(url, () => {
        onHit?.();
        return new HttpResponse(body, { headers: { 'Content-Type': contentType } });
    });
}

class RecordingMuxer implements StreamMuxer {
    readonly calls: string[][] = [];

    async mux(videoPath: string, audioPath: string, outputPath: string): Promise<void> {
        this.calls.push([videoPath, audioPath, outputPath]);
        const video = await readFile(videoPath);
        const audio = await readFile(audioPath);
        await writeFile(outputPath, Buffer.concat([video, audio]));
    }
}

describe('PageProcessor', () => {
    let dir: string;
    let outDir: string;
    let cache: CrawlCache;
    let fetcher: ContentFetcher;
    let groupBy: GroupByMapping;
    let iframeFailures: FailureLog;

    beforeEach(async () => {
        dir = await mkdtemp(join(tmpdir(), 'page-processor-test-'));
        outDir = join(dir, 'out');
        cache = await CrawlCache.open(join(dir, 'cache'));
        fetcher = new ContentFetcher({ cache, retries: 0 });
        groupBy = await loadGroupByMapping();
        iframeFailures = await FailureLog.open(join(dir, 'cache', FAILED_IFRAMES_FILE));
    });

    afterEach(async () => {
        await cache.close();
        await rm(dir, { recursive: true, force: true });
    });

    function processor(
        site: FakeSiteOptions,
        config: Partial<PageProcessorConfig> = {},
        handlers: AssetHandler[] = defaultHandlers(),
    ) {
        const tab = new FakePage(site);
        const instance = new PageProcessor({
            config: {
                outDir,
                dataDirectory: 'data',
                elements: ScrapeElements.ALL,
                scrollPauseMs: 0,
                substringsToSkip: [],
                iframeIgnore: {},
                ...config,
            },
            page: tab,
            fetcher,
            cache,
            handlers,
            groupBy,
            iframeFailures,
        });
        return { tab, instance };
    }

    it('should capture images and rewrite their references', async () => {
        const hits: string[] = [];
        server.use(
            binary('https://cdn.example.com/a.png', pngBytes(1), 'image/png', () => hits.push('a')),
            binary('https://example.com/img/b.png', pngBytes(2), 'image/png', () => hits.push('b')),
            binary('https://cdn.example.com/c.png', pngBytes(3), 'image/png', () => hits.push('c')),
        );
        const { instance } = processor(
            {
                pages: {
                    'https://example.com/gallery': page(
                        '<img src="https://cdn.example.com/a.png"><img src="/img/b.png">' +
                            '<img src="https://cdn.example.com/c.png">',
                    ),
                },
            },
            { elements: ScrapeElements.IMAGES },
        );

        const result = await instance.process('https://example.com/gallery', BASE);

        expect(hits).toEqual(['a', 'b', 'c']);
        expect(result.outputFile).toBe(join(outDir, 'gallery', 'index.html'));
        expect(await readFile(result.outputFile, 'utf-8')).toBe(
            page(
                '<img src="./data/images/a.png"><img src="./data/images/b.png">' +
                    '<img src="./data/images/c.png">',
            ),
        );
        expect((await readdir(join(outDir, 'gallery', 'data', 'images'))).sort()).toEqual([
            'a.png',
            'b.png',
            'c.png',
        ]);
        expect(cache.isCompleted('https://example.com/gallery', BASE)).toBe(true);
    });

    it('should name media after the page title', async () => {
        server.use(
            binary('https://cdn.example.com/1.png', pngBytes(1), 'image/png'),
            binary('https://cdn.example.com/2.png', pngBytes(2), 'image/png'),
        );
        const { instance } = processor(
            {
                pages: {
                    'https://example.com/lesson': page(
                        '<h1>Lesson 3</h1><img src="https://cdn.example.com/1.png">' +
                            '<img src="https://cdn.example.com/2.png">',
                    ),
                },
                xpath: { '//h1': 'Lesson 3' },
            },
            {
                elements: ScrapeElements.IMAGES,
                contentName: { xpath: '//h1', prefix: 'Course - ' },
            },
        );

        await instance.process('https://example.com/lesson', BASE);

        expect((await readdir(join(outDir, 'lesson', 'data', 'images'))).sort()).toEqual([
            'Course - Lesson 3 - 1.png',
            'Course - Lesson 3 - 2.png',
        ]);
    });

    it('should rewrite skipped links but only return followable ones', async () => {
        server.use(htmlHead('https://example.com/a'), htmlHead('https://example.com/private/b'));
        const { instance } = processor(
            {
                pages: {
                    'https://example.com/': page(
                        '<a href="/a">A</a><a href="/private/b">B</a><a href="#top">Top</a>',
                    ),
                },
            },
            { elements: ScrapeElements.NONE, substringsToSkip: ['/private'] },
        );
        const queue = new CrawlQueue();

        const result = await instance.process('https://example.com/', BASE, queue);

        expect(result.links).toEqual(['https://example.com/a']);
        expect(queue.pending()).toEqual(['https://example.com/a']);
        expect(cache.queuedUrls(BASE)).toEqual(['https://example.com/a']);
        expect(await readFile(join(outDir, 'index.html'), 'utf-8')).toBe(
            page(
                '<a href="./a/index.html">A</a><a href="./private/b/index.html">B</a>' +
                    '<a href="#top">Top</a>',
            ),
        );
    });

    it('should download linked files instead of following them', async () => {
        server.use(
            http.head('https://example.com/files/guide.pdf', () => {
                return new HttpResponse(null, {
                    headers: { 'Content-Type': 'application/pdf' },
                });
            }),
            binary(
                'https://example.com/files/guide.pdf',
                new Uint8Array([0x25, 0x50, 0x44, 0x46]),
                'application/pdf',
            ),
        );
        const { instance } = processor(
            {
                pages: {
                    'https://example.com/docs': page('<a href="/files/guide.pdf">Guide</a>'),
                },
            },
            { elements: ScrapeElements.NONE },
        );

        const result = await instance.process('https://example.com/docs', BASE, new CrawlQueue());

        expect(result.links).toEqual([]);
        expect(await readFile(join(outDir, 'docs', 'index.html'), 'utf-8')).toBe(
            page('<a href="./data/documents/guide.pdf">Guide</a>'),
        );
    });

    it('should skip a media source that serves an HTML page', async () => {
        server.use(
            http.get('https://cdn.example.com/broken.png', () => {
                return HttpResponse.html('<h1>Not found</h1>');
            }),
        );
        const html = page('<img src="https://cdn.example.com/broken.png">');
        const { instance } = processor(
            { pages: { 'https://example.com/broken': html } },
            { elements: ScrapeElements.IMAGES },
        );

        const result = await instance.process('https://example.com/broken', BASE);

        expect(result.jobs).toEqual([
            { kind: 'url', original: 'https://cdn.example.com/broken.png', localPath: null },
        ]);
        expect(cache.cachedDownload('https://cdn.example.com/broken.png')?.result).toBe(
            'SKIPPED',
        );
        expect(await readdir(join(outDir, 'broken'))).toEqual(['index.html']);
        expect(await readFile(result.outputFile, 'utf-8')).toBe(html);
    });

    it('should capture off-site URLs embedded in the source but not same-site ones', async () => {
        let sameSiteHits = 0;
        server.use(
            head('https://example.com/static/bg.png', 'image/png', () => sameSiteHits++),
            binary('https://example.com/static/bg.png', pngBytes(1), 'image/png', () => sameSiteHits++),
            head('https://cdn.example.net/img/hero.png', 'image/png'),
            binary('https://cdn.example.net/img/hero.png', pngBytes(2), 'image/png'),
        );
        const { instance } = processor(
            {
                pages: {
                    'https://example.com/styled': page(
                        '<div style="background: url(https://example.com/static/bg.png)"></div>' +
                            '<script>var hero = "https://cdn.example.net/img/hero.png";</script>',
                    ),
                },
            },
            { elements: ScrapeElements.HTML },
        );

        const result = await instance.process('https://example.com/styled', BASE);

        expect(sameSiteHits).toBe(0);
        expect(await readFile(result.outputFile, 'utf-8')).toBe(
            page(
                '<div style="background: url(https://example.com/static/bg.png)"></div>' +
                    '<script>var hero = "./data/images/hero.png";</script>',
            ),
        );
        expect(await readdir(join(outDir, 'styled', 'data', 'images'))).toEqual(['hero.png']);
    });

    it('should rewrite a relative href without touching other attributes', async () => {
        server.use(htmlHead('https://example.com/docs'));
        const { instance } = processor(
            {
                pages: {
                    'https://example.com/': page(
                        '<a href="docs">D</a><span class="docs">x</span><img alt="docs">',
                    ),
                },
            },
            { elements: ScrapeElements.NONE },
        );

        const result = await instance.process('https://example.com/', BASE, new CrawlQueue());

        expect(result.links).toEqual(['https://example.com/docs']);
        expect(await readFile(result.outputFile, 'utf-8')).toBe(
            page('<a href="./docs/index.html">D</a><span class="docs">x</span><img alt="docs">'),
        );
    });

    it('should mirror pages that differ only by query to their own directories', async () => {
        server.use(htmlHead('https://example.com/list'));
        const { instance } = processor(
            {
                pages: {
                    'https://example.com/list?page=1': page('<a href="/list?page=2">Next</a>'),
                    'https://example.com/list?page=2': page('<p>two</p>'),
                },
            },
            { elements: ScrapeElements.NONE },
        );

        const first = await instance.process('https://example.com/list?page=1', BASE);
        const second = await instance.process('https://example.com/list?page=2', BASE);

        expect(first.outputFile).toBe(join(outDir, 'list_page=1', 'index.html'));
        expect(second.outputFile).toBe(join(outDir, 'list_page=2', 'index.html'));
        expect(await readFile(first.outputFile, 'utf-8')).toBe(
            page('<a href="./../list_page=2/index.html">Next</a>'),
        );
        expect(await readFile(second.outputFile, 'utf-8')).toBe(page('<p>two</p>'));
    });

    it('should log unhandled iframes once and honour the ignore list', async () => {
        const site = {
            pages: {
                'https://example.com/embeds': page(
                    '<iframe src="https://widgets.example.net/w1"></iframe>' +
                        '<iframe src="https://ads.example.net/slot"></iframe>',
                ),
            },
        };
        const config = {
            elements: ScrapeElements.IFRAMES,
            iframeIgnore: { 'ads.example.net': 'advertising' },
        };

        await processor(site, config).instance.process('https://example.com/embeds', BASE);
        await processor(site, config).instance.process('https://example.com/embeds', BASE);

        const lines = (await readFile(iframeFailures.path, 'utf-8')).split('\n');
        expect(lines).toHaveLength(2);
        expect(lines[0].startsWith('https://widgets.example.net/w1\t<iframe')).toBe(true);
        expect(lines[1]).toBe('');
    });

    it('should replace a player iframe with its best progressive rendition', async () => {
        const config =
            '{"request":{"files":{"progressive":[' +
            '{"quality":"360p","url":"https://cdn.example.com/v/360.mp4"},' +
            '{"quality":"1080p","url":"https://cdn.example.com/v/1080.mp4"}]}},' +
            '"video":{"title":"Welcome Tour"}}';
        server.use(binary('https://cdn.example.com/v/1080.mp4', new Uint8Array([1, 2, 3]), 'video/mp4'));
        const { instance } = processor(
            {
                pages: {
                    'https://example.com/watch': page(
                        '<iframe id="player1" src="https://player.vimeo.com/video/42"></iframe>',
                    ),
                },
                frames: {
                    'https://player.vimeo.com/video/42': `<script>window.playerConfig = ${config};</script>`,
                },
            },
            { elements: ScrapeElements.IFRAMES },
        );

        await instance.process('https://example.com/watch', BASE);

        expect(await readFile(join(outDir, 'watch', 'index.html'), 'utf-8')).toBe(
            page(VIDEO_SNIPPET.replace('{{src}}', './data/videos/Welcome Tour.mp4')),
        );
    });

    it('should reassemble a segmented stream and mux its tracks', async () => {
        const base64 = (text: string) => Buffer.from(text).toString('base64');
        const manifest = {
            base_url: '../',
            video: [
                {
                    id: 'v360',
                    base_url: 'v360/',
                    mime_type: 'video/mp4',
                    height: 360,
                    init_segment: base64('LO'),
                    segments: [{ url: 's1.m4s' }],
                },
                {
                    id: 'v720',
                    base_url: 'v720/',
                    mime_type: 'video/mp4',
                    height: 720,
                    init_segment: base64('VH'),
                    segments: [{ url: 's1.m4s' }, { url: 's2.m4s' }],
                },
            ],
            audio: [
                {
                    id: 'a1',
                    base_url: 'a1/',
                    mime_type: 'audio/mp4',
                    bitrate: 128000,
                    init_segment: base64('AI'),
                    segments: [{ url: 's1.m4s' }],
                },
            ],
        };
        const text = (url: string, body: string) => http.get(url, () => HttpResponse.text(body));
        server.use(
            http.get('https://vod.example.com/exp/master.json', () => HttpResponse.json(manifest)),
            text('https://vod.example.com/v720/s1.m4s', 'V1'),
            text('https://vod.example.com/v720/s2.m4s', 'V2'),
            text('https://vod.example.com/a1/s1.m4s', 'A1'),
        );
        const config =
            '{"request":{"files":{"dash":{"default_cdn":"main","cdns":' +
            '{"main":{"url":"https://vod.example.com/exp/master.json"}}}}},' +
            '"video":{"title":"Deep Dive"}}';
        const muxer = new RecordingMuxer();
        const { instance } = processor(
            {
                pages: {
                    'https://example.com/stream': page(
                        '<iframe src="https://player.vimeo.com/video/7"></iframe>',
                    ),
                },
                frames: {
                    'https://player.vimeo.com/video/7': `<script>var c = ${config};</script>`,
                },
            },
            { elements: ScrapeElements.IFRAMES },
            [new EmbeddedPlayerHandler(muxer)],
        );

        await instance.process('https://example.com/stream', BASE);

        const videos = join(outDir, 'stream', 'data', 'videos');
        expect(muxer.calls).toHaveLength(1);
        expect(await readdir(videos)).toEqual(['Deep Dive.mkv']);
        expect(await readFile(join(videos, 'Deep Dive.mkv'), 'utf-8')).toBe('VHV1V2AIA1');
        expect(cache.cachedDownload('https://vod.example.com/exp/master.json')?.filename).toBe(
            join(videos, 'Deep Dive.mkv'),
        );
        expect(await readFile(join(outDir, 'stream', 'index.html'), 'utf-8')).toBe(
            page(VIDEO_SNIPPET.replace('{{src}}', './data/videos/Deep Dive.mkv')),
        );
    });
});
