import { describe, it, expect } from 'vitest';
import { http, HttpResponse } from 'msw';
import { ContentFetcher } from '@siteripper/http';
import type { DownloadCache } from '@siteripper/types';
import { server } from '../../../test/helpers/msw-handlers.js';
import {
    discoverSitemapUrls,
    parseRobotsTxt,
    parseSitemap,
} from '../src/sitemap.js';

const noCache: DownloadCache = {
    cachedDownload: () => undefined,
    storeDownload: async () => {},
};

function xml(url: string, body: string) {
    return http.get(url, () => {
        return new HttpResponse(body, {
            headers: { 'Content-Type': 'application/xml' },
        });
    });
}

describe('parseRobotsTxt', () => {
    it('should group agents and collect sitemaps', () => {
        const robots = [
            '# comment',
            'User-agent: a',
            'User-Agent: b',
            'Disallow: /private # inline comment',
            'Allow: /private/open',
            '',
            'User-agent: *',
            'Disallow:',
            'Sitemap: https://example.com/sitemap-main.xml',
        ].join('\n');

        expect(parseRobotsTxt(robots)).toEqual({
            groups: [
                { userAgents: ['a', 'b'], disallow: ['/private'], allow: ['/private/open'] },
                { userAgents: ['*'], disallow: [], allow: [] },
            ],
            sitemaps: ['https://example.com/sitemap-main.xml'],
        });
    });
});

describe('parseSitemap', () => {
    it('should read url entries', () => {
        const sitemap = parseSitemap(
            '<?xml version="1.0" encoding="UTF-8"?>' +
                '<urlset xmlns="http://www.sitemaps.org/schemas/sitemap/0.9">' +
                '<url><loc>https://example.com/</loc><lastmod>2024-01-02</lastmod></url>' +
                '<url><loc> https://example.com/about </loc></url>' +
                '</urlset>',
        );

        expect(sitemap).toEqual({
            kind: 'urlset',
            entries: [
                { loc: 'https://example.com/', lastmod: '2024-01-02' },
                { loc: 'https://example.com/about' },
            ],
        });
    });

    it('should recognise a sitemap index', () => {
        const sitemap = parseSitemap(
            '<sitemapindex><sitemap><loc>https://example.com/s1.xml</loc></sitemap></sitemapindex>',
        );

        expect(sitemap).toEqual({
            kind: 'sitemapindex',
            entries: [{ loc: 'https://example.com/s1.xml' }],
        });
    });
});

describe('discoverSitemapUrls', () => {
    it('should follow robots.txt and one level of sitemap index', async () => {
        server.use(
            http.get('https://example.com/robots.txt', () => {
                return HttpResponse.text('Sitemap: https://example.com/index.xml');
            }),
            xml(
                'https://example.com/index.xml',
                '<sitemapindex><sitemap><loc>https://example.com/s1.xml</loc></sitemap>' +
                    '<sitemap><loc>https://example.com/s2.xml</loc></sitemap></sitemapindex>',
            ),
            xml(
                'https://example.com/s1.xml',
                '<urlset><url><loc>https://example.com/a</loc></url></urlset>',
            ),
            xml(
                'https://example.com/s2.xml',
                '<urlset><url><loc>https://example.com/b</loc></url>' +
                    '<url><loc>https://example.com/a</loc></url></urlset>',
            ),
        );
        const fetcher = new ContentFetcher({ cache: noCache, retries: 0 });

        expect(await discoverSitemapUrls(fetcher, 'https://example.com/start')).toEqual([
            'https://example.com/a',
            'https://example.com/b',
        ]);
    });

    it('should fall back to /sitemap.xml', async () => {
        server.use(
            xml(
                'https://example.com/sitemap.xml',
                '<urlset><url><loc>https://example.com/only</loc></url></urlset>',
            ),
        );
        const fetcher = new ContentFetcher({ cache: noCache, retries: 0 });

        expect(await discoverSitemapUrls(fetcher, 'https://example.com/')).toEqual([
            'https://example.com/only',
        ]);
    });

    it('should yield nothing when the site has no sitemap', async () => {
        const fetcher = new ContentFetcher({ cache: noCache, retries: 0 });

        expect(await discoverSitemapUrls(fetcher, 'https://example.com/')).toEqual([]);
    });
});
