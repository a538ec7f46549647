/**
 * Sitemap discovery: robots.txt `Sitemap:` lines, then the sitemaps
 * themselves (one level of sitemap index is followed).
 */

import { parse } from 'node-html-parser';
import type { ContentFetcher } from '@siteripper/http';
import type { VerboseCallback } from '@siteripper/types';
import { originOf } from '@siteripper/utils';

export interface RobotsGroup {
    userAgents: string[];
    disallow: string[];
    allow: string[];
}

export interface RobotsTxt {
    groups: RobotsGroup[];
    sitemaps: string[];
}

/**
 * Parses robots.txt. Field names are case-insensitive, `#` starts a
 * comment, and consecutive `User-agent` lines share one group.
 */
export function parseRobotsTxt(text: string): RobotsTxt {
    const groups: RobotsGroup[] = [];
    const sitemaps: string[] = [];
    let current: RobotsGroup | null = null;
    let collectingAgents = false;

    for (const rawLine of text.split(/\r?\n/)) {
        const line = rawLine.replace(/#.*$/, '').trim();
        const colon = line.indexOf(':');
        if (colon === -1) {
            continue;
        }
        const field = line.slice(0, colon).trim().toLowerCase();
        const value = line.slice(colon + 1).trim();

        switch (field) {
            case 'user-agent':
                if (!current || !collectingAgents) {
                    current = { userAgents: [], disallow: [], allow: [] };
                    groups.push(current);
                }
                current.userAgents.push(value);
                collectingAgents = true;
                break;
            case 'disallow':
            case 'allow':
                collectingAgents = false;
                if (current && value) {
                    current[field].push(value);
                }
                break;
            case 'sitemap':
                if (value) {
                    sitemaps.push(value);
                }
                break;
            default:
                collectingAgents = false;
        }
    }

    return { groups, sitemaps };
}

export interface SitemapEntry {
    loc: string;
    lastmod?: string;
}

export interface Sitemap {
    kind: 'urlset' | 'sitemapindex';
    entries: SitemapEntry[];
}

/**
 * Parses a sitemap or sitemap index document.
 */
export function parseSitemap(xml: string): Sitemap {
    const root = parse(xml);
    const isIndex = root.querySelector('sitemapindex') !== null;
    const entryTag = isIndex ? 'sitemap' : 'url';

    const entries: SitemapEntry[] = [];
    for (const node of root.querySelectorAll(entryTag)) {
        const loc = node.querySelector('loc')?.text.trim();
        if (!loc) {
            continue;
        }
        const lastmod = node.querySelector('lastmod')?.text.trim();
        entries.push(lastmod ? { loc, lastmod } : { loc });
    }

    return { kind: isIndex ? 'sitemapindex' : 'urlset', entries };
}

/**
 * Page URLs listed in the sitemaps of `baseUrl`'s site. Sitemaps named in
 * robots.txt are used when present, `/sitemap.xml` otherwise. Missing or
 * unreadable documents yield no URLs.
 */
export async function discoverSitemapUrls(
    fetcher: ContentFetcher,
    baseUrl: string,
    onVerbose?: VerboseCallback,
): Promise<string[]> {
    const origin = originOf(baseUrl);
    const robots = await fetcher.fetchText(`${origin}/robots.txt`);
    const declared = robots ? parseRobotsTxt(robots).sitemaps : [];
    const sitemapUrls = declared.length > 0 ? declared : [`${origin}/sitemap.xml`];

    const pages: string[] = [];
    const seen = new Set<string>();
    const collect = (sitemap: Sitemap) => {
        for (const { loc } of sitemap.entries) {
            if (!seen.has(loc)) {
                seen.add(loc);
                pages.push(loc);
            }
        }
    };

    for (const sitemapUrl of sitemapUrls) {
        const xml = await fetcher.fetchText(sitemapUrl);
        if (!xml) {
            continue;
        }
        const sitemap = parseSitemap(xml);
        if (sitemap.kind === 'urlset') {
            collect(sitemap);
            continue;
        }
        for (const child of sitemap.entries) {
            const childXml = await fetcher.fetchText(child.loc);
            if (childXml) {
                const childMap = parseSitemap(childXml);
                if (childMap.kind === 'urlset') {
                    collect(childMap);
                }
            }
        }
    }

    onVerbose?.({
        type: 'verbose',
        level: 'info',
        source: 'sitemap',
        message: `Found ${pages.length} URLs in ${sitemapUrls.length} sitemap(s)`,
        data: { baseUrl, count: pages.length },
    });
    return pages;
}
