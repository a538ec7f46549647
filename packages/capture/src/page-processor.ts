/**
 * Processes one page: load, capture assets, discover links, rewrite and
 * persist.
 *
 * Each page walks the states LOADED → EXTRACTING → LINK_DISCOVERY →
 * REWRITING → PERSISTED. Problems with single elements are logged and
 * skipped; only a page that cannot be loaded aborts processing.
 */

import { mkdir, writeFile } from 'fs/promises';
import { join } from 'path';
import type { ContentFetcher } from '@siteripper/http';
import type { CrawlCache } from '@siteripper/state';
import {
    DuplicatePolicy,
    ScrapeElements,
    type GroupByMapping,
    type JobConfig,
    type PageProgressCallback,
    type PageState,
    type ScrapeJob,
    type VerboseCallback,
    type VerboseLevel,
} from '@siteripper/types';
import {
    containsAny,
    defragment,
    isUrlInDomain,
    LogDeduplicator,
    originOf,
    pagePathSegments,
    refererFor,
    siteRelativePath,
    tryParseUrl,
} from '@siteripper/utils';
import { addToFrontierIfNew, type CrawlQueue } from './crawl-queue.js';
import type { FailureLog } from './failure-log.js';
import type { AssetHandler, HandlerContext } from './handlers/types.js';
import { loadPage } from './page-loader.js';
import type { BrowserPage, PageElement } from './types.js';
import { findEmbeddedUrls } from './url-scanner.js';
import { rewriteHtml } from './url-rewriter.js';

/** Content types that denote a page rather than an asset. */
const PAGE_CONTENT_TYPES = new Set(['text/html', 'application/xhtml+xml']);

const NON_NAVIGABLE_HREF = /^(?:#|javascript:|mailto:|tel:|data:)/i;

export type PageProcessorConfig = Pick<
    JobConfig,
    | 'outDir'
    | 'dataDirectory'
    | 'elements'
    | 'scrollPauseMs'
    | 'contentName'
    | 'substringsToSkip'
    | 'iframeIgnore'
>;

export interface PageProcessorOptions {
    config: PageProcessorConfig;
    page: BrowserPage;
    fetcher: ContentFetcher;
    cache: CrawlCache;
    handlers: readonly AssetHandler[];
    groupBy: GroupByMapping;
    /** Receives iframes no handler accepts. */
    iframeFailures: FailureLog;
    /** Shared across pages so repeated problems are logged once per run. */
    dedup?: LogDeduplicator;
    onVerbose?: VerboseCallback;
    onPageProgress?: PageProgressCallback;
    sleep?: (ms: number) => Promise<void>;
}

/**
 * Outcome of one processed page.
 */
export interface PageResult {
    url: string;
    /** Path of the written `index.html`. */
    outputFile: string;
    jobs: ScrapeJob[];
    /** Same-domain pages found on the page that are eligible for crawling. */
    links: string[];
}

interface Claim {
    handler: AssetHandler;
    element: PageElement;
}

/**
 * Directory a page's `index.html` is written to.
 */
export function pageDirectory(outDir: string, url: string): string {
    return join(outDir, ...pagePathSegments(url));
}

/**
 * Rewrite jobs for one anchor. The absolute and site-relative forms are
 * replaced wherever they are quoted; the href as written only as an `href`
 * value.
 */
function linkJobs(
    href: string,
    forms: readonly string[],
    localPath: string | null,
): ScrapeJob[] {
    const jobs = [...new Set(forms)].map((original): ScrapeJob => ({
        kind: 'url',
        original,
        localPath,
    }));
    if (!forms.includes(href)) {
        jobs.push({ kind: 'url', original: href, localPath, attribute: 'href' });
    }
    return jobs;
}

export class PageProcessor {
    private readonly dedup: LogDeduplicator;

    constructor(private readonly options: PageProcessorOptions) {
        this.dedup = options.dedup ?? new LogDeduplicator();
    }

    /**
     * Processes `url`. With a `queue`, eligible links are added to it;
     * without one (single-page mode) links are rewritten but not followed.
     *
     * @param base - Crawl base the page belongs to (its seed's origin)
     * @throws {NavigationError} When the page cannot be loaded
     */
    async process(
        url: string,
        base: string,
        queue: CrawlQueue | null = null,
    ): Promise<PageResult> {
        const { config, page } = this.options;

        await loadPage(page, url, {
            scrollPauseMs: config.scrollPauseMs,
            onVerbose: this.options.onVerbose,
            sleep: this.options.sleep,
        });
        this.transition(url, 'LOADED');

        const pageDir = pageDirectory(config.outDir, url);
        const dataDir = join(pageDir, config.dataDirectory);
        const headers = {
            Referer: refererFor(url),
            Origin: originOf(url),
        };
        const captured = new Set<string>();
        const title = await this.contentTitle();
        const jobs: ScrapeJob[] = [];

        this.transition(url, 'EXTRACTING');
        const context = { pageUrl: url, dataDir, headers, captured, title };
        if (config.elements & ScrapeElements.VIDEOS) {
            jobs.push(...(await this.runHandlers(ScrapeElements.VIDEOS, context)));
        }
        if (config.elements & ScrapeElements.IMAGES) {
            jobs.push(...(await this.runHandlers(ScrapeElements.IMAGES, context)));
        }
        if (config.elements & ScrapeElements.HTML) {
            jobs.push(...(await this.captureEmbeddedUrls(base, context)));
        }
        if (config.elements & ScrapeElements.IFRAMES) {
            jobs.push(...(await this.runHandlers(ScrapeElements.IFRAMES, context)));
        }

        this.transition(url, 'LINK_DISCOVERY');
        const discovery = await this.discoverLinks(url, base, context);
        jobs.push(...discovery.jobs);

        this.transition(url, 'REWRITING');
        const { html, unmatched } = rewriteHtml(await page.content(), jobs, pageDir);
        for (const job of unmatched) {
            this.log('warn', `Element ${job.attribute}="${job.identifier}" not found in ${url}`);
        }

        const outputFile = join(pageDir, 'index.html');
        await mkdir(pageDir, { recursive: true });
        await writeFile(outputFile, html, 'utf-8');
        await this.options.cache.markCompleted(url, base);
        this.transition(url, 'PERSISTED');

        if (queue) {
            let added = 0;
            for (const link of discovery.links) {
                if (await addToFrontierIfNew(queue, this.options.cache, link, base)) {
                    added++;
                }
            }
            this.log('debug', `Queued ${added} new page(s) from ${url}`, { url, added });
        }

        return { url, outputFile, jobs, links: discovery.links };
    }

    // ========================================================================
    // EXTRACTING
    // ========================================================================

    private async contentTitle(): Promise<string | undefined> {
        const rule = this.options.config.contentName;
        if (!rule) {
            return undefined;
        }
        const [element] = await this.options.page.querySelectorAll(
            `xpath=${rule.xpath}`,
        );
        const text = element ? (await element.textContent()).trim() : '';
        if (!text) {
            this.log('debug', `Content name ${rule.xpath} matched nothing`);
            return undefined;
        }
        return rule.prefix + text;
    }

    /**
     * Offers the page's elements to the handlers enabled by `kind` and runs
     * the claims. Iframes nobody claims are written to the failure log.
     */
    private async runHandlers(
        kind: number,
        shared: Pick<HandlerContext, 'pageUrl' | 'dataDir' | 'headers' | 'captured' | 'title'>,
    ): Promise<ScrapeJob[]> {
        const handlers = this.options.handlers.filter(
            (handler) => handler.element === kind,
        );
        const selectors = [...new Set(handlers.map((handler) => handler.selector))];

        const claims: Claim[] = [];
        for (const selector of selectors) {
            for (const element of await this.options.page.querySelectorAll(selector)) {
                if (kind === ScrapeElements.IFRAMES && (await this.isIgnoredIframe(element))) {
                    continue;
                }
                let claimed = false;
                for (const handler of handlers) {
                    if (handler.selector === selector && (await handler.canHandle(element))) {
                        claims.push({ handler, element });
                        claimed = true;
                        break;
                    }
                }
                if (!claimed && kind === ScrapeElements.IFRAMES) {
                    await this.recordUnhandledIframe(element);
                }
            }
        }

        const counts = new Map<AssetHandler, number>();
        for (const { handler } of claims) {
            counts.set(handler, (counts.get(handler) ?? 0) + 1);
        }

        const jobs: ScrapeJob[] = [];
        const indices = new Map<AssetHandler, number>();
        for (const { handler, element } of claims) {
            const index = indices.get(handler) ?? 0;
            indices.set(handler, index + 1);
            try {
                jobs.push(
                    ...(await handler.handle({
                        ...shared,
                        page: this.options.page,
                        element,
                        index,
                        count: counts.get(handler) ?? 1,
                        fetcher: this.options.fetcher,
                        downloads: this.options.cache,
                        groupBy: this.options.groupBy,
                        log: (level, message, data) =>
                            this.log(level, `[${handler.name}] ${message}`, data),
                    })),
                );
            } catch (error) {
                this.log(
                    'error',
                    `[${handler.name}] ${error instanceof Error ? error.message : String(error)}`,
                    { pageUrl: shared.pageUrl },
                );
            }
        }
        return jobs;
    }

    private async iframeIdentifier(element: PageElement): Promise<string> {
        return (
            (await element.getAttribute('src')) ||
            (await element.getAttribute('id')) ||
            ''
        );
    }

    private async isIgnoredIframe(element: PageElement): Promise<boolean> {
        const identifier = await this.iframeIdentifier(element);
        if (!identifier) {
            return true;
        }
        for (const [substring, category] of Object.entries(
            this.options.config.iframeIgnore,
        )) {
            if (identifier.includes(substring)) {
                if (this.dedup.firstTime(`iframe-ignored:${identifier}`)) {
                    this.log('debug', `Ignoring ${category} iframe ${identifier}`);
                }
                return true;
            }
        }
        return false;
    }

    private async recordUnhandledIframe(element: PageElement): Promise<void> {
        const identifier = await this.iframeIdentifier(element);
        const written = await this.options.iframeFailures.record(
            identifier,
            await element.outerHtml(),
        );
        if (written) {
            this.log('warn', `No handler for iframe ${identifier}`);
        }
    }

    /**
     * Downloads off-site resources whose absolute URLs appear in the page
     * source, e.g. in inline scripts or styles. URLs inside the crawl's own
     * domain are left to link discovery.
     */
    private async captureEmbeddedUrls(
        base: string,
        context: Pick<HandlerContext, 'dataDir' | 'headers' | 'captured'>,
    ): Promise<ScrapeJob[]> {
        const { fetcher, groupBy } = this.options;
        const jobs: ScrapeJob[] = [];

        for (const { original, url } of findEmbeddedUrls(await this.options.page.content())) {
            if (context.captured.has(url) || isUrlInDomain(base, url)) {
                continue;
            }
            const contentType = await fetcher.probeContentType(url, context.headers);
            if (contentType === null || PAGE_CONTENT_TYPES.has(contentType)) {
                continue;
            }
            const file = await fetcher.fetch({
                url,
                outDir: context.dataDir,
                headers: context.headers,
                groupBy,
                duplicatePolicy: DuplicatePolicy.HASH_COMPARE,
                ignoredContentTypes: [...PAGE_CONTENT_TYPES],
            });
            context.captured.add(url);
            if (file.result === 'SUCCESS') {
                jobs.push({ kind: 'url', original, localPath: file.filename });
            }
        }
        return jobs;
    }

    // ========================================================================
    // LINK_DISCOVERY
    // ========================================================================

    /**
     * Classifies every anchor: assets are downloaded, same-domain pages are
     * mapped to their future `index.html` and, unless a skip substring
     * matches, returned for crawling.
     */
    private async discoverLinks(
        pageUrl: string,
        base: string,
        context: Pick<HandlerContext, 'dataDir' | 'headers' | 'captured'>,
    ): Promise<{ jobs: ScrapeJob[]; links: string[] }> {
        const { config, fetcher, groupBy } = this.options;
        const jobs: ScrapeJob[] = [];
        const links: string[] = [];
        const seenLinks = new Set<string>();

        for (const anchor of await this.options.page.querySelectorAll('a[href]')) {
            const href = (await anchor.getAttribute('href'))?.trim() ?? '';
            if (!href || NON_NAVIGABLE_HREF.test(href)) {
                continue;
            }
            const resolved = tryParseUrl(href, pageUrl);
            if (!resolved || (resolved.protocol !== 'http:' && resolved.protocol !== 'https:')) {
                if (this.dedup.firstTime(`bad-href:${href}`)) {
                    this.log('debug', `Ignoring link ${href} on ${pageUrl}`);
                }
                continue;
            }
            const link = defragment(resolved.href);

            const contentType = await fetcher.probeContentType(link, context.headers);
            if (contentType !== null && !PAGE_CONTENT_TYPES.has(contentType)) {
                const file = await fetcher.fetch({
                    url: link,
                    outDir: context.dataDir,
                    headers: context.headers,
                    groupBy,
                    duplicatePolicy: DuplicatePolicy.HASH_COMPARE,
                });
                context.captured.add(link);
                const localPath = file.result === 'SUCCESS' ? file.filename : null;
                jobs.push(...linkJobs(href, [link], localPath));
                continue;
            }

            if (contentType === null || !isUrlInDomain(base, link)) {
                continue;
            }

            const target = join(pageDirectory(config.outDir, link), 'index.html');
            const relative = siteRelativePath(link);
            jobs.push(...linkJobs(href, relative ? [link, relative] : [link], target));

            if (containsAny(link, config.substringsToSkip)) {
                if (this.dedup.firstTime(`skip:${link}`)) {
                    this.log('debug', `Not following ${link} (matches a skip substring)`);
                }
                continue;
            }
            if (!seenLinks.has(link)) {
                seenLinks.add(link);
                links.push(link);
            }
        }

        return { jobs, links };
    }

    private transition(url: string, state: PageState): void {
        this.options.onPageProgress?.({ type: 'page-state', url, state });
    }

    private log(
        level: VerboseLevel,
        message: string,
        data?: Record<string, unknown>,
    ): void {
        this.options.onVerbose?.({
            type: 'verbose',
            level,
            source: 'page',
            message,
            data,
        });
    }
}
