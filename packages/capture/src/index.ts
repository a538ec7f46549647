/**
 * Main capture orchestration module
 *
 * Wires a scrape run together: the crawl cache, the content fetcher, the
 * browser session (cookies and login), the page processor and the crawl
 * driver.
 */

import { join } from 'path';
import { ContentFetcher, loadGroupByMapping } from '@siteripper/http';
import { CrawlCache } from '@siteripper/state';
import type {
    DownloadProgressCallback,
    JobConfig,
    PageProgressCallback,
    VerboseCallback,
} from '@siteripper/types';
import { LogDeduplicator } from '@siteripper/utils';
import { BrowserManager } from './browser.js';
import { runCrawl, type CrawlSummary } from './crawl-driver.js';
import {
    FAILED_IFRAMES_FILE,
    FAILED_PAGES_FILE,
    FailureLog,
} from './failure-log.js';
import { defaultHandlers, type AssetHandler } from './handlers/index.js';
import { applyCookies, runLoginScript } from './login.js';
import { PageProcessor } from './page-processor.js';
import type { BrowserPage } from './types.js';

export { BrowserManager, type BrowserOptions } from './browser.js';
export {
    CrawlQueue,
    addToFrontierIfNew,
    type FrontierStore,
} from './crawl-queue.js';
export {
    runCrawl,
    type CrawlConfig,
    type CrawlOptions,
    type CrawlSummary,
} from './crawl-driver.js';
export {
    NavigationError,
    LoginElementNotFoundError,
    StreamReassemblyError,
} from './errors.js';
export {
    FailureLog,
    FAILED_IFRAMES_FILE,
    FAILED_PAGES_FILE,
} from './failure-log.js';
export * from './handlers/index.js';
export {
    scanTags,
    findElementSpan,
    replaceElement,
    decodeEntities,
    type TagToken,
} from './html-scanner.js';
export { extractJsonFromText, isRecord } from './json-text.js';
export {
    applyCookies,
    runLoginScript,
    toSelector,
    LOGIN_ELEMENT_TIMEOUT_MS,
    LOGIN_REDIRECT_TIMEOUT_MS,
    type LoginOptions,
} from './login.js';
export {
    loadPage,
    scrollToBottom,
    NAVIGATION_ATTEMPTS,
    type LoadPageOptions,
} from './page-loader.js';
export {
    PageProcessor,
    pageDirectory,
    type PageProcessorConfig,
    type PageProcessorOptions,
    type PageResult,
} from './page-processor.js';
export { qualityScore, selectBestRendition } from './rendition.js';
export {
    parseRobotsTxt,
    parseSitemap,
    discoverSitemapUrls,
    type RobotsTxt,
    type Sitemap,
    type SitemapEntry,
} from './sitemap.js';
export type {
    BrowserPage,
    PageElement,
    RenderedDocument,
    Selector,
} from './types.js';
export {
    findEmbeddedUrls,
    toAbsoluteWebUrl,
    type EmbeddedUrl,
} from './url-scanner.js';
export {
    rewriteHtml,
    replaceDelimited,
    SRC_PLACEHOLDER,
    type RewriteResult,
} from './url-rewriter.js';

/**
 * A browser tab and the function that releases it.
 */
export interface PageSession {
    page: BrowserPage;
    close(): Promise<void>;
}

export interface ScrapeOptions {
    onVerbose?: VerboseCallback;
    onDownload?: DownloadProgressCallback;
    onPageProgress?: PageProgressCallback;
    /** Opens the tab to crawl with; a Playwright Chromium tab by default. */
    openPage?: (config: JobConfig) => Promise<PageSession>;
    /** Replaces the built-in asset handlers. */
    handlers?: AssetHandler[];
    sleep?: (ms: number) => Promise<void>;
    random?: () => number;
}

/**
 * Totals of one scrape run.
 */
export interface ScrapeResult extends CrawlSummary {
    /** HTTP requests sent by the content fetcher. */
    requests: number;
}

async function openChromiumPage(config: JobConfig): Promise<PageSession> {
    const browser = new BrowserManager({
        headless: config.headless,
        userAgent: config.userAgent,
    });
    try {
        return { page: await browser.newPage(), close: () => browser.close() };
    } catch (error) {
        await browser.close();
        throw error;
    }
}

/**
 * Runs a complete scrape: opens the cache and a browser tab, applies
 * cookies and the login script, crawls, and releases everything again.
 *
 * @example
 * ```typescript
 * const result = await scrape(config, {
 *     onVerbose: (event) => console.log(event.message),
 * });
 * console.log(`${result.pagesProcessed} pages`);
 * ```
 */
export async function scrape(
    config: JobConfig,
    options: ScrapeOptions = {},
): Promise<ScrapeResult> {
    const cache = await CrawlCache.open(config.cacheDir);
    let session: PageSession | null = null;

    try {
        const fetcher = new ContentFetcher({
            cache,
            userAgent: config.userAgent,
            onProgress: options.onDownload,
            onVerbose: options.onVerbose,
        });
        const groupBy = await loadGroupByMapping();
        const iframeFailures = await FailureLog.open(
            join(config.cacheDir, FAILED_IFRAMES_FILE),
        );
        const pageFailures = await FailureLog.open(
            join(config.cacheDir, FAILED_PAGES_FILE),
        );

        session = await (options.openPage ?? openChromiumPage)(config);
        const { page } = session;

        if (config.cookies.length > 0) {
            await applyCookies(page, config.cookies);
        }
        if (config.login) {
            await runLoginScript(page, config.login, {
                onVerbose: options.onVerbose,
                sleep: options.sleep,
            });
        }

        const processor = new PageProcessor({
            config,
            page,
            fetcher,
            cache,
            handlers: options.handlers ?? defaultHandlers(),
            groupBy,
            iframeFailures,
            dedup: new LogDeduplicator(),
            onVerbose: options.onVerbose,
            onPageProgress: options.onPageProgress,
            sleep: options.sleep,
        });

        const summary = await runCrawl({
            config,
            processor,
            cache,
            fetcher,
            pageFailures,
            onVerbose: options.onVerbose,
            onPageProgress: options.onPageProgress,
            sleep: options.sleep,
            random: options.random,
        });
        return { ...summary, requests: fetcher.requests };
    } finally {
        try {
            await session?.close();
        } finally {
            await cache.close();
        }
    }
}
