/**
 * Crawl orchestration: seeds the frontier, paces requests and drives the
 * page processor until every base is exhausted.
 */

import type { ContentFetcher } from '@siteripper/http';
import type { CrawlCache } from '@siteripper/state';
import {
    CrawlMode,
    type JobConfig,
    type PageProgressCallback,
    type VerboseCallback,
} from '@siteripper/types';
import {
    baseKeyOf,
    defragment,
    isUrlInDomain,
    randomDelay,
    sleep as defaultSleep,
} from '@siteripper/utils';
import { addToFrontierIfNew, CrawlQueue } from './crawl-queue.js';
import { NavigationError } from './errors.js';
import type { FailureLog } from './failure-log.js';
import type { PageProcessor } from './page-processor.js';
import { discoverSitemapUrls } from './sitemap.js';

export type CrawlConfig = Pick<
    JobConfig,
    | 'mode'
    | 'urls'
    | 'useSitemap'
    | 'resume'
    | 'queueType'
    | 'minDelayMs'
    | 'maxDelayMs'
    | 'navigationFailure'
>;

export interface CrawlOptions {
    config: CrawlConfig;
    processor: PageProcessor;
    cache: CrawlCache;
    fetcher: ContentFetcher;
    /** Receives pages skipped under the `skip` navigation policy. */
    pageFailures: FailureLog;
    onVerbose?: VerboseCallback;
    onPageProgress?: PageProgressCallback;
    sleep?: (ms: number) => Promise<void>;
    random?: () => number;
}

/**
 * Totals of one crawl.
 */
export interface CrawlSummary {
    pagesProcessed: number;
    pagesSkipped: number;
    /** Scrape jobs produced across all pages. */
    jobs: number;
}

/**
 * Runs the configured crawl.
 *
 * Single-page mode processes each seed once without following links.
 * Whole-site mode crawls each seed's origin: it resumes the persisted
 * queue (or clears it when `resume` is off), optionally seeds the sitemap,
 * and processes pages until the frontier is empty. A page is removed from
 * the persisted queue when it is taken and marked completed once written.
 *
 * @throws {NavigationError} Under the `abort` policy, when a page cannot be
 *   loaded
 */
export async function runCrawl(options: CrawlOptions): Promise<CrawlSummary> {
    const { config } = options;
    const sleep = options.sleep ?? defaultSleep;
    const summary: CrawlSummary = { pagesProcessed: 0, pagesSkipped: 0, jobs: 0 };
    const log = (level: 'debug' | 'info' | 'warn' | 'error', message: string) =>
        options.onVerbose?.({ type: 'verbose', level, source: 'crawl', message });

    let first = true;
    const pace = async () => {
        if (!first) {
            const delay = randomDelay(
                config.minDelayMs,
                config.maxDelayMs,
                options.random,
            );
            if (delay > 0) {
                await sleep(delay);
            }
        }
        first = false;
    };

    const visit = async (url: string, base: string, queue: CrawlQueue | null) => {
        await pace();
        try {
            const result = await options.processor.process(url, base, queue);
            summary.pagesProcessed++;
            summary.jobs += result.jobs.length;
        } catch (error) {
            if (!(error instanceof NavigationError) || config.navigationFailure === 'abort') {
                throw error;
            }
            summary.pagesSkipped++;
            log('error', error.message);
            await options.pageFailures.record(url, error.message);
            options.onPageProgress?.({ type: 'page-skipped', url, reason: error.message });
        }
    };

    if (config.mode === CrawlMode.SINGLE_PAGE) {
        const queue = new CrawlQueue('FIFO');
        for (const url of config.urls) {
            queue.enqueue(defragment(url));
        }
        for (let url = queue.dequeue(); url !== null; url = queue.dequeue()) {
            await visit(url, baseKeyOf(url), null);
        }
        return summary;
    }

    for (const seed of config.urls) {
        const base = baseKeyOf(seed);
        if (!config.resume) {
            await options.cache.clearBase(base);
        }

        const queue = new CrawlQueue(config.queueType);
        for (const url of options.cache.queuedUrls(base)) {
            queue.enqueue(url);
        }
        if (queue.size > 0) {
            log('info', `Resuming ${base} with ${queue.size} queued page(s)`);
        }

        await addToFrontierIfNew(queue, options.cache, seed, base);
        if (config.useSitemap) {
            const listed = await discoverSitemapUrls(
                options.fetcher,
                seed,
                options.onVerbose,
            );
            for (const url of listed.filter((url) => isUrlInDomain(base, url))) {
                await addToFrontierIfNew(queue, options.cache, url, base);
            }
        }

        for (let url = queue.dequeue(); url !== null; url = queue.dequeue()) {
            await options.cache.removeQueued(url, base);
            await visit(url, base, queue);
            options.onPageProgress?.({
                type: 'crawl-status',
                base,
                processed: summary.pagesProcessed,
                queued: queue.size,
            });
        }
    }

    return summary;
}
