/**
 * Asset handler contract.
 */

import type { ContentFetcher } from '@siteripper/http';
import type {
    DownloadCache,
    GroupByMapping,
    ScrapeJob,
    VerboseLevel,
} from '@siteripper/types';
import type { BrowserPage, PageElement, Selector } from '../types.js';

/**
 * Everything a handler needs to capture one element of one page.
 */
export interface HandlerContext {
    page: BrowserPage;
    pageUrl: string;
    element: PageElement;
    /** Position of the element among those this handler claimed on the page. */
    index: number;
    /** Number of elements this handler claimed on the page. */
    count: number;
    fetcher: ContentFetcher;
    downloads: DownloadCache;
    /** Asset directory of the page (`<page dir>/<data directory>`). */
    dataDir: string;
    groupBy: GroupByMapping;
    /** Page title from the content-name rule, if configured. */
    title?: string;
    /** Referer and Origin of the page, for requests the page would make. */
    headers: Record<string, string>;
    /** Absolute URLs already captured on this page. */
    captured: Set<string>;
    log(level: VerboseLevel, message: string, data?: Record<string, unknown>): void;
}

/**
 * Captures one kind of element: finds the media it refers to, downloads it
 * and describes how the page HTML must change.
 */
export interface AssetHandler {
    readonly name: string;
    /** {@link ScrapeElements} flag that enables this handler. */
    readonly element: number;
    /** Elements the handler is offered. */
    readonly selector: Selector;
    canHandle(element: PageElement): Promise<boolean>;
    /**
     * Captures the element. A failed download still yields its jobs, with a
     * null `localPath`.
     */
    handle(context: HandlerContext): Promise<ScrapeJob[]>;
}

/**
 * Ideal filename for the element at `index` of `count` when the page has a
 * title: the title itself for a lone element, `title - n` otherwise.
 */
export function idealNameFor(
    title: string | undefined,
    index: number,
    count: number,
): string | undefined {
    if (!title) {
        return undefined;
    }
    return count > 1 ? `${title} - ${index + 1}` : title;
}
