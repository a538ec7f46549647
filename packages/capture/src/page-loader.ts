/**
 * Page loading: navigation with redirect convergence and lazy-load scrolling.
 */

import type { VerboseCallback } from '@siteripper/types';
import { isSameUrl, sleep as defaultSleep } from '@siteripper/utils';
import { NavigationError } from './errors.js';
import type { BrowserPage, RenderedDocument } from './types.js';

/** Navigation attempts before a page is given up on. */
export const NAVIGATION_ATTEMPTS = 5;

/** Upper bound on scroll steps, for pages that grow forever. */
export const MAX_SCROLL_STEPS = 200;

const SCROLL_STEP = 'window.scrollBy(0, window.innerHeight - 10)';
const SCROLL_REMAINING =
    'document.body.scrollHeight - document.documentElement.scrollTop';

export interface LoadPageOptions {
    /** Pause after each scroll step, in milliseconds. */
    scrollPauseMs: number;
    onVerbose?: VerboseCallback;
    sleep?: (ms: number) => Promise<void>;
}

/**
 * Navigates to `url` until the browser settles on it, then scrolls to the
 * bottom so lazily loaded content is in the DOM.
 *
 * A navigation that ends on a different URL (a redirect, an interstitial)
 * is retried; trailing slashes are not a difference.
 *
 * @throws {NavigationError} When {@link NAVIGATION_ATTEMPTS} navigations all
 *   end elsewhere
 */
export async function loadPage(
    page: BrowserPage,
    url: string,
    options: LoadPageOptions,
): Promise<void> {
    let lastError: unknown;

    for (let attempt = 1; attempt <= NAVIGATION_ATTEMPTS; attempt++) {
        try {
            await page.goto(url);
        } catch (error) {
            lastError = error;
            options.onVerbose?.({
                type: 'verbose',
                level: 'warn',
                source: 'page-loader',
                message: `Navigation to ${url} failed (attempt ${attempt}): ${
                    error instanceof Error ? error.message : String(error)
                }`,
                data: { url, attempt },
            });
            continue;
        }

        if (isSameUrl(page.url(), url)) {
            await scrollToBottom(
                page,
                options.scrollPauseMs,
                options.sleep ?? defaultSleep,
            );
            return;
        }

        options.onVerbose?.({
            type: 'verbose',
            level: 'debug',
            source: 'page-loader',
            message: `Landed on ${page.url()} instead of ${url} (attempt ${attempt})`,
            data: { url, finalUrl: page.url(), attempt },
        });
    }

    throw new NavigationError(url, NAVIGATION_ATTEMPTS, page.url(), {
        cause: lastError,
    });
}

async function remainingScroll(document: RenderedDocument): Promise<number> {
    const value = await document.evaluate(SCROLL_REMAINING);
    return typeof value === 'number' ? value : 0;
}

/**
 * Scrolls one viewport at a time until the distance to the bottom stops
 * changing.
 */
export async function scrollToBottom(
    document: RenderedDocument,
    pauseMs: number,
    sleep: (ms: number) => Promise<void> = defaultSleep,
): Promise<void> {
    let last = await remainingScroll(document);

    for (let step = 0; step < MAX_SCROLL_STEPS; step++) {
        await document.evaluate(SCROLL_STEP);
        if (pauseMs > 0) {
            await sleep(pauseMs);
        }
        const current = await remainingScroll(document);
        if (current === last) {
            return;
        }
        last = current;
    }
}
