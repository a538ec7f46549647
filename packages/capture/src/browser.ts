/**
 * Browser management for Playwright-based capture
 */

import {
    chromium,
    errors,
    type Browser,
    type BrowserContext,
    type ElementHandle,
    type Frame,
    type Page,
} from 'playwright';
import type { Cookie } from '@siteripper/types';
import type {
    BrowserPage,
    PageElement,
    RenderedDocument,
    Selector,
} from './types.js';

/**
 * Options for configuring browser behavior.
 */
export interface BrowserOptions {
    /** Whether to run the browser in headless mode */
    headless: boolean;
    /** User agent string to use for requests */
    userAgent?: string;
    /** Viewport size for the browser window */
    viewport?: { width: number; height: number };
    /** Navigation timeout in milliseconds */
    navigationTimeoutMs?: number;
}

const DEFAULT_VIEWPORT = { width: 1920, height: 1080 };
const DEFAULT_NAVIGATION_TIMEOUT_MS = 60_000;
const NETWORK_IDLE_TIMEOUT_MS = 5_000;

type Handle = ElementHandle<SVGElement | HTMLElement>;

class PlaywrightElement implements PageElement {
    constructor(private readonly handle: Handle) {}

    getAttribute(name: string): Promise<string | null> {
        return this.handle.getAttribute(name);
    }

    async textContent(): Promise<string> {
        return (await this.handle.textContent()) ?? '';
    }

    outerHtml(): Promise<string> {
        return this.handle.evaluate((node) => node.outerHTML);
    }

    async querySelectorAll(selector: Selector): Promise<PageElement[]> {
        const handles = await this.handle.$$(selector);
        return handles.map((handle) => new PlaywrightElement(handle));
    }

    async contentDocument(): Promise<RenderedDocument | null> {
        const frame = await this.handle.contentFrame();
        return frame ? new PlaywrightDocument(frame) : null;
    }

    fill(value: string): Promise<void> {
        return this.handle.fill(value);
    }

    click(): Promise<void> {
        return this.handle.click();
    }
}

class PlaywrightDocument implements RenderedDocument {
    constructor(protected readonly frame: Frame) {}

    url(): string {
        return this.frame.url();
    }

    content(): Promise<string> {
        return this.frame.content();
    }

    async querySelectorAll(selector: Selector): Promise<PageElement[]> {
        const handles = await this.frame.$$(selector);
        return handles.map((handle) => new PlaywrightElement(handle));
    }

    async waitForVisible(
        selector: Selector,
        timeoutMs: number,
    ): Promise<PageElement | null> {
        try {
            const handle = await this.frame.waitForSelector(selector, {
                state: 'visible',
                timeout: timeoutMs,
            });
            return handle ? new PlaywrightElement(handle) : null;
        } catch (error) {
            if (error instanceof errors.TimeoutError) {
                return null;
            }
            throw error;
        }
    }

    evaluate(expression: string): Promise<unknown> {
        return this.frame.evaluate(expression);
    }
}

class PlaywrightPage extends PlaywrightDocument implements BrowserPage {
    constructor(
        private readonly page: Page,
        private readonly navigationTimeoutMs: number,
    ) {
        super(page.mainFrame());
    }

    url(): string {
        return this.page.url();
    }

    /**
     * Navigates and waits for the load event, then briefly for the network
     * to go quiet. Pages that keep polling are used as they are.
     */
    async goto(url: string): Promise<void> {
        await this.page.goto(url, {
            waitUntil: 'load',
            timeout: this.navigationTimeoutMs,
        });
        try {
            await this.page.waitForLoadState('networkidle', {
                timeout: NETWORK_IDLE_TIMEOUT_MS,
            });
        } catch (error) {
            if (!(error instanceof errors.TimeoutError)) {
                throw error;
            }
        }
    }

    async addCookies(cookies: readonly Cookie[]): Promise<void> {
        await this.page.context().addCookies(
            cookies.map(({ name, value, domain, path }) => ({
                name,
                value,
                domain,
                path,
            })),
        );
    }
}

/**
 * Manages browser lifecycle for capture operations.
 *
 * Wraps Playwright's browser management to provide a consistent interface
 * for launching browsers, creating pages, and cleaning up resources.
 */
export class BrowserManager {
    private browser: Browser | null = null;
    private context: BrowserContext | null = null;
    private options: BrowserOptions;

    /**
     * Create a new browser manager.
     *
     * @param options - Browser configuration options
     */
    constructor(options: Partial<BrowserOptions> = {}) {
        this.options = {
            headless: options.headless ?? true,
            userAgent: options.userAgent,
            viewport: options.viewport ?? DEFAULT_VIEWPORT,
            navigationTimeoutMs:
                options.navigationTimeoutMs ?? DEFAULT_NAVIGATION_TIMEOUT_MS,
        };
    }

    /**
     * Launch the browser and create a context.
     *
     * If the browser is already launched, this method returns immediately.
     *
     * @throws Error if the browser fails to launch
     */
    async launch(): Promise<BrowserContext> {
        if (this.context) {
            return this.context;
        }

        this.browser = await chromium.launch({
            headless: this.options.headless,
        });

        this.context = await this.browser.newContext({
            userAgent: this.options.userAgent,
            viewport: this.options.viewport,
            acceptDownloads: false,
            // Ignore HTTPS errors for development sites
            ignoreHTTPSErrors: true,
        });
        return this.context;
    }

    /**
     * Create a new page in the browser context.
     *
     * Automatically launches the browser if not already running.
     */
    async newPage(): Promise<BrowserPage> {
        const context = await this.launch();
        return new PlaywrightPage(
            await context.newPage(),
            this.options.navigationTimeoutMs ?? DEFAULT_NAVIGATION_TIMEOUT_MS,
        );
    }

    /**
     * Close the browser and clean up resources
     */
    async close(): Promise<void> {
        if (this.context) {
            await this.context.close();
            this.context = null;
        }

        if (this.browser) {
            await this.browser.close();
            this.browser = null;
        }
    }
}
