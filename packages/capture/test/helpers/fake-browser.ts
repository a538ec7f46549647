import { parse, type HTMLElement } from 'node-html-parser';
import type { Cookie } from '@siteripper/types';
import type {
    BrowserPage,
    PageElement,
    RenderedDocument,
} from '../../src/types.js';

export interface FakeSiteOptions {
    /** URL to HTML. */
    pages: Record<string, string>;
    /** URL the browser ends up on when asked for a key. */
    redirects?: Record<string, string>;
    /** Iframe src to the HTML of its document. */
    frames?: Record<string, string>;
    /** XPath expression to the text of the element it selects. */
    xpath?: Record<string, string>;
    /** Called when an element is clicked. */
    onClick?: (element: FakeElement, page: FakePage) => void;
}

function select(html: string, selector: string, page: FakePage): FakeElement[] {
    if (selector.startsWith('xpath=')) {
        const text = page.options.xpath?.[selector.slice('xpath='.length)];
        return text === undefined
            ? []
            : [new FakeElement(parse(`<span>${text}</span>`), page)];
    }
    return parse(html)
        .querySelectorAll(selector)
        .map((node) => new FakeElement(node, page));
}

export class FakeElement implements PageElement {
    filled: string | null = null;

    constructor(
        readonly node: HTMLElement,
        private readonly page: FakePage,
    ) {}

    async getAttribute(name: string): Promise<string | null> {
        return this.node.getAttribute(name) ?? null;
    }

    async textContent(): Promise<string> {
        return this.node.text;
    }

    async outerHtml(): Promise<string> {
        return this.node.outerHTML;
    }

    async querySelectorAll(selector: string): Promise<PageElement[]> {
        return this.node
            .querySelectorAll(selector)
            .map((node) => new FakeElement(node, this.page));
    }

    async contentDocument(): Promise<RenderedDocument | null> {
        const src = this.node.getAttribute('src') ?? '';
        const html = this.page.options.frames?.[src];
        return html === undefined ? null : new FakeDocument(src, html, this.page);
    }

    async fill(value: string): Promise<void> {
        this.filled = value;
        this.page.actions.push(`fill:${value}`);
    }

    async click(): Promise<void> {
        this.page.actions.push(`click:${this.node.getAttribute('id') ?? ''}`);
        this.page.options.onClick?.(this, this.page);
    }
}

class FakeDocument implements RenderedDocument {
    constructor(
        protected currentUrl: string,
        protected html: string,
        protected readonly owner: FakePage | null,
    ) {}

    url(): string {
        return this.currentUrl;
    }

    async content(): Promise<string> {
        return this.html;
    }

    async querySelectorAll(selector: string): Promise<PageElement[]> {
        return this.owner ? select(this.html, selector, this.owner) : [];
    }

    async waitForVisible(selector: string): Promise<PageElement | null> {
        const [first] = await this.querySelectorAll(selector);
        return first ?? null;
    }

    async evaluate(): Promise<unknown> {
        return 0;
    }
}

/**
 * In-memory browser tab serving fixed HTML per URL. `content()` returns the
 * HTML exactly as given.
 */
export class FakePage extends FakeDocument implements BrowserPage {
    readonly visited: string[] = [];
    readonly cookieBatches: Cookie[][] = [];
    readonly actions: string[] = [];

    constructor(readonly options: FakeSiteOptions) {
        super('about:blank', '', null);
    }

    async goto(url: string): Promise<void> {
        this.visited.push(url);
        const target = this.options.redirects?.[url] ?? url;
        const html = this.options.pages[target];
        if (html === undefined) {
            throw new Error(`net::ERR_NAME_NOT_RESOLVED at ${url}`);
        }
        this.land(target, html);
    }

    /** Moves the tab to `url` without recording a navigation. */
    land(url: string, html = this.options.pages[url] ?? ''): void {
        this.currentUrl = url;
        this.html = html;
    }

    async addCookies(cookies: readonly Cookie[]): Promise<void> {
        this.cookieBatches.push([...cookies]);
    }

    async querySelectorAll(selector: string): Promise<PageElement[]> {
        return select(this.html, selector, this);
    }
}
