/**
 * Browser-facing interfaces used by the capture pipeline.
 *
 * The pipeline never touches Playwright directly; `browser.ts` adapts a
 * Playwright page to these interfaces and tests substitute an in-memory
 * document.
 */

import type { Cookie } from '@siteripper/types';

/**
 * Selectors use Playwright syntax: plain CSS, or `xpath=` followed by an
 * XPath expression.
 */
export type Selector = string;

/**
 * One element of a rendered document.
 */
export interface PageElement {
    getAttribute(name: string): Promise<string | null>;
    textContent(): Promise<string>;
    /** Serialized markup of the element itself. */
    outerHtml(): Promise<string>;
    querySelectorAll(selector: Selector): Promise<PageElement[]>;
    /** Document of an iframe element; null for other elements or cross-origin frames. */
    contentDocument(): Promise<RenderedDocument | null>;
    fill(value: string): Promise<void>;
    click(): Promise<void>;
}

/**
 * A rendered document: the main page or an iframe's content.
 */
export interface RenderedDocument {
    url(): string;
    /** Serialized HTML of the current DOM. */
    content(): Promise<string>;
    querySelectorAll(selector: Selector): Promise<PageElement[]>;
    /**
     * Waits until an element matching `selector` is visible.
     *
     * @returns The element, or null once `timeoutMs` has passed
     */
    waitForVisible(
        selector: Selector,
        timeoutMs: number,
    ): Promise<PageElement | null>;
    /** Evaluates a script expression in the document and returns its value. */
    evaluate(expression: string): Promise<unknown>;
}

/**
 * The tab the crawler drives.
 */
export interface BrowserPage extends RenderedDocument {
    /** Navigates and waits for the load event. */
    goto(url: string): Promise<void>;
    addCookies(cookies: readonly Cookie[]): Promise<void>;
}
