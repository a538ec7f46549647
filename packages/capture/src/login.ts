/**
 * Session setup: cookie injection and scripted login.
 */

import type {
    Cookie,
    LocatorKind,
    LoginScript,
    VerboseCallback,
} from '@siteripper/types';
import { isSameUrl, sleep as defaultSleep } from '@siteripper/utils';
import { LoginElementNotFoundError } from './errors.js';
import type { BrowserPage, Selector } from './types.js';

/** How long a login step waits for its element. */
export const LOGIN_ELEMENT_TIMEOUT_MS = 30_000;

/** How long to wait for the browser to leave the login page. */
export const LOGIN_REDIRECT_TIMEOUT_MS = 10_000;

const REDIRECT_POLL_MS = 250;

function quoteAttribute(value: string): string {
    return `"${value.replace(/\\/g, '\\\\').replace(/"/g, '\\"')}"`;
}

/**
 * Playwright selector for a configured locator.
 *
 * @example
 * ```typescript
 * toSelector('user', 'NAME'); // '[name="user"]'
 * toSelector('btn primary', 'CLASS'); // '.btn.primary'
 * ```
 */
export function toSelector(locator: string, kind: LocatorKind): Selector {
    switch (kind) {
        case 'ID':
            return `[id=${quoteAttribute(locator)}]`;
        case 'CLASS':
            return locator
                .split(/\s+/)
                .filter(Boolean)
                .map((name) => `.${name}`)
                .join('');
        case 'TAG':
        case 'CSS':
            return locator;
        case 'XPATH':
            return `xpath=${locator}`;
        case 'NAME':
            return `[name=${quoteAttribute(locator)}]`;
    }
}

/**
 * Adds cookies to the browser context, one batch per domain.
 */
export async function applyCookies(
    page: BrowserPage,
    cookies: readonly Cookie[],
): Promise<void> {
    const byDomain = new Map<string, Cookie[]>();
    for (const cookie of cookies) {
        const group = byDomain.get(cookie.domain) ?? [];
        group.push(cookie);
        byDomain.set(cookie.domain, group);
    }
    for (const group of byDomain.values()) {
        await page.addCookies(group);
    }
}

export interface LoginOptions {
    elementTimeoutMs?: number;
    redirectTimeoutMs?: number;
    onVerbose?: VerboseCallback;
    sleep?: (ms: number) => Promise<void>;
}

/**
 * Opens the login page and runs its steps in order: each step waits for its
 * element, types its value if it has one, then navigates to the element's
 * frame (`GO_TO`) or clicks it (`CLICK`). Afterwards waits for the browser
 * to leave the page the login URL landed on; staying there is logged, not
 * fatal.
 *
 * The login URL may redirect (e.g. to add a `next` query); wherever it
 * lands is the login page.
 *
 * @throws {LoginElementNotFoundError} When a step's element never appears
 */
export async function runLoginScript(
    page: BrowserPage,
    script: LoginScript,
    options: LoginOptions = {},
): Promise<void> {
    const elementTimeout = options.elementTimeoutMs ?? LOGIN_ELEMENT_TIMEOUT_MS;
    const redirectTimeout =
        options.redirectTimeoutMs ?? LOGIN_REDIRECT_TIMEOUT_MS;
    const sleep = options.sleep ?? defaultSleep;
    const log = (level: 'debug' | 'warn', message: string) =>
        options.onVerbose?.({ type: 'verbose', level, source: 'login', message });

    await page.goto(script.url);
    const loginPage = page.url();
    if (!isSameUrl(loginPage, script.url)) {
        log('debug', `Login page ${script.url} opened as ${loginPage}`);
    }

    for (const step of script.steps) {
        const element = await page.waitForVisible(
            toSelector(step.locator, step.kind),
            elementTimeout,
        );
        if (!element) {
            throw new LoginElementNotFoundError(
                step.locator,
                step.kind,
                elementTimeout,
            );
        }

        if (step.value !== undefined) {
            await element.fill(step.value);
        }

        if (step.task === 'GO_TO') {
            const frame = await element.contentDocument();
            const target = frame?.url() ?? (await element.getAttribute('src'));
            if (target) {
                log('debug', `Following login frame to ${target}`);
                await page.goto(target);
            }
        } else if (step.task === 'CLICK') {
            await element.click();
        }
    }

    for (let waited = 0; ; waited += REDIRECT_POLL_MS) {
        if (!isSameUrl(page.url(), loginPage)) {
            log('debug', `Logged in, now at ${page.url()}`);
            return;
        }
        if (waited >= redirectTimeout) {
            break;
        }
        await sleep(REDIRECT_POLL_MS);
    }
    log('warn', `Still on ${loginPage} after login; continuing`);
}
