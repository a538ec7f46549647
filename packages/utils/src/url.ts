/**
 * URL helpers shared by the fetcher, the frontier and the page processor.
 */

import { sanitizeFilename } from './filename.js';

/**
 * Strips the `#fragment` from a URL. Parseable URLs are also normalized
 * (`https://example.com` becomes `https://example.com/`) so the result can
 * serve as a dedup key.
 */
export function defragment(url: string): string {
    try {
        const parsed = new URL(url);
        parsed.hash = '';
        return parsed.toString();
    } catch {
        const hash = url.indexOf('#');
        return hash === -1 ? url : url.slice(0, hash);
    }
}

/**
 * Checks whether two URLs name the same page: same host, same query and the
 * same path once a trailing slash is ignored. Scheme and fragment are not
 * compared.
 */
export function isSameUrl(a: string, b: string): boolean {
    const left = tryParseUrl(a);
    const right = tryParseUrl(b);
    if (!left || !right) {
        return trimTrailingSlash(a) === trimTrailingSlash(b);
    }
    return (
        left.host === right.host &&
        left.search === right.search &&
        trimTrailingSlash(left.pathname) === trimTrailingSlash(right.pathname)
    );
}

/**
 * Checks whether `url` belongs to the site rooted at `baseUrl`. A leading
 * `www.` on the base host is ignored and subdomains count as in-domain.
 */
export function isUrlInDomain(baseUrl: string, url: string): boolean {
    const base = tryParseUrl(baseUrl);
    const target = tryParseUrl(url);
    if (!base || !target) {
        return false;
    }
    const domain = base.hostname.replace(/^www\./, '');
    const host = target.hostname;
    return host === domain || host.endsWith(`.${domain}`);
}

/**
 * The `Referer` sent with asset requests: the page origin plus `/`.
 */
export function refererFor(url: string): string {
    return `${originOf(url)}/`;
}

/**
 * The `Origin` sent with asset requests.
 */
export function originOf(url: string): string {
    const parsed = tryParseUrl(url);
    return parsed ? parsed.origin : '';
}

/**
 * The key a crawl base is stored under: scheme and host of the seed URL.
 */
export function baseKeyOf(url: string): string {
    return originOf(url) || url;
}

/**
 * Checks whether `text` contains any of `substrings`.
 */
export function containsAny(
    text: string,
    substrings: readonly string[],
): boolean {
    return substrings.some((substring) => text.includes(substring));
}

/**
 * The path of a page relative to its site, with the trailing slash removed
 * from the path and the query kept. The fragment is dropped. The site root
 * yields `''`.
 *
 * @example
 * ```typescript
 * siteRelativePath('https://example.com/docs/intro/'); // '/docs/intro'
 * siteRelativePath('https://example.com/list?page=2'); // '/list?page=2'
 * ```
 */
export function siteRelativePath(url: string): string {
    const parsed = tryParseUrl(url);
    if (!parsed) {
        return '';
    }
    return trimTrailingSlash(parsed.pathname) + parsed.search;
}

/**
 * The directory segments a page is mirrored under, decoded and sanitized.
 * A query is folded into the last segment, so pages that differ only by
 * query get directories of their own.
 *
 * @example
 * ```typescript
 * pagePathSegments('https://example.com/a%20b/c'); // ['a b', 'c']
 * pagePathSegments('https://example.com/list?page=2'); // ['list_page=2']
 * ```
 */
export function pagePathSegments(url: string): string[] {
    const parsed = tryParseUrl(url);
    if (!parsed) {
        return [];
    }
    const segments = trimTrailingSlash(parsed.pathname)
        .split('/')
        .map((segment) => sanitizeFilename(safeDecode(segment)))
        .filter((segment) => segment.length > 0 && segment !== '..');
    if (parsed.search) {
        const query = sanitizeFilename(safeDecode(parsed.search), '_');
        const last = segments.pop() ?? '';
        segments.push(last + query);
    }
    return segments;
}

/**
 * The last path segment of a URL, decoded, or `''` when the path ends with
 * a slash.
 */
export function urlBasename(url: string): string {
    const parsed = tryParseUrl(url);
    const path = parsed ? parsed.pathname : url.split(/[?#]/)[0];
    const last = path.slice(path.lastIndexOf('/') + 1);
    return safeDecode(last);
}

/**
 * Checks whether a reference is relative (no scheme, no `//` host prefix,
 * no drive letter, not starting with `www.`).
 */
export function isRelativeUrl(reference: string): boolean {
    return !/^(?:www\.|[a-z][a-z0-9+.-]*:|\/\/)/i.test(reference);
}

/**
 * Parses a URL, returning null instead of throwing.
 */
export function tryParseUrl(url: string, base?: string): URL | null {
    try {
        return new URL(url, base);
    } catch {
        return null;
    }
}

function trimTrailingSlash(path: string): string {
    return path.endsWith('/') ? path.slice(0, -1) : path;
}

function safeDecode(segment: string): string {
    try {
        return decodeURIComponent(segment);
    } catch {
        return segment;
    }
}
