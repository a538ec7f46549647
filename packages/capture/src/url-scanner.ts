/**
 * Finds absolute URLs embedded in HTML and script text.
 */

import { tryParseUrl } from '@siteripper/utils';

/**
 * Matches a quoted value after `=` or `:` (attributes, object literals,
 * assignments) or a parenthesized value (CSS `url(...)`, call arguments).
 */
const URL_REGEX = /[=:] *(?:'([^']*)'|"([^"]*)")| *\(([^()]*)\)/g;

export interface EmbeddedUrl {
    /** The text as it appears in the source. */
    original: string;
    /** Absolute http(s) URL it refers to. */
    url: string;
}

function stripQuotes(value: string): string {
    const trimmed = value.trim();
    const first = trimmed[0];
    if (
        trimmed.length >= 2 &&
        (first === '"' || first === "'") &&
        trimmed[trimmed.length - 1] === first
    ) {
        return trimmed.slice(1, -1);
    }
    return trimmed;
}

/**
 * Resolves one candidate value to an absolute web URL. Protocol-relative
 * values become https; relative paths are not considered.
 */
export function toAbsoluteWebUrl(candidate: string): string | null {
    const value = candidate.trim().replace(/\\\//g, '/');
    if (!value || /\s/.test(value)) {
        return null;
    }
    const absolute = value.startsWith('//') ? `https:${value}` : value;
    const parsed = tryParseUrl(absolute);
    if (
        !parsed ||
        (parsed.protocol !== 'http:' && parsed.protocol !== 'https:') ||
        !parsed.hostname.includes('.')
    ) {
        return null;
    }
    return parsed.href;
}

/**
 * Scans `text` for absolute URLs in quoted or parenthesized positions.
 *
 * @returns One entry per distinct source text, in order of appearance
 *
 * @example
 * ```typescript
 * findEmbeddedUrls(`background: url(//cdn.example.com/bg.png)`);
 * // [{ original: '//cdn.example.com/bg.png', url: 'https://cdn.example.com/bg.png' }]
 * ```
 */
export function findEmbeddedUrls(text: string): EmbeddedUrl[] {
    const found: EmbeddedUrl[] = [];
    const seen = new Set<string>();

    const regex = new RegExp(URL_REGEX.source, 'g');
    for (let match = regex.exec(text); match; match = regex.exec(text)) {
        const raw = match[1] ?? match[2] ?? match[3];
        if (raw === undefined) {
            continue;
        }
        const original = match[3] !== undefined ? stripQuotes(raw) : raw;
        const url = toAbsoluteWebUrl(original);
        if (!url) {
            // Look inside, e.g. for url(...) within a style attribute
            regex.lastIndex = match.index + 1;
            continue;
        }
        if (!seen.has(original)) {
            seen.add(original);
            found.push({ original, url });
        }
    }

    return found;
}
