/**
 * URL rewriting: applies a page's scrape jobs to its HTML so references
 * point at the downloaded copies.
 */

import type { ScrapeJob, VideoScrapeJob } from '@siteripper/types';
import { relativePath } from '@siteripper/utils';
import { replaceElement } from './html-scanner.js';

/** Placeholder in a video snippet for the local file path. */
export const SRC_PLACEHOLDER = '{{src}}';

/**
 * Result of rewriting a page.
 */
export interface RewriteResult {
    html: string;
    /** Video jobs whose element was not found in the HTML. */
    unmatched: VideoScrapeJob[];
}

/**
 * Escapes the characters HTML serializers escape inside attribute values.
 */
function htmlEscaped(value: string): string {
    return value.replace(/&/g, '&amp;');
}

/**
 * Replaces every occurrence of `original` that is wrapped in double quotes,
 * single quotes or parentheses. Bare occurrences (prose, substrings of
 * longer URLs) are left alone.
 */
export function replaceDelimited(
    html: string,
    original: string,
    replacement: string,
): string {
    return html
        .split(`"${original}"`)
        .join(`"${replacement}"`)
        .split(`'${original}'`)
        .join(`'${replacement}'`)
        .split(`(${original})`)
        .join(`(${replacement})`);
}

function escapeRegExp(text: string): string {
    return text.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}

/**
 * Replaces `original` where it is the whole quoted value of `attribute`,
 * e.g. `href="docs"`, leaving the same text elsewhere untouched.
 */
export function replaceAttributeValue(
    html: string,
    attribute: string,
    original: string,
    replacement: string,
): string {
    const pattern = new RegExp(
        `(\\s${escapeRegExp(attribute)}\\s*=\\s*)(["'])${escapeRegExp(original)}\\2`,
        'g',
    );
    return html.replace(
        pattern,
        (_match, prefix: string, quote: string) =>
            `${prefix}${quote}${replacement}${quote}`,
    );
}

/**
 * Rewrites `html` with the page's scrape jobs.
 *
 * Paths are written relative to `pageDir` (the directory holding the page's
 * `index.html`), so the output tree can be moved or opened from disk.
 * Jobs without a local file leave the HTML unchanged.
 *
 * @example
 * ```typescript
 * const { html } = rewriteHtml(
 *     '<img src="https://cdn.example.com/a.png">',
 *     [{ kind: 'url', original: 'https://cdn.example.com/a.png', localPath: '/out/p/data/images/a.png' }],
 *     '/out/p',
 * );
 * // '<img src="./data/images/a.png">'
 * ```
 */
export function rewriteHtml(
    html: string,
    jobs: readonly ScrapeJob[],
    pageDir: string,
): RewriteResult {
    let rewritten = html;
    const unmatched: VideoScrapeJob[] = [];

    for (const job of jobs) {
        if (job.localPath === null) {
            continue;
        }
        const local = relativePath(job.localPath, pageDir);

        if (job.kind === 'url') {
            if (!job.original) {
                continue;
            }
            const { attribute } = job;
            const replace = (text: string, original: string, replacement: string) =>
                attribute
                    ? replaceAttributeValue(text, attribute, original, replacement)
                    : replaceDelimited(text, original, replacement);
            rewritten = replace(rewritten, job.original, local);
            const escaped = htmlEscaped(job.original);
            if (escaped !== job.original) {
                rewritten = replace(rewritten, escaped, htmlEscaped(local));
            }
            continue;
        }

        const snippet = job.snippet.split(SRC_PLACEHOLDER).join(local);
        const replaced = replaceElement(
            rewritten,
            job.attribute,
            job.identifier,
            snippet,
        );
        if (replaced === null) {
            unmatched.push(job);
        } else {
            rewritten = replaced;
        }
    }

    return { html: rewritten, unmatched };
}
