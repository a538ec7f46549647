/**
 * Tag-level HTML scanning for element replacement.
 *
 * Parsers normalize markup when they serialize it, so elements are located
 * in the original text by a tag tokenizer and swapped by offset; everything
 * outside the replaced element is left byte for byte.
 */

/** Elements that never have a closing tag. */
const VOID_ELEMENTS = new Set([
    'area',
    'base',
    'br',
    'col',
    'embed',
    'hr',
    'img',
    'input',
    'link',
    'meta',
    'param',
    'source',
    'track',
    'wbr',
]);

/** Elements whose content is not markup. */
const RAW_TEXT_ELEMENTS = new Set(['script', 'style', 'textarea', 'title']);

export interface TagToken {
    kind: 'open' | 'close' | 'self-closing';
    /** Lower-cased tag name. */
    name: string;
    /** Offset of `<`. */
    start: number;
    /** Offset just past `>`. */
    end: number;
    attributes: Map<string, string>;
}

const ATTRIBUTE_REGEX =
    /([^\s"'>/=]+)(?:\s*=\s*(?:"([^"]*)"|'([^']*)'|([^\s"'=<>`]+)))?/g;

const MAX_CODE_POINT = 0x10ffff;

const ENTITIES: Record<string, string> = {
    amp: '&',
    quot: '"',
    apos: "'",
    lt: '<',
    gt: '>',
};

/**
 * Decodes the character references that commonly appear in attribute
 * values.
 */
export function decodeEntities(value: string): string {
    return value.replace(
        /&(#x[0-9a-f]+|#\d+|[a-z]+);/gi,
        (match, body: string) => {
            if (body.startsWith('#')) {
                const hex = body[1] === 'x' || body[1] === 'X';
                const code = parseInt(body.slice(hex ? 2 : 1), hex ? 16 : 10);
                // Out of Unicode range stays literal
                return code <= MAX_CODE_POINT ? String.fromCodePoint(code) : match;
            }
            return ENTITIES[body.toLowerCase()] ?? match;
        },
    );
}

function parseAttributes(source: string): Map<string, string> {
    const attributes = new Map<string, string>();
    for (const match of source.matchAll(ATTRIBUTE_REGEX)) {
        const name = match[1].toLowerCase();
        if (attributes.has(name)) {
            continue;
        }
        const value = match[2] ?? match[3] ?? match[4] ?? '';
        attributes.set(name, decodeEntities(value));
    }
    return attributes;
}

/**
 * Finds the `>` closing a tag that opens at `from`, skipping quoted
 * attribute values.
 */
function findTagEnd(html: string, from: number): number {
    let quote: string | null = null;
    for (let i = from; i < html.length; i++) {
        const char = html[i];
        if (quote) {
            if (char === quote) {
                quote = null;
            }
        } else if (char === '"' || char === "'") {
            quote = char;
        } else if (char === '>') {
            return i;
        }
    }
    return -1;
}

/**
 * Yields the tags of `html` in document order. Comments, doctypes and the
 * content of raw-text elements are skipped.
 */
export function* scanTags(html: string, from = 0): Generator<TagToken> {
    const lower = html.toLowerCase();
    let position = from;

    while (position < html.length) {
        const lt = html.indexOf('<', position);
        if (lt === -1) {
            return;
        }

        if (html.startsWith('<!--', lt)) {
            const close = html.indexOf('-->', lt + 4);
            position = close === -1 ? html.length : close + 3;
            continue;
        }
        if (html[lt + 1] === '!' || html[lt + 1] === '?') {
            const close = html.indexOf('>', lt);
            position = close === -1 ? html.length : close + 1;
            continue;
        }

        const closing = html[lt + 1] === '/';
        const nameMatch = /^[a-zA-Z][a-zA-Z0-9:-]*/.exec(
            html.slice(lt + (closing ? 2 : 1), lt + 64),
        );
        if (!nameMatch) {
            position = lt + 1;
            continue;
        }

        const gt = findTagEnd(html, lt + 1);
        if (gt === -1) {
            return;
        }

        const name = nameMatch[0].toLowerCase();
        const end = gt + 1;

        if (closing) {
            yield { kind: 'close', name, start: lt, end, attributes: new Map() };
            position = end;
            continue;
        }

        const inner = html.slice(lt + 1 + nameMatch[0].length, gt);
        const selfClosing = inner.trimEnd().endsWith('/') || VOID_ELEMENTS.has(name);
        yield {
            kind: selfClosing ? 'self-closing' : 'open',
            name,
            start: lt,
            end,
            attributes: parseAttributes(inner.replace(/\/\s*$/, '')),
        };
        position = end;

        if (!selfClosing && RAW_TEXT_ELEMENTS.has(name)) {
            const close = lower.indexOf(`</${name}`, position);
            position = close === -1 ? html.length : close;
        }
    }
}

/**
 * Locates the first element whose `attribute` equals `value`, including its
 * closing tag.
 *
 * @returns `[start, end)` offsets of the element, or null when absent
 */
export function findElementSpan(
    html: string,
    attribute: string,
    value: string,
): [number, number] | null {
    const wanted = attribute.toLowerCase();
    let target: TagToken | null = null;
    let depth = 0;

    for (const token of scanTags(html)) {
        if (!target) {
            if (
                token.kind !== 'close' &&
                token.attributes.get(wanted) === value
            ) {
                if (token.kind === 'self-closing') {
                    return [token.start, token.end];
                }
                target = token;
                depth = 1;
            }
            continue;
        }

        if (token.name !== target.name) {
            continue;
        }
        if (token.kind === 'open') {
            depth++;
        } else if (token.kind === 'close') {
            depth--;
            if (depth === 0) {
                return [target.start, token.end];
            }
        }
    }

    // Unclosed element: replace just its start tag
    return target ? [target.start, target.end] : null;
}

/**
 * Replaces the element located by {@link findElementSpan}.
 *
 * @returns The new HTML, or null when no element matched
 */
export function replaceElement(
    html: string,
    attribute: string,
    value: string,
    replacement: string,
): string | null {
    const span = findElementSpan(html, attribute, value);
    if (!span) {
        return null;
    }
    return html.slice(0, span[0]) + replacement + html.slice(span[1]);
}
