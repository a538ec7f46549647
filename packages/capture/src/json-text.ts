/**
 * Pulls JSON object literals out of script text such as
 * `window.config = {...};` or `callback({...})`.
 */

/**
 * Returns the end offset (exclusive) of the balanced object starting at
 * `start`, honouring string literals and escapes.
 */
function balancedObjectEnd(text: string, start: number): number {
    let depth = 0;
    let inString = false;
    let escaped = false;

    for (let i = start; i < text.length; i++) {
        const char = text[i];
        if (inString) {
            if (escaped) {
                escaped = false;
            } else if (char === '\\') {
                escaped = true;
            } else if (char === '"') {
                inString = false;
            }
            continue;
        }
        if (char === '"') {
            inString = true;
        } else if (char === '{') {
            depth++;
        } else if (char === '}') {
            depth--;
            if (depth === 0) {
                return i + 1;
            }
        }
    }
    return -1;
}

/**
 * Finds the first object literal following `=` or `(` that parses as JSON.
 *
 * @param marker - Only consider text after the first occurrence of this string
 * @returns The parsed object, or null when none parses
 */
export function extractJsonFromText(
    text: string,
    marker?: string,
): Record<string, unknown> | null {
    let offset = 0;
    if (marker !== undefined) {
        offset = text.indexOf(marker);
        if (offset === -1) {
            return null;
        }
    }

    const opener = /[=(]\s*\{/g;
    opener.lastIndex = offset;
    for (
        let match = opener.exec(text);
        match;
        match = opener.exec(text)
    ) {
        const start = match.index + match[0].length - 1;
        const end = balancedObjectEnd(text, start);
        if (end === -1) {
            continue;
        }
        try {
            const value: unknown = JSON.parse(text.slice(start, end));
            if (isRecord(value)) {
                return value;
            }
        } catch {
            // Not JSON (e.g. a JavaScript object literal); try the next one
        }
    }
    return null;
}

export function isRecord(value: unknown): value is Record<string, unknown> {
    return typeof value === 'object' && value !== null && !Array.isArray(value);
}
