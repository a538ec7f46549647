/**
 * Content-type handling: MIME to extension mapping, magic-byte sniffing,
 * filename resolution and the extension to sub-folder mapping.
 */

import { open, readFile } from 'fs/promises';
import mime from 'mime-types';
import type { GroupByMapping } from '@siteripper/types';
import { sanitizeFilename, splitFilename, urlBasename } from '@siteripper/utils';

/** Location of the default extension to sub-folder table. */
export const DEFAULT_GROUP_BY_PATH = new URL(
    '../data/group-by.json',
    import.meta.url,
);

/** Content types that say nothing about the payload. */
const GENERIC_CONTENT_TYPES = new Set([
    'application/octet-stream',
    'binary/octet-stream',
    'application/unknown',
]);

/**
 * Strips parameters and lower-cases a `Content-Type` value.
 *
 * @example
 * ```typescript
 * baseContentType('Text/HTML; charset=utf-8'); // 'text/html'
 * ```
 */
export function baseContentType(value: string | null | undefined): string | null {
    if (!value) {
        return null;
    }
    const base = value.split(';')[0].trim().toLowerCase();
    return base || null;
}

/**
 * Checks a content type against an ignore list. Entries match exactly or,
 * when they end in `/`, by major type (`video/` matches `video/mp4`).
 */
export function isIgnoredContentType(
    contentType: string | null,
    ignored: readonly string[],
): boolean {
    if (!contentType) {
        return false;
    }
    return ignored.some((entry) =>
        entry.endsWith('/')
            ? contentType.startsWith(entry)
            : contentType === entry,
    );
}

/**
 * Extension (without dot) registered for a content type, if any.
 */
export function extensionForContentType(
    contentType: string | null,
): string | null {
    if (!contentType || GENERIC_CONTENT_TYPES.has(contentType)) {
        return null;
    }
    return mime.extension(contentType) || null;
}

/**
 * Extracts the filename from a `Content-Disposition` header, preferring the
 * RFC 5987 `filename*` form.
 */
export function parseContentDisposition(
    header: string | null | undefined,
): string | null {
    if (!header) {
        return null;
    }

    const extended = /filename\*\s*=\s*(?:[\w-]+)?''([^;]+)/i.exec(header);
    if (extended) {
        try {
            return decodeURIComponent(extended[1].trim());
        } catch {
            return extended[1].trim();
        }
    }

    const plain = /filename\s*=\s*(?:"([^"]*)"|([^;]+))/i.exec(header);
    if (!plain) {
        return null;
    }
    const name = (plain[1] ?? plain[2] ?? '').trim();
    return name || null;
}

// ============================================================================
// MAGIC BYTES
// ============================================================================

interface Signature {
    extension: string;
    offset: number;
    bytes: number[];
}

const SIGNATURES: Signature[] = [
    { extension: 'png', offset: 0, bytes: [0x89, 0x50, 0x4e, 0x47] },
    { extension: 'jpg', offset: 0, bytes: [0xff, 0xd8, 0xff] },
    { extension: 'gif', offset: 0, bytes: [0x47, 0x49, 0x46, 0x38] },
    { extension: 'pdf', offset: 0, bytes: [0x25, 0x50, 0x44, 0x46] },
    { extension: 'zip', offset: 0, bytes: [0x50, 0x4b, 0x03, 0x04] },
    { extension: 'gz', offset: 0, bytes: [0x1f, 0x8b] },
    { extension: 'webm', offset: 0, bytes: [0x1a, 0x45, 0xdf, 0xa3] },
    { extension: 'ogg', offset: 0, bytes: [0x4f, 0x67, 0x67, 0x53] },
    { extension: 'mp3', offset: 0, bytes: [0x49, 0x44, 0x33] },
    { extension: 'woff', offset: 0, bytes: [0x77, 0x4f, 0x46, 0x46] },
    { extension: 'woff2', offset: 0, bytes: [0x77, 0x4f, 0x46, 0x32] },
    { extension: 'svg', offset: 0, bytes: [0x3c, 0x73, 0x76, 0x67] },
];

const RIFF = [0x52, 0x49, 0x46, 0x46];
const RIFF_FORMATS: Record<string, string> = {
    WEBP: 'webp',
    WAVE: 'wav',
    'AVI ': 'avi',
};
const FTYP_BRANDS: Record<string, string> = {
    'M4A ': 'm4a',
    'qt  ': 'mov',
};

function matchesAt(header: Uint8Array, offset: number, bytes: number[]) {
    return bytes.every((byte, i) => header[offset + i] === byte);
}

function asciiAt(header: Uint8Array, offset: number, length: number): string {
    return String.fromCharCode(...header.subarray(offset, offset + length));
}

/**
 * Guesses a file extension from the first bytes of a file.
 *
 * @returns Extension without the dot, or null when nothing matches
 */
export function sniffExtension(header: Uint8Array): string | null {
    if (matchesAt(header, 0, RIFF) && header.length >= 12) {
        return RIFF_FORMATS[asciiAt(header, 8, 4)] ?? null;
    }
    if (header.length >= 12 && asciiAt(header, 4, 4) === 'ftyp') {
        return FTYP_BRANDS[asciiAt(header, 8, 4)] ?? 'mp4';
    }
    for (const signature of SIGNATURES) {
        if (matchesAt(header, signature.offset, signature.bytes)) {
            return signature.extension;
        }
    }
    return null;
}

/**
 * Reads the head of `path` and sniffs its extension.
 */
export async function sniffFileExtension(path: string): Promise<string | null> {
    const handle = await open(path, 'r');
    try {
        const buffer = new Uint8Array(16);
        const { bytesRead } = await handle.read(buffer, 0, buffer.length, 0);
        return sniffExtension(buffer.subarray(0, bytesRead));
    } finally {
        await handle.close();
    }
}

// ============================================================================
// FILENAME RESOLUTION
// ============================================================================

export interface FilenameInputs {
    url: string;
    contentType: string | null;
    contentDisposition: string | null;
    /** Lazily sniffs the payload; only called when headers are inconclusive. */
    sniff: () => Promise<string | null>;
    /** Used when neither the URL nor the headers yield a stem. */
    fallbackStem: string;
    idealFilename?: string;
}

/**
 * Picks the name a download is stored under.
 *
 * 1. A `Content-Disposition` filename with an extension wins.
 * 2. Otherwise the URL basename, when its extension agrees with the
 *    content type.
 * 3. Otherwise the URL stem (or `fallbackStem`) plus the extension of the
 *    content type, or of the sniffed payload.
 * 4. With an `idealFilename`, its stem replaces the chosen stem.
 */
export async function resolveFilename(inputs: FilenameInputs): Promise<string> {
    let name: string | null = null;

    const disposition = parseContentDisposition(inputs.contentDisposition);
    if (disposition && splitFilename(disposition).ext) {
        name = disposition;
    }

    const basename = sanitizeFilename(urlBasename(inputs.url));

    if (!name && basename && splitFilename(basename).ext) {
        if (basenameAgrees(basename, inputs.contentType)) {
            name = basename;
        }
    }

    if (!name) {
        const stem = splitFilename(basename).stem || inputs.fallbackStem;
        const extension =
            extensionForContentType(inputs.contentType) ??
            (await inputs.sniff());
        name = extension ? `${stem}.${extension}` : basename || stem;
    }

    const { ext } = splitFilename(name);
    if (inputs.idealFilename && ext) {
        const ideal = sanitizeFilename(inputs.idealFilename);
        if (ideal) {
            name = ideal + ext;
        }
    }

    return sanitizeFilename(name) || inputs.fallbackStem;
}

function basenameAgrees(basename: string, contentType: string | null) {
    if (!contentType || GENERIC_CONTENT_TYPES.has(contentType)) {
        return true;
    }
    const lookedUp = mime.lookup(basename);
    if (lookedUp === false) {
        // Unknown extension, e.g. `.php` serving an image
        return false;
    }
    if (lookedUp === contentType) {
        return true;
    }
    const ext = splitFilename(basename).ext.slice(1).toLowerCase();
    return mime.extensions[contentType]?.includes(ext) ?? false;
}

// ============================================================================
// GROUP-BY MAPPING
// ============================================================================

/**
 * Sub-folder for a filename under `mapping`, keyed by lower-cased extension.
 */
export function groupFolderFor(
    filename: string,
    mapping: GroupByMapping,
): string {
    const ext = splitFilename(filename).ext.slice(1).toLowerCase();
    return mapping.folders[ext] ?? mapping.fallback;
}

/**
 * Loads and validates an extension to sub-folder table.
 */
export async function loadGroupByMapping(
    path: string | URL = DEFAULT_GROUP_BY_PATH,
): Promise<GroupByMapping> {
    const raw: unknown = JSON.parse(await readFile(path, 'utf-8'));
    if (typeof raw !== 'object' || raw === null) {
        throw new Error(`Group-by mapping ${String(path)} must be an object`);
    }
    const fallback: unknown = Reflect.get(raw, 'fallback');
    const folders: unknown = Reflect.get(raw, 'folders');
    if (typeof fallback !== 'string') {
        throw new Error(`Group-by mapping ${String(path)} needs a fallback`);
    }
    if (typeof folders !== 'object' || folders === null) {
        throw new Error(`Group-by mapping ${String(path)} needs folders`);
    }

    const decoded: Record<string, string> = {};
    for (const [extension, folder] of Object.entries(folders)) {
        if (typeof folder === 'string') {
            decoded[extension.toLowerCase()] = folder;
        }
    }
    return { folders: decoded, fallback };
}
