/**
 * Filename and path sanitizing.
 *
 * Turns URL segments and page titles into names every common filesystem
 * accepts, and computes the relative paths written into rewritten HTML.
 */

import { posix } from 'path';

/** Longest filename stem the fetcher writes, extension excluded. */
export const DEFAULT_MAX_FILENAME_LENGTH = 80;

// Reserved on Windows or meaningless in a single path segment, plus the
// ASCII control range.
// eslint-disable-next-line no-control-regex
const INVALID_FILENAME_CHARACTERS = /["<>|\0:*?\\/\x01-\x1f]/g;
// eslint-disable-next-line no-control-regex
const INVALID_PATH_CHARACTERS = /["<>|\0:*?\\\x01-\x1f]/g;

/**
 * Removes characters that cannot appear in a filename, including both
 * path separators.
 *
 * @param name - Candidate filename
 * @param replacement - Text substituted for each invalid character
 */
export function sanitizeFilename(name: string, replacement = ''): string {
    return name.replace(INVALID_FILENAME_CHARACTERS, replacement).trim();
}

/**
 * Like {@link sanitizeFilename} but keeps forward slashes, so a whole
 * relative path can be cleaned at once.
 */
export function sanitizePath(path: string, replacement = ''): string {
    return path.replace(INVALID_PATH_CHARACTERS, replacement);
}

/**
 * Splits a filename into its stem and extension. The extension keeps its
 * leading dot and is empty when the name has none. A leading dot (as in
 * `.htaccess`) does not start an extension.
 *
 * @example
 * ```typescript
 * splitFilename('clip.final.mp4'); // { stem: 'clip.final', ext: '.mp4' }
 * splitFilename('README');         // { stem: 'README', ext: '' }
 * ```
 */
export function splitFilename(name: string): { stem: string; ext: string } {
    const dot = name.lastIndexOf('.');
    if (dot <= 0 || dot === name.length - 1) {
        return { stem: name, ext: '' };
    }
    return { stem: name.slice(0, dot), ext: name.slice(dot) };
}

/**
 * Truncates the stem of a filename so the stem is at most `max` characters,
 * preserving the extension.
 */
export function shortenFilename(
    name: string,
    max: number = DEFAULT_MAX_FILENAME_LENGTH,
): string {
    const { stem, ext } = splitFilename(name);
    if (stem.length <= max) {
        return name;
    }
    return stem.slice(0, max).trimEnd() + ext;
}

/**
 * Returns `name` with a numeric suffix before the extension.
 *
 * @example
 * ```typescript
 * numberedFilename('photo.jpg', 2); // 'photo2.jpg'
 * ```
 */
export function numberedFilename(name: string, n: number): string {
    const { stem, ext } = splitFilename(name);
    return `${stem}${n}${ext}`;
}

/**
 * Computes a `./`-prefixed path from `directory` to `file`.
 *
 * Shared leading segments are dropped, one `../` is emitted per remaining
 * directory segment, then the rest of the file path follows. Both arguments
 * are absolute paths.
 *
 * @example
 * ```typescript
 * relativePath('/out/a/b/index.html', '/out/a');   // './b/index.html'
 * relativePath('/out/img/x.png', '/out/a/b');      // './../../img/x.png'
 * ```
 */
export function relativePath(file: string, directory: string): string {
    const fileSegments = toSegments(file);
    const dirSegments = toSegments(directory);

    let shared = 0;
    while (
        shared < fileSegments.length &&
        shared < dirSegments.length &&
        fileSegments[shared] === dirSegments[shared]
    ) {
        shared++;
    }

    const up = '../'.repeat(dirSegments.length - shared);
    return './' + up + fileSegments.slice(shared).join('/');
}

function toSegments(path: string): string[] {
    return posix
        .normalize(path.replaceAll('\\', '/'))
        .split('/')
        .filter((segment) => segment.length > 0 && segment !== '.');
}
