/**
 * Download pipeline errors.
 */

/**
 * Thrown under the `THROW_ERROR` duplicate policy when the target file
 * already exists.
 */
export class DuplicateFileError extends Error {
    readonly name = 'DuplicateFileError';

    constructor(
        public readonly path: string,
        public readonly url: string,
    ) {
        super(`Refusing to replace ${path} with the download of ${url}`);
    }
}

/**
 * The server declared a body length that was not delivered.
 */
export class ContentLengthMismatchError extends Error {
    readonly name = 'ContentLengthMismatchError';

    constructor(
        public readonly url: string,
        public readonly expected: number,
        public readonly received: number,
    ) {
        super(
            `Incomplete download of ${url}: expected ${expected} bytes, received ${received}`,
        );
    }
}
