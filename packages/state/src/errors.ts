/**
 * `@siteripper/state` - Error definitions
 *
 * Both errors are fatal for a run: resume correctness depends on the stores
 * being durable, so there is no in-memory fallback.
 */

/**
 * Error thrown when a store's snapshot or write-ahead log cannot be parsed.
 */
export class CorruptedStateError extends Error {
    readonly name = 'CorruptedStateError';

    /**
     * @param filePath - Path to the corrupted file
     * @param line - Line number where corruption was detected (1-based)
     * @param details - Additional details about the corruption
     */
    constructor(
        public readonly filePath: string,
        public readonly line?: number,
        public readonly details?: string,
    ) {
        const location = line !== undefined ? `:${line}` : '';
        super(
            `Cache store corrupted at ${filePath}${location}. ` +
                `${details || 'Delete the file to start over.'}`,
        );
    }
}

/**
 * Error thrown when a store cannot be read or written.
 */
export class StateIOError extends Error {
    readonly name = 'StateIOError';

    /**
     * @param operation - Description of the operation that failed
     * @param cause - The underlying error that caused the failure
     */
    constructor(
        public readonly operation: string,
        public readonly cause: Error,
    ) {
        super(`Cache ${operation} failed: ${cause.message}`);
    }
}

/**
 * Normalizes an unknown thrown value into an `Error`.
 */
export function toError(value: unknown): Error {
    return value instanceof Error ? value : new Error(String(value));
}
