/**
 * Capture errors.
 */

import type { LocatorKind } from '@siteripper/types';

/**
 * The browser kept landing somewhere other than the requested URL.
 */
export class NavigationError extends Error {
    readonly name = 'NavigationError';

    constructor(
        public readonly url: string,
        public readonly attempts: number,
        public readonly finalUrl: string,
        options?: { cause?: unknown },
    ) {
        super(
            `Could not load ${url} after ${attempts} attempts (ended at ${finalUrl})`,
            options,
        );
    }
}

/**
 * A login step's element never became visible.
 */
export class LoginElementNotFoundError extends Error {
    readonly name = 'LoginElementNotFoundError';

    constructor(
        public readonly locator: string,
        public readonly kind: LocatorKind,
        public readonly timeoutMs: number,
    ) {
        super(
            `Login element ${kind} "${locator}" not visible after ${timeoutMs}ms`,
        );
    }
}

/**
 * A segmented stream could not be turned into a playable file.
 */
export class StreamReassemblyError extends Error {
    readonly name = 'StreamReassemblyError';

    constructor(
        public readonly url: string,
        public readonly reason: string,
        options?: { cause?: unknown },
    ) {
        super(`Could not reassemble stream ${url}: ${reason}`, options);
    }
}
