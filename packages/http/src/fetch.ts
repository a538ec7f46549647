/**
 * Retrying fetch wrapper and fetch error reporting.
 */

import { sleep } from '@siteripper/utils';

// ============================================================================
// REQUEST HEADERS
// ============================================================================

/**
 * Headers sent with every asset request unless the caller overrides them.
 * `identity` encoding keeps `Content-Length` comparable to the bytes read.
 */
export const DEFAULT_HEADERS: Readonly<Record<string, string>> = {
    Accept: '*/*',
    'Accept-Encoding': 'identity',
    'Accept-Language': 'en-US,en;q=0.5',
};

/** Error codes that are considered transient and worth retrying */
const TRANSIENT_ERROR_CODES = new Set([
    'ECONNRESET',
    'ETIMEDOUT',
    'ECONNREFUSED',
    'EPIPE',
    'ENOTFOUND', // DNS can be flaky
    'EAI_AGAIN', // DNS temporary failure
    'UND_ERR_CONNECT_TIMEOUT',
    'UND_ERR_SOCKET',
]);

/** Default number of retry attempts for transient errors */
const DEFAULT_RETRY_ATTEMPTS = 2;

/** Delay between retry attempts in milliseconds */
const RETRY_DELAY_MS = 1000;

function errorCode(error: Error): string | undefined {
    const code: unknown = Reflect.get(error, 'code');
    return typeof code === 'string' ? code : undefined;
}

function errorCause(error: Error): Error | undefined {
    return error.cause instanceof Error ? error.cause : undefined;
}

/**
 * Extracts detailed error information from a fetch error.
 * Node.js fetch errors (via undici) wrap the actual cause in error.cause,
 * which can be nested multiple levels deep.
 */
export function getFetchErrorDetails(error: unknown): {
    message: string;
    code?: string;
    cause?: string;
    hint?: string;
} {
    if (!(error instanceof Error)) {
        return { message: String(error) };
    }

    const causes: string[] = [];
    let current: Error | undefined = error;
    let code: string | undefined;

    while (current) {
        code ??= errorCode(current);
        if (current.message && !causes.includes(current.message)) {
            causes.push(current.message);
        }
        current = errorCause(current);
    }

    let causeStr = causes.length > 1 ? causes.slice(1).join(' -> ') : undefined;
    if (code && causeStr) {
        causeStr = `[${code}] ${causeStr}`;
    } else if (code) {
        causeStr = `[${code}]`;
    }

    const fullText = causes.join(' ').toLowerCase();
    let hint: string | undefined;

    if (code === 'ENOTFOUND' || fullText.includes('getaddrinfo')) {
        hint =
            'DNS resolution failed. Check the URL spelling or your network connection.';
    } else if (code === 'ECONNREFUSED') {
        hint =
            'Connection refused. The server may be down or blocking connections.';
    } else if (code === 'ECONNRESET') {
        hint =
            'Connection reset by server. This may be a transient network issue.';
    } else if (code === 'ETIMEDOUT' || fullText.includes('timeout')) {
        hint = 'Request timed out. The server may be slow or unresponsive.';
    } else if (
        code === 'CERT_HAS_EXPIRED' ||
        fullText.includes('certificate')
    ) {
        hint =
            'SSL certificate error. The site may have an expired or invalid certificate.';
    } else if (fullText.includes('socket hang up')) {
        hint =
            'Connection closed unexpectedly. The server may have dropped the connection.';
    }

    return {
        message: causes[0] || 'Unknown error',
        code,
        cause: causeStr,
        hint,
    };
}

/**
 * Custom error class for fetch failures with detailed information
 */
export class FetchError extends Error {
    readonly name = 'FetchError';
    public readonly code?: string;
    public readonly hint?: string;

    constructor(
        public readonly url: string,
        public readonly originalError: unknown,
    ) {
        const details = getFetchErrorDetails(originalError);

        let message = details.message;
        if (details.cause) {
            message += ` (${details.cause})`;
        }

        super(message);
        this.code = details.code;
        this.hint = details.hint;
    }

    /**
     * Returns a formatted error message suitable for display
     */
    format(verbose = false): string {
        let msg = `Failed to fetch ${this.url}: ${this.message}`;
        if (verbose && this.hint) {
            msg += `\n  Hint: ${this.hint}`;
        }
        return msg;
    }
}

/**
 * Checks if an error is transient and worth retrying
 */
function isTransientError(error: unknown): boolean {
    if (!(error instanceof Error)) {
        return false;
    }

    let current: Error | undefined = error;
    while (current) {
        const code = errorCode(current);
        if (code && TRANSIENT_ERROR_CODES.has(code)) {
            return true;
        }
        current = errorCause(current);
    }

    const message = error.message.toLowerCase();
    return (
        message.includes('socket hang up') ||
        message.includes('other side closed') ||
        message.includes('connection reset')
    );
}

/**
 * Parses the Retry-After header value.
 * Can be either a number of seconds or an HTTP date.
 *
 * @returns Delay in milliseconds, or null if parsing fails
 */
function parseRetryAfter(retryAfter: string | null): number | null {
    if (!retryAfter) return null;

    const seconds = parseInt(retryAfter, 10);
    if (!isNaN(seconds)) {
        return seconds * 1000;
    }

    const date = Date.parse(retryAfter);
    if (!isNaN(date)) {
        const delay = date - Date.now();
        return delay > 0 ? delay : null;
    }

    return null;
}

/**
 * Adds jitter to a delay to prevent thundering herd
 */
function addJitter(delay: number, jitterFactor: number = 0.25): number {
    const jitter = delay * jitterFactor * Math.random();
    return Math.floor(delay + jitter);
}

export interface RobustFetchOptions extends RequestInit {
    /** Number of retry attempts for transient errors (default: 2) */
    retries?: number;
}

/**
 * Wrapper around fetch that retries on transient errors (including 429 rate limits)
 * and provides improved error messages.
 *
 * @param url - The URL to fetch
 * @param options - Fetch options plus optional retry count
 * @returns The fetch Response
 * @throws FetchError with detailed error information on failure
 */
export async function robustFetch(
    url: string,
    options: RobustFetchOptions = {},
): Promise<Response> {
    const { retries = DEFAULT_RETRY_ATTEMPTS, ...fetchOptions } = options;

    let lastError: unknown;
    let lastResponse: Response | undefined;

    for (let attempt = 0; attempt <= retries; attempt++) {
        try {
            const response = await fetch(url, fetchOptions);

            if (response.status === 429 && attempt < retries) {
                lastResponse = response;
                const retryAfterDelay = parseRetryAfter(
                    response.headers.get('Retry-After'),
                );
                const backoffDelay = RETRY_DELAY_MS * Math.pow(2, attempt);
                await sleep(addJitter(retryAfterDelay ?? backoffDelay));
                continue;
            }

            if (response.status >= 500 && attempt < retries) {
                lastResponse = response;
                await sleep(addJitter(RETRY_DELAY_MS * Math.pow(2, attempt)));
                continue;
            }

            return response;
        } catch (error) {
            lastError = error;

            if (attempt < retries && isTransientError(error)) {
                await sleep(addJitter(RETRY_DELAY_MS * Math.pow(2, attempt)));
                continue;
            }

            throw new FetchError(url, error);
        }
    }

    // Retries exhausted on 429/5xx: hand the last response to the caller
    if (lastResponse) {
        return lastResponse;
    }

    throw new FetchError(url, lastError);
}
