/**
 * Job file decoding.
 *
 * The job file is snake_case JSON. Every entity has its own decoder that
 * checks required fields and types and fails with a {@link ConfigError}
 * naming the dotted path of the offending field.
 */

import { readFile } from 'fs/promises';
import {
    CrawlMode,
    ScrapeElements,
    type ContentNameRule,
    type Cookie,
    type JobConfig,
    type LocatorKind,
    type LoginScript,
    type LoginStep,
    type LoginTask,
    type NavigationFailurePolicy,
    type QueueType,
    type ReplaceRule,
    type ScrapeElementName,
} from '@siteripper/types';
import { tryParseUrl, VERSION } from '@siteripper/utils';

export const DEFAULT_JOB_FILE = 'job.json';

/**
 * Error thrown when the job file is missing, unreadable or malformed.
 */
export class ConfigError extends Error {
    readonly name = 'ConfigError';

    /**
     * @param field - Dotted path of the offending field, empty for the whole file
     * @param reason - What is wrong with it
     */
    constructor(
        public readonly field: string,
        public readonly reason: string,
    ) {
        super(
            field
                ? `Invalid job configuration at ${field}: ${reason}`
                : `Invalid job configuration: ${reason}`,
        );
    }
}

/** Values the command line can force over the job file. */
export interface ConfigOverrides {
    headless?: boolean;
    postScrapeJobsOnly?: boolean;
}

// ============================================================================
// FIELD READERS
// ============================================================================

type JsonObject = Record<string, unknown>;

const ELEMENT_NAMES: readonly ScrapeElementName[] = [
    'VIDEOS',
    'IMAGES',
    'HTML',
    'IFRAMES',
];
const LOCATOR_KINDS: readonly LocatorKind[] = [
    'ID',
    'CLASS',
    'TAG',
    'XPATH',
    'NAME',
    'CSS',
];
const LOGIN_TASKS: readonly LoginTask[] = ['GO_TO', 'CLICK'];
const QUEUE_TYPES: readonly QueueType[] = ['FIFO', 'LIFO'];
const NAVIGATION_POLICIES: readonly NavigationFailurePolicy[] = [
    'abort',
    'skip',
];
const CRAWL_MODES: readonly CrawlMode[] = Object.values(CrawlMode);

function fieldPath(parent: string, key: string | number): string {
    if (typeof key === 'number') {
        return `${parent}[${key}]`;
    }
    return parent ? `${parent}.${key}` : key;
}

function isObject(value: unknown): value is JsonObject {
    return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function expectObject(value: unknown, path: string): JsonObject {
    if (!isObject(value)) {
        throw new ConfigError(path, 'expected an object');
    }
    return value;
}

function requiredString(object: JsonObject, key: string, parent: string): string {
    const path = fieldPath(parent, key);
    const value = object[key];
    if (value === undefined || value === null) {
        throw new ConfigError(path, 'is required');
    }
    if (typeof value !== 'string') {
        throw new ConfigError(path, 'expected a string');
    }
    return value;
}

function optionalString(
    object: JsonObject,
    key: string,
    parent: string,
): string | undefined {
    if (object[key] === undefined || object[key] === null) {
        return undefined;
    }
    return requiredString(object, key, parent);
}

function optionalBoolean(
    object: JsonObject,
    key: string,
    parent: string,
    fallback: boolean,
): boolean {
    const value = object[key];
    if (value === undefined || value === null) {
        return fallback;
    }
    if (typeof value !== 'boolean') {
        throw new ConfigError(fieldPath(parent, key), 'expected true or false');
    }
    return value;
}

/** Reads a non-negative number of seconds and returns milliseconds. */
function optionalSeconds(
    object: JsonObject,
    key: string,
    parent: string,
    fallbackSeconds: number,
): number {
    const value = object[key] ?? fallbackSeconds;
    if (typeof value !== 'number' || !Number.isFinite(value) || value < 0) {
        throw new ConfigError(
            fieldPath(parent, key),
            'expected a non-negative number of seconds',
        );
    }
    return Math.round(value * 1000);
}

function oneOf<T extends string>(
    value: unknown,
    allowed: readonly T[],
    path: string,
): T {
    const match = allowed.find((candidate) => candidate === value);
    if (match === undefined) {
        throw new ConfigError(path, `expected one of ${allowed.join(', ')}`);
    }
    return match;
}

function optionalOneOf<T extends string>(
    object: JsonObject,
    key: string,
    parent: string,
    allowed: readonly T[],
    fallback: T,
): T {
    const value = object[key];
    if (value === undefined || value === null) {
        return fallback;
    }
    return oneOf(value, allowed, fieldPath(parent, key));
}

function arrayField(object: JsonObject, key: string, parent: string): unknown[] {
    const value = object[key];
    if (value === undefined || value === null) {
        return [];
    }
    if (!Array.isArray(value)) {
        throw new ConfigError(fieldPath(parent, key), 'expected a list');
    }
    return value;
}

function stringList(object: JsonObject, key: string, parent: string): string[] {
    const path = fieldPath(parent, key);
    return arrayField(object, key, parent).map((item, index) => {
        if (typeof item !== 'string') {
            throw new ConfigError(fieldPath(path, index), 'expected a string');
        }
        return item;
    });
}

// ============================================================================
// ENTITY DECODERS
// ============================================================================

/**
 * Decodes `scrape_elements`: either a list of element names or the numeric
 * bitmask itself. Absent means every element kind.
 */
export function decodeScrapeElements(value: unknown, path = 'scrape_elements'): number {
    if (value === undefined || value === null) {
        return ScrapeElements.ALL;
    }
    if (typeof value === 'number') {
        if (!Number.isInteger(value) || value < 0 || value > ScrapeElements.ALL) {
            throw new ConfigError(path, `expected a bitmask between 0 and ${ScrapeElements.ALL}`);
        }
        return value;
    }
    if (!Array.isArray(value)) {
        throw new ConfigError(path, 'expected a list of element names or a bitmask');
    }
    let mask: number = ScrapeElements.NONE;
    value.forEach((item, index) => {
        mask |= ScrapeElements[oneOf(item, ELEMENT_NAMES, fieldPath(path, index))];
    });
    return mask;
}

function decodeCookie(value: unknown, path: string): Cookie {
    const object = expectObject(value, path);
    return {
        name: requiredString(object, 'name', path),
        value: requiredString(object, 'value', path),
        domain: requiredString(object, 'domain', path),
        path: optionalString(object, 'path', path) ?? '/',
    };
}

function decodeLoginStep(value: unknown, path: string): LoginStep {
    const object = expectObject(value, path);
    const step: LoginStep = {
        locator: requiredString(object, 'identifier', path),
        kind: oneOf(object.ui_type, LOCATOR_KINDS, fieldPath(path, 'ui_type')),
    };
    const input = optionalString(object, 'value', path);
    if (input !== undefined) {
        step.value = input;
    }
    if (object.task !== undefined && object.task !== null) {
        step.task = oneOf(object.task, LOGIN_TASKS, fieldPath(path, 'task'));
    }
    return step;
}

function decodeLogin(value: unknown, path: string): LoginScript {
    const object = expectObject(value, path);
    const childrenPath = fieldPath(path, 'children');
    return {
        url: requiredString(object, 'url', path),
        steps: arrayField(object, 'children', path).map((child, index) =>
            decodeLoginStep(child, fieldPath(childrenPath, index)),
        ),
    };
}

function decodeContentName(value: unknown, path: string): ContentNameRule {
    const object = expectObject(value, path);
    return {
        xpath: requiredString(object, 'id', path),
        prefix: optionalString(object, 'prefix', path) ?? '',
    };
}

function decodeReplaceRule(value: unknown, path: string): ReplaceRule {
    const object = expectObject(value, path);
    oneOf(object.type, ['REPLACE'], fieldPath(path, 'type'));
    return {
        type: 'REPLACE',
        identifier: requiredString(object, 'identifier', path),
        text: requiredString(object, 'text', path),
    };
}

function decodeIframeIgnore(value: unknown, path: string): Record<string, string> {
    if (value === undefined || value === null) {
        return {};
    }
    const object = expectObject(value, path);
    const ignore: Record<string, string> = {};
    for (const [key, category] of Object.entries(object)) {
        if (typeof category !== 'string') {
            throw new ConfigError(fieldPath(path, key), 'expected a string');
        }
        ignore[key] = category;
    }
    return ignore;
}

/**
 * Decodes a parsed job document into a frozen {@link JobConfig}.
 *
 * @throws {ConfigError} On the first missing or mistyped field
 */
export function decodeJobConfig(
    raw: unknown,
    overrides: ConfigOverrides = {},
): JobConfig {
    const job = expectObject(raw, '');

    const mode = oneOf(job.scrape_type, CRAWL_MODES, 'scrape_type');
    const urls = stringList(job, 'urls', '');
    if (urls.length === 0) {
        throw new ConfigError('urls', 'needs at least one URL');
    }
    urls.forEach((url, index) => {
        if (!tryParseUrl(url)) {
            throw new ConfigError(fieldPath('urls', index), `not an absolute URL: ${url}`);
        }
    });

    const minDelayMs = optionalSeconds(job, 'timeout_min', '', 0);
    const maxDelayMs = optionalSeconds(job, 'timeout_max', '', 0);
    if (maxDelayMs < minDelayMs) {
        throw new ConfigError('timeout_max', 'must not be less than timeout_min');
    }

    const config: JobConfig = {
        mode,
        urls,
        outDir: requiredString(job, 'out_dir', ''),
        dataDirectory: optionalString(job, 'data_directory', '') ?? 'data',
        elements: decodeScrapeElements(job.scrape_elements),
        useSitemap: optionalBoolean(job, 'use_sitemap', '', true),
        resume: optionalBoolean(job, 'resume', '', true),
        queueType: optionalOneOf(job, 'queue_type', '', QUEUE_TYPES, 'FIFO'),
        minDelayMs,
        maxDelayMs,
        scrollPauseMs: optionalSeconds(job, 'scroll_pause_time', '', 0.5),
        contentName:
            job.content_name === undefined || job.content_name === null
                ? undefined
                : decodeContentName(job.content_name, 'content_name'),
        cookies: arrayField(job, 'cookies', '').map((cookie, index) =>
            decodeCookie(cookie, fieldPath('cookies', index)),
        ),
        login:
            job.login === undefined || job.login === null
                ? undefined
                : decodeLogin(job.login, 'login'),
        substringsToSkip: stringList(job, 'substrings_to_skip', ''),
        iframeIgnore: decodeIframeIgnore(job.iframe_ignore, 'iframe_ignore'),
        postScrapeJobs: arrayField(job, 'post_scrape_jobs', '').map((rule, index) =>
            decodeReplaceRule(rule, fieldPath('post_scrape_jobs', index)),
        ),
        postScrapeJobsOnly:
            overrides.postScrapeJobsOnly ||
            optionalBoolean(job, 'post_scrape_jobs_only', '', false),
        userAgent: optionalString(job, 'user_agent', '') ?? `siteripper/${VERSION}`,
        cacheDir: optionalString(job, 'cache_dir', '') ?? 'cache',
        navigationFailure: optionalOneOf(
            job,
            'navigation_failure',
            '',
            NAVIGATION_POLICIES,
            'abort',
        ),
        headless: overrides.headless ?? optionalBoolean(job, 'headless', '', true),
    };
    return Object.freeze(config);
}

/**
 * Reads and decodes a job file.
 *
 * @throws {ConfigError} When the file cannot be read, is not JSON, or fails
 *   decoding
 */
export async function loadJobConfig(
    path: string,
    overrides: ConfigOverrides = {},
): Promise<JobConfig> {
    let text: string;
    try {
        text = await readFile(path, 'utf-8');
    } catch (error) {
        const message = error instanceof Error ? error.message : String(error);
        throw new ConfigError('', `cannot read ${path}: ${message}`);
    }

    let raw: unknown;
    try {
        raw = JSON.parse(text);
    } catch (error) {
        const message = error instanceof Error ? error.message : String(error);
        throw new ConfigError('', `${path} is not valid JSON: ${message}`);
    }
    return decodeJobConfig(raw, overrides);
}
