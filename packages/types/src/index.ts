/**
 * `@siteripper/types`
 *
 * Shared TypeScript types for siteripper packages: the job configuration,
 * download results, scrape jobs and the events the core emits for the CLI
 * to render.
 *
 * @packageDocumentation
 */

// ============================================================================
// JOB CONFIGURATION
// ============================================================================

/**
 * How seed URLs are treated.
 *
 * - `SINGLE_PAGE`: every seed is processed once, links are never followed
 * - `ALL_PAGES`: every seed is a site base URL whose link graph is crawled
 */
export const CrawlMode = {
    SINGLE_PAGE: 'SINGLE_PAGE',
    ALL_PAGES: 'ALL_PAGES',
} as const;

export type CrawlMode = (typeof CrawlMode)[keyof typeof CrawlMode];

/**
 * Element kinds extracted from each page, combinable as a bitmask.
 *
 * @example
 * ```typescript
 * const elements = ScrapeElements.IMAGES | ScrapeElements.VIDEOS;
 * if (elements & ScrapeElements.IMAGES) {
 *     // run the image handler
 * }
 * ```
 */
export const ScrapeElements = {
    NONE: 0,
    VIDEOS: 1,
    IMAGES: 2,
    HTML: 4,
    IFRAMES: 8,
    ALL: 15,
} as const;

export type ScrapeElementName = Exclude<
    keyof typeof ScrapeElements,
    'NONE' | 'ALL'
>;

export type QueueType = 'FIFO' | 'LIFO';

/** What happens when a page never converges on its requested URL. */
export type NavigationFailurePolicy = 'abort' | 'skip';

/** A browser cookie injected before the first navigation. */
export interface Cookie {
    name: string;
    value: string;
    domain: string;
    path: string;
}

/** How a login-script element is located on the page. */
export type LocatorKind = 'ID' | 'CLASS' | 'TAG' | 'XPATH' | 'NAME' | 'CSS';

/** What to do with a login-script element once it is visible. */
export type LoginTask = 'GO_TO' | 'CLICK';

export interface LoginStep {
    /** Locator string, interpreted according to `kind`. */
    locator: string;
    kind: LocatorKind;
    /** Text typed into the element before `task` runs. */
    value?: string;
    /** `GO_TO` switches later lookups into the element's frame. */
    task?: LoginTask;
}

export interface LoginScript {
    url: string;
    steps: LoginStep[];
}

/** Names downloaded media after an element on the page. */
export interface ContentNameRule {
    /** XPath of the element whose text becomes the filename. */
    xpath: string;
    prefix: string;
}

/** A literal text replacement applied to every produced `.html` file. */
export interface ReplaceRule {
    type: 'REPLACE';
    identifier: string;
    text: string;
}

/**
 * Immutable run configuration, decoded once from the job file.
 */
export interface JobConfig {
    readonly mode: CrawlMode;
    readonly urls: readonly string[];
    readonly outDir: string;
    /** Folder under each page directory that receives its assets. */
    readonly dataDirectory: string;
    /** Bitmask of {@link ScrapeElements}. */
    readonly elements: number;
    readonly useSitemap: boolean;
    readonly resume: boolean;
    readonly queueType: QueueType;
    /** Politeness delay bounds in milliseconds; zero disables pacing. */
    readonly minDelayMs: number;
    readonly maxDelayMs: number;
    readonly scrollPauseMs: number;
    readonly contentName?: ContentNameRule;
    readonly cookies: readonly Cookie[];
    readonly login?: LoginScript;
    readonly substringsToSkip: readonly string[];
    /** Iframe identifier substring mapped to an ignore category. */
    readonly iframeIgnore: Readonly<Record<string, string>>;
    readonly postScrapeJobs: readonly ReplaceRule[];
    readonly postScrapeJobsOnly: boolean;
    readonly userAgent: string;
    readonly cacheDir: string;
    readonly navigationFailure: NavigationFailurePolicy;
    readonly headless: boolean;
}

// ============================================================================
// DOWNLOADS
// ============================================================================

export const DownloadResult = {
    SUCCESS: 'SUCCESS',
    SKIPPED: 'SKIPPED',
    FAIL: 'FAIL',
} as const;

export type DownloadResult =
    (typeof DownloadResult)[keyof typeof DownloadResult];

/**
 * How the fetcher resolves a name collision in the output directory.
 */
export const DuplicatePolicy = {
    /** Append a numeric suffix until the name is free. */
    FIND_VALID_FILE: 'FIND_VALID_FILE',
    /** Delete the existing file first. */
    OVERWRITE: 'OVERWRITE',
    /** Raise a `DuplicateFileError`. */
    THROW_ERROR: 'THROW_ERROR',
    /** Keep the existing file and discard the new download. */
    SKIP: 'SKIP',
    /** Reuse the existing file when its content hash matches. */
    HASH_COMPARE: 'HASH_COMPARE',
} as const;

export type DuplicatePolicy =
    (typeof DuplicatePolicy)[keyof typeof DuplicatePolicy];

/**
 * Outcome of one fetch, also the value stored in the download cache.
 */
export interface DownloadedFile {
    result: DownloadResult;
    /** Absolute path of the stored file; null unless `result` is SUCCESS. */
    filename: string | null;
    /** Response headers, lower-cased names. */
    headers: Record<string, string>;
}

/**
 * The download cache as seen by the fetcher. Lookups work by final URL and by
 * any pre-redirect URL the entry was stored under.
 */
export interface DownloadCache {
    cachedDownload(url: string): DownloadedFile | undefined;
    storeDownload(
        url: string,
        entry: DownloadedFile,
        altUrls?: readonly string[],
    ): Promise<void>;
}

/**
 * Extension (without the dot, lower case) to output sub-folder.
 */
export interface GroupByMapping {
    folders: Record<string, string>;
    /** Folder for extensions missing from `folders`. */
    fallback: string;
}

// ============================================================================
// SCRAPE JOBS
// ============================================================================

/**
 * Replace every quoted or parenthesized occurrence of `original` in the page
 * HTML with the path of `localPath` relative to the page directory.
 */
export interface UrlScrapeJob {
    kind: 'url';
    original: string;
    localPath: string | null;
    /**
     * Restricts the replacement to values of this attribute, e.g. `href`
     * for a link written relative to its page.
     */
    attribute?: string;
}

/**
 * Replace the element carrying `attribute="identifier"` with `snippet`,
 * where `{{src}}` in the snippet becomes the relative path of `localPath`.
 */
export interface VideoScrapeJob {
    kind: 'video';
    identifier: string;
    attribute: string;
    localPath: string | null;
    snippet: string;
}

export type ScrapeJob = UrlScrapeJob | VideoScrapeJob;

// ============================================================================
// EVENTS
// ============================================================================

export type VerboseLevel = 'debug' | 'info' | 'warn' | 'error';

/**
 * Diagnostic message emitted by the core packages.
 */
export interface VerboseEvent {
    type: 'verbose';
    level: VerboseLevel;
    /** Component that produced the message, e.g. `fetcher`. */
    source: string;
    message: string;
    data?: Record<string, unknown>;
}

export type VerboseCallback = (event: VerboseEvent) => void;

/**
 * Byte-level progress of a single download.
 */
export interface DownloadProgressEvent {
    type: 'download';
    phase: 'start' | 'progress' | 'complete';
    url: string;
    receivedBytes: number;
    /** Declared length, zero when the server sent none. */
    totalBytes: number;
}

export type DownloadProgressCallback = (event: DownloadProgressEvent) => void;

/** Stage names of the page-processing state machine. */
export type PageState =
    | 'LOADED'
    | 'EXTRACTING'
    | 'LINK_DISCOVERY'
    | 'REWRITING'
    | 'PERSISTED';

export type PageProgressEvent =
    | {
          type: 'page-state';
          url: string;
          state: PageState;
      }
    | {
          type: 'page-skipped';
          url: string;
          reason: string;
      }
    | {
          type: 'crawl-status';
          base: string;
          processed: number;
          queued: number;
      };

export type PageProgressCallback = (event: PageProgressEvent) => void;
