/**
 * Event handler factories that render core events in the terminal.
 *
 * The core packages never print; they call these handlers, which log through
 * the {@link SpinnerRegistry} and keep the current page and download on the
 * spinner line.
 */

import chalk from 'chalk';
import type {
    DownloadProgressCallback,
    PageProgressCallback,
    VerboseCallback,
} from '@siteripper/types';
import type { SpinnerRegistry } from '../spinner-registry.js';
import { formatBytes, formatUrlForLog } from './format.js';

/** Running totals shown in the summary line. */
export interface RunStats {
    pagesProcessed: number;
    pagesSkipped: number;
    filesDownloaded: number;
    bytesDownloaded: number;
    warnings: number;
}

export function createRunStats(): RunStats {
    return {
        pagesProcessed: 0,
        pagesSkipped: 0,
        filesDownloaded: 0,
        bytesDownloaded: 0,
        warnings: 0,
    };
}

/** The part of an ora spinner the handlers drive. */
export interface StatusLine {
    text: string;
}

export interface EventHandlerOptions {
    registry: SpinnerRegistry;
    stats: RunStats;
    status: StatusLine;
    /** Show debug and info messages, not only warnings and errors. */
    verbose: boolean;
    /** First seed URL; same-origin URLs are logged as paths. */
    baseUrl: string;
}

const MAX_URL_LENGTH = 70;

/**
 * Create an onVerbose handler. Warnings and errors are always shown and
 * counted; debug and info only in verbose mode.
 */
export function createVerboseHandler(
    options: Pick<EventHandlerOptions, 'registry' | 'stats' | 'verbose'>,
): VerboseCallback {
    const { registry, stats, verbose } = options;

    return (event) => {
        if (event.level === 'warn' || event.level === 'error') {
            stats.warnings++;
        } else if (!verbose) {
            return;
        }

        let prefix: string;
        if (event.level === 'warn') {
            prefix = `[${chalk.yellow('⚠')} ${event.source}]`;
        } else if (event.level === 'error') {
            prefix = `[${chalk.red('✗')} ${event.source}]`;
        } else {
            prefix = `[${event.source}]`;
        }
        registry.safeLog(`${prefix} ${event.message}`, event.level);
    };
}

/**
 * Create an onPageProgress handler.
 */
export function createPageProgressHandler(
    options: EventHandlerOptions,
): PageProgressCallback {
    const { registry, stats, status, verbose, baseUrl } = options;
    let counts = '';

    return (event) => {
        switch (event.type) {
            case 'page-state': {
                const shortUrl = formatUrlForLog(event.url, baseUrl, MAX_URL_LENGTH);
                if (event.state === 'PERSISTED') {
                    stats.pagesProcessed++;
                    registry.safeLog(`${chalk.green('✓')} Saved: ${shortUrl}`, 'info');
                } else {
                    status.text = `${event.state.toLowerCase()} ${shortUrl}${counts}`;
                    if (verbose) {
                        registry.safeLog(`${event.state}: ${shortUrl}`, 'debug');
                    }
                }
                break;
            }

            case 'page-skipped': {
                stats.pagesSkipped++;
                const shortUrl = formatUrlForLog(event.url, baseUrl, MAX_URL_LENGTH);
                registry.safeLog(
                    `${chalk.red('✗')} Skipped: ${shortUrl} - ${event.reason}`,
                    'warn',
                );
                break;
            }

            case 'crawl-status': {
                counts = chalk.gray(
                    ` (${event.processed} done, ${event.queued} queued)`,
                );
                break;
            }
        }
    };
}

/**
 * Create an onDownload handler that shows the current transfer on the
 * status line and counts finished files.
 */
export function createDownloadHandler(
    options: Pick<EventHandlerOptions, 'stats' | 'status' | 'baseUrl'>,
): DownloadProgressCallback {
    const { stats, status, baseUrl } = options;

    return (event) => {
        const shortUrl = formatUrlForLog(event.url, baseUrl, MAX_URL_LENGTH);
        switch (event.phase) {
            case 'start':
                status.text = `Downloading ${shortUrl}`;
                break;
            case 'progress': {
                const total =
                    event.totalBytes > 0 ? ` / ${formatBytes(event.totalBytes)}` : '';
                status.text = `Downloading ${shortUrl} (${formatBytes(event.receivedBytes)}${total})`;
                break;
            }
            case 'complete':
                stats.filesDownloaded++;
                stats.bytesDownloaded += event.receivedBytes;
                break;
        }
    };
}
