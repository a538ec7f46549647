/**
 * Terminal rendering of scrape progress.
 *
 * @packageDocumentation
 */

export {
    createDownloadHandler,
    createPageProgressHandler,
    createRunStats,
    createVerboseHandler,
    type EventHandlerOptions,
    type RunStats,
    type StatusLine,
} from './event-handlers.js';

export {
    formatBytes,
    formatDuration,
    formatUrlForLog,
    truncate,
} from './format.js';
