/**
 * `@siteripper/state`
 *
 * Durable crawl state: the completed, queued and download stores that let
 * an interrupted crawl resume where it stopped.
 *
 * @packageDocumentation
 */

export {
    CrawlCache,
    withCrawlCache,
    decodeDownloadedFile,
    COMPLETED_STORE,
    QUEUED_STORE,
    DOWNLOADS_STORE,
    type CrawlCacheOptions,
} from './crawl-cache.js';
export {
    KeyValueStore,
    withStore,
    DEFAULT_COMPACTION_THRESHOLD,
    SNAPSHOT_VERSION,
    type KeyValueStoreOptions,
} from './kv-store.js';
export {
    readWAL,
    validateEvent,
    WALWriter,
    type WALEvent,
    type WALEventPayload,
    type WALReadResult,
} from './wal.js';
export { CorruptedStateError, StateIOError, toError } from './errors.js';
