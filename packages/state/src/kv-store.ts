/**
 * `@siteripper/state` - Durable key-value store
 *
 * A store is a snapshot file (`<name>.json`) plus a write-ahead log
 * (`<name>.wal`). Every mutation is appended to the log and synced before
 * the call resolves. The log is folded into the snapshot every
 * `compactionThreshold` writes and when the store is closed.
 */

import { mkdir, readFile, rename, unlink, writeFile } from 'fs/promises';
import { existsSync } from 'fs';
import { join } from 'path';
import { CorruptedStateError, StateIOError, toError } from './errors.js';
import { readWAL, WALWriter, type WALEvent } from './wal.js';

/** Snapshot format version */
export const SNAPSHOT_VERSION = 1;

/** Writes between two compactions */
export const DEFAULT_COMPACTION_THRESHOLD = 100;

export interface KeyValueStoreOptions<V> {
    /**
     * Validates a value read back from disk. Throwing marks the file as
     * corrupted.
     */
    decodeValue: (raw: unknown) => V;
    compactionThreshold?: number;
}

interface Snapshot<V> {
    version: number;
    lastSeq: number;
    entries: Array<[string, V]>;
}

/**
 * Insertion-ordered, disk-backed map from string keys to values of type `V`.
 *
 * @example
 * ```typescript
 * const store = await KeyValueStore.open(cacheDir, 'completed_urls', {
 *     decodeValue: decodeString,
 * });
 * try {
 *     await store.set('https://example.com/', new Date().toISOString());
 * } finally {
 *     await store.close();
 * }
 * ```
 */
export class KeyValueStore<V> {
    private entries = new Map<string, V>();
    private lastCompactedSeq = 0;
    private closed = false;

    private constructor(
        private readonly snapshotPath: string,
        private readonly walPath: string,
        private readonly writer: WALWriter<V>,
        private readonly compactionThreshold: number,
    ) {}

    /**
     * Opens (creating if needed) the store `name` inside `dir`, replaying
     * any uncompacted log entries.
     *
     * @throws {CorruptedStateError} When the snapshot or the log is unreadable
     * @throws {StateIOError} When the files cannot be accessed
     */
    static async open<V>(
        dir: string,
        name: string,
        options: KeyValueStoreOptions<V>,
    ): Promise<KeyValueStore<V>> {
        try {
            await mkdir(dir, { recursive: true });
        } catch (error) {
            throw new StateIOError(`create ${dir}`, toError(error));
        }

        const snapshotPath = join(dir, `${name}.json`);
        const walPath = join(dir, `${name}.wal`);

        const snapshot = await readSnapshot(snapshotPath, options.decodeValue);
        const walResult = await readWAL(walPath, options.decodeValue);

        if (walResult.corrupted) {
            throw new CorruptedStateError(
                walPath,
                walResult.corruptedAtLine,
                `Unreadable entry: ${walResult.corruptedContent ?? ''}`,
            );
        }

        const store = new KeyValueStore<V>(
            snapshotPath,
            walPath,
            new WALWriter<V>(walPath),
            options.compactionThreshold ?? DEFAULT_COMPACTION_THRESHOLD,
        );

        for (const [key, value] of snapshot.entries) {
            store.entries.set(key, value);
        }
        store.lastCompactedSeq = snapshot.lastSeq;
        store.applyEvents(walResult.events);

        await store.writer.open(
            Math.max(snapshot.lastSeq, walResult.lastValidSeq),
        );
        return store;
    }

    get(key: string): V | undefined {
        return this.entries.get(key);
    }

    has(key: string): boolean {
        return this.entries.has(key);
    }

    get size(): number {
        return this.entries.size;
    }

    /**
     * Entries whose key starts with `prefix`, in insertion order.
     */
    entriesWithPrefix(prefix: string): Array<[string, V]> {
        const result: Array<[string, V]> = [];
        for (const entry of this.entries) {
            if (entry[0].startsWith(prefix)) {
                result.push(entry);
            }
        }
        return result;
    }

    async set(key: string, value: V): Promise<void> {
        this.assertOpen();
        await this.writer.append({ op: 'set', key, value });
        this.entries.set(key, value);
        await this.compactIfNeeded();
    }

    /**
     * Removes `key`. Absent keys are a no-op and write nothing.
     */
    async delete(key: string): Promise<void> {
        this.assertOpen();
        if (!this.entries.has(key)) {
            return;
        }
        await this.writer.append({ op: 'delete', key });
        this.entries.delete(key);
        await this.compactIfNeeded();
    }

    /**
     * Folds the log into the snapshot: the snapshot is rewritten atomically
     * (temp file + rename), then the log is truncated.
     */
    async compact(): Promise<void> {
        this.assertOpen();
        const snapshot: Snapshot<V> = {
            version: SNAPSHOT_VERSION,
            lastSeq: this.writer.getCurrentSeq(),
            entries: [...this.entries],
        };

        const tempPath = `${this.snapshotPath}.tmp`;
        try {
            await writeFile(tempPath, JSON.stringify(snapshot), 'utf-8');
            await rename(tempPath, this.snapshotPath);
        } catch (error) {
            if (existsSync(tempPath)) {
                await unlink(tempPath);
            }
            throw new StateIOError('write snapshot', toError(error));
        }

        await this.writer.truncate();
        this.lastCompactedSeq = snapshot.lastSeq;
    }

    /**
     * Compacts outstanding writes and releases the log file. The store
     * rejects writes afterwards.
     */
    async close(): Promise<void> {
        if (this.closed) {
            return;
        }
        if (this.writer.getCurrentSeq() > this.lastCompactedSeq) {
            await this.compact();
        }
        await this.writer.close();
        this.closed = true;
    }

    get isClosed(): boolean {
        return this.closed;
    }

    get paths(): { snapshot: string; wal: string } {
        return { snapshot: this.snapshotPath, wal: this.walPath };
    }

    private applyEvents(events: WALEvent<V>[]): void {
        for (const event of events) {
            if (event.seq <= this.lastCompactedSeq) {
                continue;
            }
            if (event.op === 'set') {
                this.entries.set(event.key, event.value);
            } else {
                this.entries.delete(event.key);
            }
        }
    }

    private async compactIfNeeded(): Promise<void> {
        if (this.writer.getEventsSinceCompaction() >= this.compactionThreshold) {
            await this.compact();
        }
    }

    private assertOpen(): void {
        if (this.closed) {
            throw new Error(`Store ${this.snapshotPath} is closed`);
        }
    }
}

/**
 * Opens a store, runs `fn` with it and closes it whatever `fn` does.
 */
export async function withStore<V, T>(
    dir: string,
    name: string,
    options: KeyValueStoreOptions<V>,
    fn: (store: KeyValueStore<V>) => Promise<T>,
): Promise<T> {
    const store = await KeyValueStore.open(dir, name, options);
    try {
        return await fn(store);
    } finally {
        await store.close();
    }
}

async function readSnapshot<V>(
    snapshotPath: string,
    decodeValue: (raw: unknown) => V,
): Promise<Snapshot<V>> {
    if (!existsSync(snapshotPath)) {
        return { version: SNAPSHOT_VERSION, lastSeq: 0, entries: [] };
    }

    let content: string;
    try {
        content = await readFile(snapshotPath, 'utf-8');
    } catch (error) {
        throw new StateIOError('read snapshot', toError(error));
    }

    try {
        return decodeSnapshot(JSON.parse(content), decodeValue);
    } catch (error) {
        throw new CorruptedStateError(
            snapshotPath,
            undefined,
            toError(error).message,
        );
    }
}

function decodeSnapshot<V>(
    raw: unknown,
    decodeValue: (raw: unknown) => V,
): Snapshot<V> {
    if (typeof raw !== 'object' || raw === null) {
        throw new Error('Snapshot must be an object');
    }
    const version: unknown = Reflect.get(raw, 'version');
    const lastSeq: unknown = Reflect.get(raw, 'lastSeq');
    const entries: unknown = Reflect.get(raw, 'entries');

    if (version !== SNAPSHOT_VERSION) {
        throw new Error(`Unsupported snapshot version: ${String(version)}`);
    }
    if (typeof lastSeq !== 'number' || !Number.isInteger(lastSeq)) {
        throw new Error('Snapshot must have an integer lastSeq');
    }
    if (!Array.isArray(entries)) {
        throw new Error('Snapshot entries must be an array');
    }

    const decoded: Array<[string, V]> = [];
    for (const entry of entries) {
        if (
            !Array.isArray(entry) ||
            entry.length !== 2 ||
            typeof entry[0] !== 'string'
        ) {
            throw new Error('Snapshot entry must be a [key, value] pair');
        }
        decoded.push([entry[0], decodeValue(entry[1])]);
    }
    return { version, lastSeq, entries: decoded };
}
