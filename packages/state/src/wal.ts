/**
 * `@siteripper/state` - Write-ahead log
 *
 * Append-only log for durability. Each event is written as a JSON line
 * followed by a newline, and fsync is called after each write.
 */

import { open, readFile, type FileHandle } from 'fs/promises';
import { existsSync } from 'fs';
import { StateIOError, toError } from './errors.js';

/**
 * One mutation of a key-value store.
 */
export type WALEvent<V> =
    | { seq: number; timestamp: string; op: 'set'; key: string; value: V }
    | { seq: number; timestamp: string; op: 'delete'; key: string };

export type WALEventPayload<V> =
    | { op: 'set'; key: string; value: V }
    | { op: 'delete'; key: string };

/**
 * Result of reading a WAL file.
 */
export interface WALReadResult<V> {
    /** Successfully parsed events */
    events: WALEvent<V>[];
    /** Last valid sequence number */
    lastValidSeq: number;
    /** Whether corruption was detected */
    corrupted: boolean;
    /** Line number where corruption was detected (1-based) */
    corruptedAtLine?: number;
    /** The corrupted line content (for debugging) */
    corruptedContent?: string;
}

/**
 * Validate that a parsed line is a WAL event whose value passes
 * `decodeValue`.
 *
 * @throws {Error} When the object is not a valid WAL event
 */
export function validateEvent<V>(
    obj: unknown,
    decodeValue: (raw: unknown) => V,
): WALEvent<V> {
    if (typeof obj !== 'object' || obj === null) {
        throw new Error('Event must be an object');
    }

    const seq: unknown = Reflect.get(obj, 'seq');
    const timestamp: unknown = Reflect.get(obj, 'timestamp');
    const op: unknown = Reflect.get(obj, 'op');
    const key: unknown = Reflect.get(obj, 'key');

    if (typeof seq !== 'number' || !Number.isInteger(seq)) {
        throw new Error('Event must have an integer seq number');
    }
    if (typeof timestamp !== 'string') {
        throw new Error('Event must have a timestamp string');
    }
    if (typeof key !== 'string') {
        throw new Error('Event must have a string key');
    }

    if (op === 'set') {
        const value = decodeValue(Reflect.get(obj, 'value'));
        return { seq, timestamp, op, key, value };
    }
    if (op === 'delete') {
        return { seq, timestamp, op, key };
    }
    throw new Error(`Invalid event op: ${String(op)}`);
}

/**
 * Read and parse all events from a WAL file.
 *
 * Parsing stops at the first invalid line; the events before it are
 * returned together with the corruption details.
 *
 * @throws {StateIOError} When the file cannot be read
 */
export async function readWAL<V>(
    walPath: string,
    decodeValue: (raw: unknown) => V,
): Promise<WALReadResult<V>> {
    if (!existsSync(walPath)) {
        return { events: [], lastValidSeq: 0, corrupted: false };
    }

    let content: string;
    try {
        content = await readFile(walPath, 'utf-8');
    } catch (error) {
        throw new StateIOError('read WAL', toError(error));
    }

    const lines = content.split('\n');
    const events: WALEvent<V>[] = [];
    let lastValidSeq = 0;

    for (let i = 0; i < lines.length; i++) {
        const line = lines[i].trim();

        if (!line) {
            continue;
        }

        try {
            const event = validateEvent(JSON.parse(line), decodeValue);
            events.push(event);
            lastValidSeq = event.seq;
        } catch {
            return {
                events,
                lastValidSeq,
                corrupted: true,
                corruptedAtLine: i + 1,
                corruptedContent: line.substring(0, 200),
            };
        }
    }

    return { events, lastValidSeq, corrupted: false };
}

/**
 * Write-ahead log writer.
 *
 * Writes are serialized: each append waits for the previous one to reach
 * the disk before its own line is written.
 */
export class WALWriter<V> {
    private fd: FileHandle | null = null;
    private seq = 0;
    private eventsSinceCompaction = 0;
    private queue: Promise<void> = Promise.resolve();

    constructor(private walPath: string) {}

    /**
     * Open the WAL file for appending.
     *
     * @param startSeq - Sequence number of the last event already applied
     * @throws {StateIOError} When the file cannot be opened
     */
    async open(startSeq = 0): Promise<void> {
        if (this.fd) {
            throw new Error('WAL writer is already open');
        }

        try {
            this.fd = await open(this.walPath, 'a');
            this.seq = startSeq;
            this.eventsSinceCompaction = 0;
        } catch (error) {
            throw new StateIOError('open WAL', toError(error));
        }
    }

    /**
     * Append an event and wait until it is synced.
     *
     * @returns The sequence number assigned to this event
     */
    append(event: WALEventPayload<V>): Promise<number> {
        const write = this.queue.then(() => this.writeEvent(event));
        this.queue = write.then(
            () => undefined,
            () => undefined,
        );
        return write;
    }

    private async writeEvent(event: WALEventPayload<V>): Promise<number> {
        if (!this.fd) {
            throw new Error('WAL writer is not open');
        }

        const seq = this.seq + 1;
        const line =
            JSON.stringify({
                seq,
                timestamp: new Date().toISOString(),
                ...event,
            }) + '\n';

        try {
            await this.fd.write(line);
            await this.fd.sync();
        } catch (error) {
            throw new StateIOError('write WAL event', toError(error));
        }

        this.seq = seq;
        this.eventsSinceCompaction++;
        return seq;
    }

    getCurrentSeq(): number {
        return this.seq;
    }

    getEventsSinceCompaction(): number {
        return this.eventsSinceCompaction;
    }

    /**
     * Truncate the WAL file after its events were compacted.
     */
    async truncate(): Promise<void> {
        if (!this.fd) {
            throw new Error('WAL writer is not open');
        }

        await this.queue;
        try {
            await this.fd.truncate(0);
            await this.fd.sync();
            this.eventsSinceCompaction = 0;
        } catch (error) {
            throw new StateIOError('truncate WAL', toError(error));
        }
    }

    /**
     * Close the WAL file once pending writes have finished.
     */
    async close(): Promise<void> {
        if (!this.fd) {
            return;
        }

        await this.queue;
        try {
            await this.fd.close();
            this.fd = null;
        } catch (error) {
            throw new StateIOError('close WAL', toError(error));
        }
    }

    isOpen(): boolean {
        return this.fd !== null;
    }
}
