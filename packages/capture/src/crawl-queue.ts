/**
 * Crawl frontier: an ordered set of pages waiting to be processed.
 */

import type { QueueType } from '@siteripper/types';
import { defragment } from '@siteripper/utils';

/**
 * The parts of the crawl cache the frontier consults.
 */
export interface FrontierStore {
    isCompleted(url: string, base: string): boolean;
    addQueued(url: string, base: string): Promise<void>;
}

/**
 * Ordered set of URLs to crawl.
 *
 * A URL is accepted once for the life of the queue: enqueuing a URL that is
 * waiting, or that has already been taken, is a no-op. FIFO yields a
 * breadth-first crawl, LIFO a depth-first one.
 */
export class CrawlQueue {
    private items: string[] = [];
    private accepted = new Set<string>();

    constructor(private readonly order: QueueType = 'FIFO') {}

    /**
     * Add a URL unless it was accepted before.
     *
     * @returns True if the URL was added
     */
    enqueue(url: string): boolean {
        if (this.accepted.has(url)) {
            return false;
        }
        this.accepted.add(url);
        this.items.push(url);
        return true;
    }

    /**
     * Take the next URL: the oldest under FIFO, the newest under LIFO.
     *
     * @returns The URL, or null when the queue is empty
     */
    dequeue(): string | null {
        const next = this.order === 'FIFO' ? this.items.shift() : this.items.pop();
        return next ?? null;
    }

    isEmpty(): boolean {
        return this.items.length === 0;
    }

    get size(): number {
        return this.items.length;
    }

    /**
     * Whether the URL was ever accepted.
     */
    has(url: string): boolean {
        return this.accepted.has(url);
    }

    /**
     * URLs waiting, in the order they will be taken.
     */
    pending(): string[] {
        return this.order === 'FIFO'
            ? [...this.items]
            : [...this.items].reverse();
    }
}

/**
 * Add a discovered URL to the frontier unless the page is already done.
 *
 * The fragment is dropped first, so `/a#top` and `/a` are one page. New
 * entries are also recorded in the persistent queue so an interrupted crawl
 * can resume.
 *
 * @returns True if the URL was added
 */
export async function addToFrontierIfNew(
    queue: CrawlQueue,
    store: FrontierStore,
    url: string,
    base: string,
): Promise<boolean> {
    const page = defragment(url);
    if (store.isCompleted(page, base) || !queue.enqueue(page)) {
        return false;
    }
    await store.addQueued(page, base);
    return true;
}
