/**
 * Append-only, tab-separated log of things the crawler could not handle
 * (unsupported iframes, pages that would not load). Each identifier is
 * written once across runs.
 */

import { appendFile, mkdir, readFile } from 'fs/promises';
import { dirname } from 'path';

export const FAILED_IFRAMES_FILE = 'failed_iframes.txt';
export const FAILED_PAGES_FILE = 'failed_pages.txt';

export class FailureLog {
    private constructor(
        readonly path: string,
        private readonly recorded: Set<string>,
    ) {}

    /**
     * Opens the log, loading the identifiers of earlier runs.
     */
    static async open(path: string): Promise<FailureLog> {
        let text = '';
        try {
            text = await readFile(path, 'utf-8');
        } catch (error) {
            if (!(error instanceof Error && Reflect.get(error, 'code') === 'ENOENT')) {
                throw error;
            }
        }

        const recorded = new Set<string>();
        for (const line of text.split('\n')) {
            const identifier = line.split('\t')[0];
            if (identifier) {
                recorded.add(identifier);
            }
        }
        return new FailureLog(path, recorded);
    }

    has(identifier: string): boolean {
        return this.recorded.has(identifier);
    }

    /**
     * Appends `identifier` and `detail` unless the identifier was recorded
     * before. Newlines and tabs in either are flattened to spaces.
     *
     * @returns True if a line was written
     */
    async record(identifier: string, detail: string): Promise<boolean> {
        if (this.recorded.has(identifier)) {
            return false;
        }
        this.recorded.add(identifier);
        const flatten = (value: string) => value.replace(/[\t\r\n]+/g, ' ');
        await mkdir(dirname(this.path), { recursive: true });
        await appendFile(
            this.path,
            `${flatten(identifier)}\t${flatten(detail)}\n`,
            'utf-8',
        );
        return true;
    }
}
