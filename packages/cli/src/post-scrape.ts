/**
 * Post-scrape pass: literal text replacements over every produced page.
 */

import type { Dirent } from 'fs';
import { readdir, readFile, writeFile } from 'fs/promises';
import { join } from 'path';
import type { ReplaceRule, VerboseCallback } from '@siteripper/types';

export interface PostScrapeResult {
    filesScanned: number;
    filesChanged: number;
}

/**
 * Recursively finds all `.html` files under a directory.
 *
 * A missing directory yields no files.
 */
export async function findHtmlFiles(dir: string): Promise<string[]> {
    let entries: Dirent[];
    try {
        entries = await readdir(dir, { withFileTypes: true });
    } catch (error) {
        if (
            error instanceof Error &&
            'code' in error &&
            error.code === 'ENOENT'
        ) {
            return [];
        }
        throw error;
    }

    const files: string[] = [];
    for (const entry of entries) {
        const fullPath = join(dir, entry.name);
        if (entry.isDirectory()) {
            files.push(...(await findHtmlFiles(fullPath)));
        } else if (entry.isFile() && entry.name.endsWith('.html')) {
            files.push(fullPath);
        }
    }
    return files.sort();
}

/**
 * Applies every rule, in order, to one document.
 */
export function applyReplaceRules(
    html: string,
    rules: readonly ReplaceRule[],
): string {
    let result = html;
    for (const rule of rules) {
        if (rule.identifier) {
            result = result.replaceAll(rule.identifier, rule.text);
        }
    }
    return result;
}

/**
 * Runs the replacement rules over every `.html` file under `outDir`,
 * rewriting only files whose content changed.
 */
export async function runPostScrapeJobs(
    outDir: string,
    rules: readonly ReplaceRule[],
    onVerbose?: VerboseCallback,
): Promise<PostScrapeResult> {
    const result: PostScrapeResult = { filesScanned: 0, filesChanged: 0 };
    if (rules.length === 0) {
        return result;
    }

    for (const file of await findHtmlFiles(outDir)) {
        result.filesScanned++;
        const original = await readFile(file, 'utf-8');
        const updated = applyReplaceRules(original, rules);
        if (updated === original) {
            continue;
        }
        await writeFile(file, updated, 'utf-8');
        result.filesChanged++;
        onVerbose?.({
            type: 'verbose',
            level: 'debug',
            source: 'post-scrape',
            message: `Rewrote ${file}`,
        });
    }
    return result;
}
