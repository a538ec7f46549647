import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdir, mkdtemp, readFile, rm, stat, writeFile } from 'fs/promises';
import { join } from 'path';
import { tmpdir } from 'os';
import type { ReplaceRule } from '@siteripper/types';
import {
    applyReplaceRules,
    findHtmlFiles,
    runPostScrapeJobs,
} from '../src/post-scrape.js';

function rule(identifier: string, text: string): ReplaceRule {
    return { type: 'REPLACE', identifier, text };
}

describe('applyReplaceRules', () => {
    it('should replace every occurrence, rule by rule', () => {
        expect(
            applyReplaceRules('a-a-b', [rule('a', 'b'), rule('b', 'c')]),
        ).toBe('c-c-c');
    });

    it('should treat identifiers literally', () => {
        expect(applyReplaceRules('x.*y x.*y', [rule('.*', '+')])).toBe('x+y x+y');
    });

    it('should ignore rules with an empty identifier', () => {
        expect(applyReplaceRules('abc', [rule('', 'z')])).toBe('abc');
    });
});

describe('runPostScrapeJobs', () => {
    let dir: string;

    beforeEach(async () => {
        dir = await mkdtemp(join(tmpdir(), 'post-scrape-test-'));
        await mkdir(join(dir, 'a', 'data'), { recursive: true });
        await writeFile(
            join(dir, 'index.html'),
            '<a href="http://old.example.com/x">old</a> http://old.example.com',
        );
        await writeFile(join(dir, 'a', 'index.html'), '<p>nothing here</p>');
        await writeFile(join(dir, 'a', 'data', 'notes.txt'), 'http://old.example.com');
    });

    afterEach(async () => {
        await rm(dir, { recursive: true, force: true });
    });

    it('should find html files recursively', async () => {
        expect(await findHtmlFiles(dir)).toEqual([
            join(dir, 'a', 'index.html'),
            join(dir, 'index.html'),
        ]);
        expect(await findHtmlFiles(join(dir, 'missing'))).toEqual([]);
    });

    it('should rewrite only html files whose content changes', async () => {
        const untouched = (await stat(join(dir, 'a', 'index.html'))).mtimeMs;

        const result = await runPostScrapeJobs(dir, [
            rule('http://old.example.com', 'https://new.example.com'),
        ]);

        expect(result).toEqual({ filesScanned: 2, filesChanged: 1 });
        expect(await readFile(join(dir, 'index.html'), 'utf-8')).toBe(
            '<a href="https://new.example.com/x">old</a> https://new.example.com',
        );
        expect(await readFile(join(dir, 'a', 'data', 'notes.txt'), 'utf-8')).toBe(
            'http://old.example.com',
        );
        expect((await stat(join(dir, 'a', 'index.html'))).mtimeMs).toBe(untouched);
    });

    it('should do nothing without rules', async () => {
        expect(await runPostScrapeJobs(dir, [])).toEqual({
            filesScanned: 0,
            filesChanged: 0,
        });
    });
});
