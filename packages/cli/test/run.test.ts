import { describe, it, expect, beforeAll, beforeEach, afterEach } from 'vitest';
import { mkdir, mkdtemp, readFile, rm, writeFile } from 'fs/promises';
import { join } from 'path';
import { tmpdir } from 'os';
import chalk from 'chalk';
import { FakePage } from '../../capture/test/helpers/fake-browser.js';
import { runMain, type CliOptions } from '../src/index.js';

const noSleep = async () => {};

describe('runMain', () => {
    let dir: string;
    let out: string[];
    let err: string[];

    const sink = {
        out: (line: string) => out.push(line),
        err: (line: string) => err.push(line),
    };

    function options(overrides: Partial<CliOptions> = {}): CliOptions {
        return {
            jobFile: join(dir, 'job.json'),
            verbose: false,
            headed: false,
            postScrapeOnly: false,
            ...overrides,
        };
    }

    async function writeJob(job: Record<string, unknown>) {
        await writeFile(join(dir, 'job.json'), JSON.stringify(job));
    }

    beforeAll(() => {
        chalk.level = 0;
    });

    beforeEach(async () => {
        dir = await mkdtemp(join(tmpdir(), 'run-main-test-'));
        out = [];
        err = [];
    });

    afterEach(async () => {
        await rm(dir, { recursive: true, force: true });
    });

    it('should exit with 1 and explain a bad job file', async () => {
        const code = await runMain(options(), { sink });

        expect(code).toBe(1);
        expect(err).toHaveLength(1);
        expect(err[0]).toContain('Invalid job configuration: cannot read');
    });

    it('should only run the post-scrape jobs when asked to', async () => {
        await mkdir(join(dir, 'out', 'docs'), { recursive: true });
        await writeFile(join(dir, 'out', 'docs', 'index.html'), '<p>Old Name</p>');
        await writeJob({
            scrape_type: 'ALL_PAGES',
            urls: ['https://example.com/'],
            out_dir: join(dir, 'out'),
            post_scrape_jobs: [{ type: 'REPLACE', identifier: 'Old Name', text: 'New Name' }],
        });

        const code = await runMain(options({ postScrapeOnly: true }), { sink });

        expect(code).toBe(0);
        expect(await readFile(join(dir, 'out', 'docs', 'index.html'), 'utf-8')).toBe(
            '<p>New Name</p>',
        );
        expect(out.at(-1)).toMatch(/^Done in \d+(ms|\.\ds): 1\/1 pages rewritten, 0 warnings$/);
    });

    it('should crawl a page and then apply the post-scrape jobs', async () => {
        await writeJob({
            scrape_type: 'SINGLE_PAGE',
            urls: ['https://example.com/'],
            out_dir: join(dir, 'out'),
            cache_dir: join(dir, 'cache'),
            scrape_elements: [],
            use_sitemap: false,
            scroll_pause_time: 0,
            post_scrape_jobs: [{ type: 'REPLACE', identifier: 'Hello', text: 'Hi' }],
        });
        const page = new FakePage({
            pages: { 'https://example.com/': '<h1>Hello</h1>' },
        });

        const code = await runMain(options(), {
            sink,
            spinner: false,
            scrapeOptions: {
                openPage: async () => ({ page, close: async () => {} }),
                sleep: noSleep,
            },
        });

        expect(err).toEqual([]);
        expect(code).toBe(0);
        expect(page.visited).toEqual(['https://example.com/']);
        expect(await readFile(join(dir, 'out', 'index.html'), 'utf-8')).toBe(
            '<h1>Hi</h1>',
        );
        expect(out.at(-1)).toMatch(
            /^Done in \d+(ms|\.\ds): 1 pages, 0 files \(0 B\), 0 skipped, 0 requests, 1\/1 pages rewritten, 0 warnings$/,
        );
    });
});
