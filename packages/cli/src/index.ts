/**
 * Entry point and run orchestration for the siteripper CLI.
 *
 * A run decodes the job file, crawls every seed with {@link scrape}, then
 * applies the post-scrape replacement rules to the pages on disk and prints
 * a summary line.
 */

import chalk from 'chalk';
import ora, { type Ora } from 'ora';
import {
    LoginElementNotFoundError,
    NavigationError,
    scrape,
    type ScrapeOptions,
    type ScrapeResult,
} from '@siteripper/capture';
import { FetchError } from '@siteripper/http';
import type { JobConfig } from '@siteripper/types';
import { parseArgs, type CliOptions } from './cli.js';
import { ConfigError, loadJobConfig } from './config.js';
import { runPostScrapeJobs, type PostScrapeResult } from './post-scrape.js';
import {
    createDownloadHandler,
    createPageProgressHandler,
    createRunStats,
    createVerboseHandler,
    formatBytes,
    formatDuration,
    type RunStats,
} from './progress/index.js';
import { SpinnerRegistry, type LogSink } from './spinner-registry.js';

export { ConfigError, decodeJobConfig, loadJobConfig } from './config.js';
export { applyReplaceRules, findHtmlFiles, runPostScrapeJobs } from './post-scrape.js';
export type { CliOptions } from './cli.js';

/**
 * Collaborators a caller can replace, mainly for tests.
 */
export interface RunDependencies {
    /** Passed through to {@link scrape}, e.g. a different browser tab. */
    scrapeOptions?: Pick<ScrapeOptions, 'openPage' | 'handlers' | 'sleep' | 'random'>;
    /** Where log lines go; the console by default. */
    sink?: LogSink;
    /** Draw a spinner while crawling. */
    spinner?: boolean;
}

/**
 * Renders a fatal error with as much context as its type carries.
 */
export function formatFatalError(error: unknown, verbose: boolean): string {
    if (error instanceof FetchError) {
        return error.format(verbose);
    }
    if (error instanceof NavigationError) {
        return (
            `${error.message}. ` +
            'Set "navigation_failure": "skip" in the job file to continue past unreachable pages.'
        );
    }
    if (error instanceof ConfigError || error instanceof LoginElementNotFoundError) {
        return error.message;
    }
    if (error instanceof Error) {
        return verbose && error.stack ? error.stack : `${error.name}: ${error.message}`;
    }
    return String(error);
}

/**
 * One line summarising a finished run.
 */
export function formatSummary(
    elapsedMs: number,
    stats: RunStats,
    scrapeResult: ScrapeResult | null,
    postScrape: PostScrapeResult | null,
): string {
    const parts: string[] = [];
    if (scrapeResult) {
        parts.push(
            `${stats.pagesProcessed} pages`,
            `${stats.filesDownloaded} files (${formatBytes(stats.bytesDownloaded)})`,
            `${stats.pagesSkipped} skipped`,
            `${scrapeResult.requests} requests`,
        );
    }
    if (postScrape) {
        parts.push(`${postScrape.filesChanged}/${postScrape.filesScanned} pages rewritten`);
    }
    parts.push(`${stats.warnings} warnings`);
    return `Done in ${formatDuration(elapsedMs)}: ${parts.join(', ')}`;
}

async function crawl(
    config: JobConfig,
    options: CliOptions,
    registry: SpinnerRegistry,
    stats: RunStats,
    deps: RunDependencies,
): Promise<ScrapeResult> {
    const spinner: Ora = ora({
        text: `Crawling ${config.urls.length} seed URL(s)...`,
        color: 'cyan',
        isSilent: deps.spinner === false,
    }).start();
    registry.register(spinner);

    const handlerOptions = {
        registry,
        stats,
        status: spinner,
        verbose: options.verbose,
        baseUrl: config.urls[0] ?? '',
    };

    try {
        const result = await scrape(config, {
            ...deps.scrapeOptions,
            onVerbose: createVerboseHandler(handlerOptions),
            onPageProgress: createPageProgressHandler(handlerOptions),
            onDownload: createDownloadHandler(handlerOptions),
        });
        spinner.succeed(
            `Crawled ${chalk.bold(result.pagesProcessed)} pages` +
                (result.pagesSkipped > 0
                    ? chalk.yellow(` (${result.pagesSkipped} skipped)`)
                    : ''),
        );
        return result;
    } catch (error) {
        spinner.fail('Crawl stopped');
        throw error;
    } finally {
        registry.unregister(spinner);
    }
}

/**
 * Runs one job.
 *
 * @returns The process exit code: 0 on success, 1 on a fatal error
 */
export async function runMain(
    options: CliOptions,
    deps: RunDependencies = {},
): Promise<number> {
    const registry = new SpinnerRegistry(deps.sink);
    registry.setupSignalHandlers();
    const started = Date.now();
    const stats = createRunStats();

    try {
        const config = await loadJobConfig(options.jobFile, {
            headless: options.headed ? false : undefined,
            postScrapeJobsOnly: options.postScrapeOnly,
        });

        registry.print(chalk.bold.cyan('\n  siteripper'));
        registry.print(chalk.gray('  ' + '─'.repeat(10)));

        const scrapeResult = config.postScrapeJobsOnly
            ? null
            : await crawl(config, options, registry, stats, deps);

        let postScrape: PostScrapeResult | null = null;
        if (config.postScrapeJobs.length > 0) {
            postScrape = await runPostScrapeJobs(
                config.outDir,
                config.postScrapeJobs,
                createVerboseHandler({ registry, stats, verbose: options.verbose }),
            );
        }

        registry.print(
            chalk.green(formatSummary(Date.now() - started, stats, scrapeResult, postScrape)),
        );
        return 0;
    } catch (error) {
        registry.safeLog(formatFatalError(error, options.verbose), 'error');
        return 1;
    } finally {
        registry.cleanup();
    }
}

/**
 * CLI entry point: parses the command line and runs the job.
 */
export async function main(): Promise<void> {
    await parseArgs();
}
